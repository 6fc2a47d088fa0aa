import { describe, it, expect } from 'vitest';
import { RecognizeRequest } from '../types';
import { encodeRequests } from './RequestEncoder';

async function* blocks(...items: Buffer[]): AsyncGenerator<Buffer> {
  for (const item of items) {
    yield item;
  }
}

const collect = async (requests: AsyncIterable<RecognizeRequest>): Promise<RecognizeRequest[]> => {
  const out: RecognizeRequest[] = [];
  for await (const request of requests) {
    out.push(request);
  }
  return out;
};

describe('encodeRequests', () => {
  it('sends the configuration first and then one message per audio block', async () => {
    const requests = await collect(
      encodeRequests(blocks(Buffer.from([1]), Buffer.from([2, 3])), { sampleRate: 16000 })
    );

    expect(requests).toEqual([
      {
        streamingConfig: {
          config: { encoding: 'LINEAR16', sampleRateHertz: 16000, languageCode: 'en-US' },
          interimResults: true
        }
      },
      { audioContent: Buffer.from([1]) },
      { audioContent: Buffer.from([2, 3]) }
    ]);
  });

  it('applies the language and interim-results settings', async () => {
    const [first] = await collect(
      encodeRequests(blocks(), { sampleRate: 8000, languageCode: 'de-DE', interimResults: false })
    );

    expect(first).toEqual({
      streamingConfig: {
        config: { encoding: 'LINEAR16', sampleRateHertz: 8000, languageCode: 'de-DE' },
        interimResults: false
      }
    });
  });

  it('still sends the configuration when no audio was captured', async () => {
    const requests = await collect(encodeRequests(blocks(), { sampleRate: 16000 }));

    expect(requests).toHaveLength(1);
  });
});
