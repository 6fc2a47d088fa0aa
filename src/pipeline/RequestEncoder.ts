import { AudioEncoding, RecognizeRequest } from '../types';

export interface RequestEncoderOptions {
  sampleRate: number;
  languageCode?: string;
  interimResults?: boolean;
  encoding?: AudioEncoding;
}

/**
 * Outbound message sequence: one configuration message, then one audio
 * message per drained block, in capture order.
 */
export async function* encodeRequests(
  audio: AsyncIterable<Buffer>,
  options: RequestEncoderOptions
): AsyncGenerator<RecognizeRequest, void, undefined> {
  yield {
    streamingConfig: {
      config: {
        encoding: options.encoding ?? 'LINEAR16',
        sampleRateHertz: options.sampleRate,
        languageCode: options.languageCode ?? 'en-US'
      },
      interimResults: options.interimResults ?? true
    }
  };

  for await (const block of audio) {
    yield { audioContent: block };
  }
}
