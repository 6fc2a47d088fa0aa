import { describe, it, expect } from 'vitest';
import { AudioDrain } from './AudioDrain';
import { CaptureBuffer } from './CaptureBuffer';

const collect = async (drain: AudioDrain): Promise<Buffer[]> => {
  const blocks: Buffer[] = [];
  for await (const block of drain) {
    blocks.push(block);
  }
  return blocks;
};

describe('AudioDrain', () => {
  it('coalesces everything already buffered into one block and ends at the sentinel', async () => {
    const buffer = new CaptureBuffer();
    buffer.put(Buffer.from([1, 2]));
    buffer.put(Buffer.from([3]));
    buffer.put(Buffer.from([4, 5, 6]));
    buffer.close();

    const blocks = await collect(new AudioDrain(buffer));

    expect(blocks).toEqual([Buffer.from([1, 2, 3, 4, 5, 6])]);
  });

  it('preserves capture order across several pulls', async () => {
    const buffer = new CaptureBuffer();
    const drain = new AudioDrain(buffer);

    buffer.put(Buffer.from([1]));
    buffer.put(Buffer.from([2]));
    const first = await drain.next();

    buffer.put(Buffer.from([3]));
    const second = await drain.next();

    buffer.put(Buffer.from([4]));
    buffer.close();
    const third = await drain.next();
    const fourth = await drain.next();

    expect(first).toEqual({ done: false, value: Buffer.from([1, 2]) });
    expect(second).toEqual({ done: false, value: Buffer.from([3]) });
    expect(third).toEqual({ done: false, value: Buffer.from([4]) });
    expect(fourth.done).toBe(true);
  });

  it('waits for the first item of a pull instead of returning an empty block', async () => {
    const buffer = new CaptureBuffer();
    const drain = new AudioDrain(buffer);
    let settled = false;

    const pull = drain.next().then((result) => {
      settled = true;
      return result;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(settled).toBe(false);

    buffer.put(Buffer.from([9]));

    expect(await pull).toEqual({ done: false, value: Buffer.from([9]) });
  });

  it('yields one empty block when stopped with nothing captured', async () => {
    const buffer = new CaptureBuffer();
    buffer.close();

    const blocks = await collect(new AudioDrain(buffer));

    expect(blocks).toEqual([Buffer.alloc(0)]);
  });

  it('is not restartable once finished', async () => {
    const buffer = new CaptureBuffer();
    buffer.close();
    const drain = new AudioDrain(buffer);

    await collect(drain);

    expect(drain.isFinished()).toBe(true);
    expect(await drain.next()).toEqual({ done: true, value: undefined });
    expect(await collect(drain)).toEqual([]);
  });

  it('reassembles every chunk in order', async () => {
    const buffer = new CaptureBuffer();
    const drain = new AudioDrain(buffer);
    const chunks = Array.from({ length: 12 }, (_, index) => Buffer.from([index, index + 100]));
    const blocks: Buffer[] = [];

    for (const [index, chunk] of chunks.entries()) {
      buffer.put(chunk);
      if (index % 5 === 4) {
        const result = await drain.next();
        if (!result.done) {
          blocks.push(result.value);
        }
      }
    }
    buffer.close();
    blocks.push(...(await collect(drain)));

    expect(blocks).toHaveLength(3);
    expect(Buffer.concat(blocks)).toEqual(Buffer.concat(chunks));
  });
});
