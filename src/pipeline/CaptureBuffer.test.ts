import { describe, it, expect } from 'vitest';
import { CaptureBuffer, END_OF_CAPTURE } from './CaptureBuffer';

describe('CaptureBuffer', () => {
  it('hands out items in the order they were put', async () => {
    const buffer = new CaptureBuffer();
    buffer.put(Buffer.from([1]));
    buffer.put(Buffer.from([2]));

    expect(await buffer.take()).toEqual(Buffer.from([1]));
    expect(buffer.poll()).toEqual(Buffer.from([2]));
    expect(buffer.poll()).toBeUndefined();
  });

  it('wakes a waiting taker when a chunk arrives', async () => {
    const buffer = new CaptureBuffer();
    const pending = buffer.take();

    buffer.put(Buffer.from([7, 8]));

    expect(await pending).toEqual(Buffer.from([7, 8]));
    expect(buffer.size()).toBe(0);
  });

  it('appends the sentinel once and only as the last item', () => {
    const buffer = new CaptureBuffer();
    buffer.put(Buffer.from([1]));
    buffer.close();
    buffer.close();

    expect(buffer.size()).toBe(2);
    expect(buffer.poll()).toEqual(Buffer.from([1]));
    expect(buffer.poll()).toBe(END_OF_CAPTURE);
    expect(buffer.poll()).toBeUndefined();
  });

  it('rejects chunks put after the sentinel', () => {
    const buffer = new CaptureBuffer();
    buffer.close();

    expect(() => buffer.put(Buffer.from([1]))).toThrow('Capture buffer is closed');
    expect(buffer.isClosed()).toBe(true);
  });
});
