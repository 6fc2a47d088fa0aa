import { describe, it, expect } from 'vitest';
import { FakeAudioSource } from '../testing/fakes';
import { AudioDrain } from './AudioDrain';
import { CaptureBuffer, END_OF_CAPTURE } from './CaptureBuffer';
import { CaptureLoop } from './CaptureLoop';
import { StopSignal } from './StopSignal';

describe('CaptureLoop', () => {
  it('ends on a device failure and still appends the sentinel', async () => {
    const source = new FakeAudioSource({
      chunks: [Buffer.from([1, 2]), Buffer.from([3, 4])],
      whenEmpty: 'fail'
    });
    const buffer = new CaptureBuffer();
    const loop = new CaptureLoop(source, buffer, new StopSignal());

    const summary = await loop.start();

    expect(summary).toEqual({
      reason: 'device-failure',
      chunks: 2,
      bytes: 4,
      detail: 'Input/output error'
    });
    expect(buffer.poll()).toEqual(Buffer.from([1, 2]));
    expect(buffer.poll()).toEqual(Buffer.from([3, 4]));
    expect(buffer.poll()).toBe(END_OF_CAPTURE);
    expect(buffer.poll()).toBeUndefined();
  });

  it('stops after the read in progress once the signal is set', async () => {
    const source = new FakeAudioSource();
    const buffer = new CaptureBuffer();
    const stop = new StopSignal();
    const loop = new CaptureLoop(source, buffer, stop);

    const running = loop.start();
    await new Promise((resolve) => setImmediate(resolve));
    stop.set();
    const summary = await running;

    expect(summary.reason).toBe('stopped');
    expect(summary.chunks).toBe(source.reads);
    expect(buffer.size()).toBe(summary.chunks + 1);
    expect(buffer.isClosed()).toBe(true);
  });

  it('does not read at all when stopped before starting', async () => {
    const source = new FakeAudioSource();
    const buffer = new CaptureBuffer();
    const stop = new StopSignal();
    stop.set();

    const summary = await new CaptureLoop(source, buffer, stop).start();

    expect(summary).toEqual({ reason: 'stopped', chunks: 0, bytes: 0 });
    expect(source.reads).toBe(0);
  });

  it('lets a drain finish with at most one empty block after an immediate stop', async () => {
    const buffer = new CaptureBuffer();
    const stop = new StopSignal();
    stop.set();
    const loop = new CaptureLoop(new FakeAudioSource(), buffer, stop);
    const drain = new AudioDrain(buffer);

    const pull = drain.next();
    await loop.start();

    expect(await pull).toEqual({ done: false, value: Buffer.alloc(0) });
    expect(await drain.next()).toEqual({ done: true, value: undefined });
  });

  it('refuses to start twice', () => {
    const stop = new StopSignal();
    stop.set();
    const loop = new CaptureLoop(new FakeAudioSource(), new CaptureBuffer(), stop);

    void loop.start();

    expect(() => loop.start()).toThrow('Capture loop already started');
  });
});
