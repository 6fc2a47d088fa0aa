import { CaptureBuffer, CaptureItem, END_OF_CAPTURE } from './CaptureBuffer';

/**
 * Pull-based view over a CaptureBuffer. Each pull waits for one item, then
 * takes whatever else is already queued and yields it as one block. The pull
 * that sees the sentinel yields its block (possibly empty) and ends the
 * sequence for good.
 */
export class AudioDrain implements AsyncIterableIterator<Buffer> {
  private finished = false;

  public constructor(private readonly buffer: CaptureBuffer) {}

  public [Symbol.asyncIterator](): AsyncIterableIterator<Buffer> {
    return this;
  }

  public isFinished(): boolean {
    return this.finished;
  }

  public async next(): Promise<IteratorResult<Buffer>> {
    if (this.finished) {
      return { done: true, value: undefined };
    }

    const parts: Buffer[] = [];
    let sawSentinel = false;
    let item: CaptureItem | undefined = await this.buffer.take();

    while (item !== undefined) {
      if (item === END_OF_CAPTURE) {
        sawSentinel = true;
      } else {
        parts.push(item);
      }

      item = sawSentinel ? undefined : this.buffer.poll();
    }

    if (sawSentinel) {
      this.finished = true;
    }

    return { done: false, value: Buffer.concat(parts) };
  }

  public async return(): Promise<IteratorResult<Buffer>> {
    this.finished = true;
    return { done: true, value: undefined };
  }
}
