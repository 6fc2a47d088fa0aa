export const END_OF_CAPTURE: unique symbol = Symbol('end-of-capture');

export type CaptureItem = Buffer | typeof END_OF_CAPTURE;

/**
 * Unbounded FIFO between the capture task and the audio drain. Holds at most
 * one END_OF_CAPTURE sentinel, always as the last item.
 */
export class CaptureBuffer {
  private items: CaptureItem[] = [];
  private waiters: Array<(item: CaptureItem) => void> = [];
  private closed = false;

  public put(chunk: Buffer): void {
    if (this.closed) {
      throw new Error('Capture buffer is closed');
    }

    this.deliver(chunk);
  }

  /** Appends the sentinel. Later calls are no-ops. */
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.deliver(END_OF_CAPTURE);
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public size(): number {
    return this.items.length;
  }

  /** Waits until an item is available and removes it. */
  public take(): Promise<CaptureItem> {
    const head = this.items.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }

    return new Promise<CaptureItem>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Removes the head item without waiting; undefined when empty. */
  public poll(): CaptureItem | undefined {
    return this.items.shift();
  }

  private deliver(item: CaptureItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    this.items.push(item);
  }
}
