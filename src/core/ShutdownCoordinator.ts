import { StructuredLogger } from '../logging/StructuredLogger';
import { StopSignal } from '../pipeline/StopSignal';

export interface Cancellable {
  cancel(): void;
}

/**
 * Joins the two ways a session ends. `interrupt` comes from the process
 * signal handler and cancels the in-flight stream; `requestStop` sets the
 * flag the capture task polls. Both are idempotent and only flip flags or
 * call the cancel capability, so either may run from a signal handler.
 */
export class ShutdownCoordinator {
  public readonly stopSignal: StopSignal;
  private stream: Cancellable | undefined;
  private streamCancelled = false;
  private interrupts = 0;

  public constructor(
    private readonly logger?: StructuredLogger,
    stopSignal: StopSignal = new StopSignal()
  ) {
    this.stopSignal = stopSignal;
  }

  /** Registers the in-flight stream; the returned function detaches it. */
  public attachStream(stream: Cancellable): () => void {
    if (this.stream) {
      throw new Error('A recognition stream is already attached');
    }

    this.stream = stream;
    this.streamCancelled = false;

    if (this.interrupts > 0) {
      this.cancelStream();
    }

    return () => {
      if (this.stream === stream) {
        this.stream = undefined;
      }
    };
  }

  /** Returns how many interrupts have been received, including this one. */
  public interrupt(): number {
    this.interrupts += 1;

    if (this.interrupts === 1) {
      this.logger?.info('Interrupt received; cancelling recognition stream');
      this.cancelStream();
    }

    return this.interrupts;
  }

  public wasInterrupted(): boolean {
    return this.interrupts > 0;
  }

  public requestStop(): void {
    if (this.stopSignal.set()) {
      this.logger?.debug('Stop requested');
    }
  }

  /** Cancels the attached stream unless it has already been cancelled. */
  public cancelStream(): void {
    const current = this.stream;
    if (!current || this.streamCancelled) {
      return;
    }

    this.streamCancelled = true;
    current.cancel();
  }
}
