type StopListener = () => void;

/**
 * Set-once cancellation flag shared by the capture task and the main task.
 * Once set it stays set for the lifetime of the session.
 */
export class StopSignal {
  private stopped = false;
  private listeners: StopListener[] = [];

  public isSet(): boolean {
    return this.stopped;
  }

  /** Returns true only for the call that actually flipped the flag. */
  public set(): boolean {
    if (this.stopped) {
      return false;
    }

    this.stopped = true;
    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      listener();
    }

    return true;
  }

  public onSet(listener: StopListener): void {
    if (this.stopped) {
      listener();
      return;
    }

    this.listeners.push(listener);
  }
}
