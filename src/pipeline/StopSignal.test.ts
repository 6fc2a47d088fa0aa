import { describe, it, expect, vi } from 'vitest';
import { StopSignal } from './StopSignal';

describe('StopSignal', () => {
  it('starts unset', () => {
    expect(new StopSignal().isSet()).toBe(false);
  });

  it('treats a second set exactly like the first', () => {
    const signal = new StopSignal();
    const listener = vi.fn();
    signal.onSet(listener);

    expect(signal.set()).toBe(true);
    expect(signal.set()).toBe(false);

    expect(signal.isSet()).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('runs listeners registered after it was set right away', () => {
    const signal = new StopSignal();
    signal.set();
    const listener = vi.fn();

    signal.onSet(listener);

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
