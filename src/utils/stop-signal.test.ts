import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createStopSignal } from './stop-signal.js';

describe('createStopSignal', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should ask the loop to stop on the first signal without exiting', () => {
    const exit = vi.fn();
    const signal = createStopSignal(exit);

    expect(signal.stopping).toBe(false);
    signal.handle();

    expect(signal.stopping).toBe(true);
    expect(exit).not.toHaveBeenCalled();
  });

  it('should exit with code 1 on the second signal', () => {
    const exit = vi.fn();
    const signal = createStopSignal(exit);

    signal.handle();
    signal.handle();

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
