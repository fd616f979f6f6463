/** Time source for rate limiting and expiry, swappable in tests */
export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export function epochSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}
