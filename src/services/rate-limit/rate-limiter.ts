import { DEFAULT_RATE_LIMITS } from '../../constants/index.js';
import { systemClock, type Clock } from '../../utils/clock.js';

export type RateLimits = Partial<Record<string, number>>;

/**
 * Spaces outbound requests per category. Each category keeps its own
 * last-request time; categories never wait on each other.
 *
 * The next slot is reserved synchronously before sleeping, so concurrent
 * callers in one category are released one interval apart.
 */
export class RateLimiter {
  private lastRequest = new Map<string, number>();
  private limits: Record<string, number>;

  constructor(
    limits: RateLimits = {},
    private clock: Clock = systemClock
  ) {
    this.limits = { ...DEFAULT_RATE_LIMITS };
    for (const [category, interval] of Object.entries(limits)) {
      if (interval === undefined) continue;
      if (!Number.isFinite(interval) || interval < 0) {
        console.warn(`[RateLimiter] Ignoring invalid interval for "${category}": ${interval}`);
        continue;
      }
      this.limits[category] = interval;
    }
  }

  intervalFor(category: string): number {
    return this.limits[category] ?? this.limits.default ?? DEFAULT_RATE_LIMITS.default;
  }

  async wait(category = 'default'): Promise<void> {
    const interval = this.intervalFor(category);
    const now = this.clock.now();
    const last = this.lastRequest.get(category);
    const slot = last === undefined ? now : Math.max(now, last + interval);

    this.lastRequest.set(category, slot);

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }

  /** Time the last request in `category` was released, if any */
  lastRequestAt(category: string): number | undefined {
    return this.lastRequest.get(category);
  }

  reset(): void {
    this.lastRequest.clear();
  }
}
