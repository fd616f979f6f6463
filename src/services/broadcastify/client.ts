import { config } from '../../config/index.js';
import type { ArchiveWindow } from '../../types/index.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { TimeBucketCache } from '../cache/time-bucket-cache.js';
import { ArchiveRetriever } from '../calls/archive.js';
import { LiveSession } from '../calls/live-session.js';
import { RateLimiter, type RateLimits } from '../rate-limit/rate-limiter.js';
import { Authenticator, type Credentials } from './auth.js';
import { BroadcastifyHttp, type FetchLike } from './http.js';

export interface BroadcastifyClientOptions extends Credentials {
  /** Log out when the client is closed */
  autoLogout?: boolean;
  /** Persist the archive cache to cacheDir */
  saveCache?: boolean;
  cacheDir?: string;
  cacheTtlMs?: number;
  rateLimits?: RateLimits;
  baseUrl?: string;
  /** 0 disables the timeout */
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
}

/**
 * Entry point tying together the rate limiter, archive cache and
 * credentials. One instance owns its own limiter and cache; nothing is
 * shared across instances.
 */
export class BroadcastifyClient {
  readonly limiter: RateLimiter;
  readonly cache: TimeBucketCache;
  readonly auth: Authenticator;
  private http: BroadcastifyHttp;
  private archive: ArchiveRetriever;
  private clock: Clock;
  private autoLogout: boolean;
  private closed = false;

  constructor(options: BroadcastifyClientOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.autoLogout = options.autoLogout ?? config.broadcastify.autoLogout;
    this.limiter = new RateLimiter({ ...config.rateLimits, ...options.rateLimits }, this.clock);
    this.http = new BroadcastifyHttp(this.limiter, {
      baseUrl: options.baseUrl,
      fetch: options.fetch,
      timeoutMs: options.requestTimeoutMs,
    });
    this.cache = new TimeBucketCache({
      dir: options.cacheDir,
      persist: options.saveCache,
      ttlMs: options.cacheTtlMs,
      clock: this.clock,
    });
    this.auth = new Authenticator(this.http, options);
    this.archive = new ArchiveRetriever(this.http, this.cache, this.auth);
  }

  get isLoggedIn(): boolean {
    return this.auth.isLoggedIn;
  }

  get credentialKey(): string | undefined {
    return this.auth.token;
  }

  login(): Promise<string> {
    return this.auth.login();
  }

  logout(): Promise<void> {
    return this.auth.logout();
  }

  /**
   * Calls for the 30-minute window containing `time` (epoch seconds).
   */
  getArchivedCalls(systemId: number, talkgroupId: number, time: number): Promise<ArchiveWindow> {
    return this.archive.getArchivedCalls(systemId, talkgroupId, time);
  }

  createLiveSession(systemId: number, talkgroupId: number, sessionToken?: string): LiveSession {
    return new LiveSession({
      systemId,
      talkgroupId,
      token: this.auth.requireToken(),
      http: this.http,
      clock: this.clock,
      sessionToken,
    });
  }

  /**
   * Save the archive cache and, with autoLogout, end the session. Safe to
   * call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      if (this.autoLogout && this.auth.isLoggedIn) {
        await this.auth.logout();
      }
    } finally {
      this.cache.save();
    }
  }
}

/**
 * Run `fn` with a client that is closed afterwards, also when `fn` throws.
 */
export async function withClient<T>(
  options: BroadcastifyClientOptions,
  fn: (client: BroadcastifyClient) => Promise<T>
): Promise<T> {
  const client = new BroadcastifyClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
