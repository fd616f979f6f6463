import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { config } from '../../config/index.js';
import { CACHE } from '../../constants/index.js';
import { CacheCorruptError } from '../../errors/index.js';
import type { Call, CacheEntry, RawCallRecord } from '../../types/index.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { isRecord } from '../broadcastify/http.js';
import { CallParseError, parseCall, toRawCallRecord } from '../calls/call.js';

/**
 * Floor an epoch timestamp (seconds) to the start of its bucket.
 */
export function bucketOf(timestamp: number, interval: number = CACHE.BUCKET_SECONDS): number {
  const offset = ((timestamp % interval) + interval) % interval;
  return timestamp - offset;
}

export interface TimeBucketCacheOptions {
  /** Directory holding cache.json */
  dir?: string;
  /** When false nothing is read from or written to disk */
  persist?: boolean;
  /** Lifetime of the whole cache, counted from its first save */
  ttlMs?: number;
  clock?: Clock;
}

interface PersistedEntry {
  calls: RawCallRecord[];
  start: number;
  end: number;
}

interface PersistedCache {
  expiresAt?: number;
  systems: Record<string, Record<string, Record<string, PersistedEntry>>>;
}

type BucketMap = Map<number, CacheEntry>;
type TalkgroupMap = Map<number, BucketMap>;

/**
 * Archive windows keyed by (system, talkgroup, bucket).
 *
 * The cache carries one expiry timestamp for all of its entries. It is set
 * at the first save to now + TTL; once reached, the next lookup (or load)
 * drops everything.
 */
export class TimeBucketCache {
  readonly filePath: string;
  private systems = new Map<number, TalkgroupMap>();
  private expiry: number | undefined;
  private persist: boolean;
  private ttlMs: number;
  private clock: Clock;

  constructor(options: TimeBucketCacheOptions = {}) {
    this.filePath = join(options.dir ?? config.cache.dir, CACHE.FILE_NAME);
    this.persist = options.persist ?? config.cache.enabled;
    this.ttlMs = options.ttlMs ?? config.cache.ttlHours * 60 * 60 * 1000;
    this.clock = options.clock ?? systemClock;
    this.load();
  }

  get expiresAt(): number | undefined {
    return this.expiry;
  }

  /** Number of cached buckets */
  get size(): number {
    let count = 0;
    for (const talkgroups of this.systems.values()) {
      for (const buckets of talkgroups.values()) {
        count += buckets.size;
      }
    }
    return count;
  }

  get(systemId: number, talkgroupId: number, bucket: number): CacheEntry | undefined {
    this.expireIfDue();
    return this.systems.get(systemId)?.get(talkgroupId)?.get(bucket);
  }

  put(systemId: number, talkgroupId: number, bucket: number, calls: Call[], start: number, end: number): void {
    let talkgroups = this.systems.get(systemId);
    if (!talkgroups) {
      talkgroups = new Map();
      this.systems.set(systemId, talkgroups);
    }
    let buckets = talkgroups.get(talkgroupId);
    if (!buckets) {
      buckets = new Map();
      talkgroups.set(talkgroupId, buckets);
    }
    buckets.set(bucket, { calls, start, end });
  }

  clear(): void {
    this.systems.clear();
    this.expiry = undefined;
  }

  load(): void {
    if (!this.persist || !existsSync(this.filePath)) return;

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      this.restore(parsed);
    } catch (error) {
      const corrupt =
        error instanceof CacheCorruptError
          ? error
          : new CacheCorruptError(`Unreadable cache file: ${error instanceof Error ? error.message : String(error)}`, {
              cause: error,
            });
      console.warn(`[Cache] Ignoring ${this.filePath}: ${corrupt.message}`);
      this.clear();
      return;
    }

    if (this.expireIfDue()) return;
    console.log(`[Cache] Loaded ${this.size} archive buckets from ${this.filePath}`);
  }

  save(): void {
    if (!this.persist) return;

    if (this.expiry === undefined) {
      this.expiry = this.clock.now() + this.ttlMs;
    }

    const persisted: PersistedCache = { expiresAt: this.expiry, systems: {} };
    for (const [systemId, talkgroups] of this.systems) {
      const systemEntry: Record<string, Record<string, PersistedEntry>> = {};
      for (const [talkgroupId, buckets] of talkgroups) {
        const talkgroupEntry: Record<string, PersistedEntry> = {};
        for (const [bucket, entry] of buckets) {
          talkgroupEntry[bucket] = {
            calls: entry.calls.map(toRawCallRecord),
            start: entry.start,
            end: entry.end,
          };
        }
        systemEntry[talkgroupId] = talkgroupEntry;
      }
      persisted.systems[systemId] = systemEntry;
    }

    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(persisted));
  }

  /** Clears the cache if its expiry has passed; returns whether it did */
  private expireIfDue(): boolean {
    if (this.expiry === undefined || this.clock.now() < this.expiry) return false;
    console.log(`[Cache] Cache expired at ${new Date(this.expiry).toISOString()}, clearing ${this.size} buckets`);
    this.clear();
    return true;
  }

  private restore(data: unknown): void {
    if (!isRecord(data)) {
      throw new CacheCorruptError('Cache file is not an object');
    }
    const systemData = asRecord(data.systems, '"systems"');
    const rawExpiry = data.expiresAt;
    let expiresAt: number | undefined;
    if (rawExpiry !== undefined) {
      if (!isFiniteNumber(rawExpiry)) {
        throw new CacheCorruptError('Invalid "expiresAt"');
      }
      expiresAt = rawExpiry;
    }

    const systems = new Map<number, TalkgroupMap>();
    for (const [systemKey, talkgroupData] of Object.entries(systemData)) {
      const talkgroups: TalkgroupMap = new Map();
      for (const [talkgroupKey, bucketData] of Object.entries(asRecord(talkgroupData, `system ${systemKey}`))) {
        const buckets: BucketMap = new Map();
        for (const [bucketKey, entry] of Object.entries(asRecord(bucketData, `talkgroup ${talkgroupKey}`))) {
          buckets.set(toKey(bucketKey), restoreEntry(entry, `${systemKey}/${talkgroupKey}/${bucketKey}`));
        }
        talkgroups.set(toKey(talkgroupKey), buckets);
      }
      systems.set(toKey(systemKey), talkgroups);
    }

    this.systems = systems;
    this.expiry = expiresAt;
  }
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new CacheCorruptError(`Expected an object for ${label}`);
  }
  return value;
}

function toKey(key: string): number {
  const value = Number(key);
  if (!Number.isFinite(value)) {
    throw new CacheCorruptError(`Invalid cache key "${key}"`);
  }
  return value;
}

function restoreEntry(value: unknown, label: string): CacheEntry {
  const { calls, start, end } = asRecord(value, label);
  if (!Array.isArray(calls) || !isFiniteNumber(start) || !isFiniteNumber(end)) {
    throw new CacheCorruptError(`Malformed entry ${label}`);
  }
  try {
    return { calls: calls.map((call: unknown) => parseCall(call)), start, end };
  } catch (error) {
    if (error instanceof CallParseError) {
      throw new CacheCorruptError(`Malformed call in ${label}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
