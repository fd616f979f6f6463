import { ENDPOINTS } from '../../constants/index.js';
import { UpstreamError } from '../../errors/index.js';
import type { ArchiveWindow } from '../../types/index.js';
import type { CredentialSource } from '../broadcastify/auth.js';
import { isRecord, type BroadcastifyHttp } from '../broadcastify/http.js';
import { bucketOf, type TimeBucketCache } from '../cache/time-bucket-cache.js';
import { parseCalls } from './call.js';

function toEpoch(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

/** Callers get their own calls array; the cached one stays as the server sent it */
function copyWindow({ calls, start, end }: ArchiveWindow): ArchiveWindow {
  return { calls: [...calls], start, end };
}

/**
 * Fetches 30-minute windows of archived calls for a system/talkgroup pair.
 * Windows are served from the cache when present; a miss costs one
 * rate-limited request.
 */
export class ArchiveRetriever {
  private inFlight = new Map<string, Promise<ArchiveWindow>>();

  constructor(
    private http: BroadcastifyHttp,
    private cache: TimeBucketCache,
    private credentials: CredentialSource
  ) {}

  async getArchivedCalls(systemId: number, talkgroupId: number, requestedTime: number): Promise<ArchiveWindow> {
    const token = this.credentials.requireToken();
    const bucket = bucketOf(requestedTime);

    const cached = this.cache.get(systemId, talkgroupId, bucket);
    if (cached) {
      return copyWindow(cached);
    }

    // Concurrent misses for one bucket share a single fetch
    const key = `${systemId}-${talkgroupId}-${bucket}`;
    let request = this.inFlight.get(key);
    if (!request) {
      request = this.fetchWindow(systemId, talkgroupId, bucket, token).finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, request);
    }
    return copyWindow(await request);
  }

  private async fetchWindow(
    systemId: number,
    talkgroupId: number,
    bucket: number,
    token: string
  ): Promise<ArchiveWindow> {
    const body = await this.http.requestJson('archive', ENDPOINTS.ARCHIVE, {
      query: { group: `${systemId}-${talkgroupId}`, s: bucket },
      token,
    });

    if (!isRecord(body) || !Array.isArray(body.calls)) {
      throw new UpstreamError('Failed to get archived calls - calls key not found in response');
    }
    const start = toEpoch(body.start);
    const end = toEpoch(body.end);
    if (start === undefined || end === undefined) {
      throw new UpstreamError('Failed to get archived calls - start/end missing from response');
    }

    const calls = parseCalls(body.calls, `archive ${systemId}-${talkgroupId}@${bucket}`);
    this.cache.put(systemId, talkgroupId, bucket, calls, start, end);
    console.log(`[ArchiveRetriever] Cached ${calls.length} calls for ${systemId}-${talkgroupId} bucket ${bucket}`);

    return { calls, start, end };
  }
}
