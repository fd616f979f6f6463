import { randomBytes, randomInt } from 'crypto';
import { EventEmitter } from 'events';
import { ENDPOINTS, LIVE_MODES } from '../../constants/index.js';
import {
  SessionAlreadyInitializedError,
  SessionNotInitializedError,
  UpstreamError,
} from '../../errors/index.js';
import type { Call, LiveMode, LiveSessionEvents, LiveSessionState } from '../../types/index.js';
import { epochSeconds, systemClock, type Clock } from '../../utils/clock.js';
import { isRecord, type BroadcastifyHttp } from '../broadcastify/http.js';
import { parseCalls } from './call.js';

export interface LiveSessionOptions {
  systemId: number;
  talkgroupId: number;
  token: string;
  http: BroadcastifyHttp;
  clock?: Clock;
  /** Correlation id sent with each poll; generated when omitted */
  sessionToken?: string;
}

/** `xxxxxxxx-yyyy`: 8 random hex digits, then 4 digits in 8..b */
export function generateSessionToken(): string {
  const head = randomBytes(4).toString('hex');
  let tail = '';
  for (let i = 0; i < 4; i++) {
    tail += (8 + randomInt(4)).toString(16);
  }
  return `${head}-${tail}`;
}

/**
 * Polls live calls for one system/talkgroup pair.
 *
 * initSession() fetches the backlog once; each poll() after that asks for
 * calls newer than the cursor and emits `update` with just the new ones.
 * One session must not be polled concurrently.
 */
export class LiveSession extends EventEmitter {
  readonly systemId: number;
  readonly talkgroupId: number;
  readonly sessionToken: string;
  private token: string;
  private http: BroadcastifyHttp;
  private cursor: number;
  private received: Call[] = [];
  private currentState: LiveSessionState = 'uninitialized';

  constructor(options: LiveSessionOptions) {
    super();
    this.systemId = options.systemId;
    this.talkgroupId = options.talkgroupId;
    this.token = options.token;
    this.http = options.http;
    this.sessionToken = options.sessionToken ?? generateSessionToken();
    this.cursor = epochSeconds(options.clock ?? systemClock);
  }

  get state(): LiveSessionState {
    return this.currentState;
  }

  get isInitialized(): boolean {
    return this.currentState === 'polling';
  }

  /** Low-water mark for the next poll, epoch seconds */
  get position(): number {
    return this.cursor;
  }

  /** Every call received so far, in arrival order */
  get calls(): readonly Call[] {
    return [...this.received];
  }

  override on<E extends keyof LiveSessionEvents>(event: E, listener: LiveSessionEvents[E]): this {
    return super.on(event, listener);
  }

  override off<E extends keyof LiveSessionEvents>(event: E, listener: LiveSessionEvents[E]): this {
    return super.off(event, listener);
  }

  override emit<E extends keyof LiveSessionEvents>(event: E, ...args: Parameters<LiveSessionEvents[E]>): boolean {
    return super.emit(event, ...args);
  }

  async initSession(): Promise<Call[]> {
    if (this.currentState !== 'uninitialized') {
      throw new SessionAlreadyInitializedError();
    }
    await this.fetchDelta('initialize');
    this.currentState = 'polling';
    return [...this.received];
  }

  async poll(): Promise<Call[]> {
    if (this.currentState !== 'polling') {
      throw new SessionNotInitializedError();
    }
    return this.fetchDelta('incremental');
  }

  private async fetchDelta(mode: LiveMode): Promise<Call[]> {
    const referer = `${this.http.baseUrl}${ENDPOINTS.TALKGROUP_PAGE}/${this.systemId}/${this.talkgroupId}`;
    const body = await this.http.requestJson('live', ENDPOINTS.LIVE_UPDATE, {
      method: 'POST',
      token: this.token,
      form: {
        systemId: this.systemId,
        talkgroupId: this.talkgroupId,
        lastUpdate: Math.floor(this.cursor),
        mode: LIVE_MODES[mode],
        sessionKey: this.sessionToken,
      },
      headers: {
        'X-Requested-With': 'XMLHttpRequest',
        Origin: this.http.baseUrl,
        Referer: referer,
      },
    });

    if (!isRecord(body) || !Array.isArray(body.calls)) {
      throw new UpstreamError('Failed to get live calls - calls key not found in response');
    }

    const delta = parseCalls(body.calls, `live ${this.systemId}-${this.talkgroupId}`);
    this.received.push(...delta);
    this.advanceCursor(delta, mode);

    if (delta.length > 0) {
      console.log(`[LiveSession] ${this.systemId}-${this.talkgroupId}: ${delta.length} new calls, position ${this.cursor}`);
    }
    this.emit('update', delta);
    return delta;
  }

  /**
   * Move the cursor to the start time of the last call in the delta. The
   * initial backlog may set it back to the server's clock; later polls only
   * ever move it forward.
   */
  private advanceCursor(delta: Call[], mode: LiveMode): void {
    let last: number | undefined;
    for (let i = delta.length - 1; i >= 0; i--) {
      const startTime = delta[i].startTime;
      if (startTime !== undefined) {
        last = startTime;
        break;
      }
    }
    if (last === undefined) return;

    if (mode === 'initialize' || last >= this.cursor) {
      this.cursor = last;
    } else {
      console.warn(
        `[LiveSession] ${this.systemId}-${this.talkgroupId}: delta ends at ${last}, before position ${this.cursor}; keeping position`
      );
    }
  }
}
