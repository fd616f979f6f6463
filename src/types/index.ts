// =============================================================================
// Call Types
// =============================================================================

/**
 * One radio transmission. Every attribute is optional: upstream records are
 * loosely shaped and a missing key leaves the attribute unset.
 */
export interface Call {
  readonly talkgroupId?: number;
  readonly systemId?: number;
  /** Seconds */
  readonly duration?: number;
  /** Epoch seconds */
  readonly startTime?: number;
  /** File name on the calls CDN, without extension */
  readonly filename?: string;
  readonly talkgroupName?: string;
  /** Talkgroup category, e.g. Fire, Law, EMS */
  readonly talkgroupGroup?: string;
  readonly unitRadioId?: number;
  readonly hash?: string;
}

/** Raw call record as returned by the calls endpoints */
export type RawCallRecord = Record<string, unknown>;

// =============================================================================
// Archive Types
// =============================================================================

/** A bucket of archived calls plus the server-reported [start, end) window */
export interface ArchiveWindow {
  calls: Call[];
  start: number;
  end: number;
}

export type CacheEntry = ArchiveWindow;

// =============================================================================
// Live Session Types
// =============================================================================

export type LiveSessionState = 'uninitialized' | 'polling';

export type LiveMode = 'initialize' | 'incremental';

export interface LiveSessionEvents {
  update: (calls: Call[]) => void;
}
