/**
 * Constants for the Broadcastify calls client.
 * Endpoint paths, request categories and timing defaults live here.
 */

// =============================================================================
// Endpoints (relative to the configured base URL)
// =============================================================================

export const ENDPOINTS = {
  /** Login form target; answers with a redirect and the credential cookie */
  LOGIN: '/login/',
  LOGOUT: '/account/?action=logout',
  /** One 30-minute window of archived calls for a group */
  ARCHIVE: '/calls/apis/archivecall.php',
  /** Live call updates for a talkgroup */
  LIVE_UPDATE: '/calls/ajax/update',
  /** Talkgroup page, sent as the Referer of live requests */
  TALKGROUP_PAGE: '/calls/tg',
} as const;

/** Cookie carrying the credential token */
export const CREDENTIAL_COOKIE = 'bcfyuser1';

// =============================================================================
// Rate Limiting
// =============================================================================

export type RequestCategory = 'default' | 'live' | 'archive';

/** Minimum interval between requests of one category (ms) */
export const DEFAULT_RATE_LIMITS: Record<RequestCategory, number> = {
  default: 1000,
  live: 5000,
  archive: 2000,
};

// =============================================================================
// Archive Cache
// =============================================================================

export const CACHE = {
  /** Archive bucket width (seconds) */
  BUCKET_SECONDS: 1800,
  FILE_NAME: 'cache.json',
} as const;

// =============================================================================
// Live Polling
// =============================================================================

export const LIVE_MODES = {
  initialize: 'gettalkgroups',
  incremental: 'getupdate',
} as const;

export const HTTP_HEADERS = {
  USER_AGENT: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
  ACCEPT_HTML: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  ACCEPT_JSON: 'application/json, text/javascript, */*; q=0.01',
} as const;
