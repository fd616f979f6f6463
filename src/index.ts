export { BroadcastifyClient, withClient, type BroadcastifyClientOptions } from './services/broadcastify/client.js';
export { Authenticator, extractLoginError, type Credentials, type CredentialSource } from './services/broadcastify/auth.js';
export {
  BroadcastifyHttp,
  type BroadcastifyHttpOptions,
  type FetchLike,
  type HttpResponse,
  type RequestOptions,
} from './services/broadcastify/http.js';
export { ArchiveRetriever } from './services/calls/archive.js';
export { LiveSession, generateSessionToken, type LiveSessionOptions } from './services/calls/live-session.js';
export {
  CALL_FIELD_MAP,
  CallParseError,
  describeCall,
  getMediaUrl,
  parseCall,
  parseCalls,
  toRawCallRecord,
} from './services/calls/call.js';
export { TimeBucketCache, bucketOf, type TimeBucketCacheOptions } from './services/cache/time-bucket-cache.js';
export { RateLimiter, type RateLimits } from './services/rate-limit/rate-limiter.js';
export { CallStore, callId, type CallDefaults, type CallQuery, type StoredCall } from './db/index.js';
export { systemClock, type Clock } from './utils/clock.js';
export { config, type Config } from './config/index.js';
export * from './errors/index.js';
export * from './types/index.js';
