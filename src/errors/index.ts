/**
 * Error types raised by the Broadcastify client.
 *
 * Nothing in the client retries on these; they are surfaced to the caller,
 * except CacheCorruptError which the archive cache recovers from itself.
 */

export type BroadcastifyErrorCode =
  | 'AUTH_REQUIRED'
  | 'AUTH_FAILED'
  | 'UPSTREAM'
  | 'SESSION_NOT_INITIALIZED'
  | 'SESSION_ALREADY_INITIALIZED'
  | 'CACHE_CORRUPT';

export class BroadcastifyError extends Error {
  readonly code: BroadcastifyErrorCode;

  constructor(code: BroadcastifyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BroadcastifyError';
    this.code = code;
  }
}

/** No credential token is held */
export class AuthenticationRequiredError extends BroadcastifyError {
  constructor(message = 'Not logged in') {
    super('AUTH_REQUIRED', message);
    this.name = 'AuthenticationRequiredError';
  }
}

/** Login was rejected or the server answered in an unexpected way */
export class AuthenticationFailedError extends BroadcastifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTH_FAILED', message, options);
    this.name = 'AuthenticationFailedError';
  }
}

/** Non-success status, transport failure, or a response missing expected fields */
export class UpstreamError extends BroadcastifyError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('UPSTREAM', message, { cause: options?.cause });
    this.name = 'UpstreamError';
    this.status = options?.status;
  }
}

export class SessionNotInitializedError extends BroadcastifyError {
  constructor() {
    super('SESSION_NOT_INITIALIZED', 'Session not initialized - call initSession() first');
    this.name = 'SessionNotInitializedError';
  }
}

export class SessionAlreadyInitializedError extends BroadcastifyError {
  constructor() {
    super('SESSION_ALREADY_INITIALIZED', 'Session already initialized');
    this.name = 'SessionAlreadyInitializedError';
  }
}

export class CacheCorruptError extends BroadcastifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_CORRUPT', message, options);
    this.name = 'CacheCorruptError';
  }
}

export function isBroadcastifyError(error: unknown): error is BroadcastifyError {
  return error instanceof BroadcastifyError;
}
