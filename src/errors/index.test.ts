import { describe, it, expect } from 'vitest';
import {
  AuthenticationRequiredError,
  BroadcastifyError,
  CacheCorruptError,
  SessionNotInitializedError,
  UpstreamError,
  isBroadcastifyError,
} from './index.js';

describe('errors', () => {
  it('should carry a code and name per subclass', () => {
    const error = new AuthenticationRequiredError();

    expect(error).toBeInstanceOf(BroadcastifyError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('AUTH_REQUIRED');
    expect(error.name).toBe('AuthenticationRequiredError');
    expect(error.message).toBe('Not logged in');
  });

  it('should keep the status and cause of an upstream failure', () => {
    const cause = new Error('socket hang up');
    const error = new UpstreamError('Server error 502', { status: 502, cause });

    expect(error.status).toBe(502);
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('UPSTREAM');
  });

  it('should tell client errors apart from other errors', () => {
    expect(isBroadcastifyError(new SessionNotInitializedError())).toBe(true);
    expect(isBroadcastifyError(new CacheCorruptError('bad'))).toBe(true);
    expect(isBroadcastifyError(new Error('other'))).toBe(false);
    expect(isBroadcastifyError('AUTH_REQUIRED')).toBe(false);
  });
});
