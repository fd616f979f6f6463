import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BroadcastifyClient, withClient, type BroadcastifyClientOptions } from './client.js';
import { AuthenticationRequiredError, UpstreamError } from '../../errors/index.js';
import { FakeClock, createMockFetch, htmlResponse, jsonResponse } from '../../test/helpers.js';

describe('BroadcastifyClient', () => {
  let dir: string;
  let clock: FakeClock;
  let mockFetch: ReturnType<typeof createMockFetch>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bcfy-client-'));
    clock = new FakeClock(1_733_229_000_000);
    mockFetch = createMockFetch();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function options(overrides: BroadcastifyClientOptions = {}): BroadcastifyClientOptions {
    return {
      username: 'scanner-user',
      password: 'test-secret',
      credentialKey: '',
      baseUrl: 'https://bcfy.example.test',
      cacheDir: dir,
      saveCache: true,
      autoLogout: true,
      requestTimeoutMs: 0,
      fetch: mockFetch,
      clock,
      ...overrides,
    };
  }

  function loginResponse() {
    return htmlResponse('', 302, { location: 'https://bcfy.example.test/', 'set-cookie': 'bcfyuser1=test-token; path=/' });
  }

  it('should start logged out without a credential key', () => {
    const client = new BroadcastifyClient(options());

    expect(client.isLoggedIn).toBe(false);
    expect(client.credentialKey).toBeUndefined();
  });

  it('should log in and expose the credential key', async () => {
    mockFetch.mockResolvedValueOnce(loginResponse());
    const client = new BroadcastifyClient(options());

    await client.login();

    expect(client.isLoggedIn).toBe(true);
    expect(client.credentialKey).toBe('test-token');
  });

  it('should refuse archive requests before login', async () => {
    const client = new BroadcastifyClient(options());

    await expect(client.getArchivedCalls(7804, 2451, 1733229000)).rejects.toThrow(AuthenticationRequiredError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should fetch archived calls with the credential cookie', async () => {
    mockFetch.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(
      jsonResponse({
        start: 1733229000,
        end: 1733230800,
        calls: [{ call_tg: 2451, systemId: 7804, ts: 1733229012, filename: '1733229012-2451', hash: 'h1' }],
      })
    );
    const client = new BroadcastifyClient(options());

    await client.login();
    const window = await client.getArchivedCalls(7804, 2451, 1733229600);

    expect(window.calls).toHaveLength(1);
    expect(client.cache.get(7804, 2451, 1733229000)).toBeDefined();
    expect(mockFetch.mock.calls[1][1].headers).toMatchObject({ Cookie: 'bcfyuser1=test-token' });
  });

  it('should apply rate limit overrides', () => {
    const client = new BroadcastifyClient(options({ rateLimits: { archive: 250 } }));

    expect(client.limiter.intervalFor('archive')).toBe(250);
    expect(client.limiter.intervalFor('live')).toBeGreaterThan(0);
  });

  describe('createLiveSession', () => {
    it('should require a credential token', () => {
      const client = new BroadcastifyClient(options());

      expect(() => client.createLiveSession(7804, 2451)).toThrow(AuthenticationRequiredError);
    });

    it('should create a session bound to the talkgroup', () => {
      const client = new BroadcastifyClient(options({ credentialKey: 'saved-token' }));

      const session = client.createLiveSession(7804, 2451, 'cafebabe-8a9b');

      expect(session.systemId).toBe(7804);
      expect(session.talkgroupId).toBe(2451);
      expect(session.sessionToken).toBe('cafebabe-8a9b');
      expect(session.position).toBe(1733229000);
    });
  });

  describe('close', () => {
    it('should log out and save the cache', async () => {
      mockFetch.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(htmlResponse('', 302, { location: '/' }));
      const client = new BroadcastifyClient(options());
      await client.login();
      client.cache.put(7804, 2451, 1733229000, [], 1733229000, 1733230800);

      await client.close();

      expect(mockFetch.mock.calls[1][0]).toBe('https://bcfy.example.test/account/?action=logout');
      expect(client.isLoggedIn).toBe(false);
      const saved = JSON.parse(readFileSync(join(dir, 'cache.json'), 'utf8'));
      expect(saved.systems['7804']['2451']['1733229000']).toEqual({ calls: [], start: 1733229000, end: 1733230800 });
    });

    it('should stay logged in when autoLogout is off', async () => {
      const client = new BroadcastifyClient(options({ credentialKey: 'saved-token', autoLogout: false }));

      await client.close();

      expect(mockFetch).not.toHaveBeenCalled();
      expect(client.credentialKey).toBe('saved-token');
    });

    it('should do nothing the second time', async () => {
      mockFetch.mockResolvedValue(htmlResponse('', 302, { location: '/' }));
      const client = new BroadcastifyClient(options({ credentialKey: 'saved-token' }));

      await client.close();
      await client.close();

      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should save the cache even when logout fails', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('', 500));
      const client = new BroadcastifyClient(options({ credentialKey: 'saved-token' }));

      await expect(client.close()).rejects.toThrow(UpstreamError);
      expect(existsSync(join(dir, 'cache.json'))).toBe(true);
    });

    it('should write nothing when the cache is not persisted', async () => {
      const client = new BroadcastifyClient(options({ saveCache: false, autoLogout: false }));

      await client.close();

      expect(existsSync(join(dir, 'cache.json'))).toBe(false);
    });
  });
});

describe('withClient', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bcfy-with-client-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the result and close the client', async () => {
    const mockFetch = createMockFetch();
    mockFetch.mockResolvedValue(htmlResponse('', 302, { location: '/' }));

    const result = await withClient(
      { credentialKey: 'saved-token', baseUrl: 'https://bcfy.example.test', cacheDir: dir, saveCache: true, autoLogout: true, fetch: mockFetch, clock: new FakeClock(0) },
      async (client) => client.credentialKey
    );

    expect(result).toBe('saved-token');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(existsSync(join(dir, 'cache.json'))).toBe(true);
  });

  it('should close the client when the callback throws', async () => {
    const mockFetch = createMockFetch();
    mockFetch.mockResolvedValue(htmlResponse('', 302, { location: '/' }));

    await expect(
      withClient(
        { credentialKey: 'saved-token', baseUrl: 'https://bcfy.example.test', cacheDir: dir, saveCache: true, autoLogout: true, fetch: mockFetch, clock: new FakeClock(0) },
        async () => {
          throw new Error('callback failed');
        }
      )
    ).rejects.toThrow('callback failed');

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://bcfy.example.test/account/?action=logout');
    expect(existsSync(join(dir, 'cache.json'))).toBe(true);
  });
});
