import { config } from '../../config/index.js';
import { CREDENTIAL_COOKIE, HTTP_HEADERS, type RequestCategory } from '../../constants/index.js';
import { UpstreamError } from '../../errors/index.js';
import type { RateLimiter } from '../rate-limit/rate-limiter.js';

/** The subset of a fetch Response the client reads */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: Headers;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<HttpResponse>;

export interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string | number>;
  form?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Credential token sent as the session cookie */
  token?: string;
  /** Return 3xx responses instead of following them */
  manualRedirect?: boolean;
}

export interface BroadcastifyHttpOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  /** 0 disables the timeout */
  timeoutMs?: number;
  verbose?: boolean;
}

/**
 * All outbound traffic goes through here: every request first waits on the
 * rate limiter for its category, then carries the credential cookie.
 */
export class BroadcastifyHttp {
  readonly baseUrl: string;
  private fetchImpl: FetchLike;
  private timeoutMs: number;
  private verbose: boolean;

  constructor(
    private limiter: RateLimiter,
    options: BroadcastifyHttpOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? config.broadcastify.baseUrl).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? config.broadcastify.requestTimeoutMs;
    this.verbose = options.verbose ?? config.logging.verbose;
  }

  url(path: string, query?: Record<string, string | number>): string {
    const url = path.startsWith('http') ? path : `${this.baseUrl}${path}`;
    if (!query) return url;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      params.append(key, String(value));
    }
    return `${url}${url.includes('?') ? '&' : '?'}${params.toString()}`;
  }

  async request(category: RequestCategory, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const url = this.url(path, options.query);
    const method = options.method ?? (options.form ? 'POST' : 'GET');

    const headers: Record<string, string> = {
      'User-Agent': HTTP_HEADERS.USER_AGENT,
      Accept: HTTP_HEADERS.ACCEPT_HTML,
      'Accept-Language': 'en-US,en;q=0.5',
      ...options.headers,
    };
    if (options.token) {
      headers.Cookie = `${CREDENTIAL_COOKIE}=${options.token}`;
    }

    const init: RequestInit = { method, headers };
    if (options.form) {
      const body = new URLSearchParams();
      for (const [key, value] of Object.entries(options.form)) {
        body.append(key, String(value));
      }
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      init.body = body.toString();
    }
    if (options.manualRedirect) {
      init.redirect = 'manual';
    }

    await this.limiter.wait(category);

    if (this.timeoutMs > 0) {
      init.signal = AbortSignal.timeout(this.timeoutMs);
    }

    if (this.verbose) {
      console.log(`[HTTP] ${method} ${url} (${category})`);
    }

    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Request to ${url} failed: ${reason}`, { cause: error });
    }
  }

  /**
   * Request that must answer 2xx with a JSON body.
   */
  async requestJson(category: RequestCategory, path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request(category, path, {
      ...options,
      headers: { Accept: HTTP_HEADERS.ACCEPT_JSON, ...options.headers },
    });

    if (!response.ok) {
      throw new UpstreamError(`Server error ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new UpstreamError('Response body is not valid JSON', { status: response.status, cause: error });
    }
  }
}

export function readSetCookies(headers: Headers): string[] {
  if (typeof headers.getSetCookie === 'function') {
    return headers.getSetCookie();
  }
  const joined = headers.get('set-cookie');
  return joined ? [joined] : [];
}

/**
 * Value of the named cookie among a response's Set-Cookie headers; the last
 * one wins when it is set more than once.
 */
export function readCookie(headers: Headers, name: string): string | undefined {
  let value: string | undefined;
  for (const header of readSetCookies(headers)) {
    const match = header.match(/^\s*([^=;]+)=([^;]*)/);
    if (match && match[1].trim() === name) {
      value = match[2];
    }
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
