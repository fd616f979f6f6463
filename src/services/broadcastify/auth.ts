import * as cheerio from 'cheerio';
import { config } from '../../config/index.js';
import { CREDENTIAL_COOKIE, ENDPOINTS } from '../../constants/index.js';
import { AuthenticationFailedError, AuthenticationRequiredError, UpstreamError } from '../../errors/index.js';
import { readCookie, type BroadcastifyHttp } from './http.js';

export interface Credentials {
  username?: string;
  password?: string;
  /** Token from an earlier login; skips the login request */
  credentialKey?: string;
}

/** Anything that can hand out the current credential token */
export interface CredentialSource {
  requireToken(): string;
}

/**
 * Owns the credential token: obtains it through the login form and
 * invalidates it through the logout endpoint. The token is an opaque
 * cookie value and is never logged.
 */
export class Authenticator implements CredentialSource {
  private currentToken: string | undefined;
  private username: string;
  private password: string;

  constructor(
    private http: BroadcastifyHttp,
    credentials: Credentials = {}
  ) {
    this.username = credentials.username ?? config.broadcastify.username;
    this.password = credentials.password ?? config.broadcastify.password;
    this.currentToken = (credentials.credentialKey ?? config.broadcastify.credentialKey) || undefined;
  }

  get token(): string | undefined {
    return this.currentToken;
  }

  get isLoggedIn(): boolean {
    return this.currentToken !== undefined;
  }

  requireToken(): string {
    if (this.currentToken === undefined) {
      throw new AuthenticationRequiredError();
    }
    return this.currentToken;
  }

  async login(): Promise<string> {
    if (this.currentToken !== undefined) {
      return this.currentToken;
    }
    if (!this.username || !this.password) {
      throw new AuthenticationFailedError('Login failed - no username or password configured');
    }

    const response = await this.http.request('default', ENDPOINTS.LOGIN, {
      method: 'POST',
      form: {
        username: this.username,
        password: this.password,
        action: 'auth',
        redirect: this.http.baseUrl,
      },
      manualRedirect: true,
    });

    if (response.status >= 400) {
      throw new AuthenticationFailedError(`Login failed - server error ${response.status}`);
    }

    const location = response.headers.get('location') ?? '';
    if (location.includes('failed=1')) {
      throw new AuthenticationFailedError('Login failed - incorrect credentials');
    }

    const token = readCookie(response.headers, CREDENTIAL_COOKIE);

    if (!token) {
      // A 200 here means the login page was rendered again
      if (response.status === 200) {
        const message = extractLoginError(await response.text());
        throw new AuthenticationFailedError(
          message ? `Login failed - ${message}` : 'Login failed - login page returned without a session'
        );
      }
      throw new AuthenticationFailedError(`Login failed - unknown error (${CREDENTIAL_COOKIE} cookie not found)`);
    }

    this.currentToken = token;
    console.log('[Auth] Logged in to Broadcastify');
    return token;
  }

  async logout(token: string | undefined = this.currentToken): Promise<void> {
    if (token === undefined) return;

    const response = await this.http.request('default', ENDPOINTS.LOGOUT, { token, manualRedirect: true });
    if (response.status >= 400) {
      throw new UpstreamError(`Logout failed - server error ${response.status}`, { status: response.status });
    }

    if (token === this.currentToken) {
      this.currentToken = undefined;
    }
    console.log('[Auth] Logged out');
  }
}

/**
 * Pull the alert text out of a re-rendered login page, if it has one.
 */
export function extractLoginError(html: string): string | null {
  const $ = cheerio.load(html);
  const text = $('.alert-danger, .alert-error, .error, #loginError').first().text().replace(/\s+/g, ' ').trim();
  return text || null;
}
