import jwt from 'jsonwebtoken';
import { logger } from '../../shared/logger.js';
import { AuthenticationError, DataCloudError } from '../../shared/errors.js';
import type { CachedToken, DataCloudTokenResponse, OAuthTokenResponse } from '../types.js';
import { parseJson, send, toBaseUrl } from './request.js';

const DEFAULT_TOKEN_TTL_MS = 115 * 60 * 1000; // 115 minutes
const ASSERTION_LIFETIME_SECONDS = 180;

const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const CDP_EXCHANGE_GRANT = 'urn:salesforce:grant-type:external:cdp';
const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

export class DataCloudAuth {
  private readonly loginUrl: string;
  private readonly clientId: string;
  private readonly userName: string;
  private readonly privateKey: string;
  private readonly tokenTtlMs: number;
  private readonly timeoutMs: number | undefined;

  private cachedToken: CachedToken | null = null;
  private refreshPromise: Promise<CachedToken> | null = null;

  constructor(opts: {
    loginUrl: string;
    clientId: string;
    userName: string;
    privateKey: string;
    tokenTtlMs?: number;
    timeoutMs?: number;
  }) {
    this.loginUrl = toBaseUrl(opts.loginUrl);
    this.clientId = opts.clientId;
    this.userName = opts.userName;
    this.privateKey = opts.privateKey;
    this.tokenTtlMs = opts.tokenTtlMs ?? DEFAULT_TOKEN_TTL_MS;
    this.timeoutMs = opts.timeoutMs;
  }

  /** Get a valid Data Cloud token, refreshing if necessary. */
  async getToken(): Promise<CachedToken> {
    if (this.cachedToken && Date.now() < this.cachedToken.expiresAt) {
      return this.cachedToken;
    }

    // Coalesce concurrent refresh calls into a single exchange
    if (!this.refreshPromise) {
      this.refreshPromise = this.fetchToken().finally(() => {
        this.refreshPromise = null;
      });
    }

    return this.refreshPromise;
  }

  /** Force a token refresh (e.g. after a 401 response). */
  async forceRefresh(): Promise<CachedToken> {
    this.cachedToken = null;
    this.refreshPromise = null;
    return this.getToken();
  }

  /** Clear cached state (for testing). */
  reset(): void {
    this.cachedToken = null;
    this.refreshPromise = null;
  }

  /** Sign the JWT bearer assertion for the login host. */
  createAssertion(nowSeconds = Math.floor(Date.now() / 1000)): string {
    try {
      return jwt.sign(
        {
          iss: this.clientId,
          sub: this.userName,
          aud: this.loginUrl,
          exp: nowSeconds + ASSERTION_LIFETIME_SECONDS,
        },
        this.privateKey,
        { algorithm: 'RS256', noTimestamp: true },
      );
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AuthenticationError(`Could not sign JWT assertion: ${reason}`);
    }
  }

  // ── private ───────────────────────────────────────────────────────────────

  private async fetchToken(): Promise<CachedToken> {
    logger.info('Refreshing Data Cloud token');

    const core = await this.postForm<OAuthTokenResponse>(
      'Get S2S Access Token',
      `${this.loginUrl}/services/oauth2/token`,
      { grant_type: JWT_BEARER_GRANT, assertion: this.createAssertion() },
    );

    const cdp = await this.postForm<DataCloudTokenResponse>(
      'Data Cloud Token Exchange',
      `${toBaseUrl(core.instance_url)}/services/a360/token`,
      {
        grant_type: CDP_EXCHANGE_GRANT,
        subject_token: core.access_token,
        subject_token_type: ACCESS_TOKEN_TYPE,
      },
    );

    this.cachedToken = {
      accessToken: cdp.access_token,
      instanceUrl: toBaseUrl(cdp.instance_url),
      expiresAt: Date.now() + this.tokenTtlMs,
    };

    logger.info({ instanceUrl: this.cachedToken.instanceUrl }, 'Data Cloud token acquired');
    return this.cachedToken;
  }

  private async postForm<T extends { access_token: string; instance_url: string }>(
    operation: string,
    url: string,
    form: Record<string, string>,
  ): Promise<T> {
    try {
      const res = await send({
        operation,
        method: 'POST',
        url,
        contentType: 'application/x-www-form-urlencoded',
        body: new URLSearchParams(form).toString(),
        expect: [200],
        timeoutMs: this.timeoutMs,
      });
      const data = parseJson<T>(res);
      if (!data.access_token || !data.instance_url) {
        throw new AuthenticationError(`${operation} returned no access_token/instance_url`);
      }
      return data;
    } catch (err: unknown) {
      if (err instanceof DataCloudError) {
        throw new AuthenticationError(
          `${operation} failed (${err.status}): ${err.content}`,
          err.status,
          err.content,
        );
      }
      throw err;
    }
  }
}
