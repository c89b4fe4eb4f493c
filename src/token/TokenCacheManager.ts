import { pino, type Logger } from 'pino';
import type { CachedToken, IssuanceRequest } from './tokenTypes.js';
import type { TokenStore } from './TokenStore.js';
import type { TokenIssuer } from './OAuthTokenIssuer.js';
import { credentialKey } from './credentialKey.js';
import { IssuanceError } from '../errors/AppError.js';

const moduleLogger = pino({ name: 'TokenCacheManager' });

export interface TokenCacheManagerOptions {
  store: TokenStore;
  issuer: TokenIssuer;
  /**
   * Slack subtracted from every token's expiry before it is considered usable.
   * Keep it in seconds, not milliseconds: it also absorbs clock skew with the identity provider.
   */
  safetyMarginSeconds: number;
  /** Cache hits, misses and refreshes are logged at debug. */
  logger?: Pick<Logger, 'debug'>;
}

/**
 * TokenCacheManager hands out upstream tokens, issuing a new one only when the stored token is
 * missing or within the safety margin of its expiry.
 *
 * Features:
 * - Token caching per credential identity, shared by every invocation in the warm process
 * - Single-flight refresh: callers that find the token stale while a refresh for the same
 *   credentials is in progress await that refresh instead of starting their own
 * - A failed refresh leaves the store untouched and rejects every caller waiting on it
 */
export class TokenCacheManager {
  private readonly store: TokenStore;
  private readonly issuer: TokenIssuer;
  private readonly safetyMarginMs: number;
  private readonly logger: Pick<Logger, 'debug'>;

  private inFlightRefreshes: Map<string, Promise<CachedToken>> = new Map();

  constructor(options: TokenCacheManagerOptions) {
    this.store = options.store;
    this.issuer = options.issuer;
    this.safetyMarginMs = options.safetyMarginSeconds * 1000;
    this.logger = options.logger ?? moduleLogger;
  }

  /**
   * Get a token that stays valid for at least the safety margin.
   *
   * At most one issuance call is made per call, and at most one is in flight per credential identity.
   *
   * @throws IssuanceError if a refresh was needed and failed
   */
  async getValidToken(request: IssuanceRequest): Promise<CachedToken> {
    const key = credentialKey(request);
    const keyPrefix = key.slice(0, 8);

    const cached = this.store.get(key);
    if (cached && this.isFresh(cached)) {
      this.logger.debug({ credential: keyPrefix }, 'Token cache hit');
      return cached;
    }

    const existingRefresh = this.inFlightRefreshes.get(key);
    if (existingRefresh) {
      this.logger.debug({ credential: keyPrefix }, 'Joining in-flight token refresh');
      return existingRefresh;
    }

    this.logger.debug({ credential: keyPrefix, reason: cached ? 'expired' : 'empty' }, 'Token cache miss, refreshing');

    const refreshPromise = this.refreshToken(key, request);
    this.inFlightRefreshes.set(key, refreshPromise);

    try {
      return await refreshPromise;
    } finally {
      if (this.inFlightRefreshes.get(key) === refreshPromise) {
        this.inFlightRefreshes.delete(key);
      }
    }
  }

  /**
   * Number of refreshes currently awaiting the identity provider.
   */
  get pendingRefreshes(): number {
    return this.inFlightRefreshes.size;
  }

  private isFresh(token: CachedToken): boolean {
    return token.expiresAt - this.safetyMarginMs > Date.now();
  }

  private async refreshToken(key: string, request: IssuanceRequest): Promise<CachedToken> {
    const token = await this.issuer.issue(request);

    if (!this.isFresh(token)) {
      throw IssuanceError.invalidResponse(
        `token lifetime does not exceed the ${this.safetyMarginMs / 1000}s safety margin`
      );
    }

    this.store.set(key, token);
    return token;
  }
}
