import type { Logger } from 'pino';

/**
 * OAuth token response from the identity provider's token endpoint.
 * Only `access_token` is always required; the lifetime may come from `expires_in`
 * or, failing that, from the `exp` claim of a JWT access token.
 */
export interface OAuthTokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
  scope?: string;
}

/**
 * Client-credentials parameters for one issuance call.
 */
export interface IssuanceRequest {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly scope?: string;
}

/**
 * Cached token with expiry information.
 * `expiresAt` is the provider-reported expiry in epoch milliseconds, without any safety margin.
 */
export interface CachedToken {
  value: string;
  tokenType: string;
  expiresAt: number;
}

export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post';

/**
 * Configuration options for OAuthTokenIssuer.
 */
export interface OAuthTokenIssuerOptions {
  tokenUrl: string;
  timeoutMs: number;
  clientAuthMethod?: ClientAuthMethod;
  /** Defaults to a module-level pino logger at pino's default level. */
  logger?: Pick<Logger, 'debug'>;
}
