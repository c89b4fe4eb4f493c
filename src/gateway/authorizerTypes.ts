import type { CachedToken } from '../token/tokenTypes.js';

export type Decision = 'ALLOW' | 'DENY';

/**
 * Why an invocation was denied. Never part of the gateway-visible response.
 */
export type DenyReason =
  | 'MISSING_SCOPE'
  | 'SCOPE_NOT_PERMITTED'
  | 'MISSING_CREDENTIAL'
  | 'ISSUANCE_FAILED';

export interface AllowResponse {
  active: true;
  decision: 'ALLOW';
  scope: string[];
  /** ISO-8601 expiry of the upstream token, so the gateway can cap its own caching. */
  expiresAt: string;
  context: Record<string, string> & {
    token: string;
    tokenType: string;
  };
}

export interface DenyResponse {
  active: false;
  decision: 'DENY';
  context: Record<string, never>;
}

export type AuthorizerResponse = AllowResponse | DenyResponse;

/**
 * Per-invocation diagnostics; created and discarded with the invocation.
 */
export interface AuthorizationContext {
  requestedScopes: string[];
  permittedScopes: ReadonlySet<string>;
  deniedScopes?: string[];
  decision: Decision;
  denyReason?: DenyReason;
  tokenForUpstream?: CachedToken;
}

export interface AuthorizationOutcome {
  response: AuthorizerResponse;
  context: AuthorizationContext;
}
