import type { CachedToken } from './tokenTypes.js';

/**
 * Process-lifetime holder of issued tokens, keyed by credential identity.
 *
 * Implementations are synchronous: invocations sharing a warm process run on one
 * event loop, so a get or set can never interleave with another.
 * `get` returns whatever was last written, stale or not; freshness is the caller's call.
 */
export interface TokenStore {
  get(key: string): CachedToken | undefined;
  set(key: string, token: CachedToken): void;
  readonly size: number;
}
