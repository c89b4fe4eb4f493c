/**
 * Scope decisions for gateway invocations.
 *
 * Requested scopes are space-delimited, case-sensitive strings (OAuth style). A request is
 * allowed only when every scope it names is permitted; an empty request is denied.
 * Token freshness plays no part here.
 */

export type ScopeDecision = 'ALLOW' | 'DENY';

/**
 * How a requested scope is matched against a permitted one.
 * - `exact`: string equality
 * - `hierarchical`: equality, or the requested scope extends the permitted one past
 *   `separator` (`orders` permits `orders:read` and `orders:read:own`)
 */
export type ScopeMatchPolicy =
  | { mode: 'exact' }
  | { mode: 'hierarchical'; separator: string };

export const EXACT_MATCH: ScopeMatchPolicy = { mode: 'exact' };

export interface ScopeEvaluation {
  decision: ScopeDecision;
  requestedScopes: string[];
  /** Requested scopes that matched nothing in the permitted set. */
  deniedScopes: string[];
}

export function parseScopes(raw: string): string[] {
  return raw.split(/\s+/).filter((scope) => scope.length > 0);
}

function matches(requested: string, permitted: string, policy: ScopeMatchPolicy): boolean {
  if (requested === permitted) {
    return true;
  }
  if (policy.mode === 'hierarchical') {
    return policy.separator.length > 0 && requested.startsWith(permitted + policy.separator);
  }
  return false;
}

export function evaluateScopes(
  requestedScope: string,
  permittedScopes: ReadonlySet<string>,
  policy: ScopeMatchPolicy = EXACT_MATCH
): ScopeEvaluation {
  const requestedScopes = [...new Set(parseScopes(requestedScope))];

  if (requestedScopes.length === 0) {
    return { decision: 'DENY', requestedScopes, deniedScopes: [] };
  }

  const deniedScopes = requestedScopes.filter((requested) => {
    if (permittedScopes.has(requested)) {
      return false;
    }
    for (const permitted of permittedScopes) {
      if (matches(requested, permitted, policy)) {
        return false;
      }
    }
    return true;
  });

  return {
    decision: deniedScopes.length === 0 ? 'ALLOW' : 'DENY',
    requestedScopes,
    deniedScopes,
  };
}

export function authorize(
  requestedScope: string,
  permittedScopes: ReadonlySet<string>,
  policy: ScopeMatchPolicy = EXACT_MATCH
): ScopeDecision {
  return evaluateScopes(requestedScope, permittedScopes, policy).decision;
}
