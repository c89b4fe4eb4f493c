function base64UrlDecode(data: string): string {
  const padded = data + '='.repeat((4 - (data.length % 4)) % 4);
  return Buffer.from(padded.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf8');
}

/**
 * Read the `exp` claim of a JWT without verifying its signature.
 *
 * @returns expiry in epoch milliseconds, or undefined when the token is not a JWT or carries no numeric `exp`
 */
export function decodeJwtExpiry(token: string): number | undefined {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return undefined;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(base64UrlDecode(parts[1]));
  } catch {
    return undefined;
  }

  if (typeof payload !== 'object' || payload === null || !('exp' in payload)) {
    return undefined;
  }

  const { exp } = payload;
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return undefined;
  }

  return exp * 1000;
}
