import { createHash } from 'crypto';
import type { IssuanceRequest } from './tokenTypes.js';

/**
 * Credential identity of an issuance request: a SHA-256 hex digest, so the
 * client secret never serves as a map key or shows up in logs.
 */
export function credentialKey(request: IssuanceRequest): string {
  return createHash('sha256')
    .update(JSON.stringify([request.clientId, request.clientSecret, request.scope ?? '']))
    .digest('hex');
}
