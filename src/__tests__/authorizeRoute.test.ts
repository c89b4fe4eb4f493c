import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../server.js';
import { parseConfig } from '../config.js';
import { IssuanceError } from '../errors/AppError.js';
import type { CachedToken, IssuanceRequest } from '../token/tokenTypes.js';

const TEST_ENV = {
  TOKEN_URL: 'https://idp.test/oauth2/v1/token',
  OAUTH_CLIENT_ID: 'test-client-id',
  OAUTH_CLIENT_SECRET: 'test-client-secret',
  OAUTH_SCOPE: 'urn:backend:api',
  PERMITTED_SCOPES: 'read,write',
  PASS_THROUGH_FIELDS: 'X-Tenant-Id',
};

function createToken(value: string): CachedToken {
  return { value, tokenType: 'Bearer', expiresAt: Date.now() + 3600_000 };
}

describe('authorize routes', () => {
  let fastify: FastifyInstance;
  const issue = vi.fn<(request: IssuanceRequest) => Promise<CachedToken>>();

  beforeEach(async () => {
    fastify = await buildServer(parseConfig(TEST_ENV), { issuer: { issue }, logger: false });
  });

  afterEach(async () => {
    await fastify.close();
    issue.mockReset();
  });

  describe('POST /v1/authorize', () => {
    it('should return ALLOW with the upstream token for a permitted scope', async () => {
      issue.mockResolvedValueOnce(createToken('upstream-token'));

      const response = await fastify.inject({
        method: 'POST',
        url: '/v1/authorize',
        payload: {
          type: 'USER_DEFINED',
          data: { scope: 'read', 'X-Tenant-Id': 'tenant-7' },
        },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.active).toBe(true);
      expect(body.decision).toBe('ALLOW');
      expect(body.scope).toEqual(['read']);
      expect(body.context).toEqual({
        'X-Tenant-Id': 'tenant-7',
        token: 'upstream-token',
        tokenType: 'Bearer',
      });
      expect(issue).toHaveBeenCalledWith({
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        scope: 'urn:backend:api',
      });
    });

    it('should issue once for a burst of concurrent invocations', async () => {
      issue.mockResolvedValue(createToken('upstream-token'));

      const responses = await Promise.all(
        Array.from({ length: 5 }, () =>
          fastify.inject({ method: 'POST', url: '/v1/authorize', payload: { scope: 'write' } })
        )
      );

      expect(responses.map((response) => response.json().decision)).toEqual([
        'ALLOW',
        'ALLOW',
        'ALLOW',
        'ALLOW',
        'ALLOW',
      ]);
      expect(issue).toHaveBeenCalledTimes(1);
    });

    it('should return DENY without a token for an unpermitted scope', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/v1/authorize',
        payload: { scope: 'delete' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ active: false, decision: 'DENY', context: {} });
      expect(issue).not.toHaveBeenCalled();
    });

    it('should return DENY without provider details when issuance fails', async () => {
      issue.mockRejectedValueOnce(IssuanceError.httpStatus(500, 'internal provider trace'));

      const response = await fastify.inject({
        method: 'POST',
        url: '/v1/authorize',
        payload: { scope: 'read' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ active: false, decision: 'DENY', context: {} });
    });

    it('should reject an invocation that does not match the schema', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/v1/authorize',
        payload: { scope: 42 },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error.category).toBe('VALIDATION');
      expect(body.error.code).toBe('VALIDATION_REQUEST_INVALID');
      expect(body.error.message).toBe('scope: Expected string, received number');
      expect(body.requestId).toEqual(expect.any(String));
      expect(issue).not.toHaveBeenCalled();
    });
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });
  });
});
