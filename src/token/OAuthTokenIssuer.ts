import { fetch, type Response } from 'undici';
import { z } from 'zod';
import { pino, type Logger } from 'pino';
import type {
  CachedToken,
  ClientAuthMethod,
  IssuanceRequest,
  OAuthTokenIssuerOptions,
  OAuthTokenResponse,
} from './tokenTypes.js';
import { decodeJwtExpiry } from './jwtExpiry.js';
import { withTimeout } from '../http/timeout.js';
import { IssuanceError } from '../errors/AppError.js';

const moduleLogger = pino({ name: 'OAuthTokenIssuer' });

const MAX_PROVIDER_BODY_CHARS = 500;

/**
 * Some providers send `expires_in` as a numeric string.
 */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z
    .union([z.number(), z.string().regex(/^\d+$/).transform((value) => parseInt(value, 10))])
    .pipe(z.number().positive())
    .optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

/**
 * Performs the network call that turns client credentials into a bearer token.
 */
export interface TokenIssuer {
  issue(request: IssuanceRequest): Promise<CachedToken>;
}

/**
 * OAuthTokenIssuer calls an OAuth2 token endpoint with the client credentials grant.
 *
 * Exactly one HTTP request per `issue` call; no retries. Every failure, timeouts included,
 * surfaces as an IssuanceError.
 */
export class OAuthTokenIssuer implements TokenIssuer {
  private readonly tokenUrl: string;
  private readonly timeoutMs: number;
  private readonly clientAuthMethod: ClientAuthMethod;
  private readonly logger: Pick<Logger, 'debug'>;

  constructor(options: OAuthTokenIssuerOptions) {
    this.tokenUrl = options.tokenUrl;
    this.timeoutMs = options.timeoutMs;
    this.clientAuthMethod = options.clientAuthMethod ?? 'client_secret_basic';
    this.logger = options.logger ?? moduleLogger;
  }

  async issue(request: IssuanceRequest): Promise<CachedToken> {
    // Measured from before the request goes out
    const issuedAt = Date.now();
    const data = await this.requestToken(request);

    const expiresAt =
      data.expires_in !== undefined
        ? issuedAt + data.expires_in * 1000
        : decodeJwtExpiry(data.access_token);

    if (expiresAt === undefined) {
      throw IssuanceError.invalidResponse('missing expires_in and no exp claim in access_token');
    }

    this.logger.debug(
      { expiresAt: new Date(expiresAt).toISOString(), lifetimeSource: data.expires_in !== undefined ? 'expires_in' : 'jwt' },
      'Token issued'
    );

    return {
      value: data.access_token,
      tokenType: data.token_type ?? 'Bearer',
      expiresAt,
    };
  }

  private async requestToken(request: IssuanceRequest): Promise<OAuthTokenResponse> {
    const body = new URLSearchParams({ grant_type: 'client_credentials' });
    if (request.scope) {
      body.set('scope', request.scope);
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };

    if (this.clientAuthMethod === 'client_secret_basic') {
      headers.Authorization = basicAuthorization(request.clientId, request.clientSecret);
    } else {
      body.set('client_id', request.clientId);
      body.set('client_secret', request.clientSecret);
    }

    // The deadline covers the whole exchange, body included
    const responseText = await withTimeout(
      async (signal) => {
        let response: Response;
        try {
          response = await fetch(this.tokenUrl, {
            method: 'POST',
            headers,
            body: body.toString(),
            signal,
          });
        } catch (error) {
          const cause = error instanceof Error ? error : undefined;
          throw IssuanceError.network(cause ? describeNetworkError(cause) : String(error), cause);
        }

        if (!response.ok) {
          const errorBody = await response.text().catch(() => 'Unable to read error body');
          throw IssuanceError.httpStatus(response.status, errorBody.slice(0, MAX_PROVIDER_BODY_CHARS));
        }

        try {
          return await response.text();
        } catch (error) {
          const cause = error instanceof Error ? error : undefined;
          throw IssuanceError.network(`reading response body failed: ${cause?.message ?? String(error)}`, cause);
        }
      },
      this.timeoutMs,
      (cause) => IssuanceError.timeout(this.timeoutMs, cause)
    );

    let json: unknown;
    try {
      json = JSON.parse(responseText);
    } catch (error) {
      throw IssuanceError.invalidResponse('body is not valid JSON', error instanceof Error ? error : undefined);
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
      throw IssuanceError.invalidResponse(`missing or invalid fields: ${[...new Set(fields)].join(', ')}`, parsed.error);
    }

    return parsed.data;
  }
}

export function basicAuthorization(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;
}

/**
 * undici reports every transport failure as `TypeError: fetch failed` and keeps the useful part in `cause`.
 */
function describeNetworkError(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}
