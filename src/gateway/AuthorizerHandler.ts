import { pino, type Logger } from 'pino';
import type { GatewayInvocation } from './invocation.js';
import {
  extractBasicCredential,
  extractRequestedScope,
  pickPassThroughFields,
} from './invocation.js';
import type { AuthorizerResponse, AuthorizationContext, AuthorizationOutcome, DenyReason } from './authorizerTypes.js';
import { evaluateScopes, type ScopeMatchPolicy } from '../authz/scopeAuthorizer.js';
import type { TokenCacheManager } from '../token/TokenCacheManager.js';
import type { CachedToken, IssuanceRequest } from '../token/tokenTypes.js';
import type { ClientCredentials } from '../config.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';

const PASS_THROUGH_RESERVED = new Set(['token', 'tokenType']);

export interface AuthorizerHandlerOptions {
  tokenCache: TokenCacheManager;
  credentials: ClientCredentials;
  /** Scope requested from the identity provider, not the scope the caller asks for. */
  issuanceScope?: string;
  permittedScopes: ReadonlySet<string>;
  scopePolicy: ScopeMatchPolicy;
  requestedScopeField: string;
  passThroughFields?: readonly string[];
  logger?: DecisionLogger;
}

/**
 * Any pino-compatible logger, Fastify's included.
 */
export type DecisionLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

/**
 * Entry point for one gateway invocation.
 *
 * The scope decision comes first since it is pure and cheap; a denied caller never costs an
 * issuance call. Every path that cannot produce both a permitted scope and a fresh token
 * resolves to DENY. Deny reasons go to the log only.
 */
export class AuthorizerHandler {
  private readonly tokenCache: TokenCacheManager;
  private readonly credentials: ClientCredentials;
  private readonly issuanceScope?: string;
  private readonly permittedScopes: ReadonlySet<string>;
  private readonly scopePolicy: ScopeMatchPolicy;
  private readonly requestedScopeField: string;
  private readonly passThroughFields: readonly string[];
  private readonly logger: DecisionLogger;

  constructor(options: AuthorizerHandlerOptions) {
    this.tokenCache = options.tokenCache;
    this.credentials = options.credentials;
    this.issuanceScope = options.issuanceScope;
    this.permittedScopes = options.permittedScopes;
    this.scopePolicy = options.scopePolicy;
    this.requestedScopeField = options.requestedScopeField;
    this.passThroughFields = (options.passThroughFields ?? []).filter(
      (field) => !PASS_THROUGH_RESERVED.has(field)
    );
    this.logger = options.logger ?? pino({ name: 'AuthorizerHandler' });
  }

  async handle(invocation: GatewayInvocation): Promise<AuthorizerResponse> {
    const outcome = await this.evaluate(invocation);
    return outcome.response;
  }

  async evaluate(invocation: GatewayInvocation): Promise<AuthorizationOutcome> {
    const requestedScope = extractRequestedScope(invocation, this.requestedScopeField);
    if (requestedScope === undefined) {
      return this.deny({ requestedScopes: [] }, 'MISSING_SCOPE');
    }

    const evaluation = evaluateScopes(requestedScope, this.permittedScopes, this.scopePolicy);
    if (evaluation.decision === 'DENY') {
      return this.deny(
        { requestedScopes: evaluation.requestedScopes, deniedScopes: evaluation.deniedScopes },
        'SCOPE_NOT_PERMITTED'
      );
    }

    const issuanceRequest = this.resolveIssuanceRequest(invocation);
    if (!issuanceRequest) {
      return this.deny({ requestedScopes: evaluation.requestedScopes }, 'MISSING_CREDENTIAL');
    }

    let token: CachedToken;
    try {
      token = await this.tokenCache.getValidToken(issuanceRequest);
    } catch (error) {
      const appError = mapError(error);
      return this.deny({ requestedScopes: evaluation.requestedScopes }, 'ISSUANCE_FAILED', {
        category: appError.category,
        code: appError.code,
        message: appError.message,
        details: sanitizeForLogging(appError.details),
      });
    }

    const context: AuthorizationContext = {
      requestedScopes: evaluation.requestedScopes,
      permittedScopes: this.permittedScopes,
      decision: 'ALLOW',
      tokenForUpstream: token,
    };

    this.logger.info(
      { scopes: evaluation.requestedScopes, tokenExpiresAt: new Date(token.expiresAt).toISOString() },
      'Invocation allowed'
    );

    return {
      context,
      response: {
        active: true,
        decision: 'ALLOW',
        scope: evaluation.requestedScopes,
        expiresAt: new Date(token.expiresAt).toISOString(),
        context: {
          ...pickPassThroughFields(invocation, this.passThroughFields),
          token: token.value,
          tokenType: token.tokenType,
        },
      },
    };
  }

  private resolveIssuanceRequest(invocation: GatewayInvocation): IssuanceRequest | undefined {
    if (this.credentials.source === 'config') {
      return {
        clientId: this.credentials.clientId,
        clientSecret: this.credentials.clientSecret,
        scope: this.issuanceScope,
      };
    }

    const credential = extractBasicCredential(invocation);
    if (!credential) {
      return undefined;
    }
    return { ...credential, scope: this.issuanceScope };
  }

  private deny(
    context: Pick<AuthorizationContext, 'requestedScopes' | 'deniedScopes'>,
    reason: DenyReason,
    error?: Record<string, unknown>
  ): AuthorizationOutcome {
    const logFields = { reason, scopes: context.requestedScopes, deniedScopes: context.deniedScopes };
    if (error) {
      this.logger.error({ ...logFields, error }, 'Invocation denied: token issuance failed');
    } else {
      this.logger.warn(logFields, 'Invocation denied');
    }

    return {
      context: {
        ...context,
        permittedScopes: this.permittedScopes,
        decision: 'DENY',
        denyReason: reason,
      },
      response: { active: false, decision: 'DENY', context: {} },
    };
  }
}
