import Fastify from 'fastify';
import { pino } from 'pino';
import { loadConfig, type Config } from './config.js';
import { InMemoryTokenStore } from './token/InMemoryTokenStore.js';
import { OAuthTokenIssuer, type TokenIssuer } from './token/OAuthTokenIssuer.js';
import { TokenCacheManager } from './token/TokenCacheManager.js';
import { AuthorizerHandler } from './gateway/AuthorizerHandler.js';
import { authorizeRoutes } from './routes/authorize.js';
import { AppError, mapError } from './errors/index.js';

export interface BuildServerOptions {
  /** Replaces the OAuth issuer; the store and cache manager are always fresh per server. */
  issuer?: TokenIssuer;
  logger?: boolean;
}

export async function buildServer(config: Config, options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: options.logger === false
      ? false
      : {
          level: config.debug ? 'debug' : 'info',
        },
  });

  fastify.setErrorHandler((error, request, reply) => {
    // Fastify's own 4xx errors (bad JSON, wrong content type) are the caller's fault
    const appError =
      error.statusCode !== undefined && error.statusCode < 500
        ? AppError.validation(error.message, { fastifyCode: error.code }, error)
        : mapError(error);
    request.log.error({ code: appError.code, message: appError.message }, 'Request failed');
    return reply.status(appError.httpStatus).send(appError.toPayload(request.id));
  });

  // Created once per process: every invocation in this warm context shares the store
  const tokenStore = new InMemoryTokenStore({
    maxEntries: config.oauth.credentials.source === 'config' ? 1 : config.tokenCache.maxEntries,
  });

  const issuer = options.issuer ?? new OAuthTokenIssuer({
    tokenUrl: config.oauth.tokenUrl,
    timeoutMs: config.oauth.timeoutMs,
    clientAuthMethod: config.oauth.clientAuthMethod,
    logger: fastify.log.child({ name: 'OAuthTokenIssuer' }),
  });

  const tokenCache = new TokenCacheManager({
    store: tokenStore,
    issuer,
    safetyMarginSeconds: config.tokenCache.safetyMarginSeconds,
    logger: fastify.log.child({ name: 'TokenCacheManager' }),
  });

  const handler = new AuthorizerHandler({
    tokenCache,
    credentials: config.oauth.credentials,
    issuanceScope: config.oauth.scope,
    permittedScopes: config.scopes.permitted,
    scopePolicy: config.scopes.policy,
    requestedScopeField: config.invocation.requestedScopeField,
    passThroughFields: config.invocation.passThroughFields,
    logger: fastify.log.child({ name: 'AuthorizerHandler' }),
  });

  await fastify.register(authorizeRoutes, { handler });

  return fastify;
}

export async function startServer() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    pino({ name: 'server' }).fatal({ err }, 'Invalid configuration, refusing to start');
    process.exit(1);
  }

  const fastify = await buildServer(config);

  try {
    await fastify.listen({
      port: config.port,
      host: config.host,
    });
    fastify.log.info(
      {
        credentialSource: config.oauth.credentials.source,
        permittedScopes: [...config.scopes.permitted],
        scopePolicy: config.scopes.policy.mode,
      },
      `Authorizer listening on port ${config.port}`
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((err: unknown) => {
    pino({ name: 'server' }).fatal({ err }, 'Failed to start');
    process.exit(1);
  });
}
