import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors/AppError.js';
import { parseScopes, type ScopeMatchPolicy } from './authz/scopeAuthorizer.js';

const numericString = (name: string) =>
  z.string().regex(/^\d+$/, `${name} must be a non-negative integer`);

/**
 * Schema for validating environment variables.
 */
const configSchema = z
  .object({
    // Server
    PORT: numericString('PORT').default('8080'),
    HOST: z.string().default('0.0.0.0'),

    // Identity provider
    TOKEN_URL: z.string().url('TOKEN_URL must be a valid URL'),
    // 'config' uses OAUTH_CLIENT_ID/SECRET; 'passthrough' uses the Basic credential carried by each invocation
    CREDENTIAL_SOURCE: z.enum(['config', 'passthrough']).default('config'),
    OAUTH_CLIENT_ID: z.string().optional(),
    OAUTH_CLIENT_SECRET: z.string().optional(),
    OAUTH_SCOPE: z.string().optional(),
    OAUTH_CLIENT_AUTH_METHOD: z
      .enum(['client_secret_basic', 'client_secret_post'])
      .default('client_secret_basic'),
    OAUTH_TIMEOUT_MS: numericString('OAUTH_TIMEOUT_MS').default('10000'),

    // Scope policy
    PERMITTED_SCOPES: z.string({ required_error: 'PERMITTED_SCOPES is required' }),
    SCOPE_MATCH_POLICY: z.enum(['exact', 'hierarchical']).default('exact'),
    SCOPE_SEPARATOR: z.string().min(1, 'SCOPE_SEPARATOR must not be empty').default(':'),

    // Invocation mapping
    REQUESTED_SCOPE_FIELD: z.string().min(1).default('scope'),
    PASS_THROUGH_FIELDS: z.string().default(''),

    // Token cache
    TOKEN_SAFETY_MARGIN_SECONDS: numericString('TOKEN_SAFETY_MARGIN_SECONDS').default('30'),
    TOKEN_STORE_MAX_ENTRIES: numericString('TOKEN_STORE_MAX_ENTRIES').default('1000'),

    DEBUG: z.string().default('0'),
  })
  .superRefine((env, ctx) => {
    if (env.CREDENTIAL_SOURCE === 'config') {
      if (!env.OAUTH_CLIENT_ID) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['OAUTH_CLIENT_ID'],
          message: 'OAUTH_CLIENT_ID is required when CREDENTIAL_SOURCE=config',
        });
      }
      if (!env.OAUTH_CLIENT_SECRET) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['OAUTH_CLIENT_SECRET'],
          message: 'OAUTH_CLIENT_SECRET is required when CREDENTIAL_SOURCE=config',
        });
      }
    }
    if (splitList(env.PERMITTED_SCOPES).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PERMITTED_SCOPES'],
        message: 'PERMITTED_SCOPES must name at least one scope',
      });
    }
    if (parseInt(env.OAUTH_TIMEOUT_MS, 10) === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OAUTH_TIMEOUT_MS'],
        message: 'OAUTH_TIMEOUT_MS must be greater than 0',
      });
    }
    if (parseInt(env.TOKEN_STORE_MAX_ENTRIES, 10) === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TOKEN_STORE_MAX_ENTRIES'],
        message: 'TOKEN_STORE_MAX_ENTRIES must be greater than 0',
      });
    }
  });

/**
 * Scopes may be separated by commas, whitespace or both.
 */
function splitList(value: string): string[] {
  return parseScopes(value.replace(/,/g, ' '));
}

export type ClientCredentials =
  | { source: 'config'; clientId: string; clientSecret: string }
  | { source: 'passthrough' };

export interface Config {
  port: number;
  host: string;
  oauth: {
    tokenUrl: string;
    credentials: ClientCredentials;
    scope?: string;
    clientAuthMethod: 'client_secret_basic' | 'client_secret_post';
    timeoutMs: number;
  };
  scopes: {
    permitted: ReadonlySet<string>;
    policy: ScopeMatchPolicy;
  };
  invocation: {
    requestedScopeField: string;
    passThroughFields: string[];
  };
  tokenCache: {
    safetyMarginSeconds: number;
    maxEntries: number;
  };
  debug: boolean;
}

/**
 * Parse and validate an environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function parseConfig(source: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = result.data;

  const credentials: ClientCredentials =
    env.CREDENTIAL_SOURCE === 'config' && env.OAUTH_CLIENT_ID && env.OAUTH_CLIENT_SECRET
      ? { source: 'config', clientId: env.OAUTH_CLIENT_ID, clientSecret: env.OAUTH_CLIENT_SECRET }
      : { source: 'passthrough' };

  return {
    port: parseInt(env.PORT, 10),
    host: env.HOST,

    oauth: {
      tokenUrl: env.TOKEN_URL,
      credentials,
      // empty/whitespace means no scope parameter is sent
      scope: env.OAUTH_SCOPE?.trim() || undefined,
      clientAuthMethod: env.OAUTH_CLIENT_AUTH_METHOD,
      timeoutMs: parseInt(env.OAUTH_TIMEOUT_MS, 10),
    },

    scopes: {
      permitted: new Set(splitList(env.PERMITTED_SCOPES)),
      policy:
        env.SCOPE_MATCH_POLICY === 'hierarchical'
          ? { mode: 'hierarchical', separator: env.SCOPE_SEPARATOR }
          : { mode: 'exact' },
    },

    invocation: {
      requestedScopeField: env.REQUESTED_SCOPE_FIELD,
      passThroughFields: env.PASS_THROUGH_FIELDS.split(',')
        .map((field) => field.trim())
        .filter((field) => field.length > 0),
    },

    tokenCache: {
      safetyMarginSeconds: parseInt(env.TOKEN_SAFETY_MARGIN_SECONDS, 10),
      maxEntries: parseInt(env.TOKEN_STORE_MAX_ENTRIES, 10),
    },

    debug: env.DEBUG === '1' || env.DEBUG === 'true',
  };
}

/**
 * Load `.env` into the process environment and parse it. Called once at start-up;
 * the result is immutable for the life of the process.
 */
export function loadConfig(): Config {
  dotenvConfig();
  return parseConfig(process.env);
}
