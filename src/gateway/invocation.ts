import { z } from 'zod';

/**
 * One gateway invocation. The gateway has already authenticated whatever it forwards in `data`
 * (typically request headers); the authorizer only reads the requested scope and,
 * with pass-through credentials, the caller's Basic credential.
 */
export const gatewayInvocationSchema = z.object({
  type: z.string().optional(),
  token: z.string().optional(),
  scope: z.string().optional(),
  data: z.record(z.string(), z.string()).optional(),
});

export type GatewayInvocation = z.infer<typeof gatewayInvocationSchema>;

/**
 * Case-insensitive lookup, since header names arrive in whatever case the gateway forwards.
 */
export function findField(data: Record<string, string> | undefined, name: string): string | undefined {
  if (!data) {
    return undefined;
  }
  if (Object.hasOwn(data, name)) {
    return data[name];
  }
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(data)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

export function extractRequestedScope(invocation: GatewayInvocation, field: string): string | undefined {
  const scope = invocation.scope ?? findField(invocation.data, field);
  return scope?.trim() ? scope : undefined;
}

export interface BasicCredential {
  clientId: string;
  clientSecret: string;
}

/**
 * Decode the caller's `Basic base64(clientId:clientSecret)` credential from `token`
 * or the forwarded Authorization header.
 */
export function extractBasicCredential(invocation: GatewayInvocation): BasicCredential | undefined {
  const header = invocation.token ?? findField(invocation.data, 'Authorization');
  if (!header || !header.startsWith('Basic ')) {
    return undefined;
  }

  const encoded = header.slice('Basic '.length).trim();
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) {
    return undefined;
  }

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator <= 0 || separator === decoded.length - 1) {
    return undefined;
  }

  return {
    clientId: decoded.slice(0, separator),
    clientSecret: decoded.slice(separator + 1),
  };
}

export function pickPassThroughFields(
  invocation: GatewayInvocation,
  fields: readonly string[]
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const field of fields) {
    const value = findField(invocation.data, field);
    if (value !== undefined) {
      picked[field] = value;
    }
  }
  return picked;
}
