import { z } from 'zod';
import { AppError } from './AppError.js';

/**
 * Map an unknown error to an AppError.
 * Handles zod validation errors and generic errors;
 * AppErrors (IssuanceError, ConfigurationError included) are returned as-is.
 */
export function mapError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    const messages = error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    return AppError.validation(messages.join(', '), {
      issues: error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
        code: issue.code,
      })),
    }, error);
  }

  // Handle non-Error objects
  if (!(error instanceof Error)) {
    const message = typeof error === 'string' ? error : 'Unknown error';
    return AppError.internal(message);
  }

  return AppError.internal(error.message, error);
}

const SENSITIVE_KEYS = [
  'token',
  'secret',
  'password',
  'apikey',
  'api_key',
  'authorization',
  'bearer',
  'credential',
];

const MAX_LOGGED_STRING_LENGTH = 500;

/**
 * Sanitize error details for logging.
 * Removes sensitive information like tokens and secrets.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string' && value.length > MAX_LOGGED_STRING_LENGTH) {
      sanitized[key] = value.substring(0, MAX_LOGGED_STRING_LENGTH) + '...[truncated]';
    } else if (Array.isArray(value)) {
      sanitized[key] = value;
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
