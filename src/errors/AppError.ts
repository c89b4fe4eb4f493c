/**
 * Error categories for the authorizer.
 */
export type ErrorCategory =
  | 'ISSUANCE'
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'INTERNAL';

/**
 * Error codes for more specific error identification.
 * Format: CATEGORY_SPECIFIC_ERROR
 */
export type ErrorCode =
  | 'ISSUANCE_NETWORK_ERROR'
  | 'ISSUANCE_TIMEOUT'
  | 'ISSUANCE_HTTP_ERROR'
  | 'ISSUANCE_INVALID_RESPONSE'
  | 'CONFIGURATION_INVALID'
  | 'VALIDATION_REQUEST_INVALID'
  | 'INTERNAL_ERROR';

/**
 * Options for creating an AppError.
 */
export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Structured error response payload for API responses.
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
  };
  requestId?: string;
}

/**
 * AppError is the base error class for all authorizer errors.
 * `safeMessage` is the only text that may reach a gateway-visible response;
 * `details` are for diagnostics and must go through `sanitizeForLogging` before they are logged.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: AppErrorOptions, message: string = options.safeMessage) {
    super(message);
    this.name = 'AppError';
    this.category = options.category;
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.safeMessage = options.safeMessage;
    this.details = options.details;
    this.cause = options.cause;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert the error to a structured payload for API responses.
   * Details are deliberately left out.
   */
  toPayload(requestId?: string): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        category: this.category,
        code: this.code,
        message: this.safeMessage,
      },
    };

    if (requestId) {
      payload.requestId = requestId;
    }

    return payload;
  }

  /**
   * Create a validation error for an invalid gateway invocation.
   */
  static validation(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 400,
      safeMessage: message,
      details,
      cause,
    });
  }

  /**
   * Create an internal error for unexpected failures.
   */
  static internal(message: string, cause?: Error): AppError {
    return new AppError(
      {
        category: 'INTERNAL',
        code: 'INTERNAL_ERROR',
        httpStatus: 500,
        safeMessage: 'An unexpected error occurred. Please try again later.',
        details: { originalMessage: message },
        cause,
      },
      message
    );
  }
}

/**
 * The identity provider could not issue a token: network failure, timeout,
 * non-success status or a malformed response.
 */
export class IssuanceError extends AppError {
  constructor(code: Extract<ErrorCode, `ISSUANCE_${string}`>, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(
      {
        category: 'ISSUANCE',
        code,
        httpStatus: 503,
        safeMessage: 'Upstream credentials are temporarily unavailable.',
        details,
        cause,
      },
      message
    );
    this.name = 'IssuanceError';
  }

  static network(message: string, cause?: Error): IssuanceError {
    return new IssuanceError('ISSUANCE_NETWORK_ERROR', `Token request failed: ${message}`, { originalMessage: message }, cause);
  }

  static timeout(timeoutMs: number, cause?: Error): IssuanceError {
    return new IssuanceError('ISSUANCE_TIMEOUT', `Token request timed out after ${timeoutMs}ms`, { timeoutMs }, cause);
  }

  static httpStatus(status: number, providerBody: string): IssuanceError {
    return new IssuanceError('ISSUANCE_HTTP_ERROR', `Token request failed with status ${status}`, {
      httpStatus: status,
      providerBody,
    });
  }

  static invalidResponse(reason: string, cause?: Error): IssuanceError {
    return new IssuanceError('ISSUANCE_INVALID_RESPONSE', `Invalid token response: ${reason}`, { reason }, cause);
  }
}

/**
 * Missing or invalid configuration. Fatal at start-up, never raised per invocation.
 */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      {
        category: 'CONFIGURATION',
        code: 'CONFIGURATION_INVALID',
        httpStatus: 500,
        safeMessage: 'The authorizer is misconfigured.',
        details: { issues },
      },
      `Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
