// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Authentication errors
export class AuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', details);
  }
}

export class AuthConfigError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'AUTH_CONFIG_ERROR';
  }
}

/**
 * The authorization server redirected back with an error
 * (user denied consent, invalid scope, cancelled flow).
 */
export class CallbackError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CALLBACK_ERROR';
  }
}

export class CallbackTimeoutError extends CallbackError {
  constructor(message: string = 'Timed out waiting for authorization callback', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CALLBACK_TIMEOUT';
  }
}

export class CallbackListenerError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CALLBACK_LISTENER_ERROR';
  }
}

export class StateMismatchError extends AuthError {
  constructor(
    message: string = 'State mismatch - possible request forgery',
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.code = 'STATE_MISMATCH';
  }
}

export class CodeExchangeError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CODE_EXCHANGE_FAILED';
  }
}

export class NotAuthenticatedError extends AuthError {
  constructor(message: string = 'Not authenticated. Call authenticate() first.', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NOT_AUTHENTICATED';
  }
}

// Token errors
export class TokenError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOKEN_ERROR', details);
  }
}

export class TokenRefreshError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_REFRESH_FAILED';
  }
}

export class CacheCorruptError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CACHE_CORRUPT';
  }
}

export class PersistenceError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'PERSISTENCE_FAILED';
  }
}

// API errors (client handle requests)
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, typeof details?.status === 'number' ? details.status : 400, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, typeof details?.status === 'number' ? details.status : 500, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error code (ENOENT, EADDRINUSE, ...) if present
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
