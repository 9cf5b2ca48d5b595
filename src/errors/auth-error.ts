import {
  type AuthErrorCode,
  type AuthErrorKind,
  type AuthErrorStatus,
  ERROR_KINDS,
  ERROR_MESSAGES,
  KIND_STATUS_CODES,
  ERROR_VALIDATION_FAILED,
  ERROR_INVALID_CREDENTIALS,
  ERROR_ACCOUNT_NOT_ACTIVE,
  ERROR_INVALID_TOKEN,
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_REVOKED,
  ERROR_TOKEN_OWNERSHIP,
  ERROR_UNAUTHENTICATED,
  ERROR_FORBIDDEN,
  ERROR_NOT_FOUND,
  ERROR_DUPLICATE_RESOURCE,
  ERROR_SERVER_ERROR,
} from './error-codes.js';
import type { IdentityStatus } from '../types/identity.js';

/**
 * Error response body
 */
export interface AuthErrorResponse {
  code: AuthErrorCode;
  message: string;
  timestamp: string;
}

/**
 * Typed auth failure
 *
 * Returned inside a failed `AuthResult` by the auth service, and thrown by
 * route handlers so the global error handler can render it.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly kind: AuthErrorKind;
  public readonly statusCode: AuthErrorStatus;

  constructor(code: AuthErrorCode, message?: string, options?: { cause?: Error }) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'AuthError';
    this.code = code;
    this.kind = ERROR_KINDS[code];
    this.statusCode = KIND_STATUS_CODES[this.kind];

    if (options?.cause) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    return {
      code: this.code,
      message: this.message,
      timestamp: new Date().toISOString(),
    };
  }

  // Factory methods for common errors

  static validationFailed(message?: string): AuthError {
    return new AuthError(ERROR_VALIDATION_FAILED, message);
  }

  static invalidCredentials(): AuthError {
    return new AuthError(ERROR_INVALID_CREDENTIALS);
  }

  static accountNotActive(status?: IdentityStatus): AuthError {
    return new AuthError(
      ERROR_ACCOUNT_NOT_ACTIVE,
      status ? `Account is ${status}. Please contact administrator.` : undefined
    );
  }

  static invalidToken(message?: string): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, message);
  }

  static tokenExpired(): AuthError {
    return new AuthError(ERROR_TOKEN_EXPIRED);
  }

  static tokenRevoked(): AuthError {
    return new AuthError(ERROR_TOKEN_REVOKED);
  }

  static tokenOwnership(): AuthError {
    return new AuthError(ERROR_TOKEN_OWNERSHIP);
  }

  static unauthenticated(message?: string): AuthError {
    return new AuthError(ERROR_UNAUTHENTICATED, message);
  }

  static forbidden(message?: string): AuthError {
    return new AuthError(ERROR_FORBIDDEN, message);
  }

  static notFound(message?: string): AuthError {
    return new AuthError(ERROR_NOT_FOUND, message);
  }

  static duplicateResource(message?: string): AuthError {
    return new AuthError(ERROR_DUPLICATE_RESOURCE, message);
  }

  static serverError(message?: string, cause?: Error): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, message, { cause });
  }
}

/**
 * Outcome of every auth service operation
 */
export type AuthResult<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export function success<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: AuthError): AuthResult<T> {
  return { ok: false, error };
}

/**
 * Unwrap a result at an outer boundary, throwing the typed error on failure
 */
export function unwrap<T>(result: AuthResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
