/**
 * Auth core error codes
 */

// Input errors
export const ERROR_VALIDATION_FAILED = 'validation_failed' as const;

// Authentication errors
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_ACCOUNT_NOT_ACTIVE = 'account_not_active' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_TOKEN_EXPIRED = 'token_expired' as const;
export const ERROR_TOKEN_REVOKED = 'token_revoked' as const;
export const ERROR_TOKEN_OWNERSHIP = 'token_ownership' as const;
export const ERROR_UNAUTHENTICATED = 'unauthenticated' as const;

// Authorization errors
export const ERROR_FORBIDDEN = 'forbidden' as const;

// Resource errors
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_DUPLICATE_RESOURCE = 'duplicate_resource' as const;

// Unexpected errors
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All auth error codes
 */
export type AuthErrorCode =
  | typeof ERROR_VALIDATION_FAILED
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_ACCOUNT_NOT_ACTIVE
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_TOKEN_REVOKED
  | typeof ERROR_TOKEN_OWNERSHIP
  | typeof ERROR_UNAUTHENTICATED
  | typeof ERROR_FORBIDDEN
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_DUPLICATE_RESOURCE
  | typeof ERROR_SERVER_ERROR;

/**
 * Error families. Callers branch on the kind; the code carries the detail.
 */
export type AuthErrorKind =
  | 'ValidationFailed'
  | 'AuthenticationError'
  | 'AuthorizationError'
  | 'NotFound'
  | 'DuplicateResource'
  | 'ServerError';

export const ERROR_KINDS: Record<AuthErrorCode, AuthErrorKind> = {
  [ERROR_VALIDATION_FAILED]: 'ValidationFailed',
  [ERROR_INVALID_CREDENTIALS]: 'AuthenticationError',
  [ERROR_ACCOUNT_NOT_ACTIVE]: 'AuthenticationError',
  [ERROR_INVALID_TOKEN]: 'AuthenticationError',
  [ERROR_TOKEN_EXPIRED]: 'AuthenticationError',
  [ERROR_TOKEN_REVOKED]: 'AuthenticationError',
  [ERROR_TOKEN_OWNERSHIP]: 'AuthenticationError',
  [ERROR_UNAUTHENTICATED]: 'AuthenticationError',
  [ERROR_FORBIDDEN]: 'AuthorizationError',
  [ERROR_NOT_FOUND]: 'NotFound',
  [ERROR_DUPLICATE_RESOURCE]: 'DuplicateResource',
  [ERROR_SERVER_ERROR]: 'ServerError',
};

export type AuthErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

/**
 * HTTP status codes per error kind
 */
export const KIND_STATUS_CODES: Record<AuthErrorKind, AuthErrorStatus> = {
  ValidationFailed: 400,
  AuthenticationError: 401,
  AuthorizationError: 403,
  NotFound: 404,
  DuplicateResource: 409,
  ServerError: 500,
};

/**
 * Default error messages
 */
export const ERROR_MESSAGES: Record<AuthErrorCode, string> = {
  [ERROR_VALIDATION_FAILED]: 'The request is missing a required field or contains an invalid value.',
  [ERROR_INVALID_CREDENTIALS]: 'Invalid email or password',
  [ERROR_ACCOUNT_NOT_ACTIVE]: 'User account is not active',
  [ERROR_INVALID_TOKEN]: 'Invalid refresh token',
  [ERROR_TOKEN_EXPIRED]: 'Refresh token has expired',
  [ERROR_TOKEN_REVOKED]: 'Refresh token has been revoked',
  [ERROR_TOKEN_OWNERSHIP]: "Cannot revoke another user's token",
  [ERROR_UNAUTHENTICATED]: 'Authentication is required to access this resource',
  [ERROR_FORBIDDEN]: 'The request requires privileges the current session does not hold',
  [ERROR_NOT_FOUND]: 'Resource not found',
  [ERROR_DUPLICATE_RESOURCE]: 'Resource already exists',
  [ERROR_SERVER_ERROR]: 'An unexpected error occurred. Please try again later.',
};
