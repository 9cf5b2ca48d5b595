import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { AuthEnv } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { ERROR_UNAUTHENTICATED } from '../errors/error-codes.js';
import { getLogger, type Logger } from '../logging/index.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';

/**
 * Join zod issues into one readable line
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

function toAuthError(err: Error, production: boolean): AuthError {
  if (err instanceof AuthError) {
    return err;
  }

  if (err instanceof ZodError) {
    return AuthError.validationFailed(formatZodIssues(err));
  }

  // Raised by hono's validator for a missing content type or unparseable body
  if (err instanceof HTTPException && err.status === 400) {
    return AuthError.validationFailed(err.message || undefined);
  }

  return AuthError.serverError(production ? undefined : err.message, err);
}

export interface ErrorHandlerOptions {
  production?: boolean;
  logger?: Logger;
}

/**
 * Global error handler
 *
 * Renders every error as `{ code, message, timestamp }` with the status of
 * its kind. Unexpected errors become `server_error`, with a generic message
 * in production.
 */
export function authErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler<AuthEnv> {
  const production = options.production ?? process.env['NODE_ENV'] === 'production';
  const logger = options.logger ?? getLogger('http');

  return (err, c) => {
    const error = toAuthError(err, production);

    if (error.kind === 'ServerError') {
      logger.error({ err, method: c.req.method, path: c.req.path }, 'Unhandled error');
    } else {
      logger.debug({ code: error.code, path: c.req.path }, 'Request failed');
    }

    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (error.code === ERROR_UNAUTHENTICATED) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer');
    }

    return c.json(error.toJSON(), error.statusCode);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware. Logs method, path, status and duration only.
 */
export function requestLogger(logger: Logger = getLogger('http')): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
      },
      'Request handled'
    );
  };
}
