import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import { AuthError } from '../../errors/auth-error.js';
import { ERROR_NOT_FOUND } from '../../errors/error-codes.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';
import { loginSchema, registerSchema, rejectInvalid } from './schemas.js';

export interface CredentialRoutesOptions {
  authService: AuthService;
}

/**
 * Login and registration endpoints
 */
export function createCredentialRoutes(options: CredentialRoutesOptions) {
  const { authService } = options;

  const router = new Hono<AuthEnv>();

  // POST /login
  router.post('/login', zValidator('json', loginSchema, rejectInvalid), async (c) => {
    const result = await authService.login(c.req.valid('json'));

    if (!result.ok) {
      // Unknown email and wrong password look the same from outside
      if (result.error.code === ERROR_NOT_FOUND) {
        throw AuthError.invalidCredentials();
      }
      throw result.error;
    }

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json(result.value);
  });

  // POST /register
  router.post('/register', zValidator('json', registerSchema, rejectInvalid), async (c) => {
    const result = await authService.register(c.req.valid('json'));

    if (!result.ok) {
      throw result.error;
    }

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json(result.value, 201);
  });

  return router;
}
