import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { AuthorizationGate } from '../../services/authorization-gate.js';
import { capabilitiesFor } from '../../services/authorization-gate.js';
import type { ICredentialStorage } from '../../storage/interfaces/index.js';
import { toIdentitySnapshot } from '../../services/identity-mapper.js';
import { AuthError, unwrap } from '../../errors/auth-error.js';
import { requireAuth, getSession } from '../../middleware/session-auth.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  STATUS_ACTIVE,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';
import { logoutSchema, refreshTokenSchema, rejectInvalid } from './schemas.js';

export interface SessionRoutesOptions {
  authService: AuthService;
  gate: AuthorizationGate;
  identities: ICredentialStorage;
}

/**
 * Refresh, logout, session restore and current identity endpoints
 */
export function createSessionRoutes(options: SessionRoutesOptions) {
  const { authService, gate, identities } = options;

  const router = new Hono<AuthEnv>();

  // POST /refresh
  router.post('/refresh', zValidator('json', refreshTokenSchema, rejectInvalid), async (c) => {
    const { refreshToken } = c.req.valid('json');
    const tokens = unwrap(await authService.refresh(refreshToken));

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json(tokens);
  });

  // POST /logout
  router.post(
    '/logout',
    requireAuth(gate),
    zValidator('json', logoutSchema, rejectInvalid),
    async (c) => {
      const session = getSession(c);
      const { refreshToken } = c.req.valid('json');

      unwrap(await authService.logout(session.identityId, refreshToken));

      return c.json({ message: 'Logged out successfully' });
    }
  );

  // POST /session
  router.post('/session', zValidator('json', refreshTokenSchema, rejectInvalid), async (c) => {
    const { refreshToken } = c.req.valid('json');
    const user = unwrap(await authService.validateSession(refreshToken));

    return c.json({ user });
  });

  // GET /me
  router.get('/me', requireAuth(gate), async (c) => {
    const session = getSession(c);

    const identity = await identities.findById(session.identityId);
    if (!identity || identity.status !== STATUS_ACTIVE) {
      throw AuthError.accountNotActive(identity?.status);
    }

    return c.json({
      user: toIdentitySnapshot(identity),
      capabilities: capabilitiesFor(identity.role, identity.permissions),
    });
  });

  return router;
}
