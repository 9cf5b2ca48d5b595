import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { AuthorizationGate } from '../../services/authorization-gate.js';
import type { TokenMaintenance } from '../../services/token-maintenance.js';
import { unwrap } from '../../errors/auth-error.js';
import { requirePermission, requireRole, getSession } from '../../middleware/session-auth.js';
import { getLogger } from '../../logging/index.js';
import { ROLE_ADMINISTRATOR } from '../../config/constants.js';

export interface AdminRoutesOptions {
  authService: AuthService;
  gate: AuthorizationGate;
  maintenance: TokenMaintenance;
}

/**
 * Session administration endpoints
 */
export function createAdminRoutes(options: AdminRoutesOptions) {
  const { authService, gate, maintenance } = options;
  const logger = getLogger('admin-routes');

  const router = new Hono<AuthEnv>();

  // POST /identities/:id/revoke-sessions
  router.post(
    '/identities/:id/revoke-sessions',
    requireRole(gate, ROLE_ADMINISTRATOR),
    async (c) => {
      const session = getSession(c);
      const identityId = c.req.param('id');

      const revoked = unwrap(await authService.revokeAllSessions(identityId));
      logger.info({ actorId: session.identityId, identityId, revoked }, 'Sessions revoked by administrator');

      return c.json({ revoked });
    }
  );

  // POST /maintenance/sweep
  router.post('/maintenance/sweep', requirePermission(gate, 'manageSettings'), async (c) => {
    const result = await maintenance.sweep();
    return c.json(result);
  });

  return router;
}
