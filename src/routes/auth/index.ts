import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { AuthorizationGate } from '../../services/authorization-gate.js';
import type { TokenMaintenance } from '../../services/token-maintenance.js';
import type { ICredentialStorage } from '../../storage/interfaces/index.js';
import { createCredentialRoutes } from './credentials.js';
import { createSessionRoutes } from './session.js';
import { createAdminRoutes } from './admin.js';

export { createCredentialRoutes, type CredentialRoutesOptions } from './credentials.js';
export { createSessionRoutes, type SessionRoutesOptions } from './session.js';
export { createAdminRoutes, type AdminRoutesOptions } from './admin.js';

export interface AuthRoutesOptions {
  authService: AuthService;
  gate: AuthorizationGate;
  maintenance: TokenMaintenance;
  identities: ICredentialStorage;
}

/**
 * All `/auth` endpoints
 */
export function createAuthRoutes(options: AuthRoutesOptions) {
  const router = new Hono<AuthEnv>();

  router.route('/', createCredentialRoutes(options));
  router.route('/', createSessionRoutes(options));
  router.route('/', createAdminRoutes(options));

  return router;
}
