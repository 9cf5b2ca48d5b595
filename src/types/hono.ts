import type { Context } from 'hono';
import type { AuthenticatedPrincipal, Principal } from '../services/authorization-gate.js';

/**
 * Hono context variables set by the session middleware
 */
export interface AuthVariables {
  principal: Principal;
  session?: AuthenticatedPrincipal;
}

export interface AuthEnv {
  Variables: AuthVariables;
}

export type AuthContext = Context<AuthEnv>;
