import type { Context, Input, MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import type { PermissionFlag, Role } from '../types/identity.js';
import type {
  AccessRequirement,
  AuthenticatedPrincipal,
  AuthorizationGate,
} from '../services/authorization-gate.js';
import { AuthError, unwrap } from '../errors/auth-error.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

/**
 * Resolve the bearer token into a principal. Never rejects a request;
 * anonymous callers pass through with `principal.authenticated === false`.
 */
export function sessionAuth(gate: AuthorizationGate): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const principal = await gate.authenticate(c.req.header(HEADER_AUTHORIZATION));
    c.set('principal', principal);
    await next();
  };
}

function requireAccess(
  gate: AuthorizationGate,
  requirement: AccessRequirement
): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    // Works with or without sessionAuth earlier in the chain
    const principal =
      c.get('principal') ?? (await gate.authenticate(c.req.header(HEADER_AUTHORIZATION)));
    c.set('principal', principal);

    const session = unwrap(await gate.authorize(principal, requirement));
    c.set('session', session);

    await next();
  };
}

export function requireAuth(gate: AuthorizationGate): MiddlewareHandler<AuthEnv> {
  return requireAccess(gate, {});
}

export function requireRole(gate: AuthorizationGate, ...roles: Role[]): MiddlewareHandler<AuthEnv> {
  return requireAccess(gate, { roles });
}

export function requirePermission(
  gate: AuthorizationGate,
  permission: PermissionFlag
): MiddlewareHandler<AuthEnv> {
  return requireAccess(gate, { permission });
}

/**
 * The authenticated principal set by one of the `require*` middlewares
 */
export function getSession<P extends string, I extends Input>(
  c: Context<AuthEnv, P, I>
): AuthenticatedPrincipal {
  const session = c.get('session');
  if (!session) {
    throw AuthError.unauthenticated();
  }
  return session;
}
