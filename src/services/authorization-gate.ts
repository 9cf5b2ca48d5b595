import type { Capability, IdentityPermissions, PermissionFlag, Role } from '../types/identity.js';
import type { ICredentialStorage } from '../storage/interfaces/index.js';
import { type TokenCodec, expectKind } from '../crypto/token-codec.js';
import { AuthError, type AuthResult, success, failure } from '../errors/auth-error.js';
import { getLogger, type Logger } from '../logging/index.js';
import {
  BEARER_PREFIX,
  CAPABILITY_IDENTITIES_DELETE,
  CAPABILITY_IDENTITIES_LIST,
  CAPABILITY_IDENTITIES_MANAGE,
  CAPABILITY_PROFILE_READ,
  CAPABILITY_PROFILE_UPDATE,
  CAPABILITY_REPORTS_VIEW,
  CAPABILITY_SESSIONS_REVOKE,
  CAPABILITY_SETTINGS_MANAGE,
  ROLE_ADMINISTRATOR,
  ROLE_MANAGER,
  ROLE_STANDARD_USER,
  STATUS_ACTIVE,
  TOKEN_KIND_ACCESS,
} from '../config/constants.js';

export interface AuthenticatedPrincipal {
  authenticated: true;
  identityId: string;
  subject: string;
  role: Role;
}

export interface AnonymousPrincipal {
  authenticated: false;
}

export type Principal = AuthenticatedPrincipal | AnonymousPrincipal;

export const ANONYMOUS: AnonymousPrincipal = Object.freeze({ authenticated: false });

/**
 * What a request needs beyond a valid session
 */
export interface AccessRequirement {
  roles?: readonly Role[];
  permission?: PermissionFlag;
}

export interface AuthorizationGateOptions {
  codec: TokenCodec;
  identities: ICredentialStorage;
  logger?: Logger;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

function roleCapabilities(role: Role): Capability[] {
  switch (role) {
    case ROLE_ADMINISTRATOR:
      return [
        CAPABILITY_PROFILE_READ,
        CAPABILITY_PROFILE_UPDATE,
        CAPABILITY_IDENTITIES_LIST,
        CAPABILITY_IDENTITIES_MANAGE,
        CAPABILITY_IDENTITIES_DELETE,
        CAPABILITY_SESSIONS_REVOKE,
        CAPABILITY_REPORTS_VIEW,
        CAPABILITY_SETTINGS_MANAGE,
      ];
    case ROLE_MANAGER:
      return [
        CAPABILITY_PROFILE_READ,
        CAPABILITY_PROFILE_UPDATE,
        CAPABILITY_IDENTITIES_LIST,
        CAPABILITY_REPORTS_VIEW,
      ];
    case ROLE_STANDARD_USER:
      return [CAPABILITY_PROFILE_READ, CAPABILITY_PROFILE_UPDATE];
    default:
      return assertNever(role);
  }
}

function flagCapabilities(flag: PermissionFlag): Capability[] {
  switch (flag) {
    case 'manageIdentities':
      return [CAPABILITY_IDENTITIES_LIST, CAPABILITY_IDENTITIES_MANAGE];
    case 'viewReports':
      return [CAPABILITY_REPORTS_VIEW];
    case 'manageSettings':
      return [CAPABILITY_SETTINGS_MANAGE];
    default:
      return assertNever(flag);
  }
}

const PERMISSION_FLAGS: readonly PermissionFlag[] = [
  'manageIdentities',
  'viewReports',
  'manageSettings',
];

/**
 * Capability set for a role plus the flags granted on top of it, sorted
 */
export function capabilitiesFor(role: Role, permissions: IdentityPermissions): Capability[] {
  const capabilities = new Set<Capability>(roleCapabilities(role));

  for (const flag of PERMISSION_FLAGS) {
    if (permissions[flag]) {
      for (const capability of flagCapabilities(flag)) {
        capabilities.add(capability);
      }
    }
  }

  return [...capabilities].sort();
}

/**
 * Extract the token from an Authorization header value
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Per-request access decisions
 *
 * Roles come from the verified access token. Permission flags are read from
 * the credential store on every check, since they may change after the
 * token was issued.
 */
export class AuthorizationGate {
  private readonly codec: TokenCodec;
  private readonly identities: ICredentialStorage;
  private readonly logger: Logger;

  constructor(options: AuthorizationGateOptions) {
    this.codec = options.codec;
    this.identities = options.identities;
    this.logger = options.logger ?? getLogger('authorization-gate');
  }

  /**
   * Derive a principal from an Authorization header. Never throws for a bad
   * token; anything short of a valid access token is anonymous.
   */
  async authenticate(header: string | undefined): Promise<Principal> {
    const token = extractBearerToken(header);
    if (!token) {
      return ANONYMOUS;
    }

    const result = await this.codec.verify(token);
    if (!result.valid) {
      this.logger.debug({ reason: result.reason }, 'Bearer token rejected');
      return ANONYMOUS;
    }

    const claims = expectKind(result, TOKEN_KIND_ACCESS);
    if (!claims) {
      this.logger.debug({ kind: result.claims.kind }, 'Non-access token presented as bearer');
      return ANONYMOUS;
    }

    return {
      authenticated: true,
      identityId: claims.identityId,
      subject: claims.subject,
      role: claims.role,
    };
  }

  /**
   * Checks the role carried by the access token. Identity status is not
   * re-read, so a suspended identity keeps passing role checks until its
   * access token expires; use `hasPermission` for a live check.
   */
  hasRole(principal: Principal, allowed: readonly Role[]): boolean {
    return principal.authenticated && allowed.includes(principal.role);
  }

  async hasPermission(principal: Principal, flag: PermissionFlag): Promise<boolean> {
    if (!principal.authenticated) {
      return false;
    }

    const identity = await this.identities.findById(principal.identityId);
    if (!identity || identity.status !== STATUS_ACTIVE) {
      return false;
    }

    return identity.permissions[flag];
  }

  /**
   * Allow or deny a request. Anonymous fails `unauthenticated`; an unmet role
   * or permission fails `forbidden`.
   */
  async authorize(
    principal: Principal,
    requirement: AccessRequirement = {}
  ): Promise<AuthResult<AuthenticatedPrincipal>> {
    if (!principal.authenticated) {
      return failure(AuthError.unauthenticated());
    }

    if (requirement.roles && !this.hasRole(principal, requirement.roles)) {
      this.logger.warn(
        { identityId: principal.identityId, role: principal.role },
        'Access denied: role not allowed'
      );
      return failure(AuthError.forbidden());
    }

    if (requirement.permission && !(await this.hasPermission(principal, requirement.permission))) {
      this.logger.warn(
        { identityId: principal.identityId, permission: requirement.permission },
        'Access denied: permission not granted'
      );
      return failure(AuthError.forbidden());
    }

    return success(principal);
  }
}
