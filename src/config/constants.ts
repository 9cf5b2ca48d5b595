/**
 * Auth core constants
 */

// Roles (closed enumeration)
export const ROLE_ADMINISTRATOR = 'administrator' as const;
export const ROLE_MANAGER = 'manager' as const;
export const ROLE_STANDARD_USER = 'standard_user' as const;

export const ROLES = [ROLE_ADMINISTRATOR, ROLE_MANAGER, ROLE_STANDARD_USER] as const;

// Identity activation states
export const STATUS_ACTIVE = 'active' as const;
export const STATUS_INACTIVE = 'inactive' as const;
export const STATUS_SUSPENDED = 'suspended' as const;

export const IDENTITY_STATUSES = [STATUS_ACTIVE, STATUS_INACTIVE, STATUS_SUSPENDED] as const;

// Token kinds
export const TOKEN_KIND_ACCESS = 'access' as const;
export const TOKEN_KIND_REFRESH = 'refresh' as const;

export const TOKEN_KINDS = [TOKEN_KIND_ACCESS, TOKEN_KIND_REFRESH] as const;

// Token signing
export const TOKEN_SIGNING_ALGORITHM = 'HS256' as const;
export const MIN_SIGNING_SECRET_BYTES = 32;

// Default lifetimes (in milliseconds)
export const DEFAULT_ACCESS_TOKEN_TTL_MS = 3_600_000; // 60 minutes
export const DEFAULT_REFRESH_TOKEN_TTL_MS = 604_800_000; // 7 days

// Registration rules
export const MIN_PASSWORD_LENGTH = 8;

// Token/ID lengths
export const JTI_LENGTH = 16; // bytes

// Password hashing (scrypt)
export const SCRYPT_COST = 16384;
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELIZATION = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_LENGTH = 16;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

export const BEARER_PREFIX = 'Bearer ';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';

// Server defaults
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_LOG_LEVEL = 'info';

// Capabilities derived from role and permission flags
export const CAPABILITY_PROFILE_READ = 'profile:read' as const;
export const CAPABILITY_PROFILE_UPDATE = 'profile:update' as const;
export const CAPABILITY_IDENTITIES_LIST = 'identities:list' as const;
export const CAPABILITY_IDENTITIES_MANAGE = 'identities:manage' as const;
export const CAPABILITY_IDENTITIES_DELETE = 'identities:delete' as const;
export const CAPABILITY_SESSIONS_REVOKE = 'sessions:revoke' as const;
export const CAPABILITY_REPORTS_VIEW = 'reports:view' as const;
export const CAPABILITY_SETTINGS_MANAGE = 'settings:manage' as const;

export const CAPABILITIES = [
  CAPABILITY_PROFILE_READ,
  CAPABILITY_PROFILE_UPDATE,
  CAPABILITY_IDENTITIES_LIST,
  CAPABILITY_IDENTITIES_MANAGE,
  CAPABILITY_IDENTITIES_DELETE,
  CAPABILITY_SESSIONS_REVOKE,
  CAPABILITY_REPORTS_VIEW,
  CAPABILITY_SETTINGS_MANAGE,
] as const;
