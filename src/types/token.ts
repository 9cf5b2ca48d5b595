import type { TOKEN_KINDS } from '../config/constants.js';
import type { Role, IdentitySnapshot } from './identity.js';

export type TokenKind = (typeof TOKEN_KINDS)[number];

/**
 * JWT payload as it travels on the wire
 * Standard claims from RFC 7519 plus the identity claims
 */
export interface TokenPayload {
  sub: string; // Identity handle
  uid: string; // Identity ID
  role: Role;
  kind: TokenKind;
  iat: number; // Issued at (seconds)
  exp: number; // Expiration time (seconds)
  jti: string; // JWT ID (unique identifier)
}

/**
 * Claims the codec is asked to sign. Timestamps are stamped at issue time.
 */
export interface TokenClaimsInput {
  subject: string;
  identityId: string;
  role: Role;
  kind: TokenKind;
}

/**
 * Verified claims, decoded from a token whose signature checked out
 */
export interface TokenClaims extends TokenClaimsInput {
  issuedAt: Date;
  expiresAt: Date;
  tokenId: string;
}

export type TokenVerificationFailure = 'signature_invalid' | 'malformed' | 'expired';

export type VerifyResult =
  | { valid: true; claims: TokenClaims }
  | { valid: false; reason: TokenVerificationFailure };

/**
 * Issued refresh token (stored)
 */
export interface IssuedToken {
  id: string;
  identityId: string;
  token: string; // Opaque token value
  expiresAt: Date;
  createdAt: Date;
  revokedAt?: Date;
}

/**
 * Issued token creation input
 */
export interface CreateIssuedTokenInput {
  identityId: string;
  token: string;
  expiresAt: Date;
}

/**
 * Login / registration response
 */
export interface LoginResponse {
  accessToken: string;
  refreshToken: string;
  expiresIn: number; // Access token lifetime in milliseconds
  identity: IdentitySnapshot;
}

/**
 * Refresh response
 */
export interface TokenResponse {
  accessToken: string;
  expiresIn: number;
}
