import type { IssuedToken, CreateIssuedTokenInput } from '../../types/token.js';

/**
 * Storage interface for issued refresh tokens
 *
 * Writes must be visible to the next read: once a token is revoked, every
 * later `findByTokenString` returns it with `revokedAt` set.
 */
export interface IIssuedTokenStorage {
  /**
   * Insert a new issued token. Token values are unique.
   */
  create(input: CreateIssuedTokenInput): Promise<IssuedToken>;

  /**
   * Find an issued token by its opaque value
   */
  findByTokenString(token: string): Promise<IssuedToken | null>;

  /**
   * Persist changes to an existing issued token (only `revokedAt` may change)
   */
  save(token: IssuedToken): Promise<IssuedToken>;

  /**
   * List tokens of an identity that are neither revoked nor expired at `now`
   */
  findActiveByIdentity(identityId: string, now: Date): Promise<IssuedToken[]>;

  /**
   * Revoke every unrevoked token of an identity
   * Returns the number of tokens revoked
   */
  revokeAllForIdentity(identityId: string, revokedAt: Date): Promise<number>;

  /**
   * Delete tokens whose expiry is before `now` (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;

  /**
   * Delete revoked tokens (cleanup)
   */
  deleteRevoked(): Promise<number>;
}
