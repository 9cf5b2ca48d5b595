import type { Identity, CreateIdentityInput } from '../../types/identity.js';

/**
 * Storage interface for identity records
 *
 * Implementations must enforce unique `email` and unique `handle` at write
 * time and reject a violating `create` or `save` with `UniqueConstraintError`.
 * The auth service relies on that rejection, not on a prior `exists` check,
 * to stay correct under concurrent registrations.
 */
export interface ICredentialStorage {
  /**
   * Find an identity by ID
   */
  findById(id: string): Promise<Identity | null>;

  /**
   * Find an identity by email
   */
  findByEmail(email: string): Promise<Identity | null>;

  /**
   * Find an identity by handle
   */
  findByHandle(handle: string): Promise<Identity | null>;

  /**
   * Check whether an email is taken
   */
  existsByEmail(email: string): Promise<boolean>;

  /**
   * Check whether a handle is taken
   */
  existsByHandle(handle: string): Promise<boolean>;

  /**
   * Insert a new identity
   */
  create(input: CreateIdentityInput): Promise<Identity>;

  /**
   * Persist changes to an existing identity
   */
  save(identity: Identity): Promise<Identity>;

  /**
   * Set `lastAuthenticatedAt` and `updatedAt` on the stored record, leaving
   * every other field as it currently is. Throws `RecordNotFoundError` when
   * the identity no longer exists.
   */
  touchLastAuthenticated(id: string, at: Date): Promise<Identity>;
}
