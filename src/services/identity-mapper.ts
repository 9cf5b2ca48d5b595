import type { Identity, IdentitySnapshot } from '../types/identity.js';

/**
 * Project a stored identity onto its outward-facing shape
 *
 * Fields are listed one by one: the object literal is checked against
 * `IdentitySnapshot`, so adding `passwordHash` here fails to compile.
 */
export function toIdentitySnapshot(identity: Identity): IdentitySnapshot {
  const snapshot: IdentitySnapshot = {
    id: identity.id,
    email: identity.email,
    handle: identity.handle,
    firstName: identity.firstName,
    lastName: identity.lastName,
    role: identity.role,
    status: identity.status,
    permissions: {
      manageIdentities: identity.permissions.manageIdentities,
      viewReports: identity.permissions.viewReports,
      manageSettings: identity.permissions.manageSettings,
    },
    createdAt: identity.createdAt,
    updatedAt: identity.updatedAt,
  };

  if (identity.phone !== undefined) snapshot.phone = identity.phone;
  if (identity.department !== undefined) snapshot.department = identity.department;
  if (identity.lastAuthenticatedAt !== undefined) {
    snapshot.lastAuthenticatedAt = identity.lastAuthenticatedAt;
  }

  return snapshot;
}
