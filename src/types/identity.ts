import type { ROLES, IDENTITY_STATUSES, CAPABILITIES } from '../config/constants.js';

/**
 * Closed role enumeration
 */
export type Role = (typeof ROLES)[number];

/**
 * Account activation state. Only `active` identities may authenticate.
 */
export type IdentityStatus = (typeof IDENTITY_STATUSES)[number];

/**
 * Capability flags, independent of role
 */
export interface IdentityPermissions {
  manageIdentities: boolean;
  viewReports: boolean;
  manageSettings: boolean;
}

export type PermissionFlag = keyof IdentityPermissions;

/**
 * Action an identity may perform, derived from its role and flags
 */
export type Capability = (typeof CAPABILITIES)[number];

/**
 * Identity (stored)
 */
export interface Identity {
  id: string;
  email: string;
  handle: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  phone?: string;
  department?: string;
  role: Role;
  status: IdentityStatus;
  permissions: IdentityPermissions;
  createdAt: Date;
  updatedAt: Date;
  lastAuthenticatedAt?: Date;
}

/**
 * Identity creation input
 */
export interface CreateIdentityInput {
  email: string;
  handle: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  phone?: string;
  department?: string;
  role: Role;
  status: IdentityStatus;
  permissions: IdentityPermissions;
}

/**
 * Outward-facing identity. Never carries the password hash.
 */
export interface IdentitySnapshot {
  id: string;
  email: string;
  handle: string;
  firstName: string;
  lastName: string;
  phone?: string;
  department?: string;
  role: Role;
  status: IdentityStatus;
  permissions: IdentityPermissions;
  createdAt: Date;
  updatedAt: Date;
  lastAuthenticatedAt?: Date;
}
