import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthorizationGate,
  capabilitiesFor,
  extractBearerToken,
  type Principal,
} from '../../services/authorization-gate.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenCodec } from '../../crypto/token-codec.js';
import type { Identity } from '../../types/identity.js';
import { TestClock, createMemoryStorage, createTestCodec, seedIdentity } from '../fixtures.js';

const NO_FLAGS = { manageIdentities: false, viewReports: false, manageSettings: false };

describe('capabilitiesFor', () => {
  it('should give a standard user only profile capabilities', () => {
    expect(capabilitiesFor('standard_user', NO_FLAGS)).toEqual(['profile:read', 'profile:update']);
  });

  it('should give a manager listing and reports', () => {
    expect(capabilitiesFor('manager', NO_FLAGS)).toEqual([
      'identities:list',
      'profile:read',
      'profile:update',
      'reports:view',
    ]);
  });

  it('should give an administrator every capability', () => {
    expect(capabilitiesFor('administrator', NO_FLAGS)).toEqual([
      'identities:delete',
      'identities:list',
      'identities:manage',
      'profile:read',
      'profile:update',
      'reports:view',
      'sessions:revoke',
      'settings:manage',
    ]);
  });

  it('should add flag capabilities on top of the role', () => {
    expect(capabilitiesFor('standard_user', { ...NO_FLAGS, manageSettings: true })).toEqual([
      'profile:read',
      'profile:update',
      'settings:manage',
    ]);
    expect(capabilitiesFor('standard_user', { ...NO_FLAGS, manageIdentities: true })).toEqual([
      'identities:list',
      'identities:manage',
      'profile:read',
      'profile:update',
    ]);
  });

  it('should not duplicate a capability granted by both role and flag', () => {
    expect(capabilitiesFor('manager', { ...NO_FLAGS, viewReports: true })).toEqual(
      capabilitiesFor('manager', NO_FLAGS)
    );
  });
});

describe('extractBearerToken', () => {
  it('should return the token after the Bearer scheme', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('should return null for a missing header, another scheme or an empty token', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(extractBearerToken('Bearer   ')).toBeNull();
  });
});

describe('AuthorizationGate', () => {
  let clock: TestClock;
  let storage: IStorage;
  let codec: TokenCodec;
  let gate: AuthorizationGate;
  let alice: Identity;

  async function accessHeader(identity: Identity, lifetimeMs = 60_000): Promise<string> {
    const token = await codec.issue(
      { subject: identity.handle, identityId: identity.id, role: identity.role, kind: 'access' },
      lifetimeMs
    );
    return `Bearer ${token}`;
  }

  beforeEach(async () => {
    clock = new TestClock();
    storage = createMemoryStorage();
    codec = createTestCodec(clock);
    gate = new AuthorizationGate({ codec, identities: storage.identities });
    alice = await seedIdentity(storage, { email: 'alice@example.com', role: 'manager' });
  });

  describe('authenticate', () => {
    it('should build a principal from a valid access token', async () => {
      const principal = await gate.authenticate(await accessHeader(alice));

      expect(principal).toEqual({
        authenticated: true,
        identityId: alice.id,
        subject: 'alice',
        role: 'manager',
      });
    });

    it('should treat a missing or malformed header as anonymous', async () => {
      await expect(gate.authenticate(undefined)).resolves.toEqual({ authenticated: false });
      await expect(gate.authenticate('Basic dXNlcjpwYXNz')).resolves.toEqual({ authenticated: false });
      await expect(gate.authenticate('Bearer ')).resolves.toEqual({ authenticated: false });
      await expect(gate.authenticate('Bearer not-a-token')).resolves.toEqual({ authenticated: false });
    });

    it('should treat an expired access token as anonymous', async () => {
      const header = await accessHeader(alice);
      clock.advance(60_000);

      await expect(gate.authenticate(header)).resolves.toEqual({ authenticated: false });
    });

    it('should never accept a refresh token as a bearer token', async () => {
      const refresh = await codec.issue(
        { subject: 'alice', identityId: alice.id, role: 'manager', kind: 'refresh' },
        60_000
      );

      await expect(gate.authenticate(`Bearer ${refresh}`)).resolves.toEqual({ authenticated: false });
    });
  });

  describe('hasRole', () => {
    it('should test membership in the allowed roles', async () => {
      const principal = await gate.authenticate(await accessHeader(alice));

      expect(gate.hasRole(principal, ['manager', 'administrator'])).toBe(true);
      expect(gate.hasRole(principal, ['administrator'])).toBe(false);
      expect(gate.hasRole({ authenticated: false }, ['manager'])).toBe(false);
    });
  });

  describe('hasPermission', () => {
    it('should observe flag changes made after the token was issued', async () => {
      const principal = await gate.authenticate(await accessHeader(alice));
      await expect(gate.hasPermission(principal, 'viewReports')).resolves.toBe(false);

      await storage.identities.save({ ...alice, permissions: { ...NO_FLAGS, viewReports: true } });

      await expect(gate.hasPermission(principal, 'viewReports')).resolves.toBe(true);
    });

    it('should deny a flag to an identity that is no longer active', async () => {
      const flagged = { ...alice, permissions: { ...NO_FLAGS, viewReports: true } };
      await storage.identities.save(flagged);
      const principal = await gate.authenticate(await accessHeader(alice));

      await storage.identities.save({ ...flagged, status: 'suspended' });

      await expect(gate.hasPermission(principal, 'viewReports')).resolves.toBe(false);
    });

    it('should deny a flag when the identity is gone or the caller is anonymous', async () => {
      const ghost: Principal = {
        authenticated: true,
        identityId: 'missing',
        subject: 'ghost',
        role: 'administrator',
      };

      await expect(gate.hasPermission(ghost, 'manageSettings')).resolves.toBe(false);
      await expect(gate.hasPermission({ authenticated: false }, 'manageSettings')).resolves.toBe(false);
    });
  });

  describe('authorize', () => {
    it('should fail an anonymous principal as unauthenticated', async () => {
      const result = await gate.authorize({ authenticated: false });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('unauthenticated');
        expect(result.error.statusCode).toBe(401);
      }
    });

    it('should fail a principal without the required role as forbidden', async () => {
      const principal = await gate.authenticate(await accessHeader(alice));

      const result = await gate.authorize(principal, { roles: ['administrator'] });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('forbidden');
        expect(result.error.statusCode).toBe(403);
      }
    });

    it('should fail a principal without the required permission as forbidden', async () => {
      const principal = await gate.authenticate(await accessHeader(alice));

      const result = await gate.authorize(principal, { permission: 'manageSettings' });

      expect(result.ok ? null : result.error.code).toBe('forbidden');
    });

    it('should pass the principal through when every requirement holds', async () => {
      await storage.identities.save({ ...alice, permissions: { ...NO_FLAGS, manageSettings: true } });
      const principal = await gate.authenticate(await accessHeader(alice));

      const result = await gate.authorize(principal, {
        roles: ['manager'],
        permission: 'manageSettings',
      });

      expect(result).toEqual({ ok: true, value: principal });
    });
  });
});
