import { TokenCodec } from '../crypto/token-codec.js';
import { ScryptPasswordHasher } from '../crypto/hash.js';
import { createMemoryStorage } from '../storage/memory/index.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { Identity, IdentityPermissions, IdentityStatus, Role } from '../types/identity.js';

/**
 * Shared test fixtures
 */

export const TEST_SECRET = 'test-secret-test-secret-test-secret-0001';
export const OTHER_SECRET = 'test-secret-other-secret-other-secret-02';

export const START_TIME = new Date('2026-01-01T00:00:00.000Z');

// Cheap scrypt parameters; hashing cost is irrelevant in tests
export const testHasher = new ScryptPasswordHasher(1024, 8, 1);

/**
 * Controllable clock
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = START_TIME) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function createTestCodec(clock: TestClock = new TestClock(), secret = TEST_SECRET): TokenCodec {
  return new TokenCodec({ secret, now: clock.now });
}

export interface SeedIdentityInput {
  email: string;
  password?: string;
  handle?: string;
  role?: Role;
  status?: IdentityStatus;
  permissions?: Partial<IdentityPermissions>;
}

/**
 * Insert an identity directly into the store, bypassing registration
 */
export async function seedIdentity(storage: IStorage, input: SeedIdentityInput): Promise<Identity> {
  return storage.identities.create({
    email: input.email,
    handle: input.handle ?? input.email.split('@')[0] ?? input.email,
    passwordHash: await testHasher.hash(input.password ?? 'password123'),
    firstName: 'Test',
    lastName: 'User',
    role: input.role ?? 'standard_user',
    status: input.status ?? 'active',
    permissions: {
      manageIdentities: false,
      viewReports: false,
      manageSettings: false,
      ...input.permissions,
    },
  });
}

export { createMemoryStorage };
