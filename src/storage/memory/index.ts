import type { IStorage } from '../interfaces/index.js';
import { MemoryCredentialStorage } from './credential-storage.js';
import { MemoryIssuedTokenStorage } from './token-storage.js';

export { MemoryCredentialStorage } from './credential-storage.js';
export { MemoryIssuedTokenStorage } from './token-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    identities: new MemoryCredentialStorage(),
    issuedTokens: new MemoryIssuedTokenStorage(),
  };
}
