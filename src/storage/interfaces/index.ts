export * from './credential-storage.js';
export * from './token-storage.js';
export * from './errors.js';

import type { ICredentialStorage } from './credential-storage.js';
import type { IIssuedTokenStorage } from './token-storage.js';

/**
 * Complete storage interface for the auth core
 */
export interface IStorage {
  identities: ICredentialStorage;
  issuedTokens: IIssuedTokenStorage;
}
