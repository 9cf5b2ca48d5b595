import type { Identity, CreateIdentityInput } from '../../types/identity.js';
import type { ICredentialStorage } from '../interfaces/credential-storage.js';
import { UniqueConstraintError, RecordNotFoundError } from '../interfaces/errors.js';
import { generateId } from '../../crypto/index.js';

function cloneIdentity(identity: Identity): Identity {
  return { ...identity, permissions: { ...identity.permissions } };
}

/**
 * In-memory identity storage implementation
 */
export class MemoryCredentialStorage implements ICredentialStorage {
  private identities = new Map<string, Identity>();
  private emailIndex = new Map<string, string>(); // email -> id
  private handleIndex = new Map<string, string>(); // handle -> id

  async findById(id: string): Promise<Identity | null> {
    const identity = this.identities.get(id);
    return identity ? cloneIdentity(identity) : null;
  }

  async findByEmail(email: string): Promise<Identity | null> {
    const id = this.emailIndex.get(email);
    if (!id) return null;
    return this.findById(id);
  }

  async findByHandle(handle: string): Promise<Identity | null> {
    const id = this.handleIndex.get(handle);
    if (!id) return null;
    return this.findById(id);
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.emailIndex.has(email);
  }

  async existsByHandle(handle: string): Promise<boolean> {
    return this.handleIndex.has(handle);
  }

  async create(input: CreateIdentityInput): Promise<Identity> {
    if (this.emailIndex.has(input.email)) {
      throw new UniqueConstraintError('email');
    }
    if (this.handleIndex.has(input.handle)) {
      throw new UniqueConstraintError('handle');
    }

    const now = new Date();
    const identity: Identity = {
      ...input,
      permissions: { ...input.permissions },
      id: generateId(),
      createdAt: now,
      updatedAt: now,
    };

    this.identities.set(identity.id, identity);
    this.emailIndex.set(identity.email, identity.id);
    this.handleIndex.set(identity.handle, identity.id);

    return cloneIdentity(identity);
  }

  async save(identity: Identity): Promise<Identity> {
    const existing = this.identities.get(identity.id);
    if (!existing) {
      throw new RecordNotFoundError('Identity', identity.id);
    }

    const emailOwner = this.emailIndex.get(identity.email);
    if (emailOwner && emailOwner !== identity.id) {
      throw new UniqueConstraintError('email');
    }
    const handleOwner = this.handleIndex.get(identity.handle);
    if (handleOwner && handleOwner !== identity.id) {
      throw new UniqueConstraintError('handle');
    }

    this.emailIndex.delete(existing.email);
    this.handleIndex.delete(existing.handle);

    const stored = cloneIdentity(identity);
    this.identities.set(stored.id, stored);
    this.emailIndex.set(stored.email, stored.id);
    this.handleIndex.set(stored.handle, stored.id);

    return cloneIdentity(stored);
  }

  async touchLastAuthenticated(id: string, at: Date): Promise<Identity> {
    const existing = this.identities.get(id);
    if (!existing) {
      throw new RecordNotFoundError('Identity', id);
    }

    existing.lastAuthenticatedAt = at;
    existing.updatedAt = at;

    return cloneIdentity(existing);
  }
}
