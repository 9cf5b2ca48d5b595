import type { IssuedToken, CreateIssuedTokenInput } from '../../types/token.js';
import type { IIssuedTokenStorage } from '../interfaces/token-storage.js';
import { UniqueConstraintError, RecordNotFoundError } from '../interfaces/errors.js';
import { generateId } from '../../crypto/index.js';

/**
 * In-memory issued token storage implementation
 */
export class MemoryIssuedTokenStorage implements IIssuedTokenStorage {
  private tokens = new Map<string, IssuedToken>();
  private valueIndex = new Map<string, string>(); // token value -> id
  private identityIndex = new Map<string, Set<string>>(); // identityId -> Set<id>

  async create(input: CreateIssuedTokenInput): Promise<IssuedToken> {
    if (this.valueIndex.has(input.token)) {
      throw new UniqueConstraintError('token');
    }

    const token: IssuedToken = {
      id: generateId(),
      identityId: input.identityId,
      token: input.token,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };

    this.tokens.set(token.id, token);
    this.valueIndex.set(token.token, token.id);

    let ids = this.identityIndex.get(token.identityId);
    if (!ids) {
      ids = new Set();
      this.identityIndex.set(token.identityId, ids);
    }
    ids.add(token.id);

    return { ...token };
  }

  async findByTokenString(token: string): Promise<IssuedToken | null> {
    const id = this.valueIndex.get(token);
    if (!id) return null;
    const stored = this.tokens.get(id);
    return stored ? { ...stored } : null;
  }

  async save(token: IssuedToken): Promise<IssuedToken> {
    const existing = this.tokens.get(token.id);
    if (!existing) {
      throw new RecordNotFoundError('IssuedToken', token.id);
    }

    // Only the revocation marker is mutable
    const updated: IssuedToken = { ...existing, revokedAt: token.revokedAt };
    this.tokens.set(updated.id, updated);

    return { ...updated };
  }

  async findActiveByIdentity(identityId: string, now: Date): Promise<IssuedToken[]> {
    const ids = this.identityIndex.get(identityId);
    if (!ids) return [];

    const active: IssuedToken[] = [];
    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt && now < token.expiresAt) {
        active.push({ ...token });
      }
    }
    return active;
  }

  async revokeAllForIdentity(identityId: string, revokedAt: Date): Promise<number> {
    const ids = this.identityIndex.get(identityId);
    if (!ids) return 0;

    let count = 0;
    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt) {
        this.tokens.set(id, { ...token, revokedAt });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.deleteWhere((token) => token.expiresAt < now);
  }

  async deleteRevoked(): Promise<number> {
    return this.deleteWhere((token) => token.revokedAt !== undefined);
  }

  private deleteWhere(predicate: (token: IssuedToken) => boolean): number {
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (predicate(token)) {
        this.valueIndex.delete(token.token);
        this.identityIndex.get(token.identityId)?.delete(id);
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
