import type { RefreshToken, CreateRefreshTokenInput } from '../../types/token.js';
import type { IRefreshTokenStorage } from '../interfaces/token-storage.js';
import { generateId, generateRefreshToken, generateFamilyId, hashToken } from '../../crypto/index.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id
  private familyIndex = new Map<string, Set<string>>(); // familyId -> Set<id>

  async create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }> {
    const id = generateId();
    const tokenValue = generateRefreshToken();
    const tokenHash = hashToken(tokenValue);
    const familyId = input.familyId ?? generateFamilyId();

    const token: RefreshToken = {
      id,
      clientId: input.clientId,
      subjectId: input.user.id,
      user: input.user,
      tokenHash,
      scope: input.scope,
      issuedAt: input.issuedAt,
      expiresAt: input.expiresAt,
      absoluteExpiresAt: input.absoluteExpiresAt,
      familyId,
      parentTokenId: input.parentTokenId,
    };

    this.tokens.set(id, token);
    this.hashIndex.set(tokenHash, id);

    let family = this.familyIndex.get(familyId);
    if (!family) {
      family = new Set();
      this.familyIndex.set(familyId, family);
    }
    family.add(id);

    return { token, value: tokenValue };
  }

  async findByValue(tokenValue: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(hashToken(tokenValue));
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async consume(id: string, now: Date): Promise<boolean> {
    // Check-and-set without an await in between
    const token = this.tokens.get(id);
    if (!token || token.consumedAt || token.revokedAt) {
      return false;
    }

    this.tokens.set(id, { ...token, consumedAt: now });
    return true;
  }

  async extend(id: string, expiresAt: Date): Promise<RefreshToken | null> {
    const token = this.tokens.get(id);
    if (!token) return null;

    const extended: RefreshToken = { ...token, expiresAt };
    this.tokens.set(id, extended);
    return extended;
  }

  async revokeFamily(familyId: string, now: Date): Promise<number> {
    const tokenIds = this.familyIndex.get(familyId);
    if (!tokenIds) return 0;

    let count = 0;
    for (const id of tokenIds) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt) {
        this.tokens.set(id, { ...token, revokedAt: now });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.absoluteExpiresAt.getTime() <= now.getTime()) {
        this.hashIndex.delete(token.tokenHash);

        const family = this.familyIndex.get(token.familyId);
        family?.delete(id);
        if (family?.size === 0) {
          this.familyIndex.delete(token.familyId);
        }

        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
