import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { generateId, generateAuthorizationCode, hashToken } from '../../crypto/index.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private codes = new Map<string, AuthorizationCode>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }> {
    const id = generateId();
    const codeValue = generateAuthorizationCode();
    const codeHash = hashToken(codeValue);

    const code: AuthorizationCode = {
      id,
      clientId: input.clientId,
      subjectId: input.user.id,
      user: input.user,
      codeHash,
      redirectUri: input.redirectUri,
      scope: input.scope,
      codeChallenge: input.codeChallenge,
      codeChallengeMethod: input.codeChallengeMethod,
      nonce: input.nonce,
      issuedAt: input.issuedAt,
      expiresAt: input.expiresAt,
    };

    this.codes.set(id, code);
    this.hashIndex.set(codeHash, id);

    return { code, value: codeValue };
  }

  async findByValue(codeValue: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(hashToken(codeValue));
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async consume(codeValue: string, now: Date): Promise<AuthorizationCode | null> {
    // Read and write happen in one synchronous block, so no other redemption can interleave
    const id = this.hashIndex.get(hashToken(codeValue));
    if (!id) return null;

    const code = this.codes.get(id);
    if (!code) return null;

    // Check if already used
    if (code.consumedAt) {
      return null;
    }

    // Check if expired
    if (code.expiresAt.getTime() <= now.getTime()) {
      return null;
    }

    const consumed: AuthorizationCode = {
      ...code,
      consumedAt: now,
    };
    this.codes.set(id, consumed);

    return consumed;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [id, code] of this.codes) {
      if (code.expiresAt.getTime() <= now.getTime()) {
        this.hashIndex.delete(code.codeHash);
        this.codes.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
