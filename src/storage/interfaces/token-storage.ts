import type { RefreshToken, CreateRefreshTokenInput } from '../../types/token.js';

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  /**
   * Create a new refresh token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }>;

  /**
   * Find a refresh token by plaintext value
   */
  findByValue(tokenValue: string): Promise<RefreshToken | null>;

  /**
   * Mark a token consumed if it is neither consumed nor revoked
   * Returns false when another redemption got there first
   * This MUST be atomic: two concurrent calls for one token yield exactly one true
   */
  consume(id: string, now: Date): Promise<boolean>;

  /**
   * Move a token's expiry (sliding expiration)
   */
  extend(id: string, expiresAt: Date): Promise<RefreshToken | null>;

  /**
   * Revoke all tokens in a family (for replay detection)
   */
  revokeFamily(familyId: string, now: Date): Promise<number>;

  /**
   * Delete tokens past their absolute expiry (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
