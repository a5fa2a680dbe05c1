import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';

/**
 * Storage interface for authorization code management
 */
export interface IAuthorizationCodeStorage {
  /**
   * Create a new authorization code
   * Returns the code record and the plaintext code value
   */
  create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }>;

  /**
   * Find an authorization code by plaintext value
   */
  findByValue(codeValue: string): Promise<AuthorizationCode | null>;

  /**
   * Consume (mark as used) an authorization code atomically
   * Returns the code if successful, null if unknown, expired at `now` or already used
   * This MUST be atomic to prevent code reuse attacks
   */
  consume(codeValue: string, now: Date): Promise<AuthorizationCode | null>;

  /**
   * Delete expired authorization codes (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
