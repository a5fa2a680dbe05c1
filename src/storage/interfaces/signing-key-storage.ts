import type { SigningKey } from '../../types/token.js';

/**
 * Storage interface for signing keys
 * Exactly one key is active at a time.
 */
export interface ISigningKeyStorage {
  /**
   * The key new tokens are signed with
   */
  getActive(): Promise<SigningKey | null>;

  /**
   * Find a key by key ID, active or retired
   */
  findByKid(kid: string): Promise<SigningKey | null>;

  /**
   * Keys whose public half is still published at `now`
   */
  listPublished(now: Date): Promise<SigningKey[]>;

  /**
   * Every stored key, newest first
   */
  list(): Promise<SigningKey[]>;

  /**
   * Make `key` the active key; the previous active key stays published until `retiresAt`
   */
  activate(key: SigningKey, previousRetiresAt: Date): Promise<void>;

  /**
   * Delete keys whose retirement time has passed (cleanup)
   */
  deleteRetired(now: Date): Promise<number>;
}
