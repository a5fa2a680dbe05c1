import type { User, UserSession } from '../../types/user.js';

/**
 * Storage interface for login sessions created by the account pages
 */
export interface ISessionStorage {
  create(user: User, now: Date, expiresAt: Date): Promise<UserSession>;

  /**
   * Find a session that has not expired at `now`
   */
  find(sessionId: string, now: Date): Promise<UserSession | null>;

  delete(sessionId: string): Promise<void>;

  /**
   * Delete expired sessions (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
