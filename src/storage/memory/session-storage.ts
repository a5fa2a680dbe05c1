import type { User, UserSession } from '../../types/user.js';
import type { ISessionStorage } from '../interfaces/session-storage.js';
import { generateSessionId } from '../../crypto/index.js';

/**
 * In-memory login session storage implementation
 */
export class MemorySessionStorage implements ISessionStorage {
  private sessions = new Map<string, UserSession>();

  async create(user: User, now: Date, expiresAt: Date): Promise<UserSession> {
    const session: UserSession = {
      sessionId: generateSessionId(),
      user,
      createdAt: now,
      expiresAt,
    };

    this.sessions.set(session.sessionId, session);
    return session;
  }

  async find(sessionId: string, now: Date): Promise<UserSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session || session.expiresAt.getTime() <= now.getTime()) {
      return null;
    }
    return session;
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [id, session] of this.sessions) {
      if (session.expiresAt.getTime() <= now.getTime()) {
        this.sessions.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
