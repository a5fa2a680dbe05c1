import { z } from 'zod';
import type { User } from '../types/user.js';
import type { ICredentialVerifier } from '../storage/interfaces/user-storage.js';
import type { TestUserConfig } from '../config/identity-config.js';
import { claimValueSchema } from '../config/identity-config.js';
import { hashSecret, verifySecret } from '../crypto/hash.js';

interface StoredUser {
  user: User;
  passwordHash: string;
}

/**
 * Verifies credentials against the test users of the identity configuration
 * Passwords are kept as scrypt hashes only
 */
export class InMemoryCredentialVerifier implements ICredentialVerifier {
  private readonly byUsername = new Map<string, StoredUser>();
  private readonly bySubject = new Map<string, User>();

  private constructor(users: StoredUser[]) {
    for (const stored of users) {
      if (this.byUsername.has(stored.user.username) || this.bySubject.has(stored.user.id)) {
        throw new Error(`Duplicate test user: ${stored.user.username}`);
      }
      this.byUsername.set(stored.user.username, stored);
      this.bySubject.set(stored.user.id, stored.user);
    }
  }

  static async fromConfig(testUsers: readonly TestUserConfig[]): Promise<InMemoryCredentialVerifier> {
    const users = await Promise.all(
      testUsers.map(async (config): Promise<StoredUser> => ({
        user: { id: config.subjectId, username: config.username, claims: { ...config.claims } },
        passwordHash: config.passwordHash ?? (await hashSecret(config.password ?? '')),
      }))
    );
    return new InMemoryCredentialVerifier(users);
  }

  async verify(username: string, password: string): Promise<User | null> {
    const stored = this.byUsername.get(username);
    if (!stored || !password) {
      return null;
    }

    const matches = await verifySecret(password, stored.passwordHash);
    return matches ? { ...stored.user, claims: { ...stored.user.claims } } : null;
  }

  async findBySubject(subjectId: string): Promise<User | null> {
    const user = this.bySubject.get(subjectId);
    return user ? { ...user, claims: { ...user.claims } } : null;
  }
}

const remoteUserSchema = z.object({
  subjectId: z.string().min(1),
  username: z.string().min(1),
  claims: z.record(claimValueSchema).default({}),
});

export interface RemoteCredentialVerifierOptions {
  url: string;
  timeoutMs?: number;
}

/**
 * Delegates credential checks to an external user service
 *
 * POST {url} with `{ username, password }`:
 * - 200 and a user document: credentials accepted
 * - 401 / 403 / 404: credentials rejected
 * - anything else: the user service is unavailable
 */
export class RemoteCredentialVerifier implements ICredentialVerifier {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: RemoteCredentialVerifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async verify(username: string, password: string): Promise<User | null> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({ username, password }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 401 || response.status === 403 || response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`Credential verifier responded with HTTP ${response.status}`);
    }

    const parsed = remoteUserSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Credential verifier returned an invalid user document', { cause: parsed.error });
    }

    return {
      id: parsed.data.subjectId,
      username: parsed.data.username,
      claims: parsed.data.claims,
    };
  }
}
