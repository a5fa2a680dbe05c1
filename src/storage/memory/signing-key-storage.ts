import type { SigningKey } from '../../types/token.js';
import type { ISigningKeyStorage } from '../interfaces/signing-key-storage.js';

/**
 * In-memory signing key storage implementation
 */
export class MemorySigningKeyStorage implements ISigningKeyStorage {
  private keys = new Map<string, SigningKey>(); // kid -> key

  async getActive(): Promise<SigningKey | null> {
    for (const key of this.keys.values()) {
      if (key.isActive) {
        return key;
      }
    }
    return null;
  }

  async findByKid(kid: string): Promise<SigningKey | null> {
    return this.keys.get(kid) ?? null;
  }

  async listPublished(now: Date): Promise<SigningKey[]> {
    const published = (await this.list()).filter(
      (key) => key.isActive || (key.retiresAt !== undefined && key.retiresAt.getTime() > now.getTime())
    );
    return published;
  }

  async list(): Promise<SigningKey[]> {
    return [...this.keys.values()].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async activate(key: SigningKey, previousRetiresAt: Date): Promise<void> {
    if (this.keys.has(key.kid)) {
      throw new Error(`Signing key ${key.kid} already exists`);
    }

    for (const [kid, existing] of this.keys) {
      if (existing.isActive) {
        this.keys.set(kid, { ...existing, isActive: false, retiresAt: previousRetiresAt });
      }
    }

    this.keys.set(key.kid, { ...key, isActive: true, retiresAt: undefined });
  }

  async deleteRetired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [kid, key] of this.keys) {
      if (!key.isActive && (key.retiresAt === undefined || key.retiresAt.getTime() <= now.getTime())) {
        this.keys.delete(kid);
        deleted++;
      }
    }

    return deleted;
  }
}
