import type { IStorage } from '../interfaces/index.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryRefreshTokenStorage } from './token-storage.js';
import { MemorySigningKeyStorage } from './signing-key-storage.js';
import { MemorySessionStorage } from './session-storage.js';

export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryRefreshTokenStorage } from './token-storage.js';
export { MemorySigningKeyStorage } from './signing-key-storage.js';
export { MemorySessionStorage } from './session-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    refreshTokens: new MemoryRefreshTokenStorage(),
    signingKeys: new MemorySigningKeyStorage(),
    sessions: new MemorySessionStorage(),
  };
}
