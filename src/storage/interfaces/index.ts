export * from './authorization-code-storage.js';
export * from './token-storage.js';
export * from './signing-key-storage.js';
export * from './session-storage.js';
export * from './user-storage.js';

import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IRefreshTokenStorage } from './token-storage.js';
import type { ISigningKeyStorage } from './signing-key-storage.js';
import type { ISessionStorage } from './session-storage.js';

/**
 * Complete storage interface for the identity server
 */
export interface IStorage {
  authorizationCodes: IAuthorizationCodeStorage;
  refreshTokens: IRefreshTokenStorage;
  signingKeys: ISigningKeyStorage;
  sessions: ISessionStorage;
}
