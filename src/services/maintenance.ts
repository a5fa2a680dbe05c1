import type { IStorage } from '../storage/interfaces/index.js';
import type { TokenIssuer } from './token-issuer.js';
import { logAuditEvent } from '../utils/audit.js';

export interface CleanupResult {
  authorizationCodes: number;
  refreshTokens: number;
  sessions: number;
  signingKeys: number;
}

/**
 * Purge expired grants and sessions, and keys past their retirement time
 */
export async function purgeExpired(
  storage: IStorage,
  tokenIssuer: TokenIssuer,
  now: Date
): Promise<CleanupResult> {
  const [authorizationCodes, refreshTokens, sessions, signingKeys] = await Promise.all([
    storage.authorizationCodes.deleteExpired(now),
    storage.refreshTokens.deleteExpired(now),
    storage.sessions.deleteExpired(now),
    tokenIssuer.pruneRetired(now),
  ]);

  return { authorizationCodes, refreshTokens, sessions, signingKeys };
}

/**
 * Rotate the signing key and record it in the audit log
 */
export async function rotateSigningKey(tokenIssuer: TokenIssuer, now: Date): Promise<string> {
  const key = await tokenIssuer.rotate(now);
  logAuditEvent('signing_key_rotated', { kid: key.kid });
  return key.kid;
}
