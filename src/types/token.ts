import type { User, UserClaimValue } from './user.js';
import type { CodeChallengeMethod } from './oauth.js';

/**
 * JWT Access Token Payload
 * RFC 9068 JWT Profile for OAuth 2.0 Access Tokens
 */
export interface AccessTokenPayload {
  // Standard JWT claims
  iss: string; // Issuer
  sub: string; // Subject (user ID or client ID)
  aud: string | string[]; // Audience
  exp: number; // Expiration time
  iat: number; // Issued at
  jti: string; // JWT ID (unique identifier)

  // OAuth 2.0 claims
  client_id: string;
  scope: string;
  auth_time?: number;
}

/**
 * ID Token Payload (OpenID Connect)
 * OpenID Connect Core 1.0 Section 2
 */
export interface IdTokenPayload {
  iss: string;
  sub: string;
  aud: string;
  exp: number;
  iat: number;
  jti: string;
  auth_time?: number;
  nonce?: string;

  // Identity claims selected by the granted identity scopes
  [claim: string]: UserClaimValue | undefined;
}

/**
 * UserInfo Response
 * OpenID Connect Core 1.0 Section 5.3.2
 */
export interface UserInfoResponse {
  sub: string;
  [claim: string]: UserClaimValue;
}

/**
 * Refresh Token (stored)
 */
export interface RefreshToken {
  id: string;
  clientId: string;
  subjectId: string;
  user: User; // Snapshot taken at login
  tokenHash: string; // Hashed token value
  scope: string;
  issuedAt: Date;
  expiresAt: Date; // Current expiry (moves with sliding expiration)
  absoluteExpiresAt: Date; // Never extended
  familyId: string; // Token family for replay detection
  parentTokenId?: string; // For rotation tracking
  consumedAt?: Date;
  revokedAt?: Date;
}

/**
 * Refresh token creation input
 */
export interface CreateRefreshTokenInput {
  clientId: string;
  user: User;
  scope: string;
  issuedAt: Date;
  expiresAt: Date;
  absoluteExpiresAt: Date;
  familyId?: string;
  parentTokenId?: string;
}

/**
 * Authorization Code (stored)
 */
export interface AuthorizationCode {
  id: string;
  clientId: string;
  subjectId: string;
  user: User; // Snapshot taken at authentication
  codeHash: string; // Hashed code value
  redirectUri: string;
  scope: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  nonce?: string;
  issuedAt: Date;
  expiresAt: Date;
  consumedAt?: Date; // Single use tracking
}

/**
 * Authorization code creation input
 */
export interface CreateAuthorizationCodeInput {
  clientId: string;
  user: User;
  redirectUri: string;
  scope: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  nonce?: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Signing Key
 * Exactly one key is active; retired keys stay published until retiresAt.
 */
export interface SigningKey {
  kid: string;
  algorithm: 'RS256';
  publicKey: string; // PEM (SPKI)
  privateKey: string; // PEM (PKCS#8)
  isActive: boolean;
  createdAt: Date;
  retiresAt?: Date;
}

/**
 * Public view of a signing key (read-only registry API)
 */
export interface SigningKeyInfo {
  kid: string;
  algorithm: SigningKey['algorithm'];
  isActive: boolean;
  published: boolean;
  createdAt: Date;
  retiresAt?: Date;
}
