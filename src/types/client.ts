import type { GrantType } from './oauth.js';

/**
 * OAuth 2.0 Client Types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * Client Authentication Methods
 * RFC 6749 Section 2.3, OpenID Connect Core Section 9
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * What happens to a refresh token when it is redeemed
 * - one-time: the token is consumed and a replacement in the same family is issued
 * - reuse: the same token value keeps working until it expires
 */
export type RefreshTokenUsage = 'one-time' | 'reuse';

/**
 * How a refresh token's lifetime is computed
 * - absolute: fixed at issuance
 * - sliding: each use extends it, never past the absolute lifetime
 */
export type RefreshTokenExpiration = 'absolute' | 'sliding';

/**
 * Registered OAuth 2.0 client
 * Frozen once the registry is built.
 */
export interface OAuthClient {
  readonly clientId: string; // Public identifier
  readonly clientName: string;
  readonly clientSecretHash?: string; // Absent for public clients
  readonly clientType: ClientType;
  readonly allowedGrantTypes: readonly GrantType[];
  readonly redirectUris: readonly string[]; // Exact match required
  readonly postLogoutRedirectUris: readonly string[];
  readonly allowedScopes: readonly string[];
  readonly requirePkce: boolean;
  readonly allowOfflineAccess: boolean;
  readonly accessTokenTtl: number; // seconds
  readonly identityTokenTtl: number; // seconds
  readonly refreshTokenTtl: number; // absolute lifetime, seconds
  readonly slidingRefreshTokenTtl: number; // seconds
  readonly refreshTokenUsage: RefreshTokenUsage;
  readonly refreshTokenExpiration: RefreshTokenExpiration;
}

/**
 * Authenticated client context
 */
export interface AuthenticatedClient {
  client: OAuthClient;
  authMethod: ClientAuthMethod;
}
