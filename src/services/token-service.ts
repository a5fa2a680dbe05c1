import type { OAuthClient } from '../types/client.js';
import type { User, UserClaimValue } from '../types/user.js';
import type { TokenResponse } from '../types/oauth.js';
import type { RefreshToken } from '../types/token.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import type { TokenIssuer } from './token-issuer.js';
import { scopeService } from './scope-service.js';
import { RESOURCES_AUDIENCE_SUFFIX, TOKEN_TYPE_BEARER } from '../config/constants.js';

export interface TokenServiceOptions {
  tokenIssuer: TokenIssuer;
  resources: ResourceRegistry;
  refreshTokenStorage: IRefreshTokenStorage;
}

export interface TokenGenerationOptions {
  client: OAuthClient;
  user?: User;
  scopes: readonly string[];
  now: Date;
  nonce?: string;
  /**
   * Plaintext refresh token to return alongside the access token
   */
  refreshToken?: string;
}

/**
 * Builds token responses: access token, optional ID token, optional refresh token
 */
export class TokenService {
  private readonly tokenIssuer: TokenIssuer;
  private readonly resources: ResourceRegistry;
  private readonly refreshTokenStorage: IRefreshTokenStorage;

  constructor(options: TokenServiceOptions) {
    this.tokenIssuer = options.tokenIssuer;
    this.resources = options.resources;
    this.refreshTokenStorage = options.refreshTokenStorage;
  }

  /**
   * Generate a complete token response
   * The ID token is only issued when a user is present and openid was granted
   */
  async generateTokenResponse(options: TokenGenerationOptions): Promise<TokenResponse> {
    const { client, user, scopes, now, nonce, refreshToken } = options;

    const accessToken = await this.tokenIssuer.signAccessToken({
      // Subject is user ID or client ID for client_credentials
      subject: user?.id ?? client.clientId,
      clientId: client.clientId,
      scopes,
      audience: this.audienceFor(scopes),
      ttl: client.accessTokenTtl,
      now,
      authTime: user?.authTime,
    });

    const response: TokenResponse = {
      access_token: accessToken,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: client.accessTokenTtl,
      scope: scopeService.formatScopes(scopes),
    };

    if (refreshToken) {
      response.refresh_token = refreshToken;
    }

    if (user && scopeService.isOpenIdScope(scopes)) {
      response.id_token = await this.tokenIssuer.signIdToken({
        user,
        clientId: client.clientId,
        claims: this.identityClaims(user, scopes),
        ttl: client.identityTokenTtl,
        now,
        nonce,
      });
    }

    return response;
  }

  /**
   * Mint a refresh token for a user.
   * A child token (one-time rotation) keeps its parent's family and absolute lifetime.
   */
  async createRefreshToken(options: {
    client: OAuthClient;
    user: User;
    scopes: readonly string[];
    now: Date;
    parent?: RefreshToken;
  }): Promise<string> {
    const { client, user, scopes, now, parent } = options;

    const absoluteExpiresAt =
      parent?.absoluteExpiresAt ?? new Date(now.getTime() + client.refreshTokenTtl * 1000);

    const { value } = await this.refreshTokenStorage.create({
      clientId: client.clientId,
      user,
      scope: scopeService.formatScopes(scopes),
      issuedAt: now,
      expiresAt: this.refreshTokenExpiry(client, now, absoluteExpiresAt),
      absoluteExpiresAt,
      familyId: parent?.familyId,
      parentTokenId: parent?.id,
    });

    return value;
  }

  /**
   * Expiry of a refresh token issued or used at `now`
   * Sliding tokens get min(now + sliding lifetime, absolute expiry)
   */
  refreshTokenExpiry(client: OAuthClient, now: Date, absoluteExpiresAt: Date): Date {
    if (client.refreshTokenExpiration === 'sliding') {
      const sliding = now.getTime() + client.slidingRefreshTokenTtl * 1000;
      return new Date(Math.min(sliding, absoluteExpiresAt.getTime()));
    }
    return absoluteExpiresAt;
  }

  /**
   * API resources covering the granted scopes, or the generic resources audience
   */
  audienceFor(scopes: readonly string[]): string | string[] {
    const audiences = this.resources.audiencesForScopes(scopes);
    if (audiences.length === 0) {
      return `${this.tokenIssuer.issuer}${RESOURCES_AUDIENCE_SUFFIX}`;
    }
    return audiences.length === 1 && audiences[0] !== undefined ? audiences[0] : audiences;
  }

  /**
   * User claims released by the granted identity scopes (sub excluded)
   */
  identityClaims(user: User, scopes: readonly string[]): Record<string, UserClaimValue> {
    const claims: Record<string, UserClaimValue> = {};
    for (const claim of this.resources.claimsForScopes(scopes)) {
      const value = user.claims[claim];
      if (claim !== 'sub' && value !== undefined) {
        claims[claim] = value;
      }
    }
    return claims;
  }
}
