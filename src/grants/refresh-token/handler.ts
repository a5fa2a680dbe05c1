import type { Context } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { IRefreshTokenStorage } from '../../storage/interfaces/index.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { getAuthenticatedClient } from '../../middleware/client-authenticator.js';
import { stringParam } from '../../utils/params.js';
import { logAuditEvent } from '../../utils/audit.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenHandlerOptions {
  refreshTokenStorage: IRefreshTokenStorage;
  clients: ClientRegistry;
  tokenService: TokenService;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * one-time usage: each token is redeemed once and replaced by a child in the same
 * family; presenting a consumed token revokes the whole family.
 * reuse: the same token keeps working; sliding expiration moves its expiry forward.
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions) {
  const { refreshTokenStorage, clients, tokenService } = options;

  return async (c: Context<{ Variables: OAuthVariables }>): Promise<TokenResponse> => {
    const now = c.get('requestTime');
    const { client } = getAuthenticatedClient(c);

    // Parse body
    const body = await c.req.parseBody();
    const refreshTokenValue = stringParam(body, 'refresh_token');
    const requestedScope = stringParam(body, 'scope');

    if (!refreshTokenValue) {
      throw OAuthError.invalidRequest('Missing refresh_token parameter');
    }

    // Check if grant type is allowed
    if (!clients.isGrantAllowed(client, GRANT_TYPE_REFRESH_TOKEN)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for refresh token grant');
    }

    // Find the refresh token
    const refreshToken = await refreshTokenStorage.findByValue(refreshTokenValue);

    if (!refreshToken) {
      throw OAuthError.invalidGrant('Invalid refresh token');
    }

    // Check if token belongs to this client
    if (refreshToken.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Refresh token was issued to a different client');
    }

    if (refreshToken.revokedAt) {
      throw OAuthError.invalidGrant('Refresh token has been revoked');
    }

    // A consumed one-time token presented again: assume it leaked
    if (refreshToken.consumedAt) {
      const revoked = await refreshTokenStorage.revokeFamily(refreshToken.familyId, now);
      logAuditEvent('refresh_token_replay', {
        clientId: client.clientId,
        subjectId: refreshToken.subjectId,
        familyId: refreshToken.familyId,
        revoked,
      });
      throw OAuthError.invalidGrant('Refresh token has already been used');
    }

    // Check if token is expired
    if (refreshToken.expiresAt.getTime() <= now.getTime()) {
      throw OAuthError.invalidGrant('Refresh token has expired');
    }

    // Handle scope downgrading
    const originalScopes = scopeService.parseScopes(refreshToken.scope);
    let newScopes = originalScopes;

    if (requestedScope) {
      const requestedScopes = scopeService.parseScopes(requestedScope);
      // Can only request a subset of original scopes
      const invalidScopes = requestedScopes.filter((scope) => !originalScopes.includes(scope));

      if (invalidScopes.length > 0) {
        throw OAuthError.invalidScope(
          `Cannot request scopes not in original grant: ${invalidScopes.join(', ')}`
        );
      }

      newScopes = requestedScopes;
    }

    let refreshTokenValueOut: string;

    if (client.refreshTokenUsage === 'one-time') {
      // Exactly one concurrent redemption wins
      const consumed = await refreshTokenStorage.consume(refreshToken.id, now);
      if (!consumed) {
        throw OAuthError.invalidGrant('Refresh token has already been used');
      }

      // The replacement keeps the original grant's scope (RFC 6749 Section 6)
      refreshTokenValueOut = await tokenService.createRefreshToken({
        client,
        user: refreshToken.user,
        scopes: originalScopes,
        now,
        parent: refreshToken,
      });
    } else {
      if (client.refreshTokenExpiration === 'sliding') {
        await refreshTokenStorage.extend(
          refreshToken.id,
          tokenService.refreshTokenExpiry(client, now, refreshToken.absoluteExpiresAt)
        );
      }
      refreshTokenValueOut = refreshTokenValue;
    }

    return tokenService.generateTokenResponse({
      client,
      user: refreshToken.user,
      scopes: newScopes,
      now,
      refreshToken: refreshTokenValueOut,
    });
  };
}
