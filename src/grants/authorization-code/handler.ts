import type { Context } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { IAuthorizationCodeStorage } from '../../storage/interfaces/index.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { verifyCodeChallenge, isValidCodeVerifier } from '../../crypto/pkce.js';
import { getAuthenticatedClient } from '../../middleware/client-authenticator.js';
import { stringParam } from '../../utils/params.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeHandlerOptions {
  authorizationCodeStorage: IAuthorizationCodeStorage;
  clients: ClientRegistry;
  tokenService: TokenService;
}

/**
 * Handle authorization code token exchange
 *
 * RFC 6749 Section 4.1.3, RFC 7636 Section 4.6
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions) {
  const { authorizationCodeStorage, clients, tokenService } = options;

  return async (c: Context<{ Variables: OAuthVariables }>): Promise<TokenResponse> => {
    const now = c.get('requestTime');
    const { client } = getAuthenticatedClient(c);

    // Parse body
    const body = await c.req.parseBody();
    const code = stringParam(body, 'code');
    const redirectUri = stringParam(body, 'redirect_uri');
    const codeVerifier = stringParam(body, 'code_verifier');

    // Validate required parameters
    if (!code) {
      throw OAuthError.invalidRequest('Missing code parameter');
    }

    if (!redirectUri) {
      throw OAuthError.invalidRequest('Missing redirect_uri parameter');
    }

    // Check if grant type is allowed
    if (!clients.isGrantAllowed(client, GRANT_TYPE_AUTHORIZATION_CODE)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for authorization code grant');
    }

    // Consume authorization code atomically (prevents replay)
    const authCode = await authorizationCodeStorage.consume(code, now);

    if (!authCode) {
      throw OAuthError.invalidGrant('Invalid, expired or already used authorization code');
    }

    // Validate client matches
    if (authCode.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Authorization code was issued to a different client');
    }

    // Validate redirect_uri matches (exact match required)
    if (authCode.redirectUri !== redirectUri) {
      throw OAuthError.invalidGrant('redirect_uri does not match');
    }

    // Verify PKCE code verifier
    if (authCode.codeChallenge && authCode.codeChallengeMethod) {
      if (!codeVerifier) {
        throw OAuthError.invalidRequest('Missing code_verifier parameter (PKCE required)');
      }

      if (
        !isValidCodeVerifier(codeVerifier) ||
        !verifyCodeChallenge(codeVerifier, authCode.codeChallenge, authCode.codeChallengeMethod)
      ) {
        throw OAuthError.invalidGrant('Invalid code_verifier');
      }
    } else if (codeVerifier) {
      throw OAuthError.invalidGrant('code_verifier sent for a code issued without code_challenge');
    }

    // Parse scopes from auth code
    const scopes = scopeService.parseScopes(authCode.scope);

    let refreshToken: string | undefined;
    if (client.allowOfflineAccess && scopeService.hasOfflineAccess(scopes)) {
      refreshToken = await tokenService.createRefreshToken({
        client,
        user: authCode.user,
        scopes,
        now,
      });
    }

    return tokenService.generateTokenResponse({
      client,
      user: authCode.user,
      scopes,
      now,
      nonce: authCode.nonce,
      refreshToken,
    });
  };
}
