import { Hono } from 'hono';
import type { OAuthVariables, OAuthContext } from '../../types/hono.js';
import type { UserInfoResponse } from '../../types/token.js';
import type { ICredentialVerifier } from '../../storage/interfaces/user-storage.js';
import type { TokenIssuer } from '../../services/token-issuer.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { bearerAuth, getAccessToken } from '../../middleware/bearer-auth.js';
import { OPENID_SCOPE } from '../../config/constants.js';

export interface UserInfoRoutesOptions {
  tokenIssuer: TokenIssuer;
  tokenService: TokenService;
  credentialVerifier: ICredentialVerifier;
}

/**
 * Create UserInfo endpoint
 *
 * GET/POST /connect/userinfo
 *
 * Returns claims about the authenticated user based on the access token
 * and granted scopes. When the user store cannot look users up by subject,
 * only `sub` is returned.
 *
 * OpenID Connect Core 1.0 Section 5.3
 */
export function createUserInfoRoutes(options: UserInfoRoutesOptions) {
  const { tokenIssuer, tokenService, credentialVerifier } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  router.use('*', bearerAuth({ tokenIssuer, requiredScopes: [OPENID_SCOPE] }));

  const handleUserInfo = async (c: OAuthContext) => {
    const accessToken = getAccessToken(c);
    const response: UserInfoResponse = { sub: accessToken.sub };

    if (!credentialVerifier.findBySubject) {
      return c.json(response);
    }

    const user = await credentialVerifier.findBySubject(accessToken.sub);
    if (!user) {
      throw OAuthError.invalidToken('User no longer exists');
    }

    const scopes = scopeService.parseScopes(accessToken.scope);
    return c.json({ ...tokenService.identityClaims(user, scopes), ...response });
  };

  router.get('/', handleUserInfo);
  router.post('/', handleUserInfo);

  return router;
}
