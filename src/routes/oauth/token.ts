import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { createAuthorizationCodeHandler } from '../../grants/authorization-code/handler.js';
import { createClientCredentialsHandler } from '../../grants/client-credentials/handler.js';
import { createRefreshTokenHandler } from '../../grants/refresh-token/handler.js';
import { stringParam } from '../../utils/params.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  storage: IStorage;
  clients: ClientRegistry;
  resources: ResourceRegistry;
  tokenService: TokenService;
}

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { storage, clients, resources, tokenService } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // Create grant handlers
  const authorizationCodeHandler = createAuthorizationCodeHandler({
    authorizationCodeStorage: storage.authorizationCodes,
    clients,
    tokenService,
  });

  const clientCredentialsHandler = createClientCredentialsHandler({
    clients,
    resources,
    tokenService,
  });

  const refreshTokenHandler = createRefreshTokenHandler({
    refreshTokenStorage: storage.refreshTokens,
    clients,
    tokenService,
  });

  // POST /connect/token
  router.post(
    '/',
    async (c, next) => {
      // Set cache control headers, also on authentication failures
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
      await next();
    },
    // Client authentication
    clientAuthenticator({
      clients,
      allowPublicClients: true, // Public clients redeem codes with PKCE
    }),
    async (c) => {
      // Parse grant type
      const body = await c.req.parseBody();
      const grantType = stringParam(body, 'grant_type');

      if (!grantType) {
        throw OAuthError.invalidRequest('Missing grant_type parameter');
      }

      let response: TokenResponse;

      switch (grantType) {
        case GRANT_TYPE_AUTHORIZATION_CODE:
          response = await authorizationCodeHandler(c);
          break;

        case GRANT_TYPE_CLIENT_CREDENTIALS:
          response = await clientCredentialsHandler(c);
          break;

        case GRANT_TYPE_REFRESH_TOKEN:
          response = await refreshTokenHandler(c);
          break;

        default:
          throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${grantType}`);
      }

      return c.json(response);
    }
  );

  return router;
}
