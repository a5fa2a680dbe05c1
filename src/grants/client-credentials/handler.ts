import type { Context } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { getAuthenticatedClient } from '../../middleware/client-authenticator.js';
import { stringParam } from '../../utils/params.js';
import { GRANT_TYPE_CLIENT_CREDENTIALS } from '../../config/constants.js';

export interface ClientCredentialsHandlerOptions {
  clients: ClientRegistry;
  resources: ResourceRegistry;
  tokenService: TokenService;
}

/**
 * Handle client credentials token request
 *
 * RFC 6749 Section 4.4
 *
 * Granted scope = requested ∩ client-allowed ∩ API scopes.
 * With no scope requested, every API scope the client may use is granted.
 */
export function createClientCredentialsHandler(options: ClientCredentialsHandlerOptions) {
  const { clients, resources, tokenService } = options;

  return async (c: Context<{ Variables: OAuthVariables }>): Promise<TokenResponse> => {
    const now = c.get('requestTime');
    const { client } = getAuthenticatedClient(c);

    // Client credentials only for confidential clients
    if (client.clientType !== 'confidential') {
      throw OAuthError.unauthorizedClient('Client credentials grant requires a confidential client');
    }

    // Check if grant type is allowed
    if (!clients.isGrantAllowed(client, GRANT_TYPE_CLIENT_CREDENTIALS)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for client credentials grant');
    }

    const body = await c.req.parseBody();
    const requestedScopes = scopeService.parseScopes(stringParam(body, 'scope'));

    // No user is involved, so only API scopes can be granted
    const allowedApiScopes = scopeService.apiScopesOnly(client.allowedScopes, resources);

    const grantedScopes =
      requestedScopes.length === 0
        ? allowedApiScopes
        : requestedScopes.filter((scope) => allowedApiScopes.includes(scope));

    if (grantedScopes.length === 0) {
      throw OAuthError.invalidScope(
        requestedScopes.length === 0
          ? 'Client has no API scopes to grant'
          : `None of the requested scopes can be granted: ${scopeService.formatScopes(requestedScopes)}`
      );
    }

    // Never a refresh token or ID token
    return tokenService.generateTokenResponse({
      client,
      scopes: grantedScopes,
      now,
    });
  };
}
