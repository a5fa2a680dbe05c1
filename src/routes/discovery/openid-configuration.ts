import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { OpenIDConfiguration } from '../../types/oauth.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import {
  RESPONSE_TYPE_CODE,
  RESPONSE_MODE_QUERY,
  CODE_CHALLENGE_METHOD_S256,
  SUPPORTED_CLIENT_AUTH_METHODS,
  SIGNING_ALGORITHM_RS256,
  PATH_AUTHORIZE,
  PATH_TOKEN,
  PATH_USERINFO,
  PATH_END_SESSION,
  PATH_JWKS,
} from '../../config/constants.js';

export interface OpenIDConfigurationRouteOptions {
  issuer: string;
  clients: ClientRegistry;
  resources: ResourceRegistry;
}

/**
 * Build the discovery document from the registries
 */
export function buildOpenIDConfiguration(options: OpenIDConfigurationRouteOptions): OpenIDConfiguration {
  const { issuer, clients, resources } = options;

  return {
    // Core endpoints
    issuer,
    authorization_endpoint: `${issuer}${PATH_AUTHORIZE}`,
    token_endpoint: `${issuer}${PATH_TOKEN}`,
    userinfo_endpoint: `${issuer}${PATH_USERINFO}`,
    end_session_endpoint: `${issuer}${PATH_END_SESSION}`,
    jwks_uri: `${issuer}${PATH_JWKS}`,

    // Scopes and claims
    scopes_supported: resources.supportedScopes(),
    claims_supported: resources.supportedClaims(),

    // Supported features
    response_types_supported: [RESPONSE_TYPE_CODE],
    response_modes_supported: [RESPONSE_MODE_QUERY],
    grant_types_supported: clients.supportedGrantTypes(),
    subject_types_supported: ['public'],
    id_token_signing_alg_values_supported: [SIGNING_ALGORITHM_RS256],
    token_endpoint_auth_methods_supported: [...SUPPORTED_CLIENT_AUTH_METHODS],
    code_challenge_methods_supported: [CODE_CHALLENGE_METHOD_S256],
    authorization_response_iss_parameter_supported: true,
  };
}

/**
 * Create OpenID Connect discovery endpoint
 *
 * GET /.well-known/openid-configuration
 */
export function createOpenIDConfigurationRoutes(options: OpenIDConfigurationRouteOptions) {
  const router = new Hono<{ Variables: OAuthVariables }>();

  router.get('/', (c) => {
    // Cache for 1 hour
    c.header('Cache-Control', 'public, max-age=3600');

    return c.json(buildOpenIDConfiguration(options));
  });

  return router;
}
