import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenIssuer } from '../../services/token-issuer.js';

export interface JWKSRouteOptions {
  tokenIssuer: TokenIssuer;
}

/**
 * Create JWKS endpoint
 *
 * GET /.well-known/openid-configuration/jwks
 *
 * Publishes the active key and rotated keys that have not retired yet
 */
export function createJWKSRoutes(options: JWKSRouteOptions) {
  const { tokenIssuer } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  router.get('/', async (c) => {
    const response = await tokenIssuer.publicKeys(c.get('requestTime'));

    // Short cache so a rotated-in key is picked up quickly
    c.header('Cache-Control', 'public, max-age=60');

    return c.json(response);
  });

  return router;
}
