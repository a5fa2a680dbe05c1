import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import { createAuthorizeHandler, type AuthorizeHandlerOptions } from '../../grants/authorization-code/authorize.js';

export type AuthorizeRouteOptions = AuthorizeHandlerOptions;

/**
 * Create authorization endpoint routes
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const router = new Hono<{ Variables: OAuthVariables }>();

  const authorizeHandler = createAuthorizeHandler(options);

  // GET /connect/authorize - Initial authorization request
  router.get('/', authorizeHandler);

  // POST /connect/authorize - Form post variant of the same request
  router.post('/', authorizeHandler);

  return router;
}
