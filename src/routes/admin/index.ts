import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import type { TokenIssuer } from '../../services/token-issuer.js';
import { adminAuth, type AdminAuthOptions } from './middleware.js';
import { createClientRoutes } from './clients.js';
import { createResourceRoutes } from './resources.js';
import { createSigningKeyRoutes } from './signing-keys.js';

export interface AdminRoutesOptions {
  clients: ClientRegistry;
  resources: ResourceRegistry;
  tokenIssuer: TokenIssuer;
  auth?: AdminAuthOptions;
}

/**
 * Create the read-only registry API
 * Mount at /admin prefix
 */
export function createAdminRoutes(options: AdminRoutesOptions) {
  const { clients, resources, tokenIssuer, auth } = options;
  const app = new Hono<{ Variables: OAuthVariables }>();

  // Apply authentication middleware
  app.use('*', adminAuth(auth));

  app.route('/clients', createClientRoutes({ clients }));
  app.route('/', createResourceRoutes({ resources }));
  app.route('/signing-keys', createSigningKeyRoutes({ tokenIssuer }));

  return app;
}

export { adminAuth } from './middleware.js';
export type { AdminAuthOptions } from './middleware.js';
