import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { OAuthVariables } from '../../types/hono.js';
import type { OAuthClient } from '../../types/client.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import { validationHook } from './validation.js';

const listClientsSchema = z.object({
  grantType: z.enum(['authorization_code', 'client_credentials', 'refresh_token']).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  page: z.coerce.number().int().min(1).default(1),
});

export type ClientView = Omit<OAuthClient, 'clientSecretHash'> & { hasSecret: boolean };

/**
 * Client as exposed by the admin API: never the secret hash
 */
export function toClientView(client: OAuthClient): ClientView {
  const { clientSecretHash, ...view } = client;
  return { ...view, hasSecret: clientSecretHash !== undefined };
}

export interface ClientRoutesOptions {
  clients: ClientRegistry;
}

export function createClientRoutes(options: ClientRoutesOptions) {
  const { clients } = options;
  const app = new Hono<{ Variables: OAuthVariables }>();

  // List clients
  app.get('/', zValidator('query', listClientsSchema, validationHook), (c) => {
    const { grantType, limit, page } = c.req.valid('query');

    const matching = clients
      .list()
      .filter((client) => !grantType || clients.isGrantAllowed(client, grantType));
    const offset = (page - 1) * limit;

    return c.json({
      data: matching.slice(offset, offset + limit).map(toClientView),
      pagination: {
        page,
        limit,
        total: matching.length,
        totalPages: Math.ceil(matching.length / limit),
      },
    });
  });

  // Get a single client
  app.get('/:clientId', (c) => {
    const client = clients.lookupClient(c.req.param('clientId'));
    if (!client) {
      return c.json({ error: 'not_found', message: 'Client not found' }, 404);
    }
    return c.json(toClientView(client));
  });

  return app;
}
