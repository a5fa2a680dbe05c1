import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { OAuthVariables } from '../../types/hono.js';
import type { Scope } from '../../types/scope.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import { validationHook } from './validation.js';

const listScopesSchema = z.object({
  kind: z.enum(['identity', 'api']).optional(),
});

export interface ResourceRoutesOptions {
  resources: ResourceRegistry;
}

export function createResourceRoutes(options: ResourceRoutesOptions) {
  const { resources } = options;
  const app = new Hono<{ Variables: OAuthVariables }>();

  // Identity resources and API scopes
  app.get('/scopes', zValidator('query', listScopesSchema, validationHook), (c) => {
    const { kind } = c.req.valid('query');

    const scopes: Scope[] = [...resources.identityResources(), ...resources.apiScopes()];
    return c.json({ data: scopes.filter((scope) => !kind || scope.kind === kind) });
  });

  app.get('/api-resources', (c) => {
    return c.json({ data: resources.apiResources() });
  });

  return app;
}
