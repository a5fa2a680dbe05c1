import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenIssuer } from '../../services/token-issuer.js';

export interface SigningKeyRoutesOptions {
  tokenIssuer: TokenIssuer;
}

export function createSigningKeyRoutes(options: SigningKeyRoutesOptions) {
  const { tokenIssuer } = options;
  const app = new Hono<{ Variables: OAuthVariables }>();

  // Key metadata only; key material never leaves the token issuer
  app.get('/', async (c) => {
    return c.json({ data: await tokenIssuer.describeKeys(c.get('requestTime')) });
  });

  return app;
}
