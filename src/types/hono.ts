import type { Context } from 'hono';
import type { AuthenticatedClient } from './client.js';
import type { AccessTokenPayload } from './token.js';

/**
 * Extended Hono context variables for OAuth
 */
export interface OAuthVariables {
  requestTime: Date; // Captured once per request; every TTL check uses it
  client?: AuthenticatedClient;
  accessToken?: AccessTokenPayload;
}

/**
 * OAuth-aware Hono context
 */
export type OAuthContext = Context<{ Variables: OAuthVariables }>;

