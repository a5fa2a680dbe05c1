import type { MiddlewareHandler, Context } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { OAuthClient, ClientAuthMethod, AuthenticatedClient } from '../types/client.js';
import type { ClientRegistry } from '../registry/client-registry.js';
import { OAuthError } from '../errors/oauth-error.js';
import { stringParam } from '../utils/params.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
  CONTENT_TYPE_FORM,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clients: ClientRegistry;
  allowPublicClients?: boolean; // Allow clients without a secret to identify by client_id
}

interface PresentedCredentials {
  clientId: string;
  clientSecret?: string;
  method: ClientAuthMethod;
}

/**
 * Extract client credentials from Basic auth header
 * RFC 6749 Section 2.3.1: both parts are form-urlencoded before base64
 */
export function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6).trim(), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    throw OAuthError.invalidClient('Malformed Basic credentials');
  }

  try {
    return {
      clientId: decodeFormComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeFormComponent(decoded.slice(colonIndex + 1)),
    };
  } catch (err) {
    if (err instanceof URIError) {
      throw OAuthError.invalidClient('Malformed Basic credentials');
    }
    throw err;
  }
}

function decodeFormComponent(value: string): string {
  return decodeURIComponent(value.replace(/\+/g, ' '));
}

/**
 * Extract client credentials from POST body
 */
async function extractPostAuth(c: Context): Promise<{ clientId: string; clientSecret?: string } | null> {
  const contentType = c.req.header('content-type');
  if (!contentType?.includes(CONTENT_TYPE_FORM)) {
    return null;
  }

  const body = await c.req.parseBody();
  const clientId = stringParam(body, 'client_id');
  if (!clientId) {
    return null;
  }

  return {
    clientId,
    clientSecret: stringParam(body, 'client_secret') || undefined,
  };
}

async function presentedCredentials(c: Context): Promise<PresentedCredentials | null> {
  const authHeader = c.req.header(HEADER_AUTHORIZATION);
  const basic = authHeader ? extractBasicAuth(authHeader) : null;
  const post = await extractPostAuth(c);

  if (basic) {
    // A client must not use more than one authentication method
    if (post?.clientSecret) {
      throw OAuthError.invalidRequest('Multiple client authentication methods used');
    }
    if (post && post.clientId !== basic.clientId) {
      throw OAuthError.invalidClient('client_id does not match the authenticated client');
    }
    return { ...basic, method: CLIENT_AUTH_BASIC };
  }

  if (post) {
    return {
      ...post,
      method: post.clientSecret ? CLIENT_AUTH_POST : CLIENT_AUTH_NONE,
    };
  }

  return null;
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - none: Public clients identify by client_id alone
 *
 * Sets `client` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { clients, allowPublicClients = true } = options;

  return async (c, next) => {
    const credentials = await presentedCredentials(c);
    if (!credentials) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const client: OAuthClient | null = clients.lookupClient(credentials.clientId);
    if (!client) {
      throw OAuthError.invalidClient('Unknown client');
    }

    if (client.clientType === 'public') {
      if (credentials.method !== CLIENT_AUTH_NONE) {
        throw OAuthError.invalidClient('Public clients must not present a secret');
      }
      if (!allowPublicClients) {
        throw OAuthError.invalidClient('Public clients are not allowed');
      }
    } else {
      if (!credentials.clientSecret) {
        throw OAuthError.invalidClient('Client credentials required');
      }

      const isValid = await clients.validateSecret(client, credentials.clientSecret);
      if (!isValid) {
        throw OAuthError.invalidClient('Invalid client credentials');
      }
    }

    c.set('client', { client, authMethod: credentials.method });

    await next();
  };
}

/**
 * The client authenticated by `clientAuthenticator`
 */
export function getAuthenticatedClient(c: Context<{ Variables: OAuthVariables }>): AuthenticatedClient {
  const authenticated = c.get('client');
  if (!authenticated) {
    throw OAuthError.invalidClient('Client authentication required');
  }
  return authenticated;
}
