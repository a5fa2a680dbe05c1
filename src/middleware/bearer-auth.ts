import type { MiddlewareHandler, Context } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { AccessTokenPayload } from '../types/token.js';
import type { TokenIssuer } from '../services/token-issuer.js';
import { OAuthError } from '../errors/oauth-error.js';
import { scopeService } from '../services/scope-service.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

export interface BearerAuthOptions {
  tokenIssuer: TokenIssuer;
  requiredScopes?: string[];
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  const match = /^Bearer\s+(\S+)$/i.exec(authHeader.trim());
  return match?.[1] ?? null;
}

/**
 * Middleware to validate bearer tokens (JWT access tokens issued by this server)
 *
 * Sets `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { tokenIssuer, requiredScopes = [] } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    if (!authHeader) {
      throw OAuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      throw OAuthError.invalidToken('Invalid authorization header format');
    }

    const payload = await tokenIssuer.verifyAccessToken(token, c.get('requestTime'));

    const granted = scopeService.parseScopes(payload.scope);
    if (!scopeService.hasAllScopes(granted, requiredScopes)) {
      throw OAuthError.insufficientScope(`Required scopes: ${requiredScopes.join(' ')}`);
    }

    c.set('accessToken', payload);

    await next();
  };
}

/**
 * The access token validated by `bearerAuth`
 */
export function getAccessToken(c: Context<{ Variables: OAuthVariables }>): AccessTokenPayload {
  const payload = c.get('accessToken');
  if (!payload) {
    throw OAuthError.invalidToken('Access token required');
  }
  return payload;
}
