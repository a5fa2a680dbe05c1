import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { OAuthVariables } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
  PATH_AUTHORIZE,
  PATH_LOGIN,
} from '../config/constants.js';

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC-compliant OAuth error responses
 */
export const oauthErrorHandler: ErrorHandler<{ Variables: OAuthVariables }> = (err, c) => {
  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof OAuthError) {
    if (err.statusCode >= 500) {
      console.error('OAuth Error:', err);
    }
    if (err.code === 'invalid_client' && c.req.header('authorization')?.startsWith('Basic ')) {
      // RFC 6749 Section 5.2
      c.header(HEADER_WWW_AUTHENTICATE, 'Basic realm="token"');
    }
    if (err.code === 'invalid_token' || err.code === 'insufficient_scope') {
      // RFC 6750 Section 3
      c.header(
        HEADER_WWW_AUTHENTICATE,
        `Bearer error="${err.code}", error_description="${err.description.replace(/"/g, "'")}"`
      );
    }
    return c.json(err.toJSON(), err.statusCode);
  }

  console.error('Unhandled error:', err);

  // Framework errors: 4xx (e.g. a cross-site form post) keep their status, the rest (e.g. timeouts) are ours
  if (err instanceof HTTPException && err.status < 500) {
    return c.json(OAuthError.invalidRequest(err.message || undefined).toJSON(), err.status);
  }

  // Handle unexpected errors
  const serverError = OAuthError.serverError(
    process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
  );

  return c.json(serverError.toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Content Security Policy for interactive pages
    if (c.req.path.startsWith(PATH_AUTHORIZE) || c.req.path.startsWith(PATH_LOGIN)) {
      c.header('Content-Security-Policy', "default-src 'self'; frame-ancestors 'none'; form-action 'self'");
    }

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    // Don't log sensitive data (no query strings, no bodies)
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        method,
        path,
        status,
        duration,
        client: c.get('client')?.client.clientId,
      })
    );
  };
}
