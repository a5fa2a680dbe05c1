import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OAuthVariables } from './types/hono.js';
import type { OAuthClient } from './types/client.js';
import type { IStorage, IUserAuthenticator, ICredentialVerifier } from './storage/interfaces/index.js';
import type { ClientRegistry } from './registry/client-registry.js';
import type { ResourceRegistry } from './registry/resource-registry.js';
import type { TokenIssuer } from './services/token-issuer.js';
import { TokenService } from './services/token-service.js';
import { clampAuthorizationCodeTtl } from './registry/index.js';
import { SessionManager, SessionUserAuthenticator } from './authentication/session-authenticator.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter, type RateLimiterOptions } from './middleware/rate-limiter.js';
import { requestTime, requestTimeout, systemClock, type Clock } from './middleware/request-context.js';
import {
  createAuthorizeRoutes,
  createTokenRoutes,
  createUserInfoRoutes,
  createEndSessionRoutes,
} from './routes/oauth/index.js';
import { createLoginRoutes } from './routes/account/index.js';
import { createOpenIDConfigurationRoutes, createJWKSRoutes } from './routes/discovery/index.js';
import { createAdminRoutes, type AdminAuthOptions } from './routes/admin/index.js';
import {
  DEFAULT_AUTHORIZATION_CODE_TTL,
  DEFAULT_SESSION_TTL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  PATH_AUTHORIZE,
  PATH_TOKEN,
  PATH_USERINFO,
  PATH_END_SESSION,
  PATH_LOGIN,
  PATH_DISCOVERY,
  PATH_JWKS,
} from './config/constants.js';

export interface IdentityServerOptions {
  issuer: string;
  clients: ClientRegistry;
  resources: ResourceRegistry;
  storage: IStorage;
  /**
   * Must be initialized (an active key present) before requests arrive
   */
  tokenIssuer: TokenIssuer;
  credentialVerifier: ICredentialVerifier;
  /**
   * Secret used to sign the session cookie
   */
  sessionSecret: string;
  /**
   * Defaults to the session cookie set by the login page
   */
  userAuthenticator?: IUserAuthenticator;
  authorizationCodeTtl?: number; // seconds
  sessionTtl?: number; // seconds
  clock?: Clock;
  requestTimeoutMs?: number;
  rateLimit?: RateLimiterOptions | false;
  enableCors?: boolean;
  enableLogging?: boolean;
  /**
   * Read-only registry API configuration
   */
  admin?: {
    enabled?: boolean;
    auth?: AdminAuthOptions;
  };
}

/**
 * How long a rotated-out signing key stays published: the longest token lifetime
 * any client can be issued
 */
export function keyRetirementPeriod(clients: readonly OAuthClient[]): number {
  return clients.reduce(
    (longest, client) => Math.max(longest, client.accessTokenTtl, client.identityTokenTtl),
    0
  );
}

/**
 * Create the identity provider application
 */
export function createIdentityServer(options: IdentityServerOptions): Hono<{ Variables: OAuthVariables }> {
  const {
    issuer,
    clients,
    resources,
    storage,
    tokenIssuer,
    credentialVerifier,
    sessionSecret,
    authorizationCodeTtl = DEFAULT_AUTHORIZATION_CODE_TTL,
    sessionTtl = DEFAULT_SESSION_TTL,
    clock = systemClock,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    rateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS },
    enableCors = true,
    enableLogging = true,
    admin = { enabled: true },
  } = options;

  const sessionManager = new SessionManager({
    sessions: storage.sessions,
    secret: sessionSecret,
    ttl: sessionTtl,
    secureCookie: issuer.startsWith('https://'),
  });
  const userAuthenticator = options.userAuthenticator ?? new SessionUserAuthenticator(sessionManager);

  const tokenService = new TokenService({
    tokenIssuer,
    resources,
    refreshTokenStorage: storage.refreshTokens,
  });

  const app = new Hono<{ Variables: OAuthVariables }>();

  // Global error handler
  app.onError(oauthErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // One timestamp per request
  app.use('*', requestTime(clock));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  app.use('*', requestTimeout(requestTimeoutMs));

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting
  if (rateLimit) {
    app.use('*', rateLimiter(rateLimit));
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // Discovery endpoints
  app.route(PATH_DISCOVERY, createOpenIDConfigurationRoutes({ issuer, clients, resources }));
  app.route(PATH_JWKS, createJWKSRoutes({ tokenIssuer }));

  // OAuth / OpenID Connect endpoints
  app.route(
    PATH_AUTHORIZE,
    createAuthorizeRoutes({
      clients,
      resources,
      authorizationCodeStorage: storage.authorizationCodes,
      userAuthenticator,
      issuer,
      authorizationCodeTtl: clampAuthorizationCodeTtl(authorizationCodeTtl),
    })
  );

  app.route(PATH_TOKEN, createTokenRoutes({ storage, clients, resources, tokenService }));

  app.route(PATH_USERINFO, createUserInfoRoutes({ tokenIssuer, tokenService, credentialVerifier }));

  app.route(PATH_END_SESSION, createEndSessionRoutes({ clients, tokenIssuer, sessionManager }));

  // Login page
  app.route(PATH_LOGIN, createLoginRoutes({ issuer, credentialVerifier, sessionManager }));

  // Read-only registry API
  if (admin.enabled !== false) {
    app.route('/admin', createAdminRoutes({ clients, resources, tokenIssuer, auth: admin.auth }));
  }

  return app;
}
