import { z } from 'zod';
import * as jose from 'jose';
import { createIdentityServer, keyRetirementPeriod } from '../../app.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { buildRegistries, type ClientRegistry, type ResourceRegistry } from '../../registry/index.js';
import { parseIdentityConfig, type IdentityConfigInput } from '../../config/identity-config.js';
import { defaultLifetimes } from '../../config/index.js';
import { TokenIssuer } from '../../services/token-issuer.js';
import { InMemoryCredentialVerifier } from '../../authentication/credential-verifier.js';
import type { IStorage, IUserAuthenticator, AuthenticationResult } from '../../storage/interfaces/index.js';
import type { User } from '../../types/user.js';
import type { OAuthContext } from '../../types/hono.js';
import type { Clock } from '../../middleware/request-context.js';
import { generateCodeChallenge } from '../../crypto/pkce.js';
import { generateRandomBase64Url } from '../../crypto/random.js';

/**
 * Test fixtures and helpers
 */

export const ISSUER = 'https://id.example.test';

export const WEB_CLIENT = {
  clientId: 'web',
  clientSecret: 'test-secret',
  redirectUri: 'https://rp.example.test/callback',
  postLogoutRedirectUri: 'https://rp.example.test/signed-out',
};

export const SPA_CLIENT = {
  clientId: 'spa',
  redirectUri: 'http://localhost:4200/callback',
};

export const SERVICE_CLIENT = {
  clientId: 'service',
  clientSecret: 'service-secret',
};

export const LEGACY_CLIENT = {
  clientId: 'legacy',
  clientSecret: 'legacy-secret',
  redirectUri: 'https://legacy.example.test/cb',
};

export const TEST_USER = {
  subjectId: 'user-1',
  username: 'alice',
  password: 'test-password',
};

export const testIdentityConfig: IdentityConfigInput = {
  clients: [
    {
      clientId: WEB_CLIENT.clientId,
      clientName: 'Web App',
      clientSecret: WEB_CLIENT.clientSecret,
      allowedGrantTypes: ['authorization_code'],
      redirectUris: [WEB_CLIENT.redirectUri],
      postLogoutRedirectUris: [WEB_CLIENT.postLogoutRedirectUri],
      allowedScopes: ['openid', 'profile', 'email', 'api1'],
      allowOfflineAccess: true,
    },
    {
      clientId: SPA_CLIENT.clientId,
      allowedGrantTypes: ['authorization_code'],
      redirectUris: [SPA_CLIENT.redirectUri],
      allowedScopes: ['openid', 'profile', 'api1'],
    },
    {
      clientId: SERVICE_CLIENT.clientId,
      clientSecret: SERVICE_CLIENT.clientSecret,
      allowedGrantTypes: ['client_credentials'],
      allowedScopes: ['api1', 'api2'],
      accessTokenTtl: 600,
    },
    {
      clientId: LEGACY_CLIENT.clientId,
      clientSecret: LEGACY_CLIENT.clientSecret,
      allowedGrantTypes: ['authorization_code'],
      redirectUris: [LEGACY_CLIENT.redirectUri],
      allowedScopes: ['openid', 'api2'],
      requirePkce: false,
      allowOfflineAccess: true,
      refreshTokenUsage: 'reuse',
      refreshTokenExpiration: 'sliding',
      refreshTokenTtl: 3600,
      slidingRefreshTokenTtl: 600,
    },
  ],
  identityResources: [
    { name: 'openid', displayName: 'Your user identifier', userClaims: ['sub'] },
    { name: 'profile', displayName: 'User profile', userClaims: ['name', 'given_name', 'family_name'] },
    { name: 'email', displayName: 'Your email address', userClaims: ['email', 'email_verified'] },
  ],
  apiScopes: [
    { name: 'api1', displayName: 'Orders API' },
    { name: 'api2', displayName: 'Billing API' },
  ],
  apiResources: [
    { name: 'orders-api', displayName: 'Orders', scopes: ['api1'] },
    { name: 'billing-api', displayName: 'Billing', scopes: ['api2'] },
  ],
  testUsers: [
    {
      subjectId: TEST_USER.subjectId,
      username: TEST_USER.username,
      password: TEST_USER.password,
      claims: {
        name: 'Alice Example',
        given_name: 'Alice',
        family_name: 'Example',
        email: 'alice@example.test',
        email_verified: true,
      },
    },
  ],
};

export const testUser: User = {
  id: TEST_USER.subjectId,
  username: TEST_USER.username,
  authTime: 1_700_000_000,
  claims: {
    name: 'Alice Example',
    given_name: 'Alice',
    family_name: 'Example',
    email: 'alice@example.test',
    email_verified: true,
  },
};

/**
 * Controllable clock: every request sees `now` until the test moves it
 */
export class TestClock {
  now = new Date('2024-01-01T12:00:00Z');

  readonly clock: Clock = () => this.now;

  advance(seconds: number): void {
    this.now = new Date(this.now.getTime() + seconds * 1000);
  }
}

// Test user authenticator that signs the current user in without a login page
export class TestUserAuthenticator implements IUserAuthenticator {
  private currentUser: User | null = testUser;

  setCurrentUser(user: User | null) {
    this.currentUser = user;
  }

  async authenticate(_ctx: OAuthContext): Promise<AuthenticationResult> {
    if (!this.currentUser) {
      return { authenticated: false, redirectTo: '/account/login' };
    }
    return { authenticated: true, user: this.currentUser };
  }
}

// Shared test context
export interface TestContext {
  app: ReturnType<typeof createIdentityServer>;
  storage: IStorage;
  clients: ClientRegistry;
  resources: ResourceRegistry;
  tokenIssuer: TokenIssuer;
  clock: TestClock;
  userAuthenticator: TestUserAuthenticator;
}

export interface TestContextOptions {
  /**
   * Registries to serve; defaults to testIdentityConfig
   */
  identity?: IdentityConfigInput;
  /**
   * Use the session cookie of the login page instead of the test authenticator
   */
  sessions?: boolean;
  adminApiKey?: string;
  rateLimit?: { windowMs: number; maxRequests: number };
}

// Setup function for tests
export async function setupTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const identity = parseIdentityConfig(options.identity ?? testIdentityConfig);
  const { clients, resources } = await buildRegistries(identity, defaultLifetimes());
  const storage = createMemoryStorage();
  const clock = new TestClock();

  const tokenIssuer = new TokenIssuer({
    issuer: ISSUER,
    signingKeys: storage.signingKeys,
    keyRetirementPeriod: keyRetirementPeriod(clients.list()),
  });
  await tokenIssuer.initialize(clock.now);

  const userAuthenticator = new TestUserAuthenticator();

  const app = createIdentityServer({
    issuer: ISSUER,
    clients,
    resources,
    storage,
    tokenIssuer,
    credentialVerifier: await InMemoryCredentialVerifier.fromConfig(identity.testUsers),
    sessionSecret: 'test-session-secret',
    userAuthenticator: options.sessions ? undefined : userAuthenticator,
    clock: clock.clock,
    enableLogging: false,
    // High limit for tests
    rateLimit: options.rateLimit ?? { windowMs: 60000, maxRequests: 1000 },
    admin: { enabled: true, auth: { apiKey: options.adminApiKey } },
  });

  return { app, storage, clients, resources, tokenIssuer, clock, userAuthenticator };
}

// Generate a valid PKCE code verifier (43-128 characters using unreserved characters)
export function generateCodeVerifier(): string {
  // 48 bytes = 64 base64url characters
  return generateRandomBase64Url(48);
}

// Create Basic auth header
export function basicAuth(clientId: string, clientSecret: string): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

export function authorizeUrl(params: Record<string, string>): string {
  return `/connect/authorize?${new URLSearchParams(params).toString()}`;
}

/**
 * The Location header of a redirect, resolved against the issuer
 */
export function locationOf(res: Response): URL {
  const location = res.headers.get('Location');
  if (!location) {
    throw new Error(`Expected a redirect, got HTTP ${res.status}`);
  }
  return new URL(location, ISSUER);
}

export function tokenRequest(
  app: TestContext['app'],
  params: Record<string, string>,
  headers: Record<string, string> = {}
) {
  return app.request('/connect/token', {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      ...headers,
    },
    body: new URLSearchParams(params),
  });
}

/**
 * Run the authorization request for the current user and return the issued code
 */
export async function obtainCode(
  app: TestContext['app'],
  params: Record<string, string>
): Promise<string> {
  const res = await app.request(authorizeUrl(params));
  const code = locationOf(res).searchParams.get('code');
  if (!code) {
    throw new Error(`No code in redirect: ${res.headers.get('Location')}`);
  }
  return code;
}

/**
 * Full authorization code flow for the web client, returning the token response
 */
export async function webClientTokens(app: TestContext['app'], scope: string): Promise<TokenResponse> {
  const codeVerifier = generateCodeVerifier();
  const code = await obtainCode(app, {
    response_type: 'code',
    client_id: WEB_CLIENT.clientId,
    redirect_uri: WEB_CLIENT.redirectUri,
    scope,
    code_challenge: generateCodeChallenge(codeVerifier),
    code_challenge_method: 'S256',
  });

  const res = await tokenRequest(
    app,
    {
      grant_type: 'authorization_code',
      code,
      redirect_uri: WEB_CLIENT.redirectUri,
      code_verifier: codeVerifier,
    },
    { Authorization: basicAuth(WEB_CLIENT.clientId, WEB_CLIENT.clientSecret) }
  );
  if (res.status !== 200) {
    throw new Error(`Token request failed with HTTP ${res.status}`);
  }
  return readTokenResponse(res);
}

// Response schemas
export const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
  scope: z.string(),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export const jwksSchema = z.object({
  keys: z.array(
    z.object({
      kty: z.string(),
      use: z.string(),
      alg: z.string(),
      kid: z.string(),
      n: z.string(),
      e: z.string(),
    })
  ),
});

export async function readJson<T extends z.ZodTypeAny>(res: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await res.json());
}

export function readTokenResponse(res: Response): Promise<TokenResponse> {
  return readJson(res, tokenResponseSchema);
}

export function readJwks(res: Response) {
  return readJson(res, jwksSchema);
}

export function readError(res: Response): Promise<ErrorResponse> {
  return readJson(res, errorResponseSchema);
}

// Re-export for convenience
export { generateCodeChallenge, generateRandomBase64Url, jose };
