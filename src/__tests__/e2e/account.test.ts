import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  setupTestContext,
  authorizeUrl,
  locationOf,
  readError,
  tokenRequest,
  readTokenResponse,
  basicAuth,
  generateCodeVerifier,
  generateCodeChallenge,
  jose,
  WEB_CLIENT,
  TEST_USER,
  ISSUER,
  type TestContext,
} from './test-setup.js';
import { createIdentityServer } from '../../app.js';

function login(ctx: TestContext, fields: Record<string, string>) {
  return ctx.app.request('/account/login', {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded', Origin: ISSUER },
    body: new URLSearchParams(fields),
  });
}

// name=value part of the Set-Cookie header
function sessionCookie(res: Response): string {
  const setCookie = res.headers.get('Set-Cookie');
  if (!setCookie) {
    throw new Error('Expected a Set-Cookie header');
  }
  return setCookie.split(';')[0] ?? '';
}

describe('Login', () => {
  let ctx: TestContext;
  let codeVerifier: string;
  let authorizePath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ctx = await setupTestContext({ sessions: true });

    codeVerifier = generateCodeVerifier();
    authorizePath = authorizeUrl({
      response_type: 'code',
      client_id: WEB_CLIENT.clientId,
      redirect_uri: WEB_CLIENT.redirectUri,
      scope: 'openid profile',
      state: 'abc',
      code_challenge: generateCodeChallenge(codeVerifier),
      code_challenge_method: 'S256',
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should send an anonymous authorization request to the login page', async () => {
    const res = await ctx.app.request(authorizePath);

    expect(res.status).toBe(302);
    const location = locationOf(res);
    expect(location.pathname).toBe('/account/login');
    expect(location.searchParams.get('returnUrl')).toBe(authorizePath);
  });

  it('should render the login form', async () => {
    const res = await ctx.app.request(`/account/login?returnUrl=${encodeURIComponent(authorizePath)}`);

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toMatch(/^text\/html/);

    const body = await res.text();
    expect(body).toContain('<form method="post" action="/account/login">');
    expect(body).toContain('name="returnUrl" value="/connect/authorize?response_type=code&amp;');
  });

  it('should refuse a returnUrl outside the authorization endpoint', async () => {
    const res = await ctx.app.request(
      `/account/login?returnUrl=${encodeURIComponent('https://attacker.example.test/')}`
    );

    expect(res.status).toBe(400);
    expect(await readError(res)).toEqual({ error: 'invalid_request', error_description: 'Invalid returnUrl' });
  });

  it('should require both username and password', async () => {
    const res = await login(ctx, { username: TEST_USER.username, password: '' });

    expect(res.status).toBe(400);
    expect(res.headers.get('Set-Cookie')).toBeNull();
    expect(await res.text()).toContain('<p role="alert">Username and password are required</p>');
  });

  it('should reject bad credentials', async () => {
    const res = await login(ctx, { username: TEST_USER.username, password: 'wrong-password' });

    expect(res.status).toBe(401);
    expect(res.headers.get('Set-Cookie')).toBeNull();
    expect(await res.text()).toContain('<p role="alert">Invalid username or password</p>');
  });

  it('should escape the echoed username', async () => {
    const res = await login(ctx, { username: '<b>mallory</b>', password: 'wrong-password' });

    expect(await res.text()).toContain('value="&lt;b&gt;mallory&lt;/b&gt;"');
  });

  it('should confirm a login without a returnUrl', async () => {
    const res = await login(ctx, { username: TEST_USER.username, password: TEST_USER.password });

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('You are signed in as alice.');
  });

  it('should refuse a credential post from another site', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await ctx.app.request('/account/login', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Origin: 'https://evil.example',
        'Sec-Fetch-Site': 'cross-site',
      },
      body: new URLSearchParams({ username: TEST_USER.username, password: TEST_USER.password }),
    });

    expect(res.status).toBe(403);
    expect(res.headers.get('Set-Cookie')).toBeNull();
    expect((await readError(res)).error).toBe('invalid_request');
  });

  it('should refuse a credential post without an Origin header', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await ctx.app.request('/account/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ username: TEST_USER.username, password: TEST_USER.password }),
    });

    expect(res.status).toBe(403);
    expect(res.headers.get('Set-Cookie')).toBeNull();
  });

  it('should resume the authorization request after login', async () => {
    const res = await login(ctx, {
      returnUrl: authorizePath,
      username: TEST_USER.username,
      password: TEST_USER.password,
    });

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(authorizePath);

    const setCookie = res.headers.get('Set-Cookie') ?? '';
    expect(setCookie).toMatch(/^oidc_session=/);
    expect(setCookie).toContain('HttpOnly');
    expect(setCookie).toContain('Secure');
    expect(setCookie).toContain('SameSite=Lax');

    // Same authorization request, now with the session cookie
    const authorized = await ctx.app.request(authorizePath, {
      headers: { Cookie: sessionCookie(res) },
    });
    expect(authorized.status).toBe(302);

    const location = locationOf(authorized);
    expect(location.searchParams.get('state')).toBe('abc');
    const code = location.searchParams.get('code') ?? '';

    const tokenRes = await tokenRequest(
      ctx.app,
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: WEB_CLIENT.redirectUri,
        code_verifier: codeVerifier,
      },
      { Authorization: basicAuth(WEB_CLIENT.clientId, WEB_CLIENT.clientSecret) }
    );
    expect(tokenRes.status).toBe(200);

    const idToken = jose.decodeJwt((await readTokenResponse(tokenRes)).id_token ?? '');
    expect(idToken.sub).toBe(TEST_USER.subjectId);
    // Authentication time is the login time
    expect(idToken['auth_time']).toBe(Math.floor(ctx.clock.now.getTime() / 1000));
  });

  it('should ignore a tampered session cookie', async () => {
    const res = await login(ctx, { username: TEST_USER.username, password: TEST_USER.password });
    const [name, value] = sessionCookie(res).split('=');

    const authorized = await ctx.app.request(authorizePath, {
      headers: { Cookie: `${name}=forged${value}` },
    });

    expect(authorized.status).toBe(302);
    expect(locationOf(authorized).pathname).toBe('/account/login');
  });

  it('should require a new login once the session expires', async () => {
    const res = await login(ctx, { username: TEST_USER.username, password: TEST_USER.password });

    // Default session lifetime: 8 hours
    ctx.clock.advance(28800);

    const authorized = await ctx.app.request(authorizePath, {
      headers: { Cookie: sessionCookie(res) },
    });
    expect(locationOf(authorized).pathname).toBe('/account/login');
  });
});

describe('Login with an unavailable user store', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should answer temporarily_unavailable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const ctx = await setupTestContext({ sessions: true });
    const app = createIdentityServer({
      issuer: ISSUER,
      clients: ctx.clients,
      resources: ctx.resources,
      storage: ctx.storage,
      tokenIssuer: ctx.tokenIssuer,
      credentialVerifier: {
        verify: async () => {
          throw new Error('connection refused');
        },
      },
      sessionSecret: 'test-session-secret',
      enableLogging: false,
      rateLimit: false,
    });

    const res = await app.request('/account/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Origin: ISSUER },
      body: new URLSearchParams({ username: TEST_USER.username, password: TEST_USER.password }),
    });

    expect(res.status).toBe(503);
    expect(await readError(res)).toEqual({
      error: 'temporarily_unavailable',
      error_description: 'User store is unavailable',
    });
  });
});
