import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  setupTestContext,
  webClientTokens,
  authorizeUrl,
  locationOf,
  readError,
  WEB_CLIENT,
  LEGACY_CLIENT,
  TEST_USER,
  ISSUER,
  type TestContext,
} from './test-setup.js';

function endSessionUrl(params: Record<string, string>): string {
  return `/connect/endsession?${new URLSearchParams(params).toString()}`;
}

describe('End Session Endpoint', () => {
  let ctx: TestContext;
  let idToken: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ctx = await setupTestContext();
    idToken = (await webClientTokens(ctx.app, 'openid')).id_token ?? '';
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should redirect to the registered post-logout URI with state', async () => {
    const res = await ctx.app.request(
      endSessionUrl({
        id_token_hint: idToken,
        post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri,
        state: 'bye',
      })
    );

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(`${WEB_CLIENT.postLogoutRedirectUri}?state=bye`);
  });

  it('should accept client_id in place of id_token_hint', async () => {
    const res = await ctx.app.request(
      endSessionUrl({
        client_id: WEB_CLIENT.clientId,
        post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri,
      })
    );

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(WEB_CLIENT.postLogoutRedirectUri);
  });

  it('should accept an expired id_token_hint', async () => {
    ctx.clock.advance(86400);

    const res = await ctx.app.request(
      endSessionUrl({ id_token_hint: idToken, post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri })
    );

    expect(res.status).toBe(302);
  });

  it('should accept the request as a form post', async () => {
    const res = await ctx.app.request('/connect/endsession', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        id_token_hint: idToken,
        post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri,
      }),
    });

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(WEB_CLIENT.postLogoutRedirectUri);
  });

  it('should not redirect to an unregistered URI', async () => {
    const res = await ctx.app.request(
      endSessionUrl({ id_token_hint: idToken, post_logout_redirect_uri: 'https://attacker.example.test/' })
    );

    expect(res.status).toBe(400);
    expect(res.headers.get('Location')).toBeNull();
    expect((await readError(res)).error_description).toBe('Invalid post_logout_redirect_uri');
  });

  it('should require a client for the post-logout redirect', async () => {
    const res = await ctx.app.request(
      endSessionUrl({ post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri })
    );

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_request');
  });

  it('should reject a client_id that does not match the hint', async () => {
    const res = await ctx.app.request(
      endSessionUrl({
        id_token_hint: idToken,
        client_id: LEGACY_CLIENT.clientId,
        post_logout_redirect_uri: WEB_CLIENT.postLogoutRedirectUri,
      })
    );

    expect(res.status).toBe(400);
    expect((await readError(res)).error_description).toBe('client_id does not match id_token_hint');
  });

  it('should reject a hint this server did not issue', async () => {
    const res = await ctx.app.request(endSessionUrl({ id_token_hint: 'not-a-jwt' }));

    expect(res.status).toBe(400);
    expect((await readError(res)).error_description).toBe('id_token_hint was not issued by this server');
  });

  it('should show a confirmation page without a redirect URI', async () => {
    const res = await ctx.app.request('/connect/endsession');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toMatch(/^text\/html/);
    expect(await res.text()).toContain('<h1>Logged Out</h1>');
  });
});

describe('End Session with a login session', () => {
  let ctx: TestContext;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ctx = await setupTestContext({ sessions: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should end the session and clear the cookie', async () => {
    const loginRes = await ctx.app.request('/account/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Origin: ISSUER },
      body: new URLSearchParams({ username: TEST_USER.username, password: TEST_USER.password }),
    });
    const cookie = (loginRes.headers.get('Set-Cookie') ?? '').split(';')[0] ?? '';

    const res = await ctx.app.request('/connect/endsession', { headers: { Cookie: cookie } });

    expect(res.status).toBe(200);
    expect(res.headers.get('Set-Cookie')).toMatch(/^oidc_session=; Max-Age=0; /);

    const logoutEvents = logSpy.mock.calls.filter(
      ([line]) => typeof line === 'string' && line.includes('"event":"user_logout"')
    );
    expect(logoutEvents).toHaveLength(1);
    expect(String(logoutEvents[0]?.[0])).toContain(`"subject":"${TEST_USER.subjectId}"`);

    // The old cookie no longer signs the user in
    const authorized = await ctx.app.request(
      authorizeUrl({
        response_type: 'code',
        client_id: WEB_CLIENT.clientId,
        redirect_uri: WEB_CLIENT.redirectUri,
        scope: 'openid',
        code_challenge: 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM',
        code_challenge_method: 'S256',
      }),
      { headers: { Cookie: cookie } }
    );
    expect(locationOf(authorized).pathname).toBe('/account/login');
  });
});
