import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import {
  setupTestContext,
  basicAuth,
  obtainCode,
  tokenRequest,
  webClientTokens,
  readTokenResponse,
  readError,
  WEB_CLIENT,
  LEGACY_CLIENT,
  SERVICE_CLIENT,
  type TestContext,
} from '../test-setup.js';

const replayEventSchema = z.object({
  event: z.literal('refresh_token_replay'),
  clientId: z.string(),
  subjectId: z.string(),
  revoked: z.number(),
});

function replayEvents(calls: unknown[][]) {
  return calls.flatMap(([line]) => {
    if (typeof line !== 'string') return [];
    const parsed = replayEventSchema.safeParse(JSON.parse(line));
    return parsed.success ? [parsed.data] : [];
  });
}

describe('Refresh Token Grant', () => {
  let ctx: TestContext;
  let refreshToken: string;

  const webAuth = { Authorization: basicAuth(WEB_CLIENT.clientId, WEB_CLIENT.clientSecret) };

  function refresh(token: string, extra: Record<string, string> = {}, headers = webAuth) {
    return tokenRequest(ctx.app, { grant_type: 'refresh_token', refresh_token: token, ...extra }, headers);
  }

  beforeEach(async () => {
    ctx = await setupTestContext();

    // Get a refresh token via authorization code flow
    const tokens = await webClientTokens(ctx.app, 'openid profile api1 offline_access');
    refreshToken = tokens.refresh_token ?? '';
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should issue new tokens with valid refresh token', async () => {
    const res = await refresh(refreshToken);

    expect(res.status).toBe(200);

    const tokens = await readTokenResponse(res);
    expect(tokens.token_type).toBe('Bearer');
    expect(tokens.scope).toBe('openid profile api1 offline_access');
    expect(tokens.id_token).toBeDefined();
    expect(tokens.refresh_token).toBeDefined();
    // One-time usage: rotated
    expect(tokens.refresh_token).not.toBe(refreshToken);
  });

  it('should revoke the token family when a used token is replayed', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const first = await readTokenResponse(await refresh(refreshToken));
    const rotated = first.refresh_token ?? '';

    // Replay the original token
    const replay = await refresh(refreshToken);
    expect(replay.status).toBe(400);
    expect((await readError(replay)).error).toBe('invalid_grant');

    // The replacement is revoked along with it
    const afterReplay = await refresh(rotated);
    expect(afterReplay.status).toBe(400);
    expect((await readError(afterReplay)).error).toBe('invalid_grant');

    expect(replayEvents(logSpy.mock.calls)).toEqual([
      { event: 'refresh_token_replay', clientId: 'web', subjectId: 'user-1', revoked: 2 },
    ]);
  });

  it('should allow scope downgrade', async () => {
    const res = await refresh(refreshToken, { scope: 'openid api1' });

    expect(res.status).toBe(200);
    const tokens = await readTokenResponse(res);
    expect(tokens.scope).toBe('openid api1');

    // The replacement keeps the original grant
    const next = await readTokenResponse(await refresh(tokens.refresh_token ?? ''));
    expect(next.scope).toBe('openid profile api1 offline_access');
  });

  it('should reject scope escalation', async () => {
    const res = await refresh(refreshToken, { scope: 'openid email' });

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_scope');
  });

  it('should reject a refresh token issued to another client', async () => {
    const res = await refresh(
      refreshToken,
      {},
      { Authorization: basicAuth(LEGACY_CLIENT.clientId, LEGACY_CLIENT.clientSecret) }
    );

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_grant');
  });

  it('should reject a client that may not refresh', async () => {
    const res = await refresh(
      refreshToken,
      {},
      { Authorization: basicAuth(SERVICE_CLIENT.clientId, SERVICE_CLIENT.clientSecret) }
    );

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('unauthorized_client');
  });

  it('should reject an unknown refresh token', async () => {
    const res = await refresh('not-a-real-token');

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_grant');
  });

  it('should require the refresh_token parameter', async () => {
    const res = await tokenRequest(ctx.app, { grant_type: 'refresh_token' }, webAuth);

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_request');
  });

  it('should reject an expired refresh token', async () => {
    // Default absolute lifetime: 30 days
    ctx.clock.advance(2592000);

    const res = await refresh(refreshToken);

    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_grant');
  });

  it('should let only one concurrent redemption win', async () => {
    const responses = await Promise.all([refresh(refreshToken), refresh(refreshToken)]);

    expect(responses.map((res) => res.status).sort()).toEqual([200, 400]);
  });
});

describe('Refresh Token Grant (reuse, sliding expiration)', () => {
  let ctx: TestContext;
  let refreshToken: string;

  const legacyAuth = { Authorization: basicAuth(LEGACY_CLIENT.clientId, LEGACY_CLIENT.clientSecret) };

  function refresh(token: string) {
    return tokenRequest(ctx.app, { grant_type: 'refresh_token', refresh_token: token }, legacyAuth);
  }

  beforeEach(async () => {
    ctx = await setupTestContext();

    const code = await obtainCode(ctx.app, {
      response_type: 'code',
      client_id: LEGACY_CLIENT.clientId,
      redirect_uri: LEGACY_CLIENT.redirectUri,
      scope: 'openid api2 offline_access',
    });
    const res = await tokenRequest(
      ctx.app,
      { grant_type: 'authorization_code', code, redirect_uri: LEGACY_CLIENT.redirectUri },
      legacyAuth
    );
    refreshToken = (await readTokenResponse(res)).refresh_token ?? '';
  });

  it('should return the same refresh token', async () => {
    const res = await refresh(refreshToken);

    expect(res.status).toBe(200);
    expect((await readTokenResponse(res)).refresh_token).toBe(refreshToken);
  });

  it('should expire after the sliding window without use', async () => {
    ctx.clock.advance(600);

    const res = await refresh(refreshToken);
    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_grant');
  });

  it('should slide the expiry on use but never past the absolute lifetime', async () => {
    // Sliding window 600s, absolute lifetime 3600s
    for (let elapsed = 550; elapsed <= 3300; elapsed += 550) {
      ctx.clock.advance(550);
      const res = await refresh(refreshToken);
      expect(res.status).toBe(200);
    }

    // Elapsed 3850s: past the absolute lifetime
    ctx.clock.advance(550);
    const res = await refresh(refreshToken);
    expect(res.status).toBe(400);
    expect((await readError(res)).error).toBe('invalid_grant');
  });
});
