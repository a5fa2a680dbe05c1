import { describe, it, expect, beforeEach } from 'vitest';
import * as jose from 'jose';
import { TokenIssuer } from '../../services/token-issuer.js';
import { MemorySigningKeyStorage } from '../../storage/memory/index.js';
import { generateRsaKeyPair } from '../../crypto/jwt.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { testUser, ISSUER } from '../e2e/test-setup.js';

const t0 = new Date('2024-01-01T12:00:00Z');

function at(seconds: number): Date {
  return new Date(t0.getTime() + seconds * 1000);
}

describe('TokenIssuer', () => {
  let signingKeys: MemorySigningKeyStorage;
  let issuer: TokenIssuer;

  function accessToken(now: Date = t0) {
    return issuer.signAccessToken({
      subject: 'user-1',
      clientId: 'web',
      scopes: ['openid', 'api1'],
      audience: 'orders-api',
      ttl: 3600,
      now,
    });
  }

  function idToken(now: Date = t0) {
    return issuer.signIdToken({ user: testUser, clientId: 'web', claims: {}, ttl: 300, now });
  }

  beforeEach(async () => {
    signingKeys = new MemorySigningKeyStorage();
    issuer = new TokenIssuer({ issuer: ISSUER, signingKeys, keyRetirementPeriod: 3600 });
    await issuer.initialize(t0);
  });

  it('should keep the existing active key on initialize', async () => {
    const active = await signingKeys.getActive();

    expect((await issuer.initialize(at(10))).kid).toBe(active?.kid);
    expect(await signingKeys.list()).toHaveLength(1);
  });

  it('should use a configured private key', async () => {
    const { privateKey, publicKey } = await generateRsaKeyPair();
    const configured = new TokenIssuer({ issuer: ISSUER, signingKeys: new MemorySigningKeyStorage() });

    const key = await configured.initialize(t0, privateKey);

    expect(key.publicKey).toBe(publicKey);
  });

  it('should sign access tokens with the at+jwt type', async () => {
    const token = await accessToken();

    const header = jose.decodeProtectedHeader(token);
    expect(header.typ).toBe('at+jwt');
    expect(header.alg).toBe('RS256');

    const payload = await issuer.verifyAccessToken(token, at(60));
    expect(payload).toMatchObject({
      iss: ISSUER,
      sub: 'user-1',
      aud: 'orders-api',
      client_id: 'web',
      scope: 'openid api1',
      iat: 1704110400,
      exp: 1704114000,
    });
  });

  it('should not accept an ID token as an access token', async () => {
    await expect(issuer.verifyAccessToken(await idToken(), t0)).rejects.toMatchObject({
      code: 'invalid_token',
    });
  });

  it('should reject a malformed access token', async () => {
    await expect(issuer.verifyAccessToken('not-a-jwt', t0)).rejects.toBeInstanceOf(OAuthError);
  });

  describe('rotation', () => {
    it('should sign with the new key and keep verifying old tokens', async () => {
      const before = await accessToken();
      const rotated = await issuer.rotate(at(60));
      const after = await accessToken(at(60));

      expect(jose.decodeProtectedHeader(after).kid).toBe(rotated.kid);
      expect(jose.decodeProtectedHeader(before).kid).not.toBe(rotated.kid);
      await expect(issuer.verifyAccessToken(before, at(120))).resolves.toMatchObject({ sub: 'user-1' });
    });

    it('should publish the previous key until it retires', async () => {
      await issuer.rotate(at(60));

      expect((await issuer.publicKeys(at(60))).keys).toHaveLength(2);
      expect((await issuer.publicKeys(at(3660))).keys).toHaveLength(1);
    });

    it('should reject tokens signed with a retired key', async () => {
      const before = await accessToken();
      await issuer.rotate(at(60));

      await expect(issuer.verifyAccessToken(before, at(3660))).rejects.toMatchObject({
        code: 'invalid_token',
        description: 'Access token was signed with an unknown key',
      });
    });

    it('should prune retired keys', async () => {
      await issuer.rotate(at(60));

      expect(await issuer.pruneRetired(at(3659))).toBe(0);
      expect(await issuer.pruneRetired(at(3660))).toBe(1);
      expect(await signingKeys.list()).toHaveLength(1);
    });

    it('should describe keys without key material', async () => {
      const rotated = await issuer.rotate(at(60));

      const keys = await issuer.describeKeys(at(60));

      expect(keys).toHaveLength(2);
      expect(keys[0]).toEqual({
        kid: rotated.kid,
        algorithm: 'RS256',
        isActive: true,
        published: true,
        createdAt: at(60),
        retiresAt: undefined,
      });
      expect(keys[1]).toMatchObject({ isActive: false, published: true, retiresAt: at(3660) });
      expect(keys[1]).not.toHaveProperty('privateKey');
    });
  });

  describe('verifyIdTokenHint', () => {
    it('should return subject and client of a valid hint', async () => {
      const hint = await idToken();

      expect(await issuer.verifyIdTokenHint(hint, at(10))).toEqual({ subject: 'user-1', clientId: 'web' });
    });

    it('should accept an expired hint', async () => {
      const hint = await idToken();

      expect(await issuer.verifyIdTokenHint(hint, at(86400))).toEqual({ subject: 'user-1', clientId: 'web' });
    });

    it('should reject a hint from another issuer', async () => {
      const other = new TokenIssuer({ issuer: 'https://other.example.test', signingKeys });
      const hint = await other.signIdToken({ user: testUser, clientId: 'web', claims: {}, ttl: 300, now: t0 });

      await expect(issuer.verifyIdTokenHint(hint, t0)).rejects.toMatchObject({
        code: 'invalid_request',
        description: 'Invalid id_token_hint',
      });
    });

    it('should reject an access token as a hint', async () => {
      await expect(issuer.verifyIdTokenHint(await accessToken(), t0)).rejects.toMatchObject({
        code: 'invalid_request',
      });
    });
  });
});
