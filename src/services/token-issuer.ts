import { z } from 'zod';
import type { SigningKey, SigningKeyInfo, AccessTokenPayload, IdTokenPayload } from '../types/token.js';
import type { JWKSResponse } from '../types/oauth.js';
import type { User, UserClaimValue } from '../types/user.js';
import type { ISigningKeyStorage } from '../storage/interfaces/signing-key-storage.js';
import {
  signJwt,
  verifyJwt,
  getJwtHeader,
  generateRsaKeyPair,
  derivePublicKey,
  publicKeyToJwk,
  generateJti,
  generateKid,
} from '../crypto/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { DEFAULT_ACCESS_TOKEN_TTL, SIGNING_ALGORITHM_RS256 } from '../config/constants.js';

export interface TokenIssuerOptions {
  issuer: string;
  signingKeys: ISigningKeyStorage;
  /**
   * How long (seconds) a rotated-out key stays in the JWKS.
   * Should be at least the longest token lifetime.
   */
  keyRetirementPeriod?: number;
}

export interface AccessTokenInput {
  subject: string;
  clientId: string;
  scopes: readonly string[];
  audience: string | string[];
  ttl: number;
  now: Date;
  authTime?: number;
}

export interface IdTokenInput {
  user: User;
  clientId: string;
  claims: Record<string, UserClaimValue>;
  ttl: number;
  now: Date;
  nonce?: string;
}

const accessTokenPayloadSchema = z.object({
  iss: z.string(),
  sub: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  exp: z.number(),
  iat: z.number(),
  jti: z.string(),
  client_id: z.string(),
  scope: z.string(),
  auth_time: z.number().optional(),
});

const idTokenHintSchema = z.object({
  sub: z.string(),
  aud: z.string(),
});

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Signs access and ID tokens with the active key, publishes the JWKS and rotates keys
 */
export class TokenIssuer {
  readonly issuer: string;
  private readonly signingKeys: ISigningKeyStorage;
  private readonly keyRetirementPeriod: number;

  constructor(options: TokenIssuerOptions) {
    this.issuer = options.issuer;
    this.signingKeys = options.signingKeys;
    this.keyRetirementPeriod = options.keyRetirementPeriod ?? DEFAULT_ACCESS_TOKEN_TTL;
  }

  /**
   * Make sure an active key exists: the configured PKCS#8 key, or a generated
   * developer key when none is configured.
   */
  async initialize(now: Date, privateKeyPem?: string): Promise<SigningKey> {
    const active = await this.signingKeys.getActive();
    if (active) {
      return active;
    }

    const key = privateKeyPem
      ? await this.keyFromPem(privateKeyPem, now)
      : await this.generateKey(now);

    await this.signingKeys.activate(key, now);
    return key;
  }

  /**
   * Sign a JWT access token (RFC 9068)
   */
  async signAccessToken(input: AccessTokenInput): Promise<string> {
    const key = await this.requireActiveKey();
    const iat = toEpochSeconds(input.now);

    const payload: AccessTokenPayload = {
      iss: this.issuer,
      sub: input.subject,
      aud: input.audience,
      exp: iat + input.ttl,
      iat,
      jti: generateJti(),
      client_id: input.clientId,
      scope: input.scopes.join(' '),
    };
    if (input.authTime !== undefined) {
      payload.auth_time = input.authTime;
    }

    return signJwt({ ...payload }, key, 'at+jwt');
  }

  /**
   * Sign an OpenID Connect ID token
   */
  async signIdToken(input: IdTokenInput): Promise<string> {
    const key = await this.requireActiveKey();
    const iat = toEpochSeconds(input.now);

    const payload: IdTokenPayload = {
      ...input.claims,
      iss: this.issuer,
      sub: input.user.id,
      aud: input.clientId,
      exp: iat + input.ttl,
      iat,
      jti: generateJti(),
      auth_time: input.user.authTime ?? iat,
    };
    if (input.nonce) {
      payload.nonce = input.nonce;
    }

    return signJwt(payload, key, 'JWT');
  }

  /**
   * Verify an access token issued by this server
   * Any failure is reported as invalid_token
   */
  async verifyAccessToken(token: string, now: Date): Promise<AccessTokenPayload> {
    const header = getJwtHeader(token);
    if (!header?.kid) {
      throw OAuthError.invalidToken('Malformed access token');
    }

    const key = await this.signingKeys.findByKid(header.kid);
    if (!key || !isPublished(key, now)) {
      throw OAuthError.invalidToken('Access token was signed with an unknown key');
    }

    let claims: unknown;
    try {
      claims = await verifyJwt(token, key, {
        issuer: this.issuer,
        typ: 'at+jwt',
        currentDate: now,
      });
    } catch (err) {
      throw new OAuthError('invalid_token', 'Access token is invalid or expired', { cause: err });
    }

    const parsed = accessTokenPayloadSchema.safeParse(claims);
    if (!parsed.success) {
      throw OAuthError.invalidToken('Access token is missing required claims');
    }
    return parsed.data;
  }

  /**
   * Verify an ID token presented as `id_token_hint` at logout
   * Expired tokens are accepted; the signature and issuer must still check out.
   */
  async verifyIdTokenHint(token: string, now: Date): Promise<{ subject: string; clientId: string }> {
    const header = getJwtHeader(token);
    const key = header?.kid ? await this.signingKeys.findByKid(header.kid) : null;
    if (!key || !isPublished(key, now)) {
      throw OAuthError.invalidRequest('id_token_hint was not issued by this server');
    }

    let claims: unknown;
    try {
      claims = await verifyJwt(token, key, {
        issuer: this.issuer,
        typ: 'JWT',
        currentDate: now,
        clockTolerance: Number.MAX_SAFE_INTEGER,
      });
    } catch (err) {
      throw new OAuthError('invalid_request', 'Invalid id_token_hint', { cause: err });
    }

    const parsed = idTokenHintSchema.safeParse(claims);
    if (!parsed.success) {
      throw OAuthError.invalidRequest('id_token_hint is missing required claims');
    }
    return { subject: parsed.data.sub, clientId: parsed.data.aud };
  }

  /**
   * JWKS: the active key plus rotated keys that have not yet retired
   */
  async publicKeys(now: Date): Promise<JWKSResponse> {
    const keys = await this.signingKeys.listPublished(now);
    return {
      keys: await Promise.all(keys.map((key) => publicKeyToJwk(key.publicKey, key.kid, key.algorithm))),
    };
  }

  /**
   * Every stored key without its key material
   */
  async describeKeys(now: Date): Promise<SigningKeyInfo[]> {
    const keys = await this.signingKeys.list();
    return keys.map((key) => ({
      kid: key.kid,
      algorithm: key.algorithm,
      isActive: key.isActive,
      published: isPublished(key, now),
      createdAt: key.createdAt,
      retiresAt: key.retiresAt,
    }));
  }

  /**
   * Generate a new active key; the previous one stays published for the retirement period
   */
  async rotate(now: Date): Promise<SigningKey> {
    const key = await this.generateKey(now);
    const retiresAt = new Date(now.getTime() + this.keyRetirementPeriod * 1000);
    await this.signingKeys.activate(key, retiresAt);
    return key;
  }

  /**
   * Drop keys whose retirement time has passed
   */
  async pruneRetired(now: Date): Promise<number> {
    return this.signingKeys.deleteRetired(now);
  }

  private async requireActiveKey(): Promise<SigningKey> {
    const key = await this.signingKeys.getActive();
    if (!key) {
      throw OAuthError.serverError('No active signing key');
    }
    return key;
  }

  private async generateKey(now: Date): Promise<SigningKey> {
    const { publicKey, privateKey } = await generateRsaKeyPair();
    return {
      kid: generateKid(),
      algorithm: SIGNING_ALGORITHM_RS256,
      publicKey,
      privateKey,
      isActive: true,
      createdAt: now,
    };
  }

  private async keyFromPem(privateKeyPem: string, now: Date): Promise<SigningKey> {
    return {
      kid: generateKid(),
      algorithm: SIGNING_ALGORITHM_RS256,
      publicKey: await derivePublicKey(privateKeyPem),
      privateKey: privateKeyPem,
      isActive: true,
      createdAt: now,
    };
  }
}

function isPublished(key: SigningKey, now: Date): boolean {
  return key.isActive || (key.retiresAt !== undefined && key.retiresAt.getTime() > now.getTime());
}
