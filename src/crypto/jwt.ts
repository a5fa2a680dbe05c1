import * as jose from 'jose';
import type { SigningKey } from '../types/token.js';
import type { JsonWebKey } from '../types/oauth.js';

/**
 * JWT signing and verification utilities using jose library
 */

type SigningAlgorithm = SigningKey['algorithm'];

/**
 * Import a private key from PEM format
 */
async function importPrivateKey(pem: string, algorithm: SigningAlgorithm): Promise<jose.KeyLike> {
  return jose.importPKCS8(pem, algorithm, { extractable: true });
}

/**
 * Import a public key from PEM format
 */
async function importPublicKey(pem: string, algorithm: SigningAlgorithm): Promise<jose.KeyLike> {
  return jose.importSPKI(pem, algorithm);
}

/**
 * Sign a JWT with the given key
 * `typ` is `at+jwt` for access tokens (RFC 9068) and `JWT` for ID tokens
 */
export async function signJwt(
  payload: jose.JWTPayload,
  signingKey: SigningKey,
  typ: 'at+jwt' | 'JWT'
): Promise<string> {
  const privateKey = await importPrivateKey(signingKey.privateKey, signingKey.algorithm);

  return new jose.SignJWT(payload)
    .setProtectedHeader({
      alg: signingKey.algorithm,
      kid: signingKey.kid,
      typ,
    })
    .sign(privateKey);
}

/**
 * Verify a JWT signature and its registered claims
 */
export async function verifyJwt(
  token: string,
  signingKey: SigningKey,
  options: {
    issuer: string;
    typ?: string;
    currentDate?: Date;
    clockTolerance?: number;
  }
): Promise<jose.JWTPayload> {
  const key = await importPublicKey(signingKey.publicKey, signingKey.algorithm);

  const { payload } = await jose.jwtVerify(token, key, {
    issuer: options.issuer,
    algorithms: [signingKey.algorithm],
    typ: options.typ,
    currentDate: options.currentDate,
    clockTolerance: options.clockTolerance ?? 5,
  });

  return payload;
}

/**
 * Get the JWT header without verification
 */
export function getJwtHeader(token: string): jose.ProtectedHeaderParameters | null {
  try {
    return jose.decodeProtectedHeader(token);
  } catch {
    return null;
  }
}

/**
 * Generate a new RSA key pair for signing
 */
export async function generateRsaKeyPair(): Promise<{ publicKey: string; privateKey: string }> {
  const { publicKey, privateKey } = await jose.generateKeyPair('RS256', {
    modulusLength: 2048,
    extractable: true,
  });

  const publicKeyPem = await jose.exportSPKI(publicKey);
  const privateKeyPem = await jose.exportPKCS8(privateKey);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
  };
}

/**
 * Derive the SPKI public key PEM from a PKCS#8 RSA private key PEM
 */
export async function derivePublicKey(privateKeyPem: string): Promise<string> {
  const privateKey = await importPrivateKey(privateKeyPem, 'RS256');
  const { kty, n, e } = await jose.exportJWK(privateKey);
  if (kty !== 'RSA' || !n || !e) {
    throw new Error('Signing key must be an RSA private key');
  }

  const publicKey = await jose.importJWK({ kty, n, e }, 'RS256');
  if (publicKey instanceof Uint8Array) {
    throw new Error('Signing key must be an RSA private key');
  }
  return jose.exportSPKI(publicKey);
}

/**
 * Convert a PEM public key to JWK format (for JWKS endpoint)
 */
export async function publicKeyToJwk(
  publicKeyPem: string,
  kid: string,
  algorithm: SigningAlgorithm
): Promise<JsonWebKey> {
  const publicKey = await importPublicKey(publicKeyPem, algorithm);
  const { kty = 'RSA', n, e } = await jose.exportJWK(publicKey);

  return {
    kty,
    use: 'sig',
    alg: algorithm,
    kid,
    n,
    e,
  };
}
