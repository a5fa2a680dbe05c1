import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

const SCRYPT_N = 16384; // CPU/memory cost
const SCRYPT_R = 8; // Block size
const SCRYPT_P = 1; // Parallelization
const SCRYPT_KEY_LENGTH = 64;

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 (for tokens, codes)
 * Used for storing authorization codes and refresh tokens
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a secret (client secret or user password) using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$scrypt$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Check whether a string is in the $scrypt$N$r$p$salt$hash format
 */
export function isSecretHash(value: string): boolean {
  return parseSecretHash(value) !== null;
}

interface ParsedSecretHash {
  N: number;
  r: number;
  p: number;
  salt: Buffer;
  hash: Buffer;
}

function parseSecretHash(value: string): ParsedSecretHash | null {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, scheme, n, r, p, salt, hash, ...rest] = value.split('$');
  if (empty !== '' || scheme !== 'scrypt' || rest.length > 0) {
    return null;
  }
  if (n === undefined || r === undefined || p === undefined || !salt || !hash) {
    return null;
  }

  const params = [n, r, p].map((part) => (/^\d+$/.test(part) ? parseInt(part, 10) : NaN));
  const [N = NaN, blockSize = NaN, parallelization = NaN] = params;
  if (!Number.isFinite(N) || !Number.isFinite(blockSize) || !Number.isFinite(parallelization)) {
    return null;
  }

  return {
    N,
    r: blockSize,
    p: parallelization,
    salt: Buffer.from(salt, 'base64'),
    hash: Buffer.from(hash, 'base64'),
  };
}

/**
 * Verify a secret against its scrypt hash
 */
export async function verifySecret(secret: string, hash: string): Promise<boolean> {
  const parsed = parseSecretHash(hash);
  if (!parsed || parsed.hash.length === 0) {
    return false;
  }

  const derivedHash = await scryptAsync(secret, parsed.salt, parsed.hash.length, {
    N: parsed.N,
    r: parsed.r,
    p: parsed.p,
  });

  return timingSafeEqual(parsed.hash, derivedHash);
}

/**
 * Hash for token comparison (quick hash, not for long-term storage)
 * Used for comparing tokens that are already random and high-entropy
 */
export function hashToken(token: string): string {
  return sha256(token);
}
