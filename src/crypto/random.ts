import { randomBytes } from 'node:crypto';
import { AUTHORIZATION_CODE_LENGTH, REFRESH_TOKEN_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure authorization code (256 bits by default)
 */
export function generateAuthorizationCode(length: number = AUTHORIZATION_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure refresh token
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique key ID (kid) for signing keys
 */
export function generateKid(): string {
  return generateRandomBase64Url(12);
}

/**
 * Generate a unique ID for stored records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a login session ID
 */
export function generateSessionId(): string {
  return generateRandomBase64Url(32);
}
