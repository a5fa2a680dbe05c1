import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (err) {
      console.warn(`Warning: Could not read secret from ${filePath}`, err);
    }
  }

  // Fall back to direct environment variable
  return process.env[envVar];
}

/**
 * Parse a positive integer from the environment, falling back to a default
 */
function readInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const trimmed = raw.trim();
  const value = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${envVar} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Like readInt, but absent means "not configured"
 */
function readOptionalInt(envVar: string): number | undefined {
  const raw = process.env[envVar];
  return raw === undefined || raw.trim() === '' ? undefined : readInt(envVar, 0);
}

/**
 * Token and session lifetimes (seconds) applied when a client does not override them
 */
export interface LifetimeDefaults {
  accessTokenTtl: number;
  identityTokenTtl: number;
  refreshTokenTtl: number;
  slidingRefreshTokenTtl: number;
  authorizationCodeTtl: number;
  sessionTtl: number;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    issuer: string;
    requestTimeoutMs: number;
  };
  identity: {
    configPath: string;
    credentialVerifierUrl: string | undefined;
  };
  secrets: {
    adminApiKey: string | undefined;
    sessionSecret: string | undefined;
    jwtSigningKey: string | undefined;
  };
  maintenance: {
    keyRotationInterval: number | undefined; // seconds; no scheduled rotation when unset
    cleanupIntervalMs: number;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  defaults: LifetimeDefaults;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 5000);
  const issuer = (process.env['ISSUER'] ?? `http://localhost:${port}`).replace(/\/+$/, '');

  return {
    server: {
      port,
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      issuer,
      requestTimeoutMs: readInt('REQUEST_TIMEOUT_MS', constants.DEFAULT_REQUEST_TIMEOUT_MS),
    },
    identity: {
      configPath: process.env['IDENTITY_CONFIG_PATH'] ?? 'config/identity.json',
      credentialVerifierUrl: process.env['CREDENTIAL_VERIFIER_URL'],
    },
    secrets: {
      adminApiKey: readSecret('ADMIN_API_KEY'),
      sessionSecret: readSecret('SESSION_SECRET'),
      jwtSigningKey: readSecret('JWT_SIGNING_KEY'),
    },
    maintenance: {
      keyRotationInterval: readOptionalInt('SIGNING_KEY_ROTATION_INTERVAL'),
      cleanupIntervalMs: readInt('CLEANUP_INTERVAL_MS', constants.DEFAULT_CLEANUP_INTERVAL_MS),
    },
    rateLimit: {
      windowMs: readInt('RATE_LIMIT_WINDOW_MS', constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: readInt('RATE_LIMIT_MAX_REQUESTS', constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    defaults: {
      accessTokenTtl: readInt('DEFAULT_ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      identityTokenTtl: readInt('DEFAULT_IDENTITY_TOKEN_TTL', constants.DEFAULT_IDENTITY_TOKEN_TTL),
      refreshTokenTtl: readInt('DEFAULT_REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      slidingRefreshTokenTtl: readInt(
        'DEFAULT_SLIDING_REFRESH_TOKEN_TTL',
        constants.DEFAULT_SLIDING_REFRESH_TOKEN_TTL
      ),
      // Codes never live longer than 10 minutes
      authorizationCodeTtl: Math.min(
        readInt('AUTHORIZATION_CODE_TTL', constants.DEFAULT_AUTHORIZATION_CODE_TTL),
        constants.MAX_AUTHORIZATION_CODE_TTL
      ),
      sessionTtl: readInt('SESSION_TTL', constants.DEFAULT_SESSION_TTL),
    },
  };
}

/**
 * Lifetime defaults without reading the environment
 */
export function defaultLifetimes(): LifetimeDefaults {
  return {
    accessTokenTtl: constants.DEFAULT_ACCESS_TOKEN_TTL,
    identityTokenTtl: constants.DEFAULT_IDENTITY_TOKEN_TTL,
    refreshTokenTtl: constants.DEFAULT_REFRESH_TOKEN_TTL,
    slidingRefreshTokenTtl: constants.DEFAULT_SLIDING_REFRESH_TOKEN_TTL,
    authorizationCodeTtl: constants.DEFAULT_AUTHORIZATION_CODE_TTL,
    sessionTtl: constants.DEFAULT_SESSION_TTL,
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
