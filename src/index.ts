import { serve } from '@hono/node-server';
import { createIdentityServer, keyRetirementPeriod } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { loadIdentityConfig } from './config/identity-config.js';
import { buildRegistries } from './registry/index.js';
import { TokenIssuer } from './services/token-issuer.js';
import { purgeExpired, rotateSigningKey } from './services/maintenance.js';
import { InMemoryCredentialVerifier, RemoteCredentialVerifier } from './authentication/index.js';
import type { ICredentialVerifier } from './storage/interfaces/index.js';
import { generateRandomBase64Url } from './crypto/random.js';
import { PATH_DISCOVERY, PATH_AUTHORIZE, PATH_TOKEN, PATH_JWKS, PATH_LOGIN } from './config/constants.js';

async function main(): Promise<void> {
  // Load configuration
  const config = getConfig();
  const identityConfig = loadIdentityConfig(config.identity.configPath);

  const { clients, resources, warnings } = await buildRegistries(identityConfig, config.defaults);
  for (const warning of warnings) {
    console.warn(`Warning: ${warning}`);
  }

  const storage = createMemoryStorage();

  const tokenIssuer = new TokenIssuer({
    issuer: config.server.issuer,
    signingKeys: storage.signingKeys,
    keyRetirementPeriod: keyRetirementPeriod(clients.list()),
  });
  await tokenIssuer.initialize(new Date(), config.secrets.jwtSigningKey);
  if (!config.secrets.jwtSigningKey) {
    console.warn('Warning: JWT_SIGNING_KEY is not set; using a generated developer signing key');
  }

  let credentialVerifier: ICredentialVerifier;
  if (config.identity.credentialVerifierUrl) {
    console.log(`Verifying credentials against ${config.identity.credentialVerifierUrl}`);
    credentialVerifier = new RemoteCredentialVerifier({ url: config.identity.credentialVerifierUrl });
  } else {
    credentialVerifier = await InMemoryCredentialVerifier.fromConfig(identityConfig.testUsers);
  }

  let sessionSecret = config.secrets.sessionSecret;
  if (!sessionSecret) {
    if (config.server.nodeEnv === 'production') {
      throw new Error('SESSION_SECRET must be set in production');
    }
    console.warn('Warning: SESSION_SECRET is not set; sessions will not survive a restart');
    sessionSecret = generateRandomBase64Url(32);
  }

  const app = createIdentityServer({
    issuer: config.server.issuer,
    clients,
    resources,
    storage,
    tokenIssuer,
    credentialVerifier,
    sessionSecret,
    authorizationCodeTtl: config.defaults.authorizationCodeTtl,
    sessionTtl: config.defaults.sessionTtl,
    requestTimeoutMs: config.server.requestTimeoutMs,
    rateLimit: config.rateLimit,
    enableLogging: config.server.nodeEnv !== 'test',
    admin: { enabled: true, auth: { apiKey: config.secrets.adminApiKey } },
  });

  // Purge expired codes, tokens, sessions and retired keys
  const cleanup = setInterval(() => {
    purgeExpired(storage, tokenIssuer, new Date()).catch((err: unknown) => {
      console.error('Cleanup failed:', err);
    });
  }, config.maintenance.cleanupIntervalMs);
  cleanup.unref();

  const { keyRotationInterval } = config.maintenance;
  if (keyRotationInterval) {
    const rotation = setInterval(() => {
      rotateSigningKey(tokenIssuer, new Date()).catch((err: unknown) => {
        console.error('Signing key rotation failed:', err);
      });
    }, keyRotationInterval * 1000);
    rotation.unref();
  }

  // Start server
  serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      const issuer = config.server.issuer;
      console.log(`Identity provider running at http://${info.address}:${info.port}`);
      console.log('');
      console.log('Endpoints:');
      console.log(`  Discovery: ${issuer}${PATH_DISCOVERY}`);
      console.log(`  JWKS:      ${issuer}${PATH_JWKS}`);
      console.log(`  Authorize: ${issuer}${PATH_AUTHORIZE}`);
      console.log(`  Token:     ${issuer}${PATH_TOKEN}`);
      console.log(`  Login:     ${issuer}${PATH_LOGIN}`);
      console.log('');
      console.log(`Registered clients: ${clients.list().map((client) => client.clientId).join(', ')}`);
    }
  );
}

main().catch((err: unknown) => {
  console.error('Failed to start identity provider:', err);
  process.exit(1);
});

// Export for programmatic use
export { createIdentityServer, keyRetirementPeriod, type IdentityServerOptions } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export { buildRegistries, ClientRegistry, ResourceRegistry } from './registry/index.js';
export { TokenIssuer } from './services/token-issuer.js';
export * from './authentication/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
