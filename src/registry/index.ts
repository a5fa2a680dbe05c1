import type { IdentityConfig, ClientConfig } from '../config/identity-config.js';
import type { LifetimeDefaults } from '../config/index.js';
import type { OAuthClient } from '../types/client.js';
import { MAX_AUTHORIZATION_CODE_TTL, OFFLINE_ACCESS_SCOPE } from '../config/constants.js';
import { hashSecret } from '../crypto/hash.js';
import { ClientRegistry } from './client-registry.js';
import { ResourceRegistry } from './resource-registry.js';

export { ClientRegistry } from './client-registry.js';
export { ResourceRegistry, type ResourceRegistryInput } from './resource-registry.js';

export interface Registries {
  clients: ClientRegistry;
  resources: ResourceRegistry;
  /**
   * Configuration that loads but deserves attention (e.g. PKCE disabled)
   */
  warnings: string[];
}

/**
 * Build the client and resource registries from validated configuration.
 * Plaintext secrets are hashed here and never kept.
 */
export async function buildRegistries(
  config: IdentityConfig,
  defaults: LifetimeDefaults
): Promise<Registries> {
  const resources = new ResourceRegistry({
    identityResources: config.identityResources.map((resource) => ({
      kind: 'identity' as const,
      name: resource.name,
      displayName: resource.displayName,
      description: resource.description,
      userClaims: resource.userClaims,
    })),
    apiScopes: config.apiScopes.map((scope) => ({
      kind: 'api' as const,
      name: scope.name,
      displayName: scope.displayName,
      description: scope.description,
    })),
    apiResources: config.apiResources,
  });

  const warnings: string[] = [];
  const clients: OAuthClient[] = [];

  for (const clientConfig of config.clients) {
    const unknownScopes = clientConfig.allowedScopes.filter((scope) => !resources.isKnownScope(scope));
    if (unknownScopes.length > 0) {
      throw new Error(
        `Client ${clientConfig.clientId} references unknown scopes: ${unknownScopes.join(', ')}`
      );
    }

    const client = await toClient(clientConfig, defaults);

    if (client.clientType === 'public' && client.allowedGrantTypes.includes('client_credentials')) {
      throw new Error(`Client ${client.clientId} uses client_credentials but has no secret`);
    }
    if (client.allowedGrantTypes.includes('authorization_code') && !client.requirePkce) {
      warnings.push(
        `Client ${client.clientId} does not require PKCE; this is a development-only relaxation`
      );
    }
    if (client.allowedScopes.includes(OFFLINE_ACCESS_SCOPE) && !client.allowOfflineAccess) {
      warnings.push(
        `Client ${client.clientId} lists ${OFFLINE_ACCESS_SCOPE} but allowOfflineAccess is false`
      );
    }

    clients.push(client);
  }

  return { clients: new ClientRegistry(clients), resources, warnings };
}

async function toClient(config: ClientConfig, defaults: LifetimeDefaults): Promise<OAuthClient> {
  let clientSecretHash = config.clientSecretHash;
  if (config.clientSecret) {
    clientSecretHash = await hashSecret(config.clientSecret);
  }

  const refreshTokenTtl = config.refreshTokenTtl ?? defaults.refreshTokenTtl;

  return {
    clientId: config.clientId,
    clientName: config.clientName ?? config.clientId,
    clientSecretHash,
    clientType: clientSecretHash ? 'confidential' : 'public',
    allowedGrantTypes: config.allowedGrantTypes,
    redirectUris: config.redirectUris,
    postLogoutRedirectUris: config.postLogoutRedirectUris,
    allowedScopes: config.allowedScopes,
    requirePkce: config.requirePkce,
    allowOfflineAccess: config.allowOfflineAccess,
    accessTokenTtl: config.accessTokenTtl ?? defaults.accessTokenTtl,
    identityTokenTtl: config.identityTokenTtl ?? defaults.identityTokenTtl,
    refreshTokenTtl,
    slidingRefreshTokenTtl: Math.min(
      config.slidingRefreshTokenTtl ?? defaults.slidingRefreshTokenTtl,
      refreshTokenTtl
    ),
    refreshTokenUsage: config.refreshTokenUsage,
    refreshTokenExpiration: config.refreshTokenExpiration,
  };
}

/**
 * Clamp a configured authorization code lifetime to the protocol maximum
 */
export function clampAuthorizationCodeTtl(ttl: number): number {
  return Math.min(ttl, MAX_AUTHORIZATION_CODE_TTL);
}
