import type { OAuthClient } from '../types/client.js';
import type { GrantType } from '../types/oauth.js';
import { verifySecret } from '../crypto/hash.js';
import { OFFLINE_ACCESS_SCOPE } from '../config/constants.js';

/**
 * Read-only table of registered OAuth clients.
 * Built once at startup; every client is frozen.
 */
export class ClientRegistry {
  private readonly clients: ReadonlyMap<string, OAuthClient>;

  constructor(clients: readonly OAuthClient[]) {
    const byId = new Map<string, OAuthClient>();
    for (const client of clients) {
      if (byId.has(client.clientId)) {
        throw new Error(`Duplicate client_id in client registry: ${client.clientId}`);
      }
      byId.set(client.clientId, deepFreeze(client));
    }
    this.clients = byId;
  }

  /**
   * Find a client by its public identifier
   */
  lookupClient(clientId: string): OAuthClient | null {
    return this.clients.get(clientId) ?? null;
  }

  /**
   * All registered clients, in registration order
   */
  list(): OAuthClient[] {
    return [...this.clients.values()];
  }

  /**
   * Check a presented secret against the client's stored hash.
   * Public clients have no secret and never validate.
   */
  async validateSecret(client: OAuthClient, provided: string): Promise<boolean> {
    if (!client.clientSecretHash || provided.length === 0) {
      return false;
    }
    return verifySecret(provided, client.clientSecretHash);
  }

  /**
   * offline_access follows allowOfflineAccess; every other scope must be listed
   */
  isScopeAllowed(client: OAuthClient, scope: string): boolean {
    if (scope === OFFLINE_ACCESS_SCOPE) {
      return client.allowOfflineAccess;
    }
    return client.allowedScopes.includes(scope);
  }

  /**
   * Whether the client may use a grant type.
   * refresh_token is implied by allowOfflineAccess.
   */
  isGrantAllowed(client: OAuthClient, grantType: GrantType): boolean {
    if (grantType === 'refresh_token' && client.allowOfflineAccess) {
      return true;
    }
    return client.allowedGrantTypes.includes(grantType);
  }

  /**
   * Exact string comparison, no prefix or pattern matching
   */
  isRedirectUriRegistered(client: OAuthClient, redirectUri: string): boolean {
    return client.redirectUris.includes(redirectUri);
  }

  isPostLogoutRedirectUriRegistered(client: OAuthClient, redirectUri: string): boolean {
    return client.postLogoutRedirectUris.includes(redirectUri);
  }

  /**
   * Union of grant types usable by at least one client
   */
  supportedGrantTypes(): GrantType[] {
    const grants = new Set<GrantType>();
    for (const client of this.clients.values()) {
      for (const grant of client.allowedGrantTypes) {
        grants.add(grant);
      }
      if (client.allowOfflineAccess) {
        grants.add('refresh_token');
      }
    }

    const order: GrantType[] = ['authorization_code', 'client_credentials', 'refresh_token'];
    return order.filter((grant) => grants.has(grant));
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const property of Object.values(value)) {
    if (typeof property === 'object' && property !== null && !Object.isFrozen(property)) {
      deepFreeze(property);
    }
  }
  return Object.freeze(value);
}
