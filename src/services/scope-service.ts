import type { OAuthClient } from '../types/client.js';
import type { ClientRegistry } from '../registry/client-registry.js';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import { OAuthError } from '../errors/oauth-error.js';
import { OFFLINE_ACCESS_SCOPE, OPENID_SCOPE } from '../config/constants.js';

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array, dropping duplicates
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    const scopes = scopeString
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    return [...new Set(scopes)];
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Validate requested scopes against the registries and the client
   * Every scope must be known and allowed for the client, otherwise invalid_scope
   *
   * @returns The requested scopes, deduplicated
   */
  validateScopes(
    requestedScopes: readonly string[],
    client: OAuthClient,
    clients: ClientRegistry,
    resources: ResourceRegistry,
    state?: string
  ): string[] {
    const unknownScopes = requestedScopes.filter((scope) => !resources.isKnownScope(scope));
    if (unknownScopes.length > 0) {
      throw OAuthError.invalidScope(`Unknown scopes: ${unknownScopes.join(', ')}`, state);
    }

    const disallowedScopes = requestedScopes.filter((scope) => !clients.isScopeAllowed(client, scope));
    if (disallowedScopes.length > 0) {
      throw OAuthError.invalidScope(
        `Scopes not allowed for this client: ${disallowedScopes.join(', ')}`,
        state
      );
    }

    return [...new Set(requestedScopes)];
  }

  /**
   * Check if a scope set includes a specific scope
   */
  hasScope(scopes: readonly string[], scope: string): boolean {
    return scopes.includes(scope);
  }

  /**
   * Check if a scope set includes all required scopes
   */
  hasAllScopes(scopes: readonly string[], requiredScopes: readonly string[]): boolean {
    return requiredScopes.every((scope) => scopes.includes(scope));
  }

  /**
   * Check if the scopes include 'offline_access' (needed for refresh tokens)
   */
  hasOfflineAccess(scopes: readonly string[]): boolean {
    return this.hasScope(scopes, OFFLINE_ACCESS_SCOPE);
  }

  /**
   * Check if the scopes include 'openid' (OIDC flow)
   */
  isOpenIdScope(scopes: readonly string[]): boolean {
    return this.hasScope(scopes, OPENID_SCOPE);
  }

  /**
   * Keep only API scopes
   * Used by client credentials, which has no user to release identity claims about
   */
  apiScopesOnly(scopes: readonly string[], resources: ResourceRegistry): string[] {
    return scopes.filter((scope) => resources.isApiScope(scope));
  }
}

// Singleton instance
export const scopeService = new ScopeService();
