import type { Scope, IdentityScope, ApiScope, ApiResource } from '../types/scope.js';
import { OFFLINE_ACCESS_SCOPE } from '../config/constants.js';

export interface ResourceRegistryInput {
  identityResources: readonly IdentityScope[];
  apiScopes: readonly ApiScope[];
  apiResources: readonly ApiResource[];
}

/**
 * Read-only table of identity resources, API scopes and API resources
 */
export class ResourceRegistry {
  private readonly scopes: ReadonlyMap<string, Scope>;
  private readonly identity: readonly IdentityScope[];
  private readonly api: readonly ApiScope[];
  private readonly resources: readonly ApiResource[];

  constructor(input: ResourceRegistryInput) {
    const scopes = new Map<string, Scope>();
    for (const scope of [...input.identityResources, ...input.apiScopes]) {
      if (scope.name === OFFLINE_ACCESS_SCOPE) {
        throw new Error(`${OFFLINE_ACCESS_SCOPE} is built in and cannot be registered`);
      }
      if (scopes.has(scope.name)) {
        throw new Error(`Duplicate scope name in resource registry: ${scope.name}`);
      }
      scopes.set(scope.name, Object.freeze({ ...scope }));
    }

    for (const resource of input.apiResources) {
      for (const scopeName of resource.scopes) {
        if (scopes.get(scopeName)?.kind !== 'api') {
          throw new Error(`API resource ${resource.name} references unknown API scope ${scopeName}`);
        }
      }
    }

    this.scopes = scopes;
    this.identity = Object.freeze([...input.identityResources]);
    this.api = Object.freeze([...input.apiScopes]);
    this.resources = Object.freeze(input.apiResources.map((resource) => Object.freeze({ ...resource })));
  }

  findScope(name: string): Scope | null {
    return this.scopes.get(name) ?? null;
  }

  /**
   * Registered scope or offline_access
   */
  isKnownScope(name: string): boolean {
    return name === OFFLINE_ACCESS_SCOPE || this.scopes.has(name);
  }

  isApiScope(name: string): boolean {
    return this.scopes.get(name)?.kind === 'api';
  }

  identityResources(): readonly IdentityScope[] {
    return this.identity;
  }

  apiScopes(): readonly ApiScope[] {
    return this.api;
  }

  apiResources(): readonly ApiResource[] {
    return this.resources;
  }

  /**
   * Scopes advertised in discovery: identity, API, then offline_access
   */
  supportedScopes(): string[] {
    return [...this.identity.map((s) => s.name), ...this.api.map((s) => s.name), OFFLINE_ACCESS_SCOPE];
  }

  /**
   * Every claim any identity resource can release
   */
  supportedClaims(): string[] {
    return this.claimsForScopes(this.identity.map((s) => s.name));
  }

  /**
   * Claims released by the identity scopes among `scopes`, in registry order
   */
  claimsForScopes(scopes: readonly string[]): string[] {
    const claims = new Set<string>();
    for (const resource of this.identity) {
      if (scopes.includes(resource.name)) {
        for (const claim of resource.userClaims) {
          claims.add(claim);
        }
      }
    }
    return [...claims];
  }

  /**
   * Names of the API resources covering any of the given API scopes
   */
  audiencesForScopes(scopes: readonly string[]): string[] {
    return this.resources
      .filter((resource) => resource.scopes.some((scope) => scopes.includes(scope)))
      .map((resource) => resource.name);
  }
}
