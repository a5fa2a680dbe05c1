/**
 * Scope kinds
 * - identity: grants claims about the user (OpenID Connect)
 * - api: grants access to an API
 */
export type ScopeKind = 'identity' | 'api';

interface ScopeBase {
  readonly name: string;
  readonly displayName: string;
  readonly description?: string;
}

/**
 * Identity resource, e.g. openid, profile, email
 */
export interface IdentityScope extends ScopeBase {
  readonly kind: 'identity';
  readonly userClaims: readonly string[];
}

/**
 * API scope, e.g. api1
 */
export interface ApiScope extends ScopeBase {
  readonly kind: 'api';
}

export type Scope = IdentityScope | ApiScope;

/**
 * API resource: a named audience that groups API scopes
 */
export interface ApiResource {
  readonly name: string;
  readonly displayName: string;
  readonly scopes: readonly string[];
}
