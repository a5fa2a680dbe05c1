// OAuth types
export * from './oauth.js';

// Client types
export type {
  OAuthClient,
  ClientType,
  ClientAuthMethod,
  RefreshTokenUsage,
  RefreshTokenExpiration,
  AuthenticatedClient,
} from './client.js';

// Scope and resource types
export type { Scope, ScopeKind, IdentityScope, ApiScope, ApiResource } from './scope.js';

// Token types
export * from './token.js';

// User types
export * from './user.js';

// Hono context types
export * from './hono.js';
