/**
 * Value of a user claim as it appears in tokens and userinfo
 */
export type UserClaimValue = string | number | boolean | string[];

/**
 * User representation for OAuth flows
 * This is what the credential verifier and the user authenticator return
 *
 * Claims use their OIDC names (given_name, email, role...) so that
 * identity resources can select them by name.
 */
export interface User {
  // Subject identifier (unique user ID)
  id: string;
  username: string;

  // Unix timestamp of authentication
  authTime?: number;

  claims: Record<string, UserClaimValue>;
}

/**
 * Login session created by the account pages
 */
export interface UserSession {
  sessionId: string;
  user: User;
  createdAt: Date;
  expiresAt: Date;
}
