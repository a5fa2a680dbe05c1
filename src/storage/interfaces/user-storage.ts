import type { User } from '../../types/user.js';
import type { OAuthContext } from '../../types/hono.js';

/**
 * Authentication result from the user authenticator
 */
export type AuthenticationResult =
  | { authenticated: true; user: User }
  | { authenticated: false; redirectTo: string };

/**
 * Pluggable user authenticator interface
 *
 * The authorization endpoint does NOT manage users or authentication - it delegates
 * to this interface. The default implementation reads the session cookie set by the
 * login page; an embedding application can supply its own.
 *
 * Example implementation:
 *
 * ```typescript
 * class HeaderUserAuthenticator implements IUserAuthenticator {
 *   async authenticate(ctx: OAuthContext): Promise<AuthenticationResult> {
 *     const subject = ctx.req.header('x-authenticated-user');
 *     if (!subject) {
 *       const returnUrl = new URL(ctx.req.url);
 *       return {
 *         authenticated: false,
 *         redirectTo: `/sso/login?returnUrl=${encodeURIComponent(returnUrl.pathname + returnUrl.search)}`,
 *       };
 *     }
 *     return { authenticated: true, user: { id: subject, username: subject, claims: {} } };
 *   }
 * }
 * ```
 */
export interface IUserAuthenticator {
  /**
   * Authenticate the current request
   *
   * 1. Check for an existing session (cookie, token, etc.)
   * 2. If authenticated, return the user
   * 3. If not authenticated, return a redirect URL to the login page, carrying
   *    the authorization URL to come back to
   */
  authenticate(ctx: OAuthContext): Promise<AuthenticationResult>;
}

/**
 * Verifies a username and password against a user store
 */
export interface ICredentialVerifier {
  /**
   * Returns the user when the credentials match, null otherwise
   * Throws when the user store cannot be reached
   */
  verify(username: string, password: string): Promise<User | null>;

  /**
   * Optional: look a user up by subject identifier (userinfo)
   */
  findBySubject?(subjectId: string): Promise<User | null>;
}
