import { getSignedCookie, setSignedCookie, deleteCookie } from 'hono/cookie';
import type { OAuthContext } from '../types/hono.js';
import type { User, UserSession } from '../types/user.js';
import type { ISessionStorage } from '../storage/interfaces/session-storage.js';
import type { IUserAuthenticator, AuthenticationResult } from '../storage/interfaces/user-storage.js';
import { stringParams } from '../utils/params.js';
import { PATH_LOGIN, SESSION_COOKIE_NAME } from '../config/constants.js';

export interface SessionManagerOptions {
  sessions: ISessionStorage;
  secret: string;
  ttl: number; // seconds
  secureCookie: boolean;
}

/**
 * Login sessions: a server-side record referenced by a signed, HttpOnly cookie
 */
export class SessionManager {
  private readonly sessions: ISessionStorage;
  private readonly secret: string;
  private readonly ttl: number;
  private readonly secureCookie: boolean;

  constructor(options: SessionManagerOptions) {
    this.sessions = options.sessions;
    this.secret = options.secret;
    this.ttl = options.ttl;
    this.secureCookie = options.secureCookie;
  }

  async start(c: OAuthContext, user: User): Promise<UserSession> {
    const now = c.get('requestTime');
    const expiresAt = new Date(now.getTime() + this.ttl * 1000);
    const session = await this.sessions.create(
      { ...user, authTime: Math.floor(now.getTime() / 1000) },
      now,
      expiresAt
    );

    await setSignedCookie(c, SESSION_COOKIE_NAME, session.sessionId, this.secret, {
      path: '/',
      httpOnly: true,
      secure: this.secureCookie,
      sameSite: 'Lax',
      maxAge: this.ttl,
    });

    return session;
  }

  /**
   * The session referenced by the request cookie, if it is still valid
   * A tampered cookie counts as no session.
   */
  async current(c: OAuthContext): Promise<UserSession | null> {
    const sessionId = await getSignedCookie(c, this.secret, SESSION_COOKIE_NAME);
    if (!sessionId) {
      return null;
    }
    return this.sessions.find(sessionId, c.get('requestTime'));
  }

  async end(c: OAuthContext): Promise<UserSession | null> {
    const session = await this.current(c);
    if (session) {
      await this.sessions.delete(session.sessionId);
    }
    deleteCookie(c, SESSION_COOKIE_NAME, { path: '/', secure: this.secureCookie });
    return session;
  }
}

/**
 * Default user authenticator: the session established by the login page
 */
export class SessionUserAuthenticator implements IUserAuthenticator {
  private readonly sessionManager: SessionManager;

  constructor(sessionManager: SessionManager) {
    this.sessionManager = sessionManager;
  }

  async authenticate(c: OAuthContext): Promise<AuthenticationResult> {
    const session = await this.sessionManager.current(c);
    if (session) {
      return { authenticated: true, user: session.user };
    }

    const returnUrl = await originalRequestUrl(c);
    return {
      authenticated: false,
      redirectTo: `${PATH_LOGIN}?returnUrl=${encodeURIComponent(returnUrl)}`,
    };
  }
}

/**
 * Local URL of the current request; a form POST is replayed as a query string
 */
async function originalRequestUrl(c: OAuthContext): Promise<string> {
  const url = new URL(c.req.url);
  if (c.req.method === 'GET') {
    return url.pathname + url.search;
  }

  const params = new URLSearchParams(stringParams(await c.req.parseBody()));
  const search = params.toString();
  return search ? `${url.pathname}?${search}` : url.pathname;
}
