import { Hono } from 'hono';
import { html } from 'hono/html';
import { csrf } from 'hono/csrf';
import type { OAuthVariables, OAuthContext } from '../../types/hono.js';
import type { ICredentialVerifier } from '../../storage/interfaces/user-storage.js';
import type { SessionManager } from '../../authentication/session-authenticator.js';
import type { User } from '../../types/user.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { stringParam } from '../../utils/params.js';
import { logAuditEvent } from '../../utils/audit.js';
import { PATH_AUTHORIZE, PATH_LOGIN } from '../../config/constants.js';

export interface LoginRoutesOptions {
  /**
   * Only forms served from the issuer's origin may post credentials
   */
  issuer: string;
  credentialVerifier: ICredentialVerifier;
  sessionManager: SessionManager;
}

/**
 * Only authorization requests on this server may be resumed after login
 */
export function isLocalAuthorizeUrl(returnUrl: string): boolean {
  return returnUrl === PATH_AUTHORIZE || returnUrl.startsWith(`${PATH_AUTHORIZE}?`);
}

function readReturnUrl(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  if (!isLocalAuthorizeUrl(value)) {
    throw OAuthError.invalidRequest('Invalid returnUrl');
  }
  return value;
}

function loginPage(options: { returnUrl?: string; username?: string; error?: string }) {
  return html`<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Sign in</title>
</head>
<body>
  <h1>Sign in</h1>
  ${options.error ? html`<p role="alert">${options.error}</p>` : ''}
  <form method="post" action="${PATH_LOGIN}">
    <input type="hidden" name="returnUrl" value="${options.returnUrl ?? ''}">
    <label>Username <input name="username" autocomplete="username" value="${options.username ?? ''}" required></label>
    <label>Password <input name="password" type="password" autocomplete="current-password" required></label>
    <button type="submit">Sign in</button>
  </form>
</body>
</html>`;
}

/**
 * Create login page routes
 *
 * GET  /account/login?returnUrl=...  - login form
 * POST /account/login                - verify credentials, start a session, resume the authorization request
 */
export function createLoginRoutes(options: LoginRoutesOptions) {
  const { issuer, credentialVerifier, sessionManager } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // Cross-site form posts are rejected with 403
  router.use('*', csrf({ origin: new URL(issuer).origin }));

  router.get('/', (c) => {
    const returnUrl = readReturnUrl(c.req.query('returnUrl'));
    return c.html(loginPage({ returnUrl }));
  });

  router.post('/', async (c: OAuthContext) => {
    const body = await c.req.parseBody();
    const returnUrl = readReturnUrl(stringParam(body, 'returnUrl'));
    const username = stringParam(body, 'username')?.trim() ?? '';
    const password = stringParam(body, 'password') ?? '';

    if (!username || !password) {
      return c.html(
        loginPage({ returnUrl, username, error: 'Username and password are required' }),
        400
      );
    }

    let user: User | null;
    try {
      user = await credentialVerifier.verify(username, password);
    } catch (err) {
      throw new OAuthError('temporarily_unavailable', 'User store is unavailable', { cause: err });
    }

    if (!user) {
      logAuditEvent('user_login_failure', { username });
      return c.html(loginPage({ returnUrl, username, error: 'Invalid username or password' }), 401);
    }

    await sessionManager.start(c, user);
    logAuditEvent('user_login_success', { subject: user.id, username: user.username });

    if (returnUrl) {
      return c.redirect(returnUrl);
    }

    return c.html(html`<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Signed in</title></head>
<body><p>You are signed in as ${user.username}.</p></body>
</html>`);
  });

  return router;
}
