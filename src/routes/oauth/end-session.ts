import { Hono } from 'hono';
import { html } from 'hono/html';
import type { OAuthVariables, OAuthContext } from '../../types/hono.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { TokenIssuer } from '../../services/token-issuer.js';
import type { SessionManager } from '../../authentication/session-authenticator.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { stringParam } from '../../utils/params.js';
import { logAuditEvent } from '../../utils/audit.js';

export interface EndSessionRoutesOptions {
  clients: ClientRegistry;
  tokenIssuer: TokenIssuer;
  sessionManager: SessionManager;
}

/**
 * Create End Session (Logout) endpoint
 *
 * GET/POST /connect/endsession
 *
 * Handles RP-initiated logout per OpenID Connect RP-Initiated Logout 1.0
 *
 * Parameters:
 * - id_token_hint: Previously issued ID token (expired tokens are accepted)
 * - post_logout_redirect_uri: must exactly match a URI registered for the client
 * - state: Opaque value echoed to the client
 * - client_id: Client identifier (required if id_token_hint not provided)
 */
export function createEndSessionRoutes(options: EndSessionRoutesOptions) {
  const { clients, tokenIssuer, sessionManager } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  const handleEndSession = async (c: OAuthContext) => {
    const now = c.get('requestTime');

    // Extract parameters from query (GET) or body (POST)
    const params: Record<string, unknown> =
      c.req.method === 'GET' ? c.req.query() : await c.req.parseBody();

    const idTokenHint = stringParam(params, 'id_token_hint');
    const postLogoutRedirectUri = stringParam(params, 'post_logout_redirect_uri');
    const state = stringParam(params, 'state');
    let clientId = stringParam(params, 'client_id');

    let hintedSubject: string | undefined;
    if (idTokenHint) {
      const hint = await tokenIssuer.verifyIdTokenHint(idTokenHint, now);
      if (clientId && clientId !== hint.clientId) {
        throw OAuthError.invalidRequest('client_id does not match id_token_hint');
      }
      clientId = hint.clientId;
      hintedSubject = hint.subject;
    }

    // Validate post_logout_redirect_uri before anything is changed
    if (postLogoutRedirectUri) {
      if (!clientId) {
        throw OAuthError.invalidRequest(
          'client_id or id_token_hint is required when post_logout_redirect_uri is provided'
        );
      }

      const client = clients.lookupClient(clientId);
      if (!client) {
        throw OAuthError.invalidRequest('Unknown client_id');
      }

      if (!clients.isPostLogoutRedirectUriRegistered(client, postLogoutRedirectUri)) {
        throw OAuthError.invalidRequest('Invalid post_logout_redirect_uri');
      }
    }

    const session = await sessionManager.end(c);
    const subject = session?.user.id ?? hintedSubject;
    if (subject) {
      logAuditEvent('user_logout', { subject, clientId });
    }

    if (postLogoutRedirectUri) {
      const url = new URL(postLogoutRedirectUri);
      if (state) {
        url.searchParams.set('state', state);
      }
      return c.redirect(url.toString());
    }

    // Return a simple logout confirmation page
    return c.html(html`<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Logged Out</title>
</head>
<body>
  <h1>Logged Out</h1>
  <p>You have been successfully logged out.</p>
</body>
</html>`);
  };

  router.get('/', handleEndSession);
  router.post('/', handleEndSession);

  return router;
}
