import type { Context } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationRequestParams } from '../../types/oauth.js';
import type { IAuthorizationCodeStorage, IUserAuthenticator } from '../../storage/interfaces/index.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import { stringParam } from '../../utils/params.js';
import { receive, validate, authenticate, issueCode } from './authorization-request.js';

export interface AuthorizeHandlerOptions {
  clients: ClientRegistry;
  resources: ResourceRegistry;
  authorizationCodeStorage: IAuthorizationCodeStorage;
  userAuthenticator: IUserAuthenticator;
  issuer: string;
  authorizationCodeTtl: number; // seconds
}

/**
 * Read authorization request parameters from the query (GET) or form body (POST)
 */
export async function readAuthorizationParams(
  c: Context<{ Variables: OAuthVariables }>
): Promise<AuthorizationRequestParams> {
  const params: Record<string, unknown> =
    c.req.method === 'GET' ? c.req.query() : await c.req.parseBody();

  return {
    response_type: stringParam(params, 'response_type'),
    client_id: stringParam(params, 'client_id'),
    redirect_uri: stringParam(params, 'redirect_uri'),
    scope: stringParam(params, 'scope'),
    state: stringParam(params, 'state'),
    code_challenge: stringParam(params, 'code_challenge'),
    code_challenge_method: stringParam(params, 'code_challenge_method'),
    nonce: stringParam(params, 'nonce'),
  };
}

/**
 * Handle the authorization endpoint (GET/POST /connect/authorize)
 *
 * Drives the authorization request state machine:
 * 1. Validate the request parameters
 * 2. Authenticate the user (redirect to login if needed)
 * 3. Generate authorization code
 * 4. Redirect to client with code
 *
 * All configured clients skip consent.
 */
export function createAuthorizeHandler(options: AuthorizeHandlerOptions) {
  const { clients, resources, authorizationCodeStorage, userAuthenticator, issuer, authorizationCodeTtl } =
    options;

  return async (c: Context<{ Variables: OAuthVariables }>) => {
    const received = receive(await readAuthorizationParams(c));

    const validated = validate(received, { clients, resources, issuer });
    if (validated.status === 'rejected') {
      if (validated.delivery === 'direct') {
        // Client or redirect_uri not trusted: show the error here
        throw validated.error;
      }
      return c.redirect(validated.redirectTo);
    }

    const authenticated = authenticate(validated, await userAuthenticator.authenticate(c));
    if (authenticated.status === 'login_required') {
      return c.redirect(authenticated.redirectTo);
    }

    const issued = await issueCode(authenticated, {
      authorizationCodeStorage,
      issuer,
      authorizationCodeTtl,
      now: c.get('requestTime'),
    });

    return c.redirect(issued.redirectTo);
  };
}
