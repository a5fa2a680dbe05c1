import type { OAuthClient } from '../../types/client.js';
import type { AuthorizationRequestParams, CodeChallengeMethod } from '../../types/oauth.js';
import type { User } from '../../types/user.js';
import type { ClientRegistry } from '../../registry/client-registry.js';
import type { ResourceRegistry } from '../../registry/resource-registry.js';
import type { IAuthorizationCodeStorage, AuthenticationResult } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isValidCodeChallenge, isSupportedChallengeMethod } from '../../crypto/pkce.js';
import { RESPONSE_TYPE_CODE, GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

/**
 * Authorization request lifecycle
 *
 *   received ──validate──▶ validated ──authenticate──▶ authenticated ──issueCode──▶ code_issued
 *      │                      │
 *      └──────────────▶ rejected        login_required (user agent sent to the login page)
 *
 * A rejected request is delivered directly when the client or redirect_uri cannot be
 * trusted, otherwise by redirect to the validated redirect_uri.
 */
export type AuthorizationRequestState =
  | ReceivedState
  | ValidatedState
  | AuthenticatedState
  | LoginRequiredState
  | CodeIssuedState
  | RejectedState;

export interface ValidatedAuthorizationRequest {
  client: OAuthClient;
  redirectUri: string;
  scopes: string[];
  state?: string;
  nonce?: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
}

export interface ReceivedState {
  status: 'received';
  params: AuthorizationRequestParams;
}

export interface ValidatedState {
  status: 'validated';
  request: ValidatedAuthorizationRequest;
}

export interface AuthenticatedState {
  status: 'authenticated';
  request: ValidatedAuthorizationRequest;
  user: User;
}

export interface LoginRequiredState {
  status: 'login_required';
  request: ValidatedAuthorizationRequest;
  redirectTo: string;
}

export interface CodeIssuedState {
  status: 'code_issued';
  request: ValidatedAuthorizationRequest;
  user: User;
  code: string;
  redirectTo: string;
}

export type RejectedState =
  | { status: 'rejected'; delivery: 'direct'; error: OAuthError }
  | { status: 'rejected'; delivery: 'redirect'; error: OAuthError; redirectTo: string };

export interface ValidationContext {
  clients: ClientRegistry;
  resources: ResourceRegistry;
  issuer: string;
}

export interface CodeIssuanceContext {
  authorizationCodeStorage: IAuthorizationCodeStorage;
  issuer: string;
  authorizationCodeTtl: number; // seconds
  now: Date;
}

export function receive(params: AuthorizationRequestParams): ReceivedState {
  return { status: 'received', params };
}

/**
 * RECEIVED → VALIDATED | REJECTED
 */
export function validate(state: ReceivedState, ctx: ValidationContext): ValidatedState | RejectedState {
  const { params } = state;
  const { clients, resources, issuer } = ctx;

  // Until client and redirect_uri are trusted, errors are shown directly
  if (!params.client_id) {
    return rejectDirect(OAuthError.invalidRequest('Missing client_id parameter'));
  }

  const client = clients.lookupClient(params.client_id);
  if (!client) {
    return rejectDirect(OAuthError.invalidRequest('Unknown client_id'));
  }

  if (!params.redirect_uri) {
    return rejectDirect(OAuthError.invalidRequest('Missing redirect_uri parameter'));
  }

  if (!clients.isRedirectUriRegistered(client, params.redirect_uri)) {
    // Never redirect to an unregistered URI
    return rejectDirect(OAuthError.invalidRequest('Invalid redirect_uri'));
  }

  const redirectUri = params.redirect_uri;
  const clientState = params.state || undefined;
  const reject = (error: OAuthError): RejectedState =>
    rejectByRedirect(error.withState(clientState), redirectUri, issuer);

  if (!params.response_type) {
    return reject(OAuthError.invalidRequest('Missing response_type parameter'));
  }

  if (params.response_type !== RESPONSE_TYPE_CODE) {
    return reject(OAuthError.unsupportedResponseType('Only "code" response type is supported'));
  }

  if (!clients.isGrantAllowed(client, GRANT_TYPE_AUTHORIZATION_CODE)) {
    return reject(OAuthError.unauthorizedClient('Client is not authorized for authorization code grant'));
  }

  const requestedScopes = scopeService.parseScopes(params.scope);
  if (requestedScopes.length === 0) {
    return reject(OAuthError.invalidRequest('Missing scope parameter'));
  }

  let scopes: string[];
  try {
    scopes = scopeService.validateScopes(requestedScopes, client, clients, resources);
  } catch (error) {
    if (error instanceof OAuthError) {
      return reject(error);
    }
    throw error;
  }

  const codeChallenge = params.code_challenge;
  const codeChallengeMethod = params.code_challenge_method;

  if (client.requirePkce && !codeChallenge) {
    return reject(OAuthError.invalidRequest('Missing code_challenge parameter (PKCE required)'));
  }

  let method: CodeChallengeMethod | undefined;
  if (codeChallenge) {
    if (!codeChallengeMethod || !isSupportedChallengeMethod(codeChallengeMethod)) {
      return reject(OAuthError.invalidRequest('Only S256 code_challenge_method is supported'));
    }
    if (!isValidCodeChallenge(codeChallenge)) {
      return reject(OAuthError.invalidRequest('Invalid code_challenge format'));
    }
    method = codeChallengeMethod;
  } else if (codeChallengeMethod) {
    return reject(OAuthError.invalidRequest('code_challenge_method sent without code_challenge'));
  }

  return {
    status: 'validated',
    request: {
      client,
      redirectUri,
      scopes,
      state: clientState,
      nonce: params.nonce || undefined,
      codeChallenge,
      codeChallengeMethod: method,
    },
  };
}

/**
 * VALIDATED → AUTHENTICATED, or a detour through the login page
 */
export function authenticate(
  state: ValidatedState,
  result: AuthenticationResult
): AuthenticatedState | LoginRequiredState {
  if (!result.authenticated) {
    return { status: 'login_required', request: state.request, redirectTo: result.redirectTo };
  }
  return { status: 'authenticated', request: state.request, user: result.user };
}

/**
 * AUTHENTICATED → CODE_ISSUED
 * Stores a code bound to client, user, redirect_uri, scopes, nonce and PKCE challenge
 */
export async function issueCode(
  state: AuthenticatedState,
  ctx: CodeIssuanceContext
): Promise<CodeIssuedState> {
  const { request, user } = state;
  const expiresAt = new Date(ctx.now.getTime() + ctx.authorizationCodeTtl * 1000);

  const { value: code } = await ctx.authorizationCodeStorage.create({
    clientId: request.client.clientId,
    user,
    redirectUri: request.redirectUri,
    scope: scopeService.formatScopes(request.scopes),
    codeChallenge: request.codeChallenge,
    codeChallengeMethod: request.codeChallengeMethod,
    nonce: request.nonce,
    issuedAt: ctx.now,
    expiresAt,
  });

  const url = new URL(request.redirectUri);
  url.searchParams.set('code', code);
  if (request.state !== undefined) {
    url.searchParams.set('state', request.state);
  }
  // RFC 9207: Include issuer in authorization response
  url.searchParams.set('iss', ctx.issuer);

  return { status: 'code_issued', request, user, code, redirectTo: url.toString() };
}

function rejectDirect(error: OAuthError): RejectedState {
  return { status: 'rejected', delivery: 'direct', error };
}

function rejectByRedirect(error: OAuthError, redirectUri: string, issuer: string): RejectedState {
  return {
    status: 'rejected',
    delivery: 'redirect',
    error,
    redirectTo: error.toRedirectUrl(redirectUri, issuer),
  };
}
