/**
 * OAuth 2.0 Grant Types
 * RFC 6749
 */
export type GrantType = 'authorization_code' | 'client_credentials' | 'refresh_token';

/**
 * Response types for authorization endpoint
 */
export type ResponseType = 'code';

/**
 * PKCE Code Challenge Methods
 * RFC 9700 requires S256 only
 */
export type CodeChallengeMethod = 'S256';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Authorization Request parameters as received (GET or POST /connect/authorize)
 * RFC 6749 Section 4.1.1, OpenID Connect Core Section 3.1.2.1
 *
 * Every field is optional here; validation happens in the request state machine.
 */
export interface AuthorizationRequestParams {
  response_type?: string;
  client_id?: string;
  redirect_uri?: string;
  scope?: string;
  state?: string;
  code_challenge?: string;
  code_challenge_method?: string;
  nonce?: string;
}

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  id_token?: string;
}

/**
 * OpenID Connect Discovery Response
 * Based on OpenID Connect Discovery 1.0
 */
export interface OpenIDConfiguration {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  userinfo_endpoint: string;
  end_session_endpoint: string;
  jwks_uri: string;
  scopes_supported: string[];
  claims_supported: string[];
  response_types_supported: ResponseType[];
  response_modes_supported: string[];
  grant_types_supported: GrantType[];
  subject_types_supported: string[];
  id_token_signing_alg_values_supported: string[];
  token_endpoint_auth_methods_supported: string[];
  code_challenge_methods_supported: CodeChallengeMethod[];
  authorization_response_iss_parameter_supported: boolean;
}

/**
 * JWKS Response
 */
export interface JWKSResponse {
  keys: JsonWebKey[];
}

export interface JsonWebKey {
  kty: string;
  use?: string;
  alg?: string;
  kid?: string;
  // RSA specific
  n?: string;
  e?: string;
}
