import {
  type OAuthErrorCode,
  type OAuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_INVALID_TOKEN,
  ERROR_INSUFFICIENT_SCOPE,
} from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: OAuthErrorStatus;
  public readonly description: string;
  public readonly errorUri?: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      errorUri?: string;
      state?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Append the error to a redirect URI as query parameters (RFC 6749 Section 4.1.2.1).
   * The issuer is added per RFC 9207 when given.
   */
  toRedirectUrl(redirectUri: string, issuer?: string): string {
    const url = new URL(redirectUri);
    url.searchParams.set('error', this.code);
    url.searchParams.set('error_description', this.description);

    if (this.errorUri) {
      url.searchParams.set('error_uri', this.errorUri);
    }
    if (this.state) {
      url.searchParams.set('state', this.state);
    }
    if (issuer) {
      url.searchParams.set('iss', issuer);
    }

    return url.toString();
  }

  /**
   * Copy of this error carrying the client's state value
   */
  withState(state: string | undefined): OAuthError {
    if (!state) {
      return this;
    }
    return new OAuthError(this.code, this.description, {
      errorUri: this.errorUri,
      state,
      cause: this.cause,
    });
  }

  // Factory methods for common errors

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description);
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }

  static insufficientScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INSUFFICIENT_SCOPE, description);
  }
}
