/**
 * OAuth 2.0 / OpenID Connect constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;
export const RESPONSE_MODE_QUERY = 'query' as const;

// Code challenge methods (S256 only)
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_NONE = 'none' as const;

export const SUPPORTED_CLIENT_AUTH_METHODS = [CLIENT_AUTH_BASIC, CLIENT_AUTH_POST] as const;

// Signing
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_IDENTITY_TOKEN_TTL = 300; // 5 minutes
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days, absolute
export const DEFAULT_SLIDING_REFRESH_TOKEN_TTL = 1296000; // 15 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 300; // 5 minutes
export const MAX_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_SESSION_TTL = 28800; // 8 hours

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 32; // bytes

// Request handling
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60000;

// OpenID Connect scopes
export const OPENID_SCOPE = 'openid' as const;
export const OFFLINE_ACCESS_SCOPE = 'offline_access' as const;

// Audience used when a token carries no API resource scope
export const RESOURCES_AUDIENCE_SUFFIX = '/resources';

// Endpoint paths (relative to the issuer)
export const PATH_DISCOVERY = '/.well-known/openid-configuration';
export const PATH_JWKS = '/.well-known/openid-configuration/jwks';
export const PATH_AUTHORIZE = '/connect/authorize';
export const PATH_TOKEN = '/connect/token';
export const PATH_USERINFO = '/connect/userinfo';
export const PATH_END_SESSION = '/connect/endsession';
export const PATH_LOGIN = '/account/login';

// Session cookie
export const SESSION_COOKIE_NAME = 'oidc_session';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
