export {
  createOpenIDConfigurationRoutes,
  buildOpenIDConfiguration,
  type OpenIDConfigurationRouteOptions,
} from './openid-configuration.js';
export { createJWKSRoutes, type JWKSRouteOptions } from './jwks.js';
