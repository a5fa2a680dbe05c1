export { createLoginRoutes, isLocalAuthorizeUrl, type LoginRoutesOptions } from './login.js';
