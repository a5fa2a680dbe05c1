export { createAuthorizeRoutes, type AuthorizeRouteOptions } from './authorize.js';
export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createUserInfoRoutes, type UserInfoRoutesOptions } from './userinfo.js';
export { createEndSessionRoutes, type EndSessionRoutesOptions } from './end-session.js';
