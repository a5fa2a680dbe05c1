export * from './hash.js';
export * from './random.js';
export * from './pkce.js';
export * from './jwt.js';
