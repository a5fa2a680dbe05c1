export { InMemoryCredentialVerifier, RemoteCredentialVerifier } from './credential-verifier.js';
export type { RemoteCredentialVerifierOptions } from './credential-verifier.js';
export { SessionManager, SessionUserAuthenticator } from './session-authenticator.js';
export type { SessionManagerOptions } from './session-authenticator.js';
