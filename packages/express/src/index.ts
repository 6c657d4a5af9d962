export { createIdentityRouter } from './plugin.js';
export type { IdentityRouterOptions } from './plugin.js';
export { requireAuth } from './middleware.js';
export type { RequireAuthOptions } from './middleware.js';
export { DEFAULT_COOKIE_NAME, sessionCookies } from './session.js';
export type { RequestIdentity, SessionCookieOptions, SessionCookies } from './session.js';

// Re-export core types for convenience
export type {
  AuthErrorResult,
  AuthSettings,
  IdTokenClaims,
  LogInResult,
  TokenResult,
} from '@session-auth/core';
