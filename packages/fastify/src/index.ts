export { identityPlugin } from './plugin.js';
export type { IdentityPluginOptions } from './plugin.js';
export { requireAuth } from './middleware.js';
export type { RequireAuthOptions } from './middleware.js';
export { DEFAULT_COOKIE_NAME, sessionCookies } from './session.js';
export type { RequestIdentity, SessionCookieOptions, SessionCookies } from './session.js';

export type {
  AuthErrorResult,
  AuthSettings,
  IdTokenClaims,
  LogInResult,
  TokenResult,
} from '@session-auth/core';
