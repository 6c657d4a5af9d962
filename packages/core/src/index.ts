export { Auth } from './auth.js';
export type { AuthOptions, AuthSettings, GetTokenOptions } from './auth.js';
export { IdentityClient, callbackUrl, discoveryKey, scopeParameter, toAuthError } from './identity-client.js';
export type {
  AuthCodeFlowOptions,
  DeviceFlowOptions,
  DiscoveryCache,
  IdentityClientConfig,
  IdentityClientFactory,
  IdentityProviderClient,
  SilentTokenOptions,
} from './identity-client.js';
export { LifespanValidator, Validator, runValidator, runValidators } from './validators.js';
export type {
  ClaimsValidator,
  LifespanValidatorOptions,
  ValidationFailure,
  ValidatorFn,
  ValidatorOptions,
} from './validators.js';
export { RESERVED_SCOPES, TokenCache, normalizeScopes } from './token-cache.js';
export type {
  CachedAccessToken,
  CachedAccount,
  CachedIdToken,
  CachedRefreshToken,
  TokenCacheEntry,
} from './token-cache.js';
export {
  COOKIE_CHUNK_SIZE,
  CookieSession,
  loadCookieSession,
  objectSession,
  planCookieWrites,
  readChunkedCookie,
  sealSession,
  unsealSession,
} from './session.js';
export type { CookieWrite, CookieWritePlan, SessionConfig, SessionData, SessionStore } from './session.js';
export { loadAuthConfig, validatorsFromConfig } from './config.js';
export type { AuthConfig } from './config.js';
export { ConfigurationError, FlowStateError, IdentityError, TokenCacheError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { LogContext, Logger } from './logger.js';
export { isAuthError, isIdTokenClaims } from './types.js';
export type {
  AuthCodeFlow,
  AuthErrorResult,
  AuthFlow,
  AuthResponse,
  DeviceCodeFlow,
  IdTokenClaims,
  LogInOptions,
  LogInResult,
  LoginTokenResult,
  TokenGrantResult,
  TokenResult,
} from './types.js';
