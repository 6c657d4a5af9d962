import type { JWTPayload } from 'jose';

/**
 * Claims of a validated ID token, as stored for the logged-in user:
 * sub, iat, exp, preferred_username and whatever else the provider issued.
 */
export type IdTokenClaims = JWTPayload;

/**
 * Auth-code flow state kept in the session between the two legs.
 */
export interface AuthCodeFlow {
  kind: 'auth_code';
  authUri: string;
  state: string;
  nonce: string;
  codeVerifier: string;
  redirectUri: string;
  scopes: string[];
}

/**
 * Device-code flow state kept in the session between the two legs.
 */
export interface DeviceCodeFlow {
  kind: 'device_code';
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Epoch seconds */
  expiresAt: number;
  /** Polling interval in seconds */
  interval: number;
  scopes: string[];
}

export type AuthFlow = AuthCodeFlow | DeviceCodeFlow;

/**
 * Parameters the identity provider appended to the redirect URI.
 * Express's req.query and Fastify's request.query both fit.
 */
export type AuthResponse = Record<string, unknown>;

/**
 * OAuth error as reported by the provider, returned rather than thrown.
 */
export interface AuthErrorResult {
  error: string;
  error_description?: string;
}

export interface TokenResult {
  accessToken: string;
  tokenType: string;
  /** Seconds until the access token expires */
  expiresIn: number;
  scopes: string[];
  idToken?: string;
  idTokenClaims?: IdTokenClaims;
}

/**
 * Token result of a completed login; always carries the ID token claims.
 */
export interface LoginTokenResult extends TokenResult {
  idTokenClaims: IdTokenClaims;
}

export type TokenGrantResult = LoginTokenResult | AuthErrorResult;

export interface LogInOptions {
  scopes?: string[];
  /**
   * Absolute redirect URI registered for the app. Without one the
   * device-code flow is used.
   */
  redirectUri?: string;
  prompt?: string;
  loginHint?: string;
  extraParameters?: Record<string, string>;
}

export interface LogInResult {
  /** Where the user should go to sign in */
  authUri: string;
  /** Code to enter at authUri (device-code flow only) */
  userCode?: string;
}

export function isAuthError(value: unknown): value is AuthErrorResult {
  return isRecord(value) && typeof value.error === 'string';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptional(value: unknown, type: 'string' | 'number'): boolean {
  return value === undefined || typeof value === type;
}

/**
 * Plain object whose registered claims, where present, have their JWT types.
 */
export function isIdTokenClaims(value: unknown): value is IdTokenClaims {
  if (!isRecord(value)) {
    return false;
  }
  const { iss, sub, iat, exp, nbf, jti } = value;
  return (
    isOptional(iss, 'string') &&
    isOptional(sub, 'string') &&
    isOptional(jti, 'string') &&
    isOptional(iat, 'number') &&
    isOptional(exp, 'number') &&
    isOptional(nbf, 'number')
  );
}
