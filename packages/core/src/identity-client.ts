/**
 * Identity client
 *
 * Drives the provider side of both sign-in flows through openid-client:
 * discovery, PKCE authorization URLs, code and device grants, silent refresh
 * and the end-session URL. Tokens land in the TokenCache handed in by Auth.
 */

import { decodeJwt } from 'jose';
import * as client from 'openid-client';
import { FlowStateError, IdentityError } from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { RESERVED_SCOPES, TokenCache, normalizeScopes } from './token-cache.js';
import type { CachedAccount } from './token-cache.js';
import type {
  AuthCodeFlow,
  AuthErrorResult,
  AuthResponse,
  DeviceCodeFlow,
  IdTokenClaims,
  LoginTokenResult,
  TokenGrantResult,
  TokenResult,
} from './types.js';
import { isIdTokenClaims } from './types.js';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const DEFAULT_EXPIRES_IN = 3600;
const DEFAULT_DEVICE_INTERVAL = 5;
const FALLBACK_LOGOUT_PATH = '/oauth2/v2.0/logout';

/**
 * Discovered provider configurations, keyed by discoveryKey(). Entries never
 * change once resolved, so one map may serve every client in the process.
 */
export type DiscoveryCache = Map<string, Promise<client.Configuration>>;

const sharedDiscoveryCache: DiscoveryCache = new Map();

export function discoveryKey(authority: string, clientId: string, confidential: boolean): string {
  return `${authority}|${clientId}|${confidential ? 'confidential' : 'public'}`;
}

export interface IdentityClientConfig {
  authority: string;
  clientId: string;
  /** Client secret; without one the client is public */
  clientCredential?: string;
  tokenCache?: TokenCache;
  discoveryCache?: DiscoveryCache;
  /** Allow plain-HTTP providers (local development only) */
  allowInsecureRequests?: boolean;
  logger?: Logger;
}

export interface AuthCodeFlowOptions {
  redirectUri: string;
  prompt?: string;
  loginHint?: string;
  extraParameters?: Record<string, string>;
}

export interface DeviceFlowOptions {
  extraParameters?: Record<string, string>;
}

export interface SilentTokenOptions {
  forceRefresh?: boolean;
}

/**
 * What Auth needs from an identity library.
 */
export interface IdentityProviderClient {
  initiateAuthCodeFlow(scopes: string[], options: AuthCodeFlowOptions): Promise<AuthCodeFlow>;
  initiateDeviceFlow(scopes: string[], options?: DeviceFlowOptions): Promise<DeviceCodeFlow>;
  acquireTokenByAuthCodeFlow(flow: AuthCodeFlow, response: AuthResponse): Promise<TokenGrantResult>;
  acquireTokenByDeviceFlow(flow: DeviceCodeFlow): Promise<TokenGrantResult>;
  getAccounts(): CachedAccount[];
  acquireTokenSilent(
    scopes: string[],
    account: CachedAccount,
    options?: SilentTokenOptions
  ): Promise<TokenResult | undefined>;
  getLogoutUrl(postLogoutRedirectUri: string): Promise<string>;
}

export type IdentityClientFactory = (config: IdentityClientConfig) => IdentityProviderClient;

/**
 * Requested scopes plus the reserved ones, space-separated.
 */
export function scopeParameter(scopes: readonly string[]): string {
  const all = [...scopes];
  for (const scope of RESERVED_SCOPES) {
    if (!all.includes(scope)) {
      all.push(scope);
    }
  }
  return all.join(' ');
}

/**
 * OAuth error reported by the provider, or undefined for any other error.
 */
export function toAuthError(error: unknown): AuthErrorResult | undefined {
  if (error instanceof client.ResponseBodyError || error instanceof client.AuthorizationResponseError) {
    return authError(error.error, error.error_description);
  }
  return undefined;
}

function authError(error: string, description?: string | null): AuthErrorResult {
  return description ? { error, error_description: description } : { error };
}

function toSearchParams(response: AuthResponse): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(response)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') {
      params.set(key, first);
    }
  }
  return params;
}

/**
 * The URL the provider redirected to: the flow's redirect URI, its own query
 * kept, with the auth response parameters added.
 */
export function callbackUrl(redirectUri: string, params: URLSearchParams): URL {
  const url = new URL(redirectUri);
  for (const [key, value] of params) {
    url.searchParams.set(key, value);
  }
  return url;
}

type GrantResponse = client.TokenEndpointResponse & client.TokenEndpointResponseHelpers;

export class IdentityClient implements IdentityProviderClient {
  private authority: string;
  private clientId: string;
  private clientCredential?: string;
  private tokenCache: TokenCache;
  private discoveryCache: DiscoveryCache;
  private allowInsecure: boolean;
  private logger: Logger;

  constructor(config: IdentityClientConfig) {
    this.authority = config.authority;
    this.clientId = config.clientId;
    this.clientCredential = config.clientCredential;
    this.tokenCache = config.tokenCache ?? new TokenCache();
    this.discoveryCache = config.discoveryCache ?? sharedDiscoveryCache;
    this.allowInsecure = config.allowInsecureRequests ?? false;
    this.logger = config.logger ?? createLogger('identity-client');
  }

  /**
   * Discovered configuration for this client (cached; failures are evicted).
   */
  private getConfiguration(): Promise<client.Configuration> {
    const key = discoveryKey(this.authority, this.clientId, Boolean(this.clientCredential));
    const cached = this.discoveryCache.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.discover(key);
    this.discoveryCache.set(key, pending);
    return pending;
  }

  private async discover(key: string): Promise<client.Configuration> {
    this.logger.debug('Discovering provider configuration', { authority: this.authority });
    try {
      return await client.discovery(
        new URL(this.authority),
        this.clientId,
        this.clientCredential,
        this.clientCredential ? undefined : client.None(),
        this.allowInsecure ? { execute: [client.allowInsecureRequests] } : undefined
      );
    } catch (error) {
      this.discoveryCache.delete(key);
      throw error;
    }
  }

  async initiateAuthCodeFlow(scopes: string[], options: AuthCodeFlowOptions): Promise<AuthCodeFlow> {
    const config = await this.getConfiguration();

    const state = client.randomState();
    const nonce = client.randomNonce();
    const codeVerifier = client.randomPKCECodeVerifier();
    const codeChallenge = await client.calculatePKCECodeChallenge(codeVerifier);

    const parameters: Record<string, string> = {
      ...options.extraParameters,
      redirect_uri: options.redirectUri,
      scope: scopeParameter(scopes),
      response_type: 'code',
      state,
      nonce,
      code_challenge: codeChallenge,
      code_challenge_method: 'S256',
    };
    if (options.prompt) {
      parameters.prompt = options.prompt;
    }
    if (options.loginHint) {
      parameters.login_hint = options.loginHint;
    }

    const authUri = client.buildAuthorizationUrl(config, parameters);

    return {
      kind: 'auth_code',
      authUri: authUri.href,
      state,
      nonce,
      codeVerifier,
      redirectUri: options.redirectUri,
      scopes: [...scopes],
    };
  }

  async initiateDeviceFlow(scopes: string[], options: DeviceFlowOptions = {}): Promise<DeviceCodeFlow> {
    const config = await this.getConfiguration();
    const response = await client.initiateDeviceAuthorization(config, {
      ...options.extraParameters,
      scope: scopeParameter(scopes),
    });

    const flow: DeviceCodeFlow = {
      kind: 'device_code',
      deviceCode: response.device_code,
      userCode: response.user_code,
      verificationUri: response.verification_uri,
      expiresAt: Math.floor(Date.now() / 1000) + response.expires_in,
      interval: response.interval ?? DEFAULT_DEVICE_INTERVAL,
      scopes: [...scopes],
    };
    if (response.verification_uri_complete) {
      flow.verificationUriComplete = response.verification_uri_complete;
    }
    return flow;
  }

  /**
   * Second leg of the auth-code flow. Throws FlowStateError when the response
   * does not belong to the flow.
   */
  async acquireTokenByAuthCodeFlow(flow: AuthCodeFlow, response: AuthResponse): Promise<TokenGrantResult> {
    const params = toSearchParams(response);

    const state = params.get('state');
    if (!state) {
      throw new FlowStateError('state missing from auth response');
    }
    if (state !== flow.state) {
      throw new FlowStateError(`state mismatch: expected ${flow.state}, got ${state}`);
    }

    const error = params.get('error');
    if (error) {
      return authError(error, params.get('error_description'));
    }

    const config = await this.getConfiguration();
    const currentUrl = callbackUrl(flow.redirectUri, params);

    try {
      const tokens = await client.authorizationCodeGrant(config, currentUrl, {
        pkceCodeVerifier: flow.codeVerifier,
        expectedState: flow.state,
        expectedNonce: flow.nonce,
        idTokenExpected: true,
      });
      return this.storeLogin(tokens, flow.scopes);
    } catch (err) {
      const result = toAuthError(err);
      if (result) {
        return result;
      }
      throw err;
    }
  }

  /**
   * Polls the token endpoint once; a pending authorization comes back as
   * { error: 'authorization_pending' }.
   */
  async acquireTokenByDeviceFlow(flow: DeviceCodeFlow): Promise<TokenGrantResult> {
    const config = await this.getConfiguration();

    try {
      const tokens = await client.genericGrantRequest(config, DEVICE_CODE_GRANT, {
        device_code: flow.deviceCode,
      });
      return this.storeLogin(tokens, flow.scopes);
    } catch (err) {
      const result = toAuthError(err);
      if (result) {
        return result;
      }
      throw err;
    }
  }

  getAccounts(): CachedAccount[] {
    return this.tokenCache.getAccounts();
  }

  async acquireTokenSilent(
    scopes: string[],
    account: CachedAccount,
    options: SilentTokenOptions = {}
  ): Promise<TokenResult | undefined> {
    const id = account.homeAccountId;

    if (!options.forceRefresh) {
      const cached = this.tokenCache.findAccessToken(id, scopes);
      if (cached) {
        const now = Math.floor(Date.now() / 1000);
        const result: TokenResult = {
          accessToken: cached.secret,
          tokenType: cached.tokenType,
          expiresIn: cached.expiresOn - now,
          scopes: [...cached.scopes],
        };
        const idToken = this.tokenCache.findIdToken(id);
        if (idToken) {
          result.idToken = idToken.secret;
          const claims = this.decodeClaims(idToken.secret);
          if (claims) {
            result.idTokenClaims = claims;
          }
        }
        return result;
      }
    }

    const refreshToken = this.tokenCache.findRefreshToken(id);
    if (!refreshToken) {
      return undefined;
    }

    const config = await this.getConfiguration();
    let tokens: GrantResponse;
    try {
      tokens = await client.refreshTokenGrant(config, refreshToken.secret, {
        scope: scopeParameter(scopes),
      });
    } catch (err) {
      const result = toAuthError(err);
      if (result) {
        this.logger.warn('Silent token refresh rejected by provider', { ...result });
        return undefined;
      }
      throw err;
    }

    const idTokenClaims = tokens.claims();
    const claims: IdTokenClaims | undefined = idTokenClaims ? { ...idTokenClaims } : undefined;
    return this.storeTokens(tokens, account, scopes, claims);
  }

  async getLogoutUrl(postLogoutRedirectUri: string): Promise<string> {
    const config = await this.getConfiguration();
    const parameters = { post_logout_redirect_uri: postLogoutRedirectUri };

    if (config.serverMetadata().end_session_endpoint) {
      return client.buildEndSessionUrl(config, parameters).href;
    }

    const logoutUrl = new URL(`${this.authority.replace(/\/+$/, '')}${FALLBACK_LOGOUT_PATH}`);
    logoutUrl.search = new URLSearchParams(parameters).toString();
    return logoutUrl.href;
  }

  // Claims of an ID token that was validated when it was issued
  private decodeClaims(idToken: string): IdTokenClaims | undefined {
    try {
      const claims = decodeJwt(idToken);
      return isIdTokenClaims(claims) ? claims : undefined;
    } catch (error) {
      this.logger.debug('Cached ID token is not a decodable JWT', {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private storeLogin(tokens: GrantResponse, requestedScopes: string[]): LoginTokenResult {
    const idTokenClaims = tokens.claims();
    if (!idTokenClaims) {
      throw new IdentityError('Token response did not include an ID token', 'MISSING_ID_TOKEN');
    }

    const claims: IdTokenClaims = { ...idTokenClaims };
    const account: CachedAccount = { homeAccountId: idTokenClaims.sub, environment: this.authority };
    const { preferred_username: username, name } = claims;
    if (typeof username === 'string') {
      account.username = username;
    }
    if (typeof name === 'string') {
      account.name = name;
    }

    const result = this.storeTokens(tokens, account, requestedScopes, claims);
    return { ...result, idTokenClaims: claims };
  }

  private storeTokens(
    tokens: GrantResponse,
    account: CachedAccount,
    requestedScopes: string[],
    claims: IdTokenClaims | undefined
  ): TokenResult {
    const scopes = tokens.scope ? normalizeScopes(tokens.scope.split(' ')) : normalizeScopes(requestedScopes);
    const expiresIn = tokens.expiresIn() ?? DEFAULT_EXPIRES_IN;

    this.tokenCache.add({
      account,
      scopes,
      accessToken: tokens.access_token,
      tokenType: tokens.token_type,
      expiresIn,
      refreshToken: tokens.refresh_token,
      idToken: tokens.id_token,
    });

    const result: TokenResult = {
      accessToken: tokens.access_token,
      tokenType: tokens.token_type,
      expiresIn,
      scopes,
    };
    if (tokens.id_token) {
      result.idToken = tokens.id_token;
    }
    if (claims) {
      result.idTokenClaims = claims;
    }
    return result;
  }
}
