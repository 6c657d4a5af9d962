/**
 * Auth façade
 *
 * Session-bound sign-in for one user session: starts and completes the
 * auth-code or device-code flow, keeps the token cache in the session, and
 * hands out the logged-in user's claims and access tokens.
 *
 * Cheap to construct. Build one per request around that request's session;
 * provider discovery is cached per process.
 */

import { z } from 'zod';
import { FlowStateError } from './errors.js';
import { IdentityClient } from './identity-client.js';
import type {
  DiscoveryCache,
  IdentityClientConfig,
  IdentityClientFactory,
  IdentityProviderClient,
} from './identity-client.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { SessionStore } from './session.js';
import { TokenCache } from './token-cache.js';
import { runValidators } from './validators.js';
import type { ClaimsValidator } from './validators.js';
import { isAuthError, isIdTokenClaims } from './types.js';
import type {
  AuthErrorResult,
  AuthFlow,
  AuthResponse,
  IdTokenClaims,
  LogInOptions,
  LogInResult,
  TokenGrantResult,
  TokenResult,
} from './types.js';

/** Everything Auth needs apart from the session. */
export interface AuthSettings {
  /** Provider issuer URL, e.g. https://login.example.com/tenant */
  authority: string;
  clientId: string;
  /** Client secret, used for the code exchange and silent refresh */
  clientCredential?: string;
  /** Run on every getUser() and getToken() */
  validators?: ClaimsValidator[];
  logger?: Logger;
  /** Builds the identity client; defaults to IdentityClient over openid-client */
  createClient?: IdentityClientFactory;
  discoveryCache?: DiscoveryCache;
  allowInsecureRequests?: boolean;
}

export interface AuthOptions extends AuthSettings {
  session: SessionStore;
}

export interface GetTokenOptions {
  /** Replace the configured validators for this call */
  validators?: ClaimsValidator[];
  /** Skip cached access tokens and use the refresh token */
  forceRefresh?: boolean;
}

const authCodeFlowSchema = z.object({
  kind: z.literal('auth_code'),
  authUri: z.string(),
  state: z.string(),
  nonce: z.string(),
  codeVerifier: z.string(),
  redirectUri: z.string(),
  scopes: z.array(z.string()),
});

const deviceCodeFlowSchema = z.object({
  kind: z.literal('device_code'),
  deviceCode: z.string(),
  userCode: z.string(),
  verificationUri: z.string(),
  verificationUriComplete: z.string().optional(),
  expiresAt: z.number(),
  interval: z.number(),
  scopes: z.array(z.string()),
});

const authFlowSchema = z.discriminatedUnion('kind', [authCodeFlowSchema, deviceCodeFlowSchema]);

function readFlow(value: unknown): AuthFlow | undefined {
  const parsed = authFlowSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function invalidGrant(description: string): AuthErrorResult {
  return { error: 'invalid_grant', error_description: description };
}

export class Auth {
  // Session keys, hopefully unique among whatever else the app keeps there
  static readonly TOKEN_CACHE = '_token_cache';
  static readonly AUTH_FLOW = '_auth_flow';
  static readonly USER = '_logged_in_user';

  private session: SessionStore;
  private authority: string;
  private clientId: string;
  private clientCredential?: string;
  private validators: ClaimsValidator[];
  private logger: Logger;
  private createClient: IdentityClientFactory;
  private discoveryCache?: DiscoveryCache;
  private allowInsecureRequests: boolean;

  constructor(options: AuthOptions) {
    this.session = options.session;
    this.authority = options.authority;
    this.clientId = options.clientId;
    this.clientCredential = options.clientCredential;
    this.validators = options.validators ?? [];
    this.logger = options.logger ?? createLogger('auth');
    this.createClient = options.createClient ?? ((config) => new IdentityClient(config));
    this.discoveryCache = options.discoveryCache;
    this.allowInsecureRequests = options.allowInsecureRequests ?? false;
  }

  private loadCache(): TokenCache {
    const cache = new TokenCache();
    const blob = this.session.get(Auth.TOKEN_CACHE);
    if (typeof blob === 'string' && blob) {
      cache.deserialize(blob);
    }
    return cache;
  }

  private saveCache(cache: TokenCache): void {
    if (cache.hasStateChanged) {
      this.session.set(Auth.TOKEN_CACHE, cache.serialize());
    }
  }

  // One token cache per session, so one client per cache
  private buildClient(clientCredential?: string, tokenCache?: TokenCache): IdentityProviderClient {
    const config: IdentityClientConfig = {
      authority: this.authority,
      clientId: this.clientId,
      clientCredential,
      tokenCache,
      allowInsecureRequests: this.allowInsecureRequests,
      logger: this.logger,
    };
    if (this.discoveryCache) {
      config.discoveryCache = this.discoveryCache;
    }
    return this.createClient(config);
  }

  /**
   * First leg. With a redirectUri the auth-code flow starts and the user is
   * sent to authUri; without one the device-code flow starts and the user
   * enters userCode at authUri.
   */
  async logIn(options: LogInOptions = {}): Promise<LogInResult> {
    const scopes = options.scopes ?? [];
    const client = this.buildClient();

    if (options.redirectUri) {
      const flow = await client.initiateAuthCodeFlow(scopes, {
        redirectUri: options.redirectUri,
        prompt: options.prompt,
        loginHint: options.loginHint,
        extraParameters: options.extraParameters,
      });
      this.session.set(Auth.AUTH_FLOW, flow);
      this.logger.debug('Auth-code flow started', { redirectUri: options.redirectUri, scopes });
      return { authUri: flow.authUri };
    }

    const flow = await client.initiateDeviceFlow(scopes, { extraParameters: options.extraParameters });
    this.session.set(Auth.AUTH_FLOW, flow);
    this.logger.debug('Device-code flow started', { scopes });
    return { authUri: flow.verificationUri, userCode: flow.userCode };
  }

  /**
   * Second leg. Pass the redirect's query parameters for the auth-code flow,
   * nothing for the device-code flow.
   *
   * Resolves to the validated user claims, to an AuthErrorResult when the
   * provider (or the flow state) rejected the login, or to undefined when
   * the new login fails the validators.
   */
  async completeLogIn(authResponse?: AuthResponse): Promise<IdTokenClaims | AuthErrorResult | undefined> {
    const cache = this.loadCache();
    const flow = readFlow(this.session.get(Auth.AUTH_FLOW));
    let result: TokenGrantResult;

    if (authResponse && Object.keys(authResponse).length > 0) {
      if (flow?.kind !== 'auth_code') {
        return invalidGrant('no auth-code flow in progress');
      }
      try {
        result = await this.buildClient(this.clientCredential, cache).acquireTokenByAuthCodeFlow(flow, authResponse);
      } catch (error) {
        if (error instanceof FlowStateError) {
          return invalidGrant(error.message);
        }
        throw error;
      }
    } else {
      if (flow?.kind !== 'device_code') {
        return invalidGrant('no device-code flow in progress');
      }
      result = await this.buildClient(undefined, cache).acquireTokenByDeviceFlow(flow);
    }

    if (isAuthError(result)) {
      this.logger.debug('Login rejected by provider', { ...result });
      return result;
    }

    // TODO: decide whether a re-login as a different account should be rejected
    this.session.set(Auth.USER, result.idTokenClaims);
    this.saveCache(cache);
    this.session.pop(Auth.AUTH_FLOW);
    return this.getUser();
  }

  /**
   * Claims of the logged-in user, or undefined when nobody is logged in or the
   * user no longer passes validation. Non-empty validators replace the
   * configured ones for this call.
   *
   * The claims carry at least sub, the user's stable identifier.
   */
  getUser(validators?: ClaimsValidator[]): IdTokenClaims | undefined {
    const claims = this.session.get(Auth.USER);
    if (!isIdTokenClaims(claims)) {
      return undefined;
    }
    const chain = validators && validators.length > 0 ? validators : this.validators;
    return runValidators(chain, claims) ? claims : undefined;
  }

  /**
   * Access token for the current user, from the cache or refreshed silently.
   * Undefined when the user fails validation or no token can be had silently.
   */
  async getToken(scopes: string[], options: GetTokenOptions = {}): Promise<TokenResult | undefined> {
    const user = this.getUser(options.validators);
    if (!user) {
      return undefined;
    }

    const cache = this.loadCache();
    const client = this.buildClient(this.clientCredential, cache);
    const accounts = client.getAccounts();
    const account = accounts.find((a) => a.homeAccountId === user.sub) ?? accounts[0];
    if (!account) {
      return undefined;
    }

    const result = await client.acquireTokenSilent(scopes, account, { forceRefresh: options.forceRefresh });
    this.saveCache(cache); // A refresh changes the cache
    return result;
  }

  /**
   * Forget the user in this app and return the provider's log-out URL.
   * Unless the user visits it they stay signed in at the provider and can
   * get back in without a prompt.
   */
  async logOut(homepage: string): Promise<string> {
    this.session.pop(Auth.USER);
    this.session.pop(Auth.TOKEN_CACHE);
    return this.buildClient().getLogoutUrl(homepage);
  }
}
