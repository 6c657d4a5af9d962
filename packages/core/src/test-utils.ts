/**
 * In-process stand-in for an identity provider, for tests of Auth and the
 * framework adapters. Plug it in through the createClient option.
 */

import { FlowStateError } from './errors.js';
import type {
  AuthCodeFlowOptions,
  IdentityClientConfig,
  IdentityClientFactory,
  IdentityProviderClient,
  SilentTokenOptions,
} from './identity-client.js';
import { TokenCache } from './token-cache.js';
import type { CachedAccount } from './token-cache.js';
import type {
  AuthCodeFlow,
  AuthErrorResult,
  AuthResponse,
  DeviceCodeFlow,
  IdTokenClaims,
  TokenGrantResult,
  TokenResult,
} from './types.js';

export const FAKE_AUTHORITY = 'https://login.example.test/tenant';

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export class FakeProvider {
  /** Config of every client built through factory, in order */
  readonly configs: IdentityClientConfig[] = [];
  /** Claim overrides applied to every issued ID token */
  claims: IdTokenClaims = {};
  /** Returned by the next code or device grant instead of tokens */
  grantError?: AuthErrorResult;
  /** Returned by refresh grants instead of tokens */
  refreshError?: AuthErrorResult;
  /** Device grant answers authorization_pending while set */
  devicePending = false;
  /** Access tokens issued so far */
  issued = 0;
  /** Minimum length of issued tokens; real provider tokens run to 1-2 KB each */
  tokenSize = 0;

  readonly factory: IdentityClientFactory = (config) => {
    this.configs.push(config);
    return new FakeIdentityClient(this, config);
  };

  issueClaims(): IdTokenClaims {
    const now = nowSeconds();
    return {
      iss: FAKE_AUTHORITY,
      aud: 'test-client',
      sub: 'user-1',
      preferred_username: 'johndoe',
      name: 'John Doe',
      iat: now,
      exp: now + 3600,
      ...this.claims,
    };
  }

  nextAccessToken(): string {
    this.issued += 1;
    return this.padded(`access-token-${this.issued}`);
  }

  padded(token: string): string {
    return token.length < this.tokenSize ? `${token}.${'x'.repeat(this.tokenSize - token.length - 1)}` : token;
  }
}

export class FakeIdentityClient implements IdentityProviderClient {
  private tokenCache: TokenCache;

  constructor(
    private provider: FakeProvider,
    private config: IdentityClientConfig
  ) {
    this.tokenCache = config.tokenCache ?? new TokenCache();
  }

  async initiateAuthCodeFlow(scopes: string[], options: AuthCodeFlowOptions): Promise<AuthCodeFlow> {
    const authUri = new URL(`${this.config.authority}/authorize`);
    authUri.searchParams.set('client_id', this.config.clientId);
    authUri.searchParams.set('redirect_uri', options.redirectUri);
    authUri.searchParams.set('state', 'test-state');
    return {
      kind: 'auth_code',
      authUri: authUri.href,
      state: 'test-state',
      nonce: 'test-nonce',
      codeVerifier: 'test-verifier',
      redirectUri: options.redirectUri,
      scopes: [...scopes],
    };
  }

  async initiateDeviceFlow(scopes: string[]): Promise<DeviceCodeFlow> {
    return {
      kind: 'device_code',
      deviceCode: 'test-device-code',
      userCode: 'WDJB-MJHT',
      verificationUri: `${this.config.authority}/device`,
      expiresAt: nowSeconds() + 900,
      interval: 5,
      scopes: [...scopes],
    };
  }

  async acquireTokenByAuthCodeFlow(flow: AuthCodeFlow, response: AuthResponse): Promise<TokenGrantResult> {
    if (response.state !== flow.state) {
      throw new FlowStateError(`state mismatch: expected ${flow.state}, got ${String(response.state)}`);
    }
    if (typeof response.error === 'string') {
      return { error: response.error };
    }
    return this.grant(flow.scopes);
  }

  async acquireTokenByDeviceFlow(flow: DeviceCodeFlow): Promise<TokenGrantResult> {
    if (this.provider.devicePending) {
      return { error: 'authorization_pending', error_description: 'The user has not finished signing in' };
    }
    return this.grant(flow.scopes);
  }

  getAccounts(): CachedAccount[] {
    return this.tokenCache.getAccounts();
  }

  async acquireTokenSilent(
    scopes: string[],
    account: CachedAccount,
    options: SilentTokenOptions = {}
  ): Promise<TokenResult | undefined> {
    if (!options.forceRefresh) {
      const cached = this.tokenCache.findAccessToken(account.homeAccountId, scopes);
      if (cached) {
        return {
          accessToken: cached.secret,
          tokenType: cached.tokenType,
          expiresIn: cached.expiresOn - nowSeconds(),
          scopes: cached.scopes,
        };
      }
    }
    if (!this.tokenCache.findRefreshToken(account.homeAccountId) || this.provider.refreshError) {
      return undefined;
    }

    const accessToken = this.provider.nextAccessToken();
    this.tokenCache.add({
      account,
      scopes,
      accessToken,
      tokenType: 'bearer',
      expiresIn: 3600,
      refreshToken: this.provider.padded(`refresh-token-${this.provider.issued}`),
    });
    return { accessToken, tokenType: 'bearer', expiresIn: 3600, scopes };
  }

  async getLogoutUrl(postLogoutRedirectUri: string): Promise<string> {
    const url = new URL(`${this.config.authority}/logout`);
    url.searchParams.set('post_logout_redirect_uri', postLogoutRedirectUri);
    return url.href;
  }

  private grant(scopes: string[]): TokenGrantResult {
    if (this.provider.grantError) {
      return this.provider.grantError;
    }

    const claims = this.provider.issueClaims();
    const accessToken = this.provider.nextAccessToken();
    const idToken = this.provider.padded('test-id-token');
    this.tokenCache.add({
      account: { homeAccountId: String(claims.sub), environment: this.config.authority },
      scopes,
      accessToken,
      tokenType: 'bearer',
      expiresIn: 3600,
      refreshToken: this.provider.padded(`refresh-token-${this.provider.issued}`),
      idToken,
    });
    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn: 3600,
      scopes,
      idToken,
      idTokenClaims: claims,
    };
  }
}
