import { describe, expect, it } from 'vitest';
import { Auth } from './auth.js';
import type { AuthOptions } from './auth.js';
import { TokenCacheError } from './errors.js';
import { silentLogger } from './logger.js';
import { CookieSession } from './session.js';
import { FAKE_AUTHORITY, FakeProvider } from './test-utils.js';
import { TokenCache } from './token-cache.js';

const REDIRECT_URI = 'https://app.example.test/auth/callback';

function setup(overrides: Partial<AuthOptions> = {}) {
  const provider = new FakeProvider();
  const session = new CookieSession();
  const auth = new Auth({
    session,
    authority: FAKE_AUTHORITY,
    clientId: 'test-client',
    clientCredential: 'test-secret',
    logger: silentLogger,
    createClient: provider.factory,
    ...overrides,
  });
  return { provider, session, auth };
}

async function logInAs(auth: Auth, scopes: string[] = ['User.Read']) {
  await auth.logIn({ scopes, redirectUri: REDIRECT_URI });
  return auth.completeLogIn({ code: 'test-code', state: 'test-state' });
}

describe('Auth', () => {
  describe('logIn', () => {
    it('starts an auth-code flow and stores it in the session', async () => {
      const { auth, session, provider } = setup();

      const result = await auth.logIn({ scopes: ['User.Read'], redirectUri: REDIRECT_URI });

      expect(new URL(result.authUri).searchParams.get('redirect_uri')).toBe(REDIRECT_URI);
      expect(result.userCode).toBeUndefined();
      expect(session.get(Auth.AUTH_FLOW)).toEqual({
        kind: 'auth_code',
        authUri: result.authUri,
        state: 'test-state',
        nonce: 'test-nonce',
        codeVerifier: 'test-verifier',
        redirectUri: REDIRECT_URI,
        scopes: ['User.Read'],
      });
      expect(provider.configs[0]?.clientCredential).toBeUndefined();
    });

    it('starts a device-code flow without a redirect URI', async () => {
      const { auth, session } = setup();

      const result = await auth.logIn({ scopes: ['User.Read'] });

      expect(result).toEqual({ authUri: `${FAKE_AUTHORITY}/device`, userCode: 'WDJB-MJHT' });
      expect(session.get(Auth.AUTH_FLOW)).toMatchObject({ kind: 'device_code', deviceCode: 'test-device-code' });
    });
  });

  describe('completeLogIn', () => {
    it('stores the user and token cache and clears the flow', async () => {
      const { auth, session, provider } = setup();

      const user = await logInAs(auth);

      expect(user).toMatchObject({ sub: 'user-1', preferred_username: 'johndoe' });
      expect(session.get(Auth.USER)).toEqual(user);
      expect(session.get(Auth.AUTH_FLOW)).toBeUndefined();
      expect(typeof session.get(Auth.TOKEN_CACHE)).toBe('string');
      expect(provider.configs[1]?.clientCredential).toBe('test-secret');
    });

    it('returns invalid_grant on a state mismatch instead of throwing', async () => {
      const { auth, session } = setup();
      await auth.logIn({ redirectUri: REDIRECT_URI });

      const result = await auth.completeLogIn({ code: 'test-code', state: 'forged' });

      expect(result).toEqual({
        error: 'invalid_grant',
        error_description: 'state mismatch: expected test-state, got forged',
      });
      expect(session.get(Auth.USER)).toBeUndefined();
      expect(session.get(Auth.AUTH_FLOW)).toMatchObject({ kind: 'auth_code' });
    });

    it('returns errors reported in the auth response', async () => {
      const { auth, session } = setup();
      await auth.logIn({ redirectUri: REDIRECT_URI });

      const result = await auth.completeLogIn({ error: 'access_denied', state: 'test-state' });

      expect(result).toEqual({ error: 'access_denied' });
      expect(session.get(Auth.USER)).toBeUndefined();
    });

    it('returns errors reported by the token endpoint', async () => {
      const { auth, provider } = setup();
      provider.grantError = { error: 'invalid_grant', error_description: 'code expired' };
      await auth.logIn({ redirectUri: REDIRECT_URI });

      await expect(auth.completeLogIn({ code: 'test-code', state: 'test-state' })).resolves.toEqual({
        error: 'invalid_grant',
        error_description: 'code expired',
      });
    });

    it('returns invalid_grant when no flow is in progress', async () => {
      const { auth } = setup();

      await expect(auth.completeLogIn({ code: 'test-code', state: 'test-state' })).resolves.toEqual({
        error: 'invalid_grant',
        error_description: 'no auth-code flow in progress',
      });
      await expect(auth.completeLogIn()).resolves.toEqual({
        error: 'invalid_grant',
        error_description: 'no device-code flow in progress',
      });
    });

    it('treats an empty auth response as the device-code flow', async () => {
      const { auth } = setup();
      await auth.logIn({ redirectUri: REDIRECT_URI });

      await expect(auth.completeLogIn({})).resolves.toEqual({
        error: 'invalid_grant',
        error_description: 'no device-code flow in progress',
      });
    });

    it('completes the device-code flow once the user signed in', async () => {
      const { auth, session, provider } = setup();
      await auth.logIn({ scopes: ['User.Read'] });

      provider.devicePending = true;
      await expect(auth.completeLogIn()).resolves.toEqual({
        error: 'authorization_pending',
        error_description: 'The user has not finished signing in',
      });
      expect(session.get(Auth.AUTH_FLOW)).toMatchObject({ kind: 'device_code' });

      provider.devicePending = false;
      await expect(auth.completeLogIn()).resolves.toMatchObject({ sub: 'user-1' });
      expect(session.get(Auth.AUTH_FLOW)).toBeUndefined();
      expect(provider.configs[2]?.clientCredential).toBeUndefined();
    });

    it('returns undefined when the new login fails validation', async () => {
      const { auth, session } = setup({ validators: [(claims) => claims.preferred_username === 'janedoe'] });

      await expect(logInAs(auth)).resolves.toBeUndefined();
      expect(session.get(Auth.USER)).toMatchObject({ sub: 'user-1' });
      expect(auth.getUser()).toBeUndefined();
    });
  });

  describe('getUser', () => {
    it('returns undefined before login', () => {
      const { auth } = setup();
      expect(auth.getUser()).toBeUndefined();
    });

    it('returns undefined for session values that are not claims', () => {
      const { auth, session } = setup();
      session.set(Auth.USER, 'user-1');
      expect(auth.getUser()).toBeUndefined();
      session.set(Auth.USER, { sub: 42 });
      expect(auth.getUser()).toBeUndefined();
    });

    it('applies explicit validators in place of the configured ones', async () => {
      const { auth } = setup({ validators: [() => false] });
      await logInAs(auth);

      expect(auth.getUser()).toBeUndefined();
      expect(auth.getUser([(claims) => claims.sub === 'user-1'])).toMatchObject({ sub: 'user-1' });
      expect(auth.getUser([])).toBeUndefined();
    });
  });

  describe('getToken', () => {
    it('returns undefined before login', async () => {
      const { auth } = setup();
      await expect(auth.getToken(['User.Read'])).resolves.toBeUndefined();
    });

    it('serves a cached access token without touching the session', async () => {
      const { auth, session } = setup();
      await logInAs(auth);
      const blob = session.get(Auth.TOKEN_CACHE);

      const token = await auth.getToken(['User.Read']);

      expect(token).toMatchObject({ accessToken: 'access-token-1', tokenType: 'bearer', scopes: ['user.read'] });
      expect(session.get(Auth.TOKEN_CACHE)).toBe(blob);
    });

    it('refreshes silently and saves the updated cache', async () => {
      const { auth, session } = setup();
      await logInAs(auth);

      const token = await auth.getToken(['User.Read'], { forceRefresh: true });

      expect(token?.accessToken).toBe('access-token-2');
      expect(String(session.get(Auth.TOKEN_CACHE))).toContain('access-token-2');
    });

    it('returns undefined when the provider refuses to refresh', async () => {
      const { auth, provider } = setup();
      await logInAs(auth);
      provider.refreshError = { error: 'invalid_grant' };

      await expect(auth.getToken(['Mail.Send'])).resolves.toBeUndefined();
    });

    it('returns undefined when the user fails validation', async () => {
      const { auth } = setup();
      await logInAs(auth);

      await expect(auth.getToken(['User.Read'], { validators: [() => false] })).resolves.toBeUndefined();
    });

    it('uses the cached account of the logged-in user', async () => {
      const { auth, session } = setup();
      await logInAs(auth);

      const cache = new TokenCache();
      for (const [homeAccountId, accessToken] of [['user-2', 'someone-else'], ['user-1', 'mine']]) {
        cache.add({
          account: { homeAccountId, environment: FAKE_AUTHORITY },
          scopes: ['User.Read'],
          accessToken,
          tokenType: 'bearer',
          expiresIn: 3600,
        });
      }
      session.set(Auth.TOKEN_CACHE, cache.serialize());

      await expect(auth.getToken(['User.Read'])).resolves.toMatchObject({ accessToken: 'mine' });
    });

    it('propagates a corrupt token cache', async () => {
      const { auth, session } = setup();
      await logInAs(auth);
      session.set(Auth.TOKEN_CACHE, '{"version":1}');

      await expect(auth.getToken(['User.Read'])).rejects.toBeInstanceOf(TokenCacheError);
    });
  });

  describe('logOut', () => {
    it('forgets the user and returns the provider log-out URL', async () => {
      const { auth, session } = setup();
      await logInAs(auth);

      const url = await auth.logOut('https://app.example.test/');

      expect(url).toBe(`${FAKE_AUTHORITY}/logout?post_logout_redirect_uri=https%3A%2F%2Fapp.example.test%2F`);
      expect(auth.getUser()).toBeUndefined();
      expect(session.get(Auth.TOKEN_CACHE)).toBeUndefined();
      await expect(auth.getToken(['User.Read'])).resolves.toBeUndefined();
    });
  });
});
