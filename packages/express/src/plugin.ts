/**
 * Express router for session-bound OIDC sign-in.
 *
 * Returns an Express Router with auth routes (/login, /callback, /device,
 * /me, /logout). Flow state, token cache and the signed-in user live in one
 * encrypted httpOnly session cookie.
 *
 * Without a callbackUrl the router runs the device-code flow: GET /login
 * returns the verification URI and user code as JSON, and the client polls
 * POST /device until the user has signed in.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import cookieParser from 'cookie-parser';
import { createLogger, isAuthError } from '@session-auth/core';
import type { AuthSettings } from '@session-auth/core';
import { sessionCookies } from './session.js';
import type { SessionCookieOptions } from './session.js';

export interface IdentityRouterOptions extends AuthSettings, SessionCookieOptions {
  /** Full callback URL (e.g., https://app.example.com/auth/callback); omit for the device-code flow */
  callbackUrl?: string;
  /** Frontend URL for redirects after login/logout */
  frontendUrl: string;
  /** Scopes requested at sign-in, on top of openid, profile and offline_access */
  scopes?: string[];
  /** Where to redirect after successful login (default: frontendUrl + '/dashboard') */
  postLoginPath?: string;
  /** Where the provider redirects after logout (default: frontendUrl + '/login') */
  postLogoutPath?: string;
}

export function createIdentityRouter(opts: IdentityRouterOptions): Router {
  const router = Router();
  const logger = opts.logger ?? createLogger('express');
  const settings: IdentityRouterOptions = { ...opts, logger };
  const sessions = sessionCookies(opts);

  const loginPage = `${opts.frontendUrl}/login`;
  const postLoginRedirect = `${opts.frontendUrl}${opts.postLoginPath ?? '/dashboard'}`;
  const postLogoutRedirect = `${opts.frontendUrl}${opts.postLogoutPath ?? '/login'}`;

  router.use(cookieParser());

  // ------------------------------------------------------------------
  // GET /login — Start sign-in: redirect to the provider, or hand out a device code
  // ------------------------------------------------------------------
  router.get('/login', async (req: Request, res: Response) => {
    try {
      const { auth, save } = await sessions.identity(req, res, settings);
      const result = await auth.logIn({ scopes: opts.scopes, redirectUri: opts.callbackUrl });
      await save();

      if (!opts.callbackUrl) {
        res.json(result);
        return;
      }
      res.redirect(result.authUri);
    } catch (error) {
      logger.error('Login redirect failed', error);
      res.redirect(`${loginPage}?error=login_failed`);
    }
  });

  // ------------------------------------------------------------------
  // GET /callback — Finish the auth-code flow
  // ------------------------------------------------------------------
  router.get('/callback', async (req: Request, res: Response) => {
    try {
      const { auth, save } = await sessions.identity(req, res, settings);
      const result = await auth.completeLogIn(req.query);
      await save();

      if (isAuthError(result)) {
        logger.warn('Login rejected', { error: result.error, description: result.error_description });
        res.redirect(`${loginPage}?error=${encodeURIComponent(result.error)}`);
        return;
      }
      if (!result) {
        res.redirect(`${loginPage}?error=not_authorized`);
        return;
      }
      res.redirect(postLoginRedirect);
    } catch (error) {
      logger.error('OIDC callback failed', error);
      res.redirect(`${loginPage}?error=callback_failed`);
    }
  });

  // ------------------------------------------------------------------
  // POST /device — Poll the device-code flow
  // ------------------------------------------------------------------
  router.post('/device', async (req: Request, res: Response) => {
    try {
      const { auth, save } = await sessions.identity(req, res, settings);
      const result = await auth.completeLogIn();
      await save();

      if (isAuthError(result)) {
        res.status(400).json({ error: { code: result.error, message: result.error_description ?? result.error } });
        return;
      }
      if (!result) {
        res.status(403).json({ error: { code: 'NOT_AUTHORIZED', message: 'User is not authorized' } });
        return;
      }
      res.json({ user: result });
    } catch (error) {
      logger.error('Device login failed', error);
      res.status(500).json({ error: { code: 'DEVICE_LOGIN_FAILED', message: 'Device login failed' } });
    }
  });

  // ------------------------------------------------------------------
  // GET /me — Return the signed-in user's claims
  // ------------------------------------------------------------------
  router.get('/me', async (req: Request, res: Response) => {
    try {
      const { auth } = await sessions.identity(req, res, settings);
      const user = auth.getUser();
      if (!user) {
        res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'Not authenticated' } });
        return;
      }
      res.json({ user });
    } catch (error) {
      logger.error('Reading the session user failed', error);
      res.status(500).json({ error: { code: 'SESSION_ERROR', message: 'Could not read session' } });
    }
  });

  async function logOut(req: Request, res: Response): Promise<string> {
    const { auth, save } = await sessions.identity(req, res, settings);
    const logoutUrl = await auth.logOut(postLogoutRedirect);
    await save();
    return logoutUrl;
  }

  // ------------------------------------------------------------------
  // POST /logout — Forget the user, return the provider logout URL (for SPAs)
  // ------------------------------------------------------------------
  router.post('/logout', async (req: Request, res: Response) => {
    try {
      res.json({ success: true, logoutUrl: await logOut(req, res) });
    } catch (error) {
      logger.error('Logout failed', error);
      res.status(500).json({ error: { code: 'LOGOUT_FAILED', message: 'Logout failed' } });
    }
  });

  // ------------------------------------------------------------------
  // GET /logout — Forget the user, redirect to the provider logout (for MPA/links)
  // ------------------------------------------------------------------
  router.get('/logout', async (req: Request, res: Response) => {
    try {
      res.redirect(await logOut(req, res));
    } catch (error) {
      logger.error('Logout failed', error);
      res.redirect(postLogoutRedirect);
    }
  });

  return router;
}
