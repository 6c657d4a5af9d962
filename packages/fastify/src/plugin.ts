/**
 * Fastify plugin for session-bound OIDC sign-in.
 *
 * Registers auth routes (/auth/login, /auth/callback, /auth/device, /auth/me,
 * /auth/logout) with the flow state, token cache and signed-in user kept in
 * one encrypted httpOnly session cookie.
 *
 * Without a callbackUrl the plugin runs the device-code flow: GET /auth/login
 * returns the verification URI and user code, and the client polls
 * POST /auth/device until the user has signed in.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import fastifyCookie from '@fastify/cookie';
import { createLogger, isAuthError } from '@session-auth/core';
import type { AuthSettings } from '@session-auth/core';
import { sessionCookies } from './session.js';
import type { SessionCookieOptions } from './session.js';

export interface IdentityPluginOptions extends AuthSettings, SessionCookieOptions {
  /** Full callback URL (e.g., https://app.example.com/auth/callback); omit for the device-code flow */
  callbackUrl?: string;
  /** Frontend URL for redirects after login/logout */
  frontendUrl: string;
  /** Scopes requested at sign-in, on top of openid, profile and offline_access */
  scopes?: string[];
  /** Prefix of the auth routes (default: '/auth') */
  routePrefix?: string;
  /** Where to redirect after successful login (default: frontendUrl + '/dashboard') */
  postLoginPath?: string;
  /** Where the provider redirects after logout (default: frontendUrl + '/login') */
  postLogoutPath?: string;
}

interface CallbackRoute {
  Querystring: Record<string, string | string[]>;
}

async function identityPluginImpl(app: FastifyInstance, opts: IdentityPluginOptions): Promise<void> {
  if (!app.hasReplyDecorator('setCookie')) {
    await app.register(fastifyCookie);
  }

  const logger = opts.logger ?? createLogger('fastify');
  const settings: IdentityPluginOptions = { ...opts, logger };
  const sessions = sessionCookies(opts);
  const prefix = opts.routePrefix ?? '/auth';

  const loginPage = `${opts.frontendUrl}/login`;
  const postLoginRedirect = `${opts.frontendUrl}${opts.postLoginPath ?? '/dashboard'}`;
  const postLogoutRedirect = `${opts.frontendUrl}${opts.postLogoutPath ?? '/login'}`;

  app.get(`${prefix}/login`, async (request, reply) => {
    try {
      const { auth, save } = await sessions.identity(request, reply, settings);
      const result = await auth.logIn({ scopes: opts.scopes, redirectUri: opts.callbackUrl });
      await save();

      if (!opts.callbackUrl) {
        return reply.send(result);
      }
      return reply.redirect(result.authUri);
    } catch (error) {
      logger.error('Login redirect failed', error);
      return reply.redirect(`${loginPage}?error=login_failed`);
    }
  });

  app.get<CallbackRoute>(`${prefix}/callback`, async (request, reply) => {
    try {
      const { auth, save } = await sessions.identity(request, reply, settings);
      const result = await auth.completeLogIn(request.query);
      await save();

      if (isAuthError(result)) {
        logger.warn('Login rejected', { error: result.error, description: result.error_description });
        return reply.redirect(`${loginPage}?error=${encodeURIComponent(result.error)}`);
      }
      if (!result) {
        return reply.redirect(`${loginPage}?error=not_authorized`);
      }
      return reply.redirect(postLoginRedirect);
    } catch (error) {
      logger.error('OIDC callback failed', error);
      return reply.redirect(`${loginPage}?error=callback_failed`);
    }
  });

  app.post(`${prefix}/device`, async (request, reply) => {
    try {
      const { auth, save } = await sessions.identity(request, reply, settings);
      const result = await auth.completeLogIn();
      await save();

      if (isAuthError(result)) {
        return reply
          .status(400)
          .send({ error: { code: result.error, message: result.error_description ?? result.error } });
      }
      if (!result) {
        return reply.status(403).send({ error: { code: 'NOT_AUTHORIZED', message: 'User is not authorized' } });
      }
      return reply.send({ user: result });
    } catch (error) {
      logger.error('Device login failed', error);
      return reply.status(500).send({ error: { code: 'DEVICE_LOGIN_FAILED', message: 'Device login failed' } });
    }
  });

  app.get(`${prefix}/me`, async (request, reply) => {
    try {
      const { auth } = await sessions.identity(request, reply, settings);
      const user = auth.getUser();
      if (!user) {
        return reply.status(401).send({ error: { code: 'UNAUTHORIZED', message: 'Not authenticated' } });
      }
      return reply.send({ user });
    } catch (error) {
      logger.error('Reading the session user failed', error);
      return reply.status(500).send({ error: { code: 'SESSION_ERROR', message: 'Could not read session' } });
    }
  });

  async function logOut(request: FastifyRequest, reply: FastifyReply): Promise<string> {
    const { auth, save } = await sessions.identity(request, reply, settings);
    const logoutUrl = await auth.logOut(postLogoutRedirect);
    await save();
    return logoutUrl;
  }

  // For SPAs
  app.post(`${prefix}/logout`, async (request, reply) => {
    try {
      return reply.send({ success: true, logoutUrl: await logOut(request, reply) });
    } catch (error) {
      logger.error('Logout failed', error);
      return reply.status(500).send({ error: { code: 'LOGOUT_FAILED', message: 'Logout failed' } });
    }
  });

  // For MPA/links
  app.get(`${prefix}/logout`, async (request, reply) => {
    try {
      return reply.redirect(await logOut(request, reply));
    } catch (error) {
      logger.error('Logout failed', error);
      return reply.redirect(postLogoutRedirect);
    }
  });
}

export const identityPlugin = fp(identityPluginImpl, {
  name: 'session-auth',
  fastify: '4.x',
});
