/**
 * Session cookie handling for Express.
 *
 * The whole session (flow state, token cache, user claims) travels in an
 * encrypted httpOnly cookie, split into numbered chunks (identity_session.0,
 * identity_session.1, ...) when it outgrows one. Reading it needs
 * cookie-parser in front.
 */

import type { Request, Response } from 'express';
import { Auth, loadCookieSession, planCookieWrites, readChunkedCookie, sealSession } from '@session-auth/core';
import type { AuthSettings, CookieSession, SessionConfig } from '@session-auth/core';

export const DEFAULT_COOKIE_NAME = 'identity_session';
const DEFAULT_MAX_AGE = 86400; // 24h

export interface SessionCookieOptions {
  /** Secret the session cookie is encrypted with */
  sessionSecret: string;
  /** Cookie name (default: 'identity_session') */
  cookieName?: string;
  /** Session lifetime in seconds (default: 86400) */
  sessionMaxAge?: number;
  /** Secure cookie flag (default: NODE_ENV === 'production') */
  secureCookie?: boolean;
}

/**
 * Per-request handle on the user's sign-in state.
 * Call save() after getToken() so a refreshed cache reaches the cookie.
 */
export interface RequestIdentity {
  auth: Auth;
  session: CookieSession;
  save(): Promise<void>;
}

export interface SessionCookies {
  read(req: Request): string | undefined;
  load(req: Request): Promise<CookieSession>;
  save(req: Request, res: Response, session: CookieSession): Promise<void>;
  identity(req: Request, res: Response, settings: AuthSettings): Promise<RequestIdentity>;
}

export function sessionCookies(opts: SessionCookieOptions): SessionCookies {
  const name = opts.cookieName || DEFAULT_COOKIE_NAME;
  const maxAge = opts.sessionMaxAge ?? DEFAULT_MAX_AGE;
  const secure = opts.secureCookie ?? process.env.NODE_ENV === 'production';
  const config: SessionConfig = { secret: opts.sessionSecret, expiresIn: `${maxAge}s` };

  function read(req: Request): string | undefined {
    return readChunkedCookie(name, req.cookies);
  }

  function load(req: Request): Promise<CookieSession> {
    return loadCookieSession(read(req), config);
  }

  async function save(req: Request, res: Response, session: CookieSession): Promise<void> {
    if (!session.modified) {
      return;
    }
    const token = session.isEmpty ? undefined : await sealSession(session.toJSON(), config);
    const plan = planCookieWrites(name, token, Object.keys(req.cookies ?? {}));

    for (const cookie of plan.set) {
      res.cookie(cookie.name, cookie.value, {
        httpOnly: true,
        secure,
        sameSite: 'lax',
        maxAge: maxAge * 1000, // Express uses milliseconds
        path: '/',
      });
    }
    for (const cookie of plan.clear) {
      res.clearCookie(cookie, { path: '/' });
    }
  }

  async function identity(req: Request, res: Response, settings: AuthSettings): Promise<RequestIdentity> {
    const session = await load(req);
    const auth = new Auth({ ...settings, session });
    return { auth, session, save: () => save(req, res, session) };
  }

  return { read, load, save, identity };
}
