/**
 * Session cookie handling for Fastify. Needs @fastify/cookie, which the
 * identity plugin registers when the app has not. Sessions too large for one
 * cookie are split into numbered chunks.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import '@fastify/cookie';
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

export interface RequestIdentity {
  auth: Auth;
  session: CookieSession;
  /** Writes the session cookie if anything in the session changed */
  save(): Promise<void>;
}

export interface SessionCookies {
  read(request: FastifyRequest): string | undefined;
  save(request: FastifyRequest, reply: FastifyReply, session: CookieSession): Promise<void>;
  identity(request: FastifyRequest, reply: FastifyReply, settings: AuthSettings): Promise<RequestIdentity>;
}

export function sessionCookies(opts: SessionCookieOptions): SessionCookies {
  const name = opts.cookieName || DEFAULT_COOKIE_NAME;
  const maxAge = opts.sessionMaxAge ?? DEFAULT_MAX_AGE;
  const secure = opts.secureCookie ?? process.env.NODE_ENV === 'production';
  const config: SessionConfig = { secret: opts.sessionSecret, expiresIn: `${maxAge}s` };

  function read(request: FastifyRequest): string | undefined {
    return readChunkedCookie(name, request.cookies);
  }

  async function save(request: FastifyRequest, reply: FastifyReply, session: CookieSession): Promise<void> {
    if (!session.modified) {
      return;
    }
    const token = session.isEmpty ? undefined : await sealSession(session.toJSON(), config);
    const plan = planCookieWrites(name, token, Object.keys(request.cookies ?? {}));

    for (const cookie of plan.set) {
      reply.setCookie(cookie.name, cookie.value, {
        httpOnly: true,
        secure,
        sameSite: 'lax',
        maxAge, // @fastify/cookie uses seconds
        path: '/',
      });
    }
    for (const cookie of plan.clear) {
      reply.clearCookie(cookie, { path: '/' });
    }
  }

  async function identity(
    request: FastifyRequest,
    reply: FastifyReply,
    settings: AuthSettings
  ): Promise<RequestIdentity> {
    const session = await loadCookieSession(read(request), config);
    const auth = new Auth({ ...settings, session });
    return { auth, session, save: () => save(request, reply, session) };
  }

  return { read, save, identity };
}
