/**
 * requireAuth() preHandler for Fastify routes.
 *
 * Reads the session cookie written by the identity plugin, checks the
 * signed-in user against the validators and attaches the claims to
 * request.user and the per-request Auth handle to request.identity.
 *
 * Usage:
 *   import { identityPlugin, requireAuth } from '@session-auth/fastify';
 *
 *   await app.register(identityPlugin, options);
 *   const auth = requireAuth(options);
 *   app.get('/api/protected', { preHandler: [auth] }, handler);
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { AuthSettings, IdTokenClaims } from '@session-auth/core';
import { sessionCookies } from './session.js';
import type { RequestIdentity, SessionCookieOptions } from './session.js';

export interface RequireAuthOptions extends AuthSettings, SessionCookieOptions {}

declare module 'fastify' {
  interface FastifyRequest {
    user?: IdTokenClaims;
    identity?: RequestIdentity;
  }
}

/**
 * Creates a Fastify preHandler that admits requests with a valid signed-in user.
 * Errors thrown by validators reach the Fastify error handler.
 */
export function requireAuth(opts: RequireAuthOptions) {
  const sessions = sessionCookies(opts);

  return async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    if (!sessions.read(request)) {
      await reply.status(401).send({
        error: { code: 'AUTH_MISSING_SESSION', message: 'Authentication session is required' },
      });
      return;
    }

    const identity = await sessions.identity(request, reply, opts);
    const user = identity.auth.getUser();
    if (!user) {
      await reply.status(401).send({
        error: { code: 'AUTH_INVALID_SESSION', message: 'Invalid or expired session' },
      });
      return;
    }

    request.user = user;
    request.identity = identity;
  };
}
