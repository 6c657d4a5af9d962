/**
 * requireAuth() middleware for Express routes.
 *
 * Reads the session cookie written by the identity router, checks the
 * signed-in user against the validators and attaches the claims to req.user
 * and the per-request Auth handle to req.identity.
 *
 * Usage:
 *   import cookieParser from 'cookie-parser';
 *   import { requireAuth } from '@session-auth/express';
 *
 *   app.use(cookieParser());
 *   const auth = requireAuth({ authority, clientId, sessionSecret: config.SESSION_SECRET });
 *   app.get('/api/protected', auth, async (req, res) => {
 *     const token = await req.identity?.auth.getToken(['User.Read']);
 *     await req.identity?.save();
 *     ...
 *   });
 */

import type { Request, Response, NextFunction } from 'express';
import type { AuthSettings, IdTokenClaims } from '@session-auth/core';
import { sessionCookies } from './session.js';
import type { RequestIdentity, SessionCookieOptions } from './session.js';

export interface RequireAuthOptions extends AuthSettings, SessionCookieOptions {}

// Extend Express Request to include the signed-in user
declare global {
  namespace Express {
    interface Request {
      user?: IdTokenClaims;
      identity?: RequestIdentity;
    }
  }
}

/**
 * Creates Express middleware that admits requests with a valid signed-in user.
 * Errors thrown by validators go to the Express error handler.
 */
export function requireAuth(opts: RequireAuthOptions) {
  const sessions = sessionCookies(opts);

  return async function authenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (!sessions.read(req)) {
      res.status(401).json({
        error: { code: 'AUTH_MISSING_SESSION', message: 'Authentication session is required' },
      });
      return;
    }

    try {
      const identity = await sessions.identity(req, res, opts);
      const user = identity.auth.getUser();
      if (!user) {
        res.status(401).json({
          error: { code: 'AUTH_INVALID_SESSION', message: 'Invalid or expired session' },
        });
        return;
      }

      req.user = user;
      req.identity = identity;
      next();
    } catch (error) {
      next(error);
    }
  };
}
