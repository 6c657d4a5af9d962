/**
 * Error classes raised by the library itself.
 *
 * Provider-reported OAuth errors are not thrown: they come back as
 * AuthErrorResult values (see types.ts). Errors from openid-client propagate
 * as the library raises them.
 */

export class IdentityError extends Error {
  constructor(
    message: string,
    public code: string = 'IDENTITY_ERROR'
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The auth response does not belong to the flow stored in the session.
 * Usually a CSRF attempt or a stale browser tab.
 */
export class FlowStateError extends IdentityError {
  constructor(message: string) {
    super(message, 'FLOW_STATE_ERROR');
  }
}

export class TokenCacheError extends IdentityError {
  constructor(message: string) {
    super(`Token cache error: ${message}`, 'TOKEN_CACHE_ERROR');
  }
}

export class ConfigurationError extends IdentityError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(`Configuration error: ${message}`, 'CONFIGURATION_ERROR');
  }
}
