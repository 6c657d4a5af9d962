/**
 * Validators run against the logged-in user's claims on every getUser() and
 * getToken() call.
 *
 * The simplest validator is a function:
 *
 *   const onlyJohn = (claims: IdTokenClaims) => claims.preferred_username === 'johndoe';
 *
 * Subclass Validator when a failed check should throw an error of your own.
 */

import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { IdTokenClaims } from './types.js';

export type ValidatorFn = (claims: IdTokenClaims) => boolean;

export type ClaimsValidator = ValidatorFn | { validate(claims: IdTokenClaims): boolean };

/**
 * Thrown as-is when an instance, constructed with the claims when a class.
 */
export type ValidationFailure = Error | (new (claims: IdTokenClaims) => Error);

export interface ValidatorOptions {
  onError?: ValidationFailure;
}

export abstract class Validator {
  private onError?: ValidationFailure;

  constructor(options: ValidatorOptions = {}) {
    this.onError = options.onError;
  }

  abstract isValid(claims: IdTokenClaims): boolean;

  validate(claims: IdTokenClaims): boolean {
    const valid = this.isValid(claims);
    const onError = this.onError;
    if (!valid && onError !== undefined) {
      if (onError instanceof Error) {
        throw onError;
      }
      throw new onError(claims);
    }
    return valid;
  }
}

export interface LifespanValidatorOptions extends ValidatorOptions {
  /**
   * Lifespan of a login in seconds, counted from the ID token's iat.
   * When omitted the login lasts as long as the ID token (exp).
   */
  seconds?: number;
  /** Clock skew allowance in seconds (default: 210) */
  skew?: number;
  logger?: Logger;
}

const DEFAULT_SKEW_SECONDS = 210;

/**
 * Expires a login after a fixed time, independent of token refreshes.
 * Without it a user stays logged in until they log out.
 */
export class LifespanValidator extends Validator {
  private seconds?: number;
  private skew: number;
  private logger: Logger;

  constructor(options: LifespanValidatorOptions = {}) {
    super(options);
    this.seconds = options.seconds;
    this.skew = options.skew ?? DEFAULT_SKEW_SECONDS;
    this.logger = options.logger ?? createLogger('lifespan-validator');
  }

  isValid(claims: IdTokenClaims): boolean {
    const now = Date.now() / 1000;
    this.logger.debug('Checking login lifespan', { now, iat: claims.iat, exp: claims.exp, skew: this.skew });

    const expiresAt = this.seconds === undefined
      ? claims.exp
      : claims.iat === undefined ? undefined : claims.iat + this.seconds;
    if (typeof expiresAt !== 'number') {
      return false;
    }
    return now < this.skew + expiresAt;
  }
}

export function runValidator(validator: ClaimsValidator, claims: IdTokenClaims): boolean {
  return typeof validator === 'function' ? validator(claims) : validator.validate(claims);
}

/**
 * True when every validator accepts the claims. Stops at the first failure.
 */
export function runValidators(validators: readonly ClaimsValidator[], claims: IdTokenClaims): boolean {
  return validators.every((validator) => runValidator(validator, claims));
}
