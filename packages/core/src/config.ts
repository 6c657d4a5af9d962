/**
 * Environment configuration.
 *
 *   IDENTITY_AUTHORITY         provider issuer URL (required)
 *   IDENTITY_CLIENT_ID         client id (required)
 *   IDENTITY_CLIENT_SECRET     client secret; public client when unset
 *   IDENTITY_REDIRECT_URI      callback URL; device-code flow when unset
 *   IDENTITY_SCOPES            space- or comma-separated scopes
 *   IDENTITY_SESSION_SECRET    session encryption secret (16+ chars, required)
 *   IDENTITY_SESSION_LIFESPAN  max login age in seconds
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LifespanValidator } from './validators.js';
import type { ClaimsValidator } from './validators.js';

// Blank variables count as unset
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredString = z.preprocess(blankAsUndefined, z.string().trim().min(1));
const optionalString = z.preprocess(blankAsUndefined, z.string().trim().min(1).optional());
const optionalUrl = z.preprocess(blankAsUndefined, z.string().trim().url().optional());

const envSchema = z.object({
  IDENTITY_AUTHORITY: z.preprocess(blankAsUndefined, z.string().trim().url()),
  IDENTITY_CLIENT_ID: requiredString,
  IDENTITY_CLIENT_SECRET: optionalString,
  IDENTITY_REDIRECT_URI: optionalUrl,
  IDENTITY_SCOPES: optionalString,
  IDENTITY_SESSION_SECRET: z.preprocess(
    blankAsUndefined,
    z.string().min(16, 'must be at least 16 characters')
  ),
  IDENTITY_SESSION_LIFESPAN: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
});

export interface AuthConfig {
  authority: string;
  clientId: string;
  clientCredential?: string;
  redirectUri?: string;
  scopes: string[];
  sessionSecret: string;
  /** Seconds a login stays valid, regardless of token refreshes */
  sessionLifespan?: number;
}

export function loadAuthConfig(env: Record<string, string | undefined> = process.env): AuthConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment (${issues.join('; ')})`, issues);
  }

  const vars = parsed.data;
  const config: AuthConfig = {
    authority: vars.IDENTITY_AUTHORITY,
    clientId: vars.IDENTITY_CLIENT_ID,
    scopes: vars.IDENTITY_SCOPES ? vars.IDENTITY_SCOPES.split(/[\s,]+/).filter(Boolean) : [],
    sessionSecret: vars.IDENTITY_SESSION_SECRET,
  };
  if (vars.IDENTITY_CLIENT_SECRET) {
    config.clientCredential = vars.IDENTITY_CLIENT_SECRET;
  }
  if (vars.IDENTITY_REDIRECT_URI) {
    config.redirectUri = vars.IDENTITY_REDIRECT_URI;
  }
  if (vars.IDENTITY_SESSION_LIFESPAN !== undefined) {
    config.sessionLifespan = vars.IDENTITY_SESSION_LIFESPAN;
  }
  return config;
}

export function validatorsFromConfig(config: AuthConfig): ClaimsValidator[] {
  return config.sessionLifespan === undefined ? [] : [new LifespanValidator({ seconds: config.sessionLifespan })];
}
