/**
 * Session storage.
 *
 * Auth reads and writes the session through the SessionStore interface. For
 * cookie-backed sessions the whole record is carried in an encrypted JWT
 * (dir + A256GCM) so cached refresh tokens never reach the browser in clear.
 */

import { createHash } from 'node:crypto';
import { EncryptJWT, jwtDecrypt } from 'jose';
import { isRecord } from './types.js';

export type SessionData = Record<string, unknown>;

/**
 * Key-value store owned by the hosting framework. Values must survive
 * JSON serialization.
 */
export interface SessionStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  pop(key: string): unknown;
}

export interface SessionConfig {
  secret: string;
  issuer?: string; // Default: 'session-auth'
  expiresIn?: string; // Default: '24h'
}

const DEFAULT_ISSUER = 'session-auth';
const DATA_CLAIM = 'data';

/**
 * Longest value written to a single cookie. Browsers drop cookies over 4096
 * bytes, name and attributes included.
 */
export const COOKIE_CHUNK_SIZE = 3800;

export interface CookieWrite {
  name: string;
  value: string;
}

/** Cookies to set and cookies to expire for one sealed session value. */
export interface CookieWritePlan {
  set: CookieWrite[];
  clear: string[];
}

function chunkName(name: string, index: number): string {
  return `${name}.${index}`;
}

function isCookiePart(name: string, candidate: string): boolean {
  if (candidate === name) {
    return true;
  }
  return candidate.startsWith(`${name}.`) && /^\d+$/.test(candidate.slice(name.length + 1));
}

/**
 * Session cookie value from the request cookies: the cookie itself, or its
 * numbered chunks name.0, name.1, ... joined in order.
 */
export function readChunkedCookie(name: string, cookies: Record<string, unknown> | undefined): string | undefined {
  const whole = cookies?.[name];
  if (typeof whole === 'string' && whole) {
    return whole;
  }

  let value = '';
  for (let index = 0; ; index++) {
    const part = cookies?.[chunkName(name, index)];
    if (typeof part !== 'string' || !part) {
      break;
    }
    value += part;
  }
  return value || undefined;
}

/**
 * Splits a sealed session over as many cookies as it needs. Parts of the
 * previous value the new one does not overwrite are expired; an undefined
 * value expires them all.
 */
export function planCookieWrites(
  name: string,
  value: string | undefined,
  present: readonly string[],
  chunkSize: number = COOKIE_CHUNK_SIZE
): CookieWritePlan {
  const set: CookieWrite[] = [];
  if (value !== undefined && value.length <= chunkSize) {
    set.push({ name, value });
  } else if (value !== undefined) {
    for (let offset = 0; offset < value.length; offset += chunkSize) {
      set.push({ name: chunkName(name, set.length), value: value.slice(offset, offset + chunkSize) });
    }
  }

  const written = new Set(set.map((cookie) => cookie.name));
  const candidates = new Set([name, ...present.filter((cookie) => isCookiePart(name, cookie))]);
  const clear = [...candidates].filter((cookie) => !written.has(cookie));
  return { set, clear };
}

/**
 * SessionStore over an in-memory record that remembers whether it was modified.
 */
export class CookieSession implements SessionStore {
  private data: SessionData;
  private dirty = false;

  constructor(data: SessionData = {}) {
    this.data = { ...data };
  }

  get modified(): boolean {
    return this.dirty;
  }

  get isEmpty(): boolean {
    return Object.keys(this.data).length === 0;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
    this.dirty = true;
  }

  pop(key: string): unknown {
    if (!(key in this.data)) {
      return undefined;
    }
    const value = this.data[key];
    delete this.data[key];
    this.dirty = true;
    return value;
  }

  toJSON(): SessionData {
    return { ...this.data };
  }
}

/**
 * SessionStore over a mutable object, e.g. req.session from express-session.
 */
export function objectSession(target: Record<string, unknown>): SessionStore {
  return {
    get: (key) => target[key],
    set: (key, value) => {
      target[key] = value;
    },
    pop: (key) => {
      const value = target[key];
      delete target[key];
      return value;
    },
  };
}

function encryptionKey(secret: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(secret).digest());
}

/**
 * Encrypt a session record into a compact JWE.
 */
export async function sealSession(data: SessionData, config: SessionConfig): Promise<string> {
  return new EncryptJWT({ [DATA_CLAIM]: data })
    .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
    .setIssuedAt()
    .setExpirationTime(config.expiresIn || '24h')
    .setIssuer(config.issuer || DEFAULT_ISSUER)
    .encrypt(encryptionKey(config.secret));
}

/**
 * Decrypt a sealed session, or null if invalid/expired/foreign.
 */
export async function unsealSession(token: string, config: SessionConfig): Promise<SessionData | null> {
  try {
    const { payload } = await jwtDecrypt(token, encryptionKey(config.secret), {
      issuer: config.issuer || DEFAULT_ISSUER,
    });

    const data = payload[DATA_CLAIM];
    return isRecord(data) ? data : null;
  } catch {
    return null;
  }
}

/**
 * Session for one request, empty when the cookie is missing or unreadable.
 */
export async function loadCookieSession(
  token: string | undefined,
  config: SessionConfig
): Promise<CookieSession> {
  if (!token) {
    return new CookieSession();
  }
  const data = await unsealSession(token, config);
  return new CookieSession(data ?? {});
}
