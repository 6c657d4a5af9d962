/**
 * Serializable token cache.
 *
 * One cache per user session. The Auth façade only deserializes it from the
 * session and writes it back when hasStateChanged is set; the identity client
 * is the one reading and adding tokens.
 */

import { z } from 'zod';
import { TokenCacheError } from './errors.js';

/**
 * Scopes that are requested on every flow and never identify an access token.
 */
export const RESERVED_SCOPES = ['openid', 'profile', 'offline_access'] as const;

/** Access tokens this close to expiry are not served from the cache. */
const EXPIRY_BUFFER_SECONDS = 300;

const CACHE_VERSION = 1;

const accountSchema = z.object({
  homeAccountId: z.string(),
  environment: z.string(),
  username: z.string().optional(),
  name: z.string().optional(),
});

const accessTokenSchema = z.object({
  homeAccountId: z.string(),
  secret: z.string(),
  tokenType: z.string(),
  scopes: z.array(z.string()),
  /** Epoch seconds */
  expiresOn: z.number(),
  cachedAt: z.number(),
});

const refreshTokenSchema = z.object({
  homeAccountId: z.string(),
  secret: z.string(),
});

// Raw token only; the claims are kept once, as the session user
const idTokenSchema = z.object({
  homeAccountId: z.string(),
  secret: z.string(),
});

const cacheSchema = z.object({
  version: z.literal(CACHE_VERSION),
  accounts: z.array(accountSchema),
  accessTokens: z.array(accessTokenSchema),
  refreshTokens: z.array(refreshTokenSchema),
  idTokens: z.array(idTokenSchema),
});

export type CachedAccount = z.infer<typeof accountSchema>;
export type CachedAccessToken = z.infer<typeof accessTokenSchema>;
export type CachedRefreshToken = z.infer<typeof refreshTokenSchema>;

export type CachedIdToken = z.infer<typeof idTokenSchema>;

type CacheState = z.infer<typeof cacheSchema>;

export interface TokenCacheEntry {
  account: CachedAccount;
  scopes: string[];
  accessToken: string;
  tokenType: string;
  expiresIn: number;
  refreshToken?: string;
  idToken?: string;
}

/**
 * Lowercased, de-duplicated scopes without the reserved ones.
 */
export function normalizeScopes(scopes: readonly string[]): string[] {
  const reserved = new Set<string>(RESERVED_SCOPES);
  const result: string[] = [];
  for (const scope of scopes) {
    const value = scope.trim().toLowerCase();
    if (value && !reserved.has(value) && !result.includes(value)) {
      result.push(value);
    }
  }
  return result;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function emptyState(): CacheState {
  return { version: CACHE_VERSION, accounts: [], accessTokens: [], refreshTokens: [], idTokens: [] };
}

export class TokenCache {
  private state: CacheState = emptyState();
  private changed = false;

  /** Set whenever the cache content changed since it was created or deserialized. */
  get hasStateChanged(): boolean {
    return this.changed;
  }

  serialize(): string {
    return JSON.stringify(this.state);
  }

  deserialize(blob: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(blob);
    } catch (error) {
      throw new TokenCacheError(error instanceof Error ? error.message : 'invalid JSON');
    }

    const result = cacheSchema.safeParse(parsed);
    if (!result.success) {
      throw new TokenCacheError(result.error.issues.map((issue) => issue.message).join('; '));
    }

    this.state = result.data;
    this.changed = false;
  }

  add(entry: TokenCacheEntry, now: number = nowSeconds()): void {
    const { account } = entry;
    const id = account.homeAccountId;
    const scopes = normalizeScopes(entry.scopes);

    this.state.accounts = [...this.state.accounts.filter((a) => a.homeAccountId !== id), { ...account }];

    // A fresh token supersedes the account's expired tokens and any token
    // sharing one of its scopes; tokens with no scopes besides the reserved
    // ones supersede each other
    const superseded = (token: CachedAccessToken): boolean =>
      token.expiresOn <= now ||
      token.scopes.some((scope) => scopes.includes(scope)) ||
      (scopes.length === 0 && token.scopes.length === 0);
    this.state.accessTokens = this.state.accessTokens.filter(
      (token) => token.homeAccountId !== id || !superseded(token)
    );
    this.state.accessTokens.push({
      homeAccountId: id,
      secret: entry.accessToken,
      tokenType: entry.tokenType,
      scopes,
      expiresOn: now + entry.expiresIn,
      cachedAt: now,
    });

    if (entry.refreshToken) {
      this.state.refreshTokens = [
        ...this.state.refreshTokens.filter((token) => token.homeAccountId !== id),
        { homeAccountId: id, secret: entry.refreshToken },
      ];
    }

    if (entry.idToken) {
      this.state.idTokens = [
        ...this.state.idTokens.filter((token) => token.homeAccountId !== id),
        { homeAccountId: id, secret: entry.idToken },
      ];
    }

    this.changed = true;
  }

  getAccounts(): CachedAccount[] {
    return this.state.accounts.map((account) => ({ ...account }));
  }

  /**
   * First unexpired access token of the account covering every requested scope.
   */
  findAccessToken(
    homeAccountId: string,
    scopes: readonly string[],
    now: number = nowSeconds()
  ): CachedAccessToken | undefined {
    const wanted = normalizeScopes(scopes);
    return this.state.accessTokens.find(
      (token) =>
        token.homeAccountId === homeAccountId &&
        token.expiresOn - EXPIRY_BUFFER_SECONDS > now &&
        wanted.every((scope) => token.scopes.includes(scope))
    );
  }

  findRefreshToken(homeAccountId: string): CachedRefreshToken | undefined {
    return this.state.refreshTokens.find((token) => token.homeAccountId === homeAccountId);
  }

  findIdToken(homeAccountId: string): CachedIdToken | undefined {
    return this.state.idTokens.find((token) => token.homeAccountId === homeAccountId);
  }

  removeAccount(homeAccountId: string): void {
    const keep = <T extends { homeAccountId: string }>(items: T[]): T[] =>
      items.filter((item) => item.homeAccountId !== homeAccountId);

    const before = this.serialize();
    this.state = {
      version: CACHE_VERSION,
      accounts: keep(this.state.accounts),
      accessTokens: keep(this.state.accessTokens),
      refreshTokens: keep(this.state.refreshTokens),
      idTokens: keep(this.state.idTokens),
    };
    if (this.serialize() !== before) {
      this.changed = true;
    }
  }
}
