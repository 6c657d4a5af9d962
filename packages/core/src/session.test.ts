import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CookieSession,
  loadCookieSession,
  objectSession,
  planCookieWrites,
  readChunkedCookie,
  sealSession,
  unsealSession,
} from './session.js';

const config = { secret: 'test-secret-for-sessions' };

describe('CookieSession', () => {
  it('tracks modification through set and pop', () => {
    const session = new CookieSession({ theme: 'dark' });
    expect(session.modified).toBe(false);
    expect(session.get('theme')).toBe('dark');

    session.set('_auth_flow', { kind: 'auth_code' });
    expect(session.modified).toBe(true);
    expect(session.toJSON()).toEqual({ theme: 'dark', _auth_flow: { kind: 'auth_code' } });
  });

  it('pops values and leaves the session unmodified for missing keys', () => {
    const session = new CookieSession({ a: 1 });
    expect(session.pop('missing')).toBeUndefined();
    expect(session.modified).toBe(false);

    expect(session.pop('a')).toBe(1);
    expect(session.modified).toBe(true);
    expect(session.isEmpty).toBe(true);
  });

  it('does not share its record with the caller', () => {
    const data = { a: 1 };
    const session = new CookieSession(data);
    session.set('b', 2);
    expect(data).toEqual({ a: 1 });
  });
});

describe('objectSession', () => {
  it('reads and writes the wrapped object', () => {
    const target: Record<string, unknown> = { a: 1 };
    const session = objectSession(target);

    session.set('b', 2);
    expect(session.get('a')).toBe(1);
    expect(session.pop('a')).toBe(1);
    expect(target).toEqual({ b: 2 });
  });
});

describe('sealSession', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('round-trips session data', async () => {
    const token = await sealSession({ _logged_in_user: { sub: 'user-1' }, n: 3 }, config);
    expect(token.split('.')).toHaveLength(5);
    await expect(unsealSession(token, config)).resolves.toEqual({ _logged_in_user: { sub: 'user-1' }, n: 3 });
  });

  it('does not expose the data in the token', async () => {
    const token = await sealSession({ refresh: 'refresh-token-value' }, config);
    const decoded = token
      .split('.')
      .map((part) => Buffer.from(part, 'base64url').toString('latin1'))
      .join('');
    expect(decoded).not.toContain('refresh-token-value');
  });

  it('returns null for another secret, another issuer or garbage', async () => {
    const token = await sealSession({ a: 1 }, config);
    await expect(unsealSession(token, { secret: 'another-test-secret' })).resolves.toBeNull();
    await expect(unsealSession(token, { ...config, issuer: 'other-app' })).resolves.toBeNull();
    await expect(unsealSession('not-a-token', config)).resolves.toBeNull();
  });

  it('returns null once the session expired', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(Date.UTC(2026, 0, 1));
    const token = await sealSession({ a: 1 }, { ...config, expiresIn: '1h' });

    vi.setSystemTime(Date.UTC(2026, 0, 1, 2));
    await expect(unsealSession(token, config)).resolves.toBeNull();
  });
});

describe('loadCookieSession', () => {
  it('starts empty without a cookie or with an unreadable one', async () => {
    expect((await loadCookieSession(undefined, config)).isEmpty).toBe(true);
    expect((await loadCookieSession('garbage', config)).isEmpty).toBe(true);
  });

  it('restores a sealed session unmodified', async () => {
    const token = await sealSession({ a: 1 }, config);
    const session = await loadCookieSession(token, config);
    expect(session.get('a')).toBe(1);
    expect(session.modified).toBe(false);
  });
});

describe('planCookieWrites', () => {
  it('writes a value that fits as one cookie', () => {
    expect(planCookieWrites('sid', 'abcdef', [], 10)).toEqual({ set: [{ name: 'sid', value: 'abcdef' }], clear: [] });
  });

  it('splits a long value into numbered chunks and expires the single cookie', () => {
    expect(planCookieWrites('sid', 'abcdefghijklmnopqrstuvwxy', ['sid', 'theme'], 10)).toEqual({
      set: [
        { name: 'sid.0', value: 'abcdefghij' },
        { name: 'sid.1', value: 'klmnopqrst' },
        { name: 'sid.2', value: 'uvwxy' },
      ],
      clear: ['sid'],
    });
  });

  it('expires chunks the new value no longer needs', () => {
    expect(planCookieWrites('sid', 'abc', ['sid.0', 'sid.1', 'sid.2', 'sid.extra'], 10)).toEqual({
      set: [{ name: 'sid', value: 'abc' }],
      clear: ['sid.0', 'sid.1', 'sid.2'],
    });
  });

  it('expires every part when there is no value', () => {
    expect(planCookieWrites('sid', undefined, ['sid.0', 'sid.1'])).toEqual({
      set: [],
      clear: ['sid', 'sid.0', 'sid.1'],
    });
  });
});

describe('readChunkedCookie', () => {
  it('prefers the single cookie', () => {
    expect(readChunkedCookie('sid', { sid: 'whole', 'sid.0': 'part' })).toBe('whole');
  });

  it('joins consecutive chunks', () => {
    expect(readChunkedCookie('sid', { 'sid.1': 'klm', 'sid.0': 'abc', 'sid.3': 'zzz' })).toBe('abcklm');
  });

  it('returns undefined without any part', () => {
    expect(readChunkedCookie('sid', { theme: 'dark' })).toBeUndefined();
    expect(readChunkedCookie('sid', undefined)).toBeUndefined();
  });

  it('reassembles what planCookieWrites split', async () => {
    const token = await sealSession({ blob: 'x'.repeat(9000) }, config);
    const { set } = planCookieWrites('sid', token, []);
    const cookies = Object.fromEntries(set.map((cookie) => [cookie.name, cookie.value]));

    expect(set.length).toBeGreaterThan(1);
    await expect(unsealSession(readChunkedCookie('sid', cookies) ?? '', config)).resolves.toEqual({
      blob: 'x'.repeat(9000),
    });
  });
});
