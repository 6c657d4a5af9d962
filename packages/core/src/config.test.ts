import { describe, expect, it } from 'vitest';
import { loadAuthConfig, validatorsFromConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { LifespanValidator } from './validators.js';

const baseEnv = {
  IDENTITY_AUTHORITY: 'https://login.example.test/tenant',
  IDENTITY_CLIENT_ID: 'test-client',
  IDENTITY_SESSION_SECRET: 'test-session-secret',
};

describe('loadAuthConfig', () => {
  it('reads the minimal configuration', () => {
    expect(loadAuthConfig(baseEnv)).toEqual({
      authority: 'https://login.example.test/tenant',
      clientId: 'test-client',
      scopes: [],
      sessionSecret: 'test-session-secret',
    });
  });

  it('reads the optional settings', () => {
    const config = loadAuthConfig({
      ...baseEnv,
      IDENTITY_CLIENT_SECRET: 'test-secret',
      IDENTITY_REDIRECT_URI: 'https://app.example.test/auth/callback',
      IDENTITY_SCOPES: 'User.Read, Mail.Send  Files.Read',
      IDENTITY_SESSION_LIFESPAN: '3600',
    });

    expect(config).toEqual({
      authority: 'https://login.example.test/tenant',
      clientId: 'test-client',
      clientCredential: 'test-secret',
      redirectUri: 'https://app.example.test/auth/callback',
      scopes: ['User.Read', 'Mail.Send', 'Files.Read'],
      sessionSecret: 'test-session-secret',
      sessionLifespan: 3600,
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadAuthConfig({ ...baseEnv, IDENTITY_CLIENT_SECRET: '  ', IDENTITY_SESSION_LIFESPAN: '' })).toEqual({
      authority: 'https://login.example.test/tenant',
      clientId: 'test-client',
      scopes: [],
      sessionSecret: 'test-session-secret',
    });
  });

  it('lists every problem', () => {
    let thrown: unknown;
    try {
      loadAuthConfig({
        IDENTITY_AUTHORITY: 'not a url',
        IDENTITY_CLIENT_ID: 'test-client',
        IDENTITY_SESSION_SECRET: 'short',
        IDENTITY_SESSION_LIFESPAN: '-5',
      });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    const issues = thrown instanceof ConfigurationError ? thrown.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual([
      'IDENTITY_AUTHORITY',
      'IDENTITY_SESSION_SECRET',
      'IDENTITY_SESSION_LIFESPAN',
    ]);
    expect(issues[1]).toBe('IDENTITY_SESSION_SECRET: must be at least 16 characters');
  });

  it('requires the client id', () => {
    expect(() => loadAuthConfig({ ...baseEnv, IDENTITY_CLIENT_ID: '' })).toThrow(ConfigurationError);
  });
});

describe('validatorsFromConfig', () => {
  it('adds a lifespan validator only when a lifespan is set', () => {
    const config = loadAuthConfig(baseEnv);
    expect(validatorsFromConfig(config)).toEqual([]);

    const validators = validatorsFromConfig({ ...config, sessionLifespan: 600 });
    expect(validators).toHaveLength(1);
    expect(validators[0]).toBeInstanceOf(LifespanValidator);
  });
});
