/**
 * Unit Tests: Configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getRedisUrl, loadConfig, parseDuration, validateConfig, type Config } from '../../config/index.js';

const MANAGED_KEYS = [
  'NODE_ENV', 'PORT', 'SERVER_PORT', 'JWT_SECRET', 'DATABASE_URL', 'REDIS_URL', 'REDIS_HOST',
  'REDIS_PORT', 'REDIS_PASSWORD', 'ACCESS_TOKEN_TTL', 'REFRESH_TOKEN_TTL', 'BCRYPT_ROUNDS',
  'BOOTSTRAP_ADMIN_EMAIL', 'CORS_ORIGINS', 'APP_BASE_URL', 'CLOUDINARY_CLOUD_NAME',
  'CLOUDINARY_API_KEY', 'CLOUDINARY_API_SECRET',
];

describe('parseDuration', () => {
  it.each([
    ['30', 30],
    ['45s', 45],
    ['15m', 900],
    ['1h', 3600],
    ['7d', 604800],
  ])('should parse %s as %d seconds', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it('should reject unknown formats', () => {
    expect(() => parseDuration('15 minutes')).toThrow('Invalid duration: 15 minutes');
    expect(() => parseDuration('-5m')).toThrow('Invalid duration: -5m');
  });
});

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of MANAGED_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env['NODE_ENV'] = 'test';
  });

  afterEach(() => {
    for (const key of MANAGED_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should apply development defaults', () => {
    const config = loadConfig();

    expect(config.server.port).toBe(8000);
    expect(config.appBaseUrl).toBe('http://localhost:8000');
    expect(config.auth).toMatchObject({
      accessTokenTtl: 900,
      refreshTokenTtl: 604800,
      emailTokenTtl: 604800,
      resetTokenTtl: 3600,
      sessionCacheTtl: 3600,
      bcryptRounds: 10,
      bootstrapAdminEmail: undefined,
    });
    expect(validateConfig(config)).toEqual([]);
  });

  it('should read overrides from the environment', () => {
    process.env['PORT'] = '9100';
    process.env['ACCESS_TOKEN_TTL'] = '5m';
    process.env['BOOTSTRAP_ADMIN_EMAIL'] = ' Admin@Example.com ';
    process.env['CORS_ORIGINS'] = 'https://a.test, https://b.test,';

    const config = loadConfig();

    expect(config.server.port).toBe(9100);
    expect(config.auth.accessTokenTtl).toBe(300);
    expect(config.auth.bootstrapAdminEmail).toBe('admin@example.com');
    expect(config.server.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
  });

  it('should require secrets in production', () => {
    process.env['NODE_ENV'] = 'production';

    expect(() => loadConfig()).toThrow('Missing required environment variable: DATABASE_URL');
  });
});

describe('validateConfig', () => {
  function withAuth(overrides: Partial<Config['auth']>, env = 'development'): Config {
    process.env['NODE_ENV'] = 'test';
    const base = loadConfig();
    return { ...base, env, auth: { ...base.auth, ...overrides } };
  }

  it('should require the access token to expire before the refresh token', () => {
    expect(validateConfig(withAuth({ accessTokenTtl: 3600, refreshTokenTtl: 3600 })))
      .toContain('ACCESS_TOKEN_TTL must be shorter than REFRESH_TOKEN_TTL');
  });

  it('should bound bcrypt rounds', () => {
    expect(validateConfig(withAuth({ bcryptRounds: 3 })))
      .toContain('Invalid BCRYPT_ROUNDS: 3. Must be between 4 and 15.');
  });

  it('should refuse the default secret in production', () => {
    const errors = validateConfig(withAuth({ jwtSecret: 'dev-secret-change-in-production' }, 'production'));

    expect(errors).toContain('JWT_SECRET must be changed from default in production');
    expect(errors).toContain('JWT_SECRET must be at least 32 characters in production');
  });
});

describe('getRedisUrl', () => {
  it('should prefer REDIS_URL and fall back to host and port', () => {
    const config = loadConfig();
    const redis = { ...config.redis, host: 'localhost', port: 6379 };

    expect(getRedisUrl({ ...config, redis: { ...redis, url: 'redis://cache:6380' } }))
      .toBe('redis://cache:6380');
    expect(getRedisUrl({ ...config, redis: { ...redis, url: undefined, password: 'test-secret' } }))
      .toBe('redis://:test-secret@localhost:6379');
  });
});
