import { loadConfig, parseDurationSeconds } from '../../config/config';
import { ConfigError } from '../../utils/errors';
import logger, { configureLogger } from '../../utils/logger';

describe('parseDurationSeconds', () => {
  it.each([
    ['90', 90],
    ['90s', 90],
    ['60m', 3600],
    ['12h', 43200],
    ['7d', 604800],
  ])('reads %s as %d seconds', (value, expected) => {
    expect(parseDurationSeconds(value)).toBe(expected);
  });

  it('rejects zero, unknown units and garbage', () => {
    expect(parseDurationSeconds('0')).toBeUndefined();
    expect(parseDurationSeconds('5w')).toBeUndefined();
    expect(parseDurationSeconds('soon')).toBeUndefined();
  });
});

describe('loadConfig', () => {
  it('fills every default when only the secret is given', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret' });

    expect(config.env).toBe('development');
    expect(config.port).toBe(8000);
    expect(config.jwt).toEqual({ secret: 'test-secret', accessTtlSeconds: 3600, refreshTtlSeconds: 604800 });
    expect(config.bcryptRounds).toBe(10);
    expect(config.database).toEqual({
      dialect: 'postgres',
      host: 'localhost',
      port: 5432,
      name: 'socialconnect',
      user: 'postgres',
      password: '',
      storage: ':memory:',
    });
    expect(config.redisUrl).toBeUndefined();
    expect(config.kafka).toEqual({ broker: undefined, clientId: 'socialconnect-api', topic: 'social_events' });
    expect(config.corsOrigins).toEqual(['*']);
    expect(config.publicBaseUrl).toBe('http://localhost:8000');
  });

  it('parses lists, numbers and durations from strings', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      PORT: '9100',
      JWT_ACCESS_TTL: '15m',
      JWT_REFRESH_TTL: '1d',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      PUBLIC_BASE_URL: 'http://api.test/',
      REDIS_URL: 'redis://cache.test:6379',
      KAFKA_BROKER: 'kafka.test:9092',
    });

    expect(config.port).toBe(9100);
    expect(config.jwt.accessTtlSeconds).toBe(900);
    expect(config.jwt.refreshTtlSeconds).toBe(86400);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.publicBaseUrl).toBe('http://api.test');
    expect(config.redisUrl).toBe('redis://cache.test:6379');
    expect(config.kafka.broker).toBe('kafka.test:9092');
  });

  it('treats empty optional service urls as unset', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret', REDIS_URL: '', KAFKA_BROKER: '' });
    expect(config.redisUrl).toBeUndefined();
    expect(config.kafka.broker).toBeUndefined();
  });

  it('reports every invalid key at once', () => {
    let caught: unknown;
    try {
      loadConfig({ JWT_ACCESS_TTL: 'soon', DB_DIALECT: 'mysql' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toContain('JWT_SECRET: JWT_SECRET is required');
    expect(issues).toContain('JWT_ACCESS_TTL: Invalid duration "soon"');
    expect(issues.some(issue => issue.startsWith('DB_DIALECT:'))).toBe(true);
  });
});

describe('configureLogger', () => {
  afterEach(() => {
    configureLogger({ serviceName: 'socialconnect-api', logLevel: 'info' });
  });

  it('applies the configured service name and level', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret', SERVICE_NAME: 'social-worker', LOG_LEVEL: 'debug' });

    configureLogger(config);

    expect(logger.level).toBe('debug');
    expect(logger.defaultMeta).toEqual({ service: 'social-worker' });
  });
});
