import { ConfigError, loadConfig, validateConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      store: 'memory',
      v3io: { endpoint: undefined, container: 'users', accessKey: undefined },
      logLevel: LogLevel.Info,
    });
  });

  test('reads the service variables', () => {
    const config = loadConfig({
      RUNMETA_PORT: '9000',
      RUNMETA_STORE: 'V3IO',
      RUNMETA_V3IO_URL: 'webapi:8081',
      RUNMETA_V3IO_CONTAINER: 'projects',
      RUNMETA_V3IO_ACCESS_KEY: 'test-secret',
      RUNMETA_LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({
      port: 9000,
      store: 'v3io',
      v3io: { endpoint: 'http://webapi:8081', container: 'projects', accessKey: 'test-secret' },
      logLevel: LogLevel.Debug,
    });
  });

  test('falls back to the generic variables', () => {
    const config = loadConfig({ PORT: '3000', V3IO_API: 'https://webapi', V3IO_ACCESS_KEY: 'test-secret' });
    expect(config.port).toBe(3000);
    expect(config.v3io.endpoint).toBe('https://webapi');
    expect(config.v3io.accessKey).toBe('test-secret');
  });

  test('the service variables win', () => {
    expect(loadConfig({ RUNMETA_PORT: '9000', PORT: '3000' }).port).toBe(9000);
  });

  test('a non-numeric port is kept for validation', () => {
    expect(loadConfig({ RUNMETA_PORT: 'eighty' }).port).toBeNaN();
  });

  test('rejects an unknown store', () => {
    expect(() => loadConfig({ RUNMETA_STORE: 'redis' })).toThrow(ConfigError);
  });

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ RUNMETA_LOG_LEVEL: 'loud' })).toThrow(
      'RUNMETA_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
    );
  });
});

describe('validateConfig', () => {
  test('the defaults are valid', () => {
    expect(validateConfig(loadConfig({}))).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test('reports an invalid port', () => {
    const result = validateConfig(loadConfig({ RUNMETA_PORT: '70000' }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Port must be an integer between 0 and 65535']);
  });

  test('the v3io store needs an endpoint', () => {
    const result = validateConfig(loadConfig({ RUNMETA_STORE: 'v3io', RUNMETA_V3IO_ACCESS_KEY: 'test-secret' }));
    expect(result.errors).toEqual(['The v3io store needs RUNMETA_V3IO_URL (or V3IO_API)']);
  });

  test('warns about a missing access key', () => {
    const result = validateConfig(loadConfig({ RUNMETA_STORE: 'v3io', RUNMETA_V3IO_URL: 'webapi' }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['No v3io access key configured; requests are sent without a session key']);
  });

  test('warns about an unused endpoint', () => {
    const result = validateConfig(loadConfig({ RUNMETA_V3IO_URL: 'webapi' }));
    expect(result.warnings).toHaveLength(1);
  });
});
