import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { defaultConfig, loadConfigFile, parseConfig, parseEndpointConfig, serverSettingsFromEnv } from '../config.js';
import { ConfigurationError } from '../errors.js';

const SAMPLE = `
endpoints:
  - url: https://users.example.test/api
    name: users
    version: v1
    methods: [GET, POST]
    auth_type: bearer
    health_check_path: /health
    timeout: 15
  - url: https://orders.example.test
circuit_breaker:
  failure_threshold: 3
  fallback_strategy: default_response
  fallback_response:
    message: try again later
health_check:
  interval: 10
  unhealthy_threshold: 4
log_level: debug
`;

describe('parseConfig', () => {
  it('maps snake_case keys and fills defaults', () => {
    const config = parseConfig(SAMPLE);

    expect(config.endpoints).toEqual([
      {
        url: 'https://users.example.test/api',
        name: 'users',
        version: 'v1',
        methods: ['GET', 'POST'],
        authType: 'bearer',
        disabled: false,
        healthCheckPath: '/health',
        timeout: 15,
      },
      {
        url: 'https://orders.example.test',
        name: undefined,
        version: undefined,
        methods: ['GET'],
        authType: 'none',
        disabled: false,
        healthCheckPath: undefined,
        timeout: 30,
      },
    ]);
    expect(config.circuitBreaker).toEqual({
      failureThreshold: 3,
      resetTimeout: 60,
      halfOpenMaxCalls: 3,
      fallbackStrategy: 'default_response',
      fallbackResponse: { message: 'try again later' },
    });
    expect(config.healthCheck).toEqual({
      enabled: true,
      interval: 10,
      timeout: 10,
      unhealthyThreshold: 4,
      healthyThreshold: 2,
    });
    expect(config.logLevel).toBe('DEBUG');
  });

  it('treats an empty document as the default configuration', () => {
    expect(parseConfig('')).toEqual(defaultConfig());
    expect(defaultConfig()).toMatchObject({ endpoints: [], logLevel: 'INFO' });
  });

  it('reports YAML syntax errors with the source name', () => {
    expect(() => parseConfig('endpoints:\n  - url: "unterminated\n', 'broken.yaml')).toThrow(
      /^Failed to parse broken\.yaml/
    );
  });

  it('reports schema violations with the offending path', () => {
    expect(() => parseConfig('endpoints:\n  - url: not-a-url\n')).toThrow(ConfigurationError);
    expect(() => parseConfig('endpoints:\n  - url: not-a-url\n')).toThrow(/endpoints\.0\.url/);
  });

  it.each([
    ['a name with spaces', 'endpoints:\n  - url: https://a.example.test\n    name: bad name\n'],
    ['an unknown method', 'endpoints:\n  - url: https://a.example.test\n    methods: [FETCH]\n'],
    ['a timeout above 300', 'endpoints:\n  - url: https://a.example.test\n    timeout: 301\n'],
    ['a health interval below 5', 'health_check:\n  interval: 4\n'],
    ['an unknown fallback strategy', 'circuit_breaker:\n  fallback_strategy: retry\n'],
    ['an unknown log level', 'log_level: verbose\n'],
  ])('rejects %s', (_label, yaml) => {
    expect(() => parseConfig(yaml)).toThrow(ConfigurationError);
  });
});

describe('parseEndpointConfig', () => {
  it('accepts a minimal endpoint', () => {
    expect(parseEndpointConfig({ url: 'https://a.example.test', name: 'svc-a_1', version: '1.2.0' })).toMatchObject({
      url: 'https://a.example.test',
      name: 'svc-a_1',
      version: '1.2.0',
      methods: ['GET'],
    });
  });

  it('rejects an invalid version', () => {
    expect(() => parseEndpointConfig({ url: 'https://a.example.test', version: 'latest' })).toThrow(
      /^Invalid endpoint configuration: version: Version must be in format/
    );
  });
});

describe('loadConfigFile', () => {
  it('loads the bundled configuration', async () => {
    const path = fileURLToPath(new URL('../../config/config.yaml', import.meta.url));
    const config = await loadConfigFile(path);

    expect(config.endpoints.map((e) => e.name)).toEqual(['users', 'orders', 'legacy']);
    expect(config.endpoints[2]?.disabled).toBe(true);
    expect(config.circuitBreaker.fallbackStrategy).toBe('error_response');
  });
});

describe('serverSettingsFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(serverSettingsFromEnv({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      configPath: 'config/config.yaml',
      logLevel: undefined,
    });
  });

  it('reads overrides', () => {
    expect(
      serverSettingsFromEnv({ PORT: '9100', HOST: '127.0.0.1', CONFIG_PATH: '/etc/orchestrator.yaml', LOG_LEVEL: 'warn' })
    ).toEqual({ port: 9100, host: '127.0.0.1', configPath: '/etc/orchestrator.yaml', logLevel: 'WARNING' });
  });

  it('ignores an unknown log level', () => {
    expect(serverSettingsFromEnv({ LOG_LEVEL: 'loud' }).logLevel).toBeUndefined();
  });
});
