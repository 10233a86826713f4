import { vi, type Mock } from 'vitest';
import type { Logger } from '../logger.js';
import type {
  CircuitBreakerSettings,
  EndpointConfig,
  GatewayRequest,
  HealthCheckSettings,
} from '../models.js';
import type { FetchFn } from '../proxy.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export const START_TIME = 1_700_000_000_000;
export const START_ISO = '2023-11-14T22:13:20.000Z';

export function endpointConfig(overrides: Partial<EndpointConfig> = {}): EndpointConfig {
  return {
    url: 'https://users.example.test/api',
    name: 'users',
    methods: ['GET', 'POST'],
    authType: 'bearer',
    disabled: false,
    timeout: 30,
    ...overrides,
  };
}

export function breakerSettings(overrides: Partial<CircuitBreakerSettings> = {}): CircuitBreakerSettings {
  return {
    failureThreshold: 2,
    resetTimeout: 60,
    halfOpenMaxCalls: 1,
    fallbackStrategy: 'error_response',
    ...overrides,
  };
}

export function healthSettings(overrides: Partial<HealthCheckSettings> = {}): HealthCheckSettings {
  return {
    enabled: true,
    interval: 30,
    timeout: 10,
    unhealthyThreshold: 2,
    healthyThreshold: 2,
    ...overrides,
  };
}

export function gatewayRequest(overrides: Partial<GatewayRequest> = {}): GatewayRequest {
  return { method: 'GET', path: '/users', headers: {}, ...overrides };
}

// ---------------------------------------------------------------------------
// Test doubles
// ---------------------------------------------------------------------------

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

export function createClock(start = START_TIME): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function connectionRefused(): TypeError {
  return new TypeError('fetch failed');
}

export function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

/** fetch stub answering every call with a fresh copy of the same response. */
export function fetchReturning(status = 200, body: string | null = 'ok'): Mock<FetchFn> {
  return vi.fn<FetchFn>(async () => new Response(body, { status }));
}
