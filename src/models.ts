import { createHash } from 'node:crypto';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

// Documentation only: the gateway never inspects credentials.
export const AUTH_TYPES = ['none', 'bearer', 'api_key', 'basic', 'oauth2'] as const;
export type AuthType = (typeof AUTH_TYPES)[number];

export const ENDPOINT_STATUSES = ['active', 'inactive', 'disabled', 'unhealthy'] as const;
export type EndpointStatus = (typeof ENDPOINT_STATUSES)[number];

export type CircuitState = 'closed' | 'open' | 'half_open';

export const FALLBACK_STRATEGIES = [
  'error_response',
  'cached_response',
  'default_response',
  'redirect',
] as const;
export type FallbackStrategy = (typeof FALLBACK_STRATEGIES)[number];

export interface EndpointConfig {
  url: string;
  name?: string;
  version?: string;
  methods: HttpMethod[];
  authType: AuthType;
  disabled: boolean;
  healthCheckPath?: string;
  timeout: number; // seconds
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  resetTimeout: number; // seconds
  halfOpenMaxCalls: number;
  fallbackStrategy: FallbackStrategy;
  fallbackResponse?: Record<string, unknown>;
}

export interface HealthCheckSettings {
  enabled: boolean;
  interval: number; // seconds, >= 5
  timeout: number; // seconds
  unhealthyThreshold: number;
  healthyThreshold: number;
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface GatewayConfig {
  endpoints: EndpointConfig[];
  circuitBreaker: CircuitBreakerSettings;
  healthCheck: HealthCheckSettings;
  logLevel: LogLevelName;
}

export interface RegisteredEndpoint {
  readonly id: string;
  readonly config: Readonly<EndpointConfig>;
  readonly status: EndpointStatus;
  readonly circuitBreakerState: CircuitState;
  readonly registeredAt: Date;
  readonly lastHealthCheck?: Date;
  readonly consecutiveFailures: number;
  readonly lastFailureTime?: Date;
}

export interface EndpointHealth {
  endpointId: string;
  status: EndpointStatus;
  lastCheckTime: Date;
  responseTimeMs?: number;
  errorMessage?: string;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
}

export type HeaderValue = string | string[] | undefined;
export type IncomingHeaders = Record<string, HeaderValue>;
export type QueryParams = Record<string, string | string[] | undefined>;

export interface GatewayRequest {
  method: string;
  path: string;
  headers: IncomingHeaders;
  body?: Buffer;
  query?: QueryParams;
}

export type ResponseHeaders = Record<string, string | string[]>;

export interface GatewayResponse {
  statusCode: number;
  headers: ResponseHeaders;
  body: Buffer;
}

export function normalizeUrl(url: string): string {
  return new URL(url).toString();
}

/**
 * Endpoint identity: the configured name, or a SHA-256 digest of the
 * normalised URL so unnamed endpoints keep their id across restarts.
 */
export function endpointIdFor(config: Pick<EndpointConfig, 'url' | 'name'>): string {
  if (config.name) return config.name;
  const digest = createHash('sha256').update(normalizeUrl(config.url)).digest('hex');
  return `endpoint_${digest.slice(0, 16)}`;
}

export function sameEndpointConfig(a: Readonly<EndpointConfig>, b: Readonly<EndpointConfig>): boolean {
  return (
    normalizeUrl(a.url) === normalizeUrl(b.url) &&
    a.name === b.name &&
    a.version === b.version &&
    a.methods.join(',') === b.methods.join(',') &&
    a.authType === b.authType &&
    a.disabled === b.disabled &&
    a.healthCheckPath === b.healthCheckPath &&
    a.timeout === b.timeout
  );
}
