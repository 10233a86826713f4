import { readFile } from 'node:fs/promises';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import {
  AUTH_TYPES,
  FALLBACK_STRATEGIES,
  HTTP_METHODS,
  type EndpointConfig,
  type GatewayConfig,
  type LogLevelName,
} from './models.js';

export const EndpointConfigSchema = z
  .object({
    url: z.string().url(),
    name: z
      .string()
      .regex(/^[a-zA-Z0-9_-]+$/, 'Name must contain only alphanumeric characters, hyphens, and underscores')
      .optional(),
    version: z
      .string()
      .regex(/^v?\d+(\.\d+)*$/, 'Version must be in format like "1.0.0" or "v1.0.0"')
      .optional(),
    methods: z.array(z.enum(HTTP_METHODS)).min(1).default(['GET']),
    auth_type: z.enum(AUTH_TYPES).default('none'),
    disabled: z.boolean().default(false),
    health_check_path: z.string().optional(),
    timeout: z.number().int().min(1).max(300).default(30),
  })
  .transform(
    (raw): EndpointConfig => ({
      url: raw.url,
      name: raw.name,
      version: raw.version,
      methods: raw.methods,
      authType: raw.auth_type,
      disabled: raw.disabled,
      healthCheckPath: raw.health_check_path,
      timeout: raw.timeout,
    })
  );

const CircuitBreakerSchema = z
  .object({
    failure_threshold: z.number().int().min(1).default(5),
    reset_timeout: z.number().int().min(1).default(60),
    half_open_max_calls: z.number().int().min(1).default(3),
    fallback_strategy: z.enum(FALLBACK_STRATEGIES).default('error_response'),
    fallback_response: z.record(z.unknown()).optional(),
  })
  .default({})
  .transform((raw) => ({
    failureThreshold: raw.failure_threshold,
    resetTimeout: raw.reset_timeout,
    halfOpenMaxCalls: raw.half_open_max_calls,
    fallbackStrategy: raw.fallback_strategy,
    fallbackResponse: raw.fallback_response,
  }));

const HealthCheckSchema = z
  .object({
    enabled: z.boolean().default(true),
    interval: z.number().int().min(5).default(30),
    timeout: z.number().int().min(1).default(10),
    unhealthy_threshold: z.number().int().min(1).default(3),
    healthy_threshold: z.number().int().min(1).default(2),
  })
  .default({})
  .transform((raw) => ({
    enabled: raw.enabled,
    interval: raw.interval,
    timeout: raw.timeout,
    unhealthyThreshold: raw.unhealthy_threshold,
    healthyThreshold: raw.healthy_threshold,
  }));

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export const GatewayConfigSchema = z
  .object({
    endpoints: z.array(EndpointConfigSchema).default([]),
    circuit_breaker: CircuitBreakerSchema,
    health_check: HealthCheckSchema,
    log_level: z
      .string()
      .transform((level) => level.toUpperCase())
      .pipe(z.enum(LOG_LEVELS))
      .default('INFO'),
  })
  .transform(
    (raw): GatewayConfig => ({
      endpoints: raw.endpoints,
      circuitBreaker: raw.circuit_breaker,
      healthCheck: raw.health_check,
      logLevel: raw.log_level,
    })
  );

export function defaultConfig(): GatewayConfig {
  return GatewayConfigSchema.parse({});
}

export function parseEndpointConfig(input: unknown): EndpointConfig {
  const result = EndpointConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid endpoint configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseConfig(yamlString: string, source = 'config'): GatewayConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlString);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      const pos = err.linePos?.[0];
      const where = pos ? ` at line ${pos.line}, column ${pos.col}` : '';
      throw new ConfigurationError(`Failed to parse ${source}${where}: ${err.message}`, undefined, {
        cause: err,
      });
    }
    throw err;
  }

  // An empty document is a valid, all-defaults configuration.
  const result = GatewayConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Configuration validation error in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadConfigFile(path: string): Promise<GatewayConfig> {
  const content = await readFile(path, 'utf-8');
  return parseConfig(content, path);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export interface ServerSettings {
  port: number;
  host: string;
  configPath: string;
  logLevel?: LogLevelName;
}

function envLogLevel(value: string | undefined): LogLevelName | undefined {
  if (!value) return undefined;
  const parsed = z.enum(LOG_LEVELS).safeParse(value.toUpperCase() === 'WARN' ? 'WARNING' : value.toUpperCase());
  return parsed.success ? parsed.data : undefined;
}

export function serverSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return {
    port: parseInt(env.PORT || '8000', 10),
    host: env.HOST || '0.0.0.0',
    configPath: env.CONFIG_PATH || 'config/config.yaml',
    logLevel: envLogLevel(env.LOG_LEVEL),
  };
}
