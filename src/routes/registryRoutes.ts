import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { parseEndpointConfig } from '../config.js';
import type { AppContext } from '../context.js';
import { ConfigurationError, EndpointNotFoundError } from '../errors.js';
import { ENDPOINT_STATUSES, type RegisteredEndpoint } from '../models.js';

const ListQuerySchema = z.object({
  status: z.enum(ENDPOINT_STATUSES).optional(),
  include_disabled: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

const StatusBodySchema = z.object({ status: z.enum(ENDPOINT_STATUSES) });

export function endpointDetails(endpoint: RegisteredEndpoint) {
  return {
    endpointId: endpoint.id,
    url: endpoint.config.url,
    name: endpoint.config.name ?? null,
    version: endpoint.config.version ?? null,
    methods: [...endpoint.config.methods],
    authType: endpoint.config.authType,
    disabled: endpoint.config.disabled,
    status: endpoint.status,
    circuitBreakerState: endpoint.circuitBreakerState,
    registrationTime: endpoint.registeredAt.toISOString(),
    lastHealthCheck: endpoint.lastHealthCheck?.toISOString() ?? null,
    consecutiveFailures: endpoint.consecutiveFailures,
    lastFailureTime: endpoint.lastFailureTime?.toISOString() ?? null,
    timeout: endpoint.config.timeout,
  };
}

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

export function registryRoutes(context: AppContext): FastifyPluginAsync {
  const { registry, router, circuitBreakers, configManager } = context;
  return async (app) => {
    app.get('/endpoints', async (request) => {
      const query = parseOrThrow(ListQuerySchema, request.query, 'query');
      const endpoints = registry.list({ status: query.status, includeDisabled: query.include_disabled });
      const stats = registry.stats();
      return {
        endpoints: endpoints.map(endpointDetails),
        totalCount: endpoints.length,
        activeCount: stats.active,
        unhealthyCount: stats.unhealthy,
        disabledCount: stats.disabled,
      };
    });

    app.get<{ Params: { id: string } }>('/endpoints/:id', async (request) => {
      const endpoint = registry.get(request.params.id);
      if (!endpoint) throw EndpointNotFoundError.forId(request.params.id);
      return endpointDetails(endpoint);
    });

    app.post('/endpoints', async (request, reply) => {
      const body = parseOrThrow(z.object({ config: z.unknown() }), request.body, 'registration request');
      const endpoint = registry.register(parseEndpointConfig(body.config));
      router.refreshRoutes();
      return reply.status(201).send({
        success: true,
        message: 'Endpoint registered successfully',
        endpointId: endpoint.id,
        endpointUrl: endpoint.config.url,
      });
    });

    app.delete<{ Params: { id: string } }>('/endpoints/:id', async (request) => {
      const { id } = request.params;
      if (!registry.unregister(id)) throw EndpointNotFoundError.forId(id);
      router.refreshRoutes();
      circuitBreakers.cleanup();
      return { success: true, message: 'Endpoint unregistered successfully', endpointId: id };
    });

    app.put<{ Params: { id: string } }>('/endpoints/:id/status', async (request) => {
      const { id } = request.params;
      const { status } = parseOrThrow(StatusBodySchema, request.body, 'status update');
      if (!registry.updateStatus(id, status)) throw EndpointNotFoundError.forId(id);
      return { success: true, message: `Endpoint status updated to ${status}`, endpointId: id, newStatus: status };
    });

    app.get('/stats', async () => ({
      registryStats: registry.stats(),
      timestamp: new Date().toISOString(),
    }));

    app.post('/sync', async (_request, reply) => {
      const config = configManager?.getConfig();
      if (!config) {
        return reply.status(404).send({
          error: 'configuration_not_loaded',
          message: 'Configuration not loaded',
          timestamp: new Date().toISOString(),
        });
      }
      const result = context.applyConfig(config);
      return {
        success: true,
        message: 'Registry synchronized with configuration',
        syncResult: result,
        timestamp: new Date().toISOString(),
      };
    });
  };
}
