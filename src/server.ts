import Fastify, { type FastifyInstance, type HTTPMethods } from 'fastify';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import type { AppContext } from './context.js';
import { GatewayError } from './errors.js';
import { createLogger } from './logger.js';
import type { QueryParams } from './models.js';
import { configRoutes } from './routes/configRoutes.js';
import { healthRoutes } from './routes/healthRoutes.js';
import { registryRoutes } from './routes/registryRoutes.js';
import { routerRoutes } from './routes/routerRoutes.js';

const logger = createLogger('server');

export const SERVICE_NAME = 'Orchestrator API';
export const SERVICE_VERSION = '0.1.0';

const PROXY_METHODS: HTTPMethods[] = ['DELETE', 'GET', 'HEAD', 'PATCH', 'POST', 'PUT', 'OPTIONS'];

// fetch has already decoded the upstream body, so its framing headers no longer apply.
const REPLY_SKIPPED_HEADERS = new Set(['content-length', 'content-encoding']);

export async function buildServer(context: AppContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, genReqId: () => randomUUID() });

  await app.register(cors);

  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info('Request completed', {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      elapsed: `${(reply.elapsedTime / 1000).toFixed(3)}s`,
      requestId: request.id,
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof GatewayError) {
      return reply.status(error.httpStatus).send(error.toJSON());
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.code ?? 'bad_request',
        message: error.message,
        timestamp: new Date().toISOString(),
      });
    }
    logger.error('Unhandled exception', { method: request.method, url: request.url, error: error.message });
    return reply.status(500).send({
      error: 'internal_server_error',
      message: 'An internal server error occurred',
      details: { path: request.url, method: request.method },
      timestamp: new Date().toISOString(),
    });
  });

  // Proxy scope keeps request bodies as raw buffers so they are forwarded byte for byte.
  await app.register(async (proxyScope) => {
    proxyScope.removeAllContentTypeParsers();
    proxyScope.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    proxyScope.route<{ Params: { '*': string }; Querystring: QueryParams }>({
      method: PROXY_METHODS,
      url: '/orchestrator/*',
      exposeHeadRoute: false,
      handler: async (request, reply) => {
        const result = await context.router.routeRequest({
          method: request.method,
          path: request.params['*'],
          headers: request.headers,
          body: Buffer.isBuffer(request.body) ? request.body : undefined,
          query: request.query,
        });

        reply.status(result.statusCode);
        for (const [key, value] of Object.entries(result.headers)) {
          if (!REPLY_SKIPPED_HEADERS.has(key.toLowerCase())) {
            reply.header(key, value);
          }
        }
        return reply.send(result.body);
      },
    });
  });

  await app.register(registryRoutes(context), { prefix: '/registry' });
  await app.register(healthRoutes(context), { prefix: '/health' });
  await app.register(routerRoutes(context), { prefix: '/router' });
  await app.register(configRoutes(context), { prefix: '/config' });

  app.get('/health', async () => {
    const registryStats = context.registry.stats();
    const summary = context.healthMonitor.getHealthSummary();
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      configuration: {
        loaded: context.configManager?.isLoaded() ?? true,
        endpointsCount: context.config.endpoints.length,
      },
      registry: {
        totalEndpoints: registryStats.total,
        activeEndpoints: registryStats.active,
        unhealthyEndpoints: registryStats.unhealthy,
      },
      healthMonitoring: {
        enabled: summary.config.enabled,
        monitoredEndpoints: summary.totalEndpoints,
        healthyEndpoints: summary.healthyEndpoints,
        healthPercentage: summary.healthPercentage,
      },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', context.metrics.registry.contentType);
    return context.metrics.registry.metrics();
  });

  app.get('/', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    description: 'API gateway with health monitoring, circuit breakers and authentication passthrough',
    endpoints: {
      health: '/health',
      configuration: '/config',
      registry: '/registry',
      routing: '/router',
      metrics: '/metrics',
      orchestrator: '/orchestrator/{path}',
    },
  }));

  return app;
}
