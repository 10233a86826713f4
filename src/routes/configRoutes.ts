import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { errorMessage } from '../logger.js';
import { parseOrThrow } from './registryRoutes.js';

const ValidateBodySchema = z.object({ config_path: z.string().min(1) });

export function configRoutes(context: AppContext): FastifyPluginAsync {
  return async (app) => {
    app.post('/reload', async (_request, reply) => {
      const manager = context.configManager;
      if (!manager) {
        return reply.status(404).send({
          error: 'configuration_not_loaded',
          message: 'No configuration file is attached',
          timestamp: new Date().toISOString(),
        });
      }
      try {
        // Reload callbacks apply the new snapshot to the registry and routes.
        const config = await manager.reload();
        return {
          success: true,
          message: 'Configuration reloaded successfully',
          endpointsCount: config.endpoints.length,
          timestamp: new Date().toISOString(),
        };
      } catch (err) {
        return reply.status(400).send({
          success: false,
          error: 'configuration_error',
          message: errorMessage(err),
          timestamp: new Date().toISOString(),
        });
      }
    });

    app.get('/status', async () => {
      const status = context.configManager?.getStatus();
      return status ?? { loaded: true, configPath: null, endpointsCount: context.config.endpoints.length };
    });

    app.get('/endpoints', async () => {
      const endpoints = context.config.endpoints.map((endpoint) => ({
        url: endpoint.url,
        name: endpoint.name ?? null,
        version: endpoint.version ?? null,
        methods: [...endpoint.methods],
        authType: endpoint.authType,
        disabled: endpoint.disabled,
        healthCheckPath: endpoint.healthCheckPath ?? null,
        timeout: endpoint.timeout,
      }));
      return { endpoints, totalCount: endpoints.length };
    });

    app.post('/validate', async (request) => {
      const { config_path: configPath } = parseOrThrow(ValidateBodySchema, request.body, 'validation request');
      const manager = context.configManager;
      if (!manager) {
        return { valid: false, errorMessage: 'No configuration manager attached', configPath };
      }
      const { valid, error } = await manager.validateFile(configPath);
      return { valid, errorMessage: error, configPath };
    });
  };
}
