import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../context.js';
import { EndpointNotFoundError } from '../errors.js';
import type { EndpointHealth } from '../models.js';

function healthView(health: EndpointHealth) {
  return {
    endpointId: health.endpointId,
    status: health.status,
    lastCheckTime: health.lastCheckTime.toISOString(),
    responseTimeMs: health.responseTimeMs ?? null,
    errorMessage: health.errorMessage ?? null,
    consecutiveFailures: health.consecutiveFailures,
    consecutiveSuccesses: health.consecutiveSuccesses,
  };
}

export function systemStatus(percentage: number): 'healthy' | 'degraded' | 'unhealthy' {
  if (percentage >= 90) return 'healthy';
  if (percentage >= 70) return 'degraded';
  return 'unhealthy';
}

export function healthRoutes({ healthMonitor, circuitBreakers, registry }: AppContext): FastifyPluginAsync {
  return async (app) => {
    app.get('/status', async () => {
      const summary = healthMonitor.getHealthSummary();
      const breakers = circuitBreakers.getAllStats();
      const open = breakers.filter((b) => b.state === 'open').length;
      const halfOpen = breakers.filter((b) => b.state === 'half_open').length;
      const closed = breakers.length - open - halfOpen;
      const breakerHealth = breakers.length > 0 ? (closed / breakers.length) * 100 : 100;

      return {
        systemStatus: systemStatus(Math.min(summary.healthPercentage, breakerHealth)),
        timestamp: new Date().toISOString(),
        summary,
        circuitBreakerSummary: {
          totalCircuitBreakers: breakers.length,
          openBreakers: open,
          halfOpenBreakers: halfOpen,
          closedBreakers: closed,
          healthPercentage: breakerHealth,
        },
      };
    });

    app.get('/endpoints', async () => {
      const records = healthMonitor.getAllHealthStatus();
      return { endpoints: records.map(healthView), totalCount: records.length };
    });

    app.get<{ Params: { id: string } }>('/endpoints/:id', async (request) => {
      const { id } = request.params;
      const endpoint = registry.get(id);
      if (!endpoint) throw EndpointNotFoundError.forId(id);
      const health = healthMonitor.getEndpointHealth(id);
      return {
        endpointId: id,
        health: health ? healthView(health) : null,
        circuitBreaker: circuitBreakers.getStats(id) ?? null,
        registryStatus: endpoint.status,
      };
    });

    app.post<{ Params: { id: string } }>('/check/:id', async (request) => {
      const health = await healthMonitor.checkEndpointImmediately(request.params.id);
      return { success: true, health: healthView(health), timestamp: new Date().toISOString() };
    });

    app.get('/unhealthy', async () => {
      const records = healthMonitor.getUnhealthyEndpoints();
      return { unhealthyEndpoints: records.map(healthView), count: records.length };
    });

    app.get('/summary', async () => healthMonitor.getHealthSummary());

    app.get('/circuit-breakers', async () => {
      const breakers = circuitBreakers.getAllStats();
      return { circuitBreakers: breakers, totalCount: breakers.length };
    });

    app.get('/circuit-breakers/open', async () => {
      const open = circuitBreakers.getAllStats().filter((b) => b.state === 'open');
      return { openCircuitBreakers: open, count: open.length };
    });

    app.post<{ Params: { id: string } }>('/circuit-breakers/:id/reset', async (request) => ({
      success: true,
      circuitBreaker: circuitBreakers.reset(request.params.id),
    }));

    app.post<{ Params: { id: string } }>('/circuit-breakers/:id/trip', async (request) => ({
      success: true,
      circuitBreaker: circuitBreakers.trip(request.params.id),
    }));
  };
}
