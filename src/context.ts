import { CircuitBreakerManager } from './circuitBreakerManager.js';
import type { ConfigManager } from './configManager.js';
import { HealthMonitor } from './healthMonitor.js';
import { createLogger } from './logger.js';
import { createMetrics, type GatewayMetrics } from './metrics.js';
import type { GatewayConfig } from './models.js';
import { EndpointProxy, type FetchFn } from './proxy.js';
import { EndpointRegistry, type SyncResult } from './registry.js';
import { RequestRouter } from './router.js';

export interface AppContextDeps {
  fetch?: FetchFn;
  now?: () => number;
  metrics?: GatewayMetrics;
  configManager?: ConfigManager;
}

export interface AppContext {
  config: GatewayConfig;
  registry: EndpointRegistry;
  circuitBreakers: CircuitBreakerManager;
  router: RequestRouter;
  healthMonitor: HealthMonitor;
  metrics: GatewayMetrics;
  configManager?: ConfigManager;
  /** Registers the configured endpoints and builds the route table. */
  bootstrap: () => { registered: number; errors: string[] };
  /** Reload path: registry sync, then route refresh, then breaker sweep. */
  applyConfig: (config: GatewayConfig) => SyncResult;
  close: () => Promise<void>;
}

export function createAppContext(config: GatewayConfig, deps: AppContextDeps = {}): AppContext {
  const metrics = deps.metrics ?? createMetrics();
  const now = deps.now ?? Date.now;

  const registry = new EndpointRegistry(createLogger('registry'), now);
  const circuitBreakers = new CircuitBreakerManager(registry, config.circuitBreaker, {
    logger: createLogger('circuit-breaker'),
    metrics,
    now,
  });
  const router = new RequestRouter(registry, {
    circuitBreakers,
    proxy: new EndpointProxy({ fetch: deps.fetch, logger: createLogger('proxy') }),
    logger: createLogger('router'),
    metrics,
    now,
  });
  const healthMonitor = new HealthMonitor(registry, config.healthCheck, {
    fetch: deps.fetch,
    logger: createLogger('health'),
    metrics,
    now,
  });

  const context: AppContext = {
    config,
    registry,
    circuitBreakers,
    router,
    healthMonitor,
    metrics,
    configManager: deps.configManager,
    bootstrap: () => {
      const { registered, errors } = registry.bulkRegister(config.endpoints);
      router.refreshRoutes();
      return { registered: registered.length, errors };
    },
    applyConfig: (next) => {
      const result = registry.syncWithConfig(next);
      router.refreshRoutes();
      circuitBreakers.cleanup();
      context.config = { ...context.config, endpoints: next.endpoints };
      return result;
    },
    close: async () => {
      await healthMonitor.stop();
      await deps.configManager?.stopWatching();
      router.cleanup();
    },
  };
  return context;
}
