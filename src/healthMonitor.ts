import { EndpointNotFoundError } from './errors.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import type { GatewayMetrics } from './metrics.js';
import type { EndpointHealth, HealthCheckSettings, RegisteredEndpoint } from './models.js';
import { EndpointProxy, healthCheckUrl, type FetchFn } from './proxy.js';
import type { EndpointRegistry } from './registry.js';

export const MIN_INTERVAL_SECONDS = 5;
export const LOOP_ERROR_BACKOFF_MS = 5_000;
const DAY_MS = 24 * 60 * 60 * 1000;

interface ProbeOutcome {
  healthy: boolean;
  responseTimeMs: number;
  errorMessage?: string;
}

export interface HealthSummary {
  totalEndpoints: number;
  healthyEndpoints: number;
  unhealthyEndpoints: number;
  healthPercentage: number;
  averageResponseTimeMs: number;
  lastCheckTime: string | null;
  config: HealthCheckSettings;
}

export interface HealthMonitorOptions {
  fetch?: FetchFn;
  logger?: Logger;
  metrics?: GatewayMetrics;
  now?: () => number;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Probes every enabled endpoint on a fixed interval, concurrently, and
 * flips registry status with hysteresis: UNHEALTHY after
 * `unhealthyThreshold` consecutive failed probes, ACTIVE again after
 * `healthyThreshold` consecutive good ones.
 */
export class HealthMonitor {
  private readonly health = new Map<string, EndpointHealth>();
  private readonly prober: EndpointProxy;
  private readonly logger: Logger;
  private readonly metrics?: GatewayMetrics;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  // Bumped on every start so a tick left over from an earlier run never reschedules.
  private generation = 0;
  private inFlight: Promise<void> | undefined;

  constructor(
    private readonly registry: EndpointRegistry,
    private readonly config: HealthCheckSettings,
    options: HealthMonitorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('health');
    this.prober = new EndpointProxy({ fetch: options.fetch, logger: this.logger });
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (!this.config.enabled || this.running) return;
    this.running = true;
    this.generation += 1;
    this.schedule(0, this.generation);
    this.logger.info('Health monitor started', { interval: this.intervalMs() / 1000 });
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
    this.logger.info('Health monitor stopped');
  }

  /** One tick: probe every non-disabled endpoint concurrently and apply the results. */
  async checkAll(): Promise<void> {
    const endpoints = this.registry.list({ includeDisabled: false });
    if (endpoints.length === 0) return;

    const results = await Promise.allSettled(endpoints.map((endpoint) => this.checkEndpoint(endpoint)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error('Health check exception', {
          endpointId: endpoints[i]?.id,
          error: errorMessage(result.reason),
        });
      }
    });
  }

  async checkEndpointImmediately(endpointId: string): Promise<EndpointHealth> {
    const endpoint = this.registry.get(endpointId);
    if (!endpoint) {
      throw EndpointNotFoundError.forId(endpointId);
    }
    return this.checkEndpoint(endpoint);
  }

  getEndpointHealth(endpointId: string): EndpointHealth | undefined {
    return this.health.get(endpointId);
  }

  getAllHealthStatus(): EndpointHealth[] {
    return [...this.health.values()];
  }

  getUnhealthyEndpoints(): EndpointHealth[] {
    return this.getAllHealthStatus().filter((h) => h.status === 'unhealthy');
  }

  getHealthSummary(): HealthSummary {
    const records = this.getAllHealthStatus();
    const total = records.length;
    const healthy = records.filter((h) => h.status === 'active').length;
    const times = records.flatMap((h) => (h.responseTimeMs === undefined ? [] : [h.responseTimeMs]));
    const lastCheck = records.reduce<number | undefined>(
      (latest, h) => Math.max(latest ?? 0, h.lastCheckTime.getTime()),
      undefined
    );

    return {
      totalEndpoints: total,
      healthyEndpoints: healthy,
      unhealthyEndpoints: total - healthy,
      healthPercentage: total > 0 ? (healthy / total) * 100 : 100,
      averageResponseTimeMs: times.length > 0 ? times.reduce((a, b) => a + b, 0) / times.length : 0,
      lastCheckTime: lastCheck === undefined ? null : new Date(lastCheck).toISOString(),
      config: { ...this.config },
    };
  }

  /** Evicts records of unregistered endpoints and of those not checked within `maxAgeMs`. */
  cleanupStale(maxAgeMs: number = DAY_MS): string[] {
    const cutoff = this.now() - maxAgeMs;
    const stale: string[] = [];

    for (const [endpointId, record] of this.health) {
      if (!this.registry.get(endpointId) || record.lastCheckTime.getTime() < cutoff) {
        stale.push(endpointId);
      }
    }
    for (const endpointId of stale) {
      this.health.delete(endpointId);
      this.metrics?.endpointHealthy.remove({ endpoint: endpointId });
    }
    if (stale.length > 0) {
      this.logger.info('Cleaned up stale health records', { count: stale.length });
    }
    return stale;
  }

  private intervalMs(): number {
    return Math.max(this.config.interval, MIN_INTERVAL_SECONDS) * 1000;
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.inFlight = this.tick(generation);
    }, delayMs);
    this.timer.unref();
  }

  private async tick(generation: number): Promise<void> {
    let delay = this.intervalMs();
    try {
      await this.checkAll();
    } catch (err) {
      this.logger.error('Error in health check loop', { error: errorMessage(err) });
      delay = LOOP_ERROR_BACKOFF_MS;
    }
    if (this.running && generation === this.generation) {
      this.schedule(delay, generation);
    }
  }

  private async checkEndpoint(endpoint: RegisteredEndpoint): Promise<EndpointHealth> {
    const outcome = await this.probe(endpoint);
    return this.apply(endpoint, outcome);
  }

  private async probe(endpoint: RegisteredEndpoint): Promise<ProbeOutcome> {
    const url = healthCheckUrl(endpoint);
    const start = this.now();

    try {
      const { status } = await this.prober.probe(url, this.config.timeout * 1000);
      const responseTimeMs = this.now() - start;
      this.logger.debug('Health check', { endpointId: endpoint.id, status, responseTimeMs });
      if (status >= 200 && status < 400) {
        return { healthy: true, responseTimeMs };
      }
      return { healthy: false, responseTimeMs, errorMessage: `HTTP ${status}` };
    } catch (err) {
      const responseTimeMs = this.now() - start;
      if (isTimeout(err)) {
        this.logger.warn('Health check timeout', { endpointId: endpoint.id });
        return { healthy: false, responseTimeMs, errorMessage: 'Request timeout' };
      }
      if (err instanceof TypeError) {
        this.logger.warn('Health check connection error', { endpointId: endpoint.id });
        return { healthy: false, responseTimeMs, errorMessage: 'Connection error' };
      }
      this.logger.error('Health check error', { endpointId: endpoint.id, error: errorMessage(err) });
      return { healthy: false, responseTimeMs, errorMessage: errorMessage(err) };
    }
  }

  private apply(endpoint: RegisteredEndpoint, outcome: ProbeOutcome): EndpointHealth {
    const checkedAt = new Date(this.now());
    let record = this.health.get(endpoint.id);
    if (!record) {
      record = {
        endpointId: endpoint.id,
        status: 'active',
        lastCheckTime: checkedAt,
        consecutiveFailures: 0,
        consecutiveSuccesses: 0,
      };
      this.health.set(endpoint.id, record);
    }

    const previous = record.status;
    record.lastCheckTime = checkedAt;
    record.responseTimeMs = outcome.responseTimeMs;
    record.errorMessage = outcome.errorMessage;

    if (outcome.healthy) {
      record.consecutiveSuccesses += 1;
      record.consecutiveFailures = 0;
    } else {
      record.consecutiveFailures += 1;
      record.consecutiveSuccesses = 0;
    }

    if (record.consecutiveFailures >= this.config.unhealthyThreshold) {
      record.status = 'unhealthy';
    } else if (record.consecutiveSuccesses >= this.config.healthyThreshold) {
      record.status = 'active';
    }

    if (previous !== record.status) {
      this.logger.info('Endpoint health changed', { endpointId: endpoint.id, from: previous, to: record.status });
    }

    // Disabled endpoints can be probed on demand but keep their DISABLED status.
    const live = this.registry.get(endpoint.id);
    if (live && !live.config.disabled) {
      this.registry.updateStatus(endpoint.id, record.status);
    }
    this.registry.updateLastHealthCheck(endpoint.id, checkedAt);
    this.metrics?.endpointHealthy.set({ endpoint: endpoint.id }, record.status === 'active' ? 1 : 0);

    return { ...record };
  }
}
