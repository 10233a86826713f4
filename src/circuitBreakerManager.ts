import { CircuitBreaker, type CircuitBreakerStats } from './circuitBreaker.js';
import { CircuitOpenError, EndpointNotFoundError } from './errors.js';
import { FallbackHandler, type FallbackResponse } from './fallback.js';
import { createLogger, type Logger } from './logger.js';
import { circuitStateValue, type GatewayMetrics } from './metrics.js';
import type { CircuitBreakerSettings, CircuitState, GatewayResponse } from './models.js';
import type { EndpointRegistry } from './registry.js';

export type ExecutionOutcome =
  | { kind: 'success'; response: GatewayResponse }
  | { kind: 'fallback'; fallback: FallbackResponse; state: CircuitState };

export interface CircuitBreakerManagerOptions {
  logger?: Logger;
  metrics?: GatewayMetrics;
  now?: () => number;
}

/**
 * Owns one breaker per endpoint identity and is the only place a
 * CircuitOpenError is caught: callers always get a response or a fallback.
 */
export class CircuitBreakerManager {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly fallbackHandler: FallbackHandler;
  private readonly logger: Logger;
  private readonly metrics?: GatewayMetrics;
  private readonly now: () => number;

  constructor(
    private readonly registry: EndpointRegistry,
    private readonly settings: CircuitBreakerSettings,
    options: CircuitBreakerManagerOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('circuit-breaker');
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;
    this.fallbackHandler = new FallbackHandler(this.now);
  }

  get fallbacks(): FallbackHandler {
    return this.fallbackHandler;
  }

  getCircuitBreaker(endpointId: string): CircuitBreaker {
    let breaker = this.breakers.get(endpointId);
    if (!breaker) {
      breaker = new CircuitBreaker(endpointId, this.settings, this.now, (id, from, to) =>
        this.handleStateChange(id, from, to)
      );
      this.breakers.set(endpointId, breaker);
    }
    return breaker;
  }

  async execute(endpointId: string, operation: () => Promise<GatewayResponse>): Promise<ExecutionOutcome> {
    const breaker = this.getCircuitBreaker(endpointId);

    try {
      const response = await breaker.call(operation);
      if (response.statusCode >= 200 && response.statusCode < 300) {
        this.fallbackHandler.cacheResponse(endpointId, response);
      }
      this.registry.recordSuccess(endpointId);
      return { kind: 'success', response };
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        return { kind: 'fallback', fallback: this.fallbackFor(endpointId), state: breaker.state };
      }
      this.registry.recordFailure(endpointId);
      throw err;
    } finally {
      this.registry.updateCircuitBreakerState(endpointId, breaker.state);
    }
  }

  /** Current state after the lazy open -> half_open check, mirrored into the registry. */
  getState(endpointId: string): CircuitState {
    const state = this.getCircuitBreaker(endpointId).state;
    this.registry.updateCircuitBreakerState(endpointId, state);
    return state;
  }

  fallbackFor(endpointId: string): FallbackResponse {
    const fallback = this.fallbackHandler.handle(
      endpointId,
      this.settings.fallbackStrategy,
      this.settings.fallbackResponse
    );
    this.metrics?.fallbackResponses.inc({ endpoint: endpointId, strategy: fallback.strategy });
    return fallback;
  }

  reset(endpointId: string): CircuitBreakerStats {
    this.requireEndpoint(endpointId);
    const breaker = this.getCircuitBreaker(endpointId);
    breaker.reset();
    this.registry.updateCircuitBreakerState(endpointId, breaker.state);
    this.logger.info('Circuit breaker manually reset', { endpointId });
    return breaker.getStats();
  }

  trip(endpointId: string): CircuitBreakerStats {
    this.requireEndpoint(endpointId);
    const breaker = this.getCircuitBreaker(endpointId);
    breaker.trip();
    this.registry.updateCircuitBreakerState(endpointId, breaker.state);
    this.logger.info('Circuit breaker manually tripped', { endpointId });
    return breaker.getStats();
  }

  getStats(endpointId: string): CircuitBreakerStats | undefined {
    return this.breakers.get(endpointId)?.getStats();
  }

  getAllStats(): CircuitBreakerStats[] {
    return [...this.breakers.values()].map((breaker) => breaker.getStats());
  }

  /** Drops breakers (and cached fallbacks) of endpoints no longer registered. */
  cleanup(): string[] {
    const removed: string[] = [];
    for (const endpointId of [...this.breakers.keys()]) {
      if (this.registry.get(endpointId)) continue;
      this.breakers.delete(endpointId);
      this.fallbackHandler.evict(endpointId);
      this.metrics?.circuitBreakerState.remove({ endpoint: endpointId });
      removed.push(endpointId);
    }
    if (removed.length > 0) {
      this.logger.info('Cleaned up unused circuit breakers', { count: removed.length });
    }
    return removed;
  }

  private requireEndpoint(endpointId: string): void {
    if (!this.registry.get(endpointId)) {
      throw EndpointNotFoundError.forId(endpointId);
    }
  }

  private handleStateChange(endpointId: string, from: CircuitState, to: CircuitState): void {
    this.metrics?.circuitBreakerState.set({ endpoint: endpointId }, circuitStateValue(to));
    this.registry.updateCircuitBreakerState(endpointId, to);
    const meta = { endpointId, from, to };
    if (to === 'open') {
      this.logger.warn('Circuit breaker opened', meta);
    } else {
      this.logger.info('Circuit breaker state changed', meta);
    }
  }
}
