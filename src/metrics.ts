import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { CircuitState } from './models.js';

export interface GatewayMetrics {
  registry: Registry;
  requestsTotal: Counter<'endpoint' | 'status' | 'method'>;
  requestDuration: Histogram<'endpoint'>;
  circuitBreakerState: Gauge<'endpoint'>;
  fallbackResponses: Counter<'endpoint' | 'strategy'>;
  endpointHealthy: Gauge<'endpoint'>;
}

const CIRCUIT_STATE_VALUE: Record<CircuitState, number> = {
  closed: 0,
  open: 1,
  half_open: 2,
};

export function circuitStateValue(state: CircuitState): number {
  return CIRCUIT_STATE_VALUE[state];
}

// One registry per application context, so tests and embedded instances never collide.
export function createMetrics(): GatewayMetrics {
  const registry = new Registry();

  return {
    registry,
    requestsTotal: new Counter({
      name: 'gateway_requests_total',
      help: 'Total requests through gateway',
      labelNames: ['endpoint', 'status', 'method'],
      registers: [registry],
    }),
    requestDuration: new Histogram({
      name: 'gateway_request_duration_seconds',
      help: 'Request duration in seconds',
      labelNames: ['endpoint'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [registry],
    }),
    circuitBreakerState: new Gauge({
      name: 'gateway_circuit_breaker_state',
      help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
      labelNames: ['endpoint'],
      registers: [registry],
    }),
    fallbackResponses: new Counter({
      name: 'gateway_fallback_responses_total',
      help: 'Fallback responses served while a circuit was open',
      labelNames: ['endpoint', 'strategy'],
      registers: [registry],
    }),
    endpointHealthy: new Gauge({
      name: 'gateway_endpoint_healthy',
      help: 'Health check verdict per endpoint (1=healthy, 0=unhealthy)',
      labelNames: ['endpoint'],
      registers: [registry],
    }),
  };
}
