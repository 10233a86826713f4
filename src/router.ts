import type { CircuitBreakerManager } from './circuitBreakerManager.js';
import { EndpointNotFoundError, GatewayError, PolicyRejectionError } from './errors.js';
import type { FallbackResponse } from './fallback.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import type { GatewayMetrics } from './metrics.js';
import type {
  CircuitState,
  GatewayRequest,
  GatewayResponse,
  HttpMethod,
  RegisteredEndpoint,
} from './models.js';
import { EndpointProxy, healthCheckUrl } from './proxy.js';
import type { EndpointRegistry } from './registry.js';

export interface RouteMatch {
  pattern: string;
  endpoint: RegisteredEndpoint;
  relativePath: string;
}

export interface ActiveRoute {
  pattern: string;
  endpointId: string;
  targetUrl: string;
  methods: HttpMethod[];
  status: RegisteredEndpoint['status'];
  circuitBreakerState: CircuitState;
}

export interface ConnectivityResult {
  endpointId: string;
  url: string;
  statusCode: number | null;
  responseTimeMs: number;
  success: boolean;
  error: string | null;
}

export interface RequestRouterOptions {
  circuitBreakers?: CircuitBreakerManager;
  proxy?: EndpointProxy;
  logger?: Logger;
  metrics?: GatewayMetrics;
  now?: () => number;
}

const CONNECTIVITY_TIMEOUT_MS = 10_000;

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

function isHttpMethod(method: string, allowed: readonly HttpMethod[]): boolean {
  return allowed.some((m) => m === method);
}

export class RequestRouter {
  private routeCache = new Map<string, RegisteredEndpoint>();
  private readonly circuitBreakers?: CircuitBreakerManager;
  private readonly proxy: EndpointProxy;
  private readonly logger: Logger;
  private readonly metrics?: GatewayMetrics;
  private readonly now: () => number;

  constructor(
    private readonly registry: EndpointRegistry,
    options: RequestRouterOptions = {}
  ) {
    this.circuitBreakers = options.circuitBreakers;
    this.logger = options.logger ?? createLogger('router');
    this.proxy = options.proxy ?? new EndpointProxy({ logger: this.logger });
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;
    this.refreshRoutes();
  }

  /** Rebuilds the whole route table from the registry. */
  refreshRoutes(): void {
    const cache = new Map<string, RegisteredEndpoint>();
    for (const endpoint of this.registry.list({ includeDisabled: false })) {
      const name = endpoint.config.name ?? endpoint.id;
      cache.set(`/${name}`, endpoint);
      if (endpoint.config.version) {
        cache.set(`/${endpoint.config.version}/${name}`, endpoint);
      }
    }
    this.routeCache = cache;
    this.logger.info('Route cache refreshed', { routes: cache.size });
  }

  /** Exact path first, then `/{a}/{b}` for versioned routes, then `/{a}`. */
  resolve(path: string): RouteMatch | undefined {
    const normalized = normalizePath(path);
    const segments = normalized.split('/').filter(Boolean);

    const candidates = [normalized];
    if (segments.length >= 2) {
      candidates.push(`/${segments[0]}/${segments[1]}`);
    }
    if (segments.length >= 1) {
      candidates.push(`/${segments[0]}`);
    }

    for (const pattern of candidates) {
      const endpoint = this.routeCache.get(pattern);
      if (endpoint) {
        const relativePath = normalized.slice(pattern.length).replace(/^\/+/, '');
        return { pattern, endpoint, relativePath };
      }
    }
    return undefined;
  }

  async routeRequest(request: GatewayRequest): Promise<GatewayResponse> {
    const start = this.now();
    const method = request.method.toUpperCase();
    const match = this.resolve(request.path);

    if (!match) {
      this.logger.warn('No endpoint found for path', { path: request.path, method });
      this.metrics?.requestsTotal.inc({ endpoint: 'unmatched', status: '404', method });
      throw EndpointNotFoundError.forPath(request.path);
    }

    // Re-read live state: cached references may belong to an endpoint since replaced.
    const endpoint = this.registry.get(match.endpoint.id) ?? match.endpoint;
    const endTimer = this.metrics?.requestDuration.startTimer({ endpoint: endpoint.id });

    try {
      const fallback = this.checkPolicy(endpoint, method);
      if (fallback) {
        const response = this.fallbackResponse(endpoint, fallback.response, fallback.state, start);
        this.record(endpoint.id, method, response.statusCode);
        return response;
      }

      const upstream = await this.forward(endpoint, request, match.relativePath, start);
      this.record(endpoint.id, method, upstream.statusCode);
      this.logger.info('Routed request', {
        method,
        path: request.path,
        endpointId: endpoint.id,
        status: upstream.statusCode,
        elapsed: upstream.headers['X-Response-Time'],
      });
      return upstream;
    } catch (err) {
      const status = err instanceof GatewayError ? err.httpStatus : 500;
      this.record(endpoint.id, method, status);
      if (err instanceof GatewayError && err.isExpected) {
        this.logger.warn('Request rejected', { method, path: request.path, endpointId: endpoint.id, reason: err.code });
      } else {
        this.logger.error('Routing error', { method, path: request.path, endpointId: endpoint.id, error: errorMessage(err) });
      }
      throw err;
    } finally {
      endTimer?.();
    }
  }

  /**
   * Policy checks in order: disabled, unhealthy, circuit open, method.
   * With a breaker manager attached an open mirror is confirmed against the
   * live breaker, which answers with its fallback when still open.
   */
  private checkPolicy(
    endpoint: RegisteredEndpoint,
    method: string
  ): { response: FallbackResponse; state: CircuitState } | undefined {
    if (endpoint.config.disabled) {
      throw new PolicyRejectionError('disabled', 'Endpoint is disabled', endpoint.id);
    }
    if (endpoint.status === 'unhealthy') {
      throw new PolicyRejectionError('unhealthy', 'Endpoint is unhealthy', endpoint.id);
    }
    if (endpoint.circuitBreakerState === 'open') {
      if (!this.circuitBreakers) {
        throw new PolicyRejectionError('circuit_open', 'Circuit breaker is open', endpoint.id);
      }
      const state = this.circuitBreakers.getState(endpoint.id);
      if (state === 'open') {
        return { response: this.circuitBreakers.fallbackFor(endpoint.id), state };
      }
    }
    if (!isHttpMethod(method, endpoint.config.methods)) {
      throw new PolicyRejectionError(
        'method_not_allowed',
        `Method ${method} not allowed. Allowed: ${endpoint.config.methods.join(', ')}`,
        endpoint.id
      );
    }
    return undefined;
  }

  private async forward(
    endpoint: RegisteredEndpoint,
    request: GatewayRequest,
    relativePath: string,
    start: number
  ): Promise<GatewayResponse> {
    if (!this.circuitBreakers) {
      try {
        const response = await this.proxy.forward(endpoint, request, relativePath);
        this.registry.recordSuccess(endpoint.id);
        return this.decorate(response, endpoint.id, start);
      } catch (err) {
        this.registry.recordFailure(endpoint.id);
        throw err;
      }
    }

    const outcome = await this.circuitBreakers.execute(endpoint.id, () =>
      this.proxy.forward(endpoint, request, relativePath)
    );
    if (outcome.kind === 'fallback') {
      return this.fallbackResponse(endpoint, outcome.fallback, outcome.state, start);
    }
    return this.decorate(outcome.response, endpoint.id, start);
  }

  private fallbackResponse(
    endpoint: RegisteredEndpoint,
    fallback: FallbackResponse,
    state: CircuitState,
    start: number
  ): GatewayResponse {
    const diagnostic = {
      'X-Circuit-Breaker': 'fallback',
      'X-Circuit-Breaker-State': state,
      'X-Fallback-Strategy': fallback.strategy,
    };

    if (fallback.kind === 'cached') {
      const { response, cachedAt } = fallback.entry;
      return this.decorate(
        {
          statusCode: 503,
          headers: { ...response.headers, ...diagnostic, 'X-Cached-At': cachedAt.toISOString() },
          body: response.body,
        },
        endpoint.id,
        start
      );
    }

    return this.decorate(
      {
        statusCode: 503,
        headers: { 'Content-Type': 'application/json', ...diagnostic },
        body: Buffer.from(JSON.stringify(fallback.body)),
      },
      endpoint.id,
      start
    );
  }

  private decorate(response: GatewayResponse, endpointId: string, start: number): GatewayResponse {
    return {
      ...response,
      headers: {
        ...response.headers,
        'X-Response-Time': formatElapsed(this.now() - start),
        'X-Endpoint-ID': endpointId,
      },
    };
  }

  private record(endpointId: string, method: string, status: number): void {
    this.metrics?.requestsTotal.inc({ endpoint: endpointId, status: String(status), method });
  }

  getActiveRoutes(): ActiveRoute[] {
    return [...this.routeCache.entries()].map(([pattern, cached]) => {
      const endpoint = this.registry.get(cached.id) ?? cached;
      return {
        pattern,
        endpointId: endpoint.id,
        targetUrl: endpoint.config.url,
        methods: [...endpoint.config.methods],
        status: endpoint.status,
        circuitBreakerState: endpoint.circuitBreakerState,
      };
    });
  }

  async testEndpointConnectivity(endpointId: string): Promise<ConnectivityResult> {
    const endpoint = this.registry.get(endpointId);
    if (!endpoint) {
      throw EndpointNotFoundError.forId(endpointId);
    }

    const url = healthCheckUrl(endpoint);
    const start = this.now();
    try {
      const { status } = await this.proxy.probe(url, CONNECTIVITY_TIMEOUT_MS);
      return {
        endpointId,
        url,
        statusCode: status,
        responseTimeMs: this.now() - start,
        success: status >= 200 && status < 400,
        error: null,
      };
    } catch (err) {
      return {
        endpointId,
        url,
        statusCode: null,
        responseTimeMs: this.now() - start,
        success: false,
        error: errorMessage(err),
      };
    }
  }

  cleanup(): void {
    this.routeCache.clear();
  }
}
