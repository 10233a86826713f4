import { IdentityConflictError, UrlConflictError } from './errors.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import {
  endpointIdFor,
  normalizeUrl,
  sameEndpointConfig,
  type CircuitState,
  type EndpointConfig,
  type EndpointStatus,
  type GatewayConfig,
  type RegisteredEndpoint,
} from './models.js';

type MutableEndpoint = { -readonly [K in keyof RegisteredEndpoint]: RegisteredEndpoint[K] };

export interface ListOptions {
  status?: EndpointStatus;
  includeDisabled?: boolean;
}

export interface SyncResult {
  added: string[];
  updated: string[];
  removed: string[];
  errors: string[];
}

export interface RegistryStats {
  total: number;
  active: number;
  inactive: number;
  disabled: number;
  unhealthy: number;
}

function copyConfig(config: Readonly<EndpointConfig>): EndpointConfig {
  return { ...config, url: normalizeUrl(config.url), methods: [...config.methods] };
}

function initialStatus(config: Readonly<EndpointConfig>): EndpointStatus {
  return config.disabled ? 'disabled' : 'active';
}

/**
 * In-memory table of registered endpoints; the only writer of endpoint
 * runtime state. Every method runs to completion without awaiting, so
 * concurrent callers on the event loop never observe a half-applied update.
 * Identity and URL stay a bijection after every call.
 */
export class EndpointRegistry {
  private readonly endpoints = new Map<string, MutableEndpoint>();
  private readonly urlToId = new Map<string, string>();

  constructor(
    private readonly logger: Logger = createLogger('registry'),
    private readonly now: () => number = Date.now
  ) {}

  register(config: Readonly<EndpointConfig>): RegisteredEndpoint {
    const copy = copyConfig(config);
    const id = endpointIdFor(copy);

    const existing = this.endpoints.get(id);
    if (existing) {
      if (existing.config.url !== copy.url) {
        throw new IdentityConflictError(id);
      }
      existing.config = copy;
      existing.registeredAt = new Date(this.now());
      existing.status = initialStatus(copy);
      this.logger.info('Updated endpoint', { endpointId: id });
      return existing;
    }

    const boundId = this.urlToId.get(copy.url);
    if (boundId !== undefined) {
      throw new UrlConflictError(copy.url, boundId);
    }

    const endpoint: MutableEndpoint = {
      id,
      config: copy,
      status: initialStatus(copy),
      circuitBreakerState: 'closed',
      registeredAt: new Date(this.now()),
      consecutiveFailures: 0,
    };
    this.endpoints.set(id, endpoint);
    this.urlToId.set(copy.url, id);

    this.logger.info('Registered endpoint', { endpointId: id, url: copy.url });
    return endpoint;
  }

  unregister(id: string): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) {
      this.logger.warn('Attempted to unregister non-existent endpoint', { endpointId: id });
      return false;
    }

    this.endpoints.delete(id);
    this.urlToId.delete(endpoint.config.url);
    this.logger.info('Unregistered endpoint', { endpointId: id });
    return true;
  }

  get(id: string): RegisteredEndpoint | undefined {
    return this.endpoints.get(id);
  }

  getByUrl(url: string): RegisteredEndpoint | undefined {
    let key: string;
    try {
      key = normalizeUrl(url);
    } catch {
      return undefined;
    }
    const id = this.urlToId.get(key);
    return id === undefined ? undefined : this.endpoints.get(id);
  }

  list(options: ListOptions = {}): RegisteredEndpoint[] {
    const { status, includeDisabled = true } = options;
    let endpoints: RegisteredEndpoint[] = [...this.endpoints.values()];

    if (!includeDisabled) {
      endpoints = endpoints.filter((ep) => !ep.config.disabled);
    }
    if (status) {
      endpoints = endpoints.filter((ep) => ep.status === status);
    }

    // Array.prototype.sort is stable, so equal timestamps keep insertion order.
    return endpoints.sort((a, b) => a.registeredAt.getTime() - b.registeredAt.getTime());
  }

  getActive(): RegisteredEndpoint[] {
    return this.list({ status: 'active', includeDisabled: false });
  }

  getUnhealthy(): RegisteredEndpoint[] {
    return this.list({ status: 'unhealthy' });
  }

  count(): number {
    return this.endpoints.size;
  }

  updateStatus(id: string, status: EndpointStatus): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) return false;

    const previous = endpoint.status;
    endpoint.status = status;
    if (previous !== status) {
      this.logger.info('Endpoint status changed', { endpointId: id, from: previous, to: status });
    }
    return true;
  }

  updateCircuitBreakerState(id: string, state: CircuitState): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) return false;

    const previous = endpoint.circuitBreakerState;
    endpoint.circuitBreakerState = state;
    if (previous !== state) {
      this.logger.info('Endpoint circuit breaker changed', { endpointId: id, from: previous, to: state });
    }
    return true;
  }

  recordFailure(id: string): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) return false;

    endpoint.consecutiveFailures += 1;
    endpoint.lastFailureTime = new Date(this.now());
    this.logger.debug('Recorded failure', {
      endpointId: id,
      consecutiveFailures: endpoint.consecutiveFailures,
    });
    return true;
  }

  recordSuccess(id: string): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) return false;

    endpoint.consecutiveFailures = 0;
    endpoint.lastFailureTime = undefined;
    return true;
  }

  updateLastHealthCheck(id: string, time: Date): boolean {
    const endpoint = this.endpoints.get(id);
    if (!endpoint) return false;

    endpoint.lastHealthCheck = time;
    return true;
  }

  clear(): void {
    this.endpoints.clear();
    this.urlToId.clear();
    this.logger.info('Cleared all registered endpoints');
  }

  bulkRegister(configs: readonly EndpointConfig[]): { registered: RegisteredEndpoint[]; errors: string[] } {
    const registered: RegisteredEndpoint[] = [];
    const errors: string[] = [];

    for (const config of configs) {
      try {
        registered.push(this.register(config));
      } catch (err) {
        const message = `Failed to register endpoint ${config.url}: ${errorMessage(err)}`;
        this.logger.error(message);
        errors.push(message);
      }
    }

    if (errors.length > 0) {
      this.logger.warn('Bulk registration completed with errors', { errors: errors.length });
    }
    return { registered, errors };
  }

  /**
   * Reconciles the registry against a full configuration snapshot.
   * Changed endpoints restart at ACTIVE or DISABLED; runtime counters are kept.
   */
  syncWithConfig(config: Pick<GatewayConfig, 'endpoints'>): SyncResult {
    const result: SyncResult = { added: [], updated: [], removed: [], errors: [] };
    const wanted: Array<{ id: string; endpointConfig: EndpointConfig }> = [];

    for (const endpointConfig of config.endpoints) {
      try {
        wanted.push({ id: endpointIdFor(endpointConfig), endpointConfig });
      } catch (err) {
        result.errors.push(`Failed to sync endpoint ${endpointConfig.url}: ${errorMessage(err)}`);
      }
    }

    // Removals go first so a URL moving to a new identity is free to register.
    const configIds = new Set(wanted.map(({ id }) => id));
    for (const id of [...this.endpoints.keys()]) {
      if (!configIds.has(id) && this.unregister(id)) {
        result.removed.push(id);
      }
    }

    for (const { id, endpointConfig } of wanted) {
      try {
        const existing = this.endpoints.get(id);
        if (!existing) {
          this.register(endpointConfig);
          result.added.push(id);
          continue;
        }
        if (sameEndpointConfig(existing.config, endpointConfig)) continue;

        const copy = copyConfig(endpointConfig);
        if (copy.url !== existing.config.url) {
          throw new IdentityConflictError(id);
        }
        existing.config = copy;
        existing.status = initialStatus(copy);
        result.updated.push(id);
      } catch (err) {
        const message = `Failed to sync endpoint ${endpointConfig.url}: ${errorMessage(err)}`;
        this.logger.error(message);
        result.errors.push(message);
      }
    }

    this.logger.info('Registry sync completed', {
      added: result.added.length,
      updated: result.updated.length,
      removed: result.removed.length,
      errors: result.errors.length,
    });
    return result;
  }

  stats(): RegistryStats {
    const stats: RegistryStats = { total: this.endpoints.size, active: 0, inactive: 0, disabled: 0, unhealthy: 0 };

    for (const endpoint of this.endpoints.values()) {
      if (endpoint.config.disabled) {
        stats.disabled += 1;
      } else if (endpoint.status !== 'disabled') {
        stats[endpoint.status] += 1;
      }
    }
    return stats;
  }
}
