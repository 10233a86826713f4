import type { FallbackStrategy, GatewayResponse } from './models.js';

export const MAX_CACHE_ENTRY_BYTES = 10_000;
export const MAX_CACHE_ENTRIES = 100;

export interface CachedResponse {
  endpointId: string;
  response: GatewayResponse;
  cachedAt: Date;
}

export type FallbackResponse =
  | { kind: 'body'; strategy: FallbackStrategy; body: Record<string, unknown> }
  | { kind: 'cached'; strategy: 'cached_response'; entry: CachedResponse };

export class FallbackHandler {
  // Map iteration order is cache-time order: entries are re-inserted on every refresh.
  private readonly cache = new Map<string, CachedResponse>();

  constructor(private readonly now: () => number = Date.now) {}

  handle(
    endpointId: string,
    strategy: FallbackStrategy,
    staticResponse?: Record<string, unknown>
  ): FallbackResponse {
    switch (strategy) {
      case 'error_response':
        return { kind: 'body', strategy, body: this.errorBody(endpointId) };
      case 'default_response':
        return {
          kind: 'body',
          strategy,
          body: staticResponse ?? {
            message: 'Default response - service temporarily unavailable',
            endpoint_id: endpointId,
            timestamp: this.timestamp(),
          },
        };
      case 'cached_response': {
        const entry = this.cache.get(endpointId);
        if (entry) return { kind: 'cached', strategy, entry };
        return { kind: 'body', strategy, body: this.errorBody(endpointId) };
      }
      case 'redirect':
        // No redirect targets are configurable yet; answer like error_response.
        return {
          kind: 'body',
          strategy,
          body: this.errorBody(endpointId, `Service ${endpointId} is unavailable - redirect not configured`),
        };
      default: {
        const unhandled: never = strategy;
        throw new Error(`Unknown fallback strategy: ${String(unhandled)}`);
      }
    }
  }

  /** Returns false when the response is too large to cache. */
  cacheResponse(endpointId: string, response: GatewayResponse): boolean {
    if (response.body.length >= MAX_CACHE_ENTRY_BYTES) return false;

    this.cache.delete(endpointId);
    this.cache.set(endpointId, {
      endpointId,
      response: { statusCode: response.statusCode, headers: { ...response.headers }, body: response.body },
      cachedAt: new Date(this.now()),
    });

    while (this.cache.size > MAX_CACHE_ENTRIES) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    return true;
  }

  getCached(endpointId: string): CachedResponse | undefined {
    return this.cache.get(endpointId);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  evict(endpointId: string): void {
    this.cache.delete(endpointId);
  }

  private errorBody(endpointId: string, message = `Service ${endpointId} is currently unavailable`) {
    return {
      error: 'service_unavailable',
      message,
      circuit_breaker_state: 'open',
      timestamp: this.timestamp(),
    };
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
