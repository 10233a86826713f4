import { CircuitOpenError } from './errors.js';
import type { CircuitBreakerSettings, CircuitState, FallbackStrategy } from './models.js';

export type StateChangeListener = (endpointId: string, from: CircuitState, to: CircuitState) => void;

export interface CircuitBreakerStats {
  endpointId: string;
  state: CircuitState;
  failureCount: number;
  lastFailureTime: string | null;
  lastSuccessTime: string | null;
  stateChangedTime: string;
  halfOpenCalls: number;
  config: {
    failureThreshold: number;
    resetTimeout: number;
    halfOpenMaxCalls: number;
    fallbackStrategy: FallbackStrategy;
  };
}

const iso = (ms: number | undefined): string | null => (ms === undefined ? null : new Date(ms).toISOString());

/**
 * Per-endpoint breaker.
 *
 *   closed   : calls flow; `failureThreshold` consecutive failures open it
 *   open     : calls rejected; after `resetTimeout` seconds since the last
 *               failure the next state query moves it to half-open
 *   half_open: up to `halfOpenMaxCalls` trial calls; one success closes,
 *               one failure reopens
 *
 * There is no timer: the open -> half_open move happens only when the state
 * is read. Admission runs synchronously before the wrapped operation is
 * awaited, which serialises concurrent callers on the event loop.
 */
export class CircuitBreaker {
  private _state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime: number | undefined;
  private lastSuccessTime: number | undefined;
  private halfOpenCalls = 0;
  private stateChangedTime: number;

  constructor(
    readonly endpointId: string,
    private readonly config: CircuitBreakerSettings,
    private readonly now: () => number = Date.now,
    private readonly onStateChange?: StateChangeListener
  ) {
    this.stateChangedTime = now();
  }

  get state(): CircuitState {
    if (this._state === 'open' && this.lastFailureTime !== undefined) {
      const elapsed = this.now() - this.lastFailureTime;
      if (elapsed >= this.config.resetTimeout * 1000) {
        this.transition('half_open');
      }
    }
    return this._state;
  }

  async call<T>(operation: () => Promise<T>): Promise<T> {
    const state = this.state;

    if (state === 'open') {
      throw new CircuitOpenError(`Circuit breaker is open for ${this.endpointId}`, this.endpointId);
    }
    if (state === 'half_open') {
      if (this.halfOpenCalls >= this.config.halfOpenMaxCalls) {
        throw new CircuitOpenError(`Half-open call limit exceeded for ${this.endpointId}`, this.endpointId);
      }
      this.halfOpenCalls += 1;
    }

    let result: T;
    try {
      result = await operation();
    } catch (err) {
      this.onFailure();
      throw err;
    }
    this.onSuccess();
    return result;
  }

  reset(): void {
    this.transition('closed');
  }

  trip(): void {
    this.failureCount = this.config.failureThreshold;
    this.lastFailureTime = this.now();
    this.transition('open');
  }

  getStats(): CircuitBreakerStats {
    return {
      endpointId: this.endpointId,
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: iso(this.lastFailureTime),
      lastSuccessTime: iso(this.lastSuccessTime),
      stateChangedTime: new Date(this.stateChangedTime).toISOString(),
      halfOpenCalls: this.halfOpenCalls,
      config: {
        failureThreshold: this.config.failureThreshold,
        resetTimeout: this.config.resetTimeout,
        halfOpenMaxCalls: this.config.halfOpenMaxCalls,
        fallbackStrategy: this.config.fallbackStrategy,
      },
    };
  }

  private onSuccess(): void {
    this.lastSuccessTime = this.now();
    if (this._state === 'half_open') {
      this.transition('closed');
    } else if (this._state === 'closed') {
      this.failureCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount += 1;
    this.lastFailureTime = this.now();

    if (this._state === 'closed' && this.failureCount >= this.config.failureThreshold) {
      this.transition('open');
    } else if (this._state === 'half_open') {
      this.transition('open');
    }
  }

  private transition(to: CircuitState): void {
    const from = this._state;
    this._state = to;
    this.stateChangedTime = this.now();
    this.halfOpenCalls = 0;
    if (to === 'closed') {
      this.failureCount = 0;
    }
    if (from !== to) {
      this.onStateChange?.(this.endpointId, from, to);
    }
  }
}
