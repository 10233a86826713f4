export type PolicyReason = 'disabled' | 'unhealthy' | 'circuit_open' | 'method_not_allowed';

/**
 * Base class for every error the gateway surfaces at its boundary.
 * `code` is the machine-readable reason written into error bodies.
 */
export abstract class GatewayError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;
  /** Expected errors are steady-state conditions and log at warn, not error. */
  readonly isExpected: boolean = true;

  constructor(
    message: string,
    readonly endpointId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      ...(this.endpointId !== undefined ? { endpoint_id: this.endpointId } : {}),
      timestamp: new Date().toISOString(),
    };
  }
}

export class IdentityConflictError extends GatewayError {
  readonly code = 'identity_conflict';
  readonly httpStatus = 409;

  constructor(endpointId: string) {
    super(`Endpoint ID '${endpointId}' already exists with different URL`, endpointId);
  }
}

export class UrlConflictError extends GatewayError {
  readonly code = 'url_conflict';
  readonly httpStatus = 409;

  constructor(
    readonly url: string,
    readonly existingId: string
  ) {
    super(`URL '${url}' already registered with different ID '${existingId}'`, existingId);
  }
}

export class EndpointNotFoundError extends GatewayError {
  readonly code = 'endpoint_not_found';
  readonly httpStatus = 404;

  constructor(message: string, endpointId?: string) {
    super(message, endpointId);
  }

  static forId(endpointId: string): EndpointNotFoundError {
    return new EndpointNotFoundError(`Endpoint not found: ${endpointId}`, endpointId);
  }

  static forPath(path: string): EndpointNotFoundError {
    return new EndpointNotFoundError(`No endpoint found for path: ${path}`);
  }
}

/** Raised by a breaker that refuses a call. The manager always converts it to a fallback. */
export class CircuitOpenError extends GatewayError {
  readonly code = 'circuit_open';
  readonly httpStatus = 503;
}

export class GatewayTimeoutError extends GatewayError {
  readonly code = 'gateway_timeout';
  readonly httpStatus = 504;
}

export class GatewayConnectionError extends GatewayError {
  readonly code = 'bad_gateway';
  readonly httpStatus = 502;
}

export class GatewayProtocolError extends GatewayError {
  readonly code = 'orchestration_error';
  readonly httpStatus = 502;
}

const POLICY_STATUS: Record<PolicyReason, number> = {
  disabled: 503,
  unhealthy: 503,
  circuit_open: 503,
  method_not_allowed: 405,
};

export class PolicyRejectionError extends GatewayError {
  readonly code: PolicyReason;
  readonly httpStatus: number;

  constructor(reason: PolicyReason, message: string, endpointId: string) {
    super(message, endpointId);
    this.code = reason;
    this.httpStatus = POLICY_STATUS[reason];
  }
}

export class ConfigurationError extends GatewayError {
  readonly code = 'configuration_error';
  readonly httpStatus = 400;
  override readonly isExpected = false;
}
