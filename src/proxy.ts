import { GatewayConnectionError, GatewayProtocolError, GatewayTimeoutError } from './errors.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import type {
  GatewayRequest,
  GatewayResponse,
  IncomingHeaders,
  QueryParams,
  RegisteredEndpoint,
  ResponseHeaders,
} from './models.js';

export type FetchFn = typeof fetch;

// Authorization and every other end-to-end header pass through untouched.
export const REQUEST_HOP_BY_HOP = new Set([
  'host',
  'connection',
  'proxy-connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailers',
  'transfer-encoding',
  'upgrade',
]);

export const RESPONSE_EXCLUDED = new Set([
  'connection',
  'proxy-connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailers',
  'transfer-encoding',
  'upgrade',
  'server',
]);

export const ORCHESTRATED_BY = 'Orchestrator-API';

export function filterRequestHeaders(headers: IncomingHeaders): Record<string, string> {
  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || REQUEST_HOP_BY_HOP.has(key.toLowerCase())) continue;
    filtered[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return filtered;
}

export function filterResponseHeaders(headers: Headers): ResponseHeaders {
  const filtered: ResponseHeaders = {};
  headers.forEach((value, key) => {
    if (!RESPONSE_EXCLUDED.has(key.toLowerCase())) {
      filtered[key] = value;
    }
  });
  // forEach joins repeated Set-Cookie values with commas, which breaks cookie dates.
  const cookies = headers.getSetCookie();
  if (cookies.length > 0) {
    filtered['set-cookie'] = cookies;
  }
  filtered['X-Orchestrated-By'] = ORCHESTRATED_BY;
  return filtered;
}

/** Base URL with `subPath` appended after exactly one slash, plus query parameters. */
export function buildTargetUrl(baseUrl: string, subPath: string, query?: QueryParams): string {
  const url = new URL(baseUrl);
  const trimmed = subPath.replace(/^\/+/, '');
  if (trimmed) {
    url.pathname = `${url.pathname.replace(/\/+$/, '')}/${trimmed}`;
  }
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      url.searchParams.append(key, item);
    }
  }
  return url.toString();
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

// undici reports refused/reset/DNS failures as a TypeError("fetch failed").
function isConnectionFailure(err: unknown): boolean {
  return err instanceof TypeError;
}

export interface EndpointProxyOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

export class EndpointProxy {
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: EndpointProxyOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('proxy');
  }

  async forward(endpoint: RegisteredEndpoint, request: GatewayRequest, subPath = ''): Promise<GatewayResponse> {
    const targetUrl = buildTargetUrl(endpoint.config.url, subPath, request.query);
    const method = request.method.toUpperCase();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), endpoint.config.timeout * 1000);

    try {
      this.logger.debug('Forwarding request', { endpointId: endpoint.id, method, targetUrl });
      const response = await this.fetchFn(targetUrl, {
        method,
        headers: filterRequestHeaders(request.headers),
        body: method === 'GET' || method === 'HEAD' || !request.body?.length ? undefined : request.body,
        signal: controller.signal,
      });
      const body = Buffer.from(await response.arrayBuffer());

      this.logger.debug('Received response', { endpointId: endpoint.id, status: response.status, targetUrl });
      return {
        statusCode: response.status,
        headers: filterResponseHeaders(response.headers),
        body,
      };
    } catch (err) {
      if (isTimeout(err)) {
        this.logger.warn('Request timeout', { endpointId: endpoint.id, targetUrl });
        throw new GatewayTimeoutError('Gateway timeout', endpoint.id, { cause: err });
      }
      if (isConnectionFailure(err)) {
        this.logger.error('Connection error', { endpointId: endpoint.id, targetUrl, error: errorMessage(err) });
        throw new GatewayConnectionError('Bad gateway - connection error', endpoint.id, { cause: err });
      }
      this.logger.error('Orchestration error', { endpointId: endpoint.id, targetUrl, error: errorMessage(err) });
      throw new GatewayProtocolError(`Orchestration error - ${errorMessage(err)}`, endpoint.id, { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Plain GET used for connectivity tests and health probes. */
  async probe(url: string, timeoutMs: number): Promise<{ status: number }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': 'Orchestrator-HealthCheck/1.0' },
        signal: controller.signal,
      });
      await response.body?.cancel();
      return { status: response.status };
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Resolves a health-check path against the endpoint URL the way a browser resolves a link. */
export function healthCheckUrl(endpoint: RegisteredEndpoint): string {
  const base = endpoint.config.url;
  return endpoint.config.healthCheckPath ? new URL(endpoint.config.healthCheckPath, base).toString() : base;
}
