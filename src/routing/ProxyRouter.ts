import axios, { AxiosProxyConfig } from 'axios';
import { RelayError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { buildMessage, responseSchema, JsonRpcParams, MCPRequest, MCPResponse } from '../protocol';
import { BridgeTimeouts, DEFAULT_TIMEOUTS } from '../types';
import { RelayContext } from './RelayContext';

const log = createLogger('router');

export type Route = 'upstream-proxy' | 'relay' | 'stdio';

export interface ProxyRouterOptions {
  context: RelayContext;
  /** Relay endpoint, e.g. http://127.0.0.1:3000/mcp. Without it calls go straight to stdio */
  relayUrl?: string;
  /** Inspection proxy the relay traffic is sent through, e.g. http://127.0.0.1:8080 */
  upstreamProxy?: string;
  timeouts?: Partial<Pick<BridgeTimeouts, 'notificationMs' | 'requestMs'>>;
}

export function parseProxyUrl(url: string): AxiosProxyConfig {
  const parsed = new URL(url);
  const protocol = parsed.protocol.replace(/:$/, '');
  const proxy: AxiosProxyConfig = {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : protocol === 'https' ? 443 : 80,
  };
  if (parsed.username) {
    proxy.auth = { username: decodeURIComponent(parsed.username), password: decodeURIComponent(parsed.password) };
  }
  return proxy;
}

/**
 * Sends JSON-RPC calls over HTTP to the relay, through the inspection proxy
 * when one is configured, and falls back to the bound process's stdio when
 * that leg fails.
 */
export class ProxyRouter {
  private readonly context: RelayContext;
  private readonly timeouts: Pick<BridgeTimeouts, 'notificationMs' | 'requestMs'>;
  private relayUrl?: string;
  private proxy?: AxiosProxyConfig;
  private nextId = 1;
  private _lastRoute?: Route;

  constructor(options: ProxyRouterOptions) {
    this.context = options.context;
    this.relayUrl = options.relayUrl;
    this.proxy = options.upstreamProxy ? parseProxyUrl(options.upstreamProxy) : undefined;
    this.timeouts = {
      notificationMs: options.timeouts?.notificationMs ?? DEFAULT_TIMEOUTS.notificationMs,
      requestMs: options.timeouts?.requestMs ?? DEFAULT_TIMEOUTS.requestMs,
    };
  }

  /** Route taken by the most recent completed call */
  get lastRoute(): Route | undefined {
    return this._lastRoute;
  }

  get httpRoute(): Route {
    if (!this.relayUrl) return 'stdio';
    return this.proxy ? 'upstream-proxy' : 'relay';
  }

  useRelay(relayUrl: string | undefined): void {
    this.relayUrl = relayUrl;
  }

  useUpstreamProxy(upstreamProxy: string | undefined): void {
    this.proxy = upstreamProxy ? parseProxyUrl(upstreamProxy) : undefined;
  }

  async call(method: string, params?: JsonRpcParams): Promise<MCPResponse> {
    if (this.relayUrl) {
      const envelope = buildMessage(method, params, this.nextId++);
      try {
        const response = await this.post(this.relayUrl, envelope, this.timeouts.requestMs);
        if (response === null) {
          throw new RelayError('malformed', `Relay returned no body for ${method}`);
        }
        this._lastRoute = this.httpRoute;
        return response;
      } catch (error) {
        log.warn(`⚠️  HTTP request failed, falling back to stdio: ${errorMessage(error)}`);
      }
    }

    const { transport } = this.context.require();
    const response = await transport.request(method, params, this.timeouts.requestMs);
    this._lastRoute = 'stdio';
    return response;
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    if (this.relayUrl) {
      try {
        await this.post(this.relayUrl, buildMessage(method, params), this.timeouts.notificationMs);
        this._lastRoute = this.httpRoute;
        return;
      } catch (error) {
        log.warn(`⚠️  HTTP notification failed, falling back to stdio: ${errorMessage(error)}`);
      }
    }

    const { transport } = this.context.require();
    await transport.notify(method, params);
    this._lastRoute = 'stdio';
  }

  private async post(url: string, envelope: MCPRequest, timeoutMs: number): Promise<MCPResponse | null> {
    let status: number;
    let body: string;
    try {
      const response = await axios.post<string>(url, JSON.stringify(envelope), {
        headers: { 'Content-Type': 'application/json' },
        // `false` keeps axios from picking up HTTP_PROXY for the direct route
        proxy: this.proxy ?? false,
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        responseType: 'text',
        transformResponse: [(data: string) => data],
        validateStatus: () => true,
      });
      status = response.status;
      body = typeof response.data === 'string' ? response.data : '';
    } catch (error) {
      throw toRelayError(error, timeoutMs);
    }

    if (status < 200 || status >= 300) {
      throw new RelayError('status', `HTTP request failed with status ${status}: ${body.slice(0, 200)}`, status);
    }
    if (!body.trim()) {
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(body);
    } catch (error) {
      throw new RelayError('malformed', `Invalid JSON from relay: ${errorMessage(error)}`, status, { cause: error });
    }
    const parsed = responseSchema.safeParse(value);
    if (!parsed.success) {
      throw new RelayError('malformed', 'Relay response is not a JSON object', status);
    }
    return parsed.data;
  }
}

function toRelayError(error: unknown, timeoutMs: number): RelayError {
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED';
    if (timedOut) {
      return new RelayError('timeout', `HTTP request timed out after ${timeoutMs}ms`, undefined, { cause: error });
    }
  }
  return new RelayError('network', `HTTP request failed: ${errorMessage(error)}`, undefined, { cause: error });
}
