import { ToolCatalog } from './catalog/ToolCatalog';
import { InitializeError, ReadinessError, errorMessage } from './errors';
import { createLogger } from './logger';
import { describeError, responseError } from './protocol';
import { ProcessSupervisor } from './process/ProcessSupervisor';
import { ProxyRouter } from './routing/ProxyRouter';
import { BridgeSession, RelayContext } from './routing/RelayContext';
import { RelayServer } from './routing/RelayServer';
import { BridgeSettings } from './setup/BridgeSettings';
import { proxychainsWrapper } from './setup/Proxychains';
import { ServerConfigManager } from './setup/ServerConfigManager';
import { EnvironmentManager } from './setup/StandardEnvironment';
import { StdioTransport } from './transport/StdioTransport';

const log = createLogger('bridge');

export const PROTOCOL_VERSION = '2025-06-18';
export const CLIENT_INFO = { name: 'stdio-relay-bridge', version: '0.1.0' } as const;

export interface BridgeOptions {
  settings: BridgeSettings;
  config: ServerConfigManager;
  /** Defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * One child server at a time, reachable over stdio and through the relay.
 * Owns the supervisor, the relay listener and the tool catalog.
 */
export class Bridge {
  readonly context = new RelayContext();
  readonly supervisor: ProcessSupervisor;
  readonly router: ProxyRouter;
  readonly catalog: ToolCatalog;
  private readonly settings: BridgeSettings;
  private readonly config: ServerConfigManager;
  private readonly baseEnv?: NodeJS.ProcessEnv;
  private relay?: RelayServer;
  private session?: BridgeSession;
  private closed = false;

  constructor(options: BridgeOptions) {
    this.settings = options.settings;
    this.config = options.config;
    this.baseEnv = options.baseEnv;
    this.supervisor = new ProcessSupervisor({
      pollIntervalMs: options.settings.readinessPollMs,
      terminationGraceMs: options.settings.timeouts.terminationGraceMs,
    });
    this.router = new ProxyRouter({ context: this.context, timeouts: options.settings.timeouts });
    this.catalog = new ToolCatalog(this.router);
  }

  get current(): BridgeSession | undefined {
    return this.session;
  }

  get relayUrl(): string | undefined {
    return this.relay?.url;
  }

  /** Start the relay listener when it is enabled. Returns its URL. */
  async startRelay(): Promise<string | undefined> {
    if (!this.settings.relayEnabled) {
      log.info('Relay disabled; calls go straight to stdio');
      return undefined;
    }
    if (!this.relay) {
      this.relay = new RelayServer(this.context, {
        host: this.settings.relayHost,
        port: this.settings.relayPort,
        requestTimeoutMs: this.settings.timeouts.requestMs,
      });
    }
    const url = await this.relay.start();
    this.router.useRelay(url);
    this.router.useUpstreamProxy(this.settings.useUpstreamProxy ? this.settings.proxyUrl : undefined);
    if (this.settings.useUpstreamProxy) {
      log.info(`🌐 Relay traffic goes through ${this.settings.proxyUrl}`);
    }
    return url;
  }

  /**
   * Start `serverName`, wait for it, attach it to the relay, run the
   * initialize handshake and load its tools. Any failure stops the process.
   */
  async open(serverName: string): Promise<BridgeSession> {
    if (this.session) {
      await this.closeSession();
    }

    const spec = this.config.requireServer(serverName);
    const envOverrides = EnvironmentManager.createOverrides({ bypassTls: this.settings.bypassTls });
    const wrapper = this.settings.useProxychains
      ? proxychainsWrapper({ configPath: this.settings.proxychainsConfig, proxyUrl: this.settings.proxyUrl })
      : undefined;

    log.info(`🚀 Starting ${serverName}`);
    const managed = await this.supervisor.start(spec, {
      name: serverName,
      envOverrides,
      wrapper,
      baseEnv: this.baseEnv,
    });

    const readiness = await this.supervisor.awaitReady(managed, this.settings.timeouts.readinessMs);
    if (readiness.status !== 'ready') {
      await this.supervisor.stop(managed);
      throw new ReadinessError(readiness);
    }

    const session: BridgeSession = {
      serverName,
      process: managed,
      transport: new StdioTransport(managed, {
        correlation: this.settings.correlation,
        defaultTimeoutMs: this.settings.timeouts.requestMs,
      }),
    };
    this.session = session;
    this.context.bind(session);

    try {
      await this.initialize(serverName);
      await this.catalog.refresh();
    } catch (error) {
      log.error(`❌ Failed to open ${serverName}: ${errorMessage(error)}`);
      await this.closeSession();
      throw error;
    }

    log.info(`✅ ${serverName} ready with ${this.catalog.size} tools`);
    return session;
  }

  /** Replace the current server; the relay keeps listening and serves the new one. */
  async switchServer(serverName: string): Promise<BridgeSession> {
    log.info(`🔄 Switching to ${serverName}`);
    await this.closeSession();
    return this.open(serverName);
  }

  async closeSession(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = undefined;
    this.context.unbind(session);
    this.catalog.clear();
    await this.supervisor.stop(session.process);
    log.info(`🛑 Stopped ${session.serverName}`);
  }

  /** Stop the relay and the current server. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.router.useRelay(undefined);
    try {
      await this.closeSession();
    } finally {
      await this.relay?.stop();
    }
  }

  private async initialize(serverName: string): Promise<void> {
    const response = await this.router.call('initialize', {
      protocolVersion: PROTOCOL_VERSION,
      clientInfo: { ...CLIENT_INFO },
      capabilities: {},
    });
    if (response.result === undefined) {
      const error = responseError(response);
      const reason = error ? describeError(error) : 'no result in response';
      throw new InitializeError(`Initialization of ${serverName} failed: ${reason}`);
    }
    log.info(`✅ MCP initialize done for ${serverName}`);
    await this.router.notify('notifications/initialized');
  }
}
