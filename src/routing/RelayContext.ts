import { TransportError } from '../errors';
import { createLogger } from '../logger';
import type { ManagedProcess } from '../process/ProcessSupervisor';
import type { StdioTransport } from '../transport/StdioTransport';

const log = createLogger('relay');

export interface BridgeSession {
  readonly serverName: string;
  readonly process: ManagedProcess;
  readonly transport: StdioTransport;
}

/**
 * The session the relay forwards to. Handlers look it up per request, so
 * re-binding after a server switch takes effect on the next request.
 */
export class RelayContext {
  private session?: BridgeSession;

  get current(): BridgeSession | undefined {
    return this.session;
  }

  bind(session: BridgeSession): void {
    this.session = session;
    log.info(`Relay bound to ${session.serverName} (${session.process.id})`);
  }

  /** Detach `session`, or whatever is bound when called without one. */
  unbind(session?: BridgeSession): void {
    if (!this.session || (session && this.session !== session)) return;
    log.info(`Relay detached from ${this.session.serverName}`);
    this.session = undefined;
  }

  require(): BridgeSession {
    if (!this.session) {
      throw new TransportError('closed', 'No child process is attached');
    }
    return this.session;
  }
}
