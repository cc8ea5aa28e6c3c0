import express from 'express';
import http from 'http';
import { BridgeError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { relayEnvelopeSchema } from '../protocol';
import { DEFAULT_TIMEOUTS } from '../types';
import { RelayContext } from './RelayContext';

const log = createLogger('relay');

export const RELAY_PATH = '/mcp';

export interface RelayServerOptions {
  host?: string;
  /** 0 picks a free port */
  port?: number;
  /** Stdio reply timeout for forwarded requests (ms) */
  requestTimeoutMs?: number;
}

export interface RelayErrorBody {
  error: string;
  type: string;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function sendError(res: express.Response, status: number, error: string, type: string): void {
  const body: RelayErrorBody = { error, type };
  res.status(status).json(body);
}

/**
 * HTTP face of the bridge: `POST /mcp` takes a JSON-RPC envelope and
 * forwards it over stdio to whatever session `context` currently holds.
 */
export function createRelayApp(context: RelayContext, options: Pick<RelayServerOptions, 'requestTimeoutMs'> = {}): express.Application {
  const app = express();
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUTS.requestMs;

  // Browser-based inspection clients send a preflight first
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(200).end();
      return;
    }
    next();
  });

  // An intercepting proxy may rewrite Content-Type, so parse every body as JSON
  app.use(express.json({ limit: '10mb', type: () => true }));

  app.post(RELAY_PATH, async (req: express.Request, res: express.Response): Promise<void> => {
    const parsed = relayEnvelopeSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      sendError(res, 400, `Invalid JSON-RPC envelope: ${issues.join('; ')}`, 'invalid_request');
      return;
    }

    const session = context.current;
    if (!session) {
      sendError(res, 503, 'No child process is attached', 'unavailable');
      return;
    }

    const envelope = parsed.data;
    try {
      const response = await session.transport.forward(envelope, requestTimeoutMs);
      if (response === null) {
        res.status(202).end();
        return;
      }
      res.json(response);
    } catch (error) {
      log.error(`❌ Relay error forwarding ${envelope.method} to ${session.serverName}: ${errorMessage(error)}`);
      sendError(res, 500, errorMessage(error), error instanceof BridgeError ? error.code : 'relay_error');
    }
  });

  app.all(RELAY_PATH, (req, res) => {
    res.setHeader('Allow', 'POST, OPTIONS');
    sendError(res, 405, `Method ${req.method} not allowed on ${RELAY_PATH}`, 'method_not_allowed');
  });

  app.use((req, res) => {
    log.warn(`Relay received request to unknown path: ${req.path}`);
    sendError(res, 404, `Path ${req.path} not found`, 'not_found');
  });

  const handleError: express.ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      sendError(res, status, `Invalid request body: ${errorMessage(err)}`, 'invalid_request');
      return;
    }
    log.error('Unhandled relay error:', err);
    sendError(res, 500, errorMessage(err), 'relay_error');
  };
  app.use(handleError);

  return app;
}

/**
 * Owns the relay's HTTP listener.
 */
export class RelayServer {
  readonly app: express.Application;
  private server?: http.Server;
  private boundPort?: number;
  private readonly host: string;
  private readonly port: number;

  constructor(
    readonly context: RelayContext,
    options: RelayServerOptions = {},
  ) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 3000;
    this.app = createRelayApp(context, options);
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Relay endpoint URL once listening */
  get url(): string | undefined {
    if (this.boundPort === undefined) return undefined;
    const host = this.host.includes(':') ? `[${this.host}]` : this.host;
    return `http://${host}:${this.boundPort}${RELAY_PATH}`;
  }

  async start(): Promise<string> {
    if (!this.server) {
      const server = http.createServer(this.app);
      try {
        await new Promise<void>((resolve, reject) => {
          server.once('error', reject);
          server.listen(this.port, this.host, () => {
            server.off('error', reject);
            resolve();
          });
        });
      } catch (error) {
        throw new BridgeError(`Cannot listen on ${this.host}:${this.port}: ${errorMessage(error)}`, 'relay_listen_failed', {
          cause: error,
        });
      }
      const address = server.address();
      this.boundPort = address !== null && typeof address === 'object' ? address.port : this.port;
      this.server = server;
      log.info(`🔧 Relay listening on ${this.url}`);
    }
    return this.url ?? '';
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    this.boundPort = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    log.info('🛑 Relay stopped');
  }
}
