import { TransportError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { LineTimeoutError } from '../process/LineBuffer';
import type { ManagedProcess } from '../process/ProcessSupervisor';
import {
  buildMessage,
  isNotification,
  responseSchema,
  JsonRpcParams,
  MCPRequest,
  MCPResponse,
  RelayEnvelope,
} from '../protocol';
import { DEFAULT_TIMEOUTS } from '../types';
import { Mutex } from './Mutex';

const log = createLogger('stdio');

/**
 * `sequential` reads the reply to each request under a lock held from write
 * to read, so only one request is in flight. `by-id` runs a background reader
 * that matches replies to requests by their JSON-RPC id.
 */
export type CorrelationMode = 'sequential' | 'by-id';

export interface StdioTransportOptions {
  correlation?: CorrelationMode;
  defaultTimeoutMs?: number;
}

export interface PendingRequest {
  id: number;
  method: string;
  submittedAt: number;
}

export interface PendingCall extends PendingRequest {
  /** Settles with the child's reply */
  response: Promise<MCPResponse>;
}

interface ReplySlot {
  resolve: (response: MCPResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

type OutgoingMessage = Pick<MCPRequest, 'method' | 'params'>;

/**
 * Newline-delimited JSON-RPC over one child's stdin/stdout. Identifiers are
 * allocated here, start at 1 and are never reused for this process.
 */
export class StdioTransport {
  readonly correlation: CorrelationMode;
  private readonly defaultTimeoutMs: number;
  private readonly lock = new Mutex();
  private readonly pending = new Map<number, PendingRequest>();
  private readonly slots = new Map<number, ReplySlot>();
  private nextId = 1;
  private reader?: Promise<void>;

  constructor(
    readonly process: ManagedProcess,
    options: StdioTransportOptions = {},
  ) {
    this.correlation = options.correlation ?? 'sequential';
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUTS.requestMs;
  }

  get pendingRequests(): PendingRequest[] {
    return [...this.pending.values()];
  }

  /** Write a request and return once it is on the wire. */
  send(method: string, params?: JsonRpcParams, timeoutMs = this.defaultTimeoutMs): Promise<PendingCall> {
    return this.dispatch(buildMessage(method, params), timeoutMs);
  }

  async request(method: string, params?: JsonRpcParams, timeoutMs = this.defaultTimeoutMs): Promise<MCPResponse> {
    const call = await this.send(method, params, timeoutMs);
    return call.response;
  }

  /** Fire-and-forget: no identifier, no reply awaited. */
  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    this.ensureOpen();
    await this.lock.runExclusive(() => this.write(buildMessage(method, params)));
  }

  /**
   * Relay an envelope received from elsewhere. Notifications resolve `null`;
   * requests go out under a transport id and the reply is handed back with
   * the caller's id.
   */
  async forward(envelope: RelayEnvelope, timeoutMs = this.defaultTimeoutMs): Promise<MCPResponse | null> {
    if (envelope.id === undefined) {
      await this.notify(envelope.method, envelope.params);
      return null;
    }
    const call = await this.send(envelope.method, envelope.params, timeoutMs);
    const response = await call.response;
    return { ...response, id: envelope.id };
  }

  private async dispatch(message: OutgoingMessage, timeoutMs: number): Promise<PendingCall> {
    this.ensureOpen();
    return this.correlation === 'sequential'
      ? this.dispatchSequential(message, timeoutMs)
      : this.dispatchById(message, timeoutMs);
  }

  private async dispatchSequential(message: OutgoingMessage, timeoutMs: number): Promise<PendingCall> {
    const release = await this.lock.acquire();
    // The process may have gone away while we queued for the lock
    if (!this.isOpen()) {
      release();
      throw this.closedError();
    }
    const request = this.track(message.method);
    try {
      await this.write(buildMessage(message.method, message.params, request.id));
    } catch (error) {
      this.pending.delete(request.id);
      release();
      throw error;
    }
    return { ...request, response: this.readReply(request, timeoutMs, release) };
  }

  private async dispatchById(message: OutgoingMessage, timeoutMs: number): Promise<PendingCall> {
    this.startReader();
    const request = this.track(message.method);
    const response = new Promise<MCPResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(request.id);
        reject(this.timeoutError(request, timeoutMs));
      }, timeoutMs);
      this.slots.set(request.id, { resolve, reject, timer });
    });

    try {
      await this.lock.runExclusive(() => this.write(buildMessage(message.method, message.params, request.id)));
    } catch (error) {
      const slot = this.settle(request.id);
      if (slot) clearTimeout(slot.timer);
      throw error;
    }
    return { ...request, response };
  }

  /**
   * Read the next reply line while holding the lock. On timeout the lock is
   * kept until the late reply arrives or stdout ends, so it can never be
   * handed to the next caller.
   */
  private async readReply(request: PendingRequest, timeoutMs: number, release: () => void): Promise<MCPResponse> {
    const deadline = Date.now() + timeoutMs;
    let releaseLater = false;
    try {
      for (;;) {
        let line: string | null;
        try {
          line = await this.process.stdout.next(Math.max(0, deadline - Date.now()));
        } catch (error) {
          if (error instanceof LineTimeoutError) {
            releaseLater = true;
            this.discardLateReply(request, release);
            throw this.timeoutError(request, timeoutMs);
          }
          throw error;
        }

        if (line === null) {
          throw new TransportError('no-response', `No response from ${this.process.name}: output stream ended`);
        }
        if (!line.trim()) continue;

        const message = parseLine(line);
        if (isNotification(message)) {
          log.debug(`Skipping notification ${String(message.method)} from ${this.process.name} while awaiting #${request.id}`);
          continue;
        }
        if (typeof message.id === 'number' && message.id < request.id) {
          log.warn(`Discarded stale reply #${message.id} from ${this.process.name} while awaiting #${request.id}`);
          continue;
        }
        if (message.id !== request.id) {
          log.debug(`Reply id ${String(message.id)} from ${this.process.name} does not match request #${request.id}`);
        }
        return message;
      }
    } finally {
      this.pending.delete(request.id);
      if (!releaseLater) release();
    }
  }

  private discardLateReply(request: PendingRequest, release: () => void): void {
    void this.skipLateReply(request)
      .catch((error: unknown) => {
        log.error(`Failed waiting for late reply to #${request.id}: ${errorMessage(error)}`);
      })
      .finally(release);
  }

  /** Read until the timed-out request's reply shows up; notifications before it do not count. */
  private async skipLateReply(request: PendingRequest): Promise<void> {
    for (;;) {
      const line = await this.process.stdout.next();
      if (line === null) return;
      if (!line.trim()) continue;

      let message: MCPResponse;
      try {
        message = parseLine(line);
      } catch (error) {
        log.warn(`Dropping unparseable line from ${this.process.name}: ${errorMessage(error)}`);
        continue;
      }
      if (isNotification(message)) {
        log.debug(`Skipping notification ${String(message.method)} from ${this.process.name} while waiting out #${request.id}`);
        continue;
      }
      log.warn(`Discarded late reply to #${request.id} (${request.method}) from ${this.process.name}`);
      return;
    }
  }

  private startReader(): void {
    this.reader ??= this.readLoop().catch((error: unknown) => {
      log.error(`Reader for ${this.process.name} stopped: ${errorMessage(error)}`);
      this.failAll(new TransportError('no-response', `Reader for ${this.process.name} stopped`, { cause: error }));
    });
  }

  private async readLoop(): Promise<void> {
    for (;;) {
      const line = await this.process.stdout.next();
      if (line === null) break;
      if (!line.trim()) continue;

      let message: MCPResponse;
      try {
        message = parseLine(line);
      } catch (error) {
        log.warn(`Dropping unparseable line from ${this.process.name}: ${errorMessage(error)}`);
        continue;
      }

      const id = message.id;
      const slot = typeof id === 'number' ? this.settle(id) : undefined;
      if (!slot) {
        log.debug(`Dropping unmatched message from ${this.process.name}: ${line.trim()}`);
        continue;
      }
      clearTimeout(slot.timer);
      slot.resolve(message);
    }
    this.failAll(new TransportError('no-response', `No response from ${this.process.name}: output stream ended`));
  }

  private failAll(error: TransportError): void {
    for (const id of [...this.slots.keys()]) {
      const slot = this.settle(id);
      if (slot) {
        clearTimeout(slot.timer);
        slot.reject(error);
      }
    }
  }

  private settle(id: number): ReplySlot | undefined {
    const slot = this.slots.get(id);
    this.slots.delete(id);
    this.pending.delete(id);
    return slot;
  }

  private track(method: string): PendingRequest {
    const request: PendingRequest = { id: this.nextId++, method, submittedAt: Date.now() };
    this.pending.set(request.id, request);
    return request;
  }

  private isOpen(): boolean {
    return this.process.writable && !this.process.stdout.ended;
  }

  private ensureOpen(): void {
    if (!this.isOpen()) throw this.closedError();
  }

  private closedError(): TransportError {
    return new TransportError('closed', `Process ${this.process.name} has no open stdio channel`);
  }

  private write(message: MCPRequest): Promise<void> {
    const line = JSON.stringify(message) + '\n';
    return new Promise((resolve, reject) => {
      this.process.child.stdin.write(line, (error) => {
        if (error) {
          reject(new TransportError('closed', `Failed to write to ${this.process.name}: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  private timeoutError(request: PendingRequest, timeoutMs: number): TransportError {
    return new TransportError('timeout', `No reply to #${request.id} (${request.method}) within ${timeoutMs}ms`);
  }
}

function parseLine(line: string): MCPResponse {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new TransportError('malformed', `Invalid JSON response: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = responseSchema.safeParse(value);
  if (!parsed.success) {
    throw new TransportError('malformed', `Response is not a JSON object: ${line.trim().slice(0, 200)}`);
  }
  return parsed.data;
}
