import { describeError, MCPErrorObject } from './protocol';
import type { ReadinessResult } from './types';

/** Base class for every failure the bridge reports. */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

/** The child process could not be spawned. */
export class StartFailure extends BridgeError {
  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'start_failure', options);
    this.name = 'StartFailure';
  }
}

/** The child was spawned but never became usable. */
export class ReadinessError extends BridgeError {
  constructor(public readonly result: Exclude<ReadinessResult, { status: 'ready' }>) {
    super(describeReadiness(result), 'readiness_failed');
    this.name = 'ReadinessError';
  }
}

function describeReadiness(result: Exclude<ReadinessResult, { status: 'ready' }>): string {
  switch (result.status) {
    case 'failed':
      return `Server reported an error during startup: ${result.line}`;
    case 'exited':
      return `Server process exited during startup (code ${result.code ?? 'none'}, signal ${result.signal ?? 'none'})`;
    case 'timeout':
      return 'Server did not report readiness before the timeout';
  }
}

export type TransportErrorKind = 'closed' | 'no-response' | 'malformed' | 'timeout';

/** Stdio-level failure of a single request. The process keeps running. */
export class TransportError extends BridgeError {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, `transport_${kind.replace('-', '_')}`, options);
    this.name = 'TransportError';
  }
}

export type RelayErrorKind = 'network' | 'status' | 'malformed' | 'timeout';

/** The HTTP leg (relay or upstream proxy) failed. */
export class RelayError extends BridgeError {
  constructor(
    public readonly kind: RelayErrorKind,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, `relay_${kind}`, options);
    this.name = 'RelayError';
  }
}

export class UnknownToolError extends BridgeError {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`, 'unknown_tool');
    this.name = 'UnknownToolError';
  }
}

/** The child answered with a JSON-RPC error object. */
export class RemoteError extends BridgeError {
  constructor(
    public readonly method: string,
    public readonly error: MCPErrorObject,
  ) {
    super(`${method} failed: ${describeError(error)}`, 'remote_error');
    this.name = 'RemoteError';
  }
}

export class InitializeError extends BridgeError {
  constructor(message: string) {
    super(message, 'initialize_failed');
    this.name = 'InitializeError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'config_error', options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
