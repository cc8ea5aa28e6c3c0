/** How a configured server is started: command, arguments and extra environment. */
export interface ServerLaunchSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export type LaunchMechanism = 'package-runner' | 'generic';

export type ProcessState = 'starting' | 'ready' | 'exited' | 'failed';

export type ReadinessResult =
  | { status: 'ready'; reason: 'indicator' | 'timeout'; line?: string }
  | { status: 'failed'; line: string }
  | { status: 'exited'; code: number | null; signal: NodeJS.Signals | null; output: string[] }
  | { status: 'timeout' };

export interface ToolParameter {
  type: string;
  description: string;
  required: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  parameters: Record<string, ToolParameter>;
}

export interface BridgeTimeouts {
  /** Startup readiness wait (ms) */
  readinessMs: number;
  /** Notification calls through the relay (ms) */
  notificationMs: number;
  /** Result-bearing calls (ms) */
  requestMs: number;
  /** Wait between SIGTERM and SIGKILL (ms) */
  terminationGraceMs: number;
}

export const DEFAULT_TIMEOUTS: BridgeTimeouts = {
  readinessMs: 20_000,
  notificationMs: 5_000,
  requestMs: 30_000,
  terminationGraceMs: 5_000,
};
