import { spawn, ChildProcessWithoutNullStreams } from 'child_process';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { StartFailure, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { EnvironmentManager } from '../setup/StandardEnvironment';
import {
  DEFAULT_TIMEOUTS,
  LaunchMechanism,
  ProcessState,
  ReadinessResult,
  ServerLaunchSpec,
} from '../types';
import { LineBuffer } from './LineBuffer';
import { classifyReadinessLine, detectLaunchMechanism } from './ReadinessClassifier';
import { settlesWithin, sleep } from './timers';

const log = createLogger('supervisor');

export interface StartOptions {
  /** Label used in logs and process ids */
  name?: string;
  /** Applied over the base and server environment */
  envOverrides?: Record<string, string>;
  /** Command prefix, e.g. a proxychains invocation */
  wrapper?: readonly string[];
  cwd?: string;
  /** Defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

export interface SupervisorOptions {
  pollIntervalMs?: number;
  terminationGraceMs?: number;
  /** Treat a silent but living process as ready when the wait runs out */
  assumeReadyOnTimeout?: boolean;
}

/**
 * A running child process and its stdio line buffers. Emits `exit` when the
 * process ends and `released` once its pipes have been torn down.
 */
export class ManagedProcess extends EventEmitter {
  readonly id: string;
  readonly createdAt = Date.now();
  readonly stdout: LineBuffer;
  readonly stderr: LineBuffer;
  readonly exited: Promise<void>;
  state: ProcessState = 'starting';
  exitCode: number | null = null;
  exitSignal: NodeJS.Signals | null = null;
  private hasExited = false;
  private released = false;

  constructor(
    readonly child: ChildProcessWithoutNullStreams,
    readonly name: string,
    readonly mechanism: LaunchMechanism,
  ) {
    super();
    this.id = `${name}-${uuidv4()}`;
    this.stdout = new LineBuffer(child.stdout);
    this.stderr = new LineBuffer(child.stderr);
    // EPIPE on a dead child surfaces as a write error on the transport
    child.stdin.on('error', (error) => {
      log.debug(`[${name}] stdin error: ${error.message}`);
    });
    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.hasExited = true;
        this.exitCode = code;
        this.exitSignal = signal;
        if (this.state !== 'failed') {
          this.state = 'exited';
        }
        log.info(`Process ${this.id} exited with code ${code}, signal ${signal}`);
        this.emit('exit', code, signal);
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return !this.hasExited && !this.released;
  }

  get writable(): boolean {
    return this.running && this.child.stdin.writable;
  }

  markReady(): void {
    if (this.state === 'starting') {
      this.state = 'ready';
    }
  }

  markFailed(): void {
    this.state = 'failed';
  }

  /** Tear down the pipes. Runs once however often it is called. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.child.stdin.destroy();
    this.child.stdout.destroy();
    this.child.stderr.destroy();
    this.emit('released');
  }
}

/**
 * Owns child processes: spawns them with the merged environment, decides
 * when they are ready and terminates them.
 */
export class ProcessSupervisor {
  private live = new Set<ManagedProcess>();
  private stopping = new WeakMap<ManagedProcess, Promise<void>>();
  private pollIntervalMs: number;
  private terminationGraceMs: number;
  private assumeReadyOnTimeout: boolean;

  constructor(options: SupervisorOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.terminationGraceMs = options.terminationGraceMs ?? DEFAULT_TIMEOUTS.terminationGraceMs;
    this.assumeReadyOnTimeout = options.assumeReadyOnTimeout ?? true;
  }

  async start(spec: ServerLaunchSpec, options: StartOptions = {}): Promise<ManagedProcess> {
    const name = options.name ?? spec.command;
    const [command, ...args] = [...(options.wrapper ?? []), spec.command, ...spec.args];
    if (!command) {
      throw new StartFailure(`No command configured for ${name}`, '');
    }

    const env = EnvironmentManager.mergeEnvironments(options.baseEnv ?? process.env, spec.env, options.envOverrides);
    const overridden = Object.keys(options.envOverrides ?? {});
    if (overridden.length > 0) {
      log.debug(`Environment overrides for ${name}: ${overridden.join(', ')}`);
    }

    log.info(`Spawning process for ${name}: ${command} ${args.join(' ')}`);

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command, args, { cwd: options.cwd, env });
    } catch (error) {
      throw new StartFailure(`Failed to start ${name}: ${errorMessage(error)}`, command, { cause: error });
    }

    const managed = new ManagedProcess(child, name, detectLaunchMechanism(spec));

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        const onSpawn = () => {
          child.off('error', onError);
          resolve();
        };
        child.once('error', onError);
        child.once('spawn', onSpawn);
      });
    } catch (error) {
      managed.markFailed();
      managed.release();
      throw new StartFailure(`Failed to start ${name}: ${errorMessage(error)}`, command, { cause: error });
    }

    child.on('error', (error) => {
      log.error(`Process ${managed.id} error:`, error);
    });
    managed.once('exit', () => this.live.delete(managed));
    this.live.add(managed);
    return managed;
  }

  /**
   * Watch startup output until a readiness or error indicator shows up, the
   * process exits, or `timeoutMs` passes.
   */
  async awaitReady(managed: ManagedProcess, timeoutMs = DEFAULT_TIMEOUTS.readinessMs): Promise<ReadinessResult> {
    const deadline = Date.now() + timeoutMs;
    const output: string[] = [];
    let nextProgress = Date.now() + 10_000;

    for (;;) {
      for (const [streamName, buffer] of [['stderr', managed.stderr], ['stdout', managed.stdout]] as const) {
        let raw: string | undefined;
        while ((raw = buffer.shift()) !== undefined) {
          const line = raw.trim();
          if (!line) continue;
          output.push(line);

          const verdict = classifyReadinessLine(line, managed.mechanism);
          if (verdict === 'ready') {
            log.info(`✅ ${managed.name} appears to be ready (from ${streamName})`);
            this.onReady(managed);
            return { status: 'ready', reason: 'indicator', line };
          }
          if (verdict === 'error') {
            log.error(`❌ ${managed.name} error detected (from ${streamName}): ${line}`);
            managed.markFailed();
            return { status: 'failed', line };
          }
        }
      }

      if (!managed.running) {
        return this.exitedDuringStartup(managed, output);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      if (Date.now() >= nextProgress) {
        log.info(`⏳ Still waiting for ${managed.name}... (${Math.round((timeoutMs - remaining) / 1000)}s elapsed)`);
        nextProgress += 10_000;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }

    log.warn(`⏰ Timeout reached after ${timeoutMs}ms waiting for ${managed.name}`);
    if (!managed.running) {
      return this.exitedDuringStartup(managed, output);
    }
    if (!this.assumeReadyOnTimeout) {
      return { status: 'timeout' };
    }
    log.warn(`Process ${managed.name} is still running but printed no ready indicator; proceeding anyway`);
    this.onReady(managed);
    return { status: 'ready', reason: 'timeout' };
  }

  /** Graceful signal first, forced kill after the grace period. Safe to call repeatedly. */
  stop(managed: ManagedProcess): Promise<void> {
    let pending = this.stopping.get(managed);
    if (!pending) {
      pending = this.terminate(managed);
      this.stopping.set(managed, pending);
    }
    return pending;
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.live].map((managed) => this.stop(managed)));
  }

  get processCount(): number {
    return this.live.size;
  }

  private async terminate(managed: ManagedProcess): Promise<void> {
    try {
      if (!managed.running) return;

      managed.child.stdin.end();
      managed.child.kill('SIGTERM');
      if (await settlesWithin(managed.exited, this.terminationGraceMs)) return;

      log.warn(`Process ${managed.id} ignored SIGTERM for ${this.terminationGraceMs}ms, killing`);
      managed.child.kill('SIGKILL');
      await settlesWithin(managed.exited, this.terminationGraceMs);
    } finally {
      managed.release();
      this.live.delete(managed);
    }
  }

  private onReady(managed: ManagedProcess): void {
    managed.markReady();
    managed.stderr.forward((line) => {
      if (line.trim()) {
        log.debug(`[${managed.name}] stderr: ${line.trim()}`);
      }
    });
  }

  private async exitedDuringStartup(managed: ManagedProcess, output: string[]): Promise<ReadinessResult> {
    // Output written just before exit can still be in flight
    await settlesWithin(
      Promise.all([managed.stdout.done, managed.stderr.done]),
      1_000,
    );
    for (const line of [...managed.stderr.takeAvailable(), ...managed.stdout.takeAvailable()]) {
      if (line.trim()) output.push(line.trim());
    }

    log.error(`❌ ${managed.name} exited unexpectedly during startup`);
    if (output.length > 0) {
      log.error(`Startup output:\n${output.join('\n')}`);
    }
    return { status: 'exited', code: managed.exitCode, signal: managed.exitSignal, output };
  }
}
