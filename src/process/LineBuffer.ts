import type { Readable } from 'stream';

type Waiter = (line: string | null) => void;

/**
 * Splits a child stream into newline-terminated lines and hands them out in
 * order. `next()` resolves `null` once the stream has ended and every
 * buffered line has been taken.
 */
export class LineBuffer {
  private partial = '';
  private lines: string[] = [];
  private waiters: Waiter[] = [];
  private listener?: (line: string) => void;
  private _ended = false;
  private resolveDone: () => void = () => undefined;
  /** Settles when the stream has ended */
  readonly done: Promise<void>;

  constructor(stream: Readable) {
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => this.push(chunk));
    stream.once('end', () => this.finish());
    stream.once('close', () => this.finish());
    stream.on('error', () => this.finish());
  }

  get ended(): boolean {
    return this._ended;
  }

  get pending(): number {
    return this.lines.length;
  }

  /** Take the oldest buffered line without waiting. */
  shift(): string | undefined {
    return this.lines.shift();
  }

  /** Remove and return every line buffered so far without waiting. */
  takeAvailable(): string[] {
    const taken = this.lines;
    this.lines = [];
    return taken;
  }

  next(timeoutMs?: number): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this._ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter = (line) => {
        if (timer) clearTimeout(timer);
        resolve(line);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new LineTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Hand every buffered and future line to `listener` instead of queueing it.
   * Used once startup is over for streams nobody reads from (stderr).
   */
  forward(listener: (line: string) => void): void {
    this.listener = listener;
    for (const line of this.takeAvailable()) {
      listener(line);
    }
  }

  private push(chunk: string): void {
    this.partial += chunk;
    const parts = this.partial.split('\n');
    this.partial = parts.pop() ?? '';
    for (const part of parts) {
      this.deliver(part.replace(/\r$/, ''));
    }
  }

  private deliver(line: string): void {
    if (this.listener) {
      this.listener(line);
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      this.lines.push(line);
    }
  }

  private finish(): void {
    if (this._ended) return;
    if (this.partial.length > 0) {
      const rest = this.partial;
      this.partial = '';
      this.deliver(rest);
    }
    this._ended = true;
    this.resolveDone();
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }
}

export class LineTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`No line received within ${timeoutMs}ms`);
    this.name = 'LineTimeoutError';
  }
}
