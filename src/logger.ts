/**
 * Leveled console logger.
 *
 * `LOG_LEVEL` (error, warn, info, debug) gates output; it is read on first
 * use so that the CLI's `dotenv/config` import has populated `process.env`.
 *
 *   const log = createLogger('relay');
 *   log.info('Listening');   // [2026-10-18 12:00:00] [INFO ] [relay] Listening
 */

const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
type LevelName = keyof typeof LEVELS;

const COLORS: Record<LevelName, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[32m',
  debug: '\x1b[34m',
};
const RESET = '\x1b[0m';

let resolvedThreshold: number | null = null;

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatMessage(level: LevelName, mod: string, msg: string): string {
  const tag = level.toUpperCase().padEnd(5);
  return `[${timestamp()}] [${COLORS[level]}${tag}${RESET}] [${mod}] ${msg}`;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, args: unknown[]) => {
    if (LEVELS[level] > threshold()) return;
    const formatted = formatMessage(level, module, message);
    // stdout belongs to the caller when the bridge itself is piped
    if (level === 'error') {
      console.error(formatted, ...args);
    } else if (level === 'warn') {
      console.warn(formatted, ...args);
    } else {
      console.error(formatted, ...args);
    }
  };

  return {
    error: (message, ...args) => emit('error', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    info: (message, ...args) => emit('info', message, args),
    debug: (message, ...args) => emit('debug', message, args),
  };
}
