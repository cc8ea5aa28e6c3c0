import * as fs from 'fs';
import * as path from 'path';
import { StartFailure } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('proxychains');

export const PROXYCHAINS_BINARIES = ['proxychains4', 'proxychains'] as const;

const INSTALL_HINT = [
  'Install it first:',
  '  Ubuntu/Debian: sudo apt-get install proxychains4',
  '  CentOS/RHEL:   sudo yum install proxychains-ng',
  '  macOS:         brew install proxychains-ng',
].join('\n');

/** First executable named `candidates[i]` on `searchPath`, in candidate order. */
export function findExecutable(candidates: readonly string[], searchPath = process.env.PATH ?? ''): string | undefined {
  const dirs = searchPath.split(path.delimiter).filter(Boolean);
  for (const name of candidates) {
    for (const dir of dirs) {
      const candidate = path.join(dir, name);
      try {
        fs.accessSync(candidate, fs.constants.X_OK);
        if (fs.statSync(candidate).isFile()) return candidate;
      } catch {
        // not here, keep looking
      }
    }
  }
  return undefined;
}

export interface ProxychainsOptions {
  configPath: string;
  /** Inspection proxy the config is expected to point at */
  proxyUrl: string;
  searchPath?: string;
}

/**
 * Command prefix that runs the child under proxychains, so its own outbound
 * connections also go through the inspection proxy.
 */
export function proxychainsWrapper(options: ProxychainsOptions): string[] {
  const binary = findExecutable(PROXYCHAINS_BINARIES, options.searchPath);
  if (!binary) {
    throw new StartFailure(`proxychains is not installed. ${INSTALL_HINT}`, PROXYCHAINS_BINARIES[0]);
  }

  const configPath = path.resolve(options.configPath);
  if (!fs.existsSync(configPath)) {
    throw new StartFailure(
      `proxychains config '${configPath}' not found. Create one or disable proxychains`,
      binary,
    );
  }

  const port = new URL(options.proxyUrl).port || '80';
  const content = fs.readFileSync(configPath, 'utf8');
  if (content.includes(port)) {
    log.info(`✅ ${configPath} mentions proxy port ${port}`);
  } else {
    log.warn(`⚠️  ${configPath} may not point at the inspection proxy; expected "http 127.0.0.1 ${port}" in [ProxyList]`);
  }

  return [binary, '-f', configPath];
}
