import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError } from '../errors';
import { ServerConfigManager } from './ServerConfigManager';

describe('ServerConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'mcp_config.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('loads server definitions and fills in defaults', () => {
    const file = writeConfig({
      mcpServers: {
        fetch: { command: 'uvx', args: ['mcp-server-fetch'] },
        github: { command: 'npx', args: ['-y', 'server-github'], env: { GITHUB_TOKEN: 'test-token' } },
        bare: { command: 'my-server' },
      },
    });

    const config = ServerConfigManager.load(file);

    expect(config.configPath).toBe(file);
    expect(config.listServers()).toEqual(['fetch', 'github', 'bare']);
    expect(config.getServer('github')).toEqual({
      command: 'npx',
      args: ['-y', 'server-github'],
      env: { GITHUB_TOKEN: 'test-token' },
    });
    expect(config.getServer('bare')).toEqual({ command: 'my-server', args: [], env: {} });
    expect(config.getServer('missing')).toBeUndefined();
  });

  it('treats a file without mcpServers as empty', () => {
    const config = ServerConfigManager.load(writeConfig({}));

    expect(config.listServers()).toEqual([]);
  });

  it('names the known servers when a lookup fails', () => {
    const config = ServerConfigManager.fromObject({ mcpServers: { a: { command: 'x' }, b: { command: 'y' } } });

    expect(() => config.requireServer('c')).toThrow("Server 'c' is not defined in <inline> (available: a, b)");
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'absent.json');

    expect(() => ServerConfigManager.load(file)).toThrow(ConfigError);
    expect(() => ServerConfigManager.load(file)).toThrow(`Configuration file '${file}' not found`);
  });

  it('reports invalid JSON', () => {
    const file = writeConfig('{ "mcpServers": ');

    expect(() => ServerConfigManager.load(file)).toThrow(/^Invalid JSON in configuration file/);
  });

  it('reports entries of the wrong shape', () => {
    const file = writeConfig({ mcpServers: { broken: { args: 'not-a-list' } } });

    expect(() => ServerConfigManager.load(file)).toThrow(
      `Invalid configuration in ${file}: mcpServers.broken.command: Required; mcpServers.broken.args: Expected array, received string`,
    );
  });
});
