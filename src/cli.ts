import { parseArgs } from 'util';
import { ConfigError, errorMessage } from './errors';
import type { SettingsOverrides } from './setup/BridgeSettings';
import type { ServerConfigManager } from './setup/ServerConfigManager';

export const USAGE = `Usage: stdio-relay-bridge [options] [server]

Starts a server from mcp_config.json and relays its stdio JSON-RPC over
HTTP (POST /mcp) so an inspection proxy can observe the traffic.

Options:
  -c, --config <path>          Server config file (default: mcp_config.json)
  -p, --proxy <url>            Inspection proxy (default: http://127.0.0.1:8080)
      --relay-host <host>      Relay listen host (default: 127.0.0.1)
      --relay-port <port>      Relay listen port (default: 3000)
      --no-relay               Do not start the relay; talk over stdio only
      --no-upstream            Call the relay directly instead of through the proxy
      --no-ssl-bypass          Do not disable TLS verification in the child
      --proxychains            Run the child under proxychains
      --proxychains-config <p> proxychains config (default: proxychains.conf)
      --correlation <mode>     sequential | by-id (default: sequential)
      --call <tool>            Call one tool, print its result and exit
      --args <json>            JSON object of arguments for --call
  -h, --help                   Show this help
`;

export function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      proxy: { type: 'string', short: 'p' },
      'relay-host': { type: 'string' },
      'relay-port': { type: 'string' },
      'no-relay': { type: 'boolean' },
      'no-upstream': { type: 'boolean' },
      'no-ssl-bypass': { type: 'boolean' },
      proxychains: { type: 'boolean' },
      'proxychains-config': { type: 'string' },
      correlation: { type: 'string' },
      call: { type: 'string' },
      args: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export type CliValues = ReturnType<typeof parseCli>['values'];

export function settingsFromFlags(values: CliValues): SettingsOverrides {
  const overrides: SettingsOverrides = {
    configPath: values.config,
    proxyUrl: values.proxy,
    relayHost: values['relay-host'],
    proxychainsConfig: values['proxychains-config'],
  };
  if (values['relay-port'] !== undefined) {
    const port = Number(values['relay-port']);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid --relay-port: ${values['relay-port']}`);
    }
    overrides.relayPort = port;
  }
  if (values['no-relay']) overrides.relayEnabled = false;
  if (values['no-upstream']) overrides.useUpstreamProxy = false;
  if (values['no-ssl-bypass']) overrides.bypassTls = false;
  if (values.proxychains) overrides.useProxychains = true;
  if (values.correlation !== undefined) {
    if (values.correlation !== 'sequential' && values.correlation !== 'by-id') {
      throw new ConfigError(`Invalid --correlation: ${values.correlation} (expected sequential or by-id)`);
    }
    overrides.correlation = values.correlation;
  }
  return overrides;
}

export function parseToolArgs(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined) return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`--args is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError('--args must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

export function pickServer(config: ServerConfigManager, requested: string | undefined): string {
  if (requested) return requested;
  const servers = config.listServers();
  if (servers.length === 1) return servers[0];
  throw new ConfigError(
    servers.length === 0
      ? `No servers defined in ${config.configPath}`
      : `Several servers are configured; name one of: ${servers.join(', ')}`,
  );
}
