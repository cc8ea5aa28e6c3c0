import { z } from 'zod';
import { ConfigError } from '../errors';
import type { CorrelationMode } from '../transport/StdioTransport';
import { BridgeTimeouts, DEFAULT_TIMEOUTS } from '../types';
import { DEFAULT_CONFIG_FILE } from './ServerConfigManager';

export interface BridgeSettings {
  /** Path to mcp_config.json */
  configPath: string;
  /** Inspection proxy, e.g. Burp or mitmproxy */
  proxyUrl: string;
  /** Send relay traffic through `proxyUrl` */
  useUpstreamProxy: boolean;
  relayEnabled: boolean;
  relayHost: string;
  relayPort: number;
  /** Inject the TLS bypass variables into the child */
  bypassTls: boolean;
  /** Prefix the child command with proxychains */
  useProxychains: boolean;
  proxychainsConfig: string;
  correlation: CorrelationMode;
  readinessPollMs: number;
  timeouts: BridgeTimeouts;
}

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value));

const milliseconds = z.coerce.number().int().nonnegative();

/** `BRIDGE_*` variables; every one is optional. */
const environmentSchema = z.object({
  BRIDGE_CONFIG: z.string().min(1).optional(),
  BRIDGE_PROXY_URL: z.string().url().optional(),
  BRIDGE_UPSTREAM_PROXY: flag.optional(),
  BRIDGE_RELAY: flag.optional(),
  BRIDGE_RELAY_HOST: z.string().min(1).optional(),
  BRIDGE_RELAY_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  BRIDGE_BYPASS_TLS: flag.optional(),
  BRIDGE_PROXYCHAINS: flag.optional(),
  BRIDGE_PROXYCHAINS_CONFIG: z.string().min(1).optional(),
  BRIDGE_CORRELATION: z.enum(['sequential', 'by-id']).optional(),
  BRIDGE_READINESS_POLL_MS: milliseconds.optional(),
  BRIDGE_READINESS_TIMEOUT_MS: milliseconds.optional(),
  BRIDGE_NOTIFICATION_TIMEOUT_MS: milliseconds.optional(),
  BRIDGE_REQUEST_TIMEOUT_MS: milliseconds.optional(),
  BRIDGE_TERMINATION_GRACE_MS: milliseconds.optional(),
});

export type SettingsOverrides = Partial<Omit<BridgeSettings, 'timeouts'>> & {
  timeouts?: Partial<BridgeTimeouts>;
};

export const DEFAULT_SETTINGS: BridgeSettings = {
  configPath: DEFAULT_CONFIG_FILE,
  proxyUrl: 'http://127.0.0.1:8080',
  useUpstreamProxy: true,
  relayEnabled: true,
  relayHost: '127.0.0.1',
  relayPort: 3000,
  bypassTls: true,
  useProxychains: false,
  proxychainsConfig: 'proxychains.conf',
  correlation: 'sequential',
  readinessPollMs: 500,
  timeouts: DEFAULT_TIMEOUTS,
};

/**
 * Resolve settings: defaults, then `BRIDGE_*` environment variables, then
 * `overrides` (the CLI flags).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, overrides: SettingsOverrides = {}): BridgeSettings {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid bridge environment: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  const o = overrides;
  const t = overrides.timeouts ?? {};
  const d = DEFAULT_SETTINGS;
  return {
    configPath: o.configPath ?? e.BRIDGE_CONFIG ?? d.configPath,
    proxyUrl: o.proxyUrl ?? e.BRIDGE_PROXY_URL ?? d.proxyUrl,
    useUpstreamProxy: o.useUpstreamProxy ?? e.BRIDGE_UPSTREAM_PROXY ?? d.useUpstreamProxy,
    relayEnabled: o.relayEnabled ?? e.BRIDGE_RELAY ?? d.relayEnabled,
    relayHost: o.relayHost ?? e.BRIDGE_RELAY_HOST ?? d.relayHost,
    relayPort: o.relayPort ?? e.BRIDGE_RELAY_PORT ?? d.relayPort,
    bypassTls: o.bypassTls ?? e.BRIDGE_BYPASS_TLS ?? d.bypassTls,
    useProxychains: o.useProxychains ?? e.BRIDGE_PROXYCHAINS ?? d.useProxychains,
    proxychainsConfig: o.proxychainsConfig ?? e.BRIDGE_PROXYCHAINS_CONFIG ?? d.proxychainsConfig,
    correlation: o.correlation ?? e.BRIDGE_CORRELATION ?? d.correlation,
    readinessPollMs: o.readinessPollMs ?? e.BRIDGE_READINESS_POLL_MS ?? d.readinessPollMs,
    timeouts: {
      readinessMs: t.readinessMs ?? e.BRIDGE_READINESS_TIMEOUT_MS ?? d.timeouts.readinessMs,
      notificationMs: t.notificationMs ?? e.BRIDGE_NOTIFICATION_TIMEOUT_MS ?? d.timeouts.notificationMs,
      requestMs: t.requestMs ?? e.BRIDGE_REQUEST_TIMEOUT_MS ?? d.timeouts.requestMs,
      terminationGraceMs: t.terminationGraceMs ?? e.BRIDGE_TERMINATION_GRACE_MS ?? d.timeouts.terminationGraceMs,
    },
  };
}
