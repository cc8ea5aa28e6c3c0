import path from 'path';
import type { LaunchMechanism, ServerLaunchSpec } from '../types';

export type ReadinessVerdict = 'ready' | 'error';

interface IndicatorTable {
  success: readonly string[];
  error: readonly string[];
}

const GENERIC_ERRORS = [
  'error',
  'failed',
  'exception',
  'crash',
  'exit',
  'not found',
  'command failed',
  'npm error',
] as const;

// Package runners print install chatter before the server itself speaks
const INDICATORS: Record<LaunchMechanism, IndicatorTable> = {
  'package-runner': {
    success: [
      'ready',
      'started',
      'listening',
      'server running',
      'server is running',
      'server is ready',
      'server started',
      'mcp server',
      'initialized',
      'connected',
      'package installed',
      'npm',
      'node_modules',
      'successfully',
      'running on',
      'ready to accept connections',
      'installed',
    ],
    error: GENERIC_ERRORS,
  },
  generic: {
    success: ['ready', 'started', 'listening', 'server running', 'mcp server', 'initialized', 'connected', 'installed'],
    error: GENERIC_ERRORS,
  },
};

const PACKAGE_RUNNERS = new Set(['npx', 'npx.cmd', 'pnpx']);

export function detectLaunchMechanism(spec: Pick<ServerLaunchSpec, 'command' | 'args'>): LaunchMechanism {
  if (PACKAGE_RUNNERS.has(path.basename(spec.command))) {
    return 'package-runner';
  }
  return spec.args.some((arg) => PACKAGE_RUNNERS.has(arg)) ? 'package-runner' : 'generic';
}

/**
 * Classify one line of startup output. Success indicators win over error
 * indicators on the same line; `null` means keep waiting.
 */
export function classifyReadinessLine(line: string, mechanism: LaunchMechanism): ReadinessVerdict | null {
  const lower = line.toLowerCase();
  const table = INDICATORS[mechanism];
  if (table.success.some((indicator) => lower.includes(indicator))) {
    return 'ready';
  }
  if (table.error.some((indicator) => lower.includes(indicator))) {
    return 'error';
  }
  return null;
}
