#!/usr/bin/env node
import 'dotenv/config';
import { Bridge } from './Bridge';
import { parseCli, parseToolArgs, pickServer, settingsFromFlags, USAGE } from './cli';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { loadSettings } from './setup/BridgeSettings';
import { ServerConfigManager } from './setup/ServerConfigManager';

const log = createLogger('cli');

async function main() {
  const { values, positionals } = parseCli(process.argv.slice(2));
  if (values.help) {
    process.stderr.write(USAGE);
    return;
  }

  const settings = loadSettings(process.env, settingsFromFlags(values));
  const config = ServerConfigManager.load(settings.configPath);
  const serverName = pickServer(config, positionals[0]);
  const bridge = new Bridge({ settings, config });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down gracefully...`);
    try {
      await bridge.close();
      process.exit(0);
    } catch (error) {
      log.error(`❌ Error during shutdown: ${errorMessage(error)}`);
      process.exit(1);
    }
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    const relayUrl = await bridge.startRelay();
    await bridge.open(serverName);

    if (values.call !== undefined) {
      const result = await bridge.catalog.invoke(values.call, parseToolArgs(values.args));
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      await bridge.close();
      return;
    }

    for (const tool of bridge.catalog.list()) {
      log.info(`  🔧 ${tool.name}${tool.description ? `: ${tool.description}` : ''}`);
    }
    if (relayUrl) {
      log.info(`📡 Relay available at ${relayUrl}`);
    }
    log.info('Press Ctrl+C to stop');
  } catch (error) {
    await bridge.close();
    throw error;
  }
}

main().catch((error: unknown) => {
  log.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
