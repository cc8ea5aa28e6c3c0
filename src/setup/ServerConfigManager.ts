import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { ServerLaunchSpec } from '../types';

const log = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'mcp_config.json';

const serverEntrySchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
});

const configFileSchema = z.object({
    mcpServers: z.record(serverEntrySchema).default({}),
});

export type ServerConfigFile = z.infer<typeof configFileSchema>;

/**
 * Reads the named server definitions from an `mcp_config.json` file:
 *
 *   { "mcpServers": { "fetch": { "command": "uvx", "args": ["mcp-server-fetch"] } } }
 */
export class ServerConfigManager {
    private readonly servers: ReadonlyMap<string, ServerLaunchSpec>;

    constructor(
        readonly configPath: string,
        config: ServerConfigFile,
    ) {
        this.servers = new Map(Object.entries(config.mcpServers));
    }

    /**
     * Load and validate a config file
     * @param configPath Relative paths resolve against the working directory
     */
    static load(configPath = DEFAULT_CONFIG_FILE): ServerConfigManager {
        const resolved = path.resolve(configPath);
        if (!fs.existsSync(resolved)) {
            throw new ConfigError(`Configuration file '${resolved}' not found`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
        } catch (error) {
            throw new ConfigError(`Invalid JSON in configuration file ${resolved}: ${errorMessage(error)}`, { cause: error });
        }
        return ServerConfigManager.fromObject(raw, resolved);
    }

    static fromObject(raw: unknown, source = '<inline>'): ServerConfigManager {
        const parsed = configFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`);
        }
        const manager = new ServerConfigManager(source, parsed.data);
        log.debug(`Loaded ${manager.servers.size} server definitions from ${source}`);
        return manager;
    }

    listServers(): string[] {
        return [...this.servers.keys()];
    }

    getServer(name: string): ServerLaunchSpec | undefined {
        return this.servers.get(name);
    }

    requireServer(name: string): ServerLaunchSpec {
        const spec = this.servers.get(name);
        if (!spec) {
            const known = this.listServers();
            throw new ConfigError(
                `Server '${name}' is not defined in ${this.configPath}` +
                    (known.length > 0 ? ` (available: ${known.join(', ')})` : ''),
            );
        }
        return spec;
    }
}
