/**
 * Variables that switch off outbound certificate verification in the common
 * runtimes, so a child's own HTTPS calls can pass through the same
 * inspection proxy that watches the relay.
 */
export const TLS_BYPASS_ENVIRONMENT: Readonly<Record<string, string>> = {
    NODE_TLS_REJECT_UNAUTHORIZED: '0',
    PYTHONHTTPSVERIFY: '0',
    REQUESTS_CA_BUNDLE: '',
    SSL_CERT_FILE: '',
    CURL_CA_BUNDLE: '',
};

export interface OverrideOptions {
    bypassTls: boolean;
    /** Applied after the TLS set */
    extra?: Record<string, string>;
}

/**
 * Builds the environment handed to a child process.
 */
export class EnvironmentManager {
    /**
     * Environment overrides the bridge itself injects into every child.
     */
    static createOverrides(options: OverrideOptions): Record<string, string> {
        return {
            ...(options.bypassTls ? TLS_BYPASS_ENVIRONMENT : {}),
            ...(options.extra ?? {}),
        };
    }

    /**
     * Merge environments with proper precedence
     * @param base Base environment (usually process.env); unset entries are dropped
     * @param server Variables from the server's configuration entry
     * @param overrides Bridge overrides, which win on conflict
     */
    static mergeEnvironments(
        base: NodeJS.ProcessEnv,
        server: Readonly<Record<string, string>> = {},
        overrides: Readonly<Record<string, string>> = {},
    ): Record<string, string> {
        const defined: Record<string, string> = {};
        for (const [key, value] of Object.entries(base)) {
            if (value !== undefined) {
                defined[key] = value;
            }
        }
        // Precedence: base -> server -> overrides
        return {
            ...defined,
            ...server,
            ...overrides,
        };
    }
}
