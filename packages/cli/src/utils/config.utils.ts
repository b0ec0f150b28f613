/**
 * Loads configuration for a command, applying command-line overrides
 */

import {
    ConfigError,
    MAX_CONCURRENCY,
    loadConfig,
    type BackupConfig,
} from "@org-backup/shared";

export interface GlobalArgs {
    config: string;
    verbose: boolean;
}

export interface ConfigOverrides {
    concurrency?: number;
}

/**
 * Returns a copy of config with the overrides applied
 */
export function applyOverrides(config: BackupConfig, overrides: ConfigOverrides): BackupConfig {
    if (overrides.concurrency === undefined) return config;

    const { concurrency } = overrides;
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
        throw new ConfigError(`--concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
    }
    return { ...config, backup: { ...config.backup, concurrency } };
}

/**
 * Loads the config file; prints the problem and returns undefined when it
 * cannot be used
 */
export function loadCommandConfig(
    configPath: string,
    overrides: ConfigOverrides = {}
): BackupConfig | undefined {
    try {
        return applyOverrides(loadConfig(configPath), overrides);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Error loading configuration: ${error.message}`);
            return undefined;
        }
        throw error;
    }
}
