/**
 * Configuration loading
 *
 * Reads the YAML configuration file, validates it and maps the snake_case
 * document onto the camelCase BackupConfig used by the rest of the code.
 *
 * The access token may come from the file or from GITHUB_TOKEN; the file
 * wins when both are present.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
    DEFAULT_CONCURRENCY,
    DEFAULT_LOG_RETENTION_DAYS,
    MAX_CONCURRENCY,
    type BackupConfig,
} from "./types.js";

export const DEFAULT_CONFIG_PATH = "config.yaml";

/**
 * Raised for any configuration problem; always fatal for the run
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const configSchema = z.object({
    github: z.object({
        token: z.string().min(1).nullish(),
        api_url: z.string().url().nullish(),
        embed_token_in_url: z.boolean().default(true),
        skip_archived: z.boolean().default(false),
    }),
    backup: z.object({
        path: z.string().min(1),
        log_retention_days: z.number().int().nonnegative().default(DEFAULT_LOG_RETENTION_DAYS),
        heartbeat_url: z.string().url().nullish(),
        concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
        git_timeout_seconds: z.number().int().nonnegative().default(0),
    }),
    organizations: z.array(z.string().min(1)).min(1),
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${key}: ${issue.message}`;
        })
        .join("; ");
}

/**
 * Parses and validates configuration text
 */
export function parseConfig(
    text: string,
    env: NodeJS.ProcessEnv = process.env
): BackupConfig {
    let document: unknown;
    try {
        document = parseYaml(text);
    } catch (error) {
        throw new ConfigError(
            `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    const parsed = configSchema.safeParse(document);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }

    const { github, backup, organizations } = parsed.data;
    const token = github.token ?? env.GITHUB_TOKEN;
    if (!token) {
        throw new ConfigError(
            "Invalid configuration: github.token is required (or set GITHUB_TOKEN)"
        );
    }

    return {
        github: {
            token,
            apiUrl: github.api_url ?? undefined,
            embedTokenInUrl: github.embed_token_in_url,
            skipArchived: github.skip_archived,
        },
        backup: {
            path: path.resolve(backup.path),
            logRetentionDays: backup.log_retention_days,
            heartbeatUrl: backup.heartbeat_url ?? undefined,
            concurrency: backup.concurrency,
            gitTimeoutSeconds: backup.git_timeout_seconds,
        },
        organizations,
    };
}

/**
 * Loads the configuration file at configPath
 */
export function loadConfig(
    configPath: string = DEFAULT_CONFIG_PATH,
    env: NodeJS.ProcessEnv = process.env
): BackupConfig {
    let text: string;
    try {
        text = fs.readFileSync(configPath, "utf-8");
    } catch (error) {
        throw new ConfigError(
            `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return parseConfig(text, env);
}
