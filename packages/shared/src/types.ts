/**
 * Shared configuration types for org-backup
 *
 * These interfaces are used by the sync engine and the CLI and are kept
 * here to avoid circular dependencies between the two.
 */

/**
 * GitHub access configuration
 */
export interface GitHubConfig {
    /** Personal access token used for the API and for HTTPS clones */
    token: string;
    /** REST API base URL (set for GitHub Enterprise) */
    apiUrl?: string;
    /** Embed the token in clone/fetch URLs while git runs */
    embedTokenInUrl: boolean;
    /** Leave archived repositories out of the backup */
    skipArchived: boolean;
}

/**
 * Backup destination and run behaviour
 */
export interface BackupSettings {
    /** Root directory; each organization gets a subdirectory */
    path: string;
    /** Log files older than this many days are removed after a run */
    logRetentionDays: number;
    /** Pinged with a GET after every completed run */
    heartbeatUrl?: string;
    /** Number of repositories synced at the same time */
    concurrency: number;
    /** Per git invocation, 0 disables the timeout */
    gitTimeoutSeconds: number;
}

/**
 * Complete org-backup configuration
 */
export interface BackupConfig {
    github: GitHubConfig;
    backup: BackupSettings;
    /** Organization logins, processed in this order */
    organizations: string[];
}

export type LogLevel = "error" | "warn" | "info" | "debug";

/**
 * Leveled logging sink used throughout the sync engine
 */
export interface Logger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

export const DEFAULT_LOG_RETENTION_DAYS = 30;

export const DEFAULT_CONCURRENCY = 1;

export const MAX_CONCURRENCY = 32;

/** Name of the log directory created under the backup root */
export const LOG_DIR_NAME = "logs";
