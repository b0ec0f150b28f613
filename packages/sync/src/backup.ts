/**
 * A complete backup run: lock, sync, log retention, heartbeat
 */

import * as path from "node:path";
import { LOG_DIR_NAME, type BackupConfig, type Logger } from "@org-backup/shared";
import { AuthenticationError, errorMessage } from "./errors.js";
import { GitHubRepositoryLister, type RepositoryLister } from "./github.js";
import { sendHeartbeat } from "./heartbeat.js";
import type { GitFactory } from "./lib/git-command.js";
import { acquireRunLock } from "./lock.js";
import { runSync, type RunSummary } from "./orchestrator.js";
import { cleanupOldLogs } from "./retention.js";

export interface BackupRunOptions {
    logger: Logger;
    /** Defaults to the GitHub REST API */
    lister?: RepositoryLister;
    openGit?: GitFactory;
    heartbeat?: (url: string | undefined, logger: Logger) => Promise<unknown>;
    now?: () => Date;
}

export interface BackupRunResult {
    /** Absent when the run was aborted */
    summary?: RunSummary;
    exitCode: number;
}

export function logDirectory(config: BackupConfig): string {
    return path.join(config.backup.path, LOG_DIR_NAME);
}

/**
 * Exit code for a finished run: non-zero when any repository failed
 */
export function exitCodeFor(summary: RunSummary): number {
    return summary.failed > 0 ? 1 : 0;
}

/**
 * Runs one backup
 *
 * An authentication failure (or a held lock) aborts the run with exit
 * code 1 and skips retention and the heartbeat. Retention and the
 * heartbeat run after every other outcome.
 */
export async function runBackup(
    config: BackupConfig,
    options: BackupRunOptions
): Promise<BackupRunResult> {
    const { logger } = options;
    const now = options.now ?? (() => new Date());
    const lister = options.lister ?? new GitHubRepositoryLister(config.github, logger);
    const heartbeat = options.heartbeat ?? sendHeartbeat;

    const lock = await acquireRunLock(config.backup.path, { logger });
    if (!lock.held) {
        logger.error(`Cannot acquire lock: ${lock.reason}`);
        return { exitCode: 1 };
    }

    try {
        let summary: RunSummary | undefined;
        try {
            summary = await runSync(config, {
                lister,
                logger,
                openGit: options.openGit,
                now,
            });
        } catch (error) {
            if (error instanceof AuthenticationError) {
                logger.error(error.message);
                return { exitCode: 1 };
            }
            logger.error(`Unhandled exception: ${errorMessage(error)}`);
        }

        cleanupOldLogs(logDirectory(config), config.backup.logRetentionDays, logger, now());
        await heartbeat(config.backup.heartbeatUrl, logger);

        return summary ? { summary, exitCode: exitCodeFor(summary) } : { exitCode: 1 };
    } finally {
        await lock.release();
        logger.info("Backup process complete");
    }
}
