/**
 * Log retention: removes log files older than the configured age
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "@org-backup/shared";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Deletes `*.log*` files in logDir last modified before the cutoff
 *
 * Returns the removed paths. Failures are logged per file.
 */
export function cleanupOldLogs(
    logDir: string,
    retentionDays: number,
    logger: Logger,
    now: Date = new Date()
): string[] {
    const cutoff = now.getTime() - retentionDays * DAY_MS;
    const removed: string[] = [];

    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(logDir, { withFileTypes: true });
    } catch (error) {
        logger.error(
            `Failed to read log directory ${logDir}: ${error instanceof Error ? error.message : String(error)}`
        );
        return removed;
    }

    for (const entry of entries) {
        if (!entry.isFile() || !entry.name.includes(".log")) continue;

        const filePath = path.join(logDir, entry.name);
        try {
            if (fs.statSync(filePath).mtimeMs >= cutoff) continue;
            logger.debug(`Removing old log file: ${filePath}`);
            fs.rmSync(filePath);
            removed.push(filePath);
        } catch (error) {
            logger.error(
                `Failed to remove old log file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
    }

    return removed;
}
