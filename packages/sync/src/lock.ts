/**
 * Single-run guard for a backup root
 *
 * The lock file lives inside the backup root, so two runs against different
 * roots never block each other. A run that died keeps the lock until it is
 * older than staleMs.
 */

import * as lockfile from "proper-lockfile";
import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "@org-backup/shared";
import { errorMessage } from "./errors.js";

export const LOCK_FILE_NAME = ".org-backup.lock";

const DEFAULT_STALE_MS = 10 * 60 * 1000;

export type RunLock =
    | { held: true; lockPath: string; release: () => Promise<void> }
    | { held: false; reason: string };

export interface RunLockOptions {
    logger: Logger;
    staleMs?: number;
}

/**
 * Takes the run lock of backupRoot, or reports why it could not
 *
 * Never waits for another run to finish.
 */
export async function acquireRunLock(
    backupRoot: string,
    options: RunLockOptions
): Promise<RunLock> {
    const { logger, staleMs = DEFAULT_STALE_MS } = options;
    const lockPath = path.join(backupRoot, LOCK_FILE_NAME);

    let unlock: () => Promise<void>;
    try {
        fs.mkdirSync(backupRoot, { recursive: true });
        // proper-lockfile locks an existing file
        fs.closeSync(fs.openSync(lockPath, "a"));
        unlock = await lockfile.lock(lockPath, { stale: staleMs, retries: 0 });
    } catch (error) {
        const message = errorMessage(error);
        if (message.includes("already being held")) {
            return { held: false, reason: `another backup run holds ${lockPath}` };
        }
        return { held: false, reason: message };
    }

    logger.debug(`Acquired run lock ${lockPath}`);
    return {
        held: true,
        lockPath,
        release: async () => {
            try {
                await unlock();
            } catch (error) {
                logger.warn(`Could not release run lock ${lockPath}: ${errorMessage(error)}`);
            }
        },
    };
}
