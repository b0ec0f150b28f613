/**
 * Leveled logger writing to the console and to a size-rotated log file
 *
 * Lines look like `2026-10-18T02:00:00.000Z - INFO - message`. When the
 * file would grow past maxBytes it is renamed to `.1` (older backups shift
 * up to backupCount) and a fresh file is started.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    error: "ERROR",
    warn: "WARNING",
    info: "INFO",
    debug: "DEBUG",
};

export const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export const DEFAULT_LOG_BACKUP_COUNT = 5;

export interface LogFileOptions {
    path: string;
    /** Rotate once the file would exceed this size (default: 10 MiB) */
    maxBytes?: number;
    /** Rotated files to keep (default: 5) */
    backupCount?: number;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Mirror lines to stdout/stderr (default: true) */
    console?: boolean;
    file?: LogFileOptions;
    /** Clock used for timestamps */
    now?: () => Date;
}

/**
 * Builds the daily log file name, e.g. org-backup_20261018.log
 */
export function logFileName(date: Date = new Date()): string {
    const y = date.getFullYear();
    const m = String(date.getMonth() + 1).padStart(2, "0");
    const d = String(date.getDate()).padStart(2, "0");
    return `org-backup_${y}${m}${d}.log`;
}

export function formatLogLine(level: LogLevel, message: string, timestamp: Date): string {
    return `${timestamp.toISOString()} - ${LEVEL_LABELS[level]} - ${message}`;
}

/**
 * Shifts file -> file.1 -> file.2 ... dropping the oldest backup
 */
function rotate(filePath: string, backupCount: number): void {
    if (backupCount <= 0) {
        fs.rmSync(filePath, { force: true });
        return;
    }
    for (let i = backupCount - 1; i >= 1; i--) {
        const source = `${filePath}.${i}`;
        if (fs.existsSync(source)) {
            fs.renameSync(source, `${filePath}.${i + 1}`);
        }
    }
    fs.renameSync(filePath, `${filePath}.1`);
}

class FileSink {
    private readonly maxBytes: number;
    private readonly backupCount: number;
    private failed = false;

    constructor(private readonly options: LogFileOptions) {
        this.maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
        this.backupCount = options.backupCount ?? DEFAULT_LOG_BACKUP_COUNT;
        fs.mkdirSync(path.dirname(options.path), { recursive: true });
    }

    write(line: string): void {
        if (this.failed) return;
        const data = `${line}\n`;
        try {
            if (this.maxBytes > 0 && fs.existsSync(this.options.path)) {
                const size = fs.statSync(this.options.path).size;
                if (size > 0 && size + Buffer.byteLength(data) > this.maxBytes) {
                    rotate(this.options.path, this.backupCount);
                }
            }
            fs.appendFileSync(this.options.path, data);
        } catch (error) {
            // Keep logging to the console once the file is unusable
            this.failed = true;
            console.error("[logger] failed to write log file", error);
        }
    }
}

/**
 * Creates a logger; lines below `level` are dropped
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const minLevel = LEVELS[options.level ?? "info"];
    const toConsole = options.console ?? true;
    const now = options.now ?? (() => new Date());
    const sink = options.file ? new FileSink(options.file) : undefined;

    function write(level: LogLevel, message: string): void {
        if (LEVELS[level] > minLevel) return;
        const line = formatLogLine(level, message, now());
        if (toConsole) {
            if (level === "error" || level === "warn") {
                console.error(line);
            } else {
                console.log(line);
            }
        }
        sink?.write(line);
    }

    return {
        error: (message) => write("error", message),
        warn: (message) => write("warn", message),
        info: (message) => write("info", message),
        debug: (message) => write("debug", message),
    };
}

/**
 * A logger that discards everything
 */
export const silentLogger: Logger = {
    error: () => {},
    warn: () => {},
    info: () => {},
    debug: () => {},
};
