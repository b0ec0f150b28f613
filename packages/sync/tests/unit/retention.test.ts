/**
 * Unit tests for log retention
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { silentLogger, type Logger } from "@org-backup/shared";
import { cleanupOldLogs } from "../../src/retention.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

describe("cleanupOldLogs", () => {
    let logDir: string;

    beforeEach(() => {
        logDir = fs.mkdtempSync(path.join(os.tmpdir(), "org-backup-logs-"));
    });

    afterEach(() => {
        fs.rmSync(logDir, { recursive: true, force: true });
    });

    function writeFile(name: string, ageDays: number): string {
        const filePath = path.join(logDir, name);
        fs.writeFileSync(filePath, "x");
        const mtime = new Date(NOW.getTime() - ageDays * DAY_MS);
        fs.utimesSync(filePath, mtime, mtime);
        return filePath;
    }

    it("should remove log files older than the retention period", () => {
        const old = writeFile("org-backup_20260901.log", 40);
        const oldRotated = writeFile("org-backup_20260901.log.3", 35);
        const recent = writeFile("org-backup_20261017.log", 1);

        const removed = cleanupOldLogs(logDir, 30, silentLogger, NOW);

        expect(removed.sort()).toEqual([old, oldRotated].sort());
        expect(fs.existsSync(recent)).toBe(true);
    });

    it("should leave files that are not logs", () => {
        const notes = writeFile("notes.txt", 90);

        expect(cleanupOldLogs(logDir, 30, silentLogger, NOW)).toEqual([]);
        expect(fs.existsSync(notes)).toBe(true);
    });

    it("should leave directories alone", () => {
        fs.mkdirSync(path.join(logDir, "archive.log.d"));

        expect(cleanupOldLogs(logDir, 0, silentLogger, NOW)).toEqual([]);
    });

    it("should log and return nothing when the directory is missing", () => {
        const logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() } satisfies Logger;
        const missing = path.join(logDir, "missing");

        expect(cleanupOldLogs(missing, 30, logger, NOW)).toEqual([]);
        expect(logger.error).toHaveBeenCalledTimes(1);
        expect(logger.error.mock.calls[0]?.[0]).toMatch(
            new RegExp(`^Failed to read log directory ${missing}: `)
        );
    });
});
