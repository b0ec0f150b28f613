/**
 * Unit tests for a complete backup run
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { silentLogger, type BackupConfig } from "@org-backup/shared";
import { exitCodeFor, logDirectory, runBackup } from "../../src/backup.js";
import { acquireRunLock } from "../../src/lock.js";
import type { RunSummary } from "../../src/orchestrator.js";
import { createFakeGitFactory } from "../helpers/fake-git.js";
import { createFakeLister, repo } from "../helpers/fake-lister.js";

const NOW = new Date("2026-10-18T02:00:00.000Z");

describe("runBackup", () => {
    let root: string;
    let config: BackupConfig;
    let staleLog: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "org-backup-backup-"));
        config = {
            github: { token: "test-token", embedTokenInUrl: true, skipArchived: false },
            backup: {
                path: root,
                logRetentionDays: 30,
                heartbeatUrl: "https://hc.example.com/ping/abc",
                concurrency: 1,
                gitTimeoutSeconds: 0,
            },
            organizations: ["acme"],
        };

        fs.mkdirSync(logDirectory(config));
        staleLog = path.join(logDirectory(config), "org-backup_20260101.log");
        fs.writeFileSync(staleLog, "old");
        const mtime = new Date("2026-01-01T00:00:00.000Z");
        fs.utimesSync(staleLog, mtime, mtime);
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it("should sync, clean old logs and send the heartbeat", async () => {
        const heartbeat = vi.fn(async () => true);
        const lister = createFakeLister({ acme: [repo("acme", "r1"), repo("acme", "r2")] });

        const result = await runBackup(config, {
            logger: silentLogger,
            lister,
            openGit: createFakeGitFactory().factory,
            heartbeat,
            now: () => NOW,
        });

        expect(result.exitCode).toBe(0);
        expect(result.summary).toMatchObject({ totalRepos: 2, succeeded: 2, failed: 0 });
        expect(fs.existsSync(staleLog)).toBe(false);
        expect(heartbeat).toHaveBeenCalledWith("https://hc.example.com/ping/abc", silentLogger);
    });

    it("should exit non-zero but still clean up and ping when a repository fails", async () => {
        const heartbeat = vi.fn(async () => true);
        const git = createFakeGitFactory({
            [path.join(root, "acme")]: { failures: { "clone --mirror": "fatal: early EOF" } },
        });

        const result = await runBackup(config, {
            logger: silentLogger,
            lister: createFakeLister({ acme: [repo("acme", "r1")] }),
            openGit: git.factory,
            heartbeat,
            now: () => NOW,
        });

        expect(result.exitCode).toBe(1);
        expect(result.summary?.failed).toBe(1);
        expect(fs.existsSync(staleLog)).toBe(false);
        expect(heartbeat).toHaveBeenCalledTimes(1);
    });

    it("should stop after an authentication failure", async () => {
        const heartbeat = vi.fn(async () => true);

        const result = await runBackup(config, {
            logger: silentLogger,
            lister: createFakeLister({}, { authFails: true }),
            openGit: createFakeGitFactory().factory,
            heartbeat,
            now: () => NOW,
        });

        expect(result).toEqual({ exitCode: 1 });
        expect(fs.existsSync(staleLog)).toBe(true);
        expect(heartbeat).not.toHaveBeenCalled();
    });

    it("should release the lock when the run ends", async () => {
        await runBackup(config, {
            logger: silentLogger,
            lister: createFakeLister({ acme: [] }),
            openGit: createFakeGitFactory().factory,
            heartbeat: async () => true,
            now: () => NOW,
        });

        const lock = await acquireRunLock(root, { logger: silentLogger });
        expect(lock.held).toBe(true);
        if (lock.held) await lock.release();
    });

    it("should refuse to run while another run holds the lock", async () => {
        const held = await acquireRunLock(root, { logger: silentLogger });
        const lister = createFakeLister({ acme: [] });

        const result = await runBackup(config, {
            logger: silentLogger,
            lister,
            openGit: createFakeGitFactory().factory,
            heartbeat: async () => true,
        });

        expect(result).toEqual({ exitCode: 1 });
        expect(lister.authenticate).not.toHaveBeenCalled();
        if (held.held) await held.release();
    });
});

describe("exitCodeFor", () => {
    function summary(failed: number): RunSummary {
        const at = new Date(0);
        return {
            totalRepos: 3,
            succeeded: 3 - failed,
            failed,
            created: 0,
            updated: 3 - failed,
            skippedOrganizations: [],
            failures: [],
            startedAt: at,
            finishedAt: at,
            durationMs: 0,
        };
    }

    it("should be 0 when nothing failed", () => {
        expect(exitCodeFor(summary(0))).toBe(0);
    });

    it("should be 1 when any repository failed", () => {
        expect(exitCodeFor(summary(2))).toBe(1);
    });
});
