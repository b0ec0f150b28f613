/**
 * Unit tests for config.utils.ts
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, afterEach } from "vitest";
import { ConfigError, type BackupConfig } from "@org-backup/shared";
import { applyOverrides, loadCommandConfig } from "../../src/utils/config.utils.js";

const BASE: BackupConfig = {
    github: { token: "test-token", embedTokenInUrl: true, skipArchived: false },
    backup: {
        path: "/srv/backups",
        logRetentionDays: 30,
        concurrency: 1,
        gitTimeoutSeconds: 0,
    },
    organizations: ["acme"],
};

describe("applyOverrides", () => {
    it("should return the config untouched without overrides", () => {
        expect(applyOverrides(BASE, {})).toBe(BASE);
    });

    it("should override the concurrency", () => {
        const config = applyOverrides(BASE, { concurrency: 4 });

        expect(config.backup.concurrency).toBe(4);
        expect(BASE.backup.concurrency).toBe(1);
    });

    it("should reject a concurrency out of range", () => {
        expect(() => applyOverrides(BASE, { concurrency: 0 })).toThrow(ConfigError);
        expect(() => applyOverrides(BASE, { concurrency: 2.5 })).toThrow(
            "--concurrency must be an integer between 1 and 32"
        );
    });
});

describe("loadCommandConfig", () => {
    let tmpDir: string | undefined;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = undefined;
        vi.restoreAllMocks();
    });

    it("should load the file and apply overrides", () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "org-backup-cli-"));
        const file = path.join(tmpDir, "config.yaml");
        fs.writeFileSync(
            file,
            "github:\n  token: test-token\nbackup:\n  path: /srv/backups\norganizations: [acme]\n"
        );

        const config = loadCommandConfig(file, { concurrency: 2 });

        expect(config?.organizations).toEqual(["acme"]);
        expect(config?.backup.concurrency).toBe(2);
    });

    it("should print the problem and return undefined for a bad file", () => {
        const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

        expect(loadCommandConfig("/nonexistent/org-backup.yaml")).toBeUndefined();
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(
            /^Error loading configuration: Cannot read configuration file \/nonexistent\/org-backup\.yaml/
        );
    });
});
