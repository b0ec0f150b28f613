/**
 * run command - mirror every configured organization (default command)
 */

import * as path from "node:path";
import type { CommandModule } from "yargs";
import { createLogger, logFileName } from "@org-backup/shared";
import { logDirectory, runBackup } from "@org-backup/sync";
import { loadCommandConfig, type GlobalArgs } from "../utils/config.utils.js";

interface RunArgs extends GlobalArgs {
    concurrency?: number;
}

export const runCommand: CommandModule<GlobalArgs, RunArgs> = {
    command: ["run", "$0"],
    describe: "Clone or update every repository of the configured organizations",
    builder: (yargs) =>
        yargs
            .option("concurrency", {
                type: "number",
                description: "Repositories synced at the same time (overrides backup.concurrency)",
            })
            .example("$0 --config /volume1/backup/config.yaml", "Run a backup")
            .example("$0 run --verbose --concurrency 4", "Debug output, four repositories at once"),
    handler: async (argv) => {
        const config = loadCommandConfig(argv.config, { concurrency: argv.concurrency });
        if (!config) {
            process.exitCode = 1;
            return;
        }

        const logger = createLogger({
            level: argv.verbose ? "debug" : "info",
            file: { path: path.join(logDirectory(config), logFileName()) },
        });

        const result = await runBackup(config, { logger });
        process.exitCode = result.exitCode;
    },
};
