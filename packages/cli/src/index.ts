#!/usr/bin/env tsx

/**
 * org-backup CLI
 *
 * Mirrors every repository of the configured GitHub organizations.
 * Run `org-backup --help` for usage information.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runCommand } from "./commands/run.js";
import { listCommand } from "./commands/list.js";

await yargs(hideBin(process.argv))
    .scriptName("org-backup")
    .usage("$0 [command] [options]")
    .option("config", {
        alias: "c",
        type: "string",
        description: "Path to config file",
        default: "config.yaml",
    })
    .option("verbose", {
        type: "boolean",
        description: "Enable verbose output",
        default: false,
    })
    .command(runCommand)
    .command(listCommand)
    .strict()
    .help()
    .alias("h", "help")
    .version("1.0.0")
    .alias("v", "version")
    .parseAsync();
