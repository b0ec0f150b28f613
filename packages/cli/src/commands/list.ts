/**
 * list command - print the repositories a run would back up
 */

import type { CommandModule } from "yargs";
import { createLogger } from "@org-backup/shared";
import { AuthenticationError, GitHubRepositoryLister, errorMessage } from "@org-backup/sync";
import { loadCommandConfig, type GlobalArgs } from "../utils/config.utils.js";
import { formatRepositoryLine } from "../utils/format.utils.js";

export const listCommand: CommandModule<GlobalArgs, GlobalArgs> = {
    command: "list",
    describe: "List the repositories of the configured organizations without syncing",
    handler: async (argv) => {
        const config = loadCommandConfig(argv.config);
        if (!config) {
            process.exitCode = 1;
            return;
        }

        const logger = createLogger({ level: argv.verbose ? "debug" : "warn" });
        const lister = new GitHubRepositoryLister(config.github, logger);

        try {
            const login = await lister.authenticate();
            console.log(`Connected to GitHub as: ${login}\n`);
        } catch (error) {
            if (!(error instanceof AuthenticationError)) throw error;
            console.error(error.message);
            process.exitCode = 1;
            return;
        }

        for (const organization of config.organizations) {
            console.log(`${organization}:`);
            try {
                const repositories = await lister.listOrganizationRepositories(organization);
                for (const repo of repositories) {
                    console.log(`  ${formatRepositoryLine(repo)}`);
                }
            } catch (error) {
                console.error(`  ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        }
    },
};
