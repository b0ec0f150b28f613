/**
 * Sync orchestration
 *
 * Walks the configured organizations in order, lists their repositories
 * and syncs each one. A failing organization or repository is logged and
 * counted; only an authentication failure stops the run.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { BackupConfig, Logger } from "@org-backup/shared";
import { errorMessage } from "./errors.js";
import { syncRepository, type SyncOptions, type SyncResult } from "./git.js";
import type { Repository, RepositoryLister } from "./github.js";
import { gitFactory, type GitFactory } from "./lib/git-command.js";
import { mapWithConcurrency } from "./lib/pool.js";

export interface RepositoryFailure {
    organization: string;
    repository: string;
    reason: string;
}

export interface RunSummary {
    totalRepos: number;
    succeeded: number;
    failed: number;
    created: number;
    updated: number;
    /** Organizations whose repositories could not be listed */
    skippedOrganizations: string[];
    failures: RepositoryFailure[];
    startedAt: Date;
    finishedAt: Date;
    durationMs: number;
}

export interface SyncRunOptions {
    lister: RepositoryLister;
    logger: Logger;
    /** Defaults to simple-git with the configured timeout */
    openGit?: GitFactory;
    now?: () => Date;
}

function failedResult(repo: Repository, message: string): SyncResult {
    return { repository: repo.fullName, action: "failed", message, durationMs: 0 };
}

/**
 * Syncs one organization's repositories through the worker pool
 *
 * Target paths are claimed before any work starts, so two repositories
 * mapping to the same directory never run against it.
 */
async function syncOrganization(
    organization: string,
    repositories: Repository[],
    organizationDir: string,
    claimedPaths: Map<string, string>,
    concurrency: number,
    syncOptions: SyncOptions
): Promise<SyncResult[]> {
    const { logger } = syncOptions;

    try {
        fs.mkdirSync(organizationDir, { recursive: true });
    } catch (error) {
        const reason = `Cannot create ${organizationDir}: ${errorMessage(error)}`;
        logger.error(`Error processing organization ${organization}: ${reason}`);
        return repositories.map((repo) => failedResult(repo, reason));
    }

    const tasks = repositories.map((repo) => {
        const key = path.join(organizationDir, repo.name).toLowerCase();
        const owner = claimedPaths.get(key);
        if (owner !== undefined) {
            return { repo, conflict: `Local path already used by ${owner}` };
        }
        claimedPaths.set(key, repo.fullName);
        return { repo, conflict: undefined };
    });

    return mapWithConcurrency(tasks, concurrency, async ({ repo, conflict }) => {
        if (conflict !== undefined) {
            logger.error(`Failed to backup repository ${repo.fullName}: ${conflict}`);
            return failedResult(repo, conflict);
        }
        return syncRepository(repo, organizationDir, syncOptions);
    });
}

export function logSummary(summary: RunSummary, logger: Logger): void {
    const rule = "=".repeat(50);
    logger.info(rule);
    logger.info("Backup Summary");
    logger.info(rule);
    logger.info(`Total repositories found: ${summary.totalRepos}`);
    logger.info(
        `Successfully backed up: ${summary.succeeded} (created ${summary.created}, updated ${summary.updated})`
    );
    logger.info(`Failed backups: ${summary.failed}`);
    for (const failure of summary.failures) {
        logger.info(`  ${failure.repository}: ${failure.reason}`);
    }
    if (summary.skippedOrganizations.length > 0) {
        logger.info(`Skipped organizations: ${summary.skippedOrganizations.join(", ")}`);
    }
    logger.info(`Backup duration: ${(summary.durationMs / 60000).toFixed(2)} minutes`);
    logger.info(rule);
}

/**
 * Runs one full sync of every configured organization
 *
 * Throws AuthenticationError before touching disk when the token is
 * rejected.
 */
export async function runSync(config: BackupConfig, options: SyncRunOptions): Promise<RunSummary> {
    const { lister, logger } = options;
    const now = options.now ?? (() => new Date());
    const startedAt = now();

    logger.info("Starting GitHub repository backup");
    const login = await lister.authenticate();
    logger.info(`Connected to GitHub as: ${login}`);

    fs.mkdirSync(config.backup.path, { recursive: true });

    const timeoutMs = config.backup.gitTimeoutSeconds * 1000;
    const syncOptions: SyncOptions = {
        token: config.github.token,
        embedTokenInUrl: config.github.embedTokenInUrl,
        openGit: options.openGit ?? gitFactory({ timeoutMs }),
        logger,
    };

    const skippedOrganizations: string[] = [];
    const failures: RepositoryFailure[] = [];
    const claimedPaths = new Map<string, string>();
    let created = 0;
    let updated = 0;
    let totalRepos = 0;

    for (const organization of config.organizations) {
        logger.info(`Processing organization: ${organization}`);

        let repositories: Repository[];
        try {
            repositories = await lister.listOrganizationRepositories(organization);
        } catch (error) {
            logger.error(errorMessage(error));
            skippedOrganizations.push(organization);
            continue;
        }

        const results = await syncOrganization(
            organization,
            repositories,
            path.join(config.backup.path, organization),
            claimedPaths,
            config.backup.concurrency,
            syncOptions
        );

        totalRepos += results.length;
        for (const result of results) {
            switch (result.action) {
                case "created":
                    created++;
                    break;
                case "updated":
                    updated++;
                    break;
                case "failed":
                    failures.push({
                        organization,
                        repository: result.repository,
                        reason: result.message,
                    });
                    break;
            }
        }
    }

    const finishedAt = now();
    const summary: RunSummary = {
        totalRepos,
        succeeded: created + updated,
        failed: failures.length,
        created,
        updated,
        skippedOrganizations,
        failures,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
    };

    logSummary(summary, logger);
    return summary;
}
