/**
 * Git operations for cloning and updating repository backups
 *
 * New repositories are mirror-cloned. Existing ones are refreshed in place:
 * mirrors fetch every ref, regular clones fetch and then reset onto a
 * resolved branch. Nothing here throws; every failure becomes a
 * SyncResult with action "failed".
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "@org-backup/shared";
import { resolveBranch, REMOTE_NAME, type BranchResolution } from "./branch.js";
import { errorMessage } from "./errors.js";
import type { Repository } from "./github.js";
import {
    getAuthenticatedUrl,
    redactSecret,
    runGitStep,
    type GitClient,
    type GitFactory,
} from "./lib/git-command.js";

/** Written inside every clone created with --mirror */
export const MIRROR_MARKER_FILE = "org-backup-mirror";

export interface SyncOptions {
    /** GitHub token for HTTPS auth */
    token: string;
    /** Put the token in the remote URL while git talks to GitHub */
    embedTokenInUrl: boolean;
    openGit: GitFactory;
    logger: Logger;
}

export type SyncOutcome =
    | { action: "created"; message: string }
    | {
          action: "updated";
          message: string;
          /** Absent for mirror clones, which are never reset */
          branch?: BranchResolution;
      }
    | { action: "failed"; message: string };

export type SyncResult = SyncOutcome & {
    /** Full name, e.g. acme/widgets */
    repository: string;
    durationMs: number;
};

export interface LocalClone {
    path: string;
    isMirror: boolean;
}

/**
 * Gets the local path for a repository inside its organization directory
 */
export function getRepoLocalPath(organizationDir: string, repo: Repository): string {
    return path.join(organizationDir, repo.name);
}

function writeMirrorMarker(localPath: string): void {
    fs.writeFileSync(path.join(localPath, MIRROR_MARKER_FILE), `${new Date().toISOString()}\n`);
}

/**
 * Reads the mirror flag of an existing clone
 *
 * Clones made before the marker existed are checked once through
 * remote.origin.mirror and marked when they turn out to be mirrors.
 */
export async function inspectLocalClone(
    git: GitClient,
    localPath: string,
    logger: Logger
): Promise<LocalClone> {
    if (fs.existsSync(path.join(localPath, MIRROR_MARKER_FILE))) {
        return { path: localPath, isMirror: true };
    }

    let isMirror = false;
    try {
        const config = await git.getConfig(`remote.${REMOTE_NAME}.mirror`);
        isMirror = config.value?.trim() === "true";
    } catch (error) {
        // git config exits 1 when the key is unset
        logger.debug(`No mirror setting in ${localPath}: ${errorMessage(error).trim() || "unset"}`);
    }

    if (isMirror) {
        writeMirrorMarker(localPath);
    }
    return { path: localPath, isMirror };
}

/**
 * Mirror-clones a repository that has no local copy yet
 */
async function cloneRepository(
    repo: Repository,
    organizationDir: string,
    localPath: string,
    options: SyncOptions
): Promise<SyncOutcome> {
    const { logger, openGit, token, embedTokenInUrl } = options;
    logger.info(`Cloning new repository: ${repo.fullName}`);

    const url = embedTokenInUrl ? getAuthenticatedUrl(repo.cloneUrl, token) : repo.cloneUrl;
    const git = openGit(organizationDir);
    await runGitStep("git clone --mirror", () => git.clone(url, localPath, ["--mirror"]));

    if (embedTokenInUrl) {
        // Update remote URL to non-authenticated version for safety
        const repoGit = openGit(localPath);
        await runGitStep("git remote set-url", () =>
            repoGit.remote(["set-url", REMOTE_NAME, repo.cloneUrl])
        );
    }
    writeMirrorMarker(localPath);

    return { action: "created", message: "Mirror cloned" };
}

/**
 * Fetches every ref into an existing clone and, for regular clones,
 * resets the working copy onto a branch
 */
async function refreshRepository(
    repo: Repository,
    git: GitClient,
    localPath: string,
    logger: Logger
): Promise<SyncOutcome> {
    const clone = await inspectLocalClone(git, localPath, logger);
    logger.debug(`Repository is mirror: ${clone.isMirror}`);

    logger.debug(`Fetching updates for ${repo.fullName}`);
    await runGitStep("git fetch --all", () => git.fetch(["--all"]));

    if (clone.isMirror) {
        await runGitStep("git fetch --prune", () => git.fetch(["--prune"]));
        await runGitStep("git fetch --tags --force", () => git.fetch(["--tags", "--force"]));
        return { action: "updated", message: "Mirror refs fetched" };
    }

    logger.debug(`Repository default branch: ${repo.defaultBranch}`);
    const branch = await resolveBranch(git, repo.defaultBranch, logger);

    if (branch.kind === "resolved") {
        await runGitStep("git pull --all", () => git.pull(["--all"]));
    } else {
        // Nothing to merge into; pull would fail on the missing upstream
        logger.debug(`Skipping pull for ${repo.fullName}`);
    }
    await runGitStep("git fetch --tags --force", () => git.fetch(["--tags", "--force"]));

    const message =
        branch.kind === "resolved"
            ? `Updated on ${branch.branch}${branch.fellBack ? " (fallback)" : ""}`
            : "Fetched without a branch to reset onto";
    return { action: "updated", message, branch };
}

/**
 * Updates an existing clone, with the authenticated remote URL set only
 * for the duration of the update
 */
async function updateRepository(
    repo: Repository,
    localPath: string,
    options: SyncOptions
): Promise<SyncOutcome> {
    const { logger, openGit, token, embedTokenInUrl } = options;
    logger.info(`Updating existing repository: ${repo.fullName}`);

    const git = openGit(localPath);
    if (!embedTokenInUrl) {
        return refreshRepository(repo, git, localPath, logger);
    }

    const authUrl = getAuthenticatedUrl(repo.cloneUrl, token);
    await runGitStep("git remote set-url", () => git.remote(["set-url", REMOTE_NAME, authUrl]));

    let result: SyncOutcome;
    try {
        result = await refreshRepository(repo, git, localPath, logger);
    } catch (error) {
        try {
            await git.remote(["set-url", REMOTE_NAME, repo.cloneUrl]);
        } catch (restoreError) {
            logger.warn(
                `Could not restore remote URL of ${repo.fullName}: ${redactSecret(errorMessage(restoreError), token)}`
            );
        }
        throw error;
    }

    // Restore non-authenticated URL
    await runGitStep("git remote set-url", () =>
        git.remote(["set-url", REMOTE_NAME, repo.cloneUrl])
    );
    return result;
}

/**
 * Syncs a single repository (clone or update) into organizationDir
 */
export async function syncRepository(
    repo: Repository,
    organizationDir: string,
    options: SyncOptions
): Promise<SyncResult> {
    const { logger, token } = options;
    const localPath = getRepoLocalPath(organizationDir, repo);
    const startedAt = Date.now();

    try {
        const outcome = fs.existsSync(localPath)
            ? await updateRepository(repo, localPath, options)
            : await cloneRepository(repo, organizationDir, localPath, options);
        logger.info(`Successfully backed up: ${repo.fullName}`);
        return { ...outcome, repository: repo.fullName, durationMs: Date.now() - startedAt };
    } catch (error) {
        const reason = redactSecret(errorMessage(error), token);
        logger.error(`Git operation failed for ${repo.fullName}: ${reason}`);
        return {
            repository: repo.fullName,
            action: "failed",
            message: reason,
            durationMs: Date.now() - startedAt,
        };
    }
}
