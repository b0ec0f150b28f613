/**
 * Branch resolution for regular (non-mirror) clones
 *
 * After a fetch the working copy is reset onto the repository's default
 * branch. When GitHub reports a default branch that the clone does not
 * know (renamed, or never pushed), a remote branch is picked instead:
 * main, then master, then whatever git lists first.
 */

import type { Logger } from "@org-backup/shared";
import { runGitStep, type GitClient } from "./lib/git-command.js";

export const REMOTE_NAME = "origin";

export type BranchResolution =
    | { kind: "resolved"; branch: string; fellBack: boolean }
    | { kind: "none" };

/**
 * Parses `git branch -r` output into remote-qualified branch names
 *
 * Symbolic entries such as `origin/HEAD -> origin/main` are dropped.
 */
export function parseRemoteBranches(output: string): string[] {
    return output
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line !== "" && !line.includes(" -> ") && !line.endsWith("/HEAD"));
}

/**
 * Picks the branch to fall back to: main, then master, then the first listed
 *
 * The last rule depends on git's listing order.
 */
export function selectFallbackBranch(branches: readonly string[]): string | undefined {
    return (
        branches.find((b) => b.endsWith("/main")) ??
        branches.find((b) => b.endsWith("/master")) ??
        branches[0]
    );
}

function stripRemote(ref: string): string {
    const slash = ref.indexOf("/");
    return slash === -1 ? ref : ref.slice(slash + 1);
}

async function remoteBranchExists(git: GitClient, branch: string): Promise<boolean> {
    try {
        await git.raw(["show-ref", "--verify", "--quiet", `refs/remotes/${REMOTE_NAME}/${branch}`]);
        return true;
    } catch {
        return false;
    }
}

/**
 * Resets the working copy onto ref and checks out branch tracking it
 *
 * Afterwards the local branch never tracks an upstream that was renamed or
 * deleted on GitHub.
 */
async function checkoutRemoteBranch(git: GitClient, branch: string, ref: string): Promise<void> {
    await runGitStep(`git reset --hard ${ref}`, () => git.reset(["--hard", ref]));
    await runGitStep(`git checkout -B ${branch} --track ${ref}`, () =>
        git.raw(["checkout", "-B", branch, "--track", ref])
    );
}

/**
 * Resets the working copy onto the candidate branch, or onto a fallback
 *
 * Git failures propagate.
 */
export async function resolveBranch(
    git: GitClient,
    candidate: string,
    logger: Logger
): Promise<BranchResolution> {
    if (await remoteBranchExists(git, candidate)) {
        const ref = `${REMOTE_NAME}/${candidate}`;
        logger.debug(`Resetting to ${ref}`);
        await checkoutRemoteBranch(git, candidate, ref);
        return { kind: "resolved", branch: candidate, fellBack: false };
    }

    logger.warn(
        `Could not reset to ${REMOTE_NAME}/${candidate}, trying to find available branches`
    );

    const listing = await runGitStep("git branch -r", () => git.raw(["branch", "-r"]));
    const branches = parseRemoteBranches(listing);
    logger.debug(`Available remote branches: ${branches.length > 0 ? branches.join(", ") : "(none)"}`);

    const selected = selectFallbackBranch(branches);
    if (selected === undefined) {
        logger.warn("No remote branches found, skipping reset");
        return { kind: "none" };
    }

    const branch = stripRemote(selected);
    logger.info(`Resetting to ${selected}`);
    await checkoutRemoteBranch(git, branch, selected);
    return { kind: "resolved", branch, fellBack: true };
}
