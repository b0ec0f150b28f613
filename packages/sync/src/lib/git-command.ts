/**
 * Helpers for running git through simple-git
 *
 * Every instance is bound to one directory, so no invocation depends on the
 * process working directory. Any non-zero exit rejects, with the tool's
 * stdout and stderr as the error message.
 */

import { simpleGit, type SimpleGit, type SimpleGitOptions } from "simple-git";
import { GitStepError, errorMessage } from "../errors.js";

export interface GitClientOptions {
    /** Kill a git process that produces no output for this long */
    timeoutMs?: number;
}

/** The git operations the sync engine uses */
export type GitClient = Pick<
    SimpleGit,
    "clone" | "fetch" | "pull" | "reset" | "raw" | "remote" | "getConfig"
>;

/** Opens git bound to a directory */
export type GitFactory = (baseDir: string) => GitClient;

/**
 * Creates a simple-git instance whose working directory is baseDir
 */
export function createGit(baseDir: string, options: GitClientOptions = {}): SimpleGit {
    const gitOptions: Partial<SimpleGitOptions> = {
        baseDir,
        binary: "git",
        maxConcurrentProcesses: 1,
        errors(error, result) {
            if (error) return error;
            if (result.exitCode === 0) return undefined;
            return Buffer.concat([...result.stdOut, ...result.stdErr]);
        },
    };
    if (options.timeoutMs && options.timeoutMs > 0) {
        gitOptions.timeout = { block: options.timeoutMs };
    }
    return simpleGit(gitOptions);
}

export function gitFactory(options: GitClientOptions = {}): GitFactory {
    return (baseDir) => createGit(baseDir, options);
}

/**
 * Runs one git invocation, converting its failure into a GitStepError
 */
export async function runGitStep<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        if (error instanceof GitStepError) throw error;
        throw new GitStepError(step, errorMessage(error).trim(), error);
    }
}

/**
 * Constructs the authenticated HTTPS URL for cloning
 */
export function getAuthenticatedUrl(cloneUrl: string, token: string): string {
    // Convert https://github.com/org/repo.git to https://token@github.com/org/repo.git
    const url = new URL(cloneUrl);
    url.username = token;
    return url.toString();
}

/**
 * Replaces every occurrence of secret in text
 */
export function redactSecret(text: string, secret: string): string {
    if (!secret) return text;
    return text.split(secret).join("***");
}
