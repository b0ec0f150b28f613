export { runBackup, exitCodeFor, logDirectory } from "./backup.js";
export type { BackupRunOptions, BackupRunResult } from "./backup.js";
export { resolveBranch, selectFallbackBranch, parseRemoteBranches } from "./branch.js";
export type { BranchResolution } from "./branch.js";
export {
    AuthenticationError,
    GitStepError,
    OrganizationListingError,
    errorMessage,
} from "./errors.js";
export { syncRepository, inspectLocalClone, MIRROR_MARKER_FILE } from "./git.js";
export type { LocalClone, SyncOptions, SyncOutcome, SyncResult } from "./git.js";
export { GitHubRepositoryLister } from "./github.js";
export type { Repository, RepositoryLister } from "./github.js";
export { sendHeartbeat } from "./heartbeat.js";
export { createGit, gitFactory } from "./lib/git-command.js";
export type { GitClient, GitFactory } from "./lib/git-command.js";
export { acquireRunLock, LOCK_FILE_NAME } from "./lock.js";
export type { RunLock, RunLockOptions } from "./lock.js";
export { runSync, logSummary } from "./orchestrator.js";
export type { RepositoryFailure, RunSummary, SyncRunOptions } from "./orchestrator.js";
export { cleanupOldLogs } from "./retention.js";
