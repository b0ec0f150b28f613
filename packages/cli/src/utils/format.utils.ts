import type { Repository } from "@org-backup/sync";

/**
 * One line per repository for `org-backup list`
 */
export function formatRepositoryLine(repo: Repository): string {
    const archived = repo.isArchived ? "  [archived]" : "";
    return `${repo.fullName}  ${repo.defaultBranch}${archived}`;
}
