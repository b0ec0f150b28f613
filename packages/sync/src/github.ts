/**
 * GitHub API client for listing organization repositories
 */

import { Octokit } from "@octokit/rest";
import type { GitHubConfig, Logger } from "@org-backup/shared";
import { AuthenticationError, OrganizationListingError } from "./errors.js";

export interface Repository {
    name: string;
    fullName: string;
    cloneUrl: string;
    defaultBranch: string;
    isArchived: boolean;
}

/**
 * The remote side of a run: who we are and what each organization holds
 */
export interface RepositoryLister {
    /** Returns the authenticated login; throws AuthenticationError */
    authenticate(): Promise<string>;
    /** Throws OrganizationListingError */
    listOrganizationRepositories(organization: string): Promise<Repository[]>;
}

export class GitHubRepositoryLister implements RepositoryLister {
    private readonly octokit: Octokit;

    constructor(
        private readonly config: GitHubConfig,
        private readonly logger: Logger
    ) {
        this.octokit = new Octokit({
            auth: config.token,
            ...(config.apiUrl ? { baseUrl: config.apiUrl } : {}),
        });
    }

    async authenticate(): Promise<string> {
        try {
            const { data } = await this.octokit.users.getAuthenticated();
            return data.login;
        } catch (error) {
            throw new AuthenticationError(error);
        }
    }

    async listOrganizationRepositories(organization: string): Promise<Repository[]> {
        const repositories: Repository[] = [];
        let archivedCount = 0;

        try {
            for await (const response of this.octokit.paginate.iterator(
                this.octokit.repos.listForOrg,
                { org: organization, type: "all", per_page: 100 }
            )) {
                for (const repo of response.data) {
                    const isArchived = repo.archived ?? false;
                    if (isArchived && this.config.skipArchived) {
                        archivedCount++;
                        this.logger.debug(`Skipping archived: ${repo.full_name}`);
                        continue;
                    }
                    if (!repo.clone_url) {
                        this.logger.warn(`Skipping ${repo.full_name}: no clone URL reported`);
                        continue;
                    }

                    repositories.push({
                        name: repo.name,
                        fullName: repo.full_name,
                        cloneUrl: repo.clone_url,
                        defaultBranch: repo.default_branch ?? "main",
                        isArchived,
                    });
                }
            }
        } catch (error) {
            throw new OrganizationListingError(organization, error);
        }

        this.logger.info(
            `Found ${repositories.length} repositories in ${organization}` +
                (archivedCount > 0 ? ` (${archivedCount} archived skipped)` : "")
        );
        return repositories;
    }
}
