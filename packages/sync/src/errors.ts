/**
 * Error types for the sync engine
 *
 * AuthenticationError aborts a run. OrganizationListingError skips one
 * organization. GitStepError fails one repository.
 */

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class AuthenticationError extends Error {
    constructor(cause: unknown) {
        super(`GitHub authentication failed: ${errorMessage(cause)}`, { cause });
        this.name = "AuthenticationError";
    }
}

export class OrganizationListingError extends Error {
    constructor(
        readonly organization: string,
        cause: unknown
    ) {
        super(`GitHub API error for organization ${organization}: ${errorMessage(cause)}`, { cause });
        this.name = "OrganizationListingError";
    }
}

/**
 * A git invocation exited non-zero; `output` holds what the tool printed
 */
export class GitStepError extends Error {
    constructor(
        readonly step: string,
        readonly output: string,
        cause?: unknown
    ) {
        super(output ? `${step} failed: ${output}` : `${step} failed`, { cause });
        this.name = "GitStepError";
    }
}
