import { type GitHubClient, isObject } from "./github-client.js";
import type { RepositoryRecord } from "./types.js";

/**
 * List the full names of an organization's repositories worth aggregating.
 * Archived, private and forked repositories are skipped, as are those listed
 * in `excludeRepositories`. The service's order is kept.
 */
export async function listRepositories(
	client: GitHubClient,
	organization: string,
	excludeRepositories: string[] = [],
	onPage?: (page: number, totalPages: number) => void
): Promise<string[]> {
	const records = await client.fetchAllPages(
		client.endpoints.organizationRepositories,
		{ organization },
		onPage
	);

	return records
		.filter(isRepositoryRecord)
		.filter((repo) => !repo.archived && !repo.private && !repo.fork)
		.filter((repo) => !excludeRepositories.includes(repo.full_name))
		.map((repo) => repo.full_name);
}

function isRepositoryRecord(value: unknown): value is RepositoryRecord {
	return isObject(value) && typeof value.full_name === "string";
}
