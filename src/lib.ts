/**
 * Programmatic API for github-contributor-stats.
 *
 * @example
 * ```ts
 * import { getContributorStats } from "github-contributor-stats";
 *
 * const users = await getContributorStats({
 *   user: "octocat",
 *   password: process.env.GITHUB_TOKEN ?? "",
 *   organization: "my-org",
 *   config: { extractEmailDomain: true },
 * });
 * console.log(users[0]?.login);
 * ```
 */
import { aggregate } from "./aggregator.js";
import { resolveConfig } from "./config.js";
import { GitHubClient } from "./github-client.js";
import { listRepositories } from "./repositories.js";
import { sortUsers } from "./report.js";
import type { AggregatedUser, ContributorConfig, Endpoints } from "./types.js";

export type {
	AggregatedUser,
	ContributorConfig,
	ContributorRecord,
	Endpoints,
	ReportEntry,
	UserProfile
} from "./types.js";

export { aggregate } from "./aggregator.js";
export { ConfigError, loadConfig, parseConfig, resolveConfig } from "./config.js";
export {
	DEFAULT_ENDPOINTS,
	GitHubClient,
	GitHubRequestError
} from "./github-client.js";
export { listRepositories } from "./repositories.js";
export { sortUsers, toReport, writeReport } from "./report.js";

export interface GetContributorStatsOptions {
	/** Account used for HTTP Basic authentication */
	user: string;
	/** Password or personal access token. Defaults to "". */
	password?: string;
	/** Organization whose repositories are aggregated */
	organization?: string;
	/**
	 * Single `owner/name` repository. When set, it is aggregated on its own
	 * and the organization is not listed.
	 */
	repository?: string;
	config?: Partial<ContributorConfig>;
	/** Per-request timeout in milliseconds. Defaults to 2000. */
	timeoutMs?: number;
	/** Override the REST endpoint templates (e.g. for GitHub Enterprise). */
	endpoints?: Partial<Endpoints>;
	/**
	 * Narrow the listed repositories before aggregation, e.g. to let a user
	 * pick some of them.
	 */
	selectRepositories?: (repositories: string[]) => Promise<string[]>;
	/** Optional progress callback invoked as each phase advances. */
	onProgress?: (event: ProgressEvent) => void;
}

export type ProgressEvent =
	| { phase: "repositories"; page: number; totalPages: number }
	| { phase: "repositories-done"; count: number }
	| { phase: "contributors"; repository: string; index: number; total: number }
	| { phase: "sort"; users: number };

/** Resolve which repositories to aggregate, listing the organization if needed. */
export async function resolveRepositories(
	client: GitHubClient,
	options: Pick<
		GetContributorStatsOptions,
		"organization" | "repository" | "onProgress"
	>,
	config: ContributorConfig
): Promise<string[]> {
	const { organization, repository, onProgress } = options;
	if (repository) return [repository];
	if (!organization) {
		throw new Error("Either an organization or a repository is required");
	}
	const repositories = await listRepositories(
		client,
		organization,
		config.excludeRepositories,
		(page, totalPages) => {
			onProgress?.({ phase: "repositories", page, totalPages });
		}
	);
	onProgress?.({ phase: "repositories-done", count: repositories.length });
	return repositories;
}

/**
 * Aggregate contributors across an organization (or one repository) and
 * return them ranked by contributions.
 *
 * The function mirrors the CLI pipeline (list repositories → aggregate
 * contributors → sort) without console output, so it can be embedded in
 * other tools. Writing the report is left to the caller (see `writeReport`).
 */
export async function getContributorStats(
	options: GetContributorStatsOptions
): Promise<AggregatedUser[]> {
	const {
		user,
		password = "",
		timeoutMs,
		endpoints,
		selectRepositories,
		onProgress
	} = options;
	const config = resolveConfig(options.config);

	const client = new GitHubClient({ user, password, timeoutMs, endpoints });

	// ── Phase 1: Repositories ────────────────────────────────────────────────

	let repositories = await resolveRepositories(client, options, config);
	// Nothing to choose from when the organization lists no repositories
	if (selectRepositories && repositories.length > 0) {
		repositories = await selectRepositories(repositories);
	}

	// ── Phase 2: Contributors ────────────────────────────────────────────────

	const users = await aggregate(
		client,
		repositories,
		config,
		(repository, index, total) => {
			onProgress?.({ phase: "contributors", repository, index, total });
		}
	);

	// ── Phase 3: Sort ────────────────────────────────────────────────────────

	onProgress?.({ phase: "sort", users: users.size });
	return sortUsers(users);
}
