import type { Endpoints, UserProfile } from "./types.js";

const GH_REST = "https://api.github.com";

export const DEFAULT_ENDPOINTS: Endpoints = {
	organizationRepositories: `${GH_REST}/orgs/{organization}/repos`,
	repositoryContributors: `${GH_REST}/repos/{repository}/contributors`,
	user: `${GH_REST}/users/{login}`
};

export const DEFAULT_TIMEOUT_MS = 2000;

const PER_PAGE = 100;

/** Matches the page number of the `rel="last"` entry of a Link header */
const LAST_PAGE_PATTERN = /<[^>]*[?&]page=(\d+)[^>]*>;\s*rel="last"/;

export class GitHubRequestError extends Error {
	readonly status: number;
	readonly url: string;

	constructor(status: number, url: string) {
		super(`GitHub request failed (${status}) for ${url}`);
		this.name = "GitHubRequestError";
		this.status = status;
		this.url = url;
	}
}

export interface GitHubClientOptions {
	user: string;
	password?: string;
	/** Per-request timeout in milliseconds */
	timeoutMs?: number;
	endpoints?: Partial<Endpoints>;
}

export class GitHubClient {
	readonly endpoints: Endpoints;
	private user: string;
	private password: string;
	private timeoutMs: number;

	constructor(options: GitHubClientOptions) {
		this.user = options.user;
		this.password = options.password ?? "";
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.endpoints = { ...DEFAULT_ENDPOINTS, ...options.endpoints };
	}

	private headers(): Record<string, string> {
		const credentials = Buffer.from(`${this.user}:${this.password}`).toString(
			"base64"
		);
		return {
			Authorization: `Basic ${credentials}`,
			"User-Agent": "github-contributor-stats-cli/1.0",
			Accept: "application/vnd.github+json",
			"X-GitHub-Api-Version": "2022-11-28"
		};
	}

	private request(url: string): Promise<Response> {
		return fetch(url, {
			headers: this.headers(),
			signal: AbortSignal.timeout(this.timeoutMs)
		});
	}

	// ---------------------------------------------------------------------------
	// Fetch every page of a paginated REST resource.
	// The first response doubles as page 1; its Link header tells how many follow.
	// ---------------------------------------------------------------------------

	async fetchAllPages(
		template: string,
		params: Record<string, string>,
		onPage?: (page: number, totalPages: number) => void
	): Promise<unknown[]> {
		const base = expandTemplate(template, params);

		const first = await this.request(pageUrl(base, 1));
		// Anything but success on the first page means "nothing found"
		if (!first.ok) return [];

		const totalPages = parseLastPage(first.headers.get("link")) ?? 1;
		const records: unknown[] = [...(await readPage(first))];
		onPage?.(1, totalPages);

		for (let page = 2; page <= totalPages; page++) {
			const url = pageUrl(base, page);
			const res = await this.request(url);
			if (!res.ok) throw new GitHubRequestError(res.status, url);
			records.push(...(await readPage(res)));
			onPage?.(page, totalPages);
		}

		return records;
	}

	// ---------------------------------------------------------------------------
	// Single user profile; null when the lookup does not succeed
	// ---------------------------------------------------------------------------

	async getUser(login: string): Promise<UserProfile | null> {
		const res = await this.request(
			expandTemplate(this.endpoints.user, { login })
		);
		if (!res.ok) return null;
		const json: unknown = await res.json();
		return isObject(json) ? json : null;
	}
}

/** Replace `{name}` placeholders, encoding each path segment of the value */
export function expandTemplate(
	template: string,
	params: Record<string, string>
): string {
	return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
		const value = params[name];
		if (value === undefined) {
			throw new Error(`Missing value for ${placeholder} in ${template}`);
		}
		return value.split("/").map(encodeURIComponent).join("/");
	});
}

export function parseLastPage(link: string | null): number | undefined {
	if (!link) return undefined;
	const match = LAST_PAGE_PATTERN.exec(link);
	return match ? parseInt(match[1], 10) : undefined;
}

function pageUrl(base: string, page: number): string {
	const url = new URL(base);
	url.searchParams.set("per_page", String(PER_PAGE));
	url.searchParams.set("page", String(page));
	return url.toString();
}

async function readPage(res: Response): Promise<unknown[]> {
	// 204: GitHub's reply for contributors of an empty repository
	if (res.status === 204) return [];
	const json: unknown = await res.json();
	return Array.isArray(json) ? json : [];
}

export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
