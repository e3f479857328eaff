import { delay, http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import {
	GitHubClient,
	GitHubRequestError,
	expandTemplate,
	parseLastPage
} from "./github-client.js";
import {
	GITHUB_API_BASE,
	type RecordedRequest,
	githubApi
} from "./test/github-handlers.js";
import { server } from "./test/msw-setup.js";

function client(password = "test-secret"): GitHubClient {
	return new GitHubClient({ user: "octocat", password });
}

describe("expandTemplate", () => {
	it("substitutes placeholders and encodes each path segment", () => {
		expect(
			expandTemplate("https://api.github.com/repos/{repository}/contributors", {
				repository: "acme/my repo"
			})
		).toBe("https://api.github.com/repos/acme/my%20repo/contributors");
	});

	it("throws when a placeholder has no value", () => {
		expect(() => expandTemplate("https://x.test/users/{login}", {})).toThrow(
			"Missing value for {login} in https://x.test/users/{login}"
		);
	});
});

describe("parseLastPage", () => {
	it("reads the page number of the rel=last link", () => {
		const link =
			'<https://api.github.com/organizations/9/repos?per_page=100&page=2>; rel="next", ' +
			'<https://api.github.com/organizations/9/repos?per_page=100&page=7>; rel="last"';
		expect(parseLastPage(link)).toBe(7);
	});

	it("returns undefined without a header or a last link", () => {
		expect(parseLastPage(null)).toBeUndefined();
		expect(
			parseLastPage('<https://api.github.com/orgs/acme/repos?page=2>; rel="next"')
		).toBeUndefined();
	});
});

describe("GitHubClient.fetchAllPages", () => {
	const template = `${GITHUB_API_BASE}/orgs/{organization}/repos`;

	it("requests every page in order and concatenates the records", async () => {
		const requests: RecordedRequest[] = [];
		server.use(
			...githubApi(
				{
					orgRepos: {
						acme: [
							[{ full_name: "acme/a" }, { full_name: "acme/b" }],
							[{ full_name: "acme/c" }],
							[{ full_name: "acme/d" }]
						]
					}
				},
				requests
			)
		);
		const pages: Array<[number, number]> = [];

		const records = await client().fetchAllPages(
			template,
			{ organization: "acme" },
			(page, total) => pages.push([page, total])
		);

		expect(records).toEqual([
			{ full_name: "acme/a" },
			{ full_name: "acme/b" },
			{ full_name: "acme/c" },
			{ full_name: "acme/d" }
		]);
		expect(requests.map((r) => r.page)).toEqual(["1", "2", "3"]);
		expect(pages).toEqual([
			[1, 3],
			[2, 3],
			[3, 3]
		]);
	});

	it("issues a single request when there is no Link header", async () => {
		const requests: RecordedRequest[] = [];
		server.use(
			...githubApi({ orgRepos: { acme: [[{ full_name: "acme/a" }]] } }, requests)
		);

		const records = await client().fetchAllPages(template, {
			organization: "acme"
		});

		expect(records).toEqual([{ full_name: "acme/a" }]);
		expect(requests).toHaveLength(1);
	});

	it("returns nothing when the first page is not a success", async () => {
		const requests: RecordedRequest[] = [];
		server.use(...githubApi({}, requests));
		const pages: number[] = [];

		const records = await client().fetchAllPages(
			template,
			{ organization: "missing" },
			(page) => pages.push(page)
		);

		expect(records).toEqual([]);
		expect(requests).toHaveLength(1);
		expect(pages).toEqual([]);
	});

	it("fails when a later page is not a success", async () => {
		server.use(
			...githubApi({
				orgRepos: { acme: [[{ full_name: "acme/a" }], [{ full_name: "acme/b" }]] },
				statusOverrides: { "/orgs/acme/repos?page=2": 500 }
			})
		);

		const result = client().fetchAllPages(template, { organization: "acme" });

		await expect(result).rejects.toBeInstanceOf(GitHubRequestError);
		await expect(result).rejects.toMatchObject({ status: 500 });
	});

	it("fails when a request outlives the timeout", async () => {
		server.use(
			http.get(`${GITHUB_API_BASE}/orgs/acme/repos`, async () => {
				await delay(300);
				return HttpResponse.json([{ full_name: "acme/a" }]);
			})
		);
		const impatient = new GitHubClient({ user: "octocat", timeoutMs: 50 });

		await expect(
			impatient.fetchAllPages(template, { organization: "acme" })
		).rejects.toThrow();
	});

	it("fails when the connection breaks", async () => {
		server.use(
			http.get(`${GITHUB_API_BASE}/orgs/acme/repos`, () => HttpResponse.error())
		);

		await expect(
			client().fetchAllPages(template, { organization: "acme" })
		).rejects.toThrow();
	});

	it("treats 204 No Content as an empty page", async () => {
		server.use(
			http.get(
				`${GITHUB_API_BASE}/repos/acme/empty/contributors`,
				() => new HttpResponse(null, { status: 204 })
			)
		);
		const c = client();

		const records = await c.fetchAllPages(c.endpoints.repositoryContributors, {
			repository: "acme/empty"
		});

		expect(records).toEqual([]);
	});

	it("authenticates with HTTP Basic credentials", async () => {
		const requests: RecordedRequest[] = [];
		server.use(...githubApi({ orgRepos: { acme: [[]] } }, requests));

		await client().fetchAllPages(template, { organization: "acme" });
		await client("").fetchAllPages(template, { organization: "acme" });

		expect(requests.map((r) => r.authorization)).toEqual([
			"Basic b2N0b2NhdDp0ZXN0LXNlY3JldA==",
			"Basic b2N0b2NhdDo="
		]);
	});
});

describe("GitHubClient.getUser", () => {
	it("returns the profile of a login", async () => {
		server.use(
			...githubApi({
				users: { jdoe: { login: "jdoe", name: "Jane Doe", email: "jdoe@example.com" } }
			})
		);

		expect(await client().getUser("jdoe")).toEqual({
			login: "jdoe",
			name: "Jane Doe",
			email: "jdoe@example.com"
		});
	});

	it("returns null when the lookup fails", async () => {
		server.use(...githubApi({}));

		expect(await client().getUser("ghost")).toBeNull();
	});

	it("uses injected endpoint templates", async () => {
		server.use(
			http.get("https://ghe.example.com/api/v3/users/:login", ({ params }) =>
				HttpResponse.json({ login: params.login, site_admin: true })
			)
		);
		const enterprise = new GitHubClient({
			user: "octocat",
			endpoints: { user: "https://ghe.example.com/api/v3/users/{login}" }
		});

		expect(await enterprise.getUser("jdoe")).toEqual({
			login: "jdoe",
			site_admin: true
		});
	});
});
