import { type GitHubClient, isObject } from "./github-client.js";
import type {
	AggregatedUser,
	ContributorConfig,
	ContributorRecord,
	UserProfile
} from "./types.js";

// Merge the contributor lists of every repository into one entry per login.
// The returned Map keeps the order in which logins were first seen.
export async function aggregate(
	client: GitHubClient,
	repositories: string[],
	config: ContributorConfig,
	onRepository?: (repository: string, index: number, total: number) => void
): Promise<Map<string, AggregatedUser>> {
	const users = new Map<string, AggregatedUser>();
	const exclusions = new Set(config.exclusions);

	let index = 0;
	for (const repository of repositories) {
		const records = await client.fetchAllPages(
			client.endpoints.repositoryContributors,
			{ repository }
		);

		for (const record of records.filter(isContributorRecord)) {
			const isExcluded = exclusions.has(record.login);
			if (isExcluded && !config.keepExcludedUsers) continue;

			let user = users.get(record.login);
			if (!user) {
				// Profile lookups happen once per login, on first sighting
				const profile =
					(await client.getUser(record.login)) ?? profileFromRecord(record);
				user = createUser(record.login, profile, isExcluded, config);
				users.set(record.login, user);
			}

			user.contributions += record.contributions;
			user.repositories[repository] = record.contributions;
		}

		index++;
		onRepository?.(repository, index, repositories.length);
	}

	return users;
}

export function createUser(
	login: string,
	profile: UserProfile,
	isExcluded: boolean,
	config: ContributorConfig
): AggregatedUser {
	const user: AggregatedUser = {
		login,
		contributions: 0,
		repositories: {},
		profile: filterFields(profile, config.fieldsWhitelist)
	};
	if (config.extractEmailDomain) user.email_domain = emailDomain(profile.email);
	if (config.keepExcludedUsers) user.excluded = isExcluded;
	return user;
}

export function filterFields(
	profile: UserProfile,
	whitelist: string[]
): UserProfile {
	if (whitelist.length === 0) return { ...profile };
	return Object.fromEntries(
		Object.entries(profile).filter(([field]) => whitelist.includes(field))
	);
}

/** Text after the "@" of an email, or "" when there is none */
export function emailDomain(email: unknown): string {
	if (typeof email !== "string") return "";
	const at = email.indexOf("@");
	return at === -1 ? "" : email.slice(at + 1);
}

function profileFromRecord(record: ContributorRecord): UserProfile {
	const { contributions: _contributions, ...profile } = record;
	return profile;
}

function isContributorRecord(value: unknown): value is ContributorRecord {
	return (
		isObject(value) &&
		typeof value.login === "string" &&
		typeof value.contributions === "number"
	);
}
