/** A repository record as returned by the organization-repositories endpoint. */
export interface RepositoryRecord {
	full_name: string;
	archived?: boolean;
	private?: boolean;
	fork?: boolean;
}

/** A contributor record for one repository. */
export interface ContributorRecord {
	login: string;
	contributions: number;
	[field: string]: unknown;
}

/** Profile fields as returned by the user-lookup endpoint. Shape varies per account. */
export type UserProfile = Record<string, unknown>;

export interface AggregatedUser {
	login: string;
	/** Sum of contributions across every repository the login appeared in */
	contributions: number;
	/** Map of "owner/repo" → contributions in that repository */
	repositories: Record<string, number>;
	/** Part of the profile email after "@" (only when extractEmailDomain is on) */
	email_domain?: string;
	/** Whether the login is listed in exclusions (only when keepExcludedUsers is on) */
	excluded?: boolean;
	/** Pass-through profile fields, already restricted to the whitelist */
	profile: UserProfile;
}

/** Serialized form of an AggregatedUser in the report. */
export type ReportEntry = UserProfile & {
	email_domain?: string;
	excluded?: boolean;
	contributions: number;
	repositories: Record<string, number>;
};

export interface ContributorConfig {
	/** Logins to drop (or flag, with keepExcludedUsers) */
	exclusions: string[];
	keepExcludedUsers: boolean;
	extractEmailDomain: boolean;
	/** Profile fields to keep. Empty keeps everything. */
	fieldsWhitelist: string[];
	/** Repository full names skipped when listing an organization */
	excludeRepositories: string[];
}

export interface Endpoints {
	organizationRepositories: string;
	repositoryContributors: string;
	user: string;
}
