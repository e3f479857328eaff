import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { AggregatedUser, ReportEntry } from "./types.js";

export const DEFAULT_OUTPUT_PATH = "contributors.json";

/**
 * Order users by contributions, highest first. The sort is stable, so users
 * with equal counts stay in the order they were discovered.
 */
export function sortUsers(
	users: Map<string, AggregatedUser> | AggregatedUser[]
): AggregatedUser[] {
	return [...users.values()].sort((a, b) => b.contributions - a.contributions);
}

export function toReportEntry(user: AggregatedUser): ReportEntry {
	// Profile fields first, derived fields next, counts last
	const { contributions: _c, repositories: _r, ...profile } = user.profile;
	return {
		...profile,
		...(user.email_domain !== undefined
			? { email_domain: user.email_domain }
			: {}),
		...(user.excluded !== undefined ? { excluded: user.excluded } : {}),
		contributions: user.contributions,
		repositories: user.repositories
	};
}

export function toReport(users: AggregatedUser[]): string {
	return JSON.stringify(users.map(toReportEntry), null, 2);
}

/** Write the report, replacing any existing file. Returns the absolute path. */
export function writeReport(path: string, users: AggregatedUser[]): string {
	const outPath = resolve(path);
	const outDir = dirname(outPath);
	if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true });
	writeFileSync(outPath, `${toReport(users)}\n`, "utf-8");
	return outPath;
}
