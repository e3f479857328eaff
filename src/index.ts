#!/usr/bin/env node
import checkbox from "@inquirer/checkbox";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";
import { loadConfig } from "./config.js";
import { type ProgressEvent, getContributorStats } from "./lib.js";
import { DEFAULT_OUTPUT_PATH, writeReport } from "./report.js";
import type { AggregatedUser, ContributorConfig } from "./types.js";

const program = new Command();

program
	.name("gcs")
	.alias("github-contributor-stats")
	.description(
		"Rank the contributors of a GitHub organization (or a single repository).\n" +
			"Merges the contributor lists of every repository into one entry per login,\n" +
			"enriched with profile data, and writes them sorted by contributions."
	)
	.version("1.0.0")
	.option("-u, --user <login>", "GitHub account used for authenticated requests")
	.option("-p, --password <password>", "Password or personal access token", "")
	.option("-o, --organization <org>", "Organization whose repositories are aggregated")
	.option(
		"-r, --repository <owner/name>",
		"Single repository to aggregate instead of an organization"
	)
	.option("-c, --config <path>", "YAML configuration file")
	.option(
		"-t, --timeout <seconds>",
		"Timeout of each HTTP request in seconds",
		parseSeconds,
		2
	)
	.option("--output <path>", "Path of the JSON report", DEFAULT_OUTPUT_PATH)
	.option(
		"--select-repos",
		"Interactively select which repositories to aggregate after listing them"
	)
	.parse(process.argv);

const opts = program.opts<{
	user?: string;
	password: string;
	organization?: string;
	repository?: string;
	config?: string;
	timeout: number;
	output: string;
	selectRepos?: boolean;
}>();

// ─── Guards ───────────────────────────────────────────────────────────────────

const user = opts.user;
if (!user) {
	console.log(chalk.yellow("A GitHub user is required (--user) — nothing to do."));
	process.exit(0);
}
if (!opts.organization && !opts.repository) {
	console.log(
		chalk.yellow(
			"Set an organization (--organization) or a repository (--repository) — nothing to do."
		)
	);
	process.exit(0);
}

let config: ContributorConfig;
try {
	config = loadConfig(opts.config);
} catch (err) {
	console.error(chalk.red(err instanceof Error ? err.message : String(err)));
	process.exit(1);
}
const target = opts.repository ?? opts.organization;

console.log(
	chalk.bold(`\ngithub-contributor-stats`) +
		chalk.gray(` — ${target}`) +
		chalk.gray(` — as ${user}`)
);
if (opts.config) console.log(chalk.gray(`Config: ${opts.config}`));
console.log();

// ─── Run ──────────────────────────────────────────────────────────────────────

let spinner: Ora | undefined;

function onProgress(event: ProgressEvent): void {
	switch (event.phase) {
		case "repositories":
			spinner ??= ora().start();
			spinner.text = `Listing repositories of ${opts.organization} — page ${event.page} / ${event.totalPages}…`;
			break;
		case "repositories-done":
			if (spinner) {
				spinner.succeed(`Found ${chalk.bold(event.count)} repositories`);
			} else {
				console.log(`${chalk.green("✓")} Found ${chalk.bold(event.count)} repositories`);
			}
			spinner = undefined;
			break;
		case "contributors":
			spinner ??= ora().start();
			spinner.text = `[${event.index}/${event.total}] ${event.repository}…`;
			break;
		case "sort":
			spinner?.succeed(
				`Aggregated ${chalk.bold(event.users)} unique contributors`
			);
			spinner = undefined;
			break;
	}
}

function failSpinner(): void {
	spinner?.fail();
	spinner = undefined;
}

async function selectRepositories(repositories: string[]): Promise<string[]> {
	if (!opts.selectRepos || opts.repository || repositories.length === 0) {
		return repositories;
	}

	console.log(
		`\n${chalk.bold("Select repositories to aggregate")} ` +
			chalk.gray("(space=toggle, a=toggle all, i=invert, enter=confirm)\n")
	);

	const selected = await checkbox({
		message: `Choose repos (${repositories.length} total)`,
		choices: repositories.map((name) => ({
			name,
			value: name,
			checked: true
		})),
		pageSize: 20,
		loop: false
	});

	if (selected.length === 0) {
		console.log(chalk.red("No repositories selected — nothing to do."));
		process.exit(0);
	}
	console.log(
		`${chalk.green("✓")} Aggregating ${chalk.bold(selected.length)} selected repos\n`
	);
	return selected;
}

let users: AggregatedUser[];
try {
	users = await getContributorStats({
		user,
		password: opts.password,
		organization: opts.organization,
		repository: opts.repository,
		config,
		timeoutMs: Math.round(opts.timeout * 1000),
		selectRepositories,
		onProgress
	});
} catch (err) {
	failSpinner();
	console.error(chalk.red(`\n${err instanceof Error ? err.message : String(err)}`));
	process.exit(1);
}

const outPath = writeReport(opts.output, users);
console.log(chalk.green(`\n✓ Report written to ${outPath}`));

// ─── Summary ─────────────────────────────────────────────────────────────────

if (users.length > 0) {
	console.log(chalk.bold("\nTop contributors:"));
	const topN = users.slice(0, 10);
	const maxContributions = Math.max(topN[0]?.contributions ?? 1, 1);
	for (const entry of topN) {
		const bar = "█".repeat(Math.round((entry.contributions / maxContributions) * 20));
		const flag = entry.excluded ? chalk.gray(" (excluded)") : "";
		console.log(
			`  ${entry.login.padEnd(24)} ${bar.padEnd(20)} ${formatNum(entry.contributions)}${flag}`
		);
	}
}

const repositoryCount = new Set(users.flatMap((u) => Object.keys(u.repositories)))
	.size;
console.log(
	chalk.gray(
		`\n${users.length} contributors across ${repositoryCount} repositories`
	)
);

// ─── Helpers ─────────────────────────────────────────────────────────────────

function parseSeconds(value: string): number {
	const seconds = Number.parseFloat(value);
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new InvalidArgumentError("Expected a positive number of seconds.");
	}
	return seconds;
}

function formatNum(n: number): string {
	return n.toLocaleString("en-US");
}
