import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { ContributorConfig } from "./types.js";

export class ConfigError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigError";
	}
}

// An empty key (`exclusions:`) parses as null and falls back to the default.
// Entries such as an all-digit login parse as numbers and are read as text.
const list = z
	.array(z.union([z.string(), z.number()]).transform(String))
	.nullish()
	.transform((value) => value ?? []);
const flag = z
	.boolean()
	.nullish()
	.transform((value) => value ?? false);

const configSchema = z
	.object({
		exclusions: list,
		keepExcludedUsers: flag,
		extractEmailDomain: flag,
		fieldsWhitelist: list,
		excludeRepositories: list
	})
	.passthrough();

const documentSchema = z
	.object({
		config: configSchema.nullish()
	})
	.passthrough()
	.nullish();

export function defaultConfig(): ContributorConfig {
	return {
		exclusions: [],
		keepExcludedUsers: false,
		extractEmailDomain: false,
		fieldsWhitelist: [],
		excludeRepositories: []
	};
}

/** Fill the options left out (or left undefined) with their defaults. */
export function resolveConfig(
	overrides: Partial<ContributorConfig> = {}
): ContributorConfig {
	const defaults = defaultConfig();
	return {
		exclusions: overrides.exclusions ?? defaults.exclusions,
		keepExcludedUsers: overrides.keepExcludedUsers ?? defaults.keepExcludedUsers,
		extractEmailDomain:
			overrides.extractEmailDomain ?? defaults.extractEmailDomain,
		fieldsWhitelist: overrides.fieldsWhitelist ?? defaults.fieldsWhitelist,
		excludeRepositories:
			overrides.excludeRepositories ?? defaults.excludeRepositories
	};
}

/** Parse the text of a configuration document. */
export function parseConfig(text: string, source = "config"): ContributorConfig {
	let raw: unknown;
	try {
		raw = YAML.parse(text);
	} catch (err) {
		throw new ConfigError(`Invalid YAML in ${source}: ${String(err)}`, {
			cause: err
		});
	}

	const result = documentSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new ConfigError(
			`Invalid ${source}: ${issue.path.join(".") || "document"}: ${issue.message}`
		);
	}

	const section = result.data?.config;
	if (!section) return defaultConfig();
	return {
		exclusions: section.exclusions,
		keepExcludedUsers: section.keepExcludedUsers,
		extractEmailDomain: section.extractEmailDomain,
		fieldsWhitelist: section.fieldsWhitelist,
		excludeRepositories: section.excludeRepositories
	};
}

/**
 * Load the configuration document at `path`. Without a path every option
 * keeps its default; a path that cannot be read is fatal.
 */
export function loadConfig(path?: string): ContributorConfig {
	if (!path) return defaultConfig();
	const fullPath = resolve(path);
	let text: string;
	try {
		text = readFileSync(fullPath, "utf-8");
	} catch (err) {
		throw new ConfigError(`Cannot read config file ${fullPath}`, {
			cause: err
		});
	}
	return parseConfig(text, fullPath);
}
