/**
 * Config - solopack configuration loading.
 *
 * Configuration is global (per user), stored at $SOLOPACK_HOME/config.json,
 * or read from an explicit path passed with --config.
 */

import fs from 'node:fs/promises';
import {z} from 'zod';
import {getConfigPath} from './constants.js';
import {ConfigError} from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const nonEmpty = z.string().trim().min(1);

/**
 * Fallback values for descriptor fields. `name` always comes from the source
 * file name, so it cannot be configured.
 */
const defaultsSchema = z
	.object({
		author: nonEmpty,
		email: nonEmpty,
		version: nonEmpty,
		summary: nonEmpty,
		description: nonEmpty,
		homepage: nonEmpty,
	})
	.partial()
	.strict();

const commandsSchema = z
	.object({
		node: nonEmpty,
		npm: nonEmpty,
		git: nonEmpty,
	})
	.partial()
	.strict();

const configFileSchema = z
	.object({
		defaults: defaultsSchema,
		/** Run `node --check` on the source before packaging */
		syntaxCheck: z.boolean(),
		/** Leave the staging directory behind after a build */
		keepStagingDir: z.boolean(),
		/** Infer author/email from the global git config */
		useGitIdentity: z.boolean(),
		commands: commandsSchema,
	})
	.partial()
	.strict();

export type ConfigDefaults = z.infer<typeof defaultsSchema>;

export interface CommandsConfig {
	node: string;
	npm: string;
	git: string;
}

export interface SolopackConfig {
	defaults: ConfigDefaults;
	syntaxCheck: boolean;
	keepStagingDir: boolean;
	useGitIdentity: boolean;
	commands: CommandsConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_COMMANDS: CommandsConfig = {
	node: 'node',
	npm: 'npm',
	git: 'git',
};

export const DEFAULT_CONFIG: SolopackConfig = {
	defaults: {},
	syntaxCheck: true,
	keepStagingDir: false,
	useGitIdentity: true,
	commands: DEFAULT_COMMANDS,
};

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Validate parsed JSON and merge it over the defaults.
 */
export function parseConfig(value: unknown, source: string): SolopackConfig {
	const result = configFileSchema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues
			.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new ConfigError(`Invalid config at ${source}: ${issues}`);
	}

	const loaded = result.data;
	return {
		...DEFAULT_CONFIG,
		...loaded,
		defaults: {...DEFAULT_CONFIG.defaults, ...loaded.defaults},
		commands: {...DEFAULT_COMMANDS, ...loaded.commands},
	};
}

/**
 * Load config from disk, merging with defaults.
 *
 * Without an explicit path, a missing $SOLOPACK_HOME/config.json means
 * DEFAULT_CONFIG. An explicit path must exist. A file that exists but cannot be
 * parsed or validated is always an error.
 */
export async function loadConfig(configPath?: string): Promise<SolopackConfig> {
	const resolvedPath = configPath ?? getConfigPath();

	let content: string;
	try {
		content = await fs.readFile(resolvedPath, 'utf-8');
	} catch (error) {
		const code =
			error instanceof Error && 'code' in error ? error.code : undefined;
		if (!configPath && code === 'ENOENT') {
			return {...DEFAULT_CONFIG};
		}
		throw new ConfigError(
			`Cannot read config at ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigError(
			`Invalid config.json at ${resolvedPath}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
		);
	}

	return parseConfig(parsed, resolvedPath);
}
