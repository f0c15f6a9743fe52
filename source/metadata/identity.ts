/**
 * Identity - author/email lookup from the global git config.
 */

import type {CommandRunner} from '../lib/exec.js';
import type {Logger} from '../lib/logger.js';
import type {IdentityKey, IdentityLookup} from './types.js';

const IDENTITY_KEYS: readonly IdentityKey[] = ['user.name', 'user.email'];

/**
 * Identity backed by fixed values.
 */
export function createStaticIdentity(
	values: Partial<Record<IdentityKey, string>>,
): IdentityLookup {
	return {
		lookup(key) {
			const value = values[key]?.trim();
			return value ? value : null;
		},
	};
}

/**
 * Identity that knows nothing.
 */
export const NO_IDENTITY: IdentityLookup = createStaticIdentity({});

/**
 * Read one key with `git config --global <key>`.
 * Returns null when git is missing, the key is unset, or the value is blank.
 */
export async function readGitGlobalConfig(
	runner: CommandRunner,
	key: IdentityKey,
	git = 'git',
	logger?: Logger,
): Promise<string | null> {
	try {
		const result = await runner(git, ['config', '--global', key]);
		if (result.exitCode !== 0) return null;
		const value = result.stdout.trim();
		return value ? value : null;
	} catch (error) {
		// git not installed
		logger?.debug('Identity', `git config ${key} unavailable`, {
			error: error instanceof Error ? error.message : String(error),
		});
		return null;
	}
}

/**
 * Read user.name and user.email from git once, so lookups stay synchronous.
 */
export async function loadGitIdentity(
	runner: CommandRunner,
	git = 'git',
	logger?: Logger,
): Promise<IdentityLookup> {
	const values: Partial<Record<IdentityKey, string>> = {};
	for (const key of IDENTITY_KEYS) {
		const value = await readGitGlobalConfig(runner, key, git, logger);
		if (value) values[key] = value;
	}
	return createStaticIdentity(values);
}
