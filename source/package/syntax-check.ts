/**
 * Source checks run before any packaging work.
 */

import fs from 'node:fs/promises';
import {combinedOutput, type CommandRunner} from '../lib/exec.js';
import {SourceCheckError} from '../lib/errors.js';

export async function checkSourceReadable(sourcePath: string): Promise<void> {
	try {
		await fs.access(sourcePath, fs.constants.R_OK);
	} catch {
		throw new SourceCheckError(`${sourcePath} is not readable`);
	}
}

/**
 * Run `node --check` on the source.
 *
 * @throws SourceCheckError with node's output when the source does not parse
 */
export async function checkSourceSyntax(
	sourcePath: string,
	runner: CommandRunner,
	node = 'node',
): Promise<void> {
	const result = await runner(node, ['--check', sourcePath]);
	if (result.exitCode !== 0) {
		throw new SourceCheckError(
			`${sourcePath} is not valid JavaScript`,
			combinedOutput(result),
		);
	}
}
