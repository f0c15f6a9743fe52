/**
 * Build - Runs `npm pack` against a staging directory.
 */

import path from 'node:path';
import {z} from 'zod';
import {combinedOutput, type CommandRunner} from '../lib/exec.js';
import {PackageBuildError} from '../lib/errors.js';

/**
 * The part of `npm pack --json` output we rely on.
 */
const packOutputSchema = z
	.array(z.object({filename: z.string().min(1)}).passthrough())
	.nonempty();

export interface BuildOptions {
	stagingDir: string;
	/** Directory that receives the tarball (absolute) */
	outDir: string;
	runner: CommandRunner;
	npm?: string;
}

export function getPackArgs(outDir: string): string[] {
	return ['pack', '--json', '--pack-destination', outDir];
}

/**
 * Read the tarball filename from `npm pack --json` stdout.
 */
export function parsePackOutput(stdout: string): string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(stdout);
	} catch {
		throw new PackageBuildError('Unexpected npm pack output', stdout.trim());
	}

	const result = packOutputSchema.safeParse(parsed);
	if (!result.success) {
		throw new PackageBuildError('Unexpected npm pack output', stdout.trim());
	}
	return result.data[0].filename;
}

/**
 * Pack the staging directory into `outDir`.
 *
 * @returns absolute path of the tarball
 */
export async function buildPackage(options: BuildOptions): Promise<string> {
	const {stagingDir, outDir, runner, npm = 'npm'} = options;
	const result = await runner(npm, getPackArgs(outDir), {cwd: stagingDir});
	if (result.exitCode !== 0) {
		throw new PackageBuildError(
			"Couldn't build package",
			combinedOutput(result),
		);
	}

	const filename = parsePackOutput(result.stdout);
	return path.join(outDir, path.basename(filename));
}
