/**
 * Command execution for the external tools solopack drives
 * (node, npm, git).
 */

import {spawn} from 'node:child_process';

export interface CommandResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export interface CommandOptions {
	cwd?: string;
}

/**
 * Runs an external command to completion.
 *
 * Resolves with the exit code and captured output whatever the exit code is;
 * rejects only when the process cannot be started (e.g. ENOENT).
 */
export type CommandRunner = (
	command: string,
	args: readonly string[],
	options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) =>
	new Promise((resolve, reject) => {
		const child = spawn(command, [...args], {
			cwd: options.cwd,
			stdio: ['ignore', 'pipe', 'pipe'],
			windowsHide: true,
		});

		let stdout = '';
		let stderr = '';
		child.stdout.setEncoding('utf-8');
		child.stderr.setEncoding('utf-8');
		child.stdout.on('data', (chunk: string) => {
			stdout += chunk;
		});
		child.stderr.on('data', (chunk: string) => {
			stderr += chunk;
		});

		child.once('error', reject);
		child.once('close', code => {
			resolve({exitCode: code ?? 1, stdout, stderr});
		});
	});

/**
 * Combined output, the way a terminal would have shown it.
 */
export function combinedOutput(result: CommandResult): string {
	return [result.stdout, result.stderr]
		.map(part => part.trim())
		.filter(Boolean)
		.join('\n');
}
