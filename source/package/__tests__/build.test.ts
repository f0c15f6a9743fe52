/**
 * npm pack invocation tests, with an in-process command runner.
 */

import {describe, it, expect, vi} from 'vitest';
import {buildPackage, parsePackOutput} from '../build.js';
import {PackageBuildError} from '../../lib/errors.js';
import type {CommandRunner} from '../../lib/exec.js';

describe('parsePackOutput', () => {
	it('reads the tarball filename', () => {
		const stdout = JSON.stringify([
			{id: 'tiny@1.0.0', name: 'tiny', filename: 'tiny-1.0.0.tgz', files: []},
		]);
		expect(parsePackOutput(stdout)).toBe('tiny-1.0.0.tgz');
	});

	it('rejects output that is not JSON', () => {
		expect(() => parsePackOutput('npm notice oops')).toThrow(PackageBuildError);
	});

	it('rejects an empty result list', () => {
		expect(() => parsePackOutput('[]')).toThrow('Unexpected npm pack output');
	});
});

describe('buildPackage', () => {
	it('runs npm pack in the staging directory', async () => {
		const runner = vi.fn<CommandRunner>(async () => ({
			exitCode: 0,
			stdout: '[{"filename": "tiny-1.0.0.tgz"}]',
			stderr: 'npm notice Tarball Contents',
		}));

		const tarball = await buildPackage({
			stagingDir: '/tmp/stage',
			outDir: '/work/out',
			runner,
			npm: 'npm',
		});

		expect(tarball).toBe('/work/out/tiny-1.0.0.tgz');
		expect(runner).toHaveBeenCalledWith(
			'npm',
			['pack', '--json', '--pack-destination', '/work/out'],
			{cwd: '/tmp/stage'},
		);
	});

	it('fails with the tool output when npm exits non-zero', async () => {
		const runner: CommandRunner = async () => ({
			exitCode: 1,
			stdout: '',
			stderr: 'npm error Invalid name: "Bad Name"',
		});

		await expect(
			buildPackage({stagingDir: '/tmp/stage', outDir: '/out', runner}),
		).rejects.toThrow(
			"Couldn't build package: npm error Invalid name: \"Bad Name\"",
		);
	});
});
