/**
 * Staging - Writes the package parts into a temporary directory for
 * `npm pack` to work against.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {README_FILENAME, STAGING_DIR_PREFIX} from '../lib/constants.js';
import type {ModuleFormat} from '../lexer/types.js';
import type {PackageDescriptor} from '../metadata/types.js';
import {renderExecutable} from './executable.js';
import {
	getExecutablePath,
	renderManifest,
	serializeManifest,
} from './manifest.js';

export interface PackageParts {
	descriptor: PackageDescriptor;
	moduleFormat: ModuleFormat;
	/** Raw README region of the source */
	readme: string;
	/** Library region of the source */
	library: string;
}

/**
 * The README shipped with the package: the source's README region, or the
 * resolved description when the source has none.
 */
export function renderReadme(parts: PackageParts): string {
	if (parts.readme.trim()) return parts.readme;
	return parts.descriptor.description + '\n';
}

/**
 * Write package.json, README.md, the library and (when declared) the
 * executable shim into `dir`.
 */
export async function writePackageFiles(
	dir: string,
	parts: PackageParts,
): Promise<void> {
	const {descriptor, moduleFormat} = parts;
	const [libraryFile] = descriptor.files;

	await fs.writeFile(
		path.join(dir, 'package.json'),
		serializeManifest(renderManifest(descriptor, moduleFormat)),
	);
	await fs.writeFile(path.join(dir, README_FILENAME), renderReadme(parts));
	await fs.writeFile(path.join(dir, libraryFile), parts.library);

	const executable = renderExecutable(descriptor, moduleFormat);
	if (executable !== null) {
		const executablePath = path.join(
			dir,
			getExecutablePath(descriptor.name, moduleFormat),
		);
		await fs.mkdir(path.dirname(executablePath), {recursive: true});
		await fs.writeFile(executablePath, executable, {mode: 0o755});
	}
}

/**
 * Create a fresh temporary directory and write the package into it.
 * Returns the directory path; the caller removes it.
 */
export async function writeStagingDir(
	parts: PackageParts,
	tmpRoot: string = os.tmpdir(),
): Promise<string> {
	const dir = await fs.mkdtemp(path.join(tmpRoot, STAGING_DIR_PREFIX));
	try {
		await writePackageFiles(dir, parts);
	} catch (error) {
		await fs.rm(dir, {recursive: true, force: true});
		throw error;
	}
	return dir;
}
