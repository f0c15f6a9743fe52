/**
 * Manifest - Serializes a resolved descriptor as the package.json that
 * `npm pack` builds from.
 */

import {BIN_DIR} from '../lib/constants.js';
import type {ModuleFormat} from '../lexer/types.js';
import type {PackageDescriptor} from '../metadata/types.js';

export interface PackageManifest {
	name: string;
	version: string;
	description: string;
	author: {name: string; email: string};
	homepage: string;
	type: ModuleFormat;
	main: string;
	files: string[];
	bin?: Record<string, string>;
}

/**
 * Path of the executable shim inside the package.
 */
export function getExecutablePath(
	name: string,
	moduleFormat: ModuleFormat,
): string {
	const extension = moduleFormat === 'module' ? 'mjs' : 'cjs';
	// Scoped names (@scope/tool) install their bin as "tool"
	const baseName = name.split('/').pop() ?? name;
	return `${BIN_DIR}/${baseName}.${extension}`;
}

/**
 * Build package.json contents. npm has a single one-line `description`, so it
 * carries the summary; the long description ships as the README.
 */
export function renderManifest(
	descriptor: PackageDescriptor,
	moduleFormat: ModuleFormat,
): PackageManifest {
	const [libraryFile] = descriptor.files;
	const manifest: PackageManifest = {
		name: descriptor.name,
		version: descriptor.version,
		description: descriptor.summary,
		author: {name: descriptor.author, email: descriptor.email},
		homepage: descriptor.homepage,
		type: moduleFormat,
		main: libraryFile,
		files: [libraryFile],
	};

	if (descriptor.executable !== undefined) {
		const binName = descriptor.name.split('/').pop() ?? descriptor.name;
		manifest.bin = {
			[binName]: getExecutablePath(descriptor.name, moduleFormat),
		};
	}

	return manifest;
}

export function serializeManifest(manifest: PackageManifest): string {
	return JSON.stringify(manifest, null, 2) + '\n';
}
