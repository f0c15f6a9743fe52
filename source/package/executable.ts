/**
 * Executable shim: loads the library as `lib`, then runs the snippet given
 * under the `executable` metadata key.
 */

import type {ModuleFormat} from '../lexer/types.js';
import type {PackageDescriptor} from '../metadata/types.js';

/**
 * Render the shim, or null when the descriptor declares no executable.
 * The shim lives one directory below the library (bin/).
 */
export function renderExecutable(
	descriptor: PackageDescriptor,
	moduleFormat: ModuleFormat,
): string | null {
	if (descriptor.executable === undefined) return null;

	const [libraryFile] = descriptor.files;
	const specifier = JSON.stringify(`../${libraryFile}`);
	const load =
		moduleFormat === 'module'
			? `import * as lib from ${specifier};`
			: `'use strict';\nconst lib = require(${specifier});`;

	return `#!/usr/bin/env node\n${load}\n${descriptor.executable}\n`;
}
