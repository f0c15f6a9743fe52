export {
	Packager,
	PACK_STEPS,
	createTreeSitterLexer,
	type PackStep,
	type PackResult,
	type PackagerOptions,
	type LexerFactory,
} from './packager.js';
export {
	renderManifest,
	serializeManifest,
	getExecutablePath,
	type PackageManifest,
} from './manifest.js';
export {renderExecutable} from './executable.js';
export {
	writeStagingDir,
	writePackageFiles,
	renderReadme,
	type PackageParts,
} from './staging.js';
export {buildPackage, parsePackOutput, getPackArgs} from './build.js';
export {checkSourceReadable, checkSourceSyntax} from './syntax-check.js';
