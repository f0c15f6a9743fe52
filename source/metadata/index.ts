export {parseMetadata} from './parse.js';
export {
	resolveMetadata,
	extractMetadata,
	EXECUTABLE_KEY,
	type ResolveOptions,
} from './resolver.js';
export {
	INFERENCE_RULES,
	VERSION_PATTERN,
	HOMEPAGE_PATTERN,
	SUMMARY_PATTERN,
	substituteDescriptionWords,
} from './infer.js';
export {
	createStaticIdentity,
	loadGitIdentity,
	readGitGlobalConfig,
	NO_IDENTITY,
} from './identity.js';
export * from './types.js';
