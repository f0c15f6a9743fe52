/**
 * Resolver - Builds a complete PackageDescriptor.
 *
 * Per field, in DESCRIPTOR_FIELDS order:
 * 1. explicit value from the metadata block
 * 2. caller default
 * 3. field-specific inference (see infer.ts)
 * 4. MissingFieldError
 *
 * Blank strings count as absent at every step. The resolver is a pure
 * function of its inputs; the only side channel is the notice callback.
 */

import {MissingFieldError} from '../lib/errors.js';
import type {ChunkedSource} from '../chunker/types.js';
import {INFERENCE_RULES} from './infer.js';
import {parseMetadata} from './parse.js';
import type {
	DescriptorField,
	IdentityLookup,
	InferenceNotice,
	MetadataDefaults,
	PackageDescriptor,
	RawMetadata,
} from './types.js';

export const EXECUTABLE_KEY = 'executable';

export interface ResolveOptions {
	identity?: IdentityLookup;
	onNotice?: (notice: InferenceNotice) => void;
	/** Extension of the library file listed in `files` (default: .js) */
	libraryExtension?: string;
}

function present(value: string | undefined): value is string {
	return value !== undefined && value.trim() !== '';
}

function resolveField(
	field: DescriptorField,
	raw: RawMetadata,
	defaults: MetadataDefaults,
	readme: string,
	options: ResolveOptions,
): string {
	const explicit = raw[field];
	if (present(explicit)) return explicit;

	const fallback = defaults[field];
	if (present(fallback)) return fallback;

	const inferred = INFERENCE_RULES[field]?.({
		readme,
		identity: options.identity,
	});
	if (inferred) {
		options.onNotice?.({field, ...inferred});
		return inferred.value;
	}

	throw new MissingFieldError(field);
}

/**
 * Resolve a descriptor from already-parsed metadata.
 *
 * @throws MissingFieldError for the first field with no value
 */
export function resolveMetadata(
	raw: RawMetadata,
	defaults: MetadataDefaults,
	readme: string,
	options: ResolveOptions = {},
): PackageDescriptor {
	const resolve = (field: DescriptorField): string =>
		resolveField(field, raw, defaults, readme, options);

	// Fields resolve in declaration order, so the first missing one is reported
	const values: Record<DescriptorField, string> = {
		author: resolve('author'),
		email: resolve('email'),
		name: resolve('name'),
		version: resolve('version'),
		summary: resolve('summary'),
		description: resolve('description'),
		homepage: resolve('homepage'),
	};

	const descriptor: PackageDescriptor = {
		...values,
		description: values.description.trim(),
		files: [`${values.name}${options.libraryExtension ?? '.js'}`],
	};

	const executable = raw[EXECUTABLE_KEY];
	if (present(executable)) {
		descriptor.executable = executable;
	}

	return descriptor;
}

/**
 * Parse the metadata region of a chunked source and resolve a descriptor.
 *
 * @throws InvalidMetadataSyntaxError when the metadata block is malformed
 * @throws MissingFieldError for the first field with no value
 */
export function extractMetadata(
	chunked: Pick<ChunkedSource, 'metadata' | 'readme'>,
	defaults: MetadataDefaults,
	options: ResolveOptions = {},
): PackageDescriptor {
	const raw = parseMetadata(chunked.metadata);
	return resolveMetadata(raw, defaults, chunked.readme, options);
}
