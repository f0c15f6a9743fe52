/**
 * Metadata Types - Raw metadata, defaults and the resolved package descriptor.
 */

/**
 * Descriptor fields, in resolution order. The first field that cannot be
 * resolved is the one reported by MissingFieldError.
 */
export const DESCRIPTOR_FIELDS = [
	'author',
	'email',
	'name',
	'version',
	'summary',
	'description',
	'homepage',
] as const;

export type DescriptorField = (typeof DESCRIPTOR_FIELDS)[number];

/**
 * Key/value pairs parsed from the metadata region.
 * Unknown keys are kept but ignored by the resolver.
 */
export type RawMetadata = Record<string, string>;

/**
 * Caller-supplied fallbacks, consulted after explicit metadata.
 */
export type MetadataDefaults = Partial<Record<DescriptorField, string>>;

export interface PackageDescriptor extends Record<DescriptorField, string> {
	/** Files shipped in the package: always exactly the library file */
	files: readonly [string];
	/** Code run by the package's executable, when one is declared */
	executable?: string;
}

export type NoticeSource = 'git' | 'readme';

/**
 * Emitted whenever a field value was inferred rather than given.
 */
export interface InferenceNotice {
	field: DescriptorField;
	value: string;
	source: NoticeSource;
	/** Human-readable, e.g. "Using version from README: 1.0.0" */
	message: string;
}

/**
 * Global identity lookup (git config keys such as `user.name`).
 * Absence is not an error.
 */
export interface IdentityLookup {
	lookup(key: IdentityKey): string | null;
}

export type IdentityKey = 'user.name' | 'user.email';
