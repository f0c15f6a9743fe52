/**
 * Error classes raised while turning a source file into a package.
 *
 * All of them are fatal for the current packaging attempt; callers surface
 * the message as-is.
 */

import type {DescriptorField} from '../metadata/types.js';

/**
 * The metadata block is not a valid YAML mapping of strings.
 */
export class InvalidMetadataSyntaxError extends Error {
	/** The metadata text exactly as it appeared in the source */
	readonly rawText: string;

	constructor(reason: string, rawText: string) {
		super(
			`Bad metadata block (${reason}) - are you sure it's valid YAML?\n${rawText}`,
		);
		this.name = 'InvalidMetadataSyntaxError';
		this.rawText = rawText;
	}
}

/**
 * A required descriptor field has no explicit value, default, or inferred value.
 */
export class MissingFieldError extends Error {
	readonly field: DescriptorField;

	constructor(field: DescriptorField) {
		super(`No value for required field: ${field}`);
		this.name = 'MissingFieldError';
		this.field = field;
	}
}

export class UnsupportedSourceError extends Error {
	constructor(sourcePath: string, extension: string) {
		super(
			`${sourcePath} has unsupported extension "${extension || '(none)'}"; expected .js, .cjs or .mjs`,
		);
		this.name = 'UnsupportedSourceError';
	}
}

/**
 * The source is unreadable or fails `node --check`.
 */
export class SourceCheckError extends Error {
	readonly output: string;

	constructor(message: string, output = '') {
		super(output ? `${message}:\n${output}` : message);
		this.name = 'SourceCheckError';
		this.output = output;
	}
}

/**
 * `npm pack` failed or reported something we could not read.
 */
export class PackageBuildError extends Error {
	readonly output: string;

	constructor(message: string, output: string) {
		super(`${message}: ${output}`);
		this.name = 'PackageBuildError';
		this.output = output;
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}
