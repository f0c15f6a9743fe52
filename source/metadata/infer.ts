/**
 * Inference rules for descriptor fields that were neither given explicitly
 * nor defaulted.
 *
 * These are heuristics keyed on the first match in the README. A
 * version-shaped string that is not the package version (say, "requires
 * Node v20.0.0" above the real version line) wins if it comes first.
 */

import type {
	DescriptorField,
	IdentityKey,
	IdentityLookup,
	NoticeSource,
} from './types.js';

/** `Version 1.2.3`, `version: 1.2.3`, `v1.2.3` */
export const VERSION_PATTERN = /(Version:?|v)\s*(\d+\.\d+\.\d+)/i;

/** `Home: https://...`, `Homepage https://...`, `[Homepage](https://...)` */
export const HOMEPAGE_PATTERN =
	/^\s*\[?Home(page)?:?\s*(\]\()?(https?:\/\/[^)\n]+)\)?\s*/im;

/** A line with at least one letter or digit */
export const SUMMARY_PATTERN = /^.*[\p{L}\p{N}].*$/mu;

/**
 * Some build tools reject descriptions mentioning FIXME or TODO.
 * The words are swapped for look-alikes so the text still reads the same.
 */
const DESCRIPTION_SUBSTITUTIONS: ReadonlyArray<[RegExp, string]> = [
	[/FIXME/gi, 'FIZZIX-ME'],
	[/TODO/gi, 'TOODLES'],
];

export interface Inference {
	value: string;
	source: NoticeSource;
	message: string;
}

export interface InferenceContext {
	readme: string;
	identity?: IdentityLookup;
}

export type InferenceRule = (context: InferenceContext) => Inference | null;

function captureAt(text: string, pattern: RegExp, group: number): string | null {
	const value = pattern.exec(text)?.[group]?.trim();
	return value ? value : null;
}

function fromIdentity(key: IdentityKey, label: string): InferenceRule {
	return ({identity}) => {
		const value = identity?.lookup(key)?.trim();
		if (!value) return null;
		return {
			value,
			source: 'git',
			message: `Using ${label} from git as: ${value}`,
		};
	};
}

function fromReadme(
	label: string,
	pattern: RegExp,
	group: number,
): InferenceRule {
	return ({readme}) => {
		const value = captureAt(readme, pattern, group);
		if (!value) return null;
		return {
			value,
			source: 'readme',
			message: `Using ${label} from README: ${value}`,
		};
	};
}

export function substituteDescriptionWords(text: string): string {
	return DESCRIPTION_SUBSTITUTIONS.reduce(
		(result, [pattern, replacement]) => result.replace(pattern, replacement),
		text,
	);
}

const inferDescription: InferenceRule = ({readme}) => {
	const value = substituteDescriptionWords(readme);
	if (!value.trim()) return null;
	return {value, source: 'readme', message: 'Using README as description'};
};

/**
 * Rules per field. `name` is always supplied by the caller.
 */
export const INFERENCE_RULES: Partial<Record<DescriptorField, InferenceRule>> =
	{
		author: fromIdentity('user.name', 'author'),
		email: fromIdentity('user.email', 'email'),
		version: fromReadme('version', VERSION_PATTERN, 2),
		homepage: fromReadme('homepage', HOMEPAGE_PATTERN, 3),
		summary: fromReadme('summary', SUMMARY_PATTERN, 0),
		description: inferDescription,
	};
