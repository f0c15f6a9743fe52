/**
 * Parse the metadata region of a chunked source as YAML.
 */

import {parse as parseYaml} from 'yaml';
import {z} from 'zod';
import {InvalidMetadataSyntaxError} from '../lib/errors.js';
import type {RawMetadata} from './types.js';

const rawMetadataSchema = z.record(z.string(), z.string());

/**
 * Parse metadata text into a string map.
 *
 * The failsafe schema keeps every scalar a string, so `version: 1.10` stays
 * "1.10" rather than becoming the number 1.1.
 *
 * A document that is not a mapping (prose, a list) carries no fields and
 * gives an empty map.
 *
 * @throws InvalidMetadataSyntaxError on malformed YAML or a non-string value
 */
export function parseMetadata(text: string): RawMetadata {
	if (text.trim() === '') return {};

	let document: unknown;
	try {
		document = parseYaml(text, {schema: 'failsafe'});
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidMetadataSyntaxError(firstLine(reason), text);
	}

	if (!isMapping(document)) return {};

	const result = rawMetadataSchema.safeParse(document);
	if (!result.success) {
		const key = result.error.issues[0]?.path.join('.') ?? '';
		throw new InvalidMetadataSyntaxError(
			`value of "${key}" is not a string`,
			text,
		);
	}

	return result.data;
}

function isMapping(document: unknown): boolean {
	return (
		typeof document === 'object' && document !== null && !Array.isArray(document)
	);
}

function firstLine(message: string): string {
	return message.split('\n', 1)[0] ?? message;
}
