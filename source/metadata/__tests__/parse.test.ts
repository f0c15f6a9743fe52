/**
 * Metadata parsing tests.
 */

import {describe, it, expect} from 'vitest';
import {parseMetadata} from '../parse.js';
import {InvalidMetadataSyntaxError} from '../../lib/errors.js';

function parseError(text: string): InvalidMetadataSyntaxError {
	try {
		parseMetadata(text);
	} catch (error) {
		if (error instanceof InvalidMetadataSyntaxError) return error;
		throw error;
	}
	throw new Error('expected parseMetadata to throw');
}

describe('parseMetadata', () => {
	it('returns an empty mapping for blank text', () => {
		expect(parseMetadata('')).toEqual({});
		expect(parseMetadata('  \n\n')).toEqual({});
	});

	it('returns an empty mapping for a comment-only document', () => {
		expect(parseMetadata('# nothing here\n')).toEqual({});
	});

	it('keeps every scalar as a string', () => {
		expect(
			parseMetadata('author: Ada\nversion: 1.10\nprivate: true\n'),
		).toEqual({author: 'Ada', version: '1.10', private: 'true'});
	});

	it('keeps unknown keys', () => {
		expect(parseMetadata('executable: run()\nextra: x\n')).toEqual({
			executable: 'run()',
			extra: 'x',
		});
	});

	it('fails on malformed YAML with the raw text', () => {
		const error = parseError('author: [unclosed');
		expect(error.name).toBe('InvalidMetadataSyntaxError');
		expect(error.rawText).toBe('author: [unclosed');
		expect(error.message).toContain('author: [unclosed');
	});

	it('gives an empty map for prose', () => {
		expect(parseMetadata('Adds two numbers.\n')).toEqual({});
	});

	it('gives an empty map for a list', () => {
		expect(parseMetadata('- one\n- two\n')).toEqual({});
	});

	it('fails when a value is not a string', () => {
		const error = parseError('author:\n  name: Ada\n');
		expect(error.message).toContain('value of "author" is not a string');
	});
});
