/**
 * Metadata resolution tests: precedence, inference notices and failures.
 */

import {describe, it, expect} from 'vitest';
import {extractMetadata, resolveMetadata} from '../resolver.js';
import {createStaticIdentity} from '../identity.js';
import {InvalidMetadataSyntaxError, MissingFieldError} from '../../lib/errors.js';
import type {InferenceNotice, RawMetadata} from '../types.js';

const COMPLETE: RawMetadata = {
	author: 'Ada',
	email: 'ada@example.com',
	version: '1.0.0',
	summary: 'A tool',
	description: 'Does things',
	homepage: 'https://example.com',
};

function missingField(run: () => unknown): string {
	try {
		run();
	} catch (error) {
		if (error instanceof MissingFieldError) return error.field;
		throw error;
	}
	throw new Error('expected MissingFieldError');
}

describe('resolveMetadata', () => {
	it('uses explicit values over defaults', () => {
		const descriptor = resolveMetadata(
			COMPLETE,
			{name: 'tool', author: 'Default Author', version: '9.9.9'},
			'',
		);
		expect(descriptor.author).toBe('Ada');
		expect(descriptor.version).toBe('1.0.0');
		expect(descriptor.name).toBe('tool');
	});

	it('uses defaults over inference', () => {
		const notices: InferenceNotice[] = [];
		const {version, ...rest} = COMPLETE;
		const descriptor = resolveMetadata(
			rest,
			{name: 'tool', version: '2.0.0'},
			'Version 3.0.0\n',
			{onNotice: notice => notices.push(notice)},
		);
		expect(version).toBe('1.0.0');
		expect(descriptor.version).toBe('2.0.0');
		expect(notices).toEqual([]);
	});

	it('infers from the readme and emits notices in field order', () => {
		const notices: InferenceNotice[] = [];
		const descriptor = resolveMetadata(
			{author: 'Ada', email: 'ada@example.com'},
			{name: 'foo'},
			'v2.3.4 stable\nHomepage: https://x.io/\n',
			{onNotice: notice => notices.push(notice)},
		);

		expect(descriptor).toEqual({
			author: 'Ada',
			email: 'ada@example.com',
			name: 'foo',
			version: '2.3.4',
			summary: 'v2.3.4 stable',
			description: 'v2.3.4 stable\nHomepage: https://x.io/',
			homepage: 'https://x.io/',
			files: ['foo.js'],
		});
		expect(notices.map(n => n.message)).toEqual([
			'Using version from README: 2.3.4',
			'Using summary from README: v2.3.4 stable',
			'Using README as description',
			'Using homepage from README: https://x.io/',
		]);
		expect(notices.map(n => n.field)).toEqual([
			'version',
			'summary',
			'description',
			'homepage',
		]);
	});

	it('infers author and email from the identity lookup', () => {
		const notices: InferenceNotice[] = [];
		const {author, email, ...rest} = COMPLETE;
		const descriptor = resolveMetadata(rest, {name: 'tool'}, '', {
			identity: createStaticIdentity({
				'user.name': 'Grace',
				'user.email': 'grace@example.com',
			}),
			onNotice: notice => notices.push(notice),
		});

		expect([author, email]).toEqual(['Ada', 'ada@example.com']);
		expect(descriptor.author).toBe('Grace');
		expect(descriptor.email).toBe('grace@example.com');
		expect(notices).toEqual([
			{
				field: 'author',
				value: 'Grace',
				source: 'git',
				message: 'Using author from git as: Grace',
			},
			{
				field: 'email',
				value: 'grace@example.com',
				source: 'git',
				message: 'Using email from git as: grace@example.com',
			},
		]);
	});

	it('fails on author first when nothing can be resolved', () => {
		expect(missingField(() => resolveMetadata({}, {name: 'foo'}, ''))).toBe(
			'author',
		);
	});

	it('names only the first missing field', () => {
		const {version, homepage, ...rest} = COMPLETE;
		expect([version, homepage]).toEqual(['1.0.0', 'https://example.com']);
		expect(
			missingField(() =>
				resolveMetadata(rest, {name: 'foo'}, 'no numbers in here\n'),
			),
		).toBe('version');
	});

	it('fails on name when the caller supplies none', () => {
		expect(missingField(() => resolveMetadata(COMPLETE, {}, ''))).toBe('name');
	});

	it('treats blank explicit values as absent', () => {
		const descriptor = resolveMetadata(
			{...COMPLETE, author: '  '},
			{name: 'tool', author: 'Fallback'},
			'',
		);
		expect(descriptor.author).toBe('Fallback');
	});

	it('trims the description', () => {
		const descriptor = resolveMetadata(
			{...COMPLETE, description: '\n  Does things  \n'},
			{name: 'tool'},
			'',
		);
		expect(descriptor.description).toBe('Does things');
	});

	it('keeps an explicit executable and never defaults one', () => {
		const withExecutable = resolveMetadata(
			{...COMPLETE, executable: 'lib.main(process.argv)'},
			{name: 'tool'},
			'',
		);
		expect(withExecutable.executable).toBe('lib.main(process.argv)');

		const without = resolveMetadata(COMPLETE, {name: 'tool'}, '');
		expect('executable' in without).toBe(false);
	});

	it('lists the library file under the given extension', () => {
		const descriptor = resolveMetadata(COMPLETE, {name: 'tool'}, '', {
			libraryExtension: '.mjs',
		});
		expect(descriptor.files).toEqual(['tool.mjs']);
	});
});

describe('extractMetadata', () => {
	it('parses the metadata region and resolves against the readme', () => {
		const descriptor = extractMetadata(
			{
				metadata: 'author: Ada\nemail: ada@example.com\nsummary: Tiny\n',
				readme: '# Tiny\n\nVersion 0.2.0\n\nHome: https://example.com/tiny\n',
			},
			{name: 'tiny'},
		);

		expect(descriptor).toEqual({
			author: 'Ada',
			email: 'ada@example.com',
			name: 'tiny',
			version: '0.2.0',
			summary: 'Tiny',
			description:
				'# Tiny\n\nVersion 0.2.0\n\nHome: https://example.com/tiny',
			homepage: 'https://example.com/tiny',
			files: ['tiny.js'],
		});
	});

	it('fails with InvalidMetadataSyntaxError on malformed metadata', () => {
		const run = () =>
			extractMetadata(
				{metadata: 'author: [unclosed', readme: ''},
				{name: 'foo'},
			);
		expect(run).toThrow(InvalidMetadataSyntaxError);
		expect(run).toThrow('author: [unclosed');
	});
});
