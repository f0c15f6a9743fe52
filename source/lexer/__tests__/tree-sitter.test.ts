/**
 * Tree-sitter lexer tests.
 *
 * These load the real JavaScript WASM grammar from tree-sitter-wasms.
 */

import {describe, it, expect, beforeAll, afterAll} from 'vitest';
import {TreeSitterLexer} from '../tree-sitter.js';

describe('TreeSitterLexer', () => {
	let lexer: TreeSitterLexer;

	beforeAll(async () => {
		lexer = new TreeSitterLexer('javascript');
		await lexer.initialize();
	});

	afterAll(() => {
		lexer.close();
	});

	it('throws when used before initialize()', () => {
		const uninitialized = new TreeSitterLexer();
		expect(() => uninitialized.lex('x')).toThrow('not initialized');
	});

	it('reproduces the source when tokens are joined', () => {
		const source = [
			'#!/usr/bin/env node',
			'/**',
			'author: Ada',
			'---',
			'# Tool',
			'*/',
			"const greeting = `hi ${'there'}`; // trailing",
			'module.exports = {greeting};',
			'',
		].join('\n');

		const tokens = lexer.lex(source);
		expect(tokens.map(t => t.text).join('')).toBe(source);
	});

	it('splits the documentation comment by line', () => {
		const source = '/**\nauthor: Ada\n---\n# Tool\n*/\nexports.x = 1;\n';
		const doc = lexer
			.lex(source)
			.filter(t => t.category.startsWith('doc-'))
			.map(t => [t.category, t.text]);

		expect(doc).toEqual([
			['doc-begin', '/**\n'],
			['doc-content', 'author: Ada\n'],
			['doc-content', '---\n'],
			['doc-content', '# Tool\n'],
			['doc-end', '*/\n'],
		]);
	});

	it('does not treat comment markers inside strings as comments', () => {
		const source = 'const s = "/** not a comment */";\n';
		const tokens = lexer.lex(source);
		expect(tokens.some(t => t.category.startsWith('doc-'))).toBe(false);
		expect(tokens.some(t => t.category === 'comment')).toBe(false);
	});

	it('classifies line and plain block comments as comments', () => {
		const source = '// line\n/* block */\nx();\n';
		const comments = lexer
			.lex(source)
			.filter(t => t.category === 'comment')
			.map(t => t.text);
		expect(comments).toEqual(['// line', '/* block */']);
	});

	it('reports positions in source order', () => {
		const tokens = lexer.lex('a;\n/** b */\nc;\n');
		const indexes = tokens.map(t => t.position.index);
		expect(indexes).toEqual([...indexes].sort((x, y) => x - y));
		const begin = tokens.find(t => t.category === 'doc-begin');
		expect(begin?.position).toEqual({index: 3, line: 2, column: 0});
	});
});
