/**
 * Lexer - web-tree-sitter based tokenization.
 *
 * Uses web-tree-sitter (WASM) so comment boundaries follow the real grammar:
 * a `/**` inside a string or template literal is never mistaken for a
 * documentation comment.
 */

import path from 'node:path';
import {createRequire} from 'node:module';
import Parser from 'web-tree-sitter';
import {tokenizeSpans, type LeafSpan} from './tokens.js';
import type {Lexer, SourceLanguage, Token} from './types.js';

// Use createRequire to resolve WASM file paths from tree-sitter-wasms
const require = createRequire(import.meta.url);

/**
 * Mapping from our language names to tree-sitter-wasms filenames.
 * WASM files are in node_modules/tree-sitter-wasms/out/
 */
export const LANGUAGE_WASM_FILES: Record<SourceLanguage, string> = {
	javascript: 'tree-sitter-javascript.wasm',
};

/**
 * Resolve the directory holding the tree-sitter-wasms grammars.
 */
export function getWasmBasePath(): string {
	const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
	return path.join(path.dirname(wasmPackagePath), 'out');
}

/**
 * Collect leaf spans in source order. Comments are leaves already; nodes
 * with children (strings, templates) are descended into.
 */
function collectLeaves(node: Parser.SyntaxNode, leaves: LeafSpan[]): void {
	if (node.childCount === 0 || node.type === 'comment') {
		leaves.push({
			type: node.type,
			startIndex: node.startIndex,
			endIndex: node.endIndex,
		});
		return;
	}

	for (let i = 0; i < node.childCount; i++) {
		const child = node.child(i);
		if (child) {
			collectLeaves(child, leaves);
		}
	}
}

export class TreeSitterLexer implements Lexer {
	private parser: Parser | null = null;
	private readonly language: SourceLanguage;

	constructor(language: SourceLanguage = 'javascript') {
		this.language = language;
	}

	/**
	 * Initialize web-tree-sitter and load the grammar.
	 * Must be called before using lex().
	 */
	async initialize(): Promise<void> {
		if (this.parser) return;

		await Parser.init();
		const parser = new Parser();

		try {
			const wasmPath = path.join(
				getWasmBasePath(),
				LANGUAGE_WASM_FILES[this.language],
			);
			const language = await Parser.Language.load(wasmPath);
			parser.setLanguage(language);
		} catch (error) {
			// Free WASM memory before surfacing the failure
			parser.delete();
			throw error;
		}

		this.parser = parser;
	}

	lex(text: string): Token[] {
		if (!this.parser) {
			throw new Error(
				'TreeSitterLexer not initialized. Call initialize() before lex().',
			);
		}

		const tree = this.parser.parse(text);
		if (!tree) {
			throw new Error(`Failed to parse ${this.language} source`);
		}

		try {
			const leaves: LeafSpan[] = [];
			collectLeaves(tree.rootNode, leaves);
			return tokenizeSpans(text, leaves);
		} finally {
			tree.delete();
		}
	}

	/**
	 * Close the parser and free resources.
	 */
	close(): void {
		if (this.parser) {
			this.parser.delete();
			this.parser = null;
		}
	}
}
