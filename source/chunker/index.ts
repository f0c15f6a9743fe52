/**
 * Chunker - Splits one source file into metadata, readme and library.
 *
 * A single forward pass over the token stream. Only the first documentation
 * comment is read; everything after it is library code.
 */

import type {Lexer, Token} from '../lexer/types.js';
import type {ChunkedSource, ChunkState} from './types.js';

export type {ChunkedSource, ChunkState};

/**
 * Separates the YAML metadata from the README: `---` alone on its line.
 */
export const README_SEPARATOR = /^\s*---\s*$/;

/**
 * Chunk an ordered token stream.
 *
 * Without a documentation comment, metadata and readme are empty and the
 * whole input is the library. Without a separator line, the whole comment
 * body is metadata.
 */
export function chunkTokens(tokens: Iterable<Token>): ChunkedSource {
	let state: ChunkState = 'seeking-brief';
	let skipped = '';
	let metadata = '';
	let readme = '';
	let library = '';

	for (const token of tokens) {
		switch (state) {
			case 'seeking-brief': {
				if (token.category === 'doc-begin') {
					state = 'read-metadata';
				} else {
					skipped += token.text;
				}
				break;
			}

			case 'read-metadata': {
				if (token.category === 'doc-end') {
					state = 'read-library';
				} else if (token.category === 'doc-content') {
					if (README_SEPARATOR.test(token.text)) {
						state = 'read-readme';
					} else {
						metadata += token.text;
					}
				}
				break;
			}

			case 'read-readme': {
				if (token.category === 'doc-end') {
					state = 'read-library';
				} else if (token.category === 'doc-content') {
					readme += token.text;
				}
				break;
			}

			case 'read-library': {
				library += token.text;
				break;
			}
		}
	}

	if (state === 'seeking-brief') {
		return {metadata: '', readme: '', library: skipped};
	}

	return {metadata, readme, library};
}

/**
 * Lexes source text and chunks the resulting tokens.
 */
export class SourceChunker {
	private readonly lexer: Lexer;

	constructor(lexer: Lexer) {
		this.lexer = lexer;
	}

	chunk(sourceText: string): ChunkedSource {
		return chunkTokens(this.lexer.lex(sourceText));
	}
}
