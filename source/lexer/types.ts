/**
 * Lexer Types - Tokens fed to the source chunker.
 */

/**
 * Token categories.
 *
 * A documentation comment (`/** ... *\/`) is split into one `doc-begin`
 * token, a `doc-content` token per body line, and one `doc-end` token.
 * Every other comment is a single `comment` token.
 */
export type TokenCategory =
	| 'doc-begin'
	| 'doc-content'
	| 'doc-end'
	| 'comment'
	| 'whitespace'
	| 'code';

export interface TokenPosition {
	/** Offset into the source text */
	index: number;
	/** 1-indexed line */
	line: number;
	/** 0-indexed column */
	column: number;
}

export interface Token {
	readonly position: TokenPosition;
	readonly category: TokenCategory;
	/** Exact source text; all token texts joined reproduce the source */
	readonly text: string;
}

export interface Lexer {
	lex(text: string): Token[];
}

/**
 * Languages the lexer can load.
 */
export type SourceLanguage = 'javascript';

export type ModuleFormat = 'commonjs' | 'module';

export interface SourceKind {
	language: SourceLanguage;
	moduleFormat: ModuleFormat;
}

/**
 * Map of source file extensions to how they are lexed and loaded.
 * `.js` files are packaged as CommonJS.
 */
export const EXTENSION_TO_SOURCE_KIND: Record<string, SourceKind> = {
	'.js': {language: 'javascript', moduleFormat: 'commonjs'},
	'.cjs': {language: 'javascript', moduleFormat: 'commonjs'},
	'.mjs': {language: 'javascript', moduleFormat: 'module'},
};
