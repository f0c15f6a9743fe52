/**
 * Chunker Types - Regions of a single annotated source file.
 */

/**
 * Chunker state. Transitions only move forward:
 * seeking-brief -> read-metadata -> (read-readme ->) read-library
 */
export type ChunkState =
	| 'seeking-brief'
	| 'read-metadata'
	| 'read-readme'
	| 'read-library';

/**
 * The three regions of a source file.
 */
export interface ChunkedSource {
	/** Documentation comment body before the `---` separator (YAML) */
	metadata: string;
	/** Documentation comment body after the separator (Markdown) */
	readme: string;
	/** Everything after the documentation comment, verbatim */
	library: string;
}
