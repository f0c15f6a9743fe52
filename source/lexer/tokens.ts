/**
 * Token construction from syntax-tree leaf spans.
 *
 * Kept apart from the tree-sitter front end so it can be driven with plain
 * spans. Text between spans becomes `whitespace` or `code` tokens, which keeps
 * the token stream a lossless cover of the source.
 */

import type {Token, TokenCategory, TokenPosition} from './types.js';

/**
 * A leaf of the syntax tree, as offsets into the source text.
 */
export interface LeafSpan {
	type: string;
	startIndex: number;
	endIndex: number;
}

const DOC_COMMENT_OPEN = '/**';
const COMMENT_CLOSE = '*/';

/** Blanks up to and including the line break (or end of input) after `*\/` */
const TRAILING_LINE_BREAK = /[ \t]*(?:\r?\n|$)/y;

/**
 * `/** ... *\/` but not the empty block comment `/**\/`.
 */
export function isDocComment(text: string): boolean {
	return (
		text.startsWith(DOC_COMMENT_OPEN) &&
		text.endsWith(COMMENT_CLOSE) &&
		text.length > 4
	);
}

/**
 * Map source offsets to 1-indexed lines and 0-indexed columns.
 */
export function createLocator(source: string): (index: number) => TokenPosition {
	const lineStarts = [0];
	for (let i = 0; i < source.length; i++) {
		if (source[i] === '\n') lineStarts.push(i + 1);
	}

	return index => {
		let low = 0;
		let high = lineStarts.length - 1;
		while (low < high) {
			const mid = (low + high + 1) >> 1;
			if ((lineStarts[mid] ?? 0) <= index) {
				low = mid;
			} else {
				high = mid - 1;
			}
		}
		return {index, line: low + 1, column: index - (lineStarts[low] ?? 0)};
	};
}

function isBlank(text: string): boolean {
	return text.trim() === '';
}

/**
 * Build the token stream for `source` from its leaf spans (in source order).
 */
export function tokenizeSpans(
	source: string,
	spans: Iterable<LeafSpan>,
): Token[] {
	const locate = createLocator(source);
	const tokens: Token[] = [];
	let cursor = 0;

	const push = (category: TokenCategory, start: number, end: number) => {
		if (end <= start) return;
		tokens.push({
			position: locate(start),
			category,
			text: source.slice(start, end),
		});
	};

	const pushGap = (end: number) => {
		if (end <= cursor) return;
		const gap = source.slice(cursor, end);
		push(isBlank(gap) ? 'whitespace' : 'code', cursor, end);
		cursor = end;
	};

	const pushDocComment = (start: number, end: number): number => {
		const bodyStart = start + DOC_COMMENT_OPEN.length;
		const bodyEnd = end - COMMENT_CLOSE.length;

		// Opener, plus the rest of its line when nothing else is on it
		let contentStart = bodyStart;
		const firstBreak = source.indexOf('\n', bodyStart);
		if (
			firstBreak !== -1 &&
			firstBreak < bodyEnd &&
			isBlank(source.slice(bodyStart, firstBreak))
		) {
			contentStart = firstBreak + 1;
		}
		push('doc-begin', start, contentStart);

		// Indentation in front of the closer belongs to the closer
		const lastBreak = source.lastIndexOf('\n', bodyEnd - 1);
		const lastLineStart = Math.max(contentStart, lastBreak + 1);
		const contentEnd = isBlank(source.slice(lastLineStart, bodyEnd))
			? lastLineStart
			: bodyEnd;

		let lineStart = contentStart;
		while (lineStart < contentEnd) {
			const lineBreak = source.indexOf('\n', lineStart);
			const lineEnd =
				lineBreak === -1 || lineBreak >= contentEnd
					? contentEnd
					: lineBreak + 1;
			push('doc-content', lineStart, lineEnd);
			lineStart = lineEnd;
		}

		TRAILING_LINE_BREAK.lastIndex = end;
		const trailing = TRAILING_LINE_BREAK.exec(source);
		const closeEnd = end + (trailing?.[0].length ?? 0);
		push('doc-end', contentEnd, closeEnd);
		return closeEnd;
	};

	for (const span of spans) {
		// Already covered by a consumed line break
		if (span.startIndex < cursor) continue;
		pushGap(span.startIndex);

		const text = source.slice(span.startIndex, span.endIndex);
		if (span.type === 'comment' && isDocComment(text)) {
			cursor = pushDocComment(span.startIndex, span.endIndex);
		} else {
			push(
				span.type === 'comment' ? 'comment' : 'code',
				span.startIndex,
				span.endIndex,
			);
			cursor = Math.max(cursor, span.endIndex);
		}
	}
	pushGap(source.length);

	return tokens;
}
