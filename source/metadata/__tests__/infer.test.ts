/**
 * Inference rule tests.
 */

import {describe, it, expect} from 'vitest';
import {INFERENCE_RULES, substituteDescriptionWords} from '../infer.js';
import {createStaticIdentity} from '../identity.js';

function infer(
	field: keyof typeof INFERENCE_RULES,
	readme: string,
): string | null {
	const rule = INFERENCE_RULES[field];
	if (!rule) throw new Error(`no rule for ${field}`);
	return rule({readme})?.value ?? null;
}

describe('version inference', () => {
	it.each([
		['Version 1.0.0', '1.0.0'],
		['version: 2.10.3', '2.10.3'],
		['v0.1.2 beta', '0.1.2'],
		['Release V 3.0.0', '3.0.0'],
	])('reads %j as %s', (readme, expected) => {
		expect(infer('version', readme)).toBe(expected);
	});

	it('ignores two-part versions', () => {
		expect(infer('version', 'Version 1.0')).toBeNull();
	});

	it('takes the first version-shaped string, even when it is not the version', () => {
		// Known limitation: first match wins
		expect(infer('version', 'Requires Node v20.11.1\n\nVersion 1.0.0\n')).toBe(
			'20.11.1',
		);
	});
});

describe('homepage inference', () => {
	it.each([
		['Home: https://example.com/tool', 'https://example.com/tool'],
		['  Homepage http://example.org', 'http://example.org'],
		['[Homepage](https://example.com/tool)', 'https://example.com/tool'],
		['[Home](https://example.com/x)', 'https://example.com/x'],
	])('reads %j', (readme, expected) => {
		expect(infer('homepage', `# Title\n\n${readme}\n`)).toBe(expected);
	});

	it('needs the label at the start of a line', () => {
		expect(infer('homepage', 'See the Home: https://example.com\n')).toBeNull();
	});
});

describe('summary inference', () => {
	it('uses the first line with a letter or digit', () => {
		expect(infer('summary', '\n***\n\n# My tool\nMore text\n')).toBe(
			'# My tool',
		);
	});

	it('finds nothing in punctuation-only text', () => {
		expect(infer('summary', '---\n***\n')).toBeNull();
	});
});

describe('description inference', () => {
	it('swaps FIXME and TODO in any case', () => {
		expect(infer('description', 'Fix the TODO and fixme list\n')).toBe(
			'Fix the TOODLES and FIZZIX-ME list\n',
		);
	});

	it('finds nothing in a blank readme', () => {
		expect(infer('description', '\n  \n')).toBeNull();
	});

	it('leaves text without those words unchanged', () => {
		const text = 'Plain description.\nNothing to swap.';
		expect(substituteDescriptionWords(text)).toBe(text);
		expect(substituteDescriptionWords(substituteDescriptionWords(text))).toBe(
			text,
		);
	});
});

describe('identity inference', () => {
	it('reads author and email from the identity lookup', () => {
		const identity = createStaticIdentity({
			'user.name': 'Ada',
			'user.email': 'ada@example.com',
		});
		expect(INFERENCE_RULES.author?.({readme: '', identity})).toEqual({
			value: 'Ada',
			source: 'git',
			message: 'Using author from git as: Ada',
		});
		expect(INFERENCE_RULES.email?.({readme: '', identity})?.value).toBe(
			'ada@example.com',
		);
	});

	it('finds nothing without an identity', () => {
		expect(INFERENCE_RULES.author?.({readme: ''})).toBeNull();
	});

	it('never infers a name', () => {
		expect(INFERENCE_RULES.name).toBeUndefined();
	});
});
