/**
 * css-syntax-primitives — Input preprocessing
 *
 * Turns a JS string into the code point stream a CSS tokenizer consumes.
 *
 * @see https://www.w3.org/TR/css-syntax-3/#input-preprocessing
 */

import { isSurrogate } from './chars.ts';
import { REPLACEMENT_CHARACTER } from './types.ts';
import type { CodePoint } from './types.ts';

/**
 * Split a string into code points. Surrogate pairs are combined; an unpaired
 * surrogate is kept as its own value.
 */
export function toCodePoints(text: string): CodePoint[] {
	const codes: CodePoint[] = [];
	for (const ch of text) {
		const code = ch.codePointAt(0);
		if (code !== undefined) codes.push(code);
	}
	return codes;
}

/**
 * Split a string into code points and apply the CSS preprocessing rules:
 *
 *   - CR LF, a lone CR, and FF each become a single LF.
 *   - NULL becomes U+FFFD.
 *   - Unpaired surrogates become U+FFFD.
 */
export function preprocess(text: string): CodePoint[] {
	const codes = toCodePoints(text);
	const out: CodePoint[] = [];
	for (let i = 0; i < codes.length; i++) {
		const code = codes[i];
		if (code === 0x0d) {
			if (codes[i + 1] === 0x0a) i++;
			out.push(0x0a);
		} else if (code === 0x0c) {
			out.push(0x0a);
		} else if (code === 0x00 || isSurrogate(code)) {
			out.push(REPLACEMENT_CHARACTER);
		} else {
			out.push(code);
		}
	}
	return out;
}
