/**
 * css-syntax-primitives — Character escaping
 *
 * The two escape forms CSSOM serialization is built from.
 *
 * @see https://www.w3.org/TR/cssom-1/#common-serializing-idioms
 */

import { isLowerThanMaxCodePoint, isSurrogate } from './chars.ts';
import { REPLACEMENT_CHARACTER } from './types.ts';
import type { CodePoint } from './types.ts';

/**
 * `\` followed by the character itself.
 *
 *   escapeCharacter(0x2e) → '\.'
 *
 * Values that are not scalar values (negative, fractional, surrogates, or
 * above U+10FFFF) are written as U+FFFD instead.
 */
export function escapeCharacter(code: CodePoint): string {
	const valid = Number.isInteger(code) && code >= 0 && isLowerThanMaxCodePoint(code) && !isSurrogate(code);
	return `\\${String.fromCodePoint(valid ? code : REPLACEMENT_CHARACTER)}`;
}

/**
 * `\` followed by the code point in lowercase hex with no leading zeros,
 * followed by a single space.
 *
 *   escapeCharacterAsCodePoint(0x61)    → '\61 '
 *   escapeCharacterAsCodePoint(0x10348) → '\10348 '
 *
 * The trailing space is always written, even where the next character could
 * not be mistaken for a hex digit; a tokenizer consumes it as part of the
 * escape.
 */
export function escapeCharacterAsCodePoint(code: CodePoint): string {
	return `\\${code.toString(16)} `;
}
