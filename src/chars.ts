/**
 * css-syntax-primitives — CSS code point classification
 *
 * All functions operate on numeric Unicode code points (from `codePointAt`).
 *
 * The ranges follow the tokenizer definitions of CSS Syntax Level 3 §4.2 and,
 * for surrogates, the WHATWG Infra standard. Boundaries are inclusive.
 *
 * @see https://www.w3.org/TR/css-syntax-3/#tokenizer-definitions
 * @see https://infra.spec.whatwg.org/#code-points
 */

import { MAX_CODE_POINT } from './types.ts';
import type { CodePoint } from './types.ts';

// ---------------------------------------------------------------------------
// Single code point predicates
// ---------------------------------------------------------------------------

/** ASCII decimal digit [0-9]. */
export function isDigit(code: CodePoint): boolean {
	return code >= 0x30 && code <= 0x39;
}

/** ASCII hex digit [0-9A-Fa-f]. */
export function isHexDigit(code: CodePoint): boolean {
	return isDigit(code) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

/** [A-Z] */
export function isUpperCaseLetter(code: CodePoint): boolean {
	return code >= 0x41 && code <= 0x5a;
}

/** [a-z] */
export function isLowerCaseLetter(code: CodePoint): boolean {
	return code >= 0x61 && code <= 0x7a;
}

/** [A-Za-z] */
export function isLetter(code: CodePoint): boolean {
	return isUpperCaseLetter(code) || isLowerCaseLetter(code);
}

/** U+0080 <control> and everything above it. */
export function isNonASCII(code: CodePoint): boolean {
	return code >= 0x80;
}

/**
 * A code point that may begin an identifier without escaping: a letter,
 * any non-ASCII code point, or `_`.
 */
export function isIdentStartCodePoint(code: CodePoint): boolean {
	return isLetter(code) || isNonASCII(code) || code === 0x5f; // _
}

/** Ident-start code point, digit, or `-`. */
export function isIdentCodePoint(code: CodePoint): boolean {
	return isIdentStartCodePoint(code) || isDigit(code) || code === 0x2d; // -
}

/** U+0000–U+0008, U+000B, U+000E–U+001F, or U+007F DELETE. */
export function isNonPrintableCodePoint(code: CodePoint): boolean {
	return (code >= 0x00 && code <= 0x08) || code === 0x0b || (code >= 0x0e && code <= 0x1f) || code === 0x7f;
}

/**
 * LF, CR, or FF.
 *
 * CSS Syntax only names LF here because CR and FF are folded into LF during
 * input preprocessing. This predicate accepts all three so that it gives the
 * same answer whether or not `preprocess()` ran first.
 */
export function isNewline(code: CodePoint): boolean {
	return code === 0x0a || code === 0x0d || code === 0x0c;
}

/** Newline, tab, or space. */
export function isWhitespace(code: CodePoint): boolean {
	return isNewline(code) || code === 0x09 || code === 0x20;
}

/** At most U+10FFFF, the greatest code point Unicode defines. */
export function isLowerThanMaxCodePoint(code: CodePoint): boolean {
	return code <= MAX_CODE_POINT;
}

/** U+D800–U+DBFF */
export function isLeadingSurrogate(code: CodePoint): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

/** U+DC00–U+DFFF */
export function isTrailingSurrogate(code: CodePoint): boolean {
	return code >= 0xdc00 && code <= 0xdfff;
}

/** U+D800–U+DFFF, either half of a UTF-16 pair. */
export function isSurrogate(code: CodePoint): boolean {
	return isLeadingSurrogate(code) || isTrailingSurrogate(code);
}

// ---------------------------------------------------------------------------
// Lookahead checks
//
// An omitted argument stands for end of input.
// ---------------------------------------------------------------------------

/**
 * Whether two code points are a valid escape: a backslash that is not
 * followed by a newline.
 *
 * @see https://www.w3.org/TR/css-syntax-3/#check-if-two-code-points-are-a-valid-escape
 */
export function startsValidEscape(first: CodePoint, second?: CodePoint): boolean {
	if (first !== 0x5c) return false; // \
	return second === undefined || !isNewline(second);
}

/** @see https://www.w3.org/TR/css-syntax-3/#would-start-an-identifier */
export function wouldStartAnIdentifier(first: CodePoint, second?: CodePoint, third?: CodePoint): boolean {
	if (first === 0x2d) {
		if (second === undefined) return false;
		return isIdentStartCodePoint(second) || second === 0x2d || startsValidEscape(second, third);
	}
	if (isIdentStartCodePoint(first)) return true;
	if (first === 0x5c) return startsValidEscape(first, second);
	return false;
}

/** @see https://www.w3.org/TR/css-syntax-3/#starts-with-a-number */
export function wouldStartANumber(first: CodePoint, second?: CodePoint, third?: CodePoint): boolean {
	if (first === 0x2b || first === 0x2d) {
		// + or -
		if (second === undefined) return false;
		if (isDigit(second)) return true;
		return second === 0x2e && third !== undefined && isDigit(third);
	}
	if (first === 0x2e) return second !== undefined && isDigit(second); // .
	return isDigit(first);
}
