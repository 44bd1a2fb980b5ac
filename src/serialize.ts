/**
 * css-syntax-primitives — CSSOM serializer
 *
 * Turns raw text into CSS source that a tokenizer reads back as the same
 * value: identifiers, quoted strings, `url()` and `local()` functions, and
 * the two list forms.
 *
 * Output contract
 * ───────────────
 * • Every string input is accepted; nothing here throws.
 * • NULL and unpaired surrogates are written as U+FFFD, so they are the
 *   characters that do not survive a round trip.
 * • Strings are always double-quoted; `'` is never escaped.
 * • There is one output per input. Where CSS allows several escaped forms,
 *   the CSSOM form is used.
 *
 * @see https://www.w3.org/TR/cssom-1/#common-serializing-idioms
 */

import { isDigit, isLetter, isNonASCII, isSurrogate } from './chars.ts';
import { escapeCharacter, escapeCharacterAsCodePoint } from './escape.ts';
import { toCodePoints } from './preprocess.ts';
import { REPLACEMENT_CHARACTER } from './types.ts';
import type { CodePoint } from './types.ts';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** U+0001–U+001F or U+007F: always written as a hex escape. */
function isControl(code: CodePoint): boolean {
	return (code >= 0x01 && code <= 0x1f) || code === 0x7f;
}

const REPLACEMENT = String.fromCodePoint(REPLACEMENT_CHARACTER);

/** The character itself; an unpaired surrogate becomes U+FFFD so the output stays well-formed. */
function verbatim(code: CodePoint): string {
	return isSurrogate(code) ? REPLACEMENT : String.fromCodePoint(code);
}

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/**
 * Serialize one code point of an identifier. The checks run in order and the
 * first match wins; the positional ones must stay ahead of the character
 * class check so a leading digit is escaped rather than passed through.
 */
function serializeIdentifierCodePoint(code: CodePoint, index: number, codes: readonly CodePoint[]): string {
	if (code === 0x00) return REPLACEMENT;
	if (isControl(code)) return escapeCharacterAsCodePoint(code);
	if (index === 0 && isDigit(code)) return escapeCharacterAsCodePoint(code);
	if (index === 1 && isDigit(code) && codes[0] === 0x2d) return escapeCharacterAsCodePoint(code);
	if (index === 0 && code === 0x2d && codes.length === 1) return escapeCharacter(code);
	if (isNonASCII(code) || code === 0x2d || code === 0x5f || isDigit(code) || isLetter(code)) {
		return verbatim(code);
	}
	return escapeCharacter(code);
}

/**
 * Serialize a string as a CSS identifier.
 *
 *   serializeIdentifier('1test')  → '\31 test'
 *   serializeIdentifier('-1test') → '-\31 test'
 *   serializeIdentifier('-')      → '\-'
 *   serializeIdentifier('a b')    → 'a\ b'
 *
 * Not idempotent: feeding the output back in escapes its backslashes again.
 *
 * @see https://www.w3.org/TR/cssom-1/#serialize-an-identifier
 */
export function serializeIdentifier(identifier: string): string {
	const codes = toCodePoints(identifier);
	return codes.map((code, index) => serializeIdentifierCodePoint(code, index, codes)).join('');
}

// ---------------------------------------------------------------------------
// Strings and functions
// ---------------------------------------------------------------------------

function serializeStringCodePoint(code: CodePoint): string {
	if (code === 0x00) return REPLACEMENT;
	if (isControl(code)) return escapeCharacterAsCodePoint(code);
	if (code === 0x22 || code === 0x5c) return escapeCharacter(code); // " or \
	return verbatim(code);
}

/**
 * Serialize a string as a double-quoted CSS string.
 *
 * @see https://www.w3.org/TR/cssom-1/#serialize-a-string
 */
export function serializeString(value: string): string {
	return `"${toCodePoints(value).map(serializeStringCodePoint).join('')}"`;
}

/** `url("…")` @see https://www.w3.org/TR/cssom-1/#serialize-a-url */
export function serializeURL(url: string): string {
	return `url(${serializeString(url)})`;
}

/** `local("…")` @see https://www.w3.org/TR/cssom-1/#serialize-a-local */
export function serializeLocal(local: string): string {
	return `local(${serializeString(local)})`;
}

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

/**
 * Join already-serialized items with `", "`. An empty list gives `""`.
 *
 * @see https://www.w3.org/TR/cssom-1/#serialize-a-comma-separated-list
 */
export function serializeCommaSeparatedList(items: readonly string[]): string {
	return items.join(', ');
}

/** @see https://www.w3.org/TR/cssom-1/#serialize-a-whitespace-separated-list */
export function serializeWhitespaceSeparatedList(items: readonly string[]): string {
	return items.join(' ');
}
