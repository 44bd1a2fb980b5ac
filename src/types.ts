/**
 * css-syntax-primitives — Type definitions
 *
 * Everything in this package works on numeric Unicode scalar values rather
 * than UTF-16 code units, so astral characters (U+10000 and up) are a single
 * `CodePoint` and never a surrogate pair.
 */

// ---------------------------------------------------------------------------
// Code points
// ---------------------------------------------------------------------------

/**
 * A single Unicode scalar value, `0` through `0x10FFFF`.
 *
 * Unpaired surrogates read out of a malformed JS string still arrive as a
 * `CodePoint` holding the surrogate value; use `isSurrogate()` to detect them.
 */
export type CodePoint = number;

/** The greatest code point defined by Unicode. */
export const MAX_CODE_POINT: CodePoint = 0x10ffff;

/** U+FFFD REPLACEMENT CHARACTER, substituted for NULL and invalid input. */
export const REPLACEMENT_CHARACTER: CodePoint = 0xfffd;
