/**
 * css-syntax-primitives
 *
 * The lexical building blocks of CSS Syntax and CSSOM: code point
 * classification, input preprocessing, character escaping, and the
 * serializers that turn arbitrary text into valid CSS tokens.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { serializeIdentifier, serializeURL, serializeCommaSeparatedList } from 'css-syntax-primitives';
 *
 * serializeIdentifier('1st-item');     // '\31 st-item'
 * serializeURL('images/a "b".png');    // 'url("images/a \"b\".png")'
 * serializeCommaSeparatedList(['a', 'b']); // 'a, b'
 * ```
 */

// Code point type and constants
export type { CodePoint } from './types.ts';
export { MAX_CODE_POINT, REPLACEMENT_CHARACTER } from './types.ts';

// Classification
export {
	isDigit,
	isHexDigit,
	isUpperCaseLetter,
	isLowerCaseLetter,
	isLetter,
	isNonASCII,
	isIdentStartCodePoint,
	isIdentCodePoint,
	isNonPrintableCodePoint,
	isNewline,
	isWhitespace,
	isLowerThanMaxCodePoint,
	isLeadingSurrogate,
	isTrailingSurrogate,
	isSurrogate,
	startsValidEscape,
	wouldStartAnIdentifier,
	wouldStartANumber,
} from './chars.ts';

// Preprocessing
export { toCodePoints, preprocess } from './preprocess.ts';

// Escaping
export { escapeCharacter, escapeCharacterAsCodePoint } from './escape.ts';

// Serializer
export {
	serializeIdentifier,
	serializeString,
	serializeURL,
	serializeLocal,
	serializeCommaSeparatedList,
	serializeWhitespaceSeparatedList,
} from './serialize.ts';
