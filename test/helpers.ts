/**
 * Test helpers — a minimal CSS escape consumer, following CSS Syntax §4.3.7,
 * used to check that serializer output reads back as the original text.
 */
import { isHexDigit, isNewline, isSurrogate, isWhitespace, preprocess, MAX_CODE_POINT, REPLACEMENT_CHARACTER } from '../src/index.ts';
import type { CodePoint } from '../src/index.ts';

/** Consume the escape whose backslash sits at `codes[start - 1]`. Returns the value and the index after it. */
function consumeEscape(codes: readonly CodePoint[], start: number): [CodePoint, number] {
	let i = start;
	if (i >= codes.length) return [REPLACEMENT_CHARACTER, i];
	if (!isHexDigit(codes[i])) return [codes[i], i + 1];

	let hex = '';
	while (i < codes.length && hex.length < 6 && isHexDigit(codes[i])) {
		hex += String.fromCodePoint(codes[i]);
		i++;
	}
	if (i < codes.length && isWhitespace(codes[i])) i++;
	const value = parseInt(hex, 16);
	if (value === 0 || isSurrogate(value) || value > MAX_CODE_POINT) return [REPLACEMENT_CHARACTER, i];
	return [value, i];
}

/** Resolve every escape in `css`. Assumes the backslashes all start valid escapes. */
export function resolveEscapes(css: string): string {
	const codes = preprocess(css);
	const out: CodePoint[] = [];
	let i = 0;
	while (i < codes.length) {
		if (codes[i] === 0x5c) {
			const [value, next] = consumeEscape(codes, i + 1);
			out.push(value);
			i = next;
		} else {
			out.push(codes[i]);
			i++;
		}
	}
	return String.fromCodePoint(...out);
}

/** Read back the value of a double-quoted CSS string, throwing on anything a tokenizer would reject. */
export function decodeString(css: string): string {
	const codes = preprocess(css);
	if (codes[0] !== 0x22 || codes[codes.length - 1] !== 0x22 || codes.length < 2) {
		throw new Error(`Not a double-quoted string: ${css}`);
	}
	const out: CodePoint[] = [];
	let i = 1;
	while (i < codes.length - 1) {
		const code = codes[i];
		if (code === 0x22) throw new Error(`Unescaped quote at ${i}: ${css}`);
		if (isNewline(code)) throw new Error(`Bad string (raw newline) at ${i}: ${css}`);
		if (code === 0x5c) {
			if (i + 1 < codes.length - 1 && isNewline(codes[i + 1])) {
				i += 2; // line continuation
				continue;
			}
			const [value, next] = consumeEscape(codes.slice(0, codes.length - 1), i + 1);
			out.push(value);
			i = next;
		} else {
			out.push(code);
			i++;
		}
	}
	return String.fromCodePoint(...out);
}
