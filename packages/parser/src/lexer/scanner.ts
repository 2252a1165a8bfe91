/**
 * @title Scanner
 * @description Line splitting, indentation and literal handling.
 *
 * The scanner works on decoded text. Bytes that are not valid UTF-8 survive
 * decoding as lone low surrogates (U+DC80 to U+DCFF) so that each token can
 * report "invalid UTF-8" on its own without aborting the scan.
 *
 * @module lexer
 */

const LINE_BREAK = /\r\n|\r|\n/;
const LEADING_HORIZONTAL = /^[ \t]*/;
const TRAILING_HORIZONTAL = /[ \t]*$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const QUOTED_LITERAL = /^"((?:\\.|[^\\"])*)"/s;
const ESCAPE = /\\(\{[^}]*\}?|.)/gs;
const HEX_DIGITS = /^[0-9a-fA-F]{1,8}$/;
const NEEDS_ESCAPE = /[\\"\u0000-\u001f\u007f]/g;
const NEEDS_QUOTES = /^$|^[ \t]|[ \t]$|[;="\u0000-\u001f\u007f]/;

/** Number of code points decoded before they are flushed to a string. */
const DECODE_CHUNK = 4096;

/**
 * Result of decoding a literal.
 */
export interface DecodedLiteral {
	content: string;
	error?: string;
}

function continuationBytes(lead: number): number {
	if (lead >= 0xc2 && lead <= 0xdf) {
		return 1;
	}
	if (lead >= 0xe0 && lead <= 0xef) {
		return 2;
	}
	if (lead >= 0xf0 && lead <= 0xf4) {
		return 3;
	}
	return -1;
}

function secondByteRange(lead: number): [number, number] {
	switch (lead) {
		case 0xe0:
			return [0xa0, 0xbf];
		case 0xed:
			return [0x80, 0x9f];
		case 0xf0:
			return [0x90, 0xbf];
		case 0xf4:
			return [0x80, 0x8f];
		default:
			return [0x80, 0xbf];
	}
}

function decodeSequence(bytes: Uint8Array, offset: number): [codePoint: number, length: number] {
	const lead = bytes[offset];
	if (lead < 0x80) {
		return [lead, 1];
	}

	const count = continuationBytes(lead);
	if (count < 0 || offset + count >= bytes.length) {
		return [0xdc00 | lead, 1];
	}

	const [low, high] = secondByteRange(lead);
	let codePoint = lead & (0xff >> (count + 2));
	for (let i = 1; i <= count; i++) {
		const byte = bytes[offset + i];
		const min = i === 1 ? low : 0x80;
		const max = i === 1 ? high : 0xbf;
		if (byte < min || byte > max) {
			return [0xdc00 | lead, 1];
		}
		codePoint = (codePoint << 6) | (byte & 0x3f);
	}
	return [codePoint, count + 1];
}

/**
 * Decode document input to a string.
 *
 * Strings are returned unchanged. Bytes are decoded as UTF-8, mapping every
 * byte that does not start a valid sequence to U+DC00 plus the byte value.
 */
export function decodeInput(input: string | Uint8Array): string {
	if (typeof input === "string") {
		return input;
	}

	let result = "";
	let chunk: number[] = [];
	let offset = 0;
	while (offset < input.length) {
		const [codePoint, length] = decodeSequence(input, offset);
		chunk.push(codePoint);
		offset += length;
		if (chunk.length === DECODE_CHUNK) {
			result += String.fromCodePoint(...chunk);
			chunk = [];
		}
	}
	return result + String.fromCodePoint(...chunk);
}

/**
 * Check that text holds no unpaired surrogates, i.e. came from valid UTF-8.
 */
export function isValidUtf8(text: string): boolean {
	return !LONE_SURROGATE.test(text);
}

/**
 * Return "invalid UTF-8" when the text is not valid, otherwise undefined.
 */
export function checkUtf8(text: string): string | undefined {
	return isValidUtf8(text) ? undefined : "invalid UTF-8";
}

/**
 * Split text into physical lines on CRLF, CR or LF.
 */
export function splitLines(text: string): string[] {
	return text.split(LINE_BREAK);
}

/**
 * Remove leading spaces and tabs.
 */
export function trimStartHorizontal(text: string): string {
	return text.replace(LEADING_HORIZONTAL, "");
}

/**
 * Remove trailing spaces and tabs.
 */
export function trimEndHorizontal(text: string): string {
	return text.replace(TRAILING_HORIZONTAL, "");
}

/**
 * Split a line into its indentation (spaces and tabs) and the rest.
 */
export function splitIndent(line: string): [indent: string, rest: string] {
	const rest = trimStartHorizontal(line);
	return [line.slice(0, line.length - rest.length), rest];
}

function splitUnquoted(input: string, inKey: boolean): [literal: string, rest: string] {
	const comment = input.indexOf(";");
	if (inKey) {
		const separator = input.indexOf("=");
		if (separator >= 0 && (comment < 0 || separator < comment)) {
			return [trimEndHorizontal(input.slice(0, separator)), input.slice(separator)];
		}
	}
	if (comment >= 0) {
		return [trimEndHorizontal(input.slice(0, comment)), input.slice(comment)];
	}
	return [trimEndHorizontal(input), ""];
}

/**
 * Split the literal at the start of `input` from whatever follows it.
 *
 * Unquoted literals end at the first `;` and, for keys, at the first `=`.
 * Quoted literals end at their closing quote, though anything up to the next
 * separator stays attached so that decoding can report it. The returned rest
 * starts with the separator (`=` or `;`) or is empty. An unclosed quote takes
 * the whole input.
 */
export function splitLiteral(input: string, inKey: boolean): [literal: string, rest: string] {
	if (!input.startsWith('"')) {
		return splitUnquoted(input, inKey);
	}

	let escaped = false;
	for (let i = 1; i < input.length; i++) {
		const char = input[i];
		if (char === '"' && !escaped) {
			const [tail, rest] = splitUnquoted(input.slice(i + 1), inKey);
			return [input.slice(0, i + 1) + tail, rest];
		}
		escaped = char === "\\" && !escaped;
	}
	return [input, ""];
}

function decodeEscape(escape: string): string | undefined {
	const code = escape.slice(1);
	switch (code) {
		case "n":
			return "\n";
		case "r":
			return "\r";
		case "t":
			return "\t";
		case '"':
		case "\\":
			return code;
	}

	if (!code.startsWith("{") || !code.endsWith("}")) {
		return undefined;
	}
	const hex = code.slice(1, -1);
	if (!HEX_DIGITS.test(hex)) {
		return undefined;
	}
	const codePoint = Number.parseInt(hex, 16);
	if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
		return undefined;
	}
	return String.fromCodePoint(codePoint);
}

/**
 * Decode a literal as returned by {@link splitLiteral}.
 *
 * Unquoted literals decode to themselves. Quoted literals lose their quotes
 * and have escapes replaced: `\n`, `\r`, `\t`, `\"`, `\\` and `\{hex}` for
 * a Unicode code point.
 */
export function decodeLiteral(literal: string): DecodedLiteral {
	if (!isValidUtf8(literal)) {
		return { content: "", error: "invalid UTF-8" };
	}
	if (!literal.startsWith('"')) {
		return { content: literal };
	}

	const match = QUOTED_LITERAL.exec(literal);
	if (!match) {
		return { content: "", error: "unclosed quotes" };
	}
	if (match[0].length !== literal.length) {
		return { content: "", error: "characters after quotes" };
	}

	let badEscape: string | undefined;
	const content = match[1].replace(ESCAPE, (escape) => {
		const decoded = decodeEscape(escape);
		if (decoded === undefined) {
			badEscape ??= escape;
			return escape;
		}
		return decoded;
	});
	if (badEscape !== undefined) {
		return { content: "", error: `invalid escape code: ${badEscape}` };
	}
	return { content };
}

function escapeCharacter(char: string): string {
	switch (char) {
		case "\\":
			return "\\\\";
		case '"':
			return '\\"';
		case "\n":
			return "\\n";
		case "\r":
			return "\\r";
		case "\t":
			return "\\t";
		default:
			return `\\{${(char.codePointAt(0) ?? 0).toString(16)}}`;
	}
}

/**
 * Encode a string as a literal that decodes back to the same string.
 *
 * Plain text is written bare; anything that would be read differently bare
 * (empty text, surrounding whitespace, separators, quotes or control
 * characters) is quoted and escaped.
 */
export function encodeLiteral(value: string): string {
	if (!NEEDS_QUOTES.test(value)) {
		return value;
	}
	return `"${value.replace(NEEDS_ESCAPE, escapeCharacter)}"`;
}
