/**
 * Lexer exports for @conl/parser.
 */

export { Lexer, createToken } from "./lexer.js";
export { TokenStream, tokens, type TokenStreamOptions } from "./tokens.js";
export {
	checkUtf8,
	decodeInput,
	decodeLiteral,
	encodeLiteral,
	isValidUtf8,
	splitIndent,
	splitLines,
	splitLiteral,
	trimEndHorizontal,
	trimStartHorizontal,
	type DecodedLiteral,
} from "./scanner.js";
