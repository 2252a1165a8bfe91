/**
 * @title Token Types
 * @description The token model shared by the lexer, the normalizer and
 * every consumer of the token stream.
 *
 * @module types
 */

/**
 * Kinds of token yielded by the lexer and the normalizer.
 *
 * `NoValue` is only ever synthesised by the normalizer.
 */
export type TokenKind =
	| "Comment"
	| "Indent"
	| "Outdent"
	| "MapKey"
	| "ListItem"
	| "Scalar"
	| "NoValue"
	| "MultilineHint"
	| "MultilineScalar";

/**
 * A single token.
 */
export interface Token {
	kind: TokenKind;
	/** Decoded content: key text, scalar text, comment text or indentation. */
	content: string;
	/** 1-based line number. */
	line: number;
	/** Decode problem local to this token. The stream carries on regardless. */
	error?: string;
}

/** Kinds that open an entry in a section. */
export type EntryKind = Extract<TokenKind, "MapKey" | "ListItem">;
