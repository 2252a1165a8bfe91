/**
 * @title Token Stream
 * @description Normalized token stream over the raw lexer.
 *
 * The stream guarantees, for any input:
 * - `Indent` and `Outdent` are always paired.
 * - Ignoring comments, a `MapKey` or `ListItem` is always followed by a
 *   `Scalar`, a `MultilineHint` and its `MultilineScalar`, an `Indent`, or a
 *   synthesised `NoValue`.
 * - A section holds only map keys or only list items.
 *
 * Structural problems are reported as error-flagged tokens and scanning
 * carries on.
 *
 * @module lexer
 */

import { ParseError } from "../errors.js";
import type { EntryKind, Token } from "../types/token.js";
import { createToken, Lexer } from "./lexer.js";

/**
 * Options for {@link tokens}.
 */
export interface TokenStreamOptions {
	/**
	 * Include `Comment` and `MultilineHint` tokens (default: true).
	 * Consumers that only need structure can turn them off.
	 */
	trivia?: boolean;
}

interface SectionState {
	kind?: EntryKind;
	/** A key or item is waiting for its value. */
	hasKey: boolean;
}

/**
 * Iterator over normalized tokens.
 */
export class TokenStream implements IterableIterator<Token> {
	private readonly lexer: Lexer;
	private readonly trivia: boolean;
	private readonly states: SectionState[] = [{ hasKey: false }];
	private readonly queue: Token[] = [];
	private lastLine = 0;
	private finished = false;

	constructor(input: string | Uint8Array, options: TokenStreamOptions = {}) {
		this.lexer = new Lexer(input);
		this.trivia = options.trivia ?? true;
	}

	[Symbol.iterator](): IterableIterator<Token> {
		return this;
	}

	next(): IteratorResult<Token> {
		for (;;) {
			const token = this.queue.shift();
			if (token) {
				if (!this.trivia && (token.kind === "Comment" || token.kind === "MultilineHint")) {
					continue;
				}
				return { done: false, value: token };
			}
			if (this.finished) {
				return { done: true, value: undefined };
			}

			const raw = this.lexer.next();
			if (raw.done) {
				this.close();
			} else {
				this.accept(raw.value);
			}
		}
	}

	private state(): SectionState {
		return this.states[this.states.length - 1];
	}

	private accept(token: Token): void {
		const state = this.state();
		switch (token.kind) {
			case "Indent":
				if (state.hasKey) {
					state.hasKey = false;
				} else {
					const kind = (state.kind ??= "MapKey");
					this.queue.push(createToken(kind, "", token.line, "unexpected indent"));
				}
				this.states.push({ hasKey: false });
				break;
			case "Outdent":
				if (this.states.length === 1) {
					throw new ParseError("outdent without a matching indent", { line: token.line });
				}
				this.states.pop();
				if (state.hasKey) {
					this.queue.push(createToken("NoValue", "", token.line));
				}
				break;
			case "MapKey":
			case "ListItem": {
				const kind = (state.kind ??= token.kind);
				if (state.hasKey) {
					this.queue.push(createToken("NoValue", "", token.line));
				}
				state.hasKey = true;
				if (kind !== token.kind) {
					const message = token.kind === "ListItem" ? "unexpected list item" : "unexpected map key";
					this.queue.push(createToken(kind, "", token.line, message));
					this.lastLine = token.line;
					return;
				}
				break;
			}
			case "Scalar":
			case "MultilineScalar":
				state.hasKey = false;
				break;
			case "Comment":
			case "MultilineHint":
				break;
			case "NoValue":
				throw new ParseError("the lexer does not produce NoValue tokens", { line: token.line });
		}
		this.lastLine = token.line;
		this.queue.push(token);
	}

	private close(): void {
		this.finished = true;
		while (this.states.length > 0) {
			const state = this.state();
			if (state.hasKey) {
				this.queue.push(createToken("NoValue", "", this.lastLine));
			}
			if (this.states.length > 1) {
				this.queue.push(createToken("Outdent", "", this.lastLine));
			}
			this.states.pop();
		}
	}
}

/**
 * Tokenize a document into a normalized, single-pass token stream.
 *
 * @param input - Document text, or its UTF-8 bytes
 * @param options - Stream options
 * @returns Iterable stream of tokens
 *
 * @example
 * ```typescript
 * for (const token of tokens("a = 1\nb\n  = 2")) {
 *   console.log(token.line, token.kind, token.content);
 * }
 * ```
 */
export function tokens(input: string | Uint8Array, options?: TokenStreamOptions): TokenStream {
	return new TokenStream(input, options);
}
