/**
 * @title Document Builder
 * @description Builds an immutable document tree from a token stream.
 *
 * Each entry keeps the token that introduced it so that consumers can map
 * values back to lines, and records the line of its parent entry (0 for the
 * document root) for editor lookups.
 *
 * @module document
 */

import { ParseError } from "../errors.js";
import { tokens } from "../lexer/tokens.js";
import type { EntryKind, Token } from "../types/token.js";

/**
 * A single scalar (possibly multiline).
 */
export interface ScalarValue {
	readonly kind: "scalar";
	readonly token: Token;
}

/**
 * A map: entries introduced by `MapKey` tokens.
 */
export interface MapValue {
	readonly kind: "map";
	readonly entries: readonly Entry[];
}

/**
 * A list: entries introduced by `ListItem` tokens.
 */
export interface ListValue {
	readonly kind: "list";
	readonly entries: readonly Entry[];
}

/**
 * No value at all.
 */
export interface EmptyValue {
	readonly kind: "empty";
}

/**
 * A node in the document tree.
 */
export type Value = ScalarValue | MapValue | ListValue | EmptyValue;

/**
 * A key (or list item) and its value.
 */
export interface Entry {
	/** The `MapKey` or `ListItem` token. */
	readonly key: Token;
	readonly value: Value;
	/** Line of the entry owning this one, 0 at the document root. */
	readonly parentLine: number;
}

/**
 * A decode problem located in the document.
 */
export interface DecodeErrorSite {
	/** Line of the entry the problem belongs to. */
	line: number;
	/** Whether the problem is in the key rather than the value. */
	isKey: boolean;
	message: string;
}

/** The shared empty value. */
export const EMPTY_VALUE: EmptyValue = Object.freeze({ kind: "empty" });

interface EntryBuilder {
	key: Token;
	value: Value;
	parentLine: number;
}

interface Section {
	kind?: EntryKind;
	entries: EntryBuilder[];
	owner?: EntryBuilder;
	line: number;
}

function sectionValue(section: Section): Value {
	if (section.entries.length === 0) {
		return EMPTY_VALUE;
	}
	return section.kind === "ListItem"
		? { kind: "list", entries: section.entries }
		: { kind: "map", entries: section.entries };
}

function collectDecodeErrors(value: Value, sites: DecodeErrorSite[]): void {
	if (value.kind !== "map" && value.kind !== "list") {
		return;
	}
	for (const entry of value.entries) {
		if (entry.key.error !== undefined) {
			sites.push({ line: entry.key.line, isKey: true, message: entry.key.error });
		}
		if (entry.value.kind === "scalar" && entry.value.token.error !== undefined) {
			sites.push({ line: entry.key.line, isKey: false, message: entry.value.token.error });
		}
		collectDecodeErrors(entry.value, sites);
	}
}

/**
 * A parsed document.
 */
export class ConlDocument {
	private readonly index = new Map<number, Entry>();

	/**
	 * @param root - Root value of the document
	 * @param strayErrors - Error-flagged tokens with no place in the tree (comments)
	 */
	constructor(
		readonly root: Value,
		readonly strayErrors: readonly Token[] = [],
	) {
		this.indexEntries(root);
	}

	private indexEntries(value: Value): void {
		if (value.kind !== "map" && value.kind !== "list") {
			return;
		}
		for (const entry of value.entries) {
			this.index.set(entry.key.line, entry);
			this.indexEntries(entry.value);
		}
	}

	/**
	 * Find the entry whose key or list marker is on the given line.
	 * When several entries start on one line, the innermost wins.
	 */
	entryAt(line: number): Entry | undefined {
		return this.index.get(line);
	}

	/**
	 * Find the value belonging to the entry on the given line, or the root
	 * value for line 0.
	 */
	valueAt(line: number): Value | undefined {
		return line === 0 ? this.root : this.entryAt(line)?.value;
	}

	/**
	 * List every decode problem in document order: keys, scalars and stray comments.
	 */
	decodeErrors(): DecodeErrorSite[] {
		const sites: DecodeErrorSite[] = [];
		collectDecodeErrors(this.root, sites);
		for (const token of this.strayErrors) {
			if (token.error !== undefined) {
				sites.push({ line: token.line, isKey: false, message: token.error });
			}
		}
		return sites;
	}

	/**
	 * Check whether the document holds no entries.
	 */
	isEmpty(): boolean {
		return this.root.kind === "empty";
	}
}

/**
 * Build a document from a normalized token stream.
 *
 * @param stream - Tokens as produced by {@link tokens}
 * @returns The document tree
 * @throws {ParseError} When the stream does not keep the normalizer's guarantees
 */
export function buildDocument(stream: Iterable<Token>): ConlDocument {
	const stack: Section[] = [{ entries: [], line: 0 }];
	const strayErrors: Token[] = [];
	let hintError: string | undefined;

	const current = (): Section => stack[stack.length - 1];
	const lastEntry = (token: Token): EntryBuilder => {
		const entries = current().entries;
		const entry = entries[entries.length - 1];
		if (!entry) {
			throw new ParseError(`${token.kind} without a key or list item`, { line: token.line });
		}
		return entry;
	};

	for (const token of stream) {
		switch (token.kind) {
			case "MapKey":
			case "ListItem": {
				const section = current();
				section.kind ??= token.kind;
				section.entries.push({ key: token, value: EMPTY_VALUE, parentLine: section.line });
				break;
			}
			case "Scalar":
				lastEntry(token).value = { kind: "scalar", token };
				break;
			case "MultilineScalar": {
				const scalar = token.error === undefined && hintError !== undefined ? { ...token, error: hintError } : token;
				hintError = undefined;
				lastEntry(token).value = { kind: "scalar", token: scalar };
				break;
			}
			case "MultilineHint":
				hintError = token.error;
				break;
			case "Indent": {
				const owner = lastEntry(token);
				stack.push({ entries: [], owner, line: owner.key.line });
				break;
			}
			case "Outdent": {
				const section = stack.pop();
				if (!section?.owner) {
					throw new ParseError("Outdent without a matching Indent", { line: token.line });
				}
				section.owner.value = sectionValue(section);
				break;
			}
			case "Comment":
				if (token.error !== undefined) {
					strayErrors.push(token);
				}
				break;
			case "NoValue":
				break;
		}
	}

	if (stack.length !== 1) {
		throw new ParseError("token stream ended inside an indented section");
	}
	return new ConlDocument(sectionValue(stack[0]), strayErrors);
}

/**
 * Parse a document from text or UTF-8 bytes.
 *
 * Malformed input never throws: decode problems stay on their tokens and are
 * listed by {@link ConlDocument.decodeErrors}.
 *
 * @example
 * ```typescript
 * const document = parseDocument("server\n  port = 8080\n");
 * document.valueAt(2); // { kind: "scalar", token: { kind: "Scalar", content: "8080", line: 2 } }
 * ```
 */
export function parseDocument(input: string | Uint8Array): ConlDocument {
	return buildDocument(tokens(input, { trivia: true }));
}
