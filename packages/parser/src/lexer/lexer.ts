/**
 * @title Lexer
 * @description Raw, line-by-line tokenizer.
 *
 * The lexer tracks an indentation stack and a pending multiline capture and
 * yields tokens one at a time. Problems are attached to the offending token;
 * the lexer itself never throws on malformed input. Its output is not yet
 * normalized: use {@link tokens} for a stream with structural guarantees.
 *
 * @module lexer
 */

import type { Token, TokenKind } from "../types/token.js";
import {
	checkUtf8,
	decodeInput,
	decodeLiteral,
	splitIndent,
	splitLines,
	splitLiteral,
	trimStartHorizontal,
} from "./scanner.js";

const TRAILING_WHITESPACE = /[ \t\r\n]+$/;

/**
 * State of a `"""` value being captured.
 */
interface MultilineCapture {
	/** Line of the hint, then of the first captured line. */
	line: number;
	/** Indentation shared by all captured lines, fixed by the first of them. */
	prefix?: string;
	value: string;
}

/**
 * Create a token, leaving `error` unset when there is none.
 */
export function createToken(kind: TokenKind, content: string, line: number, error?: string): Token {
	return error === undefined ? { kind, content, line } : { kind, content, line, error };
}

/**
 * Iterator over the raw tokens of a document.
 *
 * Each call to `next()` consumes as many lines as it takes to produce one
 * token. The iterator is single-pass.
 */
export class Lexer implements IterableIterator<Token> {
	private readonly lines: string[];
	private lineIndex = 0;
	private readonly queue: Token[] = [];
	private readonly stack: string[] = [""];
	private multiline?: MultilineCapture;
	private finished = false;

	constructor(input: string | Uint8Array) {
		this.lines = splitLines(decodeInput(input));
	}

	[Symbol.iterator](): IterableIterator<Token> {
		return this;
	}

	next(): IteratorResult<Token> {
		for (;;) {
			const token = this.queue.shift();
			if (token) {
				return { done: false, value: token };
			}
			if (this.finished) {
				return { done: true, value: undefined };
			}
			this.advance();
		}
	}

	private advance(): void {
		if (this.lineIndex >= this.lines.length) {
			this.finish();
			return;
		}
		const content = this.lines[this.lineIndex];
		this.lineIndex++;
		this.scanLine(content, this.lineIndex);
	}

	private finish(): void {
		this.finished = true;
		const capture = this.multiline;
		if (!capture) {
			return;
		}
		this.multiline = undefined;
		if (capture.prefix === undefined) {
			this.emit("MultilineScalar", "", capture.line, "missing multiline value");
		} else {
			this.emitMultiline(capture);
		}
	}

	private top(): string {
		return this.stack[this.stack.length - 1];
	}

	private emit(kind: TokenKind, content: string, line: number, error?: string): void {
		this.queue.push(createToken(kind, content, line, error));
	}

	private emitComment(text: string, line: number): void {
		this.emit("Comment", text, line, checkUtf8(text));
	}

	private emitMultiline(capture: MultilineCapture): void {
		const content = capture.value.replace(TRAILING_WHITESPACE, "");
		this.emit("MultilineScalar", content, capture.line, checkUtf8(content));
	}

	/**
	 * Feed a line to the pending multiline capture.
	 *
	 * @returns True when the line belongs to the captured value
	 */
	private captureLine(capture: MultilineCapture, content: string, indent: string, rest: string, line: number): boolean {
		if (capture.prefix === undefined) {
			if (rest === "") {
				return true;
			}
			const top = this.top();
			if (indent.startsWith(top) && indent !== top) {
				capture.prefix = indent;
				capture.value = rest;
				capture.line = line;
				return true;
			}
			this.multiline = undefined;
			this.emit("MultilineScalar", "", capture.line, "missing multiline value");
			return false;
		}

		if (content.startsWith(capture.prefix)) {
			capture.value += "\n" + content.slice(capture.prefix.length);
			return true;
		}
		if (rest === "") {
			capture.value += "\n";
			return true;
		}
		this.multiline = undefined;
		this.emitMultiline(capture);
		return false;
	}

	private scanLine(content: string, line: number): void {
		const [indent, text] = splitIndent(content);

		if (this.multiline && this.captureLine(this.multiline, content, indent, text, line)) {
			return;
		}
		if (text === "") {
			return;
		}
		if (text.startsWith(";")) {
			this.emitComment(text.slice(1), line);
			return;
		}

		while (!indent.startsWith(this.top())) {
			this.stack.pop();
			this.emit("Outdent", "", line);
		}
		if (indent !== this.top()) {
			this.stack.push(indent);
			this.emit("Indent", indent, line);
		}

		let rest: string;
		if (text.startsWith("=")) {
			this.emit("ListItem", "", line);
			rest = trimStartHorizontal(text.slice(1));
		} else {
			const [key, after] = splitLiteral(text, true);
			const decoded = decodeLiteral(key);
			this.emit("MapKey", decoded.content, line, decoded.error);
			rest = trimStartHorizontal(after);
			if (rest.startsWith("=")) {
				rest = trimStartHorizontal(rest.slice(1));
			}
		}

		if (rest.startsWith(";")) {
			this.emitComment(rest.slice(1), line);
			return;
		}

		if (rest.startsWith('"""')) {
			const [hint, after] = splitLiteral(rest.slice(3), false);
			const content = trimStartHorizontal(hint);
			const error = content.startsWith('"') ? "characters after quotes" : checkUtf8(content);
			this.emit("MultilineHint", content, line, error);
			this.multiline = { line, value: "" };
			if (after.startsWith(";")) {
				this.emitComment(after.slice(1), line);
			}
			return;
		}

		const [value, after] = splitLiteral(rest, false);
		if (value !== "") {
			const decoded = decodeLiteral(value);
			this.emit("Scalar", decoded.content, line, decoded.error);
		}
		if (after.startsWith(";")) {
			this.emitComment(after.slice(1), line);
		}
	}
}
