/**
 * @title Validation Errors
 * @description Problems found while validating a document, and how they are
 * rendered as messages and located on a line.
 *
 * @module validation
 */

import _ from "lodash";
import { trimEndHorizontal, trimStartHorizontal } from "@conl/parser";

/**
 * A coordinate in a document: the key or the value of the entry starting on
 * `line`. Line 0 is the document root.
 */
export interface Position {
	line: number;
	isKey: boolean;
}

/** The document root. */
export const ROOT_POSITION: Position = Object.freeze({ line: 0, isKey: false });

/**
 * What went wrong at a position.
 */
export type IssueDetail =
	| { kind: "decode"; message: string }
	| { kind: "expected"; candidates: string[] }
	| { kind: "missingKey"; candidates: string[] }
	| { kind: "missingItem"; description: string }
	| { kind: "unexpected"; description: string }
	| { kind: "duplicate"; description: string };

/**
 * A single problem, before problems at one position are combined.
 */
export interface Issue {
	position: Position;
	detail: IssueDetail;
}

const PRIORITY: Record<IssueDetail["kind"], number> = {
	decode: 4,
	duplicate: 3,
	unexpected: 3,
	missingKey: 2,
	missingItem: 2,
	expected: 1,
};

/**
 * Key identifying a position in maps.
 */
export function positionKey(position: Position): string {
	return `${position.line}:${position.isKey ? "key" : "value"}`;
}

/**
 * Line shown to users; the root reports as line 1.
 */
export function displayLine(position: Position): number {
	return position.line === 0 ? 1 : position.line;
}

/**
 * Join alternatives as "a, b or c".
 */
export function joinWithOr(items: readonly string[]): string {
	if (items.length <= 1) {
		return items.join("");
	}
	return `${items.slice(0, -1).join(", ")} or ${items[items.length - 1]}`;
}

function sortedUnique(items: readonly string[]): string[] {
	return _.sortedUniq([...items].sort());
}

const QUOTED_LITERAL = /^"(?:[^\\"]|\\.)*"/;

function maskQuoted(text: string): string {
	return text.replace(QUOTED_LITERAL, (quoted) => "a".repeat(quoted.length));
}

/**
 * Locate the parts of a line.
 *
 * @returns Offsets of the start and end of the key (or list marker), the
 * start and end of the value, and the start of the comment
 */
export function splitLine(line: string): [startKey: number, endKey: number, startValue: number, endValue: number, startComment: number] {
	let trimmed = trimStartHorizontal(line);
	const startKey = line.length - trimmed.length;
	trimmed = maskQuoted(trimmed);

	let endKey: number;
	let startValue = line.length;
	const separator = trimmed.search(/[=;]/);
	if (trimmed.startsWith("=")) {
		endKey = startKey + 1;
		startValue = endKey;
	} else if (separator > -1) {
		endKey = startKey + trimEndHorizontal(trimmed.slice(0, separator)).length;
		startValue = trimmed[separator] === "=" ? startKey + separator + 1 : startKey + separator;
	} else {
		endKey = startKey + trimEndHorizontal(trimmed).length;
	}

	const valueHalf = line.slice(startValue);
	trimmed = trimStartHorizontal(valueHalf);
	startValue += valueHalf.length - trimmed.length;
	trimmed = maskQuoted(trimmed);

	let endValue: number;
	let startComment = line.length;
	const comment = trimmed.indexOf(";");
	if (comment > -1) {
		endValue = startValue + trimEndHorizontal(trimmed.slice(0, comment)).length;
		startComment = startValue + comment;
	} else {
		endValue = startValue + trimEndHorizontal(trimmed).length;
	}

	return [startKey, endKey, startValue, endValue, startComment];
}

/**
 * A rendered validation problem at one position.
 */
export class ValidationError {
	constructor(
		readonly position: Position,
		readonly detail: IssueDetail,
	) {}

	/** 1-based line on which the problem occurred. */
	get line(): number {
		return displayLine(this.position);
	}

	/** Whether the problem concerns a key (or list marker) rather than a value. */
	get isKey(): boolean {
		return this.position.isKey;
	}

	/** Human-readable description of the problem. */
	get message(): string {
		const detail = this.detail;
		switch (detail.kind) {
			case "decode":
				return detail.message;
			case "expected":
				return `expected ${joinWithOr(detail.candidates)}`;
			case "missingKey":
				return `missing required key ${joinWithOr(detail.candidates)}`;
			case "missingItem":
				return `missing required list item ${detail.description}`;
			case "unexpected":
				return `unexpected ${detail.description}`;
			case "duplicate":
				return `duplicate key ${detail.description}`;
		}
	}

	/**
	 * The 0-based `[start, end)` range to highlight, given the text of the
	 * error's line.
	 */
	range(lineText: string): [start: number, end: number] {
		const [startKey, endKey, startValue, endValue] = splitLine(lineText);
		if (this.position.line === 0) {
			return [startKey, endValue];
		}
		if (this.position.isKey || startValue === endValue) {
			return [startKey, endKey];
		}
		return [startValue, endValue];
	}

	toString(): string {
		return `${this.line}: ${this.message}`;
	}
}

function combine(issues: readonly Issue[]): IssueDetail {
	const details = issues.map((issue) => issue.detail);
	const top = _.maxBy(details, (detail) => PRIORITY[detail.kind]) ?? details[0];
	const ranked = details.filter((detail) => PRIORITY[detail.kind] === PRIORITY[top.kind]);

	const missingKeys = ranked.flatMap((detail) => (detail.kind === "missingKey" ? detail.candidates : []));
	if (missingKeys.length > 0) {
		return { kind: "missingKey", candidates: sortedUnique(missingKeys) };
	}
	const expected = ranked.flatMap((detail) => (detail.kind === "expected" ? detail.candidates : []));
	if (expected.length > 0) {
		return { kind: "expected", candidates: sortedUnique(expected) };
	}
	return top;
}

function compareErrors(a: ValidationError, b: ValidationError): number {
	return (
		a.line - b.line ||
		Number(b.position.isKey) - Number(a.position.isKey) ||
		a.position.line - b.position.line
	);
}

/**
 * Turn raw issues into one error per position, ordered by line with keys
 * before values.
 *
 * At each position only the most severe kind of problem is kept: decode
 * errors, then duplicate or unexpected entries, then missing entries, then
 * mismatches. Alternatives are merged, sorted and de-duplicated.
 */
export function buildErrors(issues: readonly Issue[]): ValidationError[] {
	const grouped = _.groupBy(issues, (issue) => positionKey(issue.position));
	return Object.values(grouped)
		.map((group) => new ValidationError(group[0].position, combine(group)))
		.sort(compareErrors);
}
