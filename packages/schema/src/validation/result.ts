/**
 * @title Validation Result
 * @description The outcome of validating a document.
 *
 * A result keeps the document, the schema and everything attempted during
 * validation, so that errors, suggestions and documentation can be queried
 * repeatedly without validating again.
 *
 * @module validation
 */

import type { ConlDocument } from "@conl/parser";
import type { Schema } from "../schema/schema.js";
import { keySuggestions, matcherDocs, valueSuggestions, type Suggestion } from "./suggestions.js";
import type { Attempt, AttemptMap } from "./validate.js";
import { buildErrors, positionKey, type Issue, type Position, type ValidationError } from "./validation-error.js";

export class ValidationResult {
	private readonly errorList: readonly ValidationError[];

	constructor(
		readonly document: ConlDocument,
		readonly schema: Schema,
		issues: readonly Issue[],
		private readonly attempts: AttemptMap,
	) {
		this.errorList = buildErrors(issues);
	}

	/**
	 * Check whether the document matched without any problem.
	 */
	valid(): boolean {
		return this.errorList.length === 0;
	}

	/**
	 * Problems found, ordered by line with keys before values.
	 */
	errors(): ValidationError[] {
		return [...this.errorList];
	}

	/**
	 * Everything tried against the key or value at a position.
	 */
	attemptsAt(position: Position): readonly Attempt[] {
		return this.attempts.get(positionKey(position)) ?? [];
	}

	private valueAttempts(line: number): readonly Attempt[] {
		return this.attemptsAt({ line, isKey: false });
	}

	/**
	 * Keys that could be added to the value of the entry on `line`
	 * (0 for the document root), excluding keys already present.
	 * A list marker (`=`) is included when a list would be accepted.
	 */
	suggestedKeys(line: number): Suggestion[] {
		const value = this.document.valueAt(line);
		const present = new Set(value?.kind === "map" ? value.entries.map((entry) => entry.key.content) : []);
		return keySuggestions(this.valueAttempts(line), present);
	}

	/**
	 * Scalars that would be accepted as the value of the entry on `line`.
	 */
	suggestedValues(line: number): Suggestion[] {
		return valueSuggestions(this.valueAttempts(line));
	}

	/**
	 * Check whether the value of the entry on `line` may be a map or a list.
	 */
	allowsNesting(line: number): boolean {
		return this.valueAttempts(line).some(
			(attempt) =>
				attempt.kind === "definition" &&
				(attempt.definition.shape === "keys" || attempt.definition.shape === "items"),
		);
	}

	/**
	 * Documentation for what the key or value on `line` matched.
	 */
	docsAt(line: number, isKey: boolean): string | undefined {
		if (isKey) {
			for (const attempt of this.attemptsAt({ line, isKey: true })) {
				if (attempt.kind === "key") {
					return attempt.rule.key.docs ?? matcherDocs(attempt.rule.value);
				}
			}
			return undefined;
		}

		for (const attempt of this.valueAttempts(line)) {
			if (attempt.kind === "pattern" && attempt.ok && attempt.matcher.docs !== undefined) {
				return attempt.matcher.docs;
			}
			if (attempt.kind === "definition" && attempt.ok) {
				const docs = matcherDocs(attempt.matcher);
				if (docs !== undefined) {
					return docs;
				}
			}
		}
		return undefined;
	}
}
