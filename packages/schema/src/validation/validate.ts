/**
 * @title Validation Engine
 * @description Matches a document tree against schema definitions.
 *
 * Validation walks the document and the schema together. Every definition,
 * pattern and key rule tried against a value is recorded as an attempt at
 * that value's position, whether or not it matched, so that suggestions and
 * documentation can be looked up afterwards. Problems are returned as issues
 * and only rendered into errors at the end.
 *
 * @module validation
 */

import type { ConlDocument, Entry, Token, Value } from "@conl/parser";
import { SchemaError } from "../errors.js";
import {
	describeMatcher,
	describeShape,
	type Definition,
	type ItemsDefinition,
	type KeyRule,
	type KeysDefinition,
	type Matcher,
	type PatternMatcher,
	type ReferenceMatcher,
} from "../types/schema.js";
import { patternCandidates } from "./patterns.js";
import { pickIssues } from "./ranking.js";
import { positionKey, ROOT_POSITION, type Issue, type IssueDetail, type Position } from "./validation-error.js";

/**
 * A definition tried against the value at a position.
 */
export interface DefinitionAttempt {
	kind: "definition";
	definition: Definition;
	/** The reference that led here. */
	matcher: ReferenceMatcher;
	ok: boolean;
}

/**
 * A pattern tried against the value at a position.
 */
export interface PatternAttempt {
	kind: "pattern";
	matcher: PatternMatcher;
	ok: boolean;
}

/**
 * The key rule that accepted the key at a position.
 */
export interface KeyAttempt {
	kind: "key";
	rule: KeyRule;
}

export type Attempt = DefinitionAttempt | PatternAttempt | KeyAttempt;

/**
 * Attempts recorded during a validation, by position.
 */
export type AttemptMap = Map<string, Attempt[]>;

function issue(position: Position, detail: IssueDetail): Issue {
	return { position, detail };
}

function expected(position: Position, ...candidates: string[]): Issue[] {
	return [issue(position, { kind: "expected", candidates })];
}

function keyPosition(entry: Entry): Position {
	return { line: entry.key.line, isKey: true };
}

function valuePosition(entry: Entry): Position {
	return { line: entry.key.line, isKey: false };
}

/**
 * Matches values against matchers, recording attempts as it goes.
 */
export class Validator {
	/**
	 * @param attempts - Where to record attempts; key checks that only need an
	 * answer pass nothing.
	 */
	constructor(private readonly attempts?: AttemptMap) {}

	private record(position: Position, attempt: Attempt): void {
		if (!this.attempts) {
			return;
		}
		const key = positionKey(position);
		const list = this.attempts.get(key);
		if (list) {
			list.push(attempt);
		} else {
			this.attempts.set(key, [attempt]);
		}
	}

	/**
	 * Validate a value against a matcher.
	 *
	 * @returns Issues found; empty when the value matches
	 */
	validateMatcher(matcher: Matcher, value: Value, position: Position): Issue[] {
		// A value that failed to decode is still walked for its attempts, but
		// only the decode problem is reported.
		const decodeError = value.kind === "scalar" ? value.token.error : undefined;
		const decodeIssues = decodeError === undefined ? [] : [issue(position, { kind: "decode", message: decodeError })];

		if (matcher.kind === "pattern") {
			if (decodeError !== undefined) {
				this.record(position, { kind: "pattern", matcher, ok: false });
				return decodeIssues;
			}
			return this.validatePattern(matcher, value, position);
		}
		if (!matcher.definition) {
			throw new SchemaError(`${describeMatcher(matcher)} has not been resolved`, { line: matcher.line });
		}
		const issues = this.validateDefinition(matcher.definition, value, position);
		const ok = decodeError === undefined && issues.length === 0;
		this.record(position, { kind: "definition", definition: matcher.definition, matcher, ok });
		return decodeError === undefined ? issues : decodeIssues;
	}

	private validatePattern(matcher: PatternMatcher, value: Value, position: Position): Issue[] {
		let issues: Issue[];
		switch (value.kind) {
			case "scalar":
				issues = matcher.regexp.test(value.token.content)
					? []
					: expected(position, ...patternCandidates(matcher.source));
				break;
			case "empty":
				issues = expected(position, ...patternCandidates(matcher.source));
				break;
			case "map":
			case "list":
				issues = expected(position, "any scalar");
				break;
		}
		this.record(position, { kind: "pattern", matcher, ok: issues.length === 0 });
		return issues;
	}

	private validateDefinition(definition: Definition, value: Value, position: Position): Issue[] {
		switch (definition.shape) {
			case "scalar":
				if (value.kind === "map" || value.kind === "list") {
					return expected(position, "any scalar");
				}
				return this.validateMatcher(definition.matcher, value, position);

			case "oneOf": {
				// Every choice is tried so that each one leaves attempts behind.
				let best: Issue[] | undefined;
				for (const choice of definition.choices) {
					const issues = this.validateMatcher(choice, value, position);
					best = best ? pickIssues(best, issues) : issues;
				}
				return best ?? [];
			}

			case "keys":
				if (value.kind === "scalar" || value.kind === "list") {
					return expected(position, describeShape("keys"));
				}
				return this.validateKeys(definition, value.kind === "map" ? value.entries : [], position);

			case "items":
				if (value.kind === "scalar" || value.kind === "map") {
					return expected(position, describeShape("items"));
				}
				return this.validateItems(definition, value.kind === "list" ? value.entries : [], position);

			case "empty":
				return value.kind === "empty" ? [] : expected(position, describeShape("empty"));
		}
	}

	private keyMatches(matcher: Matcher, key: Token): boolean {
		const check = new Validator();
		return check.validateMatcher(matcher, { kind: "scalar", token: key }, { line: key.line, isKey: true }).length === 0;
	}

	private validateKeys(definition: KeysDefinition, entries: readonly Entry[], position: Position): Issue[] {
		const issues: Issue[] = [];
		const seenKeys = new Set<string>();
		const seenRules = new Set<KeyRule>();

		for (const entry of entries) {
			const key = entry.key;
			if (key.error !== undefined) {
				issues.push(issue(keyPosition(entry), { kind: "decode", message: key.error }));
				// No rule can claim the key, so the value is tried against each of
				// them for its attempts alone.
				for (const rule of [...definition.requiredKeys, ...definition.keys]) {
					this.validateMatcher(rule.value, entry.value, valuePosition(entry));
				}
				continue;
			}
			if (seenKeys.has(key.content)) {
				issues.push(issue(keyPosition(entry), { kind: "duplicate", description: key.content }));
				continue;
			}
			seenKeys.add(key.content);

			const required = definition.requiredKeys.find((rule) => this.keyMatches(rule.key, key));
			if (required && seenRules.has(required)) {
				issues.push(issue(keyPosition(entry), { kind: "duplicate", description: describeMatcher(required.key) }));
				continue;
			}
			const rule = required ?? definition.keys.find((candidate) => this.keyMatches(candidate.key, key));
			if (!rule) {
				issues.push(issue(keyPosition(entry), { kind: "unexpected", description: `key ${key.content}` }));
				continue;
			}

			seenRules.add(rule);
			this.record(keyPosition(entry), { kind: "key", rule });
			issues.push(...this.validateMatcher(rule.value, entry.value, valuePosition(entry)));
		}

		const missing = definition.requiredKeys.filter((rule) => !seenRules.has(rule));
		if (missing.length > 0) {
			issues.push(
				issue(position, {
					kind: "missingKey",
					candidates: missing.flatMap((rule) =>
						rule.key.kind === "pattern" ? patternCandidates(rule.key.source) : [describeMatcher(rule.key)],
					),
				}),
			);
		}
		return issues;
	}

	private validateItems(definition: ItemsDefinition, entries: readonly Entry[], position: Position): Issue[] {
		const issues: Issue[] = [];

		entries.forEach((entry, index) => {
			if (entry.key.error !== undefined) {
				issues.push(issue(keyPosition(entry), { kind: "decode", message: entry.key.error }));
				return;
			}
			const matcher = index < definition.requiredItems.length ? definition.requiredItems[index] : definition.items;
			if (!matcher) {
				issues.push(issue(keyPosition(entry), { kind: "unexpected", description: "list item" }));
				return;
			}
			issues.push(...this.validateMatcher(matcher, entry.value, valuePosition(entry)));
		});

		if (entries.length < definition.requiredItems.length) {
			issues.push(
				issue(position, {
					kind: "missingItem",
					description: describeMatcher(definition.requiredItems[entries.length]),
				}),
			);
		}
		return issues;
	}
}

/**
 * Validate a document against a root matcher.
 *
 * Decode problems anywhere in the document are always reported, including
 * those under entries that the schema rejected.
 *
 * @returns Every issue found and the attempts recorded along the way
 */
export function validateDocumentTree(root: Matcher, document: ConlDocument): { issues: Issue[]; attempts: AttemptMap } {
	const attempts: AttemptMap = new Map();
	const issues = new Validator(attempts).validateMatcher(root, document.root, ROOT_POSITION);

	const reported = new Set(
		issues.flatMap((found) => (found.detail.kind === "decode" ? [positionKey(found.position)] : [])),
	);
	for (const site of document.decodeErrors()) {
		const position = { line: site.line, isKey: site.isKey };
		if (!reported.has(positionKey(position))) {
			reported.add(positionKey(position));
			issues.push(issue(position, { kind: "decode", message: site.message }));
		}
	}

	return { issues, attempts };
}
