/**
 * @title Suggestions
 * @description Completion candidates derived from recorded attempts.
 *
 * Only patterns that are a plain alternation of literals can be offered;
 * anything with metacharacters cannot be enumerated and is skipped.
 *
 * @module validation
 */

import _ from "lodash";
import type { Matcher } from "../types/schema.js";
import { literalAlternatives } from "./patterns.js";
import type { Attempt } from "./validate.js";

/**
 * A completion candidate.
 */
export interface Suggestion {
	value: string;
	docs?: string;
}

/** Suggested when a list could start at a position. */
export const LIST_ITEM_SUGGESTION = "=";

/**
 * Documentation of a matcher, falling back to the definition it refers to.
 */
export function matcherDocs(matcher: Matcher): string | undefined {
	if (matcher.docs !== undefined) {
		return matcher.docs;
	}
	return matcher.kind === "reference" ? matcher.definition?.docs : undefined;
}

function suggestion(value: string, docs: string | undefined): Suggestion {
	return docs === undefined ? { value } : { value, docs };
}

function literalSuggestions(matcher: Matcher, docs: string | undefined): Suggestion[] {
	if (matcher.kind !== "pattern") {
		return [];
	}
	return (literalAlternatives(matcher.source) ?? [])
		.filter((literal) => literal !== "")
		.map((literal) => suggestion(literal, docs));
}

function sortSuggestions(suggestions: Suggestion[]): Suggestion[] {
	return _.uniqBy(_.sortBy(suggestions, (candidate) => candidate.value), (candidate) => candidate.value);
}

/**
 * Keys that the map definitions attempted at a value would accept.
 *
 * @param attempts - Attempts recorded at the value
 * @param present - Keys already in the map, which are left out
 */
export function keySuggestions(attempts: readonly Attempt[], present: ReadonlySet<string>): Suggestion[] {
	const suggestions: Suggestion[] = [];

	for (const attempt of attempts) {
		if (attempt.kind !== "definition") {
			continue;
		}
		const definition = attempt.definition;
		if (definition.shape === "keys") {
			for (const rule of [...definition.requiredKeys, ...definition.keys]) {
				const docs = rule.key.docs ?? matcherDocs(rule.value);
				suggestions.push(...literalSuggestions(rule.key, docs).filter((candidate) => !present.has(candidate.value)));
			}
		} else if (definition.shape === "items") {
			suggestions.push(suggestion(LIST_ITEM_SUGGESTION, definition.docs));
		}
	}

	return sortSuggestions(suggestions);
}

/**
 * Scalars that the patterns attempted at a value would accept.
 */
export function valueSuggestions(attempts: readonly Attempt[]): Suggestion[] {
	const suggestions = attempts.flatMap((attempt) =>
		attempt.kind === "pattern" ? literalSuggestions(attempt.matcher, attempt.matcher.docs) : [],
	);
	return sortSuggestions(suggestions);
}
