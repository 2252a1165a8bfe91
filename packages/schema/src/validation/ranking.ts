/**
 * @title Ranking
 * @description Choosing between the problems of competing alternatives.
 *
 * When several alternatives fail, the one that got furthest is most likely
 * what the author meant. These heuristics may change as they improve; the
 * ones here are:
 *
 * 1. The set whose first problem is on a later line wins.
 * 2. Otherwise, the set touching more positions wins. This counts distinct
 *    positions rather than total problems, so repeated expectations at one
 *    position do not outweigh progress elsewhere.
 * 3. Otherwise both sets are kept, so their expectations merge into one
 *    message such as "expected false or true".
 *
 * @module validation
 */

import _ from "lodash";
import { positionKey, type Issue } from "./validation-error.js";

function firstLine(issues: readonly Issue[]): number {
	return _.min(issues.map((issue) => issue.position.line)) ?? 0;
}

function positionCount(issues: readonly Issue[]): number {
	return new Set(issues.map((issue) => positionKey(issue.position))).size;
}

/**
 * Pick the more plausible of two failing alternatives.
 */
export function pickIssues(a: Issue[], b: Issue[]): Issue[] {
	if (a.length === 0 || b.length === 0) {
		return a.length === 0 ? a : b;
	}

	const lineA = firstLine(a);
	const lineB = firstLine(b);
	if (lineA !== lineB) {
		return lineA > lineB ? a : b;
	}

	const countA = positionCount(a);
	const countB = positionCount(b);
	if (countA !== countB) {
		return countA > countB ? a : b;
	}

	return [...a, ...b];
}
