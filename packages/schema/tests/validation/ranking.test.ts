import { describe, it, expect } from "vitest";
import { pickIssues } from "../../src/validation/ranking.js";
import type { Issue } from "../../src/validation/validation-error.js";

function expected(line: number, candidate: string, isKey = false): Issue {
	return { position: { line, isKey }, detail: { kind: "expected", candidates: [candidate] } };
}

describe("pickIssues", () => {
	it("prefers success", () => {
		expect(pickIssues([], [expected(1, "a")])).toEqual([]);
		expect(pickIssues([expected(1, "a")], [])).toEqual([]);
	});

	it("prefers the alternative whose first problem is later", () => {
		const early = [expected(1, "a"), expected(5, "b")];
		const late = [expected(3, "c")];

		expect(pickIssues(early, late)).toBe(late);
		expect(pickIssues(late, early)).toBe(late);
	});

	it("prefers the alternative touching more positions", () => {
		const one = [expected(2, "a"), expected(2, "b")];
		const two = [expected(2, "c"), expected(2, "d", true)];

		expect(pickIssues(one, two)).toBe(two);
	});

	it("keeps both on a tie", () => {
		const a = [expected(2, "a")];
		const b = [expected(2, "b")];

		expect(pickIssues(a, b)).toEqual([...a, ...b]);
	});
});
