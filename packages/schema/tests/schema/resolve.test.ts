import { describe, it, expect } from "vitest";
import { SchemaError } from "../../src/errors.js";
import { parseSchema } from "../../src/schema/parse.js";
import { resolveSchema } from "../../src/schema/resolve.js";

function schemaText(lines: string[]): string {
	return lines.join("\n");
}

describe("resolveSchema", () => {
	it("binds references to their definitions", () => {
		const schema = parseSchema(schemaText(["root = <a>", "definitions", "  a", "    scalar = <b>", "  b", "    scalar = x"]));
		const a = schema.definitions.get("a");
		const b = schema.definitions.get("b");

		expect(schema.root.kind === "reference" && schema.root.definition).toBe(a);
		expect(a?.shape === "scalar" && a.matcher.kind === "reference" && a.matcher.definition).toBe(b);
		expect(a?.resolution).toBe("resolved");
		expect(b?.resolution).toBe("resolved");
	});

	it("rejects references to missing definitions", () => {
		expect(() => parseSchema("root = <missing>")).toThrow("<missing> is not defined");
		expect(() => parseSchema(schemaText(["root", "  keys", "    a = <nope>"]))).toThrow("<nope> is not defined");
	});

	it("reports the line of a missing reference", () => {
		try {
			parseSchema(schemaText(["root", "  keys", "    a = <nope>"]));
			expect.unreachable();
		} catch (error) {
			expect(error instanceof SchemaError && error.line).toBe(3);
		}
	});

	it("rejects definitions defined in terms of themselves", () => {
		expect(() => parseSchema(schemaText(["root = <a>", "definitions", "  a", "    scalar = <a>"]))).toThrow(
			"<a> is defined in terms of itself",
		);
		expect(() =>
			parseSchema(
				schemaText(["root = <a>", "definitions", "  a", "    scalar = <b>", "  b", "    one of", "      = x", "      = <a>"]),
			),
		).toThrow(/is defined in terms of itself/);
	});

	it("allows recursion through maps and lists", () => {
		const schema = parseSchema(
			schemaText(["root = <tree>", "definitions", "  tree", "    keys", "      .* = <tree>", "  chain", "    items = <chain>"]),
		);

		expect(schema.validate("a\n  b\n    c").valid()).toBe(true);
		expect(schema.validate("a\n  b = leaf").errors().map(String)).toEqual(["2: expected a map"]);
	});

	it("does nothing for a resolved schema", () => {
		const schema = parseSchema(schemaText(["root = <a>", "definitions", "  a", "    keys", "      b = <a>"]));
		const a = schema.definitions.get("a");

		resolveSchema(schema);

		expect(schema.definitions.get("a")).toBe(a);
		expect(a?.resolution).toBe("resolved");
		expect(schema.validate("b\n  b").valid()).toBe(true);
	});
});
