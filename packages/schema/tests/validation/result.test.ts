import { describe, it, expect } from "vitest";
import { parseSchema } from "../../src/schema/parse.js";

const SETTINGS_SCHEMA = [
	"root",
	"  keys",
	"    name = <name>",
	"    color",
	"      matches = red|green|blue",
	"      docs = Display colour",
	"    tags = <tags>",
	"definitions",
	"  name",
	"    docs = Your name",
	"    scalar = .+",
	"  tags",
	"    docs = A list of tags",
	"    items = \\w+",
].join("\n");

describe("ValidationResult", () => {
	const schema = parseSchema(SETTINGS_SCHEMA);

	it("lists errors and validity", () => {
		const result = schema.validate("name = Ann\ncolor = pink");

		expect(result.valid()).toBe(false);
		expect(result.errors().map(String)).toEqual(["2: expected blue, green or red"]);
	});

	it("returns a copy of the errors", () => {
		const result = schema.validate("color = pink");

		result.errors().pop();

		expect(result.errors()).toHaveLength(1);
	});

	it("suggests keys that are not present yet", () => {
		const result = schema.validate("name = Ann\ncolor = pink");

		expect(result.suggestedKeys(0)).toEqual([{ value: "tags", docs: "A list of tags" }]);
	});

	it("suggests values with the matcher's docs", () => {
		const result = schema.validate("name = Ann\ncolor = pink");

		expect(result.suggestedValues(2)).toEqual([
			{ value: "blue", docs: "Display colour" },
			{ value: "green", docs: "Display colour" },
			{ value: "red", docs: "Display colour" },
		]);
		expect(result.suggestedValues(1)).toEqual([]);
	});

	it("suggests starting a list where one is accepted", () => {
		const result = schema.validate("tags");

		expect(result.valid()).toBe(true);
		expect(result.suggestedKeys(1)).toEqual([{ value: "=", docs: "A list of tags" }]);
		expect(result.allowsNesting(1)).toBe(true);
	});

	it("reports where nesting is allowed", () => {
		const result = schema.validate("name = Ann");

		expect(result.allowsNesting(0)).toBe(true);
		expect(result.allowsNesting(1)).toBe(false);
		expect(result.suggestedKeys(1)).toEqual([]);
	});

	it("finds docs for keys and values", () => {
		const result = schema.validate("name = Ann\ncolor = red");

		expect(result.docsAt(1, true)).toBe("Your name");
		expect(result.docsAt(1, false)).toBe("Your name");
		expect(result.docsAt(2, true)).toBe("Display colour");
		expect(result.docsAt(2, false)).toBe("Display colour");
		expect(result.docsAt(3, false)).toBeUndefined();
	});

	it("suggests every alternative of a choice, with docs where given", () => {
		const choice = parseSchema(
			[
				"root",
				"  keys",
				"    mode",
				"      one of",
				"        =",
				"          matches = a",
				"          docs = Hello!",
				"        = b",
			].join("\n"),
		);
		const result = choice.validate("mode = c");

		expect(result.errors().map(String)).toEqual(["1: expected a or b"]);
		expect(result.suggestedValues(1)).toEqual([{ value: "a", docs: "Hello!" }, { value: "b" }]);
	});

	it("suggests alternatives even after one has matched", () => {
		const bool = parseSchema(
			["root", "  keys", "    flag = <bool>", "definitions", "  bool", "    one of", "      = true", "      = false"].join(
				"\n",
			),
		);
		const result = bool.validate("flag = true");

		expect(result.valid()).toBe(true);
		expect(result.suggestedValues(1).map((suggestion) => suggestion.value)).toEqual(["false", "true"]);
	});

	it("suggests values for a value that does not decode", () => {
		const result = schema.validate('color = "re');

		expect(result.errors().map(String)).toEqual(["1: unclosed quotes"]);
		expect(result.suggestedValues(1)).toEqual([
			{ value: "blue", docs: "Display colour" },
			{ value: "green", docs: "Display colour" },
			{ value: "red", docs: "Display colour" },
		]);
	});

	it("suggests keys under a key that does not decode", () => {
		const server = parseSchema(
			["root", "  keys", "    server = <server>", "definitions", "  server", "    keys", "      host = .*", "      port = [0-9]+"].join(
				"\n",
			),
		);
		const result = server.validate('"server');

		expect(result.errors().map(String)).toEqual(["1: unclosed quotes"]);
		expect(result.suggestedKeys(1)).toEqual([{ value: "host" }, { value: "port" }]);
		expect(result.allowsNesting(1)).toBe(true);
	});
});
