import * as fs from "node:fs";
import { describe, it, expect } from "vitest";
import { bundledSchemaPath } from "../../src/schema/bundled.js";
import { defaultSchema } from "../../src/schema/default-schema.js";
import { metaSchema, validateSchemaSource } from "../../src/schema/meta-schema.js";

const META_SCHEMA_SOURCE = fs.readFileSync(bundledSchemaPath("schema.schema.conl"));
const ANY_SCHEMA_SOURCE = fs.readFileSync(bundledSchemaPath("any.schema.conl"));

describe("metaSchema", () => {
	it("describes itself", () => {
		expect(metaSchema().validate(META_SCHEMA_SOURCE).errors().map(String)).toEqual([]);
	});

	it("accepts the default schema", () => {
		expect(validateSchemaSource(ANY_SCHEMA_SOURCE).errors().map(String)).toEqual([]);
	});

	it("is built once", () => {
		expect(metaSchema()).toBe(metaSchema());
	});

	it("reports structural problems in schema files", () => {
		const result = validateSchemaSource("definitions\n  a = <b>\n");

		expect(result.errors().map(String)).toEqual(["1: missing required key root", "2: expected a map"]);
	});

	it("suggests the keys of a definition", () => {
		const result = validateSchemaSource("root = <a>\ndefinitions\n  a\n    docs = x\n");

		expect(result.suggestedKeys(3).map((suggestion) => suggestion.value)).toEqual([
			"items",
			"keys",
			"one of",
			"required items",
			"required keys",
			"scalar",
		]);
		expect(result.suggestedKeys(0).map((suggestion) => suggestion.value)).toEqual([]);
	});
});

describe("defaultSchema", () => {
	it("accepts any document", () => {
		expect(defaultSchema().validate(META_SCHEMA_SOURCE).valid()).toBe(true);
		expect(defaultSchema().validate(ANY_SCHEMA_SOURCE).valid()).toBe(true);
		expect(defaultSchema().validate("= a\n=\n  b = c\n  d\n=").valid()).toBe(true);
	});

	it("still reports decode errors", () => {
		expect(defaultSchema().validate('a = "\\q"').errors().map(String)).toEqual(["1: invalid escape code: \\q"]);
	});

	it("is built once", () => {
		expect(defaultSchema()).toBe(defaultSchema());
	});
});
