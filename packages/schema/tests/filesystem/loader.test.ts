import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resetLogLevelCache, setLogOutput } from "@conl/parser";
import { SchemaCache } from "../../src/filesystem/schema-cache.js";
import { createSchemaLoader } from "../../src/filesystem/loader.js";
import { validateDocument } from "../../src/validation/validate-document.js";

const SETTINGS_SCHEMA = ["root", "  keys", "    schema = settings", "    port = [0-9]+", ""].join("\n");

describe("createSchemaLoader", () => {
	const originalEnv = process.env;
	let tempDir: string;

	beforeEach(() => {
		process.env = { ...originalEnv };
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "conl-schema-loader-test-"));
		fs.writeFileSync(path.join(tempDir, "settings.schema.conl"), SETTINGS_SCHEMA);
		fs.writeFileSync(path.join(tempDir, "broken.schema.conl"), "root = <missing>\n");
		resetLogLevelCache();
		setLogOutput({ appendLine: vi.fn() });
	});

	afterEach(() => {
		process.env = originalEnv;
		fs.rmSync(tempDir, { recursive: true, force: true });
		setLogOutput();
		resetLogLevelCache();
	});

	it("returns undefined for an empty name", () => {
		expect(createSchemaLoader({ directories: [tempDir] })("")).toBeUndefined();
	});

	it("loads schemas by name and caches them", () => {
		const cache = new SchemaCache();
		const loadSchema = createSchemaLoader({ directories: [tempDir], cache });

		const schema = loadSchema("settings");

		expect(schema).toBeDefined();
		expect(loadSchema("settings")).toBe(schema);
		expect(cache.has(path.join(tempDir, "settings.schema.conl"))).toBe(true);
	});

	it("rejects unknown, unsafe and broken schemas", () => {
		const loadSchema = createSchemaLoader({ directories: [tempDir] });

		expect(() => loadSchema("nope")).toThrow('schema "nope" not found');
		expect(() => loadSchema("a/b")).toThrow('invalid schema name "a/b"');
		expect(() => loadSchema("broken")).toThrow("<missing> is not defined");
	});

	it("searches CONL_SCHEMA_PATH by default", () => {
		process.env["CONL_SCHEMA_PATH"] = [path.join(tempDir, "absent"), tempDir].join(path.delimiter);

		expect(createSchemaLoader()("settings")).toBeDefined();
	});

	it("drives validateDocument", () => {
		const loadSchema = createSchemaLoader({ directories: [tempDir] });

		expect(validateDocument("schema = settings\nport = 8080", loadSchema).valid()).toBe(true);
		expect(validateDocument("schema = settings\nport = http", loadSchema).errors().map(String)).toEqual([
			"2: expected [0-9]+",
		]);
		expect(validateDocument("schema = other\nport = http", loadSchema).errors().map(String)).toEqual([
			'1: schema "other" not found',
		]);
	});
});
