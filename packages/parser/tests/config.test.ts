import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { getConfig, isLogLevel } from "../src/config.js";

describe("getConfig", () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
		delete process.env["CONL_LOG_LEVEL"];
		delete process.env["CONL_SCHEMA_PATH"];
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	it("returns defaults when nothing is set", () => {
		expect(getConfig()).toEqual({ logLevel: "warn", schemaPath: [] });
	});

	it("reads the log level case-insensitively", () => {
		process.env["CONL_LOG_LEVEL"] = " Debug ";

		expect(getConfig().logLevel).toBe("debug");
	});

	it("falls back to warn for unknown levels", () => {
		process.env["CONL_LOG_LEVEL"] = "verbose";

		expect(getConfig().logLevel).toBe("warn");
	});

	it("splits the schema path on the platform delimiter", () => {
		process.env["CONL_SCHEMA_PATH"] = ["/etc/conl", "", " ./schemas "].join(path.delimiter);

		expect(getConfig().schemaPath).toEqual(["/etc/conl", "./schemas"]);
	});
});

describe("isLogLevel", () => {
	it("recognises level names", () => {
		expect(isLogLevel("info")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
	});
});
