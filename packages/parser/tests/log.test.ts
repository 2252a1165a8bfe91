import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logMessage, logMessageDebounced, resetLogLevelCache, setLogOutput } from "../src/log.js";

describe("logMessage", () => {
	const originalEnv = process.env;
	const appendLine = vi.fn<(message: string) => void>();

	beforeEach(() => {
		process.env = { ...originalEnv };
		delete process.env["CONL_LOG_LEVEL"];
		resetLogLevelCache();
		appendLine.mockReset();
		setLogOutput({ appendLine });
	});

	afterEach(() => {
		process.env = originalEnv;
		resetLogLevelCache();
		setLogOutput();
		vi.useRealTimers();
	});

	it("writes warnings and errors at the default level", () => {
		logMessage("careful", "warn");
		logMessage("broken", "error");
		logMessage("fyi");

		expect(appendLine.mock.calls).toEqual([["careful"], ["broken"]]);
	});

	it("honours CONL_LOG_LEVEL", () => {
		process.env["CONL_LOG_LEVEL"] = "debug";
		resetLogLevelCache();

		logMessage("details", "debug");

		expect(appendLine).toHaveBeenCalledWith("details");
	});

	it("caches the level until reset", () => {
		logMessage("hidden", "info");
		process.env["CONL_LOG_LEVEL"] = "info";
		logMessage("still hidden", "info");
		resetLogLevelCache();
		logMessage("shown", "info");

		expect(appendLine.mock.calls).toEqual([["shown"]]);
	});

	it("debounces bursts of messages", () => {
		vi.useFakeTimers();

		logMessageDebounced("first", "warn");
		logMessageDebounced("second", "warn");
		expect(appendLine).not.toHaveBeenCalled();

		vi.advanceTimersByTime(1000);

		expect(appendLine.mock.calls).toEqual([["second"]]);
	});
});
