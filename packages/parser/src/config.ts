/**
 * @title Configuration Module
 * @description Configuration from environment variables.
 *
 * CONL tooling reads its settings from the environment so that libraries,
 * editors and scripts embedding it share one source of configuration.
 *
 * @module config
 *
 * @envvar CONL_LOG_LEVEL - Most verbose log level written: error, warn, info or debug (default: warn).
 * @envvar CONL_SCHEMA_PATH - Directories searched for `<name>.schema.conl` files, separated by the
 * platform path delimiter (":" on POSIX, ";" on Windows).
 *
 * @example Verbose logging while debugging schema loading
 * ```bash
 * export CONL_LOG_LEVEL=debug
 * ```
 *
 * @example Searching two schema directories
 * ```bash
 * export CONL_SCHEMA_PATH=./schemas:/usr/share/conl/schemas
 * ```
 */

import * as path from "node:path";

/** Log levels, ordered from least to most verbose. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

/**
 * Severity of a log message.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Level used when CONL_LOG_LEVEL is unset or unrecognised. */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Resolved configuration.
 */
export interface ConlConfig {
	/** Most verbose level that is written to the log output. */
	logLevel: LogLevel;
	/** Directories searched for schema files, in order. */
	schemaPath: string[];
}

/**
 * Type guard for log level names.
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value: string | undefined): LogLevel {
	const level = value?.trim().toLowerCase();
	return level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
}

function parseSchemaPath(value: string | undefined): string[] {
	if (!value) {
		return [];
	}

	return value
		.split(path.delimiter)
		.map((directory) => directory.trim())
		.filter((directory) => directory.length > 0);
}

/**
 * Read configuration from environment variables.
 *
 * @returns Resolved configuration
 */
export function getConfig(): ConlConfig {
	return {
		logLevel: parseLogLevel(process.env["CONL_LOG_LEVEL"]),
		schemaPath: parseSchemaPath(process.env["CONL_SCHEMA_PATH"]),
	};
}
