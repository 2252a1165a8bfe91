/**
 * @title Schema File Module
 * @description Finding and parsing `<name>.schema.conl` files.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { getErrorMessage } from "@conl/parser";
import { SchemaError } from "../errors.js";
import { parseSchema } from "../schema/parse.js";
import type { Schema } from "../schema/schema.js";

/** Suffix of schema file names. */
export const SCHEMA_FILE_SUFFIX = ".schema.conl";

/**
 * Check that a schema name can be used as a file name.
 */
export function isValidSchemaName(name: string): boolean {
	return name !== "" && name !== "." && name !== ".." && !/[/\\]/.test(name);
}

/**
 * Find the schema file for a name, searching directories in order.
 *
 * @param directories - Directories to search
 * @param name - Schema name, without the suffix
 * @returns Path to the schema file or null if not found
 */
export function findSchemaFile(directories: readonly string[], name: string): string | null {
	if (!isValidSchemaName(name)) {
		return null;
	}
	for (const directory of directories) {
		const schemaPath = path.join(directory, `${name}${SCHEMA_FILE_SUFFIX}`);
		if (fs.existsSync(schemaPath)) {
			return schemaPath;
		}
	}
	return null;
}

/**
 * Parse a schema file from a path.
 *
 * @param schemaPath - Full path to the schema file
 * @returns Resolved schema
 * @throws SchemaError if reading or parsing fails
 */
export function parseSchemaFile(schemaPath: string): Schema {
	let content: Buffer;
	try {
		content = fs.readFileSync(schemaPath);
	} catch (error) {
		throw new SchemaError(`Failed to read schema file: ${getErrorMessage(error)}`, { schemaPath, cause: error });
	}

	try {
		return parseSchema(content);
	} catch (error) {
		if (error instanceof SchemaError) {
			throw new SchemaError(error.message, { line: error.line, schemaPath, cause: error });
		}
		throw new SchemaError(`Failed to parse schema: ${getErrorMessage(error)}`, { schemaPath, cause: error });
	}
}
