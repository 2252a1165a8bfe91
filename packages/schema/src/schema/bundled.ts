/**
 * @title Bundled Schemas
 * @description Schemas shipped in the package's `schemas` directory.
 *
 * @module schema
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { SchemaError } from "../errors.js";
import { parseSchema } from "./parse.js";
import type { Schema } from "./schema.js";

/**
 * Path of a schema shipped with the package.
 */
export function bundledSchemaPath(fileName: string): string {
	return fileURLToPath(new URL(`../../schemas/${fileName}`, import.meta.url));
}

/**
 * Read and parse a schema shipped with the package.
 *
 * @throws {SchemaError} When the file is missing or invalid
 */
export function loadBundledSchema(fileName: string): Schema {
	const schemaPath = bundledSchemaPath(fileName);
	let content: Buffer;
	try {
		content = fs.readFileSync(schemaPath);
	} catch (error) {
		throw new SchemaError(`Failed to read bundled schema ${fileName}`, { schemaPath, cause: error });
	}
	return parseSchema(content);
}
