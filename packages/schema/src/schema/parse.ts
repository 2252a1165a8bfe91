/**
 * @title Schema Parsing
 * @description Builds a resolved schema from schema text.
 *
 * @module schema
 */

import { parseDocument } from "@conl/parser";
import { readSchema } from "./reader.js";
import { Schema } from "./schema.js";

/**
 * Parse and resolve a schema.
 *
 * @param input - Schema text or bytes
 * @throws {SchemaError} When the schema cannot be read or resolved
 */
export function parseSchema(input: string | Uint8Array): Schema {
	const { root, definitions } = readSchema(parseDocument(input));
	return new Schema(root, definitions);
}
