/**
 * @title Meta-Schema
 * @description The schema describing schema files.
 *
 * Editors validate schema files against it to offer completions for
 * `root`, `definitions` and the keys of each definition.
 *
 * @module schema
 */

import { loadBundledSchema } from "./bundled.js";
import type { DocumentInput, Schema } from "./schema.js";
import type { ValidationResult } from "../validation/result.js";

let cached: Schema | undefined;

/**
 * The schema for schema files. Built on first use.
 */
export function metaSchema(): Schema {
	cached ??= loadBundledSchema("schema.schema.conl");
	return cached;
}

/**
 * Check the structure of a schema file without resolving it.
 */
export function validateSchemaSource(input: DocumentInput): ValidationResult {
	return metaSchema().validate(input);
}
