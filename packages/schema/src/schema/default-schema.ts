/**
 * @title Default Schema
 * @description The schema used when a document names none.
 *
 * Accepts any document, so only decode problems are reported.
 *
 * @module schema
 */

import { loadBundledSchema } from "./bundled.js";
import type { Schema } from "./schema.js";

let cached: Schema | undefined;

/**
 * The schema that accepts any document. Built on first use.
 */
export function defaultSchema(): Schema {
	cached ??= loadBundledSchema("any.schema.conl");
	return cached;
}
