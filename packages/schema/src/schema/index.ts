/**
 * @title Schema Module
 * @description Barrel export for reading and resolving schemas.
 *
 * @module schema
 */

export { parseMatcherText, readDefinition, readSchema, type SchemaSource } from "./reader.js";
export { resolveSchema, type SchemaTable } from "./resolve.js";
export { Schema, type DocumentInput } from "./schema.js";
export { parseSchema } from "./parse.js";
export { defaultSchema } from "./default-schema.js";
export { metaSchema, validateSchemaSource } from "./meta-schema.js";
export { bundledSchemaPath, loadBundledSchema } from "./bundled.js";
