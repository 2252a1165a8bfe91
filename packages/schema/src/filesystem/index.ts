/**
 * Filesystem module exports.
 */

export { SCHEMA_FILE_SUFFIX, findSchemaFile, isValidSchemaName, parseSchemaFile } from "./schema-file.js";

export { SchemaCache } from "./schema-cache.js";

export { createSchemaLoader, type SchemaLoaderOptions } from "./loader.js";
