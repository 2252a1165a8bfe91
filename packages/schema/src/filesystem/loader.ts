/**
 * @title Schema Loader Module
 * @description Resolves schema names to schema files on disk.
 *
 * @module filesystem
 */

import { getConfig } from "@conl/parser";
import { SchemaError } from "../errors.js";
import type { Schema } from "../schema/schema.js";
import type { SchemaLoader } from "../validation/validate-document.js";
import { SchemaCache } from "./schema-cache.js";
import { findSchemaFile, isValidSchemaName } from "./schema-file.js";

/**
 * Options for creating a schema loader.
 */
export interface SchemaLoaderOptions {
	/** Directories to search. Defaults to `CONL_SCHEMA_PATH`. */
	directories?: readonly string[];
	/** Cache to share between loaders. */
	cache?: SchemaCache;
}

/**
 * Create a loader that finds `<name>.schema.conl` in a list of directories.
 *
 * An empty name selects the default schema. A name with no schema file, or
 * whose file cannot be parsed, is an error.
 */
export function createSchemaLoader(options: SchemaLoaderOptions = {}): SchemaLoader {
	const directories = options.directories ?? getConfig().schemaPath;
	const cache = options.cache ?? new SchemaCache();

	return (name: string): Schema | undefined => {
		if (name === "") {
			return undefined;
		}
		if (!isValidSchemaName(name)) {
			throw new SchemaError(`invalid schema name "${name}"`);
		}

		const schemaPath = findSchemaFile(directories, name);
		if (!schemaPath) {
			throw new SchemaError(`schema "${name}" not found`);
		}

		const schema = cache.get(schemaPath);
		if (!schema) {
			throw new SchemaError(cache.getError(schemaPath) ?? `schema "${name}" could not be loaded`, { schemaPath });
		}
		return schema;
	};
}
