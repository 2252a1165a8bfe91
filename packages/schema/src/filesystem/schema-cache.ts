/**
 * @title Schema Cache Module
 * @description In-memory cache for parsed schema files.
 *
 * Provides lazy-loading schema caching without file watchers; callers that
 * watch files invalidate entries themselves.
 *
 * @module filesystem
 */

import { getErrorMessage, logMessage, logMessageDebounced } from "@conl/parser";
import type { Schema } from "../schema/schema.js";
import { parseSchemaFile } from "./schema-file.js";

/**
 * Cache for parsed schemas, keyed by file path.
 * Schemas are loaded lazily on first access.
 */
export class SchemaCache {
	private cache = new Map<string, Schema>();
	private errors = new Map<string, string>();

	/**
	 * Get the schema stored at a path.
	 * Loads and caches the schema on first access.
	 *
	 * @param schemaPath - Path to the schema file
	 * @returns Parsed schema or null if it could not be loaded
	 */
	get(schemaPath: string): Schema | null {
		const cached = this.cache.get(schemaPath);
		if (cached) {
			return cached;
		}

		try {
			const schema = parseSchemaFile(schemaPath);
			this.errors.delete(schemaPath);
			this.cache.set(schemaPath, schema);
			logMessage(`Loaded schema ${schemaPath}`, "debug");
			return schema;
		} catch (error) {
			const message = getErrorMessage(error);
			this.errors.set(schemaPath, message);
			logMessage(`Failed to load schema ${schemaPath}: ${message}`, "warn");
			return null;
		}
	}

	/**
	 * Get the load error for a schema path, if any.
	 *
	 * @param schemaPath - Path to the schema file
	 * @returns Error message or null if no error occurred
	 */
	getError(schemaPath: string): string | null {
		return this.errors.get(schemaPath) ?? null;
	}

	/**
	 * Check whether a schema is cached for the given path.
	 *
	 * @param schemaPath - Path to the schema file
	 * @returns True if a schema is cached
	 */
	has(schemaPath: string): boolean {
		return this.cache.has(schemaPath);
	}

	/**
	 * Invalidate the cached schema for a path.
	 *
	 * @param schemaPath - Path to the schema file
	 */
	invalidate(schemaPath: string): void {
		this.cache.delete(schemaPath);
		this.errors.delete(schemaPath);
		logMessageDebounced(`Schema cache invalidated: ${schemaPath}`, "debug");
	}

	/**
	 * Invalidate all cached schemas.
	 */
	invalidateAll(): void {
		this.cache.clear();
		this.errors.clear();
		logMessageDebounced("Schema cache cleared", "debug");
	}
}
