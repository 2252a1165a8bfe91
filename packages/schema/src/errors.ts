/**
 * @title Errors
 * @description Error types for @conl/schema.
 *
 * @module errors
 */

import { ConlError } from "@conl/parser";

/**
 * Error when reading, resolving or loading a schema fails.
 */
export class SchemaError extends ConlError {
	/** 1-based line in the schema document, when known. */
	readonly line?: number;
	/** Path to the schema file. */
	readonly schemaPath?: string;

	constructor(message: string, options?: { line?: number; schemaPath?: string; cause?: unknown }) {
		super(message, "SCHEMA_ERROR", {
			suggestion: options?.schemaPath ? `Check the schema file at: ${options.schemaPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "SchemaError";
		this.line = options?.line;
		this.schemaPath = options?.schemaPath;
	}
}
