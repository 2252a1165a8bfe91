/**
 * @conl/schema - Schemas for CONL documents.
 *
 * This library provides functionality for:
 * - Schema types (matchers and definitions)
 * - Schema reading and resolution (references and cycle checks)
 * - Document validation with line-accurate error messages
 * - Key and value suggestions with documentation for editors
 * - Schema files on disk (lookup, lazy-loading cache, loader)
 */

// Error exports
export { SchemaError } from "./errors.js";

// Type exports
export * from "./types/index.js";

// Schema exports
export * from "./schema/index.js";

// Validation exports
export * from "./validation/index.js";

// Filesystem exports
export * from "./filesystem/index.js";
