/**
 * @conl/parser - Tokenizer and document model for CONL.
 *
 * This library provides functionality for:
 * - Decoding literals and detecting invalid UTF-8
 * - Raw tokenization and a normalized, error-tolerant token stream
 * - An immutable document tree with line lookups
 * - Shared error types, logging and configuration
 */

// Error exports
export { ConlError, ParseError, getErrorMessage, type ConlErrorOptions } from "./errors.js";

// Configuration exports
export {
	DEFAULT_LOG_LEVEL,
	LOG_LEVELS,
	getConfig,
	isLogLevel,
	type ConlConfig,
	type LogLevel,
} from "./config.js";

// Logging exports
export { logMessage, logMessageDebounced, resetLogLevelCache, setLogOutput, type LogOutputChannel } from "./log.js";

// Type exports
export * from "./types/index.js";

// Lexer exports
export * from "./lexer/index.js";

// Document exports
export * from "./document/index.js";
