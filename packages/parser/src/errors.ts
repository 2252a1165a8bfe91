/**
 * @title Errors
 * @description Error types for @conl/parser.
 *
 * Provides typed error classes for failures that are thrown rather than
 * reported inline on tokens.
 *
 * @module errors
 */

/**
 * Options for constructing a ConlError.
 */
export interface ConlErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all CONL errors.
 */
export class ConlError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: ConlErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "ConlError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error when the token stream breaks one of its structural guarantees.
 *
 * Malformed documents never raise this: they produce error-flagged tokens.
 * It signals a token sequence that did not come from the normalizer.
 */
export class ParseError extends ConlError {
	/** 1-based line of the offending token, when known. */
	readonly line?: number;

	constructor(message: string, options?: { line?: number; cause?: unknown }) {
		super(message, "PARSE_ERROR", {
			suggestion: "Build documents from the stream returned by tokens()",
			cause: options?.cause,
		});
		this.name = "ParseError";
		this.line = options?.line;
	}
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
