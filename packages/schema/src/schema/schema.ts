/**
 * @title Schema
 * @description A resolved schema, ready to validate documents.
 *
 * @module schema
 */

import { ConlDocument, parseDocument } from "@conl/parser";
import type { Definition, Matcher } from "../types/schema.js";
import { ValidationResult } from "../validation/result.js";
import { validateDocumentTree } from "../validation/validate.js";
import type { Issue } from "../validation/validation-error.js";
import { resolveSchema } from "./resolve.js";

/**
 * Input accepted for validation: raw text, raw bytes or a parsed document.
 */
export type DocumentInput = string | Uint8Array | ConlDocument;

export class Schema {
	readonly definitions: ReadonlyMap<string, Definition>;

	/**
	 * @throws {SchemaError} When the definitions do not resolve
	 */
	constructor(
		readonly root: Matcher,
		definitions: ReadonlyMap<string, Definition> = new Map(),
	) {
		this.definitions = definitions;
		resolveSchema(this);
	}

	/**
	 * Validate a document.
	 *
	 * @param input - Document text, bytes or a parsed document
	 * @param extraIssues - Problems found before validation, reported with
	 * the rest
	 */
	validate(input: DocumentInput, extraIssues: readonly Issue[] = []): ValidationResult {
		const document = input instanceof ConlDocument ? input : parseDocument(input);
		const { issues, attempts } = validateDocumentTree(this.root, document);
		return new ValidationResult(document, this, [...extraIssues, ...issues], attempts);
	}
}
