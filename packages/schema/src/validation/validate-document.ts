/**
 * @title Document Validation
 * @description Validates a document against the schema it names.
 *
 * A document names its schema with a root `schema` key. The loader turns
 * that name into a schema; documents without one are given the loader an
 * empty name, so it can supply a schema chosen another way.
 *
 * @module validation
 */

import { getErrorMessage, logMessage, parseDocument, type ConlDocument } from "@conl/parser";
import { defaultSchema } from "../schema/default-schema.js";
import type { Schema } from "../schema/schema.js";
import type { ValidationResult } from "./result.js";
import { ROOT_POSITION, type Issue } from "./validation-error.js";

/**
 * Finds the schema for a name. Returns undefined to use the default schema
 * and throws when the named schema cannot be used.
 */
export type SchemaLoader = (name: string) => Schema | undefined;

/**
 * Name of the root key that selects a document's schema.
 */
export const SCHEMA_KEY = "schema";

/**
 * Read the schema name a document declares, or "" when it declares none.
 */
export function schemaName(document: ConlDocument): string {
	if (document.root.kind !== "map") {
		return "";
	}
	const entry = document.root.entries.find((candidate) => candidate.key.content === SCHEMA_KEY);
	return entry?.value.kind === "scalar" ? entry.value.token.content : "";
}

/**
 * Validate a document against the schema it names.
 *
 * When loading fails, the failure is reported on the first line and the
 * document is checked against the default schema instead.
 */
export function validateDocument(input: string | Uint8Array | ConlDocument, loadSchema?: SchemaLoader): ValidationResult {
	const document = typeof input === "string" || input instanceof Uint8Array ? parseDocument(input) : input;
	const issues: Issue[] = [];
	let schema: Schema | undefined;

	if (loadSchema && !document.isEmpty()) {
		const name = schemaName(document);
		try {
			schema = loadSchema(name);
		} catch (error) {
			const message = getErrorMessage(error);
			logMessage(`Failed to load schema "${name}": ${message}`, "warn");
			issues.push({ position: ROOT_POSITION, detail: { kind: "decode", message } });
		}
	}

	return (schema ?? defaultSchema()).validate(document, issues);
}
