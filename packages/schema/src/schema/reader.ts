/**
 * @title Schema Reader
 * @description Reads schema documents into matchers and definitions.
 *
 * A schema is itself a CONL document:
 *
 * ```
 * root = <config>
 * definitions
 *   config
 *     docs = Application settings
 *     required keys
 *       name = \w+
 *     keys
 *       port = <port>
 *   port
 *     scalar = [0-9]+
 * ```
 *
 * `root` is a matcher. Each definition has at most one shape: `scalar`,
 * `one of`, `keys` and/or `required keys`, or `items` and/or
 * `required items`; a definition with none matches only a missing value.
 *
 * A matcher is `<name>` for a reference, any other scalar for a regular
 * expression (write `\<` for a leading `<`), a map with `matches` and
 * `docs` for a documented matcher, or a definition written in place.
 *
 * @module schema
 */

import { getErrorMessage, type ConlDocument, type Entry, type Value } from "@conl/parser";
import { SchemaError } from "../errors.js";
import { describeShape, type Definition, type KeyRule, type Matcher } from "../types/schema.js";
import { compilePattern } from "../validation/patterns.js";

/**
 * The parts of a schema, before resolution.
 */
export interface SchemaSource {
	root: Matcher;
	definitions: Map<string, Definition>;
}

function fail(line: number, message: string): never {
	throw new SchemaError(`${line}: ${message}`, { line });
}

function uniqueEntries(entries: readonly Entry[]): readonly Entry[] {
	const seen = new Set<string>();
	for (const entry of entries) {
		if (seen.has(entry.key.content)) {
			fail(entry.key.line, `duplicate key ${entry.key.content}`);
		}
		seen.add(entry.key.content);
	}
	return entries;
}

function mapEntries(entry: Entry): readonly Entry[] {
	switch (entry.value.kind) {
		case "map":
			return uniqueEntries(entry.value.entries);
		case "empty":
			return [];
		default:
			return fail(entry.key.line, `expected a map for ${entry.key.content}`);
	}
}

function listEntries(entry: Entry): readonly Entry[] {
	if (entry.value.kind !== "list") {
		return fail(entry.key.line, `expected a list for ${entry.key.content}`);
	}
	return entry.value.entries;
}

function readText(entry: Entry): string {
	switch (entry.value.kind) {
		case "scalar":
			return entry.value.token.content;
		case "empty":
			return "";
		default:
			return fail(entry.key.line, `expected text for ${entry.key.content}`);
	}
}

/**
 * Read a matcher written as a scalar: `<name>` or a regular expression.
 */
export function parseMatcherText(text: string, line: number): Matcher {
	if (text.startsWith("<")) {
		if (text.length < 2 || !text.endsWith(">")) {
			fail(line, `missing closing > in ${text}`);
		}
		return { kind: "reference", name: text.slice(1, -1), inline: false, line };
	}

	let regexp: RegExp;
	try {
		regexp = compilePattern(text);
	} catch (error) {
		throw new SchemaError(`${line}: invalid pattern ${text}: ${getErrorMessage(error)}`, { line, cause: error });
	}
	return { kind: "pattern", source: text, regexp, line };
}

function readDocumentedMatcher(entries: readonly Entry[], line: number): Matcher | undefined {
	const matches = entries.find((field) => field.key.content === "matches");
	if (!matches) {
		return undefined;
	}

	let docs: string | undefined;
	for (const field of entries) {
		if (field.key.content === "docs") {
			docs = readText(field);
		} else if (field.key.content !== "matches") {
			fail(field.key.line, `unexpected key ${field.key.content}`);
		}
	}
	if (matches.value.kind !== "scalar") {
		return fail(matches.key.line, "expected a scalar for matches");
	}

	const matcher = parseMatcherText(matches.value.token.content, line);
	if (docs !== undefined) {
		matcher.docs = docs;
	}
	return matcher;
}

function readMatcher(entry: Entry): Matcher {
	const line = entry.key.line;
	const value = entry.value;

	if (value.kind === "scalar") {
		return parseMatcherText(value.token.content, line);
	}
	if (value.kind === "list") {
		return fail(line, "expected a matcher, not a list");
	}

	const documented = value.kind === "map" ? readDocumentedMatcher(uniqueEntries(value.entries), line) : undefined;
	if (documented) {
		return documented;
	}

	const definition = readDefinition(value, `definition on line ${line}`, line);
	definition.name = describeShape(definition.shape);
	return { kind: "reference", name: definition.name, inline: true, line, definition };
}

function readKeyRules(entry: Entry): KeyRule[] {
	return mapEntries(entry).map((rule) => ({
		key: parseMatcherText(rule.key.content, rule.key.line),
		value: readMatcher(rule),
	}));
}

/**
 * Read a single definition.
 *
 * @param value - The definition's value in the schema document
 * @param name - Name used in messages
 * @param line - Line of the definition
 */
export function readDefinition(value: Value, name: string, line: number): Definition {
	if (value.kind === "empty") {
		return { shape: "empty", name, line };
	}
	if (value.kind !== "map") {
		return fail(line, `expected a map for ${name}`);
	}

	let docs: string | undefined;
	let scalar: Matcher | undefined;
	let oneOf: Matcher[] | undefined;
	let keys: KeyRule[] | undefined;
	let requiredKeys: KeyRule[] | undefined;
	let items: Matcher | undefined;
	let requiredItems: Matcher[] | undefined;

	for (const field of uniqueEntries(value.entries)) {
		switch (field.key.content) {
			case "docs":
				docs = readText(field);
				break;
			case "scalar":
				scalar = readMatcher(field);
				break;
			case "one of":
				oneOf = listEntries(field).map(readMatcher);
				break;
			case "keys":
				keys = readKeyRules(field);
				break;
			case "required keys":
				requiredKeys = readKeyRules(field);
				break;
			case "items":
				items = readMatcher(field);
				break;
			case "required items":
				requiredItems = listEntries(field).map(readMatcher);
				break;
			default:
				fail(field.key.line, `unexpected key ${field.key.content}`);
		}
	}

	const shapes = [scalar, oneOf, keys ?? requiredKeys, items ?? requiredItems].filter((shape) => shape !== undefined);
	if (shapes.length > 1) {
		throw new SchemaError(
			`invalid schema: ${name} must have only one of scalar, one of, (required) keys, or (required) items`,
			{ line },
		);
	}

	if (scalar) {
		return { shape: "scalar", name, docs, line, matcher: scalar };
	}
	if (oneOf) {
		return { shape: "oneOf", name, docs, line, choices: oneOf };
	}
	if (keys || requiredKeys) {
		return { shape: "keys", name, docs, line, keys: keys ?? [], requiredKeys: requiredKeys ?? [] };
	}
	if (items || requiredItems) {
		return { shape: "items", name, docs, line, items, requiredItems: requiredItems ?? [] };
	}
	return { shape: "empty", name, docs, line };
}

/**
 * Read a parsed schema document.
 *
 * @throws {SchemaError} When the document has decode errors or is not a
 * well-formed schema
 */
export function readSchema(document: ConlDocument): SchemaSource {
	const [decodeError] = document.decodeErrors();
	if (decodeError) {
		fail(decodeError.line, decodeError.message);
	}

	const root = document.root;
	if (root.kind === "list" || root.kind === "scalar") {
		fail(1, "expected a map");
	}

	let rootMatcher: Matcher | undefined;
	const definitions = new Map<string, Definition>();

	for (const entry of uniqueEntries(root.kind === "map" ? root.entries : [])) {
		switch (entry.key.content) {
			case "root":
				rootMatcher = readMatcher(entry);
				break;
			case "definitions":
				for (const definition of mapEntries(entry)) {
					const name = definition.key.content;
					definitions.set(name, readDefinition(definition.value, name, definition.key.line));
				}
				break;
			default:
				fail(entry.key.line, `unexpected key ${entry.key.content}`);
		}
	}

	if (!rootMatcher) {
		throw new SchemaError('invalid schema: missing "root"');
	}
	return { root: rootMatcher, definitions };
}
