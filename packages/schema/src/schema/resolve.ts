/**
 * @title Schema Resolution
 * @description Binds references to definitions and rejects cycles.
 *
 * A definition may refer to itself through a map or a list, since each
 * level of nesting consumes part of the document. It may not refer to
 * itself through `scalar` or `one of` alone, as validating it would never
 * make progress.
 *
 * @module schema
 */

import { SchemaError } from "../errors.js";
import type { Definition, Matcher } from "../types/schema.js";

/**
 * What resolution needs from a schema.
 */
export interface SchemaTable {
	root: Matcher;
	definitions: ReadonlyMap<string, Definition>;
}

/**
 * Matchers checked against the same value as the definition itself.
 */
function directMatchers(definition: Definition): Matcher[] {
	switch (definition.shape) {
		case "scalar":
			return [definition.matcher];
		case "oneOf":
			return definition.choices;
		default:
			return [];
	}
}

/**
 * Matchers checked against keys or nested values.
 */
function nestedMatchers(definition: Definition): Matcher[] {
	switch (definition.shape) {
		case "keys":
			return [...definition.requiredKeys, ...definition.keys].flatMap((rule) => [rule.key, rule.value]);
		case "items":
			return definition.items ? [...definition.requiredItems, definition.items] : definition.requiredItems;
		default:
			return [];
	}
}

function bindReferences(schema: SchemaTable): void {
	const queue: Definition[] = [...schema.definitions.values()];

	const bind = (matcher: Matcher): void => {
		if (matcher.kind === "pattern") {
			return;
		}
		if (!matcher.definition) {
			const definition = schema.definitions.get(matcher.name);
			if (!definition) {
				throw new SchemaError(`<${matcher.name}> is not defined`, { line: matcher.line });
			}
			matcher.definition = definition;
		}
		if (matcher.inline) {
			queue.push(matcher.definition);
		}
	};

	bind(schema.root);
	for (let definition = queue.pop(); definition; definition = queue.pop()) {
		directMatchers(definition).forEach(bind);
		nestedMatchers(definition).forEach(bind);
	}
}

function checkCycles(schema: SchemaTable): void {
	const pending: Definition[] = [];

	const enqueue = (matcher: Matcher): void => {
		if (matcher.kind === "reference" && matcher.definition) {
			pending.push(matcher.definition);
		}
	};

	const visit = (definition: Definition): void => {
		if (definition.resolution !== undefined) {
			return;
		}
		definition.resolution = "resolving";
		for (const matcher of directMatchers(definition)) {
			if (matcher.kind !== "reference" || !matcher.definition) {
				continue;
			}
			if (matcher.definition.resolution === "resolving") {
				throw new SchemaError(`<${matcher.name}> is defined in terms of itself`, { line: matcher.line });
			}
			visit(matcher.definition);
		}
		definition.resolution = "resolved";
		nestedMatchers(definition).forEach(enqueue);
	};

	enqueue(schema.root);
	pending.push(...schema.definitions.values());
	for (let definition = pending.pop(); definition; definition = pending.pop()) {
		visit(definition);
	}
}

/**
 * Bind every reference in a schema and check it for cycles.
 *
 * Resolving an already resolved schema does nothing.
 *
 * @throws {SchemaError} When a reference names no definition, or a
 * definition refers to itself without nesting
 */
export function resolveSchema(schema: SchemaTable): void {
	bindReferences(schema);
	checkCycles(schema);
}
