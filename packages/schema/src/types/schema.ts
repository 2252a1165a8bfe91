/**
 * @title Schema Types
 * @description Matchers and definitions making up a schema.
 *
 * A schema is a root matcher plus a table of named definitions. Matchers
 * refer to definitions by name and are bound to them once, when the schema
 * is resolved.
 *
 * @module types
 */

/**
 * A regular expression that must match a whole scalar.
 */
export interface PatternMatcher {
	kind: "pattern";
	/** The expression as written in the schema. */
	source: string;
	/** Compiled, anchored expression. */
	regexp: RegExp;
	docs?: string;
	line: number;
}

/**
 * A reference to a definition, written `<name>`, or a definition written
 * in place.
 */
export interface ReferenceMatcher {
	kind: "reference";
	/** Definition name, or a label describing an inline definition. */
	name: string;
	/** True for a definition written in place of a matcher. */
	inline: boolean;
	docs?: string;
	line: number;
	/** Bound during resolution; set from the start for inline definitions. */
	definition?: Definition;
}

export type Matcher = PatternMatcher | ReferenceMatcher;

/**
 * A key matcher and the matcher for its value.
 */
export interface KeyRule {
	key: Matcher;
	value: Matcher;
}

/**
 * Progress of a definition through resolution.
 */
export type Resolution = "resolving" | "resolved";

interface DefinitionBase {
	name: string;
	docs?: string;
	line: number;
	resolution?: Resolution;
}

export interface ScalarDefinition extends DefinitionBase {
	shape: "scalar";
	matcher: Matcher;
}

export interface OneOfDefinition extends DefinitionBase {
	shape: "oneOf";
	choices: Matcher[];
}

export interface KeysDefinition extends DefinitionBase {
	shape: "keys";
	keys: KeyRule[];
	requiredKeys: KeyRule[];
}

export interface ItemsDefinition extends DefinitionBase {
	shape: "items";
	items?: Matcher;
	requiredItems: Matcher[];
}

/** Matches only a missing value. */
export interface EmptyDefinition extends DefinitionBase {
	shape: "empty";
}

export type Definition = ScalarDefinition | OneOfDefinition | KeysDefinition | ItemsDefinition | EmptyDefinition;

export type DefinitionShape = Definition["shape"];

/**
 * Describe a matcher the way it is written in a schema.
 */
export function describeMatcher(matcher: Matcher): string {
	if (matcher.kind === "pattern") {
		return matcher.source;
	}
	return matcher.inline ? matcher.name : `<${matcher.name}>`;
}

/**
 * Label an inline definition by what it accepts.
 */
export function describeShape(shape: DefinitionShape): string {
	switch (shape) {
		case "scalar":
			return "a scalar";
		case "oneOf":
			return "one of several values";
		case "keys":
			return "a map";
		case "items":
			return "a list";
		case "empty":
			return "no value";
	}
}
