/**
 * Public type exports for @conl/schema.
 */

export {
	describeMatcher,
	describeShape,
	type Definition,
	type DefinitionShape,
	type EmptyDefinition,
	type ItemsDefinition,
	type KeyRule,
	type KeysDefinition,
	type Matcher,
	type OneOfDefinition,
	type PatternMatcher,
	type ReferenceMatcher,
	type Resolution,
	type ScalarDefinition,
} from "./schema.js";
