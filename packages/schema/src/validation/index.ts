/**
 * @title Validation Module
 * @description Barrel export for document validation and suggestions.
 *
 * @module validation
 */

export { compilePattern, literalAlternatives, patternCandidates } from "./patterns.js";

export {
	ROOT_POSITION,
	ValidationError,
	buildErrors,
	displayLine,
	joinWithOr,
	positionKey,
	splitLine,
	type Issue,
	type IssueDetail,
	type Position,
} from "./validation-error.js";

export { pickIssues } from "./ranking.js";

export {
	Validator,
	validateDocumentTree,
	type Attempt,
	type AttemptMap,
	type DefinitionAttempt,
	type KeyAttempt,
	type PatternAttempt,
} from "./validate.js";

export { LIST_ITEM_SUGGESTION, keySuggestions, matcherDocs, valueSuggestions, type Suggestion } from "./suggestions.js";

export { ValidationResult } from "./result.js";

export { SCHEMA_KEY, schemaName, validateDocument, type SchemaLoader } from "./validate-document.js";
