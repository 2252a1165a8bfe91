/**
 * Document exports for @conl/parser.
 */

export {
	ConlDocument,
	EMPTY_VALUE,
	buildDocument,
	parseDocument,
	type DecodeErrorSite,
	type EmptyValue,
	type Entry,
	type ListValue,
	type MapValue,
	type ScalarValue,
	type Value,
} from "./document.js";
