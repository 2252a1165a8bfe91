/**
 * Public type exports for @conl/parser.
 */

export { type Token, type TokenKind, type EntryKind } from "./token.js";
