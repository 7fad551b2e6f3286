/**
 * Chevrotain-based parser for the opt language.
 *
 * Re-exports the public parse function as well as the lexer for direct access.
 */
export { MAX_NESTING, parseOpt } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { OptLexer, allTokens } from "./lexer.js";
