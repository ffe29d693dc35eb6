/**
 * Parser for Galaxy script
 *
 * Exports the lexer, the parser implementation and its pass
 */

export { parse, Parser } from "./parser.js";
export { tokenize, Lexer, KEYWORDS, type Token, type TokenKind } from "./lexer.js";
export { pass } from "./pass.js";
export * from "./errors.js";
