/**
 * Syntax analysis module.
 * Builds the lossless concrete syntax tree from lexed tokens.
 */

export { type ParseResult, parse } from './parser.ts'
export { CONDITION_EXPR, DEFAULT_EXPR, type ExprOptions, PATTERN_EXPR, ParseAbort, ParserState } from './state.ts'
