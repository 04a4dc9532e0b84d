/**
 * Lexical analysis module.
 * Splits source text into tokens that carry their own trivia.
 */

export { type LexemeRule, type RawLexeme, scan, SwiftLexicon } from './grammar.ts'
export { DECLARATION_MODIFIERS, KEYWORDS, type TokenizeResult, tokenize } from './lexer.ts'
