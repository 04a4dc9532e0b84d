import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * Lexical rules the lexer turns into trivia or tokens.
 */
export type LexemeRule =
	| 'attribute'
	| 'blockComment'
	| 'dotOperator'
	| 'identifier'
	| 'lineComment'
	| 'multilineString'
	| 'newline'
	| 'number'
	| 'operator'
	| 'poundKeyword'
	| 'punctuation'
	| 'string'
	| 'unknown'
	| 'whitespace'

/**
 * One lexical element, before trivia is attached to tokens.
 */
export interface RawLexeme {
	rule: LexemeRule
	text: string
	offset: number
}

const LEXEME_RULES: ReadonlySet<string> = new Set<LexemeRule>([
	'attribute',
	'blockComment',
	'dotOperator',
	'identifier',
	'lineComment',
	'multilineString',
	'newline',
	'number',
	'operator',
	'poundKeyword',
	'punctuation',
	'string',
	'unknown',
	'whitespace',
])

function isLexemeRule(name: string): name is LexemeRule {
	return LEXEME_RULES.has(name)
}

/**
 * Swift lexicon.
 *
 * Every input matches: characters no other rule accepts become `unknown`
 * elements, which the lexer reports. Block comments nest. String literals
 * stay on one line; `"""` literals may span lines and are single tokens.
 */
const grammarSource = String.raw`
SwiftLexicon {
  stream = element* end

  element = newline
          | whitespace
          | lineComment
          | blockComment
          | multilineString
          | string
          | number
          | poundKeyword
          | attribute
          | identifier
          | dotOperator
          | operator
          | punctuation
          | unknown

  // Trivia
  newline = "\r\n" | "\n" | "\r"
  whitespace = (" " | "\t")+
  lineComment = "//" (~lineTerminator any)*
  blockComment = "/*" (blockComment | ~"*/" any)* "*/"
  lineTerminator = "\n" | "\r"

  // Literals
  multilineString = "\"\"\"" (escape | ~"\"\"\"" any)* "\"\"\""
  string = "\"" stringItem* "\""
  stringItem = interpolation | escape | ~("\"" | "\\" | lineTerminator) any
  interpolation = "\\(" interpolationItem* ")"
  interpolationItem = string
                    | "(" interpolationItem* ")"                    -- nested
                    | ~("(" | ")" | "\"" | lineTerminator) any
  escape = "\\" ~lineTerminator any

  number = hexNumber | binaryNumber | octalNumber | decimalNumber
  hexNumber = "0x" hexDigit (hexDigit | "_")*
  binaryNumber = "0b" ("0" | "1") ("0" | "1" | "_")*
  octalNumber = "0o" "0".."7" ("0".."7" | "_")*
  decimalNumber = digit (digit | "_")* fraction? exponent?
  fraction = "." digit (digit | "_")*
  exponent = ("e" | "E") ("+" | "-")? digit+

  // Words
  poundKeyword = "#" identifierStart identifierPart*
  attribute = "@" identifierStart identifierPart*
  identifier = "\x60" (~("\x60" | lineTerminator) any)+ "\x60"  -- escaped
             | "$" identifierPart+                               -- dollar
             | identifierStart identifierPart*                   -- plain
  identifierStart = letter | "_"
  identifierPart = alnum | "_"

  // Operators and punctuation
  dotOperator = "." "." ("." | operatorChar)*
  operator = (~("//" | "/*") operatorChar)+
  operatorChar = "/" | "=" | "-" | "+" | "!" | "*" | "%" | "<" | ">"
               | "&" | "|" | "^" | "~" | "?"
  punctuation = "(" | ")" | "{" | "}" | "[" | "]" | "," | ":" | ";" | "." | "\\"

  unknown = any
}
`

/**
 * The compiled lexical grammar.
 */
export const SwiftLexicon = ohm.grammar(grammarSource)

/**
 * Create semantics that flatten a match into raw lexemes.
 */
export function createSemantics(): Semantics {
	const semantics = SwiftLexicon.createSemantics()

	semantics.addOperation<RawLexeme>('toLexeme', {
		element(inner: Node): RawLexeme {
			const rule = inner.ctorName
			if (!isLexemeRule(rule)) {
				throw new Error(`Unhandled lexical rule: ${rule}`)
			}
			return {
				offset: inner.source.startIdx,
				rule,
				text: inner.sourceString,
			}
		},
	})

	semantics.addOperation<RawLexeme[]>('toLexemes', {
		stream(elements: Node, _end: Node): RawLexeme[] {
			return elements.children.map((element: Node) => element['toLexeme']())
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Split source text into raw lexemes.
 *
 * @returns The lexemes in source order, or null if the grammar rejected the input
 */
export function scan(source: string): RawLexeme[] | null {
	const matchResult = SwiftLexicon.match(source)
	if (matchResult.failed()) return null
	const lexemes: RawLexeme[] = semantics(matchResult)['toLexemes']()
	return lexemes
}
