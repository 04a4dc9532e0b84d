import { readFileSync } from 'node:fs'
import type { FormatContext } from '../core/context.ts'
import {
	createToken,
	type SyntaxToken,
	TokenKind,
	type TriviaPiece,
	TriviaKind,
} from '../core/tokens.ts'
import { type RawLexeme, scan } from './grammar.ts'

export interface TokenizeResult {
	succeeded: boolean
}

interface WordLists {
	keywords: string[]
	modifiers: string[]
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function loadWordLists(): WordLists {
	const parsed: unknown = JSON.parse(readFileSync(new URL('./keywords.json', import.meta.url), 'utf8'))
	if (typeof parsed !== 'object' || parsed === null) {
		throw new Error('keywords.json must contain an object')
	}
	const keywords: unknown = Reflect.get(parsed, 'keywords')
	const modifiers: unknown = Reflect.get(parsed, 'modifiers')
	if (!isStringArray(keywords) || !isStringArray(modifiers)) {
		throw new Error('keywords.json must list "keywords" and "modifiers" as string arrays')
	}
	return { keywords, modifiers }
}

const wordLists = loadWordLists()

export const KEYWORDS: ReadonlySet<string> = new Set(wordLists.keywords)

/** Words that may precede a declaration keyword as a modifier. */
export const DECLARATION_MODIFIERS: ReadonlySet<string> = new Set(wordLists.modifiers)

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
	'(': TokenKind.LeftParen,
	')': TokenKind.RightParen,
	',': TokenKind.Comma,
	'.': TokenKind.Period,
	':': TokenKind.Colon,
	';': TokenKind.Semicolon,
	'[': TokenKind.LeftBracket,
	'\\': TokenKind.Backslash,
	']': TokenKind.RightBracket,
	'{': TokenKind.LeftBrace,
	'}': TokenKind.RightBrace,
}

function triviaKindOf(lexeme: RawLexeme): TriviaPiece['kind'] | null {
	switch (lexeme.rule) {
		case 'newline':
			return TriviaKind.Newline
		case 'whitespace':
			return TriviaKind.Whitespace
		case 'lineComment':
			return TriviaKind.LineComment
		case 'blockComment':
			return TriviaKind.BlockComment
		default:
			return null
	}
}

function classifyNumber(text: string): TokenKind {
	if (/^0[xbo]/.test(text)) return TokenKind.IntegerLiteral
	return /[.eE]/.test(text) ? TokenKind.FloatLiteral : TokenKind.IntegerLiteral
}

function tokenKindOf(lexeme: RawLexeme): TokenKind {
	switch (lexeme.rule) {
		case 'identifier':
			return KEYWORDS.has(lexeme.text) ? TokenKind.Keyword : TokenKind.Identifier
		case 'number':
			return classifyNumber(lexeme.text)
		case 'string':
		case 'multilineString':
			return TokenKind.StringLiteral
		case 'poundKeyword':
			return TokenKind.PoundKeyword
		case 'attribute':
			return TokenKind.Attribute
		case 'operator':
		case 'dotOperator':
			return TokenKind.Operator
		case 'punctuation':
			return PUNCTUATION[lexeme.text] ?? TokenKind.Unknown
		default:
			return TokenKind.Unknown
	}
}

function reportUnknown(lexeme: RawLexeme, context: FormatContext): void {
	if (lexeme.text === '"') {
		context.emitAtOffset('IKLEX002', lexeme.offset)
		return
	}
	if (context.source.startsWith('/*', lexeme.offset)) {
		context.emitAtOffset('IKLEX003', lexeme.offset)
		return
	}
	context.emitAtOffset('IKLEX001', lexeme.offset, { char: JSON.stringify(lexeme.text) })
}

/**
 * Attaches trivia to tokens while scanning.
 * Trailing trivia runs up to (not including) the next newline; everything
 * after that newline leads the next token.
 */
class TriviaAttacher {
	private leading: TriviaPiece[] = []
	private leadingStart: number | null = null
	private current: { kind: TokenKind; text: string; leading: TriviaPiece[]; offset: number } | null =
		null
	private trailing: TriviaPiece[] = []
	private collectingTrailing = false

	constructor(private readonly context: FormatContext) {}

	addTrivia(piece: TriviaPiece, offset: number): void {
		if (this.collectingTrailing && piece.kind !== TriviaKind.Newline) {
			this.trailing.push(piece)
			return
		}
		this.collectingTrailing = false
		if (this.leadingStart === null) this.leadingStart = offset
		this.leading.push(piece)
	}

	addToken(kind: TokenKind, text: string, offset: number): void {
		this.flush()
		this.current = { kind, leading: this.leading, offset: this.leadingStart ?? offset, text }
		this.leading = []
		this.leadingStart = null
		this.collectingTrailing = true
	}

	finish(endOffset: number): void {
		this.addToken(TokenKind.Eof, '', endOffset)
		this.flush()
	}

	private flush(): void {
		if (this.current === null) return
		const { kind, text, leading, offset } = this.current
		const token: SyntaxToken = createToken(kind, text, leading, this.trailing, offset)
		this.context.tokens.add(token)
		this.current = null
		this.trailing = []
	}
}

/**
 * Tokenize `context.source` into `context.tokens`.
 * The last token is always an empty `Eof` token carrying the file's final trivia.
 */
export function tokenize(context: FormatContext): TokenizeResult {
	const lexemes = scan(context.source)
	if (lexemes === null) {
		context.emit('IKLEX001', 1, 1, { char: 'input' })
		return { succeeded: false }
	}

	const attacher = new TriviaAttacher(context)
	for (const lexeme of lexemes) {
		const triviaKind = triviaKindOf(lexeme)
		if (triviaKind !== null) {
			attacher.addTrivia({ kind: triviaKind, text: lexeme.text }, lexeme.offset)
			continue
		}
		const kind = tokenKindOf(lexeme)
		if (kind === TokenKind.Unknown) reportUnknown(lexeme, context)
		attacher.addToken(kind, lexeme.text, lexeme.offset)
	}
	attacher.finish(context.source.length)

	return { succeeded: !context.hasErrors() }
}
