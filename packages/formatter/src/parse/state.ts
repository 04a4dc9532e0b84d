/**
 * Parser state: a cursor over the lexed tokens.
 *
 * Parsing functions take the state as their first argument and build
 * immutable syntax nodes bottom-up. The first syntax error aborts the
 * parse by throwing `ParseAbort`, which `parse()` turns into a failed result.
 */

import type { FormatContext } from '../core/context.ts'
import type { DiagnosticCode } from '../core/diagnostics.ts'
import {
	createToken,
	hasNewline,
	isToken,
	type SyntaxToken,
	TokenKind,
	triviaText,
} from '../core/tokens.ts'

/** Expression parsing options that depend on the enclosing construct. */
export interface ExprOptions {
	/** `{` after an expression starts a trailing closure. Off in statement conditions. */
	readonly trailingClosures: boolean
	/** `=` continues the expression. Off in `case` patterns, where it ends the pattern. */
	readonly assignments: boolean
}

export const DEFAULT_EXPR: ExprOptions = { assignments: true, trailingClosures: true }
export const CONDITION_EXPR: ExprOptions = { assignments: true, trailingClosures: false }
export const PATTERN_EXPR: ExprOptions = { assignments: false, trailingClosures: false }

/** Unwinds the parser after the first syntax error. */
export class ParseAbort extends Error {
	constructor(readonly detail: string) {
		super(detail)
		this.name = 'ParseAbort'
	}
}

const OPENING_KINDS: ReadonlySet<TokenKind> = new Set([
	TokenKind.LeftParen,
	TokenKind.LeftBracket,
	TokenKind.LeftBrace,
	TokenKind.Comma,
	TokenKind.Semicolon,
	TokenKind.Colon,
])

const CLOSING_KINDS: ReadonlySet<TokenKind> = new Set([
	TokenKind.RightParen,
	TokenKind.RightBracket,
	TokenKind.RightBrace,
	TokenKind.Comma,
	TokenKind.Semicolon,
	TokenKind.Colon,
])

export class ParserState {
	private readonly tokens: SyntaxToken[] = []
	private pos = 0
	private speculating = 0

	constructor(readonly context: FormatContext) {
		for (const [, token] of context.tokens) this.tokens.push(token)
		if (this.tokens.length === 0) {
			this.tokens.push(createToken(TokenKind.Eof, ''))
		}
	}

	peek(ahead = 0): SyntaxToken {
		const index = Math.min(this.pos + ahead, this.tokens.length - 1)
		const token = this.tokens[index]
		if (token === undefined) throw new Error('Parser ran past the end-of-file token')
		return token
	}

	at(kind: TokenKind, text?: string, ahead = 0): boolean {
		return isToken(this.peek(ahead), kind, text)
	}

	atKeyword(text: string, ahead = 0): boolean {
		return this.at(TokenKind.Keyword, text, ahead)
	}

	atContextual(text: string, ahead = 0): boolean {
		return this.at(TokenKind.Identifier, text, ahead)
	}

	atOperator(text: string, ahead = 0): boolean {
		return this.at(TokenKind.Operator, text, ahead)
	}

	atEnd(): boolean {
		return this.peek().kind === TokenKind.Eof
	}

	advance(): SyntaxToken {
		const token = this.peek()
		if (token.kind !== TokenKind.Eof) this.pos++
		return token
	}

	eat(kind: TokenKind, text?: string): SyntaxToken | null {
		return this.at(kind, text) ? this.advance() : null
	}

	expect(kind: TokenKind, what: string, text?: string): SyntaxToken {
		if (!this.at(kind, text)) this.fail(`expected ${what}`)
		return this.advance()
	}

	expectKeyword(text: string): SyntaxToken {
		return this.expect(TokenKind.Keyword, `'${text}'`, text)
	}

	/** True when a newline separates the token from the one before it. */
	startsLine(ahead = 0): boolean {
		if (this.pos + ahead === 0) return true
		return hasNewline(this.peek(ahead).leading)
	}

	/** Whitespace, a newline, an opening bracket or a separator precedes the token. */
	spaceBefore(ahead = 0): boolean {
		const index = this.pos + ahead
		const previous = this.tokens[index - 1]
		if (previous === undefined) return true
		if (this.peek(ahead).leading.length > 0 || previous.trailing.length > 0) return true
		return OPENING_KINDS.has(previous.kind)
	}

	/** Whitespace, a closing bracket, a separator or the end of file follows the token. */
	spaceAfter(ahead = 0): boolean {
		const next = this.peek(ahead + 1)
		if (next.kind === TokenKind.Eof) return true
		if (this.peek(ahead).trailing.length > 0 || next.leading.length > 0) return true
		return CLOSING_KINDS.has(next.kind)
	}

	/** An operator is binary when it is spaced the same on both sides, unless a `.` follows directly. */
	isBinaryOperator(ahead = 0): boolean {
		if (!this.spaceBefore(ahead) && this.at(TokenKind.Period, undefined, ahead + 1)) {
			return this.spaceAfter(ahead)
		}
		return this.spaceBefore(ahead) === this.spaceAfter(ahead)
	}

	isPostfixOperator(ahead = 0): boolean {
		return !this.spaceBefore(ahead) && !this.isBinaryOperator(ahead)
	}

	/**
	 * Split the current operator token after `length` characters, so that
	 * `>>` can close two generic clauses and `?` can follow a type directly.
	 * The trivia stays with the outer halves.
	 */
	splitOperator(length: number): void {
		const token = this.peek()
		if (token.kind !== TokenKind.Operator || token.text.length <= length) return
		const textStart = token.offset + triviaText(token.leading).length
		const head = createToken(TokenKind.Operator, token.text.slice(0, length), token.leading, [], token.offset)
		const tail = createToken(TokenKind.Operator, token.text.slice(length), [], token.trailing, textStart + length)
		this.tokens.splice(this.pos, 1, head, tail)
	}

	/** Consume one operator character when the current operator starts with it. */
	eatOperatorPrefix(prefix: string): SyntaxToken | null {
		const token = this.peek()
		if (token.kind !== TokenKind.Operator || !token.text.startsWith(prefix)) return null
		this.splitOperator(prefix.length)
		return this.advance()
	}

	/**
	 * Run `parse` and keep its result, or rewind and return null when it
	 * hits a syntax error. No diagnostic is reported for the rewound attempt.
	 */
	speculate<T>(parse: () => T): T | null {
		const saved = this.pos
		const savedTokens = this.tokens.slice()
		this.speculating++
		try {
			return parse()
		} catch (error) {
			if (!(error instanceof ParseAbort)) throw error
			this.pos = saved
			this.tokens.splice(0, this.tokens.length, ...savedTokens)
			return null
		} finally {
			this.speculating--
		}
	}

	fail(detail: string, code: DiagnosticCode = 'IKPARSE001'): never {
		if (this.speculating === 0) {
			const token = this.peek()
			this.context.emitAtOffset(code, token.offset + triviaText(token.leading).length, { detail })
		}
		throw new ParseAbort(detail)
	}

	describeCurrent(): string {
		const token = this.peek()
		return token.kind === TokenKind.Eof ? 'end of file' : `'${token.text}'`
	}
}
