/**
 * Tokens of the concrete syntax tree.
 *
 * A token owns the trivia around it: everything from the end of the previous
 * token's trailing trivia up to its own text is leading trivia, and everything
 * after its text up to (not including) the next newline is trailing trivia.
 * Concatenating leading + text + trailing for every token reproduces the source.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Attribute: 23,
	Backslash: 10,
	Colon: 7,
	Comma: 6,

	// Special (254-255)
	Eof: 255,
	FloatLiteral: 41,

	// Words (20-39)
	Identifier: 20,
	IntegerLiteral: 40,
	Keyword: 21,
	LeftBrace: 2,
	LeftBracket: 4,

	// Punctuation (0-19)
	LeftParen: 0,

	// Operators (60-79)
	Operator: 60,
	Period: 9,
	PoundKeyword: 22,
	RightBrace: 3,
	RightBracket: 5,
	RightParen: 1,
	Semicolon: 8,

	// Literals (40-59)
	StringLiteral: 42,
	Unknown: 254,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export const TriviaKind = {
	BlockComment: 'blockComment',
	LineComment: 'lineComment',
	Newline: 'newline',
	Whitespace: 'whitespace',
} as const

export type TriviaKind = (typeof TriviaKind)[keyof typeof TriviaKind]

export interface TriviaPiece {
	readonly kind: TriviaKind
	readonly text: string
}

export type Trivia = readonly TriviaPiece[]

export interface SyntaxToken {
	readonly type: 'token'
	readonly kind: TokenKind
	readonly text: string
	readonly leading: Trivia
	readonly trailing: Trivia
	/** Absolute offset of the first character of the leading trivia. */
	readonly offset: number
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

export function createToken(
	kind: TokenKind,
	text: string,
	leading: Trivia = [],
	trailing: Trivia = [],
	offset = 0
): SyntaxToken {
	return { kind, leading, offset, text, trailing, type: 'token' }
}

export function triviaText(trivia: Trivia): string {
	let text = ''
	for (const piece of trivia) text += piece.text
	return text
}

export function hasNewline(trivia: Trivia): boolean {
	return trivia.some((piece) => piece.kind === TriviaKind.Newline)
}

export function isComment(piece: TriviaPiece): boolean {
	return piece.kind === TriviaKind.LineComment || piece.kind === TriviaKind.BlockComment
}

/** True when the token is `kind` and, for words and operators, spelled `text`. */
export function isToken(token: SyntaxToken | null | undefined, kind: TokenKind, text?: string): boolean {
	if (!token || token.kind !== kind) return false
	return text === undefined || token.text === text
}

export function isKeyword(token: SyntaxToken | null | undefined, text: string): boolean {
	return isToken(token, TokenKind.Keyword, text)
}

/** Contextual keywords (`get`, `willSet`, `mutating`, ...) are lexed as identifiers. */
export function isContextual(token: SyntaxToken | null | undefined, text: string): boolean {
	return isToken(token, TokenKind.Identifier, text)
}

export function isOperator(token: SyntaxToken | null | undefined, text: string): boolean {
	return isToken(token, TokenKind.Operator, text)
}

export function withLeadingTrivia(token: SyntaxToken, leading: Trivia): SyntaxToken {
	return { ...token, leading }
}

export function tokenEquals(a: SyntaxToken, b: SyntaxToken): boolean {
	return (
		a.kind === b.kind &&
		a.text === b.text &&
		triviaEquals(a.leading, b.leading) &&
		triviaEquals(a.trailing, b.trailing)
	)
}

function triviaEquals(a: Trivia, b: Trivia): boolean {
	if (a.length !== b.length) return false
	return a.every((piece, i) => {
		const other = b[i]
		return other !== undefined && other.kind === piece.kind && other.text === piece.text
	})
}

/**
 * Dense array storage for lexed tokens.
 * Append-only during lexing.
 */
export class TokenStore {
	private readonly tokens: SyntaxToken[] = []

	add(token: SyntaxToken): TokenId {
		const id = this.tokens.length as TokenId
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): SyntaxToken {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, SyntaxToken]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [i as TokenId, token]
		}
	}
}
