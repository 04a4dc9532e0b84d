import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FormatContext } from '../../src/core/context.ts'
import { type SyntaxToken, TokenKind, TriviaKind } from '../../src/core/tokens.ts'
import { KEYWORDS, tokenize } from '../../src/lex/lexer.ts'

function lex(source: string): FormatContext {
	const context = new FormatContext(source, 'test.swift')
	tokenize(context)
	return context
}

function tokensOf(source: string): SyntaxToken[] {
	return [...lex(source).tokens].map(([, token]) => token)
}

function texts(source: string): string[] {
	return tokensOf(source).map((token) => token.text)
}

function kinds(source: string): TokenKind[] {
	return tokensOf(source).map((token) => token.kind)
}

describe('lex/lexer', () => {
	describe('tokens', () => {
		it('should split a declaration into tokens', () => {
			assert.deepStrictEqual(texts('let x = 1\n'), ['let', 'x', '=', '1', ''])
			assert.deepStrictEqual(kinds('let x = 1\n'), [
				TokenKind.Keyword,
				TokenKind.Identifier,
				TokenKind.Operator,
				TokenKind.IntegerLiteral,
				TokenKind.Eof,
			])
		})

		it('should end with an empty Eof token for empty input', () => {
			const tokens = tokensOf('')
			assert.strictEqual(tokens.length, 1)
			assert.strictEqual(tokens[0]?.kind, TokenKind.Eof)
			assert.strictEqual(tokens[0]?.text, '')
		})

		it('should lex contextual keywords as identifiers', () => {
			assert.deepStrictEqual(kinds('func get'), [TokenKind.Keyword, TokenKind.Identifier, TokenKind.Eof])
			assert.strictEqual(KEYWORDS.has('get'), false)
		})

		it('should lex escaped and dollar identifiers', () => {
			assert.deepStrictEqual(kinds('`class` $0'), [TokenKind.Identifier, TokenKind.Identifier, TokenKind.Eof])
		})

		it('should classify number literals', () => {
			assert.deepStrictEqual(kinds('0x1F 1.5 1e3 42 1_000'), [
				TokenKind.IntegerLiteral,
				TokenKind.FloatLiteral,
				TokenKind.FloatLiteral,
				TokenKind.IntegerLiteral,
				TokenKind.IntegerLiteral,
				TokenKind.Eof,
			])
		})

		it('should keep an interpolated string as one token', () => {
			assert.deepStrictEqual(texts('"a\\(b + "c")d"'), ['"a\\(b + "c")d"', ''])
		})

		it('should keep parentheses nested inside an interpolation', () => {
			assert.deepStrictEqual(texts('x = "\\(f(g(y)))" + z'), ['x', '=', '"\\(f(g(y)))"', '+', 'z', ''])
			assert.deepStrictEqual(kinds('"\\(f(x))"'), [TokenKind.StringLiteral, TokenKind.Eof])
		})

		it('should keep a multiline string as one token', () => {
			const tokens = tokensOf('"""\nhello\n"""')
			assert.strictEqual(tokens[0]?.kind, TokenKind.StringLiteral)
			assert.strictEqual(tokens[0]?.text, '"""\nhello\n"""')
		})

		it('should lex attributes and pound keywords', () => {
			assert.deepStrictEqual(kinds('@objc #if'), [TokenKind.Attribute, TokenKind.PoundKeyword, TokenKind.Eof])
		})

		it('should lex dot operators as single operators', () => {
			assert.deepStrictEqual(texts('a...b ..< c'), ['a', '...', 'b', '..<', 'c', ''])
		})

		it('should lex punctuation', () => {
			assert.deepStrictEqual(kinds('(a.b)'), [
				TokenKind.LeftParen,
				TokenKind.Identifier,
				TokenKind.Period,
				TokenKind.Identifier,
				TokenKind.RightParen,
				TokenKind.Eof,
			])
		})
	})

	describe('trivia', () => {
		it('should attach same-line whitespace as trailing trivia', () => {
			const [letToken, name] = tokensOf('let x')
			assert.deepStrictEqual(letToken?.trailing, [{ kind: TriviaKind.Whitespace, text: ' ' }])
			assert.deepStrictEqual(name?.leading, [])
		})

		it('should start leading trivia at the newline', () => {
			const [a, b] = tokensOf('a // note\n  b')
			assert.deepStrictEqual(a?.trailing, [
				{ kind: TriviaKind.Whitespace, text: ' ' },
				{ kind: TriviaKind.LineComment, text: '// note' },
			])
			assert.deepStrictEqual(b?.leading, [
				{ kind: TriviaKind.Newline, text: '\n' },
				{ kind: TriviaKind.Whitespace, text: '  ' },
			])
			assert.strictEqual(b?.offset, 9)
		})

		it('should give every newline its own piece', () => {
			const [, b] = tokensOf('a\n\n\tb')
			assert.deepStrictEqual(b?.leading, [
				{ kind: TriviaKind.Newline, text: '\n' },
				{ kind: TriviaKind.Newline, text: '\n' },
				{ kind: TriviaKind.Whitespace, text: '\t' },
			])
		})

		it('should keep CRLF as one newline piece', () => {
			const [, b] = tokensOf('a\r\nb')
			assert.deepStrictEqual(b?.leading, [{ kind: TriviaKind.Newline, text: '\r\n' }])
		})

		it('should nest block comments', () => {
			const [a, b] = tokensOf('a /* x /* y */ z */ b')
			assert.deepStrictEqual(a?.trailing, [
				{ kind: TriviaKind.Whitespace, text: ' ' },
				{ kind: TriviaKind.BlockComment, text: '/* x /* y */ z */' },
				{ kind: TriviaKind.Whitespace, text: ' ' },
			])
			assert.deepStrictEqual(b?.leading, [])
		})

		it('should carry the final trivia on the Eof token', () => {
			const tokens = tokensOf('a\n// end\n')
			const eof = tokens[tokens.length - 1]
			assert.deepStrictEqual(eof?.leading, [
				{ kind: TriviaKind.Newline, text: '\n' },
				{ kind: TriviaKind.LineComment, text: '// end' },
				{ kind: TriviaKind.Newline, text: '\n' },
			])
		})
	})

	describe('errors', () => {
		it('should report an unterminated string', () => {
			const context = lex('let s = "abc')
			const [error] = context.getErrors()
			assert.strictEqual(context.getErrorCount(), 1)
			assert.strictEqual(error?.def.code, 'IKLEX002')
			assert.strictEqual(error?.line, 1)
			assert.strictEqual(error?.column, 9)
		})

		it('should report an unknown character', () => {
			const context = lex('x = §')
			const [error] = context.getErrors()
			assert.strictEqual(error?.def.code, 'IKLEX001')
			assert.strictEqual(error?.message, 'unexpected character "§"')
			assert.strictEqual(error?.column, 5)
		})

		it('should report an unterminated block comment', () => {
			const context = lex('/* open')
			const [error] = context.getErrors()
			assert.strictEqual(error?.def.code, 'IKLEX003')
			assert.strictEqual(error?.line, 1)
			assert.strictEqual(error?.column, 1)
		})

		it('should fail the result on errors', () => {
			const context = new FormatContext('a ¶ b')
			assert.strictEqual(tokenize(context).succeeded, false)
			assert.strictEqual(tokenize(new FormatContext('a b')).succeeded, true)
		})
	})
})
