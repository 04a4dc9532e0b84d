import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { FormatContext } from '../../src/core/context.ts'
import { hasNewline, type SyntaxToken, TokenKind, triviaText } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/lexer.ts'

function lex(source: string): SyntaxToken[] {
	const context = new FormatContext(source)
	tokenize(context)
	return [...context.tokens].map(([, token]) => token)
}

function print(tokens: readonly SyntaxToken[]): string {
	return tokens.map((token) => triviaText(token.leading) + token.text + triviaText(token.trailing)).join('')
}

// Fragments that exercise every trivia and token rule, including broken ones
const fragmentArb = fc.constantFrom(
	'let',
	'x',
	'foo',
	'42',
	'1.5',
	' ',
	'  ',
	'\t',
	'\n',
	'\r\n',
	'// comment',
	'/* block */',
	'/*',
	'*/',
	'"text"',
	'"',
	'"""',
	'(',
	')',
	'{',
	'}',
	'.',
	'...',
	'+',
	'->',
	'#if',
	'@main',
	'§'
)

const sourceArb = fc.array(fragmentArb, { maxLength: 40 }).map((fragments) => fragments.join(''))

describe('lex/lexer properties', () => {
	it('printing the tokens reproduces any fragment soup', () => {
		fc.assert(
			fc.property(sourceArb, (source) => {
				assert.strictEqual(print(lex(source)), source)
			})
		)
	})

	it('printing the tokens reproduces arbitrary strings', () => {
		fc.assert(
			fc.property(fc.string(), (source) => {
				assert.strictEqual(print(lex(source)), source)
			})
		)
	})

	it('trailing trivia never holds a newline', () => {
		fc.assert(
			fc.property(sourceArb, (source) => lex(source).every((token) => !hasNewline(token.trailing)))
		)
	})

	it('ends with exactly one empty Eof token', () => {
		fc.assert(
			fc.property(sourceArb, (source) => {
				const tokens = lex(source)
				const eofs = tokens.filter((token) => token.kind === TokenKind.Eof)
				const last = tokens[tokens.length - 1]
				return eofs.length === 1 && last?.kind === TokenKind.Eof && last.text === ''
			})
		)
	})

	it('offsets point at the start of each token', () => {
		fc.assert(
			fc.property(sourceArb, (source) => {
				let offset = 0
				for (const token of lex(source)) {
					if (token.offset !== offset) return false
					offset += print([token]).length
				}
				return offset === source.length
			})
		)
	})
})
