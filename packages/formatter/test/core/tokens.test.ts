import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	createToken,
	hasNewline,
	isComment,
	isContextual,
	isKeyword,
	isOperator,
	isToken,
	TokenKind,
	TokenStore,
	tokenEquals,
	tokenId,
	TriviaKind,
	triviaText,
	withLeadingTrivia,
} from '../../src/core/tokens.ts'

describe('core/tokens', () => {
	describe('TokenKind', () => {
		it('should group punctuation below words', () => {
			assert.ok(TokenKind.LeftParen < TokenKind.Identifier)
			assert.ok(TokenKind.RightBrace < TokenKind.Identifier)
		})

		it('should reserve the top values for special tokens', () => {
			assert.strictEqual(TokenKind.Eof, 255)
			assert.strictEqual(TokenKind.Unknown, 254)
		})
	})

	describe('createToken', () => {
		it('should default to empty trivia at offset 0', () => {
			const token = createToken(TokenKind.Identifier, 'foo')
			assert.strictEqual(token.type, 'token')
			assert.strictEqual(token.text, 'foo')
			assert.deepStrictEqual(token.leading, [])
			assert.deepStrictEqual(token.trailing, [])
			assert.strictEqual(token.offset, 0)
		})
	})

	describe('trivia helpers', () => {
		const leading = [
			{ kind: TriviaKind.Newline, text: '\n' },
			{ kind: TriviaKind.Whitespace, text: '  ' },
			{ kind: TriviaKind.LineComment, text: '// note' },
		]

		it('should concatenate trivia text', () => {
			assert.strictEqual(triviaText(leading), '\n  // note')
		})

		it('should detect newlines', () => {
			assert.strictEqual(hasNewline(leading), true)
			assert.strictEqual(hasNewline([{ kind: TriviaKind.Whitespace, text: ' ' }]), false)
		})

		it('should classify comments', () => {
			assert.strictEqual(isComment({ kind: TriviaKind.LineComment, text: '//' }), true)
			assert.strictEqual(isComment({ kind: TriviaKind.BlockComment, text: '/**/' }), true)
			assert.strictEqual(isComment({ kind: TriviaKind.Whitespace, text: ' ' }), false)
		})
	})

	describe('token predicates', () => {
		it('should match kind and text', () => {
			const token = createToken(TokenKind.Keyword, 'return')
			assert.strictEqual(isToken(token, TokenKind.Keyword), true)
			assert.strictEqual(isKeyword(token, 'return'), true)
			assert.strictEqual(isKeyword(token, 'throw'), false)
		})

		it('should treat contextual keywords as identifiers', () => {
			assert.strictEqual(isContextual(createToken(TokenKind.Identifier, 'get'), 'get'), true)
			assert.strictEqual(isContextual(createToken(TokenKind.Keyword, 'get'), 'get'), false)
		})

		it('should match operators by spelling', () => {
			assert.strictEqual(isOperator(createToken(TokenKind.Operator, '->'), '->'), true)
			assert.strictEqual(isOperator(createToken(TokenKind.Operator, '-'), '->'), false)
		})

		it('should reject missing tokens', () => {
			assert.strictEqual(isToken(null, TokenKind.Identifier), false)
			assert.strictEqual(isToken(undefined, TokenKind.Identifier), false)
		})
	})

	describe('tokenEquals', () => {
		it('should compare kind, text and trivia', () => {
			const a = createToken(TokenKind.Identifier, 'x', [{ kind: TriviaKind.Whitespace, text: ' ' }])
			const b = createToken(TokenKind.Identifier, 'x', [{ kind: TriviaKind.Whitespace, text: ' ' }], [], 10)
			assert.strictEqual(tokenEquals(a, b), true)
			assert.strictEqual(tokenEquals(a, withLeadingTrivia(a, [])), false)
		})
	})

	describe('TokenStore', () => {
		it('should hand out dense ids', () => {
			const store = new TokenStore()
			const first = store.add(createToken(TokenKind.Identifier, 'a'))
			const second = store.add(createToken(TokenKind.Identifier, 'b'))
			assert.strictEqual(first, 0)
			assert.strictEqual(second, 1)
			assert.strictEqual(store.count(), 2)
			assert.strictEqual(store.get(second).text, 'b')
		})

		it('should throw for unknown ids', () => {
			const store = new TokenStore()
			assert.throws(() => store.get(tokenId(3)), /Invalid TokenId: 3/)
			assert.strictEqual(store.isValid(tokenId(0)), false)
		})

		it('should iterate in insertion order', () => {
			const store = new TokenStore()
			store.add(createToken(TokenKind.Identifier, 'a'))
			store.add(createToken(TokenKind.Eof, ''))
			const texts = [...store].map(([, token]) => token.text)
			assert.deepStrictEqual(texts, ['a', ''])
		})
	})
})
