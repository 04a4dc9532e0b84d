import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	firstToken,
	getSlot,
	isConstructKind,
	isListKind,
	isNodeOf,
	makeList,
	makeNode,
	NodeEditor,
	NodeKind,
	nodeKindName,
	printSyntax,
	slotIndex,
	syntaxEquals,
	tokensOf,
	withChild,
	withChildren,
} from '../../src/core/nodes.ts'
import { createToken, TokenKind, TriviaKind } from '../../src/core/tokens.ts'

const space = [{ kind: TriviaKind.Whitespace, text: ' ' }]

function identifier(name: string, leading = space) {
	return makeNode(NodeKind.IdentifierExpr, { identifier: createToken(TokenKind.Identifier, name, leading) })
}

describe('core/nodes', () => {
	describe('kinds', () => {
		it('should separate constructs from lists', () => {
			assert.strictEqual(isConstructKind(NodeKind.FunctionCallExpr), true)
			assert.strictEqual(isListKind(NodeKind.CodeBlockItemList), true)
			assert.strictEqual(isListKind(NodeKind.FunctionCallExpr), false)
		})

		it('should name kinds', () => {
			assert.strictEqual(nodeKindName(NodeKind.GuardStmt), 'GuardStmt')
		})
	})

	describe('makeNode', () => {
		it('should fill absent slots with null', () => {
			const node = makeNode(NodeKind.MemberAccessExpr, { dot: createToken(TokenKind.Period, '.') })
			assert.strictEqual(node.children.length, 3)
			assert.strictEqual(node.children[0], null)
			assert.strictEqual(getSlot(node, NodeKind.MemberAccessExpr, 'dot'), node.children[1])
		})

		it('should place slots in layout order', () => {
			assert.strictEqual(slotIndex(NodeKind.TernaryExpr, 'conditionExpression'), 0)
			assert.strictEqual(slotIndex(NodeKind.TernaryExpr, 'secondChoice'), 4)
		})

		it('should reject slot reads on another kind', () => {
			const node = identifier('a')
			assert.throws(() => getSlot(node, NodeKind.MemberAccessExpr, 'dot'), /Expected node kind/)
		})
	})

	describe('editing', () => {
		it('should share the node when a child is unchanged', () => {
			const node = identifier('a')
			assert.strictEqual(withChild(node, 0, node.children[0] ?? null), node)
			assert.strictEqual(withChildren(node, node.children), node)
		})

		it('should copy the node when a child changes', () => {
			const node = identifier('a')
			const replaced = withChild(node, 0, createToken(TokenKind.Identifier, 'b'))
			assert.notStrictEqual(replaced, node)
			assert.strictEqual(printSyntax(replaced), 'b')
			assert.strictEqual(printSyntax(node), ' a')
		})

		it('should rebuild constructs through NodeEditor', () => {
			const node = makeNode(NodeKind.MemberAccessExpr, {
				base: identifier('a', []),
				dot: createToken(TokenKind.Period, '.'),
				name: createToken(TokenKind.Identifier, 'b'),
			})
			const editor = new NodeEditor(node, NodeKind.MemberAccessExpr)
			assert.strictEqual(editor.build(), node)
			editor.set('name', createToken(TokenKind.Identifier, 'c'))
			assert.strictEqual(printSyntax(editor.build()), 'a.c')
		})
	})

	describe('traversal', () => {
		const list = makeList(NodeKind.ExprList, [
			identifier('a', []),
			makeNode(NodeKind.BinaryOperatorExpr, { operatorToken: createToken(TokenKind.Operator, '+', space) }),
			identifier('b'),
		])

		it('should yield tokens in source order', () => {
			assert.deepStrictEqual(
				[...tokensOf(list)].map((token) => token.text),
				['a', '+', 'b']
			)
		})

		it('should find the first token', () => {
			assert.strictEqual(firstToken(list)?.text, 'a')
			assert.strictEqual(firstToken(makeList(NodeKind.ExprList, [])), null)
		})

		it('should print trivia around tokens', () => {
			assert.strictEqual(printSyntax(list), 'a + b')
		})

		it('should recognise node kinds', () => {
			assert.strictEqual(isNodeOf(list, NodeKind.ExprList), true)
			assert.strictEqual(isNodeOf(list, NodeKind.CodeBlockItemList), false)
			assert.strictEqual(isNodeOf(null, NodeKind.ExprList), false)
		})
	})

	describe('syntaxEquals', () => {
		it('should compare structure and trivia', () => {
			assert.strictEqual(syntaxEquals(identifier('a'), identifier('a')), true)
			assert.strictEqual(syntaxEquals(identifier('a'), identifier('a', [])), false)
			assert.strictEqual(syntaxEquals(identifier('a'), null), false)
		})
	})
})
