import { makeList, makeNode, NodeKind, type Syntax, type SyntaxNode } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import { parseExpression } from './expressions.ts'
import { PATTERN_EXPR, type ParserState } from './state.ts'
import { parseType } from './types.ts'

/** Binding patterns: `x`, `_`, `(a, b)`, `let x`. */
export function parsePattern(state: ParserState): Syntax {
	if (state.atContextual('_')) {
		return makeNode(NodeKind.WildcardPattern, { typeAnnotation: null, wildcard: state.advance() })
	}
	if (state.at(TokenKind.Identifier)) {
		return makeNode(NodeKind.IdentifierPattern, { identifier: state.advance() })
	}
	if (state.at(TokenKind.LeftParen)) return parseTuplePattern(state)
	if (state.atKeyword('let') || state.atKeyword('var')) {
		const letOrVarKeyword = state.advance()
		return makeNode(NodeKind.ValueBindingPattern, { letOrVarKeyword, valuePattern: parsePattern(state) })
	}
	return state.fail(`expected pattern, found ${state.describeCurrent()}`)
}

function parseTuplePattern(state: ParserState): SyntaxNode {
	const leftParen = state.advance()
	const elements: Syntax[] = []
	while (!state.at(TokenKind.RightParen)) {
		const labeled = state.at(TokenKind.Identifier) && state.at(TokenKind.Colon, undefined, 1)
		const label = labeled ? state.advance() : null
		const colon = labeled ? state.advance() : null
		const pattern = parsePattern(state)
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(makeNode(NodeKind.TuplePatternElement, { colon, label, pattern, trailingComma }))
		if (trailingComma === null) break
	}
	const rightParen = state.expect(TokenKind.RightParen, "')'")
	return makeNode(NodeKind.TuplePattern, {
		elements: makeList(NodeKind.TuplePatternElementList, elements),
		leftParen,
		rightParen,
	})
}

/** Patterns after `case` and `catch`: expressions that may bind with `let` or `var`. */
export function parseCasePattern(state: ParserState): Syntax {
	if (state.atKeyword('let') || state.atKeyword('var')) {
		const letOrVarKeyword = state.advance()
		return makeNode(NodeKind.ValueBindingPattern, { letOrVarKeyword, valuePattern: parseCasePattern(state) })
	}
	if (state.atKeyword('is')) {
		const isKeyword = state.advance()
		return makeNode(NodeKind.ExpressionPattern, {
			expression: makeNode(NodeKind.IsExpr, { isKeyword, typeName: parseType(state) }),
		})
	}
	if (state.atContextual('_') && !state.at(TokenKind.Period, undefined, 1)) {
		return makeNode(NodeKind.WildcardPattern, { typeAnnotation: null, wildcard: state.advance() })
	}
	return makeNode(NodeKind.ExpressionPattern, { expression: parseExpression(state, PATTERN_EXPR) })
}
