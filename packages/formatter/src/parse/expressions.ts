/**
 * Expression parsing.
 *
 * Binary expressions stay unfolded: `a + b * c` becomes one sequence of
 * operands and operators, since indentation never depends on precedence.
 * Whitespace decides the role of an operator, and a newline before `(`,
 * `[` or `{` ends the expression.
 */

import {
	type ListKind,
	makeList,
	makeNode,
	NodeKind,
	type Syntax,
	type SyntaxNode,
} from '../core/nodes.ts'
import { type SyntaxToken, TokenKind } from '../core/tokens.ts'
import { looksLikeAccessorBlock, parseParameterClause } from './declarations.ts'
import { parsePattern } from './patterns.ts'
import { DEFAULT_EXPR, type ExprOptions, type ParserState } from './state.ts'
import { parseStatementList } from './statements.ts'
import { parseGenericArgumentClause, parseType } from './types.ts'

type LabeledElementKind = typeof NodeKind.FunctionCallArgument | typeof NodeKind.TupleExprElement

function sequence(elements: readonly Syntax[]): Syntax {
	const [only] = elements
	if (elements.length === 1 && only !== undefined) return only
	return makeNode(NodeKind.SequenceExpr, { elements: makeList(NodeKind.ExprList, elements) })
}

export function parseExpression(state: ParserState, options: ExprOptions = DEFAULT_EXPR): Syntax {
	const elements: Syntax[] = [parseSequenceElement(state, options)]
	for (;;) {
		if (state.atKeyword('as') || state.atKeyword('is')) {
			elements.push(parseCast(state))
			continue
		}
		const token = state.peek()
		if (token.kind !== TokenKind.Operator || !state.isBinaryOperator()) break
		if (token.text === '?') return parseTernary(state, elements, options)
		if (token.text === '=') {
			if (!options.assignments) break
			elements.push(makeNode(NodeKind.AssignmentExpr, { assignToken: state.advance() }))
		} else {
			elements.push(makeNode(NodeKind.BinaryOperatorExpr, { operatorToken: state.advance() }))
		}
		elements.push(parseSequenceElement(state, options))
	}
	return sequence(elements)
}

function parseCast(state: ParserState): SyntaxNode {
	if (state.atKeyword('is')) {
		const isKeyword = state.advance()
		return makeNode(NodeKind.IsExpr, { isKeyword, typeName: parseType(state) })
	}
	const asKeyword = state.advance()
	const questionOrExclamationMark = state.spaceBefore()
		? null
		: (state.eatOperatorPrefix('?') ?? state.eatOperatorPrefix('!'))
	return makeNode(NodeKind.AsExpr, { asKeyword, questionOrExclamationMark, typeName: parseType(state) })
}

/** The condition of `a ? b : c` is everything after the last assignment. */
function parseTernary(state: ParserState, elements: readonly Syntax[], options: ExprOptions): Syntax {
	let split = 0
	elements.forEach((element, index) => {
		if (element.type === 'node' && element.kind === NodeKind.AssignmentExpr) split = index + 1
	})
	const conditionExpression = sequence(elements.slice(split))
	const questionMark = state.advance()
	const firstChoice = parseExpression(state, options)
	const colonMark = state.expect(TokenKind.Colon, "':' in ternary expression")
	const secondChoice = parseExpression(state, options)
	const ternary = makeNode(NodeKind.TernaryExpr, {
		colonMark,
		conditionExpression,
		firstChoice,
		questionMark,
		secondChoice,
	})
	return sequence([...elements.slice(0, split), ternary])
}

function parseSequenceElement(state: ParserState, options: ExprOptions): Syntax {
	if (state.atKeyword('try')) {
		const tryKeyword = state.advance()
		const questionOrExclamationMark = state.spaceBefore()
			? null
			: (state.eatOperatorPrefix('?') ?? state.eatOperatorPrefix('!'))
		return makeNode(NodeKind.TryExpr, {
			expression: parseSequenceElement(state, options),
			questionOrExclamationMark,
			tryKeyword,
		})
	}
	if (state.atKeyword('await')) {
		const awaitKeyword = state.advance()
		return makeNode(NodeKind.AwaitExpr, { awaitKeyword, expression: parseSequenceElement(state, options) })
	}
	if (state.at(TokenKind.Operator)) {
		const operatorToken = state.advance()
		return makeNode(NodeKind.PrefixOperatorExpr, {
			operatorToken,
			postfixExpression: parseSequenceElement(state, options),
		})
	}
	return parsePostfixExpression(state, options)
}

function canStartTrailingClosure(state: ParserState, options: ExprOptions): boolean {
	return (
		options.trailingClosures &&
		state.at(TokenKind.LeftBrace) &&
		!state.startsLine() &&
		!looksLikeAccessorBlock(state)
	)
}

function parsePostfixExpression(state: ParserState, options: ExprOptions): Syntax {
	let expression = parsePrimary(state)
	for (;;) {
		if (state.at(TokenKind.Period)) {
			const dot = state.advance()
			expression = makeNode(NodeKind.MemberAccessExpr, { base: expression, dot, name: parseMemberName(state) })
			continue
		}
		if (state.at(TokenKind.Operator) && state.isPostfixOperator()) {
			expression = makeNode(NodeKind.PostfixUnaryExpr, { expression, operatorToken: state.advance() })
			continue
		}
		if (state.at(TokenKind.LeftParen) && !state.startsLine()) {
			const leftParen = state.advance()
			const argumentList = parseLabeledElements(
				state,
				NodeKind.FunctionCallArgument,
				NodeKind.FunctionCallArgumentList,
				TokenKind.RightParen
			)
			const rightParen = state.expect(TokenKind.RightParen, "')' to close the argument list")
			const trailingClosure = canStartTrailingClosure(state, options) ? parseClosure(state) : null
			expression = makeNode(NodeKind.FunctionCallExpr, {
				argumentList,
				calledExpression: expression,
				leftParen,
				rightParen,
				trailingClosure,
			})
			continue
		}
		if (state.at(TokenKind.LeftBracket) && !state.startsLine()) {
			const leftBracket = state.advance()
			const argumentList = parseLabeledElements(
				state,
				NodeKind.FunctionCallArgument,
				NodeKind.FunctionCallArgumentList,
				TokenKind.RightBracket
			)
			const rightBracket = state.expect(TokenKind.RightBracket, "']' to close the subscript")
			expression = makeNode(NodeKind.SubscriptExpr, {
				argumentList,
				calledExpression: expression,
				leftBracket,
				rightBracket,
				trailingClosure: null,
			})
			continue
		}
		if (canStartTrailingClosure(state, options)) {
			expression = makeNode(NodeKind.FunctionCallExpr, {
				calledExpression: expression,
				trailingClosure: parseClosure(state),
			})
			continue
		}
		return expression
	}
}

function parseMemberName(state: ParserState): SyntaxToken {
	const token = state.peek()
	if (
		token.kind === TokenKind.Identifier ||
		token.kind === TokenKind.Keyword ||
		token.kind === TokenKind.IntegerLiteral
	) {
		return state.advance()
	}
	return state.fail(`expected member name after '.', found ${state.describeCurrent()}`)
}

function parsePrimary(state: ParserState): Syntax {
	const token = state.peek()
	switch (token.kind) {
		case TokenKind.Identifier:
			return parseIdentifierExpr(state)
		case TokenKind.IntegerLiteral:
		case TokenKind.FloatLiteral:
		case TokenKind.StringLiteral:
			return makeNode(NodeKind.LiteralExpr, { literal: state.advance() })
		case TokenKind.Keyword:
			return parseKeywordPrimary(state, token)
		case TokenKind.PoundKeyword:
			if (['#if', '#elseif', '#else', '#endif'].includes(token.text)) break
			return makeNode(NodeKind.IdentifierExpr, { identifier: state.advance() })
		case TokenKind.Period: {
			const dot = state.advance()
			return makeNode(NodeKind.MemberAccessExpr, { base: null, dot, name: parseMemberName(state) })
		}
		case TokenKind.LeftParen: {
			const leftParen = state.advance()
			const elementList = parseLabeledElements(
				state,
				NodeKind.TupleExprElement,
				NodeKind.TupleExprElementList,
				TokenKind.RightParen
			)
			const rightParen = state.expect(TokenKind.RightParen, "')'")
			return makeNode(NodeKind.TupleExpr, { elementList, leftParen, rightParen })
		}
		case TokenKind.LeftBracket:
			return parseCollection(state)
		case TokenKind.LeftBrace:
			return parseClosure(state)
	}
	return state.fail(`expected expression, found ${state.describeCurrent()}`)
}

function parseKeywordPrimary(state: ParserState, token: SyntaxToken): Syntax {
	switch (token.text) {
		case 'self':
		case 'Self':
		case 'super':
		case 'init':
			return makeNode(NodeKind.IdentifierExpr, { identifier: state.advance() })
		case 'true':
		case 'false':
		case 'nil':
			return makeNode(NodeKind.LiteralExpr, { literal: state.advance() })
		case 'let':
		case 'var': {
			const letOrVarKeyword = state.advance()
			const pattern = makeNode(NodeKind.ValueBindingPattern, {
				letOrVarKeyword,
				valuePattern: parsePattern(state),
			})
			return makeNode(NodeKind.PatternExpr, { pattern })
		}
	}
	return state.fail(`expected expression, found '${token.text}'`)
}

/** Tokens that may follow `Name<Args>` when the angle brackets are generic arguments. */
const AFTER_GENERIC_ARGUMENTS: ReadonlySet<TokenKind> = new Set([
	TokenKind.LeftParen,
	TokenKind.Period,
	TokenKind.RightParen,
	TokenKind.RightBracket,
	TokenKind.Comma,
	TokenKind.Eof,
])

function parseIdentifierExpr(state: ParserState): Syntax {
	const expression = makeNode(NodeKind.IdentifierExpr, { identifier: state.advance() })
	if (state.spaceBefore() || !state.at(TokenKind.Operator) || !state.peek().text.startsWith('<')) {
		return expression
	}
	const genericArgumentClause = state.speculate(() => {
		const clause = parseGenericArgumentClause(state)
		if (!AFTER_GENERIC_ARGUMENTS.has(state.peek().kind)) state.fail('not a generic argument clause')
		return clause
	})
	if (genericArgumentClause === null) return expression
	return makeNode(NodeKind.SpecializeExpr, { expression, genericArgumentClause })
}

function isLabelAhead(state: ParserState): boolean {
	const kind = state.peek().kind
	return (
		(kind === TokenKind.Identifier || kind === TokenKind.Keyword) && state.at(TokenKind.Colon, undefined, 1)
	)
}

/** Operator references such as the `+` in `reduce(0, +)`. */
function isOperatorReference(state: ParserState, closing: TokenKind): boolean {
	return state.at(TokenKind.Operator) && (state.at(TokenKind.Comma, undefined, 1) || state.at(closing, undefined, 1))
}

function parseLabeledElements(
	state: ParserState,
	elementKind: LabeledElementKind,
	listKind: ListKind,
	closing: TokenKind
): SyntaxNode {
	const elements: Syntax[] = []
	while (!state.at(closing)) {
		const labeled = isLabelAhead(state)
		const label = labeled ? state.advance() : null
		const colon = labeled ? state.advance() : null
		const expression = isOperatorReference(state, closing)
			? makeNode(NodeKind.IdentifierExpr, { identifier: state.advance() })
			: parseExpression(state, DEFAULT_EXPR)
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(makeNode(elementKind, { colon, expression, label, trailingComma }))
		if (trailingComma === null) break
	}
	return makeList(listKind, elements)
}

function parseCollection(state: ParserState): SyntaxNode {
	const leftSquare = state.advance()
	if (state.at(TokenKind.RightBracket)) {
		const elements = makeList(NodeKind.ArrayElementList, [])
		return makeNode(NodeKind.ArrayExpr, { elements, leftSquare, rightSquare: state.advance() })
	}
	if (state.at(TokenKind.Colon) && state.at(TokenKind.RightBracket, undefined, 1)) {
		const content = state.advance()
		return makeNode(NodeKind.DictionaryExpr, { content, leftSquare, rightSquare: state.advance() })
	}

	const first = parseExpression(state, DEFAULT_EXPR)
	if (!state.at(TokenKind.Colon)) {
		const elements: Syntax[] = []
		let expression = first
		for (;;) {
			const trailingComma = state.eat(TokenKind.Comma)
			elements.push(makeNode(NodeKind.ArrayElement, { expression, trailingComma }))
			if (trailingComma === null || state.at(TokenKind.RightBracket)) break
			expression = parseExpression(state, DEFAULT_EXPR)
		}
		const rightSquare = state.expect(TokenKind.RightBracket, "']' to close the array literal")
		return makeNode(NodeKind.ArrayExpr, {
			elements: makeList(NodeKind.ArrayElementList, elements),
			leftSquare,
			rightSquare,
		})
	}

	const elements: Syntax[] = []
	let keyExpression = first
	for (;;) {
		const colon = state.expect(TokenKind.Colon, "':' in dictionary literal")
		const valueExpression = parseExpression(state, DEFAULT_EXPR)
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(
			makeNode(NodeKind.DictionaryElement, { colon, keyExpression, trailingComma, valueExpression })
		)
		if (trailingComma === null || state.at(TokenKind.RightBracket)) break
		keyExpression = parseExpression(state, DEFAULT_EXPR)
	}
	const rightSquare = state.expect(TokenKind.RightBracket, "']' to close the dictionary literal")
	return makeNode(NodeKind.DictionaryExpr, {
		content: makeList(NodeKind.DictionaryElementList, elements),
		leftSquare,
		rightSquare,
	})
}

export function parseClosure(state: ParserState): SyntaxNode {
	const leftBrace = state.expect(TokenKind.LeftBrace, "'{'")
	const signature = state.speculate(() => parseClosureSignature(state))
	const statements = parseStatementList(state)
	const rightBrace = state.expect(TokenKind.RightBrace, "'}' to close the closure")
	return makeNode(NodeKind.ClosureExpr, { leftBrace, rightBrace, signature, statements })
}

function parseCaptureList(state: ParserState): SyntaxNode | null {
	if (!state.at(TokenKind.LeftBracket)) return null
	const tokens: Syntax[] = [state.advance()]
	while (!state.at(TokenKind.RightBracket)) {
		if (state.atEnd()) state.fail("expected ']' to close the capture list")
		tokens.push(state.advance())
	}
	tokens.push(state.advance())
	return makeList(NodeKind.TokenList, tokens)
}

function parseClosureParams(state: ParserState): SyntaxNode {
	const params: Syntax[] = []
	for (;;) {
		const name = state.expect(TokenKind.Identifier, 'closure parameter name')
		const trailingComma = state.eat(TokenKind.Comma)
		params.push(makeNode(NodeKind.ClosureParam, { name, trailingComma }))
		if (trailingComma === null) break
	}
	return makeList(NodeKind.ClosureParamList, params)
}

/** `[capture] (params) async throws -> Result in`, every part optional but `in`. */
function parseClosureSignature(state: ParserState): SyntaxNode {
	const capture = parseCaptureList(state)
	let input: Syntax | null = null
	if (state.at(TokenKind.LeftParen)) input = parseParameterClause(state, 'closure')
	else if (state.at(TokenKind.Identifier)) input = parseClosureParams(state)
	const asyncKeyword = state.eat(TokenKind.Identifier, 'async')
	const throwsKeyword = state.eat(TokenKind.Keyword, 'throws')
	let output: Syntax | null = null
	if (state.atOperator('->')) {
		const arrow = state.advance()
		output = makeNode(NodeKind.ReturnClause, { arrow, returnType: parseType(state) })
	}
	const inKeyword = state.expectKeyword('in')
	return makeNode(NodeKind.ClosureSignature, { asyncKeyword, capture, inKeyword, input, output, throwsKeyword })
}
