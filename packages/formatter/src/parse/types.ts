/**
 * Type syntax: annotations, generic clauses and inheritance clauses.
 */

import { makeList, makeNode, NodeKind, type Syntax, type SyntaxNode } from '../core/nodes.ts'
import { type SyntaxToken, TokenKind } from '../core/tokens.ts'
import { parseAttributes } from './declarations.ts'
import type { ParserState } from './state.ts'

/** `name:` or `first second:` labels inside tuple types. */
interface TupleTypeLabels {
	name: SyntaxToken | null
	secondName: SyntaxToken | null
	colon: SyntaxToken | null
}

function isNameToken(state: ParserState, ahead: number): boolean {
	const kind = state.peek(ahead).kind
	return kind === TokenKind.Identifier || kind === TokenKind.Keyword
}

export function parseType(state: ParserState): Syntax {
	if (state.atKeyword('inout') || state.at(TokenKind.Attribute)) {
		const specifier = state.eat(TokenKind.Keyword, 'inout')
		const attributes = parseAttributes(state)
		return makeNode(NodeKind.AttributedType, { attributes, baseType: parseType(state), specifier })
	}
	if ((state.atContextual('some') || state.atContextual('any')) && isNameToken(state, 1)) {
		const someSpecifier = state.advance()
		return makeNode(NodeKind.SomeType, { baseType: parseType(state), someSpecifier })
	}
	return parseTypeSuffixes(state, parseTypeBase(state))
}

function parseTypeSuffixes(state: ParserState, base: Syntax): Syntax {
	let type = base
	for (;;) {
		if (!state.spaceBefore() && state.peek().text.startsWith('?')) {
			const questionMark = state.eatOperatorPrefix('?')
			type = makeNode(NodeKind.OptionalType, { questionMark, wrappedType: type })
			continue
		}
		if (!state.spaceBefore() && state.peek().text.startsWith('!')) {
			const exclamationMark = state.eatOperatorPrefix('!')
			type = makeNode(NodeKind.ImplicitlyUnwrappedOptionalType, { exclamationMark, wrappedType: type })
			continue
		}
		if (state.at(TokenKind.Period) && isNameToken(state, 1)) {
			const period = state.advance()
			const name = state.advance()
			type = makeNode(NodeKind.MemberTypeIdentifier, {
				baseType: type,
				genericArgumentClause: parseOptionalGenericArguments(state),
				name,
				period,
			})
			continue
		}
		return type
	}
}

function parseTypeBase(state: ParserState): Syntax {
	if (state.at(TokenKind.LeftParen)) return parseTupleOrFunctionType(state)
	if (state.at(TokenKind.LeftBracket)) return parseCollectionType(state)
	if (state.at(TokenKind.Identifier) || state.atKeyword('Self')) {
		const name = state.advance()
		return makeNode(NodeKind.SimpleTypeIdentifier, {
			genericArgumentClause: parseOptionalGenericArguments(state),
			name,
		})
	}
	return state.fail(`expected type, found ${state.describeCurrent()}`)
}

function parseTupleTypeLabels(state: ParserState): TupleTypeLabels {
	if (isNameToken(state, 0) && state.at(TokenKind.Colon, undefined, 1)) {
		const name = state.advance()
		return { colon: state.advance(), name, secondName: null }
	}
	if (isNameToken(state, 0) && isNameToken(state, 1) && state.at(TokenKind.Colon, undefined, 2)) {
		const name = state.advance()
		const secondName = state.advance()
		return { colon: state.advance(), name, secondName }
	}
	return { colon: null, name: null, secondName: null }
}

function parseTupleOrFunctionType(state: ParserState): SyntaxNode {
	const leftParen = state.advance()
	const elements: Syntax[] = []
	while (!state.at(TokenKind.RightParen)) {
		const inOut = state.eat(TokenKind.Keyword, 'inout')
		const labels = parseTupleTypeLabels(state)
		const type = parseType(state)
		const ellipsis = state.spaceBefore() ? null : state.eatOperatorPrefix('...')
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(makeNode(NodeKind.TupleTypeElement, { ...labels, ellipsis, inOut, trailingComma, type }))
		if (trailingComma === null) break
	}
	const rightParen = state.expect(TokenKind.RightParen, "')'")
	const list = makeList(NodeKind.TupleTypeElementList, elements)

	const asyncKeyword = state.eat(TokenKind.Identifier, 'async')
	const throwsOrRethrowsKeyword =
		state.eat(TokenKind.Keyword, 'throws') ?? state.eat(TokenKind.Keyword, 'rethrows')
	if (asyncKeyword === null && throwsOrRethrowsKeyword === null && !state.atOperator('->')) {
		return makeNode(NodeKind.TupleType, { elements: list, leftParen, rightParen })
	}
	const arrow = state.expect(TokenKind.Operator, "'->'", '->')
	return makeNode(NodeKind.FunctionType, {
		arguments: list,
		arrow,
		asyncKeyword,
		leftParen,
		returnType: parseType(state),
		rightParen,
		throwsOrRethrowsKeyword,
	})
}

function parseCollectionType(state: ParserState): SyntaxNode {
	const leftSquare = state.advance()
	const elementType = parseType(state)
	const colon = state.eat(TokenKind.Colon)
	if (colon === null) {
		const rightSquare = state.expect(TokenKind.RightBracket, "']'")
		return makeNode(NodeKind.ArrayType, { elementType, leftSquare, rightSquare })
	}
	const valueType = parseType(state)
	const rightSquare = state.expect(TokenKind.RightBracket, "']'")
	return makeNode(NodeKind.DictionaryType, { colon, keyType: elementType, leftSquare, rightSquare, valueType })
}

export function parseTypeAnnotation(state: ParserState): SyntaxNode | null {
	const colon = state.eat(TokenKind.Colon)
	if (colon === null) return null
	return makeNode(NodeKind.TypeAnnotation, { colon, type: parseType(state) })
}

/** `<` directly attached to the preceding name opens a generic argument clause. */
export function parseOptionalGenericArguments(state: ParserState): SyntaxNode | null {
	if (state.spaceBefore() || !state.at(TokenKind.Operator) || !state.peek().text.startsWith('<')) {
		return null
	}
	return parseGenericArgumentClause(state)
}

export function parseGenericArgumentClause(state: ParserState): SyntaxNode {
	const leftAngle = state.eatOperatorPrefix('<') ?? state.fail("expected '<'")
	const args: Syntax[] = []
	for (;;) {
		const argumentType = parseType(state)
		const trailingComma = state.eat(TokenKind.Comma)
		args.push(makeNode(NodeKind.GenericArgument, { argumentType, trailingComma }))
		if (trailingComma === null) break
	}
	const rightAngle = state.eatOperatorPrefix('>') ?? state.fail("expected '>'")
	return makeNode(NodeKind.GenericArgumentClause, {
		arguments: makeList(NodeKind.GenericArgumentList, args),
		leftAngle,
		rightAngle,
	})
}

export function parseOptionalGenericParameters(state: ParserState): SyntaxNode | null {
	if (!state.at(TokenKind.Operator) || !state.peek().text.startsWith('<')) return null
	const leftAngle = state.eatOperatorPrefix('<') ?? state.fail("expected '<'")
	const parameters: Syntax[] = []
	for (;;) {
		const attributes = parseAttributes(state)
		const name = state.expect(TokenKind.Identifier, 'generic parameter name')
		const colon = state.eat(TokenKind.Colon)
		const inheritedType = colon === null ? null : parseType(state)
		const trailingComma = state.eat(TokenKind.Comma)
		parameters.push(
			makeNode(NodeKind.GenericParameter, { attributes, colon, inheritedType, name, trailingComma })
		)
		if (trailingComma === null) break
	}
	const rightAngle = state.eatOperatorPrefix('>') ?? state.fail("expected '>'")
	return makeNode(NodeKind.GenericParameterClause, {
		leftAngle,
		parameters: makeList(NodeKind.GenericParameterList, parameters),
		rightAngle,
	})
}

export function parseOptionalWhereClause(state: ParserState): SyntaxNode | null {
	const whereKeyword = state.eat(TokenKind.Keyword, 'where')
	if (whereKeyword === null) return null
	const requirements: Syntax[] = []
	for (;;) {
		const leftType = parseType(state)
		const relation = state.eat(TokenKind.Colon) ?? state.expect(TokenKind.Operator, "':' or '=='", '==')
		const rightType = parseType(state)
		const trailingComma = state.eat(TokenKind.Comma)
		requirements.push(makeNode(NodeKind.GenericRequirement, { leftType, relation, rightType, trailingComma }))
		if (trailingComma === null) break
	}
	return makeNode(NodeKind.GenericWhereClause, {
		requirements: makeList(NodeKind.GenericRequirementList, requirements),
		whereKeyword,
	})
}

export function parseOptionalInheritance(state: ParserState): SyntaxNode | null {
	const colon = state.eat(TokenKind.Colon)
	if (colon === null) return null
	const inherited: Syntax[] = []
	for (;;) {
		const classKeyword = state.eat(TokenKind.Keyword, 'class')
		const typeName =
			classKeyword === null
				? parseType(state)
				: makeNode(NodeKind.SimpleTypeIdentifier, { genericArgumentClause: null, name: classKeyword })
		const trailingComma = state.eat(TokenKind.Comma)
		inherited.push(makeNode(NodeKind.InheritedType, { trailingComma, typeName }))
		if (trailingComma === null) break
	}
	return makeNode(NodeKind.TypeInheritanceClause, {
		colon,
		inheritedTypes: makeList(NodeKind.InheritedTypeList, inherited),
	})
}
