/**
 * Declaration parsing: variables, functions, initializers, nominal types,
 * extensions, enum cases and operator declarations.
 */

import { makeList, makeNode, NodeKind, type Syntax, type SyntaxNode } from '../core/nodes.ts'
import { type SyntaxToken, TokenKind } from '../core/tokens.ts'
import { DECLARATION_MODIFIERS } from '../lex/lexer.ts'
import { parseExpression } from './expressions.ts'
import { parsePattern } from './patterns.ts'
import { DEFAULT_EXPR, type ParserState } from './state.ts'
import { atRegionContinuation, expectItemSeparator, parseCodeBlock, parseIfConfig } from './statements.ts'
import {
	parseOptionalGenericParameters,
	parseOptionalInheritance,
	parseOptionalWhereClause,
	parseType,
	parseTypeAnnotation,
} from './types.ts'

/** How parameter names are written in a parameter clause. */
export type ParameterStyle = 'closure' | 'enumCase' | 'function'

const DECLARATION_KEYWORDS: ReadonlySet<string> = new Set([
	'associatedtype',
	'case',
	'class',
	'deinit',
	'enum',
	'extension',
	'func',
	'import',
	'init',
	'let',
	'operator',
	'precedencegroup',
	'protocol',
	'struct',
	'subscript',
	'typealias',
	'var',
])

const ACCESSOR_KINDS: ReadonlySet<string> = new Set(['get', 'set', 'willSet', 'didSet'])

const IMPORT_KINDS: ReadonlySet<string> = new Set([
	'class',
	'enum',
	'func',
	'let',
	'protocol',
	'struct',
	'typealias',
	'var',
])

function isWord(token: SyntaxToken): boolean {
	return token.kind === TokenKind.Identifier || token.kind === TokenKind.Keyword
}

/** Index just past the `)` matching the `(` at `ahead`. */
function skipParenthesized(state: ParserState, ahead: number): number {
	let depth = 0
	let index = ahead
	for (;;) {
		const token = state.peek(index)
		if (token.kind === TokenKind.Eof) return index
		if (token.kind === TokenKind.LeftParen) depth++
		if (token.kind === TokenKind.RightParen && --depth === 0) return index + 1
		index++
	}
}

function isModifierAt(state: ParserState, ahead: number): boolean {
	const token = state.peek(ahead)
	if (!isWord(token)) return false
	if (token.kind === TokenKind.Keyword && token.text === 'class') {
		const next = state.peek(ahead + 1)
		return isWord(next) && (DECLARATION_KEYWORDS.has(next.text) || DECLARATION_MODIFIERS.has(next.text))
	}
	return DECLARATION_MODIFIERS.has(token.text)
}

/** Attributes and modifiers followed by a declaration keyword. */
export function isDeclarationStart(state: ParserState, from = 0): boolean {
	let ahead = from
	for (;;) {
		const token = state.peek(ahead)
		if (token.kind === TokenKind.Attribute) {
			ahead++
			if (state.at(TokenKind.LeftParen, undefined, ahead) && !state.spaceBefore(ahead)) {
				ahead = skipParenthesized(state, ahead)
			}
			continue
		}
		if (isModifierAt(state, ahead)) {
			ahead++
			if (state.at(TokenKind.LeftParen, undefined, ahead) && state.at(TokenKind.RightParen, undefined, ahead + 2)) {
				ahead += 3
			}
			continue
		}
		return token.kind === TokenKind.Keyword && DECLARATION_KEYWORDS.has(token.text)
	}
}

/** `{ get set }`, `{ didSet { ... } }` and friends, as opposed to a closure or code block. */
export function looksLikeAccessorBlock(state: ParserState): boolean {
	if (!state.at(TokenKind.LeftBrace)) return false
	let ahead = 1
	while (
		state.at(TokenKind.Attribute, undefined, ahead) ||
		state.atContextual('mutating', ahead) ||
		state.atContextual('nonmutating', ahead)
	) {
		ahead++
	}
	const kind = state.peek(ahead)
	if (kind.kind !== TokenKind.Identifier || !ACCESSOR_KINDS.has(kind.text)) return false
	const next = state.peek(ahead + 1)
	return (
		next.kind === TokenKind.LeftBrace ||
		next.kind === TokenKind.LeftParen ||
		next.kind === TokenKind.RightBrace ||
		(next.kind === TokenKind.Identifier && ACCESSOR_KINDS.has(next.text)) ||
		state.startsLine(ahead + 1)
	)
}

export function parseAttributes(state: ParserState): SyntaxNode | null {
	const attributes: Syntax[] = []
	while (state.at(TokenKind.Attribute)) {
		const name = state.advance()
		if (!state.at(TokenKind.LeftParen) || state.spaceBefore()) {
			attributes.push(makeNode(NodeKind.Attribute, { name }))
			continue
		}
		const leftParen = state.advance()
		const tokens: Syntax[] = []
		let depth = 0
		while (depth > 0 || !state.at(TokenKind.RightParen)) {
			if (state.atEnd()) state.fail("expected ')' to close the attribute arguments")
			if (state.at(TokenKind.LeftParen)) depth++
			if (state.at(TokenKind.RightParen)) depth--
			tokens.push(state.advance())
		}
		const rightParen = state.advance()
		attributes.push(
			makeNode(NodeKind.Attribute, {
				arguments: makeList(NodeKind.TokenList, tokens),
				leftParen,
				name,
				rightParen,
			})
		)
	}
	return attributes.length > 0 ? makeList(NodeKind.AttributeList, attributes) : null
}

function parseModifiers(state: ParserState): SyntaxNode | null {
	const modifiers: Syntax[] = []
	while (isModifierAt(state, 0)) {
		const name = state.advance()
		const hasDetail =
			state.at(TokenKind.LeftParen) && !state.spaceBefore() && state.at(TokenKind.RightParen, undefined, 2)
		if (!hasDetail) {
			modifiers.push(makeNode(NodeKind.DeclModifier, { name }))
			continue
		}
		const leftParen = state.advance()
		const detail = state.advance()
		const rightParen = state.advance()
		modifiers.push(makeNode(NodeKind.DeclModifier, { detail, leftParen, name, rightParen }))
	}
	return modifiers.length > 0 ? makeList(NodeKind.ModifierList, modifiers) : null
}

export function parseDeclaration(state: ParserState): SyntaxNode {
	const attributes = parseAttributes(state)
	const modifiers = parseModifiers(state)
	const keyword = state.peek()
	if (keyword.kind !== TokenKind.Keyword) {
		return state.fail(`expected declaration, found ${state.describeCurrent()}`)
	}
	switch (keyword.text) {
		case 'let':
		case 'var':
			return parseVariable(state, attributes, modifiers)
		case 'func':
			return parseFunction(state, attributes, modifiers)
		case 'init':
			return parseInitializer(state, attributes, modifiers)
		case 'deinit': {
			const deinitKeyword = state.advance()
			return makeNode(NodeKind.DeinitializerDecl, {
				attributes,
				body: parseCodeBlock(state),
				deinitKeyword,
				modifiers,
			})
		}
		case 'subscript':
			return parseSubscript(state, attributes, modifiers)
		case 'class':
			return parseNominal(state, NodeKind.ClassDecl, attributes, modifiers)
		case 'struct':
			return parseNominal(state, NodeKind.StructDecl, attributes, modifiers)
		case 'enum':
			return parseNominal(state, NodeKind.EnumDecl, attributes, modifiers)
		case 'protocol':
			return parseNominal(state, NodeKind.ProtocolDecl, attributes, modifiers)
		case 'extension':
			return parseExtension(state, attributes, modifiers)
		case 'case':
			return parseEnumCase(state, attributes, modifiers)
		case 'typealias':
			return parseTypealias(state, attributes, modifiers)
		case 'associatedtype':
			return parseAssociatedtype(state, attributes, modifiers)
		case 'import':
			return parseImport(state, attributes, modifiers)
		case 'precedencegroup':
			return parsePrecedenceGroup(state, attributes, modifiers)
		case 'operator':
			return parseOperator(state, attributes, modifiers)
	}
	return state.fail(`expected declaration, found '${keyword.text}'`)
}

function parseInitializerClause(state: ParserState): SyntaxNode | null {
	if (!state.atOperator('=')) return null
	const equal = state.advance()
	return makeNode(NodeKind.InitializerClause, { equal, value: parseExpression(state, DEFAULT_EXPR) })
}

function parseVariable(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const letOrVarKeyword = state.advance()
	const bindings: Syntax[] = []
	for (;;) {
		const pattern = parsePattern(state)
		const typeAnnotation = parseTypeAnnotation(state)
		const initializer = parseInitializerClause(state)
		const accessor =
			state.at(TokenKind.LeftBrace) && !state.startsLine() ? parseAccessorOrCodeBlock(state) : null
		const trailingComma = state.eat(TokenKind.Comma)
		bindings.push(
			makeNode(NodeKind.PatternBinding, { accessor, initializer, pattern, trailingComma, typeAnnotation })
		)
		if (trailingComma === null) break
	}
	return makeNode(NodeKind.VariableDecl, {
		attributes,
		bindings: makeList(NodeKind.PatternBindingList, bindings),
		letOrVarKeyword,
		modifiers,
	})
}

function parseAccessorOrCodeBlock(state: ParserState): SyntaxNode {
	if (!looksLikeAccessorBlock(state)) return parseCodeBlock(state)
	const leftBrace = state.advance()
	const accessors: Syntax[] = []
	while (!state.at(TokenKind.RightBrace) && !state.atEnd()) {
		const attributes = parseAttributes(state)
		const modifierName = state.eat(TokenKind.Identifier, 'mutating') ?? state.eat(TokenKind.Identifier, 'nonmutating')
		const modifier = modifierName === null ? null : makeNode(NodeKind.DeclModifier, { name: modifierName })
		const accessorKind = state.peek()
		if (accessorKind.kind !== TokenKind.Identifier || !ACCESSOR_KINDS.has(accessorKind.text)) {
			return state.fail(`expected 'get', 'set', 'willSet' or 'didSet', found ${state.describeCurrent()}`)
		}
		state.advance()
		let parameter: SyntaxNode | null = null
		if (state.at(TokenKind.LeftParen)) {
			const leftParen = state.advance()
			const name = state.expect(TokenKind.Identifier, 'accessor parameter name')
			const rightParen = state.expect(TokenKind.RightParen, "')'")
			parameter = makeNode(NodeKind.AccessorParameter, { leftParen, name, rightParen })
		}
		const body = state.at(TokenKind.LeftBrace) ? parseCodeBlock(state) : null
		accessors.push(
			makeNode(NodeKind.AccessorDecl, { accessorKind, attributes, body, modifier, parameter })
		)
	}
	const rightBrace = state.expect(TokenKind.RightBrace, "'}' to close the accessors")
	return makeNode(NodeKind.AccessorBlock, {
		accessors: makeList(NodeKind.AccessorList, accessors),
		leftBrace,
		rightBrace,
	})
}

function parseParameterNames(
	state: ParserState,
	style: ParameterStyle
): { firstName: SyntaxToken | null; secondName: SyntaxToken | null } {
	const first = state.peek()
	if (isWord(first) && state.at(TokenKind.Colon, undefined, 1)) {
		return { firstName: state.advance(), secondName: null }
	}
	if (isWord(first) && state.at(TokenKind.Identifier, undefined, 1) && state.at(TokenKind.Colon, undefined, 2)) {
		const firstName = state.advance()
		return { firstName, secondName: state.advance() }
	}
	switch (style) {
		case 'closure':
			return { firstName: state.expect(TokenKind.Identifier, 'parameter name'), secondName: null }
		case 'enumCase':
			return { firstName: null, secondName: null }
		case 'function':
			return state.fail(`expected parameter name, found ${state.describeCurrent()}`)
	}
}

export function parseParameterClause(state: ParserState, style: ParameterStyle): SyntaxNode {
	const leftParen = state.expect(TokenKind.LeftParen, "'('")
	const parameters: Syntax[] = []
	while (!state.at(TokenKind.RightParen)) {
		const attributes = parseAttributes(state)
		const { firstName, secondName } = parseParameterNames(state, style)
		const colon = state.eat(TokenKind.Colon)
		const typed = colon !== null || firstName === null
		const type = typed ? parseType(state) : null
		const ellipsis = typed && !state.spaceBefore() ? state.eatOperatorPrefix('...') : null
		const defaultArgument = parseInitializerClause(state)
		const trailingComma = state.eat(TokenKind.Comma)
		parameters.push(
			makeNode(NodeKind.FunctionParameter, {
				attributes,
				colon,
				defaultArgument,
				ellipsis,
				firstName,
				secondName,
				trailingComma,
				type,
			})
		)
		if (trailingComma === null) break
	}
	const rightParen = state.expect(TokenKind.RightParen, "')' to close the parameter list")
	return makeNode(NodeKind.ParameterClause, {
		leftParen,
		parameterList: makeList(NodeKind.FunctionParameterList, parameters),
		rightParen,
	})
}

function parseReturnClause(state: ParserState): SyntaxNode | null {
	if (!state.atOperator('->')) return null
	const arrow = state.advance()
	return makeNode(NodeKind.ReturnClause, { arrow, returnType: parseType(state) })
}

function parseEffects(state: ParserState): {
	asyncKeyword: SyntaxToken | null
	throwsOrRethrowsKeyword: SyntaxToken | null
} {
	const asyncKeyword = state.eat(TokenKind.Identifier, 'async')
	const throwsOrRethrowsKeyword =
		state.eat(TokenKind.Keyword, 'throws') ?? state.eat(TokenKind.Keyword, 'rethrows')
	return { asyncKeyword, throwsOrRethrowsKeyword }
}

function parseOptionalBody(state: ParserState): SyntaxNode | null {
	return state.at(TokenKind.LeftBrace) ? parseCodeBlock(state) : null
}

function parseFunction(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const funcKeyword = state.advance()
	const name = state.peek()
	if (name.kind !== TokenKind.Identifier && name.kind !== TokenKind.Operator) {
		return state.fail(`expected function name, found ${state.describeCurrent()}`)
	}
	const identifier = state.advance()
	const genericParameterClause = parseOptionalGenericParameters(state)
	const input = parseParameterClause(state, 'function')
	const effects = parseEffects(state)
	const output = parseReturnClause(state)
	const signature = makeNode(NodeKind.FunctionSignature, { ...effects, input, output })
	const genericWhereClause = parseOptionalWhereClause(state)
	return makeNode(NodeKind.FunctionDecl, {
		attributes,
		body: parseOptionalBody(state),
		funcKeyword,
		genericParameterClause,
		genericWhereClause,
		identifier,
		modifiers,
		signature,
	})
}

function parseInitializer(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const initKeyword = state.advance()
	const optionalMark = state.spaceBefore() ? null : (state.eatOperatorPrefix('?') ?? state.eatOperatorPrefix('!'))
	const genericParameterClause = parseOptionalGenericParameters(state)
	const parameters = parseParameterClause(state, 'function')
	const effects = parseEffects(state)
	const genericWhereClause = parseOptionalWhereClause(state)
	return makeNode(NodeKind.InitializerDecl, {
		...effects,
		attributes,
		body: parseOptionalBody(state),
		genericParameterClause,
		genericWhereClause,
		initKeyword,
		modifiers,
		optionalMark,
		parameters,
	})
}

function parseSubscript(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const subscriptKeyword = state.advance()
	const genericParameterClause = parseOptionalGenericParameters(state)
	const indices = parseParameterClause(state, 'function')
	const result = parseReturnClause(state) ?? state.fail("expected '->' in subscript declaration")
	const genericWhereClause = parseOptionalWhereClause(state)
	const accessor = state.at(TokenKind.LeftBrace) ? parseAccessorOrCodeBlock(state) : null
	return makeNode(NodeKind.SubscriptDecl, {
		accessor,
		attributes,
		genericParameterClause,
		genericWhereClause,
		indices,
		modifiers,
		result,
		subscriptKeyword,
	})
}

type NominalKind =
	| typeof NodeKind.ClassDecl
	| typeof NodeKind.EnumDecl
	| typeof NodeKind.ProtocolDecl
	| typeof NodeKind.StructDecl

function parseNominal(
	state: ParserState,
	kind: NominalKind,
	attributes: Syntax | null,
	modifiers: Syntax | null
): SyntaxNode {
	const keyword = state.advance()
	const identifier = state.expect(TokenKind.Identifier, 'type name')
	const genericParameterClause = parseOptionalGenericParameters(state)
	const inheritanceClause = parseOptionalInheritance(state)
	const genericWhereClause = parseOptionalWhereClause(state)
	return makeNode(kind, {
		attributes,
		genericParameterClause,
		genericWhereClause,
		identifier,
		inheritanceClause,
		keyword,
		members: parseMemberBlock(state),
		modifiers,
	})
}

function parseExtension(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const keyword = state.advance()
	const extendedType = parseType(state)
	const inheritanceClause = parseOptionalInheritance(state)
	const genericWhereClause = parseOptionalWhereClause(state)
	return makeNode(NodeKind.ExtensionDecl, {
		attributes,
		extendedType,
		genericWhereClause,
		inheritanceClause,
		keyword,
		members: parseMemberBlock(state),
		modifiers,
	})
}

function parseEnumCase(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const caseKeyword = state.advance()
	const elements: Syntax[] = []
	for (;;) {
		const identifier = state.expect(TokenKind.Identifier, 'enum case name')
		const associatedValue = state.at(TokenKind.LeftParen) ? parseParameterClause(state, 'enumCase') : null
		const rawValue = parseInitializerClause(state)
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(makeNode(NodeKind.EnumCaseElement, { associatedValue, identifier, rawValue, trailingComma }))
		if (trailingComma === null) break
	}
	return makeNode(NodeKind.EnumCaseDecl, {
		attributes,
		caseKeyword,
		elements: makeList(NodeKind.EnumCaseElementList, elements),
		modifiers,
	})
}

function parseTypeInitializer(state: ParserState): SyntaxNode | null {
	if (!state.atOperator('=')) return null
	const equal = state.advance()
	return makeNode(NodeKind.TypeInitializerClause, { equal, value: parseType(state) })
}

function parseTypealias(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const typealiasKeyword = state.advance()
	const identifier = state.expect(TokenKind.Identifier, 'type alias name')
	const genericParameterClause = parseOptionalGenericParameters(state)
	const initializer = parseTypeInitializer(state) ?? state.fail("expected '=' in type alias")
	return makeNode(NodeKind.TypealiasDecl, {
		attributes,
		genericParameterClause,
		identifier,
		initializer,
		modifiers,
		typealiasKeyword,
	})
}

function parseAssociatedtype(
	state: ParserState,
	attributes: Syntax | null,
	modifiers: Syntax | null
): SyntaxNode {
	const associatedtypeKeyword = state.advance()
	const identifier = state.expect(TokenKind.Identifier, 'associated type name')
	const inheritanceClause = parseOptionalInheritance(state)
	const initializer = parseTypeInitializer(state)
	const genericWhereClause = parseOptionalWhereClause(state)
	return makeNode(NodeKind.AssociatedtypeDecl, {
		associatedtypeKeyword,
		attributes,
		genericWhereClause,
		identifier,
		inheritanceClause,
		initializer,
		modifiers,
	})
}

function parseImport(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const importKeyword = state.advance()
	const path: Syntax[] = []
	const kind = state.peek()
	if (kind.kind === TokenKind.Keyword && IMPORT_KINDS.has(kind.text)) path.push(state.advance())
	path.push(state.expect(TokenKind.Identifier, 'module name'))
	while (state.at(TokenKind.Period)) {
		path.push(state.advance())
		const name = state.peek()
		if (!isWord(name) && name.kind !== TokenKind.Operator) state.fail('expected name after \'.\'')
		path.push(state.advance())
	}
	return makeNode(NodeKind.ImportDecl, {
		attributes,
		importKeyword,
		modifiers,
		path: makeList(NodeKind.TokenList, path),
	})
}

function atPrecedenceAttributeEnd(state: ParserState): boolean {
	return (
		state.atEnd() ||
		state.at(TokenKind.RightBrace) ||
		(state.at(TokenKind.Identifier) && state.at(TokenKind.Colon, undefined, 1))
	)
}

function parsePrecedenceGroup(
	state: ParserState,
	attributes: Syntax | null,
	modifiers: Syntax | null
): SyntaxNode {
	const precedencegroupKeyword = state.advance()
	const identifier = state.expect(TokenKind.Identifier, 'precedence group name')
	const leftBrace = state.expect(TokenKind.LeftBrace, "'{'")
	const groupAttributes: Syntax[] = []
	while (!state.at(TokenKind.RightBrace)) {
		const name = state.expect(TokenKind.Identifier, 'precedence group attribute')
		const colon = state.expect(TokenKind.Colon, "':'")
		const value: Syntax[] = []
		do {
			value.push(state.advance())
		} while (!atPrecedenceAttributeEnd(state))
		groupAttributes.push(
			makeNode(NodeKind.PrecedenceGroupAttribute, { colon, name, value: makeList(NodeKind.TokenList, value) })
		)
	}
	const rightBrace = state.advance()
	return makeNode(NodeKind.PrecedenceGroupDecl, {
		attributes,
		groupAttributes: makeList(NodeKind.PrecedenceGroupAttributeList, groupAttributes),
		identifier,
		leftBrace,
		modifiers,
		precedencegroupKeyword,
		rightBrace,
	})
}

function parseOperator(state: ParserState, attributes: Syntax | null, modifiers: Syntax | null): SyntaxNode {
	const operatorKeyword = state.advance()
	const identifier = state.expect(TokenKind.Operator, 'operator')
	const colon = state.eat(TokenKind.Colon)
	const precedenceGroup = colon === null ? null : state.expect(TokenKind.Identifier, 'precedence group name')
	return makeNode(NodeKind.OperatorDecl, {
		attributes,
		colon,
		identifier,
		modifiers,
		operatorKeyword,
		precedenceGroup,
	})
}

function parseMemberBlock(state: ParserState): SyntaxNode {
	const leftBrace = state.expect(TokenKind.LeftBrace, "'{' to open the declaration body")
	const members = parseMemberList(state)
	const rightBrace = state.expect(TokenKind.RightBrace, "'}' to close the declaration body")
	return makeNode(NodeKind.MemberDeclBlock, { leftBrace, members, rightBrace })
}

function atMemberListEnd(state: ParserState): boolean {
	return state.atEnd() || state.at(TokenKind.RightBrace) || atRegionContinuation(state)
}

export function parseMemberList(state: ParserState): SyntaxNode {
	const items: Syntax[] = []
	while (!atMemberListEnd(state)) {
		let decl: Syntax
		if (state.at(TokenKind.PoundKeyword, '#if')) decl = parseIfConfig(state, 'members')
		else if (isDeclarationStart(state)) decl = parseDeclaration(state)
		else decl = state.fail(`expected declaration, found ${state.describeCurrent()}`)
		const semicolon = state.eat(TokenKind.Semicolon)
		items.push(makeNode(NodeKind.MemberDeclListItem, { decl, semicolon }))
		expectItemSeparator(state, semicolon, atMemberListEnd(state))
	}
	return makeList(NodeKind.MemberDeclList, items)
}
