/**
 * Statement parsing, including `#if` regions in statement, member and
 * switch-case position.
 */

import { makeList, makeNode, NodeKind, type Syntax, type SyntaxNode } from '../core/nodes.ts'
import { type SyntaxToken, TokenKind } from '../core/tokens.ts'
import { isDeclarationStart, parseAttributes, parseDeclaration, parseMemberList } from './declarations.ts'
import { parseExpression } from './expressions.ts'
import { parseCasePattern, parsePattern } from './patterns.ts'
import { CONDITION_EXPR, DEFAULT_EXPR, type ParserState } from './state.ts'
import { parseTypeAnnotation } from './types.ts'

/** What the clauses of an `#if` region contain. */
export type RegionContent = 'members' | 'statements' | 'switchCases'

const REGION_CONTINUATIONS: ReadonlySet<string> = new Set(['#elseif', '#else', '#endif'])

export function atRegionContinuation(state: ParserState): boolean {
	return state.at(TokenKind.PoundKeyword) && REGION_CONTINUATIONS.has(state.peek().text)
}

function atSwitchLabel(state: ParserState): boolean {
	if (state.atKeyword('case') || state.atKeyword('default')) return true
	return state.at(TokenKind.Attribute, '@unknown') && state.atKeyword('default', 1)
}

/** A statement list ends at `}`, at a switch label, at `#elseif`/`#else`/`#endif`, or at end of file. */
export function atStatementListEnd(state: ParserState): boolean {
	return (
		state.atEnd() || state.at(TokenKind.RightBrace) || atRegionContinuation(state) || atSwitchLabel(state)
	)
}

/** Consecutive items on one line must be separated by `;`. */
export function expectItemSeparator(state: ParserState, semicolon: SyntaxToken | null, atEnd: boolean): void {
	if (semicolon === null && !atEnd && !state.startsLine()) {
		state.fail('statements must be separated by a newline or semicolon', 'IKPARSE002')
	}
}

/** `#if` whose first clause starts with a switch label wraps whole cases, not statements. */
function atSwitchCaseRegion(state: ParserState): boolean {
	if (!state.at(TokenKind.PoundKeyword, '#if')) return false
	let ahead = 1
	while (!state.startsLine(ahead) && !state.at(TokenKind.Eof, undefined, ahead)) ahead++
	return (
		state.atKeyword('case', ahead) ||
		state.atKeyword('default', ahead) ||
		state.at(TokenKind.Attribute, '@unknown', ahead)
	)
}

/** In a switch case body the list also ends before an `#if` that wraps further cases. */
export function parseStatementList(state: ParserState, inSwitchCase = false): SyntaxNode {
	const items: Syntax[] = []
	while (!atStatementListEnd(state) && !(inSwitchCase && atSwitchCaseRegion(state))) {
		const item = parseStatement(state)
		const semicolon = state.eat(TokenKind.Semicolon)
		items.push(makeNode(NodeKind.CodeBlockItem, { item, semicolon }))
		expectItemSeparator(state, semicolon, atStatementListEnd(state))
	}
	return makeList(NodeKind.CodeBlockItemList, items)
}

export function parseCodeBlock(state: ParserState): SyntaxNode {
	const leftBrace = state.expect(TokenKind.LeftBrace, "'{'")
	const statements = parseStatementList(state)
	const rightBrace = state.expect(TokenKind.RightBrace, "'}' to close the block")
	return makeNode(NodeKind.CodeBlock, { leftBrace, rightBrace, statements })
}

export function parseStatement(state: ParserState): Syntax {
	if (state.at(TokenKind.PoundKeyword, '#if')) return parseIfConfig(state, 'statements')
	if (isDeclarationStart(state)) return parseDeclaration(state)
	if (state.at(TokenKind.Keyword)) {
		const statement = parseKeywordStatement(state, state.peek().text)
		if (statement !== null) return statement
	}
	return parseExpression(state, DEFAULT_EXPR)
}

function parseKeywordStatement(state: ParserState, keyword: string): SyntaxNode | null {
	switch (keyword) {
		case 'return': {
			const returnKeyword = state.advance()
			const hasValue = !atStatementListEnd(state) && !state.startsLine() && !state.at(TokenKind.Semicolon)
			const expression = hasValue ? parseExpression(state, DEFAULT_EXPR) : null
			return makeNode(NodeKind.ReturnStmt, { expression, returnKeyword })
		}
		case 'throw': {
			const throwKeyword = state.advance()
			return makeNode(NodeKind.ThrowStmt, { expression: parseExpression(state, DEFAULT_EXPR), throwKeyword })
		}
		case 'break': {
			const breakKeyword = state.advance()
			return makeNode(NodeKind.BreakStmt, { breakKeyword, label: parseJumpLabel(state) })
		}
		case 'continue': {
			const continueKeyword = state.advance()
			return makeNode(NodeKind.ContinueStmt, { continueKeyword, label: parseJumpLabel(state) })
		}
		case 'fallthrough':
			return makeNode(NodeKind.FallthroughStmt, { fallthroughKeyword: state.advance() })
		case 'defer': {
			const deferKeyword = state.advance()
			return makeNode(NodeKind.DeferStmt, { body: parseCodeBlock(state), deferKeyword })
		}
		case 'if':
			return parseIf(state)
		case 'guard':
			return parseGuard(state)
		case 'while': {
			const whileKeyword = state.advance()
			const conditions = parseConditions(state)
			return makeNode(NodeKind.WhileStmt, { body: parseCodeBlock(state), conditions, whileKeyword })
		}
		case 'repeat':
			return parseRepeat(state)
		case 'for':
			return parseForIn(state)
		case 'switch':
			return parseSwitch(state)
		case 'do':
			return parseDo(state)
		default:
			return null
	}
}

function parseJumpLabel(state: ParserState): SyntaxToken | null {
	if (!state.at(TokenKind.Identifier) || state.startsLine()) return null
	return state.advance()
}

function parseInitializerClause(state: ParserState): SyntaxNode | null {
	if (!state.atOperator('=')) return null
	const equal = state.advance()
	return makeNode(NodeKind.InitializerClause, { equal, value: parseExpression(state, CONDITION_EXPR) })
}

function parseCondition(state: ParserState): Syntax {
	if (state.atKeyword('let') || state.atKeyword('var')) {
		const letOrVarKeyword = state.advance()
		const pattern = parsePattern(state)
		const typeAnnotation = parseTypeAnnotation(state)
		return makeNode(NodeKind.OptionalBindingCondition, {
			initializer: parseInitializerClause(state),
			letOrVarKeyword,
			pattern,
			typeAnnotation,
		})
	}
	if (state.atKeyword('case')) {
		const caseKeyword = state.advance()
		const pattern = parseCasePattern(state)
		const typeAnnotation = parseTypeAnnotation(state)
		const initializer = parseInitializerClause(state) ?? state.fail("expected '=' in 'case' condition")
		return makeNode(NodeKind.MatchingPatternCondition, { caseKeyword, initializer, pattern, typeAnnotation })
	}
	return parseExpression(state, CONDITION_EXPR)
}

export function parseConditions(state: ParserState): SyntaxNode {
	const elements: Syntax[] = []
	for (;;) {
		const condition = parseCondition(state)
		const trailingComma = state.eat(TokenKind.Comma)
		elements.push(makeNode(NodeKind.ConditionElement, { condition, trailingComma }))
		if (trailingComma === null) break
	}
	return makeList(NodeKind.ConditionElementList, elements)
}

function parseIf(state: ParserState): SyntaxNode {
	const ifKeyword = state.expectKeyword('if')
	const conditions = parseConditions(state)
	const body = parseCodeBlock(state)
	const elseKeyword = state.eat(TokenKind.Keyword, 'else')
	let elseBody: Syntax | null = null
	if (elseKeyword !== null) elseBody = state.atKeyword('if') ? parseIf(state) : parseCodeBlock(state)
	return makeNode(NodeKind.IfStmt, { body, conditions, elseBody, elseKeyword, ifKeyword })
}

function parseGuard(state: ParserState): SyntaxNode {
	const guardKeyword = state.advance()
	const conditions = parseConditions(state)
	const elseKeyword = state.expectKeyword('else')
	return makeNode(NodeKind.GuardStmt, { body: parseCodeBlock(state), conditions, elseKeyword, guardKeyword })
}

function parseRepeat(state: ParserState): SyntaxNode {
	const repeatKeyword = state.advance()
	const body = parseCodeBlock(state)
	const whileKeyword = state.expectKeyword('while')
	const condition = parseExpression(state, CONDITION_EXPR)
	return makeNode(NodeKind.RepeatWhileStmt, { body, condition, repeatKeyword, whileKeyword })
}

function parseWhereClause(state: ParserState): SyntaxNode | null {
	const whereKeyword = state.eat(TokenKind.Keyword, 'where')
	if (whereKeyword === null) return null
	return makeNode(NodeKind.WhereClause, { guardResult: parseExpression(state, CONDITION_EXPR), whereKeyword })
}

function parseForIn(state: ParserState): SyntaxNode {
	const forKeyword = state.advance()
	const caseKeyword = state.eat(TokenKind.Keyword, 'case')
	const pattern = caseKeyword === null ? parsePattern(state) : parseCasePattern(state)
	const typeAnnotation = parseTypeAnnotation(state)
	const inKeyword = state.expectKeyword('in')
	const sequenceExpr = parseExpression(state, CONDITION_EXPR)
	const whereClause = parseWhereClause(state)
	return makeNode(NodeKind.ForInStmt, {
		body: parseCodeBlock(state),
		caseKeyword,
		forKeyword,
		inKeyword,
		pattern,
		sequenceExpr,
		typeAnnotation,
		whereClause,
	})
}

function parseSwitch(state: ParserState): SyntaxNode {
	const switchKeyword = state.advance()
	const expression = parseExpression(state, CONDITION_EXPR)
	const leftBrace = state.expect(TokenKind.LeftBrace, "'{' after switch subject")
	const cases = parseSwitchCases(state)
	const rightBrace = state.expect(TokenKind.RightBrace, "'}' to close the switch")
	return makeNode(NodeKind.SwitchStmt, { cases, expression, leftBrace, rightBrace, switchKeyword })
}

function parseSwitchCases(state: ParserState): SyntaxNode {
	const cases: Syntax[] = []
	while (!state.atEnd() && !state.at(TokenKind.RightBrace) && !atRegionContinuation(state)) {
		if (state.at(TokenKind.PoundKeyword, '#if')) {
			cases.push(parseIfConfig(state, 'switchCases'))
			continue
		}
		cases.push(parseSwitchCase(state))
	}
	return makeList(NodeKind.SwitchCaseList, cases)
}

function parseSwitchCase(state: ParserState): SyntaxNode {
	let label: SyntaxNode
	if (state.atKeyword('case')) {
		const caseKeyword = state.advance()
		const items: Syntax[] = []
		for (;;) {
			const pattern = parseCasePattern(state)
			const whereClause = parseWhereClause(state)
			const trailingComma = state.eat(TokenKind.Comma)
			items.push(makeNode(NodeKind.CaseItem, { pattern, trailingComma, whereClause }))
			if (trailingComma === null) break
		}
		const colon = state.expect(TokenKind.Colon, "':' after case patterns")
		label = makeNode(NodeKind.SwitchCaseLabel, {
			caseItems: makeList(NodeKind.CaseItemList, items),
			caseKeyword,
			colon,
		})
	} else {
		const attributes = parseAttributes(state)
		const defaultKeyword = state.expectKeyword('default')
		const colon = state.expect(TokenKind.Colon, "':' after 'default'")
		label = makeNode(NodeKind.SwitchDefaultLabel, { attributes, colon, defaultKeyword })
	}
	return makeNode(NodeKind.SwitchCase, { label, statements: parseStatementList(state, true) })
}

function parseDo(state: ParserState): SyntaxNode {
	const doKeyword = state.advance()
	const body = parseCodeBlock(state)
	const clauses: Syntax[] = []
	while (state.atKeyword('catch')) {
		const catchKeyword = state.advance()
		const pattern = state.at(TokenKind.LeftBrace) || state.atKeyword('where') ? null : parseCasePattern(state)
		const whereClause = parseWhereClause(state)
		clauses.push(makeNode(NodeKind.CatchClause, { body: parseCodeBlock(state), catchKeyword, pattern, whereClause }))
	}
	const catchClauses = clauses.length > 0 ? makeList(NodeKind.CatchClauseList, clauses) : null
	return makeNode(NodeKind.DoStmt, { body, catchClauses, doKeyword })
}

function parseRegionContent(state: ParserState, content: RegionContent): SyntaxNode {
	switch (content) {
		case 'members':
			return parseMemberList(state)
		case 'statements':
			return parseStatementList(state)
		case 'switchCases':
			return parseSwitchCases(state)
	}
}

/** `#if cond ... #elseif cond ... #else ... #endif` */
export function parseIfConfig(state: ParserState, content: RegionContent): SyntaxNode {
	const clauses: Syntax[] = []
	do {
		const poundKeyword = state.advance()
		const condition = poundKeyword.text === '#else' ? null : parseExpression(state, CONDITION_EXPR)
		const elements = parseRegionContent(state, content)
		clauses.push(makeNode(NodeKind.IfConfigClause, { condition, elements, poundKeyword }))
	} while (state.at(TokenKind.PoundKeyword, '#elseif') || state.at(TokenKind.PoundKeyword, '#else'))
	const poundEndif = state.expect(TokenKind.PoundKeyword, "'#endif'", '#endif')
	return makeNode(NodeKind.IfConfigDecl, {
		clauses: makeList(NodeKind.IfConfigClauseList, clauses),
		poundEndif,
	})
}
