/**
 * Composite nodes of the concrete syntax tree.
 *
 * Nodes are immutable. A node is either a construct, whose children are named
 * slots fixed by its kind (absent slots hold null), or a list, whose children
 * are an open-ended sequence of present elements. Editing a child yields a new
 * node; untouched subtrees are shared.
 */

import { type SyntaxToken, tokenEquals, triviaText } from './tokens.ts'

/**
 * Node kinds - one per grammar production.
 * Grouped by category for clarity.
 */
export const NodeKind = {
	AccessorBlock: 57,
	AccessorDecl: 61,
	AccessorList: 4,
	AccessorParameter: 58,
	ArrayElement: 70,
	ArrayElementList: 14,
	ArrayExpr: 138,
	ArrayType: 174,
	AsExpr: 129,
	AssignmentExpr: 122,
	AssociatedtypeDecl: 96,
	Attribute: 45,
	AttributedType: 178,
	AttributeList: 23,
	AwaitExpr: 127,
	BinaryOperatorExpr: 121,
	BreakStmt: 102,
	CaseItem: 75,
	CaseItemList: 17,
	CatchClause: 79,
	CatchClauseList: 25,
	ClassDecl: 85,
	ClosureExpr: 135,
	ClosureParam: 73,
	ClosureParamList: 20,
	ClosureSignature: 136,
	CodeBlock: 42,
	CodeBlockItem: 41,

	// Lists (0-39)
	CodeBlockItemList: 0,
	ConditionElement: 76,
	ConditionElementList: 5,
	ContinueStmt: 103,
	DeclModifier: 46,
	DeferStmt: 104,
	DeinitializerDecl: 94,
	DictionaryElement: 71,
	DictionaryElementList: 15,
	DictionaryExpr: 139,
	DictionaryType: 175,
	DoStmt: 114,
	EnumCaseDecl: 89,
	EnumCaseElement: 74,
	EnumCaseElementList: 21,
	EnumDecl: 86,
	ExpressionPattern: 164,
	ExprList: 2,
	ExtensionDecl: 88,
	FallthroughStmt: 117,
	ForInStmt: 109,
	FunctionCallArgument: 72,
	FunctionCallArgumentList: 19,
	FunctionCallExpr: 133,
	FunctionDecl: 81,
	FunctionParameter: 62,
	FunctionParameterList: 6,
	FunctionSignature: 82,
	FunctionType: 177,
	GenericArgument: 64,
	GenericArgumentClause: 53,
	GenericArgumentList: 8,
	GenericParameter: 63,
	GenericParameterClause: 52,
	GenericParameterList: 7,
	GenericRequirement: 65,
	GenericRequirementList: 9,
	GenericWhereClause: 54,
	GuardStmt: 106,
	IdentifierExpr: 130,

	// Patterns (160-169)
	IdentifierPattern: 160,
	IfConfigClause: 78,
	IfConfigClauseList: 22,
	IfConfigDecl: 93,
	IfStmt: 105,
	ImplicitlyUnwrappedOptionalType: 173,
	ImportDecl: 91,
	InheritedType: 66,
	InheritedTypeList: 10,
	InitializerClause: 48,
	InitializerDecl: 83,
	IsExpr: 128,
	LiteralExpr: 131,
	MatchingPatternCondition: 116,
	MemberAccessExpr: 132,
	MemberDeclBlock: 43,
	MemberDeclList: 1,
	MemberDeclListItem: 44,
	MemberTypeIdentifier: 171,
	ModifierList: 24,
	OperatorDecl: 97,
	OptionalBindingCondition: 115,
	OptionalType: 172,
	ParameterClause: 50,
	PatternBinding: 60,
	PatternBindingList: 3,
	PatternExpr: 140,
	PostfixUnaryExpr: 125,
	PrecedenceGroupAttribute: 77,
	PrecedenceGroupAttributeList: 18,
	PrecedenceGroupDecl: 92,
	PrefixOperatorExpr: 124,
	ProtocolDecl: 87,
	RepeatWhileStmt: 108,
	ReturnClause: 51,

	// Statements (100-119)
	ReturnStmt: 100,

	// Expressions (120-159)
	SequenceExpr: 120,

	// Types (170-189)
	SimpleTypeIdentifier: 170,
	SomeType: 179,

	// Structure (40-59)
	SourceFile: 40,
	SpecializeExpr: 141,
	StructDecl: 84,
	SubscriptDecl: 95,
	SubscriptExpr: 134,
	SwitchCase: 111,
	SwitchCaseLabel: 112,
	SwitchCaseList: 16,
	SwitchDefaultLabel: 113,
	SwitchStmt: 110,
	TernaryExpr: 123,
	ThrowStmt: 101,
	TokenList: 26,
	TryExpr: 126,
	TupleExpr: 137,
	TupleExprElement: 69,
	TupleExprElementList: 13,
	TuplePattern: 162,
	TuplePatternElement: 67,
	TuplePatternElementList: 11,
	TupleType: 176,
	TupleTypeElement: 68,
	TupleTypeElementList: 12,
	TypealiasDecl: 90,
	TypeAnnotation: 47,
	TypeInheritanceClause: 55,
	TypeInitializerClause: 49,
	ValueBindingPattern: 163,

	// Declarations (80-99)
	VariableDecl: 80,
	WhereClause: 56,
	WhileStmt: 107,
	WildcardPattern: 161,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

const NOMINAL_SLOTS = [
	'attributes',
	'modifiers',
	'keyword',
	'identifier',
	'genericParameterClause',
	'inheritanceClause',
	'genericWhereClause',
	'members',
] as const

/**
 * Slot names of every construct kind, in source order.
 * Kinds missing from this table are lists.
 */
export const Layout = {
	[NodeKind.AccessorBlock]: ['leftBrace', 'accessors', 'rightBrace'],
	[NodeKind.AccessorDecl]: ['attributes', 'modifier', 'accessorKind', 'parameter', 'body'],
	[NodeKind.AccessorParameter]: ['leftParen', 'name', 'rightParen'],
	[NodeKind.ArrayElement]: ['expression', 'trailingComma'],
	[NodeKind.ArrayExpr]: ['leftSquare', 'elements', 'rightSquare'],
	[NodeKind.ArrayType]: ['leftSquare', 'elementType', 'rightSquare'],
	[NodeKind.AsExpr]: ['asKeyword', 'questionOrExclamationMark', 'typeName'],
	[NodeKind.AssignmentExpr]: ['assignToken'],
	[NodeKind.AssociatedtypeDecl]: [
		'attributes',
		'modifiers',
		'associatedtypeKeyword',
		'identifier',
		'inheritanceClause',
		'initializer',
		'genericWhereClause',
	],
	[NodeKind.Attribute]: ['name', 'leftParen', 'arguments', 'rightParen'],
	[NodeKind.AttributedType]: ['specifier', 'attributes', 'baseType'],
	[NodeKind.AwaitExpr]: ['awaitKeyword', 'expression'],
	[NodeKind.BinaryOperatorExpr]: ['operatorToken'],
	[NodeKind.BreakStmt]: ['breakKeyword', 'label'],
	[NodeKind.CaseItem]: ['pattern', 'whereClause', 'trailingComma'],
	[NodeKind.CatchClause]: ['catchKeyword', 'pattern', 'whereClause', 'body'],
	[NodeKind.ClassDecl]: NOMINAL_SLOTS,
	[NodeKind.ClosureExpr]: ['leftBrace', 'signature', 'statements', 'rightBrace'],
	[NodeKind.ClosureParam]: ['name', 'trailingComma'],
	[NodeKind.ClosureSignature]: [
		'capture',
		'input',
		'asyncKeyword',
		'throwsKeyword',
		'output',
		'inKeyword',
	],
	[NodeKind.CodeBlock]: ['leftBrace', 'statements', 'rightBrace'],
	[NodeKind.CodeBlockItem]: ['item', 'semicolon'],
	[NodeKind.ConditionElement]: ['condition', 'trailingComma'],
	[NodeKind.ContinueStmt]: ['continueKeyword', 'label'],
	[NodeKind.DeclModifier]: ['name', 'leftParen', 'detail', 'rightParen'],
	[NodeKind.DeferStmt]: ['deferKeyword', 'body'],
	[NodeKind.DeinitializerDecl]: ['attributes', 'modifiers', 'deinitKeyword', 'body'],
	[NodeKind.DictionaryElement]: ['keyExpression', 'colon', 'valueExpression', 'trailingComma'],
	[NodeKind.DictionaryExpr]: ['leftSquare', 'content', 'rightSquare'],
	[NodeKind.DictionaryType]: ['leftSquare', 'keyType', 'colon', 'valueType', 'rightSquare'],
	[NodeKind.DoStmt]: ['doKeyword', 'body', 'catchClauses'],
	[NodeKind.EnumCaseDecl]: ['attributes', 'modifiers', 'caseKeyword', 'elements'],
	[NodeKind.EnumCaseElement]: ['identifier', 'associatedValue', 'rawValue', 'trailingComma'],
	[NodeKind.EnumDecl]: NOMINAL_SLOTS,
	[NodeKind.ExpressionPattern]: ['expression'],
	[NodeKind.ExtensionDecl]: [
		'attributes',
		'modifiers',
		'keyword',
		'extendedType',
		'inheritanceClause',
		'genericWhereClause',
		'members',
	],
	[NodeKind.FallthroughStmt]: ['fallthroughKeyword'],
	[NodeKind.ForInStmt]: [
		'forKeyword',
		'caseKeyword',
		'pattern',
		'typeAnnotation',
		'inKeyword',
		'sequenceExpr',
		'whereClause',
		'body',
	],
	[NodeKind.FunctionCallArgument]: ['label', 'colon', 'expression', 'trailingComma'],
	[NodeKind.FunctionCallExpr]: [
		'calledExpression',
		'leftParen',
		'argumentList',
		'rightParen',
		'trailingClosure',
	],
	[NodeKind.FunctionDecl]: [
		'attributes',
		'modifiers',
		'funcKeyword',
		'identifier',
		'genericParameterClause',
		'signature',
		'genericWhereClause',
		'body',
	],
	[NodeKind.FunctionParameter]: [
		'attributes',
		'firstName',
		'secondName',
		'colon',
		'type',
		'ellipsis',
		'defaultArgument',
		'trailingComma',
	],
	[NodeKind.FunctionSignature]: ['input', 'asyncKeyword', 'throwsOrRethrowsKeyword', 'output'],
	[NodeKind.FunctionType]: [
		'leftParen',
		'arguments',
		'rightParen',
		'asyncKeyword',
		'throwsOrRethrowsKeyword',
		'arrow',
		'returnType',
	],
	[NodeKind.GenericArgument]: ['argumentType', 'trailingComma'],
	[NodeKind.GenericArgumentClause]: ['leftAngle', 'arguments', 'rightAngle'],
	[NodeKind.GenericParameter]: ['attributes', 'name', 'colon', 'inheritedType', 'trailingComma'],
	[NodeKind.GenericParameterClause]: ['leftAngle', 'parameters', 'rightAngle'],
	[NodeKind.GenericRequirement]: ['leftType', 'relation', 'rightType', 'trailingComma'],
	[NodeKind.GenericWhereClause]: ['whereKeyword', 'requirements'],
	[NodeKind.GuardStmt]: ['guardKeyword', 'conditions', 'elseKeyword', 'body'],
	[NodeKind.IdentifierExpr]: ['identifier'],
	[NodeKind.IdentifierPattern]: ['identifier'],
	[NodeKind.IfConfigClause]: ['poundKeyword', 'condition', 'elements'],
	[NodeKind.IfConfigDecl]: ['clauses', 'poundEndif'],
	[NodeKind.IfStmt]: ['ifKeyword', 'conditions', 'body', 'elseKeyword', 'elseBody'],
	[NodeKind.ImplicitlyUnwrappedOptionalType]: ['wrappedType', 'exclamationMark'],
	[NodeKind.ImportDecl]: ['attributes', 'modifiers', 'importKeyword', 'path'],
	[NodeKind.InheritedType]: ['typeName', 'trailingComma'],
	[NodeKind.InitializerClause]: ['equal', 'value'],
	[NodeKind.InitializerDecl]: [
		'attributes',
		'modifiers',
		'initKeyword',
		'optionalMark',
		'genericParameterClause',
		'parameters',
		'asyncKeyword',
		'throwsOrRethrowsKeyword',
		'genericWhereClause',
		'body',
	],
	[NodeKind.IsExpr]: ['isKeyword', 'typeName'],
	[NodeKind.LiteralExpr]: ['literal'],
	[NodeKind.MatchingPatternCondition]: ['caseKeyword', 'pattern', 'typeAnnotation', 'initializer'],
	[NodeKind.MemberAccessExpr]: ['base', 'dot', 'name'],
	[NodeKind.MemberDeclBlock]: ['leftBrace', 'members', 'rightBrace'],
	[NodeKind.MemberDeclListItem]: ['decl', 'semicolon'],
	[NodeKind.MemberTypeIdentifier]: ['baseType', 'period', 'name', 'genericArgumentClause'],
	[NodeKind.OperatorDecl]: [
		'attributes',
		'modifiers',
		'operatorKeyword',
		'identifier',
		'colon',
		'precedenceGroup',
	],
	[NodeKind.OptionalBindingCondition]: ['letOrVarKeyword', 'pattern', 'typeAnnotation', 'initializer'],
	[NodeKind.OptionalType]: ['wrappedType', 'questionMark'],
	[NodeKind.ParameterClause]: ['leftParen', 'parameterList', 'rightParen'],
	[NodeKind.PatternBinding]: ['pattern', 'typeAnnotation', 'initializer', 'accessor', 'trailingComma'],
	[NodeKind.PatternExpr]: ['pattern'],
	[NodeKind.PostfixUnaryExpr]: ['expression', 'operatorToken'],
	[NodeKind.PrecedenceGroupAttribute]: ['name', 'colon', 'value'],
	[NodeKind.PrecedenceGroupDecl]: [
		'attributes',
		'modifiers',
		'precedencegroupKeyword',
		'identifier',
		'leftBrace',
		'groupAttributes',
		'rightBrace',
	],
	[NodeKind.PrefixOperatorExpr]: ['operatorToken', 'postfixExpression'],
	[NodeKind.ProtocolDecl]: NOMINAL_SLOTS,
	[NodeKind.RepeatWhileStmt]: ['repeatKeyword', 'body', 'whileKeyword', 'condition'],
	[NodeKind.ReturnClause]: ['arrow', 'returnType'],
	[NodeKind.ReturnStmt]: ['returnKeyword', 'expression'],
	[NodeKind.SequenceExpr]: ['elements'],
	[NodeKind.SimpleTypeIdentifier]: ['name', 'genericArgumentClause'],
	[NodeKind.SomeType]: ['someSpecifier', 'baseType'],
	[NodeKind.SourceFile]: ['statements', 'eof'],
	[NodeKind.SpecializeExpr]: ['expression', 'genericArgumentClause'],
	[NodeKind.StructDecl]: NOMINAL_SLOTS,
	[NodeKind.SubscriptDecl]: [
		'attributes',
		'modifiers',
		'subscriptKeyword',
		'genericParameterClause',
		'indices',
		'result',
		'genericWhereClause',
		'accessor',
	],
	[NodeKind.SubscriptExpr]: [
		'calledExpression',
		'leftBracket',
		'argumentList',
		'rightBracket',
		'trailingClosure',
	],
	[NodeKind.SwitchCase]: ['label', 'statements'],
	[NodeKind.SwitchCaseLabel]: ['caseKeyword', 'caseItems', 'colon'],
	[NodeKind.SwitchDefaultLabel]: ['attributes', 'defaultKeyword', 'colon'],
	[NodeKind.SwitchStmt]: ['switchKeyword', 'expression', 'leftBrace', 'cases', 'rightBrace'],
	[NodeKind.TernaryExpr]: [
		'conditionExpression',
		'questionMark',
		'firstChoice',
		'colonMark',
		'secondChoice',
	],
	[NodeKind.ThrowStmt]: ['throwKeyword', 'expression'],
	[NodeKind.TryExpr]: ['tryKeyword', 'questionOrExclamationMark', 'expression'],
	[NodeKind.TupleExpr]: ['leftParen', 'elementList', 'rightParen'],
	[NodeKind.TupleExprElement]: ['label', 'colon', 'expression', 'trailingComma'],
	[NodeKind.TuplePattern]: ['leftParen', 'elements', 'rightParen'],
	[NodeKind.TuplePatternElement]: ['label', 'colon', 'pattern', 'trailingComma'],
	[NodeKind.TupleType]: ['leftParen', 'elements', 'rightParen'],
	[NodeKind.TupleTypeElement]: [
		'inOut',
		'name',
		'secondName',
		'colon',
		'type',
		'ellipsis',
		'trailingComma',
	],
	[NodeKind.TypeAnnotation]: ['colon', 'type'],
	[NodeKind.TypealiasDecl]: [
		'attributes',
		'modifiers',
		'typealiasKeyword',
		'identifier',
		'genericParameterClause',
		'initializer',
	],
	[NodeKind.TypeInheritanceClause]: ['colon', 'inheritedTypes'],
	[NodeKind.TypeInitializerClause]: ['equal', 'value'],
	[NodeKind.ValueBindingPattern]: ['letOrVarKeyword', 'valuePattern'],
	[NodeKind.VariableDecl]: ['attributes', 'modifiers', 'letOrVarKeyword', 'bindings'],
	[NodeKind.WhereClause]: ['whereKeyword', 'guardResult'],
	[NodeKind.WhileStmt]: ['whileKeyword', 'conditions', 'body'],
	[NodeKind.WildcardPattern]: ['wildcard', 'typeAnnotation'],
} as const satisfies Partial<Record<NodeKind, readonly string[]>>

export type ConstructKind = keyof typeof Layout
export type ListKind = Exclude<NodeKind, ConstructKind>
export type SlotName<K extends ConstructKind> = (typeof Layout)[K][number]

export interface SyntaxNode {
	readonly type: 'node'
	readonly kind: NodeKind
	readonly children: readonly Slot[]
}

export type Syntax = SyntaxToken | SyntaxNode
export type Slot = Syntax | null

export function isConstructKind(kind: NodeKind): kind is ConstructKind {
	return kind in Layout
}

export function isListKind(kind: NodeKind): kind is ListKind {
	return !isConstructKind(kind)
}

export function isNode(syntax: Slot | undefined): syntax is SyntaxNode {
	return syntax !== null && syntax !== undefined && syntax.type === 'node'
}

export function isNodeOf<K extends NodeKind>(
	syntax: Slot | undefined,
	kind: K
): syntax is SyntaxNode & { readonly kind: K } {
	return isNode(syntax) && syntax.kind === kind
}

export function isTokenSyntax(syntax: Slot | undefined): syntax is SyntaxToken {
	return syntax !== null && syntax !== undefined && syntax.type === 'token'
}

export function slotIndex<K extends ConstructKind>(kind: K, name: SlotName<K>): number {
	const names: readonly string[] = Layout[kind]
	const index = names.indexOf(name)
	if (index < 0) {
		throw new Error(`Unknown slot "${name}" for node kind ${kind}`)
	}
	return index
}

/** Build a construct from named slots; unnamed slots are absent. */
export function makeNode<K extends ConstructKind>(
	kind: K,
	slots: Partial<Record<SlotName<K>, Slot>>
): SyntaxNode {
	const names: readonly string[] = Layout[kind]
	const lookup: Partial<Record<string, Slot>> = slots
	const children = names.map((name) => lookup[name] ?? null)
	return { children, kind, type: 'node' }
}

export function makeList(kind: ListKind, elements: readonly Syntax[]): SyntaxNode {
	return { children: elements, kind, type: 'node' }
}

/** Read a named slot of a construct. */
export function getSlot<K extends ConstructKind>(node: SyntaxNode, kind: K, name: SlotName<K>): Slot {
	if (node.kind !== kind) {
		throw new Error(`Expected node kind ${kind}, found ${node.kind}`)
	}
	return node.children[slotIndex(kind, name)] ?? null
}

/** Returns `node` itself when the child is unchanged, so untouched subtrees stay shared. */
export function withChild(node: SyntaxNode, index: number, child: Slot): SyntaxNode {
	if (node.children[index] === child) return node
	const children = node.children.slice()
	children[index] = child
	return { ...node, children }
}

export function withChildren(node: SyntaxNode, children: readonly Slot[]): SyntaxNode {
	const unchanged =
		children.length === node.children.length && children.every((child, i) => child === node.children[i])
	return unchanged ? node : { ...node, children }
}

/**
 * Rebuilds one construct slot by slot.
 * Reads always see the latest value written.
 */
export class NodeEditor<K extends ConstructKind> {
	private readonly children: Slot[]
	private changed = false

	constructor(
		private readonly original: SyntaxNode,
		readonly kind: K
	) {
		if (original.kind !== kind) {
			throw new Error(`Expected node kind ${kind}, found ${original.kind}`)
		}
		this.children = original.children.slice()
	}

	get(name: SlotName<K>): Slot {
		return this.children[slotIndex(this.kind, name)] ?? null
	}

	set(name: SlotName<K>, value: Slot): void {
		const index = slotIndex(this.kind, name)
		if (this.children[index] === value) return
		this.children[index] = value
		this.changed = true
	}

	build(): SyntaxNode {
		if (!this.changed) return this.original
		return { children: this.children, kind: this.original.kind, type: 'node' }
	}
}

export function* tokensOf(syntax: Slot): Generator<SyntaxToken> {
	if (syntax === null) return
	if (syntax.type === 'token') {
		yield syntax
		return
	}
	for (const child of syntax.children) {
		yield* tokensOf(child)
	}
}

export function firstToken(syntax: Slot): SyntaxToken | null {
	for (const token of tokensOf(syntax)) return token
	return null
}

/** Prints the exact source text the tree was built from. */
export function printSyntax(syntax: Slot): string {
	let text = ''
	for (const token of tokensOf(syntax)) {
		text += triviaText(token.leading) + token.text + triviaText(token.trailing)
	}
	return text
}

/** Structural equality: same kinds, same children, same token text and trivia. */
export function syntaxEquals(a: Slot, b: Slot): boolean {
	if (a === b) return true
	if (a === null || b === null) return false
	if (a.type === 'token' || b.type === 'token') {
		return a.type === 'token' && b.type === 'token' && tokenEquals(a, b)
	}
	if (a.kind !== b.kind || a.children.length !== b.children.length) return false
	return a.children.every((child, i) => syntaxEquals(child, b.children[i] ?? null))
}

export function nodeKindName(kind: NodeKind): string {
	for (const [name, value] of Object.entries(NodeKind)) {
		if (value === kind) return name
	}
	return `NodeKind(${kind})`
}
