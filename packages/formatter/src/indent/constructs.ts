import { type ConstructKind, NodeKind, nodeKindName } from '../core/nodes.ts'
import { SlotWalk } from './slots.ts'
import type { HandlerEntry } from './walker.ts'

/**
 * Wraps a slot walk so the construct ends at the level it started at.
 */
function construct<K extends ConstructKind>(kind: K, body: (walk: SlotWalk<K>) => void): HandlerEntry {
	const owner = nodeKindName(kind)
	return [
		kind,
		(walker, node) => {
			const entry = walker.context.level
			const walk = new SlotWalk(walker, node, kind, owner)
			body(walk)
			walker.context.assertLevel(owner, entry)
			return walk.build()
		},
	]
}

export const CONSTRUCT_HANDLERS: readonly HandlerEntry[] = [
	// The body is walked after the header's indent is closed.
	construct(NodeKind.InitializerDecl, (walk) => {
		walk.plain('attributes', 'modifiers', 'initKeyword', 'optionalMark', 'genericParameterClause')
		walk.within('parameters', NodeKind.ParameterClause, (parameters) => {
			parameters.plain('leftParen', 'parameterList')
			parameters.designated('rightParen')
		})
		walk.plain('asyncKeyword')
		walk.designated('throwsOrRethrowsKeyword', 'genericWhereClause')
		walk.closeIndent()
		walk.plain('body')
	}),

	construct(NodeKind.FunctionDecl, (walk) => {
		walk.plain('attributes', 'modifiers', 'funcKeyword', 'identifier', 'genericParameterClause', 'signature')
		walk.designated('genericWhereClause')
		walk.closeIndent()
		walk.plain('body')
	}),

	construct(NodeKind.FunctionSignature, (walk) => {
		const { editorCompatibilityMode } = walk.config
		walk.within('input', NodeKind.ParameterClause, (input) => {
			input.designated('leftParen')
			input.plain('parameterList')
			if (editorCompatibilityMode) input.designated('rightParen')
			else input.plain('rightParen')
		})
		walk.plain('asyncKeyword')
		walk.designated('throwsOrRethrowsKeyword', 'output')
		walk.closeIndent()
	}),

	construct(NodeKind.GuardStmt, (walk) => {
		walk.plain('guardKeyword', 'conditions')
		walk.designated('elseKeyword', 'body')
		walk.closeIndent()
	}),

	construct(NodeKind.InitializerClause, (walk) => {
		walk.designated('equal', 'value')
		walk.closeIndent()
	}),

	construct(NodeKind.WhereClause, (walk) => {
		walk.designated('whereKeyword', 'guardResult')
		walk.closeIndent()
	}),

	construct(NodeKind.TernaryExpr, (walk) => {
		walk.plain('conditionExpression')
		walk.designated('questionMark', 'firstChoice', 'colonMark', 'secondChoice')
		walk.closeIndent()
	}),
]
