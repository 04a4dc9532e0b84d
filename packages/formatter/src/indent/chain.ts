import { getSlot, isNodeOf, NodeKind, nodeKindName, type Slot } from '../core/nodes.ts'
import { SlotWalk } from './slots.ts'
import type { HandlerEntry, IndentHandler } from './walker.ts'

// A chain raises the level once, at its first `.` on a new line, and the
// outermost call or access of the chain lowers it again.

const CALL = nodeKindName(NodeKind.FunctionCallExpr)
const ACCESS = nodeKindName(NodeKind.MemberAccessExpr)

const functionCall: IndentHandler = (walker, node) => {
	const { context } = walker
	context.claimChain(node)
	const result = walker.visitChildren(node)
	if (context.ownsIncrementedChain(node)) context.decrement(CALL)
	context.releaseChain(node)
	return result
}

/** `a.b().c`: the base is a call on another member access. */
function callsMemberAccess(base: Slot): boolean {
	return (
		isNodeOf(base, NodeKind.FunctionCallExpr) &&
		isNodeOf(getSlot(base, NodeKind.FunctionCallExpr, 'calledExpression'), NodeKind.MemberAccessExpr)
	)
}

const memberAccess: IndentHandler = (walker, node) => {
	const { context } = walker
	context.claimChain(node)
	const walk = new SlotWalk(walker, node, NodeKind.MemberAccessExpr, ACCESS)

	if (callsMemberAccess(walk.get('base'))) {
		walk.within('base', NodeKind.FunctionCallExpr, (call) => {
			call.plain('calledExpression', 'leftParen', 'argumentList')
			walk.flag.incremented = context.chainIncremented
			if (!walk.config.editorCompatibilityMode) {
				call.plain('rightParen', 'trailingClosure')
				return
			}
			// The closing `)` and `}` line up with the chain's dots.
			call.designated('rightParen')
			call.within('trailingClosure', NodeKind.ClosureExpr, (closure) => {
				closure.plain('leftBrace', 'signature', 'statements')
				closure.designated('rightBrace')
			})
		})
	} else {
		walk.plain('base')
		walk.flag.incremented = context.chainIncremented
	}

	walk.designated('dot')
	if (walk.flag.incremented) context.markChainIncremented()
	walk.plain('name')

	const result = walk.build()
	if (context.ownsIncrementedChain(node)) context.decrement(ACCESS)
	context.releaseChain(node)
	return result
}

export const CHAIN_HANDLERS: readonly HandlerEntry[] = [
	[NodeKind.FunctionCallExpr, functionCall],
	[NodeKind.MemberAccessExpr, memberAccess],
]
