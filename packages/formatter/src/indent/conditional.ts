import { NodeKind } from '../core/nodes.ts'
import type { HandlerEntry, IndentHandler } from './walker.ts'

/**
 * `#if` clause lists suppress indentation of the statement, member or case
 * list directly inside each clause, unless regions are configured to indent.
 */
const clauseList: IndentHandler = (walker, node) => {
	const { context } = walker
	if (context.config.indentConditionalRegions) return walker.visitChildren(node)

	context.pushAllowance(false)
	const result = walker.visitChildren(node)
	context.popAllowance()
	return result
}

export const CONDITIONAL_HANDLERS: readonly HandlerEntry[] = [[NodeKind.IfConfigClauseList, clauseList]]
