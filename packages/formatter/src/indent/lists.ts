import { NodeEditor, NodeKind, nodeKindName, type SyntaxNode, withChildren } from '../core/nodes.ts'
import type { IncrementFlag } from './slots.ts'
import type { HandlerEntry, IndentHandler, IndentWalker } from './walker.ts'

/**
 * Indents a list by at most one level. Each child gets its own method-chain
 * slot, and the first child that starts a line raises the level for the rest.
 * With `canIndent` false the rule still marks each child as examined.
 */
export function indentList(walker: IndentWalker, node: SyntaxNode, canIndent: boolean): SyntaxNode {
	const { context } = walker
	const owner = nodeKindName(node.kind)
	const entry = context.level
	const flag: IncrementFlag = { incremented: !canIndent }

	const children = node.children.map((child) => {
		if (child === null) return null
		context.pushChain()
		const visited = walker.visitIndented(child, flag, owner)
		context.popChain()
		return visited
	})

	if (canIndent && flag.incremented) context.decrement(owner)
	context.assertLevel(owner, entry)
	return withChildren(node, children)
}

const plainList: IndentHandler = (walker, node) => indentList(walker, node, true)

/**
 * Statement, member and case lists inside a suppressed `#if` region do not
 * indent, and lift the suppression for everything nested in them.
 */
function blockList(canIndent: (walker: IndentWalker) => boolean): IndentHandler {
	return (walker, node) => {
		const { context } = walker
		if (context.indentAllowed) return indentList(walker, node, canIndent(walker))

		context.pushAllowance(true)
		const result = indentList(walker, node, false)
		context.popAllowance()
		return result
	}
}

/** Top-level code sits at level zero. */
const sourceFile: IndentHandler = (walker, node) => {
	const editor = new NodeEditor(node, NodeKind.SourceFile)
	const statements = editor.get('statements')
	if (statements !== null && statements.type === 'node') {
		editor.set('statements', indentList(walker, statements, false))
	}
	editor.set('eof', walker.visitSlot(editor.get('eof')))
	return editor.build()
}

export const LIST_HANDLERS: readonly HandlerEntry[] = [
	[NodeKind.SourceFile, sourceFile],
	[NodeKind.CodeBlockItemList, blockList(() => true)],
	[NodeKind.MemberDeclList, blockList(() => true)],
	[NodeKind.SwitchCaseList, blockList((walker) => walker.context.config.indentSwitchCaseBodies)],
	[NodeKind.AccessorList, plainList],
	[NodeKind.ArrayElementList, plainList],
	[NodeKind.CaseItemList, plainList],
	[NodeKind.ClosureParamList, plainList],
	[NodeKind.ConditionElementList, plainList],
	[NodeKind.DictionaryElementList, plainList],
	[NodeKind.EnumCaseElementList, plainList],
	[NodeKind.ExprList, plainList],
	[NodeKind.FunctionCallArgumentList, plainList],
	[NodeKind.FunctionParameterList, plainList],
	[NodeKind.GenericArgumentList, plainList],
	[NodeKind.GenericParameterList, plainList],
	[NodeKind.GenericRequirementList, plainList],
	[NodeKind.InheritedTypeList, plainList],
	[NodeKind.PatternBindingList, plainList],
	[NodeKind.PrecedenceGroupAttributeList, plainList],
	[NodeKind.TupleExprElementList, plainList],
	[NodeKind.TuplePatternElementList, plainList],
	[NodeKind.TupleTypeElementList, plainList],
]
