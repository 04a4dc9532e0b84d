import { firstToken, type NodeKind, type Slot, type Syntax, type SyntaxNode, withChild } from '../core/nodes.ts'
import { hasNewline, type SyntaxToken } from '../core/tokens.ts'
import { CHAIN_HANDLERS } from './chain.ts'
import { CONDITIONAL_HANDLERS } from './conditional.ts'
import { CONSTRUCT_HANDLERS } from './constructs.ts'
import type { IndentContext } from './context.ts'
import { LIST_HANDLERS } from './lists.ts'
import type { IncrementFlag } from './slots.ts'
import { isClosingSymbol, reindentToken } from './trivia.ts'

/** Rewrites one node kind and everything below it. */
export type IndentHandler = (walker: IndentWalker, node: SyntaxNode) => SyntaxNode
export type HandlerEntry = readonly [NodeKind, IndentHandler]

const HANDLERS: ReadonlyMap<NodeKind, IndentHandler> = new Map([
	...LIST_HANDLERS,
	...CONSTRUCT_HANDLERS,
	...CHAIN_HANDLERS,
	...CONDITIONAL_HANDLERS,
])

/**
 * Single depth-first pass over a tree.
 * Kinds without a handler are walked child by child.
 */
export class IndentWalker {
	readonly context: IndentContext
	private readonly programStart: SyntaxToken | null

	constructor(context: IndentContext, tree: SyntaxNode) {
		this.context = context
		this.programStart = firstToken(tree)
	}

	visit(syntax: Syntax): Syntax {
		return syntax.type === 'token' ? this.visitToken(syntax) : this.visitNode(syntax)
	}

	visitNode(node: SyntaxNode): SyntaxNode {
		const handler = HANDLERS.get(node.kind)
		return handler ? handler(this, node) : this.visitChildren(node)
	}

	visitSlot(slot: Slot): Slot {
		return slot === null ? null : this.visit(slot)
	}

	visitChildren(node: SyntaxNode): SyntaxNode {
		let result = node
		node.children.forEach((child, i) => {
			result = withChild(result, i, this.visitSlot(child))
		})
		return result
	}

	/**
	 * The increment rule. Raises the level once per flag, for the first part
	 * that starts a line and was not already examined, then visits the part.
	 */
	visitIndented(part: Syntax, flag: IncrementFlag, owner: string): Syntax {
		const first = firstToken(part)
		if (first !== null) {
			const startsLine = hasNewline(first.leading) || first === this.programStart
			if (!flag.incremented && startsLine && !this.context.isMarked(first)) {
				this.context.increment(owner)
				flag.incremented = true
			}
			this.context.mark(first)
		}
		return this.visit(part)
	}

	private visitToken(token: SyntaxToken): SyntaxToken {
		const { config, level, unit } = this.context
		return reindentToken(token, {
			atFileStart: token === this.programStart,
			closing: isClosingSymbol(token, config),
			level,
			skipCommentedOutLines: config.skipCommentedOutLines,
			unit,
		})
	}
}
