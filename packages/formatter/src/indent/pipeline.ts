import type { SyntaxNode } from '../core/nodes.ts'

/** Source before and after a pass. */
export interface PassExample {
	readonly input: string
	readonly output: string
}

/**
 * One tree-to-tree rewrite. Passes never share state; each receives the
 * complete tree produced by the previous one.
 */
export interface SyntaxPass {
	readonly name: string
	/** Expected behaviour under the pass's current configuration */
	readonly examples: readonly PassExample[]
	run(tree: SyntaxNode): SyntaxNode
}

/**
 * Composes passes left to right.
 * A composed pass has no examples of its own; each member keeps its table.
 */
export function pipeline(...passes: SyntaxPass[]): SyntaxPass {
	return {
		examples: [],
		name: passes.map((pass) => pass.name).join(' >>> '),
		run(tree) {
			return passes.reduce((current, pass) => pass.run(current), tree)
		},
	}
}
