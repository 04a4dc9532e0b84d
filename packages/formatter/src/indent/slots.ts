import { type ConstructKind, isNodeOf, NodeEditor, type Slot, type SlotName, type SyntaxNode } from '../core/nodes.ts'
import type { IndentConfig } from './config.ts'
import type { IndentWalker } from './walker.ts'

/** Whether a list or construct has raised the level yet. */
export interface IncrementFlag {
	incremented: boolean
}

/**
 * Walks the slots of one construct in the order the caller names them.
 * Designated slots share one flag, so they raise the level at most once.
 */
export class SlotWalk<K extends ConstructKind> {
	readonly flag: IncrementFlag
	private readonly editor: NodeEditor<K>

	constructor(
		private readonly walker: IndentWalker,
		node: SyntaxNode,
		kind: K,
		readonly owner: string,
		flag: IncrementFlag = { incremented: false }
	) {
		this.editor = new NodeEditor(node, kind)
		this.flag = flag
	}

	get config(): IndentConfig {
		return this.walker.context.config
	}

	get(name: SlotName<K>): Slot {
		return this.editor.get(name)
	}

	plain(...names: SlotName<K>[]): void {
		for (const name of names) {
			this.editor.set(name, this.walker.visitSlot(this.editor.get(name)))
		}
	}

	designated(...names: SlotName<K>[]): void {
		for (const name of names) {
			const part = this.editor.get(name)
			if (part !== null) this.editor.set(name, this.walker.visitIndented(part, this.flag, this.owner))
		}
	}

	/** Walks the slots of a child construct with this walk's flag. */
	within<C extends ConstructKind>(name: SlotName<K>, kind: C, body: (inner: SlotWalk<C>) => void): void {
		const child = this.editor.get(name)
		if (!isNodeOf(child, kind)) {
			this.plain(name)
			return
		}
		const inner = new SlotWalk(this.walker, child, kind, this.owner, this.flag)
		body(inner)
		this.editor.set(name, inner.build())
	}

	/** The one decrement that balances the designated slots. */
	closeIndent(): void {
		if (this.flag.incremented) this.walker.context.decrement(this.owner)
	}

	build(): SyntaxNode {
		return this.editor.build()
	}
}
