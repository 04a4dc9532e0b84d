import type { SyntaxNode } from '../core/nodes.ts'
import type { SyntaxToken } from '../core/tokens.ts'
import { type IndentConfig, indentUnitString } from './config.ts'
import { throwLevelMismatch, throwNegativeLevel } from './errors.ts'

/**
 * Method-chain state of one list child.
 * Moves only pending -> tracking(false) -> tracking(true).
 */
export type ChainState =
	| { readonly kind: 'pending' }
	| { readonly kind: 'tracking'; readonly root: SyntaxNode; readonly incremented: boolean }

export interface LevelChange {
	readonly owner: string
	readonly previous: number
	readonly level: number
}

export type LevelTrace = (change: LevelChange) => void

const PENDING: ChainState = { kind: 'pending' }

/**
 * Mutable state of one indentation pass.
 * Created per tree and dropped afterwards.
 */
export class IndentContext {
	readonly config: IndentConfig
	readonly unit: string

	private currentLevel = 0
	private marker: SyntaxToken | null = null
	private readonly chain: ChainState[] = [PENDING]
	private readonly allowance: boolean[] = [true]
	private readonly trace: LevelTrace | undefined

	constructor(config: IndentConfig, trace?: LevelTrace) {
		this.config = config
		this.unit = indentUnitString(config.unit)
		this.trace = trace
	}

	get level(): number {
		return this.currentLevel
	}

	increment(owner: string): void {
		this.change(owner, this.currentLevel + 1)
	}

	decrement(owner: string): void {
		if (this.currentLevel === 0) throwNegativeLevel(owner)
		this.change(owner, this.currentLevel - 1)
	}

	assertLevel(owner: string, expected: number): void {
		if (this.currentLevel !== expected) throwLevelMismatch(owner, expected, this.currentLevel)
	}

	private change(owner: string, level: number): void {
		const previous = this.currentLevel
		this.currentLevel = level
		this.trace?.({ level, owner, previous })
	}

	// Already-processed marker

	isMarked(token: SyntaxToken): boolean {
		return this.marker === token
	}

	mark(token: SyntaxToken): void {
		this.marker = token
	}

	// Method-chain stack

	pushChain(): void {
		this.chain.push(PENDING)
	}

	popChain(): void {
		if (this.chain.length > 1) this.chain.pop()
	}

	get chainTop(): ChainState {
		return this.chain[this.chain.length - 1] ?? PENDING
	}

	set chainTop(state: ChainState) {
		this.chain[this.chain.length - 1] = state
	}

	/** Starts tracking `root` when the current list child has no chain yet. */
	claimChain(root: SyntaxNode): void {
		if (this.chainTop.kind === 'pending') {
			this.chainTop = { incremented: false, kind: 'tracking', root }
		}
	}

	/** Frees the slot once `root` is walked, so a later chain in the same child can claim it. */
	releaseChain(root: SyntaxNode): void {
		const top = this.chainTop
		if (top.kind === 'tracking' && top.root === root) this.chainTop = PENDING
	}

	/** True when the current chain belongs to `root` and has raised the level. */
	ownsIncrementedChain(root: SyntaxNode): boolean {
		const top = this.chainTop
		return top.kind === 'tracking' && top.root === root && top.incremented
	}

	get chainIncremented(): boolean {
		const top = this.chainTop
		return top.kind === 'tracking' && top.incremented
	}

	markChainIncremented(): void {
		const top = this.chainTop
		if (top.kind === 'tracking' && !top.incremented) {
			this.chainTop = { ...top, incremented: true }
		}
	}

	// Conditional-compilation allowance stack

	get indentAllowed(): boolean {
		return this.allowance[this.allowance.length - 1] ?? true
	}

	pushAllowance(allowed: boolean): void {
		this.allowance.push(allowed)
	}

	popAllowance(): void {
		if (this.allowance.length > 1) this.allowance.pop()
	}
}
