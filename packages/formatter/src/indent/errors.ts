import { type DiagnosticArgs, getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'

type InvariantCode = 'IKINDENT001' | 'IKINDENT002'

/**
 * A broken engine invariant. Never caught inside the engine.
 */
export class IndentInvariantError extends Error {
	readonly code: InvariantCode
	readonly owner: string

	constructor(code: InvariantCode, owner: string, args: DiagnosticArgs) {
		super(interpolateMessage(getDiagnostic(code).message, { owner, ...args }))
		this.name = 'IndentInvariantError'
		this.code = code
		this.owner = owner
	}
}

export function throwLevelMismatch(owner: string, expected: number, actual: number): never {
	throw new IndentInvariantError('IKINDENT001', owner, { actual, expected })
}

export function throwNegativeLevel(owner: string): never {
	throw new IndentInvariantError('IKINDENT002', owner, {})
}
