import type { FormatContext } from './context.ts'

/**
 * Thrown by `format()` when the source cannot be lexed or parsed.
 * The message is the first error diagnostic, rendered with source context.
 */
export class FormatError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'FormatError'
	}

	static fromContext(context: FormatContext, fallback: string): FormatError {
		const error = context.getErrors()[0]
		return new FormatError(error ? context.formatDiagnostic(error) : fallback)
	}
}
