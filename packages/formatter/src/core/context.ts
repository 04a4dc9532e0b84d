/**
 * Formatting context shared by the lexer and the parser.
 * Holds the source, the lexed tokens and the collected diagnostics.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'
import { type TokenId, TokenStore, triviaText } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token associated with this diagnostic (if available) */
	readonly tokenId?: TokenId
}

export interface SourceLocation {
	readonly line: number
	readonly column: number
}

export class FormatContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Token storage (populated by the lexer) */
	readonly tokens: TokenStore

	private readonly diagnostics: Diagnostic[] = []
	private errorCount = 0
	private lineStarts: number[] | null = null

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		this.push({
			column,
			def,
			line,
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at an absolute source offset.
	 */
	emitAtOffset(code: DiagnosticCode, offset: number, args?: DiagnosticArgs): void {
		const { line, column } = this.locate(offset)
		this.emit(code, line, column, args)
	}

	/**
	 * Emit a diagnostic by code at the first character of a token's text.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const token = this.tokens.get(tokenId)
		const { line, column } = this.locate(token.offset + triviaText(token.leading).length)
		const def = getDiagnostic(code)
		this.push({
			column,
			def,
			line,
			message: interpolateMessage(def.message, args),
			tokenId,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Line and column (both 1-indexed) of an absolute offset.
	 * `\r\n`, `\n` and a lone `\r` each end a line.
	 */
	locate(offset: number): SourceLocation {
		const starts = this.getLineStarts()
		let low = 0
		let high = starts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((starts[mid] ?? 0) <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (starts[low] ?? 0) + 1, line: low + 1 }
	}

	private getLineStarts(): number[] {
		if (this.lineStarts !== null) return this.lineStarts
		const starts = [0]
		for (let i = 0; i < this.source.length; i++) {
			const char = this.source[i]
			if (char === '\r' && this.source[i + 1] === '\n') continue
			if (char === '\n' || char === '\r') starts.push(i + 1)
		}
		this.lineStarts = starts
		return starts
	}

	private push(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		return this.source.split(/\r\n|\n|\r/)[line - 1]
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[IKPARSE001]: syntax error: expected ')'
	 *   --> Sources/App.swift:3:7
	 *    |
	 *  3 | f(a, b
	 *    |       ^
	 *    |
	 *    = help: Double-check for typos, unbalanced brackets or missing keywords.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} |`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix} ${' '.repeat(diagnostic.column - 1)}^`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, ` ${pad} = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
