import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'

export type IndentUnit =
	| { readonly kind: 'spaces'; readonly count: number }
	| { readonly kind: 'tabs'; readonly count: number }

/**
 * Indentation settings for one run of the engine.
 */
export interface IndentConfig {
	/** Whitespace for one level */
	readonly unit: IndentUnit
	/** Indent `case` labels one level deeper than their `switch` */
	readonly indentSwitchCaseBodies: boolean
	/** Indent the contents of `#if` regions */
	readonly indentConditionalRegions: boolean
	/** Leave lines that start with `//` where they are */
	readonly skipCommentedOutLines: boolean
	/** Match the closing-paren and trailing-closure layout of the common Swift editor */
	readonly editorCompatibilityMode: boolean
}

export const DEFAULT_INDENT_CONFIG: IndentConfig = {
	editorCompatibilityMode: true,
	indentConditionalRegions: false,
	indentSwitchCaseBodies: false,
	skipCommentedOutLines: true,
	unit: { count: 4, kind: 'spaces' },
}

export class ConfigError extends Error {
	readonly code = 'IKCONFIG001'

	constructor(unit: IndentUnit) {
		super(interpolateMessage(getDiagnostic('IKCONFIG001').message, { count: unit.count, kind: unit.kind }))
		this.name = 'ConfigError'
	}
}

export function resolveIndentConfig(partial: Partial<IndentConfig> = {}): IndentConfig {
	const config: IndentConfig = { ...DEFAULT_INDENT_CONFIG, ...partial }
	const { count } = config.unit
	if (!Number.isInteger(count) || count < 1) {
		throw new ConfigError(config.unit)
	}
	return config
}

export function indentUnitString(unit: IndentUnit): string {
	return (unit.kind === 'tabs' ? '\t' : ' ').repeat(unit.count)
}

/**
 * Parses a command-line unit: `tab`, `tabs`, `<n>`, `tabs:<n>` or `spaces:<n>`.
 * Returns null when the text is not one of those forms.
 */
export function parseIndentUnit(text: string): IndentUnit | null {
	const value = text.trim().toLowerCase()
	if (value === 'tab' || value === 'tabs') return { count: 1, kind: 'tabs' }

	const match = /^(?:(spaces|tabs):)?(\d+)$/.exec(value)
	if (!match) return null

	const count = Number(match[2])
	if (count < 1) return null
	return match[1] === 'tabs' ? { count, kind: 'tabs' } : { count, kind: 'spaces' }
}
