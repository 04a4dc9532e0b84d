import { formatShort, IKCLI001, IKCLI002, IKCLI003, IKCLI004, IKCLI005, IKCLI006 } from '@indentkit/diagnostics'
import { ConfigError, FormatError, type IndentConfig, parseIndentUnit } from '@indentkit/formatter'

export interface IndentFlags {
	indent: string
	indentSwitchCase: boolean
	indentIfConfig: boolean
	skipCommented: boolean
	editorCompat: boolean
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatShort(IKCLI001, { path: filePath })
	}
	return formatShort(IKCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatShort(IKCLI003, { reason: getErrorMessage(error) })
}

export function formatInvalidIndentError(value: string): string {
	return formatShort(IKCLI004, { value })
}

export function formatFormatError(error: unknown): string {
	if (error instanceof FormatError) {
		return error.message
	}
	if (error instanceof ConfigError) {
		return `[${error.code}] ${error.message}`
	}
	return formatShort(IKCLI005, { reason: getErrorMessage(error) })
}

export function formatCheckFailure(filePath: string): string {
	return formatShort(IKCLI006, { path: filePath })
}

/**
 * Maps command flags onto engine settings.
 * Returns null when `--indent` is not a valid unit.
 */
export function resolveIndentFlags(options: IndentFlags): IndentConfig | null {
	const unit = parseIndentUnit(options.indent)
	if (unit === null) return null
	return {
		editorCompatibilityMode: options.editorCompat,
		indentConditionalRegions: options.indentIfConfig,
		indentSwitchCaseBodies: options.indentSwitchCase,
		skipCommentedOutLines: options.skipCommented,
		unit,
	}
}
