/**
 * CLI diagnostic definitions.
 *
 * Error code format: IKCLI<NUMBER>
 * - IKCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (IKCLI001-099)
// =============================================================================

export const IKCLI001: DiagnosticDef = {
	code: 'IKCLI001',
	description: "indentkit couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const IKCLI002: DiagnosticDef = {
	code: 'IKCLI002',
	description: "The file exists but indentkit can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const IKCLI003: DiagnosticDef = {
	code: 'IKCLI003',
	description: "indentkit couldn't write the formatted file back to disk.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for this file.',
}

export const IKCLI004: DiagnosticDef = {
	code: 'IKCLI004',
	description: "indentkit doesn't recognize this indentation setting.",
	message: 'invalid indent "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a space count like `--indent 2`, or `--indent tab`, `--indent tabs:2`, `--indent spaces:4`.',
}

export const IKCLI005: DiagnosticDef = {
	code: 'IKCLI005',
	description: 'Something unexpected went wrong while formatting.',
	message: 'formatting failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const IKCLI006: DiagnosticDef = {
	code: 'IKCLI006',
	description: 'The file is not indented the way indentkit would indent it.',
	message: 'would reindent {path}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Run `indentkit format --write {path}` to apply the changes.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	IKCLI001,
	IKCLI002,
	IKCLI003,
	IKCLI004,
	IKCLI005,
	IKCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
