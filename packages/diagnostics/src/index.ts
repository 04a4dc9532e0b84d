/**
 * @indentkit/diagnostics
 *
 * Diagnostic catalog shared by the formatter and the CLI.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	IKCLI001,
	IKCLI002,
	IKCLI003,
	IKCLI004,
	IKCLI005,
	IKCLI006,
} from './cli.ts'
export {
	FORMATTER_DIAGNOSTICS,
	type FormatterDiagnosticCode,
	IKCONFIG001,
	IKINDENT001,
	IKINDENT002,
	IKLEX001,
	IKLEX002,
	IKLEX003,
	IKPARSE001,
	IKPARSE002,
} from './formatter.ts'
export { formatShort, interpolateMessage } from './message.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	severityLabel,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { FORMATTER_DIAGNOSTICS } from './formatter.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...FORMATTER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
