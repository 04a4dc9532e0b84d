/**
 * Re-export diagnostic types and formatter definitions from the shared package.
 */

import { FORMATTER_DIAGNOSTICS } from '@indentkit/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
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
	interpolateMessage,
	severityLabel,
} from '@indentkit/diagnostics'

/**
 * All valid diagnostic codes for the formatter.
 */
export type DiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof FORMATTER_DIAGNOSTICS)[typeof code] {
	return FORMATTER_DIAGNOSTICS[code]
}
