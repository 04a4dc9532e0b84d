/**
 * Formatter diagnostic definitions.
 *
 * Error code format: IK<PHASE><NUMBER>
 * - IKLEX: Lexer errors (001-099)
 * - IKPARSE: Parser errors (001-099)
 * - IKINDENT: Indentation engine invariant failures (001-099)
 * - IKCONFIG: Configuration errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (IKLEX001-099)
// =============================================================================

export const IKLEX001: DiagnosticDef = {
	code: 'IKLEX001',
	description: "This character doesn't start any token the formatter knows about.",
	message: 'unexpected character {char}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character or put it inside a string or comment.',
}

export const IKLEX002: DiagnosticDef = {
	code: 'IKLEX002',
	description: 'A string literal starts here but never ends.',
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing `"` before the end of the line.',
}

export const IKLEX003: DiagnosticDef = {
	code: 'IKLEX003',
	description: 'A block comment starts here but is never closed. Block comments nest, so every `/*` needs its own `*/`.',
	message: 'unterminated block comment',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a matching `*/`.',
}

// =============================================================================
// PARSER ERRORS (IKPARSE001-099)
// =============================================================================

export const IKPARSE001: DiagnosticDef = {
	code: 'IKPARSE001',
	description: "The formatter couldn't understand this part of your code.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos, unbalanced brackets or missing keywords.',
}

export const IKPARSE002: DiagnosticDef = {
	code: 'IKPARSE002',
	description: 'Two statements share a line without a separator.',
	message: "consecutive statements on a line must be separated by ';'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Insert a `;` or move the second statement to its own line.',
}

// =============================================================================
// ENGINE INVARIANTS (IKINDENT001-099)
// =============================================================================

export const IKINDENT001: DiagnosticDef = {
	code: 'IKINDENT001',
	description:
		'A construct finished with a different indent level than it started with. The rest of the file would drift, so formatting stops.',
	message: '{owner} left the indent level at {actual}, expected {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a formatter bug. Please report it with the input that triggered it.',
}

export const IKINDENT002: DiagnosticDef = {
	code: 'IKINDENT002',
	description: 'The indent level was decremented below zero.',
	message: '{owner} decremented the indent level below zero',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a formatter bug. Please report it with the input that triggered it.',
}

// =============================================================================
// CONFIGURATION ERRORS (IKCONFIG001-099)
// =============================================================================

export const IKCONFIG001: DiagnosticDef = {
	code: 'IKCONFIG001',
	description: 'An indentation unit needs a positive whole number of spaces or tabs.',
	message: 'invalid indentation unit: {count} {kind}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a count of 1 or more, e.g. 4 spaces or 1 tab.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const FORMATTER_DIAGNOSTICS = {
	IKCONFIG001,
	IKINDENT001,
	IKINDENT002,
	IKLEX001,
	IKLEX002,
	IKLEX003,
	IKPARSE001,
	IKPARSE002,
} as const

export type FormatterDiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS
