import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	formatShort,
	getDiagnostic,
	IKCLI001,
	IKCLI006,
	IKPARSE001,
	interpolateMessage,
	isValidDiagnosticCode,
	severityLabel,
} from '../src/index.ts'

describe('diagnostics', () => {
	describe('catalog', () => {
		it('keys every definition by its own code', () => {
			for (const [key, def] of Object.entries(DIAGNOSTICS)) {
				assert.strictEqual(def.code, key)
			}
		})

		it('looks up definitions by code', () => {
			assert.strictEqual(getDiagnostic('IKPARSE001'), IKPARSE001)
		})

		it('recognizes known codes only', () => {
			assert.strictEqual(isValidDiagnosticCode('IKLEX002'), true)
			assert.strictEqual(isValidDiagnosticCode('IKLEX999'), false)
		})

		it('reports the check failure as a warning', () => {
			assert.strictEqual(IKCLI006.severity, DiagnosticSeverity.Warning)
		})
	})

	describe('interpolateMessage', () => {
		it('returns the template unchanged without args', () => {
			assert.strictEqual(interpolateMessage('file not found: {path}'), 'file not found: {path}')
		})

		it('replaces known placeholders', () => {
			assert.strictEqual(
				interpolateMessage('{owner} left {actual}', { actual: 3, owner: 'list' }),
				'list left 3'
			)
		})

		it('keeps unknown placeholders', () => {
			assert.strictEqual(interpolateMessage('a {b} c', { x: 1 }), 'a {b} c')
		})
	})

	describe('formatShort', () => {
		it('prefixes the code', () => {
			assert.strictEqual(formatShort(IKCLI001, { path: 'a.swift' }), '[IKCLI001] file not found: a.swift')
		})
	})

	describe('severityLabel', () => {
		it('names every severity', () => {
			assert.strictEqual(severityLabel(DiagnosticSeverity.Error), 'error')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Warning), 'warning')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Note), 'note')
		})
	})
})
