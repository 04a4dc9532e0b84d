import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FormatContext } from '../../src/core/context.ts'
import { FormatError } from '../../src/core/errors.ts'
import { tokenId } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/lexer.ts'

describe('core/context', () => {
	describe('locate', () => {
		const context = new FormatContext('ab\ncd\r\nef\rg')

		it('should map offsets on the first line', () => {
			assert.deepStrictEqual(context.locate(0), { column: 1, line: 1 })
			assert.deepStrictEqual(context.locate(2), { column: 3, line: 1 })
		})

		it('should treat LF, CRLF and CR as line ends', () => {
			assert.deepStrictEqual(context.locate(4), { column: 2, line: 2 })
			assert.deepStrictEqual(context.locate(7), { column: 1, line: 3 })
			assert.deepStrictEqual(context.locate(10), { column: 1, line: 4 })
		})

		it('should return source lines by number', () => {
			assert.strictEqual(context.getSourceLine(2), 'cd')
			assert.strictEqual(context.getSourceLine(9), undefined)
		})
	})

	describe('diagnostics', () => {
		it('should count errors', () => {
			const context = new FormatContext('x')
			assert.strictEqual(context.hasErrors(), false)
			context.emit('IKPARSE001', 1, 1, { detail: 'expected expression' })
			assert.strictEqual(context.hasErrors(), true)
			assert.strictEqual(context.getErrorCount(), 1)
			assert.strictEqual(context.getDiagnostics()[0]?.message, 'syntax error: expected expression')
		})

		it('should locate a token by its text, not its trivia', () => {
			const context = new FormatContext('let\n  x')
			tokenize(context)
			context.emitAtToken('IKPARSE001', tokenId(1), { detail: 'here' })
			const [diagnostic] = context.getErrors()
			assert.strictEqual(diagnostic?.line, 2)
			assert.strictEqual(diagnostic?.column, 3)
			assert.strictEqual(diagnostic?.tokenId, 1)
		})

		it('should render diagnostics with source context', () => {
			const context = new FormatContext('f(a, b\n', 'main.swift')
			context.emit('IKPARSE001', 1, 7, { detail: "expected ')'" })
			const [diagnostic] = context.getErrors()
			assert.ok(diagnostic)
			assert.strictEqual(
				context.formatDiagnostic(diagnostic),
				[
					"error[IKPARSE001]: syntax error: expected ')'",
					'  --> main.swift:1:7',
					'   |',
					' 1 | f(a, b',
					'   |       ^',
					'   |',
					'   = help: Double-check for typos, unbalanced brackets or missing keywords.',
				].join('\n')
			)
		})

		it('should omit the excerpt past the end of the source', () => {
			const context = new FormatContext('x', 'main.swift')
			context.emit('IKLEX002', 5, 1)
			const [diagnostic] = context.getErrors()
			assert.ok(diagnostic)
			assert.strictEqual(
				context.formatDiagnostic(diagnostic),
				'error[IKLEX002]: unterminated string literal\n  --> main.swift:5:1'
			)
		})
	})

	describe('FormatError', () => {
		it('should carry the first rendered error', () => {
			const context = new FormatContext('x', 'a.swift')
			context.emit('IKLEX002', 9, 1)
			const error = FormatError.fromContext(context, 'Lexing failed')
			assert.strictEqual(error.name, 'FormatError')
			assert.strictEqual(error.message, 'error[IKLEX002]: unterminated string literal\n  --> a.swift:9:1')
		})

		it('should fall back without errors', () => {
			const error = FormatError.fromContext(new FormatContext('x'), 'Parse failed')
			assert.strictEqual(error.message, 'Parse failed')
		})
	})
})
