import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ConfigError, FormatError } from '@indentkit/formatter'
import {
	formatCheckFailure,
	formatFormatError,
	formatInvalidIndentError,
	formatReadError,
	formatWriteError,
	getErrorMessage,
	type IndentFlags,
	isNodeError,
	resolveIndentFlags,
} from '../src/utils.ts'

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error = new Error('test') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatReadError', () => {
	it('should report ENOENT as file not found', () => {
		const error = new Error('no such file') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(formatReadError('Sources/App.swift', error), '[IKCLI001] file not found: Sources/App.swift')
	})

	it('should report other errors with their reason', () => {
		const error = new Error('permission denied') as NodeJS.ErrnoException
		error.code = 'EACCES'
		assert.strictEqual(formatReadError('Sources/App.swift', error), '[IKCLI002] cannot read file: permission denied')
	})
})

describe('formatWriteError', () => {
	it('should include the reason', () => {
		assert.strictEqual(formatWriteError(new Error('disk full')), '[IKCLI003] cannot write file: disk full')
	})
})

describe('formatInvalidIndentError', () => {
	it('should quote the rejected value', () => {
		assert.strictEqual(formatInvalidIndentError('wide'), '[IKCLI004] invalid indent "wide"')
	})
})

describe('formatFormatError', () => {
	it('should return FormatError message directly', () => {
		assert.strictEqual(formatFormatError(new FormatError('error[IKPARSE001]: syntax error')), 'error[IKPARSE001]: syntax error')
	})

	it('should prefix ConfigError with its code', () => {
		const error = new ConfigError({ count: 0, kind: 'spaces' })
		assert.strictEqual(formatFormatError(error), '[IKCONFIG001] invalid indentation unit: 0 spaces')
	})

	it('should wrap unexpected errors', () => {
		assert.strictEqual(formatFormatError(new Error('boom')), '[IKCLI005] formatting failed: boom')
	})
})

describe('formatCheckFailure', () => {
	it('should name the file', () => {
		assert.strictEqual(formatCheckFailure('main.swift'), '[IKCLI006] would reindent main.swift')
	})
})

describe('resolveIndentFlags', () => {
	const defaults: IndentFlags = {
		editorCompat: true,
		indent: '4',
		indentIfConfig: false,
		indentSwitchCase: false,
		skipCommented: true,
	}

	it('should map flags onto the engine settings', () => {
		assert.deepStrictEqual(resolveIndentFlags({ ...defaults, editorCompat: false, indentSwitchCase: true }), {
			editorCompatibilityMode: false,
			indentConditionalRegions: false,
			indentSwitchCaseBodies: true,
			skipCommentedOutLines: true,
			unit: { count: 4, kind: 'spaces' },
		})
	})

	it('should accept tab units', () => {
		assert.deepStrictEqual(resolveIndentFlags({ ...defaults, indent: 'tab' })?.unit, { count: 1, kind: 'tabs' })
		assert.deepStrictEqual(resolveIndentFlags({ ...defaults, indent: 'tabs:2' })?.unit, { count: 2, kind: 'tabs' })
	})

	it('should return null for an invalid unit', () => {
		assert.strictEqual(resolveIndentFlags({ ...defaults, indent: 'wide' }), null)
		assert.strictEqual(resolveIndentFlags({ ...defaults, indent: '0' }), null)
	})
})
