import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import type { LevelChange } from '../../src/indent/context.ts'
import { Indenter } from '../../src/indent/indenter.ts'
import { parseSource } from '../../src/index.ts'
import { indentArb, programArb } from '../arbitraries.ts'
import { reindent } from './helpers.ts'

const configArb = fc.record({
	editorCompatibilityMode: fc.boolean(),
	indentConditionalRegions: fc.boolean(),
	indentSwitchCaseBodies: fc.boolean(),
	skipCommentedOutLines: fc.boolean(),
})

const memberArb = fc.constantFrom('b', 'count', 'first()', 'map(f)', 'sorted()')

describe('indent/indenter properties', () => {
	it('keeps the level non-negative and balanced', () => {
		fc.assert(
			fc.property(programArb, configArb, (source, config) => {
				const changes: LevelChange[] = []
				new Indenter({ config, onLevelChange: (change) => changes.push(change) }).run(parseSource(source))
				for (const change of changes) {
					assert.ok(change.level >= 0)
					assert.strictEqual(Math.abs(change.level - change.previous), 1)
				}
				assert.strictEqual(changes[changes.length - 1]?.level ?? 0, 0)
			})
		)
	})

	it('is idempotent', () => {
		fc.assert(
			fc.property(programArb, configArb, (source, config) => {
				const once = reindent(source, config)
				assert.strictEqual(reindent(once, config), once)
			})
		)
	})

	it('indents any number of arguments on their own lines by one unit', () => {
		fc.assert(
			fc.property(fc.array(indentArb, { maxLength: 8, minLength: 1 }), (indents) => {
				const args = indents.map((_, i) => `a${i}`)
				const source = `f(\n${args.map((arg, i) => `${indents[i] ?? ''}${arg}`).join(',\n')}\n)`
				const expected = `f(\n${args.map((arg) => `    ${arg}`).join(',\n')}\n)`
				assert.strictEqual(reindent(source), expected)
			})
		)
	})

	it('indents every dot of a chain by one unit', () => {
		fc.assert(
			fc.property(fc.array(fc.tuple(indentArb, memberArb), { maxLength: 8, minLength: 1 }), (members) => {
				const source = `a${members.map(([indent, member]) => `\n${indent}.${member}`).join('')}`
				const expected = `a${members.map(([, member]) => `\n    .${member}`).join('')}`
				assert.strictEqual(reindent(source), expected)
			})
		)
	})
})
