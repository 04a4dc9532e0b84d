import assert from 'node:assert'
import { describe, it } from 'node:test'
import { getSlot, NodeKind, printSyntax } from '../../src/core/nodes.ts'
import { asNode, first, kindNames, parseText, parseTree, topLevel } from './helpers.ts'

describe('parse/parser', () => {
	describe('source files', () => {
		it('should parse an empty file', () => {
			const tree = parseTree('')
			assert.strictEqual(tree.kind, NodeKind.SourceFile)
			assert.strictEqual(asNode(getSlot(tree, NodeKind.SourceFile, 'statements')).children.length, 0)
		})

		it('should parse one item per statement', () => {
			assert.deepStrictEqual(kindNames(topLevel('import Foundation\nlet x = 1\nfunc f() {}\nx = 2')), [
				'ImportDecl',
				'VariableDecl',
				'FunctionDecl',
				'SequenceExpr',
			])
		})

		it('should keep semicolons on their item', () => {
			const tree = parseTree('a; b')
			const list = asNode(getSlot(tree, NodeKind.SourceFile, 'statements'))
			const item = asNode(list.children[0])
			assert.strictEqual(printSyntax(getSlot(item, NodeKind.CodeBlockItem, 'semicolon')), '; ')
			assert.strictEqual(list.children.length, 2)
		})

		it('should print the exact source', () => {
			const source = [
				'// header',
				'import Foundation',
				'',
				'struct Point: Equatable {',
				'  var x: Double',
				'\tvar y: Double  // trailing',
				'    func moved(by d: Double) -> Point {',
				'        return Point(x: x + d,',
				'                     y: y)',
				'    }',
				'}',
				'',
			].join('\r\n')
			assert.strictEqual(printSyntax(parseTree(source)), source)
		})
	})

	describe('statements', () => {
		it('should chain else-if', () => {
			const statement = first('if a {\n} else if b {\n} else {\n}')
			assert.strictEqual(statement.kind, NodeKind.IfStmt)
			const elseBody = asNode(getSlot(statement, NodeKind.IfStmt, 'elseBody'))
			assert.strictEqual(elseBody.kind, NodeKind.IfStmt)
			assert.strictEqual(asNode(getSlot(elseBody, NodeKind.IfStmt, 'elseBody')).kind, NodeKind.CodeBlock)
		})

		it('should parse guard with a binding condition', () => {
			const statement = first('guard let x = y else {\nreturn\n}')
			assert.strictEqual(statement.kind, NodeKind.GuardStmt)
			const conditions = asNode(getSlot(statement, NodeKind.GuardStmt, 'conditions'))
			const condition = asNode(getSlot(asNode(conditions.children[0]), NodeKind.ConditionElement, 'condition'))
			assert.strictEqual(condition.kind, NodeKind.OptionalBindingCondition)
		})

		it('should parse a bare return', () => {
			const body = asNode(getSlot(first('func f() {\nreturn\n}'), NodeKind.FunctionDecl, 'body'))
			const statements = asNode(getSlot(body, NodeKind.CodeBlock, 'statements'))
			const item = asNode(getSlot(asNode(statements.children[0]), NodeKind.CodeBlockItem, 'item'))
			assert.strictEqual(item.kind, NodeKind.ReturnStmt)
			assert.strictEqual(getSlot(item, NodeKind.ReturnStmt, 'expression'), null)
		})

		it('should parse loops', () => {
			assert.deepStrictEqual(
				kindNames(topLevel('for i in 0..<n where i > 1 {\n}\nwhile x {\n}\nrepeat {\n} while x')),
				['ForInStmt', 'WhileStmt', 'RepeatWhileStmt']
			)
		})

		it('should not take a trailing closure in a condition', () => {
			const statement = first('while ready {\nstep()\n}')
			const conditions = asNode(getSlot(statement, NodeKind.WhileStmt, 'conditions'))
			const condition = asNode(getSlot(asNode(conditions.children[0]), NodeKind.ConditionElement, 'condition'))
			assert.strictEqual(condition.kind, NodeKind.IdentifierExpr)
		})

		it('should parse do with catch clauses', () => {
			const statement = first('do {\ntry f()\n} catch let e {\n} catch {\n}')
			const clauses = asNode(getSlot(statement, NodeKind.DoStmt, 'catchClauses'))
			assert.strictEqual(clauses.kind, NodeKind.CatchClauseList)
			assert.strictEqual(clauses.children.length, 2)
		})

		it('should parse switch cases', () => {
			const statement = first('switch x {\ncase .a, .b:\nbreak\ndefault:\nbreak\n}')
			const cases = asNode(getSlot(statement, NodeKind.SwitchStmt, 'cases'))
			assert.strictEqual(cases.kind, NodeKind.SwitchCaseList)
			const labels = cases.children.map((child) => getSlot(asNode(child), NodeKind.SwitchCase, 'label'))
			assert.deepStrictEqual(kindNames(labels), ['SwitchCaseLabel', 'SwitchDefaultLabel'])
			const items = asNode(getSlot(asNode(labels[0]), NodeKind.SwitchCaseLabel, 'caseItems'))
			assert.strictEqual(items.children.length, 2)
		})

		it('should parse #if regions in statement position', () => {
			const statement = first('#if DEBUG\nlog()\n#else\nrun()\n#endif')
			assert.strictEqual(statement.kind, NodeKind.IfConfigDecl)
			const clauses = asNode(getSlot(statement, NodeKind.IfConfigDecl, 'clauses'))
			assert.strictEqual(clauses.children.length, 2)
			const [ifClause, elseClause] = clauses.children.map(asNode)
			assert.strictEqual(printSyntax(getSlot(asNode(ifClause), NodeKind.IfConfigClause, 'condition')), 'DEBUG')
			assert.strictEqual(getSlot(asNode(elseClause), NodeKind.IfConfigClause, 'condition'), null)
			const elements = asNode(getSlot(asNode(ifClause), NodeKind.IfConfigClause, 'elements'))
			assert.strictEqual(elements.kind, NodeKind.CodeBlockItemList)
		})

		it('should parse #if regions around switch cases', () => {
			const statement = first('switch x {\ncase 1:\nbreak\n#if os(macOS)\ncase 2:\nbreak\n#endif\n}')
			const cases = asNode(getSlot(statement, NodeKind.SwitchStmt, 'cases'))
			assert.deepStrictEqual(kindNames(cases.children), ['SwitchCase', 'IfConfigDecl'])
			const region = asNode(cases.children[1])
			const clauses = asNode(getSlot(region, NodeKind.IfConfigDecl, 'clauses'))
			const elements = asNode(getSlot(asNode(clauses.children[0]), NodeKind.IfConfigClause, 'elements'))
			assert.strictEqual(elements.kind, NodeKind.SwitchCaseList)
		})
	})

	describe('errors', () => {
		it('should report a missing closing paren', () => {
			const { context, tree } = parseText('f(a, b')
			assert.strictEqual(tree, undefined)
			const [error] = context.getErrors()
			assert.strictEqual(error?.def.code, 'IKPARSE001')
			assert.strictEqual(error?.message, "syntax error: expected ')' to close the argument list")
			assert.strictEqual(error?.line, 1)
			assert.strictEqual(error?.column, 7)
		})

		it('should require a separator between statements on one line', () => {
			const { context } = parseText('a b')
			const [error] = context.getErrors()
			assert.strictEqual(error?.def.code, 'IKPARSE002')
			assert.strictEqual(error?.column, 3)
		})

		it('should stop at the first error', () => {
			const { context } = parseText('let = 1\nlet = 2')
			assert.strictEqual(context.getErrorCount(), 1)
			assert.strictEqual(context.getErrors()[0]?.message, "syntax error: expected pattern, found '='")
		})

		it('should reject a stray closing brace', () => {
			const { context } = parseText('}')
			assert.strictEqual(context.getErrors()[0]?.message, "syntax error: unexpected '}'")
		})
	})
})
