import type { SyntaxNode } from '../core/nodes.ts'
import { type IndentConfig, indentUnitString, resolveIndentConfig } from './config.ts'
import { IndentContext, type LevelTrace } from './context.ts'
import type { PassExample, SyntaxPass } from './pipeline.ts'
import { IndentWalker } from './walker.ts'

export interface IndenterOptions {
	config?: Partial<IndentConfig>
	/** Called on every change of the indent level */
	onLevelChange?: LevelTrace
}

// {i} is one unit, {ii} two, {x} one unit only in editor-compatibility mode.
const EXAMPLE_TEMPLATES: readonly (readonly [string, string])[] = [
	['1\n+ 2', '1\n{i}+ 2'],
	['x =\n1 + 2', 'x =\n{i}1 + 2'],
	['x\n= 1 + 2', 'x\n{i}= 1 + 2'],
	['let x\n= 1 + 2', 'let x\n{i}= 1 + 2'],
	['let\nx = 1 + 2', 'let\n{i}x = 1 + 2'],
	['var x: Int {\nreturn 1\n}', 'var x: Int {\n{i}return 1\n}'],
	['func f(\nx: Int,\ny: Int\n)', 'func f(\n{i}x: Int,\n{i}y: Int\n{x})'],
	['f(\nx,\ny\n)', 'f(\n{i}x,\n{i}y\n)'],
	['f(x) {\nprint($0)}', 'f(x) {\n{i}print($0)}'],
	[
		'struct A {\nlet x: X\nvar y: Y {\nreturn why\n}\n}',
		'struct A {\n{i}let x: X\n{i}var y: Y {\n{ii}return why\n{i}}\n}',
	],
	['a\n.b\n.c', 'a\n{i}.b\n{i}.c'],
	['a\n.b()\n.c', 'a\n{i}.b()\n{i}.c'],
	['a\n.b\n.c()', 'a\n{i}.b\n{i}.c()'],
	['a\n.b()\n.c()', 'a\n{i}.b()\n{i}.c()'],
	['a\n.b {\n111\n}\n.c()', 'a\n{i}.b {\n{ii}111\n{i}}\n{i}.c()'],
	['a\n.b {\n111\n}\n.c {\n222\n}', 'a\n{i}.b {\n{ii}111\n{i}}\n{i}.c {\n{ii}222\n{i}}'],
]

/**
 * The indentation pass. Rewrites the whitespace at the start of every line so
 * it matches the nesting depth of the line's first token.
 */
export class Indenter implements SyntaxPass {
	readonly name = 'Indenter'
	readonly config: IndentConfig
	private readonly onLevelChange: LevelTrace | undefined

	constructor(options: IndenterOptions = {}) {
		this.config = resolveIndentConfig(options.config)
		this.onLevelChange = options.onLevelChange
	}

	get examples(): readonly PassExample[] {
		const unit = indentUnitString(this.config.unit)
		const fill = (template: string): string =>
			template
				.replaceAll('{ii}', unit + unit)
				.replaceAll('{i}', unit)
				.replaceAll('{x}', this.config.editorCompatibilityMode ? unit : '')
		return EXAMPLE_TEMPLATES.map(([input, output]) => ({ input, output: fill(output) }))
	}

	run(tree: SyntaxNode): SyntaxNode {
		const context = new IndentContext(this.config, this.onLevelChange)
		const result = new IndentWalker(context, tree).visitNode(tree)
		context.assertLevel(this.name, 0)
		return result
	}
}
