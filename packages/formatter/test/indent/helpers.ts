import { printSyntax } from '../../src/core/nodes.ts'
import type { IndentConfig } from '../../src/indent/config.ts'
import { Indenter } from '../../src/indent/indenter.ts'
import { parseSource } from '../../src/index.ts'

/** Parses `source`, runs the indentation pass and prints the result. */
export function reindent(source: string, config: Partial<IndentConfig> = {}): string {
	return printSyntax(new Indenter({ config }).run(parseSource(source)))
}

export function lines(...text: string[]): string {
	return text.join('\n')
}
