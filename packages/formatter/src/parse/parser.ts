import type { FormatContext } from '../core/context.ts'
import { makeNode, NodeKind, type SyntaxNode } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import { ParseAbort, ParserState } from './state.ts'
import { parseStatementList } from './statements.ts'

export interface ParseResult {
	succeeded: boolean
	tree?: SyntaxNode
}

/**
 * Parses `context.tokens` into a `SourceFile` tree.
 * Printing the tree reproduces `context.source` exactly.
 * The first syntax error is reported on the context and stops the parse.
 */
export function parse(context: FormatContext): ParseResult {
	const state = new ParserState(context)
	try {
		const statements = parseStatementList(state)
		if (!state.atEnd()) state.fail(`unexpected ${state.describeCurrent()}`)
		const eof = state.expect(TokenKind.Eof, 'end of file')
		return { succeeded: true, tree: makeNode(NodeKind.SourceFile, { eof, statements }) }
	} catch (error) {
		if (error instanceof ParseAbort) return { succeeded: false }
		throw error
	}
}
