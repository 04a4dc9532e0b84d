/**
 * Swift indentation formatter public API
 *
 * - Lossless syntax tree: every token carries its own trivia
 * - Immutable nodes, rewritten by returning new nodes
 * - One FormatContext flowing through lexing and parsing
 */

import { FormatContext } from './core/context.ts'
import { FormatError } from './core/errors.ts'
import { printSyntax, type SyntaxNode } from './core/nodes.ts'
import { type IndentConfig, Indenter } from './indent/index.ts'
import { tokenize } from './lex/lexer.ts'
import { parse } from './parse/parser.ts'

export {
	type Diagnostic,
	DiagnosticSeverity,
	FormatContext,
	type SourceLocation,
} from './core/context.ts'
export { FormatError } from './core/errors.ts'
export {
	firstToken,
	makeList,
	makeNode,
	NodeKind,
	nodeKindName,
	printSyntax,
	type Slot,
	type Syntax,
	type SyntaxNode,
	syntaxEquals,
	tokensOf,
	withChild,
} from './core/nodes.ts'
export { createToken, type SyntaxToken, TokenKind, type TriviaPiece, TriviaKind } from './core/tokens.ts'
export {
	type ChainState,
	ConfigError,
	DEFAULT_INDENT_CONFIG,
	type IndentConfig,
	IndentContext,
	Indenter,
	type IndenterOptions,
	IndentInvariantError,
	type IndentUnit,
	indentUnitString,
	isClosingSymbol,
	type LevelChange,
	type LevelTrace,
	type PassExample,
	parseIndentUnit,
	pipeline,
	reindentToken,
	resolveIndentConfig,
	type SyntaxPass,
} from './indent/index.ts'
export { type TokenizeResult, tokenize } from './lex/lexer.ts'
export { type ParseResult, parse } from './parse/parser.ts'

export interface FormatOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Overrides of the default indentation settings */
	indent?: Partial<IndentConfig>
}

export interface FormatResult {
	output: string
	/** True when `output` differs from the source */
	changed: boolean
	/** The re-indented tree */
	tree: SyntaxNode
}

/**
 * Parse source text into a syntax tree.
 *
 * @throws {FormatError} If the source cannot be lexed or parsed
 */
export function parseSource(source: string, filename?: string): SyntaxNode {
	const context = new FormatContext(source, filename)

	// Phase 1: Lexing
	const tokenResult = tokenize(context)
	if (!tokenResult.succeeded) {
		throw FormatError.fromContext(context, 'Lexing failed')
	}

	// Phase 2: Parsing
	const parseResult = parse(context)
	if (!parseResult.succeeded || parseResult.tree === undefined) {
		throw FormatError.fromContext(context, 'Parse failed')
	}
	return parseResult.tree
}

/**
 * Re-indent Swift source.
 *
 * Chains the phases:
 * 1. Lexing (source → tokens with trivia)
 * 2. Parsing (tokens → syntax tree)
 * 3. Indentation (tree → tree)
 * 4. Printing (tree → text)
 *
 * @throws {FormatError} If the source cannot be lexed or parsed
 * @throws {ConfigError} If `options.indent` holds an invalid unit
 */
export function format(source: string, options: FormatOptions = {}): FormatResult {
	const indenter = new Indenter(options.indent ? { config: options.indent } : {})
	const tree = parseSource(source, options.filename)

	// Phase 3: Indentation
	const indented = indenter.run(tree)

	// Phase 4: Printing
	const output = printSyntax(indented)
	return { changed: output !== source, output, tree: indented }
}
