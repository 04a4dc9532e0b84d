/**
 * Indentation engine.
 * Walks the syntax tree once and rewrites the whitespace that starts each line.
 */

export {
	ConfigError,
	DEFAULT_INDENT_CONFIG,
	type IndentConfig,
	type IndentUnit,
	indentUnitString,
	parseIndentUnit,
	resolveIndentConfig,
} from './config.ts'
export { type ChainState, IndentContext, type LevelChange, type LevelTrace } from './context.ts'
export { IndentInvariantError } from './errors.ts'
export { Indenter, type IndenterOptions } from './indenter.ts'
export { type PassExample, pipeline, type SyntaxPass } from './pipeline.ts'
export { isClosingSymbol, type ReindentOptions, reindentToken } from './trivia.ts'
