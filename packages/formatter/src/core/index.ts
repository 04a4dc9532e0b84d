/**
 * Core data structures of the formatter: tokens with trivia, the lossless
 * syntax tree and the context that carries diagnostics.
 */

export { type Diagnostic, FormatContext, type SourceLocation } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	FORMATTER_DIAGNOSTICS,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { FormatError } from './errors.ts'
export {
	type ConstructKind,
	firstToken,
	getSlot,
	isConstructKind,
	isListKind,
	isNode,
	isNodeOf,
	isTokenSyntax,
	Layout,
	type ListKind,
	makeList,
	makeNode,
	NodeEditor,
	NodeKind,
	nodeKindName,
	printSyntax,
	type Slot,
	type SlotName,
	type Syntax,
	type SyntaxNode,
	slotIndex,
	syntaxEquals,
	tokensOf,
	withChild,
	withChildren,
} from './nodes.ts'
export {
	createToken,
	hasNewline,
	isComment,
	isContextual,
	isKeyword,
	isOperator,
	isToken,
	type SyntaxToken,
	type TokenId,
	TokenKind,
	TokenStore,
	type Trivia,
	TriviaKind,
	type TriviaPiece,
	tokenEquals,
	tokenId,
	triviaText,
	withLeadingTrivia,
} from './tokens.ts'
