import { type SyntaxToken, type Trivia, TriviaKind, type TriviaPiece } from '../core/tokens.ts'
import type { IndentConfig } from './config.ts'

export interface ReindentOptions {
	/** Nesting depth of the token */
	readonly level: number
	/** Whitespace of one level */
	readonly unit: string
	readonly skipCommentedOutLines: boolean
	/** Realign attached comment lines as a block, see `isClosingSymbol` */
	readonly closing: boolean
	/** The token is the first of the file, so its trivia starts a line */
	readonly atFileStart: boolean
}

interface TriviaLine {
	readonly pieces: readonly TriviaPiece[]
	readonly newline: TriviaPiece | null
}

const CONDITIONAL_CLOSERS = new Set(['#else', '#elseif', '#endif'])

export function isClosingSymbol(token: SyntaxToken, config: IndentConfig): boolean {
	if (token.text === '}' || token.text === ']' || token.text === ')') return true
	return config.indentConditionalRegions && CONDITIONAL_CLOSERS.has(token.text)
}

/**
 * Rewrites the whitespace that starts each line of the leading trivia.
 * Returns `token` itself when nothing changes.
 */
export function reindentToken(token: SyntaxToken, options: ReindentOptions): SyntaxToken {
	const lines = splitLines(token.leading)
	const levels = lineLevels(lines, token, options)
	const pieces: TriviaPiece[] = []

	lines.forEach((line, i) => {
		const startsLine = i > 0 || options.atFileStart
		const level = levels[i]
		if (!startsLine || level === undefined || keepsIndent(line, i === lines.length - 1, token, options)) {
			pieces.push(...line.pieces)
		} else {
			const indent = options.unit.repeat(level)
			if (indent.length > 0) pieces.push({ kind: TriviaKind.Whitespace, text: indent })
			pieces.push(...line.pieces.slice(leadingWhitespaceCount(line)))
		}
		if (line.newline) pieces.push(line.newline)
	})

	return sameTrivia(token.leading, pieces) ? token : { ...token, leading: pieces }
}

function splitLines(trivia: Trivia): TriviaLine[] {
	const lines: TriviaLine[] = []
	let current: TriviaPiece[] = []
	for (const piece of trivia) {
		if (piece.kind === TriviaKind.Newline) {
			lines.push({ newline: piece, pieces: current })
			current = []
		} else {
			current.push(piece)
		}
	}
	lines.push({ newline: null, pieces: current })
	return lines
}

function leadingWhitespaceCount(line: TriviaLine): number {
	let count = 0
	while (line.pieces[count]?.kind === TriviaKind.Whitespace) count++
	return count
}

function firstContent(line: TriviaLine): TriviaPiece | undefined {
	return line.pieces[leadingWhitespaceCount(line)]
}

/** Lines holding only whitespace, including a last line before an empty end-of-file token. */
function isBlank(line: TriviaLine, isLast: boolean, token: SyntaxToken): boolean {
	if (firstContent(line) !== undefined) return false
	return !isLast || token.text === ''
}

function keepsIndent(line: TriviaLine, isLast: boolean, token: SyntaxToken, options: ReindentOptions): boolean {
	if (isBlank(line, isLast, token)) return true
	return options.skipCommentedOutLines && firstContent(line)?.kind === TriviaKind.LineComment
}

/**
 * Closing symbols take comment lines attached directly above them to their own
 * level. Comment lines above a blank line still belong to the enclosed block.
 */
function lineLevels(lines: readonly TriviaLine[], token: SyntaxToken, options: ReindentOptions): number[] {
	const levels = lines.map(() => options.level)
	if (!options.closing) return levels

	let pastBlank = false
	for (let i = lines.length - 2; i >= 0; i--) {
		const line = lines[i]
		if (line === undefined) continue
		if (isBlank(line, false, token)) pastBlank = true
		else if (pastBlank) levels[i] = options.level + 1
	}
	return levels
}

function sameTrivia(a: Trivia, b: Trivia): boolean {
	if (a.length !== b.length) return false
	return a.every((piece, i) => {
		const other = b[i]
		return other !== undefined && other.kind === piece.kind && other.text === piece.text
	})
}
