import assert from 'node:assert'
import { FormatContext } from '../../src/core/context.ts'
import { getSlot, isNode, NodeKind, nodeKindName, type Slot, type SyntaxNode } from '../../src/core/nodes.ts'
import { tokenize } from '../../src/lex/lexer.ts'
import { parse } from '../../src/parse/parser.ts'

export interface Parsed {
	context: FormatContext
	tree: SyntaxNode | undefined
}

export function parseText(source: string): Parsed {
	const context = new FormatContext(source, 'test.swift')
	tokenize(context)
	const result = parse(context)
	return { context, tree: result.tree }
}

export function parseTree(source: string): SyntaxNode {
	const { context, tree } = parseText(source)
	assert.ok(tree, context.formatAllDiagnostics())
	return tree
}

export function asNode(slot: Slot | undefined): SyntaxNode {
	assert.ok(isNode(slot), 'expected a node')
	return slot
}

/** The item of every top-level statement. */
export function topLevel(source: string): SyntaxNode[] {
	const list = asNode(getSlot(parseTree(source), NodeKind.SourceFile, 'statements'))
	return list.children.map((child) => asNode(getSlot(asNode(child), NodeKind.CodeBlockItem, 'item')))
}

export function first(source: string): SyntaxNode {
	const [item] = topLevel(source)
	return asNode(item)
}

export function kindNames(nodes: readonly Slot[]): string[] {
	return nodes.map((node) => (isNode(node) ? nodeKindName(node.kind) : String(node?.text ?? null)))
}
