import fc from 'fast-check'

export const indentArb = fc.constantFrom('', ' ', '  ', '\t', '        ')

export const statementArb = fc.constantFrom(
	'let x = 1',
	'var y: Int = 2',
	'foo()',
	'foo(a, b: 2)',
	'a.b.c',
	'x = y + 1',
	'let v = flag\n? a\n: b',
	'let t = ok\n? make()\n: base\n.map(f)',
	'let d = [k(): a\n.b]',
	'if a {\nb()\n}',
	'guard let v = w\nelse {\nreturn\n}',
	'for i in items {\nprint(i)\n}',
	'list\n.map { $0 + 1 }\n.filter(keep)',
	'call(\nfirst,\nsecond\n)',
	'switch k {\ncase 1:\nbreak\ndefault:\nbreak\n}',
	'#if DEBUG\nlog()\n#endif',
	'return',
	'// note',
	'/* block */ z()',
	'struct S {\nvar v: Int { get }\n}'
)

/** A statement with its own random indentation on every line. */
export const lineArb = fc
	.tuple(statementArb, fc.array(indentArb, { maxLength: 6, minLength: 6 }))
	.map(([statement, indents]) =>
		statement
			.split('\n')
			.map((line, i) => (indents[i] ?? '') + line)
			.join('\n')
	)

/** Top-level statements, or the body of one function, with LF or CRLF line breaks. */
export const programArb = fc
	.tuple(fc.array(lineArb, { maxLength: 12 }), fc.boolean(), fc.constantFrom('\n', '\r\n'))
	.map(([lines, wrap, newline]) => {
		const body = lines.join('\n')
		const source = wrap ? `func f() {\n${body}\n}\n` : body
		return source.replaceAll('\n', newline)
	})
