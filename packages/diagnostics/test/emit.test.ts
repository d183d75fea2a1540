import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Color, FdWriter, MarkupWriter, type Style, type StyledWriter } from '@gutter/render-tree'
import { emit, formatDiagnostic } from '../src/emit.ts'
import { InvalidSpanError, WriteFailureError } from '../src/errors.ts'
import { SimpleFiles } from '../src/files.ts'
import {
	diagnostic,
	primaryLabel,
	Severity,
	secondaryLabel,
	span,
	withCode,
	withLabels,
	withNotes,
} from '../src/types.ts'

function lines(...values: string[]): string {
	return `${values.join('\n')}\n`
}

class FailingWriter implements StyledWriter {
	readonly supportsColor = false

	setStyle(_style: Style): void {}

	writeText(_text: string): void {
		throw new Error('disk full')
	}

	resetStyle(): void {}
}

describe('emit', () => {
	const files = new SimpleFiles()
	const test = files.add('test.txt', 'a\nb\nlet x = foo;\n')
	const unexpected = withLabels(
		diagnostic(Severity.Error, 'unexpected token'),
		primaryLabel(span(test, 8, 12), 'here')
	)

	it('should render a single-line label', () => {
		assert.strictEqual(
			formatDiagnostic(files, unexpected),
			lines(
				'error: unexpected token',
				' --> test.txt:3:5',
				'  |',
				'3 | let x = foo;',
				'  |     ^^^^ here'
			)
		)
	})

	it('should render the code and notes', () => {
		const full = withNotes(withCode(unexpected, 'E0001'), 'first\nsecond', 'third')
		assert.strictEqual(
			formatDiagnostic(files, full),
			lines(
				'error[E0001]: unexpected token',
				' --> test.txt:3:5',
				'  |',
				'3 | let x = foo;',
				'  |     ^^^^ here',
				'  |',
				'  = first',
				'    second',
				'  = third'
			)
		)
	})

	it('should render a diagnostic without labels', () => {
		const bare = withNotes(diagnostic(Severity.Warning, 'unused import'), 'help: remove it')
		assert.strictEqual(formatDiagnostic(files, bare), lines('warning: unused import', ' = help: remove it'))
	})

	it('should style the colored output', () => {
		const writer = new MarkupWriter()
		emit(writer, files, unexpected)
		assert.strictEqual(
			writer.toString(),
			'{fg:red bold}error{bold}: unexpected token{/}\n' +
				' {fg:blue}-->{/} test.txt:3:5\n' +
				'{fg:blue}  |{/}\n' +
				'{fg:blue}3 |{/} let x = foo;\n' +
				'{fg:blue}  |{/}     {fg:red}^^^^{/} {fg:red}here{/}\n'
		)
	})

	it('should color primary labels by severity and secondary labels blue', () => {
		const target = withLabels(
			diagnostic(Severity.Warning, 'w'),
			primaryLabel(span(test, 4, 7)),
			secondaryLabel(span(test, 12, 15))
		)
		const writer = new MarkupWriter()
		emit(writer, files, target)
		assert.ok(
			writer.toString().endsWith('{fg:blue}  |{/} {fg:yellow}^^^{/}     {fg:blue}---{/}\n')
		)
	})

	it('should draw a connector for a multi-line label', () => {
		const braces = new SimpleFiles()
		const file = braces.add('braces.txt', 'a = 1\nif x {\nab cd\n}\n')
		const target = withLabels(
			diagnostic(Severity.Error, 'mismatched braces'),
			primaryLabel(span(file, 6, 20), 'block'),
			secondaryLabel(span(file, 13, 15), 'pair')
		)
		assert.strictEqual(
			formatDiagnostic(braces, target),
			lines(
				'error: mismatched braces',
				' --> braces.txt:2:1',
				'  |',
				'2 |   if x {',
				'  |   ^^^^^^',
				'3 | | ab cd',
				'  | | -- pair',
				'4 |   }',
				'  |   ^ block'
			)
		)
	})

	it('should elide the interior of a long span', () => {
		const long = new SimpleFiles()
		const file = long.add('lines.txt', 'l1\nl2\nl3\nl4\nl5\nl6\nl7\nl8\nl9\nl10\n')
		const target = withLabels(
			diagnostic(Severity.Error, 'unterminated block'),
			primaryLabel(span(file, 3, 26), 'body')
		)
		assert.strictEqual(
			formatDiagnostic(long, target),
			lines(
				'error: unterminated block',
				' --> lines.txt:2:1',
				'  |',
				'2 |   l2',
				'  |   ^^',
				'  : |',
				'9 |   l9',
				'  |   ^^ body'
			)
		)
	})

	it('should stack overlapping labels', () => {
		const source = new SimpleFiles()
		const file = source.add('overlap.txt', 'abcdef')
		const target = withLabels(
			diagnostic(Severity.Error, 'overlap'),
			primaryLabel(span(file, 0, 4), 'outer'),
			secondaryLabel(span(file, 2, 3), 'inner')
		)
		assert.strictEqual(
			formatDiagnostic(source, target),
			lines(
				'error: overlap',
				' --> overlap.txt:1:1',
				'  |',
				'1 | abcdef',
				'  | ^^^^ outer',
				'  |   - inner'
			)
		)
	})

	it('should hang a message that does not fit before the next marker', () => {
		const source = new SimpleFiles()
		const file = source.add('call.txt', 'let value = call(arg);')
		const target = withLabels(
			diagnostic(Severity.Error, 'mismatched types'),
			primaryLabel(span(file, 4, 9), 'binding'),
			secondaryLabel(span(file, 12, 16), 'callee')
		)
		assert.strictEqual(
			formatDiagnostic(source, target),
			lines(
				'error: mismatched types',
				' --> call.txt:1:5',
				'  |',
				'1 | let value = call(arg);',
				'  |     ^^^^^   ---- callee',
				'  |     |',
				'  |     binding'
			)
		)
	})

	it('should expand tabs in source and underline by display column', () => {
		const source = new SimpleFiles()
		const file = source.add('tab.txt', '\tx = 1')
		const target = withLabels(diagnostic(Severity.Note, 'tab'), primaryLabel(span(file, 1, 2)))
		assert.strictEqual(
			formatDiagnostic(source, target),
			lines('note: tab', ' --> tab.txt:1:5', '  |', '1 |     x = 1', '  |     ^')
		)
	})

	it('should print source text verbatim, trailing spaces included', () => {
		const source = new SimpleFiles()
		const file = source.add('ws.txt', 'let x = 1;   \n')
		const target = withLabels(diagnostic(Severity.Error, 'trailing'), primaryLabel(span(file, 10, 13), 'spaces'))
		const output = formatDiagnostic(source, target)
		assert.ok(output.includes('1 | let x = 1;   \n'))
		assert.strictEqual(
			output,
			lines('error: trailing', ' --> ws.txt:1:11', '  |', '1 | let x = 1;   ', '  |           ^^^ spaces')
		)
	})

	it('should stop context at the last line of a file ending in a newline', () => {
		const source = new SimpleFiles()
		const file = source.add('f.txt', 'a\nb\n')
		const target = withLabels(diagnostic(Severity.Error, 'm'), primaryLabel(span(file, 2, 3)))
		assert.strictEqual(
			formatDiagnostic(source, target, { contextLines: 1 }),
			lines('error: m', ' --> f.txt:2:1', '  |', '1 | a', '2 | b', '  | ^')
		)
	})

	it('should group labels by file in order of first appearance', () => {
		const source = new SimpleFiles()
		const first = source.add('a.txt', 'alpha')
		const second = source.add('b.txt', 'beta')
		const target = withLabels(
			diagnostic(Severity.Error, 'duplicate'),
			secondaryLabel(span(second, 0, 4), 'previous'),
			primaryLabel(span(first, 0, 5), 'again')
		)
		assert.strictEqual(
			formatDiagnostic(source, target),
			lines(
				'error: duplicate',
				' --> b.txt:1:1',
				'  |',
				'1 | beta',
				'  | ---- previous',
				' --> a.txt:1:1',
				'  |',
				'1 | alpha',
				'  | ^^^^^ again'
			)
		)
	})

	it('should write nothing when a span is invalid', () => {
		const writer = new MarkupWriter()
		const target = withLabels(
			diagnostic(Severity.Error, 'bad'),
			primaryLabel(span(test, 0, 1)),
			primaryLabel(span(test, 10, 99))
		)
		assert.throws(() => emit(writer, files, target), InvalidSpanError)
		assert.strictEqual(writer.toString(), '')
	})

	it('should wrap writer failures', () => {
		assert.throws(
			() => emit(new FailingWriter(), files, unexpected),
			(error: unknown) =>
				error instanceof WriteFailureError &&
				error.kind === 'WriteFailure' &&
				error.message === 'failed to write diagnostic: disk full' &&
				error.cause instanceof Error &&
				error.cause.message === 'disk full'
		)
	})

	it('should raise a write failure when the file descriptor cannot be written', () => {
		assert.throws(
			() => emit(new FdWriter(1_000_000, 0), files, unexpected),
			(error: unknown) =>
				error instanceof WriteFailureError &&
				error.cause instanceof Error &&
				'code' in error.cause &&
				error.cause.code === 'EBADF'
		)
	})

	it('should style each part with its theme entry', () => {
		const writer = new MarkupWriter()
		emit(writer, files, withNotes(unexpected, 'n'), {
			theme: {
				gutter: { fg: Color.Magenta },
				location: { underline: true },
				marker: { bold: true },
				message: { italic: true },
				note: { dim: true },
			},
		})
		assert.strictEqual(
			writer.toString(),
			'{fg:red bold}error{bold}: unexpected token{/}\n' +
				' {fg:magenta}-->{/} {underline}test.txt:3:5{/}\n' +
				'{fg:magenta}  |{/}\n' +
				'{fg:magenta}3 |{/} let x = foo;\n' +
				'{fg:magenta}  |{/}     {fg:red bold}^^^^{/} {fg:red italic}here{/}\n' +
				'{fg:magenta}  |{/}\n' +
				'{fg:magenta}  ={/} {dim}n{/}\n'
		)
	})

	it('should leave the gutter unstyled when its theme entry is empty', () => {
		const writer = new MarkupWriter()
		emit(writer, files, unexpected, { theme: { gutter: {} } })
		assert.ok(writer.toString().endsWith('\n  |     {fg:red}^^^^{/} {fg:red}here{/}\n'))
	})

	it('should apply theme overrides', () => {
		const writer = new MarkupWriter()
		emit(writer, files, diagnostic(Severity.Error, 'm'), { theme: { severity: { [Severity.Error]: 'magenta' } } })
		assert.strictEqual(writer.toString(), '{fg:magenta bold}error{bold}: m{/}\n')
	})
})
