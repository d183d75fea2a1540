import assert from 'node:assert'
import { describe, it } from 'node:test'
import { formatDiagnostic, LabelStyle, Severity } from '@gutter/diagnostics'
import { buildInput, formatIssuePath, InputError, parseInput, sourcePaths } from '../src/input.ts'

const valid = JSON.stringify({
	diagnostics: [
		{
			code: 'E0001',
			labels: [
				{ end: 12, file: 'main.src', message: 'here', start: 8, style: 'primary' },
				{ end: 3, file: 'lib.src', start: 0, style: 'secondary' },
			],
			message: 'unexpected token',
			notes: ['expected an expression'],
			severity: 'error',
		},
		{ labels: [{ end: 1, file: 'main.src', start: 0 }], message: 'second', severity: 'note' },
	],
})

function rejects(text: string, path: string, reason: string): void {
	assert.throws(
		() => parseInput(text),
		(error: unknown) => error instanceof InputError && error.path === path && error.reason === reason
	)
}

describe('parseInput', () => {
	it('should parse diagnostics with optional fields', () => {
		const inputs = parseInput(valid)
		assert.deepStrictEqual(inputs, [
			{
				code: 'E0001',
				labels: [
					{ end: 12, file: 'main.src', message: 'here', start: 8, style: LabelStyle.Primary },
					{ end: 3, file: 'lib.src', start: 0, style: LabelStyle.Secondary },
				],
				message: 'unexpected token',
				notes: ['expected an expression'],
				severity: Severity.Error,
			},
			{
				labels: [{ end: 1, file: 'main.src', start: 0, style: LabelStyle.Primary }],
				message: 'second',
				notes: [],
				severity: Severity.Note,
			},
		])
	})

	it('should reject invalid JSON', () => {
		assert.throws(() => parseInput('{'), (error: unknown) => error instanceof InputError && error.path === '$')
	})

	it('should reject a document without diagnostics', () => {
		rejects('[]', '$', 'expected an object with a "diagnostics" array')
		rejects('{"diagnostics": 1}', '$.diagnostics', 'expected an array')
		rejects('{}', '$.diagnostics', 'expected an array')
	})

	it('should locate a bad severity', () => {
		rejects(
			'{"diagnostics": [{"severity": "fatal", "message": "m"}]}',
			'$.diagnostics[0].severity',
			'unknown severity "fatal"'
		)
	})

	it('should locate a bad offset', () => {
		rejects(
			'{"diagnostics": [{"severity": "error", "message": "m", "labels": [{"file": "a", "start": -1, "end": 2}]}]}',
			'$.diagnostics[0].labels[0].start',
			'expected a non-negative integer'
		)
	})

	it('should reject an unknown label style', () => {
		rejects(
			'{"diagnostics": [{"severity": "error", "message": "m", "labels": [{"file": "a", "start": 0, "end": 0, "style": "bold"}]}]}',
			'$.diagnostics[0].labels[0].style',
			'expected "primary" or "secondary"'
		)
	})

	it('should reject a missing message and non-string notes', () => {
		rejects('{"diagnostics": [{"severity": "error"}]}', '$.diagnostics[0].message', 'expected a string')
		rejects(
			'{"diagnostics": [{"severity": "error", "message": "m", "notes": [1]}]}',
			'$.diagnostics[0].notes[0]',
			'expected a string'
		)
	})

	it('should locate a label that is not an object', () => {
		rejects(
			'{"diagnostics": [{"severity": "error", "message": "m", "labels": [{"file": "a", "start": 0, "end": 1}, 7]}]}',
			'$.diagnostics[0].labels[1]',
			'expected an object'
		)
	})

	it('should ignore unknown keys', () => {
		const [input] = parseInput('{"diagnostics": [{"severity": "help", "message": "m", "extra": true}]}')
		assert.deepStrictEqual(input, { labels: [], message: 'm', notes: [], severity: Severity.Help })
	})
})

describe('formatIssuePath', () => {
	it('should join keys and indexes', () => {
		assert.strictEqual(formatIssuePath([]), '$')
		assert.strictEqual(formatIssuePath(['diagnostics', 0, 'labels', 1, 'start']), '$.diagnostics[0].labels[1].start')
	})
})

describe('sourcePaths', () => {
	it('should list each file once in order of first use', () => {
		assert.deepStrictEqual(sourcePaths(parseInput(valid)), ['main.src', 'lib.src'])
	})
})

describe('buildInput', () => {
	const sources = new Map([
		['main.src', 'a\nb\nlet x = foo;\n'],
		['lib.src', 'pub fn'],
	])

	it('should build renderable diagnostics', () => {
		const { files, diagnostics } = buildInput(parseInput(valid), sources)
		assert.strictEqual(diagnostics.length, 2)
		const [first] = diagnostics
		assert.ok(first)
		assert.strictEqual(
			formatDiagnostic(files, first),
			[
				'error[E0001]: unexpected token',
				' --> main.src:3:5',
				'  |',
				'3 | let x = foo;',
				'  |     ^^^^ here',
				' --> lib.src:1:1',
				'  |',
				'1 | pub fn',
				'  | ---',
				'  |',
				'  = expected an expression',
				'',
			].join('\n')
		)
	})

	it('should reject labels whose source was not loaded', () => {
		assert.throws(
			() => buildInput(parseInput(valid), new Map([['main.src', 'x']])),
			(error: unknown) =>
				error instanceof InputError && error.path === '$.diagnostics[0].labels[1].file'
		)
	})
})
