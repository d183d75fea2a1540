/**
 * JSON input for `gutter render`.
 *
 *   {
 *     "diagnostics": [
 *       {
 *         "severity": "error",
 *         "code": "E0001",
 *         "message": "unexpected token",
 *         "labels": [{ "style": "primary", "file": "main.src", "start": 8, "end": 12, "message": "here" }],
 *         "notes": ["expected an expression"]
 *       }
 *     ]
 *   }
 *
 * Label files are paths relative to the JSON file. `code`, `labels`, `notes`,
 * label `style` (default primary) and label `message` are optional.
 */

import {
	type Diagnostic,
	type Label,
	LabelStyle,
	label,
	parseSeverity,
	type Severity,
	SimpleFiles,
	span,
} from '@gutter/diagnostics'
import * as z from 'zod/v3'

export interface LabelInput {
	readonly style: LabelStyle
	readonly file: string
	readonly start: number
	readonly end: number
	readonly message?: string
}

export interface DiagnosticInput {
	readonly severity: Severity
	readonly code?: string
	readonly message: string
	readonly labels: readonly LabelInput[]
	readonly notes: readonly string[]
}

/**
 * Malformed input. `path` locates the offending value, e.g.
 * `$.diagnostics[0].labels[1].start`.
 */
export class InputError extends Error {
	readonly path: string
	readonly reason: string

	constructor(path: string, reason: string) {
		super(`${path}: ${reason}`)
		this.name = 'InputError'
		this.path = path
		this.reason = reason
	}
}

const STRING = { invalid_type_error: 'expected a string', required_error: 'expected a string' }
const OFFSET = 'expected a non-negative integer'

const offsetSchema = z
	.number({ invalid_type_error: OFFSET, required_error: OFFSET })
	.int({ message: OFFSET })
	.nonnegative({ message: OFFSET })

const labelSchema = z
	.object(
		{
			end: offsetSchema,
			file: z.string(STRING),
			message: z.string(STRING).optional(),
			start: offsetSchema,
			style: z
				.enum(['primary', 'secondary'], {
					errorMap: () => ({ message: 'expected "primary" or "secondary"' }),
				})
				.default('primary'),
		},
		{ invalid_type_error: 'expected an object' }
	)
	.transform(
		({ end, file, message, start, style }): LabelInput => ({
			end,
			file,
			start,
			style: style === 'secondary' ? LabelStyle.Secondary : LabelStyle.Primary,
			...(message !== undefined ? { message } : {}),
		})
	)

const severitySchema = z.string(STRING).transform((name, context): Severity => {
	const severity = parseSeverity(name)
	if (severity === undefined) {
		context.addIssue({ code: z.ZodIssueCode.custom, message: `unknown severity "${name}"` })
		return z.NEVER
	}
	return severity
})

const diagnosticSchema = z
	.object(
		{
			code: z.string(STRING).optional(),
			labels: z.array(labelSchema, { invalid_type_error: 'expected an array' }).default([]),
			message: z.string(STRING),
			notes: z.array(z.string(STRING), { invalid_type_error: 'expected an array' }).default([]),
			severity: severitySchema,
		},
		{ invalid_type_error: 'expected an object' }
	)
	.transform(
		({ code, labels, message, notes, severity }): DiagnosticInput => ({
			labels,
			message,
			notes,
			severity,
			...(code !== undefined ? { code } : {}),
		})
	)

const inputSchema = z.object(
	{
		diagnostics: z.array(diagnosticSchema, {
			invalid_type_error: 'expected an array',
			required_error: 'expected an array',
		}),
	},
	{ invalid_type_error: 'expected an object with a "diagnostics" array' }
)

/**
 * `$.diagnostics[0].labels[1].start` style path of a schema issue.
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
	return path.reduce<string>(
		(result, key) => (typeof key === 'number' ? `${result}[${key}]` : `${result}.${key}`),
		'$'
	)
}

/**
 * Parse and validate the input document.
 *
 * @throws {InputError} On invalid JSON or an unexpected shape
 */
export function parseInput(text: string): DiagnosticInput[] {
	let document: unknown
	try {
		document = JSON.parse(text)
	} catch (error: unknown) {
		throw new InputError('$', error instanceof Error ? error.message : String(error))
	}
	const result = inputSchema.safeParse(document)
	if (!result.success) {
		const [issue] = result.error.issues
		throw new InputError(formatIssuePath(issue?.path ?? []), issue?.message ?? 'invalid input')
	}
	return result.data.diagnostics
}

/**
 * Source files the labels refer to, each once, in order of first use.
 */
export function sourcePaths(inputs: readonly DiagnosticInput[]): string[] {
	const paths = new Set<string>()
	for (const input of inputs) {
		for (const entry of input.labels) paths.add(entry.file)
	}
	return [...paths]
}

export interface LoadedInput {
	readonly files: SimpleFiles
	readonly diagnostics: Diagnostic[]
}

/**
 * Register the loaded sources and convert the inputs into diagnostics.
 *
 * @throws {InputError} If a label refers to a file missing from `sources`
 */
export function buildInput(
	inputs: readonly DiagnosticInput[],
	sources: ReadonlyMap<string, string>
): LoadedInput {
	const files = new SimpleFiles()
	const ids = new Map<string, number>()
	for (const [path, source] of sources) {
		ids.set(path, files.add(path, source))
	}

	const diagnostics = inputs.map((input, index): Diagnostic => {
		const labels = input.labels.map((entry, labelIndex): Label => {
			const file = ids.get(entry.file)
			if (file === undefined) {
				throw new InputError(
					`$.diagnostics[${index}].labels[${labelIndex}].file`,
					`source "${entry.file}" was not loaded`
				)
			}
			return label(entry.style, span(file, entry.start, entry.end), entry.message)
		})
		return {
			labels,
			message: input.message,
			notes: input.notes,
			severity: input.severity,
			...(input.code !== undefined ? { code: input.code } : {}),
		}
	})
	return { diagnostics, files }
}
