/**
 * Diagnostic emitter.
 *
 * Resolves the labels, lays them out per file and builds a styled document:
 *
 *   error[E0001]: unexpected token
 *    --> main.src:3:5
 *     |
 *   3 | let x = foo;
 *     |     ^^^^ here
 *     |
 *     = note text
 *
 * The document is complete before anything is written, so an invalid span
 * leaves the writer untouched.
 */

import {
	type DocNode,
	type Document,
	render,
	renderToString,
	type Style,
	type StyledWriter,
	styled,
	text,
} from '@gutter/render-tree'
import { codePoints } from './columns.ts'
import { type EmitConfig, resolveConfig } from './config.ts'
import { EmitError, WriteFailureError } from './errors.ts'
import type { Files } from './files.ts'
import {
	type AnnotationRow,
	type ConnectorSlots,
	type FileLayout,
	type LineBlock,
	layoutLabels,
	POINTER_GLYPH,
	type RowItemRole,
} from './layout.ts'
import { resolveLabels } from './resolve.ts'
import {
	effectiveStyle,
	labelColor,
	resolveTheme,
	type Theme,
	type ThemeOverrides,
} from './theme.ts'
import { type Diagnostic, type LabelStyle, type Severity, severityName } from './types.ts'

export interface EmitOptions extends EmitConfig {
	theme?: ThemeOverrides
}

export interface FormatOptions extends EmitOptions {
	/** Include ANSI escapes */
	color?: boolean
}

interface Segment {
	readonly text: string
	readonly style: Style | undefined
}

/**
 * Turn the segments into a newline-terminated line. With `trim`, trailing
 * spaces are dropped first; source text is passed with `trim` off.
 */
function row(segments: readonly Segment[], trim = true): DocNode[] {
	const kept = [...segments]
	while (trim && kept.length > 0) {
		const last = kept[kept.length - 1]
		if (last === undefined) break
		const trimmed = last.text.replace(/ +$/, '')
		if (trimmed !== '') {
			kept[kept.length - 1] = { style: last.style, text: trimmed }
			break
		}
		kept.pop()
	}
	const result: DocNode[] = kept.map((segment) =>
		segment.style === undefined ? text(segment.text) : styled(segment.style, segment.text)
	)
	result.push(text('\n'))
	return result
}

/**
 * Builds the rows of one diagnostic. Holds the per-diagnostic styling context.
 */
class DocumentBuilder {
	private readonly theme: Theme
	private readonly severity: Severity

	constructor(theme: Theme, severity: Severity) {
		this.theme = theme
		this.severity = severity
	}

	private gutter(value: string): Segment {
		return { style: effectiveStyle(this.theme.gutter), text: value }
	}

	private label(style: LabelStyle, role: RowItemRole, value: string): Segment {
		const base = role === 'message' ? this.theme.message : this.theme.marker
		return { style: { ...base, fg: labelColor(this.theme, this.severity, style) }, text: value }
	}

	private connectors(slots: ConnectorSlots): Segment[] {
		if (slots.length === 0) return []
		const cells = slots.map((slot) =>
			slot === undefined ? { style: undefined, text: ' ' } : this.label(slot, 'pointer', POINTER_GLYPH)
		)
		return [...cells, { style: undefined, text: ' ' }]
	}

	header(diagnostic: Diagnostic<unknown>): DocNode[] {
		const code = diagnostic.code !== undefined ? `[${diagnostic.code}]` : ''
		return row([
			{
				style: { bold: true, fg: this.theme.severity[diagnostic.severity] },
				text: `${severityName(diagnostic.severity)}${code}`,
			},
			{ style: effectiveStyle(this.theme.header), text: `: ${diagnostic.message}` },
		])
	}

	blankGutter(width: number): DocNode[] {
		return row([this.gutter(`${' '.repeat(width)} |`)])
	}

	file(layout: FileLayout<unknown>): DocNode[] {
		const pad = ' '.repeat(layout.gutterWidth)
		const { line, column } = layout.location
		return [
			...row([
				{ style: undefined, text: pad },
				this.gutter('-->'),
				{ style: undefined, text: ' ' },
				{ style: effectiveStyle(this.theme.location), text: `${layout.name}:${line}:${column}` },
			]),
			...this.blankGutter(layout.gutterWidth),
			...layout.blocks.flatMap((block) => this.block(block, layout.gutterWidth)),
		]
	}

	private block(block: LineBlock, width: number): DocNode[] {
		const pad = ' '.repeat(width)
		if (block.kind === 'elided') {
			return row([
				this.gutter(`${pad} :`),
				{ style: undefined, text: ' ' },
				...this.connectors(block.connectors),
			])
		}
		return [
			...row(
				[
					this.gutter(`${String(block.line).padStart(width)} |`),
					{ style: undefined, text: ' ' },
					...this.connectors(block.connectors),
					{ style: undefined, text: block.text },
				],
				block.text === ''
			),
			...block.rows.flatMap((annotation) => this.annotation(annotation, pad)),
		]
	}

	private annotation(annotation: AnnotationRow, pad: string): DocNode[] {
		const segments: Segment[] = [
			this.gutter(`${pad} |`),
			{ style: undefined, text: ' ' },
			...this.connectors(annotation.connectors),
		]
		let cursor = 1
		for (const item of annotation.items) {
			if (item.column > cursor) {
				segments.push({ style: undefined, text: ' '.repeat(item.column - cursor) })
				cursor = item.column
			}
			segments.push(this.label(item.style, item.role, item.text))
			cursor += codePoints(item.text).length
		}
		return row(segments)
	}

	notes(notes: readonly string[], width: number): DocNode[] {
		const pad = ' '.repeat(width)
		return notes.flatMap((note) =>
			note.split('\n').flatMap((part, index) =>
				row([
					index === 0 ? this.gutter(`${pad} =`) : { style: undefined, text: `${pad}  ` },
					{ style: undefined, text: ' ' },
					{ style: effectiveStyle(this.theme.note), text: part },
				])
			)
		)
	}
}

/**
 * Build the styled document for a diagnostic without writing it.
 *
 * @throws {InvalidSpanError} If a label's span does not fit its file
 * @throws {ConfigError} If an option is out of range
 */
export function buildDocument<FileId>(
	files: Files<FileId>,
	diagnostic: Diagnostic<FileId>,
	options: EmitOptions = {}
): Document {
	const config = resolveConfig(options)
	const builder = new DocumentBuilder(resolveTheme(options.theme), diagnostic.severity)
	const layouts = layoutLabels(files, resolveLabels(files, diagnostic, config), config)

	const document: DocNode[] = builder.header(diagnostic)
	for (const layout of layouts) {
		document.push(...builder.file(layout))
	}
	if (diagnostic.notes.length > 0) {
		const width = Math.max(0, ...layouts.map((layout) => layout.gutterWidth))
		if (layouts.length > 0) document.push(...builder.blankGutter(width))
		document.push(...builder.notes(diagnostic.notes, width))
	}
	return document
}

/**
 * Render a diagnostic to a writer.
 *
 * @throws {InvalidSpanError} Before anything is written
 * @throws {WriteFailureError} If the writer throws; the original error is the cause
 */
export function emit<FileId>(
	writer: StyledWriter,
	files: Files<FileId>,
	diagnostic: Diagnostic<FileId>,
	options: EmitOptions = {}
): void {
	const document = buildDocument(files, diagnostic, options)
	try {
		render(document, writer)
	} catch (error) {
		if (error instanceof EmitError) throw error
		throw new WriteFailureError(error)
	}
}

/**
 * Render a diagnostic to a string, plain unless `color` is set.
 */
export function formatDiagnostic<FileId>(
	files: Files<FileId>,
	diagnostic: Diagnostic<FileId>,
	options: FormatOptions = {}
): string {
	const document = buildDocument(files, diagnostic, options)
	return renderToString(document, options.color !== undefined ? { color: options.color } : {})
}
