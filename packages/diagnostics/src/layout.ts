/**
 * Label layout engine.
 *
 * Turns the resolved labels of one diagnostic into a per-file plan of source
 * lines, underline rows, message rows and connector columns. The plan is
 * positional only; styling happens when the emitter builds the document.
 *
 * Ordering rules:
 * - files in order of their first label
 * - markers on a line by start column, then Primary before Secondary, then
 *   label order
 * - overlapping markers stacked on extra rows by greedy interval scheduling
 */

import { codePoints, displayWidth, expandTabs } from './columns.ts'
import type { ResolvedConfig } from './config.ts'
import type { Files } from './files.ts'
import { sourceLine } from './resolve.ts'
import { isMultiline, LabelStyle, type Position, type ResolvedLabel } from './types.ts'

export const MARKER_GLYPHS: Record<LabelStyle, string> = {
	[LabelStyle.Primary]: '^',
	[LabelStyle.Secondary]: '-',
}

export const POINTER_GLYPH = '|'

/**
 * Columns `[start, end)` to underline on one line. `end > start` always holds;
 * zero-width spans are widened to one column.
 */
export interface MarkerRange {
	readonly start: number
	readonly end: number
	readonly style: LabelStyle
	readonly message: string | undefined
	readonly order: number
}

export type RowItemRole = 'marker' | 'message' | 'pointer'

/**
 * Text placed at a 1-indexed display column of an annotation row.
 */
export interface RowItem {
	readonly column: number
	readonly text: string
	readonly style: LabelStyle
	readonly role: RowItemRole
}

/**
 * One entry per connector column: the style of the multi-line label passing
 * through, or undefined for an empty column.
 */
export type ConnectorSlots = readonly (LabelStyle | undefined)[]

export interface AnnotationRow {
	readonly connectors: ConnectorSlots
	readonly items: readonly RowItem[]
}

export interface SourceBlock {
	readonly kind: 'source'
	readonly line: number
	/** Line text with tabs expanded */
	readonly text: string
	readonly connectors: ConnectorSlots
	readonly rows: readonly AnnotationRow[]
}

/** Placeholder for skipped lines. */
export interface ElidedBlock {
	readonly kind: 'elided'
	readonly connectors: ConnectorSlots
}

export type LineBlock = SourceBlock | ElidedBlock

export interface FileLayout<FileId> {
	readonly file: FileId
	readonly name: string
	/** Start of the file's first primary label, or of its first label */
	readonly location: Position
	/** Digits of the largest line number shown */
	readonly gutterWidth: number
	/** Number of connector columns between the gutter and the source text */
	readonly connectorWidth: number
	readonly blocks: readonly LineBlock[]
}

// =============================================================================
// ORDERING
// =============================================================================

export function compareRanges(a: MarkerRange, b: MarkerRange): number {
	return a.start - b.start || a.style - b.style || a.order - b.order
}

function compareLabels(a: ResolvedLabel<unknown>, b: ResolvedLabel<unknown>): number {
	return (
		a.start.line - b.start.line ||
		a.start.column - b.start.column ||
		a.style - b.style ||
		a.order - b.order
	)
}

/**
 * Group labels by file, keeping files in order of first appearance and labels
 * in their original order.
 */
export function groupByFile<FileId>(
	labels: readonly ResolvedLabel<FileId>[]
): Map<FileId, ResolvedLabel<FileId>[]> {
	const groups = new Map<FileId, ResolvedLabel<FileId>[]>()
	for (const label of labels) {
		const group = groups.get(label.file)
		if (group === undefined) {
			groups.set(label.file, [label])
		} else {
			group.push(label)
		}
	}
	return groups
}

// =============================================================================
// ROWS
// =============================================================================

/**
 * Place ranges on rows: each range goes on the first row whose last range
 * ends at or before its start, or on a new row.
 */
export function assignRows(ranges: readonly MarkerRange[]): MarkerRange[][] {
	const rows: MarkerRange[][] = []
	const ends: number[] = []
	for (const range of [...ranges].sort(compareRanges)) {
		const index = ends.findIndex((end) => end <= range.start)
		if (index === -1) {
			rows.push([range])
			ends.push(range.end)
		} else {
			rows[index]?.push(range)
			ends[index] = range.end
		}
	}
	return rows
}

function pointers(ranges: readonly MarkerRange[]): RowItem[] {
	return ranges.map((range): RowItem => ({
		column: range.start,
		role: 'pointer',
		style: range.style,
		text: POINTER_GLYPH,
	}))
}

/**
 * Expand one row of markers into the rows shown under the source line.
 *
 * The last marker takes its message inline. An earlier marker only does if
 * the message is a single line that ends before the next marker; otherwise the
 * message hangs below its marker's start column, with pointers leading down to
 * it. Continuation lines of a message keep the column of its first line.
 */
export function annotateRow(row: readonly MarkerRange[]): RowItem[][] {
	const first: RowItem[] = []
	const pending: MarkerRange[] = []
	let tail: { column: number; lines: string[]; style: LabelStyle } | undefined

	for (const [index, range] of row.entries()) {
		first.push({
			column: range.start,
			role: 'marker',
			style: range.style,
			text: MARKER_GLYPHS[range.style].repeat(range.end - range.start),
		})
		if (range.message === undefined) continue

		const [head = '', ...rest] = range.message.split('\n')
		const column = range.end + 1
		const next = row[index + 1]
		if (next === undefined) {
			first.push({ column, role: 'message', style: range.style, text: head })
			tail = { column, lines: rest, style: range.style }
		} else if (rest.length === 0 && column + codePoints(head).length < next.start) {
			first.push({ column, role: 'message', style: range.style, text: head })
		} else {
			pending.push(range)
		}
	}

	const rows: RowItem[][] = [first]
	if (tail !== undefined) {
		for (const text of tail.lines) {
			rows.push([...pointers(pending), { column: tail.column, role: 'message', style: tail.style, text }])
		}
	}
	if (pending.length > 0) {
		rows.push(pointers(pending))
		for (let i = pending.length - 1; i >= 0; i--) {
			const range = pending[i]
			if (range === undefined) continue
			for (const text of (range.message ?? '').split('\n')) {
				rows.push([
					...pointers(pending.slice(0, i)),
					{ column: range.start, role: 'message', style: range.style, text },
				])
			}
		}
	}
	return rows
}

// =============================================================================
// LINES
// =============================================================================

/**
 * Marker ranges for one line: single-line labels on it, the start of
 * multi-line labels (to the end of the line) and their end (from column 1).
 * Only single-line labels and multi-line ends carry messages.
 */
export function rangesForLine(
	labels: readonly ResolvedLabel<unknown>[],
	line: number,
	lineEndColumn: number
): MarkerRange[] {
	const ranges: MarkerRange[] = []
	for (const label of labels) {
		const message = label.message
		if (!isMultiline(label)) {
			if (label.start.line === line) {
				const start = label.start.column
				ranges.push({ end: Math.max(label.end.column, start + 1), message, order: label.order, start, style: label.style })
			}
			continue
		}
		if (label.start.line === line) {
			const start = label.start.column
			ranges.push({ end: Math.max(lineEndColumn, start + 1), message: undefined, order: label.order, start, style: label.style })
		}
		if (label.end.line === line) {
			ranges.push({ end: Math.max(label.end.column, 2), message, order: label.order, start: 1, style: label.style })
		}
	}
	return ranges.sort(compareRanges)
}

/**
 * Lines to show: every label's start and end line, the interior of multi-line
 * labels short enough not to be elided, and context around the whole group.
 */
export function displayedLines(
	labels: readonly ResolvedLabel<unknown>[],
	lineCount: number,
	config: ResolvedConfig
): number[] {
	const lines = new Set<number>()
	for (const label of labels) {
		lines.add(label.start.line)
		lines.add(label.end.line)
		if (label.end.line - label.start.line - 1 <= config.elisionThreshold) {
			for (let line = label.start.line + 1; line < label.end.line; line++) lines.add(line)
		}
	}
	if (lines.size === 0) return []

	const first = Math.min(...lines)
	const last = Math.max(...lines)
	for (let line = Math.max(1, first - config.linesBefore); line < first; line++) lines.add(line)
	for (let line = last + 1; line <= Math.min(lineCount, last + config.linesAfter); line++) {
		lines.add(line)
	}
	return [...lines].sort((a, b) => a - b)
}

/**
 * Give each multi-line label a connector column, the smallest one not held by
 * a label whose line range overlaps (inclusively) with its own.
 * Returns label order → column.
 */
export function assignConnectors(labels: readonly ResolvedLabel<unknown>[]): Map<number, number> {
	const columns = new Map<number, number>()
	let active: { column: number; endLine: number }[] = []
	for (const label of labels.filter(isMultiline).sort(compareLabels)) {
		active = active.filter((entry) => entry.endLine >= label.start.line)
		let column = 0
		while (active.some((entry) => entry.column === column)) column++
		active.push({ column, endLine: label.end.line })
		columns.set(label.order, column)
	}
	return columns
}

function connectorSlots(
	labels: readonly ResolvedLabel<unknown>[],
	columns: ReadonlyMap<number, number>,
	width: number,
	passesThrough: (label: ResolvedLabel<unknown>) => boolean
): ConnectorSlots {
	const slots: (LabelStyle | undefined)[] = Array.from({ length: width }, () => undefined)
	for (const label of labels) {
		const column = columns.get(label.order)
		if (column !== undefined && passesThrough(label)) slots[column] = label.style
	}
	return slots
}

// =============================================================================
// FILES
// =============================================================================

function layoutFile<FileId>(
	files: Files<FileId>,
	file: FileId,
	labels: readonly ResolvedLabel<FileId>[],
	config: ResolvedConfig
): FileLayout<FileId> {
	const columns = assignConnectors(labels)
	const connectorWidth = columns.size === 0 ? 0 : Math.max(...columns.values()) + 1
	const slots = (passesThrough: (label: ResolvedLabel<unknown>) => boolean): ConnectorSlots =>
		connectorSlots(labels, columns, connectorWidth, passesThrough)

	const lines = displayedLines(labels, files.lineCount(file) ?? 0, config)
	const blocks: LineBlock[] = []
	let previous: number | undefined

	for (const line of lines) {
		const before = previous
		if (before !== undefined && line > before + 1) {
			blocks.push({
				connectors: slots((label) => label.start.line <= before && label.end.line >= line),
				kind: 'elided',
			})
		}

		const text = sourceLine(files, file, line)
		const connectors = slots((label) => label.start.line < line && line < label.end.line)
		const ranges = rangesForLine(labels, line, 1 + displayWidth(text, config.tabWidth))
		const rows = assignRows(ranges)
			.flatMap((row) => annotateRow(row))
			.map((items) => ({ connectors, items }))

		blocks.push({ connectors, kind: 'source', line, rows, text: expandTabs(text, config.tabWidth) })
		previous = line
	}

	const anchor = labels.find((label) => label.style === LabelStyle.Primary) ?? labels[0]
	return {
		blocks,
		connectorWidth,
		file,
		gutterWidth: String(lines[lines.length - 1] ?? 1).length,
		location: anchor?.start ?? { column: 1, line: 1 },
		name: files.name(file) ?? String(file),
	}
}

/**
 * Lay out every file a diagnostic's labels touch, in order of first label.
 */
export function layoutLabels<FileId>(
	files: Files<FileId>,
	labels: readonly ResolvedLabel<FileId>[],
	config: ResolvedConfig
): FileLayout<FileId>[] {
	return [...groupByFile(labels)].map(([file, group]) => layoutFile(files, file, group, config))
}
