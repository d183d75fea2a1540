/**
 * Span resolution: byte offsets to 1-indexed line and display column.
 */

import { displayWidth } from './columns.ts'
import type { ResolvedConfig } from './config.ts'
import { InvalidSpanError } from './errors.ts'
import type { Files } from './files.ts'
import type { Diagnostic, Position, ResolvedLabel, Span } from './types.ts'

function resolveOffset<FileId>(
	files: Files<FileId>,
	target: Span<FileId>,
	offset: number,
	tabWidth: number
): Position {
	const location = files.location(target.file, offset)
	if (location === undefined) {
		throw new InvalidSpanError(
			target.file,
			target.start,
			target.end,
			`offset ${offset} is outside the source or inside a character`
		)
	}
	const range = files.lineRange(target.file, location.line)
	const prefix =
		range === undefined
			? undefined
			: files.slice(target.file, range.start, range.start + location.byteColumn)
	if (prefix === undefined) {
		throw new InvalidSpanError(
			target.file,
			target.start,
			target.end,
			`line ${location.line} is not available`
		)
	}
	return { column: 1 + displayWidth(prefix, tabWidth), line: location.line }
}

/**
 * @throws {InvalidSpanError} If the file is unknown or the span does not fit it
 */
export function resolveSpan<FileId>(
	files: Files<FileId>,
	target: Span<FileId>,
	config: ResolvedConfig
): { start: Position; end: Position } {
	if (files.name(target.file) === undefined) {
		throw new InvalidSpanError(target.file, target.start, target.end, 'unknown file')
	}
	if (target.start > target.end) {
		throw new InvalidSpanError(target.file, target.start, target.end, 'start is after end')
	}
	const start = resolveOffset(files, target, target.start, config.tabWidth)
	const end = resolveOffset(files, target, target.end, config.tabWidth)
	return { end, start }
}

/**
 * Resolve every label of a diagnostic, failing on the first bad span.
 */
export function resolveLabels<FileId>(
	files: Files<FileId>,
	diagnostic: Diagnostic<FileId>,
	config: ResolvedConfig
): ResolvedLabel<FileId>[] {
	return diagnostic.labels.map((label, order) => {
		const { start, end } = resolveSpan(files, label.span, config)
		return {
			end,
			file: label.span.file,
			order,
			start,
			style: label.style,
			...(label.message !== undefined && label.message !== '' ? { message: label.message } : {}),
		}
	})
}

/**
 * Text of a line without its terminator, or an empty string past the end.
 */
export function sourceLine<FileId>(files: Files<FileId>, file: FileId, line: number): string {
	const range = files.lineRange(file, line)
	if (range === undefined) return ''
	return files.slice(file, range.start, range.end) ?? ''
}
