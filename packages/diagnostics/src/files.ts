/**
 * Source file access.
 *
 * The renderer only reads through the `Files` interface, so any store that can
 * answer these lookups (an editor buffer, a compiler's source map) can back it.
 * Implementations must be deterministic and safe for concurrent reads.
 */

import { Buffer } from 'node:buffer'

export interface ByteRange {
	readonly start: number
	readonly end: number
}

export interface ByteLocation {
	/** Line number (1-indexed) */
	readonly line: number
	/** Byte offset from the start of the line (0-indexed) */
	readonly byteColumn: number
}

export interface Files<FileId> {
	/** Display name, or undefined for an unknown file */
	name(file: FileId): string | undefined
	source(file: FileId): string | undefined
	lineCount(file: FileId): number | undefined
	/** Byte range of a 1-indexed line, excluding its terminator */
	lineRange(file: FileId, line: number): ByteRange | undefined
	/** Undefined when the offset is outside the text or inside a character */
	location(file: FileId, offset: number): ByteLocation | undefined
	/** Decoded text of a byte range */
	slice(file: FileId, start: number, end: number): string | undefined
}

interface SimpleFile {
	readonly name: string
	readonly source: string
	readonly bytes: Buffer
	/** Byte offset where each line starts */
	readonly lineStarts: readonly number[]
}

const LF = 0x0a
const CR = 0x0d

function computeLineStarts(bytes: Buffer): number[] {
	const starts = [0]
	for (let i = 0; i < bytes.length; i++) {
		if (bytes[i] === LF) starts.push(i + 1)
	}
	return starts
}

function isContinuationByte(byte: number | undefined): boolean {
	return byte !== undefined && (byte & 0xc0) === 0x80
}

/**
 * In-memory files addressed by the numeric id `add` returns.
 */
export class SimpleFiles implements Files<number> {
	private readonly files: SimpleFile[] = []

	add(name: string, source: string): number {
		const bytes = Buffer.from(source, 'utf8')
		this.files.push({ bytes, lineStarts: computeLineStarts(bytes), name, source })
		return this.files.length - 1
	}

	count(): number {
		return this.files.length
	}

	name(file: number): string | undefined {
		return this.files[file]?.name
	}

	source(file: number): string | undefined {
		return this.files[file]?.source
	}

	/** A final line terminator ends the last line rather than starting another */
	lineCount(file: number): number | undefined {
		const entry = this.files[file]
		if (entry === undefined) return undefined
		const last = entry.lineStarts[entry.lineStarts.length - 1]
		const trailing = entry.bytes.length > 0 && last === entry.bytes.length
		return trailing ? entry.lineStarts.length - 1 : entry.lineStarts.length
	}

	lineRange(file: number, line: number): ByteRange | undefined {
		const entry = this.files[file]
		if (entry === undefined) return undefined
		const start = entry.lineStarts[line - 1]
		if (start === undefined) return undefined
		const next = entry.lineStarts[line]
		let end = next === undefined ? entry.bytes.length : next - 1
		if (end > start && entry.bytes[end - 1] === CR) end--
		return { end, start }
	}

	location(file: number, offset: number): ByteLocation | undefined {
		const entry = this.files[file]
		if (entry === undefined) return undefined
		if (!Number.isInteger(offset) || offset < 0 || offset > entry.bytes.length) return undefined
		if (isContinuationByte(entry.bytes[offset])) return undefined

		// Last line starting at or before the offset
		let low = 0
		let high = entry.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			const start = entry.lineStarts[mid] ?? 0
			if (start <= offset) {
				low = mid
			} else {
				high = mid - 1
			}
		}
		return { byteColumn: offset - (entry.lineStarts[low] ?? 0), line: low + 1 }
	}

	slice(file: number, start: number, end: number): string | undefined {
		const entry = this.files[file]
		if (entry === undefined) return undefined
		if (start < 0 || end < start || end > entry.bytes.length) return undefined
		return entry.bytes.subarray(start, end).toString('utf8')
	}
}
