/**
 * Output sinks for rendered documents.
 *
 * Writers never detect color support themselves; callers pass a chalk color
 * level explicitly (0 disables styling).
 */

import { Buffer } from 'node:buffer'
import { writeSync } from 'node:fs'
import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk'
import { formatStyle, type Style } from './style.ts'

export interface StyledWriter {
	/** When false, the renderer never calls `setStyle` or `resetStyle` */
	readonly supportsColor: boolean
	setStyle(style: Style): void
	writeText(text: string): void
	resetStyle(): void
}

function paint(base: ChalkInstance, style: Style): ChalkInstance {
	let result = base
	if (style.fg !== undefined) result = result[style.fg]
	if (style.bold) result = result.bold
	if (style.dim) result = result.dim
	if (style.italic) result = result.italic
	if (style.underline) result = result.underline
	return result
}

/**
 * Shared ANSI handling: the current style is applied to each written chunk.
 */
abstract class AnsiWriter implements StyledWriter {
	readonly supportsColor: boolean
	private readonly chalk: ChalkInstance
	private current: ChalkInstance | undefined

	constructor(level: ColorSupportLevel) {
		this.chalk = new Chalk({ level })
		this.supportsColor = level > 0
	}

	setStyle(style: Style): void {
		this.current = paint(this.chalk, style)
	}

	resetStyle(): void {
		this.current = undefined
	}

	writeText(text: string): void {
		this.write(this.current === undefined ? text : this.current(text))
	}

	protected abstract write(chunk: string): void
}

/**
 * Collects output in memory.
 */
export class StringWriter extends AnsiWriter {
	private buffer = ''

	protected write(chunk: string): void {
		this.buffer += chunk
	}

	override toString(): string {
		return this.buffer
	}
}

/**
 * Writes synchronously to a file descriptor such as `process.stderr.fd`.
 * A failed write throws out of `writeText`.
 */
export class FdWriter extends AnsiWriter {
	private readonly fd: number

	constructor(fd: number, level: ColorSupportLevel) {
		super(level)
		this.fd = fd
	}

	protected write(chunk: string): void {
		const bytes = Buffer.from(chunk, 'utf8')
		let offset = 0
		while (offset < bytes.length) {
			offset += writeSync(this.fd, bytes, offset)
		}
	}
}

/**
 * Records style changes as readable markup: `{fg:red bold}` when a style is
 * set and `{/}` when it is reset.
 */
export class MarkupWriter implements StyledWriter {
	readonly supportsColor = true
	private buffer = ''

	setStyle(style: Style): void {
		this.buffer += `{${formatStyle(style)}}`
	}

	resetStyle(): void {
		this.buffer += '{/}'
	}

	writeText(text: string): void {
		this.buffer += text
	}

	toString(): string {
		return this.buffer
	}
}
