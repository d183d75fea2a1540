export type EmitErrorKind = 'InvalidSpan' | 'WriteFailure'

/**
 * Base class for everything `emit` throws.
 */
export class EmitError extends Error {
	readonly kind: EmitErrorKind

	constructor(kind: EmitErrorKind, message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'EmitError'
		this.kind = kind
	}
}

/**
 * A label span that does not fit its file: unknown file id, start after end,
 * an offset past the end of the text, or an offset inside a UTF-8 sequence.
 * Spans are never clamped.
 */
export class InvalidSpanError extends EmitError {
	readonly file: unknown
	readonly start: number
	readonly end: number
	readonly reason: string

	constructor(file: unknown, start: number, end: number, reason: string) {
		super('InvalidSpan', `invalid span ${start}..${end} in file ${String(file)}: ${reason}`)
		this.name = 'InvalidSpanError'
		this.file = file
		this.start = start
		this.end = end
		this.reason = reason
	}
}

/**
 * The writer threw while rendering. The original error is kept as `cause`.
 */
export class WriteFailureError extends EmitError {
	constructor(cause: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause)
		super('WriteFailure', `failed to write diagnostic: ${detail}`, { cause })
		this.name = 'WriteFailureError'
	}
}

/**
 * An option outside its allowed range.
 */
export class ConfigError extends Error {
	readonly option: string
	readonly value: unknown

	constructor(option: string, value: unknown, expectation: string) {
		super(`invalid ${option}: expected ${expectation}, got ${String(value)}`)
		this.name = 'ConfigError'
		this.option = option
		this.value = value
	}
}
