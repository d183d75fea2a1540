import { ConfigError } from './errors.ts'

/**
 * Layout options. All fields are optional; see `DEFAULT_CONFIG`.
 */
export interface EmitConfig {
	/** Tab stop width used for display columns and source expansion */
	tabWidth?: number
	/** Context lines shown before the first and after the last labelled line */
	contextLines?: number
	/** Overrides `contextLines` before the first labelled line */
	startContextLines?: number
	/** Overrides `contextLines` after the last labelled line */
	endContextLines?: number
	/** Multi-line spans with more interior lines than this are elided */
	elisionThreshold?: number
}

export interface ResolvedConfig {
	readonly tabWidth: number
	readonly linesBefore: number
	readonly linesAfter: number
	readonly elisionThreshold: number
}

export const DEFAULT_CONFIG: ResolvedConfig = {
	elisionThreshold: 3,
	linesAfter: 0,
	linesBefore: 0,
	tabWidth: 4,
}

function checkCount(option: string, value: number | undefined, minimum: number): void {
	if (value === undefined) return
	if (!Number.isInteger(value) || value < minimum) {
		throw new ConfigError(option, value, `an integer >= ${minimum}`)
	}
}

/**
 * Fill in defaults and validate.
 *
 * @throws {ConfigError} If a value is not an integer in range
 */
export function resolveConfig(config: EmitConfig = {}): ResolvedConfig {
	checkCount('tabWidth', config.tabWidth, 1)
	checkCount('contextLines', config.contextLines, 0)
	checkCount('startContextLines', config.startContextLines, 0)
	checkCount('endContextLines', config.endContextLines, 0)
	checkCount('elisionThreshold', config.elisionThreshold, 0)

	const context = config.contextLines ?? DEFAULT_CONFIG.linesBefore
	return {
		elisionThreshold: config.elisionThreshold ?? DEFAULT_CONFIG.elisionThreshold,
		linesAfter: config.endContextLines ?? context,
		linesBefore: config.startContextLines ?? context,
		tabWidth: config.tabWidth ?? DEFAULT_CONFIG.tabWidth,
	}
}
