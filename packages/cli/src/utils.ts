import {
	type Diagnostic,
	fromDefinition,
	GTCLI001,
	GTCLI002,
	GTCLI003,
	GTCLI004,
	GTCLI005,
	GTCLI006,
} from '@gutter/diagnostics'
import type { ColorSupportLevel } from 'chalk'

export type ColorMode = 'auto' | 'always' | 'never'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function isColorMode(value: string): value is ColorMode {
	return value === 'auto' || value === 'always' || value === 'never'
}

/**
 * Chalk level for a color mode. `detected` is the terminal's own support;
 * `always` forces at least basic colors.
 */
export function colorLevel(mode: ColorMode, detected: ColorSupportLevel): ColorSupportLevel {
	if (mode === 'never') return 0
	if (mode === 'always' && detected === 0) return 1
	return detected
}

export function readErrorDiagnostic(filePath: string, error: unknown): Diagnostic {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return fromDefinition(GTCLI001, { path: filePath })
	}
	return fromDefinition(GTCLI002, { reason: getErrorMessage(error) })
}

export function inputErrorDiagnostic(path: string, reason: string): Diagnostic {
	return fromDefinition(GTCLI003, { path, reason })
}

export function colorModeDiagnostic(mode: string): Diagnostic {
	return fromDefinition(GTCLI004, { mode })
}

export function optionDiagnostic(error: unknown): Diagnostic {
	return fromDefinition(GTCLI005, { reason: getErrorMessage(error) })
}

/**
 * @param index 1-based position of the diagnostic in the input
 */
export function renderFailureDiagnostic(index: number, error: unknown): Diagnostic {
	return fromDefinition(GTCLI006, { index, reason: getErrorMessage(error) })
}

/**
 * One-line form for the logger, used when the diagnostic itself cannot be
 * rendered.
 */
export function formatCatalogLine(diagnostic: Diagnostic<unknown>): string {
	return diagnostic.code !== undefined ? `[${diagnostic.code}] ${diagnostic.message}` : diagnostic.message
}

/**
 * Flag fields the banner reads; ace's flag definitions satisfy it.
 */
export interface FlagSummary {
	readonly name: string
	readonly flagName?: string | undefined
	readonly description?: string | undefined
}

/**
 * Lines printed when `gutter` runs without a command.
 */
export function formatBanner(version: string, renderFlags: readonly FlagSummary[]): string[] {
	const entries = renderFlags.map((flag) => ({
		description: flag.description ?? '',
		option: `--${flag.flagName ?? flag.name}`,
	}))
	const width = Math.max(0, ...entries.map((entry) => entry.option.length))
	return [
		`gutter v${version}`,
		'',
		'Usage: gutter render <input.json> [options]',
		'',
		'Options:',
		...entries.map((entry) => `  ${entry.option.padEnd(width)}  ${entry.description}`.trimEnd()),
		'',
		'Run "gutter --help" for available commands and options.',
	]
}
