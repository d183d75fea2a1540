/**
 * CLI diagnostic definitions.
 *
 * Error code format: GTCLI<NUMBER>
 * - GTCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, Severity } from './types.ts'

// =============================================================================
// CLI ERRORS (GTCLI001-099)
// =============================================================================

export const GTCLI001: DiagnosticDef = {
	code: 'GTCLI001',
	message: 'file not found: {path}',
	severity: Severity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const GTCLI002: DiagnosticDef = {
	code: 'GTCLI002',
	message: 'cannot read file: {reason}',
	severity: Severity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const GTCLI003: DiagnosticDef = {
	code: 'GTCLI003',
	message: 'invalid input at {path}: {reason}',
	severity: Severity.Error,
	suggestion: 'The input must be a JSON object with a `diagnostics` array.',
}

export const GTCLI004: DiagnosticDef = {
	code: 'GTCLI004',
	message: 'unknown color mode "{mode}"',
	severity: Severity.Error,
	suggestion: 'Use `--color auto`, `--color always` or `--color never`.',
}

export const GTCLI005: DiagnosticDef = {
	code: 'GTCLI005',
	message: 'invalid option: {reason}',
	severity: Severity.Error,
}

export const GTCLI006: DiagnosticDef = {
	code: 'GTCLI006',
	message: 'cannot render diagnostic #{index}: {reason}',
	severity: Severity.Error,
	suggestion: 'Check that every label span lies inside its file.',
}
