import type { Diagnostic, DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * Instantiate a catalog entry as a label-less diagnostic. The suggestion, if
 * any, becomes a `help:` note.
 */
export function fromDefinition<FileId = number>(
	def: DiagnosticDef,
	args?: DiagnosticArgs
): Diagnostic<FileId> {
	return {
		code: def.code,
		labels: [],
		message: interpolateMessage(def.message, args),
		notes: def.suggestion !== undefined ? [`help: ${def.suggestion}`] : [],
		severity: def.severity,
	}
}
