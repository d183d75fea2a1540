/**
 * Diagnostic data model.
 */

/**
 * Diagnostic severity levels, most severe first.
 */
export const Severity = {
	Bug: 0,
	Error: 1,
	Help: 4,
	Note: 3,
	Warning: 2,
} as const

export type Severity = (typeof Severity)[keyof typeof Severity]

const SEVERITY_NAMES: Record<Severity, string> = {
	[Severity.Bug]: 'bug',
	[Severity.Error]: 'error',
	[Severity.Warning]: 'warning',
	[Severity.Note]: 'note',
	[Severity.Help]: 'help',
}

/** The word shown in a diagnostic header. */
export function severityName(severity: Severity): string {
	return SEVERITY_NAMES[severity]
}

export function parseSeverity(name: string): Severity | undefined {
	for (const severity of Object.values(Severity)) {
		if (SEVERITY_NAMES[severity] === name) return severity
	}
	return undefined
}

/**
 * Order severities: positive when `a` is more severe than `b`.
 * Bug > Error > Warning > Note > Help.
 */
export function compareSeverity(a: Severity, b: Severity): number {
	return b - a
}

/**
 * Primary labels mark the cause of a diagnostic and take the severity color.
 * Secondary labels add context and use a neutral color.
 */
export const LabelStyle = {
	Primary: 0,
	Secondary: 1,
} as const

export type LabelStyle = (typeof LabelStyle)[keyof typeof LabelStyle]

/**
 * Half-open byte range `[start, end)` into one file's UTF-8 text.
 */
export interface Span<FileId = number> {
	readonly file: FileId
	readonly start: number
	readonly end: number
}

export interface Label<FileId = number> {
	readonly style: LabelStyle
	readonly span: Span<FileId>
	/** Text shown next to the underline; may contain newlines */
	readonly message?: string
}

export interface Diagnostic<FileId = number> {
	readonly severity: Severity
	/** Identifier such as `E0308`, shown in brackets after the severity */
	readonly code?: string
	readonly message: string
	/** Rendered grouped by file, in order of each file's first label */
	readonly labels: readonly Label<FileId>[]
	/** Free text shown after the source snippets */
	readonly notes: readonly string[]
}

/**
 * A position in rendered source. Both fields are 1-indexed; `column` counts
 * display columns (code points, with tabs expanded).
 */
export interface Position {
	readonly line: number
	readonly column: number
}

/**
 * A label whose span has been converted to line/column positions.
 * `order` is the label's index in its diagnostic.
 */
export interface ResolvedLabel<FileId = number> {
	readonly style: LabelStyle
	readonly message?: string
	readonly file: FileId
	readonly start: Position
	readonly end: Position
	readonly order: number
}

// =============================================================================
// BUILDERS
// =============================================================================

export function span<FileId>(file: FileId, start: number, end: number): Span<FileId> {
	return { end, file, start }
}

export function label<FileId>(
	style: LabelStyle,
	labelSpan: Span<FileId>,
	message?: string
): Label<FileId> {
	return {
		span: labelSpan,
		style,
		...(message !== undefined ? { message } : {}),
	}
}

export function primaryLabel<FileId>(labelSpan: Span<FileId>, message?: string): Label<FileId> {
	return label(LabelStyle.Primary, labelSpan, message)
}

export function secondaryLabel<FileId>(labelSpan: Span<FileId>, message?: string): Label<FileId> {
	return label(LabelStyle.Secondary, labelSpan, message)
}

export function diagnostic<FileId = number>(
	severity: Severity,
	message: string
): Diagnostic<FileId> {
	return { labels: [], message, notes: [], severity }
}

export function withCode<FileId>(target: Diagnostic<FileId>, code: string): Diagnostic<FileId> {
	return { ...target, code }
}

export function withLabels<FileId>(
	target: Diagnostic<FileId>,
	...labels: Label<FileId>[]
): Diagnostic<FileId> {
	return { ...target, labels: [...target.labels, ...labels] }
}

export function withNotes<FileId>(
	target: Diagnostic<FileId>,
	...notes: string[]
): Diagnostic<FileId> {
	return { ...target, notes: [...target.notes, ...notes] }
}

export function isMultiline(resolved: ResolvedLabel<unknown>): boolean {
	return resolved.start.line !== resolved.end.line
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Diagnostic definition in a catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: Severity
	readonly message: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
