/**
 * @gutter/diagnostics
 *
 * Diagnostic model, span resolution, label layout and the emitter that turns
 * diagnostics into annotated source snippets.
 */

export {
	GTCLI001,
	GTCLI002,
	GTCLI003,
	GTCLI004,
	GTCLI005,
	GTCLI006,
} from './cli.ts'
export { codePoints, displayWidth, expandTabs } from './columns.ts'
export { DEFAULT_CONFIG, type EmitConfig, type ResolvedConfig, resolveConfig } from './config.ts'
export {
	buildDocument,
	type EmitOptions,
	emit,
	type FormatOptions,
	formatDiagnostic,
} from './emit.ts'
export {
	ConfigError,
	EmitError,
	type EmitErrorKind,
	InvalidSpanError,
	WriteFailureError,
} from './errors.ts'
export { type ByteLocation, type ByteRange, type Files, SimpleFiles } from './files.ts'
export { fromDefinition, interpolateMessage } from './interpolate.ts'
export {
	type AnnotationRow,
	type ConnectorSlots,
	type ElidedBlock,
	type FileLayout,
	type LineBlock,
	layoutLabels,
	MARKER_GLYPHS,
	type MarkerRange,
	POINTER_GLYPH,
	type RowItem,
	type RowItemRole,
	type SourceBlock,
} from './layout.ts'
export { resolveLabels, resolveSpan, sourceLine } from './resolve.ts'
export { DEFAULT_THEME, effectiveStyle, labelColor, resolveTheme, type Theme, type ThemeOverrides } from './theme.ts'
export {
	compareSeverity,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticDef,
	diagnostic,
	isMultiline,
	type Label,
	LabelStyle,
	label,
	type Position,
	parseSeverity,
	primaryLabel,
	type ResolvedLabel,
	type Span,
	Severity,
	secondaryLabel,
	severityName,
	span,
	withCode,
	withLabels,
	withNotes,
} from './types.ts'
