import { Color, type Style } from '@gutter/render-tree'
import { LabelStyle, Severity } from './types.ts'

/**
 * Styles used by the emitter, one entry per part of the output.
 *
 * Label parts take their color from the label: `severity` for primary labels,
 * `secondary` otherwise. `marker` and `message` add attributes on top of it.
 * An empty or missing style leaves that part unstyled.
 */
export interface Theme {
	/** Header name and primary labels, per severity */
	readonly severity: Readonly<Record<Severity, Color>>
	/** Secondary labels */
	readonly secondary: Color
	/** The `: message` part of the header */
	readonly header: Style
	/** Line numbers, separators, `:` and `=` */
	readonly gutter: Style
	/** `name:line:column` after the arrow */
	readonly location: Style | undefined
	/** Underlines, pointers and connectors */
	readonly marker: Style
	/** Label messages */
	readonly message: Style
	/** Note text */
	readonly note: Style | undefined
}

export interface ThemeOverrides {
	readonly severity?: Partial<Record<Severity, Color>>
	readonly secondary?: Color
	readonly header?: Style
	readonly gutter?: Style
	readonly location?: Style
	readonly marker?: Style
	readonly message?: Style
	readonly note?: Style
}

export const DEFAULT_THEME: Theme = {
	gutter: { fg: Color.Blue },
	header: { bold: true },
	location: undefined,
	marker: {},
	message: {},
	note: undefined,
	secondary: Color.Blue,
	severity: {
		[Severity.Bug]: Color.Red,
		[Severity.Error]: Color.Red,
		[Severity.Warning]: Color.Yellow,
		[Severity.Note]: Color.Green,
		[Severity.Help]: Color.Cyan,
	},
}

export function resolveTheme(overrides: ThemeOverrides = {}): Theme {
	return {
		gutter: overrides.gutter ?? DEFAULT_THEME.gutter,
		header: overrides.header ?? DEFAULT_THEME.header,
		location: overrides.location ?? DEFAULT_THEME.location,
		marker: overrides.marker ?? DEFAULT_THEME.marker,
		message: overrides.message ?? DEFAULT_THEME.message,
		note: overrides.note ?? DEFAULT_THEME.note,
		secondary: overrides.secondary ?? DEFAULT_THEME.secondary,
		severity: { ...DEFAULT_THEME.severity, ...overrides.severity },
	}
}

/**
 * Color of a label: primary labels follow the diagnostic's severity.
 */
export function labelColor(theme: Theme, severity: Severity, style: LabelStyle): Color {
	return style === LabelStyle.Primary ? theme.severity[severity] : theme.secondary
}

/**
 * Undefined for a style that sets nothing.
 */
export function effectiveStyle(style: Style | undefined): Style | undefined {
	if (style === undefined) return undefined
	const set = style.fg !== undefined || style.bold || style.dim || style.italic || style.underline
	return set ? style : undefined
}
