/**
 * Style tokens attached to styled regions of a document.
 */

/** The eight portable terminal colors. */
export const Color = {
	Black: 'black',
	Blue: 'blue',
	Cyan: 'cyan',
	Green: 'green',
	Magenta: 'magenta',
	Red: 'red',
	White: 'white',
	Yellow: 'yellow',
} as const

export type Color = (typeof Color)[keyof typeof Color]

/**
 * A complete style. A styled region replaces its parent's style rather than
 * layering on top of it, so every attribute the region needs must be set here.
 */
export interface Style {
	readonly fg?: Color
	readonly bold?: boolean
	readonly dim?: boolean
	readonly italic?: boolean
	readonly underline?: boolean
}

const FLAGS = ['bold', 'dim', 'italic', 'underline'] as const

export function isColor(value: string): value is Color {
	return Object.values<string>(Color).includes(value)
}

/**
 * Structural equality. `undefined` (no style) only equals `undefined`.
 */
export function styleEquals(a: Style | undefined, b: Style | undefined): boolean {
	if (a === b) return true
	if (a === undefined || b === undefined) return false
	if (a.fg !== b.fg) return false
	return FLAGS.every((flag) => (a[flag] ?? false) === (b[flag] ?? false))
}

/**
 * Compact textual form, e.g. `fg:red bold`. Attribute order is fixed.
 */
export function formatStyle(style: Style): string {
	const parts: string[] = []
	if (style.fg !== undefined) parts.push(`fg:${style.fg}`)
	for (const flag of FLAGS) {
		if (style[flag]) parts.push(flag)
	}
	return parts.join(' ')
}
