/**
 * Display-column arithmetic. Every code point is one column wide except tab,
 * which advances to the next multiple of the tab width.
 */

function advance(column: number, char: string, tabWidth: number): number {
	return char === '\t' ? column + (tabWidth - (column % tabWidth)) : column + 1
}

/**
 * Columns consumed by `text` when it starts at 0-indexed `startColumn`.
 */
export function displayWidth(text: string, tabWidth: number, startColumn = 0): number {
	let column = startColumn
	for (const char of text) {
		column = advance(column, char, tabWidth)
	}
	return column - startColumn
}

/**
 * Replace tabs with spaces up to the next tab stop.
 */
export function expandTabs(text: string, tabWidth: number): string {
	if (!text.includes('\t')) return text
	let result = ''
	let column = 0
	for (const char of text) {
		const next = advance(column, char, tabWidth)
		result += char === '\t' ? ' '.repeat(next - column) : char
		column = next
	}
	return result
}

/**
 * Split into code points, so that a string's cells match its display columns.
 */
export function codePoints(text: string): string[] {
	return Array.from(text)
}
