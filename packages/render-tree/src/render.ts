/**
 * Flattening and rendering of styled documents.
 */

import type { Document } from './document.ts'
import { type Style, styleEquals } from './style.ts'
import { StringWriter, type StyledWriter } from './writers.ts'

/**
 * A chunk of text with its effective style.
 */
export interface Run {
	readonly style: Style | undefined
	readonly text: string
}

/**
 * Depth-first traversal yielding one run per text node, in document order.
 */
export function flatten(document: Document): Run[] {
	const runs: Run[] = []
	const visit = (nodes: Document, style: Style | undefined): void => {
		for (const node of nodes) {
			if (node.kind === 'text') {
				runs.push({ style, text: node.text })
			} else {
				visit(node.children, node.style)
			}
		}
	}
	visit(document, undefined)
	return runs
}

/**
 * Merge adjacent runs with identical effective style and drop empty ones.
 */
export function coalesce(runs: readonly Run[]): Run[] {
	const result: Run[] = []
	for (const run of runs) {
		if (run.text === '') continue
		const last = result[result.length - 1]
		if (last !== undefined && styleEquals(last.style, run.style)) {
			result[result.length - 1] = { style: last.style, text: last.text + run.text }
		} else {
			result.push(run)
		}
	}
	return result
}

/**
 * Write a document to a writer.
 *
 * Styles are only switched when the effective style changes, reset when text
 * without a style follows styled text, and always reset before returning.
 * A writer without color support never sees a style call.
 */
export function render(document: Document, writer: StyledWriter): void {
	const color = writer.supportsColor
	let active: Style | undefined

	for (const run of coalesce(flatten(document))) {
		if (color) {
			if (run.style === undefined) {
				if (active !== undefined) {
					writer.resetStyle()
					active = undefined
				}
			} else if (!styleEquals(active, run.style)) {
				writer.setStyle(run.style)
				active = run.style
			}
		}
		writer.writeText(run.text)
	}

	if (active !== undefined) {
		writer.resetStyle()
	}
}

export interface RenderToStringOptions {
	/** Emit ANSI escapes (chalk level 1) instead of plain text */
	color?: boolean
}

export function renderToString(document: Document, options: RenderToStringOptions = {}): string {
	const writer = new StringWriter(options.color ? 1 : 0)
	render(document, writer)
	return writer.toString()
}
