import type { Document } from './document.ts'
import { formatStyle } from './style.ts'

/**
 * Indented outline of a document, one node per line.
 *
 * ```
 * styled {fg:red bold}
 *   "error"
 * "\n"
 * ```
 */
export function debugDocument(document: Document): string {
	const lines: string[] = []
	const visit = (nodes: Document, depth: number): void => {
		const indent = '  '.repeat(depth)
		for (const node of nodes) {
			if (node.kind === 'text') {
				lines.push(`${indent}${JSON.stringify(node.text)}`)
			} else {
				lines.push(`${indent}styled {${formatStyle(node.style)}}`)
				visit(node.children, depth + 1)
			}
		}
	}
	visit(document, 0)
	return lines.join('\n')
}
