/**
 * Styled document tree.
 *
 * A document is a list of nodes. Each node is either plain text or a styled
 * region holding further nodes. Style scoping is strictly nested: text takes
 * the style of its nearest enclosing styled region, or no style at the root.
 */

import type { Style } from './style.ts'

export interface TextNode {
	readonly kind: 'text'
	readonly text: string
}

export interface StyledNode {
	readonly kind: 'styled'
	readonly style: Style
	readonly children: readonly DocNode[]
}

export type DocNode = TextNode | StyledNode

export type Document = readonly DocNode[]

/**
 * Anything the builders accept as children. Nested arrays are spliced in place;
 * `null`, `undefined`, `false` and empty strings are skipped so optional parts
 * can be written inline.
 */
export type Content = string | DocNode | readonly Content[] | null | undefined | false

export function text(value: string): TextNode {
	return { kind: 'text', text: value }
}

export function styled(style: Style, ...content: Content[]): StyledNode {
	return { children: nodes(...content), kind: 'styled', style }
}

/**
 * Normalize content into a flat node list.
 */
export function nodes(...content: Content[]): DocNode[] {
	const result: DocNode[] = []
	const visit = (item: Content): void => {
		if (item === null || item === undefined || item === false || item === '') return
		if (typeof item === 'string') {
			result.push(text(item))
		} else if (isDocNode(item)) {
			result.push(item)
		} else {
			for (const child of item) visit(child)
		}
	}
	for (const item of content) visit(item)
	return result
}

/**
 * Content followed by a newline. The newline sits outside any styled region.
 */
export function line(...content: Content[]): DocNode[] {
	return [...nodes(...content), text('\n')]
}

function isDocNode(item: DocNode | readonly Content[]): item is DocNode {
	return !Array.isArray(item)
}
