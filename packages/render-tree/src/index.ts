/**
 * @gutter/render-tree
 *
 * Styled document trees, flattened into coalesced runs and written to a
 * color-aware sink.
 */

export { debugDocument } from './debug.ts'
export {
	type Content,
	type DocNode,
	type Document,
	line,
	nodes,
	type StyledNode,
	styled,
	type TextNode,
	text,
} from './document.ts'
export {
	coalesce,
	flatten,
	type RenderToStringOptions,
	type Run,
	render,
	renderToString,
} from './render.ts'
export { Color, formatStyle, isColor, type Style, styleEquals } from './style.ts'
export { FdWriter, MarkupWriter, StringWriter, type StyledWriter } from './writers.ts'
