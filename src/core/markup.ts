/**
 * Forgiving HTML scanner.
 *
 * Builds a lightweight element tree from a regex tokenizer so album and item
 * pages can be queried by class, attribute, sibling and parent. Unclosed tags
 * are closed at their parent's end tag; stray end tags are ignored. Script and
 * style bodies are kept as raw text.
 */

export interface MarkupElement {
	tag: string
	attrs: Record<string, string>
	children: MarkupNode[]
	parent: MarkupElement | null
}

export type MarkupNode = MarkupElement | string

const VOID_TAGS = new Set([
	"area",
	"base",
	"br",
	"col",
	"embed",
	"hr",
	"img",
	"input",
	"link",
	"meta",
	"source",
	"track",
	"wbr",
])

const RAW_TEXT_TAGS = new Set(["script", "style", "textarea"])

const TOKEN_REGEX =
	/<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<![^>]*>|<(\/?)([a-zA-Z][\w:-]*)((?:[^>"']|"[^"]*"|'[^']*')*)>|([^<]+|<)/g

const ATTR_REGEX = /([^\s=/"'>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g

const NAMED_ENTITIES: Record<string, string> = {
	amp: "&",
	lt: "<",
	gt: ">",
	quot: '"',
	apos: "'",
	nbsp: " ",
}

/** Out-of-range references decode to U+FFFD */
function fromCodePoint(code: number): string {
	return Number.isInteger(code) && code > 0 && code <= 0x10ffff
		? String.fromCodePoint(code)
		: "\uFFFD"
}

export function decodeEntities(text: string): string {
	return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, body: string) => {
		if (body.startsWith("#x") || body.startsWith("#X")) {
			return fromCodePoint(parseInt(body.slice(2), 16))
		}
		if (body.startsWith("#")) {
			return fromCodePoint(parseInt(body.slice(1), 10))
		}
		return NAMED_ENTITIES[body.toLowerCase()] ?? whole
	})
}

function parseAttributes(source: string): Record<string, string> {
	const attrs: Record<string, string> = {}
	let match: RegExpExecArray | null
	ATTR_REGEX.lastIndex = 0
	while ((match = ATTR_REGEX.exec(source)) !== null) {
		const name = (match[1] ?? "").toLowerCase()
		if (!name || name in attrs) continue
		attrs[name] = decodeEntities(match[2] ?? match[3] ?? match[4] ?? "")
	}
	return attrs
}

/** Parse an HTML document into a synthetic root element */
export function parseMarkup(html: string): MarkupElement {
	const root: MarkupElement = {
		tag: "#root",
		attrs: {},
		children: [],
		parent: null,
	}
	let current = root
	const regex = new RegExp(TOKEN_REGEX.source, "g")
	let match: RegExpExecArray | null

	while ((match = regex.exec(html)) !== null) {
		const [token, slash, rawTag, rawAttrs, text] = match
		if (text !== undefined) {
			current.children.push(decodeEntities(text))
			continue
		}
		if (!rawTag) continue // comment, doctype, CDATA

		const tag = rawTag.toLowerCase()
		if (slash) {
			// Close up to the nearest matching open element, if any
			let node: MarkupElement | null = current
			while (node && node.tag !== tag) node = node.parent
			if (node?.parent) current = node.parent
			continue
		}

		const element: MarkupElement = {
			tag,
			attrs: parseAttributes(rawAttrs ?? ""),
			children: [],
			parent: current,
		}
		current.children.push(element)

		if (RAW_TEXT_TAGS.has(tag)) {
			const closeRegex = new RegExp(`</${tag}\\s*>`, "ig")
			closeRegex.lastIndex = regex.lastIndex
			const close = closeRegex.exec(html)
			const end = close ? close.index : html.length
			const body = html.slice(regex.lastIndex, end)
			if (body) element.children.push(body)
			regex.lastIndex = close ? closeRegex.lastIndex : html.length
			continue
		}

		const selfClosing = token.endsWith("/>")
		if (!VOID_TAGS.has(tag) && !selfClosing) {
			current = element
		}
	}

	return root
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export function isElement(node: MarkupNode): node is MarkupElement {
	return typeof node !== "string"
}

/** All descendant elements in document order */
export function findAll(
	root: MarkupElement,
	predicate: (el: MarkupElement) => boolean,
): MarkupElement[] {
	const found: MarkupElement[] = []
	const visit = (el: MarkupElement): void => {
		for (const child of el.children) {
			if (!isElement(child)) continue
			if (predicate(child)) found.push(child)
			visit(child)
		}
	}
	visit(root)
	return found
}

export function findFirst(
	root: MarkupElement,
	predicate: (el: MarkupElement) => boolean,
): MarkupElement | undefined {
	for (const child of root.children) {
		if (!isElement(child)) continue
		if (predicate(child)) return child
		const nested = findFirst(child, predicate)
		if (nested) return nested
	}
	return undefined
}

export function classList(el: MarkupElement): string[] {
	return (el.attrs["class"] ?? "").split(/\s+/).filter(Boolean)
}

/** Whether any class token contains `fragment` */
export function hasClassContaining(el: MarkupElement, fragment: string): boolean {
	return classList(el).some(name => name.includes(fragment))
}

export function textContent(node: MarkupNode): string {
	if (!isElement(node)) return node
	return node.children.map(textContent).join("")
}

/** Element siblings before `el`, nearest first */
export function previousSiblings(el: MarkupElement): MarkupElement[] {
	const parent = el.parent
	if (!parent) return []
	const index = parent.children.indexOf(el)
	return parent.children.slice(0, index).filter(isElement).reverse()
}
