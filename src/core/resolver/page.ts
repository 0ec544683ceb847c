import { parseMarkup, type MarkupElement } from "../markup.js"

/** An HTML page fetched during resolution */
export interface PageSnapshot {
	/** Final URL of the page, after redirects */
	url: string
	html: string
	root: MarkupElement
}

export function snapshotPage(url: string, html: string): PageSnapshot {
	return { url, html, root: parseMarkup(html) }
}

/** Resolve `href` against the page URL, ignoring non-navigable schemes */
export function resolveHref(page: PageSnapshot, href: string | undefined): string | undefined {
	const value = href?.trim()
	if (!value || value.startsWith("#")) return undefined
	if (/^(javascript|mailto|data|blob):/i.test(value)) return undefined
	try {
		const url = new URL(value, page.url)
		return url.protocol === "http:" || url.protocol === "https:" ? url.href : undefined
	} catch {
		return undefined
	}
}
