/**
 * Next-hop extraction for legacy item pages.
 *
 * Each strategy looks at one kind of clue. They are consulted in order and
 * the first one that yields a navigable URL decides the next hop.
 */

import {
	classList,
	findAll,
	findFirst,
	textContent,
	type MarkupElement,
} from "../markup.js"
import { resolveHref, type PageSnapshot } from "./page.js"

export interface HopStrategy {
	readonly name: string
	tryExtractNextHop(page: PageSnapshot): string | undefined
}

const MEDIA_EXTENSIONS =
	"jpe?g|png|gif|webp|avif|bmp|mp4|m4v|webm|mkv|mov|avi|wmv|flv|ts|mp3|m4a|ogg|wav|flac|zip|rar|7z|tar|gz|pdf"

const MEDIA_PATH_REGEX = new RegExp(`\\.(?:${MEDIA_EXTENSIONS})(?:[?#]|$)`, "i")

const SCRIPT_MEDIA_URL_REGEX = new RegExp(
	`https?:\\/\\/[^\\s"'<>\\\\]+?\\.(?:${MEDIA_EXTENSIONS})(?:\\?[^\\s"'<>\\\\]*)?(?=["'\\s<>\\\\]|$)`,
	"i",
)

export function hasMediaExtension(url: string): boolean {
	try {
		return MEDIA_PATH_REGEX.test(new URL(url).pathname)
	} catch {
		return MEDIA_PATH_REGEX.test(url)
	}
}

/** First element matching `predicate` whose `attr` resolves to a URL */
function firstResolved(
	page: PageSnapshot,
	attr: string,
	predicate: (el: MarkupElement) => boolean,
	accept: (url: string) => boolean = () => true,
): string | undefined {
	for (const el of findAll(page.root, predicate)) {
		const url = resolveHref(page, el.attrs[attr])
		if (url && accept(url)) return url
	}
	return undefined
}

const isAnchor = (el: MarkupElement): boolean => el.tag === "a" && "href" in el.attrs

export const downloadAnchorStrategy: HopStrategy = {
	name: "download-anchor",
	tryExtractNextHop: page =>
		firstResolved(
			page,
			"href",
			el =>
				isAnchor(el) &&
				("download" in el.attrs || classList(el).includes("btn-download")),
		),
}

export const downloadPathStrategy: HopStrategy = {
	name: "download-path",
	tryExtractNextHop: page =>
		firstResolved(page, "href", isAnchor, url =>
			/\/(d|file)\//.test(new URL(url).pathname),
		),
}

export const downloadTextStrategy: HopStrategy = {
	name: "download-text",
	tryExtractNextHop: page =>
		firstResolved(
			page,
			"href",
			el => isAnchor(el) && /download/i.test(textContent(el)),
		),
}

export const mediaAnchorStrategy: HopStrategy = {
	name: "media-anchor",
	tryExtractNextHop: page => firstResolved(page, "href", isAnchor, hasMediaExtension),
}

export const mediaElementStrategy: HopStrategy = {
	name: "media-element",
	tryExtractNextHop: page =>
		firstResolved(page, "src", el => el.tag === "source" || el.tag === "video") ??
		firstResolved(page, "src", el => el.tag === "img", hasMediaExtension),
}

export const metaRefreshStrategy: HopStrategy = {
	name: "meta-refresh",
	tryExtractNextHop: page => {
		const meta = findFirst(
			page.root,
			el =>
				el.tag === "meta" &&
				(el.attrs["http-equiv"] ?? "").toLowerCase() === "refresh",
		)
		const target = meta?.attrs["content"]?.match(/url\s*=\s*['"]?([^'";]+)/i)?.[1]
		return resolveHref(page, target)
	},
}

export const dataHrefStrategy: HopStrategy = {
	name: "data-href",
	tryExtractNextHop: page =>
		firstResolved(page, "data-href", el => "data-href" in el.attrs),
}

export const inlineScriptStrategy: HopStrategy = {
	name: "inline-script",
	tryExtractNextHop: page => {
		for (const script of findAll(page.root, el => el.tag === "script")) {
			const match = textContent(script).match(SCRIPT_MEDIA_URL_REGEX)
			const url = resolveHref(page, match?.[0])
			if (url) return url
		}
		return undefined
	},
}

export const mediaAttributeStrategy: HopStrategy = {
	name: "media-attribute",
	tryExtractNextHop: page => {
		for (const el of findAll(page.root, () => true)) {
			for (const value of Object.values(el.attrs)) {
				if (!/^https?:\/\//i.test(value)) continue
				const url = resolveHref(page, value)
				if (url && hasMediaExtension(url)) return url
			}
		}
		return undefined
	},
}

export const preloadLinkStrategy: HopStrategy = {
	name: "preload-link",
	tryExtractNextHop: page =>
		firstResolved(page, "href", el => {
			const rel = (el.attrs["rel"] ?? "").toLowerCase().split(/\s+/)
			return el.tag === "link" && (rel.includes("preload") || rel.includes("prefetch"))
		}),
}

export const HOP_STRATEGIES: readonly HopStrategy[] = [
	downloadAnchorStrategy,
	downloadPathStrategy,
	downloadTextStrategy,
	mediaAnchorStrategy,
	mediaElementStrategy,
	metaRefreshStrategy,
	dataHrefStrategy,
	inlineScriptStrategy,
	mediaAttributeStrategy,
	preloadLinkStrategy,
]

/** Ask each strategy in turn; the first hit wins */
export function findNextHop(
	page: PageSnapshot,
	strategies: readonly HopStrategy[] = HOP_STRATEGIES,
): { url: string; strategy: string } | undefined {
	for (const strategy of strategies) {
		const url = strategy.tryExtractNextHop(page)
		if (url) return { url, strategy: strategy.name }
	}
	return undefined
}
