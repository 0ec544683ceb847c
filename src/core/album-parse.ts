/**
 * Album page parsing: embedded data blob, markup cards, album name and
 * pagination markers. Pure functions over a parsed markup tree.
 */

import { z } from "zod"
import type { ItemDescriptor, ItemSummary } from "../types.js"
import { categorizeMediaType } from "../types.js"
import {
	findAll,
	findFirst,
	hasClassContaining,
	previousSiblings,
	textContent,
	type MarkupElement,
} from "./markup.js"

// ─────────────────────────────────────────────────────────────────────────────
// Item links
// ─────────────────────────────────────────────────────────────────────────────

const ITEM_LINK_REGEX = /\/(f|i|v)\/([A-Za-z0-9]+)/
const SLUG_REGEX = /\/f\/([A-Za-z0-9]+)/

export type ItemLinkKind = "f" | "i" | "v"

/** Recognize /f/<id>, /i/<id> and /v/<id> item links */
export function parseItemLink(
	url: string,
): { kind: ItemLinkKind; id: string } | undefined {
	const match = url.match(ITEM_LINK_REGEX)
	const kind = match?.[1]
	const id = match?.[2]
	if (!id || (kind !== "f" && kind !== "i" && kind !== "v")) return undefined
	return { kind, id }
}

/** Whether a URL points at a single item page rather than an album */
export function isSingleFileUrl(url: string): boolean {
	return parseItemLink(url) !== undefined
}

export function slugFromUrl(url: string): string | undefined {
	return url.match(SLUG_REGEX)?.[1]
}

/**
 * Descriptor for a single item page given directly by the user.
 * Returns undefined for URLs that are not item links.
 */
export function itemFromUrl(url: string): ItemDescriptor | undefined {
	const trimmed = url.trim()
	if (!parseItemLink(trimmed)) return undefined
	let origin: string
	try {
		origin = new URL(trimmed).origin
	} catch {
		return undefined
	}
	const slug = slugFromUrl(trimmed) ?? ""
	return {
		source: "item-url",
		itemKey: slug || trimmed,
		slug,
		originalName: "",
		suggestedName: "",
		mediaType: "",
		directUrl: trimmed,
		fallbackUrl: trimmed,
		refererUrl: `${origin}/`,
	}
}

function absoluteUrl(href: string, base: string): string | undefined {
	try {
		return new URL(href, base).href
	} catch {
		return undefined
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedded data blob
// ─────────────────────────────────────────────────────────────────────────────

const ALBUM_FILES_REGEX = /window\.albumFiles\s*=\s*(\[[\s\S]*?\]);/

const AlbumFileSchema = z.object({
	slug: z.union([z.string(), z.number()]).nullish(),
	name: z.string().nullish(),
	original: z.string().nullish(),
	type: z.string().nullish(),
	size: z.union([z.number(), z.string()]).nullish(),
	cdnEndpoint: z.string().nullish(),
	thumbnail: z.string().nullish(),
})

export type AlbumFileEntry = z.infer<typeof AlbumFileSchema>

/**
 * Turn the relaxed object-literal syntax of the album blob into JSON.
 * Order matters: quote bare keys, drop trailing commas, unescape \' and
 * double any backslash that does not start a JSON escape.
 */
export function normalizeAlbumJson(raw: string): string {
	return raw
		.replace(/^(\s*)([A-Za-z0-9_]+):/gm, '$1"$2":')
		.replace(/,\s*([}\]])/g, "$1")
		.replace(/\\'/g, "'")
		.replace(/\\(?![\\"/bfnrtu])/g, "\\\\")
}

/**
 * Find and decode `window.albumFiles = [...]` in the page's scripts.
 * Scripts whose blob fails to parse are skipped.
 */
export function extractAlbumFiles(root: MarkupElement): AlbumFileEntry[] {
	const scripts = findAll(root, el => el.tag === "script")
	for (const script of scripts) {
		const text = textContent(script)
		if (!text.includes("window.albumFiles")) continue
		const match = text.match(ALBUM_FILES_REGEX)
		if (!match?.[1]) continue

		let parsed: unknown
		try {
			parsed = JSON.parse(normalizeAlbumJson(match[1]))
		} catch {
			continue
		}
		if (!Array.isArray(parsed)) continue

		const entries: AlbumFileEntry[] = []
		for (const value of parsed) {
			const result = AlbumFileSchema.safeParse(value)
			if (result.success) entries.push(result.data)
		}
		return entries
	}
	return []
}

function parseSize(size: number | string | null | undefined): number | undefined {
	if (size === null || size === undefined || size === "") return undefined
	const value = typeof size === "number" ? size : Number(size)
	return Number.isFinite(value) ? Math.trunc(value) : undefined
}

/** Build descriptors from album blob entries; entries without a slug are dropped */
export function itemsFromAlbumData(
	entries: AlbumFileEntry[],
	context: { origin: string; refererUrl: string },
): ItemDescriptor[] {
	const items: ItemDescriptor[] = []
	const seen = new Set<string>()

	for (const entry of entries) {
		const slug = String(entry.slug ?? "").trim()
		if (!slug) continue

		const fallbackUrl = new URL(`/f/${slug}`, context.origin).href
		const cdnEndpoint = entry.cdnEndpoint?.trim() ?? ""
		const thumbnailRaw = entry.thumbnail?.trim() ?? ""
		const thumbnailUrl = thumbnailRaw
			? absoluteUrl(thumbnailRaw, context.origin)
			: undefined

		let cdnOrigin: string | undefined
		if (thumbnailUrl) {
			cdnOrigin = new URL(thumbnailUrl).origin
		} else if (cdnEndpoint) {
			cdnOrigin = context.origin
		}

		const directUrl =
			cdnOrigin && cdnEndpoint
				? (absoluteUrl(cdnEndpoint, cdnOrigin) ?? fallbackUrl)
				: fallbackUrl
		const suggestedName = (entry.original || entry.name || "").trim()

		if (seen.has(slug)) continue
		seen.add(slug)

		const sizeBytes = parseSize(entry.size)
		items.push({
			source: "album-data",
			itemKey: slug,
			slug,
			originalName: suggestedName,
			suggestedName,
			mediaType: entry.type?.trim() ?? "",
			directUrl,
			fallbackUrl,
			refererUrl: context.refererUrl,
			...(sizeBytes !== undefined ? { sizeBytes } : {}),
			...(cdnOrigin ? { cdnOrigin } : {}),
			...(cdnEndpoint ? { cdnEndpoint } : {}),
			...(thumbnailUrl ? { thumbnailUrl } : {}),
		})
	}

	return items
}

// ─────────────────────────────────────────────────────────────────────────────
// Markup cards
// ─────────────────────────────────────────────────────────────────────────────

const CARD_TEXT_CLASSES = ["grid-images_box-txt", "grid-videos_box-txt"]

function cardAnchorHref(box: MarkupElement): string | undefined {
	const sibling = previousSiblings(box).find(
		el => el.tag === "a" && Boolean(el.attrs["href"]),
	)
	if (sibling) return sibling.attrs["href"]
	if (!box.parent) return undefined
	return findFirst(box.parent, el => el.tag === "a" && Boolean(el.attrs["href"]))
		?.attrs["href"]
}

/**
 * Build descriptors from the album's card grid.
 * Cards are keyed by (kind, id) so thumbnails and titles of the same item
 * collapse into one descriptor.
 */
export function itemsFromMarkup(
	root: MarkupElement,
	context: { baseUrl: string; refererUrl: string },
): ItemDescriptor[] {
	const boxes = CARD_TEXT_CLASSES.flatMap(name =>
		findAll(root, el => el.tag === "div" && hasClassContaining(el, name)).map(
			el => ({ el, mediaType: name.startsWith("grid-videos") ? "video" : "image" }),
		),
	)

	const items: ItemDescriptor[] = []
	const seen = new Set<string>()

	for (const { el, mediaType } of boxes) {
		const href = cardAnchorHref(el)
		if (!href || href.startsWith("?")) continue
		const url = absoluteUrl(href, context.baseUrl)
		if (!url) continue
		const link = parseItemLink(url)
		if (!link) continue

		const id = `${link.kind}/${link.id}`
		if (seen.has(id)) continue
		seen.add(id)

		const title = findFirst(el, child => child.tag === "p")
		const name = title ? textContent(title).trim() : ""
		const slug = slugFromUrl(url) ?? ""

		items.push({
			source: "album-markup",
			itemKey: slug || url,
			slug,
			originalName: name,
			suggestedName: name,
			mediaType,
			directUrl: url,
			fallbackUrl: url,
			refererUrl: context.refererUrl,
		})
	}

	return items
}

/** Whether the page links to other numbered pages of the album */
export function hasPaginationMarkers(root: MarkupElement): boolean {
	return (
		findFirst(
			root,
			el =>
				(el.tag === "a" && /[?&]page=\d+/.test(el.attrs["href"] ?? "")) ||
				hasClassContaining(el, "pagination"),
		) !== undefined
	)
}

// ─────────────────────────────────────────────────────────────────────────────
// Album name
// ─────────────────────────────────────────────────────────────────────────────

export function extractAlbumName(root: MarkupElement): string | undefined {
	const header = findFirst(root, el => hasClassContaining(el, "sm:text-lg"))
	const h1 = header ? findFirst(header, el => el.tag === "h1") : undefined
	const fromHeader = h1 ? textContent(h1).trim() : ""
	if (fromHeader) return fromHeader

	const title = findFirst(root, el => el.tag === "title")
	const fromTitle = title
		? textContent(title)
				.replace(/\s*[|\-–]\s*bunkr.*$/i, "")
				.trim()
		: ""
	return fromTitle || undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────────────────────

/** Count items per category and sum the known sizes */
export function summarizeItems(items: ItemDescriptor[]): ItemSummary {
	const summary: ItemSummary = {
		images: 0,
		videos: 0,
		archives: 0,
		other: 0,
		total: items.length,
		totalBytes: 0,
	}
	for (const item of items) {
		switch (categorizeMediaType(item.mediaType)) {
			case "image":
				summary.images++
				break
			case "video":
				summary.videos++
				break
			case "archive":
				summary.archives++
				break
			default:
				summary.other++
		}
		if (item.sizeBytes && item.sizeBytes > 0) summary.totalBytes += item.sizeBytes
	}
	return summary
}
