/**
 * Album fetching
 *
 * Loads the advanced view of an album (trying alternate hostnames when the
 * site's own host is unreachable) and extracts its items: embedded data blob
 * first, card markup second, with numbered-page probing for markup albums
 * that show no pagination.
 */

import type { Response } from "undici"
import { describeError, FetchError } from "../errors.js"
import { discardBody, requestWithRetry, type HttpContext } from "../http.js"
import { log } from "../logger.js"
import type { ItemDescriptor, ItemSource } from "../types.js"
import {
	extractAlbumFiles,
	extractAlbumName,
	hasPaginationMarkers,
	itemsFromAlbumData,
	itemsFromMarkup,
} from "./album-parse.js"
import { parseMarkup } from "./markup.js"

export const ALTERNATE_HOSTS = ["bunkr.si", "bunkrr.su", "bunkr.is"]

/** Highest page number probed for markup albums */
export const PAGE_PROBE_CEILING = 50

export interface FetchedAlbum {
	albumUrl: string
	/** Advanced-view URL on the host that answered */
	viewUrl: string
	albumName?: string
	items: ItemDescriptor[]
	host: string
	strategy: ItemSource
}

/** Drop `page`, set `advanced=1` */
export function withAdvancedView(url: URL): URL {
	const next = new URL(url.href)
	next.searchParams.delete("page")
	next.searchParams.set("advanced", "1")
	return next
}

/** The URL's own host, then the alternates when it is one of the site's hosts */
export function candidateHosts(host: string): string[] {
	const hosts = [host]
	if (host.startsWith("bunkr")) {
		for (const alt of ALTERNATE_HOSTS) {
			if (!hosts.includes(alt)) hosts.push(alt)
		}
	}
	return hosts
}

function parseAlbumUrl(albumUrl: string): URL {
	let url: URL
	try {
		url = new URL(albumUrl.trim())
	} catch (err) {
		throw new FetchError(`Invalid URL: ${albumUrl}`, "invalid-url", albumUrl, {
			cause: err,
		})
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new FetchError(`Invalid URL: ${albumUrl}`, "invalid-url", albumUrl)
	}
	return url
}

const PAGE_HEADERS = {
	Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
	"Accept-Language": "en-US,en;q=0.7",
}

async function fetchView(
	http: HttpContext,
	albumUrl: string,
	view: URL,
): Promise<{ html: string; viewUrl: URL }> {
	let lastError: FetchError | undefined

	for (const host of candidateHosts(view.host)) {
		const candidate = new URL(view.href)
		candidate.host = host

		let response: Response
		try {
			response = await requestWithRetry(http, candidate.href, {
				headers: { ...PAGE_HEADERS, Referer: `${candidate.origin}/` },
			})
		} catch (err) {
			lastError = new FetchError(
				`Could not reach ${candidate.host}: ${describeError(err)}`,
				"client-error",
				albumUrl,
				{ cause: err },
			)
			log.fetch.debug({ url: candidate.href, error: describeError(err) }, "host failed")
			continue
		}

		if (!response.ok) {
			await discardBody(response)
			lastError = new FetchError(
				`HTTP ${response.status} at ${candidate.href}`,
				response.status === 404 ? "not-found" : "client-error",
				albumUrl,
			)
			log.fetch.debug({ url: candidate.href, status: response.status }, "host failed")
			continue
		}

		if (host !== view.host) {
			log.fetch.info({ host }, "fetched album via alternate host")
		}
		return { html: await response.text(), viewUrl: candidate }
	}

	throw lastError ?? new FetchError(`No host answered for ${albumUrl}`, "client-error", albumUrl)
}

/** Request ?page=2, ?page=3, ... until a page adds nothing new */
async function probePages(
	http: HttpContext,
	viewUrl: URL,
	items: ItemDescriptor[],
): Promise<ItemDescriptor[]> {
	const all = [...items]
	const seen = new Set(items.map(item => item.directUrl))

	for (let page = 2; page <= PAGE_PROBE_CEILING; page++) {
		const pageUrl = new URL(viewUrl.href)
		pageUrl.searchParams.set("page", String(page))

		let response: Response
		try {
			response = await requestWithRetry(http, pageUrl.href, { headers: PAGE_HEADERS })
		} catch (err) {
			log.fetch.debug({ url: pageUrl.href, error: describeError(err) }, "page probe stopped")
			break
		}
		if (!response.ok) {
			await discardBody(response)
			break
		}

		const root = parseMarkup(await response.text())
		const fresh = itemsFromMarkup(root, {
			baseUrl: pageUrl.href,
			refererUrl: viewUrl.href,
		}).filter(item => !seen.has(item.directUrl))
		if (fresh.length === 0) break

		for (const item of fresh) {
			seen.add(item.directUrl)
			all.push(item)
		}
		log.fetch.debug({ page, added: fresh.length }, "probed page")
	}

	return all
}

/**
 * Fetch an album and list its items.
 * Throws FetchError when no item set can be obtained.
 */
export async function fetchAlbum(
	http: HttpContext,
	albumUrl: string,
): Promise<FetchedAlbum> {
	const url = parseAlbumUrl(albumUrl)
	const { html, viewUrl } = await fetchView(http, albumUrl, withAdvancedView(url))
	const root = parseMarkup(html)
	const albumName = extractAlbumName(root)

	const base = {
		albumUrl,
		viewUrl: viewUrl.href,
		host: viewUrl.host,
		...(albumName ? { albumName } : {}),
	}

	const fromData = itemsFromAlbumData(extractAlbumFiles(root), {
		origin: viewUrl.origin,
		refererUrl: viewUrl.href,
	})
	if (fromData.length > 0) {
		log.fetch.info({ album: albumUrl, items: fromData.length }, "album data parsed")
		return { ...base, items: fromData, strategy: "album-data" }
	}

	let fromMarkup = itemsFromMarkup(root, {
		baseUrl: viewUrl.href,
		refererUrl: viewUrl.href,
	})
	if (fromMarkup.length > 0 && !hasPaginationMarkers(root)) {
		fromMarkup = await probePages(http, viewUrl, fromMarkup)
	}
	if (fromMarkup.length === 0) {
		throw new FetchError(`No items found at ${viewUrl.href}`, "not-found", albumUrl)
	}

	log.fetch.info({ album: albumUrl, items: fromMarkup.length }, "album markup parsed")
	return { ...base, items: fromMarkup, strategy: "album-markup" }
}
