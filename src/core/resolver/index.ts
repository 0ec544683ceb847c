/**
 * Link resolution: turn an item reference into a response whose body is the
 * media itself.
 *
 * Regimes, in the order they are tried:
 * - structured: the album blob gave a CDN origin and endpoint; one request
 * - opaque id: the page carries a file id (or is a /f/<slug> page); ask the API
 * - CDN probe: the page carries a relative media path; try known hosts
 * - hop walk: follow the best next link until a non-HTML response arrives
 */

import type { Headers, Response } from "undici"
import { ResolutionError, RetrievalError } from "../../errors.js"
import { discardBody, isHtmlResponse, requestWithRetry } from "../../http.js"
import { log } from "../../logger.js"
import { slugFromUrl } from "../album-parse.js"
import type { RunContext } from "../context.js"
import { findAll } from "../markup.js"
import { resolveFileId } from "./api.js"
import { extractPathHint, probeCdn } from "./cdn.js"
import { findNextHop } from "./hops.js"
import { snapshotPage, type PageSnapshot } from "./page.js"

export const MAX_HOPS = 6

export interface ResolveRequest {
	url: string
	/** The URL was built from a known CDN origin and endpoint */
	structured?: boolean
	suggestedName?: string
	refererUrl?: string
}

export interface ResolvedTarget {
	finalUrl: string
	headers: Headers
	/** Live response; the caller streams its body */
	response: Response
}

function toTarget(response: Response, requestedUrl: string): ResolvedTarget {
	return {
		finalUrl: response.url || requestedUrl,
		headers: response.headers,
		response,
	}
}

async function fetchWithReferer(
	ctx: RunContext,
	url: string,
	referer: string | undefined,
): Promise<Response> {
	const response = await requestWithRetry(
		ctx.http,
		url,
		referer ? { headers: { Referer: referer } } : {},
	)
	if (response.status !== 200 && response.status !== 206) {
		await discardBody(response)
		throw new RetrievalError(
			`HTTP ${response.status} at ${url}`,
			"http-status",
			url,
			response.status,
		)
	}
	return response
}

/** Fetch a URL that must answer with media rather than a page */
async function fetchMedia(
	ctx: RunContext,
	url: string,
	referer: string | undefined,
): Promise<ResolvedTarget> {
	const response = await fetchWithReferer(ctx, url, referer)
	if (isHtmlResponse(response)) {
		await discardBody(response)
		throw new RetrievalError(
			`Expected media but got HTML at ${response.url || url}`,
			"unexpected-html",
			url,
			response.status,
		)
	}
	return toTarget(response, url)
}

/** `data-file-id`, else `data-id`, else the /f/ slug of the page URL */
export function findFileId(page: PageSnapshot): string | undefined {
	for (const attr of ["data-file-id", "data-id"]) {
		const el = findAll(page.root, candidate => Boolean(candidate.attrs[attr]?.trim()))[0]
		const value = el?.attrs[attr]?.trim()
		if (value) return value
	}
	return slugFromUrl(page.url)
}

export async function resolveTarget(
	ctx: RunContext,
	request: ResolveRequest,
): Promise<ResolvedTarget> {
	if (request.structured) {
		return fetchMedia(ctx, request.url, request.refererUrl)
	}

	const visited = new Set<string>()
	let current = request.url
	let referer = request.refererUrl

	for (let hops = 0; ; hops++) {
		if (hops >= MAX_HOPS) {
			throw new ResolutionError(
				`Gave up after ${MAX_HOPS} hops starting at ${request.url}`,
				"hop-limit",
				request.url,
			)
		}
		visited.add(current)

		const response = await fetchWithReferer(ctx, current, referer)
		if (!isHtmlResponse(response)) {
			return toTarget(response, current)
		}

		const page = snapshotPage(response.url || current, await response.text())
		visited.add(page.url)

		const fileId = findFileId(page)
		if (fileId) {
			const mediaUrl = await resolveFileId(ctx, fileId, request.suggestedName)
			log.resolve.debug({ page: page.url, fileId }, "resolved through file id")
			return fetchMedia(ctx, mediaUrl, page.url)
		}

		const hint = extractPathHint(page)
		if (hint) {
			const probed = await probeCdn(ctx, hint, page.url)
			if (probed) return toTarget(probed, probed.url)
		}

		const next = findNextHop(page)
		if (!next) {
			throw new ResolutionError(
				`No media link found at ${page.url}`,
				"no-media",
				request.url,
			)
		}
		if (visited.has(next.url)) {
			throw new ResolutionError(
				`Link loop detected at ${next.url}`,
				"loop",
				request.url,
			)
		}

		log.resolve.debug(
			{ from: page.url, to: next.url, strategy: next.strategy, hop: hops + 1 },
			"following next hop",
		)
		referer = page.url
		current = next.url
	}
}
