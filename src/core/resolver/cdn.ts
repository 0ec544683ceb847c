/**
 * CDN probing for pages that only carry a relative media path.
 */

import { existsSync, readFileSync } from "node:fs"
import { appendFile } from "node:fs/promises"
import type { Response } from "undici"
import { discardBody, isHtmlResponse, requestWithRetry } from "../../http.js"
import { log } from "../../logger.js"
import { findAll } from "../markup.js"
import type { RunContext } from "../context.js"
import type { PageSnapshot } from "./page.js"

export const CDN_DOMAIN = "bunkr.ru"

export const DEFAULT_CDN_HOSTS = [
	"media-files.bunkr.ru",
	"cdn.bunkr.ru",
	"i-burger.bunkr.ru",
]

/** "cdn8" -> "cdn8.bunkr.ru"; full hostnames and URLs reduce to the host */
export function expandCdnHost(entry: string): string {
	const value = entry.trim().toLowerCase()
	if (!value) return ""
	if (/^https?:\/\//.test(value)) {
		try {
			return new URL(value).host
		} catch {
			return ""
		}
	}
	const host = value.replace(/\/.*$/, "")
	return host.includes(".") ? host : `${host}.${CDN_DOMAIN}`
}

/** Read a host list: one entry per line, `#` starts a comment */
export function loadHostList(path: string | undefined): string[] {
	if (!path || !existsSync(path)) return []
	const hosts: string[] = []
	for (const line of readFileSync(path, "utf-8").split(/\r?\n/)) {
		const host = expandCdnHost(line.replace(/#.*$/, ""))
		if (host && !hosts.includes(host)) hosts.push(host)
	}
	return hosts
}

/**
 * Hosts that served media during this run, most recent first.
 * Newly discovered hosts are appended to the host list file.
 */
export class CdnDiscoveryCache {
	private readonly preferred: string[] = []
	private pendingWrite: Promise<void> = Promise.resolve()

	constructor(private readonly hostListPath?: string) {}

	get discovered(): readonly string[] {
		return this.preferred
	}

	/** Probe order: discoveries, host list file, configured extras, defaults */
	candidates(extraHosts: readonly string[] = []): string[] {
		const ordered = [
			...this.preferred,
			...loadHostList(this.hostListPath),
			...extraHosts.map(expandCdnHost),
			...DEFAULT_CDN_HOSTS,
		]
		return [...new Set(ordered.filter(Boolean))]
	}

	/** Prefer `host` for the rest of the run. Host list write failures are only logged. */
	async remember(host: string): Promise<void> {
		const index = this.preferred.indexOf(host)
		if (index !== -1) this.preferred.splice(index, 1)
		this.preferred.unshift(host)

		const file = this.hostListPath
		if (!file) return
		// appends are chained so concurrent discoveries of one host write it once
		this.pendingWrite = this.pendingWrite.then(() => appendHost(file, host))
		await this.pendingWrite
	}
}

async function appendHost(file: string, host: string): Promise<void> {
	try {
		if (loadHostList(file).includes(host)) return
		await appendFile(file, `${host}\n`, "utf-8")
		log.resolve.info({ host, file }, "recorded new CDN host")
	} catch (err) {
		log.resolve.warn(
			{ host, file, error: err instanceof Error ? err.message : String(err) },
			"could not record CDN host",
		)
	}
}

/** Relative media path carried by the page, without leading slashes */
export function extractPathHint(page: PageSnapshot): string | undefined {
	for (const script of findAll(page.root, el => el.tag === "script")) {
		for (const attr of ["data-path", "data-src"]) {
			const value = script.attrs[attr]?.trim()
			if (value && !/^([a-z]+:)?\/\//i.test(value)) {
				return value.replace(/^\/+/, "")
			}
		}
	}
	const assigned = page.html.match(/window\.mediaPath\s*=\s*["']([^"']+)["']/)?.[1]
	return assigned ? assigned.trim().replace(/^\/+/, "") || undefined : undefined
}

/**
 * Try each candidate host for `hint`. The first non-HTML 200/206 answer
 * wins and is returned unread; its host is remembered.
 */
export async function probeCdn(
	ctx: RunContext,
	hint: string,
	referer: string,
): Promise<Response | undefined> {
	for (const host of ctx.cdn.candidates(ctx.extraCdnHosts)) {
		const url = `https://${host}/${hint}`
		let response: Response
		try {
			response = await requestWithRetry(ctx.http, url, {
				headers: { Referer: referer },
			})
		} catch (err) {
			log.resolve.debug(
				{ url, error: err instanceof Error ? err.message : String(err) },
				"CDN candidate unreachable",
			)
			continue
		}

		if ((response.status === 200 || response.status === 206) && !isHtmlResponse(response)) {
			await ctx.cdn.remember(host)
			log.resolve.debug({ host, hint }, "CDN candidate served media")
			return response
		}
		await discardBody(response)
	}
	return undefined
}
