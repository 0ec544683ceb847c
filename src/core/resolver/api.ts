/**
 * Opaque file id resolution through the site's download API.
 *
 * The API answers with a base64 payload XOR-ed against a key derived from the
 * hour bucket of its timestamp.
 */

import type { Response } from "undici"
import { z } from "zod"
import { ResolutionError, RetrievalError } from "../../errors.js"
import { discardBody, requestWithRetry } from "../../http.js"
import { log } from "../../logger.js"
import type { RunContext } from "../context.js"

const API_ORIGIN = "https://get.bunkrr.su"

const ApiResponseSchema = z.object({
	encrypted: z.literal(true),
	timestamp: z.coerce.number().int().nonnegative(),
	url: z.string().min(1),
})

/** Key for a given API timestamp (seconds) */
export function decryptionKey(timestamp: number): string {
	return `SECRET_KEY_${Math.floor(timestamp / 3600)}`
}

/**
 * Base64-decode `payload` and XOR it with the repeating key bytes.
 * Invalid UTF-8 sequences decode to U+FFFD.
 */
export function decryptApiUrl(payload: string, timestamp: number): string {
	const data = Buffer.from(payload, "base64")
	const key = Buffer.from(decryptionKey(timestamp), "utf8")
	const out = Buffer.alloc(data.length)
	for (let i = 0; i < data.length; i++) {
		out[i] = (data[i] ?? 0) ^ (key[i % key.length] ?? 0)
	}
	return out.toString("utf8")
}

/** Add `n=<name>` so the CDN serves the file under its original name */
export function appendNameParam(url: string, name: string | undefined): string {
	if (!name) return url
	const query = url.includes("?") ? url.slice(url.indexOf("?") + 1) : ""
	if (new URLSearchParams(query).has("n")) return url
	const separator = url.includes("?") ? "&" : "?"
	return `${url}${separator}n=${encodeURIComponent(name)}`
}

function isHttpUrl(value: string): boolean {
	try {
		const { protocol } = new URL(value)
		return protocol === "http:" || protocol === "https:"
	} catch {
		return false
	}
}

/** Exchange a file id for a direct media URL */
export async function resolveFileId(
	ctx: RunContext,
	fileId: string,
	suggestedName?: string,
): Promise<string> {
	let response: Response
	try {
		response = await requestWithRetry(ctx.http, ctx.apiUrl, {
			method: "POST",
			body: JSON.stringify({ id: fileId }),
			headers: {
				"Content-Type": "application/json",
				Origin: API_ORIGIN,
				Referer: `${API_ORIGIN}/file/${fileId}`,
			},
		})
	} catch (err) {
		if (err instanceof RetrievalError) {
			throw new ResolutionError(
				`API request failed: ${err.message}`,
				"api-failure",
				ctx.apiUrl,
				{ cause: err },
			)
		}
		throw err
	}

	if (!response.ok) {
		await discardBody(response)
		throw new ResolutionError(
			`API answered HTTP ${response.status} for file ${fileId}`,
			"api-failure",
			ctx.apiUrl,
		)
	}

	let body: unknown
	try {
		body = await response.json()
	} catch (err) {
		throw new ResolutionError("API returned invalid JSON", "api-failure", ctx.apiUrl, {
			cause: err,
		})
	}

	const parsed = ApiResponseSchema.safeParse(body)
	if (!parsed.success) {
		throw new ResolutionError(
			`Unexpected API response for file ${fileId}`,
			"api-failure",
			ctx.apiUrl,
			{ cause: parsed.error },
		)
	}

	const decrypted = decryptApiUrl(parsed.data.url, parsed.data.timestamp)
	if (!isHttpUrl(decrypted)) {
		throw new ResolutionError(
			`Decrypted value for file ${fileId} is not a URL`,
			"decrypt-failure",
			ctx.apiUrl,
		)
	}

	log.resolve.debug({ fileId }, "file id resolved through API")
	return appendNameParam(decrypted, suggestedName)
}
