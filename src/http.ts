/**
 * HTTP plumbing shared by the album fetcher, link resolver and downloader.
 *
 * Every request goes through requestWithRetry(), which owns the 429 and
 * transport-error backoff. The dispatcher and sleep function live on an
 * explicit context so tests can swap in a MockAgent and a recording sleep.
 */

import {
	Agent,
	Headers,
	fetch as undiciFetch,
	type Dispatcher,
	type RequestInit,
	type Response,
} from "undici"
import { RetrievalError } from "./errors.js"
import { log } from "./logger.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
	/** Total attempts including the first one */
	maxAttempts: number
	/** Backoff base; attempt n waits baseDelayMs * 2^n */
	baseDelayMs: number
}

export interface HttpTimeouts {
	connectMs: number
	readMs: number
}

export interface HttpContext {
	dispatcher: Dispatcher
	sleep: (ms: number) => Promise<void>
	retry: RetryPolicy
	userAgent: () => string
}

export interface HttpContextOptions {
	dispatcher?: Dispatcher
	sleep?: (ms: number) => Promise<void>
	retry?: Partial<RetryPolicy>
	timeouts?: Partial<HttpTimeouts>
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const USER_AGENTS = [
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
	"Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0",
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
]

export const DEFAULT_RETRY: RetryPolicy = {
	maxAttempts: 4,
	baseDelayMs: 1500,
}

export const DEFAULT_TIMEOUTS: HttpTimeouts = {
	connectMs: 30_000,
	readMs: 300_000,
}

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}

export function createHttpContext(options: HttpContextOptions = {}): HttpContext {
	const timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts }
	const dispatcher =
		options.dispatcher ??
		new Agent({
			connect: { timeout: timeouts.connectMs },
			headersTimeout: timeouts.readMs,
			bodyTimeout: timeouts.readMs,
			keepAliveTimeout: 30_000,
			connections: 32,
		})

	let next = Math.floor(Math.random() * USER_AGENTS.length)
	return {
		dispatcher,
		sleep: options.sleep ?? sleep,
		retry: { ...DEFAULT_RETRY, ...options.retry },
		userAgent: () => {
			const agent = USER_AGENTS[next % USER_AGENTS.length] ?? ""
			next++
			return agent
		},
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Response helpers
// ─────────────────────────────────────────────────────────────────────────────

export function isHtmlResponse(response: Response): boolean {
	const contentType = response.headers.get("content-type") ?? ""
	return contentType.toLowerCase().includes("text/html")
}

/** Seconds from a numeric Retry-After header, in milliseconds */
export function parseRetryAfter(value: string | null): number | undefined {
	if (!value) return undefined
	const trimmed = value.trim()
	if (!/^\d+$/.test(trimmed)) return undefined
	return parseInt(trimmed, 10) * 1000
}

function isTimeoutError(err: unknown): boolean {
	const cause = err instanceof Error ? err.cause : undefined
	const code =
		cause && typeof cause === "object" && "code" in cause
			? String(cause.code)
			: ""
	return (
		code.includes("TIMEOUT") ||
		(err instanceof Error && err.name === "TimeoutError")
	)
}

/** Drain and discard a body we are not going to read */
export async function discardBody(response: Response): Promise<void> {
	try {
		await response.body?.cancel()
	} catch (err) {
		log.download.trace(
			{ error: err instanceof Error ? err.message : String(err) },
			"body cancel failed",
		)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Request
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Issue a request, retrying on HTTP 429 and on transport errors.
 *
 * 429 waits for a numeric Retry-After when the server sends one, else
 * baseDelayMs * 2^attempt. After the last attempt the 429 response itself is
 * returned so callers treat it like any other non-2xx status. Transport errors
 * on the last attempt throw RetrievalError ("timeout" or "transport").
 */
export async function requestWithRetry(
	ctx: HttpContext,
	url: string,
	init: RequestInit = {},
): Promise<Response> {
	const { maxAttempts, baseDelayMs } = ctx.retry
	const headers = new Headers()
	headers.set("User-Agent", ctx.userAgent())
	headers.set("Accept", "*/*")
	if (init.headers) {
		new Headers(init.headers).forEach((value, key) => headers.set(key, value))
	}

	for (let attempt = 0; ; attempt++) {
		const isLast = attempt >= maxAttempts - 1
		let response: Response
		try {
			response = await undiciFetch(url, {
				redirect: "follow",
				...init,
				headers,
				dispatcher: ctx.dispatcher,
			})
		} catch (err) {
			const timedOut = isTimeoutError(err)
			if (isLast) {
				throw new RetrievalError(
					err instanceof Error ? err.message : String(err),
					timedOut ? "timeout" : "transport",
					url,
					undefined,
					{ cause: err },
				)
			}
			const delay = baseDelayMs * 2 ** attempt
			log.download.debug(
				{ url, attempt, delay, timedOut },
				"transport error, retrying",
			)
			await ctx.sleep(delay)
			continue
		}

		if (response.status !== 429 || isLast) {
			return response
		}

		const delay =
			parseRetryAfter(response.headers.get("retry-after")) ??
			baseDelayMs * 2 ** attempt
		await discardBody(response)
		log.download.warn({ url, attempt, delay }, "rate limited (429), backing off")
		await ctx.sleep(delay)
	}
}
