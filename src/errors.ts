/**
 * Error classes shared across the fetch, resolve, retrieve and store layers.
 *
 * Every error carries a `kind` discriminant so callers can branch without
 * string matching. Batch-level code flattens them into strings with
 * describeError().
 */

export type FetchErrorKind = "invalid-url" | "client-error" | "not-found"

export type ResolutionErrorKind =
	| "hop-limit"
	| "loop"
	| "no-media"
	| "api-failure"
	| "decrypt-failure"

export type RetrievalErrorKind =
	| "http-status"
	| "unexpected-html"
	| "timeout"
	| "transport"

export type StoreErrorKind = "constraint" | "migration"

export type PolicyErrorKind = "outside-root" | "io"

export class AlbumKeeperError<K extends string = string> extends Error {
	constructor(
		message: string,
		public readonly kind: K,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = "AlbumKeeperError"
	}
}

/** Album listing could not be obtained */
export class FetchError extends AlbumKeeperError<FetchErrorKind> {
	constructor(
		message: string,
		kind: FetchErrorKind,
		public readonly url: string,
		options?: { cause?: unknown },
	) {
		super(message, kind, options)
		this.name = "FetchError"
	}
}

/** An item reference could not be turned into a media URL */
export class ResolutionError extends AlbumKeeperError<ResolutionErrorKind> {
	constructor(
		message: string,
		kind: ResolutionErrorKind,
		public readonly url: string,
		options?: { cause?: unknown },
	) {
		super(message, kind, options)
		this.name = "ResolutionError"
	}
}

export class RetrievalError extends AlbumKeeperError<RetrievalErrorKind> {
	constructor(
		message: string,
		kind: RetrievalErrorKind,
		public readonly url: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, kind, options)
		this.name = "RetrievalError"
	}
}

export class StoreError extends AlbumKeeperError<StoreErrorKind> {
	constructor(
		message: string,
		kind: StoreErrorKind,
		options?: { cause?: unknown },
	) {
		super(message, kind, options)
		this.name = "StoreError"
	}
}

export class PolicyError extends AlbumKeeperError<PolicyErrorKind> {
	constructor(
		message: string,
		kind: PolicyErrorKind,
		public readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, kind, options)
		this.name = "PolicyError"
	}
}

/** Flatten any thrown value into a one-line message */
export function describeError(err: unknown): string {
	if (err instanceof AlbumKeeperError) return `${err.kind}: ${err.message}`
	return err instanceof Error ? err.message : String(err)
}
