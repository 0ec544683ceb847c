/**
 * Core types for album-keeper runs
 *
 * These types define the event-based interface between the retrieval
 * scheduler and whatever renders progress (CLI spinner, logs, tests).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Events
// ─────────────────────────────────────────────────────────────────────────────

export type RetrievalEvent =
	| RetrievalStartEvent
	| RetrievalFallbackEvent
	| RetrievalCompleteEvent
	| RetrievalErrorEvent
	| RetrievalSkipEvent

/** Emitted when an item leaves the queue */
export interface RetrievalStartEvent {
	type: "start"
	url: string
	index: number
	total: number
}

/** Emitted when the primary URL failed and the fallback URL is tried */
export interface RetrievalFallbackEvent {
	type: "fallback"
	url: string
	fallbackUrl: string
	reason: string
}

export interface RetrievalCompleteEvent {
	type: "complete"
	url: string
	/** Full path to the saved file */
	localPath: string
	bytesDownloaded: number
}

export interface RetrievalErrorEvent {
	type: "error"
	url: string
	error: string
}

/** Emitted before scheduling for items already present on disk */
export interface RetrievalSkipEvent {
	type: "skip"
	url: string
	filename: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Batch Results
// ─────────────────────────────────────────────────────────────────────────────

export interface SavedFile {
	url: string
	path: string
	bytes: number
}

export interface DownloadBatchResult {
	/** Direct URLs of items saved in this run */
	downloaded: string[]
	/** Direct URLs of items that could not be saved */
	failed: string[]
	/** One message per failed item */
	errors: string[]
	/** Direct URLs of items skipped because a copy already exists */
	skipped: string[]
	saved: SavedFile[]
}

export interface DownloadBatchOptions {
	/** Parallel downloads; defaults to 12 */
	concurrency?: number
	/** Maximum items to schedule after skipping; 0 means all */
	limit?: number
	onEvent?: (event: RetrievalEvent) => void
}
