/**
 * Core module exports
 *
 * Album fetching, link resolution, the retrieval scheduler and the run
 * orchestration built on top of them. Progress is reported through
 * RetrievalEvent callbacks.
 */

// Album listing
export { fetchAlbum, type FetchedAlbum } from "./album-fetcher.js"
export { isSingleFileUrl, itemFromUrl, summarizeItems } from "./album-parse.js"

// Resolution
export { resolveTarget, type ResolveRequest, type ResolvedTarget } from "./resolver/index.js"
export { CdnDiscoveryCache } from "./resolver/cdn.js"
export { decryptApiUrl } from "./resolver/api.js"
export { HOP_STRATEGIES, type HopStrategy } from "./resolver/hops.js"

// Retrieval
export { downloadBatch, DEFAULT_CONCURRENCY } from "./retrieval.js"
export { createRunContext, type RunContext } from "./context.js"

// Runs
export {
	runAlbum,
	syncAlbumOnly,
	downloadItemUrls,
	readAlbumUrls,
	formatSize,
	type AlbumRunOptions,
	type AlbumRunResult,
} from "./album-run.js"
export type { RemovalPolicySummary } from "./removal-policy.js"

// Shared types
export type {
	RetrievalEvent,
	DownloadBatchOptions,
	DownloadBatchResult,
	SavedFile,
} from "./types.js"
