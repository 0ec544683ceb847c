// Library entry point. For CLI usage run: album-keeper --help

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export { configureLogging, createLogger, flushLogs } from "./logger.js"
export {
	createHttpContext,
	requestWithRetry,
	isHtmlResponse,
	type HttpContext,
	type HttpContextOptions,
	type RetryPolicy,
} from "./http.js"
export {
	contentDispositionFilename,
	deriveFilename,
	findExistingFile,
	isPathInside,
	sanitizeFilename,
} from "./filenames.js"
export * from "./core/index.js"
export * from "./store.js"
export type { SyncRunSummary, DownloadStateSummary, SyncItemInput } from "./db/queries/album-items.js"
export type {
	AlbumMediaItem,
	AlbumItemCounts,
	DeleteMediaOptions,
	MediaDeleteResult,
} from "./db/queries/album-media.js"
export type { UpsertManagedAlbumParams } from "./db/queries/managed-albums.js"
export type { ManagedAlbum } from "./db/schema.js"
