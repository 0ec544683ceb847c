/**
 * Album runs
 *
 * Chains the pieces for one album: fetch, record the snapshot, download,
 * reconcile local presence, apply the removal policy. Store steps run only
 * after the download fan-out has finished, and their failures are reported
 * in `errors` without undoing completed downloads.
 */

import { existsSync, readFileSync, statSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { basename, join, normalize, resolve } from "node:path"
import { describeError } from "../errors.js"
import { sanitizeFilename } from "../filenames.js"
import { log } from "../logger.js"
import type { SyncRunSummary, DownloadStateSummary } from "../db/queries/album-items.js"
import { applyRemovalPolicy, refreshState, syncAlbum } from "../store.js"
import type { ItemDescriptor, ItemSummary } from "../types.js"
import { fetchAlbum, type FetchedAlbum } from "./album-fetcher.js"
import { itemFromUrl, summarizeItems } from "./album-parse.js"
import type { RunContext } from "./context.js"
import type { RemovalPolicySummary } from "./removal-policy.js"
import { downloadBatch } from "./retrieval.js"
import type { DownloadBatchResult, RetrievalEvent } from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface AlbumRunOptions {
	ctx: RunContext
	/** Store file; without one the run keeps no state */
	dbPath?: string
	/** Album folder is created below this one, named after the album */
	parentFolder?: string
	/** Exact album folder; takes precedence over parentFolder */
	targetFolder?: string
	concurrency?: number
	limit?: number
	deleteOnRemove?: boolean
	onFetched?: (album: FetchedAlbum, targetFolder: string) => void
	onEvent?: (event: RetrievalEvent) => void
}

export interface AlbumRunResult {
	albumUrl: string
	albumName?: string
	targetFolder: string
	counts: ItemSummary
	sync?: SyncRunSummary
	download?: DownloadBatchResult
	state?: DownloadStateSummary
	policy?: RemovalPolicySummary
	errors: string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/** Human readable size with one decimal: 1536 -> "1.5 KB" */
export function formatSize(bytes: number): string {
	const units = ["B", "KB", "MB", "GB", "TB"]
	let size = bytes
	for (const unit of units.slice(0, -1)) {
		if (size < 1024) return `${size.toFixed(1)} ${unit}`
		size /= 1024
	}
	return `${size.toFixed(1)} TB`
}

/** Comma-separated URLs, or the path of a file with one URL per line */
export function readAlbumUrls(input: string): string[] {
	const trimmed = input.trim()
	if (trimmed && existsSync(trimmed) && statSync(trimmed).isFile()) {
		return readFileSync(trimmed, "utf-8")
			.split(/\r?\n/)
			.map(line => line.trim())
			.filter(Boolean)
	}
	return trimmed
		.split(",")
		.map(url => url.trim())
		.filter(Boolean)
}

/**
 * Folder for an album: the explicit target, else `<parent>/<album name>`.
 * A parent that already ends in the album's folder name is used as is.
 */
export function albumFolder(
	albumName: string | undefined,
	options: { parentFolder?: string; targetFolder?: string },
): string {
	if (options.targetFolder) return resolve(options.targetFolder)
	const parent = resolve(options.parentFolder ?? ".")
	const folder = sanitizeFilename(albumName ?? "") || "album"
	return basename(normalize(parent)) === folder ? parent : join(parent, folder)
}

function postProcess(
	dbPath: string,
	albumUrl: string,
	targetFolder: string,
	deleteOnRemove: boolean,
	result: AlbumRunResult,
): void {
	try {
		result.state = refreshState(dbPath, albumUrl, targetFolder)
		result.policy = applyRemovalPolicy(dbPath, albumUrl, deleteOnRemove, targetFolder)
		result.errors.push(...result.policy.errors)
	} catch (err) {
		log.store.error({ albumUrl, error: describeError(err) }, "post-sync step failed")
		result.errors.push(`Sync DB post-process failed: ${describeError(err)}`)
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetch an album and download everything not already on disk.
 * Throws FetchError when the album cannot be listed.
 */
export async function runAlbum(
	albumUrl: string,
	options: AlbumRunOptions,
): Promise<AlbumRunResult> {
	const album = await fetchAlbum(options.ctx.http, albumUrl)
	const targetFolder = albumFolder(album.albumName, options)
	await mkdir(targetFolder, { recursive: true })
	options.onFetched?.(album, targetFolder)

	const result: AlbumRunResult = {
		albumUrl,
		...(album.albumName ? { albumName: album.albumName } : {}),
		targetFolder,
		counts: summarizeItems(album.items),
		errors: [],
	}

	if (options.dbPath) {
		try {
			result.sync = syncAlbum(options.dbPath, albumUrl, album.albumName, album.items)
		} catch (err) {
			log.store.error({ albumUrl, error: describeError(err) }, "sync failed")
			result.errors.push(`Sync DB failed: ${describeError(err)}`)
		}
	}

	result.download = await downloadBatch(options.ctx, album.items, targetFolder, {
		...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
		...(options.limit !== undefined ? { limit: options.limit } : {}),
		...(options.onEvent ? { onEvent: options.onEvent } : {}),
	})
	result.errors.push(...result.download.errors)

	if (options.dbPath) {
		postProcess(
			options.dbPath,
			albumUrl,
			targetFolder,
			options.deleteOnRemove ?? false,
			result,
		)
	}

	return result
}

/** Record an album snapshot and reconcile local state without downloading */
export async function syncAlbumOnly(
	albumUrl: string,
	options: AlbumRunOptions & { dbPath: string },
): Promise<AlbumRunResult> {
	const album = await fetchAlbum(options.ctx.http, albumUrl)
	const targetFolder = albumFolder(album.albumName, options)
	await mkdir(targetFolder, { recursive: true })
	options.onFetched?.(album, targetFolder)

	const result: AlbumRunResult = {
		albumUrl,
		...(album.albumName ? { albumName: album.albumName } : {}),
		targetFolder,
		counts: summarizeItems(album.items),
		errors: [],
	}

	try {
		result.sync = syncAlbum(options.dbPath, albumUrl, album.albumName, album.items)
	} catch (err) {
		log.store.error({ albumUrl, error: describeError(err) }, "sync failed")
		result.errors.push(`Sync DB failed: ${describeError(err)}`)
		return result
	}

	postProcess(
		options.dbPath,
		albumUrl,
		targetFolder,
		options.deleteOnRemove ?? false,
		result,
	)
	return result
}

/**
 * Download single item pages into one folder. URLs that are not item links
 * are reported as errors.
 */
export async function downloadItemUrls(
	urls: readonly string[],
	options: Pick<AlbumRunOptions, "ctx" | "concurrency" | "onEvent"> & {
		targetFolder: string
	},
): Promise<DownloadBatchResult> {
	const items: ItemDescriptor[] = []
	const rejected: string[] = []
	for (const url of urls) {
		const item = itemFromUrl(url)
		if (item) items.push(item)
		else rejected.push(url)
	}

	const result = await downloadBatch(options.ctx, items, resolve(options.targetFolder), {
		...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
		...(options.onEvent ? { onEvent: options.onEvent } : {}),
	})
	for (const url of rejected) {
		result.failed.push(url)
		result.errors.push(`${url}: not an item link`)
	}
	return result
}
