/**
 * Album Media Database Queries
 *
 * Per-item listing, category counts and hard deletion of single items.
 */

import { existsSync, unlinkSync } from "node:fs"
import { resolve } from "node:path"
import { and, asc, eq, inArray } from "drizzle-orm"
import { isPathInside } from "../../filenames.js"
import { log } from "../../logger.js"
import { categorizeMediaType, type MediaCategory } from "../../types.js"
import type { DbClient } from "../index.js"
import { albumItems, albums } from "../schema.js"
import { getAlbumId } from "./album-items.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface AlbumMediaItem {
	id: number
	itemKey: string
	/** Suggested name, else original name, else the item key */
	displayName: string
	mediaType: string
	category: MediaCategory
	sizeBytes: number | null
	isActive: boolean
	isDownloaded: boolean
	downloadedPath: string
	removedAt: string | null
	directUrl: string
	fallbackUrl: string
	refererUrl: string
}

export interface AlbumItemCounts {
	image: number
	video: number
	archive: number
	other: number
	total: number
}

export interface DeleteMediaOptions {
	deleteLocalFile?: boolean
	/** Local deletion is refused for files outside this folder */
	allowedRoot?: string
}

export interface MediaDeleteResult {
	dbDeleted: boolean
	fileDeleted: boolean
	message: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Listing
// ═══════════════════════════════════════════════════════════════════════════════

export function listAlbumMediaItems(
	db: DbClient,
	albumUrl: string,
	includeRemoved = true,
): AlbumMediaItem[] {
	const albumId = getAlbumId(db, albumUrl)
	if (albumId === undefined) return []

	const rows = db
		.select()
		.from(albumItems)
		.where(
			and(
				eq(albumItems.albumId, albumId),
				includeRemoved ? undefined : eq(albumItems.isActive, true),
			),
		)
		.orderBy(asc(albumItems.id))
		.all()

	return rows.map(row => {
		const mediaType = row.mediaType ?? ""
		return {
			id: row.id,
			itemKey: row.itemKey,
			displayName: row.suggestedName || row.originalName || row.itemKey,
			mediaType,
			category: categorizeMediaType(mediaType),
			sizeBytes: row.sizeBytes,
			isActive: row.isActive,
			isDownloaded: row.isDownloaded,
			downloadedPath: row.downloadedPath ?? "",
			removedAt: row.removedAt,
			directUrl: row.directUrl ?? "",
			fallbackUrl: row.fallbackUrl ?? "",
			refererUrl: row.refererUrl ?? "",
		}
	})
}

function emptyCounts(): AlbumItemCounts {
	return { image: 0, video: 0, archive: 0, other: 0, total: 0 }
}

/**
 * Item counts per category, keyed by album URL.
 * Every requested (non-blank) URL gets an entry, unknown albums count zero.
 */
export function getAlbumItemCounts(
	db: DbClient,
	albumUrls: readonly string[],
	activeOnly = true,
): Map<string, AlbumItemCounts> {
	const urls = [...new Set(albumUrls.map(url => url.trim()).filter(Boolean))]
	const counts = new Map(urls.map(url => [url, emptyCounts()]))
	if (urls.length === 0) return counts

	const rows = db
		.select({ albumUrl: albums.albumUrl, mediaType: albumItems.mediaType })
		.from(albums)
		.innerJoin(albumItems, eq(albumItems.albumId, albums.id))
		.where(
			and(
				inArray(albums.albumUrl, urls),
				activeOnly ? eq(albumItems.isActive, true) : undefined,
			),
		)
		.all()

	for (const row of rows) {
		const bucket = counts.get(row.albumUrl)
		if (!bucket) continue
		bucket[categorizeMediaType(row.mediaType ?? "")]++
		bucket.total++
	}
	return counts
}

// ═══════════════════════════════════════════════════════════════════════════════
// Deletion
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Hard-delete one item row, optionally removing its local file first.
 * A refused or failed file deletion leaves the row in place.
 */
export function deleteAlbumMediaItem(
	db: DbClient,
	albumUrl: string,
	mediaItemId: number,
	options: DeleteMediaOptions = {},
): MediaDeleteResult {
	const albumId = getAlbumId(db, albumUrl)
	if (albumId === undefined) {
		return { dbDeleted: false, fileDeleted: false, message: "Album not found in DB." }
	}

	const row = db
		.select({ id: albumItems.id, downloadedPath: albumItems.downloadedPath })
		.from(albumItems)
		.where(and(eq(albumItems.albumId, albumId), eq(albumItems.id, mediaItemId)))
		.get()
	if (!row) {
		return {
			dbDeleted: false,
			fileDeleted: false,
			message: `Media ID ${mediaItemId} not found for this album.`,
		}
	}

	let fileDeleted = false
	const localPath = row.downloadedPath?.trim()
	if (options.deleteLocalFile && localPath) {
		const absPath = resolve(localPath)
		if (options.allowedRoot && !isPathInside(absPath, options.allowedRoot)) {
			log.store.warn({ path: absPath, root: options.allowedRoot }, "refused local delete")
			return {
				dbDeleted: false,
				fileDeleted: false,
				message: `Blocked local delete for media ID ${mediaItemId}: file path is outside allowed album folder.`,
			}
		}
		if (existsSync(absPath)) {
			try {
				unlinkSync(absPath)
				fileDeleted = true
			} catch (err) {
				const message = err instanceof Error ? err.message : String(err)
				return {
					dbDeleted: false,
					fileDeleted: false,
					message: `Failed deleting local file: ${message}`,
				}
			}
		}
	}

	const { changes } = db
		.delete(albumItems)
		.where(and(eq(albumItems.albumId, albumId), eq(albumItems.id, mediaItemId)))
		.run()
	if (changes === 0) {
		return {
			dbDeleted: false,
			fileDeleted,
			message: `Media ID ${mediaItemId} was not deleted from DB.`,
		}
	}

	log.store.info({ albumUrl, mediaItemId, fileDeleted }, "media item deleted")
	return {
		dbDeleted: true,
		fileDeleted,
		message: options.deleteLocalFile
			? `Media ID ${mediaItemId} deleted from DB and local file checked.`
			: `Media ID ${mediaItemId} deleted from DB.`,
	}
}
