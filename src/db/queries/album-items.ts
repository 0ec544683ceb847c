/**
 * Album Items Database Queries
 *
 * Diffing a fresh item snapshot against the stored album state, and
 * reconciling the stored download flags with what is on disk.
 */

import { createHash } from "node:crypto"
import { resolve } from "node:path"
import { and, eq } from "drizzle-orm"
import { deriveFilename, findExistingFile, sanitizeFilename } from "../../filenames.js"
import { log } from "../../logger.js"
import type { ItemDescriptor } from "../../types.js"
import { inTransaction, type DbClient, type DbExecutor } from "../index.js"
import { albumItems, albums, syncRuns, type AlbumItem } from "../schema.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface SyncRunSummary {
	albumId: number
	total: number
	added: number
	updated: number
	removed: number
}

export interface DownloadStateSummary {
	total: number
	downloaded: number
	missing: number
}

/** Loose item input; anything an album fetch or a caller may hand in */
export type SyncItemInput = Partial<Omit<ItemDescriptor, "sizeBytes" | "source">> & {
	sizeBytes?: number | string | null
}

/** Descriptor fields as stored: absent strings are "", absent size is null */
export interface NormalizedItem {
	itemKey: string
	slug: string
	originalName: string
	suggestedName: string
	mediaType: string
	sizeBytes: number | null
	directUrl: string
	fallbackUrl: string
	refererUrl: string
	cdnOrigin: string
	cdnEndpoint: string
	thumbnailUrl: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization & Signature
// ═══════════════════════════════════════════════════════════════════════════════

const SLUG_REGEX = /\/f\/([A-Za-z0-9]+)/

function text(value: string | undefined): string {
	return (value ?? "").trim()
}

function toInt(value: number | string | null | undefined): number | null {
	if (value === null || value === undefined || value === "") return null
	const parsed = typeof value === "number" ? value : Number(value)
	return Number.isFinite(parsed) ? Math.trunc(parsed) : null
}

function extractSlug(url: string): string {
	return url.match(SLUG_REGEX)?.[1] ?? ""
}

export function normalizeItem(raw: SyncItemInput): NormalizedItem {
	const fallbackUrl = text(raw.fallbackUrl)
	const directUrl = text(raw.directUrl)
	const slug = text(raw.slug) || extractSlug(fallbackUrl) || extractSlug(directUrl)
	return {
		itemKey: text(raw.itemKey) || slug || fallbackUrl || directUrl,
		slug,
		originalName: text(raw.originalName),
		suggestedName: text(raw.suggestedName),
		mediaType: text(raw.mediaType),
		sizeBytes: toInt(raw.sizeBytes),
		directUrl,
		fallbackUrl,
		refererUrl: text(raw.refererUrl),
		cdnOrigin: text(raw.cdnOrigin),
		cdnEndpoint: text(raw.cdnEndpoint),
		thumbnailUrl: text(raw.thumbnailUrl),
	}
}

/** Column name -> item field, in column-name order */
const SIGNATURE_FIELDS: ReadonlyArray<readonly [string, keyof NormalizedItem]> = (
	[
		["item_key", "itemKey"],
		["slug", "slug"],
		["original_name", "originalName"],
		["suggested_name", "suggestedName"],
		["media_type", "mediaType"],
		["size_bytes", "sizeBytes"],
		["direct_url", "directUrl"],
		["fallback_url", "fallbackUrl"],
		["referer_url", "refererUrl"],
		["cdn_origin", "cdnOrigin"],
		["cdn_endpoint", "cdnEndpoint"],
		["thumbnail_url", "thumbnailUrl"],
	] as const
)
	.slice()
	.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

function asciiJson(value: unknown): string {
	return JSON.stringify(value).replace(
		/[\u0080-\uffff]/g,
		ch => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`,
	)
}

/**
 * SHA-256 over the descriptor fields.
 * Encoding: keys sorted, ", " and ": " separators, non-ASCII escaped.
 */
export function itemSignature(item: NormalizedItem): string {
	const body = SIGNATURE_FIELDS.map(
		([column, field]) => `${asciiJson(column)}: ${asciiJson(item[field])}`,
	).join(", ")
	return createHash("sha256").update(`{${body}}`, "utf8").digest("hex")
}

// ═══════════════════════════════════════════════════════════════════════════════
// Lookups
// ═══════════════════════════════════════════════════════════════════════════════

export function getAlbumId(db: DbExecutor, albumUrl: string): number | undefined {
	return db
		.select({ id: albums.id })
		.from(albums)
		.where(eq(albums.albumUrl, albumUrl))
		.get()?.id
}

function upsertAlbum(
	tx: DbExecutor,
	albumUrl: string,
	albumName: string | undefined,
	now: string,
): number {
	const name = (albumName ?? "").trim()
	const existing = tx
		.select({ id: albums.id, albumName: albums.albumName })
		.from(albums)
		.where(eq(albums.albumUrl, albumUrl))
		.get()

	if (existing) {
		tx.update(albums)
			.set({
				albumName: name || existing.albumName,
				updatedAt: now,
				lastSyncedAt: now,
			})
			.where(eq(albums.id, existing.id))
			.run()
		return existing.id
	}

	return tx
		.insert(albums)
		.values({
			albumUrl,
			albumName: name,
			createdAt: now,
			updatedAt: now,
			lastSyncedAt: now,
		})
		.returning({ id: albums.id })
		.get().id
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sync
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Record a fresh snapshot of an album's items.
 *
 * New keys are inserted, known keys are refreshed (and counted as updated
 * when their signature changed or they were inactive), and active keys
 * missing from the snapshot are soft-removed. One sync run row is appended.
 * Items sharing a key collapse to the last one.
 */
export function syncAlbumItems(
	db: DbClient,
	albumUrl: string,
	albumName: string | undefined,
	items: readonly SyncItemInput[],
): SyncRunSummary {
	const deduped = new Map<string, NormalizedItem>()
	for (const raw of items) {
		const item = normalizeItem(raw)
		if (item.itemKey) deduped.set(item.itemKey, item)
	}
	const snapshot = [...deduped.values()]
	const now = new Date().toISOString()

	const summary = inTransaction(db, tx => {
		const albumId = upsertAlbum(tx, albumUrl, albumName, now)

		const existing = new Map(
			tx
				.select({
					itemKey: albumItems.itemKey,
					signature: albumItems.signature,
					isActive: albumItems.isActive,
				})
				.from(albumItems)
				.where(eq(albumItems.albumId, albumId))
				.all()
				.map(row => [row.itemKey, row]),
		)

		let added = 0
		let updated = 0

		for (const item of snapshot) {
			const signature = itemSignature(item)
			const previous = existing.get(item.itemKey)

			if (!previous) {
				tx.insert(albumItems)
					.values({
						...item,
						albumId,
						signature,
						firstSeenAt: now,
						lastSeenAt: now,
						removedAt: null,
						isActive: true,
						createdAt: now,
						updatedAt: now,
					})
					.run()
				added++
				continue
			}

			if (previous.signature !== signature || !previous.isActive) {
				updated++
			}

			tx.update(albumItems)
				.set({
					...item,
					signature,
					lastSeenAt: now,
					removedAt: null,
					isActive: true,
					retainedOnRemove: false,
					localDeletedAt: null,
					updatedAt: now,
				})
				.where(
					and(eq(albumItems.albumId, albumId), eq(albumItems.itemKey, item.itemKey)),
				)
				.run()
		}

		const removedKeys = [...existing.values()]
			.filter(row => row.isActive && !deduped.has(row.itemKey))
			.map(row => row.itemKey)

		for (const itemKey of removedKeys) {
			tx.update(albumItems)
				.set({
					isActive: false,
					removedAt: now,
					retainedOnRemove: false,
					localDeletedAt: null,
					updatedAt: now,
				})
				.where(and(eq(albumItems.albumId, albumId), eq(albumItems.itemKey, itemKey)))
				.run()
		}

		tx.insert(syncRuns)
			.values({
				albumId,
				syncedAt: now,
				totalItems: snapshot.length,
				addedItems: added,
				updatedItems: updated,
				removedItems: removedKeys.length,
			})
			.run()

		return {
			albumId,
			total: snapshot.length,
			added,
			updated,
			removed: removedKeys.length,
		}
	})

	log.store.info({ albumUrl, ...summary }, "album synced")
	return summary
}

// ═══════════════════════════════════════════════════════════════════════════════
// Local Presence
// ═══════════════════════════════════════════════════════════════════════════════

type FilenameFields = Pick<
	AlbumItem,
	"suggestedName" | "originalName" | "directUrl" | "fallbackUrl"
>

/** The name a stored item would have been saved under */
export function guessExpectedFilename(row: FilenameFields): string {
	const suggested = text(row.suggestedName ?? undefined) || text(row.originalName ?? undefined)
	const baseUrl = text(row.directUrl ?? undefined) || text(row.fallbackUrl ?? undefined)
	if (baseUrl) return deriveFilename(baseUrl, suggested || undefined)
	return suggested ? sanitizeFilename(suggested) : ""
}

/**
 * Scan `targetFolder` and update each item's download flags.
 * downloadedAt and localMissingAt keep their first value; items that were
 * never downloaded are left alone when missing.
 */
export function refreshDownloadState(
	db: DbClient,
	albumUrl: string,
	targetFolder: string,
): DownloadStateSummary {
	const folder = resolve(targetFolder)

	return inTransaction(db, tx => {
		const albumId = getAlbumId(tx, albumUrl)
		if (albumId === undefined) return { total: 0, downloaded: 0, missing: 0 }

		const rows = tx
			.select()
			.from(albumItems)
			.where(eq(albumItems.albumId, albumId))
			.all()

		const now = new Date().toISOString()
		let downloaded = 0
		let missing = 0

		for (const row of rows) {
			const found = findExistingFile(folder, guessExpectedFilename(row))

			if (found) {
				downloaded++
				tx.update(albumItems)
					.set({
						isDownloaded: true,
						downloadedPath: found,
						downloadedAt: row.downloadedAt ?? now,
						localMissingAt: null,
						updatedAt: now,
					})
					.where(eq(albumItems.id, row.id))
					.run()
				continue
			}

			missing++
			if (row.isDownloaded || row.downloadedPath) {
				tx.update(albumItems)
					.set({
						isDownloaded: false,
						localMissingAt: row.localMissingAt ?? now,
						updatedAt: now,
					})
					.where(eq(albumItems.id, row.id))
					.run()
			}
		}

		return { total: rows.length, downloaded, missing }
	})
}
