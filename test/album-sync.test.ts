/**
 * Album snapshot diffing and local presence reconciliation against a real
 * SQLite file.
 */

import { createHash } from "node:crypto"
import { mkdirSync, rmSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { eq } from "drizzle-orm"
import { describe, it, expect } from "vitest"
import { albumItems, albums, syncRuns, type DbClient } from "../src/db/index.js"
import {
	itemSignature,
	normalizeItem,
	refreshDownloadState,
	syncAlbumItems,
	type SyncItemInput,
} from "../src/db/queries/album-items.js"
import { withTempDb } from "./helpers/index.js"

const ALBUM = "https://bunkr.test/a/trip"

const photo: SyncItemInput = {
	itemKey: "a",
	slug: "a",
	suggestedName: "a.jpg",
	mediaType: "image/jpeg",
	sizeBytes: 10,
	directUrl: "https://cdn.test/data/a.jpg",
}

const clip: SyncItemInput = {
	itemKey: "b",
	slug: "b",
	suggestedName: "b.mp4",
	mediaType: "video/mp4",
	directUrl: "https://cdn.test/data/b.mp4",
}

const archive: SyncItemInput = {
	itemKey: "c",
	suggestedName: "c.zip",
	mediaType: "application/zip",
	directUrl: "https://cdn.test/data/c.zip",
}

function itemRow(db: DbClient, itemKey: string) {
	return db.select().from(albumItems).where(eq(albumItems.itemKey, itemKey)).get()
}

describe("normalizeItem", () => {
	it("trims fields and derives the key from the fallback slug", () => {
		const item = normalizeItem({ fallbackUrl: " https://bunkr.test/f/Q1 ", sizeBytes: "42" })
		expect(item.itemKey).toBe("Q1")
		expect(item.slug).toBe("Q1")
		expect(item.fallbackUrl).toBe("https://bunkr.test/f/Q1")
		expect(item.sizeBytes).toBe(42)
		expect(item.mediaType).toBe("")
	})

	it("keys slug-less items by URL", () => {
		expect(normalizeItem({ directUrl: "https://bunkr.test/v/x" }).itemKey).toBe(
			"https://bunkr.test/v/x",
		)
		expect(normalizeItem({}).itemKey).toBe("")
	})
})

describe("itemSignature", () => {
	it("hashes sorted snake_case fields with non-ASCII escaped", () => {
		const item = normalizeItem({ itemKey: "k", originalName: "café" })
		const body = String.raw`{"cdn_endpoint": "", "cdn_origin": "", "direct_url": "", "fallback_url": "", "item_key": "k", "media_type": "", "original_name": "caf\u00e9", "referer_url": "", "size_bytes": null, "slug": "", "suggested_name": "", "thumbnail_url": ""}`
		expect(itemSignature(item)).toBe(createHash("sha256").update(body).digest("hex"))
	})

	it("treats numeric and string sizes alike", () => {
		expect(itemSignature(normalizeItem({ ...photo, sizeBytes: "10" }))).toBe(
			itemSignature(normalizeItem(photo)),
		)
	})
})

describe("syncAlbumItems", () => {
	it("is idempotent for an unchanged snapshot", async () => {
		await withTempDb(db => {
			expect(syncAlbumItems(db, ALBUM, "Trip", [photo, clip])).toEqual({
				albumId: 1,
				total: 2,
				added: 2,
				updated: 0,
				removed: 0,
			})
			expect(syncAlbumItems(db, ALBUM, "Trip", [photo, clip])).toEqual({
				albumId: 1,
				total: 2,
				added: 0,
				updated: 0,
				removed: 0,
			})
			expect(db.select().from(syncRuns).all()).toHaveLength(2)
		})
	})

	it("counts additions, changes and removals", async () => {
		await withTempDb(db => {
			syncAlbumItems(db, ALBUM, "Trip", [photo, clip])

			const summary = syncAlbumItems(db, ALBUM, "Trip", [
				{ ...photo, sizeBytes: 11 },
				archive,
			])
			expect(summary).toEqual({ albumId: 1, total: 2, added: 1, updated: 1, removed: 1 })

			const removed = itemRow(db, "b")
			expect(removed?.isActive).toBe(false)
			expect(removed?.removedAt).not.toBeNull()
			expect(itemRow(db, "a")?.sizeBytes).toBe(11)
		})
	})

	it("reactivates an item that comes back", async () => {
		await withTempDb(db => {
			syncAlbumItems(db, ALBUM, "Trip", [photo, clip])
			syncAlbumItems(db, ALBUM, "Trip", [photo])

			expect(syncAlbumItems(db, ALBUM, "Trip", [photo, clip])).toEqual({
				albumId: 1,
				total: 2,
				added: 0,
				updated: 1,
				removed: 0,
			})
			const row = itemRow(db, "b")
			expect(row?.isActive).toBe(true)
			expect(row?.removedAt).toBeNull()
		})
	})

	it("collapses duplicate keys to the last item", async () => {
		await withTempDb(db => {
			const summary = syncAlbumItems(db, ALBUM, "Trip", [
				photo,
				{ ...photo, suggestedName: "z.jpg" },
			])
			expect(summary.total).toBe(1)
			expect(itemRow(db, "a")?.suggestedName).toBe("z.jpg")
		})
	})

	it("keeps the stored album name when a sync brings none", async () => {
		await withTempDb(db => {
			syncAlbumItems(db, ALBUM, "Trip", [photo])
			syncAlbumItems(db, ALBUM, "  ", [photo])
			expect(db.select().from(albums).get()?.albumName).toBe("Trip")

			syncAlbumItems(db, ALBUM, "Trip 2", [photo])
			expect(db.select().from(albums).get()?.albumName).toBe("Trip 2")
		})
	})

	it("records an empty snapshot as removing everything", async () => {
		await withTempDb(db => {
			syncAlbumItems(db, ALBUM, "Trip", [photo, clip])
			expect(syncAlbumItems(db, ALBUM, undefined, [])).toEqual({
				albumId: 1,
				total: 0,
				added: 0,
				updated: 0,
				removed: 2,
			})
		})
	})
})

describe("refreshDownloadState", () => {
	it("flags present files and remembers when they went missing", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			mkdirSync(folder)
			writeFileSync(join(folder, "a.jpg"), "x")
			syncAlbumItems(db, ALBUM, "Trip", [photo, clip])

			expect(refreshDownloadState(db, ALBUM, folder)).toEqual({
				total: 2,
				downloaded: 1,
				missing: 1,
			})
			const present = itemRow(db, "a")
			expect(present?.isDownloaded).toBe(true)
			expect(present?.downloadedPath).toBe(join(folder, "a.jpg"))
			const firstDownloadedAt = present?.downloadedAt
			expect(firstDownloadedAt).toBeTruthy()

			// Never downloaded: untouched
			expect(itemRow(db, "b")?.localMissingAt).toBeNull()

			refreshDownloadState(db, ALBUM, folder)
			expect(itemRow(db, "a")?.downloadedAt).toBe(firstDownloadedAt)

			rmSync(join(folder, "a.jpg"))
			expect(refreshDownloadState(db, ALBUM, folder)).toEqual({
				total: 2,
				downloaded: 0,
				missing: 2,
			})
			const gone = itemRow(db, "a")
			expect(gone?.isDownloaded).toBe(false)
			expect(gone?.localMissingAt).toBeTruthy()
			expect(gone?.downloadedPath).toBe(join(folder, "a.jpg"))
		})
	})

	it("matches collision-suffixed copies", async () => {
		await withTempDb((db, _dbPath, dir) => {
			writeFileSync(join(dir, "b (1).mp4"), "x")
			syncAlbumItems(db, ALBUM, "Trip", [clip])
			refreshDownloadState(db, ALBUM, dir)
			expect(itemRow(db, "b")?.downloadedPath).toBe(join(dir, "b (1).mp4"))
		})
	})

	it("returns zeros for an unknown album", async () => {
		await withTempDb((db, _dbPath, dir) => {
			expect(refreshDownloadState(db, "https://bunkr.test/a/none", dir)).toEqual({
				total: 0,
				downloaded: 0,
				missing: 0,
			})
		})
	})
})
