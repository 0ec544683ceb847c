import { existsSync, mkdirSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { eq } from "drizzle-orm"
import { describe, it, expect } from "vitest"
import { applyRemovedItemPolicy } from "../src/core/removal-policy.js"
import { albumItems, type DbClient } from "../src/db/index.js"
import {
	refreshDownloadState,
	syncAlbumItems,
	type SyncItemInput,
} from "../src/db/queries/album-items.js"
import { withTempDb } from "./helpers/index.js"

const ALBUM = "https://bunkr.test/a/trip"

const photo: SyncItemInput = {
	itemKey: "a",
	suggestedName: "a.jpg",
	mediaType: "image/jpeg",
	directUrl: "https://cdn.test/data/a.jpg",
}

const clip: SyncItemInput = {
	itemKey: "b",
	suggestedName: "b.mp4",
	mediaType: "video/mp4",
	directUrl: "https://cdn.test/data/b.mp4",
}

function itemRow(db: DbClient, itemKey: string) {
	return db.select().from(albumItems).where(eq(albumItems.itemKey, itemKey)).get()
}

/** Both items downloaded into `folder`, then "a" disappears upstream */
function seedRemoved(db: DbClient, folder: string): void {
	mkdirSync(folder, { recursive: true })
	writeFileSync(join(folder, "a.jpg"), "x")
	writeFileSync(join(folder, "b.mp4"), "x")
	syncAlbumItems(db, ALBUM, "Trip", [photo, clip])
	refreshDownloadState(db, ALBUM, folder)
	syncAlbumItems(db, ALBUM, "Trip", [clip])
}

describe("applyRemovedItemPolicy", () => {
	it("keeps files and flags rows when deletion is off", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)

			expect(applyRemovedItemPolicy(db, ALBUM, false, folder)).toEqual({
				retained: 1,
				deleted: 0,
				errors: [],
			})
			expect(existsSync(join(folder, "a.jpg"))).toBe(true)
			expect(itemRow(db, "a")?.retainedOnRemove).toBe(true)
			expect(itemRow(db, "b")?.retainedOnRemove).toBe(false)
		})
	})

	it("clears the retained flag when the item returns", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)
			applyRemovedItemPolicy(db, ALBUM, false, folder)

			syncAlbumItems(db, ALBUM, "Trip", [photo, clip])
			expect(itemRow(db, "a")?.retainedOnRemove).toBe(false)
		})
	})

	it("deletes removed files inside the album folder", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)

			expect(applyRemovedItemPolicy(db, ALBUM, true, folder)).toEqual({
				retained: 0,
				deleted: 1,
				errors: [],
			})
			expect(existsSync(join(folder, "a.jpg"))).toBe(false)
			expect(existsSync(join(folder, "b.mp4"))).toBe(true)

			const row = itemRow(db, "a")
			expect(row?.isDownloaded).toBe(false)
			expect(row?.localDeletedAt).toBeTruthy()

			// Already handled
			expect(applyRemovedItemPolicy(db, ALBUM, true, folder)).toEqual({
				retained: 0,
				deleted: 0,
				errors: [],
			})
		})
	})

	it("marks rows whose file is already gone without counting a deletion", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)
			db.update(albumItems)
				.set({ downloadedPath: join(folder, "vanished.jpg") })
				.where(eq(albumItems.itemKey, "a"))
				.run()

			expect(applyRemovedItemPolicy(db, ALBUM, true, folder)).toEqual({
				retained: 0,
				deleted: 0,
				errors: [],
			})
			expect(itemRow(db, "a")?.localDeletedAt).toBeTruthy()
		})
	})

	it("refuses files outside the album folder", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)
			const outside = join(dir, "elsewhere.jpg")
			writeFileSync(outside, "x")
			db.update(albumItems)
				.set({ downloadedPath: outside })
				.where(eq(albumItems.itemKey, "a"))
				.run()

			expect(applyRemovedItemPolicy(db, ALBUM, true, folder)).toEqual({
				retained: 0,
				deleted: 0,
				errors: [`outside-root: Refusing to delete ${outside}: outside ${folder}`],
			})
			expect(existsSync(outside)).toBe(true)
			expect(itemRow(db, "a")?.isDownloaded).toBe(true)
			expect(itemRow(db, "a")?.localDeletedAt).toBeNull()
		})
	})

	it("refuses every deletion without a target folder", async () => {
		await withTempDb((db, _dbPath, dir) => {
			const folder = join(dir, "Trip")
			seedRemoved(db, folder)
			const path = join(folder, "a.jpg")

			expect(applyRemovedItemPolicy(db, ALBUM, true)).toEqual({
				retained: 0,
				deleted: 0,
				errors: [`outside-root: Refusing to delete ${path}: outside any album folder`],
			})
			expect(existsSync(path)).toBe(true)
		})
	})

	it("does nothing for an unknown album", async () => {
		await withTempDb((db, _dbPath, dir) => {
			expect(applyRemovedItemPolicy(db, "https://bunkr.test/a/none", true, dir)).toEqual({
				retained: 0,
				deleted: 0,
				errors: [],
			})
		})
	})
})
