import { mkdirSync, writeFileSync, existsSync } from "node:fs"
import { join, resolve } from "node:path"
import { eq } from "drizzle-orm"
import { describe, it, expect } from "vitest"
import { albumItems } from "../src/db/index.js"
import {
	addManagedAlbum,
	countMedia,
	deleteMedia,
	findManagedAlbum,
	getManagedAlbums,
	listMedia,
	refreshState,
	removeManagedAlbum,
	setEnabled,
	setRemovePolicy,
	syncAlbum,
} from "../src/store.js"
import { withTempDb } from "./helpers/index.js"

const ALBUM = "https://bunkr.test/a/trip"
const OTHER = "https://bunkr.test/a/other"

describe("managed albums", () => {
	it("registers albums with an absolute folder and a default label", async () => {
		await withTempDb((_db, dbPath) => {
			const album = addManagedAlbum(dbPath, { albumUrl: ` ${ALBUM} `, targetFolder: "mirror/trip" })
			expect(album).toMatchObject({
				id: 1,
				albumUrl: ALBUM,
				albumLabel: ALBUM,
				targetFolder: resolve("mirror/trip"),
				deleteLocalOnRemoteRemove: false,
				enabled: true,
			})
		})
	})

	it("updates by URL and keeps the label when none is given", async () => {
		await withTempDb((_db, dbPath) => {
			addManagedAlbum(dbPath, { albumUrl: ALBUM, albumLabel: "Trip", targetFolder: "/m/a" })
			const updated = addManagedAlbum(dbPath, {
				albumUrl: ALBUM,
				targetFolder: "/m/b",
				deleteLocalOnRemoteRemove: true,
			})
			expect(updated).toMatchObject({
				id: 1,
				albumLabel: "Trip",
				targetFolder: resolve("/m/b"),
				deleteLocalOnRemoteRemove: true,
			})
			expect(getManagedAlbums(dbPath, false)).toHaveLength(1)
		})
	})

	it("lists enabled albums by default", async () => {
		await withTempDb((_db, dbPath) => {
			addManagedAlbum(dbPath, { albumUrl: ALBUM, targetFolder: "/m/a" })
			addManagedAlbum(dbPath, { albumUrl: OTHER, targetFolder: "/m/b", enabled: false })

			expect(getManagedAlbums(dbPath).map(album => album.albumUrl)).toEqual([ALBUM])
			expect(getManagedAlbums(dbPath, false).map(album => album.albumUrl)).toEqual([
				ALBUM,
				OTHER,
			])
		})
	})

	it("toggles policy and enabled flags, reporting unknown ids", async () => {
		await withTempDb((_db, dbPath) => {
			const { id } = addManagedAlbum(dbPath, { albumUrl: ALBUM, targetFolder: "/m/a" })

			expect(setRemovePolicy(dbPath, id, true)).toBe(true)
			expect(setEnabled(dbPath, id, false)).toBe(true)
			expect(findManagedAlbum(dbPath, id)).toMatchObject({
				deleteLocalOnRemoteRemove: true,
				enabled: false,
			})

			expect(setRemovePolicy(dbPath, 99, true)).toBe(false)
			expect(setEnabled(dbPath, 99, true)).toBe(false)
			expect(removeManagedAlbum(dbPath, 99)).toBe(false)
			expect(removeManagedAlbum(dbPath, id)).toBe(true)
			expect(findManagedAlbum(dbPath, id)).toBeUndefined()
		})
	})
})

describe("album media", () => {
	const items = [
		{ itemKey: "a", suggestedName: "a.jpg", mediaType: "image/jpeg", sizeBytes: 5, directUrl: "https://cdn.test/a.jpg" },
		{ itemKey: "b", originalName: "b.mp4", mediaType: "video/mp4", directUrl: "https://cdn.test/b.mp4" },
		{ itemKey: "c", mediaType: "application/x-rar", directUrl: "https://cdn.test/c.rar" },
	]

	it("lists items with display names and categories", async () => {
		await withTempDb((_db, dbPath) => {
			syncAlbum(dbPath, ALBUM, "Trip", items)
			syncAlbum(dbPath, ALBUM, "Trip", items.slice(0, 2))

			const all = listMedia(dbPath, ALBUM)
			expect(all.map(item => [item.id, item.displayName, item.category, item.isActive])).toEqual([
				[1, "a.jpg", "image", true],
				[2, "b.mp4", "video", true],
				[3, "c", "archive", false],
			])
			expect(all[0]?.sizeBytes).toBe(5)
			expect(listMedia(dbPath, ALBUM, false)).toHaveLength(2)
			expect(listMedia(dbPath, OTHER)).toEqual([])
		})
	})

	it("counts categories per album", async () => {
		await withTempDb((_db, dbPath) => {
			syncAlbum(dbPath, ALBUM, "Trip", items)
			syncAlbum(dbPath, ALBUM, "Trip", items.slice(0, 2))

			const active = countMedia(dbPath, [ALBUM, ` ${OTHER}`, ALBUM, ""])
			expect([...active.keys()]).toEqual([ALBUM, OTHER])
			expect(active.get(ALBUM)).toEqual({ image: 1, video: 1, archive: 0, other: 0, total: 2 })
			expect(active.get(OTHER)).toEqual({ image: 0, video: 0, archive: 0, other: 0, total: 0 })

			expect(countMedia(dbPath, [ALBUM], false).get(ALBUM)?.archive).toBe(1)
		})
	})

	it("deletes a row and, on request, its local file", async () => {
		await withTempDb((_db, dbPath, dir) => {
			const folder = join(dir, "Trip")
			mkdirSync(folder)
			writeFileSync(join(folder, "a.jpg"), "x")
			syncAlbum(dbPath, ALBUM, "Trip", items)
			refreshState(dbPath, ALBUM, folder)

			expect(deleteMedia(dbPath, ALBUM, 1, { deleteLocalFile: true, allowedRoot: folder })).toEqual({
				dbDeleted: true,
				fileDeleted: true,
				message: "Media ID 1 deleted from DB and local file checked.",
			})
			expect(existsSync(join(folder, "a.jpg"))).toBe(false)

			expect(deleteMedia(dbPath, ALBUM, 2)).toEqual({
				dbDeleted: true,
				fileDeleted: false,
				message: "Media ID 2 deleted from DB.",
			})
			expect(deleteMedia(dbPath, ALBUM, 2).message).toBe("Media ID 2 not found for this album.")
			expect(deleteMedia(dbPath, OTHER, 3).message).toBe("Album not found in DB.")
		})
	})

	it("blocks local deletion outside the allowed folder", async () => {
		await withTempDb((db, dbPath, dir) => {
			const outside = join(dir, "stray.jpg")
			writeFileSync(outside, "x")
			syncAlbum(dbPath, ALBUM, "Trip", items)
			db.update(albumItems).set({ downloadedPath: outside }).where(eq(albumItems.id, 1)).run()

			expect(
				deleteMedia(dbPath, ALBUM, 1, { deleteLocalFile: true, allowedRoot: join(dir, "Trip") }),
			).toEqual({
				dbDeleted: false,
				fileDeleted: false,
				message: "Blocked local delete for media ID 1: file path is outside allowed album folder.",
			})
			expect(existsSync(outside)).toBe(true)
			expect(listMedia(dbPath, ALBUM)).toHaveLength(3)
		})
	})
})
