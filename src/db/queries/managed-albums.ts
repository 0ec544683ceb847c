/**
 * Managed Albums Database Queries
 *
 * The registry of albums kept in sync on a schedule: where each one is
 * mirrored and what happens to local copies when items vanish upstream.
 */

import { resolve } from "node:path"
import { asc, eq } from "drizzle-orm"
import type { DbClient } from "../index.js"
import { managedAlbums, type ManagedAlbum } from "../schema.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface UpsertManagedAlbumParams {
	albumUrl: string
	/** Display label; blank falls back to the URL on insert, keeps the old one on update */
	albumLabel?: string
	targetFolder: string
	deleteLocalOnRemoteRemove?: boolean
	enabled?: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Core Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Register an album or update its registration (keyed by URL).
 * The target folder is stored as an absolute path.
 */
export function upsertManagedAlbum(
	db: DbClient,
	params: UpsertManagedAlbumParams,
): ManagedAlbum {
	const albumUrl = params.albumUrl.trim()
	const label = (params.albumLabel ?? "").trim()
	const targetFolder = resolve(params.targetFolder)
	const deleteLocalOnRemoteRemove = params.deleteLocalOnRemoteRemove ?? false
	const enabled = params.enabled ?? true
	const now = new Date().toISOString()

	const existing = db
		.select()
		.from(managedAlbums)
		.where(eq(managedAlbums.albumUrl, albumUrl))
		.get()

	if (existing) {
		return db
			.update(managedAlbums)
			.set({
				albumLabel: label || existing.albumLabel,
				targetFolder,
				deleteLocalOnRemoteRemove,
				enabled,
				updatedAt: now,
			})
			.where(eq(managedAlbums.id, existing.id))
			.returning()
			.get()
	}

	return db
		.insert(managedAlbums)
		.values({
			albumUrl,
			albumLabel: label || albumUrl,
			targetFolder,
			deleteLocalOnRemoteRemove,
			enabled,
			createdAt: now,
			updatedAt: now,
		})
		.returning()
		.get()
}

export function listManagedAlbums(db: DbClient, enabledOnly = true): ManagedAlbum[] {
	return db
		.select()
		.from(managedAlbums)
		.where(enabledOnly ? eq(managedAlbums.enabled, true) : undefined)
		.orderBy(asc(managedAlbums.id))
		.all()
}

export function getManagedAlbum(db: DbClient, id: number): ManagedAlbum | undefined {
	return db.select().from(managedAlbums).where(eq(managedAlbums.id, id)).get()
}

/** @returns false when no album has this id */
export function deleteManagedAlbum(db: DbClient, id: number): boolean {
	return db.delete(managedAlbums).where(eq(managedAlbums.id, id)).run().changes > 0
}

export function setManagedAlbumRemovePolicy(
	db: DbClient,
	id: number,
	deleteLocalOnRemoteRemove: boolean,
): boolean {
	return (
		db
			.update(managedAlbums)
			.set({ deleteLocalOnRemoteRemove, updatedAt: new Date().toISOString() })
			.where(eq(managedAlbums.id, id))
			.run().changes > 0
	)
}

export function setManagedAlbumEnabled(
	db: DbClient,
	id: number,
	enabled: boolean,
): boolean {
	return (
		db
			.update(managedAlbums)
			.set({ enabled, updatedAt: new Date().toISOString() })
			.where(eq(managedAlbums.id, id))
			.run().changes > 0
	)
}
