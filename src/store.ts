/**
 * Store facade
 *
 * Path-based entry points over the query modules. Each call opens its own
 * connection and closes it before returning.
 */

import { applyRemovedItemPolicy, type RemovalPolicySummary } from "./core/removal-policy.js"
import { withDb, type ManagedAlbum } from "./db/index.js"
import {
	deleteAlbumMediaItem,
	getAlbumItemCounts,
	listAlbumMediaItems,
	type AlbumItemCounts,
	type AlbumMediaItem,
	type DeleteMediaOptions,
	type MediaDeleteResult,
} from "./db/queries/album-media.js"
import {
	refreshDownloadState,
	syncAlbumItems,
	type DownloadStateSummary,
	type SyncItemInput,
	type SyncRunSummary,
} from "./db/queries/album-items.js"
import {
	deleteManagedAlbum,
	getManagedAlbum,
	listManagedAlbums,
	setManagedAlbumEnabled,
	setManagedAlbumRemovePolicy,
	upsertManagedAlbum,
	type UpsertManagedAlbumParams,
} from "./db/queries/managed-albums.js"

// ─────────────────────────────────────────────────────────────────────────────
// Sync state
// ─────────────────────────────────────────────────────────────────────────────

export function syncAlbum(
	dbPath: string,
	albumUrl: string,
	albumName: string | undefined,
	items: readonly SyncItemInput[],
): SyncRunSummary {
	return withDb(dbPath, db => syncAlbumItems(db, albumUrl, albumName, items))
}

export function refreshState(
	dbPath: string,
	albumUrl: string,
	targetFolder: string,
): DownloadStateSummary {
	return withDb(dbPath, db => refreshDownloadState(db, albumUrl, targetFolder))
}

export function applyRemovalPolicy(
	dbPath: string,
	albumUrl: string,
	deleteOnRemove: boolean,
	targetFolder?: string,
): RemovalPolicySummary {
	return withDb(dbPath, db =>
		applyRemovedItemPolicy(db, albumUrl, deleteOnRemove, targetFolder),
	)
}

// ─────────────────────────────────────────────────────────────────────────────
// Managed albums
// ─────────────────────────────────────────────────────────────────────────────

export function addManagedAlbum(
	dbPath: string,
	params: UpsertManagedAlbumParams,
): ManagedAlbum {
	return withDb(dbPath, db => upsertManagedAlbum(db, params))
}

export function getManagedAlbums(dbPath: string, enabledOnly = true): ManagedAlbum[] {
	return withDb(dbPath, db => listManagedAlbums(db, enabledOnly))
}

export function findManagedAlbum(dbPath: string, id: number): ManagedAlbum | undefined {
	return withDb(dbPath, db => getManagedAlbum(db, id))
}

export function removeManagedAlbum(dbPath: string, id: number): boolean {
	return withDb(dbPath, db => deleteManagedAlbum(db, id))
}

export function setRemovePolicy(dbPath: string, id: number, deleteLocal: boolean): boolean {
	return withDb(dbPath, db => setManagedAlbumRemovePolicy(db, id, deleteLocal))
}

export function setEnabled(dbPath: string, id: number, enabled: boolean): boolean {
	return withDb(dbPath, db => setManagedAlbumEnabled(db, id, enabled))
}

// ─────────────────────────────────────────────────────────────────────────────
// Media
// ─────────────────────────────────────────────────────────────────────────────

export function listMedia(
	dbPath: string,
	albumUrl: string,
	includeRemoved = true,
): AlbumMediaItem[] {
	return withDb(dbPath, db => listAlbumMediaItems(db, albumUrl, includeRemoved))
}

export function countMedia(
	dbPath: string,
	albumUrls: readonly string[],
	activeOnly = true,
): Map<string, AlbumItemCounts> {
	return withDb(dbPath, db => getAlbumItemCounts(db, albumUrls, activeOnly))
}

export function deleteMedia(
	dbPath: string,
	albumUrl: string,
	mediaItemId: number,
	options: DeleteMediaOptions = {},
): MediaDeleteResult {
	return withDb(dbPath, db => deleteAlbumMediaItem(db, albumUrl, mediaItemId, options))
}
