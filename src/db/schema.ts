/**
 * SQLite Database Schema for album-keeper
 *
 * This schema provides:
 * - Albums seen by a sync, keyed by URL
 * - Every item ever observed in an album, with upstream and local state
 * - An append-only log of sync runs
 * - The managed-album registry (target folders and removal policy)
 *
 * All timestamps are ISO 8601 UTC strings.
 */

import {
	sqliteTable,
	text,
	integer,
	index,
	uniqueIndex,
} from "drizzle-orm/sqlite-core"

// ═══════════════════════════════════════════════════════════════════════════════
// Albums
// ═══════════════════════════════════════════════════════════════════════════════

export const albums = sqliteTable(
	"albums",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),
		albumUrl: text("album_url").notNull(),
		/** Display name; a blank sync never overwrites a stored one */
		albumName: text("album_name"),
		createdAt: text("created_at").notNull(),
		updatedAt: text("updated_at").notNull(),
		lastSyncedAt: text("last_synced_at").notNull(),
	},
	table => [uniqueIndex("idx_albums_url").on(table.albumUrl)],
)

// ═══════════════════════════════════════════════════════════════════════════════
// Album Items
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One row per (album, itemKey). Rows are soft-removed (isActive = false)
 * when an item disappears upstream and reactivated when it returns.
 */
export const albumItems = sqliteTable(
	"album_items",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),
		albumId: integer("album_id")
			.notNull()
			.references(() => albums.id, { onDelete: "cascade" }),
		itemKey: text("item_key").notNull(),
		slug: text("slug"),
		originalName: text("original_name"),
		suggestedName: text("suggested_name"),
		mediaType: text("media_type"),
		sizeBytes: integer("size_bytes"),
		directUrl: text("direct_url"),
		fallbackUrl: text("fallback_url"),
		refererUrl: text("referer_url"),
		cdnOrigin: text("cdn_origin"),
		cdnEndpoint: text("cdn_endpoint"),
		thumbnailUrl: text("thumbnail_url"),
		/** SHA-256 over the descriptor fields */
		signature: text("signature").notNull(),
		firstSeenAt: text("first_seen_at").notNull(),
		lastSeenAt: text("last_seen_at").notNull(),
		removedAt: text("removed_at"),
		isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
		isDownloaded: integer("is_downloaded", { mode: "boolean" })
			.notNull()
			.default(false),
		downloadedPath: text("downloaded_path"),
		/** First time a local copy was found */
		downloadedAt: text("downloaded_at"),
		/** First time a previously present copy was found missing */
		localMissingAt: text("local_missing_at"),
		retainedOnRemove: integer("retained_on_remove", { mode: "boolean" })
			.notNull()
			.default(false),
		localDeletedAt: text("local_deleted_at"),
		createdAt: text("created_at").notNull(),
		updatedAt: text("updated_at").notNull(),
	},
	table => [
		uniqueIndex("idx_album_items_key").on(table.albumId, table.itemKey),
		index("idx_album_items_album_id").on(table.albumId),
		index("idx_album_items_active").on(table.albumId, table.isActive),
	],
)

// ═══════════════════════════════════════════════════════════════════════════════
// Sync Runs
// ═══════════════════════════════════════════════════════════════════════════════

export const syncRuns = sqliteTable(
	"sync_runs",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),
		albumId: integer("album_id")
			.notNull()
			.references(() => albums.id, { onDelete: "cascade" }),
		syncedAt: text("synced_at").notNull(),
		totalItems: integer("total_items").notNull(),
		addedItems: integer("added_items").notNull(),
		updatedItems: integer("updated_items").notNull(),
		removedItems: integer("removed_items").notNull(),
	},
	table => [index("idx_sync_runs_album_id").on(table.albumId, table.syncedAt)],
)

// ═══════════════════════════════════════════════════════════════════════════════
// Managed Albums
// ═══════════════════════════════════════════════════════════════════════════════

/** Joined to `albums` by URL, not by foreign key */
export const managedAlbums = sqliteTable(
	"managed_albums",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),
		albumUrl: text("album_url").notNull(),
		albumLabel: text("album_label").notNull(),
		/** Absolute path */
		targetFolder: text("target_folder").notNull(),
		deleteLocalOnRemoteRemove: integer("delete_local_on_remote_remove", {
			mode: "boolean",
		})
			.notNull()
			.default(false),
		enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
		createdAt: text("created_at").notNull(),
		updatedAt: text("updated_at").notNull(),
	},
	table => [
		uniqueIndex("idx_managed_albums_url").on(table.albumUrl),
		index("idx_managed_albums_enabled").on(table.enabled, table.id),
	],
)

// ═══════════════════════════════════════════════════════════════════════════════
// Type Exports
// ═══════════════════════════════════════════════════════════════════════════════

export type Album = typeof albums.$inferSelect
export type AlbumItem = typeof albumItems.$inferSelect
export type NewAlbumItem = typeof albumItems.$inferInsert
export type SyncRun = typeof syncRuns.$inferSelect
export type ManagedAlbum = typeof managedAlbums.$inferSelect
export type NewManagedAlbum = typeof managedAlbums.$inferInsert
