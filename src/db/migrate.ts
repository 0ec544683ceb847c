/**
 * Schema bootstrap and additive migration.
 *
 * Fresh files get every table and index. Files written by older releases
 * get the columns they are missing added in place; nothing is ever dropped
 * or rewritten.
 */

import type Database from "better-sqlite3"
import { StoreError } from "../errors.js"
import { log } from "../logger.js"

// ═══════════════════════════════════════════════════════════════════════════════
// DDL
// ═══════════════════════════════════════════════════════════════════════════════

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS albums (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	album_url TEXT NOT NULL UNIQUE,
	album_name TEXT,
	created_at TEXT NOT NULL,
	updated_at TEXT NOT NULL,
	last_synced_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS album_items (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	album_id INTEGER NOT NULL,
	item_key TEXT NOT NULL,
	slug TEXT,
	original_name TEXT,
	suggested_name TEXT,
	media_type TEXT,
	size_bytes INTEGER,
	direct_url TEXT,
	fallback_url TEXT,
	referer_url TEXT,
	cdn_origin TEXT,
	cdn_endpoint TEXT,
	thumbnail_url TEXT,
	signature TEXT NOT NULL,
	first_seen_at TEXT NOT NULL,
	last_seen_at TEXT NOT NULL,
	removed_at TEXT,
	is_active INTEGER NOT NULL DEFAULT 1,
	is_downloaded INTEGER NOT NULL DEFAULT 0,
	downloaded_path TEXT,
	downloaded_at TEXT,
	local_missing_at TEXT,
	retained_on_remove INTEGER NOT NULL DEFAULT 0,
	local_deleted_at TEXT,
	created_at TEXT NOT NULL,
	updated_at TEXT NOT NULL,
	UNIQUE(album_id, item_key),
	FOREIGN KEY(album_id) REFERENCES albums(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS sync_runs (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	album_id INTEGER NOT NULL,
	synced_at TEXT NOT NULL,
	total_items INTEGER NOT NULL,
	added_items INTEGER NOT NULL,
	updated_items INTEGER NOT NULL,
	removed_items INTEGER NOT NULL,
	FOREIGN KEY(album_id) REFERENCES albums(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS managed_albums (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	album_url TEXT NOT NULL UNIQUE,
	album_label TEXT NOT NULL,
	target_folder TEXT NOT NULL,
	delete_local_on_remote_remove INTEGER NOT NULL DEFAULT 0,
	enabled INTEGER NOT NULL DEFAULT 1,
	created_at TEXT NOT NULL,
	updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_album_items_album_id ON album_items(album_id);
CREATE INDEX IF NOT EXISTS idx_album_items_active ON album_items(album_id, is_active);
CREATE INDEX IF NOT EXISTS idx_sync_runs_album_id ON sync_runs(album_id, synced_at);
CREATE INDEX IF NOT EXISTS idx_managed_albums_enabled ON managed_albums(enabled, id);
`

/** Columns added after the first release of each table */
export const ADDITIVE_COLUMNS: Record<string, Record<string, string>> = {
	album_items: {
		direct_url: "TEXT",
		fallback_url: "TEXT",
		referer_url: "TEXT",
		is_downloaded: "INTEGER NOT NULL DEFAULT 0",
		downloaded_path: "TEXT",
		downloaded_at: "TEXT",
		local_missing_at: "TEXT",
		retained_on_remove: "INTEGER NOT NULL DEFAULT 0",
		local_deleted_at: "TEXT",
	},
}

// ═══════════════════════════════════════════════════════════════════════════════
// Migration Functions
// ═══════════════════════════════════════════════════════════════════════════════

export function tableColumns(sqlite: Database.Database, table: string): Set<string> {
	const rows = sqlite
		.prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
		.all()
	return new Set(rows.map(row => row.name))
}

/**
 * Add any of `columns` missing from `table`.
 * @returns names of the columns that were added
 */
export function ensureColumns(
	sqlite: Database.Database,
	table: string,
	columns: Record<string, string>,
): string[] {
	const existing = tableColumns(sqlite, table)
	const added: string[] = []
	for (const [name, type] of Object.entries(columns)) {
		if (existing.has(name)) continue
		sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${name} ${type}`)
		added.push(name)
	}
	return added
}

/** Create missing tables and columns. Throws StoreError("migration"). */
export function ensureSchema(sqlite: Database.Database, dbPath: string): void {
	try {
		sqlite.exec(SCHEMA_SQL)
		for (const [table, columns] of Object.entries(ADDITIVE_COLUMNS)) {
			const added = ensureColumns(sqlite, table, columns)
			if (added.length > 0) {
				log.store.info({ dbPath, table, added }, "added missing columns")
			}
		}
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err)
		throw new StoreError(`Failed to prepare database schema: ${message}`, "migration", {
			cause: err,
		})
	}
}
