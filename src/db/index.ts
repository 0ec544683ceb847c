/**
 * Database Connection Manager
 *
 * Every store operation opens its own short-lived connection, runs inside a
 * transaction and closes the file again, so separate runs (or a CLI command
 * next to a long sync) never hold a connection open on each other.
 * WAL mode keeps readers and the writer out of each other's way.
 */

import Database from "better-sqlite3"
import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core"
import { StoreError } from "../errors.js"
import { log } from "../logger.js"
import { ensureSchema } from "./migrate.js"
import * as schema from "./schema.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type DbClient = BetterSQLite3Database<typeof schema>

/** A client or an open transaction; query helpers accept either */
export type DbExecutor = BaseSQLiteDatabase<"sync", Database.RunResult, typeof schema>

export interface DbHandle {
	db: DbClient
	sqlite: Database.Database
	path: string
	close(): void
}

// ═══════════════════════════════════════════════════════════════════════════════
// Connection Management
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open a connection and bring the schema up to date.
 * The caller owns the handle and must close it.
 */
export function openDb(dbPath: string): DbHandle {
	mkdirSync(dirname(dbPath), { recursive: true })

	const sqlite = new Database(dbPath)

	// Enable WAL mode for better concurrency
	sqlite.pragma("journal_mode = WAL")
	sqlite.pragma("synchronous = NORMAL")
	sqlite.pragma("busy_timeout = 5000")

	// Foreign key enforcement (album_items and sync_runs cascade with albums)
	sqlite.pragma("foreign_keys = ON")

	try {
		ensureSchema(sqlite, dbPath)
	} catch (err) {
		sqlite.close()
		throw err
	}

	const db = drizzle(sqlite, { schema })
	return {
		db,
		sqlite,
		path: dbPath,
		close: () => {
			if (sqlite.open) sqlite.close()
		},
	}
}

/** Run `fn` against a fresh connection that is closed afterwards */
export function withDb<T>(dbPath: string, fn: (db: DbClient) => T): T {
	const handle = openDb(dbPath)
	try {
		return fn(handle.db)
	} finally {
		handle.close()
	}
}

function isConstraintError(err: unknown): boolean {
	return (
		err instanceof Database.SqliteError && err.code.startsWith("SQLITE_CONSTRAINT")
	)
}

/**
 * Run `fn` in one transaction. Constraint violations surface as
 * StoreError("constraint"); everything else propagates unchanged.
 */
export function inTransaction<T>(db: DbClient, fn: (tx: DbExecutor) => T): T {
	try {
		return db.transaction(tx => fn(tx))
	} catch (err) {
		if (isConstraintError(err)) {
			const message = err instanceof Error ? err.message : String(err)
			log.store.error({ error: message }, "constraint violation")
			throw new StoreError(message, "constraint", { cause: err })
		}
		throw err
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Re-exports
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./schema.js"
