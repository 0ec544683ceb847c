/**
 * Removal policy
 *
 * Decides what happens to local copies of items that disappeared upstream:
 * keep them (flagged as retained) or delete them, but only from inside the
 * album's own folder.
 */

import { existsSync, unlinkSync } from "node:fs"
import { resolve } from "node:path"
import { and, eq, isNull } from "drizzle-orm"
import { describeError, PolicyError } from "../errors.js"
import { findExistingFile, isPathInside } from "../filenames.js"
import { log } from "../logger.js"
import { inTransaction, type DbClient } from "../db/index.js"
import { getAlbumId, guessExpectedFilename } from "../db/queries/album-items.js"
import { albumItems } from "../db/schema.js"

export interface RemovalPolicySummary {
	retained: number
	deleted: number
	errors: string[]
}

/**
 * Apply the policy to downloaded items that are no longer active.
 *
 * Retain: flag each row retainedOnRemove. Delete: remove the file (the
 * stored path, else a guessed name in `targetFolder`) and mark the row
 * locally deleted. Files outside `targetFolder` are refused; without a
 * target folder every deletion is refused. Refused or failed deletions leave
 * the row untouched and add an error string.
 */
export function applyRemovedItemPolicy(
	db: DbClient,
	albumUrl: string,
	deleteOnRemove: boolean,
	targetFolder?: string,
): RemovalPolicySummary {
	const folder = targetFolder ? resolve(targetFolder) : undefined
	const summary: RemovalPolicySummary = { retained: 0, deleted: 0, errors: [] }

	return inTransaction(db, tx => {
		const albumId = getAlbumId(tx, albumUrl)
		if (albumId === undefined) return summary

		const rows = tx
			.select()
			.from(albumItems)
			.where(
				and(
					eq(albumItems.albumId, albumId),
					eq(albumItems.isActive, false),
					eq(albumItems.isDownloaded, true),
					isNull(albumItems.localDeletedAt),
				),
			)
			.all()
		if (rows.length === 0) return summary

		const now = new Date().toISOString()

		if (!deleteOnRemove) {
			for (const row of rows) {
				tx.update(albumItems)
					.set({ retainedOnRemove: true, updatedAt: now })
					.where(eq(albumItems.id, row.id))
					.run()
				summary.retained++
			}
			log.policy.info({ albumUrl, retained: summary.retained }, "kept removed items")
			return summary
		}

		const markDeleted = (id: number): void => {
			tx.update(albumItems)
				.set({
					isDownloaded: false,
					retainedOnRemove: false,
					localDeletedAt: now,
					updatedAt: now,
				})
				.where(eq(albumItems.id, id))
				.run()
		}

		for (const row of rows) {
			const candidate =
				row.downloadedPath?.trim() ||
				(folder ? findExistingFile(folder, guessExpectedFilename(row)) : undefined)

			if (!candidate) {
				markDeleted(row.id)
				continue
			}

			const absPath = resolve(candidate)
			if (!folder || !isPathInside(absPath, folder)) {
				const err = new PolicyError(
					`Refusing to delete ${absPath}: outside ${folder ?? "any album folder"}`,
					"outside-root",
					absPath,
				)
				log.policy.warn({ path: absPath, folder }, "refused delete outside album folder")
				summary.errors.push(describeError(err))
				continue
			}

			try {
				if (existsSync(absPath)) {
					unlinkSync(absPath)
					summary.deleted++
				}
			} catch (cause) {
				const err = new PolicyError(
					`Could not delete ${absPath}: ${describeError(cause)}`,
					"io",
					absPath,
					{ cause },
				)
				log.policy.warn({ path: absPath, error: describeError(cause) }, "delete failed")
				summary.errors.push(describeError(err))
				continue
			}

			markDeleted(row.id)
		}

		log.policy.info(
			{ albumUrl, deleted: summary.deleted, errors: summary.errors.length },
			"deleted removed items",
		)
		return summary
	})
}
