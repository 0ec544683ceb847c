/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import { formatSize } from "./core/album-run.js"
import type { AlbumRunResult } from "./core/album-run.js"
import type { ManagedAlbum } from "./db/schema.js"
import type { AlbumMediaItem } from "./db/queries/album-media.js"
import { spinnerSafeLog } from "./parallel.js"
import type { ItemSummary } from "./types.js"

function plural(count: number, word: string): string {
	return `${count} ${word}${count === 1 ? "" : "s"}`
}

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** One-line item breakdown for a fetched album */
	itemCounts(counts: ItemSummary): void {
		spinnerSafeLog(
			`Files: ${chalk.cyan(String(counts.total))} ` +
				`(image ${counts.images}, video ${counts.videos}, ` +
				`archive ${counts.archives}, other ${counts.other}) ` +
				chalk.dim(`~${formatSize(counts.totalBytes)}`),
		)
	},

	/** Store lines printed after each album */
	albumState(result: AlbumRunResult): void {
		if (result.sync) {
			const { total, added, updated, removed } = result.sync
			spinnerSafeLog(
				`Sync DB: ${plural(total, "item")}, added ${added}, updated ${updated}, removed ${removed}`,
			)
		}
		if (result.state) {
			const { total, downloaded, missing } = result.state
			spinnerSafeLog(`Local state: downloaded ${downloaded}/${total}, missing ${missing}`)
		}
		const policy = result.policy
		if (policy && (policy.retained || policy.deleted || policy.errors.length)) {
			spinnerSafeLog(
				`Removed media policy: retained ${policy.retained}, ` +
					`deleted ${policy.deleted}, errors ${policy.errors.length}`,
			)
		}
	},

	managedAlbums(albums: ManagedAlbum[]): void {
		if (albums.length === 0) {
			console.log("Managed album list is empty.")
			return
		}
		for (const album of albums) {
			const policy = album.deleteLocalOnRemoteRemove
				? chalk.red("delete on remove")
				: chalk.green("keep on remove")
			const state = album.enabled ? "" : chalk.dim(" (disabled)")
			console.log(`${chalk.bold(`[${album.id}]`)} ${album.albumLabel}${state}`)
			console.log(`    ${chalk.dim(album.albumUrl)}`)
			console.log(`    → ${album.targetFolder}  ${policy}`)
		}
	},

	/** Media rows grouped by category */
	mediaItems(items: AlbumMediaItem[]): void {
		if (items.length === 0) {
			console.log("No media recorded for this album.")
			return
		}
		const groups = new Map<string, AlbumMediaItem[]>()
		for (const item of items) {
			const group = groups.get(item.category) ?? []
			group.push(item)
			groups.set(item.category, group)
		}
		for (const [category, group] of groups) {
			console.log(chalk.cyan.bold(`${category} (${group.length})`))
			for (const item of group) {
				const size = item.sizeBytes !== null ? chalk.dim(` ${formatSize(item.sizeBytes)}`) : ""
				const flags = [
					item.isActive ? "" : chalk.red("removed"),
					item.isDownloaded ? chalk.green("local") : "",
				]
					.filter(Boolean)
					.join(" ")
				console.log(`  ${String(item.id).padStart(5)}  ${item.displayName}${size}  ${flags}`)
			}
		}
	},

	/** Totals and every error string */
	runSummary(downloaded: number, failed: number, errors: readonly string[]): void {
		console.log()
		console.log(
			`Downloaded: ${chalk.green(plural(downloaded, "file"))}, ` +
				`Failed: ${(failed > 0 ? chalk.red : chalk.green)(plural(failed, "file"))}.`,
		)
		for (const error of errors) {
			console.log(chalk.red(`  ✗ ${error}`))
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All operations completed successfully!"))
		} else {
			console.log(chalk.yellow.bold("⚠ Some operations failed. See above for details."))
		}
		console.log()
	},
}
