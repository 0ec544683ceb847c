/**
 * Retrieval scheduler
 *
 * Runs downloads behind a p-limit gate. Each item walks a small state
 * machine: primary URL, then the fallback URL when the primary answered with
 * an error status or a page instead of media, then failed. A failed item
 * never cancels its siblings.
 */

import { mkdir } from "node:fs/promises"
import pLimit from "p-limit"
import { describeError, ResolutionError, RetrievalError } from "../errors.js"
import { streamResponseToFile } from "../download.js"
import {
	deriveFilename,
	expectedFilename,
	findExistingFile,
	PathReservations,
} from "../filenames.js"
import { log } from "../logger.js"
import type { ResolvableItem } from "../types.js"
import type { RunContext } from "./context.js"
import { resolveTarget } from "./resolver/index.js"
import type {
	DownloadBatchOptions,
	DownloadBatchResult,
	RetrievalEvent,
} from "./types.js"

export const DEFAULT_CONCURRENCY = 12

type Stage = "primary" | "fallback"

/** Failures after which the fallback URL is worth a try */
function warrantsFallback(err: unknown): boolean {
	if (err instanceof RetrievalError) {
		return err.kind === "http-status" || err.kind === "unexpected-html"
	}
	return err instanceof ResolutionError
}

/** Items whose expected file is already in the folder, by name or dedup suffix */
export function partitionExisting<T extends ResolvableItem>(
	items: T[],
	folder: string,
): { pending: T[]; existing: Array<{ item: T; filename: string }> } {
	const pending: T[] = []
	const existing: Array<{ item: T; filename: string }> = []
	for (const item of items) {
		const name = item.suggestedName?.trim()
		if (name) {
			const filename = expectedFilename(item.directUrl, name)
			if (findExistingFile(folder, filename)) {
				existing.push({ item, filename })
				continue
			}
		}
		pending.push(item)
	}
	return { pending, existing }
}

export async function downloadBatch(
	ctx: RunContext,
	items: ResolvableItem[],
	targetFolder: string,
	options: DownloadBatchOptions = {},
): Promise<DownloadBatchResult> {
	const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
	const emit = (event: RetrievalEvent): void => options.onEvent?.(event)

	const result: DownloadBatchResult = {
		downloaded: [],
		failed: [],
		errors: [],
		skipped: [],
		saved: [],
	}

	await mkdir(targetFolder, { recursive: true })

	const { pending, existing } = partitionExisting(items, targetFolder)
	for (const { item, filename } of existing) {
		result.skipped.push(item.directUrl)
		emit({ type: "skip", url: item.directUrl, filename })
	}

	const limit = options.limit ?? 0
	const scheduled = limit > 0 ? pending.slice(0, limit) : pending
	if (scheduled.length < pending.length) {
		log.download.info(
			{ limit, available: pending.length },
			"limiting downloads to first items",
		)
	}

	const reservations = new PathReservations()
	const gate = pLimit(concurrency)

	const runItem = async (item: ResolvableItem, index: number): Promise<void> => {
		emit({ type: "start", url: item.directUrl, index, total: scheduled.length })
		const fallbackUrl = item.fallbackUrl?.trim() ?? ""
		const hasFallback = fallbackUrl !== "" && fallbackUrl !== item.directUrl
		let stage: Stage = "primary"

		for (;;) {
			const url = stage === "primary" ? item.directUrl : fallbackUrl
			try {
				const target = await resolveTarget(ctx, {
					url,
					structured:
						stage === "primary" && Boolean(item.cdnOrigin && item.cdnEndpoint),
					...(item.suggestedName ? { suggestedName: item.suggestedName } : {}),
					...(item.refererUrl ? { refererUrl: item.refererUrl } : {}),
				})
				const filename = deriveFilename(
					target.finalUrl,
					item.suggestedName,
					target.headers.get("content-disposition"),
				)
				const destPath = reservations.claim(targetFolder, filename)
				const bytes = await streamResponseToFile(target.response, destPath)

				result.downloaded.push(item.directUrl)
				result.saved.push({ url: item.directUrl, path: destPath, bytes })
				emit({
					type: "complete",
					url: item.directUrl,
					localPath: destPath,
					bytesDownloaded: bytes,
				})
				return
			} catch (err) {
				if (stage === "primary" && hasFallback && warrantsFallback(err)) {
					const reason = describeError(err)
					log.download.debug({ url, fallbackUrl, reason }, "trying fallback URL")
					emit({ type: "fallback", url: item.directUrl, fallbackUrl, reason })
					stage = "fallback"
					continue
				}

				const label = item.suggestedName || url
				const message = `${label}: ${describeError(err)}`
				log.download.warn({ url, error: describeError(err) }, "download failed")
				result.failed.push(item.directUrl)
				result.errors.push(message)
				emit({ type: "error", url: item.directUrl, error: message })
				return
			}
		}
	}

	await Promise.all(
		scheduled.map((item, index) => gate(() => runItem(item, index))),
	)

	log.download.info(
		{
			folder: targetFolder,
			downloaded: result.downloaded.length,
			failed: result.failed.length,
			skipped: result.skipped.length,
		},
		"batch complete",
	)
	return result
}
