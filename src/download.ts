/**
 * Streaming a resolved response to disk.
 *
 * - Streams directly to disk (no memory buffering)
 * - Writes to a .part file and renames on completion
 * - Removes the .part file when the stream fails
 */

import {
	createWriteStream,
	existsSync,
	renameSync,
	statSync,
	unlinkSync,
} from "node:fs"
import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import type { Response } from "undici"
import { RetrievalError } from "./errors.js"
import { log } from "./logger.js"

/** Write buffer size for media streams */
export const CHUNK_SIZE = 64 * 1024

/**
 * Get the .part file path for a destination
 */
export function getPartPath(destPath: string): string {
	return `${destPath}.part`
}

/**
 * Clean up a .part file
 */
function cleanupPartFile(partPath: string): void {
	try {
		if (existsSync(partPath)) {
			unlinkSync(partPath)
		}
	} catch (err) {
		log.download.warn(
			{ partPath, error: err instanceof Error ? err.message : String(err) },
			"could not remove partial file",
		)
	}
}

/**
 * Stream a response body to `destPath` through `<destPath>.part`.
 * Returns the number of bytes written.
 */
export async function streamResponseToFile(
	response: Response,
	destPath: string,
): Promise<number> {
	if (!response.body) {
		throw new RetrievalError("No response body", "transport", response.url)
	}

	await mkdir(dirname(destPath), { recursive: true })
	const partPath = getPartPath(destPath)

	try {
		const fileStream = createWriteStream(partPath, {
			flags: "w",
			highWaterMark: CHUNK_SIZE,
		})
		await pipeline(
			Readable.fromWeb(response.body, { highWaterMark: CHUNK_SIZE }),
			fileStream,
		)
	} catch (err) {
		cleanupPartFile(partPath)
		throw new RetrievalError(
			err instanceof Error ? err.message : String(err),
			"transport",
			response.url,
			response.status,
			{ cause: err },
		)
	}

	const bytes = statSync(partPath).size
	renameSync(partPath, destPath)
	log.download.debug({ destPath, bytes }, "saved")
	return bytes
}
