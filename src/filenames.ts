/**
 * Destination naming: sanitizing, Content-Disposition parsing, collision
 * suffixes and lookup of previously saved copies.
 */

import { existsSync, readdirSync } from "node:fs"
import { extname, isAbsolute, join, posix, relative, resolve, sep } from "node:path"

const UNSAFE_CHARS = /[\\/*?:"<>|]/g

/** Replace characters that are invalid in filenames on common filesystems */
export function sanitizeFilename(name: string): string {
	return name.replace(UNSAFE_CHARS, "_").trim()
}

/** Split "clip.final.mp4" into { stem: "clip.final", ext: ".mp4" } */
export function splitExtension(filename: string): { stem: string; ext: string } {
	const ext = extname(filename)
	return { stem: ext ? filename.slice(0, -ext.length) : filename, ext }
}

/** Last path segment of a URL, percent-decoded. Empty for unparsable URLs. */
export function urlBasename(url: string): string {
	try {
		const base = posix.basename(new URL(url).pathname)
		try {
			return decodeURIComponent(base)
		} catch {
			return base
		}
	} catch {
		return ""
	}
}

/**
 * Extract a filename from a Content-Disposition header.
 * Prefers RFC 5987 `filename*`, then quoted `filename=`, then a bare token.
 */
export function contentDispositionFilename(
	header: string | null | undefined,
): string | undefined {
	if (!header) return undefined

	const extended = header.match(/filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i)
	if (extended?.[2]) {
		const raw = extended[2].trim()
		try {
			return decodeURIComponent(raw)
		} catch {
			return raw
		}
	}

	const quoted = header.match(/filename\s*=\s*"([^"]+)"/i)
	if (quoted?.[1]) return quoted[1]

	const bare = header.match(/filename\s*=\s*([^;]+)/i)
	const value = bare?.[1]?.trim()
	return value || undefined
}

/**
 * Choose the on-disk name for a download: suggested name, else the
 * Content-Disposition filename, else the URL basename. The result is
 * sanitized and gains the URL's extension when it has none.
 */
export function deriveFilename(
	url: string,
	suggestedName?: string,
	contentDisposition?: string | null,
): string {
	const urlName = urlBasename(url)
	const chosen =
		suggestedName?.trim() ||
		contentDispositionFilename(contentDisposition) ||
		urlName ||
		"download"

	let filename = sanitizeFilename(chosen)
	const urlExt = extname(urlName)
	if (!extname(filename) && urlExt) {
		filename += urlExt
	}
	return filename
}

/** The name a download of this item would be saved under, before any dedup suffix */
export function expectedFilename(url: string, suggestedName?: string): string {
	return deriveFilename(url, suggestedName)
}

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Find a saved copy of `filename` in `folder`, either exactly or under a
 * collision suffix ("name (2).ext"). Suffixed matches are returned in name order.
 */
export function findExistingFile(
	folder: string,
	filename: string,
): string | undefined {
	if (!filename) return undefined
	const exact = join(folder, filename)
	if (existsSync(exact)) return exact

	let entries: string[]
	try {
		entries = readdirSync(folder)
	} catch {
		return undefined
	}

	const { stem, ext } = splitExtension(filename)
	const pattern = new RegExp(`^${escapeRegex(stem)} \\(\\d+\\)${escapeRegex(ext)}$`)
	const match = entries.filter(name => pattern.test(name)).sort()[0]
	return match ? join(folder, match) : undefined
}

/**
 * Hands out collision-free destination paths for one run.
 * A path counts as taken when it exists on disk or was already claimed.
 */
export class PathReservations {
	private readonly claimed = new Set<string>()

	claim(folder: string, filename: string): string {
		const { stem, ext } = splitExtension(filename)
		let candidate = join(folder, filename)
		let n = 1
		while (this.claimed.has(candidate) || existsSync(candidate)) {
			candidate = join(folder, `${stem} (${n})${ext}`)
			n++
		}
		this.claimed.add(candidate)
		return candidate
	}
}

/** True when `child` lies strictly below `root` once both are resolved */
export function isPathInside(child: string, root: string): boolean {
	const rel = relative(resolve(root), resolve(child))
	if (rel === "" || isAbsolute(rel)) return false
	return rel.split(sep)[0] !== ".."
}
