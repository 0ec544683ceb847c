/**
 * Shared type definitions for album-keeper
 */

// ─────────────────────────────────────────────────────────────────────────────
// Items
// ─────────────────────────────────────────────────────────────────────────────

/** Which album fetch strategy produced an item */
export type ItemSource = "album-data" | "album-markup" | "item-url"

/**
 * One media item observed in an album listing.
 *
 * All URL fields are absolute. Optional string fields that the album page did
 * not carry are empty strings; the optional properties are the ones the
 * listing may not know at all.
 */
export interface ItemDescriptor {
	source: ItemSource
	/** Stable per-album identity: slug, else fallback URL, else direct URL */
	itemKey: string
	slug: string
	originalName: string
	suggestedName: string
	/** MIME type or coarse category reported by the site */
	mediaType: string
	sizeBytes?: number
	directUrl: string
	fallbackUrl: string
	refererUrl: string
	cdnOrigin?: string
	cdnEndpoint?: string
	thumbnailUrl?: string
}

/**
 * The subset of a descriptor the retrieval scheduler needs.
 * ItemDescriptor satisfies it structurally.
 */
export interface ResolvableItem {
	directUrl: string
	suggestedName?: string
	refererUrl?: string
	fallbackUrl?: string
	cdnOrigin?: string
	cdnEndpoint?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Media categories
// ─────────────────────────────────────────────────────────────────────────────

export type MediaCategory = "image" | "video" | "archive" | "other"

export interface ItemSummary {
	images: number
	videos: number
	archives: number
	other: number
	total: number
	totalBytes: number
}

const ARCHIVE_TOKENS = ["zip", "rar", "7z", "tar", "gzip", "xz"]

/**
 * Bucket a site-reported media type into a display category.
 * Accepts either a MIME type ("video/mp4") or a bare word ("video").
 */
export function categorizeMediaType(mediaType: string): MediaCategory {
	const value = mediaType.trim().toLowerCase()
	if (value.startsWith("image") || value === "picture") return "image"
	if (value.startsWith("video")) return "video"
	if (ARCHIVE_TOKENS.some(token => value.includes(token))) return "archive"
	return "other"
}
