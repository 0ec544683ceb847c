/**
 * Unit tests for album page parsing
 *
 * The embedded data blob (with its relaxed syntax), the card markup
 * fallback, album names and pagination markers.
 */

import { describe, it, expect } from "vitest"
import {
	extractAlbumFiles,
	extractAlbumName,
	hasPaginationMarkers,
	isSingleFileUrl,
	itemFromUrl,
	itemsFromAlbumData,
	itemsFromMarkup,
	normalizeAlbumJson,
	parseItemLink,
	summarizeItems,
} from "../../src/core/album-parse.js"
import { parseMarkup } from "../../src/core/markup.js"

const ALBUM_VIEW = "https://bunkr.test/a/trip?advanced=1"

const BLOB_PAGE = `<!doctype html>
<html><head><title>Summer Trip | Bunkr</title></head>
<body>
<div class="flex sm:text-lg"><h1>Summer Trip</h1></div>
<script>var unrelated = 1;</script>
<script>
window.albumFiles = [
{
slug: "s1",
name: "one.jpg",
original: "beach.jpg",
type: "image/jpeg",
size: 2048,
cdnEndpoint: "/data/beach.jpg",
thumbnail: "https://i-cdn.bunkr.test/thumbs/beach.png",
},
{
slug: "s2",
name: "clip.mp4",
type: "video/mp4",
size: "1000",
},
{
name: "no slug, dropped",
},
];
</script>
</body></html>`

const MARKUP_PAGE = `<html><head><title>Cards - bunkr</title></head><body>
<div class="grid-images">
	<div class="theItem">
		<a href="/f/img1"><img src="/t1.jpg"></a>
		<div class="grid-images_box-txt"><p>First.jpg</p><p>1 MB</p></div>
	</div>
	<div class="theItem">
		<a href="/v/vid2"></a>
		<div class="grid-videos_box-txt"><p>Second.mp4</p></div>
	</div>
	<div class="theItem">
		<a href="https://bunkr.test/f/img1"></a>
		<div class="grid-images_box-txt"><p>Duplicate.jpg</p></div>
	</div>
	<div class="theItem">
		<a href="/about"></a>
		<div class="grid-images_box-txt"><p>Not an item</p></div>
	</div>
</div>
</body></html>`

describe("item links", () => {
	it("recognizes /f/, /i/ and /v/ links", () => {
		expect(parseItemLink("https://bunkr.test/f/Ab12")).toEqual({ kind: "f", id: "Ab12" })
		expect(parseItemLink("https://bunkr.test/v/xyz")).toEqual({ kind: "v", id: "xyz" })
		expect(isSingleFileUrl("https://bunkr.test/i/9")).toBe(true)
		expect(isSingleFileUrl("https://bunkr.test/a/trip")).toBe(false)
	})

	it("builds a descriptor for a single item URL", () => {
		expect(itemFromUrl(" https://bunkr.test/f/Ab12 ")).toEqual({
			source: "item-url",
			itemKey: "Ab12",
			slug: "Ab12",
			originalName: "",
			suggestedName: "",
			mediaType: "",
			directUrl: "https://bunkr.test/f/Ab12",
			fallbackUrl: "https://bunkr.test/f/Ab12",
			refererUrl: "https://bunkr.test/",
		})
		expect(itemFromUrl("https://bunkr.test/a/trip")).toBeUndefined()
	})
})

describe("normalizeAlbumJson", () => {
	it("quotes bare keys, drops trailing commas and unescapes quotes", () => {
		const raw = `[
  {
    slug: "s1",
    original: "it\\'s.jpg",
    cdnEndpoint: "/v/s1.jpg",
  },
]`
		expect(JSON.parse(normalizeAlbumJson(raw))).toEqual([
			{ slug: "s1", original: "it's.jpg", cdnEndpoint: "/v/s1.jpg" },
		])
	})

	it("doubles backslashes that do not start a JSON escape", () => {
		const raw = String.raw`[{"name": "a\d", "line": "x\ny"}]`
		expect(JSON.parse(normalizeAlbumJson(raw))).toEqual([{ name: "a\\d", line: "x\ny" }])
	})
})

describe("album data blob", () => {
	it("turns blob entries into descriptors", () => {
		const root = parseMarkup(BLOB_PAGE)
		const items = itemsFromAlbumData(extractAlbumFiles(root), {
			origin: "https://bunkr.test",
			refererUrl: ALBUM_VIEW,
		})

		expect(items).toEqual([
			{
				source: "album-data",
				itemKey: "s1",
				slug: "s1",
				originalName: "beach.jpg",
				suggestedName: "beach.jpg",
				mediaType: "image/jpeg",
				sizeBytes: 2048,
				directUrl: "https://i-cdn.bunkr.test/data/beach.jpg",
				fallbackUrl: "https://bunkr.test/f/s1",
				refererUrl: ALBUM_VIEW,
				cdnOrigin: "https://i-cdn.bunkr.test",
				cdnEndpoint: "/data/beach.jpg",
				thumbnailUrl: "https://i-cdn.bunkr.test/thumbs/beach.png",
			},
			{
				source: "album-data",
				itemKey: "s2",
				slug: "s2",
				originalName: "clip.mp4",
				suggestedName: "clip.mp4",
				mediaType: "video/mp4",
				sizeBytes: 1000,
				directUrl: "https://bunkr.test/f/s2",
				fallbackUrl: "https://bunkr.test/f/s2",
				refererUrl: ALBUM_VIEW,
			},
		])
	})

	it("uses the album origin as CDN origin when there is no thumbnail", () => {
		const items = itemsFromAlbumData([{ slug: "s3", cdnEndpoint: "/data/x.png" }], {
			origin: "https://bunkr.test",
			refererUrl: ALBUM_VIEW,
		})
		expect(items[0]?.cdnOrigin).toBe("https://bunkr.test")
		expect(items[0]?.directUrl).toBe("https://bunkr.test/data/x.png")
	})

	it("skips scripts whose blob does not parse", () => {
		const root = parseMarkup(
			`<script>window.albumFiles = [{ slug: "s1", name: }];</script>
			<script>window.albumFiles = [{ "slug": "s9" }];</script>`,
		)
		expect(extractAlbumFiles(root)).toEqual([{ slug: "s9" }])
	})

	it("returns nothing when no blob is present", () => {
		expect(extractAlbumFiles(parseMarkup(MARKUP_PAGE))).toEqual([])
	})
})

describe("card markup", () => {
	it("collects item links by (kind, id), images first", () => {
		const items = itemsFromMarkup(parseMarkup(MARKUP_PAGE), {
			baseUrl: ALBUM_VIEW,
			refererUrl: ALBUM_VIEW,
		})

		expect(items).toEqual([
			{
				source: "album-markup",
				itemKey: "img1",
				slug: "img1",
				originalName: "First.jpg",
				suggestedName: "First.jpg",
				mediaType: "image",
				directUrl: "https://bunkr.test/f/img1",
				fallbackUrl: "https://bunkr.test/f/img1",
				refererUrl: ALBUM_VIEW,
			},
			{
				source: "album-markup",
				itemKey: "https://bunkr.test/v/vid2",
				slug: "",
				originalName: "Second.mp4",
				suggestedName: "Second.mp4",
				mediaType: "video",
				directUrl: "https://bunkr.test/v/vid2",
				fallbackUrl: "https://bunkr.test/v/vid2",
				refererUrl: ALBUM_VIEW,
			},
		])
	})

	it("falls back to the first link inside the card's parent", () => {
		const root = parseMarkup(
			`<div class="card"><span><a href="/i/pic7">thumb</a></span>
			<div class="grid-images_box-txt"><p>Pic</p></div></div>`,
		)
		const items = itemsFromMarkup(root, { baseUrl: ALBUM_VIEW, refererUrl: ALBUM_VIEW })
		expect(items.map(item => item.directUrl)).toEqual(["https://bunkr.test/i/pic7"])
	})
})

describe("album name", () => {
	it("reads the header h1", () => {
		expect(extractAlbumName(parseMarkup(BLOB_PAGE))).toBe("Summer Trip")
	})

	it("falls back to the title without the site suffix", () => {
		expect(extractAlbumName(parseMarkup(MARKUP_PAGE))).toBe("Cards")
	})

	it("is undefined when the page names nothing", () => {
		expect(extractAlbumName(parseMarkup("<p>hi</p>"))).toBeUndefined()
	})
})

describe("hasPaginationMarkers", () => {
	it("detects page links and pagination classes", () => {
		expect(hasPaginationMarkers(parseMarkup('<a href="?page=2">2</a>'))).toBe(true)
		expect(hasPaginationMarkers(parseMarkup('<nav class="pagination-wrap"></nav>'))).toBe(true)
		expect(hasPaginationMarkers(parseMarkup(MARKUP_PAGE))).toBe(false)
	})
})

describe("summarizeItems", () => {
	it("counts categories and sums known sizes", () => {
		const root = parseMarkup(BLOB_PAGE)
		const items = itemsFromAlbumData(extractAlbumFiles(root), {
			origin: "https://bunkr.test",
			refererUrl: ALBUM_VIEW,
		})
		expect(summarizeItems(items)).toEqual({
			images: 1,
			videos: 1,
			archives: 0,
			other: 0,
			total: 2,
			totalBytes: 3048,
		})
	})
})
