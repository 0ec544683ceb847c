import { afterEach, describe, it, expect } from "vitest"
import { ResolutionError } from "../../src/errors.js"
import {
	appendNameParam,
	decryptApiUrl,
	decryptionKey,
	resolveFileId,
} from "../../src/core/resolver/api.js"
import { createMockSite, JSON_TYPE, type MockSite } from "../helpers/index.js"

const TIMESTAMP = 1700000000

/** The server side of the exchange: XOR with the hour key, then base64 */
function encryptUrl(url: string, timestamp: number): string {
	const data = Buffer.from(url, "utf8")
	const key = Buffer.from(decryptionKey(timestamp), "utf8")
	const out = Buffer.alloc(data.length)
	for (let i = 0; i < data.length; i++) {
		out[i] = (data[i] ?? 0) ^ (key[i % key.length] ?? 0)
	}
	return out.toString("base64")
}

let site: MockSite | undefined

afterEach(async () => {
	await site?.close()
	site = undefined
})

describe("decryptionKey", () => {
	it("buckets the timestamp by hour", () => {
		expect(decryptionKey(TIMESTAMP)).toBe("SECRET_KEY_472222")
		expect(decryptionKey(3599)).toBe("SECRET_KEY_0")
		expect(decryptionKey(3600)).toBe("SECRET_KEY_1")
	})
})

describe("decryptApiUrl", () => {
	it("reverses the XOR encoding", () => {
		const url = "https://media-files.bunkr.test/clip-AbC123.mp4"
		expect(decryptApiUrl(encryptUrl(url, TIMESTAMP), TIMESTAMP)).toBe(url)
	})

	it("produces garbage for the wrong hour", () => {
		const url = "https://media-files.bunkr.test/clip.mp4"
		expect(decryptApiUrl(encryptUrl(url, TIMESTAMP), TIMESTAMP + 3600)).not.toBe(url)
	})
})

describe("appendNameParam", () => {
	it("adds an encoded name", () => {
		expect(appendNameParam("https://cdn.test/a.mp4", "My Clip.mp4")).toBe(
			"https://cdn.test/a.mp4?n=My%20Clip.mp4",
		)
		expect(appendNameParam("https://cdn.test/a.mp4?x=1", "b.mp4")).toBe(
			"https://cdn.test/a.mp4?x=1&n=b.mp4",
		)
	})

	it("keeps an existing name parameter", () => {
		expect(appendNameParam("https://cdn.test/a.mp4?n=keep", "b.mp4")).toBe(
			"https://cdn.test/a.mp4?n=keep",
		)
		expect(appendNameParam("https://cdn.test/a.mp4", undefined)).toBe("https://cdn.test/a.mp4")
	})
})

describe("resolveFileId", () => {
	it("posts the id and decrypts the answer", async () => {
		site = createMockSite()
		const url = "https://media-files.bunkr.test/clip-AbC123.mp4"
		site
			.pool("https://api.bunkr.test")
			.intercept({
				path: "/api/_001_v2",
				method: "POST",
				body: JSON.stringify({ id: "AbC123" }),
				headers: {
					origin: "https://get.bunkrr.su",
					referer: "https://get.bunkrr.su/file/AbC123",
				},
			})
			.reply(
				200,
				{ encrypted: true, timestamp: TIMESTAMP, url: encryptUrl(url, TIMESTAMP) },
				{ headers: JSON_TYPE },
			)

		await expect(resolveFileId(site.ctx, "AbC123", "holiday.mp4")).resolves.toBe(
			`${url}?n=holiday.mp4`,
		)
	})

	it("accepts a string timestamp", async () => {
		site = createMockSite()
		const url = "https://media-files.bunkr.test/x.jpg"
		site
			.pool("https://api.bunkr.test")
			.intercept({ path: "/api/_001_v2", method: "POST" })
			.reply(
				200,
				{ encrypted: true, timestamp: String(TIMESTAMP), url: encryptUrl(url, TIMESTAMP) },
				{ headers: JSON_TYPE },
			)

		await expect(resolveFileId(site.ctx, "x1")).resolves.toBe(url)
	})

	it("rejects unencrypted answers", async () => {
		site = createMockSite()
		site
			.pool("https://api.bunkr.test")
			.intercept({ path: "/api/_001_v2", method: "POST" })
			.reply(200, { encrypted: false, timestamp: TIMESTAMP, url: "x" }, { headers: JSON_TYPE })

		const error = await resolveFileId(site.ctx, "x1").catch((err: unknown) => err)
		expect(error).toBeInstanceOf(ResolutionError)
		expect(error instanceof ResolutionError ? error.kind : "").toBe("api-failure")
	})

	it("reports a decrypted value that is not a URL", async () => {
		site = createMockSite()
		site
			.pool("https://api.bunkr.test")
			.intercept({ path: "/api/_001_v2", method: "POST" })
			.reply(
				200,
				{ encrypted: true, timestamp: TIMESTAMP, url: encryptUrl("not a url", TIMESTAMP) },
				{ headers: JSON_TYPE },
			)

		const error = await resolveFileId(site.ctx, "x1").catch((err: unknown) => err)
		expect(error instanceof ResolutionError ? error.kind : "").toBe("decrypt-failure")
	})

	it("reports HTTP failures as api-failure", async () => {
		site = createMockSite()
		site
			.pool("https://api.bunkr.test")
			.intercept({ path: "/api/_001_v2", method: "POST" })
			.reply(500, "")

		const error = await resolveFileId(site.ctx, "x1").catch((err: unknown) => err)
		expect(error instanceof ResolutionError ? error.message : "").toBe(
			"API answered HTTP 500 for file x1",
		)
	})
})
