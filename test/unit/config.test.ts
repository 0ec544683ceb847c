import { writeFileSync } from "node:fs"
import { join, resolve } from "node:path"
import { describe, it, expect } from "vitest"
import {
	DEFAULT_API_URL,
	DEFAULT_CONFIG,
	loadConfig,
	parseConfig,
	resolveDbPath,
} from "../../src/config.js"
import { withTempDir } from "../helpers/index.js"

describe("parseConfig", () => {
	it("fills defaults", () => {
		const config = parseConfig({})
		expect(config.concurrency).toBe(12)
		expect(config.limit).toBe(0)
		expect(config.retryAttempts).toBe(4)
		expect(config.apiUrl).toBe(DEFAULT_API_URL)
		expect(config.extraCdnHosts).toEqual([])
	})

	it("rejects out-of-range values", () => {
		expect(() => parseConfig({ concurrency: 0 })).toThrow()
		expect(() => parseConfig({ apiUrl: "not a url" })).toThrow()
	})
})

describe("loadConfig", () => {
	it("reads the first rc file found", async () => {
		await withTempDir(dir => {
			writeFileSync(join(dir, ".albumkeeperrc"), JSON.stringify({ concurrency: 3, limit: 5 }))
			const config = loadConfig([dir])
			expect(config.concurrency).toBe(3)
			expect(config.limit).toBe(5)
		})
	})

	it("falls back to the .json variant and skips invalid files", async () => {
		await withTempDir(dir => {
			writeFileSync(join(dir, ".albumkeeperrc"), "{ not json")
			writeFileSync(join(dir, ".albumkeeperrc.json"), JSON.stringify({ debug: true }))
			expect(loadConfig([dir]).debug).toBe(true)
		})
	})

	it("returns defaults when nothing is found", async () => {
		await withTempDir(dir => {
			expect(loadConfig([dir])).toEqual(DEFAULT_CONFIG)
		})
	})
})

describe("resolveDbPath", () => {
	it("prefers the explicit path, then the config", () => {
		const config = parseConfig({ dbPath: "from-config.db" })
		expect(resolveDbPath(config, "explicit.db")).toBe(resolve("explicit.db"))
		expect(resolveDbPath(config)).toBe(resolve("from-config.db"))
		expect(resolveDbPath(parseConfig({}))).toBe(resolve("albums.db"))
	})
})
