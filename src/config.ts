/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"

export const DEFAULT_API_URL = "https://apidl.bunkr.ru/api/_001_v2"

export const DEFAULT_DB_FILENAME = "albums.db"

const ConfigSchema = z.object({
	concurrency: z.number().int().min(1).max(32).default(12),
	debug: z.boolean().default(false),
	/** 0 means no limit */
	limit: z.number().int().min(0).default(0),
	extraCdnHosts: z.array(z.string().min(1)).default([]),
	cdnHostsFile: z.string().optional(),
	dbPath: z.string().optional(),
	downloadsRoot: z.string().default("./downloads"),
	retryAttempts: z.number().int().min(1).max(10).default(4),
	retryBaseDelayMs: z.number().int().min(0).default(1500),
	apiUrl: z.string().url().default(DEFAULT_API_URL),
	connectTimeoutMs: z.number().int().positive().default(30_000),
	readTimeoutMs: z.number().int().positive().default(300_000),
})

export type Config = z.infer<typeof ConfigSchema>

/** Parse a partial config object, filling defaults. Throws on invalid input. */
export function parseConfig(raw: unknown): Config {
	return ConfigSchema.parse(raw)
}

const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

/**
 * Load configuration from .albumkeeperrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(
	searchDirs: string[] = [process.cwd(), homedir()],
): Config {
	const paths = searchDirs.flatMap(dir => [
		join(dir, ".albumkeeperrc"),
		join(dir, ".albumkeeperrc.json"),
	])

	for (const path of paths) {
		if (existsSync(path)) {
			try {
				const raw = readFileSync(path, "utf-8")
				const parsed: unknown = JSON.parse(raw)
				return ConfigSchema.parse(parsed)
			} catch (err) {
				// Continue to next path if invalid
				log.cli.warn(
					{ path, error: err instanceof Error ? err.message : String(err) },
					"ignoring invalid config file",
				)
			}
		}
	}

	return DEFAULT_CONFIG
}

/** Resolve the store location: explicit path, config, else ./albums.db */
export function resolveDbPath(config: Config, explicit?: string): string {
	return resolve(explicit ?? config.dbPath ?? join(process.cwd(), DEFAULT_DB_FILENAME))
}

export { DEFAULT_CONFIG }
