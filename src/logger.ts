/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue
 * - info: Key milestones (default)
 * - debug: Per-request and per-hop detail (--debug)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const envLevel = process.env["LOG_LEVEL"]
let level = envLevel || "info"

// Use pino-pretty for interactive terminals, raw JSON for pipes/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** Raise the level to debug unless LOG_LEVEL pins it */
	debug?: boolean
	/** Redirect output to this file instead of stdout */
	logFilePath?: string
}

let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// The CLI may exit right after a failure; async destinations can drop lines.
	const destination = pino.destination({ dest: path, sync: true })
	return pino(
		{
			level: process.env["LOG_LEVEL_FILE"] ?? level,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

/** Apply CLI/config logging options to the root logger. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	const nextLevel = envLevel || (options.debug ? "debug" : "info")
	const nextPath = options.logFilePath ?? null

	if (nextLevel === level && nextPath === currentLogFilePath) {
		return { logFilePath: currentLogFilePath }
	}

	level = nextLevel
	currentLogFilePath = nextPath
	logger = nextPath ? createFileLogger(nextPath) : createConsoleLogger()
	return { logFilePath: currentLogFilePath }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("resolve")
 * log.debug({ url, hop }, "following next hop")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get fetch() {
		return createLogger("fetch")
	},
	get resolve() {
		return createLogger("resolve")
	},
	get download() {
		return createLogger("download")
	},
	get store() {
		return createLogger("store")
	},
	get policy() {
		return createLogger("policy")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
