/**
 * Progress display for parallel downloads
 */

import ora, { type Ora } from "ora"
import type { RetrievalEvent } from "./core/types.js"
import { log } from "./logger.js"

// Global spinner reference for spinner-safe logging
let activeSpinner: Ora | null = null
let spinnerText = ""

// Mutex for serializing log operations to prevent race conditions
let logLock = Promise.resolve()

/**
 * Log a message while a spinner is active.
 * Stops the spinner, prints the message, then restarts it.
 * Uses a mutex to prevent concurrent log operations from interfering.
 */
export function spinnerSafeLog(message: string): void {
	log.cli.debug(message)

	if (activeSpinner) {
		logLock = logLock.then(
			() =>
				new Promise<void>(resolve => {
					if (activeSpinner) {
						activeSpinner.stop()
						console.log(message)
						activeSpinner.start(spinnerText)
					} else {
						console.log(message)
					}
					setImmediate(resolve)
				}),
		)
	} else {
		console.log(message)
	}
}

/**
 * Create a simple progress spinner for a single operation
 */
export function createSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet) return null
	return ora(text).start()
}

export interface BatchProgress {
	onEvent: (event: RetrievalEvent) => void
	/** Wait for queued log lines, then settle the spinner */
	finish: () => Promise<void>
}

/**
 * Spinner that counts retrieval events for one batch.
 * Fallbacks and failures are printed above the spinner as they happen.
 */
export function createBatchProgress(label: string, quiet: boolean): BatchProgress {
	let total = 0
	let completed = 0
	let failed = 0
	let skipped = 0

	const spinner = quiet ? null : ora({ text: `${label}: starting`, prefixText: "" }).start()
	activeSpinner = spinner

	const update = (): void => {
		if (!spinner) return
		spinnerText = `${label}: ${completed + failed}/${total}`
		spinner.text = spinnerText
	}

	const onEvent = (event: RetrievalEvent): void => {
		switch (event.type) {
			case "skip":
				skipped++
				break
			case "start":
				total = event.total
				update()
				break
			case "fallback":
				if (!quiet) spinnerSafeLog(`  ↻ ${event.url} → ${event.fallbackUrl}`)
				break
			case "complete":
				completed++
				update()
				break
			case "error":
				failed++
				if (!quiet) spinnerSafeLog(`  ✗ ${event.error}`)
				update()
				break
		}
	}

	const finish = async (): Promise<void> => {
		await logLock
		activeSpinner = null
		if (!spinner) return
		const skippedNote = skipped > 0 ? `, ${skipped} already present` : ""
		if (failed === 0) {
			spinner.succeed(`${label}: ${completed} downloaded${skippedNote}`)
		} else {
			spinner.warn(`${label}: ${completed} downloaded, ${failed} failed${skippedNote}`)
		}
	}

	return { onEvent, finish }
}
