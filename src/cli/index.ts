#!/usr/bin/env node
/**
 * album-keeper CLI
 * Download albums, keep them in sync with upstream and manage what is kept locally
 */

import { Command } from "commander"
import { z } from "zod"
import { loadConfig, parseConfig, resolveDbPath, type Config } from "../config.js"
import { isSingleFileUrl, summarizeItems } from "../core/album-parse.js"
import {
	downloadItemUrls,
	readAlbumUrls,
	runAlbum,
	syncAlbumOnly,
	type AlbumRunOptions,
	type AlbumRunResult,
} from "../core/album-run.js"
import { createRunContext, type RunContext } from "../core/context.js"
import type { ManagedAlbum } from "../db/schema.js"
import { describeError } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { createBatchProgress, createSpinner, type BatchProgress } from "../parallel.js"
import {
	addManagedAlbum,
	deleteMedia,
	findManagedAlbum,
	getManagedAlbums,
	listMedia,
	removeManagedAlbum,
	setEnabled,
	setRemovePolicy,
} from "../store.js"
import { ui } from "../ui.js"

const VERSION = "1.0.0"

// ─────────────────────────────────────────────────────────────────────────────
// Shared options
// ─────────────────────────────────────────────────────────────────────────────

const intOption = z.coerce.number().int()

const GlobalOptionsSchema = z.object({
	dbPath: z.string().optional(),
	jobs: intOption.min(1).max(32).optional(),
	limit: intOption.min(0).optional(),
	debug: z.boolean().default(false),
	logFile: z.string().optional(),
	quiet: z.boolean().default(false),
	cdnHost: z.array(z.string()).default([]),
})

const OutputOptionsSchema = z.object({
	output: z.string().optional(),
	sync: z.boolean().default(true),
	deleteRemoved: z.boolean().default(false),
})

interface Session {
	config: Config
	ctx: RunContext
	dbPath: string
	quiet: boolean
}

let interrupted = false

function collect(value: string, previous: string[]): string[] {
	return [...previous, value]
}

function parseId(raw: string): number {
	const id = Number(raw)
	if (!Number.isInteger(id) || id <= 0) {
		throw new Error(`Invalid ID: ${raw}`)
	}
	return id
}

/** Build the config, logger and run context from file config plus flags */
function openSession(command: Command): Session {
	const options = GlobalOptionsSchema.parse(command.optsWithGlobals())
	const fileConfig = loadConfig()
	const config = parseConfig({
		...fileConfig,
		debug: options.debug || fileConfig.debug,
		...(options.jobs !== undefined ? { concurrency: options.jobs } : {}),
		...(options.limit !== undefined ? { limit: options.limit } : {}),
		extraCdnHosts: [...fileConfig.extraCdnHosts, ...options.cdnHost],
	})

	configureLogging({
		debug: config.debug,
		...(options.logFile ? { logFilePath: options.logFile } : {}),
	})

	return {
		config,
		ctx: createRunContext(config),
		dbPath: resolveDbPath(config, options.dbPath),
		quiet: options.quiet,
	}
}

async function finish(failed: boolean): Promise<void> {
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Could not flush logs: ${describeError(err)}`)
	}
	if (failed && !process.exitCode) process.exitCode = 1
}

function expandUrls(inputs: string[]): string[] {
	return inputs.flatMap(input => readAlbumUrls(input))
}

/** A managed album by numeric id or by its URL */
function findManagedByRef(dbPath: string, ref: string): ManagedAlbum | undefined {
	if (/^\d+$/.test(ref)) return findManagedAlbum(dbPath, Number(ref))
	return getManagedAlbums(dbPath, false).find(album => album.albumUrl === ref.trim())
}

// ─────────────────────────────────────────────────────────────────────────────
// Album runs
// ─────────────────────────────────────────────────────────────────────────────

interface AlbumJob {
	url: string
	label: string
	options: Pick<AlbumRunOptions, "parentFolder" | "targetFolder" | "deleteOnRemove">
	/** Skip the store entirely */
	noStore?: boolean
}

interface RunTotals {
	downloaded: number
	failed: number
	errors: string[]
}

async function runAlbums(
	session: Session,
	jobs: AlbumJob[],
	metadataOnly: boolean,
): Promise<RunTotals> {
	const totals: RunTotals = { downloaded: 0, failed: 0, errors: [] }

	for (const job of jobs) {
		if (interrupted) {
			totals.errors.push(`${job.url}: skipped after interrupt`)
			continue
		}
		ui.header(job.label)

		const spinner = createSpinner(`Fetching ${job.url}`, session.quiet)
		// Started once the listing is in, so only one spinner runs at a time
		const batch: { progress?: BatchProgress } = {}

		const options: AlbumRunOptions = {
			ctx: session.ctx,
			concurrency: session.config.concurrency,
			limit: session.config.limit,
			...job.options,
			...(job.noStore ? {} : { dbPath: session.dbPath }),
			onEvent: event => batch.progress?.onEvent(event),
			onFetched: (album, targetFolder) => {
				spinner?.stop()
				if (!session.quiet) {
					ui.info(`${album.albumName ?? album.albumUrl} → ${targetFolder}`)
					ui.itemCounts(summarizeItems(album.items))
				}
				if (!metadataOnly) batch.progress = createBatchProgress("Downloading", session.quiet)
			},
		}

		let result: AlbumRunResult | undefined
		try {
			result = metadataOnly
				? await syncAlbumOnly(job.url, { ...options, dbPath: session.dbPath })
				: await runAlbum(job.url, options)
		} catch (err) {
			log.cli.error({ url: job.url, error: describeError(err) }, "album run failed")
			totals.errors.push(`${job.url}: ${describeError(err)}`)
		} finally {
			spinner?.stop()
			await batch.progress?.finish()
		}

		if (!result) continue
		if (!session.quiet) ui.albumState(result)
		totals.downloaded += result.download?.downloaded.length ?? 0
		totals.failed += result.download?.failed.length ?? 0
		totals.errors.push(...result.errors)
	}

	return totals
}

async function reportTotals(totals: RunTotals, metadataOnly: boolean): Promise<void> {
	if (metadataOnly) {
		for (const error of totals.errors) ui.error(error)
	} else {
		ui.runSummary(totals.downloaded, totals.failed, totals.errors)
	}
	const ok = totals.failed === 0 && totals.errors.length === 0
	ui.finalStatus(ok)
	await finish(!ok)
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program.enablePositionalOptions()

program
	.name("album-keeper")
	.version(VERSION)
	.description("Download media albums and keep local copies in sync with upstream")
	.option("--db-path <path>", "SQLite state file (default: ./albums.db)")
	.option("-j, --jobs <number>", "Number of parallel downloads")
	.option("--limit <number>", "Download at most this many items per album (0 = all)")
	.option("--cdn-host <host>", "Extra CDN host to probe (repeatable)", collect, [])
	.option("--debug", "Debug logging", false)
	.option("--log-file <path>", "Write logs to a file instead of the terminal")
	.option("-q, --quiet", "Minimal output", false)

program
	.command("download")
	.description("Download albums (URLs, comma-separated lists or a file of URLs)")
	.argument("<urls...>", "Album URLs or a file with one URL per line")
	.option("-o, --output <dir>", "Parent folder; each album gets its own subfolder")
	.option("--no-sync", "Do not record the albums in the state file")
	.option("--delete-removed", "Delete local copies of items removed upstream", false)
	.action(async (inputs: string[], rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const options = OutputOptionsSchema.parse(rawOptions)
		const parentFolder = options.output ?? session.config.downloadsRoot
		const urls = expandUrls(inputs)

		const singles = urls.filter(isSingleFileUrl)
		for (const url of singles) {
			ui.error(`${url} is a single item link; use the "item" command`)
		}

		const jobs: AlbumJob[] = urls
			.filter(url => !isSingleFileUrl(url))
			.map(url => ({
				url,
				label: url,
				options: { parentFolder, deleteOnRemove: options.deleteRemoved },
				noStore: !options.sync,
			}))

		const totals = await runAlbums(session, jobs, false)
		totals.errors.push(...singles.map(url => `${url}: not an album link`))
		await reportTotals(totals, false)
	})

program
	.command("sync")
	.description("Record album contents in the state file without downloading")
	.argument("<urls...>", "Album URLs or a file with one URL per line")
	.option("-o, --output <dir>", "Parent folder the albums were downloaded to")
	.option("--delete-removed", "Delete local copies of items removed upstream", false)
	.action(async (inputs: string[], rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const options = OutputOptionsSchema.parse(rawOptions)
		const parentFolder = options.output ?? session.config.downloadsRoot

		const jobs: AlbumJob[] = expandUrls(inputs).map(url => ({
			url,
			label: url,
			options: { parentFolder, deleteOnRemove: options.deleteRemoved },
		}))
		const totals = await runAlbums(session, jobs, true)
		await reportTotals(totals, true)
	})

program
	.command("item")
	.description("Download single item pages (/f/, /i/ or /v/ links)")
	.argument("<urls...>", "Item URLs")
	.option("-o, --output <dir>", "Folder to save into")
	.action(async (inputs: string[], rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const options = OutputOptionsSchema.parse(rawOptions)
		const progress = createBatchProgress("Downloading", session.quiet)

		const result = await downloadItemUrls(expandUrls(inputs), {
			ctx: session.ctx,
			concurrency: session.config.concurrency,
			targetFolder: options.output ?? session.config.downloadsRoot,
			onEvent: progress.onEvent,
		})
		await progress.finish()

		await reportTotals(
			{
				downloaded: result.downloaded.length,
				failed: result.failed.length,
				errors: result.errors,
			},
			false,
		)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Managed albums
// ─────────────────────────────────────────────────────────────────────────────

const managed = program.command("managed").description("Albums kept in sync with a fixed folder")

managed
	.command("add")
	.description("Register an album (or update its registration)")
	.argument("<url>", "Album URL")
	.requiredOption("--folder <dir>", "Folder the album is mirrored into")
	.option("--label <label>", "Display label (default: the URL)")
	.option("--delete-removed", "Delete local copies of items removed upstream", false)
	.option("--disabled", "Register without enabling", false)
	.action(async (url: string, rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const options = z
			.object({
				folder: z.string(),
				label: z.string().optional(),
				deleteRemoved: z.boolean(),
				disabled: z.boolean(),
			})
			.parse(rawOptions)

		if (isSingleFileUrl(url)) {
			ui.error(`${url} is a single item link, not an album`)
			await finish(true)
			return
		}

		const album = addManagedAlbum(session.dbPath, {
			albumUrl: url,
			targetFolder: options.folder,
			deleteLocalOnRemoteRemove: options.deleteRemoved,
			enabled: !options.disabled,
			...(options.label ? { albumLabel: options.label } : {}),
		})
		ui.success(`Managed album [${album.id}] ${album.albumLabel} → ${album.targetFolder}`)
		await finish(false)
	})

managed
	.command("list")
	.description("List managed albums")
	.option("--all", "Include disabled albums", false)
	.action(async (rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const { all } = z.object({ all: z.boolean() }).parse(rawOptions)
		ui.managedAlbums(getManagedAlbums(session.dbPath, !all))
		await finish(false)
	})

managed
	.command("remove")
	.description("Unregister a managed album (local files are kept)")
	.argument("<id>", "Managed album ID")
	.action(async (rawId: string, _options: unknown, command: Command) => {
		const session = openSession(command)
		const id = parseId(rawId)
		const removed = removeManagedAlbum(session.dbPath, id)
		if (removed) ui.success(`Removed managed album ${id}`)
		else ui.error(`Managed album ${id} not found`)
		await finish(!removed)
	})

managed
	.command("policy")
	.description("Choose what happens to local copies of items removed upstream")
	.argument("<id>", "Managed album ID")
	.argument("<policy>", "keep or delete")
	.action(async (rawId: string, rawPolicy: string, _options: unknown, command: Command) => {
		const session = openSession(command)
		const id = parseId(rawId)
		const policy = z.enum(["keep", "delete"]).parse(rawPolicy)
		const changed = setRemovePolicy(session.dbPath, id, policy === "delete")
		if (changed) ui.success(`Managed album ${id}: ${policy} local copies on upstream removal`)
		else ui.error(`Managed album ${id} not found`)
		await finish(!changed)
	})

for (const [name, enabled] of [
	["enable", true],
	["disable", false],
] as const) {
	managed
		.command(name)
		.description(`${enabled ? "Enable" : "Disable"} a managed album`)
		.argument("<id>", "Managed album ID")
		.action(async (rawId: string, _options: unknown, command: Command) => {
			const session = openSession(command)
			const id = parseId(rawId)
			const changed = setEnabled(session.dbPath, id, enabled)
			if (changed) ui.success(`Managed album ${id} ${name}d`)
			else ui.error(`Managed album ${id} not found`)
			await finish(!changed)
		})
}

managed
	.command("sync")
	.description("Download (or just record) enabled managed albums")
	.argument("[ids...]", "Managed album IDs (default: all enabled)")
	.option("--metadata-only", "Record album contents without downloading", false)
	.action(async (rawIds: string[], rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const { metadataOnly } = z.object({ metadataOnly: z.boolean() }).parse(rawOptions)
		const ids = new Set(rawIds.map(parseId))

		const albums = getManagedAlbums(session.dbPath, true).filter(
			album => ids.size === 0 || ids.has(album.id),
		)
		if (albums.length === 0) {
			ui.warn("No enabled managed album selected.")
			await finish(false)
			return
		}

		const jobs: AlbumJob[] = albums.map(album => ({
			url: album.albumUrl,
			label: `[${album.id}] ${album.albumLabel}`,
			options: {
				targetFolder: album.targetFolder,
				deleteOnRemove: album.deleteLocalOnRemoteRemove,
			},
		}))
		const totals = await runAlbums(session, jobs, metadataOnly)
		await reportTotals(totals, metadataOnly)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Media
// ─────────────────────────────────────────────────────────────────────────────

const media = program.command("media").description("Inspect and delete recorded media items")

media
	.command("list")
	.description("List the media recorded for an album")
	.argument("<album>", "Managed album ID or album URL")
	.option("--active-only", "Hide items removed upstream", false)
	.action(async (ref: string, rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const { activeOnly } = z.object({ activeOnly: z.boolean() }).parse(rawOptions)
		const albumUrl = findManagedByRef(session.dbPath, ref)?.albumUrl ?? ref.trim()
		ui.mediaItems(listMedia(session.dbPath, albumUrl, !activeOnly))
		await finish(false)
	})

media
	.command("delete")
	.description("Delete media rows, optionally with their local files")
	.argument("<album>", "Managed album ID or album URL")
	.argument("<ids...>", "Media IDs")
	.option("--delete-file", "Also delete the local file", false)
	.action(async (ref: string, rawIds: string[], rawOptions: unknown, command: Command) => {
		const session = openSession(command)
		const { deleteFile } = z.object({ deleteFile: z.boolean() }).parse(rawOptions)
		const album = findManagedByRef(session.dbPath, ref)
		const albumUrl = album?.albumUrl ?? ref.trim()

		let failed = false
		for (const id of rawIds.map(parseId)) {
			const result = deleteMedia(session.dbPath, albumUrl, id, {
				deleteLocalFile: deleteFile,
				...(album ? { allowedRoot: album.targetFolder } : {}),
			})
			if (result.dbDeleted) ui.success(result.message)
			else {
				ui.error(result.message)
				failed = true
			}
		}
		await finish(failed)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

process.once("SIGINT", () => {
	interrupted = true
	process.exitCode = 130
	ui.warn("Interrupted: finishing in-flight downloads, no new albums will start")
})

program.parseAsync().catch(async (err: unknown) => {
	ui.error(describeError(err))
	await finish(true)
})
