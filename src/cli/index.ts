#!/usr/bin/env node
/**
 * eprint-harvest CLI
 * Polite bulk downloader for e-print source tarballs listed over OAI-PMH
 */

import { resolve } from "node:path"
import { Command } from "commander"
import { ZodError } from "zod"
import { resolveConfig, type ResolvedConfig } from "../config.js"
import { createHarvesterOptions, runHarvest } from "../core/harvester.js"
import type { HarvestEvent } from "../core/types.js"
import { errorMessage } from "../errors.js"
import { extractTarSafe } from "../extract.js"
import { CLIENT_VERSION, closeHttpSession, createHttpSession } from "../http.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { formatOutcome } from "../types.js"
import { ui } from "../ui.js"

interface HarvestCliOptions {
	out?: string
	max?: string
	from?: string
	until?: string
	sleep?: string
	set?: string
	contact?: string
	logFile?: string
	quiet: boolean
	verbose: boolean
}

interface ExtractCliOptions {
	deleteArchive: boolean
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`failed to flush logs: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

function renderEvent(
	event: HarvestEvent,
	options: { quiet: boolean; verbose: boolean },
): void {
	switch (event.type) {
		case "page":
			ui.debug(
				`page ${event.page}: ${event.ids} identifiers${event.hasCursor ? "" : " (last page)"}`,
				options.verbose,
			)
			break
		case "item":
			ui.debug(
				`${event.identifier}: ${formatOutcome(event.outcome)}`,
				options.verbose,
			)
			break
		case "progress":
			if (!options.quiet) ui.progress(event.downloaded)
			break
		case "harvest:start":
		case "harvest:complete":
			break
	}
}

async function run(options: HarvestCliOptions): Promise<void> {
	const { logFilePath } = configureLogging({
		logFilePath: options.logFile,
		level: options.verbose ? "debug" : undefined,
	})

	let config: ResolvedConfig
	try {
		config = resolveConfig({
			outDir: options.out,
			maxItems: options.max !== undefined ? Number(options.max) : undefined,
			fromDate: options.from,
			untilDate: options.until,
			delaySeconds:
				options.sleep !== undefined ? Number(options.sleep) : undefined,
			setName: options.set,
			contact: options.contact,
		})
	} catch (err) {
		const message =
			err instanceof ZodError
				? err.issues
						.map(issue => `${issue.path.join(".")}: ${issue.message}`)
						.join("; ")
				: errorMessage(err)
		ui.error(`Invalid options: ${message}`)
		await exitWithCode(1)
		return
	}

	if (!options.quiet) {
		ui.banner(
			CLIENT_VERSION,
			config.outDir,
			config.maxItems,
			config.fromDate,
			config.untilDate,
		)
		if (logFilePath) ui.info(`Logs: ${logFilePath}`)
	}

	const session = createHttpSession({
		contact: config.contact,
		listingTimeoutMs: config.listingTimeoutMs,
		artifactTimeoutMs: config.artifactTimeoutMs,
	})

	try {
		const summary = await runHarvest(
			createHarvesterOptions(config, session),
			event => renderEvent(event, options),
		)
		ui.summary(summary, config.outDir)
	} catch (err) {
		log.cli.error({ err }, "harvest aborted")
		ui.error(`Harvest aborted: ${errorMessage(err)}`)
		await exitWithCode(1)
	} finally {
		await closeHttpSession(session)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("eprint-harvest")
	.version(CLIENT_VERSION)
	.description(
		"Download e-print source tarballs for every record in an OAI-PMH set",
	)
	.option("-o, --out <dir>", "Output directory (default: <data dir>/papers)")
	.option("--max <number>", "Maximum artifacts to download (default: 50000)")
	.option("--from <date>", "Lower datestamp bound, YYYY-MM-DD (default: 2010-01-01)")
	.option("--until <date>", "Upper datestamp bound, YYYY-MM-DD")
	.option("--sleep <seconds>", "Pause after every item (default: 2.5)")
	.option("--set <name>", "OAI-PMH set to list (default: math)")
	.option("--contact <email>", "Contact address sent in the User-Agent")
	.option("--log-file <path>", "Write structured logs to a file")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Per-item output and debug logs", false)
	.action(run)

program
	.command("extract")
	.description("Extract a downloaded tarball, refusing members that escape the destination")
	.argument("<archive>", "Path to a .tar or .tar.gz file")
	.argument("[dest]", "Destination directory", ".")
	.option("--delete-archive", "Remove the archive after extraction", false)
	.action(async (archive: string, dest: string, options: ExtractCliOptions) => {
		const result = await extractTarSafe(resolve(archive), resolve(dest), {
			deleteArchive: options.deleteArchive,
		})
		for (const member of result.skippedFiles) {
			ui.warn(`Skipped unsafe member: ${member}`)
		}
		if (!result.success) {
			ui.error(`Extraction failed: ${result.error ?? "unknown error"}`)
			await exitWithCode(1)
			return
		}
		ui.success(`Extracted ${result.extractedFiles.length} files to ${resolve(dest)}`)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

await program.parseAsync()
