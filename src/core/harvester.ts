/**
 * Core Harvest Engine
 *
 * Walks the catalog one page at a time and fetches each listed artifact in
 * turn. Strictly sequential: one listing request or one download in flight,
 * with a politeness delay after every item. Emits events that the CLI
 * renders without any coupling to terminal output.
 */

import { mkdir } from "node:fs/promises"

import { buildPageRequest, listPage } from "../catalog.js"
import type { ResolvedConfig } from "../config.js"
import { fetchArtifact, sleep, type FetcherOptions } from "../download.js"
import type { HttpSession } from "../http.js"
import { log } from "../logger.js"
import { formatOutcome, type Cursor, type HarvestSummary } from "../types.js"
import type { HarvestEvent, HarvesterOptions } from "./types.js"

const DEFAULT_PROGRESS_EVERY = 25

/**
 * Async generator that yields harvest events.
 *
 * Stops when `maxItems` artifacts were downloaded, when a page comes back
 * without identifiers, or when a page carries no continuation cursor.
 *
 * Usage:
 * ```ts
 * for await (const event of harvest(options)) {
 *   if (event.type === "progress") ui.info(`${event.downloaded} downloaded...`)
 * }
 * ```
 */
export async function* harvest(
	options: HarvesterOptions,
): AsyncGenerator<HarvestEvent> {
	const startTime = Date.now()
	const { outDir, maxItems, delayMs } = options
	const pause = options.sleep ?? sleep
	const progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY

	await mkdir(outDir, { recursive: true })

	yield {
		type: "harvest:start",
		outDir,
		maxItems,
		from: options.fromDate,
		until: options.untilDate,
	}

	const summary: HarvestSummary = {
		downloaded: 0,
		skipped: 0,
		failed: 0,
		errorsByCode: {},
		pages: 0,
		durationMs: 0,
	}
	let cursor: Cursor = null

	while (summary.downloaded < maxItems) {
		const request = buildPageRequest(cursor, {
			setName: options.setName,
			metadataPrefix: options.metadataPrefix,
			from: options.fromDate,
			until: options.untilDate,
		})
		const page = await options.listPage(request)
		summary.pages++

		yield {
			type: "page",
			page: summary.pages,
			ids: page.ids.length,
			hasCursor: page.nextCursor !== null,
		}

		if (page.ids.length === 0) break

		for (const identifier of page.ids) {
			if (summary.downloaded >= maxItems) break

			const outcome = await options.fetchArtifact(identifier, outDir)
			switch (outcome.status) {
				case "ok":
					summary.downloaded++
					break
				case "skip":
					summary.skipped++
					break
				case "error": {
					summary.failed++
					const key = String(outcome.code)
					summary.errorsByCode[key] = (summary.errorsByCode[key] ?? 0) + 1
					break
				}
			}

			log.harvest.debug({ identifier, outcome: formatOutcome(outcome) }, "item done")
			yield {
				type: "item",
				identifier,
				outcome,
				downloaded: summary.downloaded,
			}

			if (outcome.status === "ok" && summary.downloaded % progressEvery === 0) {
				yield { type: "progress", downloaded: summary.downloaded }
			}

			await pause(delayMs)
		}

		if (!page.nextCursor) break
		cursor = page.nextCursor
		await pause(delayMs)
	}

	summary.durationMs = Date.now() - startTime
	log.harvest.info(
		{
			downloaded: summary.downloaded,
			skipped: summary.skipped,
			failed: summary.failed,
			pages: summary.pages,
		},
		"harvest complete",
	)

	yield { type: "harvest:complete", summary }
}

/**
 * Drain the harvest generator and return the final counts
 */
export async function runHarvest(
	options: HarvesterOptions,
	onEvent?: (event: HarvestEvent) => void,
): Promise<HarvestSummary> {
	let summary: HarvestSummary | null = null
	for await (const event of harvest(options)) {
		onEvent?.(event)
		if (event.type === "harvest:complete") {
			summary = event.summary
		}
	}
	if (!summary) {
		throw new Error("harvest ended without a summary")
	}
	return summary
}

/**
 * Wire the catalog paginator and artifact fetcher from resolved settings
 */
export function createHarvesterOptions(
	config: ResolvedConfig,
	session: HttpSession,
	overrides: Pick<FetcherOptions, "sleep" | "random"> = {},
): HarvesterOptions {
	const fetcherOptions: FetcherOptions = {
		artifactBase: config.artifactBase,
		session,
		maxAttempts: config.maxAttempts,
		sniffBytes: config.sniffBytes,
		htmlMarker: config.htmlMarker,
		sleep: overrides.sleep,
		random: overrides.random,
	}

	return {
		outDir: config.outDir,
		maxItems: config.maxItems,
		fromDate: config.fromDate,
		untilDate: config.untilDate,
		delayMs: config.delaySeconds * 1000,
		setName: config.setName,
		metadataPrefix: config.metadataPrefix,
		listPage: request => listPage(request, { endpoint: config.oaiEndpoint, session }),
		fetchArtifact: (identifier, destDir) =>
			fetchArtifact(identifier, destDir, fetcherOptions),
		sleep: overrides.sleep,
	}
}
