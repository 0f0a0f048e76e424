/**
 * Core types for the harvest engine
 *
 * These types define the event-based interface between the harvest
 * generator and whatever renders progress (the plain CLI today).
 */

import type {
	CatalogPage,
	DownloadOutcome,
	HarvestSummary,
	Identifier,
	PageRequest,
} from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Harvest Events
// ─────────────────────────────────────────────────────────────────────────────

export type HarvestEvent =
	| HarvestStartEvent
	| HarvestPageEvent
	| HarvestItemEvent
	| HarvestProgressEvent
	| HarvestCompleteEvent

/** Emitted once before the first listing request */
export interface HarvestStartEvent {
	type: "harvest:start"
	outDir: string
	maxItems: number
	from?: string | undefined
	until?: string | undefined
}

/** Emitted after each listing page is fetched */
export interface HarvestPageEvent {
	type: "page"
	/** 1-based page number */
	page: number
	ids: number
	hasCursor: boolean
}

/** Emitted once per identifier handed to the fetcher */
export interface HarvestItemEvent {
	type: "item"
	identifier: Identifier
	outcome: DownloadOutcome
	/** Artifacts downloaded so far, including this one */
	downloaded: number
}

/** Emitted each time the downloaded count reaches a multiple of `progressEvery` */
export interface HarvestProgressEvent {
	type: "progress"
	downloaded: number
}

export interface HarvestCompleteEvent {
	type: "harvest:complete"
	summary: HarvestSummary
}

// ─────────────────────────────────────────────────────────────────────────────
// Harvester Options (for generator input)
// ─────────────────────────────────────────────────────────────────────────────

export type PageLister = (request: PageRequest) => Promise<CatalogPage>

export type ArtifactFetcher = (
	identifier: Identifier,
	destDir: string,
) => Promise<DownloadOutcome>

export interface HarvesterOptions {
	/** Where artifacts are written */
	outDir: string

	/** Stop once this many artifacts were downloaded in this run */
	maxItems: number

	/** Lower datestamp bound (sent on the first page only) */
	fromDate?: string | undefined

	/** Upper datestamp bound (sent on the first page only) */
	untilDate?: string | undefined

	/** Politeness delay after every item and between pages (ms) */
	delayMs: number

	/** Listing set, e.g. "math" */
	setName: string

	/** Listing metadata format, e.g. "arXiv" */
	metadataPrefix: string

	listPage: PageLister

	fetchArtifact: ArtifactFetcher

	/** Injected wait (tests skip real delays) */
	sleep?: ((ms: number) => Promise<void>) | undefined

	/** Downloaded-count interval for progress events (default 25) */
	progressEvery?: number | undefined
}
