/**
 * Core module exports
 *
 * The harvest engine is an async generator; the CLI consumes its events.
 */

// Harvest engine
export { harvest, runHarvest, createHarvesterOptions } from "./harvester.js"

// Shared types
export type {
	HarvestEvent,
	HarvesterOptions,
	HarvestItemEvent,
	HarvestPageEvent,
	HarvestProgressEvent,
	PageLister,
	ArtifactFetcher,
} from "./types.js"
