/**
 * Shared type definitions for eprint-harvest
 */

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

/** Catalog item key, e.g. "2101.00001" or "math/0501001" */
export type Identifier = string

/** Opaque continuation token. `null` means the catalog is exhausted. */
export type Cursor = string | null

/** First request of a catalog walk: carries the query bounds */
export interface InitialPageRequest {
	kind: "initial"
	setName: string
	metadataPrefix: string
	from?: string | undefined
	until?: string | undefined
}

/** Follow-up request: the server remembers the bounds behind the cursor */
export interface ResumePageRequest {
	kind: "resume"
	cursor: string
}

export type PageRequest = InitialPageRequest | ResumePageRequest

export interface CatalogPage {
	ids: Identifier[]
	nextCursor: Cursor
}

// ─────────────────────────────────────────────────────────────────────────────
// Download Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/** Symbolic failure reasons that don't come from an HTTP status */
export type OutcomeReason =
	| "empty"
	| "content-type-mismatch"
	| "exception"
	| "timeout"

export type OutcomeCode = number | OutcomeReason

export type DownloadOutcome =
	| { status: "ok" }
	| { status: "skip" }
	| { status: "error"; code: OutcomeCode }

/** Render an outcome the way it shows up in logs: ok, skip, err:404 */
export function formatOutcome(outcome: DownloadOutcome): string {
	return outcome.status === "error" ? `err:${outcome.code}` : outcome.status
}

// ─────────────────────────────────────────────────────────────────────────────
// Run Summary
// ─────────────────────────────────────────────────────────────────────────────

export interface HarvestSummary {
	/** Artifacts written during this run */
	downloaded: number
	/** Artifacts already on disk */
	skipped: number
	/** Identifiers that ended in an error outcome */
	failed: number
	/** Error outcomes tallied by code (e.g. { "404": 3, "timeout": 1 }) */
	errorsByCode: Record<string, number>
	pages: number
	durationMs: number
}
