// This module is a library entry point
// For CLI usage, run: npx eprint-harvest --out <dir>
// Or: npm run cli -- --out <dir>

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./http.js"
export * from "./catalog.js"
export * from "./extract.js"
export {
	MAX_ATTEMPTS,
	SNIFF_BYTES,
	HTML_MARKER,
	artifactFilename,
	artifactTargetPath,
	artifactUrl,
	backoffDelayMs,
	fetchArtifact,
	isTargetSatisfied,
	looksBinary,
	looksLikeHtml,
	nextFetchState,
	outcomeOf,
	type AttemptResult,
	type FetcherOptions,
	type FetchState,
} from "./download.js"
export * from "./core/index.js"
