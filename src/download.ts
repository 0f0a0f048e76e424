/**
 * Artifact fetcher: one tarball per identifier, with bounded retries
 *
 * - Skips targets already on disk with a non-zero size (no request made)
 * - Retries rate-limit/5xx/403 responses and network failures with
 *   exponential backoff plus jitter
 * - Streams straight to disk
 * - Sniffs untyped payloads so an HTML error page isn't saved as a tarball
 *
 * The retry loop is a small state machine (`nextFetchState`) driven by
 * `fetchArtifact`; sleeping and randomness are injectable for tests.
 */

import { createWriteStream, statSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { TextDecoder } from "node:util"
import { fetch as undiciFetch, type Response } from "undici"

import {
	TransientTransportError,
	errorMessage,
	isTransientStatus,
} from "./errors.js"
import type { HttpSession } from "./http.js"
import { log } from "./logger.js"
import type {
	DownloadOutcome,
	Identifier,
	OutcomeCode,
	OutcomeReason,
} from "./types.js"

export const MAX_ATTEMPTS = 3
/** Bytes inspected when the Content-Type doesn't say "archive" */
export const SNIFF_BYTES = 1024
export const HTML_MARKER = "<html"

const BINARY_TYPE_HINTS = ["gzip", "tar", "octet-stream"] as const
const MIN_BACKOFF_MS = 1000
const JITTER_MS = 500

export interface FetcherOptions {
	artifactBase: string
	session: HttpSession
	maxAttempts?: number | undefined
	sniffBytes?: number | undefined
	htmlMarker?: string | undefined
	sleep?: ((ms: number) => Promise<void>) | undefined
	/** Uniform [0, 1) source for backoff jitter */
	random?: (() => number) | undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Targets
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Filesystem-safe name for an identifier's tarball
 * @example
 * artifactFilename("math/0501001") // "math_0501001.tar.gz"
 */
export function artifactFilename(identifier: Identifier): string {
	return `${identifier.replace(/\//g, "_")}.tar.gz`
}

export function artifactTargetPath(
	identifier: Identifier,
	destDir: string,
): string {
	return join(destDir, artifactFilename(identifier))
}

export function artifactUrl(artifactBase: string, identifier: Identifier): string {
	return `${artifactBase.replace(/\/+$/, "")}/${identifier}`
}

/**
 * A target counts as downloaded once it exists with content.
 * Zero-byte stubs from an aborted write are fetched again.
 */
export function isTargetSatisfied(path: string): boolean {
	try {
		return statSync(path).size > 0
	} catch {
		return false
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Retry Policy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Delay after a failed attempt: 2^attempt seconds ± 0.5s, never under 1s
 */
export function backoffDelayMs(
	attempt: number,
	random: () => number = Math.random,
): number {
	const jitter = (random() - 0.5) * 2 * JITTER_MS
	return Math.max(MIN_BACKOFF_MS, 2 ** attempt * 1000 + jitter)
}

export type FetchState =
	| { kind: "skipped" }
	| { kind: "attempting"; attempt: number; lastStatus: number | null }
	| { kind: "succeeded" }
	| { kind: "failed"; code: OutcomeCode }

export type AttemptingState = Extract<FetchState, { kind: "attempting" }>
export type TerminalFetchState = Exclude<FetchState, AttemptingState>

/** What one transport attempt produced */
export type AttemptResult =
	| { kind: "stored" }
	| { kind: "status"; status: number }
	| { kind: "rejected"; reason: Extract<OutcomeReason, "empty" | "content-type-mismatch"> }
	| { kind: "network-error"; error: unknown }
	| { kind: "exception"; error: unknown }

export function nextFetchState(
	state: AttemptingState,
	result: AttemptResult,
	maxAttempts: number = MAX_ATTEMPTS,
): FetchState {
	const canRetry = state.attempt < maxAttempts

	switch (result.kind) {
		case "stored":
			return { kind: "succeeded" }
		case "rejected":
			return { kind: "failed", code: result.reason }
		case "exception":
			return { kind: "failed", code: "exception" }
		case "status":
			if (!isTransientStatus(result.status)) {
				return { kind: "failed", code: result.status }
			}
			return canRetry
				? { kind: "attempting", attempt: state.attempt + 1, lastStatus: result.status }
				: { kind: "failed", code: result.status }
		case "network-error":
			return canRetry
				? { kind: "attempting", attempt: state.attempt + 1, lastStatus: state.lastStatus }
				: { kind: "failed", code: state.lastStatus ?? "timeout" }
	}
}

/** Results the fetcher would try again while attempts remain */
function isRetryable(result: AttemptResult): boolean {
	return (
		result.kind === "network-error" ||
		(result.kind === "status" && isTransientStatus(result.status))
	)
}

export function outcomeOf(state: TerminalFetchState): DownloadOutcome {
	switch (state.kind) {
		case "skipped":
			return { status: "skip" }
		case "succeeded":
			return { status: "ok" }
		case "failed":
			return { status: "error", code: state.code }
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Content Checks
// ─────────────────────────────────────────────────────────────────────────────

export function looksBinary(contentType: string): boolean {
	const normalized = contentType.toLowerCase()
	return BINARY_TYPE_HINTS.some(hint => normalized.includes(hint))
}

/**
 * Best-effort check for an HTML error page served with a 200.
 * Bytes that aren't valid UTF-8 are taken to be binary.
 */
export function looksLikeHtml(head: Uint8Array, marker: string = HTML_MARKER): boolean {
	let text: string
	try {
		text = new TextDecoder("utf-8", { fatal: true }).decode(head)
	} catch {
		return false
	}
	return text.toLowerCase().includes(marker.toLowerCase())
}

// ─────────────────────────────────────────────────────────────────────────────
// Streaming
// ─────────────────────────────────────────────────────────────────────────────

/** Pull the next body chunk; read failures are network trouble, so retryable */
async function readNext(
	chunks: AsyncIterator<Buffer>,
): Promise<IteratorResult<Buffer>> {
	try {
		return await chunks.next()
	} catch (err) {
		throw new TransientTransportError(
			`artifact stream interrupted: ${errorMessage(err)}`,
			undefined,
			{ cause: err },
		)
	}
}

/** Read until at least `size` bytes are buffered or the body ends */
async function peek(chunks: AsyncIterator<Buffer>, size: number): Promise<Buffer> {
	const buffered: Buffer[] = []
	let length = 0
	while (length < size) {
		const next = await readNext(chunks)
		if (next.done) break
		buffered.push(next.value)
		length += next.value.length
	}
	return Buffer.concat(buffered)
}

async function* relay(
	head: Buffer | null,
	chunks: AsyncIterator<Buffer>,
): AsyncGenerator<Buffer> {
	if (head) yield head
	for (;;) {
		const next = await readNext(chunks)
		if (next.done) return
		if (next.value.length > 0) yield next.value
	}
}

async function writeArtifact(
	target: string,
	head: Buffer | null,
	chunks: AsyncIterator<Buffer>,
): Promise<void> {
	const fileStream = createWriteStream(target, {
		highWaterMark: 1024 * 1024, // 1MB buffer for better disk throughput
	})
	await pipeline(Readable.from(relay(head, chunks)), fileStream)
}

async function discardBody(response: Response): Promise<void> {
	if (!response.body) return
	await response.body.cancel().catch((err: unknown) => {
		log.download.trace({ err }, "failed to discard response body")
	})
}

async function storeBody(
	response: Response,
	target: string,
	sniffBytes: number,
	htmlMarker: string,
): Promise<AttemptResult> {
	const source = response.body ? Readable.fromWeb(response.body) : Readable.from([])
	const chunks: AsyncIterator<Buffer> = source[Symbol.asyncIterator]()
	const contentType = response.headers.get("content-type") ?? ""

	try {
		if (looksBinary(contentType)) {
			await writeArtifact(target, null, chunks)
			return { kind: "stored" }
		}

		// Some mirrors omit the type; sniff before trusting the payload
		const head = await peek(chunks, sniffBytes)
		if (head.length === 0) {
			return { kind: "rejected", reason: "empty" }
		}
		if (looksLikeHtml(head.subarray(0, sniffBytes), htmlMarker)) {
			source.destroy()
			return { kind: "rejected", reason: "content-type-mismatch" }
		}

		await writeArtifact(target, head, chunks)
		return { kind: "stored" }
	} catch (err) {
		// The pipeline only tears down its own wrapper; release the connection too
		source.destroy()
		throw err
	}
}

async function attemptDownload(
	url: string,
	target: string,
	session: HttpSession,
	sniffBytes: number,
	htmlMarker: string,
): Promise<AttemptResult> {
	let response: Response
	try {
		response = await undiciFetch(url, {
			headers: session.headers,
			dispatcher: session.artifactDispatcher,
		})
	} catch (err) {
		return { kind: "network-error", error: err }
	}

	if (response.status !== 200) {
		await discardBody(response)
		return { kind: "status", status: response.status }
	}

	try {
		return await storeBody(response, target, sniffBytes, htmlMarker)
	} catch (err) {
		if (err instanceof TransientTransportError) {
			return { kind: "network-error", error: err }
		}
		return { kind: "exception", error: err }
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Fetcher
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Download the tarball for one identifier into `destDir`.
 *
 * Always resolves to exactly one outcome: `ok`, `skip`, or `error` with an
 * HTTP status or a reason (`empty`, `content-type-mismatch`, `exception`,
 * `timeout`). A partially written file is left in place when an attempt
 * fails mid-stream.
 */
export async function fetchArtifact(
	identifier: Identifier,
	destDir: string,
	options: FetcherOptions,
): Promise<DownloadOutcome> {
	const maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS
	const sniffBytes = options.sniffBytes ?? SNIFF_BYTES
	const htmlMarker = options.htmlMarker ?? HTML_MARKER
	const pause = options.sleep ?? sleep
	const random = options.random ?? Math.random

	const target = artifactTargetPath(identifier, destDir)
	try {
		await mkdir(destDir, { recursive: true })
	} catch (err) {
		log.download.error(
			{ identifier, destDir, error: errorMessage(err) },
			"cannot create destination directory",
		)
		return outcomeOf({ kind: "failed", code: "exception" })
	}
	if (isTargetSatisfied(target)) {
		return outcomeOf({ kind: "skipped" })
	}

	const url = artifactUrl(options.artifactBase, identifier)
	let state: FetchState = { kind: "attempting", attempt: 1, lastStatus: null }

	while (state.kind === "attempting") {
		const current: AttemptingState = state
		const result = await attemptDownload(
			url,
			target,
			options.session,
			sniffBytes,
			htmlMarker,
		)
		state = nextFetchState(current, result, maxAttempts)

		if (result.kind === "exception" || result.kind === "network-error") {
			log.download.debug(
				{ identifier, attempt: current.attempt, error: errorMessage(result.error) },
				`attempt failed (${result.kind})`,
			)
		}

		if (state.kind === "failed" && isRetryable(result)) {
			log.download.warn(
				{ identifier, attempts: current.attempt, code: state.code },
				"giving up after exhausting retries",
			)
		}

		if (state.kind === "attempting") {
			const delay = backoffDelayMs(current.attempt, random)
			log.download.debug(
				{
					identifier,
					attempt: current.attempt,
					...(result.kind === "status" ? { status: result.status } : {}),
					delayMs: Math.round(delay),
				},
				"retrying after backoff",
			)
			await pause(delay)
		}
	}

	return outcomeOf(state)
}

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}
