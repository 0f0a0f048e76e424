/**
 * Error taxonomy for the harvest pipeline
 *
 * - TransientTransportError: retryable status or network failure. The fetcher
 *   absorbs these in its retry loop.
 * - TerminalTransportError: a status or payload that retrying won't fix.
 * - ProtocolParseError: the listing response isn't the expected document.
 */

import type { OutcomeCode } from "./types.js"

/** Statuses treated as rate-limit or temporary server trouble */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([
	429, 500, 502, 503, 504, 403,
])

export function isTransientStatus(status: number): boolean {
	return TRANSIENT_STATUSES.has(status)
}

export class TransientTransportError extends Error {
	override readonly name = "TransientTransportError"

	constructor(
		message: string,
		readonly status?: number,
		options?: ErrorOptions,
	) {
		super(message, options)
	}
}

export class TerminalTransportError extends Error {
	override readonly name = "TerminalTransportError"

	constructor(
		message: string,
		readonly code: OutcomeCode,
		options?: ErrorOptions,
	) {
		super(message, options)
	}
}

export class ProtocolParseError extends Error {
	override readonly name = "ProtocolParseError"

	constructor(
		message: string,
		/** Leading slice of the raw body, for diagnostics */
		readonly snippet: string,
		options?: ErrorOptions,
	) {
		super(message, options)
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
