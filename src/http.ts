/**
 * Shared HTTP session: client identity headers and undici dispatchers
 *
 * Listing pages and artifact downloads get separate agents because undici
 * applies header/body timeouts per dispatcher, and tarballs need a longer
 * idle window than the XML listing.
 */

import { Agent, type Dispatcher } from "undici"

export const CLIENT_NAME = "eprint-harvest"
export const CLIENT_VERSION = "1.0.0"

// Prefer tarballs over whatever HTML a mirror might hand back
const ACCEPT =
	"application/gzip, application/x-gzip, application/x-tar, application/octet-stream;q=0.9,*/*;q=0.5"

export interface HttpSessionOptions {
	/** Operator contact; only sent when it looks like an email address */
	contact?: string | undefined
	listingTimeoutMs: number
	artifactTimeoutMs: number
	/** Replace both agents (tests pass an undici MockAgent here) */
	dispatcher?: Dispatcher | undefined
}

export interface HttpSession {
	headers: Record<string, string>
	listingDispatcher: Dispatcher
	artifactDispatcher: Dispatcher
}

/**
 * Build the User-Agent string, embedding a mailto when a contact is given
 * @example
 * userAgent("ops@example.org") // "eprint-harvest/1.0.0 (mailto:ops@example.org)"
 */
export function userAgent(contact?: string): string {
	const email = (contact ?? "").trim()
	const base = `${CLIENT_NAME}/${CLIENT_VERSION}`
	return email.includes("@") ? `${base} (mailto:${email})` : base
}

function createAgent(timeoutMs: number): Agent {
	return new Agent({
		keepAliveTimeout: 30_000,
		keepAliveMaxTimeout: 60_000,
		headersTimeout: timeoutMs,
		bodyTimeout: timeoutMs,
		pipelining: 1,
	})
}

export function createHttpSession(options: HttpSessionOptions): HttpSession {
	const headers = {
		"User-Agent": userAgent(options.contact),
		Accept: ACCEPT,
	}

	if (options.dispatcher) {
		return {
			headers,
			listingDispatcher: options.dispatcher,
			artifactDispatcher: options.dispatcher,
		}
	}

	return {
		headers,
		listingDispatcher: createAgent(options.listingTimeoutMs),
		artifactDispatcher: createAgent(options.artifactTimeoutMs),
	}
}

/** Release pooled connections so the process can exit */
export async function closeHttpSession(session: HttpSession): Promise<void> {
	if (session.listingDispatcher === session.artifactDispatcher) {
		await session.listingDispatcher.close()
		return
	}
	await Promise.all([
		session.listingDispatcher.close(),
		session.artifactDispatcher.close(),
	])
}
