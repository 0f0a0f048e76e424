/**
 * OAI-PMH ListRecords pagination
 *
 * Each call lists one page and hands back the resumption token as an explicit
 * value; the caller threads it into the next call. Query bounds (set, from,
 * until) are only sent on the first page, the server carries them in the
 * token afterwards.
 */

import { fetch as undiciFetch } from "undici"
import { parseStringPromise, processors } from "xml2js"
import { ProtocolParseError, TerminalTransportError } from "./errors.js"
import type { HttpSession } from "./http.js"
import { log } from "./logger.js"
import type { CatalogPage, Cursor, Identifier, PageRequest } from "./types.js"

/** How much of a non-XML body to keep for diagnostics */
const SNIPPET_LENGTH = 500

export interface CatalogQuery {
	setName: string
	metadataPrefix: string
	from?: string | undefined
	until?: string | undefined
}

export interface ListPageOptions {
	endpoint: string
	session: HttpSession
}

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Pick the request shape for the next page: the full query when starting,
 * only the cursor when continuing.
 */
export function buildPageRequest(
	cursor: Cursor,
	query: CatalogQuery,
): PageRequest {
	if (cursor) {
		return { kind: "resume", cursor }
	}
	return {
		kind: "initial",
		setName: query.setName,
		metadataPrefix: query.metadataPrefix,
		from: query.from,
		until: query.until,
	}
}

export function pageQuery(request: PageRequest): URLSearchParams {
	const params = new URLSearchParams({ verb: "ListRecords" })
	if (request.kind === "resume") {
		params.set("resumptionToken", request.cursor)
		return params
	}
	params.set("metadataPrefix", request.metadataPrefix)
	params.set("set", request.setName)
	if (request.from) params.set("from", request.from)
	if (request.until) params.set("until", request.until)
	return params
}

// ─────────────────────────────────────────────────────────────────────────────
// Response Parsing
// ─────────────────────────────────────────────────────────────────────────────

type XmlElement = Record<string, unknown>

function isElement(value: unknown): value is XmlElement {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Collect every element named `name` below `node`, in document order */
function findAll(node: unknown, name: string, out: unknown[] = []): unknown[] {
	if (Array.isArray(node)) {
		for (const child of node) findAll(child, name, out)
		return out
	}
	if (!isElement(node)) return out

	for (const [key, value] of Object.entries(node)) {
		if (key === "$" || key === "_") continue
		if (key === name) {
			if (Array.isArray(value)) out.push(...value)
			else out.push(value)
			continue
		}
		findAll(value, name, out)
	}
	return out
}

function firstChild(element: XmlElement, name: string): unknown {
	const value = element[name]
	return Array.isArray(value) ? value[0] : value
}

/** Text content of an xml2js node (plain string, or `_` when it has attributes) */
function textOf(node: unknown): string {
	if (typeof node === "string") return node
	if (isElement(node) && typeof node["_"] === "string") return node["_"]
	return ""
}

function attributeOf(node: unknown, name: string): string | undefined {
	if (!isElement(node)) return undefined
	const attrs = node["$"]
	if (!isElement(attrs)) return undefined
	const value = attrs[name]
	return typeof value === "string" ? value : undefined
}

/**
 * Reduce a compound OAI identifier to the item key
 * @example
 * identifierKey("oai:arXiv.org:math/0501001") // "math/0501001"
 */
export function identifierKey(oaiIdentifier: string): Identifier {
	const parts = oaiIdentifier.trim().split(":")
	return parts[parts.length - 1] ?? ""
}

/**
 * Parse a ListRecords response into identifiers and the next cursor.
 * Records whose header is marked deleted are left out.
 *
 * @throws ProtocolParseError when the body isn't an XML document
 */
export async function parseListRecords(xml: string): Promise<CatalogPage> {
	let root: unknown
	try {
		root = await parseStringPromise(xml, {
			tagNameProcessors: [processors.stripPrefix],
		})
	} catch (err) {
		throw new ProtocolParseError(
			"listing response is not well-formed XML",
			xml.slice(0, SNIPPET_LENGTH),
			{ cause: err },
		)
	}
	// xml2js resolves an empty document to null
	if (!isElement(root)) {
		throw new ProtocolParseError(
			"listing response has no document element",
			xml.slice(0, SNIPPET_LENGTH),
		)
	}

	const ids: Identifier[] = []
	for (const record of findAll(root, "record")) {
		if (!isElement(record)) continue
		const header = firstChild(record, "header")
		if (attributeOf(header, "status") === "deleted") continue

		const raw = isElement(header) ? textOf(firstChild(header, "identifier")) : ""
		const id = raw ? identifierKey(raw) : ""
		if (id) ids.push(id)
	}

	const token = textOf(findAll(root, "resumptionToken")[0]).trim()
	return { ids, nextCursor: token || null }
}

// ─────────────────────────────────────────────────────────────────────────────
// Page Fetch
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fetch and parse one listing page.
 *
 * A malformed body ends the walk: it comes back as an empty page with no
 * cursor. A non-2xx status is thrown; listing requests are never retried.
 */
export async function listPage(
	request: PageRequest,
	options: ListPageOptions,
): Promise<CatalogPage> {
	const { endpoint, session } = options
	const url = `${endpoint}?${pageQuery(request).toString()}`

	log.catalog.debug({ url, kind: request.kind }, "listing page")

	const response = await undiciFetch(url, {
		headers: session.headers,
		dispatcher: session.listingDispatcher,
	})

	if (!response.ok) {
		const raw = await response.text().catch(() => "")
		throw new TerminalTransportError(
			`Listing request failed: HTTP ${response.status}${raw ? ` (${raw.slice(0, 200).trim()})` : ""}`,
			response.status,
		)
	}

	const body = await response.text()
	try {
		const page = await parseListRecords(body)
		log.catalog.debug(
			{ ids: page.ids.length, hasCursor: page.nextCursor !== null },
			"listing page parsed",
		)
		return page
	} catch (err) {
		if (err instanceof ProtocolParseError) {
			log.catalog.warn(
				{ snippet: err.snippet },
				"non-XML listing response, ending catalog walk",
			)
			return { ids: [], nextCursor: null }
		}
		throw err
	}
}
