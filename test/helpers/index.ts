/**
 * Test utilities for eprint-harvest
 */

import { mkdtemp, rm } from "node:fs/promises"
import {
	createServer,
	type IncomingMessage,
	type ServerResponse,
} from "node:http"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { MockAgent } from "undici"
import { createHttpSession, type HttpSession } from "../../src/http.js"

export const OAI_ORIGIN = "https://oai.example.org"
export const OAI_ENDPOINT = `${OAI_ORIGIN}/oai2`
export const FILES_ORIGIN = "https://files.example.org"
export const ARTIFACT_BASE = `${FILES_ORIGIN}/e-print`

/**
 * Create a temporary directory for test isolation.
 * Removed once `fn` settles.
 */
export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "eprint-harvest-test-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

/**
 * MockAgent with real network disabled, plus a session that routes through it
 */
export function createMockSession(): { agent: MockAgent; session: HttpSession } {
	const agent = new MockAgent()
	agent.disableNetConnect()
	const session = createHttpSession({
		contact: "test@example.org",
		listingTimeoutMs: 1000,
		artifactTimeoutMs: 1000,
		dispatcher: agent,
	})
	return { agent, session }
}

/** Query parameters of an intercepted request path */
export function queryOf(path: string): URLSearchParams {
	return new URL(path, OAI_ORIGIN).searchParams
}

export interface FakeRecord {
	id: string
	deleted?: boolean
}

/**
 * Build an OAI-PMH ListRecords response
 * @param token - resumption token text; `""` renders an empty token element
 */
export function listRecordsXml(
	records: FakeRecord[],
	token?: string,
): string {
	const body = records
		.map(record => {
			const status = record.deleted ? ' status="deleted"' : ""
			const metadata = record.deleted
				? ""
				: `<metadata><arXiv><id>${record.id}</id><title>Paper ${record.id}</title></arXiv></metadata>`
			return `<record><header${status}><identifier>oai:arXiv.org:${record.id}</identifier><datestamp>2024-01-15</datestamp><setSpec>math</setSpec></header>${metadata}</record>`
		})
		.join("\n    ")

	const tokenXml =
		token === undefined
			? ""
			: token === ""
				? '<resumptionToken completeListSize="4" cursor="2"/>'
				: `<resumptionToken completeListSize="4" cursor="0">${token}</resumptionToken>`

	return `<?xml version="1.0" encoding="UTF-8"?>
<OAI-PMH xmlns="http://www.openarchives.org/OAI/2.0/">
  <responseDate>2024-01-16T00:00:00Z</responseDate>
  <request verb="ListRecords" metadataPrefix="arXiv">${OAI_ENDPOINT}</request>
  <ListRecords>
    ${body}
    ${tokenXml}
  </ListRecords>
</OAI-PMH>`
}

/**
 * One ustar member: 512-byte header followed by the padded body.
 * Written by hand so tests can build members tar tools refuse to create.
 */
export function tarMember(name: string, content: string): Buffer {
	const body = Buffer.from(content, "utf8")
	const header = Buffer.alloc(512)

	const octal = (value: number, width: number): string =>
		value.toString(8).padStart(width - 1, "0") + "\0"

	header.write(name, 0, 100, "utf8")
	header.write(octal(0o644, 8), 100, 8, "ascii") // mode
	header.write(octal(0, 8), 108, 8, "ascii") // uid
	header.write(octal(0, 8), 116, 8, "ascii") // gid
	header.write(octal(body.length, 12), 124, 12, "ascii") // size
	header.write(octal(1_700_000_000, 12), 136, 12, "ascii") // mtime
	header.write("        ", 148, 8, "ascii") // checksum placeholder
	header.write("0", 156, 1, "ascii") // regular file
	header.write("ustar\0", 257, 6, "ascii")
	header.write("00", 263, 2, "ascii")

	let checksum = 0
	for (const byte of header) checksum += byte
	header.write(octal(checksum, 7) + " ", 148, 8, "ascii")

	const padded = Buffer.alloc(Math.ceil(body.length / 512) * 512)
	body.copy(padded)
	return Buffer.concat([header, padded])
}

/** A complete tar archive (two zero blocks terminate it) */
export function tarArchive(
	members: Array<{ name: string; content: string }>,
): Buffer {
	return Buffer.concat([
		...members.map(member => tarMember(member.name, member.content)),
		Buffer.alloc(1024),
	])
}

/** Records sleep requests instead of waiting */
export function recordingSleep(): {
	delays: number[]
	sleep: (ms: number) => Promise<void>
} {
	const delays: number[] = []
	return {
		delays,
		sleep: async (ms: number) => {
			delays.push(ms)
		},
	}
}

export interface TestServer {
	origin: string
	/** Requests received so far */
	readonly requests: number
	close(): Promise<void>
}

/**
 * Plain HTTP server on a loopback port, for behavior MockAgent can't
 * reproduce (bodies cut off mid-stream, back-pressured responses)
 */
export async function startServer(
	handler: (req: IncomingMessage, res: ServerResponse, request: number) => void,
): Promise<TestServer> {
	let requests = 0
	const server = createServer((req, res) => {
		requests++
		handler(req, res, requests)
	})
	await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve))

	const address = server.address()
	if (!address || typeof address === "string") {
		throw new Error("test server has no TCP address")
	}

	return {
		origin: `http://127.0.0.1:${address.port}`,
		get requests() {
			return requests
		},
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.closeAllConnections()
				server.close(err => (err ? reject(err) : resolve()))
			}),
	}
}
