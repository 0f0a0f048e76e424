/**
 * Configuration management with Zod validation
 *
 * Precedence (lowest first): defaults, .eprintrc file, environment, CLI flags.
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import { z } from "zod"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

const ConfigSchema = z.object({
	oaiEndpoint: z.string().url().default("https://export.arxiv.org/oai2"),
	artifactBase: z.string().url().default("https://arxiv.org/e-print"),
	metadataPrefix: z.string().min(1).default("arXiv"),
	setName: z.string().min(1).default("math"),
	contact: z.string().optional(),
	outDir: z.string().optional(),
	maxItems: z.number().int().min(0).default(50000),
	fromDate: z.string().optional(),
	untilDate: z.string().optional(),
	delaySeconds: z.number().min(0).default(2.5),
	listingTimeoutMs: z.number().int().positive().default(60_000),
	artifactTimeoutMs: z.number().int().positive().default(90_000),
	maxAttempts: z.number().int().min(1).max(10).default(3),
	sniffBytes: z.number().int().positive().default(1024),
	htmlMarker: z.string().min(1).default("<html"),
})

export type Config = z.infer<typeof ConfigSchema>

/** Fully resolved settings: output directory and date bounds filled in */
export type ResolvedConfig = Config & { outDir: string }

const DEFAULT_CONFIG: Config = ConfigSchema.parse({ fromDate: "2010-01-01" })

export const CONFIG_FILENAMES = [".eprintrc", ".eprintrc.json"] as const

/**
 * Load configuration from .eprintrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(
	searchDirs: string[] = [process.cwd(), homedir()],
): Config {
	for (const dir of searchDirs) {
		for (const name of CONFIG_FILENAMES) {
			const path = join(dir, name)
			if (!existsSync(path)) continue
			try {
				const raw = readFileSync(path, "utf-8")
				const parsed: unknown = JSON.parse(raw)
				return ConfigSchema.parse({
					fromDate: DEFAULT_CONFIG.fromDate,
					...(isRecord(parsed) ? parsed : {}),
				})
			} catch (err) {
				// Invalid files fall through to the next candidate
				log.config.warn({ path, error: errorMessage(err) }, "ignoring invalid config file")
			}
		}
	}

	return DEFAULT_CONFIG
}

/**
 * Overlay EPRINT_HARVEST_* environment variables on a loaded config
 * and settle the output directory.
 */
export function applyEnvironment(
	config: Config,
	env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
	const contact = env["EPRINT_HARVEST_CONTACT"]?.trim()
	const oaiEndpoint = env["EPRINT_HARVEST_OAI_ENDPOINT"]?.trim()
	const artifactBase = env["EPRINT_HARVEST_ARTIFACT_BASE"]?.trim()

	return {
		...config,
		...(contact ? { contact } : {}),
		...(oaiEndpoint ? { oaiEndpoint } : {}),
		...(artifactBase ? { artifactBase } : {}),
		outDir: config.outDir ?? join(resolveDataDir(env), "papers"),
	}
}

/**
 * Data directory: EPRINT_HARVEST_DATA_DIR when set (~ expanded), else ./data
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
	const override = env["EPRINT_HARVEST_DATA_DIR"]?.trim()
	if (!override) {
		return join(process.cwd(), "data")
	}
	const expanded = override.startsWith("~")
		? join(homedir(), override.slice(1))
		: override
	return resolve(expanded)
}

/** Values supplied on the command line; these win over every other source */
export interface ConfigOverrides {
	outDir?: string | undefined
	maxItems?: number | undefined
	fromDate?: string | undefined
	untilDate?: string | undefined
	delaySeconds?: number | undefined
	setName?: string | undefined
	contact?: string | undefined
}

export interface ConfigSources {
	searchDirs?: string[] | undefined
	env?: NodeJS.ProcessEnv | undefined
}

/**
 * Full resolution: file, then environment, then overrides, validated as a whole
 *
 * @throws ZodError when a merged value is out of range (e.g. a NaN --max)
 */
export function resolveConfig(
	overrides: ConfigOverrides = {},
	sources: ConfigSources = {},
): ResolvedConfig {
	const env = sources.env ?? process.env
	const base = applyEnvironment(loadConfig(sources.searchDirs), env)

	const defined = Object.fromEntries(
		Object.entries(overrides).filter(([, value]) => value !== undefined),
	)
	const merged = ConfigSchema.parse({ ...base, ...defined })
	return { ...merged, outDir: resolve(merged.outDir ?? base.outDir) }
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

export { ConfigSchema, DEFAULT_CONFIG }
