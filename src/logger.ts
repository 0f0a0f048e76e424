/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue (soft-failed listing page, exhausted retries)
 * - info: Key milestones (default for production)
 * - debug: Per-item outcomes, retries (--verbose)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** Redirect structured logs to this file instead of the console */
	logFilePath?: string | undefined
	/** Override the level for this run (e.g. "debug" for --verbose) */
	level?: string | undefined
}

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger(consoleLevel: string) {
	return isDev
		? pino({
				level: consoleLevel,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level: consoleLevel,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string, fileLevel: string) {
	ensureDirExists(path)
	// Sync writes so nothing buffered is lost when the process exits
	const destination = pino.destination({ dest: path, sync: true })
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger(level)

/** Reconfigure the root logger for a CLI run */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	const nextLevel = process.env["LOG_LEVEL"] ?? options.level ?? level

	if (options.logFilePath) {
		const fileLevel = process.env["LOG_LEVEL_FILE"] ?? options.level ?? "debug"
		logger = createFileLogger(options.logFilePath, fileLevel)
		return { logFilePath: options.logFilePath }
	}

	logger = createConsoleLogger(nextLevel)
	return { logFilePath: null }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("download")
 * log.debug({ identifier, attempt }, "retrying after 503")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get harvest() {
		return createLogger("harvest")
	},
	get catalog() {
		return createLogger("catalog")
	},
	get download() {
		return createLogger("download")
	},
	get extract() {
		return createLogger("extract")
	},
	get config() {
		return createLogger("config")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
