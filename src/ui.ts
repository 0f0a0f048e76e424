/**
 * Terminal output helpers with consistent styling
 *
 * User-facing lines only; structured logs go through pino (logger.ts).
 */

import chalk from "chalk"
import type { HarvestSummary } from "./types.js"

export const ui = {
	/** Success message with checkmark */
	success(text: string): void {
		console.log(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		console.error(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		console.log(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		console.log(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			console.log(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(
		version: string,
		outDir: string,
		maxItems: number,
		from?: string,
		until?: string,
	): void {
		console.log(chalk.bold("eprint-harvest") + ` v${version}`)
		console.log(`Output: ${chalk.cyan(outDir)}`)
		console.log(`Limit: ${chalk.cyan(String(maxItems))} artifacts`)
		if (from || until) {
			console.log(`Range: ${chalk.cyan(`${from ?? "…"} → ${until ?? "…"}`)}`)
		}
		console.log()
	},

	/** Running count, printed every few downloads */
	progress(downloaded: number): void {
		console.log(`${downloaded} downloaded...`)
	},

	/** Final summary lines */
	summary(summary: HarvestSummary, outDir: string): void {
		console.log()
		console.log(
			chalk.green.bold(
				`Done. Downloaded: ${summary.downloaded}. Saved to: ${outDir}`,
			),
		)
		const codes = Object.entries(summary.errorsByCode)
			.map(([code, count]) => `${code}×${count}`)
			.join(", ")
		console.log(
			chalk.dim(
				`Skipped: ${summary.skipped}, failed: ${summary.failed}${codes ? ` (${codes})` : ""}, pages: ${summary.pages}`,
			),
		)
	},
}
