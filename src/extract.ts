/**
 * Tarball extraction with a path-traversal guard
 *
 * Downloaded e-prints are (usually gzipped) tar archives. Members whose
 * resolved path lands outside the destination directory are skipped, so a
 * crafted `../` or absolute member name can't write elsewhere.
 */

import { existsSync, mkdirSync, unlinkSync } from "node:fs"
import { isAbsolute, relative, resolve, sep } from "node:path"
import { x as untar } from "tar"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

export interface ExtractOptions {
	/** Delete archive after successful extraction */
	deleteArchive: boolean
}

export interface ExtractResult {
	success: boolean
	extractedFiles: string[]
	/** Members refused because they resolve outside the destination */
	skippedFiles: string[]
	error?: string
}

/**
 * True when `memberPath` stays inside `destDir` once resolved
 * @example
 * isWithinDirectory("/out", "paper/main.tex") // true
 * isWithinDirectory("/out", "../etc/passwd") // false
 */
export function isWithinDirectory(destDir: string, memberPath: string): boolean {
	const root = resolve(destDir)
	const target = resolve(root, memberPath)
	const rel = relative(root, target)
	return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
}

/**
 * Extract a tar archive (gzip detected automatically) into `destDir`.
 * Files without a .tar, .tar.gz or .tgz name are refused before any I/O.
 */
export async function extractTarSafe(
	archivePath: string,
	destDir: string,
	options: ExtractOptions = { deleteArchive: false },
): Promise<ExtractResult> {
	const extractedFiles: string[] = []
	const skippedFiles: string[] = []

	if (!isTarArchive(archivePath)) {
		return {
			success: false,
			extractedFiles,
			skippedFiles,
			error: `not a tar archive: ${archivePath}`,
		}
	}

	// Ensure destination exists
	mkdirSync(destDir, { recursive: true })

	try {
		await untar({
			file: archivePath,
			cwd: destDir,
			filter: path => {
				if (!isWithinDirectory(destDir, path)) {
					skippedFiles.push(path)
					log.extract.warn(
						{ archivePath, member: path },
						"skipping member outside destination",
					)
					return false
				}
				if (!path.endsWith("/")) extractedFiles.push(path)
				return true
			},
		})

		if (options.deleteArchive && existsSync(archivePath)) {
			unlinkSync(archivePath)
		}

		return { success: true, extractedFiles, skippedFiles }
	} catch (err) {
		return {
			success: false,
			extractedFiles,
			skippedFiles,
			error: errorMessage(err),
		}
	}
}

/**
 * Check if a file looks like a tarball by extension
 */
export function isTarArchive(filename: string): boolean {
	return /\.(tar|tar\.gz|tgz)$/i.test(filename)
}

/**
 * Extract several archives one after another
 */
export async function extractArchives(
	archives: Array<{ path: string; destDir: string }>,
	options: ExtractOptions,
): Promise<{
	success: string[]
	failed: Array<{ path: string; error: string }>
}> {
	const success: string[] = []
	const failed: Array<{ path: string; error: string }> = []

	for (const { path, destDir } of archives) {
		const result = await extractTarSafe(path, destDir, options)
		if (result.success) {
			success.push(path)
		} else {
			failed.push({ path, error: result.error ?? "Unknown error" })
		}
	}

	return { success, failed }
}
