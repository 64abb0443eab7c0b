/**
 * PatchApplicator - applies a patch plan to the project tree, all or nothing
 *
 * Every file change is validated against the current tree (and against the changes
 * before it in the same plan) before anything is written. Writes are atomic per file;
 * if one fails, every file already written is restored.
 */

import { readFile, rm } from "node:fs/promises"
import * as path from "node:path"

import { createTwoFilesPatch } from "diff"

import type { FileChange } from "@mender/types"

import { atomicWriteText, fileExists, isInsideProjectRoot, isRegularFile, normalizeRelPath } from "../fs"

export interface PlannedWrite {
	/** Repo-relative, forward slashes */
	path: string
	absPath: string
	/** Content before the plan; null when the file does not exist yet */
	before: string | null
	after: string
}

export interface PatchPlanCheck {
	writes: PlannedWrite[]
	issues: string[]
}

export class PatchApplicationError extends Error {
	constructor(
		message: string,
		readonly issues: string[],
	) {
		super(message)
		this.name = "PatchApplicationError"
	}
}

function countOccurrences(haystack: string, needle: string): number {
	return haystack.split(needle).length - 1
}

function appendContent(before: string, content: string): string {
	if (before === "" || before.endsWith("\n")) return before + content
	return `${before}\n${content}`
}

export class PatchApplicator {
	private readonly projectRootAbs: string

	constructor(projectRoot: string) {
		this.projectRootAbs = path.resolve(projectRoot)
	}

	/**
	 * Dry run: resolve every change against the tree without writing anything
	 */
	async check(files: FileChange[]): Promise<PatchPlanCheck> {
		const issues: string[] = []
		// Planned content per absolute path; null means "does not exist"
		const current = new Map<string, string | null>()
		const originals = new Map<string, string | null>()
		const order: string[] = []

		const load = async (absPath: string): Promise<string | null> => {
			if (current.has(absPath)) return current.get(absPath) ?? null
			const content = (await fileExists(absPath)) ? await readFile(absPath, "utf8") : null
			current.set(absPath, content)
			originals.set(absPath, content)
			return content
		}

		for (const change of files) {
			const relPath = normalizeRelPath(change.path)
			const absPath = path.resolve(this.projectRootAbs, relPath)
			if (!isInsideProjectRoot(this.projectRootAbs, absPath)) {
				issues.push(`Refusing to write outside project root: ${relPath}`)
				continue
			}
			if (!current.has(absPath) && (await fileExists(absPath)) && !(await isRegularFile(absPath))) {
				issues.push(`Not a regular file: ${relPath}`)
				continue
			}

			const before = await load(absPath)
			let after: string

			switch (change.operation) {
				case "replace": {
					if (before === null) {
						issues.push(`Cannot replace in missing file: ${relPath}`)
						continue
					}
					const occurrences = countOccurrences(before, change.search)
					if (occurrences !== 1) {
						issues.push(`Search text must occur exactly once in ${relPath} (found ${occurrences})`)
						continue
					}
					after = before.replace(change.search, () => change.replace)
					break
				}
				case "create": {
					if (before !== null) {
						issues.push(`Cannot create existing file: ${relPath}`)
						continue
					}
					after = change.content
					break
				}
				case "append": {
					after = appendContent(before ?? "", change.content)
					break
				}
			}

			current.set(absPath, after)
			if (!order.includes(absPath)) order.push(absPath)
		}

		const writes = order.map((absPath) => ({
			path: normalizeRelPath(path.relative(this.projectRootAbs, absPath)),
			absPath,
			before: originals.get(absPath) ?? null,
			after: current.get(absPath) ?? "",
		}))

		return { writes, issues }
	}

	/**
	 * Validate then write every file
	 *
	 * @returns repo-relative paths written
	 * @throws PatchApplicationError when validation fails or a write fails (tree restored)
	 */
	async apply(files: FileChange[]): Promise<string[]> {
		const { writes, issues } = await this.check(files)
		if (issues.length > 0) {
			throw new PatchApplicationError(`Patch plan cannot be applied: ${issues.join("; ")}`, issues)
		}

		const written: PlannedWrite[] = []
		try {
			for (const write of writes) {
				await atomicWriteText(write.absPath, write.after)
				written.push(write)
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			const rollbackIssues = await this.restore(written)
			throw new PatchApplicationError(`Patch write failed: ${message}`, [message, ...rollbackIssues])
		}

		return writes.map((w) => w.path)
	}

	/**
	 * Unified diff of the plan against the current tree; unresolvable changes are listed
	 * as comments ahead of the diff
	 */
	async preview(files: FileChange[]): Promise<string> {
		const { writes, issues } = await this.check(files)

		const sections = issues.map((issue) => `# ${issue}`)
		for (const write of writes) {
			sections.push(
				createTwoFilesPatch(
					write.before === null ? "/dev/null" : `a/${write.path}`,
					`b/${write.path}`,
					write.before ?? "",
					write.after,
				),
			)
		}

		return sections.join("\n")
	}

	private async restore(written: PlannedWrite[]): Promise<string[]> {
		const issues: string[] = []

		for (const write of written.slice().reverse()) {
			try {
				if (write.before === null) {
					await rm(write.absPath, { force: true })
				} else {
					await atomicWriteText(write.absPath, write.before)
				}
			} catch (error) {
				issues.push(`Rollback failed for ${write.path}: ${error instanceof Error ? error.message : String(error)}`)
			}
		}

		return issues
	}
}
