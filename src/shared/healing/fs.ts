import { access, mkdir, rename, stat, writeFile } from "node:fs/promises"
import * as path from "node:path"

export function formatTimestampForFilename(date: Date): string {
	// 20251214T161234Z
	const iso = date.toISOString() // 2025-12-14T16:12:34.567Z
	return iso.replace(/[-:]/g, "").replace(/\.(\d+)Z$/, "Z")
}

export async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath)
		return true
	} catch {
		return false
	}
}

/** False for directories and anything that does not exist */
export async function isRegularFile(filePath: string): Promise<boolean> {
	try {
		return (await stat(filePath)).isFile()
	} catch {
		return false
	}
}

export async function atomicWriteText(absPath: string, content: string): Promise<void> {
	await mkdir(path.dirname(absPath), { recursive: true })
	const tmpPath = `${absPath}.tmp.${process.pid}.${Date.now()}`
	await writeFile(tmpPath, content, { encoding: "utf8" })
	await rename(tmpPath, absPath)
}

export function normalizeRelPath(p: string): string {
	return p.replace(/\\/g, "/")
}

export function isInsideProjectRoot(projectRootAbs: string, targetAbs: string): boolean {
	const rel = path.relative(projectRootAbs, targetAbs)
	return !!rel && !rel.startsWith("..") && !path.isAbsolute(rel)
}

export function toRepoRelativePath(projectRoot: string, absolutePath: string): string {
	const rel = path.relative(projectRoot, absolutePath)
	// normalize Windows paths to POSIX for repo-local references
	return rel.split(path.sep).join("/")
}
