import { stat } from "node:fs/promises"

/** Exports smaller than this almost always came out empty */
export const MIN_EXPORT_FILE_BYTES = 100

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function firstDefined(record: Record<string, unknown>, keys: string[]): unknown {
	for (const key of keys) {
		if (record[key] !== undefined && record[key] !== null) return record[key]
	}
	return undefined
}

/**
 * Generic output check: no embedded error status and some content
 */
export function nonEmptyResultValidator(result: unknown): string[] {
	if (isRecord(result) && result.status === "error") {
		const error = typeof result.error === "string" && result.error ? result.error : "Unknown"
		return [`Tool error: ${error}`]
	}

	if (typeof result === "number" || typeof result === "boolean") return []
	if (typeof result === "string") return result.length > 0 ? [] : ["Output is empty"]
	if (Array.isArray(result)) return result.length > 0 ? [] : ["Output is empty"]
	if (isRecord(result)) return Object.keys(result).length > 0 ? [] : ["Output is empty"]

	return ["Output is empty"]
}

/**
 * Export check: the reported file exists, is not nearly empty and the export did not
 * report zero rows
 */
export async function exportFileValidator(result: unknown): Promise<string[]> {
	if (!isRecord(result)) {
		return ["Export result is not an object"]
	}

	const filePath = firstDefined(result, ["filePath", "file_path", "finalPath", "final_path"])
	if (typeof filePath !== "string" || filePath === "") {
		return ["Export result has no file path"]
	}

	let size: number
	try {
		size = (await stat(filePath)).size
	} catch {
		return [`Export file not found: ${filePath}`]
	}

	const issues: string[] = []
	if (size < MIN_EXPORT_FILE_BYTES) {
		issues.push(`Export file is nearly empty (${size} bytes)`)
	}

	const rowCount = firstDefined(result, ["rowCount", "row_count", "itemsExported", "items_exported"])
	if (rowCount === 0) {
		issues.push("Export returned no rows")
	}

	return issues
}
