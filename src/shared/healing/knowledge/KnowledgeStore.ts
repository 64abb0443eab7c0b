/**
 * Knowledge Store - remembered fixes keyed by error pattern
 *
 * Lookup is exact first, then case-insensitive containment in either direction, so a
 * stored "connection reset" matches "Error: Connection reset by peer" and the other way
 * round. The first containment match in insertion order wins.
 */

import { eq } from "drizzle-orm"

import type { ErrorSolution } from "@mender/types"

import type { HealingDb } from "../db/db"
import { errorSolutions } from "../db/schema"

export interface KnowledgeStore {
	findErrorSolution(pattern: string): Promise<ErrorSolution | null>
	addErrorSolution(pattern: string, solution: string, metadata?: Record<string, unknown>): Promise<ErrorSolution>
	/**
	 * Set the success rate of the entry stored under exactly `pattern`
	 *
	 * @returns the updated entry, or null when there is none
	 */
	updateSuccessRate(pattern: string, successRate: number): Promise<ErrorSolution | null>
}

/** Longest error pattern kept as a knowledge key */
export const MAX_ERROR_PATTERN_CHARS = 200

/**
 * Knowledge key for an error: its first non-blank line, trimmed and capped
 */
export function deriveErrorPattern(error: string): string {
	const firstLine = error
		.split(/\r?\n/)
		.map((line) => line.trim())
		.find((line) => line !== "")
	return (firstLine ?? "").slice(0, MAX_ERROR_PATTERN_CHARS)
}

export function matchErrorSolution<T extends { pattern: string }>(entries: Iterable<T>, pattern: string): T | null {
	const candidates = Array.from(entries)

	const exact = candidates.find((entry) => entry.pattern === pattern)
	if (exact) return exact

	const needle = pattern.toLowerCase()
	if (!needle) return null

	return (
		candidates.find((entry) => {
			const stored = entry.pattern.toLowerCase()
			return stored !== "" && (needle.includes(stored) || stored.includes(needle))
		}) ?? null
	)
}

function clampRate(rate: number): number {
	return Math.min(1, Math.max(0, rate))
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemoryKnowledgeStore implements KnowledgeStore {
	private entries = new Map<string, ErrorSolution>()

	constructor(private readonly now: () => number = Date.now) {}

	async findErrorSolution(pattern: string): Promise<ErrorSolution | null> {
		const match = matchErrorSolution(this.entries.values(), pattern)
		return match ? { ...match, metadata: { ...match.metadata } } : null
	}

	async addErrorSolution(
		pattern: string,
		solution: string,
		metadata: Record<string, unknown> = {},
	): Promise<ErrorSolution> {
		const successRate = typeof metadata.successRate === "number" ? clampRate(metadata.successRate) : 0.5
		const entry: ErrorSolution = {
			pattern,
			solution,
			successRate,
			metadata: { ...metadata },
			updatedAt: new Date(this.now()).toISOString(),
		}
		this.entries.set(pattern, entry)
		return { ...entry }
	}

	async updateSuccessRate(pattern: string, successRate: number): Promise<ErrorSolution | null> {
		const existing = this.entries.get(pattern)
		if (!existing) return null

		const updated: ErrorSolution = {
			...existing,
			successRate: clampRate(successRate),
			updatedAt: new Date(this.now()).toISOString(),
		}
		this.entries.set(pattern, updated)
		return { ...updated }
	}
}

// =============================================================================
// SQLite
// =============================================================================

export class SqliteKnowledgeStore implements KnowledgeStore {
	constructor(
		private readonly db: HealingDb,
		private readonly now: () => number = Date.now,
	) {}

	async findErrorSolution(pattern: string): Promise<ErrorSolution | null> {
		const exact = this.db.select().from(errorSolutions).where(eq(errorSolutions.pattern, pattern)).get()
		if (exact) return exact

		return matchErrorSolution(this.db.select().from(errorSolutions).all(), pattern)
	}

	async addErrorSolution(
		pattern: string,
		solution: string,
		metadata: Record<string, unknown> = {},
	): Promise<ErrorSolution> {
		const entry: ErrorSolution = {
			pattern,
			solution,
			successRate: typeof metadata.successRate === "number" ? clampRate(metadata.successRate) : 0.5,
			metadata,
			updatedAt: new Date(this.now()).toISOString(),
		}

		this.db
			.insert(errorSolutions)
			.values(entry)
			.onConflictDoUpdate({
				target: errorSolutions.pattern,
				set: {
					solution: entry.solution,
					successRate: entry.successRate,
					metadata: entry.metadata,
					updatedAt: entry.updatedAt,
				},
			})
			.run()

		return entry
	}

	async updateSuccessRate(pattern: string, successRate: number): Promise<ErrorSolution | null> {
		const updated = this.db
			.update(errorSolutions)
			.set({ successRate: clampRate(successRate), updatedAt: new Date(this.now()).toISOString() })
			.where(eq(errorSolutions.pattern, pattern))
			.returning()
			.get()

		return updated ?? null
	}
}
