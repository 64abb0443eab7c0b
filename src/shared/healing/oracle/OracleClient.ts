/**
 * OracleClient - the single ask, validate, fall back wrapper around the planning oracle
 *
 * Every structured question the engine puts to the oracle (contracts, failure analysis,
 * patch plans, complexity) goes through `askStructured`, which never throws: a missing
 * oracle, a timeout, unparseable text or a schema violation all resolve to the caller's
 * deterministic fallback.
 */

import { parse as parseYaml } from "yaml"
import type { z } from "zod"

// =============================================================================
// Port
// =============================================================================

export interface OracleResponse {
	content: string
}

/**
 * Transport to a language model (or anything that answers prompts with text)
 */
export interface Oracle {
	invoke(prompt: string): Promise<OracleResponse>
}

export interface OracleClientOptions {
	/** Absent oracle means every question resolves to its fallback */
	oracle?: Oracle | null
	timeoutMs?: number
	maxRetries?: number
	retryBaseDelayMs?: number
	/** Injected in tests to skip real backoff delays */
	sleep?: (ms: number) => Promise<void>
}

const MAX_RETRY_DELAY_MS = 10000

const RETRYABLE_ERROR_PATTERNS = [
	/timeout/i,
	/timed out/i,
	/rate limit/i,
	/\b429\b/,
	/\b5\d\d\b/,
	/network error/i,
	/connection refused/i,
	/ECONNRESET/i,
]

export function isRetryableOracleError(message: string): boolean {
	return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message))
}

// =============================================================================
// JSON extraction
// =============================================================================

/**
 * Pull the JSON-looking part out of a model answer: a ```json fence first, then any
 * fence, then the whole trimmed text.
 */
export function extractJsonText(content: string): string {
	const trimmed = content.trim()

	const jsonFence = trimmed.match(/```json\s*([\s\S]*?)\s*```/i)
	if (jsonFence?.[1] !== undefined) {
		return jsonFence[1].trim()
	}

	const anyFence = trimmed.match(/```[a-zA-Z0-9_-]*\s*([\s\S]*?)\s*```/)
	if (anyFence?.[1] !== undefined) {
		return anyFence[1].trim()
	}

	return trimmed
}

/**
 * Strict JSON first. Failing that, the outermost `{...}` span is read as a YAML flow
 * mapping, which accepts single quotes, bare keys and trailing commas.
 *
 * @returns the parsed value, or null when neither pass yields an object
 */
export function parseJsonLoose(text: string): unknown {
	const trimmed = text.trim()
	if (!trimmed) return null

	try {
		return JSON.parse(trimmed)
	} catch {
		// fall through to the relaxed pass
	}

	const start = trimmed.indexOf("{")
	const end = trimmed.lastIndexOf("}")
	if (start === -1 || end <= start) return null

	const span = trimmed.slice(start, end + 1)
	try {
		const parsed: unknown = parseYaml(span)
		return typeof parsed === "object" && parsed !== null ? parsed : null
	} catch {
		return null
	}
}

// =============================================================================
// Client
// =============================================================================

export class OracleClient {
	private readonly oracle: Oracle | null
	private readonly timeoutMs: number
	private readonly maxRetries: number
	private readonly retryBaseDelayMs: number
	private readonly sleep: (ms: number) => Promise<void>

	constructor(options: OracleClientOptions = {}) {
		this.oracle = options.oracle ?? null
		this.timeoutMs = options.timeoutMs ?? 30000
		this.maxRetries = options.maxRetries ?? 2
		this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000
		this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
	}

	get available(): boolean {
		return this.oracle !== null
	}

	/**
	 * Ask for a JSON answer and validate it; any failure resolves to `fallback()`
	 */
	async askStructured<T>(
		prompt: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		fallback: () => T,
		label: string,
	): Promise<T> {
		const response = await this.call(prompt)
		if (!response.success) {
			console.warn(`[OracleClient] ${label}: ${response.error}; using fallback`)
			return fallback()
		}

		const parsed = parseJsonLoose(extractJsonText(response.content))
		if (parsed === null) {
			console.warn(`[OracleClient] ${label}: response was not JSON; using fallback`)
			return fallback()
		}

		const result = schema.safeParse(parsed)
		if (!result.success) {
			const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
			console.warn(`[OracleClient] ${label}: response failed validation (${issues.join("; ")}); using fallback`)
			return fallback()
		}

		return result.data
	}

	/**
	 * Ask for free text
	 *
	 * @returns the trimmed answer, or null when the oracle is unavailable, fails or answers nothing
	 */
	async askText(prompt: string, label: string): Promise<string | null> {
		const response = await this.call(prompt)
		if (!response.success) {
			console.warn(`[OracleClient] ${label}: ${response.error}`)
			return null
		}

		const text = response.content.trim()
		return text ? text : null
	}

	private async call(
		prompt: string,
		retryCount = 0,
	): Promise<{ success: true; content: string } | { success: false; error: string }> {
		if (!this.oracle) {
			return { success: false, error: "No oracle configured" }
		}

		try {
			const response = await this.withTimeout(this.oracle.invoke(prompt))
			return { success: true, content: response.content }
		} catch (error) {
			const errorMessage = error instanceof Error ? error.message : String(error)

			if (retryCount < this.maxRetries && isRetryableOracleError(errorMessage)) {
				const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, retryCount), MAX_RETRY_DELAY_MS)
				await this.sleep(delay)
				return this.call(prompt, retryCount + 1)
			}

			return { success: false, error: errorMessage }
		}
	}

	private withTimeout<T>(promise: Promise<T>): Promise<T> {
		let timer: ReturnType<typeof setTimeout> | undefined
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => reject(new Error(`Oracle timeout after ${this.timeoutMs}ms`)), this.timeoutMs)
		})

		return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
	}
}
