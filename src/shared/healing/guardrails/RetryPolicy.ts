/**
 * RetryPolicy - owns the attempt budget, the wall-clock deadline, the delay between
 * attempts and cancellation for one request
 */

import type { Guardrails } from "@mender/types"

export interface RetryPolicyOptions {
	guardrails: Guardrails
	/** Delay before every attempt after the first */
	backoffMs?: number
	/** Checked between attempts; an in-flight attempt is never interrupted */
	signal?: AbortSignal
	now?: () => number
	sleep?: (ms: number) => Promise<void>
}

export class RetryPolicy {
	readonly maxAttempts: number
	readonly maxDurationMs: number
	private readonly backoffMs: number
	private readonly signal?: AbortSignal
	private readonly now: () => number
	private readonly sleep: (ms: number) => Promise<void>
	private readonly startedAt: number

	constructor(options: RetryPolicyOptions) {
		this.maxAttempts = options.guardrails.maxAttempts
		this.maxDurationMs = options.guardrails.maxDurationSeconds * 1000
		this.backoffMs = options.backoffMs ?? 0
		this.signal = options.signal
		this.now = options.now ?? Date.now
		this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
		this.startedAt = this.now()
	}

	elapsedMs(): number {
		return this.now() - this.startedAt
	}

	isLastAttempt(attempt: number): boolean {
		return attempt >= this.maxAttempts
	}

	deadlineExceeded(): boolean {
		return this.elapsedMs() > this.maxDurationMs
	}

	get cancelled(): boolean {
		return this.signal?.aborted ?? false
	}

	/**
	 * Wait out the backoff before attempt `attempt` (1-based); the first attempt never
	 * waits, nor does an `immediate` retry
	 */
	async beforeAttempt(attempt: number, options: { immediate?: boolean } = {}): Promise<void> {
		if (attempt > 1 && !options.immediate && this.backoffMs > 0) {
			await this.sleep(this.backoffMs)
		}
	}
}
