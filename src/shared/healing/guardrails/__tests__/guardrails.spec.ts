import { describe, it, expect, vi } from "vitest"
import { DEFAULT_GUARDRAILS } from "@mender/types"

import { RetryPolicy, deriveGuardrails } from "../index"

describe("deriveGuardrails", () => {
	it("returns the defaults when there are no constraints", () => {
		expect(deriveGuardrails({ executionConstraints: {} })).toEqual({
			maxAttempts: 3,
			maxDurationSeconds: 240,
			maxPayloadChars: 12000,
		})
	})

	it("applies positive numeric overrides", () => {
		const guardrails = deriveGuardrails({
			executionConstraints: { max_attempts: 5, max_duration_seconds: 12.5, max_payload_chars: 500 },
		})
		expect(guardrails).toEqual({ maxAttempts: 5, maxDurationSeconds: 12.5, maxPayloadChars: 500 })
	})

	it("ignores invalid overrides", () => {
		const guardrails = deriveGuardrails({
			executionConstraints: {
				max_attempts: "five",
				max_duration_seconds: -1,
				max_payload_chars: Number.POSITIVE_INFINITY,
			},
		})
		expect(guardrails).toEqual(DEFAULT_GUARDRAILS)
	})

	it("keeps the default attempts for zero and fractional-below-one values", () => {
		expect(deriveGuardrails({ executionConstraints: { max_attempts: 0 } }).maxAttempts).toBe(3)
		expect(deriveGuardrails({ executionConstraints: { max_attempts: 0.5 } }).maxAttempts).toBe(3)
		expect(deriveGuardrails({ executionConstraints: { max_attempts: 2.7 } }).maxAttempts).toBe(2)
	})

	it("ignores unknown keys", () => {
		expect(deriveGuardrails({ executionConstraints: { timeout: 5, maxAttempts: 9 } })).toEqual(DEFAULT_GUARDRAILS)
	})

	it("overlays onto configured defaults", () => {
		const defaults = { maxAttempts: 1, maxDurationSeconds: 10, maxPayloadChars: 100 }
		expect(deriveGuardrails({ executionConstraints: { max_attempts: 4 } }, defaults)).toEqual({
			maxAttempts: 4,
			maxDurationSeconds: 10,
			maxPayloadChars: 100,
		})
	})
})

describe("RetryPolicy", () => {
	const guardrails = { maxAttempts: 3, maxDurationSeconds: 2, maxPayloadChars: 100 }

	it("tracks the last attempt", () => {
		const policy = new RetryPolicy({ guardrails })
		expect(policy.isLastAttempt(2)).toBe(false)
		expect(policy.isLastAttempt(3)).toBe(true)
	})

	it("measures the deadline with the injected clock", () => {
		let now = 1000
		const policy = new RetryPolicy({ guardrails, now: () => now })

		now = 3000
		expect(policy.elapsedMs()).toBe(2000)
		expect(policy.deadlineExceeded()).toBe(false)

		now = 3001
		expect(policy.deadlineExceeded()).toBe(true)
	})

	it("waits the backoff only before retries", async () => {
		const sleep = vi.fn(() => Promise.resolve())
		const policy = new RetryPolicy({ guardrails, backoffMs: 250, sleep })

		await policy.beforeAttempt(1)
		await policy.beforeAttempt(2)

		expect(sleep.mock.calls).toEqual([[250]])
	})

	it("skips the backoff for an immediate retry", async () => {
		const sleep = vi.fn(() => Promise.resolve())
		const policy = new RetryPolicy({ guardrails, backoffMs: 250, sleep })

		await policy.beforeAttempt(2, { immediate: true })

		expect(sleep).not.toHaveBeenCalled()
	})

	it("reports cancellation from the abort signal", () => {
		const controller = new AbortController()
		const policy = new RetryPolicy({ guardrails, signal: controller.signal })

		expect(policy.cancelled).toBe(false)
		controller.abort()
		expect(policy.cancelled).toBe(true)
	})
})
