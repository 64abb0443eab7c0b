import { describe, it, expect, vi } from "vitest"
import { z } from "zod"

import { OracleClient, extractJsonText, isRetryableOracleError, parseJsonLoose, type Oracle } from "../OracleClient"

const answerSchema = z.object({ value: z.number() })

function mockOracle(...answers: Array<string | Error>): Oracle & { invoke: ReturnType<typeof vi.fn> } {
	const invoke = vi.fn()
	for (const answer of answers) {
		if (answer instanceof Error) {
			invoke.mockRejectedValueOnce(answer)
		} else {
			invoke.mockResolvedValueOnce({ content: answer })
		}
	}
	return { invoke }
}

const noSleep = () => Promise.resolve()

describe("extractJsonText", () => {
	it("prefers a json fence", () => {
		const content = 'Here you go:\n```json\n{"value": 1}\n```\nand ```\nother\n```'
		expect(extractJsonText(content)).toBe('{"value": 1}')
	})

	it("falls back to any fence", () => {
		expect(extractJsonText("```\n{\"value\": 2}\n```")).toBe('{"value": 2}')
	})

	it("returns the trimmed text when there is no fence", () => {
		expect(extractJsonText('  {"value": 3}  \n')).toBe('{"value": 3}')
	})
})

describe("parseJsonLoose", () => {
	it("parses strict JSON", () => {
		expect(parseJsonLoose('{"a": [1, 2]}')).toEqual({ a: [1, 2] })
	})

	it("accepts single quotes, bare keys and trailing commas", () => {
		expect(parseJsonLoose("{a: 'x', 'b': 2,}")).toEqual({ a: "x", b: 2 })
	})

	it("cuts to the outermost braces", () => {
		expect(parseJsonLoose("Sure! {tool: 'export', n: 1} Hope that helps.")).toEqual({ tool: "export", n: 1 })
	})

	it("returns null for text without an object", () => {
		expect(parseJsonLoose("no json here")).toBeNull()
		expect(parseJsonLoose("")).toBeNull()
	})
})

describe("isRetryableOracleError", () => {
	it("recognizes transient failures", () => {
		expect(isRetryableOracleError("Request timeout")).toBe(true)
		expect(isRetryableOracleError("rate limit exceeded")).toBe(true)
		expect(isRetryableOracleError("503 Service Unavailable")).toBe(true)
		expect(isRetryableOracleError("read ECONNRESET")).toBe(true)
	})

	it("does not retry client errors", () => {
		expect(isRetryableOracleError("401 Unauthorized")).toBe(false)
		expect(isRetryableOracleError("invalid prompt")).toBe(false)
	})
})

describe("OracleClient", () => {
	describe("askStructured", () => {
		it("returns the validated answer", async () => {
			const oracle = mockOracle('```json\n{"value": 42}\n```')
			const client = new OracleClient({ oracle, sleep: noSleep })

			const result = await client.askStructured("q", answerSchema, () => ({ value: 0 }), "test")

			expect(result).toEqual({ value: 42 })
			expect(oracle.invoke).toHaveBeenCalledWith("q")
		})

		it("uses the fallback when no oracle is configured", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const client = new OracleClient()

			expect(client.available).toBe(false)
			expect(await client.askStructured("q", answerSchema, () => ({ value: -1 }), "test")).toEqual({ value: -1 })
			warn.mockRestore()
		})

		it("uses the fallback on a schema violation", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const client = new OracleClient({ oracle: mockOracle('{"value": "not a number"}'), sleep: noSleep })

			const result = await client.askStructured("q", answerSchema, () => ({ value: -1 }), "test")

			expect(result).toEqual({ value: -1 })
			expect(warn).toHaveBeenCalledWith(expect.stringContaining("[OracleClient] test: response failed validation"))
			warn.mockRestore()
		})

		it("uses the fallback on prose", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const client = new OracleClient({ oracle: mockOracle("I cannot help with that."), sleep: noSleep })

			expect(await client.askStructured("q", answerSchema, () => ({ value: -1 }), "test")).toEqual({ value: -1 })
			warn.mockRestore()
		})

		it("retries transient errors with exponential backoff", async () => {
			const oracle = mockOracle(new Error("timeout"), new Error("rate limit exceeded"), '{"value": 7}')
			const sleep = vi.fn(noSleep)
			const client = new OracleClient({ oracle, maxRetries: 2, retryBaseDelayMs: 1000, sleep })

			const result = await client.askStructured("q", answerSchema, () => ({ value: 0 }), "test")

			expect(result).toEqual({ value: 7 })
			expect(oracle.invoke).toHaveBeenCalledTimes(3)
			expect(sleep.mock.calls).toEqual([[1000], [2000]])
		})

		it("respects the retry limit", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const oracle: Oracle & { invoke: ReturnType<typeof vi.fn> } = {
				invoke: vi.fn().mockRejectedValue(new Error("500 internal error")),
			}
			const client = new OracleClient({ oracle, maxRetries: 2, sleep: noSleep })

			const result = await client.askStructured("q", answerSchema, () => ({ value: 0 }), "test")

			expect(result).toEqual({ value: 0 })
			expect(oracle.invoke).toHaveBeenCalledTimes(3)
			warn.mockRestore()
		})

		it("does not retry non-transient errors", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const oracle = mockOracle(new Error("invalid api key"))
			const client = new OracleClient({ oracle, maxRetries: 2, sleep: noSleep })

			await client.askStructured("q", answerSchema, () => ({ value: 0 }), "test")

			expect(oracle.invoke).toHaveBeenCalledTimes(1)
			warn.mockRestore()
		})

		it("times out a hung oracle", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const oracle: Oracle = { invoke: () => new Promise(() => {}) }
			const client = new OracleClient({ oracle, timeoutMs: 10, maxRetries: 0, sleep: noSleep })

			const result = await client.askStructured("q", answerSchema, () => ({ value: -2 }), "test")

			expect(result).toEqual({ value: -2 })
			expect(warn).toHaveBeenCalledWith("[OracleClient] test: Oracle timeout after 10ms; using fallback")
			warn.mockRestore()
		})
	})

	describe("askText", () => {
		it("returns trimmed text", async () => {
			const client = new OracleClient({ oracle: mockOracle("  try a smaller batch \n"), sleep: noSleep })
			expect(await client.askText("q", "alt")).toBe("try a smaller batch")
		})

		it("returns null for an empty answer", async () => {
			const client = new OracleClient({ oracle: mockOracle("   "), sleep: noSleep })
			expect(await client.askText("q", "alt")).toBeNull()
		})

		it("returns null when the oracle fails", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
			const client = new OracleClient({ oracle: mockOracle(new Error("boom")), sleep: noSleep })
			expect(await client.askText("q", "alt")).toBeNull()
			warn.mockRestore()
		})
	})
})
