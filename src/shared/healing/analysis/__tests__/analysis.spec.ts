import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import type { Recommendation } from "@mender/types"

import { OracleClient, type Oracle } from "../../oracle/OracleClient"
import { BoundedLog } from "../../state/BoundedLog"
import type { FailurePattern } from "../../state/EngineState"
import { Advisor, ComplexityAnalyzer, FailureAnalyzer, UNKNOWN_FAILURE_ANALYSIS } from "../index"

function oracleAnswering(...contents: string[]): Oracle & { invoke: ReturnType<typeof vi.fn> } {
	const invoke = vi.fn()
	for (const content of contents) invoke.mockResolvedValueOnce({ content })
	return { invoke }
}

beforeEach(() => {
	vi.spyOn(console, "warn").mockImplementation(() => {})
})

afterEach(() => {
	vi.restoreAllMocks()
})

describe("FailureAnalyzer", () => {
	it("normalizes the oracle analysis and records the pattern", async () => {
		const oracle = oracleAnswering(
			JSON.stringify({
				root_cause: "Region not set",
				fix_type: "Config",
				suggested_fix: "Pass region",
				prevention: "Validate params",
			}),
		)
		const history = new BoundedLog<FailurePattern>(10)
		const analyzer = new FailureAnalyzer(new OracleClient({ oracle }), history, () => 42)

		const analysis = await analyzer.analyze("export_csv", "missing region", { attempt: 1 })

		expect(analysis).toEqual({
			rootCause: "Region not set",
			fixType: "config",
			suggestedFix: "Pass region",
			prevention: "Validate params",
			recurrenceCount: 1,
		})
		expect(history.toArray()).toEqual([{ timestamp: 42, tool: "export_csv", error: "missing region", analysis }])
	})

	it("counts recurrences of the same tool and error", async () => {
		const history = new BoundedLog<FailurePattern>(10)
		const analyzer = new FailureAnalyzer(new OracleClient(), history)

		await analyzer.analyze("t", "boom", {})
		await analyzer.analyze("t", "other", {})
		await analyzer.analyze("u", "boom", {})
		const third = await analyzer.analyze("t", "boom", {})

		expect(third.recurrenceCount).toBe(2)
	})

	it("degrades to the unknown stub", async () => {
		const analyzer = new FailureAnalyzer(new OracleClient({ oracle: oracleAnswering("not json") }), new BoundedLog(10))

		const analysis = await analyzer.analyze("t", "boom", {})

		expect(analysis).toEqual({ ...UNKNOWN_FAILURE_ANALYSIS, recurrenceCount: 1 })
		expect(analysis.rootCause).toBe("Unknown")
		expect(analysis.suggestedFix).toBe("Manual investigation required")
		expect(analysis.prevention).toBe("Monitor for recurrence")
	})

	it("maps unrecognized fix types to unknown", async () => {
		const oracle = oracleAnswering(JSON.stringify({ root_cause: "x", fix_type: "infrastructure" }))
		const analyzer = new FailureAnalyzer(new OracleClient({ oracle }), new BoundedLog(10))

		expect((await analyzer.analyze("t", "e", {})).fixType).toBe("unknown")
	})
})

describe("ComplexityAnalyzer", () => {
	it("lists the available tools in the prompt", async () => {
		const oracle = oracleAnswering(
			'```json\n{"complexity": "complex", "required_domains": ["aws"], "capabilities_sufficient": false, "missing_capabilities": ["s3_export"], "reasoning": "multi-step"}\n```',
		)
		const analyzer = new ComplexityAnalyzer(new OracleClient({ oracle }), () => ["export_csv", "run_query"])

		const analysis = await analyzer.analyze("export all buckets")

		expect(analysis).toEqual({
			complexity: "complex",
			requiredDomains: ["aws"],
			capabilitiesSufficient: false,
			missingCapabilities: ["s3_export"],
			reasoning: "multi-step",
		})
		expect(oracle.invoke.mock.calls[0]?.[0]).toContain("Available tools: export_csv, run_query")
	})

	it("falls back to unknown with sufficient capabilities", async () => {
		const analysis = await new ComplexityAnalyzer(new OracleClient()).analyze("anything")

		expect(analysis).toEqual({
			complexity: "unknown",
			requiredDomains: [],
			capabilitiesSufficient: true,
			missingCapabilities: [],
			reasoning: "Analysis unavailable",
		})
	})
})

describe("Advisor", () => {
	it("logs alternative approaches", async () => {
		const log = new BoundedLog<Recommendation>(10)
		const advisor = new Advisor(new OracleClient({ oracle: oracleAnswering(" Use the batch API. ") }), log, () => 7)

		const text = await advisor.suggestAlternative("export", "export_csv", "timeout")

		expect(text).toBe("Use the batch API.")
		expect(advisor.list("alternative_approach")).toEqual([
			{ kind: "alternative_approach", request: "export", tool: "export_csv", text: "Use the batch API.", createdAt: 7 },
		])
		expect(advisor.list("future_enhancement")).toEqual([])
	})

	it("logs future enhancements", async () => {
		const log = new BoundedLog<Recommendation>(10)
		const advisor = new Advisor(new OracleClient({ oracle: oracleAnswering("Cache the listing.") }), log, () => 8)

		await advisor.suggestEnhancement("list buckets", "list_s3", { durationMs: 9000 })

		expect(log.toArray()).toEqual([
			{ kind: "future_enhancement", request: "list buckets", tool: "list_s3", text: "Cache the listing.", createdAt: 8 },
		])
	})

	it("records nothing when the oracle is unavailable", async () => {
		const log = new BoundedLog<Recommendation>(10)
		const advisor = new Advisor(new OracleClient(), log)

		expect(await advisor.suggestAlternative("r", "t", "e")).toBeNull()
		expect(log.size).toBe(0)
	})
})
