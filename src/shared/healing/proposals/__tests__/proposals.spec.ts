import { describe, it, expect, vi, afterEach } from "vitest"
import type { FileChange, PatchPlan } from "@mender/types"

import { OracleClient, type Oracle } from "../../oracle/OracleClient"
import { ConfidenceScorer, PatchProposer, scoreConfidence } from "../index"

const create = (p: string): FileChange => ({ path: p, operation: "create", description: "", content: "x" })
const append = (p: string): FileChange => ({ path: p, operation: "append", description: "", content: "x" })
const replace = (p: string, search: string): FileChange => ({
	path: p,
	operation: "replace",
	description: "",
	search,
	replace: "y",
})

function plan(summary: string, files: FileChange[] = [create("src/a.ts")]): PatchPlan {
	return { summary, reason: "", files, testPlan: "" }
}

describe("scoreConfidence", () => {
	it("starts at one half", () => {
		expect(scoreConfidence({ error: "boom", plan: plan("Rework the client"), attempts: 1 })).toBe(0.5)
	})

	it("rewards simple errors", () => {
		expect(scoreConfidence({ error: "TypeError: x is undefined", plan: plan("Rework"), attempts: 1 })).toBeCloseTo(0.7)
		expect(scoreConfidence({ error: "Missing region", plan: plan("Rework"), attempts: 1 })).toBeCloseTo(0.7)
	})

	it("rewards mechanical fixes", () => {
		expect(scoreConfidence({ error: "boom", plan: plan("Add missing region default"), attempts: 1 })).toBeCloseTo(0.8)
	})

	it("rewards reproduced failures", () => {
		expect(scoreConfidence({ error: "boom", plan: plan("Rework"), attempts: 3 })).toBeCloseTo(0.6)
		expect(scoreConfidence({ error: "boom", plan: plan("Rework"), attempts: 2 })).toBe(0.5)
	})

	it("is monotonic and clipped to 1", () => {
		const base = { error: "boom", plan: plan("Rework"), attempts: 1 }
		const withError = { ...base, error: "ImportError: no module" }
		const withFix = { ...withError, plan: plan("Fix typo in import") }
		const withAttempts = { ...withFix, attempts: 3 }

		const scores = [base, withError, withFix, withAttempts].map(scoreConfidence)

		for (let i = 1; i < scores.length; i++) {
			expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1] ?? 0)
		}
		expect(scores[3]).toBe(1)
	})
})

describe("ConfidenceScorer.assessRisk", () => {
	const scorer = new ConfidenceScorer()

	it("rates more than three files high even when all are creates", () => {
		const files = ["a", "b", "c", "d"].map((n) => create(`src/${n}.ts`))
		expect(scorer.assessRisk({ files })).toBe("high")
	})

	it("rates create-only plans low", () => {
		expect(scorer.assessRisk({ files: [create("src/a.ts"), create("src/ExecutionEngine.ts")] })).toBe("low")
	})

	it("rates critical files high", () => {
		expect(scorer.assessRisk({ files: [append("src/core/ExecutionEngine.ts")] })).toBe("high")
		expect(scorer.assessRisk({ files: [replace("package.json", "import")] })).toBe("high")
		expect(scorer.assessRisk({ files: [append("lib\\AutoFixGate.ts")] })).toBe("high")
	})

	it("rates small import edits low", () => {
		expect(scorer.assessRisk({ files: [replace("src/tools/export.ts", 'import { a } from "./a"')] })).toBe("low")
	})

	it("rates large import edits medium", () => {
		const search = "import " + "x".repeat(100)
		expect(scorer.assessRisk({ files: [replace("src/tools/export.ts", search)] })).toBe("medium")
	})

	it("rates everything else medium", () => {
		expect(scorer.assessRisk({ files: [append("src/tools/export.ts")] })).toBe("medium")
	})

	it("honors configured critical files", () => {
		const custom = new ConfidenceScorer(["settings.ts"])
		expect(custom.assessRisk({ files: [append("src/settings.ts")] })).toBe("high")
		expect(custom.assessRisk({ files: [append("src/ExecutionEngine.ts")] })).toBe("medium")
	})

	it("scores confidence and risk together", () => {
		expect(scorer.score("KeyError: region", plan("Add missing key", [create("src/x.ts")]), 3)).toEqual({
			confidence: 1,
			riskLevel: "low",
		})
	})
})

describe("PatchProposer", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("returns the normalized plan", async () => {
		const answer = {
			summary: "Add missing region default",
			reason: "region was undefined",
			files: [{ path: "src/tools/export.ts", operation: "replace", search: "region", replace: "region ?? 'us-east-1'" }],
			test_plan: "rerun export",
		}
		const oracle: Oracle = { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(answer) }) }

		const result = await new PatchProposer(new OracleClient({ oracle })).propose({
			trigger: "tool_failure",
			request: "export",
			tool: "export_csv",
			error: "region undefined",
			context: {},
		})

		expect(result).toEqual({
			summary: "Add missing region default",
			reason: "region was undefined",
			files: [
				{
					path: "src/tools/export.ts",
					operation: "replace",
					description: "",
					search: "region",
					replace: "region ?? 'us-east-1'",
				},
			],
			testPlan: "rerun export",
		})
	})

	it("returns null for a plan violating the file-operation rules", async () => {
		vi.spyOn(console, "warn").mockImplementation(() => {})
		const answer = { summary: "s", files: [{ path: "a.ts", operation: "create" }] }
		const oracle: Oracle = { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(answer) }) }

		const result = await new PatchProposer(new OracleClient({ oracle })).propose({
			trigger: "tool_failure",
			request: "r",
			tool: "t",
			error: "e",
			context: {},
		})

		expect(result).toBeNull()
	})
})
