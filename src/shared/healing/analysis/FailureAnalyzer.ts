/**
 * FailureAnalyzer - root-cause analysis for failed attempts
 *
 * Diagnostic only: the analysis steers whether a retry is worthwhile (`fixType: "config"`)
 * and is attached to patch proposals, but never changes what is executed.
 */

import { type FailureAnalysis, oracleFailureAnalysisSchema } from "@mender/types"

import { safeStringify } from "../json"
import type { OracleClient } from "../oracle/OracleClient"
import type { BoundedLog } from "../state/BoundedLog"
import type { FailurePattern } from "../state/EngineState"

export const UNKNOWN_FAILURE_ANALYSIS: Omit<FailureAnalysis, "recurrenceCount"> = {
	rootCause: "Unknown",
	fixType: "unknown",
	suggestedFix: "Manual investigation required",
	prevention: "Monitor for recurrence",
}

export class FailureAnalyzer {
	constructor(
		private readonly oracle: OracleClient,
		private readonly history: BoundedLog<FailurePattern>,
		private readonly now: () => number = Date.now,
	) {}

	async analyze(tool: string, error: string, context: Record<string, unknown>): Promise<FailureAnalysis> {
		const recurrenceCount = this.history.filter((p) => p.tool === tool && p.error === error).length + 1
		if (recurrenceCount > 1) {
			console.warn(`[FailureAnalyzer] Recurring failure for ${tool} (${recurrenceCount} times)`)
		}

		const base = await this.oracle.askStructured(
			buildFailurePrompt(tool, error, context, recurrenceCount),
			oracleFailureAnalysisSchema,
			() => ({ ...UNKNOWN_FAILURE_ANALYSIS }),
			"failure analysis",
		)

		const analysis: FailureAnalysis = { ...base, recurrenceCount }
		this.history.append({ timestamp: this.now(), tool, error, analysis })
		return analysis
	}
}

function buildFailurePrompt(
	tool: string,
	error: string,
	context: Record<string, unknown>,
	recurrenceCount: number,
): string {
	return `Analyze this tool failure and suggest a fix.

Tool: ${tool}
Error: ${error}
Context: ${safeStringify(context, 2)}
Recurrence: ${recurrenceCount} time(s)

Return JSON only:
{
  "root_cause": "explanation",
  "fix_type": "code|config|documentation",
  "suggested_fix": "detailed fix description",
  "prevention": "how to prevent this in future"
}`
}
