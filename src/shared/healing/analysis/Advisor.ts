/**
 * Advisor - best-effort free-text advice, collected and never acted on
 *
 * Alternative approaches are asked for after the final failed attempt; future
 * enhancements after slow or complex successes. Both land in the recommendation log.
 */

import type { Recommendation, RecommendationKind } from "@mender/types"

import { safeStringify } from "../json"
import type { OracleClient } from "../oracle/OracleClient"
import type { BoundedLog } from "../state/BoundedLog"

export class Advisor {
	constructor(
		private readonly oracle: OracleClient,
		private readonly log: BoundedLog<Recommendation>,
		private readonly now: () => number = Date.now,
	) {}

	async suggestAlternative(request: string, failedApproach: string, error: string): Promise<string | null> {
		const prompt = `A tool execution failed. Suggest 2-3 alternative approaches that could achieve the same goal
(different tools, different API methods, different data sources or workarounds).

Original request: ${request}
Failed approach: ${failedApproach}
Error: ${error}

Answer as clear, actionable steps.`

		return this.ask("alternative_approach", request, failedApproach, prompt)
	}

	async suggestEnhancement(request: string, tool: string, context: Record<string, unknown>): Promise<string | null> {
		const prompt = `This request succeeded, but it was slow or complex. Suggest one concrete enhancement that
would make similar requests faster or simpler next time.

Request: ${request}
Tool: ${tool}
Context: ${safeStringify(context, 2)}

Answer in a short paragraph.`

		return this.ask("future_enhancement", request, tool, prompt)
	}

	/**
	 * Recommendations of one kind, oldest first
	 */
	list(kind?: RecommendationKind): Recommendation[] {
		return kind ? this.log.filter((r) => r.kind === kind) : this.log.toArray()
	}

	private async ask(kind: RecommendationKind, request: string, tool: string, prompt: string): Promise<string | null> {
		const text = await this.oracle.askText(prompt, kind.replace("_", " "))
		if (text === null) return null

		this.log.append({ kind, request, tool, text, createdAt: this.now() })
		return text
	}
}
