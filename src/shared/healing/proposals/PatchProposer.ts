/**
 * PatchProposer - asks the oracle for a file-level fix after a terminal failure
 */

import { type PatchPlan, type PatchTrigger, oraclePatchPlanSchema } from "@mender/types"

import { safeStringify } from "../json"
import type { OracleClient } from "../oracle/OracleClient"

export interface ProposePatchInput {
	trigger: PatchTrigger
	request: string
	tool: string
	error: string
	context: Record<string, unknown>
}

export class PatchProposer {
	constructor(private readonly oracle: OracleClient) {}

	/**
	 * @returns the plan, or null when the oracle is unavailable or its answer is unusable
	 */
	async propose(input: ProposePatchInput): Promise<PatchPlan | null> {
		return this.oracle.askStructured(
			buildPatchPrompt(input),
			oraclePatchPlanSchema.nullable(),
			() => null,
			"patch plan",
		)
	}
}

export function buildPatchPrompt(input: ProposePatchInput): string {
	return `A tool invocation failed and could not be recovered by retrying. Propose a minimal code
change to the tool implementation that would fix it.

Trigger: ${input.trigger}
Request: ${input.request}
Tool: ${input.tool}
Error: ${input.error}
Context: ${safeStringify(input.context, 2)}

Rules:
- "replace" needs "search" (exact text occurring once in the file) and "replace"
- "create" and "append" need "content"
- Paths are relative to the project root

Return JSON only:
{
  "summary": "one line",
  "reason": "why this fixes the failure",
  "files": [
    { "path": "src/tools/example.ts", "operation": "replace", "description": "what changes", "search": "old", "replace": "new" },
    { "path": "src/tools/new.ts", "operation": "create", "description": "what it adds", "content": "..." }
  ],
  "test_plan": "how to verify"
}`
}
