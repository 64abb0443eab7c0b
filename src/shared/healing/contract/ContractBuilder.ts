/**
 * ContractBuilder - negotiates the execution contract for one tool invocation
 *
 * The oracle is asked for a structured plan (required inputs, success criteria,
 * execution constraints). Anything short of a schema-valid answer yields the
 * deterministic fallback contract, so building a contract never fails.
 */

import {
	type ComplexityAnalysis,
	type ExecutionContract,
	type MemorySnapshot,
	oracleContractSchema,
} from "@mender/types"

import { safeStringify } from "../json"
import type { OracleClient } from "../oracle/OracleClient"

export interface BuildContractInput {
	request: string
	tool: string
	params: Record<string, unknown>
	complexity?: ComplexityAnalysis
	/** Recent finished requests, newest last; advisory context for the oracle */
	memory?: MemorySnapshot[]
}

/** How many memory snapshots are shown to the oracle */
const MEMORY_CONTEXT_SIZE = 5

export const FALLBACK_SUCCESS_CRITERIA = [
	"Tool reports a success status",
	"Tool returns a non-empty result",
] as const

// =============================================================================
// Payload helpers
// =============================================================================

/**
 * A value counts as missing when it is null, undefined, a blank string, an empty
 * array or an empty plain object
 */
export function isMissing(value: unknown): boolean {
	if (value === null || value === undefined) return true
	if (typeof value === "string") return value.trim() === ""
	if (Array.isArray(value)) return value.length === 0
	if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
		return Object.keys(value).length === 0
	}
	return false
}

/**
 * Merge the contract's proposed payload into the caller's params. Contract values only
 * fill gaps; a present caller value always wins.
 */
export function getFinalPayload(
	contract: ExecutionContract,
	params: Record<string, unknown>,
): Record<string, unknown> {
	const payload: Record<string, unknown> = { ...params }

	for (const [key, value] of Object.entries(contract.inputs.finalPayload)) {
		if (isMissing(value)) continue
		if (isMissing(payload[key])) {
			payload[key] = value
		}
	}

	return payload
}

/**
 * Flat list of required field names; `{name}` objects are unwrapped and blanks dropped
 */
export function requiredFields(contract: ExecutionContract): string[] {
	const fields: string[] = []

	for (const entry of contract.inputs.required) {
		const name = typeof entry === "string" ? entry : entry.name
		if (typeof name === "string" && name.trim() !== "") {
			fields.push(name.trim())
		}
	}

	return fields
}

export function missingRequiredFields(contract: ExecutionContract, payload: Record<string, unknown>): string[] {
	return requiredFields(contract).filter((field) => isMissing(payload[field]))
}

// =============================================================================
// Builder
// =============================================================================

export function buildFallbackContract(
	tool: string,
	request: string,
	params: Record<string, unknown>,
): ExecutionContract {
	return freezeContract({
		tool,
		intent: request,
		inputs: {
			required: Object.keys(params),
			optional: [],
			finalPayload: { ...params },
		},
		preconditions: [],
		successCriteria: [...FALLBACK_SUCCESS_CRITERIA],
		postValidations: [],
		fallbackPlan: [],
		executionConstraints: {},
		source: "fallback",
	})
}

export class ContractBuilder {
	constructor(private readonly oracle: OracleClient) {}

	async build(input: BuildContractInput): Promise<ExecutionContract> {
		const { request, tool, params } = input
		const contract = await this.oracle.askStructured(
			buildContractPrompt(input),
			oracleContractSchema,
			() => buildFallbackContract(tool, request, params),
			"contract",
		)

		return freezeContract(contract)
	}
}

export function buildContractPrompt(input: BuildContractInput): string {
	const memory = (input.memory ?? []).slice(-MEMORY_CONTEXT_SIZE)
	const sections: string[] = []

	sections.push(`You are planning a single tool invocation for an automation agent.`)
	sections.push("")
	sections.push(`## Request`)
	sections.push(input.request)
	sections.push("")
	sections.push(`## Tool`)
	sections.push(input.tool)
	sections.push("")
	sections.push(`## Parameters`)
	sections.push("```json")
	sections.push(safeStringify(input.params, 2))
	sections.push("```")

	if (input.complexity) {
		sections.push("")
		sections.push(`## Complexity`)
		sections.push(`${input.complexity.complexity}: ${input.complexity.reasoning}`)
	}

	if (memory.length > 0) {
		sections.push("")
		sections.push(`## Recent Executions`)
		for (const snapshot of memory) {
			sections.push(`- ${snapshot.tool} (${snapshot.status}, ${snapshot.attempts} attempts): ${snapshot.request}`)
		}
	}

	sections.push("")
	sections.push(`## Response Format`)
	sections.push(`Respond with a single JSON object and nothing else:`)
	sections.push("```json")
	sections.push(
		JSON.stringify(
			{
				tool: "<tool name>",
				intent: "<one sentence>",
				inputs: { required: ["<field>"], optional: ["<field>"], final_payload: {} },
				preconditions: ["<condition>"],
				success_criteria: ["<criterion>"],
				post_validations: ["<check>"],
				fallback_plan: ["<step>"],
				execution_constraints: { max_attempts: 3, max_duration_seconds: 240, max_payload_chars: 12000 },
			},
			null,
			2,
		),
	)
	sections.push("```")

	return sections.join("\n")
}

function freezeContract(contract: ExecutionContract): ExecutionContract {
	Object.freeze(contract.inputs.required)
	Object.freeze(contract.inputs.optional)
	Object.freeze(contract.inputs.finalPayload)
	Object.freeze(contract.inputs)
	Object.freeze(contract.preconditions)
	Object.freeze(contract.successCriteria)
	Object.freeze(contract.postValidations)
	Object.freeze(contract.fallbackPlan)
	Object.freeze(contract.executionConstraints)
	return Object.freeze(contract)
}
