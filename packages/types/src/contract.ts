import { z } from "zod"

/**
 * Execution Contract Types
 *
 * A contract is the structured plan for one tool invocation: which inputs it needs,
 * what success looks like and how hard the engine may try. The planning oracle answers
 * in snake_case JSON; the schema below validates that answer and normalizes it.
 */

// =============================================================================
// Contract
// =============================================================================

/**
 * A required input is either a bare field name or an object carrying one
 */
export const requiredInputSchema = z.union([
	z.string(),
	z.object({ name: z.string().optional() }).passthrough(),
])

export type RequiredInput = z.infer<typeof requiredInputSchema>

/**
 * Oracles sometimes answer list items with objects; keep them as JSON text
 */
const stringListItemSchema = z
	.union([z.string(), z.record(z.string(), z.unknown())])
	.transform((item) => (typeof item === "string" ? item : JSON.stringify(item)))

const stringListSchema = z.array(stringListItemSchema)

/**
 * Advisory lists and maps: a malformed or null value reads as empty
 */
const lenientListSchema = stringListSchema.catch([])
const lenientRecordSchema = z.record(z.string(), z.unknown()).catch({})

/**
 * Optional inputs come in the same shapes as required ones but are kept as names
 */
const optionalInputsSchema = z
	.array(requiredInputSchema)
	.transform((items) =>
		items.flatMap((item) => {
			const name = typeof item === "string" ? item : item.name
			return name?.trim() ? [name] : []
		}),
	)
	.catch([])

/**
 * Schema for a contract as the oracle returns it
 */
export const oracleContractSchema = z
	.object({
		tool: z.string().min(1),
		intent: z.string(),
		inputs: z.object({
			required: z
				.array(requiredInputSchema)
				.nullish()
				.transform((items) => items ?? []),
			optional: optionalInputsSchema,
			final_payload: lenientRecordSchema,
		}),
		preconditions: lenientListSchema,
		success_criteria: stringListSchema,
		post_validations: lenientListSchema,
		fallback_plan: lenientListSchema,
		execution_constraints: lenientRecordSchema,
	})
	.transform(
		(raw): ExecutionContract => ({
			tool: raw.tool,
			intent: raw.intent,
			inputs: {
				required: raw.inputs.required,
				optional: raw.inputs.optional,
				finalPayload: raw.inputs.final_payload,
			},
			preconditions: raw.preconditions,
			successCriteria: raw.success_criteria,
			postValidations: raw.post_validations,
			fallbackPlan: raw.fallback_plan,
			executionConstraints: raw.execution_constraints,
			source: "oracle",
		}),
	)

/**
 * Normalized execution contract
 */
export interface ExecutionContract {
	tool: string
	intent: string
	inputs: {
		required: RequiredInput[]
		optional: string[]
		/** Values the oracle proposes for the payload; they only fill gaps */
		finalPayload: Record<string, unknown>
	}
	preconditions: string[]
	successCriteria: string[]
	postValidations: string[]
	fallbackPlan: string[]
	/** Raw overrides; only positive numbers for known guardrail keys take effect */
	executionConstraints: Record<string, unknown>
	/** Whether the oracle produced the contract or the deterministic fallback did */
	source: "oracle" | "fallback"
}

// =============================================================================
// Guardrails
// =============================================================================

export const guardrailsSchema = z.object({
	/** Upper bound on tool attempts */
	maxAttempts: z.number().int().positive(),
	/** Wall-clock budget across all attempts */
	maxDurationSeconds: z.number().positive(),
	/** Largest serialized outgoing payload the engine will send */
	maxPayloadChars: z.number().int().positive(),
})

export type Guardrails = z.infer<typeof guardrailsSchema>

export const DEFAULT_GUARDRAILS: Guardrails = {
	maxAttempts: 3,
	maxDurationSeconds: 240,
	maxPayloadChars: 12000,
}

/**
 * Contract constraint keys mapped onto guardrail fields
 */
export const GUARDRAIL_CONSTRAINT_KEYS: Record<string, keyof Guardrails> = {
	max_attempts: "maxAttempts",
	max_duration_seconds: "maxDurationSeconds",
	max_payload_chars: "maxPayloadChars",
}
