import { DEFAULT_GUARDRAILS, type ExecutionContract, GUARDRAIL_CONSTRAINT_KEYS, type Guardrails } from "@mender/types"

const INTEGER_GUARDRAILS: ReadonlySet<keyof Guardrails> = new Set(["maxAttempts", "maxPayloadChars"])

/**
 * Overlay the contract's execution constraints onto the defaults.
 *
 * Only known keys with a finite positive number take effect; anything else keeps the
 * default. Attempt and payload limits are whole numbers, so fractions are floored and
 * a value that floors to zero is ignored.
 */
export function deriveGuardrails(
	contract: Pick<ExecutionContract, "executionConstraints">,
	defaults: Guardrails = DEFAULT_GUARDRAILS,
): Guardrails {
	const guardrails: Guardrails = { ...defaults }

	for (const [constraint, value] of Object.entries(contract.executionConstraints)) {
		const field = GUARDRAIL_CONSTRAINT_KEYS[constraint]
		if (!field) continue
		if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) continue

		const effective = INTEGER_GUARDRAILS.has(field) ? Math.floor(value) : value
		if (effective > 0) {
			guardrails[field] = effective
		}
	}

	return guardrails
}
