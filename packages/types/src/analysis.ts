import { z } from "zod"

/**
 * Oracle analysis shapes: failure root-cause analysis and request complexity analysis.
 * Both are advisory; the engine always has a deterministic stand-in for them.
 */

export const fixTypeSchema = z.enum(["code", "config", "documentation", "unknown"])
export type FixType = z.infer<typeof fixTypeSchema>

/**
 * Failure analysis as the oracle returns it
 */
export const oracleFailureAnalysisSchema = z
	.object({
		root_cause: z.string(),
		// Oracles invent categories; anything outside the enum is "unknown"
		fix_type: z.string().transform((value): FixType => {
			const parsed = fixTypeSchema.safeParse(value.trim().toLowerCase())
			return parsed.success ? parsed.data : "unknown"
		}),
		suggested_fix: z.string().default(""),
		prevention: z.string().default(""),
	})
	.transform((raw) => ({
		rootCause: raw.root_cause,
		fixType: raw.fix_type,
		suggestedFix: raw.suggested_fix,
		prevention: raw.prevention,
	}))

export interface FailureAnalysis {
	rootCause: string
	fixType: FixType
	suggestedFix: string
	prevention: string
	/** How many times this (tool, error) pair has been seen, this one included */
	recurrenceCount: number
}

export const complexityLevelSchema = z.enum(["simple", "moderate", "complex", "very_complex", "unknown"])
export type ComplexityLevel = z.infer<typeof complexityLevelSchema>

/**
 * Request complexity analysis as the oracle returns it
 */
export const oracleComplexityAnalysisSchema = z
	.object({
		complexity: complexityLevelSchema,
		required_domains: z.array(z.string()).default([]),
		capabilities_sufficient: z.boolean().default(true),
		missing_capabilities: z.array(z.string()).default([]),
		reasoning: z.string().default(""),
	})
	.transform(
		(raw): ComplexityAnalysis => ({
			complexity: raw.complexity,
			requiredDomains: raw.required_domains,
			capabilitiesSufficient: raw.capabilities_sufficient,
			missingCapabilities: raw.missing_capabilities,
			reasoning: raw.reasoning,
		}),
	)

export interface ComplexityAnalysis {
	complexity: ComplexityLevel
	requiredDomains: string[]
	capabilitiesSufficient: boolean
	missingCapabilities: string[]
	reasoning: string
}

export function isComplex(analysis: ComplexityAnalysis | undefined): boolean {
	return analysis?.complexity === "complex" || analysis?.complexity === "very_complex"
}
