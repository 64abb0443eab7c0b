import { z } from "zod"

/**
 * A remembered fix for an error pattern and how reliably it has worked
 */
export const errorSolutionSchema = z.object({
	pattern: z.string().min(1),
	solution: z.string(),
	successRate: z.number().min(0).max(1),
	metadata: z.record(z.string(), z.unknown()),
	updatedAt: z.string().datetime(),
})

export type ErrorSolution = z.infer<typeof errorSolutionSchema>

/** Success rate recorded the first time a fix is applied successfully */
export const INITIAL_FIX_SUCCESS_RATE = 0.9

/** Step added to a known fix's success rate after another successful application */
export const FIX_SUCCESS_RATE_STEP = 0.1

/** A known fix is trusted without scoring once its success rate exceeds this */
export const PROVEN_FIX_SUCCESS_RATE = 0.9
