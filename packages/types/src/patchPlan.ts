import { z } from "zod"

/**
 * Patch Plan Types
 *
 * A patch plan is a file-level code change proposed by the oracle after a failure.
 * The file-operation shape (`path, operation, description, search/replace | content`)
 * is shared with the proposal store and must not drift.
 */

export const patchOperationSchema = z.enum(["replace", "create", "append"])
export type PatchOperation = z.infer<typeof patchOperationSchema>

export const replaceFileChangeSchema = z.object({
	path: z.string().min(1),
	operation: z.literal("replace"),
	description: z.string().default(""),
	/** Exact text to find; must occur once in the target */
	search: z.string().min(1),
	replace: z.string(),
})

export const createFileChangeSchema = z.object({
	path: z.string().min(1),
	operation: z.literal("create"),
	description: z.string().default(""),
	content: z.string().min(1),
})

export const appendFileChangeSchema = z.object({
	path: z.string().min(1),
	operation: z.literal("append"),
	description: z.string().default(""),
	content: z.string().min(1),
})

export const fileChangeSchema = z.discriminatedUnion("operation", [
	replaceFileChangeSchema,
	createFileChangeSchema,
	appendFileChangeSchema,
])

export type ReplaceFileChange = z.infer<typeof replaceFileChangeSchema>
export type CreateFileChange = z.infer<typeof createFileChangeSchema>
export type AppendFileChange = z.infer<typeof appendFileChangeSchema>
export type FileChange = z.infer<typeof fileChangeSchema>

/**
 * Patch plan as the oracle returns it
 */
export const oraclePatchPlanSchema = z
	.object({
		summary: z.string().min(1),
		reason: z.string().default(""),
		files: z.array(fileChangeSchema).min(1),
		test_plan: z.string().default(""),
	})
	.transform(
		(raw): PatchPlan => ({
			summary: raw.summary,
			reason: raw.reason,
			files: raw.files,
			testPlan: raw.test_plan,
		}),
	)

export interface PatchPlan {
	summary: string
	reason: string
	files: FileChange[]
	testPlan: string
}

export const patchTriggerSchema = z.enum(["tool_failure", "guardrail_breach", "capability_gap"])
export type PatchTrigger = z.infer<typeof patchTriggerSchema>
