import { z } from "zod"

import { fileChangeSchema, patchTriggerSchema } from "./patchPlan"

export const proposalStatusSchema = z.enum(["pending", "auto_applied", "applied", "rejected"])
export type ProposalStatus = z.infer<typeof proposalStatusSchema>

export const riskLevelSchema = z.enum(["low", "medium", "high"])
export type RiskLevel = z.infer<typeof riskLevelSchema>

export const enhancementProposalSchema = z
	.object({
		id: z.string().min(1),
		trigger: patchTriggerSchema,
		userRequest: z.string(),
		tool: z.string(),
		error: z.string(),
		/**
		 * Key used to look up proven fixes in the knowledge store.
		 */
		errorPattern: z.string(),
		/** Failure analysis captured when the proposal was generated */
		analysis: z.record(z.string(), z.unknown()).nullable(),
		summary: z.string(),
		reason: z.string(),
		files: z.array(fileChangeSchema),
		testPlan: z.string(),
		metadata: z.record(z.string(), z.unknown()),
		confidence: z.number().min(0).max(1),
		riskLevel: riskLevelSchema,
		status: proposalStatusSchema,
		createdAt: z.string().datetime(),
		appliedAt: z.string().datetime().optional(),
		rejectedAt: z.string().datetime().optional(),
		backupPath: z.string().optional(),
	})
	.strict()

export type EnhancementProposal = z.infer<typeof enhancementProposalSchema>

/**
 * What a caller hands to the registry; the registry owns id, status and timestamps
 */
export type NewEnhancementProposal = Omit<
	EnhancementProposal,
	"id" | "status" | "createdAt" | "appliedAt" | "rejectedAt" | "backupPath"
>

export function formatProposalMarkdown(proposal: EnhancementProposal): string {
	const files = proposal.files

	return [
		`# Enhancement Proposal`,
		"",
		`- Proposal ID: ${proposal.id}`,
		`- Created: ${proposal.createdAt}`,
		`- Status: ${proposal.status}`,
		`- Trigger: ${proposal.trigger}`,
		`- Tool: ${proposal.tool}`,
		`- Confidence: ${Math.round(proposal.confidence * 100)}%`,
		`- Risk: ${proposal.riskLevel}`,
		"",
		`## Summary`,
		"",
		proposal.summary.trim(),
		"",
		proposal.reason ? `## Reason\n\n${proposal.reason.trim()}\n` : "",
		proposal.error ? `## Error\n\n\`\`\`\n${proposal.error.trim()}\n\`\`\`\n` : "",
		files.length > 0
			? `## Files\n\n${files
					.map((f) => `- ${f.operation} \`${f.path}\`${f.description ? `: ${f.description}` : ""}`)
					.join("\n")}\n`
			: "",
		proposal.testPlan ? `## Test Plan\n\n${proposal.testPlan.trim()}\n` : "",
	]
		.filter((s) => s !== "")
		.join("\n")
}
