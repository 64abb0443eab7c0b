import { index, real, sqliteTable, text } from "drizzle-orm/sqlite-core"

import type { FileChange } from "@mender/types"

// Proposals Table
export const proposals = sqliteTable(
	"proposals",
	{
		id: text("id").primaryKey(),
		trigger: text("trigger", { enum: ["tool_failure", "guardrail_breach", "capability_gap"] }).notNull(),
		userRequest: text("user_request").notNull(),
		tool: text("tool").notNull(),
		error: text("error").notNull(),
		errorPattern: text("error_pattern").notNull(),
		analysis: text("analysis", { mode: "json" }).$type<Record<string, unknown> | null>(),
		summary: text("summary").notNull(),
		reason: text("reason").notNull(),
		files: text("files", { mode: "json" }).$type<FileChange[]>().notNull(),
		testPlan: text("test_plan").notNull(),
		metadata: text("metadata", { mode: "json" }).$type<Record<string, unknown>>().notNull(),
		confidence: real("confidence").notNull(),
		riskLevel: text("risk_level", { enum: ["low", "medium", "high"] }).notNull(),
		status: text("status", { enum: ["pending", "auto_applied", "applied", "rejected"] }).notNull(),
		createdAt: text("created_at").notNull(),
		appliedAt: text("applied_at"),
		rejectedAt: text("rejected_at"),
		backupPath: text("backup_path"),
	},
	(table) => ({
		statusIdx: index("proposals_status_idx").on(table.status),
		createdAtIdx: index("proposals_created_at_idx").on(table.createdAt),
	}),
)

// Error Solutions Table
export const errorSolutions = sqliteTable("error_solutions", {
	pattern: text("pattern").primaryKey(),
	solution: text("solution").notNull(),
	successRate: real("success_rate").notNull(),
	metadata: text("metadata", { mode: "json" }).$type<Record<string, unknown>>().notNull(),
	updatedAt: text("updated_at").notNull(),
})

export type ProposalRow = typeof proposals.$inferSelect
export type NewProposalRow = typeof proposals.$inferInsert
export type ErrorSolutionRow = typeof errorSolutions.$inferSelect
