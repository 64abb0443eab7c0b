import { z } from "zod"

import type { ExecutionContract } from "./contract"
import type { RiskLevel } from "./proposal"
import type { TelemetrySummary } from "./telemetry"

/**
 * Execution Types
 *
 * What a tool callback hands back to the engine, and the envelopes the engine returns
 * to its caller.
 */

// =============================================================================
// Tool callback
// =============================================================================

export const toolCallResultSchema = z
	.object({
		status: z.enum(["success", "error"]),
		result: z.unknown().optional(),
		/** JSON replies often carry `error: null` on success */
		error: z
			.string()
			.nullish()
			.transform((error) => error ?? undefined),
	})
	.passthrough()

/** What a callback may hand back */
export type ToolCallResult = z.input<typeof toolCallResultSchema>

/**
 * Performs the side effect. May throw; a throw counts as an "exception" attempt.
 */
export type ToolCallback = (tool: string, payload: Record<string, unknown>) => Promise<ToolCallResult> | ToolCallResult

// =============================================================================
// Responses
// =============================================================================

export const failureReasonSchema = z.enum([
	/** The tool reported an error, or its result failed ground-truth validation */
	"tool_error",
	/** The callback threw on the final attempt */
	"exception",
	"guardrail_breach",
	"cancelled",
])

export type FailureReason = z.infer<typeof failureReasonSchema>

interface ResponseBase {
	requestId: string
	tool: string
	/** One human-readable line */
	summary: string
	contract: ExecutionContract
	telemetry: TelemetrySummary
	attempts: number
}

export interface SuccessResponse extends ResponseBase {
	status: "success"
	result: unknown
}

export interface ValidationErrorResponse extends ResponseBase {
	status: "validation_error"
	error: string
	missingFields: string[]
	/** Param schema issues, `path: message` */
	issues: string[]
}

/**
 * Compact view of a registered proposal for the caller
 */
export interface ProposalDigest {
	id: string
	summary: string
	files: string[]
	testPlan: string
	confidence: number
	riskLevel: RiskLevel
}

interface FailureResponseBase extends ResponseBase {
	error: string
	reason: FailureReason
}

export interface PendingApprovalResponse extends FailureResponseBase {
	status: "pending_approval"
	proposal: ProposalDigest
	/** Set when the fix was approved for automatic application but applying it failed */
	autoApplyError?: string
}

export interface AutoAppliedResponse extends FailureResponseBase {
	status: "auto_applied"
	proposal: ProposalDigest
	backupPath: string
}

export interface ErrorResponse extends FailureResponseBase {
	status: "error"
}

export type ExecutionResponse =
	| SuccessResponse
	| ValidationErrorResponse
	| PendingApprovalResponse
	| AutoAppliedResponse
	| ErrorResponse

export type ExecutionStatus = ExecutionResponse["status"]
