import { z } from "zod"

/**
 * Telemetry & Memory Types
 *
 * Per-attempt outcome records, the rolling memory of finished requests and the
 * advisory recommendations the engine collects along the way.
 */

// =============================================================================
// Telemetry
// =============================================================================

export const attemptStatusSchema = z.enum(["success", "error", "exception"])
export type AttemptStatus = z.infer<typeof attemptStatusSchema>

export const telemetryRecordSchema = z.object({
	/** Request this attempt belongs to */
	requestId: z.string(),
	/** Epoch millis when the attempt finished */
	timestamp: z.number(),
	tool: z.string(),
	/** 1-based attempt index */
	attempt: z.number().int().positive(),
	durationMs: z.number().min(0),
	status: attemptStatusSchema,
	error: z.string().optional(),
	/** Serialized size of the outgoing payload */
	payloadSize: z.number().int().min(0),
})

export type TelemetryRecord = z.infer<typeof telemetryRecordSchema>

export interface TelemetrySummary {
	attempts: number
	totalDurationMs: number
	errorCount: number
}

// =============================================================================
// Memory
// =============================================================================

export const memorySnapshotSchema = z.object({
	timestamp: z.number(),
	request: z.string(),
	tool: z.string(),
	status: z.enum(["success", "error"]),
	/** Result serialized and cut to a short preview */
	result: z.string(),
	intent: z.string(),
	attempts: z.number().int().min(0),
	durationMs: z.number().min(0),
	notes: z.string(),
})

export type MemorySnapshot = z.infer<typeof memorySnapshotSchema>

/** Longest result preview kept in a memory snapshot */
export const MEMORY_RESULT_PREVIEW_CHARS = 500

// =============================================================================
// Recommendations
// =============================================================================

export const recommendationKindSchema = z.enum(["alternative_approach", "future_enhancement"])
export type RecommendationKind = z.infer<typeof recommendationKindSchema>

export const recommendationSchema = z.object({
	kind: recommendationKindSchema,
	request: z.string(),
	tool: z.string(),
	text: z.string(),
	createdAt: z.number(),
})

export type Recommendation = z.infer<typeof recommendationSchema>
