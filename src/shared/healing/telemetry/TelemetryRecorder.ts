/**
 * TelemetryRecorder - capped history of per-attempt outcomes
 *
 * Every tool attempt the engine makes lands here, whatever its outcome. Records are
 * kept in memory only; the oldest are dropped once the capacity is reached.
 */

import type { AttemptStatus, TelemetryRecord, TelemetrySummary } from "@mender/types"

import { BoundedLog } from "../state/BoundedLog"

/** Options for recording one attempt */
export interface RecordAttemptOptions {
	requestId: string
	tool: string
	attempt: number
	durationMs: number
	status: AttemptStatus
	error?: string
	payloadSize: number
	/** Defaults to Date.now() */
	timestamp?: number
}

export const DEFAULT_TELEMETRY_CAPACITY = 500

export class TelemetryRecorder {
	private log: BoundedLog<TelemetryRecord>

	constructor(capacity: number = DEFAULT_TELEMETRY_CAPACITY) {
		this.log = new BoundedLog(capacity)
	}

	record(options: RecordAttemptOptions): TelemetryRecord {
		const record: TelemetryRecord = {
			requestId: options.requestId,
			timestamp: options.timestamp ?? Date.now(),
			tool: options.tool,
			attempt: options.attempt,
			durationMs: options.durationMs,
			status: options.status,
			payloadSize: options.payloadSize,
		}
		if (options.error !== undefined) {
			record.error = options.error
		}

		this.log.append(record)
		return record
	}

	/**
	 * Records of one request, in attempt order
	 */
	forRequest(requestId: string): TelemetryRecord[] {
		return this.log.filter((r) => r.requestId === requestId)
	}

	/**
	 * Records of one tool across requests
	 */
	forTool(tool: string): TelemetryRecord[] {
		return this.log.filter((r) => r.tool === tool)
	}

	recent(count: number): TelemetryRecord[] {
		return this.log.recent(count)
	}

	all(): TelemetryRecord[] {
		return this.log.toArray()
	}

	get size(): number {
		return this.log.size
	}
}

export function summarizeTelemetry(records: TelemetryRecord[]): TelemetrySummary {
	return {
		attempts: records.length,
		totalDurationMs: records.reduce((sum, r) => sum + r.durationMs, 0),
		errorCount: records.filter((r) => r.status !== "success").length,
	}
}
