import type { BufferConfig, FailureAnalysis, MemorySnapshot, Recommendation } from "@mender/types"

import { TelemetryRecorder } from "../telemetry/TelemetryRecorder"
import { BoundedLog } from "./BoundedLog"
import { SerialQueue } from "./SerialQueue"

/**
 * One analyzed failure, kept to count recurrences
 */
export interface FailurePattern {
	timestamp: number
	tool: string
	error: string
	analysis: FailureAnalysis
}

/**
 * Everything the engine shares across concurrent requests. Owned by one engine
 * instance; components receive the pieces they need at construction.
 */
export interface EngineState {
	telemetry: TelemetryRecorder
	failurePatterns: BoundedLog<FailurePattern>
	memory: BoundedLog<MemorySnapshot>
	recommendations: BoundedLog<Recommendation>
	/** Single writer for asynchronous read-modify-write on shared stores */
	writeQueue: SerialQueue
}

export function createEngineState(buffers: BufferConfig): EngineState {
	return {
		telemetry: new TelemetryRecorder(buffers.telemetry),
		failurePatterns: new BoundedLog(buffers.failurePatterns),
		memory: new BoundedLog(buffers.memory),
		recommendations: new BoundedLog(buffers.recommendations),
		writeQueue: new SerialQueue(),
	}
}
