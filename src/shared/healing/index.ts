/**
 * Self-healing tool execution
 *
 * Entry points: `createHealingEngine` for a SQLite-backed engine, or `ExecutionEngine`
 * with your own proposal registry and knowledge store.
 */

export * from "./core"
export * from "./analysis"
export * from "./autofix"
export * from "./config"
export * from "./db"
export * from "./guardrails"
export * from "./knowledge"
export * from "./proposals"
export * from "./registry"
export * from "./tools"

export {
	ContractBuilder,
	FALLBACK_SUCCESS_CRITERIA,
	buildFallbackContract,
	getFinalPayload,
	isMissing,
	missingRequiredFields,
	requiredFields,
	type BuildContractInput,
} from "./contract/ContractBuilder"
export {
	OracleClient,
	extractJsonText,
	isRetryableOracleError,
	parseJsonLoose,
	type Oracle,
	type OracleClientOptions,
	type OracleResponse,
} from "./oracle/OracleClient"
export { createEngineState, type EngineState, type FailurePattern } from "./state/EngineState"
export { BoundedLog } from "./state/BoundedLog"
export { SerialQueue } from "./state/SerialQueue"
export { TelemetryRecorder, summarizeTelemetry, type RecordAttemptOptions } from "./telemetry/TelemetryRecorder"
export { safeStringify } from "./json"
