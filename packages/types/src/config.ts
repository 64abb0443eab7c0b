import { z } from "zod"

/**
 * Engine Configuration
 *
 * Every key has a default so an empty file, or no file at all, yields a working engine.
 */

export const autoFixConfigSchema = z.object({
	/** Master toggle; when off every proposal waits for a human */
	enabled: z.boolean().default(true),

	/** Minimum confidence for auto-applying a low-risk proposal */
	confidenceThreshold: z.number().min(0).max(1).default(0.85),

	/** Where file backups are written before a fix is applied (relative to project root) */
	backupDir: z.string().min(1).default(".mender/backups/auto_fixes"),
})

export const guardrailDefaultsSchema = z.object({
	maxAttempts: z.number().int().positive().default(3),
	maxDurationSeconds: z.number().positive().default(240),
	maxPayloadChars: z.number().int().positive().default(12000),
})

export const oracleConfigSchema = z.object({
	/** Upper bound for a single oracle call */
	timeoutMs: z.number().int().positive().default(30000),

	/** Retries for transient oracle errors (timeouts, rate limits, 5xx) */
	maxRetries: z.number().int().min(0).max(5).default(2),

	/** First backoff delay; doubles per retry, capped at 10s */
	retryBaseDelayMs: z.number().int().min(0).default(1000),
})

export const bufferConfigSchema = z.object({
	telemetry: z.number().int().positive().default(500),
	failurePatterns: z.number().int().positive().default(200),
	memory: z.number().int().positive().default(50),
	recommendations: z.number().int().positive().default(100),
})

export const DEFAULT_CRITICAL_FILES = [
	"ExecutionEngine.ts",
	"ContractBuilder.ts",
	"AutoFixGate.ts",
	"OracleClient.ts",
	"index.ts",
	"package.json",
]

export const engineConfigSchema = z.object({
	autoFix: autoFixConfigSchema.default({}),
	guardrails: guardrailDefaultsSchema.default({}),
	oracle: oracleConfigSchema.default({}),
	buffers: bufferConfigSchema.default({}),

	/** Delay between tool attempts */
	retryBackoffMs: z.number().int().min(0).default(0),

	/** Ask the oracle for a complexity analysis when the caller supplies none */
	analyzeComplexity: z.boolean().default(true),

	/** File names whose modification makes a patch high risk */
	criticalFiles: z.array(z.string().min(1)).default(DEFAULT_CRITICAL_FILES),
})

export type AutoFixConfig = z.infer<typeof autoFixConfigSchema>
export type OracleConfig = z.infer<typeof oracleConfigSchema>
export type BufferConfig = z.infer<typeof bufferConfigSchema>

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>

export const DEFAULT_ENGINE_CONFIG: EngineConfig = engineConfigSchema.parse({})
