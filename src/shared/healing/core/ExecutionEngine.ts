/**
 * ExecutionEngine - runs one tool invocation under a contract, guardrails and a retry
 * loop, and turns terminal failures into patch proposals
 *
 * Flow per request:
 *   ANALYZE -> BUILD_CONTRACT -> VALIDATE_PAYLOAD -> ATTEMPT(1..maxAttempts) -> FINALIZE
 *
 * - Building a contract never fails; the oracle's answer is replaced by a fallback when unusable
 * - A payload missing required fields (or failing the tool's param schema) returns before
 *   any attempt is made
 * - Each attempt is recorded in telemetry whatever its outcome
 * - An outgoing payload above `maxPayloadChars` ends the loop at once, even after a success
 * - Analysis, advice and patch proposals are best-effort; none of them can fail a request
 */

import { v4 as uuidv4 } from "uuid"

import {
	type AttemptStatus,
	type ComplexityAnalysis,
	type EnhancementProposal,
	type ExecutionContract,
	type ExecutionResponse,
	type FailureAnalysis,
	type FailureReason,
	type Guardrails,
	isComplex,
	MEMORY_RESULT_PREVIEW_CHARS,
	type PatchTrigger,
	type PendingApprovalResponse,
	type ProposalDigest,
	type ProposalStatus,
	type Recommendation,
	type TelemetryRecord,
	type ToolCallback,
	toolCallResultSchema,
} from "@mender/types"

import { Advisor } from "../analysis/Advisor"
import { ComplexityAnalyzer } from "../analysis/ComplexityAnalyzer"
import { FailureAnalyzer } from "../analysis/FailureAnalyzer"
import { AutoFixGate, type ApplyFixResult } from "../autofix/AutoFixGate"
import { HealingConfig } from "../config/HealingConfig"
import { ContractBuilder, getFinalPayload, missingRequiredFields } from "../contract/ContractBuilder"
import { deriveGuardrails } from "../guardrails/guardrails"
import { RetryPolicy } from "../guardrails/RetryPolicy"
import { safeStringify } from "../json"
import { deriveErrorPattern, type KnowledgeStore } from "../knowledge/KnowledgeStore"
import { type Oracle, OracleClient } from "../oracle/OracleClient"
import { ConfidenceScorer } from "../proposals/ConfidenceScorer"
import { PatchProposer } from "../proposals/PatchProposer"
import type { ProposalRegistry } from "../registry/ProposalRegistry"
import { createEngineState, type EngineState } from "../state/EngineState"
import { summarizeTelemetry } from "../telemetry/TelemetryRecorder"
import { ToolRegistry } from "../tools/ToolRegistry"

/** Share of the duration guardrail after which a success counts as slow */
const SLOW_SUCCESS_RATIO = 0.8

// =============================================================================
// Events
// =============================================================================

export type ExecutionEventType =
	| "contract_built"
	| "attempt_failed"
	| "request_succeeded"
	| "request_failed"
	| "proposal_registered"
	| "fix_applied"

export interface ExecutionEvent {
	type: ExecutionEventType
	requestId: string
	tool: string
	timestamp: number
	data?: {
		attempt?: number
		error?: string
		reason?: FailureReason
		proposal?: EnhancementProposal
		contract?: ExecutionContract
	}
}

export type ExecutionEventListener = (event: ExecutionEvent) => void

// =============================================================================
// Options
// =============================================================================

export interface ExecutionEngineOptions {
	projectRoot: string
	registry: ProposalRegistry
	knowledge: KnowledgeStore
	/** Planning oracle; without one every oracle question resolves to its fallback */
	oracle?: Oracle | null
	config?: HealingConfig
	tools?: ToolRegistry
	/** Shared buffers; created from the configured capacities when omitted */
	state?: EngineState
	now?: () => number
	/** Used for retry backoff and oracle retry delays */
	sleep?: (ms: number) => Promise<void>
}

export interface ExecuteRequest {
	/** What the user asked for, in their words */
	request: string
	tool: string
	params?: Record<string, unknown>
	callback: ToolCallback
	/** Skips the complexity analysis when supplied */
	complexity?: ComplexityAnalysis
	/** Checked between attempts */
	signal?: AbortSignal
}

type AttemptOutcome =
	| { ok: true; result: unknown; attempts: number }
	| { ok: false; reason: FailureReason; error: string; attempts: number; analysis?: FailureAnalysis }

interface RequestContext {
	requestId: string
	request: string
	tool: string
	contract: ExecutionContract
	complexity?: ComplexityAnalysis
	payload: Record<string, unknown>
	guardrails: Guardrails
	startedAt: number
	telemetry: TelemetryRecord[]
}

function toDigest(proposal: EnhancementProposal): ProposalDigest {
	return {
		id: proposal.id,
		summary: proposal.summary,
		files: proposal.files.map((f) => f.path),
		testPlan: proposal.testPlan,
		confidence: proposal.confidence,
		riskLevel: proposal.riskLevel,
	}
}

/**
 * ExecutionEngine orchestrates contract, attempts, learning and fix proposals
 */
export class ExecutionEngine {
	readonly tools: ToolRegistry
	readonly state: EngineState
	readonly config: HealingConfig

	private readonly registry: ProposalRegistry
	private readonly now: () => number
	private readonly sleep?: (ms: number) => Promise<void>

	private readonly contractBuilder: ContractBuilder
	private readonly complexityAnalyzer: ComplexityAnalyzer
	private readonly failureAnalyzer: FailureAnalyzer
	private readonly advisor: Advisor
	private readonly patchProposer: PatchProposer
	private readonly scorer: ConfidenceScorer
	private readonly gate: AutoFixGate

	private eventListeners: Set<ExecutionEventListener> = new Set()

	constructor(options: ExecutionEngineOptions) {
		this.config = options.config ?? new HealingConfig()
		this.tools = options.tools ?? new ToolRegistry()
		this.state = options.state ?? createEngineState(this.config.buffers)
		this.registry = options.registry
		this.now = options.now ?? Date.now
		this.sleep = options.sleep

		const oracle = new OracleClient({
			oracle: options.oracle,
			...this.config.oracle,
			sleep: options.sleep,
		})

		this.contractBuilder = new ContractBuilder(oracle)
		this.complexityAnalyzer = new ComplexityAnalyzer(oracle, () => this.tools.list().map((t) => t.name))
		this.failureAnalyzer = new FailureAnalyzer(oracle, this.state.failurePatterns, this.now)
		this.advisor = new Advisor(oracle, this.state.recommendations, this.now)
		this.patchProposer = new PatchProposer(oracle)
		this.scorer = new ConfidenceScorer(this.config.criticalFiles)
		this.gate = new AutoFixGate({
			projectRoot: options.projectRoot,
			config: this.config.autoFix,
			registry: this.registry,
			knowledge: options.knowledge,
			writeQueue: this.state.writeQueue,
			now: this.now,
		})
	}

	// ==========================================================================
	// Execution
	// ==========================================================================

	async execute(input: ExecuteRequest): Promise<ExecutionResponse> {
		const requestId = uuidv4()
		const startedAt = this.now()
		const { request, tool } = input
		const params = input.params ?? {}

		const complexity =
			input.complexity ??
			(this.config.analyzeComplexity ? await this.complexityAnalyzer.analyze(request) : undefined)

		const contract = await this.contractBuilder.build({
			request,
			tool,
			params,
			complexity,
			memory: this.state.memory.toArray(),
		})
		this.emit({ type: "contract_built", requestId, tool, timestamp: this.now(), data: { contract } })

		const payload = getFinalPayload(contract, params)
		const missingFields = missingRequiredFields(contract, payload)
		const issues = this.tools.validateParams(tool, payload)
		if (missingFields.length > 0 || issues.length > 0) {
			const error =
				missingFields.length > 0
					? `Missing required fields: ${missingFields.join(", ")}`
					: `Invalid parameters: ${issues.join("; ")}`
			console.warn(`[ExecutionEngine] ${tool}: ${error}`)
			return {
				status: "validation_error",
				requestId,
				tool,
				summary: `Cannot run ${tool}: ${error}`,
				contract,
				telemetry: summarizeTelemetry([]),
				attempts: 0,
				error,
				missingFields,
				issues,
			}
		}

		const ctx: RequestContext = {
			requestId,
			request,
			tool,
			contract,
			complexity,
			payload,
			guardrails: deriveGuardrails(contract, this.config.guardrailDefaults),
			startedAt,
			telemetry: [],
		}

		const outcome = await this.runAttempts(ctx, input.callback, input.signal)

		return outcome.ok ? this.finalizeSuccess(ctx, outcome.result, outcome.attempts) : this.finalizeFailure(ctx, outcome)
	}

	private async runAttempts(ctx: RequestContext, callback: ToolCallback, signal?: AbortSignal): Promise<AttemptOutcome> {
		const { tool, payload, guardrails } = ctx
		const policy = new RetryPolicy({
			guardrails,
			backoffMs: this.config.retryBackoffMs,
			signal,
			now: this.now,
			sleep: this.sleep,
		})
		// Payload is fixed for the request, and so is its size
		const payloadSize = safeStringify(payload).length

		let lastError = ""
		// Set by a configuration diagnosis: the next attempt goes out without the backoff
		let retryImmediately = false

		for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
			await policy.beforeAttempt(attempt, { immediate: retryImmediately })
			retryImmediately = false
			if (policy.cancelled) {
				const error = lastError ? `Cancelled after: ${lastError}` : "Request was cancelled"
				return { ok: false, reason: "cancelled", error, attempts: attempt - 1 }
			}

			const attemptStartedAt = this.now()
			let status: AttemptStatus
			let error: string | undefined
			let result: unknown

			try {
				const response = toolCallResultSchema.safeParse(await callback(tool, payload))
				if (!response.success) {
					status = "error"
					error = `Tool returned an unexpected response: ${response.error.issues
						.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
						.join("; ")}`
				} else if (response.data.status === "success") {
					const issues = await this.tools.validateResult(tool, response.data.result)
					if (issues.length > 0) {
						status = "error"
						error = `Validation failed: ${issues.join("; ")}`
					} else {
						status = "success"
						result = response.data.result
					}
				} else {
					status = "error"
					error = response.data.error ?? "Unknown error"
				}
			} catch (caught) {
				status = "exception"
				error = caught instanceof Error ? caught.message : String(caught)
			}

			ctx.telemetry.push(
				this.state.telemetry.record({
					requestId: ctx.requestId,
					tool,
					attempt,
					durationMs: this.now() - attemptStartedAt,
					status,
					error,
					payloadSize,
					timestamp: this.now(),
				}),
			)

			if (payloadSize > guardrails.maxPayloadChars) {
				const breach = `Guardrail breach: payload size ${payloadSize} exceeds ${guardrails.maxPayloadChars} chars`
				console.warn(`[ExecutionEngine] ${tool}: ${breach}`)
				return { ok: false, reason: "guardrail_breach", error: breach, attempts: attempt }
			}

			if (status === "success") {
				return { ok: true, result, attempts: attempt }
			}

			const message = error ?? "Unknown error"
			lastError = message
			this.emit({
				type: "attempt_failed",
				requestId: ctx.requestId,
				tool,
				timestamp: this.now(),
				data: { attempt, error: message },
			})

			if (status === "exception") {
				console.error(`[ExecutionEngine] ${tool} attempt ${attempt}/${policy.maxAttempts} threw: ${message}`)
				if (policy.isLastAttempt(attempt)) {
					return { ok: false, reason: "exception", error: message, attempts: attempt }
				}
			} else {
				console.warn(`[ExecutionEngine] ${tool} attempt ${attempt}/${policy.maxAttempts} failed: ${message}`)
				const analysis = await this.failureAnalyzer.analyze(tool, message, {
					request: ctx.request,
					attempt,
					payload,
				})

				if (policy.isLastAttempt(attempt)) {
					await this.advisor.suggestAlternative(ctx.request, `${tool} with ${safeStringify(payload)}`, message)
					return { ok: false, reason: "tool_error", error: message, attempts: attempt, analysis }
				}

				if (analysis.fixType === "config") {
					console.log(
						`[ExecutionEngine] ${tool}: configuration issue suggested (${analysis.suggestedFix}); retrying immediately`,
					)
					retryImmediately = true
				}
			}

			if (policy.deadlineExceeded()) {
				const breach = `Guardrail breach: exceeded ${guardrails.maxDurationSeconds}s after ${attempt} attempt(s); last error: ${message}`
				console.warn(`[ExecutionEngine] ${tool}: ${breach}`)
				return { ok: false, reason: "guardrail_breach", error: breach, attempts: attempt }
			}
		}

		// Unreachable while maxAttempts >= 1; the last attempt always returns above
		return { ok: false, reason: "tool_error", error: lastError || "Max attempts exceeded", attempts: policy.maxAttempts }
	}

	// ==========================================================================
	// Finalize
	// ==========================================================================

	private async finalizeSuccess(ctx: RequestContext, result: unknown, attempts: number): Promise<ExecutionResponse> {
		const { requestId, request, tool, contract } = ctx
		const durationMs = this.now() - ctx.startedAt

		this.state.memory.append({
			timestamp: this.now(),
			request,
			tool,
			status: "success",
			result: safeStringify(result).slice(0, MEMORY_RESULT_PREVIEW_CHARS),
			intent: contract.intent,
			attempts,
			durationMs,
			notes: `Succeeded on attempt ${attempts}`,
		})

		const slow = durationMs > ctx.guardrails.maxDurationSeconds * 1000 * SLOW_SUCCESS_RATIO
		if (slow || isComplex(ctx.complexity)) {
			await this.advisor.suggestEnhancement(request, tool, {
				durationMs,
				attempts,
				complexity: ctx.complexity?.complexity ?? "unknown",
			})
		}

		console.log(`[ExecutionEngine] ${tool} succeeded on attempt ${attempts} (${durationMs}ms)`)
		this.emit({ type: "request_succeeded", requestId, tool, timestamp: this.now(), data: { attempt: attempts } })

		return {
			status: "success",
			requestId,
			tool,
			summary: `${tool} succeeded on attempt ${attempts}`,
			contract,
			telemetry: summarizeTelemetry(ctx.telemetry),
			attempts,
			result,
		}
	}

	private async finalizeFailure(
		ctx: RequestContext,
		outcome: Extract<AttemptOutcome, { ok: false }>,
	): Promise<ExecutionResponse> {
		const { requestId, request, tool, contract } = ctx
		const { reason, error, attempts } = outcome
		const durationMs = this.now() - ctx.startedAt

		this.state.memory.append({
			timestamp: this.now(),
			request,
			tool,
			status: "error",
			result: "",
			intent: contract.intent,
			attempts,
			durationMs,
			notes: `${reason}: ${error}`.slice(0, MEMORY_RESULT_PREVIEW_CHARS),
		})

		console.error(`[ExecutionEngine] ${tool} failed after ${attempts} attempt(s): ${error}`)
		this.emit({ type: "request_failed", requestId, tool, timestamp: this.now(), data: { error, reason } })

		const base = {
			requestId,
			tool,
			contract,
			telemetry: summarizeTelemetry(ctx.telemetry),
			attempts,
			error,
			reason,
		}
		const failedSummary = `${tool} failed after ${attempts} attempt(s): ${error}`

		const proposal = reason === "cancelled" ? null : await this.proposeFix(ctx, outcome)
		if (!proposal) {
			return { status: "error", summary: failedSummary, ...base }
		}

		const fix = await this.applyWithGate(ctx, proposal, false)

		if (fix.applied) {
			return {
				status: "auto_applied",
				summary: `${failedSummary}. Fix ${proposal.id} was applied automatically: ${proposal.summary}`,
				...base,
				proposal: toDigest(fix.proposal),
				backupPath: fix.backup.path,
			}
		}

		const response: PendingApprovalResponse = {
			status: "pending_approval",
			summary: `${failedSummary}. Proposed fix ${proposal.id} awaits approval: ${proposal.summary}`,
			...base,
			proposal: toDigest(proposal),
		}
		if (!fix.queued) {
			response.autoApplyError = fix.error
		}
		return response
	}

	/**
	 * Ask for a patch, score it and register it
	 *
	 * @returns the registered proposal, or null when there is no plan or it could not be stored
	 */
	private async proposeFix(
		ctx: RequestContext,
		outcome: Extract<AttemptOutcome, { ok: false }>,
	): Promise<EnhancementProposal | null> {
		const { request, tool, contract } = ctx
		const trigger: PatchTrigger =
			outcome.reason === "guardrail_breach"
				? "guardrail_breach"
				: ctx.complexity?.capabilitiesSufficient === false
					? "capability_gap"
					: "tool_failure"

		const plan = await this.patchProposer.propose({
			trigger,
			request,
			tool,
			error: outcome.error,
			context: {
				attempts: outcome.attempts,
				reason: outcome.reason,
				intent: contract.intent,
				payload: ctx.payload,
				analysis: outcome.analysis ?? null,
				missingCapabilities: ctx.complexity?.missingCapabilities ?? [],
			},
		})
		if (!plan) {
			return null
		}

		const { confidence, riskLevel } = this.scorer.score(outcome.error, plan, outcome.attempts)

		try {
			const proposal = await this.registry.registerProposal({
				trigger,
				userRequest: request,
				tool,
				error: outcome.error,
				errorPattern: deriveErrorPattern(outcome.error),
				analysis: outcome.analysis ? { ...outcome.analysis } : null,
				summary: plan.summary,
				reason: plan.reason,
				files: plan.files,
				testPlan: plan.testPlan,
				metadata: { requestId: ctx.requestId, attempts: outcome.attempts, failureReason: outcome.reason },
				confidence,
				riskLevel,
			})
			this.emit({ type: "proposal_registered", requestId: ctx.requestId, tool, timestamp: this.now(), data: { proposal } })
			return proposal
		} catch (error) {
			console.error(
				`[ExecutionEngine] Failed to register proposal for ${tool}: ${error instanceof Error ? error.message : String(error)}`,
			)
			return null
		}
	}

	private async applyWithGate(
		ctx: Pick<RequestContext, "requestId" | "tool">,
		proposal: EnhancementProposal,
		force: boolean,
	): Promise<ApplyFixResult> {
		const fix = await this.gate.applyFix(proposal, force)
		if (fix.applied) {
			this.emit({
				type: "fix_applied",
				requestId: ctx.requestId,
				tool: ctx.tool,
				timestamp: this.now(),
				data: { proposal: fix.proposal },
			})
		}
		return fix
	}

	// ==========================================================================
	// Review
	// ==========================================================================

	async listEnhancements(status?: ProposalStatus): Promise<EnhancementProposal[]> {
		return this.registry.listEnhancements(status)
	}

	/**
	 * Apply a pending proposal on a human's say-so: backed up and learned from like an
	 * automatic fix, but recorded as plain applied
	 */
	async approveProposal(id: string): Promise<ApplyFixResult> {
		const proposal = await this.registry.getProposal(id)
		if (!proposal) {
			throw new Error(`Proposal not found: ${id}`)
		}
		if (proposal.status !== "pending") {
			throw new Error(`Cannot approve proposal ${id}: status is ${proposal.status}`)
		}
		return this.applyWithGate({ requestId: String(proposal.metadata.requestId ?? ""), tool: proposal.tool }, proposal, true)
	}

	async rejectProposal(id: string): Promise<EnhancementProposal> {
		return this.registry.rejectProposal(id)
	}

	recommendations(): Recommendation[] {
		return this.advisor.list()
	}

	// ==========================================================================
	// Events
	// ==========================================================================

	/**
	 * Subscribe to engine events
	 * @returns Unsubscribe function
	 */
	on(listener: ExecutionEventListener): () => void {
		this.eventListeners.add(listener)
		return () => this.eventListeners.delete(listener)
	}

	private emit(event: ExecutionEvent): void {
		for (const listener of this.eventListeners) {
			try {
				listener(event)
			} catch (error) {
				console.error("[ExecutionEngine] Error in event listener:", error)
			}
		}
	}
}
