/**
 * ConfidenceScorer - how likely a patch plan fixes the failure, and how risky it is to apply
 *
 * Confidence rewards shallow, well-understood errors (missing imports, typos, wrong
 * parameters) and failures that reproduced across several attempts. Risk looks only at
 * which files the plan touches and how.
 */

import * as path from "node:path"

import { DEFAULT_CRITICAL_FILES, type PatchPlan, type RiskLevel } from "@mender/types"

/** Error text hinting at a shallow, mechanical cause */
const SIMPLE_ERROR_MARKERS = ["import", "attribute", "typeerror", "keyerror", "missing"]

/** Plan summaries describing a mechanical fix */
const SIMPLE_FIX_MARKERS = ["add import", "fix typo", "update parameter", "add missing"]

const BASE_CONFIDENCE = 0.5
const SIMPLE_ERROR_BONUS = 0.2
const SIMPLE_FIX_BONUS = 0.3
const REPRODUCED_BONUS = 0.1
const REPRODUCED_ATTEMPTS = 3

/** Plans touching more files than this are high risk */
const MAX_LOW_RISK_FILES = 3

/** A replaced snippet shorter than this that touches imports is low risk */
const SMALL_IMPORT_EDIT_CHARS = 100

export interface ConfidenceInput {
	error: string
	plan: Pick<PatchPlan, "summary">
	attempts: number
}

export interface ProposalScore {
	confidence: number
	riskLevel: RiskLevel
}

export class ConfidenceScorer {
	private readonly criticalFiles: ReadonlySet<string>

	constructor(criticalFiles: readonly string[] = DEFAULT_CRITICAL_FILES) {
		this.criticalFiles = new Set(criticalFiles)
	}

	score(error: string, plan: PatchPlan, attempts: number): ProposalScore {
		return {
			confidence: scoreConfidence({ error, plan, attempts }),
			riskLevel: this.assessRisk(plan),
		}
	}

	/**
	 * First matching rule wins: many files, all creates, a critical file, a small import
	 * edit, otherwise medium.
	 */
	assessRisk(plan: Pick<PatchPlan, "files">): RiskLevel {
		const files = plan.files

		if (files.length > MAX_LOW_RISK_FILES) return "high"
		if (files.every((f) => f.operation === "create")) return "low"
		if (files.some((f) => this.criticalFiles.has(path.posix.basename(f.path.replace(/\\/g, "/"))))) return "high"
		if (
			files.some(
				(f) => f.operation === "replace" && f.search.includes("import") && f.search.length < SMALL_IMPORT_EDIT_CHARS,
			)
		) {
			return "low"
		}

		return "medium"
	}
}

export function scoreConfidence(input: ConfidenceInput): number {
	let confidence = BASE_CONFIDENCE

	const error = input.error.toLowerCase()
	if (SIMPLE_ERROR_MARKERS.some((marker) => error.includes(marker))) {
		confidence += SIMPLE_ERROR_BONUS
	}

	const summary = input.plan.summary.toLowerCase()
	if (SIMPLE_FIX_MARKERS.some((marker) => summary.includes(marker))) {
		confidence += SIMPLE_FIX_BONUS
	}

	if (input.attempts >= REPRODUCED_ATTEMPTS) {
		confidence += REPRODUCED_BONUS
	}

	return Math.min(1, Math.max(0, confidence))
}
