/**
 * AutoFixGate - decides whether a proposal may be applied without a human, and applies it
 *
 * Approval needs either high confidence on a low-risk plan or a proven fix for the same
 * error in the knowledge store. Every referenced file that exists is backed up before
 * the registry touches the tree. A successful apply feeds the knowledge store so the
 * next occurrence of the error is approved on history alone.
 */

import { copyFile, mkdir } from "node:fs/promises"
import * as path from "node:path"

import {
	type AutoFixConfig,
	type EnhancementProposal,
	FIX_SUCCESS_RATE_STEP,
	INITIAL_FIX_SUCCESS_RATE,
	PROVEN_FIX_SUCCESS_RATE,
} from "@mender/types"

import {
	formatTimestampForFilename,
	isInsideProjectRoot,
	isRegularFile,
	normalizeRelPath,
	toRepoRelativePath,
} from "../fs"
import type { KnowledgeStore } from "../knowledge/KnowledgeStore"
import type { ProposalRegistry } from "../registry/ProposalRegistry"
import { SerialQueue } from "../state/SerialQueue"

export interface AutoFixGateOptions {
	projectRoot: string
	config: AutoFixConfig
	registry: ProposalRegistry
	knowledge: KnowledgeStore
	/** Shared single writer for knowledge updates; a private one is used when omitted */
	writeQueue?: SerialQueue
	now?: () => number
}

export interface BackupInfo {
	/** Backup directory, relative to the project root */
	path: string
	/** Repo-relative paths of the files copied */
	files: string[]
	timestamp: string
}

export type ApplyFixResult =
	| { applied: false; queued: true }
	| { applied: true; queued: false; proposal: EnhancementProposal; backup: BackupInfo }
	/** `backup` is null when the backup itself failed and the registry was never called */
	| { applied: false; queued: false; error: string; backup: BackupInfo | null }

type GateInput = Pick<EnhancementProposal, "confidence" | "riskLevel" | "errorPattern">

export class AutoFixGate {
	private readonly projectRootAbs: string
	private readonly config: AutoFixConfig
	private readonly registry: ProposalRegistry
	private readonly knowledge: KnowledgeStore
	private readonly writeQueue: SerialQueue
	private readonly now: () => number

	constructor(options: AutoFixGateOptions) {
		this.projectRootAbs = path.resolve(options.projectRoot)
		this.config = options.config
		this.registry = options.registry
		this.knowledge = options.knowledge
		this.writeQueue = options.writeQueue ?? new SerialQueue()
		this.now = options.now ?? Date.now
	}

	get enabled(): boolean {
		return this.config.enabled
	}

	async shouldAutoApply(proposal: GateInput): Promise<boolean> {
		if (!this.config.enabled) {
			return false
		}

		if (proposal.confidence >= this.config.confidenceThreshold && proposal.riskLevel === "low") {
			return true
		}

		if (!proposal.errorPattern) {
			return false
		}

		try {
			const solution = await this.knowledge.findErrorSolution(proposal.errorPattern)
			return solution !== null && solution.successRate > PROVEN_FIX_SUCCESS_RATE
		} catch (error) {
			console.warn(
				`[AutoFixGate] Knowledge lookup failed: ${error instanceof Error ? error.message : String(error)}`,
			)
			return false
		}
	}

	/**
	 * Apply a proposal when approved (or forced)
	 *
	 * An automatic apply is recorded on the proposal as auto-applied; a forced one stays
	 * plain applied. A registry failure is reported with the backup location; the backup
	 * is not restored.
	 */
	async applyFix(proposal: EnhancementProposal, force = false): Promise<ApplyFixResult> {
		const approved = force || (await this.shouldAutoApply(proposal))
		if (!approved) {
			console.log(
				`[AutoFixGate] Fix confidence ${Math.round(proposal.confidence * 100)}% (${proposal.riskLevel} risk) ` +
					`below auto-apply bar; queued for review: ${proposal.id}`,
			)
			return { applied: false, queued: true }
		}

		let backup: BackupInfo
		try {
			backup = await this.createBackup(proposal)
		} catch (error) {
			const message = `Backup failed: ${error instanceof Error ? error.message : String(error)}`
			console.error(`[AutoFixGate] ${message}; not applying ${proposal.id}`)
			return { applied: false, queued: false, error: message, backup: null }
		}

		let applied: EnhancementProposal
		try {
			applied = await this.registry.applyProposal(proposal.id)
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			console.error(`[AutoFixGate] Fix application failed for ${proposal.id}: ${message} (backup: ${backup.path})`)
			return { applied: false, queued: false, error: message, backup }
		}

		if (!force) {
			applied = await this.markAutoApplied(applied, backup)
		}

		console.log(`[AutoFixGate] Applied fix ${proposal.id}: ${proposal.summary} (backup: ${backup.path})`)
		await this.recordFixSuccess(proposal, force)

		return { applied: true, queued: false, proposal: applied, backup }
	}

	/**
	 * Copy every existing regular file the proposal references into
	 * `<backupDir>/fix_<id>_<timestamp>/`
	 */
	async createBackup(proposal: Pick<EnhancementProposal, "id" | "files">): Promise<BackupInfo> {
		const timestamp = formatTimestampForFilename(new Date(this.now()))
		const backupDirAbs = path.resolve(this.projectRootAbs, this.config.backupDir, `fix_${proposal.id}_${timestamp}`)
		await mkdir(backupDirAbs, { recursive: true })

		const files: string[] = []
		for (const change of proposal.files) {
			const relPath = normalizeRelPath(change.path)
			const absPath = path.resolve(this.projectRootAbs, relPath)
			if (!isInsideProjectRoot(this.projectRootAbs, absPath) || files.includes(relPath)) continue
			if (!(await isRegularFile(absPath))) continue

			const safeName = relPath.replace(/[/\\]/g, "_")
			await copyFile(absPath, path.join(backupDirAbs, safeName))
			files.push(relPath)
		}

		return { path: toRepoRelativePath(this.projectRootAbs, backupDirAbs), files, timestamp }
	}

	private async markAutoApplied(proposal: EnhancementProposal, backup: BackupInfo): Promise<EnhancementProposal> {
		try {
			return await this.registry.markAutoApplied(proposal.id, backup.path)
		} catch (error) {
			console.warn(
				`[AutoFixGate] Could not mark ${proposal.id} as auto-applied: ${error instanceof Error ? error.message : String(error)}`,
			)
			return proposal
		}
	}

	private async recordFixSuccess(proposal: EnhancementProposal, forced: boolean): Promise<void> {
		const pattern = proposal.errorPattern || proposal.reason
		const solution = proposal.summary
		if (!pattern || !solution) return

		try {
			await this.writeQueue.run(async () => {
				const existing = await this.knowledge.findErrorSolution(pattern)
				if (existing) {
					await this.knowledge.updateSuccessRate(
						existing.pattern,
						Math.min(1, existing.successRate + FIX_SUCCESS_RATE_STEP),
					)
				} else {
					await this.knowledge.addErrorSolution(pattern, solution, {
						successRate: INITIAL_FIX_SUCCESS_RATE,
						autoApplied: !forced,
						proposalId: proposal.id,
						firstSuccess: new Date(this.now()).toISOString(),
					})
				}
			})
		} catch (error) {
			console.warn(
				`[AutoFixGate] Could not record fix success: ${error instanceof Error ? error.message : String(error)}`,
			)
		}
	}
}
