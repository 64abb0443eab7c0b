/**
 * Proposal Registry - persistence and lifecycle of enhancement proposals
 *
 * Status transitions:
 *   pending -> applied       (applyProposal succeeded)
 *   applied -> auto_applied  (markAutoApplied, right after an automatic apply)
 *   pending -> rejected      (rejectProposal)
 * A failed apply leaves the proposal pending.
 */

import { desc, eq } from "drizzle-orm"
import { v4 as uuidv4 } from "uuid"

import type { EnhancementProposal, NewEnhancementProposal, ProposalStatus } from "@mender/types"

import type { HealingDb } from "../db/db"
import { type ProposalRow, proposals } from "../db/schema"
import { SerialQueue } from "../state/SerialQueue"
import { PatchApplicator } from "./PatchApplicator"

export interface ProposalRegistry {
	registerProposal(proposal: NewEnhancementProposal): Promise<EnhancementProposal>
	getProposal(id: string): Promise<EnhancementProposal | null>
	listEnhancements(status?: ProposalStatus): Promise<EnhancementProposal[]>
	/**
	 * Apply the proposal's file changes
	 *
	 * @throws when the proposal is unknown, not pending, or its changes cannot be applied
	 */
	applyProposal(id: string): Promise<EnhancementProposal>
	rejectProposal(id: string): Promise<EnhancementProposal>
	/**
	 * Record that an apply was automatic, with the backup taken before it
	 */
	markAutoApplied(id: string, backupPath?: string): Promise<EnhancementProposal>
}

export interface SqliteProposalRegistryOptions {
	db: HealingDb
	projectRoot: string
	now?: () => number
}

function toProposal(row: ProposalRow): EnhancementProposal {
	const proposal: EnhancementProposal = {
		id: row.id,
		trigger: row.trigger,
		userRequest: row.userRequest,
		tool: row.tool,
		error: row.error,
		errorPattern: row.errorPattern,
		analysis: row.analysis ?? null,
		summary: row.summary,
		reason: row.reason,
		files: row.files,
		testPlan: row.testPlan,
		metadata: row.metadata,
		confidence: row.confidence,
		riskLevel: row.riskLevel,
		status: row.status,
		createdAt: row.createdAt,
	}
	if (row.appliedAt !== null) proposal.appliedAt = row.appliedAt
	if (row.rejectedAt !== null) proposal.rejectedAt = row.rejectedAt
	if (row.backupPath !== null) proposal.backupPath = row.backupPath
	return proposal
}

export class SqliteProposalRegistry implements ProposalRegistry {
	private readonly db: HealingDb
	private readonly applicator: PatchApplicator
	private readonly now: () => number
	private readonly queue = new SerialQueue()

	constructor(options: SqliteProposalRegistryOptions) {
		this.db = options.db
		this.applicator = new PatchApplicator(options.projectRoot)
		this.now = options.now ?? Date.now
	}

	async registerProposal(proposal: NewEnhancementProposal): Promise<EnhancementProposal> {
		const row = this.db
			.insert(proposals)
			.values({
				...proposal,
				id: uuidv4(),
				status: "pending",
				createdAt: this.timestamp(),
			})
			.returning()
			.get()
		if (!row) {
			throw new Error("Proposal insert returned no row")
		}

		console.log(`[ProposalRegistry] Registered proposal ${row.id}: ${row.summary}`)
		return toProposal(row)
	}

	async getProposal(id: string): Promise<EnhancementProposal | null> {
		const row = this.db.select().from(proposals).where(eq(proposals.id, id)).get()
		return row ? toProposal(row) : null
	}

	async listEnhancements(status?: ProposalStatus): Promise<EnhancementProposal[]> {
		const query = this.db.select().from(proposals)
		const rows = status
			? query.where(eq(proposals.status, status)).orderBy(desc(proposals.createdAt)).all()
			: query.orderBy(desc(proposals.createdAt)).all()
		return rows.map(toProposal)
	}

	async applyProposal(id: string): Promise<EnhancementProposal> {
		return this.queue.run(async () => {
			const proposal = await this.requireStatus(id, "pending", "apply")

			const changed = await this.applicator.apply(proposal.files)

			const row = this.db
				.update(proposals)
				.set({ status: "applied", appliedAt: this.timestamp() })
				.where(eq(proposals.id, id))
				.returning()
				.get()
			if (!row) {
				throw new Error(`Proposal disappeared while applying: ${id}`)
			}

			console.log(`[ProposalRegistry] Applied proposal ${id} (${changed.join(", ")})`)
			return toProposal(row)
		})
	}

	async rejectProposal(id: string): Promise<EnhancementProposal> {
		return this.queue.run(async () => {
			await this.requireStatus(id, "pending", "reject")
			return this.updateStatus(id, { status: "rejected", rejectedAt: this.timestamp() })
		})
	}

	async markAutoApplied(id: string, backupPath?: string): Promise<EnhancementProposal> {
		return this.queue.run(async () => {
			await this.requireStatus(id, "applied", "mark as auto-applied")
			return this.updateStatus(id, { status: "auto_applied", backupPath: backupPath ?? null })
		})
	}

	/**
	 * Unified diff of a proposal's changes against the current tree
	 */
	async previewProposal(id: string): Promise<string> {
		const proposal = await this.getProposal(id)
		if (!proposal) {
			throw new Error(`Proposal not found: ${id}`)
		}
		return this.applicator.preview(proposal.files)
	}

	private async requireStatus(id: string, expected: ProposalStatus, action: string): Promise<EnhancementProposal> {
		const proposal = await this.getProposal(id)
		if (!proposal) {
			throw new Error(`Proposal not found: ${id}`)
		}
		if (proposal.status !== expected) {
			throw new Error(`Cannot ${action} proposal ${id}: status is ${proposal.status}`)
		}
		return proposal
	}

	private updateStatus(id: string, values: Partial<typeof proposals.$inferInsert>): EnhancementProposal {
		const row = this.db.update(proposals).set(values).where(eq(proposals.id, id)).returning().get()
		if (!row) {
			throw new Error(`Proposal not found: ${id}`)
		}
		return toProposal(row)
	}

	private timestamp(): string {
		return new Date(this.now()).toISOString()
	}
}
