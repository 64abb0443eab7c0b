import * as path from "node:path"

import { type HealingConfig, loadEngineConfig } from "../config/HealingConfig"
import { openHealingDatabase } from "../db/db"
import { SqliteKnowledgeStore } from "../knowledge/KnowledgeStore"
import type { Oracle } from "../oracle/OracleClient"
import { SqliteProposalRegistry } from "../registry/ProposalRegistry"
import type { ToolRegistry } from "../tools/ToolRegistry"
import { ExecutionEngine } from "./ExecutionEngine"

export const DEFAULT_DATABASE_PATH = ".mender/healing.db"

export interface CreateHealingEngineOptions {
	projectRoot: string
	oracle?: Oracle | null
	/** Loaded from the project (`.mender/config.yaml` plus environment) when omitted */
	config?: HealingConfig
	tools?: ToolRegistry
	/** Relative to the project root unless absolute; ":memory:" keeps nothing on disk */
	databasePath?: string
	now?: () => number
}

export interface HealingEngineHandle {
	engine: ExecutionEngine
	/** Closes the database; the engine must not be used afterwards */
	close(): void
}

/**
 * Wire an engine to SQLite-backed proposal and knowledge stores
 */
export async function createHealingEngine(options: CreateHealingEngineOptions): Promise<HealingEngineHandle> {
	const projectRoot = path.resolve(options.projectRoot)
	const config = options.config ?? (await loadEngineConfig({ projectRoot }))

	const databasePath = options.databasePath ?? DEFAULT_DATABASE_PATH
	const database = openHealingDatabase(
		databasePath === ":memory:" ? databasePath : path.resolve(projectRoot, databasePath),
	)
	const now = options.now ?? Date.now

	const engine = new ExecutionEngine({
		projectRoot,
		oracle: options.oracle,
		config,
		tools: options.tools,
		registry: new SqliteProposalRegistry({ db: database.db, projectRoot, now }),
		knowledge: new SqliteKnowledgeStore(database.db, now),
		now,
	})

	console.log(`[ExecutionEngine] Ready (project: ${projectRoot}, auto-fix: ${config.autoFixEnabled ? "on" : "off"})`)

	return { engine, close: database.close }
}
