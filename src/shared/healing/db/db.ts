import * as fs from "node:fs"
import * as path from "node:path"

import Database from "better-sqlite3"
import { drizzle } from "drizzle-orm/better-sqlite3"
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3"

import * as schema from "./schema"

export type HealingDb = BetterSQLite3Database<typeof schema>

export interface HealingDatabase {
	db: HealingDb
	close(): void
}

/**
 * Tables mirror ./schema.ts; applied on every open
 */
const DDL = `
CREATE TABLE IF NOT EXISTS proposals (
	id TEXT PRIMARY KEY NOT NULL,
	trigger TEXT NOT NULL,
	user_request TEXT NOT NULL,
	tool TEXT NOT NULL,
	error TEXT NOT NULL,
	error_pattern TEXT NOT NULL,
	analysis TEXT,
	summary TEXT NOT NULL,
	reason TEXT NOT NULL,
	files TEXT NOT NULL,
	test_plan TEXT NOT NULL,
	metadata TEXT NOT NULL,
	confidence REAL NOT NULL,
	risk_level TEXT NOT NULL,
	status TEXT NOT NULL,
	created_at TEXT NOT NULL,
	applied_at TEXT,
	rejected_at TEXT,
	backup_path TEXT
);
CREATE INDEX IF NOT EXISTS proposals_status_idx ON proposals (status);
CREATE INDEX IF NOT EXISTS proposals_created_at_idx ON proposals (created_at);

CREATE TABLE IF NOT EXISTS error_solutions (
	pattern TEXT PRIMARY KEY NOT NULL,
	solution TEXT NOT NULL,
	success_rate REAL NOT NULL,
	metadata TEXT NOT NULL,
	updated_at TEXT NOT NULL
);
`

export const IN_MEMORY_DB = ":memory:"

/**
 * Open (creating when needed) the proposal and knowledge database
 *
 * @param filePath - database file, or ":memory:" for a private in-process database
 */
export function openHealingDatabase(filePath: string = IN_MEMORY_DB): HealingDatabase {
	if (filePath !== IN_MEMORY_DB) {
		fs.mkdirSync(path.dirname(filePath), { recursive: true })
	}

	const sqlite = new Database(filePath)
	if (filePath !== IN_MEMORY_DB) {
		sqlite.pragma("journal_mode = WAL")
	}
	sqlite.exec(DDL)

	return {
		db: drizzle(sqlite, { schema }),
		close: () => sqlite.close(),
	}
}
