export { IN_MEMORY_DB, openHealingDatabase, type HealingDatabase, type HealingDb } from "./db"
export * from "./schema"
