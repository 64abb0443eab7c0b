/**
 * Healing Configuration Loader and Validator
 *
 * Configuration comes from `.mender/config.yaml` (optional) with a handful of environment
 * variables laid over it. Anything that fails validation falls back to the defaults.
 */

import { readFile } from "node:fs/promises"
import * as path from "node:path"

import { parse as parseYaml } from "yaml"

import {
	type AutoFixConfig,
	type BufferConfig,
	DEFAULT_ENGINE_CONFIG,
	type EngineConfig,
	engineConfigSchema,
	type Guardrails,
	type OracleConfig,
} from "@mender/types"

import { fileExists } from "../fs"

export const DEFAULT_CONFIG_PATH = ".mender/config.yaml"

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * HealingConfig - typed, validated view of the engine configuration
 */
export class HealingConfig {
	private readonly config: EngineConfig

	constructor(rawConfig?: unknown) {
		this.config = this.normalizeConfig(rawConfig)
	}

	private normalizeConfig(rawConfig: unknown): EngineConfig {
		if (rawConfig === undefined || rawConfig === null) {
			return DEFAULT_ENGINE_CONFIG
		}

		const result = engineConfigSchema.safeParse(rawConfig)
		if (!result.success) {
			console.warn(
				"[HealingConfig] Invalid configuration, using defaults:",
				result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
			)
			return DEFAULT_ENGINE_CONFIG
		}

		return result.data
	}

	get autoFix(): AutoFixConfig {
		return this.config.autoFix
	}

	get autoFixEnabled(): boolean {
		return this.config.autoFix.enabled
	}

	get guardrailDefaults(): Guardrails {
		return this.config.guardrails
	}

	get oracle(): OracleConfig {
		return this.config.oracle
	}

	get buffers(): BufferConfig {
		return this.config.buffers
	}

	get retryBackoffMs(): number {
		return this.config.retryBackoffMs
	}

	get analyzeComplexity(): boolean {
		return this.config.analyzeComplexity
	}

	get criticalFiles(): string[] {
		return this.config.criticalFiles
	}

	toJSON(): EngineConfig {
		return this.config
	}
}

// =============================================================================
// Environment overlay
// =============================================================================

const TRUE_VALUES = new Set(["1", "true", "yes", "on"])
const FALSE_VALUES = new Set(["0", "false", "no", "off"])

function readBooleanEnv(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
	const raw = env[name]?.trim().toLowerCase()
	if (!raw) return undefined
	if (TRUE_VALUES.has(raw)) return true
	if (FALSE_VALUES.has(raw)) return false
	console.warn(`[HealingConfig] Ignoring ${name}=${env[name]}: expected a boolean`)
	return undefined
}

function readNumberEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name]?.trim()
	if (!raw) return undefined
	const value = Number(raw)
	if (Number.isFinite(value)) return value
	console.warn(`[HealingConfig] Ignoring ${name}=${raw}: expected a number`)
	return undefined
}

/**
 * Lay `AUTO_FIX_*` and `ORACLE_TIMEOUT_MS` over the file configuration. Unset or
 * unreadable variables leave the file value alone.
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
	const autoFix: RawConfig = {}
	const enabled = readBooleanEnv(env, "AUTO_FIX_ENABLED")
	if (enabled !== undefined) autoFix.enabled = enabled
	const threshold = readNumberEnv(env, "AUTO_FIX_CONFIDENCE_THRESHOLD")
	if (threshold !== undefined) autoFix.confidenceThreshold = threshold
	const backupDir = env.AUTO_FIX_BACKUP_DIR?.trim()
	if (backupDir) autoFix.backupDir = backupDir

	const oracle: RawConfig = {}
	const timeoutMs = readNumberEnv(env, "ORACLE_TIMEOUT_MS")
	if (timeoutMs !== undefined) oracle.timeoutMs = timeoutMs

	const merged: RawConfig = { ...raw }
	if (Object.keys(autoFix).length > 0) {
		merged.autoFix = { ...(isRecord(raw.autoFix) ? raw.autoFix : {}), ...autoFix }
	}
	if (Object.keys(oracle).length > 0) {
		merged.oracle = { ...(isRecord(raw.oracle) ? raw.oracle : {}), ...oracle }
	}
	return merged
}

// =============================================================================
// Loader
// =============================================================================

export interface LoadEngineConfigOptions {
	projectRoot: string
	/** Relative to the project root unless absolute */
	configPath?: string
	env?: NodeJS.ProcessEnv
}

async function readConfigFile(filePath: string): Promise<RawConfig> {
	if (!(await fileExists(filePath))) {
		return {}
	}

	try {
		const parsed: unknown = parseYaml(await readFile(filePath, "utf8"))
		if (parsed === null || parsed === undefined) {
			return {}
		}
		if (!isRecord(parsed)) {
			console.warn(`[HealingConfig] Ignoring ${filePath}: expected a mapping at the top level`)
			return {}
		}
		return parsed
	} catch (error) {
		console.warn(
			`[HealingConfig] Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
		)
		return {}
	}
}

export async function loadEngineConfig(options: LoadEngineConfigOptions): Promise<HealingConfig> {
	const configPath = path.resolve(options.projectRoot, options.configPath ?? DEFAULT_CONFIG_PATH)
	const fromFile = await readConfigFile(configPath)
	return new HealingConfig(applyEnvOverrides(fromFile, options.env ?? process.env))
}
