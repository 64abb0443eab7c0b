/**
 * ToolRegistry - typed tool definitions and ground-truth validation
 *
 * A tool reporting success is not taken at its word: its result is checked against the
 * registered result schema and ground-truth validators. Validators never crash the
 * engine; a validator that throws contributes one issue describing the failure.
 */

import type { z } from "zod"

/**
 * Checks a successful result against reality; returns human-readable issues, empty when fine
 */
export type GroundTruthValidator = (result: unknown) => string[] | Promise<string[]>

export interface ToolDefinition {
	name: string
	description?: string
	/** Checked against the merged payload before any attempt */
	params?: z.ZodTypeAny
	/** Checked against a successful result */
	result?: z.ZodTypeAny
	groundTruth?: GroundTruthValidator | GroundTruthValidator[]
}

function formatZodIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const where = issue.path.length > 0 ? issue.path.join(".") : "(root)"
		return `${where}: ${issue.message}`
	})
}

export class ToolRegistry {
	private tools = new Map<string, ToolDefinition>()
	private validators = new Map<string, GroundTruthValidator[]>()

	/**
	 * Register (or replace) a tool definition
	 */
	register(definition: ToolDefinition): this {
		this.tools.set(definition.name, definition)

		const groundTruth = definition.groundTruth
		if (groundTruth) {
			this.validators.set(definition.name, Array.isArray(groundTruth) ? [...groundTruth] : [groundTruth])
		} else {
			this.validators.delete(definition.name)
		}

		return this
	}

	/**
	 * Attach a ground-truth validator to a tool, with or without a definition
	 */
	addValidator(tool: string, validator: GroundTruthValidator): this {
		const existing = this.validators.get(tool) ?? []
		this.validators.set(tool, [...existing, validator])
		return this
	}

	get(tool: string): ToolDefinition | undefined {
		return this.tools.get(tool)
	}

	has(tool: string): boolean {
		return this.tools.has(tool) || this.validators.has(tool)
	}

	list(): ToolDefinition[] {
		return Array.from(this.tools.values())
	}

	/**
	 * Param schema issues for a payload; tools without a param schema accept anything
	 */
	validateParams(tool: string, payload: Record<string, unknown>): string[] {
		const schema = this.tools.get(tool)?.params
		if (!schema) return []

		const parsed = schema.safeParse(payload)
		return parsed.success ? [] : formatZodIssues(parsed.error)
	}

	/**
	 * Ground-truth issues for a successful result. A null or undefined result, or a tool
	 * with nothing registered, has no issues.
	 */
	async validateResult(tool: string, result: unknown): Promise<string[]> {
		if (result === null || result === undefined) return []

		const issues: string[] = []

		const schema = this.tools.get(tool)?.result
		if (schema) {
			const parsed = schema.safeParse(result)
			if (!parsed.success) {
				issues.push(...formatZodIssues(parsed.error).map((issue) => `Result schema: ${issue}`))
			}
		}

		for (const validator of this.validators.get(tool) ?? []) {
			try {
				issues.push(...(await validator(result)))
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error)
				issues.push(`Validator error: ${message}`)
			}
		}

		return issues
	}
}
