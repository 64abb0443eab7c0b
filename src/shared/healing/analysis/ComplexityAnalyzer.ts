import { type ComplexityAnalysis, oracleComplexityAnalysisSchema } from "@mender/types"

import type { OracleClient } from "../oracle/OracleClient"

/**
 * Stand-in when the oracle cannot classify a request: assume it can be handled
 */
export function unknownComplexity(reasoning: string): ComplexityAnalysis {
	return {
		complexity: "unknown",
		requiredDomains: [],
		capabilitiesSufficient: true,
		missingCapabilities: [],
		reasoning,
	}
}

/**
 * Classifies a request by complexity and checks it against the tools the engine knows
 */
export class ComplexityAnalyzer {
	constructor(
		private readonly oracle: OracleClient,
		private readonly capabilities: () => string[] = () => [],
	) {}

	async analyze(request: string): Promise<ComplexityAnalysis> {
		const capabilities = this.capabilities()
		const prompt = `Analyze this request and determine:
1. Required domains
2. Complexity level (simple, moderate, complex, very_complex)
3. Whether the available tools are sufficient
4. Which capabilities are missing, if any

Available tools: ${capabilities.length > 0 ? capabilities.join(", ") : "(none registered)"}

Request: "${request}"

Return JSON only:
{
  "complexity": "simple|moderate|complex|very_complex",
  "required_domains": ["domain"],
  "capabilities_sufficient": true,
  "missing_capabilities": ["capability"],
  "reasoning": "explanation"
}`

		return this.oracle.askStructured(
			prompt,
			oracleComplexityAnalysisSchema,
			() => unknownComplexity("Analysis unavailable"),
			"complexity analysis",
		)
	}
}
