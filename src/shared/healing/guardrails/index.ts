export { deriveGuardrails } from "./guardrails"
export { RetryPolicy, type RetryPolicyOptions } from "./RetryPolicy"
