export * from "./ExecutionEngine"
export * from "./createHealingEngine"
