export * from "./HealingConfig"
