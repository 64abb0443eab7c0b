export * from "./AutoFixGate"
