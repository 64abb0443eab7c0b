export { Advisor } from "./Advisor"
export { ComplexityAnalyzer, unknownComplexity } from "./ComplexityAnalyzer"
export { FailureAnalyzer, UNKNOWN_FAILURE_ANALYSIS } from "./FailureAnalyzer"
