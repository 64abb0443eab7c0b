export * from "./contract"
export * from "./telemetry"
export * from "./analysis"
export * from "./patchPlan"
export * from "./proposal"
export * from "./knowledge"
export * from "./config"
export * from "./execution"
