export { ToolRegistry, type GroundTruthValidator, type ToolDefinition } from "./ToolRegistry"
export { exportFileValidator, nonEmptyResultValidator, MIN_EXPORT_FILE_BYTES } from "./validators"
