/**
 * HPO phenotype mapper - public API.
 */

export * from "./agents";
export * from "./services";
export * from "./config/pipeline-config";
export { calculateTokenCost, getModelPricing } from "./config/ai-model-pricing";
export { WorkflowLogger, LogLevel, type LogEntry, type WorkflowLoggerConfig } from "./logging/logging";
export { LogConfigManager, type LogConfig } from "./logging/log-config";
export { mapWithConcurrency } from "./utils/concurrency";
export {
  DocumentStateMachine,
  canTransition,
  computeMappingSummary,
  createFailedResult,
  emptyMappingSummary,
  DEFAULT_HIGH_CONFIDENCE_THRESHOLD,
} from "./workflow/state-manager";
export * from "./workflow/workflow-orchestrator";
export * from "./workflow/workflow-descriptors";
export { saveResults } from "./workflow/result-writer";
export { TOOL_DEFINITIONS, TOOL_NAMES, handleToolCall, searchHpoForSymptom, type ToolContext } from "./mcp/tools";
