/**
 * Public entry point
 */

export { ValidationEngine, ValidationEngineOptions, createValidationEngine } from "./core/engine";
export {
  OrchestratorOptions,
  OrchestratorSettings,
  ValidationOrchestrator,
  ValidationReport,
  formatViolation,
} from "./core/orchestrator";
export {
  AnalyzeOptions,
  AnalyzerRegistry,
  BEST_EFFORT_WARNING,
  Clock,
  DEFAULT_TEMP_PREFIXES,
  Deadline,
  JavaScriptAnalyzer,
  LANGUAGES,
  LanguageAnalyzer,
  PythonAnalyzer,
  analyze,
  createDefaultRegistry,
  languageFromPath,
  resolveLanguage,
} from "./core/analysis";
export { estimate, complexityScore } from "./core/estimator";
export * from "./core/policy";
export * from "./core/cache";
export * from "./core/audit";
export { EngineConfig, EngineConfigInput, createEngineConfig, loadEngineConfig } from "./core/config";
export { EventBus, EventEnvelope, EventType, EngineEventMap } from "./core/eventBus";
export { EngineLogger, getLogger, initializeLogger } from "./core/logger";
export * from "./core/errors";
export * from "./core/types";
