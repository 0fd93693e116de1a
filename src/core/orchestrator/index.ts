export {
  OrchestratorOptions,
  OrchestratorSettings,
  ValidationOrchestrator,
  ValidationReport,
} from "./validationOrchestrator";
export {
  ResultContext,
  buildAnalysisErrorResult,
  buildInvalidSubmissionResult,
  buildTimeoutResult,
  buildValidationResult,
  formatViolation,
} from "./resultBuilder";
