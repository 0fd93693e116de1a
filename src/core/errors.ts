/**
 * Error types for the validation engine
 *
 * Verdicts (syntax errors, violations, timeouts) are returned as results.
 * Only caller, configuration and infrastructure problems are thrown.
 */

export class EngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "EngineError";
    Object.setPrototypeOf(this, EngineError.prototype);
  }
}

export class UnsupportedLanguageError extends EngineError {
  constructor(language: string, supported: readonly string[]) {
    super(
      `Unsupported language: ${language}`,
      "UNSUPPORTED_LANGUAGE",
      { language, supported: [...supported] }
    );
    this.name = "UnsupportedLanguageError";
    Object.setPrototypeOf(this, UnsupportedLanguageError.prototype);
  }
}

/**
 * The artifact store could not be reached or returned unreadable data.
 * Means "we don't know", never "this code is unsafe".
 */
export class StorageFailureError extends EngineError {
  constructor(
    public operation: string,
    public key: string | undefined,
    public cause?: unknown
  ) {
    super(
      `Storage failure during ${operation}${key ? ` (${key})` : ""}: ${describeCause(cause)}`,
      "STORAGE_FAILURE",
      { operation, key }
    );
    this.name = "StorageFailureError";
    Object.setPrototypeOf(this, StorageFailureError.prototype);
  }
}

export class AnalysisTimeoutError extends EngineError {
  constructor(public stage: string, public budgetMs: number, public elapsedMs: number) {
    super(
      `Analysis timeout: ${stage} exceeded its ${budgetMs}ms budget`,
      "ANALYSIS_TIMEOUT",
      { stage, budgetMs, elapsedMs }
    );
    this.name = "AnalysisTimeoutError";
    Object.setPrototypeOf(this, AnalysisTimeoutError.prototype);
  }
}

export class PolicyConfigError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid policy: ${message}`, "POLICY_CONFIG_ERROR", details);
    this.name = "PolicyConfigError";
    Object.setPrototypeOf(this, PolicyConfigError.prototype);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_ERROR", details);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
