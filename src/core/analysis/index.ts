/**
 * Static analysis entry point
 */

import { AnalysisOutcome } from "../types";
import { AnalyzeOptions } from "./analyzer";
import { resolveLanguage } from "./languages";
import { AnalyzerRegistry, createDefaultRegistry } from "./registry";

let defaultRegistry: AnalyzerRegistry | undefined;

/**
 * Analyze `code` with the analyzer registered for `language` (aliases accepted).
 * Malformed input comes back as syntax errors; only timeouts and unknown languages throw.
 */
export function analyze(code: string, language: string, options: AnalyzeOptions = {}): AnalysisOutcome {
  const canonical = resolveLanguage(language);
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry.get(canonical).analyze(code, canonical, options);
}

export { AnalyzeOptions, DEFAULT_TEMP_PREFIXES, LanguageAnalyzer } from "./analyzer";
export { AnalyzerRegistry, createDefaultRegistry } from "./registry";
export { Deadline, Clock } from "./deadline";
export { LANGUAGES, resolveLanguage, languageFromPath } from "./languages";
export { PythonAnalyzer, BEST_EFFORT_WARNING } from "./python/analyzer";
export { JavaScriptAnalyzer } from "./javascript/analyzer";
export { builtinDeniedFunctions, builtinDeniedModules } from "./catalog";
