/**
 * Contract shared by the per-language analyzers
 */

import { AnalysisConfidence, AnalysisOutcome, Language } from "../types";
import { Deadline } from "./deadline";
import { FindingCollector, emptyFacts } from "./findings";

export const DEFAULT_TEMP_PREFIXES: readonly string[] = ["/tmp/"];

export interface AnalyzeOptions {
  deadline?: Deadline;
  /** Literal paths under these prefixes are not reported as file-system access */
  tempPathPrefixes?: readonly string[];
}

export interface LanguageAnalyzer {
  readonly languages: readonly Language[];
  analyze(code: string, language: Language, options?: AnalyzeOptions): AnalysisOutcome;
}

/**
 * Outcome for source that does not parse. Security analysis is skipped entirely.
 */
export function syntaxFailure(
  language: Language,
  confidence: AnalysisConfidence,
  code: string,
  syntaxErrors: string[],
  warnings: string[] = []
): AnalysisOutcome {
  return {
    language,
    confidence,
    syntaxErrors,
    warnings,
    securityIssues: [],
    facts: emptyFacts(new FindingCollector(code).lineCount),
  };
}
