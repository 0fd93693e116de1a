/**
 * Assembles frozen ValidationResults
 */

import { AnalysisTimeoutError } from "../errors";
import { isRejecting } from "../policy/evaluator";
import { SecurityPolicy, policyFingerprint } from "../policy/securityPolicy";
import { AnalysisOutcome, Language, PolicyViolation, ResourceEstimate, ValidationOutcome, ValidationResult } from "../types";

export interface ResultContext {
  language: Language;
  submissionHash: string;
  policy: SecurityPolicy;
  timestamp: string;
}

export function formatViolation(violation: PolicyViolation): string {
  const location = violation.lineNumber !== undefined ? ` (line ${violation.lineNumber})` : "";
  return `[${violation.ruleId}] ${violation.message}${location}`;
}

/**
 * Rejecting violations (severity at or above the policy threshold) become errors, the rest warnings
 */
export function buildValidationResult(
  context: ResultContext,
  outcome: AnalysisOutcome,
  estimate: ResourceEstimate | null,
  violations: readonly PolicyViolation[]
): ValidationResult {
  const threshold = context.policy.rejectionThreshold;
  const rejecting = violations.filter((violation) => isRejecting(violation, threshold));
  const tolerated = violations.filter((violation) => !isRejecting(violation, threshold));
  const hasSyntaxErrors = outcome.syntaxErrors.length > 0;
  const isValid = !hasSyntaxErrors && rejecting.length === 0;

  return freezeResult({
    isValid,
    outcome: hasSyntaxErrors ? "syntax_error" : isValid ? "accepted" : "rejected",
    language: context.language,
    submissionHash: context.submissionHash,
    errors: [...outcome.syntaxErrors, ...rejecting.map(formatViolation)],
    warnings: [...outcome.warnings, ...tolerated.map(formatViolation)],
    securityIssues: outcome.securityIssues,
    violations,
    resourceEstimate: hasSyntaxErrors ? null : estimate,
    policyVersionEvaluated: policyFingerprint(context.policy),
    timestamp: context.timestamp,
  });
}

export function buildTimeoutResult(context: ResultContext, error: AnalysisTimeoutError): ValidationResult {
  return failureResult(
    context,
    "analysis_timeout",
    `Analysis timed out during ${error.stage} after ${error.elapsedMs}ms (budget ${error.budgetMs}ms)`
  );
}

export function buildAnalysisErrorResult(context: ResultContext, message: string): ValidationResult {
  return failureResult(context, "analysis_error", `Analysis failed: ${message}`);
}

export function buildInvalidSubmissionResult(context: ResultContext, reason: string): ValidationResult {
  return failureResult(context, "invalid_submission", reason);
}

function failureResult(context: ResultContext, outcome: ValidationOutcome, error: string): ValidationResult {
  return freezeResult({
    isValid: false,
    outcome,
    language: context.language,
    submissionHash: context.submissionHash,
    errors: [error],
    warnings: [],
    securityIssues: [],
    violations: [],
    resourceEstimate: null,
    policyVersionEvaluated: policyFingerprint(context.policy),
    timestamp: context.timestamp,
  });
}

function freezeResult(result: ValidationResult): ValidationResult {
  return Object.freeze({
    ...result,
    errors: Object.freeze([...result.errors]),
    warnings: Object.freeze([...result.warnings]),
    securityIssues: Object.freeze([...result.securityIssues]),
    violations: Object.freeze([...result.violations]),
    resourceEstimate: result.resourceEstimate ? Object.freeze({ ...result.resourceEstimate }) : null,
  });
}
