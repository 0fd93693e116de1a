/**
 * Policy evaluator: analysis outcome + resource estimate + policy -> violations. Pure.
 */

import { compareText } from "../analysis/findings";
import { findModuleEntry, matchesAny } from "../analysis/patterns";
import { AnalysisOutcome, PolicyViolation, ResourceEstimate, RuleClass, SEVERITY_RANK, Severity } from "../types";
import { CATEGORY_RULES, RULES_BY_CLASS, RULE_ORDER } from "./rules";
import { RejectionThreshold, SecurityPolicy, listForLanguage } from "./securityPolicy";

export function evaluate(outcome: AnalysisOutcome, estimate: ResourceEstimate, policy: SecurityPolicy): PolicyViolation[] {
  if (outcome.syntaxErrors.length > 0) return [];

  const violations = new Map<string, PolicyViolation>();
  const emit = (ruleClass: RuleClass, message: string, lineNumber?: number): void => {
    const rule = RULES_BY_CLASS.get(ruleClass);
    if (!rule || !policy.rules[ruleClass]) return;
    const key = `${rule.ruleId}|${lineNumber ?? ""}|${message}`;
    if (violations.has(key)) return;
    violations.set(
      key,
      Object.freeze({
        ruleId: rule.ruleId,
        ruleClass,
        severity: rule.severity,
        message,
        remediation: rule.remediation,
        ...(lineNumber !== undefined ? { lineNumber } : {}),
      })
    );
  };

  const { facts } = outcome;
  const limits = policy.resourceLimits;
  const deniedModules = listForLanguage(policy.deniedModules, outcome.language);
  const deniedFunctions = listForLanguage(policy.deniedFunctions, outcome.language);

  for (const fact of facts.imports) {
    if (fact.relative) continue;
    const allowed = findModuleEntry(fact.module, policy.allowedModules) !== undefined;
    if (allowed) continue;
    if (findModuleEntry(fact.module, deniedModules) !== undefined) {
      emit("deniedModule", `Import of denied module '${fact.module}'`, fact.line);
    } else if (policy.restrictToAllowedModules) {
      emit("moduleNotAllowlisted", `Import of module '${fact.module}' which is not on the allowlist`, fact.line);
    }
  }

  for (const call of facts.calls) {
    if (matchesAny(call.callee, deniedFunctions) !== undefined) {
      emit("deniedFunction", `Call to denied function '${call.callee}'`, call.line);
    }
  }

  for (const issue of outcome.securityIssues) {
    const ruleClass = CATEGORY_RULES[issue.category];
    if (ruleClass) emit(ruleClass, issue.description, issue.lineNumber);
  }

  if (estimate.estimatedMemoryBytes > limits.maxMemoryBytes) {
    emit(
      "memoryLimit",
      `Estimated memory ${estimate.estimatedMemoryBytes} bytes exceeds the limit of ${limits.maxMemoryBytes} bytes`
    );
  }
  if (estimate.estimatedCpuSeconds > limits.maxCpuSeconds) {
    emit("cpuLimit", `Estimated CPU time ${estimate.estimatedCpuSeconds}s exceeds the limit of ${limits.maxCpuSeconds}s`);
  }
  if (estimate.complexityScore > limits.maxComplexity) {
    emit("complexityLimit", `Complexity score ${estimate.complexityScore} exceeds the limit of ${limits.maxComplexity}`);
  }
  if (estimate.maxNestingDepth > limits.maxNestingDepth) {
    emit("nestingLimit", `Nesting depth ${estimate.maxNestingDepth} exceeds the limit of ${limits.maxNestingDepth}`);
  }

  if (estimate.usesRecursion && !policy.allowRecursion) {
    const recursive = new Set(facts.recursiveFunctions);
    const lines = facts.functions.filter((fn) => recursive.has(fn.name)).map((fn) => fn.line);
    emit(
      "recursion",
      `Recursion is not allowed by the policy (${facts.recursiveFunctions.join(", ")})`,
      lines.length > 0 ? Math.min(...lines) : undefined
    );
  }

  if (estimate.usesUnboundedLoop && !policy.allowUnboundedLoops) {
    const count = facts.unboundedLoopLines.length;
    emit(
      "unboundedLoop",
      count === 1 ? "Loop has no exit condition" : `${count} loops have no exit condition`,
      facts.unboundedLoopLines[0]
    );
  }

  return [...violations.values()].sort(
    (a, b) =>
      (RULE_ORDER.get(a.ruleClass) ?? 0) - (RULE_ORDER.get(b.ruleClass) ?? 0) ||
      (a.lineNumber ?? 0) - (b.lineNumber ?? 0) ||
      compareText(a.message, b.message)
  );
}

export function isRejecting(violation: Pick<PolicyViolation, "severity">, threshold: RejectionThreshold): boolean {
  if (threshold === "any") return true;
  return SEVERITY_RANK[violation.severity] >= SEVERITY_RANK[threshold];
}

export interface ViolationSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byRuleClass: Partial<Record<RuleClass, number>>;
}

export function summarizeViolations(violations: readonly PolicyViolation[]): ViolationSummary {
  const summary: ViolationSummary = {
    total: violations.length,
    bySeverity: { low: 0, medium: 0, high: 0, critical: 0 },
    byRuleClass: {},
  };
  for (const violation of violations) {
    summary.bySeverity[violation.severity]++;
    summary.byRuleClass[violation.ruleClass] = (summary.byRuleClass[violation.ruleClass] ?? 0) + 1;
  }
  return summary;
}
