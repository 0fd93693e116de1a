/**
 * Rule table: one entry per rule class, in evaluation order
 */

import { IssueCategory, RuleClass, Severity } from "../types";

export interface RuleDefinition {
  ruleId: string;
  ruleClass: RuleClass;
  severity: Severity;
  remediation: string;
}

export const RULE_DEFINITIONS: readonly RuleDefinition[] = [
  {
    ruleId: "IMP001",
    ruleClass: "deniedModule",
    severity: "critical",
    remediation: "Remove prohibited module imports and use approved alternatives",
  },
  {
    ruleId: "IMP002",
    ruleClass: "moduleNotAllowlisted",
    severity: "high",
    remediation: "Use only modules on the policy allowlist",
  },
  {
    ruleId: "FUNC001",
    ruleClass: "deniedFunction",
    severity: "high",
    remediation: "Remove calls to functions denied by the active policy",
  },
  {
    ruleId: "FS001",
    ruleClass: "filesystemAccess",
    severity: "critical",
    remediation: "Remove file system operations or use approved temporary storage APIs",
  },
  {
    ruleId: "NET001",
    ruleClass: "networkAccess",
    severity: "critical",
    remediation: "Remove network calls or use approved API endpoints",
  },
  {
    ruleId: "SYS001",
    ruleClass: "processSpawn",
    severity: "critical",
    remediation: "Remove system calls and process spawning operations",
  },
  {
    ruleId: "DYN001",
    ruleClass: "dynamicCode",
    severity: "critical",
    remediation: "Replace dynamic code execution with safe alternatives",
  },
  {
    ruleId: "DYN002",
    ruleClass: "sandboxEscape",
    severity: "high",
    remediation: "Avoid prototype and interpreter introspection that can escape the sandbox",
  },
  {
    ruleId: "RES001",
    ruleClass: "memoryLimit",
    severity: "high",
    remediation: "Reduce code complexity or data structures",
  },
  {
    ruleId: "RES002",
    ruleClass: "cpuLimit",
    severity: "high",
    remediation: "Optimize algorithms or reduce iterations",
  },
  {
    ruleId: "RES003",
    ruleClass: "complexityLimit",
    severity: "medium",
    remediation: "Simplify code structure and reduce nesting",
  },
  {
    ruleId: "RES004",
    ruleClass: "nestingLimit",
    severity: "medium",
    remediation: "Reduce nesting by extracting functions",
  },
  {
    ruleId: "RES005",
    ruleClass: "recursion",
    severity: "high",
    remediation: "Convert recursive logic to iterative approach",
  },
  {
    ruleId: "RES006",
    ruleClass: "unboundedLoop",
    severity: "high",
    remediation: "Add an explicit exit condition or iteration bound to the loop",
  },
];

export const RULES_BY_CLASS = new Map<RuleClass, RuleDefinition>(RULE_DEFINITIONS.map((rule) => [rule.ruleClass, rule]));

export const RULE_ORDER = new Map<RuleClass, number>(RULE_DEFINITIONS.map((rule, index) => [rule.ruleClass, index]));

/**
 * Analyzer finding category -> rule class. Denied-module findings are evaluated from
 * the import facts against the policy's own lists instead.
 */
export const CATEGORY_RULES: Partial<Record<IssueCategory, RuleClass>> = {
  filesystem_access: "filesystemAccess",
  network_access: "networkAccess",
  process_spawn: "processSpawn",
  dynamic_code: "dynamicCode",
  sandbox_escape: "sandboxEscape",
};
