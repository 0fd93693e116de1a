/**
 * Core type definitions for the validation engine
 */

/**
 * Canonical language tags. Aliases are resolved before hashing.
 */
export type Language = "python" | "javascript" | "typescript";

export type Severity = "low" | "medium" | "high" | "critical";

export const SEVERITY_RANK: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export type IssueCategory =
  | "denied_module"
  | "dynamic_code"
  | "process_spawn"
  | "network_access"
  | "filesystem_access"
  | "sandbox_escape";

/**
 * A raw finding produced by an analyzer. Frozen once created.
 */
export interface SecurityIssue {
  readonly severity: Severity;
  readonly category: IssueCategory;
  readonly lineNumber: number;
  readonly snippet: string;
  readonly description: string;
}

export interface ImportFact {
  module: string;
  line: number;
  dynamic: boolean;
  relative: boolean;
}

export interface CallFact {
  /** Dotted callee name after alias resolution, e.g. "os.system" */
  callee: string;
  line: number;
}

export interface FunctionFact {
  name: string;
  line: number;
}

export interface StructuralFacts {
  imports: ImportFact[];
  calls: CallFact[];
  functions: FunctionFact[];
  recursiveFunctions: string[];
  branchCount: number;
  loopCount: number;
  maxNestingDepth: number;
  unboundedLoopLines: number[];
  usesNetwork: boolean;
  usesFilesystem: boolean;
  lineCount: number;
}

export type AnalysisConfidence = "full" | "best-effort";

export interface AnalysisOutcome {
  language: Language;
  confidence: AnalysisConfidence;
  syntaxErrors: string[];
  warnings: string[];
  securityIssues: SecurityIssue[];
  facts: StructuralFacts;
}

export interface ResourceEstimate {
  estimatedMemoryBytes: number;
  estimatedCpuSeconds: number;
  complexityScore: number;
  maxNestingDepth: number;
  usesRecursion: boolean;
  usesUnboundedLoop: boolean;
}

export type RuleClass =
  | "deniedModule"
  | "moduleNotAllowlisted"
  | "deniedFunction"
  | "filesystemAccess"
  | "networkAccess"
  | "processSpawn"
  | "dynamicCode"
  | "sandboxEscape"
  | "memoryLimit"
  | "cpuLimit"
  | "complexityLimit"
  | "nestingLimit"
  | "recursion"
  | "unboundedLoop";

export interface PolicyViolation {
  readonly ruleId: string;
  readonly ruleClass: RuleClass;
  readonly severity: Severity;
  readonly message: string;
  readonly remediation: string;
  readonly lineNumber?: number;
}

export type ValidationOutcome =
  | "accepted"
  | "rejected"
  | "syntax_error"
  | "analysis_timeout"
  | "analysis_error"
  | "invalid_submission";

export interface ValidationResult {
  readonly isValid: boolean;
  readonly outcome: ValidationOutcome;
  readonly language: Language;
  readonly submissionHash: string;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly securityIssues: readonly SecurityIssue[];
  readonly violations: readonly PolicyViolation[];
  readonly resourceEstimate: ResourceEstimate | null;
  readonly policyVersionEvaluated: string;
  readonly timestamp: string;
}

/**
 * What the execution sandbox needs to know about an accepted artifact
 */
export interface ExecutionMetadata {
  estimatedMemoryBytes: number;
  estimatedCpuMs: number;
  timeoutSeconds: number;
  requiresNetwork: boolean;
  requiresFilesystem: boolean;
}

export type ArtifactStatus = "validated" | "rejected";

export interface CachedArtifact {
  submissionHash: string;
  language: Language;
  validatedCode: string;
  validationResult: ValidationResult;
  dependencies: string[];
  executionMetadata: ExecutionMetadata;
  usageCount: number;
  createdAt: string;
  status: ArtifactStatus;
  /** Tool ids that currently point at this artifact */
  references: string[];
  /** Retained so a policy change can be re-evaluated without re-parsing */
  analysis?: AnalysisOutcome;
}

export interface AuditRecord {
  submissionHash: string;
  language: Language;
  isValid: boolean;
  outcome: ValidationOutcome;
  violationCount: number;
  durationMs: number;
  cacheHit: boolean;
  coalesced: boolean;
  reevaluated: boolean;
  policyVersion: string;
  timestamp: string;
}
