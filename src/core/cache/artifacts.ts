import { rootModule } from "../analysis/patterns";
import { AnalysisOutcome, CachedArtifact, Language, StructuralFacts, ValidationResult } from "../types";
import { normalizeSource } from "./hashing";

export interface ArtifactInput {
  submissionHash: string;
  language: Language;
  code: string;
  result: ValidationResult;
  analysis?: AnalysisOutcome;
  timeoutSeconds: number;
  createdAt: string;
}

/** Top-level packages the code imports, relative imports excluded */
export function collectDependencies(facts: StructuralFacts): string[] {
  const roots = new Set<string>();
  for (const fact of facts.imports) {
    if (!fact.relative) roots.add(rootModule(fact.module));
  }
  return [...roots].sort();
}

export function buildArtifact(input: ArtifactInput): CachedArtifact {
  const facts = input.analysis?.facts;
  const estimate = input.result.resourceEstimate;

  const artifact: CachedArtifact = {
    submissionHash: input.submissionHash,
    language: input.language,
    validatedCode: normalizeSource(input.code),
    validationResult: input.result,
    dependencies: facts ? collectDependencies(facts) : [],
    executionMetadata: {
      estimatedMemoryBytes: estimate?.estimatedMemoryBytes ?? 0,
      estimatedCpuMs: Math.round((estimate?.estimatedCpuSeconds ?? 0) * 1000),
      timeoutSeconds: input.timeoutSeconds,
      requiresNetwork: facts?.usesNetwork ?? false,
      requiresFilesystem: facts?.usesFilesystem ?? false,
    },
    usageCount: 0,
    createdAt: input.createdAt,
    status: input.result.isValid ? "validated" : "rejected",
    references: [],
  };

  if (input.analysis) artifact.analysis = input.analysis;
  return artifact;
}

/**
 * Swap in a verdict computed under another policy; code, counters and references are kept
 */
export function withValidationResult(
  artifact: CachedArtifact,
  result: ValidationResult,
  analysis?: AnalysisOutcome
): CachedArtifact {
  const next: CachedArtifact = {
    ...artifact,
    validationResult: result,
    status: result.isValid ? "validated" : "rejected",
  };
  if (analysis) {
    next.analysis = analysis;
    next.dependencies = collectDependencies(analysis.facts);
    next.executionMetadata = {
      ...artifact.executionMetadata,
      requiresNetwork: analysis.facts.usesNetwork,
      requiresFilesystem: analysis.facts.usesFilesystem,
    };
  }
  if (result.resourceEstimate) {
    next.executionMetadata = {
      ...next.executionMetadata,
      estimatedMemoryBytes: result.resourceEstimate.estimatedMemoryBytes,
      estimatedCpuMs: Math.round(result.resourceEstimate.estimatedCpuSeconds * 1000),
    };
  }
  return next;
}
