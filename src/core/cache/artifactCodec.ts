/**
 * JSON codec for cached artifacts. Blobs are validated on the way in;
 * anything that does not match is a storage failure, never a verdict.
 */

import { z } from "zod";
import { formatIssues } from "../config";
import { StorageFailureError } from "../errors";
import { CachedArtifact } from "../types";

const LanguageSchema = z.enum(["python", "javascript", "typescript"]);
const SeveritySchema = z.enum(["low", "medium", "high", "critical"]);

const SecurityIssueSchema = z.object({
  severity: SeveritySchema,
  category: z.enum(["denied_module", "dynamic_code", "process_spawn", "network_access", "filesystem_access", "sandbox_escape"]),
  lineNumber: z.number().int(),
  snippet: z.string(),
  description: z.string(),
});

const PolicyViolationSchema = z.object({
  ruleId: z.string(),
  ruleClass: z.enum([
    "deniedModule",
    "moduleNotAllowlisted",
    "deniedFunction",
    "filesystemAccess",
    "networkAccess",
    "processSpawn",
    "dynamicCode",
    "sandboxEscape",
    "memoryLimit",
    "cpuLimit",
    "complexityLimit",
    "nestingLimit",
    "recursion",
    "unboundedLoop",
  ]),
  severity: SeveritySchema,
  message: z.string(),
  remediation: z.string(),
  lineNumber: z.number().int().optional(),
});

const ResourceEstimateSchema = z.object({
  estimatedMemoryBytes: z.number().nonnegative(),
  estimatedCpuSeconds: z.number().nonnegative(),
  complexityScore: z.number().int(),
  maxNestingDepth: z.number().int().nonnegative(),
  usesRecursion: z.boolean(),
  usesUnboundedLoop: z.boolean(),
});

const ValidationResultSchema = z.object({
  isValid: z.boolean(),
  outcome: z.enum(["accepted", "rejected", "syntax_error", "analysis_timeout", "analysis_error", "invalid_submission"]),
  language: LanguageSchema,
  submissionHash: z.string(),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  securityIssues: z.array(SecurityIssueSchema),
  violations: z.array(PolicyViolationSchema),
  resourceEstimate: ResourceEstimateSchema.nullable(),
  policyVersionEvaluated: z.string(),
  timestamp: z.string(),
});

const StructuralFactsSchema = z.object({
  imports: z.array(
    z.object({ module: z.string(), line: z.number().int(), dynamic: z.boolean(), relative: z.boolean() })
  ),
  calls: z.array(z.object({ callee: z.string(), line: z.number().int() })),
  functions: z.array(z.object({ name: z.string(), line: z.number().int() })),
  recursiveFunctions: z.array(z.string()),
  branchCount: z.number().int().nonnegative(),
  loopCount: z.number().int().nonnegative(),
  maxNestingDepth: z.number().int().nonnegative(),
  unboundedLoopLines: z.array(z.number().int()),
  usesNetwork: z.boolean(),
  usesFilesystem: z.boolean(),
  lineCount: z.number().int().nonnegative(),
});

const AnalysisOutcomeSchema = z.object({
  language: LanguageSchema,
  confidence: z.enum(["full", "best-effort"]),
  syntaxErrors: z.array(z.string()),
  warnings: z.array(z.string()),
  securityIssues: z.array(SecurityIssueSchema),
  facts: StructuralFactsSchema,
});

export const CachedArtifactSchema = z.object({
  submissionHash: z.string(),
  language: LanguageSchema,
  validatedCode: z.string(),
  validationResult: ValidationResultSchema,
  dependencies: z.array(z.string()),
  executionMetadata: z.object({
    estimatedMemoryBytes: z.number().nonnegative(),
    estimatedCpuMs: z.number().nonnegative(),
    timeoutSeconds: z.number().positive(),
    requiresNetwork: z.boolean(),
    requiresFilesystem: z.boolean(),
  }),
  usageCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  status: z.enum(["validated", "rejected"]),
  references: z.array(z.string()),
  analysis: AnalysisOutcomeSchema.optional(),
});

export function encodeArtifact(artifact: CachedArtifact): string {
  return JSON.stringify(artifact);
}

export function decodeArtifact(blob: string, key: string): CachedArtifact {
  let document: unknown;
  try {
    document = JSON.parse(blob);
  } catch (error) {
    throw new StorageFailureError("decode", key, error);
  }

  const parsed = CachedArtifactSchema.safeParse(document);
  if (!parsed.success) {
    throw new StorageFailureError("decode", key, new Error(formatIssues(parsed.error)));
  }
  return parsed.data;
}
