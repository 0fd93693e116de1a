/**
 * Shared builders for engine tests
 */

import { createEngineConfig, EngineConfigInput } from "../src/core/config";
import { createValidationEngine, ValidationEngine, ValidationEngineOptions } from "../src/core/engine";
import { EventBus } from "../src/core/eventBus";
import { getLogger } from "../src/core/logger";
import { InMemoryArtifactStore } from "../src/core/cache/artifactStore";
import { MemoryAuditSink } from "../src/core/audit/auditSink";
import { buildArtifact } from "../src/core/cache/artifacts";
import { CachedArtifact, ValidationResult } from "../src/core/types";

export interface TestEngine {
  engine: ValidationEngine;
  store: InMemoryArtifactStore;
  audit: MemoryAuditSink;
  eventBus: EventBus;
}

/** Generous budget: the first TypeScript parse in a worker can be slow */
export function createTestEngine(
  config: EngineConfigInput = {},
  options: Omit<ValidationEngineOptions, "config" | "store" | "auditSink" | "eventBus" | "logger"> = {}
): TestEngine {
  const store = new InMemoryArtifactStore();
  const audit = new MemoryAuditSink();
  const eventBus = new EventBus();
  const engine = createValidationEngine({
    config: createEngineConfig({ budgetMs: 60_000, analysisSliceMs: 60_000, ...config, logging: { level: "silent" } }),
    store,
    auditSink: audit,
    eventBus,
    logger: getLogger(),
    ...options,
  });
  return { engine, store, audit, eventBus };
}

export const SAMPLE_HASH = "ab".repeat(32);

export function sampleResult(overrides: Partial<ValidationResult> = {}): ValidationResult {
  return {
    isValid: true,
    outcome: "accepted",
    language: "python",
    submissionHash: SAMPLE_HASH,
    errors: [],
    warnings: [],
    securityIssues: [],
    violations: [],
    resourceEstimate: {
      estimatedMemoryBytes: 69_206_016,
      estimatedCpuSeconds: 0.25,
      complexityScore: 3,
      maxNestingDepth: 1,
      usesRecursion: false,
      usesUnboundedLoop: false,
    },
    policyVersionEvaluated: "default@1",
    timestamp: "2024-05-01T12:00:00.000Z",
    ...overrides,
  };
}

export function sampleArtifact(submissionHash = SAMPLE_HASH, result: Partial<ValidationResult> = {}): CachedArtifact {
  return buildArtifact({
    submissionHash,
    language: "python",
    code: "  x = 1\n",
    result: sampleResult({ submissionHash, ...result }),
    timeoutSeconds: 30,
    createdAt: "2024-05-01T12:00:00.000Z",
  });
}
