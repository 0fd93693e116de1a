/**
 * Resource estimator: a heuristic cost model over structural facts
 */

import { ResourceEstimate, StructuralFacts } from "../types";

const MiB = 1024 * 1024;

export const BASE_MEMORY_BYTES = 64 * MiB;
export const MEMORY_PER_COMPLEXITY_BYTES = 2 * MiB;
export const MAX_MEMORY_BYTES = 512 * MiB;

export const BASE_CPU_SECONDS = 0.1;
export const CPU_PER_COMPLEXITY_SECONDS = 0.05;
export const LOOP_CPU_SECONDS = 0.5;
export const RECURSION_CPU_SECONDS = 1.0;
export const MAX_CPU_SECONDS = 30;

export function complexityScore(facts: StructuralFacts): number {
  return 1 + facts.branchCount + 2 * facts.loopCount + facts.maxNestingDepth;
}

export function estimate(facts: StructuralFacts): ResourceEstimate {
  const score = complexityScore(facts);
  const usesRecursion = facts.recursiveFunctions.length > 0;

  const memory = Math.min(BASE_MEMORY_BYTES + MEMORY_PER_COMPLEXITY_BYTES * score, MAX_MEMORY_BYTES);

  let cpu = BASE_CPU_SECONDS + CPU_PER_COMPLEXITY_SECONDS * score;
  if (facts.loopCount > 0) cpu += LOOP_CPU_SECONDS;
  if (usesRecursion) cpu += RECURSION_CPU_SECONDS;
  cpu = Math.round(Math.min(cpu, MAX_CPU_SECONDS) * 1000) / 1000;

  return {
    estimatedMemoryBytes: memory,
    estimatedCpuSeconds: cpu,
    complexityScore: score,
    maxNestingDepth: facts.maxNestingDepth,
    usesRecursion,
    usesUnboundedLoop: facts.unboundedLoopLines.length > 0,
  };
}
