/**
 * Resource estimator tests
 */

import { emptyFacts } from "../src/core/analysis/findings";
import { complexityScore, estimate } from "../src/core/estimator";
import { StructuralFacts } from "../src/core/types";

const MiB = 1024 * 1024;

function facts(overrides: Partial<StructuralFacts>): StructuralFacts {
  return { ...emptyFacts(1), ...overrides };
}

describe("Resource estimator", () => {
  test("should give straight-line code the base cost", () => {
    expect(estimate(emptyFacts(2))).toEqual({
      estimatedMemoryBytes: 66 * MiB,
      estimatedCpuSeconds: 0.15,
      complexityScore: 1,
      maxNestingDepth: 0,
      usesRecursion: false,
      usesUnboundedLoop: false,
    });
  });

  test("should weigh loops twice as much as branches", () => {
    const loopy = facts({ branchCount: 2, loopCount: 1, maxNestingDepth: 2 });
    expect(complexityScore(loopy)).toBe(7);

    const result = estimate(loopy);
    expect(result.estimatedMemoryBytes).toBe(78 * MiB);
    expect(result.estimatedCpuSeconds).toBe(0.95);
  });

  test("should add a recursion surcharge", () => {
    const result = estimate(facts({ recursiveFunctions: ["f"] }));
    expect(result.usesRecursion).toBe(true);
    expect(result.estimatedCpuSeconds).toBe(1.15);
  });

  test("should saturate memory and cpu", () => {
    const result = estimate(facts({ branchCount: 1000 }));
    expect(result.complexityScore).toBe(1001);
    expect(result.estimatedMemoryBytes).toBe(512 * MiB);
    expect(result.estimatedCpuSeconds).toBe(30);
  });

  test("should flag unbounded loops", () => {
    expect(estimate(facts({ loopCount: 1, unboundedLoopLines: [3] })).usesUnboundedLoop).toBe(true);
  });
});
