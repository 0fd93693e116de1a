/**
 * Cooperative deadline checked by analyzers while they walk the source
 */

import { AnalysisTimeoutError } from "../errors";

export type Clock = () => number;

export class Deadline {
  private readonly startedAt: number;

  constructor(
    private readonly budgetMs: number,
    private readonly stage: string = "analysis",
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
  }

  /**
   * A deadline that never expires
   */
  static unlimited(stage = "analysis"): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY, stage);
  }

  elapsed(): number {
    return this.clock() - this.startedAt;
  }

  remaining(): number {
    return Math.max(0, this.budgetMs - this.elapsed());
  }

  /**
   * Throws AnalysisTimeoutError once the budget is spent. A zero budget is spent on the first check.
   */
  check(): void {
    const elapsed = this.elapsed();
    if (elapsed >= this.budgetMs) {
      throw new AnalysisTimeoutError(this.stage, this.budgetMs, elapsed);
    }
  }
}
