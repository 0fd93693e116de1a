/**
 * Validation Orchestrator
 *
 * - resolves the language and keys the submission by content
 * - serves cached verdicts, re-evaluating those recorded under another policy
 * - runs analyzer, estimator and evaluator under the time budget on a miss
 * - coalesces concurrent identical submissions into one computation
 * - appends one audit record per call
 */

import { resolveLanguage } from "../analysis/languages";
import { LanguageAnalyzer } from "../analysis/analyzer";
import { Clock, Deadline } from "../analysis/deadline";
import { AnalyzerRegistry } from "../analysis/registry";
import { AuditSink } from "../audit/auditSink";
import { buildArtifact } from "../cache/artifacts";
import { computeSubmissionHash, normalizeSource } from "../cache/hashing";
import { CoalescedComputation, ValidationCache } from "../cache/validationCache";
import { AnalysisTimeoutError, EngineError, describeCause } from "../errors";
import { estimate } from "../estimator";
import { EventBus } from "../eventBus";
import { EngineLogger } from "../logger";
import { evaluate } from "../policy/evaluator";
import { SecurityPolicy, policyFingerprint } from "../policy/securityPolicy";
import { AnalysisOutcome, CachedArtifact, Language, ValidationResult } from "../types";
import {
  ResultContext,
  buildAnalysisErrorResult,
  buildInvalidSubmissionResult,
  buildTimeoutResult,
  buildValidationResult,
} from "./resultBuilder";

export interface OrchestratorSettings {
  /** Wall-clock ceiling for one validation */
  budgetMs: number;
  /** Part of the budget granted to the analyzer */
  analysisSliceMs: number;
  maxSourceBytes: number;
  tempPathPrefixes: readonly string[];
  executionTimeoutSeconds: number;
}

export interface OrchestratorOptions {
  cache: ValidationCache;
  registry: AnalyzerRegistry;
  eventBus: EventBus;
  logger: EngineLogger;
  settings: OrchestratorSettings;
  auditSink?: AuditSink;
  clock?: Clock;
  now?: () => Date;
}

export interface ValidationReport {
  result: ValidationResult;
  /** Served from a stored artifact */
  cacheHit: boolean;
  /** Joined a computation another caller had already started */
  coalesced: boolean;
  /** The stored verdict was recorded under another policy and evaluated again */
  reevaluated: boolean;
  usageCount: number;
  durationMs: number;
  artifact?: CachedArtifact;
}

type ReportBody = Omit<ValidationReport, "durationMs">;

interface PipelineOutcome {
  result: ValidationResult;
  /** Absent when the pipeline did not finish; such results are never cached */
  analysis?: AnalysisOutcome;
}

interface Submission {
  code: string;
  language: Language;
  analyzer: LanguageAnalyzer;
  policy: SecurityPolicy;
  context: ResultContext;
  fingerprint: string;
  /** Started before the cache lookup; analysis gets what is left of it */
  deadline: Deadline;
}

export class ValidationOrchestrator {
  private readonly clock: Clock;
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? Date.now;
    this.now = options.now ?? (() => new Date());
  }

  async validate(code: string, language: string, policy: SecurityPolicy): Promise<ValidationResult> {
    const report = await this.validateDetailed(code, language, policy);
    return report.result;
  }

  async validateDetailed(code: string, languageTag: string, policy: SecurityPolicy): Promise<ValidationReport> {
    const startedAt = this.clock();
    const deadline = new Deadline(this.options.settings.budgetMs, "validation", this.clock);
    const language = resolveLanguage(languageTag);
    const analyzer = this.options.registry.get(language);
    const normalized = normalizeSource(code);
    const submissionHash = computeSubmissionHash(code, language);
    const fingerprint = policyFingerprint(policy);
    const context: ResultContext = { language, submissionHash, policy, timestamp: this.now().toISOString() };
    const submission: Submission = { code: normalized, language, analyzer, policy, context, fingerprint, deadline };

    const rejection = this.checkSubmission(code, normalized);
    if (rejection) {
      return this.finish(
        submission,
        {
          result: buildInvalidSubmissionResult(context, rejection),
          cacheHit: false,
          coalesced: false,
          reevaluated: false,
          usageCount: 0,
        },
        startedAt
      );
    }

    const cached = await this.options.cache.get(submissionHash);
    if (cached) {
      const body =
        cached.validationResult.policyVersionEvaluated === fingerprint
          ? await this.serveCached(cached)
          : await this.reevaluate(submission, cached);
      return this.finish(submission, body, startedAt);
    }

    this.options.eventBus.emit("CacheMissEvent", { submissionHash, language });
    const { value, joined } = await this.options.cache.coalesce(`${submissionHash}|${fingerprint}`, () =>
      this.computeAndStore(submission)
    );
    return this.finish(submission, await this.reportFor(value, joined, false, false), startedAt);
  }

  private checkSubmission(code: string, normalized: string): string | undefined {
    if (normalized.length === 0) {
      return "Submission is empty";
    }
    const size = Buffer.byteLength(code, "utf8");
    if (size > this.options.settings.maxSourceBytes) {
      return `Submission is ${size} bytes; the limit is ${this.options.settings.maxSourceBytes} bytes`;
    }
    return undefined;
  }

  private async serveCached(cached: CachedArtifact): Promise<ReportBody> {
    return this.reportFor({ result: cached.validationResult, artifact: cached }, false, true, false);
  }

  /**
   * Stored analysis is reused unless the policy changes what the analyzer itself reports
   */
  private async reevaluate(submission: Submission, cached: CachedArtifact): Promise<ReportBody> {
    const hash = submission.context.submissionHash;
    const reanalyze = cached.analysis === undefined || submission.policy.tempPathPrefixes !== undefined;

    const { value, joined } = await this.options.cache.coalesce(`${hash}|${submission.fingerprint}`, async () => {
      const outcome = this.runPipeline(
        { ...submission, code: cached.validatedCode },
        reanalyze ? undefined : cached.analysis
      );
      if (!outcome.analysis) return { result: outcome.result };

      const replaced = await this.options.cache.replaceResult(
        hash,
        outcome.result,
        reanalyze ? outcome.analysis : undefined
      );
      this.options.eventBus.emit("PolicyReevaluationEvent", {
        submissionHash: hash,
        previousPolicyVersion: cached.validationResult.policyVersionEvaluated,
        policyVersion: submission.fingerprint,
        isValid: outcome.result.isValid,
        reanalyzed: reanalyze,
      });
      return replaced ? { result: outcome.result, artifact: replaced } : { result: outcome.result };
    });

    return this.reportFor(value, joined, true, true);
  }

  private async computeAndStore(submission: Submission): Promise<CoalescedComputation> {
    const outcome = this.runPipeline(submission);
    if (!outcome.analysis) return { result: outcome.result };

    this.emitSecurityEvent(submission, outcome.result);

    const artifact = buildArtifact({
      submissionHash: submission.context.submissionHash,
      language: submission.language,
      code: submission.code,
      result: outcome.result,
      analysis: outcome.analysis,
      timeoutSeconds: this.options.settings.executionTimeoutSeconds,
      createdAt: submission.context.timestamp,
    });
    const stored = await this.options.cache.put(submission.context.submissionHash, artifact);

    // First write wins; a verdict stored under another policy is not adopted
    const result =
      stored.validationResult.policyVersionEvaluated === submission.fingerprint
        ? stored.validationResult
        : outcome.result;
    return { result, artifact: stored };
  }

  /**
   * Synchronous analyze, estimate, evaluate. Timeouts and analyzer faults become results.
   */
  private runPipeline(submission: Submission, storedAnalysis?: AnalysisOutcome): PipelineOutcome {
    const { settings } = this.options;
    const { context, deadline: overall } = submission;

    try {
      const analysis =
        storedAnalysis ??
        submission.analyzer.analyze(submission.code, submission.language, {
          deadline: new Deadline(Math.min(settings.analysisSliceMs, overall.remaining()), "analysis", this.clock),
          tempPathPrefixes: submission.policy.tempPathPrefixes ?? settings.tempPathPrefixes,
        });
      overall.check();

      const resourceEstimate = estimate(analysis.facts);
      const violations = evaluate(analysis, resourceEstimate, submission.policy);
      overall.check();

      return { result: buildValidationResult(context, analysis, resourceEstimate, violations), analysis };
    } catch (error) {
      if (error instanceof AnalysisTimeoutError) {
        this.options.logger.warn("Analysis timed out", {
          submissionHash: context.submissionHash,
          language: context.language,
          stage: error.stage,
          budgetMs: error.budgetMs,
          elapsedMs: error.elapsedMs,
        });
        this.options.eventBus.emit("AnalysisTimeoutEvent", {
          submissionHash: context.submissionHash,
          language: context.language,
          stage: error.stage,
          budgetMs: error.budgetMs,
          elapsedMs: error.elapsedMs,
        });
        return { result: buildTimeoutResult(context, error) };
      }
      if (error instanceof EngineError) throw error;

      this.options.logger.error(error instanceof Error ? error : new Error(describeCause(error)), {
        submissionHash: context.submissionHash,
        language: context.language,
      });
      return { result: buildAnalysisErrorResult(context, describeCause(error)) };
    }
  }

  private async reportFor(
    value: CoalescedComputation,
    joined: boolean,
    cacheHit: boolean,
    reevaluated: boolean
  ): Promise<ReportBody> {
    const stored = value.artifact;
    if (!stored || (!joined && !cacheHit)) {
      return {
        result: value.result,
        cacheHit,
        coalesced: joined,
        reevaluated,
        usageCount: stored?.usageCount ?? 0,
        ...(stored ? { artifact: stored } : {}),
      };
    }

    const touched = (await this.options.cache.touch(stored.submissionHash)) ?? stored;
    this.options.eventBus.emit("CacheHitEvent", {
      submissionHash: stored.submissionHash,
      usageCount: touched.usageCount,
      coalesced: joined,
    });
    return { result: value.result, cacheHit, coalesced: joined, reevaluated, usageCount: touched.usageCount, artifact: touched };
  }

  private emitSecurityEvent(submission: Submission, result: ValidationResult): void {
    if (result.securityIssues.length === 0) return;
    this.options.eventBus.emit("SecurityEvent", {
      submissionHash: submission.context.submissionHash,
      language: submission.language,
      categories: [...new Set(result.securityIssues.map((issue) => issue.category))].sort(),
      ruleIds: [...new Set(result.violations.map((violation) => violation.ruleId))].sort(),
    });
  }

  private async finish(submission: Submission, body: ReportBody, startedAt: number): Promise<ValidationReport> {
    const report: ValidationReport = { ...body, durationMs: Math.max(0, this.clock() - startedAt) };
    const { result } = report;

    this.options.logger.traceValidation({
      submissionHash: result.submissionHash,
      language: result.language,
      outcome: result.outcome,
      isValid: result.isValid,
      durationMs: report.durationMs,
      cacheHit: report.cacheHit,
      violationCount: result.violations.length,
    });

    if (this.options.auditSink) {
      try {
        await this.options.auditSink.record({
          submissionHash: result.submissionHash,
          language: result.language,
          isValid: result.isValid,
          outcome: result.outcome,
          violationCount: result.violations.length,
          durationMs: report.durationMs,
          cacheHit: report.cacheHit,
          coalesced: report.coalesced,
          reevaluated: report.reevaluated,
          policyVersion: submission.fingerprint,
          timestamp: submission.context.timestamp,
        });
      } catch (error) {
        this.options.logger.error(error instanceof Error ? error : new Error(describeCause(error)), {
          submissionHash: result.submissionHash,
          operation: "audit",
        });
      }
    }

    return report;
  }
}
