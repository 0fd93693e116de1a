/**
 * Wires config, events, logging, storage, audit and policy around the orchestrator
 */

import { AnalyzerRegistry, createDefaultRegistry } from "./analysis/registry";
import { Clock } from "./analysis/deadline";
import { AuditSink, CompositeAuditSink, EventBusAuditSink } from "./audit/auditSink";
import { FileAuditSink } from "./audit/fileAuditSink";
import { ArtifactStore, InMemoryArtifactStore } from "./cache/artifactStore";
import { FileArtifactStore } from "./cache/fileArtifactStore";
import { CacheStats, DeleteOutcome, ValidationCache } from "./cache/validationCache";
import { EngineConfig, createEngineConfig } from "./config";
import { EventBus } from "./eventBus";
import { EngineLogger } from "./logger";
import { LoggerConfig } from "./logger/config";
import { ValidationOrchestrator, ValidationReport } from "./orchestrator/validationOrchestrator";
import { FilePolicySource, PolicySource, StaticPolicySource } from "./policy/policySource";
import { SecurityPolicy, createDefaultPolicy } from "./policy/securityPolicy";
import { CachedArtifact, ValidationResult } from "./types";

export interface ValidationEngineOptions {
  config?: EngineConfig;
  store?: ArtifactStore;
  eventBus?: EventBus;
  logger?: EngineLogger;
  /** Replaces the sinks derived from the config */
  auditSink?: AuditSink;
  policySource?: PolicySource;
  registry?: AnalyzerRegistry;
  clock?: Clock;
  now?: () => Date;
}

export class ValidationEngine {
  readonly config: EngineConfig;
  readonly eventBus: EventBus;
  readonly logger: EngineLogger;
  readonly cache: ValidationCache;
  readonly policySource: PolicySource;
  readonly auditSink: AuditSink;
  private readonly orchestrator: ValidationOrchestrator;

  constructor(options: ValidationEngineOptions = {}) {
    this.config = options.config ?? createEngineConfig();
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = options.logger ?? new EngineLogger(this.eventBus, loggerConfigFrom(this.config));
    this.cache = new ValidationCache(options.store ?? defaultStore(this.config), this.eventBus);
    this.policySource = options.policySource ?? defaultPolicySource(this.config);
    this.auditSink = options.auditSink ?? defaultAuditSink(this.config, this.eventBus);

    this.orchestrator = new ValidationOrchestrator({
      cache: this.cache,
      registry: options.registry ?? createDefaultRegistry(),
      eventBus: this.eventBus,
      logger: this.logger,
      auditSink: this.auditSink,
      settings: {
        budgetMs: this.config.budgetMs,
        analysisSliceMs: this.config.analysisSliceMs,
        maxSourceBytes: this.config.maxSourceBytes,
        tempPathPrefixes: this.config.tempPathPrefixes,
        executionTimeoutSeconds: this.config.executionTimeoutSeconds,
      },
      clock: options.clock,
      now: options.now,
    });
  }

  /**
   * Validate under the given policy, or the policy source's current policy when none is passed
   */
  async validate(code: string, language: string, policy?: SecurityPolicy): Promise<ValidationResult> {
    return this.orchestrator.validate(code, language, policy ?? (await this.policySource.getPolicy()));
  }

  async validateDetailed(code: string, language: string, policy?: SecurityPolicy): Promise<ValidationReport> {
    return this.orchestrator.validateDetailed(code, language, policy ?? (await this.policySource.getPolicy()));
  }

  async getArtifact(submissionHash: string): Promise<CachedArtifact | undefined> {
    return this.cache.get(submissionHash);
  }

  async addReference(submissionHash: string, reference: string): Promise<CachedArtifact | undefined> {
    return this.cache.addReference(submissionHash, reference);
  }

  async releaseReference(submissionHash: string, reference: string): Promise<CachedArtifact | undefined> {
    return this.cache.releaseReference(submissionHash, reference);
  }

  async deleteArtifact(submissionHash: string, releasingReference?: string): Promise<DeleteOutcome> {
    return this.cache.delete(submissionHash, releasingReference);
  }

  async stats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  async close(): Promise<void> {
    if (this.auditSink.close) await this.auditSink.close();
    await this.logger.flush();
  }
}

export function createValidationEngine(options: ValidationEngineOptions = {}): ValidationEngine {
  return new ValidationEngine(options);
}

function loggerConfigFrom(config: EngineConfig): Partial<LoggerConfig> {
  const { level, format, filePath } = config.logging;
  return filePath ? { level, format, file: { enabled: true, path: filePath } } : { level, format };
}

function defaultStore(config: EngineConfig): ArtifactStore {
  return config.storePath ? new FileArtifactStore(config.storePath) : new InMemoryArtifactStore();
}

function defaultPolicySource(config: EngineConfig): PolicySource {
  return config.policyPath ? new FilePolicySource(config.policyPath) : new StaticPolicySource(createDefaultPolicy());
}

function defaultAuditSink(config: EngineConfig, eventBus: EventBus): AuditSink {
  const sinks: AuditSink[] = [new EventBusAuditSink(eventBus)];
  if (config.auditLogPath) sinks.push(new FileAuditSink(config.auditLogPath));
  return new CompositeAuditSink(sinks);
}
