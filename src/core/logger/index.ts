/**
 * Engine logger - Pino-based structured logging
 *
 * - Structured JSON logging with Pino, pretty output through pino-pretty
 * - EventBus integration: engine events are logged at mapped levels
 * - Validation and security tracing helpers
 */

import pino from "pino";
import { EventBus, EventType } from "../eventBus";
import { Language, ValidationOutcome } from "../types";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter, sanitizeForLogging } from "./formatters";
import { createTransportTargets } from "./transports";

export interface LoggerContext {
  submissionHash?: string;
  language?: string;
  [key: string]: unknown;
}

export interface ValidationTrace {
  submissionHash: string;
  language: Language;
  outcome: ValidationOutcome;
  isValid: boolean;
  durationMs: number;
  cacheHit: boolean;
  violationCount: number;
}

type EventLevel = "debug" | "info" | "warn" | "error";

const EVENT_LEVELS: ReadonlyArray<{ event: EventType; level: EventLevel; message: string }> = [
  { event: "ValidationAuditEvent", level: "debug", message: "Validation audited" },
  { event: "CacheHitEvent", level: "debug", message: "Artifact cache hit" },
  { event: "CacheMissEvent", level: "debug", message: "Artifact cache miss" },
  { event: "PolicyReevaluationEvent", level: "info", message: "Cached verdict re-evaluated under new policy" },
  { event: "AnalysisTimeoutEvent", level: "warn", message: "Analysis timeout" },
  { event: "SecurityEvent", level: "warn", message: "Security findings" },
  { event: "StorageErrorEvent", level: "error", message: "Artifact store failure" },
  { event: "ArtifactDeletedEvent", level: "info", message: "Artifact deleted" },
  { event: "ListenerErrorEvent", level: "warn", message: "Event listener failed" },
];

/**
 * Pino logger bound to an EventBus
 */
export class EngineLogger {
  private pinoLogger: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(private readonly eventBus: EventBus, config: Partial<LoggerConfig> = {}, parent?: pino.Logger) {
    this.config = createLoggerConfig(config);

    if (parent) {
      this.pinoLogger = parent;
      return;
    }

    const options: pino.LoggerOptions = {
      level: this.config.level,
      formatters: createFormatter(this.config),
      serializers: {
        err: pino.stdSerializers.err,
      },
    };
    const targets = createTransportTargets(this.config);
    this.pinoLogger = targets.length > 0 ? pino(options, pino.transport({ targets })) : pino(options);

    this.setupEventBusIntegration();
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  /**
   * Child logger sharing the parent's transports
   */
  child(context: LoggerContext): EngineLogger {
    return new EngineLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name}`, { ...context, duration, timer: name });
      return duration;
    };
  }

  /**
   * One line per validation call
   */
  traceValidation(trace: ValidationTrace, context?: LoggerContext): void {
    const level = trace.outcome === "analysis_timeout" || trace.outcome === "analysis_error" ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        ...trace,
        type: "validation",
      },
      `Validation ${trace.outcome} for ${trace.language} submission (${trace.durationMs}ms${trace.cacheHit ? ", cached" : ""})`
    );
  }

  securityEvent(event: string, details: Record<string, unknown>, context?: LoggerContext): void {
    this.warn(`Security event: ${event}`, {
      ...context,
      event,
      details: sanitizeForLogging(details),
      type: "security",
    });
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.pinoLogger.flush((err?: Error) => (err ? reject(err) : resolve()));
    });
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_LEVELS) {
      this.eventBus.on(event, (evt) => {
        this.pinoLogger[level](
          {
            event,
            payload: sanitizeForLogging(evt.payload),
            type: "eventbus",
            eventId: evt.id,
          },
          message
        );
      });
    }
  }
}

let globalLogger: EngineLogger | null = null;

export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): EngineLogger {
  globalLogger = new EngineLogger(eventBus, config);
  return globalLogger;
}

export function getLogger(): EngineLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

export function createContextualLogger(context: LoggerContext): EngineLogger {
  return getLogger().child(context);
}

/**
 * Shortcuts over the global logger
 */
export const logger = {
  debug: (message: string, context?: LoggerContext) => getLogger().debug(message, context),
  info: (message: string, context?: LoggerContext) => getLogger().info(message, context),
  warn: (message: string, context?: LoggerContext) => getLogger().warn(message, context),
  error: (message: string | Error, context?: LoggerContext) => getLogger().error(message, context),
  fatal: (message: string | Error, context?: LoggerContext) => getLogger().fatal(message, context),

  submission: (submissionHash: string) => createContextualLogger({ submissionHash }),

  startTimer: (name: string, context?: LoggerContext) => getLogger().startTimer(name, context),
  securityEvent: (event: string, details: Record<string, unknown>, context?: LoggerContext) =>
    getLogger().securityEvent(event, details, context),
};

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
