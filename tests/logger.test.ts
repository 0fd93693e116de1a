/**
 * Logger Test Suite
 */

import { EventBus } from "../src/core/eventBus";
import {
  EngineLogger,
  createContextualLogger,
  getLogger,
  initializeLogger,
  logger,
  resetLogger,
} from "../src/core/logger";
import { createLoggerConfig, isValidLogLevel } from "../src/core/logger/config";
import { createFormatter, formatBytes, formatDuration, sanitizeForLogging } from "../src/core/logger/formatters";
import { createTransportTargets } from "../src/core/logger/transports";

describe("Logger", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  afterEach(() => {
    initializeLogger(new EventBus(), { level: "silent" });
  });

  describe("Initialization", () => {
    test("should register the process-wide logger", () => {
      const loggerInstance = initializeLogger(eventBus, { level: "silent" });
      expect(loggerInstance).toBeInstanceOf(EngineLogger);
      expect(getLogger()).toBe(loggerInstance);
      expect(loggerInstance.level).toBe("silent");
    });

    test("should throw when logger not initialized", () => {
      resetLogger();
      expect(() => getLogger()).toThrow("Logger not initialized");
    });
  });

  describe("Logging Methods", () => {
    let loggerInstance: EngineLogger;

    beforeEach(() => {
      loggerInstance = initializeLogger(eventBus, { level: "silent" });
    });

    test("should accept messages at every level", () => {
      expect(() => {
        loggerInstance.debug("Debug message");
        loggerInstance.info("Info message", { submissionHash: "abc" });
        loggerInstance.warn("Warning message");
        loggerInstance.error("Error message");
        loggerInstance.error(new Error("Test error"));
        loggerInstance.fatal("Fatal message");
      }).not.toThrow();
    });

    test("should create child and contextual loggers", () => {
      const child = loggerInstance.child({ submissionHash: "abc" });
      expect(child).toBeInstanceOf(EngineLogger);
      expect(child).not.toBe(loggerInstance);
      expect(createContextualLogger({ language: "python" })).toBeInstanceOf(EngineLogger);
      expect(logger.submission("abc")).toBeInstanceOf(EngineLogger);
    });

    test("should return elapsed time from a timer", () => {
      const stop = loggerInstance.startTimer("analysis");
      expect(stop()).toBeGreaterThanOrEqual(0);
    });

    test("should trace validations and security events", () => {
      expect(() => {
        loggerInstance.traceValidation({
          submissionHash: "abc",
          language: "python",
          outcome: "rejected",
          isValid: false,
          durationMs: 12,
          cacheHit: false,
          violationCount: 2,
        });
        loggerInstance.securityEvent("denied_module", { module: "os", token: "test-secret" });
      }).not.toThrow();
    });

    test("should log engine events without disturbing emitters", () => {
      expect(() => {
        eventBus.emit("StorageErrorEvent", { operation: "put", message: "disk full" });
        eventBus.emit("AnalysisTimeoutEvent", {
          submissionHash: "abc",
          language: "python",
          stage: "analysis",
          budgetMs: 0,
          elapsedMs: 0,
        });
      }).not.toThrow();
      expect(eventBus.ofType("ListenerErrorEvent")).toHaveLength(0);
    });

    test("should flush without transports", async () => {
      await expect(loggerInstance.flush()).resolves.toBeUndefined();
    });
  });

  describe("Configuration", () => {
    test("should fill defaults", () => {
      const config = createLoggerConfig({ level: "debug" });
      expect(config.level).toBe("debug");
      expect(config.format).toBe("pretty");
      expect(config.file?.enabled).toBe(false);
    });

    test("should recognise log levels", () => {
      expect(isValidLogLevel("warn")).toBe(true);
      expect(isValidLogLevel("verbose")).toBe(false);
    });

    test("should build no transports when silent", () => {
      expect(createTransportTargets(createLoggerConfig({ level: "silent" }))).toEqual([]);
    });

    test("should build console and file transports", () => {
      const targets = createTransportTargets(
        createLoggerConfig({ level: "info", format: "json", file: { enabled: true, path: "/tmp/codegate-test.log" } })
      );
      expect(targets.map((target) => target.target)).toEqual(["pino/file", "pino/file"]);
      expect(targets[0].options).toEqual({ destination: 1 });
    });

    test("should use pino-pretty for the pretty format", () => {
      const [consoleTarget] = createTransportTargets(createLoggerConfig({ level: "info", format: "pretty" }));
      expect(consoleTarget.target).toBe("pino-pretty");
    });
  });

  describe("Formatters", () => {
    test("should add source and correlation id", () => {
      const format = createFormatter(createLoggerConfig());
      expect(format.log?.({ submissionHash: "0123456789abcdef", msg: "x" })).toEqual({
        submissionHash: "0123456789abcdef",
        msg: "x",
        source: "codegate",
        correlationId: "0123456789ab",
      });
    });

    test("should redact secrets and bound strings", () => {
      const long = "a".repeat(250);
      expect(sanitizeForLogging({ apiKey: "test-secret", password: "x", note: long, nested: { token: "t" } })).toEqual({
        apiKey: "[REDACTED]",
        password: "[REDACTED]",
        note: `${"a".repeat(200)}...[250 chars]`,
        nested: { token: "[REDACTED]" },
      });
    });

    test("should format durations and sizes", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(1500)).toBe("1.50s");
      expect(formatDuration(90_000)).toBe("1m 30.00s");
      expect(formatBytes(512)).toBe("512.00B");
      expect(formatBytes(64 * 1024 * 1024)).toBe("64.00MB");
    });
  });
});
