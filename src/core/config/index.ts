/**
 * Engine configuration
 * Layering: defaults < codegate.config.json < environment variables
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";
import { LOG_LEVELS, LogLevel, isValidLogLevel } from "../logger/config";

export const CONFIG_FILE_NAME = "codegate.config.json";

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && isValidLogLevel(value),
  { message: `Expected one of ${LOG_LEVELS.join(", ")}` }
);

export const EngineConfigSchema = z
  .object({
    /** Wall-clock ceiling for a single validation */
    budgetMs: z.number().int().nonnegative().default(750),
    /** Slice of the budget granted to analysis and estimation */
    analysisSliceMs: z.number().int().nonnegative().default(600),
    maxSourceBytes: z.number().int().positive().default(100_000),
    tempPathPrefixes: z.array(z.string().startsWith("/")).min(1).default(["/tmp/"]),
    executionTimeoutSeconds: z.number().int().positive().default(30),
    storePath: z.string().min(1).optional(),
    auditLogPath: z.string().min(1).optional(),
    policyPath: z.string().min(1).optional(),
    logging: z
      .object({
        level: LogLevelSchema.default("info"),
        format: z.enum(["json", "pretty"]).default("pretty"),
        filePath: z.string().min(1).optional(),
      })
      .default({}),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseEngineConfig(input);
}

function parseEngineConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), { issues: parsed.error.issues });
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  cwd?: string;
  configPath?: string;
}

/**
 * Build the engine config from an optional JSON file and the environment
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): EngineConfig {
  const fromFile = readConfigFile(options);
  const fromEnv = configFromEnv(env);
  const fileLogging = isRecord(fromFile.logging) ? fromFile.logging : {};

  return parseEngineConfig({
    ...fromFile,
    ...fromEnv.values,
    logging: { ...fileLogging, ...fromEnv.logging },
  });
}

function readConfigFile(options: LoadConfigOptions): Record<string, unknown> {
  const explicit = options.configPath !== undefined;
  const filePath = options.configPath
    ? path.resolve(options.cwd ?? process.cwd(), options.configPath)
    : path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  if (!fs.existsSync(filePath)) {
    if (explicit) throw new ConfigError(`config file not found: ${filePath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }
  return raw;
}

function configFromEnv(env: NodeJS.ProcessEnv): { values: Record<string, unknown>; logging: Record<string, unknown> } {
  const values: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  setIfDefined(values, "budgetMs", numberFromEnv(env.CODEGATE_BUDGET_MS));
  setIfDefined(values, "analysisSliceMs", numberFromEnv(env.CODEGATE_ANALYSIS_SLICE_MS));
  setIfDefined(values, "maxSourceBytes", numberFromEnv(env.CODEGATE_MAX_SOURCE_BYTES));
  setIfDefined(values, "executionTimeoutSeconds", numberFromEnv(env.CODEGATE_EXEC_TIMEOUT_SECONDS));
  setIfDefined(values, "storePath", env.CODEGATE_STORE_PATH || undefined);
  setIfDefined(values, "auditLogPath", env.CODEGATE_AUDIT_LOG || undefined);
  setIfDefined(values, "policyPath", env.CODEGATE_POLICY_PATH || undefined);
  if (env.CODEGATE_TEMP_PREFIXES) {
    values.tempPathPrefixes = env.CODEGATE_TEMP_PREFIXES.split(",")
      .map((prefix) => prefix.trim())
      .filter(Boolean);
  }

  setIfDefined(logging, "level", env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : undefined);
  setIfDefined(logging, "format", env.LOG_FORMAT || undefined);
  setIfDefined(logging, "filePath", env.LOG_FILE_PATH || undefined);

  return { values, logging };
}

// NaN is left for the schema to reject with a readable message
function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function setIfDefined(target: Record<string, unknown>, key: string, value: unknown): void {
  if (value !== undefined) target[key] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
