/**
 * Logger Configuration
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface FileTransportConfig {
  enabled: boolean;
  path: string;
  level?: LogLevel;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  file?: FileTransportConfig;
  source?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
  file: {
    enabled: false,
    path: "./logs/codegate.log",
    level: "info",
  },
  source: "codegate",
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    file: config.file ? { ...DEFAULT_CONFIG.file, ...config.file } : DEFAULT_CONFIG.file,
  };
}

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((candidate) => candidate === level);
}
