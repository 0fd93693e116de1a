/**
 * Logger Formatters
 * Custom Pino formatters and display helpers
 */

import pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration.
 * Only `log` is set: pino rejects custom level formatters on multi-target transports.
 */
export function createFormatter(config: LoggerConfig): NonNullable<pino.LoggerOptions["formatters"]> {
  return {
    log: (obj: Record<string, unknown>) => {
      const out: Record<string, unknown> = { ...obj };
      if (config.source && out.source === undefined) {
        out.source = config.source;
      }
      if (out.correlationId === undefined && typeof out.submissionHash === "string") {
        out.correlationId = out.submissionHash.slice(0, 12);
      }
      return out;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Format bytes for display
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)}${units[unitIndex]}`;
}

const SENSITIVE_KEYS = ["password", "token", "secret", "auth", "apikey"];
const MAX_STRING_LENGTH = 200;

/**
 * Prepare a value for logging: bounded depth, bounded strings, redacted secrets.
 * Submitted code never goes to the log in full.
 */
export function sanitizeForLogging(value: unknown, maxDepth = 5, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[Max Depth Reached]";
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...[${value.length} chars]` : value;
  }

  if (typeof value === "function") {
    return "[Function]";
  }

  if (typeof value === "symbol" || typeof value === "bigint") {
    return value.toString();
  }

  if (typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    if (value.length > 100) {
      return `[Array(${value.length})]`;
    }
    return value.map((item) => sanitizeForLogging(item, maxDepth, currentDepth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  const entries = Object.entries(value);
  const maxKeys = 50;

  for (const [key, entry] of entries.slice(0, maxKeys)) {
    if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = sanitizeForLogging(entry, maxDepth, currentDepth + 1);
    }
  }

  if (entries.length > maxKeys) {
    sanitized["..."] = `${entries.length - maxKeys} more keys`;
  }

  return sanitized;
}
