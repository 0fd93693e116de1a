/**
 * Logger Transports
 * Pino transport targets for the configured outputs
 */

import pino from "pino";
import { FileTransportConfig, LoggerConfig } from "./config";

/**
 * Console target: pino-pretty for humans, raw JSON on stdout otherwise
 */
export function createConsoleTransport(config: LoggerConfig): pino.TransportTargetOptions {
  if (config.format === "pretty") {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
      level: config.level,
    };
  }
  return {
    target: "pino/file",
    options: { destination: 1 },
    level: config.level,
  };
}

/**
 * Create file transport configuration
 */
export function createFileTransport(config: FileTransportConfig): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: config.path,
      mkdir: true,
      sync: false,
    },
    level: config.level ?? "info",
  };
}

/**
 * All targets for a config. Empty when logging is silenced.
 */
export function createTransportTargets(config: LoggerConfig): pino.TransportTargetOptions[] {
  if (config.level === "silent") return [];
  const targets = [createConsoleTransport(config)];
  if (config.file?.enabled) {
    targets.push(createFileTransport(config.file));
  }
  return targets;
}
