/**
 * What a command needs from its surroundings, so commands can run in-process
 */

import path from "path";
import { loadEngineConfig, EngineConfig } from "../../core/config";
import { createValidationEngine, ValidationEngine } from "../../core/engine";
import { EngineError } from "../../core/errors";
import { FilePolicySource } from "../../core/policy/policySource";
import { LineWriter } from "./printTable";

export interface CliContext {
  out: LineWriter;
  err: LineWriter;
  env: NodeJS.ProcessEnv;
  cwd: string;
  setExitCode(code: number): void;
}

export function processContext(): CliContext {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    env: process.env,
    cwd: process.cwd(),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

export interface EngineFlags {
  config?: string;
  policy?: string;
}

/** Log output would interleave with command output, so the CLI defaults to warnings only */
export function loadCliConfig(ctx: CliContext, flags: EngineFlags): EngineConfig {
  return loadEngineConfig({ LOG_LEVEL: "warn", ...ctx.env }, { cwd: ctx.cwd, configPath: flags.config });
}

export function openEngine(ctx: CliContext, flags: EngineFlags): ValidationEngine {
  const config = loadCliConfig(ctx, flags);
  const policyPath = flags.policy ?? config.policyPath;
  return createValidationEngine({
    config,
    ...(policyPath ? { policySource: new FilePolicySource(path.resolve(ctx.cwd, policyPath)) } : {}),
  });
}

/**
 * Runs a command body; engine errors become a message and exit code 1
 */
export async function runCommand(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (!(error instanceof EngineError)) throw error;
    ctx.err(`Error: ${error.message}`);
    ctx.setExitCode(1);
  }
}
