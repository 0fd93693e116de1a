#!/usr/bin/env node
/**
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { cacheDeleteCommand } from "./commands/cacheDelete";
import { cacheStatsCommand } from "./commands/cacheStats";
import { policyShowCommand } from "./commands/policyShow";
import { validateCommand } from "./commands/validate";
import { CliContext, processContext } from "./utils/context";

export function createCli(ctx: CliContext = processContext()): Command {
  const program = new Command();

  program
    .name("codegate")
    .description("codegate: validate and cache agent-submitted tool code")
    .version("0.1.0");

  program.addCommand(validateCommand(ctx));
  program.addCommand(policyShowCommand(ctx));
  program.addCommand(cacheStatsCommand(ctx));
  program.addCommand(cacheDeleteCommand(ctx));

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error("codegate failed:", error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
