/**
 * codegate validate <file>
 */

import { Command } from "commander";
import fs from "fs/promises";
import path from "path";
import { languageFromPath } from "../../core/analysis/languages";
import { describeCause } from "../../core/errors";
import { formatBytes, formatDuration } from "../../core/logger/formatters";
import { formatViolation } from "../../core/orchestrator/resultBuilder";
import { ValidationReport } from "../../core/orchestrator/validationOrchestrator";
import { CliContext, openEngine, runCommand } from "../utils/context";
import { printTable } from "../utils/printTable";

export const EXIT_REJECTED = 2;

interface ValidateOptions {
  language?: string;
  policy?: string;
  config?: string;
  json?: boolean;
}

export function validateCommand(ctx: CliContext): Command {
  const cmd = new Command("validate");
  cmd
    .description("Validate a source file against the active policy")
    .argument("<file>", "source file to validate")
    .option("-l, --language <tag>", "language tag (inferred from the file extension by default)")
    .option("-p, --policy <path>", "JSON policy document")
    .option("-c, --config <path>", "path to codegate.config.json")
    .option("--json", "print the full result as JSON")
    .action(async (file: string, opts: ValidateOptions) => {
      const filePath = path.resolve(ctx.cwd, file);
      const language = opts.language ?? languageFromPath(filePath);
      if (!language) {
        ctx.err(`Error: cannot infer the language of ${file}; pass --language`);
        ctx.setExitCode(1);
        return;
      }

      let code: string;
      try {
        code = await fs.readFile(filePath, "utf8");
      } catch (error) {
        ctx.err(`Error: cannot read ${file}: ${describeCause(error)}`);
        ctx.setExitCode(1);
        return;
      }

      await runCommand(ctx, async () => {
        const engine = openEngine(ctx, opts);
        try {
          const report = await engine.validateDetailed(code, language);
          if (opts.json) {
            ctx.out(
              JSON.stringify(
                { ...report.result, cacheHit: report.cacheHit, usageCount: report.usageCount },
                null,
                2
              )
            );
          } else {
            printReport(ctx, file, report);
          }
          ctx.setExitCode(report.result.isValid ? 0 : EXIT_REJECTED);
        } finally {
          await engine.close();
        }
      });
    });
  return cmd;
}

function printReport(ctx: CliContext, file: string, report: ValidationReport): void {
  const { result } = report;
  ctx.out(`${file}: ${result.isValid ? "ACCEPTED" : "REJECTED"} (${result.outcome})`);
  ctx.out(`hash:   ${result.submissionHash}`);
  ctx.out(`policy: ${result.policyVersionEvaluated}`);
  ctx.out(`cache:  ${report.cacheHit ? `hit, used ${report.usageCount} times` : "miss"}`);

  const estimate = result.resourceEstimate;
  if (estimate) {
    ctx.out(
      `cost:   ${formatBytes(estimate.estimatedMemoryBytes)} memory, ` +
        `${formatDuration(Math.round(estimate.estimatedCpuSeconds * 1000))} CPU, complexity ${estimate.complexityScore}`
    );
  }

  if (result.violations.length > 0) {
    ctx.out("");
    printTable(
      ["RULE", "SEVERITY", "LINE", "MESSAGE"],
      result.violations.map((violation) => [
        violation.ruleId,
        violation.severity,
        violation.lineNumber !== undefined ? String(violation.lineNumber) : "-",
        violation.message,
      ]),
      ctx.out
    );
  }

  const unlisted = result.errors.filter(
    (error) => !result.violations.some((violation) => formatViolation(violation) === error)
  );
  for (const error of unlisted) {
    ctx.out(`error: ${error}`);
  }
}
