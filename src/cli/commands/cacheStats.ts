/**
 * codegate cache:stats
 */

import { Command } from "commander";
import { CliContext, openEngine, runCommand } from "../utils/context";
import { printTable } from "../utils/printTable";

export function cacheStatsCommand(ctx: CliContext): Command {
  const cmd = new Command("cache:stats");
  cmd
    .description("Show artifact counts for the configured store")
    .option("-c, --config <path>", "path to codegate.config.json")
    .action(async (opts: { config?: string }) => {
      await runCommand(ctx, async () => {
        const engine = openEngine(ctx, opts);
        try {
          const stats = await engine.stats();
          printTable(
            ["ARTIFACTS", "VALIDATED", "REJECTED", "REFERENCED", "TOTAL USAGE"],
            [
              [
                String(stats.artifacts),
                String(stats.validated),
                String(stats.rejected),
                String(stats.referenced),
                String(stats.totalUsage),
              ],
            ],
            ctx.out
          );
        } finally {
          await engine.close();
        }
      });
    });
  return cmd;
}
