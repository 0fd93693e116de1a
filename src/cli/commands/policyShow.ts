/**
 * codegate policy:show
 */

import { Command } from "commander";
import { CliContext, openEngine, runCommand } from "../utils/context";

export function policyShowCommand(ctx: CliContext): Command {
  const cmd = new Command("policy:show");
  cmd
    .description("Print the active policy with defaults filled in")
    .option("-p, --policy <path>", "JSON policy document")
    .option("-c, --config <path>", "path to codegate.config.json")
    .action(async (opts: { policy?: string; config?: string }) => {
      await runCommand(ctx, async () => {
        const engine = openEngine(ctx, opts);
        try {
          ctx.out(JSON.stringify(await engine.policySource.getPolicy(), null, 2));
        } finally {
          await engine.close();
        }
      });
    });
  return cmd;
}
