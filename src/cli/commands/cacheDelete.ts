/**
 * codegate cache:delete <hash>
 */

import { Command } from "commander";
import { CliContext, openEngine, runCommand } from "../utils/context";

export function cacheDeleteCommand(ctx: CliContext): Command {
  const cmd = new Command("cache:delete");
  cmd
    .description("Release a reference and delete the artifact once nothing else references it")
    .argument("<hash>", "submission hash")
    .option("-r, --ref <id>", "reference held by the caller")
    .option("-c, --config <path>", "path to codegate.config.json")
    .action(async (hash: string, opts: { ref?: string; config?: string }) => {
      await runCommand(ctx, async () => {
        const engine = openEngine(ctx, opts);
        try {
          const existing = await engine.getArtifact(hash);
          if (!existing) {
            ctx.err(`No artifact ${hash}`);
            ctx.setExitCode(1);
            return;
          }

          const outcome = await engine.deleteArtifact(hash, opts.ref);
          if (outcome.deleted) {
            ctx.out(`Deleted ${hash}`);
          } else {
            ctx.out(`Kept ${hash}: still referenced by ${outcome.remainingReferences.join(", ")}`);
          }
        } finally {
          await engine.close();
        }
      });
    });
  return cmd;
}
