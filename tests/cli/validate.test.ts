/**
 * CLI commands, run in-process against a temporary workspace
 */

import fs from "fs";
import os from "os";
import path from "path";
import { createCli } from "../../src/cli";
import { CliContext } from "../../src/cli/utils/context";
import { computeSubmissionHash } from "../../src/core/cache/hashing";

interface CliRun {
  out: string[];
  err: string[];
  exitCode: number;
}

const ADD_CODE = "def add(a, b):\n    return a + b\n";
const SHELL_CODE = "import os\nos.system('rm -rf /')\n";

describe("codegate CLI", () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "codegate-cli-"));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  const writeFile = (name: string, content: string) => fs.writeFileSync(path.join(workspace, name), content);

  async function run(...args: string[]): Promise<CliRun> {
    const result: CliRun = { out: [], err: [], exitCode: 0 };
    const ctx: CliContext = {
      out: (line) => result.out.push(line),
      err: (line) => result.err.push(line),
      env: {
        CODEGATE_STORE_PATH: path.join(workspace, "store"),
        CODEGATE_BUDGET_MS: "60000",
        CODEGATE_ANALYSIS_SLICE_MS: "60000",
        LOG_LEVEL: "silent",
      },
      cwd: workspace,
      setExitCode: (code) => {
        result.exitCode = code;
      },
    };
    await createCli(ctx).exitOverride().parseAsync(args, { from: "user" });
    return result;
  }

  describe("validate", () => {
    test("should accept a clean file", async () => {
      writeFile("add.py", ADD_CODE);

      const { out, err, exitCode } = await run("validate", "add.py");

      expect(exitCode).toBe(0);
      expect(err).toEqual([]);
      expect(out).toEqual([
        "add.py: ACCEPTED (accepted)",
        `hash:   ${computeSubmissionHash(ADD_CODE, "python")}`,
        "policy: default@1",
        "cache:  miss",
        "cost:   68.00MB memory, 200ms CPU, complexity 2",
      ]);
    });

    test("should report cache hits across runs that share a store", async () => {
      writeFile("add.py", ADD_CODE);
      await run("validate", "add.py");

      const { out } = await run("validate", "add.py");
      expect(out[3]).toBe("cache:  hit, used 1 times");
    });

    test("should list violations and exit with the rejection code", async () => {
      writeFile("shell.py", SHELL_CODE);

      const { out, exitCode } = await run("validate", "shell.py");

      expect(exitCode).toBe(2);
      expect(out[0]).toBe("shell.py: REJECTED (rejected)");
      expect(out).toContain("RULE   │ SEVERITY │ LINE │ MESSAGE");
      expect(out).toContain("IMP001 │ critical │ 1    │ Import of denied module 'os'");
      expect(out).toContain("SYS001 │ critical │ 2    │ Shell command execution via os.system()");
      expect(out.some((line) => line.startsWith("error:"))).toBe(false);
    });

    test("should print syntax errors", async () => {
      writeFile("broken.py", "def f(:\n");

      const { out, exitCode } = await run("validate", "broken.py");

      expect(exitCode).toBe(2);
      expect(out[0]).toBe("broken.py: REJECTED (syntax_error)");
      expect(out[out.length - 1]).toBe("error: Syntax error at line 1: '(' was never closed");
      expect(out.some((line) => line.startsWith("cost:"))).toBe(false);
    });

    test("should print JSON on request", async () => {
      writeFile("tool.js", 'fetch("https://example.com");\n');

      const { out, exitCode } = await run("validate", "tool.js", "--json");
      const printed = JSON.parse(out.join("\n"));

      expect(exitCode).toBe(2);
      expect(printed.language).toBe("javascript");
      expect(printed.isValid).toBe(false);
      expect(printed.cacheHit).toBe(false);
      expect(printed.usageCount).toBe(0);
      expect(printed.violations[0].ruleId).toBe("NET001");
    });

    test("should need a language for unknown extensions", async () => {
      writeFile("tool.txt", ADD_CODE);

      const guessed = await run("validate", "tool.txt");
      expect(guessed.exitCode).toBe(1);
      expect(guessed.err).toEqual(["Error: cannot infer the language of tool.txt; pass --language"]);

      const explicit = await run("validate", "tool.txt", "--language", "python");
      expect(explicit.exitCode).toBe(0);
    });

    test("should report unreadable files", async () => {
      const { err, exitCode } = await run("validate", "missing.py");
      expect(exitCode).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Error: cannot read missing\.py: ENOENT/);
    });

    test("should report unsupported language tags", async () => {
      writeFile("add.py", ADD_CODE);
      const { err, exitCode } = await run("validate", "add.py", "-l", "cobol");
      expect(exitCode).toBe(1);
      expect(err).toEqual(["Error: Unsupported language: cobol"]);
    });

    test("should validate under a policy file", async () => {
      writeFile("recursive.py", "def f():\n    return f()\n");
      writeFile("policy.json", JSON.stringify({ policyId: "team", version: "3", allowRecursion: true }));

      const rejected = await run("validate", "recursive.py");
      expect(rejected.exitCode).toBe(2);

      const accepted = await run("validate", "recursive.py", "--policy", "policy.json");
      expect(accepted.exitCode).toBe(0);
      expect(accepted.out[2]).toBe("policy: team@3");
    });

    test("should report an invalid policy file", async () => {
      writeFile("add.py", ADD_CODE);
      writeFile("policy.json", JSON.stringify({ policyId: "team" }));

      const { err, exitCode } = await run("validate", "add.py", "--policy", "policy.json");
      expect(exitCode).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Error: Invalid policy: version: /);
    });
  });

  describe("policy:show", () => {
    test("should print the default policy", async () => {
      const { out } = await run("policy:show");
      const policy = JSON.parse(out.join("\n"));

      expect(policy.policyId).toBe("default");
      expect(policy.rejectionThreshold).toBe("high");
    });
  });

  describe("cache commands", () => {
    test("should summarize the store", async () => {
      writeFile("add.py", ADD_CODE);
      writeFile("shell.py", SHELL_CODE);
      await run("validate", "add.py");
      await run("validate", "shell.py");
      await run("validate", "add.py");

      const { out } = await run("cache:stats");

      expect(out[0]).toBe("ARTIFACTS │ VALIDATED │ REJECTED │ REFERENCED │ TOTAL USAGE");
      expect(out[2].split("│").map((cell) => cell.trim())).toEqual(["2", "1", "1", "0", "1"]);
    });

    test("should delete an artifact", async () => {
      writeFile("add.py", ADD_CODE);
      await run("validate", "add.py");
      const hash = computeSubmissionHash(ADD_CODE, "python");

      expect((await run("cache:delete", hash)).out).toEqual([`Deleted ${hash}`]);

      const again = await run("cache:delete", hash);
      expect(again.exitCode).toBe(1);
      expect(again.err).toEqual([`No artifact ${hash}`]);
    });
  });
});
