/**
 * JavaScript / TypeScript analyzer tests
 */

import { Deadline } from "../src/core/analysis/deadline";
import { JavaScriptAnalyzer } from "../src/core/analysis/javascript/analyzer";
import { AnalysisTimeoutError } from "../src/core/errors";
import { Language } from "../src/core/types";

describe("JavaScriptAnalyzer", () => {
  const analyzer = new JavaScriptAnalyzer();
  const analyze = (code: string, language: Language = "javascript", tempPathPrefixes?: string[]) =>
    analyzer.analyze(code, language, tempPathPrefixes ? { tempPathPrefixes } : {});
  const descriptions = (code: string, language: Language = "javascript") =>
    analyze(code, language).securityIssues.map((issue) => issue.description);

  describe("Modules", () => {
    test("should resolve destructured require bindings", () => {
      const outcome = analyze('const { exec } = require("child_process");\nexec("ls");');

      expect(outcome.confidence).toBe("full");
      expect(outcome.warnings).toEqual([]);
      expect(outcome.securityIssues).toEqual([
        {
          severity: "high",
          category: "denied_module",
          lineNumber: 1,
          snippet: 'const { exec } = require("child_process");',
          description: "Import of restricted module 'child_process'",
        },
        {
          severity: "critical",
          category: "process_spawn",
          lineNumber: 2,
          snippet: 'exec("ls");',
          description: "Process spawning via child_process.exec()",
        },
      ]);
      expect(outcome.facts.imports).toEqual([{ module: "child_process", line: 1, dynamic: false, relative: false }]);
      expect(outcome.facts.calls).toEqual([{ callee: "child_process.exec", line: 2 }]);
    });

    test("should strip the node: prefix and resolve namespace imports", () => {
      const outcome = analyze('import * as fs from "node:fs";\nfs.writeFileSync("/tmp/out.txt", "x");');

      expect(outcome.facts.imports).toEqual([{ module: "fs", line: 1, dynamic: false, relative: false }]);
      expect(outcome.facts.usesFilesystem).toBe(true);
      expect(outcome.securityIssues.map((issue) => issue.description)).toEqual(["Import of restricted module 'fs'"]);
    });

    test("should treat submodules of a denied module as denied", () => {
      expect(descriptions('import { readFile } from "fs/promises";\nreadFile("/etc/hosts");')).toEqual([
        "Import of restricted module 'fs/promises'",
        "File system access via fs.promises.readFile() outside allowed temp paths: '/etc/hosts'",
      ]);
    });

    test("should report a require with a computed specifier", () => {
      const outcome = analyze('const name = "fs";\nrequire(name);');
      expect(outcome.securityIssues).toHaveLength(1);
      expect(outcome.securityIssues[0]).toMatchObject({
        severity: "critical",
        category: "dynamic_code",
        lineNumber: 2,
        description: "require() with a non-literal specifier",
      });
      expect(outcome.facts.imports).toEqual([]);
    });

    test("should treat require reached through another object as an import", () => {
      const outcome = analyze('module.require("child_process").exec("id");');

      expect(outcome.facts.imports).toEqual([{ module: "child_process", line: 1, dynamic: false, relative: false }]);
      expect(outcome.securityIssues.map((issue) => [issue.category, issue.description])).toEqual([
        ["denied_module", "Import of restricted module 'child_process'"],
        ["process_spawn", "Process spawning via child_process.exec()"],
      ]);
      expect(descriptions('process.mainModule.require("child_process").execSync("rm -rf /");')).toEqual([
        "Import of restricted module 'child_process'",
        "Process spawning via child_process.execSync()",
      ]);
      expect(descriptions("module.require(name);")).toEqual(["module.require() with a non-literal specifier"]);
    });

    test("should follow aliases of require", () => {
      const outcome = analyze('const r = require;\nr("child_process").execSync("id");');

      expect(outcome.securityIssues.map((issue) => [issue.lineNumber, issue.description])).toEqual([
        [1, "Indirect reference to require"],
        [2, "Import of restricted module 'child_process'"],
        [2, "Process spawning via child_process.execSync()"],
      ]);
      expect(outcome.facts.imports).toEqual([{ module: "child_process", line: 2, dynamic: false, relative: false }]);
    });

    test("should report dynamic imports", () => {
      const outcome = analyze('const mod = import("fs");');

      expect(outcome.securityIssues.map((issue) => [issue.category, issue.description])).toEqual([
        ["denied_module", "Import of restricted module 'fs'"],
        ["dynamic_code", "Dynamic import of 'fs'"],
      ]);
      expect(outcome.facts.imports).toEqual([{ module: "fs", line: 1, dynamic: true, relative: false }]);
      expect(descriptions("const mod = import(target);")).toEqual(["Dynamic import with a non-literal specifier"]);
    });

    test("should ignore type-only imports", () => {
      const outcome = analyze('import type { Stats } from "fs";\nconst size: number = 1;', "typescript");
      expect(outcome.language).toBe("typescript");
      expect(outcome.securityIssues).toEqual([]);
      expect(outcome.facts.imports).toEqual([]);
    });

    test("should record relative imports without findings", () => {
      const outcome = analyze('import { helper } from "./helper";');
      expect(outcome.facts.imports).toEqual([{ module: "./helper", line: 1, dynamic: false, relative: true }]);
      expect(outcome.securityIssues).toEqual([]);
    });
  });

  describe("Dangerous calls", () => {
    test("should report eval and Function construction", () => {
      expect(descriptions('eval("1 + 1");\nconst f = new Function("return 1");')).toEqual([
        "Dynamic code evaluation via eval()",
        "Dynamic function construction via Function()",
      ]);
    });

    test("should resolve members of global objects", () => {
      expect(descriptions('globalThis.eval("x");')).toEqual(["Dynamic code evaluation via eval()"]);
    });

    test("should report eval and Function used other than by a direct call", () => {
      const outcome = analyze('(0, eval)("globalThis.x = 1");');
      expect(outcome.securityIssues).toEqual([
        {
          severity: "critical",
          category: "dynamic_code",
          lineNumber: 1,
          snippet: '(0, eval)("globalThis.x = 1");',
          description: "Indirect reference to eval",
        },
      ]);
      expect(descriptions('window.eval.call(null, "1");')).toEqual(["Indirect reference to eval"]);
      expect(descriptions("const make = [Function][0];")).toEqual(["Indirect reference to Function"]);
    });

    test("should ignore property names, declared names and types that match a loader", () => {
      const code = "const api = { eval: 1 };\napi.eval;\nlet f: Function | undefined;\nclass Runner { require() { return 1; } }";
      expect(descriptions(code, "typescript")).toEqual([]);
    });

    test("should report network calls and flag network use", () => {
      const outcome = analyze('fetch("https://example.com/data");');
      expect(outcome.securityIssues.map((issue) => issue.description)).toEqual(["Network request via fetch()"]);
      expect(outcome.securityIssues[0].category).toBe("network_access");
      expect(outcome.facts.usesNetwork).toBe(true);
    });

    test("should report string timers only for string arguments", () => {
      expect(descriptions('setTimeout("tick()", 10);')).toEqual(["String evaluation via setTimeout()"]);
      expect(descriptions("setTimeout(() => tick(), 10);")).toEqual([]);
    });

    test("should report prototype access", () => {
      const outcome = analyze("obj.__proto__.polluted = 1;");
      expect(outcome.securityIssues).toHaveLength(1);
      expect(outcome.securityIssues[0]).toMatchObject({
        severity: "high",
        category: "sandbox_escape",
        description: "Prototype access via '__proto__'",
      });
    });

    test("should report the constructor chain", () => {
      expect(descriptions('({}).constructor.constructor("return this")();')).toEqual([
        "Function constructor reached through 'constructor.constructor'",
      ]);
    });
  });

  describe("File system paths", () => {
    test("should allow literal paths under the temp prefix", () => {
      const outcome = analyze('import { readFileSync } from "fs";\nreadFileSync("/tmp/input.txt");');
      expect(outcome.securityIssues.map((issue) => issue.description)).toEqual(["Import of restricted module 'fs'"]);
      expect(outcome.facts.usesFilesystem).toBe(true);
    });

    test("should report paths outside the temp prefix", () => {
      const outcome = analyze('import { readFileSync } from "fs";\nreadFileSync("/etc/passwd");');
      expect(outcome.securityIssues[1]).toMatchObject({
        severity: "high",
        category: "filesystem_access",
        lineNumber: 2,
        description: "File system access via fs.readFileSync() outside allowed temp paths: '/etc/passwd'",
      });
    });

    test("should report computed paths", () => {
      expect(descriptions('import { readFileSync } from "fs";\nreadFileSync(target);')).toEqual([
        "Import of restricted module 'fs'",
        "File system access via fs.readFileSync() with a non-literal path",
      ]);
    });

    test("should honor custom temp prefixes", () => {
      const code = 'import { readFileSync } from "fs";\nreadFileSync("/tmp/input.txt");';
      expect(analyze(code, "javascript", ["/data/"]).securityIssues).toHaveLength(2);
    });
  });

  describe("Structure", () => {
    test("should measure nesting, branches and loops", () => {
      const code = ["function f(xs) {", "  for (const x of xs) {", "    if (x) {", "      g(x);", "    }", "  }", "}"].join(
        "\n"
      );
      const { facts } = analyze(code);

      expect(facts.functions).toEqual([{ name: "f", line: 1 }]);
      expect(facts.maxNestingDepth).toBe(3);
      expect(facts.branchCount).toBe(1);
      expect(facts.loopCount).toBe(1);
      expect(facts.lineCount).toBe(7);
      expect(facts.recursiveFunctions).toEqual([]);
    });

    test("should count logical operators and conditionals as branches", () => {
      expect(analyze("const v = a && b ? c : d ?? e;").facts.branchCount).toBe(3);
    });

    test("should detect direct recursion", () => {
      const { facts } = analyze("function fact(n) {\n  return n <= 1 ? 1 : n * fact(n - 1);\n}");
      expect(facts.recursiveFunctions).toEqual(["fact"]);
    });

    test("should detect recursion through this", () => {
      const { facts } = analyze("class Walker {\n  walk() {\n    return this.walk();\n  }\n}");
      expect(facts.functions).toEqual([{ name: "Walker.walk", line: 2 }]);
      expect(facts.recursiveFunctions).toEqual(["Walker.walk"]);
    });

    test("should name arrow functions after their variable", () => {
      expect(analyze("const loop = () => loop();").facts.recursiveFunctions).toEqual(["loop"]);
    });

    test("should detect mutual recursion", () => {
      const code = "function ping() { return pong(); }\nfunction pong() { return ping(); }";
      expect(analyze(code).facts.recursiveFunctions).toEqual(["ping", "pong"]);
    });

    test("should flag loops without an exit", () => {
      expect(analyze("for (;;) {\n  tick();\n}").facts.unboundedLoopLines).toEqual([1]);
      expect(analyze("while (true) {\n  if (done()) break;\n}").facts.unboundedLoopLines).toEqual([]);
      expect(analyze("x = 1;\nwhile (true) {\n  for (const y of ys) { break; }\n}").facts.unboundedLoopLines).toEqual([2]);
    });
  });

  describe("Failures", () => {
    test("should report syntax errors and skip security analysis", () => {
      const outcome = analyze('require("child_process").exec(\n');

      expect(outcome.syntaxErrors.length).toBeGreaterThan(0);
      expect(outcome.syntaxErrors[0]).toMatch(/^Syntax error at line \d+: /);
      expect(outcome.securityIssues).toEqual([]);
      expect(outcome.facts.imports).toEqual([]);
      expect(outcome.facts.lineCount).toBe(2);
    });

    test("should parse the same file name again after a failure", () => {
      analyze("function (");
      expect(analyze("const ok = 1;").syntaxErrors).toEqual([]);
    });

    test("should raise a timeout when the deadline is spent", () => {
      expect(() => analyzer.analyze("const x = 1;", "javascript", { deadline: new Deadline(0) })).toThrow(
        AnalysisTimeoutError
      );
    });
  });
});
