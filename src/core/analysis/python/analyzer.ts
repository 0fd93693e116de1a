/**
 * Python analyzer. Parses with the in-house parser, then walks the tree once to collect
 * structural facts and security findings.
 */

import { AnalysisOutcome, Language, SecurityIssue, StructuralFacts } from "../../types";
import { isWithinAllowedPrefix } from "../../utils/pathSecurity";
import { AnalyzeOptions, DEFAULT_TEMP_PREFIXES, LanguageAnalyzer, syntaxFailure } from "../analyzer";
import { CallGraphBuilder } from "../callGraph";
import { FilesystemRule, PYTHON_CATALOG, describeCall, findCallRule, findFilesystemRule } from "../catalog";
import { Deadline } from "../deadline";
import { FindingCollector, emptyFacts } from "../findings";
import { findModuleEntry } from "../patterns";
import { CallExpr, Comprehension, Expr, IfStmt, Module, Parameter, Stmt } from "./ast";
import { parsePython } from "./parser";
import { PythonSyntaxError } from "./tokenizer";

export const BEST_EFFORT_WARNING =
  "Python analysis is best-effort: constructs outside the supported grammar are reported as syntax errors";

const DYNAMIC_IMPORTERS = new Set(["__import__", "importlib.import_module"]);

export class PythonAnalyzer implements LanguageAnalyzer {
  readonly languages: readonly Language[] = ["python"];

  analyze(code: string, language: Language = "python", options: AnalyzeOptions = {}): AnalysisOutcome {
    const deadline = options.deadline ?? Deadline.unlimited();

    let module: Module;
    try {
      module = parsePython(code, deadline);
    } catch (error) {
      if (error instanceof PythonSyntaxError) {
        return syntaxFailure(language, "best-effort", code, [`Syntax error at line ${error.line}: ${error.message}`], [
          BEST_EFFORT_WARNING,
        ]);
      }
      throw error;
    }

    const walker = new PythonWalker(code, deadline, options.tempPathPrefixes ?? DEFAULT_TEMP_PREFIXES);
    const { securityIssues, facts } = walker.run(module);
    return {
      language,
      confidence: "best-effort",
      syntaxErrors: [],
      warnings: [BEST_EFFORT_WARNING],
      securityIssues,
      facts,
    };
  }
}

interface Scope {
  name: string;
  kind: "function" | "class";
}

class PythonWalker {
  private readonly collector: FindingCollector;
  private readonly facts: StructuralFacts;
  private readonly graph = new CallGraphBuilder();
  /** Local name -> dotted module path, from imports and simple aliasing */
  private readonly bindings = new Map<string, string>();
  private readonly scopes: Scope[] = [];
  private readonly sandboxAttributes = new Set(PYTHON_CATALOG.sandboxEscapeAttributes);

  constructor(
    source: string,
    private readonly deadline: Deadline,
    private readonly tempPathPrefixes: readonly string[]
  ) {
    this.collector = new FindingCollector(source);
    this.facts = emptyFacts(this.collector.lineCount);
  }

  run(module: Module): { securityIssues: SecurityIssue[]; facts: StructuralFacts } {
    this.visitBlock(module.body, 0);
    this.facts.recursiveFunctions = this.graph.recursiveFunctions();
    this.facts.unboundedLoopLines.sort((a, b) => a - b);
    return { securityIssues: this.collector.toArray(), facts: this.facts };
  }

  // ---- statements ----

  private visitBlock(body: Stmt[], depth: number): void {
    for (const stmt of body) this.visitStmt(stmt, depth);
  }

  private visitStmt(stmt: Stmt, depth: number): void {
    this.deadline.check();
    const level = depth + 1;

    switch (stmt.kind) {
      case "Import":
        for (const alias of stmt.names) {
          this.recordImport(alias.name, alias.line, false, false);
          if (alias.asname) {
            this.bindings.set(alias.asname, alias.name);
          } else {
            const root = alias.name.split(".")[0];
            this.bindings.set(root, root);
          }
        }
        return;

      case "ImportFrom": {
        const relative = stmt.level > 0;
        const module = `${".".repeat(stmt.level)}${stmt.module}`;
        this.recordImport(module, stmt.line, false, relative);
        if (relative) return;
        for (const alias of stmt.names) {
          if (alias.name === "*") continue;
          this.bindings.set(alias.asname ?? alias.name, `${stmt.module}.${alias.name}`);
        }
        return;
      }

      case "FunctionDef": {
        const qualified = this.qualify(stmt.name);
        this.facts.functions.push({ name: qualified, line: stmt.line });
        this.graph.addFunction(qualified);
        this.visitExprs(stmt.decorators);
        this.visitParameters(stmt.params);
        this.visitExpr(stmt.returns);
        this.noteDepth(level);
        this.scopes.push({ name: stmt.name, kind: "function" });
        this.visitBlock(stmt.body, level);
        this.scopes.pop();
        return;
      }

      case "ClassDef":
        this.visitExprs(stmt.decorators);
        this.visitExprs(stmt.bases);
        this.visitExprs(stmt.keywords.map((keyword) => keyword.value));
        this.noteDepth(level);
        this.scopes.push({ name: stmt.name, kind: "class" });
        this.visitBlock(stmt.body, level);
        this.scopes.pop();
        return;

      case "If":
        this.visitIf(stmt, depth);
        return;

      case "For":
        this.facts.loopCount++;
        this.visitExpr(stmt.target);
        this.visitExpr(stmt.iter);
        this.noteDepth(level);
        this.visitBlock(stmt.body, level);
        this.visitBlock(stmt.orelse, level);
        return;

      case "While":
        this.facts.loopCount++;
        if (isTruthyConstant(stmt.test) && !hasLoopExit(stmt.body)) {
          this.facts.unboundedLoopLines.push(stmt.line);
        }
        this.visitExpr(stmt.test);
        this.noteDepth(level);
        this.visitBlock(stmt.body, level);
        this.visitBlock(stmt.orelse, level);
        return;

      case "Try":
        this.noteDepth(level);
        this.visitBlock(stmt.body, level);
        for (const handler of stmt.handlers) {
          this.facts.branchCount++;
          this.visitExpr(handler.type);
          this.visitBlock(handler.body, level);
        }
        this.visitBlock(stmt.orelse, level);
        this.visitBlock(stmt.finalbody, level);
        return;

      case "With":
        for (const item of stmt.items) {
          this.visitExpr(item.context);
          this.visitExpr(item.vars);
        }
        this.noteDepth(level);
        this.visitBlock(stmt.body, level);
        return;

      case "Assign":
        this.visitExpr(stmt.value);
        this.visitExprs(stmt.targets);
        this.trackAlias(stmt.targets, stmt.value);
        return;

      case "AugAssign":
        this.visitExpr(stmt.target);
        this.visitExpr(stmt.value);
        return;

      case "AnnAssign":
        this.visitExpr(stmt.target);
        this.visitExpr(stmt.annotation);
        this.visitExpr(stmt.value);
        return;

      case "Expr":
      case "Return":
        this.visitExpr(stmt.value);
        return;

      case "Delete":
        this.visitExprs(stmt.targets);
        return;

      case "Raise":
        this.visitExpr(stmt.exc);
        this.visitExpr(stmt.cause);
        return;

      case "Assert":
        this.visitExpr(stmt.test);
        this.visitExpr(stmt.msg);
        return;

      case "Pass":
      case "Break":
      case "Continue":
      case "Global":
      case "Nonlocal":
        return;
    }
  }

  /**
   * `elif` chains stay at the nesting level of the leading `if`
   */
  private visitIf(stmt: IfStmt, depth: number): void {
    const level = depth + 1;
    this.facts.branchCount++;
    this.visitExpr(stmt.test);
    this.noteDepth(level);
    this.visitBlock(stmt.body, level);

    const [first] = stmt.orelse;
    if (stmt.orelse.length === 1 && first.kind === "If" && first.isElif) {
      this.deadline.check();
      this.visitIf(first, depth);
    } else {
      this.visitBlock(stmt.orelse, level);
    }
  }

  private visitParameters(params: Parameter[]): void {
    for (const param of params) {
      this.visitExpr(param.annotation);
      this.visitExpr(param.default);
    }
  }

  // ---- expressions ----

  private visitExprs(exprs: ReadonlyArray<Expr | null | undefined>): void {
    for (const expr of exprs) this.visitExpr(expr);
  }

  private visitExpr(expr: Expr | null | undefined): void {
    if (!expr) return;

    switch (expr.kind) {
      case "Name":
        if (this.sandboxAttributes.has(expr.id)) this.reportSandboxEscape(expr.id, expr.line);
        return;
      case "Constant":
        return;
      case "JoinedStr":
        this.visitExprs(expr.values);
        return;
      case "Attribute":
        if (this.sandboxAttributes.has(expr.attr)) this.reportSandboxEscape(expr.attr, expr.line);
        this.visitExpr(expr.value);
        return;
      case "Subscript": {
        const key = literalString(expr.slice);
        if (key !== undefined && this.sandboxAttributes.has(key)) this.reportSandboxEscape(key, expr.line);
        this.visitExpr(expr.value);
        this.visitExpr(expr.slice);
        return;
      }
      case "Slice":
        this.visitExprs([expr.lower, expr.upper, expr.step]);
        return;
      case "Call":
        this.visitCall(expr);
        return;
      case "BinOp":
        this.visitExprs([expr.left, expr.right]);
        return;
      case "UnaryOp":
        this.visitExpr(expr.operand);
        return;
      case "BoolOp":
        this.facts.branchCount += expr.values.length - 1;
        this.visitExprs(expr.values);
        return;
      case "Compare":
        this.visitExpr(expr.left);
        this.visitExprs(expr.comparators);
        return;
      case "IfExp":
        this.facts.branchCount++;
        this.visitExprs([expr.test, expr.body, expr.orelse]);
        return;
      case "Lambda":
        this.visitParameters(expr.params);
        this.visitExpr(expr.body);
        return;
      case "NamedExpr":
        this.visitExpr(expr.value);
        return;
      case "List":
      case "Tuple":
      case "Set":
        this.visitExprs(expr.elts);
        return;
      case "Dict":
        this.visitExprs(expr.keys);
        this.visitExprs(expr.values);
        return;
      case "ListComp":
      case "SetComp":
      case "GeneratorExp":
        this.visitComprehensions(expr.generators);
        this.visitExpr(expr.elt);
        return;
      case "DictComp":
        this.visitComprehensions(expr.generators);
        this.visitExprs([expr.key, expr.value]);
        return;
      case "Starred":
      case "Await":
        this.visitExpr(expr.value);
        return;
      case "Yield":
      case "YieldFrom":
        this.visitExpr(expr.value);
        return;
    }
  }

  private visitComprehensions(generators: Comprehension[]): void {
    for (const generator of generators) {
      this.facts.loopCount++;
      this.facts.branchCount += generator.ifs.length;
      this.visitExprs([generator.target, generator.iter, ...generator.ifs]);
    }
  }

  private visitCall(call: CallExpr): void {
    const callee = this.resolve(call.func);
    if (callee !== undefined) {
      this.facts.calls.push({ callee, line: call.line });
      this.inspectCall(callee, call);
    }
    this.recordCallEdge(call.func);

    this.visitExpr(call.func);
    this.visitExprs(call.args);
    this.visitExprs(call.keywords.map((keyword) => keyword.value));
  }

  private inspectCall(callee: string, call: CallExpr): void {
    const rule = findCallRule(PYTHON_CATALOG, callee);
    if (rule) {
      this.collector.add(rule.severity, rule.category, call.line, describeCall(rule, callee));
      if (rule.category === "network_access") this.facts.usesNetwork = true;
    }

    const fsRule = findFilesystemRule(PYTHON_CATALOG, callee);
    if (fsRule) {
      this.facts.usesFilesystem = true;
      const target = literalString(pathArgument(call, fsRule));
      if (target === undefined) {
        this.collector.add("high", "filesystem_access", call.line, `File system access via ${callee}() with a non-literal path`);
      } else if (!isWithinAllowedPrefix(target, this.tempPathPrefixes)) {
        this.collector.add("high", "filesystem_access", call.line, `File system access via ${callee}() outside allowed temp paths: '${target}'`);
      }
    }

    if (DYNAMIC_IMPORTERS.has(callee)) {
      const module = literalString(call.args[0]);
      if (module !== undefined) this.recordImport(module, call.line, true, false);
    }

    if (callee === "getattr") {
      const attribute = literalString(call.args[1]);
      if (attribute !== undefined && this.sandboxAttributes.has(attribute)) {
        this.reportSandboxEscape(attribute, call.line);
      }
    }
  }

  /**
   * Dotted name of an expression after alias resolution, or undefined when it has none
   */
  private resolve(expr: Expr): string | undefined {
    switch (expr.kind) {
      case "Name":
        return this.bindings.get(expr.id) ?? expr.id;
      case "Attribute": {
        const base = this.resolve(expr.value);
        return base === undefined ? undefined : `${base}.${expr.attr}`;
      }
      case "Call": {
        const callee = this.resolve(expr.func);
        if (callee === "getattr" && expr.args.length >= 2) {
          const base = this.resolve(expr.args[0]);
          const attribute = literalString(expr.args[1]);
          return base !== undefined && attribute !== undefined ? `${base}.${attribute}` : undefined;
        }
        if (callee !== undefined && DYNAMIC_IMPORTERS.has(callee)) {
          return literalString(expr.args[0]);
        }
        return undefined;
      }
      default:
        return undefined;
    }
  }

  private trackAlias(targets: Expr[], value: Expr): void {
    if (targets.length !== 1) return;
    const [target] = targets;
    if (target.kind !== "Name") return;
    const resolved = this.resolve(value);
    if (resolved !== undefined && resolved !== target.id) {
      this.bindings.set(target.id, resolved);
    } else {
      this.bindings.delete(target.id);
    }
  }

  // ---- facts ----

  private recordImport(module: string, line: number, dynamic: boolean, relative: boolean): void {
    this.facts.imports.push({ module, line, dynamic, relative });
    if (relative) return;
    if (findModuleEntry(module, PYTHON_CATALOG.deniedModules)) {
      this.collector.add("high", "denied_module", line, `Import of restricted module '${module}'`);
    }
  }

  private reportSandboxEscape(attribute: string, line: number): void {
    this.collector.add("high", "sandbox_escape", line, `Interpreter introspection via '${attribute}'`);
  }

  private noteDepth(level: number): void {
    if (level > this.facts.maxNestingDepth) this.facts.maxNestingDepth = level;
  }

  // ---- call graph ----

  private qualifiedPrefix(count: number): string {
    return this.scopes
      .slice(0, count)
      .map((scope) => scope.name)
      .join(".");
  }

  private qualify(name: string): string {
    return this.scopes.length === 0 ? name : `${this.qualifiedPrefix(this.scopes.length)}.${name}`;
  }

  private currentFunction(): string | undefined {
    const innermost = this.scopes[this.scopes.length - 1];
    return innermost?.kind === "function" ? this.qualifiedPrefix(this.scopes.length) : undefined;
  }

  private enclosingClass(): string | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i].kind === "class") return this.qualifiedPrefix(i + 1);
    }
    return undefined;
  }

  /**
   * Bare names resolve through enclosing function scopes, never through class bodies
   */
  private bareCandidates(name: string): string[] {
    const candidates: string[] = [];
    for (let count = this.scopes.length; count > 0; count--) {
      if (this.scopes[count - 1].kind === "class") continue;
      candidates.push(`${this.qualifiedPrefix(count)}.${name}`);
    }
    candidates.push(name);
    return candidates;
  }

  private recordCallEdge(func: Expr): void {
    const from = this.currentFunction();
    if (!from) return;
    if (func.kind === "Name") {
      this.graph.addReference(from, this.bareCandidates(func.id));
    } else if (func.kind === "Attribute" && func.value.kind === "Name" && (func.value.id === "self" || func.value.id === "cls")) {
      const owner = this.enclosingClass();
      if (owner) this.graph.addReference(from, [`${owner}.${func.attr}`]);
    }
  }
}

function literalString(expr: Expr | undefined): string | undefined {
  return expr?.kind === "Constant" && expr.type === "str" ? expr.value : undefined;
}

function pathArgument(call: CallExpr, rule: FilesystemRule): Expr | undefined {
  const positional = call.args[rule.pathArgument];
  if (positional && positional.kind !== "Starred") return positional;
  return call.keywords.find((keyword) => keyword.name !== undefined && rule.pathKeywords.includes(keyword.name))?.value;
}

function isTruthyConstant(expr: Expr): boolean {
  if (expr.kind !== "Constant") return false;
  switch (expr.type) {
    case "bool":
      return expr.value === "True";
    case "number":
      return Number(expr.value.replace(/_/g, "").replace(/[jJ]$/, "")) !== 0;
    case "str":
    case "bytes":
      return expr.value.length > 0;
    default:
      return false;
  }
}

/**
 * A `break`, `return` or `raise` that leaves the loop, ignoring nested loops and definitions
 */
function hasLoopExit(body: Stmt[]): boolean {
  return body.some((stmt) => {
    switch (stmt.kind) {
      case "Break":
      case "Return":
      case "Raise":
        return true;
      case "If":
        return hasLoopExit(stmt.body) || hasLoopExit(stmt.orelse);
      case "With":
        return hasLoopExit(stmt.body);
      case "Try":
        return (
          hasLoopExit(stmt.body) ||
          stmt.handlers.some((handler) => hasLoopExit(handler.body)) ||
          hasLoopExit(stmt.orelse) ||
          hasLoopExit(stmt.finalbody)
        );
      default:
        return false;
    }
  });
}
