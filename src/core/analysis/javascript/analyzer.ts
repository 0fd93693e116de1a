/**
 * JavaScript / TypeScript analyzer built on the TypeScript compiler via ts-morph.
 * One in-memory project is reused; each submission is added, walked and removed.
 */

import {
  CallExpression,
  Diagnostic,
  IfStatement,
  ImportDeclaration,
  NewExpression,
  Node,
  Project,
  SyntaxKind,
  VariableDeclaration,
  ts,
} from "ts-morph";
import { AnalysisOutcome, Language, SecurityIssue, StructuralFacts } from "../../types";
import { isWithinAllowedPrefix } from "../../utils/pathSecurity";
import { AnalyzeOptions, DEFAULT_TEMP_PREFIXES, LanguageAnalyzer, syntaxFailure } from "../analyzer";
import { CallGraphBuilder } from "../callGraph";
import { JAVASCRIPT_CATALOG, describeCall, findCallRule, findFilesystemRule } from "../catalog";
import { Deadline } from "../deadline";
import { FindingCollector, emptyFacts } from "../findings";
import { findModuleEntry } from "../patterns";

const GLOBAL_OBJECTS = new Set(["globalThis", "window", "global", "self"]);

/** Globals that may not be referenced at all outside a direct call */
const LOADER_GLOBALS = new Set(["eval", "Function", "require"]);

const LOGICAL_OPERATORS = new Set<SyntaxKind>([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
  SyntaxKind.AmpersandAmpersandEqualsToken,
  SyntaxKind.BarBarEqualsToken,
  SyntaxKind.QuestionQuestionEqualsToken,
]);

const FUNCTION_KINDS = new Set<SyntaxKind>([
  SyntaxKind.FunctionDeclaration,
  SyntaxKind.FunctionExpression,
  SyntaxKind.ArrowFunction,
  SyntaxKind.MethodDeclaration,
  SyntaxKind.Constructor,
  SyntaxKind.GetAccessor,
  SyntaxKind.SetAccessor,
]);

const LOOP_KINDS = new Set<SyntaxKind>([
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
]);

export class JavaScriptAnalyzer implements LanguageAnalyzer {
  readonly languages: readonly Language[] = ["javascript", "typescript"];
  private project?: Project;

  analyze(code: string, language: Language = "javascript", options: AnalyzeOptions = {}): AnalysisOutcome {
    const deadline = options.deadline ?? Deadline.unlimited();
    const project = this.getProject();
    const fileName = language === "typescript" ? "/submission.ts" : "/submission.js";
    const sourceFile = project.createSourceFile(fileName, code, { overwrite: true });

    try {
      deadline.check();
      const diagnostics = project.getProgram().getSyntacticDiagnostics(sourceFile);
      if (diagnostics.length > 0) {
        return syntaxFailure(language, "full", code, diagnostics.map(formatDiagnostic));
      }

      const walker = new JavaScriptWalker(code, deadline, options.tempPathPrefixes ?? DEFAULT_TEMP_PREFIXES);
      const { securityIssues, facts } = walker.run(sourceFile);
      return { language, confidence: "full", syntaxErrors: [], warnings: [], securityIssues, facts };
    } finally {
      project.removeSourceFile(sourceFile);
    }
  }

  private getProject(): Project {
    if (!this.project) {
      this.project = new Project({
        useInMemoryFileSystem: true,
        skipLoadingLibFiles: true,
        compilerOptions: {
          allowJs: true,
          noLib: true,
          noResolve: true,
          target: ts.ScriptTarget.ES2022,
        },
      });
    }
    return this.project;
  }
}

function formatDiagnostic(diagnostic: Diagnostic): string {
  const text = diagnostic.getMessageText();
  const message = typeof text === "string" ? text : text.getMessageText();
  return `Syntax error at line ${diagnostic.getLineNumber() ?? 1}: ${message}`;
}

interface Scope {
  name: string;
  kind: "function" | "class";
}

class JavaScriptWalker {
  private readonly collector: FindingCollector;
  private readonly facts: StructuralFacts;
  private readonly graph = new CallGraphBuilder();
  /** Local name -> dotted module path ("cp" -> "child_process") */
  private readonly bindings = new Map<string, string>();
  private readonly scopes: Scope[] = [];
  private readonly sandboxAttributes = new Set(JAVASCRIPT_CATALOG.sandboxEscapeAttributes);
  private readonly stringTimers = new Set(JAVASCRIPT_CATALOG.stringTimers);

  constructor(
    source: string,
    private readonly deadline: Deadline,
    private readonly tempPathPrefixes: readonly string[]
  ) {
    this.collector = new FindingCollector(source);
    this.facts = emptyFacts(this.collector.lineCount);
  }

  run(root: Node): { securityIssues: SecurityIssue[]; facts: StructuralFacts } {
    this.visitChildren(root, 0);
    this.facts.recursiveFunctions = this.graph.recursiveFunctions();
    this.facts.unboundedLoopLines.sort((a, b) => a - b);
    return { securityIssues: this.collector.toArray(), facts: this.facts };
  }

  private visitChildren(node: Node, depth: number): void {
    node.forEachChild((child) => {
      this.visit(child, depth);
    });
  }

  private visit(node: Node, depth: number): void {
    this.deadline.check();
    const level = depth + 1;

    if (Node.isImportDeclaration(node)) {
      if (!node.isTypeOnly()) this.visitImportDeclaration(node);
      return;
    }

    if (Node.isImportEqualsDeclaration(node)) {
      const reference = node.getModuleReference();
      if (Node.isExternalModuleReference(reference)) {
        const target = reference.getExpression();
        const specifier = target ? stringLiteralValue(target) : undefined;
        if (specifier !== undefined) {
          this.recordImport(specifier, node.getStartLineNumber(), false);
          this.bindings.set(node.getName(), normalizeModule(specifier));
        }
      }
      return;
    }

    if (Node.isExportDeclaration(node)) {
      const specifier = node.getModuleSpecifierValue();
      if (specifier !== undefined && !node.isTypeOnly()) {
        this.recordImport(specifier, node.getStartLineNumber(), false);
      }
      return;
    }

    if (Node.isIfStatement(node)) {
      this.visitIf(node, depth);
      return;
    }

    if (LOOP_KINDS.has(node.getKind())) {
      this.facts.loopCount++;
      if (isUnboundedLoop(node)) this.facts.unboundedLoopLines.push(node.getStartLineNumber());
      this.noteDepth(level);
      this.visitChildren(node, level);
      return;
    }

    if (Node.isTryStatement(node) || Node.isSwitchStatement(node)) {
      this.noteDepth(level);
      this.visitChildren(node, level);
      return;
    }

    if (FUNCTION_KINDS.has(node.getKind())) {
      this.visitFunction(node, level);
      return;
    }

    if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
      this.noteDepth(level);
      this.scopes.push({ name: node.getName() ?? "<anonymous>", kind: "class" });
      this.visitChildren(node, level);
      this.scopes.pop();
      return;
    }

    if (Node.isCallExpression(node)) {
      this.inspectCall(node);
    } else if (Node.isNewExpression(node)) {
      this.inspectConstruction(node);
    } else if (Node.isPropertyAccessExpression(node) || Node.isElementAccessExpression(node)) {
      this.inspectMemberAccess(node);
      this.inspectReference(node);
    } else if (Node.isIdentifier(node)) {
      this.inspectReference(node);
    } else if (Node.isVariableDeclaration(node)) {
      this.trackBinding(node);
    } else if (Node.isConditionalExpression(node) || Node.isCaseClause(node) || Node.isCatchClause(node)) {
      this.facts.branchCount++;
    } else if (Node.isBinaryExpression(node) && LOGICAL_OPERATORS.has(node.getOperatorToken().getKind())) {
      this.facts.branchCount++;
    }

    this.visitChildren(node, depth);
  }

  private visitImportDeclaration(node: ImportDeclaration): void {
    const specifier = node.getModuleSpecifierValue();
    this.recordImport(specifier, node.getStartLineNumber(), false);
    const module = normalizeModule(specifier);

    const defaultImport = node.getDefaultImport();
    if (defaultImport) this.bindings.set(defaultImport.getText(), module);
    const namespaceImport = node.getNamespaceImport();
    if (namespaceImport) this.bindings.set(namespaceImport.getText(), module);

    for (const named of node.getNamedImports()) {
      if (named.isTypeOnly()) continue;
      const local = named.getAliasNode()?.getText() ?? named.getName();
      this.bindings.set(local, `${module}.${named.getName()}`);
    }
  }

  /**
   * `else if` chains stay at the nesting level of the leading `if`
   */
  private visitIf(node: IfStatement, depth: number): void {
    const level = depth + 1;
    this.facts.branchCount++;
    this.noteDepth(level);
    this.visit(node.getExpression(), depth);
    this.visit(node.getThenStatement(), level);

    const otherwise = node.getElseStatement();
    if (!otherwise) return;
    if (Node.isIfStatement(otherwise)) {
      this.visitIf(otherwise, depth);
    } else {
      this.visit(otherwise, level);
    }
  }

  private visitFunction(node: Node, level: number): void {
    this.noteDepth(level);
    const name = functionName(node);
    if (name !== undefined) {
      const qualified = this.qualify(name);
      this.facts.functions.push({ name: qualified, line: node.getStartLineNumber() });
      this.graph.addFunction(qualified);
    }
    this.scopes.push({ name: name ?? "<anonymous>", kind: "function" });
    this.visitChildren(node, level);
    this.scopes.pop();
  }

  private inspectCall(node: CallExpression): void {
    const expression = node.getExpression();
    const args = node.getArguments();
    const line = node.getStartLineNumber();

    if (expression.getKind() === SyntaxKind.ImportKeyword) {
      const specifier = args[0] ? stringLiteralValue(args[0]) : undefined;
      if (specifier === undefined) {
        this.collector.add("critical", "dynamic_code", line, "Dynamic import with a non-literal specifier");
      } else {
        this.recordImport(specifier, line, true);
        this.collector.add("high", "dynamic_code", line, `Dynamic import of '${specifier}'`);
      }
      return;
    }

    const callee = this.resolve(expression);
    if (callee !== undefined && isLoader(callee)) {
      const specifier = args[0] ? stringLiteralValue(args[0]) : undefined;
      if (specifier === undefined) {
        this.collector.add("critical", "dynamic_code", line, `${callee}() with a non-literal specifier`);
      } else {
        this.recordImport(specifier, line, false);
      }
      return;
    }

    if (callee !== undefined) {
      this.facts.calls.push({ callee, line });
      this.inspectCallee(callee, args, line);
    }
    this.recordCallEdge(expression);
  }

  private inspectConstruction(node: NewExpression): void {
    const callee = this.resolve(node.getExpression());
    if (callee === undefined) return;
    const line = node.getStartLineNumber();
    this.facts.calls.push({ callee, line });
    this.inspectCallee(callee, node.getArguments(), line);
  }

  private inspectCallee(callee: string, args: Node[], line: number): void {
    const rule = findCallRule(JAVASCRIPT_CATALOG, callee);
    if (rule) {
      this.collector.add(rule.severity, rule.category, line, describeCall(rule, callee));
      if (rule.category === "network_access") this.facts.usesNetwork = true;
    }

    const fsRule = findFilesystemRule(JAVASCRIPT_CATALOG, callee);
    if (fsRule) {
      this.facts.usesFilesystem = true;
      const argument = args[fsRule.pathArgument];
      const target = argument ? stringLiteralValue(argument) : undefined;
      if (target === undefined) {
        this.collector.add("high", "filesystem_access", line, `File system access via ${callee}() with a non-literal path`);
      } else if (!isWithinAllowedPrefix(target, this.tempPathPrefixes)) {
        this.collector.add("high", "filesystem_access", line, `File system access via ${callee}() outside allowed temp paths: '${target}'`);
      }
    }

    if (this.stringTimers.has(callee) && args[0] && isStringLike(args[0])) {
      this.collector.add("high", "dynamic_code", line, `String evaluation via ${callee}()`);
    }
  }

  private inspectMemberAccess(node: Node): void {
    const name = accessedName(node);
    if (name === undefined) return;
    const line = node.getStartLineNumber();

    if (this.sandboxAttributes.has(name)) {
      this.collector.add("high", "sandbox_escape", line, `Prototype access via '${name}'`);
    }
    if (name === "constructor" && (Node.isPropertyAccessExpression(node) || Node.isElementAccessExpression(node))) {
      if (accessedName(node.getExpression()) === "constructor") {
        this.collector.add("high", "sandbox_escape", line, "Function constructor reached through 'constructor.constructor'");
      }
    }
  }

  /**
   * `(0, eval)(...)`, `[require][0](...)` and the like: any use of a loader global
   * other than calling it by name
   */
  private inspectReference(node: Node): void {
    const name = this.resolve(node);
    if (name === undefined || !LOADER_GLOBALS.has(name)) return;
    if (isCallee(node) || !isValueReference(node)) return;
    this.collector.add("critical", "dynamic_code", node.getStartLineNumber(), `Indirect reference to ${name}`);
  }

  private trackBinding(node: VariableDeclaration): void {
    const initializer = node.getInitializer();
    if (!initializer) return;
    const resolved = this.resolve(initializer);
    const nameNode = node.getNameNode();

    if (Node.isIdentifier(nameNode)) {
      const local = nameNode.getText();
      if (resolved !== undefined && resolved !== local) this.bindings.set(local, resolved);
      return;
    }

    if (Node.isObjectBindingPattern(nameNode) && resolved !== undefined) {
      for (const element of nameNode.getElements()) {
        if (element.getDotDotDotToken()) continue;
        const local = element.getNameNode();
        if (!Node.isIdentifier(local)) continue;
        const property = element.getPropertyNameNode()?.getText() ?? local.getText();
        this.bindings.set(local.getText(), GLOBAL_OBJECTS.has(resolved) ? property : `${resolved}.${property}`);
      }
    }
  }

  /**
   * Dotted name of an expression after alias resolution, or undefined when it has none
   */
  private resolve(node: Node): string | undefined {
    if (Node.isIdentifier(node)) {
      const name = node.getText();
      return this.bindings.get(name) ?? name;
    }
    if (Node.isPropertyAccessExpression(node)) {
      return this.member(node.getExpression(), node.getName());
    }
    if (Node.isElementAccessExpression(node)) {
      const key = accessedName(node);
      return key === undefined ? undefined : this.member(node.getExpression(), key);
    }
    if (Node.isParenthesizedExpression(node) || Node.isAsExpression(node) || Node.isNonNullExpression(node)) {
      return this.resolve(node.getExpression());
    }
    if (Node.isCallExpression(node)) {
      const callee = this.resolve(node.getExpression());
      const [first] = node.getArguments();
      if (callee !== undefined && isLoader(callee) && first) {
        const specifier = stringLiteralValue(first);
        return specifier === undefined ? undefined : normalizeModule(specifier);
      }
    }
    return undefined;
  }

  private member(target: Node, property: string): string | undefined {
    const base = this.resolve(target);
    if (base === undefined) return undefined;
    return GLOBAL_OBJECTS.has(base) ? property : `${base}.${property}`;
  }

  private recordImport(specifier: string, line: number, dynamic: boolean): void {
    const module = stripNodePrefix(specifier);
    const relative = module.startsWith(".") || module.startsWith("/");
    this.facts.imports.push({ module, line, dynamic, relative });
    if (!relative && findModuleEntry(module, JAVASCRIPT_CATALOG.deniedModules)) {
      this.collector.add("high", "denied_module", line, `Import of restricted module '${module}'`);
    }
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

  private bareCandidates(name: string): string[] {
    const candidates: string[] = [];
    for (let count = this.scopes.length; count > 0; count--) {
      if (this.scopes[count - 1].kind === "class") continue;
      candidates.push(`${this.qualifiedPrefix(count)}.${name}`);
    }
    candidates.push(name);
    return candidates;
  }

  private recordCallEdge(expression: Node): void {
    const from = this.currentFunction();
    if (!from) return;
    if (Node.isIdentifier(expression)) {
      this.graph.addReference(from, this.bareCandidates(expression.getText()));
    } else if (Node.isPropertyAccessExpression(expression) && expression.getExpression().getKind() === SyntaxKind.ThisKeyword) {
      const owner = this.enclosingClass();
      if (owner) this.graph.addReference(from, [`${owner}.${expression.getName()}`]);
    }
  }
}

/**
 * `require`, or a `require` reached through another object (`module.require`,
 * `process.mainModule.require`)
 */
function isLoader(callee: string): boolean {
  return callee === "require" || callee.endsWith(".require");
}

function isCallee(node: Node): boolean {
  const parent = node.getParent();
  return parent !== undefined && (Node.isCallExpression(parent) || Node.isNewExpression(parent)) && parent.getExpression() === node;
}

/**
 * False for property names, declared names and type positions
 */
function isValueReference(node: Node): boolean {
  const parent = node.getParent();
  if (!parent) return false;
  if (Node.isPropertyAccessExpression(parent)) return parent.getExpression() === node;
  if (Node.isTypeReference(parent) || Node.isTypeQuery(parent) || Node.isQualifiedName(parent)) return false;
  if (
    Node.isVariableDeclaration(parent) ||
    Node.isBindingElement(parent) ||
    Node.isParameterDeclaration(parent) ||
    Node.isPropertyAssignment(parent) ||
    Node.isPropertyDeclaration(parent)
  ) {
    return parent.getInitializer() === node;
  }
  if (
    Node.isFunctionDeclaration(parent) ||
    Node.isFunctionExpression(parent) ||
    Node.isClassDeclaration(parent) ||
    Node.isClassExpression(parent) ||
    Node.isMethodDeclaration(parent) ||
    Node.isGetAccessorDeclaration(parent) ||
    Node.isSetAccessorDeclaration(parent) ||
    Node.isPropertySignature(parent) ||
    Node.isMethodSignature(parent)
  ) {
    return parent.getNameNode() !== node;
  }
  return !(Node.isLabeledStatement(parent) || Node.isBreakStatement(parent) || Node.isContinueStatement(parent));
}

function stripNodePrefix(specifier: string): string {
  return specifier.startsWith("node:") ? specifier.slice("node:".length) : specifier;
}

/**
 * Module specifier as a dotted path: "node:fs/promises" -> "fs.promises"
 */
function normalizeModule(specifier: string): string {
  return stripNodePrefix(specifier).replace(/\//g, ".");
}

function stringLiteralValue(node: Node): string | undefined {
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue();
  }
  return undefined;
}

function isStringLike(node: Node): boolean {
  return stringLiteralValue(node) !== undefined || Node.isTemplateExpression(node);
}

function accessedName(node: Node): string | undefined {
  if (Node.isPropertyAccessExpression(node)) return node.getName();
  if (Node.isElementAccessExpression(node)) {
    const argument = node.getArgumentExpression();
    return argument ? stringLiteralValue(argument) : undefined;
  }
  return undefined;
}

function functionName(node: Node): string | undefined {
  if (Node.isFunctionDeclaration(node) || Node.isFunctionExpression(node)) {
    const own = node.getName();
    if (own) return own;
  }
  if (Node.isMethodDeclaration(node) || Node.isGetAccessorDeclaration(node) || Node.isSetAccessorDeclaration(node)) {
    return node.getName();
  }
  if (Node.isConstructorDeclaration(node)) return "constructor";

  const parent = node.getParent();
  if (parent && (Node.isVariableDeclaration(parent) || Node.isPropertyDeclaration(parent) || Node.isPropertyAssignment(parent))) {
    return parent.getName();
  }
  return undefined;
}

function isTruthyLiteral(node: Node): boolean {
  if (Node.isTrueLiteral(node)) return true;
  if (Node.isNumericLiteral(node)) return node.getLiteralValue() !== 0;
  const text = stringLiteralValue(node);
  return text !== undefined && text.length > 0;
}

function isUnboundedLoop(node: Node): boolean {
  if (Node.isForStatement(node)) {
    const condition = node.getCondition();
    return (condition === undefined || isTruthyLiteral(condition)) && !hasLoopExit(node.getStatement());
  }
  if (Node.isWhileStatement(node) || Node.isDoStatement(node)) {
    return isTruthyLiteral(node.getExpression()) && !hasLoopExit(node.getStatement());
  }
  return false;
}

/**
 * A `break`, `return` or `throw` that leaves the loop. Breaks inside nested loops or
 * switches only count when labelled.
 */
function hasLoopExit(node: Node, nested = false): boolean {
  if (Node.isReturnStatement(node) || Node.isThrowStatement(node)) return true;
  if (Node.isBreakStatement(node)) return !nested || node.getLabel() !== undefined;
  if (FUNCTION_KINDS.has(node.getKind()) || Node.isClassDeclaration(node) || Node.isClassExpression(node)) return false;

  const innerNested = nested || LOOP_KINDS.has(node.getKind()) || Node.isSwitchStatement(node);
  return node.forEachChild((child) => (hasLoopExit(child, innerNested) ? true : undefined)) === true;
}
