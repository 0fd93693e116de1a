/**
 * Recursive-descent parser for Python 3.
 *
 * Covers the statement and expression grammar up to 3.12 except `match` statements,
 * which are rejected with an explicit syntax error rather than skipped.
 */

import { Deadline } from "../deadline";
import {
  Alias,
  Comprehension,
  ExceptHandler,
  Expr,
  FunctionDefStmt,
  ClassDefStmt,
  IfStmt,
  Keyword,
  KeywordStmt,
  Module,
  Parameter,
  Stmt,
  WithItem,
} from "./ast";
import { PythonSyntaxError, Token, tokenize } from "./tokenizer";

const HARD_KEYWORDS = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break", "class", "continue",
  "def", "del", "elif", "else", "except", "finally", "for", "from", "global", "if", "import",
  "in", "is", "lambda", "nonlocal", "not", "or", "pass", "raise", "return", "try", "while",
  "with", "yield",
]);

// Keywords that may open an expression
const EXPRESSION_KEYWORDS = new Set(["False", "None", "True", "not", "lambda", "await", "yield"]);

const AUG_ASSIGN_OPS = new Set(["+=", "-=", "*=", "/=", "//=", "%=", "**=", ">>=", "<<=", "&=", "|=", "^=", "@="]);
const COMPARISON_OPS = new Set(["<", ">", "==", ">=", "<=", "!="]);
const EXPRESSION_OPENERS = new Set(["(", "[", "{", "-", "+", "~", "*", "..."]);

const KEYWORD_STATEMENTS = new Map<string, KeywordStmt["kind"]>([
  ["pass", "Pass"],
  ["break", "Break"],
  ["continue", "Continue"],
]);

const TARGET_DESCRIPTIONS: Partial<Record<Expr["kind"], string>> = {
  Call: "function call",
  Constant: "literal",
  JoinedStr: "f-string expression",
  Compare: "comparison",
  IfExp: "conditional expression",
  Lambda: "lambda",
  NamedExpr: "named expression",
  Dict: "dict literal",
  Set: "set display",
  ListComp: "list comprehension",
  SetComp: "set comprehension",
  DictComp: "dict comprehension",
  GeneratorExp: "generator expression",
  Await: "await expression",
  Yield: "yield expression",
  YieldFrom: "yield expression",
};

type TargetContext = "assignment" | "augmented" | "for" | "del" | "with" | "comprehension";

export function parsePython(source: string, deadline: Deadline = Deadline.unlimited()): Module {
  return new Parser(tokenize(source, deadline), deadline).parseModule();
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly deadline: Deadline) {}

  parseModule(): Module {
    const body: Stmt[] = [];
    while (this.peek().kind !== "eof") {
      this.deadline.check();
      if (this.peek().kind === "newline") {
        this.next();
        continue;
      }
      body.push(...this.parseStatement());
    }
    return { body };
  }

  parseStandaloneExpression(): Expr {
    const expr = this.parseTestList();
    const end = this.peek();
    if (end.kind !== "newline" && end.kind !== "eof") throw this.error("invalid syntax", end);
    return expr;
  }

  // ---- token helpers ----

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return token;
  }

  private atOp(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === "op" && token.value === value;
  }

  private atKeyword(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === "name" && token.value === value;
  }

  private expectOp(value: string): Token {
    if (!this.atOp(value)) throw this.error(`expected '${value}'`);
    return this.next();
  }

  private expectKeyword(value: string): Token {
    if (!this.atKeyword(value)) throw this.error("invalid syntax");
    return this.next();
  }

  private expectName(): string {
    const token = this.peek();
    if (token.kind !== "name" || HARD_KEYWORDS.has(token.value)) throw this.error("invalid syntax", token);
    this.next();
    return token.value;
  }

  private expectNewline(): void {
    const token = this.peek();
    if (token.kind === "newline") {
      this.next();
      return;
    }
    if (token.kind !== "eof") throw this.error("invalid syntax", token);
  }

  private atStatementEnd(): boolean {
    const token = this.peek();
    return token.kind === "newline" || token.kind === "eof" || (token.kind === "op" && token.value === ";");
  }

  private canStartExpression(): boolean {
    const token = this.peek();
    switch (token.kind) {
      case "number":
      case "string":
        return true;
      case "name":
        return !HARD_KEYWORDS.has(token.value) || EXPRESSION_KEYWORDS.has(token.value);
      case "op":
        return EXPRESSION_OPENERS.has(token.value);
      default:
        return false;
    }
  }

  private error(message = "invalid syntax", token: Token = this.peek()): PythonSyntaxError {
    return new PythonSyntaxError(message, token.line);
  }

  // ---- statements ----

  private parseStatement(): Stmt[] {
    const token = this.peek();
    if (token.kind === "indent") throw this.error("unexpected indent", token);
    if (token.kind === "op" && token.value === "@") return [this.parseDecorated()];

    if (token.kind === "name") {
      switch (token.value) {
        case "def":
          return [this.parseFunctionDef([], false)];
        case "class":
          return [this.parseClassDef([])];
        case "if":
          return [this.parseIf(false)];
        case "while":
          return [this.parseWhile()];
        case "for":
          return [this.parseFor(false)];
        case "try":
          return [this.parseTry()];
        case "with":
          return [this.parseWith(false)];
        case "async":
          return [this.parseAsync([])];
        case "match":
          if (this.isMatchStatement()) {
            throw this.error("match statements are not supported by the analyzer", token);
          }
          break;
      }
    }
    return this.parseSimpleStatements();
  }

  private isMatchStatement(): boolean {
    const after = this.peek(1);
    if (after.kind === "newline" || after.kind === "eof") return false;
    if (after.kind === "op" && (["=", ".", ",", ")", ":", ";"].includes(after.value) || AUG_ASSIGN_OPS.has(after.value))) {
      return false;
    }
    let index = this.pos + 1;
    while (index < this.tokens.length && this.tokens[index].kind !== "newline" && this.tokens[index].kind !== "eof") {
      index++;
    }
    const last = this.tokens[index - 1];
    return last.kind === "op" && last.value === ":";
  }

  private parseSuite(what: string, line: number): Stmt[] {
    this.expectOp(":");
    if (this.peek().kind !== "newline") return this.parseSimpleStatements();
    this.next();
    if (this.peek().kind !== "indent") {
      throw this.error(`expected an indented block after ${what} on line ${line}`);
    }
    this.next();
    const body: Stmt[] = [];
    while (this.peek().kind !== "dedent" && this.peek().kind !== "eof") {
      this.deadline.check();
      if (this.peek().kind === "newline") {
        this.next();
        continue;
      }
      body.push(...this.parseStatement());
    }
    if (this.peek().kind === "dedent") this.next();
    return body;
  }

  private parseDecorated(): Stmt {
    const decorators: Expr[] = [];
    while (this.atOp("@")) {
      this.next();
      decorators.push(this.parseNamedExprTest());
      this.expectNewline();
    }
    if (this.atKeyword("def")) return this.parseFunctionDef(decorators, false);
    if (this.atKeyword("class")) return this.parseClassDef(decorators);
    if (this.atKeyword("async")) return this.parseAsync(decorators);
    throw this.error();
  }

  private parseAsync(decorators: Expr[]): Stmt {
    this.next();
    if (this.atKeyword("def")) return this.parseFunctionDef(decorators, true);
    if (decorators.length === 0 && this.atKeyword("for")) return this.parseFor(true);
    if (decorators.length === 0 && this.atKeyword("with")) return this.parseWith(true);
    throw this.error();
  }

  private parseFunctionDef(decorators: Expr[], isAsync: boolean): FunctionDefStmt {
    const start = this.expectKeyword("def");
    const name = this.expectName();
    this.expectOp("(");
    const params = this.parseParameters(")", true);
    this.expectOp(")");
    let returns: Expr | undefined;
    if (this.atOp("->")) {
      this.next();
      returns = this.parseTest();
    }
    const body = this.parseSuite("function definition", start.line);
    return { kind: "FunctionDef", name, params, returns, body, decorators, isAsync, line: start.line };
  }

  private parseParameters(closer: string, allowAnnotations: boolean): Parameter[] {
    const params: Parameter[] = [];
    while (!this.atOp(closer)) {
      if (this.atOp("/")) {
        this.next();
      } else if (this.atOp("*")) {
        this.next();
        if (this.peek().kind === "name") params.push(this.parseParameter("vararg", allowAnnotations));
      } else if (this.atOp("**")) {
        this.next();
        params.push(this.parseParameter("kwarg", allowAnnotations));
      } else {
        params.push(this.parseParameter("positional", allowAnnotations));
      }
      if (!this.atOp(",")) break;
      this.next();
    }
    return params;
  }

  private parseParameter(kind: Parameter["kind"], allowAnnotations: boolean): Parameter {
    const line = this.peek().line;
    const name = this.expectName();
    const param: Parameter = { name, kind, line };
    if (allowAnnotations && this.atOp(":")) {
      this.next();
      param.annotation = this.parseTest();
    }
    if (kind === "positional" && this.atOp("=")) {
      this.next();
      param.default = this.parseTest();
    }
    return param;
  }

  private parseClassDef(decorators: Expr[]): ClassDefStmt {
    const start = this.expectKeyword("class");
    const name = this.expectName();
    let bases: Expr[] = [];
    let keywords: Keyword[] = [];
    if (this.atOp("(")) {
      this.next();
      ({ args: bases, keywords } = this.parseArguments());
      this.expectOp(")");
    }
    const body = this.parseSuite("class definition", start.line);
    return { kind: "ClassDef", name, bases, keywords, body, decorators, line: start.line };
  }

  private parseIf(isElif: boolean): IfStmt {
    const start = this.next();
    const test = this.parseNamedExprTest();
    const body = this.parseSuite(`'${start.value}' statement`, start.line);
    let orelse: Stmt[] = [];
    if (this.atKeyword("elif")) {
      orelse = [this.parseIf(true)];
    } else if (this.atKeyword("else")) {
      const elseToken = this.next();
      orelse = this.parseSuite("'else' statement", elseToken.line);
    }
    return { kind: "If", test, body, orelse, isElif, line: start.line };
  }

  private parseElse(): Stmt[] {
    if (!this.atKeyword("else")) return [];
    const elseToken = this.next();
    return this.parseSuite("'else' statement", elseToken.line);
  }

  private parseWhile(): Stmt {
    const start = this.expectKeyword("while");
    const test = this.parseNamedExprTest();
    const body = this.parseSuite("'while' statement", start.line);
    return { kind: "While", test, body, orelse: this.parseElse(), line: start.line };
  }

  private parseFor(isAsync: boolean): Stmt {
    const start = this.expectKeyword("for");
    const target = this.parseTargetList();
    this.validateTarget(target, "for");
    this.expectKeyword("in");
    const iter = this.parseTestList();
    const body = this.parseSuite("'for' statement", start.line);
    return { kind: "For", target, iter, body, orelse: this.parseElse(), isAsync, line: start.line };
  }

  private parseTry(): Stmt {
    const start = this.expectKeyword("try");
    const body = this.parseSuite("'try' statement", start.line);
    const handlers: ExceptHandler[] = [];

    while (this.atKeyword("except")) {
      const clause = this.next();
      if (this.atOp("*")) this.next();
      let type: Expr | undefined;
      let name: string | undefined;
      if (!this.atOp(":")) {
        type = this.parseTest();
        if (this.atKeyword("as")) {
          this.next();
          name = this.expectName();
        }
      }
      handlers.push({ type, name, body: this.parseSuite("'except' statement", clause.line), line: clause.line });
    }

    const orelse = handlers.length > 0 ? this.parseElse() : [];
    let finalbody: Stmt[] = [];
    let hasFinally = false;
    if (this.atKeyword("finally")) {
      const clause = this.next();
      hasFinally = true;
      finalbody = this.parseSuite("'finally' statement", clause.line);
    }
    if (handlers.length === 0 && !hasFinally) {
      throw this.error("expected 'except' or 'finally' block");
    }
    return { kind: "Try", body, handlers, orelse, finalbody, line: start.line };
  }

  private parseWith(isAsync: boolean): Stmt {
    const start = this.expectKeyword("with");
    let items = this.tryParseParenthesizedWithItems();
    if (!items) {
      items = [this.parseWithItem()];
      while (this.atOp(",")) {
        this.next();
        items.push(this.parseWithItem());
      }
    }
    const body = this.parseSuite("'with' statement", start.line);
    return { kind: "With", items, body, isAsync, line: start.line };
  }

  /**
   * `with (a as b, c as d):` form. Falls back when the parentheses turn out to be an expression.
   */
  private tryParseParenthesizedWithItems(): WithItem[] | undefined {
    if (!this.atOp("(")) return undefined;
    const saved = this.pos;
    try {
      this.next();
      const items: WithItem[] = [];
      while (!this.atOp(")")) {
        items.push(this.parseWithItem());
        if (!this.atOp(",")) break;
        this.next();
      }
      this.expectOp(")");
      if (!this.atOp(":") || items.length === 0) throw this.error();
      return items;
    } catch (error) {
      if (!(error instanceof PythonSyntaxError)) throw error;
      this.pos = saved;
      return undefined;
    }
  }

  private parseWithItem(): WithItem {
    const context = this.parseTest();
    if (!this.atKeyword("as")) return { context };
    this.next();
    const vars = this.parseTargetItem();
    this.validateTarget(vars, "with");
    return { context, vars };
  }

  private parseSimpleStatements(): Stmt[] {
    const statements = [this.parseSmallStatement()];
    while (this.atOp(";")) {
      this.next();
      if (this.peek().kind === "newline" || this.peek().kind === "eof") break;
      statements.push(this.parseSmallStatement());
    }
    this.expectNewline();
    return statements;
  }

  private parseSmallStatement(): Stmt {
    const token = this.peek();
    if (token.kind === "name") {
      const keywordKind = KEYWORD_STATEMENTS.get(token.value);
      if (keywordKind) {
        this.next();
        return { kind: keywordKind, line: token.line };
      }

      switch (token.value) {
        case "return": {
          this.next();
          const value = this.atStatementEnd() ? undefined : this.parseTestList();
          return { kind: "Return", value, line: token.line };
        }
        case "raise": {
          this.next();
          if (this.atStatementEnd()) return { kind: "Raise", line: token.line };
          const exc = this.parseTest();
          let cause: Expr | undefined;
          if (this.atKeyword("from")) {
            this.next();
            cause = this.parseTest();
          }
          return { kind: "Raise", exc, cause, line: token.line };
        }
        case "global":
        case "nonlocal": {
          this.next();
          const names = [this.expectName()];
          while (this.atOp(",")) {
            this.next();
            names.push(this.expectName());
          }
          return { kind: token.value === "global" ? "Global" : "Nonlocal", names, line: token.line };
        }
        case "del": {
          this.next();
          const target = this.parseTargetList();
          this.validateTarget(target, "del");
          return { kind: "Delete", targets: target.kind === "Tuple" ? target.elts : [target], line: token.line };
        }
        case "assert": {
          this.next();
          const test = this.parseTest();
          let msg: Expr | undefined;
          if (this.atOp(",")) {
            this.next();
            msg = this.parseTest();
          }
          return { kind: "Assert", test, msg, line: token.line };
        }
        case "import":
          return this.parseImport();
        case "from":
          return this.parseImportFrom();
        case "type":
          if (this.peek(1).kind === "name" && (this.atOp("=", 2) || this.atOp("[", 2))) {
            return this.parseTypeAlias();
          }
          break;
      }
    }
    return this.parseExpressionStatement();
  }

  private parseTypeAlias(): Stmt {
    const start = this.next();
    const nameToken = this.peek();
    const id = this.expectName();
    if (this.atOp("[")) {
      let depth = 0;
      do {
        if (this.atOp("[")) depth++;
        else if (this.atOp("]")) depth--;
        this.next();
      } while (depth > 0 && this.peek().kind !== "eof");
    }
    this.expectOp("=");
    const value = this.parseTest();
    return { kind: "Assign", targets: [{ kind: "Name", id, line: nameToken.line }], value, line: start.line };
  }

  private parseDottedName(): string {
    const parts = [this.expectName()];
    while (this.atOp(".")) {
      this.next();
      parts.push(this.expectName());
    }
    return parts.join(".");
  }

  private parseImport(): Stmt {
    const start = this.next();
    const names: Alias[] = [];
    do {
      if (names.length > 0) this.next();
      const line = this.peek().line;
      const name = this.parseDottedName();
      let asname: string | undefined;
      if (this.atKeyword("as")) {
        this.next();
        asname = this.expectName();
      }
      names.push({ name, asname, line });
    } while (this.atOp(","));
    return { kind: "Import", names, line: start.line };
  }

  private parseImportFrom(): Stmt {
    const start = this.next();
    let level = 0;
    while (this.atOp(".") || this.atOp("...")) {
      level += this.next().value.length;
    }
    let module = "";
    if (!this.atKeyword("import")) {
      module = this.parseDottedName();
    } else if (level === 0) {
      throw this.error();
    }
    this.expectKeyword("import");

    const names: Alias[] = [];
    if (this.atOp("*")) {
      const star = this.next();
      names.push({ name: "*", line: star.line });
    } else {
      const parenthesized = this.atOp("(");
      if (parenthesized) this.next();
      do {
        if (names.length > 0) {
          this.next();
          if (parenthesized && this.atOp(")")) break;
        }
        const line = this.peek().line;
        const name = this.expectName();
        let asname: string | undefined;
        if (this.atKeyword("as")) {
          this.next();
          asname = this.expectName();
        }
        names.push({ name, asname, line });
      } while (this.atOp(","));
      if (parenthesized) this.expectOp(")");
    }
    return { kind: "ImportFrom", module, level, names, line: start.line };
  }

  private parseExpressionStatement(): Stmt {
    const start = this.peek();
    const first = this.atKeyword("yield") ? this.parseYield() : this.parseTestList();
    const op = this.peek();

    if (op.kind === "op" && AUG_ASSIGN_OPS.has(op.value)) {
      this.validateTarget(first, "augmented");
      this.next();
      const value = this.atKeyword("yield") ? this.parseYield() : this.parseTestList();
      return { kind: "AugAssign", target: first, op: op.value, value, line: start.line };
    }

    if (this.atOp(":")) {
      if (first.kind !== "Name" && first.kind !== "Attribute" && first.kind !== "Subscript") {
        throw this.error("only single target (not tuple) can be annotated", op);
      }
      this.next();
      const annotation = this.parseTest();
      let value: Expr | undefined;
      if (this.atOp("=")) {
        this.next();
        value = this.atKeyword("yield") ? this.parseYield() : this.parseTestList();
      }
      return { kind: "AnnAssign", target: first, annotation, value, line: start.line };
    }

    if (this.atOp("=")) {
      const chain: Expr[] = [first];
      while (this.atOp("=")) {
        this.next();
        chain.push(this.atKeyword("yield") ? this.parseYield() : this.parseTestList());
      }
      const value = chain[chain.length - 1];
      const targets = chain.slice(0, -1);
      targets.forEach((target) => this.validateTarget(target, "assignment"));
      return { kind: "Assign", targets, value, line: start.line };
    }

    return { kind: "Expr", value: first, line: start.line };
  }

  private validateTarget(expr: Expr, context: TargetContext): void {
    switch (expr.kind) {
      case "Name":
      case "Attribute":
      case "Subscript":
        return;
      case "Tuple":
      case "List":
        if (context === "augmented") break;
        expr.elts.forEach((element) => this.validateTarget(element, context));
        return;
      case "Starred":
        if (context === "augmented" || context === "del") break;
        this.validateTarget(expr.value, context);
        return;
    }
    const description = TARGET_DESCRIPTIONS[expr.kind] ?? (expr.kind === "Tuple" || expr.kind === "List" ? expr.kind.toLowerCase() : "expression");
    const verb = context === "del" ? "delete" : context === "augmented" ? "use augmented assignment on" : "assign to";
    throw new PythonSyntaxError(`cannot ${verb} ${description}`, expr.line);
  }

  // ---- expressions ----

  private parseTestList(): Expr {
    const first = this.parseStarOrTest();
    if (!this.atOp(",")) return first;
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (!this.canStartExpression()) break;
      elts.push(this.parseStarOrTest());
    }
    return { kind: "Tuple", elts, line: first.line };
  }

  private parseTargetList(): Expr {
    const first = this.parseTargetItem();
    if (!this.atOp(",")) return first;
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (!this.canStartExpression()) break;
      elts.push(this.parseTargetItem());
    }
    return { kind: "Tuple", elts, line: first.line };
  }

  private parseTargetItem(): Expr {
    if (this.atOp("*")) {
      const star = this.next();
      return { kind: "Starred", value: this.parseBitOr(), line: star.line };
    }
    return this.parseBitOr();
  }

  private parseStarOrTest(): Expr {
    if (this.atOp("*")) {
      const star = this.next();
      return { kind: "Starred", value: this.parseBitOr(), line: star.line };
    }
    return this.parseTest();
  }

  private parseStarOrNamed(): Expr {
    if (this.atOp("*")) {
      const star = this.next();
      return { kind: "Starred", value: this.parseBitOr(), line: star.line };
    }
    return this.parseNamedExprTest();
  }

  private parseNamedExprTest(): Expr {
    if (this.peek().kind === "name" && this.atOp(":=", 1)) {
      const nameToken = this.peek();
      const id = this.expectName();
      this.next();
      const value = this.parseTest();
      return { kind: "NamedExpr", target: { kind: "Name", id, line: nameToken.line }, value, line: nameToken.line };
    }
    return this.parseTest();
  }

  private parseTest(): Expr {
    if (this.atKeyword("lambda")) return this.parseLambda();
    const body = this.parseOrTest();
    if (!this.atKeyword("if")) return body;
    this.next();
    const test = this.parseOrTest();
    this.expectKeyword("else");
    const orelse = this.parseTest();
    return { kind: "IfExp", test, body, orelse, line: body.line };
  }

  private parseLambda(): Expr {
    const start = this.next();
    const params = this.parseParameters(":", false);
    this.expectOp(":");
    return { kind: "Lambda", params, body: this.parseTest(), line: start.line };
  }

  private parseOrTest(): Expr {
    const first = this.parseAndTest();
    if (!this.atKeyword("or")) return first;
    const values = [first];
    while (this.atKeyword("or")) {
      this.next();
      values.push(this.parseAndTest());
    }
    return { kind: "BoolOp", op: "or", values, line: first.line };
  }

  private parseAndTest(): Expr {
    const first = this.parseNotTest();
    if (!this.atKeyword("and")) return first;
    const values = [first];
    while (this.atKeyword("and")) {
      this.next();
      values.push(this.parseNotTest());
    }
    return { kind: "BoolOp", op: "and", values, line: first.line };
  }

  private parseNotTest(): Expr {
    if (this.atKeyword("not")) {
      const token = this.next();
      return { kind: "UnaryOp", op: "not", operand: this.parseNotTest(), line: token.line };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseBitOr();
    const ops: string[] = [];
    const comparators: Expr[] = [];

    for (;;) {
      const token = this.peek();
      let op: string;
      if (token.kind === "op" && COMPARISON_OPS.has(token.value)) {
        this.next();
        op = token.value;
      } else if (this.atKeyword("in")) {
        this.next();
        op = "in";
      } else if (this.atKeyword("not") && this.atKeyword("in", 1)) {
        this.next();
        this.next();
        op = "not in";
      } else if (this.atKeyword("is")) {
        this.next();
        op = "is";
        if (this.atKeyword("not")) {
          this.next();
          op = "is not";
        }
      } else {
        break;
      }
      ops.push(op);
      comparators.push(this.parseBitOr());
    }

    return ops.length === 0 ? left : { kind: "Compare", left, ops, comparators, line: left.line };
  }

  private parseBinary(operand: () => Expr, operators: readonly string[]): Expr {
    let left = operand();
    for (;;) {
      const token = this.peek();
      if (token.kind !== "op" || !operators.includes(token.value)) return left;
      this.next();
      const right = operand();
      left = { kind: "BinOp", op: token.value, left, right, line: left.line };
    }
  }

  private parseBitOr(): Expr {
    return this.parseBinary(() => this.parseBitXor(), ["|"]);
  }

  private parseBitXor(): Expr {
    return this.parseBinary(() => this.parseBitAnd(), ["^"]);
  }

  private parseBitAnd(): Expr {
    return this.parseBinary(() => this.parseShift(), ["&"]);
  }

  private parseShift(): Expr {
    return this.parseBinary(() => this.parseArith(), ["<<", ">>"]);
  }

  private parseArith(): Expr {
    return this.parseBinary(() => this.parseTerm(), ["+", "-"]);
  }

  private parseTerm(): Expr {
    return this.parseBinary(() => this.parseFactor(), ["*", "/", "//", "%", "@"]);
  }

  private parseFactor(): Expr {
    const token = this.peek();
    if (token.kind === "op" && (token.value === "+" || token.value === "-" || token.value === "~")) {
      this.next();
      return { kind: "UnaryOp", op: token.value, operand: this.parseFactor(), line: token.line };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    let value: Expr;
    if (this.atKeyword("await")) {
      const token = this.next();
      value = { kind: "Await", value: this.parsePrimary(), line: token.line };
    } else {
      value = this.parsePrimary();
    }
    if (!this.atOp("**")) return value;
    this.next();
    return { kind: "BinOp", op: "**", left: value, right: this.parseFactor(), line: value.line };
  }

  private parsePrimary(): Expr {
    let expr = this.parseAtom();
    for (;;) {
      this.deadline.check();
      if (this.atOp("(")) {
        this.next();
        const { args, keywords } = this.parseArguments();
        this.expectOp(")");
        expr = { kind: "Call", func: expr, args, keywords, line: expr.line };
      } else if (this.atOp("[")) {
        this.next();
        const slice = this.parseSubscriptList();
        this.expectOp("]");
        expr = { kind: "Subscript", value: expr, slice, line: expr.line };
      } else if (this.atOp(".")) {
        this.next();
        const attr = this.peek();
        if (attr.kind !== "name") throw this.error("invalid syntax", attr);
        this.next();
        expr = { kind: "Attribute", value: expr, attr: attr.value, line: expr.line };
      } else {
        return expr;
      }
    }
  }

  private parseArguments(): { args: Expr[]; keywords: Keyword[] } {
    const args: Expr[] = [];
    const keywords: Keyword[] = [];
    let seenKeyword = false;
    let seenUnpacking = false;
    while (!this.atOp(")")) {
      const token = this.peek();
      if (this.atOp("*")) {
        if (seenUnpacking) throw this.error("iterable argument unpacking follows keyword argument unpacking", token);
        this.next();
        args.push({ kind: "Starred", value: this.parseTest(), line: token.line });
      } else if (this.atOp("**")) {
        seenUnpacking = true;
        this.next();
        keywords.push({ value: this.parseTest(), line: token.line });
      } else if (token.kind === "name" && this.atOp("=", 1)) {
        seenKeyword = true;
        const name = this.expectName();
        this.next();
        keywords.push({ name, value: this.parseTest(), line: token.line });
      } else {
        if (seenUnpacking) throw this.error("positional argument follows keyword argument unpacking", token);
        if (seenKeyword) throw this.error("positional argument follows keyword argument", token);
        let value = this.parseNamedExprTest();
        if (this.atCompFor()) {
          value = { kind: "GeneratorExp", elt: value, generators: this.parseComprehensionClauses(), line: value.line };
          if (args.length > 0 || keywords.length > 0 || this.atOp(",")) {
            throw this.error("Generator expression must be parenthesized", token);
          }
        }
        args.push(value);
      }
      if (!this.atOp(",")) break;
      this.next();
    }
    return { args, keywords };
  }

  private parseSubscriptList(): Expr {
    const first = this.parseSliceItem();
    if (!this.atOp(",")) return first;
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (this.atOp("]")) break;
      elts.push(this.parseSliceItem());
    }
    return { kind: "Tuple", elts, line: first.line };
  }

  private parseSliceItem(): Expr {
    const line = this.peek().line;
    let lower: Expr | undefined;
    if (!this.atOp(":")) {
      lower = this.parseStarOrNamed();
      if (!this.atOp(":")) return lower;
    }
    this.next();
    let upper: Expr | undefined;
    let step: Expr | undefined;
    if (!this.atOp(":") && !this.atOp("]") && !this.atOp(",")) upper = this.parseTest();
    if (this.atOp(":")) {
      this.next();
      if (!this.atOp("]") && !this.atOp(",")) step = this.parseTest();
    }
    return { kind: "Slice", lower, upper, step, line };
  }

  private parseAtom(): Expr {
    const token = this.peek();
    switch (token.kind) {
      case "number":
        this.next();
        return { kind: "Constant", type: "number", value: token.value, line: token.line };
      case "string":
        return this.parseStrings();
      case "name":
        if (token.value === "True" || token.value === "False") {
          this.next();
          return { kind: "Constant", type: "bool", value: token.value, line: token.line };
        }
        if (token.value === "None") {
          this.next();
          return { kind: "Constant", type: "none", value: "None", line: token.line };
        }
        if (HARD_KEYWORDS.has(token.value)) throw this.error("invalid syntax", token);
        this.next();
        return { kind: "Name", id: token.value, line: token.line };
      case "op":
        if (token.value === "(") return this.parseParenthesized();
        if (token.value === "[") return this.parseListDisplay();
        if (token.value === "{") return this.parseBraceDisplay();
        if (token.value === "...") {
          this.next();
          return { kind: "Constant", type: "ellipsis", value: "...", line: token.line };
        }
        break;
    }
    throw this.error("invalid syntax", token);
  }

  private parseParenthesized(): Expr {
    const open = this.next();
    if (this.atOp(")")) {
      this.next();
      return { kind: "Tuple", elts: [], line: open.line };
    }
    if (this.atKeyword("yield")) {
      const value = this.parseYield();
      this.expectOp(")");
      return value;
    }
    const first = this.parseStarOrNamed();
    if (this.atCompFor()) {
      const generators = this.parseComprehensionClauses();
      this.expectOp(")");
      return { kind: "GeneratorExp", elt: first, generators, line: open.line };
    }
    if (!this.atOp(",")) {
      this.expectOp(")");
      return first;
    }
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (this.atOp(")")) break;
      elts.push(this.parseStarOrNamed());
    }
    this.expectOp(")");
    return { kind: "Tuple", elts, line: open.line };
  }

  private parseListDisplay(): Expr {
    const open = this.next();
    if (this.atOp("]")) {
      this.next();
      return { kind: "List", elts: [], line: open.line };
    }
    const first = this.parseStarOrNamed();
    if (this.atCompFor()) {
      const generators = this.parseComprehensionClauses();
      this.expectOp("]");
      return { kind: "ListComp", elt: first, generators, line: open.line };
    }
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (this.atOp("]")) break;
      elts.push(this.parseStarOrNamed());
    }
    this.expectOp("]");
    return { kind: "List", elts, line: open.line };
  }

  private parseBraceDisplay(): Expr {
    const open = this.next();
    if (this.atOp("}")) {
      this.next();
      return { kind: "Dict", keys: [], values: [], line: open.line };
    }
    if (this.atOp("**")) return this.parseDictEntries(open.line, [], []);

    const first = this.parseStarOrNamed();
    if (this.atOp(":")) {
      this.next();
      const value = this.parseTest();
      if (this.atCompFor()) {
        const generators = this.parseComprehensionClauses();
        this.expectOp("}");
        return { kind: "DictComp", key: first, value, generators, line: open.line };
      }
      return this.parseDictEntries(open.line, [first], [value]);
    }

    if (this.atCompFor()) {
      const generators = this.parseComprehensionClauses();
      this.expectOp("}");
      return { kind: "SetComp", elt: first, generators, line: open.line };
    }
    const elts = [first];
    while (this.atOp(",")) {
      this.next();
      if (this.atOp("}")) break;
      elts.push(this.parseStarOrNamed());
    }
    this.expectOp("}");
    return { kind: "Set", elts, line: open.line };
  }

  private parseDictEntries(line: number, keys: Array<Expr | null>, values: Expr[]): Expr {
    for (;;) {
      if (keys.length > 0) {
        if (!this.atOp(",")) break;
        this.next();
        if (this.atOp("}")) break;
      }
      if (this.atOp("**")) {
        this.next();
        keys.push(null);
        values.push(this.parseBitOr());
      } else {
        keys.push(this.parseTest());
        this.expectOp(":");
        values.push(this.parseTest());
      }
    }
    this.expectOp("}");
    return { kind: "Dict", keys, values, line };
  }

  private atCompFor(): boolean {
    return this.atKeyword("for") || (this.atKeyword("async") && this.atKeyword("for", 1));
  }

  private parseComprehensionClauses(): Comprehension[] {
    const generators: Comprehension[] = [];
    while (this.atCompFor()) {
      const isAsync = this.atKeyword("async");
      if (isAsync) this.next();
      const forToken = this.expectKeyword("for");
      const target = this.parseTargetList();
      this.validateTarget(target, "comprehension");
      this.expectKeyword("in");
      const iter = this.parseOrTest();
      const ifs: Expr[] = [];
      while (this.atKeyword("if")) {
        this.next();
        ifs.push(this.parseOrTest());
      }
      generators.push({ target, iter, ifs, isAsync, line: forToken.line });
    }
    return generators;
  }

  private parseYield(): Expr {
    const token = this.next();
    if (this.atKeyword("from")) {
      this.next();
      return { kind: "YieldFrom", value: this.parseTest(), line: token.line };
    }
    if (!this.canStartExpression()) return { kind: "Yield", line: token.line };
    return { kind: "Yield", value: this.parseTestList(), line: token.line };
  }

  private parseStrings(): Expr {
    const first = this.peek();
    const parts: Token[] = [];
    while (this.peek().kind === "string") parts.push(this.next());

    const isBytes = parts.map((part) => (part.prefix ?? "").includes("b"));
    if (isBytes.some(Boolean) && !isBytes.every(Boolean)) {
      throw new PythonSyntaxError("cannot mix bytes and nonbytes literals", first.line);
    }

    const formatted = parts.some((part) => (part.prefix ?? "").includes("f"));
    if (!formatted) {
      return {
        kind: "Constant",
        type: isBytes[0] ? "bytes" : "str",
        value: parts.map((part) => part.value).join(""),
        line: first.line,
      };
    }

    const values: Expr[] = [];
    for (const part of parts) {
      if ((part.prefix ?? "").includes("f")) {
        values.push(...this.parseFormattedFields(part.raw ?? "", part.line));
      } else {
        values.push({ kind: "Constant", type: "str", value: part.value, line: part.line });
      }
    }
    return { kind: "JoinedStr", values, line: first.line };
  }

  /**
   * Replacement fields of an f-string body, parsed as expressions
   */
  private parseFormattedFields(body: string, line: number): Expr[] {
    const fields: Expr[] = [];
    let i = 0;
    while (i < body.length) {
      const ch = body[i];
      if (ch === "{") {
        if (body[i + 1] === "{") {
          i += 2;
          continue;
        }
        const bounds = findFieldBounds(body, i + 1);
        if (bounds.close === -1) throw new PythonSyntaxError("f-string: expecting '}'", line);
        const text = body.slice(i + 1, bounds.expressionEnd);
        if (text.trim() === "") {
          throw new PythonSyntaxError("f-string: valid expression required before '}'", line);
        }
        fields.push(this.parseEmbeddedExpression(text, line));
        if (bounds.specStart !== -1) {
          fields.push(...this.parseFormattedFields(body.slice(bounds.specStart, bounds.close), line));
        }
        i = bounds.close + 1;
        continue;
      }
      if (ch === "}") {
        if (body[i + 1] === "}") {
          i += 2;
          continue;
        }
        throw new PythonSyntaxError("f-string: single '}' is not allowed", line);
      }
      i++;
    }
    return fields;
  }

  private parseEmbeddedExpression(text: string, line: number): Expr {
    try {
      const tokens = tokenize(`(${text})`, this.deadline).map((token) => ({ ...token, line: token.line + line - 1 }));
      return new Parser(tokens, this.deadline).parseStandaloneExpression();
    } catch (error) {
      if (error instanceof PythonSyntaxError && !error.message.startsWith("f-string")) {
        throw new PythonSyntaxError(`f-string: ${error.message}`, error.line);
      }
      throw error;
    }
  }
}

function findFieldBounds(body: string, start: number): { expressionEnd: number; specStart: number; close: number } {
  let depth = 0;
  let quote: string | null = null;
  let expressionEnd = -1;
  let specStart = -1;

  for (let j = start; j < body.length; j++) {
    const c = body[j];
    if (quote) {
      if (c === quote) quote = null;
      continue;
    }
    if (specStart !== -1) {
      if (c === "{") depth++;
      else if (c === "}") {
        if (depth === 0) return { expressionEnd, specStart, close: j };
        depth--;
      }
      continue;
    }
    if (c === "'" || c === '"') {
      quote = c;
    } else if (c === "(" || c === "[" || c === "{") {
      depth++;
    } else if (c === ")" || c === "]") {
      depth--;
    } else if (c === "}") {
      if (depth === 0) return { expressionEnd: expressionEnd === -1 ? j : expressionEnd, specStart, close: j };
      depth--;
    } else if (depth === 0 && c === "!" && body[j + 1] !== "=") {
      if (expressionEnd === -1) expressionEnd = j;
    } else if (depth === 0 && c === ":") {
      if (expressionEnd === -1) expressionEnd = j;
      specStart = j + 1;
    } else if (depth === 0 && c === "=" && body[j + 1] !== "=" && !"=!<>".includes(body[j - 1] ?? "")) {
      if (expressionEnd === -1) expressionEnd = j;
    }
  }
  return { expressionEnd, specStart, close: -1 };
}
