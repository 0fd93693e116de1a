/**
 * Python syntax tree produced by the parser. Every node carries its starting line.
 */

interface NodeBase {
  line: number;
}

export interface NameExpr extends NodeBase {
  kind: "Name";
  id: string;
}

export interface ConstantExpr extends NodeBase {
  kind: "Constant";
  type: "str" | "bytes" | "number" | "bool" | "none" | "ellipsis";
  value: string;
}

export interface JoinedStrExpr extends NodeBase {
  kind: "JoinedStr";
  values: Expr[];
}

export interface AttributeExpr extends NodeBase {
  kind: "Attribute";
  value: Expr;
  attr: string;
}

export interface SubscriptExpr extends NodeBase {
  kind: "Subscript";
  value: Expr;
  slice: Expr;
}

export interface SliceExpr extends NodeBase {
  kind: "Slice";
  lower?: Expr;
  upper?: Expr;
  step?: Expr;
}

export interface Keyword {
  /** Absent for `**mapping` */
  name?: string;
  value: Expr;
  line: number;
}

export interface CallExpr extends NodeBase {
  kind: "Call";
  func: Expr;
  args: Expr[];
  keywords: Keyword[];
}

export interface BinOpExpr extends NodeBase {
  kind: "BinOp";
  op: string;
  left: Expr;
  right: Expr;
}

export interface UnaryOpExpr extends NodeBase {
  kind: "UnaryOp";
  op: string;
  operand: Expr;
}

export interface BoolOpExpr extends NodeBase {
  kind: "BoolOp";
  op: "and" | "or";
  values: Expr[];
}

export interface CompareExpr extends NodeBase {
  kind: "Compare";
  left: Expr;
  ops: string[];
  comparators: Expr[];
}

export interface IfExpExpr extends NodeBase {
  kind: "IfExp";
  test: Expr;
  body: Expr;
  orelse: Expr;
}

export interface Parameter {
  name: string;
  kind: "positional" | "vararg" | "kwarg";
  annotation?: Expr;
  default?: Expr;
  line: number;
}

export interface LambdaExpr extends NodeBase {
  kind: "Lambda";
  params: Parameter[];
  body: Expr;
}

export interface NamedExpr extends NodeBase {
  kind: "NamedExpr";
  target: NameExpr;
  value: Expr;
}

export interface SequenceExpr extends NodeBase {
  kind: "List" | "Tuple" | "Set";
  elts: Expr[];
}

export interface DictExpr extends NodeBase {
  kind: "Dict";
  /** null marks a `**mapping` entry */
  keys: Array<Expr | null>;
  values: Expr[];
}

export interface Comprehension {
  target: Expr;
  iter: Expr;
  ifs: Expr[];
  isAsync: boolean;
  line: number;
}

export interface ComprehensionExpr extends NodeBase {
  kind: "ListComp" | "SetComp" | "GeneratorExp";
  elt: Expr;
  generators: Comprehension[];
}

export interface DictCompExpr extends NodeBase {
  kind: "DictComp";
  key: Expr;
  value: Expr;
  generators: Comprehension[];
}

export interface StarredExpr extends NodeBase {
  kind: "Starred";
  value: Expr;
}

export interface AwaitExpr extends NodeBase {
  kind: "Await";
  value: Expr;
}

export interface YieldExpr extends NodeBase {
  kind: "Yield" | "YieldFrom";
  value?: Expr;
}

export type Expr =
  | NameExpr
  | ConstantExpr
  | JoinedStrExpr
  | AttributeExpr
  | SubscriptExpr
  | SliceExpr
  | CallExpr
  | BinOpExpr
  | UnaryOpExpr
  | BoolOpExpr
  | CompareExpr
  | IfExpExpr
  | LambdaExpr
  | NamedExpr
  | SequenceExpr
  | DictExpr
  | ComprehensionExpr
  | DictCompExpr
  | StarredExpr
  | AwaitExpr
  | YieldExpr;

export interface Alias {
  name: string;
  asname?: string;
  line: number;
}

export interface ExceptHandler {
  type?: Expr;
  name?: string;
  body: Stmt[];
  line: number;
}

export interface WithItem {
  context: Expr;
  vars?: Expr;
}

export interface ExprStmt extends NodeBase {
  kind: "Expr";
  value: Expr;
}

export interface AssignStmt extends NodeBase {
  kind: "Assign";
  targets: Expr[];
  value: Expr;
}

export interface AugAssignStmt extends NodeBase {
  kind: "AugAssign";
  target: Expr;
  op: string;
  value: Expr;
}

export interface AnnAssignStmt extends NodeBase {
  kind: "AnnAssign";
  target: Expr;
  annotation: Expr;
  value?: Expr;
}

export interface ImportStmt extends NodeBase {
  kind: "Import";
  names: Alias[];
}

export interface ImportFromStmt extends NodeBase {
  kind: "ImportFrom";
  module: string;
  level: number;
  names: Alias[];
}

export interface FunctionDefStmt extends NodeBase {
  kind: "FunctionDef";
  name: string;
  params: Parameter[];
  returns?: Expr;
  body: Stmt[];
  decorators: Expr[];
  isAsync: boolean;
}

export interface ClassDefStmt extends NodeBase {
  kind: "ClassDef";
  name: string;
  bases: Expr[];
  keywords: Keyword[];
  body: Stmt[];
  decorators: Expr[];
}

export interface ReturnStmt extends NodeBase {
  kind: "Return";
  value?: Expr;
}

export interface DeleteStmt extends NodeBase {
  kind: "Delete";
  targets: Expr[];
}

export interface KeywordStmt extends NodeBase {
  kind: "Pass" | "Break" | "Continue";
}

export interface ScopeStmt extends NodeBase {
  kind: "Global" | "Nonlocal";
  names: string[];
}

export interface IfStmt extends NodeBase {
  kind: "If";
  test: Expr;
  body: Stmt[];
  orelse: Stmt[];
  /** Set on the nested If that an `elif` clause becomes */
  isElif: boolean;
}

export interface ForStmt extends NodeBase {
  kind: "For";
  target: Expr;
  iter: Expr;
  body: Stmt[];
  orelse: Stmt[];
  isAsync: boolean;
}

export interface WhileStmt extends NodeBase {
  kind: "While";
  test: Expr;
  body: Stmt[];
  orelse: Stmt[];
}

export interface WithStmt extends NodeBase {
  kind: "With";
  items: WithItem[];
  body: Stmt[];
  isAsync: boolean;
}

export interface TryStmt extends NodeBase {
  kind: "Try";
  body: Stmt[];
  handlers: ExceptHandler[];
  orelse: Stmt[];
  finalbody: Stmt[];
}

export interface RaiseStmt extends NodeBase {
  kind: "Raise";
  exc?: Expr;
  cause?: Expr;
}

export interface AssertStmt extends NodeBase {
  kind: "Assert";
  test: Expr;
  msg?: Expr;
}

export type Stmt =
  | ExprStmt
  | AssignStmt
  | AugAssignStmt
  | AnnAssignStmt
  | ImportStmt
  | ImportFromStmt
  | FunctionDefStmt
  | ClassDefStmt
  | ReturnStmt
  | DeleteStmt
  | KeywordStmt
  | ScopeStmt
  | IfStmt
  | ForStmt
  | WhileStmt
  | WithStmt
  | TryStmt
  | RaiseStmt
  | AssertStmt;

export interface Module {
  body: Stmt[];
}
