/**
 * PenDraw AST node definitions.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: number;
}

export interface StringLiteral extends BaseNode {
  kind: "StringLiteral";
  value: string;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export type Literal = NumberLiteral | StringLiteral | BoolLiteral;

export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

// --- Operators ---

export type ArithmeticOp = "+" | "-" | "*" | "/" | "%" | "^";
export type ComparisonOp = "<" | ">" | "<=" | ">=";
export type EqualityOp = "==" | "!=";
export type LogicalOp = "and" | "or";

export type BinaryOp = ArithmeticOp | ComparisonOp | EqualityOp | LogicalOp;

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "-" | "not";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  name: string;
  args: Expr[];
}

export type Expr =
  | Literal
  | Identifier
  | BinaryExpr
  | UnaryExpr
  | CallExpr;

// --- Statements ---
export interface VarDecl extends BaseNode {
  kind: "VarDecl";
  name: string;
  init?: Expr;
}

export interface AssignStmt extends BaseNode {
  kind: "AssignStmt";
  name: string;
  value: Expr;
}

export interface Block extends BaseNode {
  kind: "Block";
  statements: Stmt[];
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  cond: Expr;
  then: Block;
  else?: Block | IfStmt; // `else if` chains nest an IfStmt
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  cond: Expr;
  body: Block;
}

export interface ForStmt extends BaseNode {
  kind: "ForStmt";
  variable: string;
  from: Expr;
  to: Expr;
  step?: Expr;
  body: Block;
}

export interface FnDecl extends BaseNode {
  kind: "FnDecl";
  name: string;
  params: string[];
  body: Block;
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value?: Expr;
}

export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expr: Expr;
}

export type Stmt =
  | VarDecl
  | AssignStmt
  | IfStmt
  | WhileStmt
  | ForStmt
  | FnDecl
  | ReturnStmt
  | ExprStmt
  | Block;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  statements: Stmt[];
}
