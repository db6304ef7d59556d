/**
 * PenDraw canonical formatter (AST pretty-printer).
 * Produces deterministic, idempotent output. Comments are not preserved.
 */
import type * as AST from "./ast.js";

const INDENT = "  ";

// Binding strength, higher = tighter. Mirrors the parser's rule nesting.
const PRECEDENCE: Record<AST.BinaryOp, number> = {
  or: 1,
  and: 2,
  "==": 4, "!=": 4,
  "<": 5, ">": 5, "<=": 5, ">=": 5,
  "+": 6, "-": 6,
  "*": 7, "/": 7, "%": 7,
  "^": 8,
};
const NOT_PREC = 3;
const NEG_PREC = 9;
const ATOM_PREC = 10;

function precedenceOf(e: AST.Expr): number {
  if (e.kind === "BinaryExpr") return PRECEDENCE[e.op];
  if (e.kind === "UnaryExpr") return e.op === "not" ? NOT_PREC : NEG_PREC;
  return ATOM_PREC;
}

function needsParens(child: AST.Expr, parent: AST.BinaryExpr, isRight: boolean): boolean {
  const childPrec = precedenceOf(child);
  const parentPrec = PRECEDENCE[parent.op];
  if (childPrec < parentPrec) return true;
  if (childPrec > parentPrec) return false;
  // Same level: '^' groups to the right, everything else to the left.
  return parent.op === "^" ? !isRight : isRight;
}

export function format(program: AST.Program): string {
  const lines: string[] = [];
  program.statements.forEach((s, i) => {
    const prev = program.statements[i - 1];
    // Top-level functions get a blank line around them
    if (prev && (s.kind === "FnDecl" || prev.kind === "FnDecl")) {
      lines.push("");
    }
    lines.push(formatStmt(s, 0));
  });
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

function formatStmt(s: AST.Stmt, depth: number): string {
  const prefix = INDENT.repeat(depth);
  switch (s.kind) {
    case "VarDecl":
      return s.init ? `${prefix}var ${s.name} = ${formatExpr(s.init)}` : `${prefix}var ${s.name}`;
    case "AssignStmt":
      return `${prefix}${s.name} = ${formatExpr(s.value)}`;
    case "ReturnStmt":
      return s.value ? `${prefix}return ${formatExpr(s.value)}` : `${prefix}return`;
    case "ExprStmt":
      return `${prefix}${formatExpr(s.expr)}`;
    case "Block":
      return `${prefix}${formatBlock(s, depth)}`;
    case "IfStmt":
      return `${prefix}${formatIf(s, depth)}`;
    case "WhileStmt":
      return `${prefix}while ${formatExpr(s.cond)} ${formatBlock(s.body, depth)}`;
    case "ForStmt": {
      const step = s.step ? ` step ${formatExpr(s.step)}` : "";
      return `${prefix}for ${s.variable} = ${formatExpr(s.from)} to ${formatExpr(s.to)}${step} ${formatBlock(s.body, depth)}`;
    }
    case "FnDecl":
      return `${prefix}function ${s.name}(${s.params.join(", ")}) ${formatBlock(s.body, depth)}`;
  }
}

function formatIf(s: AST.IfStmt, depth: number): string {
  let out = `if ${formatExpr(s.cond)} ${formatBlock(s.then, depth)}`;
  if (s.else) {
    out += s.else.kind === "IfStmt"
      ? ` else ${formatIf(s.else, depth)}`
      : ` else ${formatBlock(s.else, depth)}`;
  }
  return out;
}

function formatBlock(block: AST.Block, depth: number): string {
  if (block.statements.length === 0) return "{}";
  const body = block.statements.map((s) => formatStmt(s, depth + 1)).join("\n");
  return `{\n${body}\n${INDENT.repeat(depth)}}`;
}

export function formatExpr(e: AST.Expr): string {
  switch (e.kind) {
    case "NumberLiteral":
      return formatNumber(e.value);
    case "StringLiteral":
      return formatString(e.value);
    case "BoolLiteral":
      return String(e.value);
    case "Identifier":
      return e.name;
    case "CallExpr":
      return `${e.name}(${e.args.map(formatExpr).join(", ")})`;
    case "BinaryExpr": {
      let leftStr = formatExpr(e.left);
      let rightStr = formatExpr(e.right);
      if (needsParens(e.left, e, false)) leftStr = `(${leftStr})`;
      if (needsParens(e.right, e, true)) rightStr = `(${rightStr})`;
      return `${leftStr} ${e.op} ${rightStr}`;
    }
    case "UnaryExpr": {
      const operandStr = formatExpr(e.operand);
      if (e.op === "not") {
        return precedenceOf(e.operand) < NOT_PREC ? `not (${operandStr})` : `not ${operandStr}`;
      }
      // Parenthesize nested negation and anything looser than unary minus
      if (e.operand.kind === "UnaryExpr" || precedenceOf(e.operand) < NEG_PREC) {
        return `-(${operandStr})`;
      }
      return `-${operandStr}`;
    }
  }
}

function formatNumber(value: number): string {
  // Literals are never negative; 1e999 is the only way to spell infinity.
  if (!Number.isFinite(value)) return "1e999";
  return String(value);
}

function formatString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case '"': out += '\\"'; break;
      case "\n": out += "\\n"; break;
      case "\t": out += "\\t"; break;
      default: out += ch;
    }
  }
  return out + '"';
}
