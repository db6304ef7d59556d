/**
 * PenDraw static checks.
 * Reports problems that are certain to fail at run time, without executing.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { arityAccepts, describeArity, type Builtin } from "./evaluator.js";

export interface ValidateOptions {
  /**
   * Built-in table the program will run with. When given, calls to names
   * that are neither built-ins nor declared functions are reported, and
   * built-in argument counts are checked.
   */
  builtins?: ReadonlyMap<string, Builtin>;
}

export function validate(program: AST.Program, options: ValidateOptions = {}): Diagnostic[] {
  const diags: Diagnostic[] = [];
  const decls = new Map<string, AST.FnDecl[]>();
  const calls: AST.CallExpr[] = [];

  for (const stmt of program.statements) {
    visitStmt(stmt, {
      fnDecl: (decl) => {
        const list = decls.get(decl.name) ?? [];
        list.push(decl);
        decls.set(decl.name, list);
      },
      call: (call) => calls.push(call),
    });
  }

  for (const list of decls.values()) {
    for (const decl of list) {
      validateFnParams(decl, diags);
    }
  }

  const builtins = options.builtins;
  for (const call of calls) {
    // Built-ins win over user functions at run time.
    const builtin = builtins?.get(call.name);
    if (builtin) {
      if (!arityAccepts(builtin.arity, call.args.length)) {
        diags.push(
          makeDiag(
            "E_CALL_ARITY",
            `'${call.name}' expects ${describeArity(builtin.arity)} argument(s), got ${call.args.length}.`,
            call.span,
            `Usage: ${builtin.signature}`
          )
        );
      }
      continue;
    }

    const declared = decls.get(call.name);
    if (!declared) {
      if (builtins) {
        diags.push(
          makeDiag(
            "E_UNKNOWN_FN",
            `Unknown function '${call.name}'.`,
            call.span,
            "Define it with 'function name(...) { ... }' or check the spelling."
          )
        );
      }
      continue;
    }

    // A name defined more than once may change arity between definitions.
    if (declared.length !== 1) continue;
    const params = declared[0].params;
    if (params.length !== call.args.length) {
      diags.push(
        makeDiag(
          "E_CALL_ARITY",
          `Function '${call.name}' expects ${params.length} argument(s), got ${call.args.length}.`,
          call.span,
          `Declared as ${call.name}(${params.join(", ")}).`
        )
      );
    }
  }

  return diags;
}

function validateFnParams(decl: AST.FnDecl, diags: Diagnostic[]): void {
  const seen = new Set<string>();
  for (const param of decl.params) {
    if (seen.has(param)) {
      diags.push(
        makeDiag(
          "E_DUP_PARAM",
          `Duplicate parameter '${param}' in function '${decl.name}'.`,
          decl.span,
          "Use unique parameter names in function declarations."
        )
      );
      continue;
    }
    seen.add(param);
  }
}

interface Visitor {
  fnDecl: (decl: AST.FnDecl) => void;
  call: (call: AST.CallExpr) => void;
}

function visitStmt(stmt: AST.Stmt, visitor: Visitor): void {
  switch (stmt.kind) {
    case "VarDecl":
      if (stmt.init) visitExpr(stmt.init, visitor);
      break;
    case "AssignStmt":
      visitExpr(stmt.value, visitor);
      break;
    case "ReturnStmt":
      if (stmt.value) visitExpr(stmt.value, visitor);
      break;
    case "ExprStmt":
      visitExpr(stmt.expr, visitor);
      break;
    case "Block":
      for (const s of stmt.statements) visitStmt(s, visitor);
      break;
    case "IfStmt":
      visitExpr(stmt.cond, visitor);
      visitStmt(stmt.then, visitor);
      if (stmt.else) visitStmt(stmt.else, visitor);
      break;
    case "WhileStmt":
      visitExpr(stmt.cond, visitor);
      visitStmt(stmt.body, visitor);
      break;
    case "ForStmt":
      visitExpr(stmt.from, visitor);
      visitExpr(stmt.to, visitor);
      if (stmt.step) visitExpr(stmt.step, visitor);
      visitStmt(stmt.body, visitor);
      break;
    case "FnDecl":
      visitor.fnDecl(stmt);
      visitStmt(stmt.body, visitor);
      break;
  }
}

function visitExpr(expr: AST.Expr, visitor: Visitor): void {
  switch (expr.kind) {
    case "BinaryExpr":
      visitExpr(expr.left, visitor);
      visitExpr(expr.right, visitor);
      break;
    case "UnaryExpr":
      visitExpr(expr.operand, visitor);
      break;
    case "CallExpr":
      visitor.call(expr);
      for (const arg of expr.args) visitExpr(arg, visitor);
      break;
    default:
      break;
  }
}
