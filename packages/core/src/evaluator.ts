/**
 * PenDraw evaluator - walks the AST against a session and a DrawingSurface.
 */
import * as crypto from "node:crypto";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic, RuntimeErrorCode } from "./diagnostics.js";
import { parse } from "./parser.js";
import { Scope } from "./scope.js";

// --- Value types ---
export type PenValue = number | string | boolean | null;

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "stmt_start"
  | "stmt_end"
  | "fn_call_start"
  | "fn_call_end"
  | "for_start"
  | "for_end"
  | "draw";

export type TraceData = { [key: string]: PenValue | PenValue[] };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Drawing surface ---

/**
 * Rendering capability the interpreter draws on. Coordinates are in turtle
 * space: origin at the centre, y growing upwards, angles in degrees.
 */
export interface DrawingSurface {
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  setPenDown(down: boolean): void;
  setColor(color: string): void;
  setWidth(width: number): void;
  setFill(fill: boolean): void;
  drawCircle(radius: number, cx?: number, cy?: number): void;
  drawRectangle(width: number, height: number, x?: number, y?: number): void;
  drawLine(x1: number, y1: number, x2: number, y2: number): void;
  drawPolygon(points: ReadonlyArray<readonly [number, number]>): void;
  drawArc(width: number, height: number, angle: number): void;
  clear(): void;
  resetState(): void;
  present(): void;
}

export interface TurtleState {
  x: number;
  y: number;
  /** Degrees; 0 points along +x, counter-clockwise positive. */
  heading: number;
  penDown: boolean;
}

export function createTurtle(): TurtleState {
  return { x: 0, y: 0, heading: 90, penDown: true };
}

// --- Built-in interface ---

/** Accepted argument counts: exact, a set, or a lower bound with an optional step. */
export type Arity = number | number[] | { min: number; multipleOf?: number };

export interface BuiltinContext {
  surface: DrawingSurface;
  turtle: TurtleState;
}

export interface Builtin {
  name: string;
  kind: "draw" | "math";
  arity: Arity;
  /** Usage line shown in help and arity errors, e.g. "circle(r [, x, y])". */
  signature: string;
  execute(args: PenValue[], ctx: BuiltinContext): PenValue;
}

export function arityAccepts(arity: Arity, count: number): boolean {
  if (typeof arity === "number") return count === arity;
  if (Array.isArray(arity)) return arity.includes(count);
  if ("min" in arity) {
    if (count < arity.min) return false;
    return arity.multipleOf === undefined || count % arity.multipleOf === 0;
  }
  return false;
}

export function describeArity(arity: Arity): string {
  if (typeof arity === "number") return String(arity);
  if (Array.isArray(arity)) {
    if (arity.length === 1) return String(arity[0]);
    return `${arity.slice(0, -1).join(", ")} or ${arity[arity.length - 1]}`;
  }
  if ("min" in arity) {
    const step = arity.multipleOf === 2 ? "an even number of" : "";
    return step ? `${step} at least ${arity.min}` : `at least ${arity.min}`;
  }
  return "?";
}

// --- Runtime error ---
export class PenRuntimeError extends Error {
  code: RuntimeErrorCode;
  span?: Span;
  hint?: string;
  /** Names of the user functions active when the error was raised, outermost first. */
  frames?: string[];

  constructor(code: RuntimeErrorCode, message: string, span?: Span, hint?: string) {
    super(message);
    this.name = "PenRuntimeError";
    this.code = code;
    this.span = span;
    this.hint = hint;
  }

  toDiagnostic(): Diagnostic {
    const diag: Diagnostic = { code: this.code, message: this.message };
    if (this.span) diag.span = this.span;
    if (this.hint) diag.hint = this.hint;
    if (this.frames && this.frames.length > 0) diag.stack = this.frames;
    return diag;
  }
}

// --- Session ---

export interface ExecLimits {
  /** Wall-clock budget per run, in milliseconds. */
  timeMs?: number;
  maxCallDepth?: number;
}

export const DEFAULT_MAX_CALL_DEPTH = 200;

export interface SessionOptions {
  builtins?: Map<string, Builtin>;
  trace?: (event: TraceEvent) => void;
  signal?: AbortSignal;
  limits?: ExecLimits;
  runId?: string;
}

export interface UserFn {
  decl: AST.FnDecl;
}

export interface Session {
  readonly globals: Scope<PenValue>;
  readonly functions: Map<string, UserFn>;
  readonly turtle: TurtleState;
  readonly builtins: Map<string, Builtin>;
  readonly surface: DrawingSurface;
  readonly runId: string;
  trace?: (event: TraceEvent) => void;
  signal?: AbortSignal;
  limits: ExecLimits;
  /** Names of the user functions currently executing, outermost first. */
  callStack: string[];
}

export function createSession(surface: DrawingSurface, options: SessionOptions = {}): Session {
  return {
    globals: new Scope<PenValue>(),
    functions: new Map(),
    turtle: createTurtle(),
    builtins: options.builtins ?? new Map(),
    surface,
    runId: options.runId ?? crypto.randomUUID(),
    trace: options.trace,
    signal: options.signal,
    limits: options.limits ?? {},
    callStack: [],
  };
}

/** Forget variables, functions and turtle position; the surface is left alone. */
export function resetSession(session: Session): Session {
  return createSession(session.surface, {
    builtins: session.builtins,
    trace: session.trace,
    signal: session.signal,
    limits: session.limits,
    runId: session.runId,
  });
}

export type RunResult =
  | { status: "completed"; value?: PenValue }
  | { status: "error"; error: Diagnostic };

// --- Completion records ---
type Completion =
  | { kind: "normal"; value?: PenValue }
  | { kind: "return"; value: PenValue };

const NORMAL: Completion = { kind: "normal" };

// Per-run state threaded through evaluation
interface Runtime {
  session: Session;
  deadline?: number;
  emit: (event: TraceEventType, span?: Span, data?: TraceData) => void;
}

function checkLimits(rt: Runtime, span: Span): void {
  if (rt.session.signal?.aborted) {
    throw new PenRuntimeError("E_CANCELLED", "Execution cancelled.", span);
  }
  if (rt.deadline !== undefined && Date.now() > rt.deadline) {
    throw new PenRuntimeError(
      "E_TIMEOUT",
      `Execution exceeded the time limit of ${rt.session.limits.timeMs}ms.`,
      span,
      "Raise the limit with --time-limit or limits.timeMs in the config."
    );
  }
}

// --- Public API ---

/** Run a program in a fresh session. */
export function execute(
  program: AST.Program,
  surface: DrawingSurface,
  options: SessionOptions = {}
): RunResult {
  return runProgram(createSession(surface, options), program);
}

/**
 * Run a program against an existing session. Globals, functions and turtle
 * state persist across calls; a failed statement leaves earlier effects.
 */
export function runProgram(session: Session, program: AST.Program): RunResult {
  const runStartMs = Date.now();
  const rt: Runtime = {
    session,
    deadline: session.limits.timeMs !== undefined ? runStartMs + session.limits.timeMs : undefined,
    emit: (event, span, data) => {
      if (session.trace) {
        session.trace({
          ts: new Date().toISOString(),
          runId: session.runId,
          event,
          span,
          data,
        });
      }
    },
  };

  rt.emit("run_start", program.span, { file: program.span.file });

  let value: PenValue | undefined;
  try {
    for (const stmt of program.statements) {
      const completion = execStatement(stmt, session.globals, rt);
      if (completion.kind === "return") {
        value = completion.value;
        break;
      }
      value = completion.value;
    }
  } catch (e) {
    session.callStack = [];
    const durationMs = Date.now() - runStartMs;
    if (e instanceof PenRuntimeError) {
      rt.emit("run_end", program.span, { durationMs, error: e.code, message: e.message });
      return { status: "error", error: e.toDiagnostic() };
    }
    rt.emit("run_end", program.span, {
      durationMs,
      error: "E_HOST",
      message: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }

  rt.emit("run_end", program.span, { durationMs: Date.now() - runStartMs });
  return value === undefined ? { status: "completed" } : { status: "completed", value };
}

/**
 * REPL entry: lex, parse and run `source` against the session.
 * The value is that of a top-level `return`, else of a trailing expression.
 */
export function evalStatement(source: string, session: Session, file: string = "<repl>"): RunResult {
  const parsed = parse(source, file);
  if (!parsed.program) {
    return { status: "error", error: parsed.diagnostics[0] ?? { code: "E_INVALID_EXPR", message: "Nothing to run." } };
  }
  return runProgram(session, parsed.program);
}

// --- Statements ---

function execBlock(stmts: AST.Stmt[], scope: Scope<PenValue>, rt: Runtime): Completion {
  for (const stmt of stmts) {
    const completion = execStatement(stmt, scope, rt);
    if (completion.kind === "return") return completion;
  }
  return NORMAL;
}

function execStatement(stmt: AST.Stmt, scope: Scope<PenValue>, rt: Runtime): Completion {
  checkLimits(rt, stmt.span);
  rt.emit("stmt_start", stmt.span, { kind: stmt.kind });
  const completion = execStatementInner(stmt, scope, rt);
  rt.emit("stmt_end", stmt.span, { kind: stmt.kind });
  return completion;
}

function execStatementInner(stmt: AST.Stmt, scope: Scope<PenValue>, rt: Runtime): Completion {
  switch (stmt.kind) {
    case "VarDecl": {
      const value = stmt.init ? evalExpr(stmt.init, scope, rt) : null;
      scope.declare(stmt.name, value);
      return NORMAL;
    }

    case "AssignStmt": {
      const value = evalExpr(stmt.value, scope, rt);
      if (!scope.assign(stmt.name, value)) {
        throw new PenRuntimeError(
          "E_UNDEFINED_VAR",
          `Undefined variable '${stmt.name}'.`,
          stmt.span,
          `Declare it first with 'var ${stmt.name} = ...'.`
        );
      }
      return NORMAL;
    }

    case "Block":
      return execBlock(stmt.statements, scope.child(), rt);

    case "IfStmt": {
      const cond = toCondition(evalExpr(stmt.cond, scope, rt), stmt.cond.span);
      if (cond) {
        return execBlock(stmt.then.statements, scope.child(), rt);
      }
      if (!stmt.else) return NORMAL;
      if (stmt.else.kind === "IfStmt") {
        return execStatementInner(stmt.else, scope, rt);
      }
      return execBlock(stmt.else.statements, scope.child(), rt);
    }

    case "WhileStmt": {
      for (;;) {
        checkLimits(rt, stmt.span);
        const cond = toCondition(evalExpr(stmt.cond, scope, rt), stmt.cond.span);
        if (!cond) return NORMAL;
        const completion = execBlock(stmt.body.statements, scope.child(), rt);
        if (completion.kind === "return") return completion;
      }
    }

    case "ForStmt":
      return execFor(stmt, scope, rt);

    case "FnDecl":
      rt.session.functions.set(stmt.name, { decl: stmt });
      return NORMAL;

    case "ReturnStmt":
      return { kind: "return", value: stmt.value ? evalExpr(stmt.value, scope, rt) : null };

    case "ExprStmt":
      return { kind: "normal", value: evalExpr(stmt.expr, scope, rt) };
  }
}

function loopBound(value: PenValue, what: string, span: Span): number {
  if (typeof value !== "number") {
    throw new PenRuntimeError(
      "E_TYPE",
      `For loop '${what}' must be a number, got ${typeName(value)}.`,
      span
    );
  }
  return value;
}

function execFor(stmt: AST.ForStmt, scope: Scope<PenValue>, rt: Runtime): Completion {
  const from = loopBound(evalExpr(stmt.from, scope, rt), "from", stmt.from.span);
  const to = loopBound(evalExpr(stmt.to, scope, rt), "to", stmt.to.span);
  const step = stmt.step ? loopBound(evalExpr(stmt.step, scope, rt), "step", stmt.step.span) : 1;

  rt.emit("for_start", stmt.span, { variable: stmt.variable, from, to, step });

  let iterations = 0;
  for (let i = from; (step > 0 && i <= to) || (step < 0 && i >= to); i += step) {
    checkLimits(rt, stmt.span);
    const iterScope = scope.child();
    iterScope.declare(stmt.variable, i);
    const completion = execBlock(stmt.body.statements, iterScope, rt);
    iterations++;
    if (completion.kind === "return") {
      rt.emit("for_end", stmt.span, { iterations });
      return completion;
    }
  }

  rt.emit("for_end", stmt.span, { iterations });
  return NORMAL;
}

// --- Expressions ---

function evalExpr(expr: AST.Expr, scope: Scope<PenValue>, rt: Runtime): PenValue {
  switch (expr.kind) {
    case "NumberLiteral":
    case "StringLiteral":
    case "BoolLiteral":
      return expr.value;

    case "Identifier": {
      const value = scope.lookup(expr.name);
      if (value === undefined) {
        throw new PenRuntimeError(
          "E_UNDEFINED_VAR",
          `Undefined variable '${expr.name}'.`,
          expr.span,
          `Declare it first with 'var ${expr.name} = ...'.`
        );
      }
      return value;
    }

    case "UnaryExpr": {
      const operand = evalExpr(expr.operand, scope, rt);
      if (expr.op === "not") {
        return !toCondition(operand, expr.operand.span);
      }
      if (typeof operand !== "number") {
        throw new PenRuntimeError(
          "E_TYPE",
          `Unary '-' requires a number, got ${typeName(operand)}.`,
          expr.span
        );
      }
      return -operand;
    }

    case "BinaryExpr": {
      if (expr.op === "and" || expr.op === "or") {
        const left = toCondition(evalExpr(expr.left, scope, rt), expr.left.span);
        if (expr.op === "and" && !left) return false;
        if (expr.op === "or" && left) return true;
        return toCondition(evalExpr(expr.right, scope, rt), expr.right.span);
      }
      const left = evalExpr(expr.left, scope, rt);
      const right = evalExpr(expr.right, scope, rt);
      return evalBinaryOp(expr.op, left, right, expr.span);
    }

    case "CallExpr":
      return evalCall(expr, scope, rt);
  }
}

function evalCall(expr: AST.CallExpr, scope: Scope<PenValue>, rt: Runtime): PenValue {
  const session = rt.session;
  const builtin = session.builtins.get(expr.name);

  if (builtin) {
    if (!arityAccepts(builtin.arity, expr.args.length)) {
      throw new PenRuntimeError(
        "E_ARG_COUNT",
        `'${builtin.name}' expects ${describeArity(builtin.arity)} argument(s), got ${expr.args.length}.`,
        expr.span,
        `Usage: ${builtin.signature}`
      );
    }
    const args = expr.args.map((a) => evalExpr(a, scope, rt));
    if (builtin.kind === "draw") {
      rt.emit("draw", expr.span, { command: expr.name, args });
    }
    try {
      return builtin.execute(args, { surface: session.surface, turtle: session.turtle });
    } catch (e) {
      if (e instanceof PenRuntimeError && !e.span) {
        e.span = expr.span;
      }
      throw e;
    }
  }

  const userFn = session.functions.get(expr.name);
  if (!userFn) {
    throw new PenRuntimeError(
      "E_UNDEFINED_FN",
      `Undefined function '${expr.name}'.`,
      expr.span,
      "Define it with 'function name(...) { ... }' before calling it."
    );
  }

  const params = userFn.decl.params;
  if (params.length !== expr.args.length) {
    throw new PenRuntimeError(
      "E_ARG_COUNT",
      `Function '${expr.name}' expects ${params.length} argument(s), got ${expr.args.length}.`,
      expr.span
    );
  }

  const args = expr.args.map((a) => evalExpr(a, scope, rt));

  const maxDepth = session.limits.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (session.callStack.length >= maxDepth) {
    throw withFrames(
      new PenRuntimeError(
        "E_CALL_DEPTH",
        `Maximum call depth of ${maxDepth} exceeded calling '${expr.name}'.`,
        expr.span,
        "Check for recursion without a base case."
      ),
      session
    );
  }

  // User functions see globals, never the caller's locals.
  const fnScope = session.globals.child();
  params.forEach((param, i) => fnScope.declare(param, args[i]));

  session.callStack.push(expr.name);
  rt.emit("fn_call_start", expr.span, { fn: expr.name, args });
  try {
    const completion = execBlock(userFn.decl.body.statements, fnScope, rt);
    const result = completion.kind === "return" ? completion.value : null;
    rt.emit("fn_call_end", expr.span, { fn: expr.name });
    return result;
  } catch (e) {
    if (e instanceof PenRuntimeError) throw withFrames(e, session);
    if (isStackOverflow(e)) {
      // The host stack ran out before maxCallDepth was reached.
      throw withFrames(
        new PenRuntimeError(
          "E_CALL_DEPTH",
          `Call depth of ${session.callStack.length} exhausted the interpreter stack calling '${expr.name}'.`,
          expr.span,
          "Check for recursion without a base case, or lower limits.maxCallDepth."
        ),
        session
      );
    }
    throw e;
  } finally {
    session.callStack.pop();
  }
}

function isStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && e.message.includes("call stack");
}

function withFrames(err: PenRuntimeError, session: Session): PenRuntimeError {
  if (!err.frames) {
    err.frames = [...session.callStack];
  }
  return err;
}

// --- Operators ---

export function typeName(v: PenValue): string {
  return v === null ? "null" : typeof v;
}

/** Condition semantics for if/while/and/or/not: booleans, or numbers (non-zero is true). */
export function toCondition(v: PenValue, span?: Span): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  throw new PenRuntimeError(
    "E_TYPE",
    `Condition must be a boolean or number, got ${typeName(v)}.`,
    span
  );
}

export function evalBinaryOp(
  op: Exclude<AST.BinaryOp, AST.LogicalOp>,
  left: PenValue,
  right: PenValue,
  span?: Span
): PenValue {
  if (op === "==" || op === "!=") {
    if (typeName(left) !== typeName(right)) {
      throw new PenRuntimeError(
        "E_TYPE",
        `Cannot compare ${typeName(left)} with ${typeName(right)} using '${op}'.`,
        span
      );
    }
    const equal = left === right;
    return op === "==" ? equal : !equal;
  }

  if (typeof left !== "number" || typeof right !== "number") {
    throw new PenRuntimeError(
      "E_TYPE",
      `Operator '${op}' requires numbers, got ${typeName(left)} and ${typeName(right)}.`,
      span
    );
  }

  switch (op) {
    case "+": return left + right;
    case "-": return left - right;
    case "*": return left * right;
    case "/":
      if (right === 0) {
        throw new PenRuntimeError("E_DIV_ZERO", "Division by zero.", span);
      }
      return left / right;
    case "%":
      if (right === 0) {
        throw new PenRuntimeError("E_DIV_ZERO", "Modulo by zero.", span);
      }
      // Floored: the result takes the divisor's sign.
      return left - right * Math.floor(left / right);
    case "^": return left ** right;
    case "<": return left < right;
    case ">": return left > right;
    case "<=": return left <= right;
    case ">=": return left >= right;
  }
}

/** Render a value the way the REPL prints it. */
export function formatValue(v: PenValue): string {
  if (v === null) return "null";
  if (typeof v === "number") {
    if (Number.isInteger(v)) return String(v);
    return String(Number(v.toPrecision(12)));
  }
  return String(v);
}
