/**
 * @pendraw/core - PenDraw language core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { tokenize, decodeString } from "./lexer.js";
export type { Token, TokenKind, LexResult } from "./lexer.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { Scope } from "./scope.js";
export { validate } from "./validator.js";
export type { ValidateOptions } from "./validator.js";
export { format, formatExpr } from "./formatter.js";
export {
  execute,
  runProgram,
  evalStatement,
  createSession,
  resetSession,
  createTurtle,
  arityAccepts,
  describeArity,
  evalBinaryOp,
  toCondition,
  typeName,
  formatValue,
  PenRuntimeError,
  DEFAULT_MAX_CALL_DEPTH,
} from "./evaluator.js";
export type {
  PenValue,
  TraceEvent,
  TraceEventType,
  TraceData,
  DrawingSurface,
  TurtleState,
  Arity,
  Builtin,
  BuiltinContext,
  ExecLimits,
  SessionOptions,
  Session,
  UserFn,
  RunResult,
} from "./evaluator.js";
export {
  resolveConfig,
  loadConfig,
  defaultConfig,
  ConfigSchema,
  ConfigError,
  PROJECT_CONFIG_FILE,
  MAX_CALL_DEPTH,
} from "./config.js";
export type { PenConfig, ResolvedConfig } from "./config.js";
