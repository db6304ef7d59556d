/**
 * PenDraw diagnostic types for lex/parse/check/runtime errors.
 */
import type { Span } from "./ast.js";

export type LexErrorCode =
  | "E_INVALID_CHAR"
  | "E_UNTERMINATED_STRING"
  | "E_MALFORMED_NUMBER";

export type ParseErrorCode =
  | "E_UNEXPECTED_TOKEN"
  | "E_MISSING_TOKEN"
  | "E_INVALID_EXPR";

export type RuntimeErrorCode =
  | "E_UNDEFINED_VAR"
  | "E_UNDEFINED_FN"
  | "E_TYPE"
  | "E_DIV_ZERO"
  | "E_ARG_COUNT"
  | "E_ARG_TYPE"
  | "E_MATH_DOMAIN"
  | "E_CALL_DEPTH"
  | "E_TIMEOUT"
  | "E_CANCELLED";

export type CheckErrorCode = "E_DUP_PARAM" | "E_CALL_ARITY" | "E_UNKNOWN_FN";

export type HostErrorCode = "E_IO" | "E_CONFIG" | "E_HOST";

export type DiagnosticCode =
  | LexErrorCode
  | ParseErrorCode
  | RuntimeErrorCode
  | CheckErrorCode
  | HostErrorCode;

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  span?: Span;
  hint?: string;
  /** Parse errors: what the grammar wanted at this point. */
  expected?: string;
  /** Parse errors: the offending token, described for humans. */
  found?: string;
  /** Runtime errors raised inside user functions: innermost call last. */
  stack?: string[];
}

const LEX_CODES: ReadonlySet<string> = new Set<LexErrorCode>([
  "E_INVALID_CHAR",
  "E_UNTERMINATED_STRING",
  "E_MALFORMED_NUMBER",
]);

const PARSE_CODES: ReadonlySet<string> = new Set<ParseErrorCode>([
  "E_UNEXPECTED_TOKEN",
  "E_MISSING_TOKEN",
  "E_INVALID_EXPR",
]);

const CHECK_CODES: ReadonlySet<string> = new Set<CheckErrorCode>([
  "E_DUP_PARAM",
  "E_CALL_ARITY",
  "E_UNKNOWN_FN",
]);

export type DiagnosticPhase = "lex" | "parse" | "check" | "runtime" | "host";

export function diagnosticPhase(code: DiagnosticCode): DiagnosticPhase {
  if (LEX_CODES.has(code)) return "lex";
  if (PARSE_CODES.has(code)) return "parse";
  if (CHECK_CODES.has(code)) return "check";
  if (code === "E_IO" || code === "E_CONFIG" || code === "E_HOST") return "host";
  return "runtime";
}

export function makeDiag(
  code: DiagnosticCode,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

const MAX_PRETTY_FRAMES = 10;

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.stack && d.stack.length > 0) {
    const frames = [...d.stack].reverse();
    const shown = frames.slice(0, MAX_PRETTY_FRAMES).join(" <- ");
    const more = frames.length > MAX_PRETTY_FRAMES ? ` <- ... (${frames.length - MAX_PRETTY_FRAMES} more)` : "";
    out += `\n  stack: ${shown}${more}`;
  }
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
