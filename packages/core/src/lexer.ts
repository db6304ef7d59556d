/**
 * PenDraw lexer using Chevrotain.
 */
import {
  createToken,
  createTokenInstance,
  Lexer,
  tokenMatcher,
  type IToken,
  type TokenType,
} from "chevrotain";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

// Categories (never matched directly)
export const Keyword = createToken({ name: "Keyword", pattern: Lexer.NA });
export const Operator = createToken({ name: "Operator", pattern: Lexer.NA });
export const Delimiter = createToken({ name: "Delimiter", pattern: Lexer.NA });
export const EqualityOp = createToken({ name: "EqualityOp", pattern: Lexer.NA, categories: Operator });
export const RelationalOp = createToken({ name: "RelationalOp", pattern: Lexer.NA, categories: Operator });
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA, categories: Operator });
export const MultiplicativeOp = createToken({
  name: "MultiplicativeOp",
  pattern: Lexer.NA,
  categories: Operator,
});

// Identifiers (keywords point here through longer_alt)
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

function keyword(word: string): TokenType {
  const name = word.charAt(0).toUpperCase() + word.slice(1);
  return createToken({
    name,
    pattern: new RegExp(word),
    longer_alt: Ident,
    categories: Keyword,
  });
}

// Keywords
export const Var = keyword("var");
export const Let = keyword("let");
export const If = keyword("if");
export const Else = keyword("else");
export const While = keyword("while");
export const For = keyword("for");
export const To = keyword("to");
export const Step = keyword("step");
export const FunctionKw = keyword("function");
export const Return = keyword("return");
export const And = keyword("and");
export const Or = keyword("or");
export const Not = keyword("not");
export const True = keyword("true");
export const False = keyword("false");

// Literals
export const NumberLit = createToken({
  name: "NumberLit",
  pattern: /(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?(?![A-Za-z0-9_.])/,
  start_chars_hint: [".", "0", "1", "2", "3", "4", "5", "6", "7", "8", "9"],
});
// A digit run glued to letters, underscores or extra dots
export const MalformedNumber = createToken({
  name: "MalformedNumber",
  pattern: /(?:\d|\.\d)[A-Za-z0-9_.]*/,
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\r\n]|\\.)*"/,
});
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"(?:[^"\\\r\n]|\\.)*/,
});

// Comparison operators (multi-char before single-char)
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: EqualityOp });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: EqualityOp });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: RelationalOp });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: RelationalOp });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: RelationalOp });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: RelationalOp });
export const Equals = createToken({ name: "Equals", pattern: /=/, categories: Operator });

// Arithmetic operators
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOp });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: AdditiveOp });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOp });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOp });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: MultiplicativeOp });
export const Caret = createToken({ name: "Caret", pattern: /\^/, categories: Operator });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/, categories: Delimiter });
export const RParen = createToken({ name: "RParen", pattern: /\)/, categories: Delimiter });
export const LBrace = createToken({ name: "LBrace", pattern: /\{/, categories: Delimiter });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/, categories: Delimiter });
export const Comma = createToken({ name: "Comma", pattern: /,/, categories: Delimiter });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/, categories: Delimiter });
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  line_breaks: true,
  categories: Delimiter,
});

// Whitespace, comments and joined lines
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const LineContinuation = createToken({
  name: "LineContinuation",
  pattern: /\\[ \t]*\r?\n/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens: TokenType[] = [
  WhiteSpace,
  LineContinuation,
  Comment,
  Newline,
  // Multi-char operators first (order critical)
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  Equals,
  Lt,
  Gt,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  Caret,
  LParen,
  RParen,
  LBrace,
  RBrace,
  Comma,
  Semicolon,
  // Keywords (before Ident)
  Var,
  Let,
  If,
  Else,
  While,
  For,
  To,
  Step,
  FunctionKw,
  Return,
  And,
  Or,
  Not,
  True,
  False,
  // Literals
  NumberLit,
  MalformedNumber,
  StringLit,
  UnterminatedString,
  Ident,
  // Categories
  Keyword,
  Operator,
  Delimiter,
  EqualityOp,
  RelationalOp,
  AdditiveOp,
  MultiplicativeOp,
];

export const PenLexer = new Lexer(allTokens);

// --- Public token model ---

export type TokenKind =
  | "NUMBER"
  | "STRING"
  | "IDENTIFIER"
  | "KEYWORD"
  | "OPERATOR"
  | "DELIMITER"
  | "EOF";

export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token; strings keep their quotes and escapes. */
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

function kindOf(token: IToken): TokenKind {
  if (tokenMatcher(token, NumberLit)) return "NUMBER";
  if (tokenMatcher(token, StringLit)) return "STRING";
  if (tokenMatcher(token, Keyword)) return "KEYWORD";
  if (tokenMatcher(token, Operator)) return "OPERATOR";
  if (tokenMatcher(token, Delimiter)) return "DELIMITER";
  return "IDENTIFIER";
}

/** Position just past the last character of `source`. */
function endPosition(source: string): { line: number; column: number } {
  let line = 1;
  let column = 1;
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === "\n") {
      line++;
      column = 1;
    } else if (ch === "\r" && source[i + 1] === "\n") {
      // counted by the following \n
    } else {
      column++;
    }
  }
  return { line, column };
}

function pointSpan(file: string, line: number, column: number, length: number): Span {
  return { file, startLine: line, startCol: column, endLine: line, endCol: column + length };
}

interface PendingError {
  offset: number;
  diag: Diagnostic;
}

/**
 * Convert source text into positioned tokens. Stops at the first lexical
 * error; on failure `tokens` is empty.
 */
export function tokenize(source: string, file: string = "<stdin>"): LexResult {
  const result = PenLexer.tokenize(source);
  const pending: PendingError[] = [];

  for (const err of result.errors) {
    const line = err.line ?? 1;
    const column = err.column ?? 1;
    const ch = source.charAt(err.offset);
    pending.push({
      offset: err.offset,
      diag: makeDiag(
        "E_INVALID_CHAR",
        `Invalid character '${ch}' at line ${line}, column ${column}.`,
        pointSpan(file, line, column, 1),
        "Remove the character or put it inside a string."
      ),
    });
  }

  for (const t of result.tokens) {
    const line = t.startLine ?? 1;
    const column = t.startColumn ?? 1;
    if (tokenMatcher(t, MalformedNumber)) {
      pending.push({
        offset: t.startOffset,
        diag: makeDiag(
          "E_MALFORMED_NUMBER",
          `Malformed number '${t.image}'.`,
          pointSpan(file, line, column, t.image.length),
          "Numbers look like 12, 3.5, .5 or 1e3."
        ),
      });
      break;
    }
    if (tokenMatcher(t, UnterminatedString)) {
      pending.push({
        offset: t.startOffset,
        diag: makeDiag(
          "E_UNTERMINATED_STRING",
          `Unterminated string starting at line ${line}, column ${column}.`,
          pointSpan(file, line, column, t.image.length),
          "Close the string with '\"' before the end of the line."
        ),
      });
      break;
    }
  }

  if (pending.length > 0) {
    pending.sort((a, b) => a.offset - b.offset);
    return { tokens: [], diagnostics: [pending[0].diag] };
  }

  const tokens: Token[] = result.tokens.map((t) => ({
    kind: kindOf(t),
    lexeme: t.image,
    line: t.startLine ?? 1,
    column: t.startColumn ?? 1,
    offset: t.startOffset,
  }));
  const end = endPosition(source);
  tokens.push({ kind: "EOF", lexeme: "", line: end.line, column: end.column, offset: source.length });
  return { tokens, diagnostics: [] };
}

// --- Token[] back to parser input ---

const FIXED_TOKENS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ["==", EqEq],
  ["!=", BangEq],
  ["<=", LtEq],
  [">=", GtEq],
  ["=", Equals],
  ["<", Lt],
  [">", Gt],
  ["+", Plus],
  ["-", Minus],
  ["*", Star],
  ["/", Slash],
  ["%", Percent],
  ["^", Caret],
  ["(", LParen],
  [")", RParen],
  ["{", LBrace],
  ["}", RBrace],
  [",", Comma],
  [";", Semicolon],
  ["\n", Newline],
  ["\r\n", Newline],
  ["var", Var],
  ["let", Let],
  ["if", If],
  ["else", Else],
  ["while", While],
  ["for", For],
  ["to", To],
  ["step", Step],
  ["function", FunctionKw],
  ["return", Return],
  ["and", And],
  ["or", Or],
  ["not", Not],
  ["true", True],
  ["false", False],
]);

function tokenTypeOf(token: Token): TokenType | undefined {
  switch (token.kind) {
    case "NUMBER":
      return NumberLit;
    case "STRING":
      return StringLit;
    case "IDENTIFIER":
      return Ident;
    case "KEYWORD":
    case "OPERATOR":
    case "DELIMITER":
      return FIXED_TOKENS.get(token.lexeme);
    case "EOF":
      return undefined;
  }
}

/**
 * Rebuild Chevrotain tokens from public tokens. Returns the index of the
 * first token that does not map to a known token type, if any.
 */
export function toParserTokens(tokens: readonly Token[]): { tokens: IToken[]; badIndex?: number } {
  const out: IToken[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.kind === "EOF") break;
    const type = tokenTypeOf(t);
    if (!type) return { tokens: out, badIndex: i };
    const isNewline = type === Newline;
    const endColumn = isNewline ? t.column : t.column + t.lexeme.length - 1;
    out.push(
      createTokenInstance(
        type,
        t.lexeme,
        t.offset,
        t.offset + t.lexeme.length - 1,
        t.line,
        t.line,
        t.column,
        endColumn
      )
    );
  }
  return { tokens: out };
}

/** Decode the escapes of a string token's lexeme (quotes included). */
export function decodeString(lexeme: string): string {
  const body = lexeme.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\" || i + 1 >= body.length) {
      out += ch;
      continue;
    }
    const next = body[++i];
    switch (next) {
      case "n":
        out += "\n";
        break;
      case "t":
        out += "\t";
        break;
      default:
        out += next;
    }
  }
  return out;
}

/** Human-readable name of a token type, used in parse error messages. */
export function describeTokenType(type: TokenType): string {
  if (type === Newline) return "newline";
  if (type === NumberLit) return "number";
  if (type === StringLit) return "string";
  if (type === Ident) return "identifier";
  for (const [lexeme, t] of FIXED_TOKENS) {
    if (t === type && lexeme !== "\r\n") return `'${lexeme}'`;
  }
  return type.name === "EOF" ? "end of input" : type.name;
}
