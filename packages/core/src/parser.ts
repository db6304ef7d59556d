/**
 * PenDraw parser using Chevrotain.
 * Produces a PenDraw AST from source text or a token list.
 */
import {
  CstParser,
  EOF,
  tokenMatcher,
  type CstElement,
  type CstNode,
  type IParserErrorMessageProvider,
  type IRecognitionException,
  type IToken,
  type TokenType,
} from "chevrotain";
import {
  allTokens,
  AdditiveOp,
  And,
  Caret,
  Comma,
  describeTokenType,
  decodeString,
  Else,
  Equals,
  EqualityOp,
  False,
  For,
  FunctionKw,
  Ident,
  If,
  LBrace,
  Let,
  LParen,
  Minus,
  MultiplicativeOp,
  Newline,
  Not,
  NumberLit,
  Or,
  RBrace,
  RelationalOp,
  Return,
  RParen,
  Semicolon,
  Step,
  StringLit,
  To,
  toParserTokens,
  tokenize,
  True,
  Var,
  While,
  type Token,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic, ParseErrorCode } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

const EXPRESSION_MSG = "an expression";
const TERMINATOR_MSG = "newline or ';'";

// The message provider runs when Chevrotain raises an error; with recovery
// off there is at most one per parse, so the last expectation is the one.
let lastExpected: string | undefined;

function describeFound(token: IToken): string {
  if (tokenMatcher(token, EOF)) return "end of input";
  if (tokenMatcher(token, Newline)) return "newline";
  return `'${token.image}'`;
}

function describeAlternatives(paths: TokenType[][][]): string {
  const names: string[] = [];
  for (const alt of paths) {
    for (const path of alt) {
      const first = path[0];
      if (!first) continue;
      const name = describeTokenType(first);
      if (!names.includes(name)) names.push(name);
    }
  }
  if (names.length === 0) return "something else";
  if (names.length === 1) return names[0];
  return `${names.slice(0, -1).join(", ")} or ${names[names.length - 1]}`;
}

const errorMessageProvider: IParserErrorMessageProvider = {
  buildMismatchTokenMessage({ expected, actual }) {
    lastExpected = describeTokenType(expected);
    return `Expected ${lastExpected} but found ${describeFound(actual)}.`;
  },
  buildNotAllInputParsedMessage({ firstRedundant }) {
    lastExpected = "a statement or end of input";
    return `Unexpected ${describeFound(firstRedundant)}.`;
  },
  buildNoViableAltMessage({ expectedPathsPerAlt, actual, customUserDescription }) {
    lastExpected = customUserDescription ?? describeAlternatives(expectedPathsPerAlt);
    return `Expected ${lastExpected} but found ${describeFound(actual[0])}.`;
  },
  buildEarlyExitMessage({ expectedIterationPaths, actual, customUserDescription }) {
    lastExpected = customUserDescription ?? describeAlternatives([expectedIterationPaths]);
    return `Expected ${lastExpected} but found ${describeFound(actual[0])}.`;
  },
};

class PenCstParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      nodeLocationTracking: "full",
      errorMessageProvider,
    });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.SUBRULE(this.statementList);
  });

  statementList = this.RULE("statementList", () => {
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Newline) },
        { ALT: () => this.CONSUME(Semicolon) },
        { ALT: () => this.SUBRULE(this.statement) },
      ]);
    });
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.varDecl) },
      { ALT: () => this.SUBRULE(this.ifStmt) },
      { ALT: () => this.SUBRULE(this.whileStmt) },
      { ALT: () => this.SUBRULE(this.forStmt) },
      { ALT: () => this.SUBRULE(this.functionDecl) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.exprStmt) },
    ]);
  });

  // Simple statements end at a newline, ';', a closing '}' or end of input.
  terminator = this.RULE("terminator", () => {
    this.OR({
      DEF: [
        { ALT: () => this.CONSUME(Newline) },
        { ALT: () => this.CONSUME(Semicolon) },
        {
          GATE: () => tokenMatcher(this.LA(1), RBrace) || tokenMatcher(this.LA(1), EOF),
          ALT: () => {},
        },
      ],
      ERR_MSG: TERMINATOR_MSG,
    });
  });

  varDecl = this.RULE("varDecl", () => {
    this.OR([
      { ALT: () => this.CONSUME(Var, { LABEL: "keyword" }) },
      { ALT: () => this.CONSUME(Let, { LABEL: "keyword" }) },
    ]);
    this.CONSUME(Ident, { LABEL: "name" });
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expression, { LABEL: "init" });
    });
    this.SUBRULE(this.terminator);
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(Return);
    this.OPTION(() => {
      this.SUBRULE(this.expression, { LABEL: "value" });
    });
    this.SUBRULE(this.terminator);
  });

  // Assignment shares this rule so that a statement is chosen on one token;
  // the visitor checks that the target is a plain name.
  exprStmt = this.RULE("exprStmt", () => {
    this.SUBRULE(this.expression, { LABEL: "target" });
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE2(this.expression, { LABEL: "value" });
    });
    this.SUBRULE(this.terminator);
  });

  ifStmt = this.RULE("ifStmt", () => {
    this.CONSUME(If);
    this.SUBRULE(this.expression, { LABEL: "cond" });
    this.SUBRULE(this.block, { LABEL: "then" });
    this.OPTION(() => {
      this.CONSUME(Else);
      this.OR({
        DEF: [
          { ALT: () => this.SUBRULE2(this.block, { LABEL: "elseBlock" }) },
          { ALT: () => this.SUBRULE(this.ifStmt, { LABEL: "elseIf" }) },
        ],
        ERR_MSG: "'{' or 'if'",
      });
    });
  });

  whileStmt = this.RULE("whileStmt", () => {
    this.CONSUME(While);
    this.SUBRULE(this.expression, { LABEL: "cond" });
    this.SUBRULE(this.block, { LABEL: "body" });
  });

  forStmt = this.RULE("forStmt", () => {
    this.CONSUME(For);
    this.CONSUME(Ident, { LABEL: "variable" });
    this.CONSUME(Equals);
    this.SUBRULE(this.expression, { LABEL: "from" });
    this.CONSUME(To);
    this.SUBRULE2(this.expression, { LABEL: "to" });
    this.OPTION(() => {
      this.CONSUME(Step);
      this.SUBRULE3(this.expression, { LABEL: "step" });
    });
    this.SUBRULE(this.block, { LABEL: "body" });
  });

  functionDecl = this.RULE("functionDecl", () => {
    this.CONSUME(FunctionKw);
    this.CONSUME(Ident, { LABEL: "name" });
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.CONSUME2(Ident, { LABEL: "params" });
      this.MANY(() => {
        this.CONSUME(Comma);
        this.CONSUME3(Ident, { LABEL: "params" });
      });
    });
    this.CONSUME(RParen);
    this.SUBRULE(this.block, { LABEL: "body" });
  });

  block = this.RULE("block", () => {
    this.CONSUME(LBrace);
    this.SUBRULE(this.statementList);
    this.CONSUME(RBrace);
  });

  // --- Expressions, lowest precedence first ---

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.orExpr);
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Or, { LABEL: "operator" });
      this.SUBRULE2(this.andExpr, { LABEL: "operands" });
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.notExpr, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(And, { LABEL: "operator" });
      this.SUBRULE2(this.notExpr, { LABEL: "operands" });
    });
  });

  notExpr = this.RULE("notExpr", () => {
    this.OR({
      DEF: [
        {
          ALT: () => {
            this.CONSUME(Not, { LABEL: "operator" });
            this.SUBRULE(this.notExpr, { LABEL: "operand" });
          },
        },
        { ALT: () => this.SUBRULE(this.equality, { LABEL: "operand" }) },
      ],
      ERR_MSG: EXPRESSION_MSG,
    });
  });

  equality = this.RULE("equality", () => {
    this.SUBRULE(this.relational, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(EqualityOp, { LABEL: "operator" });
      this.SUBRULE2(this.relational, { LABEL: "operands" });
    });
  });

  relational = this.RULE("relational", () => {
    this.SUBRULE(this.additive, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(RelationalOp, { LABEL: "operator" });
      this.SUBRULE2(this.additive, { LABEL: "operands" });
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.term, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(AdditiveOp, { LABEL: "operator" });
      this.SUBRULE2(this.term, { LABEL: "operands" });
    });
  });

  term = this.RULE("term", () => {
    this.SUBRULE(this.power, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp, { LABEL: "operator" });
      this.SUBRULE2(this.power, { LABEL: "operands" });
    });
  });

  // Right-associative: 2 ^ 3 ^ 2 == 2 ^ (3 ^ 2)
  power = this.RULE("power", () => {
    this.SUBRULE(this.unary, { LABEL: "base" });
    this.OPTION(() => {
      this.CONSUME(Caret, { LABEL: "operator" });
      this.SUBRULE(this.power, { LABEL: "exponent" });
    });
  });

  unary = this.RULE("unary", () => {
    this.OR({
      DEF: [
        {
          ALT: () => {
            this.CONSUME(Minus, { LABEL: "operator" });
            this.SUBRULE(this.unary, { LABEL: "operand" });
          },
        },
        { ALT: () => this.SUBRULE(this.primary, { LABEL: "operand" }) },
      ],
      ERR_MSG: EXPRESSION_MSG,
    });
  });

  primary = this.RULE("primary", () => {
    this.OR({
      DEF: [
        { ALT: () => this.CONSUME(NumberLit) },
        { ALT: () => this.CONSUME(StringLit) },
        { ALT: () => this.CONSUME(True) },
        { ALT: () => this.CONSUME(False) },
        {
          ALT: () => {
            this.CONSUME(LParen);
            this.SUBRULE(this.expression, { LABEL: "inner" });
            this.CONSUME(RParen);
          },
        },
        {
          ALT: () => {
            this.CONSUME(Ident, { LABEL: "name" });
            this.OPTION(() => {
              this.CONSUME2(LParen, { LABEL: "call" });
              this.OPTION2(() => {
                this.SUBRULE2(this.expression, { LABEL: "args" });
                this.MANY(() => {
                  this.CONSUME(Comma);
                  this.SUBRULE3(this.expression, { LABEL: "args" });
                });
              });
              this.CONSUME2(RParen, { LABEL: "close" });
            });
          },
        },
      ],
      ERR_MSG: EXPRESSION_MSG,
    });
  });
}

// Singleton parser instance
const cstParser = new PenCstParser();

// --- CST access helpers ---

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

function node(cst: CstNode, key: string): CstNode {
  const found = nodes(cst, key)[0];
  if (!found) throw new Error(`Missing '${key}' in ${cst.name}`);
  return found;
}

function token(cst: CstNode, key: string): IToken {
  const found = tokens(cst, key)[0];
  if (!found) throw new Error(`Missing '${key}' in ${cst.name}`);
  return found;
}

// --- CST to AST visitor ---

function tokenSpan(tok: IToken, file: string): Span {
  return {
    file,
    startLine: tok.startLine ?? 1,
    startCol: tok.startColumn ?? 1,
    endLine: tok.endLine ?? 1,
    endCol: (tok.endColumn ?? 1) + 1,
  };
}

function cstSpan(cst: CstNode, file: string): Span {
  const loc = cst.location;
  if (loc && !Number.isNaN(loc.startOffset)) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(start: Span, end: Span): Span {
  return {
    file: start.file,
    startLine: start.startLine,
    startCol: start.startCol,
    endLine: end.endLine,
    endCol: end.endCol,
  };
}

function visitProgram(cst: CstNode, file: string): AST.Program {
  const statements = visitStatementList(node(cst, "statementList"), file);
  const span =
    statements.length > 0
      ? joinSpans(statements[0].span, statements[statements.length - 1].span)
      : { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
  return { kind: "Program", span, statements };
}

function visitStatementList(cst: CstNode, file: string): AST.Stmt[] {
  return nodes(cst, "statement").map((s) => visitStatement(s, file));
}

function visitStatement(cst: CstNode, file: string): AST.Stmt {
  const children = cst.children;
  if (children["varDecl"]) return visitVarDecl(node(cst, "varDecl"), file);
  if (children["ifStmt"]) return visitIfStmt(node(cst, "ifStmt"), file);
  if (children["whileStmt"]) return visitWhileStmt(node(cst, "whileStmt"), file);
  if (children["forStmt"]) return visitForStmt(node(cst, "forStmt"), file);
  if (children["functionDecl"]) return visitFunctionDecl(node(cst, "functionDecl"), file);
  if (children["returnStmt"]) return visitReturnStmt(node(cst, "returnStmt"), file);
  if (children["block"]) return visitBlock(node(cst, "block"), file);
  if (children["exprStmt"]) return visitExprStmt(node(cst, "exprStmt"), file);
  throw new Error("Unknown statement type");
}

function visitVarDecl(cst: CstNode, file: string): AST.VarDecl {
  const keyword = token(cst, "keyword");
  const nameToken = token(cst, "name");
  const initNode = nodes(cst, "init")[0];
  const decl: AST.VarDecl = {
    kind: "VarDecl",
    span: joinSpans(tokenSpan(keyword, file), tokenSpan(nameToken, file)),
    name: nameToken.image,
  };
  if (initNode) {
    decl.init = visitExpression(initNode, file);
    decl.span = joinSpans(decl.span, decl.init.span);
  }
  return decl;
}

function visitReturnStmt(cst: CstNode, file: string): AST.ReturnStmt {
  const keywordSpan = tokenSpan(token(cst, "Return"), file);
  const valueNode = nodes(cst, "value")[0];
  if (!valueNode) {
    return { kind: "ReturnStmt", span: keywordSpan };
  }
  const value = visitExpression(valueNode, file);
  return { kind: "ReturnStmt", span: joinSpans(keywordSpan, value.span), value };
}

function visitExprStmt(cst: CstNode, file: string): AST.ExprStmt | AST.AssignStmt {
  const target = visitExpression(node(cst, "target"), file);
  const valueNode = nodes(cst, "value")[0];
  if (!valueNode) {
    return { kind: "ExprStmt", span: target.span, expr: target };
  }
  if (target.kind !== "Identifier") {
    const equals = token(cst, "Equals");
    throw new InvalidSyntaxError({
      ...makeDiag(
        "E_UNEXPECTED_TOKEN",
        "Only a variable can be assigned to.",
        tokenSpan(equals, file),
        "Write 'name = value', or '==' to compare."
      ),
      found: "'='",
    });
  }
  const value = visitExpression(valueNode, file);
  return {
    kind: "AssignStmt",
    span: joinSpans(target.span, value.span),
    name: target.name,
    value,
  };
}

function visitIfStmt(cst: CstNode, file: string): AST.IfStmt {
  const stmt: AST.IfStmt = {
    kind: "IfStmt",
    span: cstSpan(cst, file),
    cond: visitExpression(node(cst, "cond"), file),
    then: visitBlock(node(cst, "then"), file),
  };
  const elseBlock = nodes(cst, "elseBlock")[0];
  const elseIf = nodes(cst, "elseIf")[0];
  if (elseBlock) {
    stmt.else = visitBlock(elseBlock, file);
  } else if (elseIf) {
    stmt.else = visitIfStmt(elseIf, file);
  }
  return stmt;
}

function visitWhileStmt(cst: CstNode, file: string): AST.WhileStmt {
  return {
    kind: "WhileStmt",
    span: cstSpan(cst, file),
    cond: visitExpression(node(cst, "cond"), file),
    body: visitBlock(node(cst, "body"), file),
  };
}

function visitForStmt(cst: CstNode, file: string): AST.ForStmt {
  const stmt: AST.ForStmt = {
    kind: "ForStmt",
    span: cstSpan(cst, file),
    variable: token(cst, "variable").image,
    from: visitExpression(node(cst, "from"), file),
    to: visitExpression(node(cst, "to"), file),
    body: visitBlock(node(cst, "body"), file),
  };
  const stepNode = nodes(cst, "step")[0];
  if (stepNode) {
    stmt.step = visitExpression(stepNode, file);
  }
  return stmt;
}

function visitFunctionDecl(cst: CstNode, file: string): AST.FnDecl {
  return {
    kind: "FnDecl",
    span: cstSpan(cst, file),
    name: token(cst, "name").image,
    params: tokens(cst, "params").map((t) => t.image),
    body: visitBlock(node(cst, "body"), file),
  };
}

function visitBlock(cst: CstNode, file: string): AST.Block {
  return {
    kind: "Block",
    span: cstSpan(cst, file),
    statements: visitStatementList(node(cst, "statementList"), file),
  };
}

function visitExpression(cst: CstNode, file: string): AST.Expr {
  return visitLeftAssoc(node(cst, "orExpr"), file);
}

/**
 * Fold `operands (operator operands)*` into left-nested BinaryExprs.
 * Works for every binary level except power.
 */
function visitLeftAssoc(cst: CstNode, file: string): AST.Expr {
  const operands = nodes(cst, "operands");
  const operators = tokens(cst, "operator");
  let left = visitOperand(operands[0], file);
  for (let i = 0; i < operators.length; i++) {
    const right = visitOperand(operands[i + 1], file);
    left = {
      kind: "BinaryExpr",
      span: joinSpans(left.span, right.span),
      op: binaryOp(operators[i].image),
      left,
      right,
    };
  }
  return left;
}

function visitOperand(cst: CstNode, file: string): AST.Expr {
  switch (cst.name) {
    case "andExpr":
    case "equality":
    case "relational":
    case "additive":
    case "term":
      return visitLeftAssoc(cst, file);
    case "notExpr":
      return visitNot(cst, file);
    case "power":
      return visitPower(cst, file);
    default:
      throw new Error(`Unexpected operand rule '${cst.name}'`);
  }
}

function prefixed(opToken: IToken | undefined, op: AST.UnaryOp, operand: AST.Expr, file: string): AST.Expr {
  if (!opToken) return operand;
  return {
    kind: "UnaryExpr",
    span: joinSpans(tokenSpan(opToken, file), operand.span),
    op,
    operand,
  };
}

function visitNot(cst: CstNode, file: string): AST.Expr {
  const operandNode = node(cst, "operand");
  const operand =
    operandNode.name === "notExpr" ? visitNot(operandNode, file) : visitLeftAssoc(operandNode, file);
  return prefixed(tokens(cst, "operator")[0], "not", operand, file);
}

function visitUnary(cst: CstNode, file: string): AST.Expr {
  const operandNode = node(cst, "operand");
  const operand =
    operandNode.name === "unary" ? visitUnary(operandNode, file) : visitPrimary(operandNode, file);
  return prefixed(tokens(cst, "operator")[0], "-", operand, file);
}

function visitPower(cst: CstNode, file: string): AST.Expr {
  const base = visitUnary(node(cst, "base"), file);
  const exponentNode = nodes(cst, "exponent")[0];
  if (!exponentNode) return base;
  const exponent = visitPower(exponentNode, file);
  return {
    kind: "BinaryExpr",
    span: joinSpans(base.span, exponent.span),
    op: "^",
    left: base,
    right: exponent,
  };
}

function visitPrimary(cst: CstNode, file: string): AST.Expr {
  const children = cst.children;
  if (children["NumberLit"]) {
    const t = token(cst, "NumberLit");
    return { kind: "NumberLiteral", span: tokenSpan(t, file), value: Number(t.image) };
  }
  if (children["StringLit"]) {
    const t = token(cst, "StringLit");
    return { kind: "StringLiteral", span: tokenSpan(t, file), value: decodeString(t.image) };
  }
  if (children["True"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "True"), file), value: true };
  }
  if (children["False"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "False"), file), value: false };
  }
  if (children["inner"]) {
    return visitExpression(node(cst, "inner"), file);
  }
  const nameToken = token(cst, "name");
  if (!children["call"]) {
    return { kind: "Identifier", span: tokenSpan(nameToken, file), name: nameToken.image };
  }
  return {
    kind: "CallExpr",
    span: joinSpans(tokenSpan(nameToken, file), tokenSpan(token(cst, "close"), file)),
    name: nameToken.image,
    args: nodes(cst, "args").map((a) => visitExpression(a, file)),
  };
}

function binaryOp(image: string): AST.BinaryOp {
  switch (image) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
    case "^":
    case "<":
    case ">":
    case "<=":
    case ">=":
    case "==":
    case "!=":
    case "and":
    case "or":
      return image;
    default:
      throw new Error(`Unknown operator '${image}'`);
  }
}

// --- Errors ---

/** Raised by the CST visitor for input the grammar accepts but the language does not. */
class InvalidSyntaxError extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "InvalidSyntaxError";
  }
}

const EXPRESSION_RULES = new Set(["notExpr", "unary", "primary"]);
const MISSING_TOKEN_RULES = new Set(["terminator", "ifStmt"]);

function errorCode(err: IRecognitionException): ParseErrorCode {
  switch (err.name) {
    case "MismatchedTokenException":
      return "E_MISSING_TOKEN";
    case "NoViableAltException":
    case "EarlyExitException": {
      const stack = err.context.ruleStack;
      const rule = stack[stack.length - 1] ?? "";
      if (EXPRESSION_RULES.has(rule)) return "E_INVALID_EXPR";
      if (MISSING_TOKEN_RULES.has(rule)) return "E_MISSING_TOKEN";
      return "E_UNEXPECTED_TOKEN";
    }
    default:
      return "E_UNEXPECTED_TOKEN";
  }
}

/** Where the end of input sits, for errors reported on the EOF token. */
function endOfInput(toks: readonly Token[], file: string): Span {
  const last = toks[toks.length - 1];
  if (!last) return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
  const line = last.line;
  const col = last.kind === "EOF" ? last.column : last.column + last.lexeme.length;
  return { file, startLine: line, startCol: col, endLine: line, endCol: col };
}

function errorSpan(tok: IToken, toks: readonly Token[], file: string): Span {
  if (tokenMatcher(tok, EOF) || Number.isNaN(tok.startOffset)) {
    return endOfInput(toks, file);
  }
  return tokenSpan(tok, file);
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

/**
 * Parse source text (lexing it first) or an already lexed token list.
 * Stops at the first error.
 */
export function parse(input: string | readonly Token[], file: string = "<stdin>"): ParseResult {
  let toks: readonly Token[];
  if (typeof input === "string") {
    const lexed = tokenize(input, file);
    if (lexed.diagnostics.length > 0) {
      return { diagnostics: lexed.diagnostics };
    }
    toks = lexed.tokens;
  } else {
    toks = input;
  }

  const converted = toParserTokens(toks);
  if (converted.badIndex !== undefined) {
    const bad = toks[converted.badIndex];
    return {
      diagnostics: [
        {
          ...makeDiag(
            "E_UNEXPECTED_TOKEN",
            `Unexpected token '${bad.lexeme}'.`,
            {
              file,
              startLine: bad.line,
              startCol: bad.column,
              endLine: bad.line,
              endCol: bad.column + bad.lexeme.length,
            },
            "Check syntax near this location."
          ),
          found: `'${bad.lexeme}'`,
        },
      ],
    };
  }

  lastExpected = undefined;
  cstParser.input = converted.tokens;
  const cst = cstParser.program();

  const err = cstParser.errors[0];
  if (err) {
    const diag: Diagnostic = {
      ...makeDiag(
        errorCode(err),
        err.message,
        errorSpan(err.token, toks, file),
        "Check syntax near this location."
      ),
      found: describeFound(err.token),
    };
    if (lastExpected !== undefined) {
      diag.expected = lastExpected;
    }
    return { diagnostics: [diag] };
  }

  try {
    return { program: visitProgram(cst, file), diagnostics: [] };
  } catch (e) {
    if (e instanceof InvalidSyntaxError) {
      return { diagnostics: [e.diagnostic] };
    }
    throw e;
  }
}
