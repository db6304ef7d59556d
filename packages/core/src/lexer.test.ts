/**
 * Tests for the PenDraw lexer.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { tokenize, decodeString } from "./lexer.js";

function kinds(source: string): string[] {
  const result = tokenize(source);
  assert.equal(result.diagnostics.length, 0, JSON.stringify(result.diagnostics));
  return result.tokens.map((t) => t.kind);
}

describe("PenDraw Lexer", () => {
  it("tokenizes a call with positions", () => {
    const result = tokenize("forward(10)");
    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(result.tokens, [
      { kind: "IDENTIFIER", lexeme: "forward", line: 1, column: 1, offset: 0 },
      { kind: "DELIMITER", lexeme: "(", line: 1, column: 8, offset: 7 },
      { kind: "NUMBER", lexeme: "10", line: 1, column: 9, offset: 8 },
      { kind: "DELIMITER", lexeme: ")", line: 1, column: 11, offset: 10 },
      { kind: "EOF", lexeme: "", line: 1, column: 12, offset: 11 },
    ]);
  });

  it("tokenizes keywords", () => {
    const result = tokenize("var let if else while for to step function return and or not true false");
    assert.deepEqual(result.diagnostics, []);
    const keywords = result.tokens.filter((t) => t.kind === "KEYWORD");
    assert.equal(keywords.length, 15);
  });

  it("distinguishes keywords from identifiers with longer names", () => {
    assert.deepEqual(kinds("format todo iffy stepper variable nothing"), [
      "IDENTIFIER", "IDENTIFIER", "IDENTIFIER", "IDENTIFIER", "IDENTIFIER", "IDENTIFIER", "EOF",
    ]);
  });

  it("keeps keywords case-sensitive", () => {
    assert.deepEqual(kinds("IF While"), ["IDENTIFIER", "IDENTIFIER", "EOF"]);
  });

  it("tokenizes number literals", () => {
    const result = tokenize("12 3.5 .5 1e3 2.5E-2");
    assert.deepEqual(result.diagnostics, []);
    const numbers = result.tokens.filter((t) => t.kind === "NUMBER").map((t) => Number(t.lexeme));
    assert.deepEqual(numbers, [12, 3.5, 0.5, 1000, 0.025]);
  });

  it("tokenizes operators, including two-character ones", () => {
    const result = tokenize("a <= b == c != d >= e = f ^ g % h");
    const ops = result.tokens.filter((t) => t.kind === "OPERATOR").map((t) => t.lexeme);
    assert.deepEqual(ops, ["<=", "==", "!=", ">=", "=", "^", "%"]);
  });

  it("emits newlines as delimiters and skips comments", () => {
    const result = tokenize("fd(10) # move up\nrt(90)");
    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(
      result.tokens.map((t) => t.lexeme),
      ["fd", "(", "10", ")", "\n", "rt", "(", "90", ")", ""]
    );
    assert.equal(result.tokens[4].kind, "DELIMITER");
    assert.equal(result.tokens[5].line, 2);
  });

  it("joins lines ending in a backslash", () => {
    const result = tokenize("circle(10, \\\n  20, 30)");
    assert.deepEqual(result.diagnostics, []);
    assert.equal(result.tokens.some((t) => t.lexeme === "\n"), false);
    const twenty = result.tokens.find((t) => t.lexeme === "20");
    assert.equal(twenty?.line, 2);
    assert.equal(twenty?.column, 3);
  });

  it("places EOF just past the input", () => {
    const result = tokenize("a\nb");
    const eof = result.tokens[result.tokens.length - 1];
    assert.deepEqual(eof, { kind: "EOF", lexeme: "", line: 2, column: 2, offset: 3 });
  });

  it("produces only EOF for empty input", () => {
    assert.deepEqual(kinds(""), ["EOF"]);
  });

  it("keeps string lexemes raw and decodes escapes separately", () => {
    const source = String.raw`"say \"hi\"\n"`;
    const result = tokenize(source);
    assert.equal(result.tokens[0].kind, "STRING");
    assert.equal(result.tokens[0].lexeme, source);
    assert.equal(decodeString(result.tokens[0].lexeme), 'say "hi"\n');
  });

  it("decodes tab, backslash and unknown escapes", () => {
    assert.equal(decodeString(String.raw`"a\tb\\c\qd"`), "a\tb\\cqd");
  });
});

describe("PenDraw Lexer errors", () => {
  it("reports an unterminated string at the opening quote", () => {
    const result = tokenize('"abc');
    assert.equal(result.tokens.length, 0);
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0].code, "E_UNTERMINATED_STRING");
    assert.equal(result.diagnostics[0].span?.startLine, 1);
    assert.equal(result.diagnostics[0].span?.startCol, 1);
  });

  it("reports an unterminated string on a later line", () => {
    const result = tokenize('fd(10)\ncolor("red');
    assert.equal(result.diagnostics[0].code, "E_UNTERMINATED_STRING");
    assert.equal(result.diagnostics[0].span?.startLine, 2);
    assert.equal(result.diagnostics[0].span?.startCol, 7);
  });

  it("reports malformed numbers", () => {
    for (const [source, lexeme] of [
      ["1.2.3", "1.2.3"],
      ["3px", "3px"],
      ["x = 1.", "1."],
    ]) {
      const result = tokenize(source);
      assert.equal(result.diagnostics.length, 1, source);
      assert.equal(result.diagnostics[0].code, "E_MALFORMED_NUMBER");
      assert.equal(result.diagnostics[0].message, `Malformed number '${lexeme}'.`);
    }
  });

  it("reports invalid characters with line and column", () => {
    const result = tokenize("fd(10) @");
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0].code, "E_INVALID_CHAR");
    assert.equal(result.diagnostics[0].message, "Invalid character '@' at line 1, column 8.");
  });

  it("reports only the earliest error", () => {
    const result = tokenize('@ "abc');
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0].code, "E_INVALID_CHAR");
  });

  it("uses the given file name in spans", () => {
    const result = tokenize("$", "shapes.pen");
    assert.equal(result.diagnostics[0].span?.file, "shapes.pen");
  });
});
