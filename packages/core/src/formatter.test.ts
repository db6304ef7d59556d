/**
 * Tests for the PenDraw formatter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { format } from "./formatter.js";

function fmt(source: string): string {
  const result = parse(source);
  if (!result.program) {
    assert.fail(`parse failed: ${JSON.stringify(result.diagnostics)}`);
  }
  return format(result.program);
}

describe("PenDraw Formatter", () => {
  it("normalizes spacing and indentation", () => {
    assert.equal(
      fmt("var   x=1+2*3\nif x>3{forward( x )}else{ back(1) }"),
      "var x = 1 + 2 * 3\nif x > 3 {\n  forward(x)\n} else {\n  back(1)\n}\n"
    );
  });

  it("separates top-level functions with blank lines", () => {
    assert.equal(
      fmt("function sq(s) {\nreturn s*s\n}\nsq(2)\nsq(3)"),
      "function sq(s) {\n  return s * s\n}\n\nsq(2)\nsq(3)\n"
    );
  });

  it("indents nested blocks", () => {
    assert.equal(
      fmt("function f() {\nfor i = 1 to 2 {\nif i == 1 { return }\n}\n}"),
      "function f() {\n  for i = 1 to 2 {\n    if i == 1 {\n      return\n    }\n  }\n}\n"
    );
  });

  it("prints else-if chains and loop steps", () => {
    assert.equal(
      fmt("if a {x = 1} else if b {x = 2} else {x = 3}"),
      "if a {\n  x = 1\n} else if b {\n  x = 2\n} else {\n  x = 3\n}\n"
    );
    assert.equal(fmt("for i=1 to 10 step 2{fd(i)}"), "for i = 1 to 10 step 2 {\n  fd(i)\n}\n");
  });

  it("keeps only the parentheses the tree needs", () => {
    const cases: Array<[string, string]> = [
      ["(1 + 2) * 3", "(1 + 2) * 3"],
      ["1 - (2 - 3)", "1 - (2 - 3)"],
      ["(1 - 2) - 3", "1 - 2 - 3"],
      ["(2 ^ 3) ^ 2", "(2 ^ 3) ^ 2"],
      ["2 ^ (3 ^ 2)", "2 ^ 3 ^ 2"],
      ["-2 ^ 2", "-2 ^ 2"],
      ["-(2 ^ 2)", "-(2 ^ 2)"],
      ["- -x", "-(-x)"],
      ["not (a or b)", "not (a or b)"],
      ["(not a) == b", "(not a) == b"],
      ["((a))", "a"],
    ];
    for (const [source, expected] of cases) {
      assert.equal(fmt(source), `${expected}\n`, source);
    }
  });

  it("prints empty blocks, bare declarations and empty programs", () => {
    assert.equal(fmt("while false {}"), "while false {}\n");
    assert.equal(fmt("let y"), "var y\n");
    assert.equal(fmt(""), "");
    assert.equal(fmt("# only a comment\n"), "");
  });

  it("normalizes number literals and re-escapes strings", () => {
    assert.equal(fmt("x = 1e3 + .5"), "x = 1000 + 0.5\n");
    const source = String.raw`label("say \"hi\"\t\\")`;
    assert.equal(fmt(source), `${source}\n`);
  });

  it("is idempotent", () => {
    const sources = [
      "var n=5\nfunction star(size){for i=1 to 5{forward(size); right(144)}}\nstar(n*10)",
      "if not (a and b) or c {x = -(1 - 2) ^ 2} else if d {}",
      'color("red") ; width(2)\nwhile x<10 { x = x + 1 }',
    ];
    for (const source of sources) {
      const once = fmt(source);
      assert.equal(fmt(once), once, source);
    }
  });
});
