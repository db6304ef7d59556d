/**
 * Tests for the assembled PenDraw built-in library running under the evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { execute, parse, validate, type DrawingSurface, type Program, type RunResult } from "@pendraw/core";
import { getBuiltins } from "./index.js";

class Lines implements DrawingSurface {
  points: Array<[number, number]> = [];

  moveTo(): void {}
  lineTo(x: number, y: number): void {
    this.points.push([x, y]);
  }
  setPenDown(): void {}
  setColor(): void {}
  setWidth(): void {}
  setFill(): void {}
  drawCircle(): void {}
  drawRectangle(): void {}
  drawLine(): void {}
  drawPolygon(): void {}
  drawArc(): void {}
  clear(): void {}
  resetState(): void {}
  present(): void {}
}

function programOf(source: string): Program {
  const parsed = parse(source, "lib.pen");
  if (!parsed.program) {
    assert.fail(`parse failed: ${JSON.stringify(parsed.diagnostics)}`);
  }
  return parsed.program;
}

function run(source: string, surface: DrawingSurface = new Lines()): RunResult {
  return execute(programOf(source), surface, { builtins: getBuiltins() });
}

describe("getBuiltins", () => {
  it("includes every drawing command, alias and math function", () => {
    const names = [
      "forward", "fd", "backward", "bk", "left", "lt", "right", "rt", "setheading", "seth",
      "penup", "pu", "pendown", "pd", "goto", "home", "circle", "rectangle", "rect", "line",
      "polygon", "arc", "color", "width", "fill", "nofill", "clear", "reset", "show", "hide",
      "xcor", "ycor", "heading",
      "sin", "cos", "tan", "asin", "acos", "atan", "atan2", "sqrt", "abs", "floor", "ceil",
      "round", "min", "max", "pow", "random", "pi", "e",
    ];
    const builtins = getBuiltins();
    assert.deepEqual([...builtins.keys()].sort(), [...names].sort());
    for (const [name, b] of builtins) {
      assert.equal(b.name, name);
    }
  });

  it("marks drawing commands and math functions", () => {
    const builtins = getBuiltins();
    assert.equal(builtins.get("circle")?.kind, "draw");
    assert.equal(builtins.get("sqrt")?.kind, "math");
  });
});

describe("built-ins under the evaluator", () => {
  it("draws a closed square", () => {
    const surface = new Lines();
    const result = run("for i = 1 to 4 {\n  forward(10)\n  right(90)\n}\nreturn heading()", surface);
    assert.deepEqual(result, { status: "completed", value: -270 });
    assert.deepEqual(surface.points, [[0, 10], [10, 10], [10, 0], [0, 0]]);
  });

  it("combines math functions", () => {
    assert.deepEqual(run("return round(sqrt(2) * 10)"), { status: "completed", value: 14 });
    assert.deepEqual(run("goto(3, 4)\nreturn xcor() + ycor()"), { status: "completed", value: 7 });
  });

  it("reports argument type errors at the call", () => {
    const result = run('forward("far")');
    if (result.status !== "error") {
      assert.fail("expected an error");
    }
    assert.deepEqual(result.error, {
      code: "E_ARG_TYPE",
      message: "forward: distance must be a number, got string.",
      span: { file: "lib.pen", startLine: 1, startCol: 1, endLine: 1, endCol: 15 },
      hint: "Usage: forward(distance)",
    });
  });

  it("reports math domain errors", () => {
    const result = run("var r = sqrt(-1)");
    assert.equal(result.status === "error" && result.error.code, "E_MATH_DOMAIN");
  });

  it("checks argument counts at run time", () => {
    const result = run("polygon(0, 0, 1, 1, 2, 2, 3)");
    if (result.status !== "error") {
      assert.fail("expected an error");
    }
    assert.equal(result.error.code, "E_ARG_COUNT");
    assert.equal(result.error.message, "'polygon' expects an even number of at least 6 argument(s), got 7.");
  });

  it("lets the validator check built-in argument counts", () => {
    const diags = validate(programOf("circle(1, 2)\nspin()"), { builtins: getBuiltins() });
    assert.deepEqual(
      diags.map((d) => d.message),
      ["'circle' expects 1 or 3 argument(s), got 2.", "Unknown function 'spin'."]
    );
  });
});
