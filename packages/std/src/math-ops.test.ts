/**
 * Tests for PenDraw math functions.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createTurtle, PenRuntimeError, type DrawingSurface, type PenValue } from "@pendraw/core";
import { mathBuiltins, roundHalfEven, sinDegrees, cosDegrees } from "./math-ops.js";

const noop = (): void => {};
const surface: DrawingSurface = {
  moveTo: noop,
  lineTo: noop,
  setPenDown: noop,
  setColor: noop,
  setWidth: noop,
  setFill: noop,
  drawCircle: noop,
  drawRectangle: noop,
  drawLine: noop,
  drawPolygon: noop,
  drawArc: noop,
  clear: noop,
  resetState: noop,
  present: noop,
};

const byName = new Map(mathBuiltins.map((b) => [b.name, b]));

function call(name: string, ...args: PenValue[]): PenValue {
  const builtin = byName.get(name);
  if (!builtin) {
    assert.fail(`no built-in named ${name}`);
  }
  return builtin.execute(args, { surface, turtle: createTurtle() });
}

function callNumber(name: string, ...args: PenValue[]): number {
  const value = call(name, ...args);
  if (typeof value !== "number") {
    assert.fail(`${name} returned ${typeof value}`);
  }
  return value;
}

function assertClose(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} is not close to ${expected}`);
}

function assertPenError(fn: () => unknown, code: string, message: string): void {
  assert.throws(fn, (e: unknown) => {
    assert.ok(e instanceof PenRuntimeError);
    assert.equal(e.code, code);
    assert.equal(e.message, message);
    assert.equal(e.span, undefined);
    return true;
  });
}

describe("trigonometry", () => {
  it("works in degrees and is exact at right angles", () => {
    assert.equal(call("sin", 90), 1);
    assert.equal(call("sin", 180), 0);
    assert.equal(call("sin", -90), -1);
    assert.equal(call("cos", 0), 1);
    assert.equal(call("cos", 180), -1);
    assert.equal(call("cos", 450), 0);
    assertClose(callNumber("sin", 30), 0.5);
    assertClose(callNumber("cos", 60), 0.5);
    assertClose(callNumber("tan", 45), 1);
  });

  it("returns inverse functions in degrees", () => {
    assertClose(callNumber("asin", 1), 90);
    assertClose(callNumber("acos", 0), 90);
    assertClose(callNumber("atan", 1), 45);
    assertClose(callNumber("atan2", 1, -1), 135);
  });

  it("rejects inverse sine and cosine outside [-1, 1]", () => {
    assertPenError(() => call("asin", 2), "E_MATH_DOMAIN", "asin: argument must be between -1 and 1, got 2.");
    assertPenError(() => call("acos", -1.5), "E_MATH_DOMAIN", "acos: argument must be between -1 and 1, got -1.5.");
  });

  it("exposes the degree helpers", () => {
    assert.equal(sinDegrees(270), -1);
    assert.equal(cosDegrees(-180), -1);
    assert.equal(cosDegrees(90), 0);
  });
});

describe("arithmetic functions", () => {
  it("computes square roots and rejects negatives", () => {
    assert.equal(call("sqrt", 16), 4);
    assertPenError(() => call("sqrt", -4), "E_MATH_DOMAIN", "sqrt: argument must not be negative, got -4.");
  });

  it("rounds", () => {
    assert.equal(call("abs", -3), 3);
    assert.equal(call("floor", -1.5), -2);
    assert.equal(call("ceil", 1.2), 2);
    assert.equal(call("round", 2.4), 2);
    assert.equal(call("round", 3.5), 4);
  });

  it("rounds halves to even", () => {
    assert.equal(roundHalfEven(0.5), 0);
    assert.equal(roundHalfEven(1.5), 2);
    assert.equal(roundHalfEven(2.5), 2);
    assert.equal(roundHalfEven(-2.5), -2);
    assert.equal(roundHalfEven(-3.5), -4);
  });

  it("takes the minimum and maximum of any number of values", () => {
    assert.equal(call("min", 3, 1, 2), 1);
    assert.equal(call("max", 3, 1, 2), 3);
    assert.equal(call("min", 5), 5);
  });

  it("raises to a power", () => {
    assert.equal(call("pow", 2, 10), 1024);
  });

  it("returns constants and random numbers", () => {
    assert.equal(call("pi"), Math.PI);
    assert.equal(call("e"), Math.E);
    for (let i = 0; i < 20; i++) {
      const r = callNumber("random");
      assert.ok(r >= 0 && r < 1);
    }
  });
});

describe("argument validation", () => {
  it("rejects non-numbers with the parameter name", () => {
    assertPenError(() => call("sin", "a"), "E_ARG_TYPE", "sin: x must be a number, got string.");
    assertPenError(() => call("min", 1, true), "E_ARG_TYPE", "min: x must be a number, got boolean.");
    assertPenError(() => call("pow", 2, null), "E_ARG_TYPE", "pow: exponent must be a number, got null.");
  });

  it("points to the usage line", () => {
    assert.throws(
      () => call("atan2", "y", 1),
      (e: unknown) => e instanceof PenRuntimeError && e.hint === "Usage: atan2(y, x)"
    );
  });
});
