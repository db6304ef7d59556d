/**
 * PenDraw stdlib: math functions
 * Trigonometry works in degrees.
 */
import { PenRuntimeError } from "@pendraw/core";
import type { Builtin } from "@pendraw/core";
import { defineBuiltins } from "./define.js";
import { atan2Schema, noArgsSchema, numbersSchema, powSchema, unarySchema } from "./schemas.js";

const RAD_PER_DEG = Math.PI / 180;

/** Sine of an angle in degrees, exact at multiples of 90. */
export function sinDegrees(deg: number): number {
  const quadrant = deg / 90;
  if (Number.isInteger(quadrant)) {
    return [0, 1, 0, -1][((quadrant % 4) + 4) % 4];
  }
  return Math.sin(deg * RAD_PER_DEG);
}

/** Cosine of an angle in degrees, exact at multiples of 90. */
export function cosDegrees(deg: number): number {
  return sinDegrees(deg + 90);
}

export function toDegrees(rad: number): number {
  return rad / RAD_PER_DEG;
}

/** Round half to even: 0.5 -> 0, 1.5 -> 2, 2.5 -> 2. */
export function roundHalfEven(x: number): number {
  const r = Math.round(x);
  if (Math.abs(x % 1) === 0.5 && r % 2 !== 0) return r - 1;
  return r;
}

function unary(names: string[], fn: (x: number) => number): Builtin[] {
  return defineBuiltins("math", {
    names,
    params: "x",
    arity: 1,
    args: unarySchema,
    run: ([x]) => fn(x),
  });
}

function inverseTrig(name: "asin" | "acos", fn: (x: number) => number): Builtin[] {
  return unary([name], (x) => {
    if (x < -1 || x > 1) {
      throw new PenRuntimeError(
        "E_MATH_DOMAIN",
        `${name}: argument must be between -1 and 1, got ${x}.`
      );
    }
    return toDegrees(fn(x));
  });
}

function constant(name: string, value: number): Builtin[] {
  return defineBuiltins("math", {
    names: [name],
    params: "",
    arity: 0,
    args: noArgsSchema,
    run: () => value,
  });
}

export const mathBuiltins: Builtin[] = [
  ...unary(["sin"], sinDegrees),
  ...unary(["cos"], cosDegrees),
  ...unary(["tan"], (x) => sinDegrees(x) / cosDegrees(x)),
  ...inverseTrig("asin", Math.asin),
  ...inverseTrig("acos", Math.acos),
  ...unary(["atan"], (x) => toDegrees(Math.atan(x))),
  ...defineBuiltins("math", {
    names: ["atan2"],
    params: "y, x",
    arity: 2,
    args: atan2Schema,
    run: ([y, x]) => toDegrees(Math.atan2(y, x)),
  }),
  ...unary(["sqrt"], (x) => {
    if (x < 0) {
      throw new PenRuntimeError("E_MATH_DOMAIN", `sqrt: argument must not be negative, got ${x}.`);
    }
    return Math.sqrt(x);
  }),
  ...unary(["abs"], Math.abs),
  ...unary(["floor"], Math.floor),
  ...unary(["ceil"], Math.ceil),
  ...unary(["round"], roundHalfEven),
  ...defineBuiltins("math", {
    names: ["min"],
    params: "x, ...",
    arity: { min: 1 },
    args: numbersSchema,
    run: (xs) => Math.min(...xs),
  }),
  ...defineBuiltins("math", {
    names: ["max"],
    params: "x, ...",
    arity: { min: 1 },
    args: numbersSchema,
    run: (xs) => Math.max(...xs),
  }),
  ...defineBuiltins("math", {
    names: ["pow"],
    params: "base, exponent",
    arity: 2,
    args: powSchema,
    run: ([base, exponent]) => base ** exponent,
  }),
  ...defineBuiltins("math", {
    names: ["random"],
    params: "",
    arity: 0,
    args: noArgsSchema,
    run: () => Math.random(),
  }),
  ...constant("pi", Math.PI),
  ...constant("e", Math.E),
];
