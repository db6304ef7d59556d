/**
 * @pendraw/std - PenDraw built-in library
 */
import type { Builtin } from "@pendraw/core";
import { drawingBuiltins } from "./drawing-ops.js";
import { mathBuiltins } from "./math-ops.js";

export { drawingBuiltins } from "./drawing-ops.js";
export { mathBuiltins, sinDegrees, cosDegrees, toDegrees, roundHalfEven } from "./math-ops.js";
export { defineBuiltins, parseArgs } from "./define.js";
export type { BuiltinSpec } from "./define.js";

/**
 * Get all built-ins as a Map. Drawing commands are registered last so they
 * win any name clash with a math function.
 */
export function getBuiltins(): Map<string, Builtin> {
  const builtins = new Map<string, Builtin>();
  for (const b of [...mathBuiltins, ...drawingBuiltins]) {
    builtins.set(b.name, b);
  }
  return builtins;
}
