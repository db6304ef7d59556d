/**
 * @pendraw/surfaces - Drawing surfaces for PenDraw programs
 */
import type { PenConfig } from "@pendraw/core";
export { registerSurface, getSurface, getAllSurfaces } from "./registry.js";
export { RecordingSurface } from "./recording-surface.js";
export type { RecordedCall, RecordedArg, SurfaceOp } from "./recording-surface.js";
export { SvgSurface } from "./svg-surface.js";
export { NullSurface } from "./null-surface.js";
export {
  SurfaceOptionsSchema,
  SurfaceOptionsError,
  parseSurfaceOptions,
} from "./schemas.js";
export type { SurfaceOptions, SurfaceOptionsInput } from "./schemas.js";
export type { RenderSurface, SurfaceFactory } from "./types.js";

import { registerSurface } from "./registry.js";
import { RecordingSurface } from "./recording-surface.js";
import { SvgSurface } from "./svg-surface.js";
import { NullSurface } from "./null-surface.js";
import { parseSurfaceOptions, type SurfaceOptionsInput } from "./schemas.js";

/**
 * Register the surfaces that ship with PenDraw: svg, json and null.
 */
export function registerBuiltinSurfaces(): void {
  registerSurface("svg", {
    description: "SVG document sized from the canvas settings",
    extension: ".svg",
    create: (options) => new SvgSurface(options),
  });
  registerSurface("json", {
    description: "JSON list of every drawing call",
    extension: ".json",
    create: (options) => {
      parseSurfaceOptions("json", options);
      return new RecordingSurface();
    },
  });
  registerSurface("null", {
    description: "Runs the program and discards the drawing",
    extension: null,
    create: (options) => {
      parseSurfaceOptions("null", options);
      return new NullSurface();
    },
  });
}

/** Surface options taken from a resolved configuration. */
export function surfaceOptionsFromConfig(config: PenConfig): SurfaceOptionsInput {
  return {
    width: config.canvas.width,
    height: config.canvas.height,
    background: config.canvas.background,
    color: config.pen.color,
    penWidth: config.pen.width,
  };
}
