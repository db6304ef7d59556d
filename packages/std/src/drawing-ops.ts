/**
 * PenDraw stdlib: drawing commands
 * Turtle motion, pen state, shapes and turtle queries.
 */
import { createTurtle } from "@pendraw/core";
import type { Builtin, BuiltinContext } from "@pendraw/core";
import { defineBuiltins } from "./define.js";
import { cosDegrees, sinDegrees } from "./math-ops.js";
import {
  angleSchema,
  arcSchema,
  circleSchema,
  colorSchema,
  distanceSchema,
  lineSchema,
  noArgsSchema,
  penWidthSchema,
  pointSchema,
  polygonSchema,
  rectangleSchema,
} from "./schemas.js";

/** Move to an absolute point, drawing when the pen is down. */
function moveTurtle(ctx: BuiltinContext, x: number, y: number): void {
  if (ctx.turtle.penDown) {
    ctx.surface.lineTo(x, y);
  } else {
    ctx.surface.moveTo(x, y);
  }
  ctx.turtle.x = x;
  ctx.turtle.y = y;
}

function advance(ctx: BuiltinContext, distance: number): void {
  const { x, y, heading } = ctx.turtle;
  moveTurtle(ctx, x + distance * cosDegrees(heading), y + distance * sinDegrees(heading));
}

function setPen(ctx: BuiltinContext, down: boolean): void {
  ctx.turtle.penDown = down;
  ctx.surface.setPenDown(down);
}

function noArgs(names: string[], effect: (ctx: BuiltinContext) => void): Builtin[] {
  return defineBuiltins("draw", {
    names,
    params: "",
    arity: 0,
    args: noArgsSchema,
    run: (_args, ctx) => {
      effect(ctx);
      return null;
    },
  });
}

function query(name: string, read: (ctx: BuiltinContext) => number): Builtin[] {
  return defineBuiltins("draw", {
    names: [name],
    params: "",
    arity: 0,
    args: noArgsSchema,
    run: (_args, ctx) => read(ctx),
  });
}

// --- Motion ---

const motion: Builtin[] = [
  ...defineBuiltins("draw", {
    names: ["forward", "fd"],
    params: "distance",
    arity: 1,
    args: distanceSchema,
    run: ([distance], ctx) => {
      advance(ctx, distance);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["backward", "bk"],
    params: "distance",
    arity: 1,
    args: distanceSchema,
    run: ([distance], ctx) => {
      advance(ctx, -distance);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["left", "lt"],
    params: "degrees",
    arity: 1,
    args: angleSchema,
    run: ([degrees], ctx) => {
      ctx.turtle.heading += degrees;
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["right", "rt"],
    params: "degrees",
    arity: 1,
    args: angleSchema,
    run: ([degrees], ctx) => {
      ctx.turtle.heading -= degrees;
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["setheading", "seth"],
    params: "degrees",
    arity: 1,
    args: angleSchema,
    run: ([degrees], ctx) => {
      ctx.turtle.heading = degrees;
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["goto"],
    params: "x, y",
    arity: 2,
    args: pointSchema,
    run: ([x, y], ctx) => {
      moveTurtle(ctx, x, y);
      return null;
    },
  }),
  ...noArgs(["home"], (ctx) => {
    moveTurtle(ctx, 0, 0);
    ctx.turtle.heading = 90;
  }),
];

// --- Pen state ---

const pen: Builtin[] = [
  ...noArgs(["penup", "pu"], (ctx) => setPen(ctx, false)),
  ...noArgs(["pendown", "pd"], (ctx) => setPen(ctx, true)),
  ...defineBuiltins("draw", {
    names: ["color"],
    params: "name",
    arity: 1,
    args: colorSchema,
    run: ([color], ctx) => {
      ctx.surface.setColor(color);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["width"],
    params: "size",
    arity: 1,
    args: penWidthSchema,
    run: ([size], ctx) => {
      ctx.surface.setWidth(size);
      return null;
    },
  }),
  ...noArgs(["fill"], (ctx) => ctx.surface.setFill(true)),
  ...noArgs(["nofill"], (ctx) => ctx.surface.setFill(false)),
];

// --- Shapes ---

const shapes: Builtin[] = [
  ...defineBuiltins("draw", {
    names: ["circle"],
    params: "radius [, x, y]",
    arity: [1, 3],
    args: circleSchema,
    run: ([radius, ...center], ctx) => {
      const [cx = ctx.turtle.x, cy = ctx.turtle.y] = center;
      ctx.surface.drawCircle(radius, cx, cy);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["rectangle", "rect"],
    params: "width, height [, x, y]",
    arity: [2, 4],
    args: rectangleSchema,
    run: ([w, h, ...corner], ctx) => {
      const [x = ctx.turtle.x, y = ctx.turtle.y] = corner;
      ctx.surface.drawRectangle(w, h, x, y);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["line"],
    params: "x1, y1, x2, y2",
    arity: 4,
    args: lineSchema,
    run: ([x1, y1, x2, y2], ctx) => {
      ctx.surface.drawLine(x1, y1, x2, y2);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["polygon"],
    params: "x1, y1, x2, y2, x3, y3, ...",
    arity: { min: 6, multipleOf: 2 },
    args: polygonSchema,
    run: (coords, ctx) => {
      const points: Array<[number, number]> = [];
      for (let i = 0; i + 1 < coords.length; i += 2) {
        points.push([coords[i], coords[i + 1]]);
      }
      ctx.surface.drawPolygon(points);
      return null;
    },
  }),
  ...defineBuiltins("draw", {
    names: ["arc"],
    params: "width, height [, angle]",
    arity: [2, 3],
    args: arcSchema,
    run: ([w, h, angle = 0], ctx) => {
      ctx.surface.drawArc(w, h, angle);
      return null;
    },
  }),
];

// --- Canvas ---

const canvas: Builtin[] = [
  ...noArgs(["clear"], (ctx) => ctx.surface.clear()),
  ...noArgs(["reset"], (ctx) => {
    Object.assign(ctx.turtle, createTurtle());
    ctx.surface.resetState();
  }),
  ...noArgs(["show"], (ctx) => ctx.surface.present()),
  ...noArgs(["hide"], () => {}),
];

const queries: Builtin[] = [
  ...query("xcor", (ctx) => ctx.turtle.x),
  ...query("ycor", (ctx) => ctx.turtle.y),
  ...query("heading", (ctx) => ctx.turtle.heading),
];

export const drawingBuiltins: Builtin[] = [...motion, ...pen, ...shapes, ...canvas, ...queries];
