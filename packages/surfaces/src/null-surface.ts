import type { RenderSurface } from "./types.js";

/** Discards every primitive. */
export class NullSurface implements RenderSurface {
  moveTo(): void {}
  lineTo(): void {}
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

  render(): string {
    return "";
  }
}
