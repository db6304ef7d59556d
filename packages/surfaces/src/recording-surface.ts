/**
 * PenDraw recording surface
 * Keeps every primitive call in order, for tests and JSON output.
 */
import type { RenderSurface } from "./types.js";

export type SurfaceOp =
  | "moveTo"
  | "lineTo"
  | "setPenDown"
  | "setColor"
  | "setWidth"
  | "setFill"
  | "drawCircle"
  | "drawRectangle"
  | "drawLine"
  | "drawPolygon"
  | "drawArc"
  | "clear"
  | "resetState"
  | "present";

export type RecordedArg = number | string | boolean | Array<[number, number]>;

export interface RecordedCall {
  op: SurfaceOp;
  args: RecordedArg[];
}

export class RecordingSurface implements RenderSurface {
  readonly calls: RecordedCall[] = [];

  private record(op: SurfaceOp, ...args: Array<RecordedArg | undefined>): void {
    // Optional trailing arguments the caller left out are not recorded.
    const present = args.filter((a): a is RecordedArg => a !== undefined);
    this.calls.push({ op, args: present });
  }

  moveTo(x: number, y: number): void {
    this.record("moveTo", x, y);
  }

  lineTo(x: number, y: number): void {
    this.record("lineTo", x, y);
  }

  setPenDown(down: boolean): void {
    this.record("setPenDown", down);
  }

  setColor(color: string): void {
    this.record("setColor", color);
  }

  setWidth(width: number): void {
    this.record("setWidth", width);
  }

  setFill(fill: boolean): void {
    this.record("setFill", fill);
  }

  drawCircle(radius: number, cx?: number, cy?: number): void {
    this.record("drawCircle", radius, cx, cy);
  }

  drawRectangle(width: number, height: number, x?: number, y?: number): void {
    this.record("drawRectangle", width, height, x, y);
  }

  drawLine(x1: number, y1: number, x2: number, y2: number): void {
    this.record("drawLine", x1, y1, x2, y2);
  }

  drawPolygon(points: ReadonlyArray<readonly [number, number]>): void {
    this.record("drawPolygon", points.map(([x, y]): [number, number] => [x, y]));
  }

  drawArc(width: number, height: number, angle: number): void {
    this.record("drawArc", width, height, angle);
  }

  clear(): void {
    this.record("clear");
  }

  resetState(): void {
    this.record("resetState");
  }

  present(): void {
    this.record("present");
  }

  /** Names of the recorded operations, in order. */
  ops(): SurfaceOp[] {
    return this.calls.map((c) => c.op);
  }

  render(): string {
    return JSON.stringify(this.calls, null, 2) + "\n";
  }
}
